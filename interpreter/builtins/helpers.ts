/**
 * Helper functions available to formulas.
 *
 * Formulas can only call what is registered here; there is no other way to
 * reach host functionality from an expression. Helpers receive evaluated
 * positional and keyword arguments and return a plain value, or a Sequence
 * in the case of the generator constructors.
 */

import { FormulaEvaluationError } from '@core/errors/FormulaEvaluationError';
import { InvalidArgumentError } from '@core/errors/InvalidArgumentError';
import type { Value } from '@core/types/value';
import { compareValues, describeValue } from '@core/utils/value-utils';
import {
  ascending,
  counterbalanced,
  descending,
  exactOrder,
  pseudorandom,
  shuffledSet
} from '@interpreter/choice/generators';
import { RandomSource } from '@interpreter/choice/random';
import type { Sequence } from '@interpreter/choice/Sequence';
import { bindArguments, noKeywords, optional, toInteger, toList, toNumber } from './arguments';

/**
 * What a formula can evaluate to. Sequences only ever come out of generator
 * constructors and are consumed by ParameterExpression.
 */
export type FormulaResult = Value | Sequence;

export type HelperFunction = (args: Value[], keywords: Record<string, Value>) => FormulaResult;

export type HelperTable = Readonly<Record<string, HelperFunction>>;

// Shared source for the unseeded helpers (choice, toss, uniform, randint)
// and for the seeds of generators called without one
let helperRandom = new RandomSource();

/**
 * Reseeds the random source shared by the unseeded helpers. Generators with
 * their own `seed` argument are unaffected.
 */
export function seedHelpers(seed?: number | null): void {
  helperRandom = new RandomSource(seed);
}

/**
 * Rounds halves to the nearest even number
 */
export function roundHalfEven(value: number, digits = 0): number {
  const factor = 10 ** digits;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;
  let rounded: number;
  if (fraction > 0.5) {
    rounded = floor + 1;
  } else if (fraction < 0.5) {
    rounded = floor;
  } else {
    rounded = floor % 2 === 0 ? floor : floor + 1;
  }
  return rounded / factor;
}

function cyclesOf(helper: string, value: Value | undefined): number | undefined {
  const cycles = optional(value);
  return cycles === undefined ? undefined : toInteger(helper, 'cycles', cycles);
}

function seedOf(helper: string, value: Value | undefined): number {
  const seed = optional(value);
  return seed === undefined ? helperRandom.nextInt(4294967296) : toInteger(helper, 'seed', seed);
}

/**
 * Collects the values of min()/max()/sum(): either one list argument or
 * several positionals.
 */
function spread(helper: string, args: Value[]): Value[] {
  if (args.length === 1) {
    return toList(helper, 'iterable', args[0]);
  }
  return args;
}

function extreme(helper: string, args: Value[], keywords: Record<string, Value>, sign: 1 | -1): Value {
  noKeywords(helper, keywords);
  const values = spread(helper, args);
  if (values.length === 0) {
    throw new FormulaEvaluationError(`${helper}() arg is an empty sequence`, { helper });
  }
  return values.reduce((best, candidate) => {
    try {
      return sign * compareValues(candidate, best) > 0 ? candidate : best;
    } catch (error) {
      throw new FormulaEvaluationError(`${helper}() cannot compare values`, { helper }, error);
    }
  });
}

function arange(start: number, stop: number, step: number): number[] {
  if (step === 0) {
    throw new FormulaEvaluationError('range() step must not be zero', { helper: 'range' });
  }
  const count = Math.max(0, Math.ceil((stop - start) / step));
  return Array.from({ length: count }, (_, index) => start + index * step);
}

export const helpers: HelperTable = {
  // Generator constructors

  ascending: (args, keywords) => {
    const [sequence, cycles] = bindArguments({ name: 'ascending', params: ['sequence', 'cycles'], required: 1 }, args, keywords);
    return ascending(toList('ascending', 'sequence', sequence), { cycles: cyclesOf('ascending', cycles) });
  },

  descending: (args, keywords) => {
    const [sequence, cycles] = bindArguments({ name: 'descending', params: ['sequence', 'cycles'], required: 1 }, args, keywords);
    return descending(toList('descending', 'sequence', sequence), { cycles: cyclesOf('descending', cycles) });
  },

  exact_order: (args, keywords) => {
    const [sequence, cycles] = bindArguments({ name: 'exact_order', params: ['sequence', 'cycles'], required: 1 }, args, keywords);
    return exactOrder(toList('exact_order', 'sequence', sequence), { cycles: cyclesOf('exact_order', cycles) });
  },

  shuffled_set: (args, keywords) => {
    const [sequence, cycles, seed] = bindArguments(
      { name: 'shuffled_set', params: ['sequence', 'cycles', 'seed'], required: 1 },
      args,
      keywords
    );
    return shuffledSet(toList('shuffled_set', 'sequence', sequence), {
      cycles: cyclesOf('shuffled_set', cycles),
      seed: seedOf('shuffled_set', seed)
    });
  },

  pseudorandom: (args, keywords) => {
    const [sequence, seed] = bindArguments({ name: 'pseudorandom', params: ['sequence', 'seed'], required: 1 }, args, keywords);
    return pseudorandom(toList('pseudorandom', 'sequence', sequence), { seed: seedOf('pseudorandom', seed) });
  },

  counterbalanced: (args, keywords) => {
    const [sequence, n, cycles, seed] = bindArguments(
      { name: 'counterbalanced', params: ['sequence', 'n', 'cycles', 'seed'], required: 2 },
      args,
      keywords
    );
    return counterbalanced(toList('counterbalanced', 'sequence', sequence), toInteger('counterbalanced', 'n', n), {
      cycles: cyclesOf('counterbalanced', cycles),
      seed: seedOf('counterbalanced', seed)
    });
  },

  // Experiment helpers

  choice: (args, keywords) => {
    const [sequence] = bindArguments({ name: 'choice', params: ['sequence'] }, args, keywords);
    const items = toList('choice', 'sequence', sequence);
    if (items.length === 0) {
      throw new InvalidArgumentError('Cannot use an empty sequence', { helper: 'choice' });
    }
    return items[helperRandom.nextInt(items.length)];
  },

  toss: (args, keywords) => {
    const [x] = bindArguments({ name: 'toss', params: ['x'], required: 0 }, args, keywords);
    const probability = x === undefined ? 0.5 : toNumber('toss', 'x', x);
    return helperRandom.next() <= probability;
  },

  h_uniform: (args, keywords) => {
    const [x, lb, ub] = bindArguments({ name: 'h_uniform', params: ['x', 'lb', 'ub'] }, args, keywords);
    const sample = toNumber('h_uniform', 'x', x);
    const lower = toNumber('h_uniform', 'lb', lb);
    const upper = toNumber('h_uniform', 'ub', ub);
    if (sample < lower) {
      return 0;
    }
    if (sample >= upper) {
      return 1;
    }
    return 1 / (upper - sample);
  },

  imul: (args, keywords) => {
    const [x, y] = bindArguments({ name: 'imul', params: ['x', 'y'] }, args, keywords);
    const step = toNumber('imul', 'y', y);
    const coerce = (value: Value): number => roundHalfEven(toNumber('imul', 'x', value) / step) * step;
    return Array.isArray(x) ? x.map(coerce) : coerce(x ?? null);
  },

  octave_space: (args, keywords) => {
    const [start, end, spacing] = bindArguments({ name: 'octave_space', params: ['start', 'end', 'spacing'] }, args, keywords);
    const step = toNumber('octave_space', 'spacing', spacing);
    const snap = (frequency: number): number => roundHalfEven(Math.log2(frequency / 1e3) / step) * step;
    const startOctave = snap(toNumber('octave_space', 'start', start));
    const endOctave = snap(toNumber('octave_space', 'end', end));
    return arange(startOctave, endOctave + step, step).map(octave => 2 ** octave * 1e3);
  },

  // General purpose

  range: (args, keywords) => {
    noKeywords('range', keywords);
    if (args.length === 1) {
      return arange(0, toInteger('range', 'stop', args[0]), 1);
    }
    if (args.length === 2 || args.length === 3) {
      const step = args.length === 3 ? toInteger('range', 'step', args[2]) : 1;
      return arange(toInteger('range', 'start', args[0]), toInteger('range', 'stop', args[1]), step);
    }
    throw new FormulaEvaluationError(`range() expected 1 to 3 arguments, got ${args.length}`, { helper: 'range' });
  },

  len: (args, keywords) => {
    const [value] = bindArguments({ name: 'len', params: ['obj'] }, args, keywords);
    if (typeof value === 'string' || Array.isArray(value)) {
      return value.length;
    }
    if (value !== undefined && value !== null && typeof value === 'object') {
      return Object.keys(value).length;
    }
    throw new FormulaEvaluationError(`object of type ${describeValue(value)} has no len()`, { helper: 'len' });
  },

  abs: (args, keywords) => {
    const [x] = bindArguments({ name: 'abs', params: ['x'] }, args, keywords);
    return Math.abs(toNumber('abs', 'x', x));
  },

  min: (args, keywords) => extreme('min', args, keywords, -1),

  max: (args, keywords) => extreme('max', args, keywords, 1),

  sum: (args, keywords) => {
    noKeywords('sum', keywords);
    return spread('sum', args).reduce<number>((total, value) => total + toNumber('sum', 'iterable', value), 0);
  },

  round: (args, keywords) => {
    const [x, ndigits] = bindArguments({ name: 'round', params: ['number', 'ndigits'], required: 1 }, args, keywords);
    const digits = optional(ndigits);
    return roundHalfEven(toNumber('round', 'number', x), digits === undefined ? 0 : toInteger('round', 'ndigits', digits));
  },

  int: (args, keywords) => {
    const [x] = bindArguments({ name: 'int', params: ['x'] }, args, keywords);
    if (typeof x === 'string') {
      const parsed = Number(x.trim());
      if (x.trim() === '' || !Number.isInteger(parsed)) {
        throw new FormulaEvaluationError(`invalid literal for int(): '${x}'`, { helper: 'int' });
      }
      return parsed;
    }
    return Math.trunc(toNumber('int', 'x', x));
  },

  float: (args, keywords) => {
    const [x] = bindArguments({ name: 'float', params: ['x'] }, args, keywords);
    if (typeof x === 'string') {
      const parsed = Number(x.trim());
      if (x.trim() === '' || Number.isNaN(parsed)) {
        throw new FormulaEvaluationError(`could not convert string to float: '${x}'`, { helper: 'float' });
      }
      return parsed;
    }
    return toNumber('float', 'x', x);
  },

  randint: (args, keywords) => {
    const [low, high] = bindArguments({ name: 'randint', params: ['low', 'high'] }, args, keywords);
    const lower = toInteger('randint', 'low', low);
    const upper = toInteger('randint', 'high', high);
    if (upper <= lower) {
      throw new FormulaEvaluationError(`randint() low >= high (${lower} >= ${upper})`, { helper: 'randint' });
    }
    return lower + helperRandom.nextInt(upper - lower);
  },

  uniform: (args, keywords) => {
    const [low, high] = bindArguments({ name: 'uniform', params: ['low', 'high'], required: 0 }, args, keywords);
    const lower = low === undefined ? 0 : toNumber('uniform', 'low', low);
    const upper = high === undefined ? 1 : toNumber('uniform', 'high', high);
    return lower + helperRandom.next() * (upper - lower);
  },

  time: (args, keywords) => {
    bindArguments({ name: 'time', params: [] }, args, keywords);
    return Date.now() / 1000;
  }
};

export function isHelperName(name: string, table: HelperTable = helpers): boolean {
  return Object.prototype.hasOwnProperty.call(table, name);
}
