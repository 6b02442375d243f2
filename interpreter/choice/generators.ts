/**
 * Selection policies for trial sequences.
 *
 * Each generator takes a collection and returns a Sequence that yields one
 * element per pull. The collection is copied on construction, so later
 * changes to the caller's array do not affect the output (elements that are
 * themselves mutable are shared, not cloned).
 *
 * Bounded generators stop after `cycles` passes over the collection and then
 * raise SequenceExhaustedError; `cycles` defaults to Infinity.
 */

import { InvalidArgumentError } from '@core/errors/InvalidArgumentError';
import { compareValues } from '@core/utils/value-utils';
import { choiceLogger as logger } from '@core/utils/logger';
import type { Value } from '@core/types/value';
import { Sequence } from './Sequence';
import { RandomSource } from './random';

export interface CycleOptions {
  /** Number of passes over the collection */
  cycles?: number;
}

export interface RandomOptions {
  /** Seed for the generator's private random source */
  seed?: number | null;
}

export type ShuffledOptions = CycleOptions & RandomOptions;

export const CHOICE_NAMES = [
  'ascending',
  'descending',
  'exact_order',
  'shuffled_set',
  'pseudorandom',
  'counterbalanced'
] as const;

export type ChoiceName = typeof CHOICE_NAMES[number];

export function isChoiceName(value: string): value is ChoiceName {
  return (CHOICE_NAMES as readonly string[]).includes(value);
}

/**
 * Rejects empty collections and hands back a shallow copy the generator can
 * reorder freely.
 */
function checkSequence<T extends Value>(kind: string, sequence: readonly T[]): T[] {
  if (sequence.length === 0) {
    throw new InvalidArgumentError('Cannot use an empty sequence', { sequence: kind });
  }
  return [...sequence];
}

function checkCycles(kind: string, cycles: number | undefined): number {
  const value = cycles ?? Infinity;
  if (Number.isNaN(value) || value < 0) {
    throw new InvalidArgumentError(`cycles must be a non-negative number, got ${value}`, { sequence: kind });
  }
  return value;
}

function* repeatCycles<T extends Value>(items: T[], cycles: number, prepare?: (items: T[]) => T[]): Generator<T> {
  for (let cycle = 0; cycle < cycles; cycle++) {
    const order = prepare ? prepare(items) : items;
    for (const item of order) {
      yield item;
    }
  }
}

/**
 * Returns elements in ascending order, looping back to the smallest after
 * the largest.
 */
export function ascending<T extends Value>(sequence: readonly T[], options: CycleOptions = {}): Sequence<T> {
  const items = checkSequence('ascending', sequence).sort(compareValues);
  const cycles = checkCycles('ascending', options.cycles);
  return new Sequence('ascending', repeatCycles(items, cycles));
}

/**
 * Returns elements in descending order, looping back to the largest after
 * the smallest.
 */
export function descending<T extends Value>(sequence: readonly T[], options: CycleOptions = {}): Sequence<T> {
  const items = checkSequence('descending', sequence).sort((a, b) => compareValues(b, a));
  const cycles = checkCycles('descending', options.cycles);
  return new Sequence('descending', repeatCycles(items, cycles));
}

/**
 * Returns elements in the order they were provided.
 */
export function exactOrder<T extends Value>(sequence: readonly T[], options: CycleOptions = {}): Sequence<T> {
  const items = checkSequence('exact_order', sequence);
  const cycles = checkCycles('exact_order', options.cycles);
  return new Sequence('exact_order', repeatCycles(items, cycles));
}

/**
 * Draws without replacement: every cycle is a fresh random permutation of
 * the whole collection.
 */
export function shuffledSet<T extends Value>(sequence: readonly T[], options: ShuffledOptions = {}): Sequence<T> {
  const items = checkSequence('shuffled_set', sequence);
  const cycles = checkCycles('shuffled_set', options.cycles);
  const random = new RandomSource(options.seed);
  return new Sequence('shuffled_set', repeatCycles(items, cycles, current => random.shuffle([...current])));
}

/**
 * Draws uniformly with replacement, forever.
 */
export function pseudorandom<T extends Value>(sequence: readonly T[], options: RandomOptions = {}): Sequence<T> {
  const items = checkSequence('pseudorandom', sequence);
  const random = new RandomSource(options.seed);

  function* draw(): Generator<T> {
    while (true) {
      yield items[random.nextInt(items.length)];
    }
  }

  return new Sequence('pseudorandom', draw());
}

/**
 * Presents each entry of `sequence` an equal number of times over every
 * block of `n` draws. Entries are counted, not distinct values, so a value
 * listed twice fills twice the share of the block. The block is split as
 * evenly as integer division allows (earlier entries take the remainder),
 * shuffled, and rebuilt at each block boundary. Drawing a number of values
 * that is not a multiple of `n` leaves the last block unbalanced.
 */
export function counterbalanced<T extends Value>(
  sequence: readonly T[],
  n: number,
  options: ShuffledOptions = {}
): Sequence<T> {
  const items = checkSequence('counterbalanced', sequence);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError(`n must be a positive integer, got ${n}`, { sequence: 'counterbalanced' });
  }
  const cycles = checkCycles('counterbalanced', options.cycles);
  const random = new RandomSource(options.seed);

  if (n < items.length) {
    logger.warn('counterbalanced block is smaller than the number of values', { n, values: items.length });
  }

  const buildBlock = (values: T[]): T[] => {
    const block: T[] = [];
    const base = Math.floor(n / values.length);
    const remainder = n % values.length;
    values.forEach((value, index) => {
      const count = base + (index < remainder ? 1 : 0);
      for (let i = 0; i < count; i++) {
        block.push(value);
      }
    });
    return random.shuffle(block);
  };

  return new Sequence('counterbalanced', repeatCycles(items, cycles, buildBlock));
}

/**
 * Builds a sequence by policy name, as used by selectors
 */
export function createSequence<T extends Value>(
  name: ChoiceName,
  sequence: readonly T[],
  options: ShuffledOptions & { n?: number } = {}
): Sequence<T> {
  switch (name) {
    case 'ascending':
      return ascending(sequence, options);
    case 'descending':
      return descending(sequence, options);
    case 'exact_order':
      return exactOrder(sequence, options);
    case 'shuffled_set':
      return shuffledSet(sequence, options);
    case 'pseudorandom':
      return pseudorandom(sequence, options);
    case 'counterbalanced':
      return counterbalanced(sequence, options.n ?? sequence.length, options);
  }
}
