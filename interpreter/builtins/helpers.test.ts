import { describe, it, expect, beforeEach } from 'vitest';
import { FormulaEvaluationError } from '@core/errors/FormulaEvaluationError';
import { InvalidArgumentError } from '@core/errors/InvalidArgumentError';
import { isSequence } from '@interpreter/choice/Sequence';
import { helpers, isHelperName, roundHalfEven, seedHelpers } from './helpers';

describe('formula helpers', () => {
  beforeEach(() => {
    seedHelpers(1234);
  });

  describe('h_uniform', () => {
    it.each([
      [0, 0],
      [3, 0.25],
      [4, 1 / 3],
      [6, 1],
      [7, 1]
    ])('h_uniform(%d, 3, 7) is %d', (x, expected) => {
      expect(helpers.h_uniform([x, 3, 7], {})).toBe(expected);
    });
  });

  describe('imul', () => {
    it('coerces to the nearest multiple', () => {
      expect(helpers.imul([7, 5], {})).toBe(5);
      expect(helpers.imul([[7, 12], 5], {})).toEqual([5, 10]);
    });

    it('rounds halves to even', () => {
      expect(helpers.imul([7.5, 5], {})).toBe(10);
      expect(helpers.imul([2.5, 1], {})).toBe(2);
    });
  });

  it('spaces frequencies by octave', () => {
    expect(helpers.octave_space([2000, 16000, 1], {})).toEqual([2000, 4000, 8000, 16000]);
  });

  describe('roundHalfEven', () => {
    it('rounds halves to even', () => {
      expect(roundHalfEven(2.5)).toBe(2);
      expect(roundHalfEven(3.5)).toBe(4);
      expect(roundHalfEven(-2.5)).toBe(-2);
      expect(roundHalfEven(1.25, 1)).toBe(1.2);
      expect(roundHalfEven(2.6)).toBe(3);
    });
  });

  describe('range', () => {
    it('takes start, stop and step', () => {
      expect(helpers.range([3], {})).toEqual([0, 1, 2]);
      expect(helpers.range([5, 6], {})).toEqual([5]);
      expect(helpers.range([1, 7, 2], {})).toEqual([1, 3, 5]);
      expect(helpers.range([5, 0, -2], {})).toEqual([5, 3, 1]);
      expect(helpers.range([4, 2], {})).toEqual([]);
    });

    it('requires integers', () => {
      expect(() => helpers.range([1.5], {})).toThrow(FormulaEvaluationError);
    });
  });

  describe('general purpose helpers', () => {
    it('computes aggregates', () => {
      expect(helpers.len(['abc'], {})).toBe(3);
      expect(helpers.len([[1, 2]], {})).toBe(2);
      expect(helpers.min([[3, 1, 2]], {})).toBe(1);
      expect(helpers.max([3, 1, 2], {})).toBe(3);
      expect(helpers.sum([[1, 2, 3]], {})).toBe(6);
      expect(helpers.abs([-4], {})).toBe(4);
    });

    it('converts numbers', () => {
      expect(helpers.int([3.7], {})).toBe(3);
      expect(helpers.int([-3.7], {})).toBe(-3);
      expect(helpers.int(['12'], {})).toBe(12);
      expect(helpers.float(['2.5'], {})).toBe(2.5);
      expect(helpers.round([1.25], { ndigits: 1 })).toBe(1.2);
    });

    it('rejects bad conversions', () => {
      expect(() => helpers.int(['abc'], {})).toThrow("invalid literal for int(): 'abc'");
      expect(() => helpers.float([''], {})).toThrow(FormulaEvaluationError);
    });

    it('rejects min of an empty list', () => {
      expect(() => helpers.min([[]], {})).toThrow('min() arg is an empty sequence');
    });
  });

  describe('random helpers', () => {
    it('returns the only possible randint value', () => {
      expect(helpers.randint([5, 6], {})).toBe(5);
    });

    it('keeps uniform draws within bounds', () => {
      for (let i = 0; i < 20; i++) {
        const value = helpers.uniform([1, 5], {});
        expect(typeof value).toBe('number');
        expect(value).toBeGreaterThanOrEqual(1);
        expect(value).toBeLessThan(5);
      }
    });

    it('weights toss by probability', () => {
      expect(helpers.toss([1], {})).toBe(true);
      expect(helpers.toss([-1], {})).toBe(false);
    });

    it('picks from the sequence', () => {
      expect([1, 2, 3]).toContain(helpers.choice([[1, 2, 3]], {}));
      expect(() => helpers.choice([[]], {})).toThrow(InvalidArgumentError);
    });

    it('repeats after reseeding', () => {
      seedHelpers(99);
      const first = [helpers.choice([[1, 2, 3, 4]], {}), helpers.uniform([], {})];
      seedHelpers(99);
      const second = [helpers.choice([[1, 2, 3, 4]], {}), helpers.uniform([], {})];
      expect(second).toEqual(first);
    });

    it('seeds unseeded generators from the shared source', () => {
      const draw = (): unknown => {
        const sequence = helpers.shuffled_set([[1, 2, 3, 4, 5, 6]], {});
        return isSequence(sequence) ? sequence.take(6) : sequence;
      };
      seedHelpers(7);
      const first = draw();
      seedHelpers(7);
      expect(draw()).toEqual(first);
    });
  });

  describe('generator constructors', () => {
    it('returns sequences', () => {
      const sequence = helpers.ascending([[2, 1]], { cycles: 1 });
      expect(isSequence(sequence)).toBe(true);
      if (isSequence(sequence)) {
        expect(sequence.take(2)).toEqual([1, 2]);
      }
    });

    it('treats None cycles as unbounded', () => {
      const sequence = helpers.exact_order([[1]], { cycles: null });
      expect(isSequence(sequence) && sequence.take(3)).toEqual([1, 1, 1]);
    });

    it('requires n for counterbalanced', () => {
      expect(() => helpers.counterbalanced([[0, 1]], {})).toThrow("counterbalanced() missing required argument 'n'");
    });
  });

  describe('argument binding', () => {
    it('rejects unknown keywords', () => {
      expect(() => helpers.ascending([[1]], { loops: 1 })).toThrow(
        "ascending() got an unexpected keyword argument 'loops'"
      );
    });

    it('rejects a keyword that repeats a positional', () => {
      expect(() => helpers.abs([1], { x: 2 })).toThrow("abs() got multiple values for argument 'x'");
    });

    it('rejects too many positionals', () => {
      expect(() => helpers.abs([1, 2], {})).toThrow('abs() takes at most 1 arguments (2 given)');
    });
  });

  it('knows which names are helpers', () => {
    expect(isHelperName('counterbalanced')).toBe(true);
    expect(isHelperName('toString')).toBe(false);
  });
});
