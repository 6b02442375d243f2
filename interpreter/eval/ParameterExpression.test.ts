import { describe, it, expect } from 'vitest';
import { FormulaDefinitionError } from '@core/errors/FormulaDefinitionError';
import { FormulaParseError } from '@core/errors/FormulaParseError';
import { InvalidArgumentError } from '@core/errors/InvalidArgumentError';
import { SequenceExhaustedError } from '@core/errors/SequenceExhaustedError';
import type { HelperTable } from '@interpreter/builtins/helpers';
import { isSequence } from '@interpreter/choice/Sequence';
import { ParameterExpression } from './ParameterExpression';

describe('ParameterExpression', () => {
  describe('literals', () => {
    it('returns the literal unchanged', () => {
      const expression = new ParameterExpression(5);
      expect(expression.evaluate({})).toBe(5);
      expect(expression.isConstant).toBe(true);
      expect(expression.dependencies).toEqual([]);
      expect(expression.toJSON()).toBe(5);
    });

    it('keeps list literals', () => {
      expect(new ParameterExpression([1, 2]).evaluate({})).toEqual([1, 2]);
      expect(new ParameterExpression([1, 2]).toString()).toBe('[1, 2]');
    });
  });

  describe('formulas', () => {
    it('evaluates against the context', () => {
      const expression = new ParameterExpression('a * b + c');
      expect(expression.evaluate({ a: 5, b: 6, c: 25 })).toBe(55);
      expect(expression.dependencies).toEqual(['a', 'b', 'c']);
      expect(expression.isConstant).toBe(false);
    });

    it('re-evaluates plain formulas every time', () => {
      const expression = new ParameterExpression('a + 1');
      expect(expression.evaluate({ a: 1 })).toBe(2);
      expect(expression.evaluate({ a: 10 })).toBe(11);
    });

    it('leaves called helpers out of the dependencies', () => {
      expect(new ParameterExpression('range(a, b)').dependencies).toEqual(['a', 'b']);
    });
  });

  describe('advance triggers', () => {
    it('extracts the trigger from u(...)', () => {
      const expression = new ParameterExpression('u(ascending([3, 4]), p)');
      expect(expression.evaluateWhen).toBe('p');
      expect(expression.expression).toBe('ascending([3, 4])');
      expect(expression.dependencies).toEqual(['p']);
      expect(expression.toJSON()).toBe('u(ascending([3, 4]), p)');
    });

    it('treats the evaluateWhen option like u(...)', () => {
      const fromOption = new ParameterExpression('ascending([3, 4])', { evaluateWhen: 'p' });
      expect(fromOption.equals(new ParameterExpression('u(ascending([3, 4]), p)'))).toBe(true);
    });

    it('rejects two different triggers', () => {
      expect(() => new ParameterExpression('u(x, p)', { evaluateWhen: 'q' })).toThrow(InvalidArgumentError);
    });

    it('leaves formulas without the exact u(expr, name) shape alone', () => {
      const expression = new ParameterExpression('u(1,p)', {
        helpers: { u: args => args[0] ?? null }
      });
      expect(expression.evaluateWhen).toBeUndefined();
    });
  });

  describe('sequences', () => {
    it('captures a sequence and pulls one element per evaluation', () => {
      const expression = new ParameterExpression('exact_order([1, 2, 3])');
      expect([expression.evaluate({}), expression.evaluate({}), expression.evaluate({})]).toEqual([1, 2, 3]);
      expect(expression.hasSequence).toBe(true);
    });

    it('holds the last value when not advancing', () => {
      const expression = new ParameterExpression('exact_order([1, 2, 3])');
      expression.evaluate({});
      expect(expression.evaluate({}, false, false)).toBe(1);
      expect(expression.evaluate({})).toBe(2);
      expect(expression.currentValue).toBe(2);
    });

    it('starts over after reset', () => {
      const expression = new ParameterExpression('exact_order([1, 2, 3])');
      expression.evaluate({});
      expression.evaluate({});
      expression.reset();
      expect(expression.hasSequence).toBe(false);
      expect(expression.evaluate({})).toBe(1);
    });

    it('raises once a bounded sequence runs out', () => {
      const expression = new ParameterExpression('ascending([1], cycles=1)');
      expect(expression.evaluate({})).toBe(1);
      expect(() => expression.evaluate({})).toThrow(SequenceExhaustedError);
    });

    it('returns a throwaway sequence on a dry run', () => {
      const expression = new ParameterExpression('ascending([2, 1])');
      const result = expression.evaluate({}, true);
      expect(isSequence(result)).toBe(true);
      expect(expression.hasSequence).toBe(false);
      expect(expression.evaluate({})).toBe(1);
    });
  });

  describe('definition checks', () => {
    it('rejects formulas that do not parse', () => {
      expect(() => new ParameterExpression('1 +')).toThrow(FormulaParseError);
    });

    it('rejects formulas that can never evaluate', () => {
      expect(() => new ParameterExpression('ascending([])')).toThrow(FormulaDefinitionError);
      expect(() => new ParameterExpression("'a' - 1")).toThrow("Invalid formula ''a' - 1'");
    });

    it('accepts formulas whose names are not known yet', () => {
      expect(() => new ParameterExpression('undefined_name * 2')).not.toThrow();
    });
  });

  describe('equality and copies', () => {
    it('compares definition text', () => {
      expect(new ParameterExpression('a+b').equals(new ParameterExpression('a+b'))).toBe(true);
      expect(new ParameterExpression('a+b').equals(new ParameterExpression('a + b'))).toBe(false);
      expect(new ParameterExpression(5).equals(new ParameterExpression('5'))).toBe(true);
      expect(new ParameterExpression('x').equals('x')).toBe(false);
    });

    it('clones the definition with fresh state', () => {
      const original = new ParameterExpression('u(exact_order([1, 2, 3]), p)');
      original.evaluate({});
      original.evaluate({});
      const copy = original.clone();
      expect(copy.equals(original)).toBe(true);
      expect(copy.evaluate({})).toBe(1);
      expect(original.evaluate({})).toBe(3);
    });

    it('round-trips through JSON', () => {
      const expression = ParameterExpression.fromJSON(new ParameterExpression('u(a, b)').toJSON());
      expect(expression.evaluateWhen).toBe('b');
    });
  });

  it('uses an injected helper table', () => {
    const table: HelperTable = {
      twice: args => (typeof args[0] === 'number' ? args[0] * 2 : null)
    };
    expect(new ParameterExpression('twice(4)', { helpers: table }).evaluate({})).toBe(8);
    expect(() => new ParameterExpression('twice(4)').evaluate({})).toThrow("Name 'twice' is not defined");
  });
});
