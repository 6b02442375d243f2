import { describe, it, expect } from 'vitest';
import { FormulaParseError } from '@core/errors/FormulaParseError';
import { parseFormula } from './index';

describe('formula parser', () => {
  it('parses precedence into nested nodes', () => {
    expect(parseFormula('a + b * 2')).toEqual({
      type: 'Binary',
      operator: '+',
      left: { type: 'Name', name: 'a' },
      right: {
        type: 'Binary',
        operator: '*',
        left: { type: 'Name', name: 'b' },
        right: { type: 'Number', value: 2 }
      }
    });
  });

  it('parses calls with keyword arguments', () => {
    expect(parseFormula('ascending([1], cycles=2)')).toEqual({
      type: 'Call',
      callee: { type: 'Name', name: 'ascending' },
      args: [{ type: 'List', elements: [{ type: 'Number', value: 1 }] }],
      keywords: [{ name: 'cycles', value: { type: 'Number', value: 2 } }]
    });
  });

  it('keeps keywords apart from names that start with them', () => {
    expect(parseFormula('android')).toEqual({ type: 'Name', name: 'android' });
    expect(parseFormula('notice')).toEqual({ type: 'Name', name: 'notice' });
  });

  it('parses chained and negated membership comparisons', () => {
    expect(parseFormula('x not in y')).toEqual({
      type: 'Compare',
      left: { type: 'Name', name: 'x' },
      comparisons: [{ operator: 'not in', right: { type: 'Name', name: 'y' } }]
    });
  });

  it('decodes string escapes', () => {
    expect(parseFormula("'it\\'s'")).toEqual({ type: 'String', value: "it's" });
    expect(parseFormula('"a\\nb"')).toEqual({ type: 'String', value: 'a\nb' });
  });

  it('ignores surrounding whitespace', () => {
    expect(parseFormula('  5  ')).toEqual({ type: 'Number', value: 5 });
  });

  it('reports a position for malformed formulas', () => {
    try {
      parseFormula('1 +', 'delay');
      expect.unreachable('parse should fail');
    } catch (error) {
      expect(error).toBeInstanceOf(FormulaParseError);
      if (error instanceof FormulaParseError) {
        expect(error.details?.parameter).toBe('delay');
        expect(error.message).toContain('line 1');
      }
    }
  });

  it('rejects positional arguments after keywords', () => {
    expect(() => parseFormula('f(a=1, 2)')).toThrow(FormulaParseError);
  });

  it('rejects statements', () => {
    expect(() => parseFormula('x = 1')).toThrow(FormulaParseError);
  });
});
