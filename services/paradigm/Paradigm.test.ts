import { describe, it, expect, beforeEach, vi } from 'vitest';
import { FormulaParseError } from '@core/errors/FormulaParseError';
import { UnknownParameterError } from '@core/errors/UnknownParameterError';
import { ParameterExpression } from '@interpreter/eval/ParameterExpression';
import { Paradigm } from './Paradigm';
import { ParadigmSchema } from './ParadigmSchema';
import type { SchemaDefinition } from './ParadigmSchema';

function buildSchema(): SchemaDefinition {
  return new ParadigmSchema()
    .addParameter('frequency', { label: 'Frequency (Hz)', default: 1000, kind: 'number', log: true })
    .addParameter('level', { default: 60, immediate: true })
    .addParameter('ramp', { default: 'duration / 10' })
    .addParameter('duration', { default: 0.25 })
    .addParameter('seed', { default: 1, editable: false })
    .addParameter('note', { default: 7, ignore: true })
    .build();
}

describe('Paradigm', () => {
  let paradigm: Paradigm;

  beforeEach(() => {
    paradigm = new Paradigm(buildSchema());
  });

  it('creates an expression for every declared parameter', () => {
    expect(paradigm.names()).toEqual(['frequency', 'level', 'ramp', 'duration', 'seed', 'note']);
    expect(paradigm.get('ramp').expression).toBe('duration / 10');
    expect(paradigm.get('frequency').isConstant).toBe(true);
  });

  it('takes initial values over defaults', () => {
    const custom = new Paradigm(buildSchema(), { level: 'frequency / 20' });
    expect(custom.get('level').toString()).toBe('frequency / 20');
    expect(custom.get('duration').toString()).toBe('0.25');
  });

  it('rejects values for undeclared parameters', () => {
    expect(() => new Paradigm(buildSchema(), { bogus: 1 })).toThrow(UnknownParameterError);
    expect(() => paradigm.get('bogus')).toThrow("Unknown parameter 'bogus'");
  });

  it('lists editable, visible parameters sorted by name', () => {
    expect(paradigm.getParameters()).toEqual(['duration', 'frequency', 'level', 'ramp']);
    expect(paradigm.getParameterInfo()).toEqual({
      frequency: 'Frequency (Hz)',
      level: 'level',
      ramp: 'ramp',
      duration: 'duration'
    });
    expect(paradigm.getParameterLabel('frequency')).toBe('Frequency (Hz)');
    expect(() => paradigm.getParameterLabel('seed')).toThrow(UnknownParameterError);
  });

  it('reports invalid parameter names', () => {
    expect(paradigm.getInvalidParameters(['level', 'seed', 'bogus'])).toEqual(['seed', 'bogus']);
  });

  it('formats a name/label table', () => {
    expect(paradigm.formatParameterTable().split('\n')).toEqual([
      '  Variable Name Label',
      '  ------------- -----',
      '       duration duration',
      '      frequency Frequency (Hz)',
      '          level level',
      '           ramp ramp'
    ]);
  });

  it('describes log columns and context declarations', () => {
    expect(paradigm.getLogColumns()).toEqual([{ name: 'frequency', kind: 'number' }]);
    expect(paradigm.getContextDeclarations()[0]).toEqual({ name: 'frequency', label: 'Frequency (Hz)', log: true });
    expect(paradigm.getContextDeclarations()).toHaveLength(6);
  });

  describe('set', () => {
    it('notifies listeners when the definition changes', () => {
      const listener = vi.fn();
      paradigm.onChange(listener);

      paradigm.set('level', '70');

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener.mock.calls[0][0]).toBe('level');
      expect(String(listener.mock.calls[0][1])).toBe('70');
    });

    it('stays silent when the text is unchanged', () => {
      const listener = vi.fn();
      paradigm.onChange(listener);

      paradigm.set('level', 60);
      paradigm.set('level', '60');

      expect(listener).not.toHaveBeenCalled();
    });

    it('accepts a prepared expression', () => {
      const expression = new ParameterExpression('ascending([1, 2])');
      paradigm.set('level', expression);
      expect(paradigm.get('level')).toBe(expression);
    });

    it('keeps the previous expression when the formula is invalid', () => {
      expect(() => paradigm.set('level', '1 +')).toThrow(FormulaParseError);
      expect(paradigm.get('level').toString()).toBe('60');
    });

    it('stops notifying after unsubscribe', () => {
      const listener = vi.fn();
      const unsubscribe = paradigm.onChange(listener);
      unsubscribe();
      paradigm.set('level', 61);
      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('copies', () => {
    it('clones definitions into fresh expressions', () => {
      const copy = paradigm.clone();
      expect(copy.equals(paradigm)).toBe(true);
      expect(copy.get('ramp')).not.toBe(paradigm.get('ramp'));
      expect(copy.schema).toBe(paradigm.schema);
    });

    it('does not share state with the clone', () => {
      paradigm.set('level', 'ascending([1, 2])');
      paradigm.get('level').evaluate({});
      const copy = paradigm.clone();

      expect(paradigm.get('level').hasSequence).toBe(true);
      expect(copy.get('level').hasSequence).toBe(false);
    });

    it('copies edits back and notifies only for the differences', () => {
      const edited = paradigm.clone();
      edited.set('ramp', 'duration / 5');
      const listener = vi.fn();
      paradigm.onChange(listener);

      paradigm.copyFrom(edited);

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener.mock.calls[0][0]).toBe('ramp');
      expect(paradigm.get('ramp').toString()).toBe('duration / 5');
      expect(paradigm.get('ramp')).not.toBe(edited.get('ramp'));
      expect(paradigm.equals(edited)).toBe(true);
    });
  });

  it('serializes to JSON and back', () => {
    paradigm.set('level', 'u(descending([60, 50]), frequency)');
    const json = paradigm.toJSON();

    expect(json).toEqual({
      parameters: {
        frequency: 1000,
        level: 'u(descending([60, 50]), frequency)',
        ramp: 'duration / 10',
        duration: 0.25,
        seed: 1,
        note: 7
      }
    });

    const restored = Paradigm.fromJSON(paradigm.schema, json);
    expect(restored.equals(paradigm)).toBe(true);
    expect(restored.get('level').evaluateWhen).toBe('frequency');
  });
});
