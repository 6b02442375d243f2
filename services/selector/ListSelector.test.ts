import { describe, it, expect, beforeEach } from 'vitest';
import { InvalidArgumentError } from '@core/errors/InvalidArgumentError';
import { SequenceExhaustedError } from '@core/errors/SequenceExhaustedError';
import { ListSelector, MultiTypeListSelector, getSelectors } from './ListSelector';

describe('ListSelector', () => {
  let selector: ListSelector;

  beforeEach(() => {
    selector = new ListSelector();
    selector.addParameter('x');
    selector.addParameter('y', 'Shock level');
  });

  it('starts new rows at zero and then copies the last row', () => {
    expect(selector.addSetting()).toEqual({ x: 0, y: 0 });
    selector.addSetting({ x: 1, y: 2 });
    expect(selector.addSetting()).toEqual({ x: 1, y: 2 });
    expect(selector.getSettings()).toHaveLength(3);
  });

  it('requires exactly the parameter keys', () => {
    expect(() => selector.addSetting({ x: 1 })).toThrow(InvalidArgumentError);
    expect(() => selector.addSetting({ x: 1, y: 2, z: 3 })).toThrow(InvalidArgumentError);
    expect(selector.getSettings()).toEqual([]);
  });

  it('adds and removes parameter columns on existing rows', () => {
    selector.addSetting({ x: 1, y: 2 });

    selector.addParameter('z', 'Zee (dB)', 5);
    expect(selector.getSettings()).toEqual([{ x: 1, y: 2, z: 5 }]);
    expect(selector.getLabels()).toEqual(['x', 'Shock level', 'Zee (dB)']);

    selector.removeParameter('y');
    expect(selector.getSettings()).toEqual([{ x: 1, z: 5 }]);
    expect(selector.getParameters()).toEqual(['x', 'z']);
  });

  it('rejects duplicate and unknown parameters', () => {
    expect(() => selector.addParameter('x')).toThrow("Parameter 'x' already exists");
    expect(() => selector.removeParameter('q')).toThrow("Parameter 'q' not in list");
  });

  it('removes one matching setting', () => {
    selector.addSetting({ x: 1, y: 1 });
    selector.addSetting({ x: 2, y: 1 });
    selector.addSetting({ x: 2, y: 1 });

    selector.removeSetting({ x: 2, y: 1 });

    expect(selector.getSettings()).toEqual([{ x: 1, y: 1 }, { x: 2, y: 1 }]);
    expect(() => selector.removeSetting({ x: 9, y: 9 })).toThrow('Setting not in list');
  });

  it('sorts by parameter values', () => {
    selector.addSetting({ x: 2, y: 1 });
    selector.addSetting({ x: 1, y: 3 });
    selector.addSetting({ x: 1, y: 2 });

    selector.sort();

    expect(selector.getSettings()).toEqual([{ x: 1, y: 2 }, { x: 1, y: 3 }, { x: 2, y: 1 }]);
  });

  it('draws settings in the chosen order', () => {
    selector.addSetting({ x: 2, y: 0 });
    selector.addSetting({ x: 1, y: 0 });
    selector.setOrder('exact_order');

    const sequence = selector.createSelector({ cycles: 1 });

    expect(sequence.next()).toEqual({ x: 2, y: 0 });
    expect(sequence.next()).toEqual({ x: 1, y: 0 });
    expect(() => sequence.next()).toThrow(SequenceExhaustedError);
  });

  it('defaults to shuffled sets', () => {
    selector.addSetting({ x: 1, y: 0 });
    selector.addSetting({ x: 2, y: 0 });
    selector.addSetting({ x: 3, y: 0 });

    expect(selector.sequenceOrder).toBe('shuffled_set');
    const drawn = selector.createSelector({ seed: 7, cycles: 1 }).take(3);

    expect(drawn.map(setting => setting.x).sort()).toEqual([1, 2, 3]);
  });

  it('rejects unknown orders', () => {
    expect(() => selector.setOrder('sideways')).toThrow("Unknown sequence order 'sideways'");
  });

  it('cannot draw from an empty list', () => {
    expect(() => selector.createSelector()).toThrow('Cannot use an empty sequence');
  });

  it('describes a setting with labels', () => {
    const setting = selector.addSetting({ x: 1, y: 0.5 });
    expect(selector.describe(setting)).toBe('x: 1, Shock level: 0.5');
  });
});

describe('MultiTypeListSelector', () => {
  let selector: MultiTypeListSelector;

  beforeEach(() => {
    selector = new MultiTypeListSelector('GO', 'GO_REMIND', 'NOGO');
    selector.addParameter('x');
  });

  it('tags settings with their type', () => {
    selector.addSetting('GO', { x: 1 });
    selector.addSetting('NOGO', { x: 2 });
    selector.addSetting('GO');

    expect(selector.getSequence('GO')).toEqual([
      { x: 1, setting_type: 'GO' },
      { x: 2, setting_type: 'GO' }
    ]);
    expect(selector.getSequence('NOGO')).toEqual([{ x: 2, setting_type: 'NOGO' }]);
  });

  it('keeps one order per type', () => {
    selector.addSetting('GO', { x: 2 });
    selector.addSetting('GO', { x: 1 });
    selector.addSetting('NOGO', { x: 9 });
    selector.setOrder('GO', 'ascending');

    expect(selector.getOrder('GO')).toBe('ascending');
    expect(selector.getOrder('NOGO')).toBe('shuffled_set');

    const go = selector.createSelector('GO');
    expect(go.take(3)).toEqual([
      { x: 1, setting_type: 'GO' },
      { x: 2, setting_type: 'GO' },
      { x: 1, setting_type: 'GO' }
    ]);
    expect(selector.createSelector('NOGO').next()).toEqual({ x: 9, setting_type: 'NOGO' });
  });

  it('rejects unknown types', () => {
    expect(() => selector.addSetting('MAYBE', { x: 1 }))
      .toThrow("Unknown setting type 'MAYBE'; expected one of GO, GO_REMIND, NOGO");
    expect(() => selector.setOrder('MAYBE', 'ascending')).toThrow(InvalidArgumentError);
  });

  it('sorts by type first', () => {
    selector.addSetting('NOGO', { x: 1 });
    selector.addSetting('GO', { x: 2 });

    selector.sort();

    expect(selector.getSettings()).toEqual([
      { x: 2, setting_type: 'GO' },
      { x: 1, setting_type: 'NOGO' }
    ]);
  });
});

describe('getSelectors', () => {
  it('picks the selector kind from the setting types', () => {
    expect(getSelectors().list).toBeInstanceOf(ListSelector);
    expect(getSelectors(['GO', 'NOGO']).list).toBeInstanceOf(MultiTypeListSelector);
  });
});
