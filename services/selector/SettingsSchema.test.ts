import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from '@core/errors/InvalidArgumentError';
import { Paradigm } from '@services/paradigm/Paradigm';
import { ParadigmSchema } from '@services/paradigm/ParadigmSchema';
import { SettingsSchema } from './SettingsSchema';

describe('SettingsSchema', () => {
  it('creates frozen settings with defaults', () => {
    const schema = new SettingsSchema()
      .addField('x', { default: 1 })
      .addField('y', { label: 'Shock level' });

    const setting = schema.createSetting({ y: 0.5 });

    expect(setting).toEqual({ x: 1, y: 0.5 });
    expect(Object.isFrozen(setting)).toBe(true);
    expect(schema.labels()).toEqual(['x', 'Shock level']);
  });

  it('ignores a field added twice', () => {
    const schema = new SettingsSchema().addField('x', { label: 'First' }).addField('x', { label: 'Second' });
    expect(schema.keys()).toEqual(['x']);
    expect(schema.getField('x')?.label).toBe('First');
  });

  it('rejects unknown keys', () => {
    const schema = new SettingsSchema().addField('x');
    expect(() => schema.createSetting({ z: 1 })).toThrow("Unknown setting field 'z'");
    expect(() => schema.removeField('z')).toThrow(InvalidArgumentError);
  });

  it('validates the exact key set', () => {
    const schema = new SettingsSchema().addField('x').addField('y');

    expect(() => schema.validate({ x: 1, y: 2 })).not.toThrow();
    expect(() => schema.validate({ x: 1, y: 2, setting_type: 'GO' }, ['setting_type'])).not.toThrow();
    expect(() => schema.validate({ x: 1, z: 2 }))
      .toThrow('Setting does not match the parameter list: unexpected z; missing y');
    expect(() => schema.validate({ x: 1 })).toThrow('Setting does not match the parameter list: missing y');
  });

  it('formats, compares and checks equality by field values', () => {
    const schema = new SettingsSchema().addField('ttype', { label: 'Trial type' }).addField('x');
    const nogo = schema.createSetting({ ttype: 'NOGO', x: 1 });
    const go = schema.createSetting({ ttype: 'GO', x: 1 });

    expect(schema.format(nogo)).toBe('Trial type: NOGO, x: 1');
    expect(schema.compare(go, nogo)).toBeLessThan(0);
    expect(schema.equals(nogo, schema.createSetting({ ttype: 'NOGO', x: 1 }))).toBe(true);
    expect(schema.equals(nogo, go)).toBe(false);
  });

  it('builds fields from paradigm parameters', () => {
    const paradigm = new Paradigm(new ParadigmSchema()
      .addParameter('level', { label: 'Level (dB)', default: 60 })
      .addParameter('seed', { default: 1, editable: false })
      .build());

    const schema = SettingsSchema.fromParadigm(paradigm, ['level']);

    expect(schema.keys()).toEqual(['level', 'repeats']);
    expect(schema.labels()).toEqual(['Level (dB)', 'Repeats']);
    expect(schema.createSetting()).toEqual({ level: 0, repeats: 1 });
    expect(SettingsSchema.fromParadigm(paradigm, ['level'], { repeats: false }).keys()).toEqual(['level']);
    expect(() => SettingsSchema.fromParadigm(paradigm, ['seed']))
      .toThrow('Not editable paradigm parameters: seed');
  });
});
