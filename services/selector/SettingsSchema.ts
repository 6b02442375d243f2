import { InvalidArgumentError } from '@core/errors/InvalidArgumentError';
import type { Value, ValueRecord } from '@core/types/value';
import { compareValues, formatValue, valuesEqual } from '@core/utils/value-utils';
import { selectorLogger as logger } from '@core/utils/logger';
import type { Paradigm } from '@services/paradigm/Paradigm';

/**
 * One row of a selector list: parameter name → value
 */
export type Setting = Readonly<ValueRecord>;

export interface SettingField {
  readonly name: string;
  readonly label: string;
  readonly default: Value;
}

export interface FieldOptions {
  label?: string;
  default?: Value;
}

export interface FromParadigmOptions {
  /** Add a `repeats` field (default 1) */
  repeats?: boolean;
}

/**
 * Field list shared by the settings of one selector.
 *
 * Settings are plain frozen records; the schema decides which keys they
 * carry, their defaults and how they are shown and ordered.
 */
export class SettingsSchema {
  private readonly fields = new Map<string, SettingField>();

  /**
   * Builds a schema from paradigm parameters, taking their labels
   */
  static fromParadigm(paradigm: Paradigm, names: readonly string[], options: FromParadigmOptions = {}): SettingsSchema {
    const invalid = paradigm.getInvalidParameters(names);
    if (invalid.length > 0) {
      throw new InvalidArgumentError(`Not editable paradigm parameters: ${invalid.join(', ')}`);
    }
    const schema = new SettingsSchema();
    for (const name of names) {
      schema.addField(name, { label: paradigm.getParameterLabel(name), default: 0 });
    }
    if (options.repeats ?? true) {
      schema.addField('repeats', { label: 'Repeats', default: 1 });
    }
    return schema;
  }

  /**
   * Adds a field. A field that already exists is left as it is.
   */
  addField(name: string, options: FieldOptions = {}): this {
    if (this.fields.has(name)) {
      logger.debug('Setting field already defined', { field: name });
      return this;
    }
    this.fields.set(name, Object.freeze({
      name,
      label: options.label ?? name,
      default: options.default ?? null
    }));
    return this;
  }

  removeField(name: string): void {
    if (!this.fields.delete(name)) {
      throw new InvalidArgumentError(`Unknown setting field '${name}'`);
    }
  }

  has(name: string): boolean {
    return this.fields.has(name);
  }

  keys(): string[] {
    return [...this.fields.keys()];
  }

  labels(): string[] {
    return [...this.fields.values()].map(field => field.label);
  }

  getField(name: string): SettingField | undefined {
    return this.fields.get(name);
  }

  /**
   * New setting with defaults for the fields `values` leaves out
   */
  createSetting(values: Readonly<ValueRecord> = {}): Setting {
    for (const key of Object.keys(values)) {
      if (!this.fields.has(key)) {
        throw new InvalidArgumentError(`Unknown setting field '${key}'`);
      }
    }
    const setting: ValueRecord = {};
    for (const field of this.fields.values()) {
      setting[field.name] = Object.prototype.hasOwnProperty.call(values, field.name) ? values[field.name] : field.default;
    }
    return Object.freeze(setting);
  }

  /**
   * Checks that `setting` has exactly the schema's keys plus `hiddenKeys`
   */
  validate(setting: Readonly<ValueRecord>, hiddenKeys: readonly string[] = []): void {
    const expected = new Set([...this.fields.keys(), ...hiddenKeys]);
    const actual = Object.keys(setting);
    const extra = actual.filter(key => !expected.has(key));
    const missing = [...expected].filter(key => !Object.prototype.hasOwnProperty.call(setting, key));
    if (extra.length > 0 || missing.length > 0) {
      const problems = [
        extra.length > 0 ? `unexpected ${extra.join(', ')}` : '',
        missing.length > 0 ? `missing ${missing.join(', ')}` : ''
      ].filter(Boolean);
      throw new InvalidArgumentError(`Setting does not match the parameter list: ${problems.join('; ')}`);
    }
  }

  /** `Label: value` pairs in field order */
  format(setting: Setting): string {
    return [...this.fields.values()]
      .map(field => `${field.label}: ${formatValue(setting[field.name])}`)
      .join(', ');
  }

  /** Orders two settings by their field values, in field order */
  compare(a: Setting, b: Setting): number {
    return compareValues(this.values(a), this.values(b));
  }

  equals(a: Setting, b: Setting): boolean {
    return valuesEqual(this.values(a), this.values(b));
  }

  private values(setting: Setting): Value[] {
    return this.keys().map(key => setting[key] ?? null);
  }
}
