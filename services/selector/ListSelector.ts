import { InvalidArgumentError } from '@core/errors/InvalidArgumentError';
import type { Value, ValueRecord } from '@core/types/value';
import { compareValues, valuesEqual } from '@core/utils/value-utils';
import { selectorLogger as logger } from '@core/utils/logger';
import { createSequence, isChoiceName } from '@interpreter/choice/generators';
import type { ChoiceName, ShuffledOptions } from '@interpreter/choice/generators';
import type { Sequence } from '@interpreter/choice/Sequence';
import { SettingsSchema } from './SettingsSchema';
import type { Setting } from './SettingsSchema';

export type SelectorOptions = ShuffledOptions & {
  /** Block size for `counterbalanced` */
  n?: number;
};

function checkOrder(order: string): ChoiceName {
  if (!isChoiceName(order)) {
    throw new InvalidArgumentError(`Unknown sequence order '${order}'`);
  }
  return order;
}

/**
 * An editable list of trial settings over a set of parameters
 */
export abstract class BaseListSelector {
  protected readonly schema = new SettingsSchema();
  protected settings: Setting[] = [];

  /** Keys settings carry besides the parameters */
  protected readonly hiddenKeys: readonly string[] = [];

  /**
   * Adds a parameter column. Existing settings get `defaultValue` for it.
   */
  addParameter(name: string, label?: string, defaultValue: Value = null): void {
    if (this.schema.has(name)) {
      throw new InvalidArgumentError(`Parameter '${name}' already exists`);
    }
    this.schema.addField(name, { label, default: defaultValue });
    this.settings = this.settings.map(setting => Object.freeze({ ...setting, [name]: defaultValue }));
  }

  removeParameter(name: string): void {
    if (!this.schema.has(name)) {
      throw new InvalidArgumentError(`Parameter '${name}' not in list`);
    }
    this.schema.removeField(name);
    this.settings = this.settings.map(setting =>
      Object.freeze(Object.fromEntries(Object.entries(setting).filter(([key]) => key !== name)))
    );
  }

  getParameters(): string[] {
    return this.schema.keys();
  }

  getLabels(): string[] {
    return this.schema.labels();
  }

  getSettings(): Setting[] {
    return [...this.settings];
  }

  /**
   * Removes the first setting equal to `setting`
   */
  removeSetting(setting: Readonly<ValueRecord>): void {
    const index = this.settings.findIndex(candidate => valuesEqual(candidate, setting));
    if (index === -1) {
      throw new InvalidArgumentError('Setting not in list');
    }
    this.settings.splice(index, 1);
  }

  /**
   * Sorts by hidden keys, then by parameter values in column order
   */
  sort(): void {
    const keys = [...this.hiddenKeys, ...this.schema.keys()];
    const row = (setting: Setting): Value[] => keys.map(key => setting[key] ?? null);
    try {
      this.settings = [...this.settings].sort((a, b) => compareValues(row(a), row(b)));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new InvalidArgumentError(`Settings cannot be sorted: ${message}`);
    }
  }

  /** Format a setting as `Label: value` pairs */
  describe(setting: Setting): string {
    return this.schema.format(setting);
  }

  /**
   * Template for a new row: a copy of the last one, or zeros
   */
  protected newSetting(): ValueRecord {
    const last = this.settings[this.settings.length - 1];
    if (last) {
      return { ...last };
    }
    return Object.fromEntries(this.schema.keys().map(key => [key, 0]));
  }

  protected appendSetting(setting: Readonly<ValueRecord>): Setting {
    this.schema.validate(setting, this.hiddenKeys);
    const frozen = Object.freeze({ ...setting });
    this.settings.push(frozen);
    logger.debug('Added setting', { setting: frozen });
    return frozen;
  }

  protected sequenceFrom(order: ChoiceName, settings: readonly Setting[], options: SelectorOptions): Sequence<Setting> {
    logger.debug('Creating selector', { order, settings: settings.length });
    return createSequence(order, settings, options);
  }
}

/**
 * A single list of settings drawn in one order
 */
export class ListSelector extends BaseListSelector {
  private order: ChoiceName = 'shuffled_set';

  get sequenceOrder(): ChoiceName {
    return this.order;
  }

  setOrder(order: string): void {
    this.order = checkOrder(order);
  }

  /**
   * Appends `setting`, or a copy of the last row when none is given
   *
   * @throws {InvalidArgumentError} If the keys are not exactly the parameters
   */
  addSetting(setting?: Readonly<ValueRecord>): Setting {
    return this.appendSetting(setting ?? this.newSetting());
  }

  createSelector(options: SelectorOptions = {}): Sequence<Setting> {
    return this.sequenceFrom(this.order, this.settings, options);
  }
}

/**
 * Settings tagged with a type (for example GO and NOGO), each type drawn
 * through its own order
 */
export class MultiTypeListSelector extends BaseListSelector {
  protected readonly hiddenKeys = ['setting_type'] as const;
  readonly settingTypes: readonly string[];
  private readonly orders = new Map<string, ChoiceName>();

  constructor(...settingTypes: string[]) {
    super();
    this.settingTypes = settingTypes;
    for (const type of settingTypes) {
      this.orders.set(type, 'shuffled_set');
    }
  }

  getOrder(settingType: string): ChoiceName {
    const order = this.orders.get(settingType);
    if (order === undefined) {
      throw this.unknownType(settingType);
    }
    return order;
  }

  setOrder(settingType: string, order: string): void {
    if (!this.orders.has(settingType)) {
      throw this.unknownType(settingType);
    }
    this.orders.set(settingType, checkOrder(order));
  }

  addSetting(settingType: string, setting?: Readonly<ValueRecord>): Setting {
    if (!this.orders.has(settingType)) {
      throw this.unknownType(settingType);
    }
    return this.appendSetting({ ...(setting ?? this.newSetting()), setting_type: settingType });
  }

  getSequence(settingType: string): Setting[] {
    return this.settings.filter(setting => setting.setting_type === settingType);
  }

  createSelector(settingType: string, options: SelectorOptions = {}): Sequence<Setting> {
    return this.sequenceFrom(this.getOrder(settingType), this.getSequence(settingType), options);
  }

  private unknownType(settingType: string): InvalidArgumentError {
    return new InvalidArgumentError(
      `Unknown setting type '${settingType}'; expected one of ${this.settingTypes.join(', ')}`
    );
  }
}

/**
 * Available selectors, keyed by name
 */
export function getSelectors(settingTypes?: readonly string[]): Record<string, BaseListSelector> {
  return {
    list: settingTypes ? new MultiTypeListSelector(...settingTypes) : new ListSelector()
  };
}
