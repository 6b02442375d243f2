export { SettingsSchema } from './SettingsSchema';
export type { FieldOptions, FromParadigmOptions, Setting, SettingField } from './SettingsSchema';
export { BaseListSelector, ListSelector, MultiTypeListSelector, getSelectors } from './ListSelector';
export type { SelectorOptions } from './ListSelector';
