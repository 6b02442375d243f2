export type { Value, ValueRecord, Context, ContextDeclaration, ContextSource } from './value';
export { isValueRecord } from './value';
export type * from './formula';
export type { ColumnKind, LogColumn, TrialRecord, EventRecord } from './log';
