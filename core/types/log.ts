import type { Value } from './value';

export type ColumnKind = 'number' | 'string' | 'boolean' | 'list' | 'any' | 'text';

/**
 * One column of the trial log
 */
export interface LogColumn {
  name: string;
  kind: ColumnKind;
}

export type TrialRecord = Record<string, Value>;

export interface EventRecord {
  /** Seconds */
  timestamp: number;
  name: string;
}
