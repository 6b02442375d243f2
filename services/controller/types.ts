import type { Context } from '@core/types/value';
import type { ITrialLog } from '@services/data/ITrialLog';
import type { Paradigm } from '@services/paradigm/Paradigm';

/**
 * uninitialized: not ready to start
 * initialized: ready; columns registered
 * running: trials in progress; paradigm edits wait for apply
 * paused: no trials until resumed
 * halted: done and saved
 */
export type ControllerState = 'uninitialized' | 'initialized' | 'running' | 'paused' | 'halted';

/**
 * What a controller drives: the paradigm the operator edits and the log
 * trials go to
 */
export interface ExperimentModel {
  paradigm: Paradigm;
  data: ITrialLog;
}

export interface ControllerOptions {
  /** Constant values visible to every formula */
  extraContext?: Context;
}

export interface RefreshOptions {
  /** Values recorded for this round before anything is evaluated */
  extraContext?: Context;
  /** Evaluate every pending expression right away */
  evaluate?: boolean;
}

/**
 * One row of the context display
 */
export interface ContextListingEntry {
  name: string;
  value: string;
  label: string;
  log: boolean;
  /** Differs from the previous round */
  changed: boolean;
}
