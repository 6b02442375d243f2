import type { ContextSource, Value } from '@core/types/value';
import type { EventRecord, LogColumn, TrialRecord } from '@core/types/log';

/**
 * Destination for trial and event records. Also a context source: its
 * values (such as the trial count) are visible to formulas.
 */
export interface ITrialLog extends ContextSource {
  /**
   * Declares the trial columns. Records logged afterwards are ordered by
   * these columns.
   * @throws {InvalidArgumentError} If a column name repeats
   */
  registerColumns(columns: readonly LogColumn[]): void;

  /**
   * Appends a trial record and returns the new trial count.
   * @throws {InvalidArgumentError} If the record has a key no column declares
   */
  logTrial(record: TrialRecord): number;

  logEvent(timestamp: number, name: string): void;

  getColumns(): LogColumn[];

  getTrials(): TrialRecord[];

  getEvents(): EventRecord[];

  /**
   * Called when the experiment halts.
   */
  save(attributes?: Record<string, Value>): void;
}
