import { InvalidArgumentError } from '@core/errors/InvalidArgumentError';
import type { EventRecord, LogColumn, TrialRecord } from '@core/types/log';
import type { Context, ContextDeclaration, Value } from '@core/types/value';
import { dataLogger as logger } from '@core/utils/logger';
import type { ITrialLog } from './ITrialLog';

export interface TrialLogJSON {
  columns: LogColumn[];
  trials: TrialRecord[];
  events: EventRecord[];
  attributes: Record<string, Value>;
}

/**
 * In-memory trial and event log.
 *
 * Without registered columns records are stored as given. Once columns are
 * registered every record carries exactly those keys, in column order, with
 * null for anything the record left out.
 */
export class TrialLog implements ITrialLog {
  private columns: LogColumn[] = [];
  private readonly trials: TrialRecord[] = [];
  private readonly events: EventRecord[] = [];
  private attributes: Record<string, Value> = {};
  private saved = false;

  registerColumns(columns: readonly LogColumn[]): void {
    const seen = new Set<string>();
    for (const column of columns) {
      if (seen.has(column.name)) {
        throw new InvalidArgumentError(`Duplicate trial log column '${column.name}'`);
      }
      seen.add(column.name);
    }
    this.columns = columns.map(column => ({ ...column }));
    logger.debug('Registered trial log columns', { columns: this.columns.map(column => column.name) });
  }

  logTrial(record: TrialRecord): number {
    if (this.columns.length === 0) {
      this.trials.push({ ...record });
      return this.trials.length;
    }

    const known = new Set(this.columns.map(column => column.name));
    for (const key of Object.keys(record)) {
      if (!known.has(key)) {
        throw new InvalidArgumentError(`Unknown trial log column '${key}'`, { column: key });
      }
    }

    const ordered: TrialRecord = {};
    for (const { name } of this.columns) {
      ordered[name] = Object.prototype.hasOwnProperty.call(record, name) ? record[name] : null;
    }
    this.trials.push(ordered);
    return this.trials.length;
  }

  logEvent(timestamp: number, name: string): void {
    this.events.push({ timestamp, name });
  }

  getColumns(): LogColumn[] {
    return this.columns.map(column => ({ ...column }));
  }

  getTrials(): TrialRecord[] {
    return this.trials.map(trial => ({ ...trial }));
  }

  getEvents(): EventRecord[] {
    return this.events.map(event => ({ ...event }));
  }

  getContextDeclarations(): ContextDeclaration[] {
    return [{ name: 'trial_count', label: 'Trial count', log: false }];
  }

  getContextValues(): Context {
    return { trial_count: this.trials.length };
  }

  save(attributes: Record<string, Value> = {}): void {
    this.attributes = { ...this.attributes, ...attributes };
    this.saved = true;
    logger.info('Trial log closed', { trials: this.trials.length, events: this.events.length });
  }

  get isSaved(): boolean {
    return this.saved;
  }

  toJSON(): TrialLogJSON {
    return {
      columns: this.getColumns(),
      trials: this.getTrials(),
      events: this.getEvents(),
      attributes: { ...this.attributes }
    };
  }
}
