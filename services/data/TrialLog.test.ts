import { describe, it, expect, beforeEach } from 'vitest';
import { InvalidArgumentError } from '@core/errors/InvalidArgumentError';
import { TrialLog } from './TrialLog';

describe('TrialLog', () => {
  let log: TrialLog;

  beforeEach(() => {
    log = new TrialLog();
  });

  it('stores records as given before columns are registered', () => {
    expect(log.logTrial({ b: 1, a: 'x' })).toBe(1);
    expect(log.getTrials()).toEqual([{ b: 1, a: 'x' }]);
  });

  it('orders records by the registered columns', () => {
    log.registerColumns([
      { name: 'frequency', kind: 'number' },
      { name: 'level', kind: 'number' },
      { name: 'expression_level', kind: 'text' }
    ]);

    log.logTrial({ level: 60, frequency: 1000 });

    const [trial] = log.getTrials();
    expect(Object.keys(trial)).toEqual(['frequency', 'level', 'expression_level']);
    expect(trial).toEqual({ frequency: 1000, level: 60, expression_level: null });
  });

  it('rejects keys no column declares', () => {
    log.registerColumns([{ name: 'a', kind: 'any' }]);
    expect(() => log.logTrial({ a: 1, b: 2 })).toThrow("Unknown trial log column 'b'");
    expect(log.getTrials()).toEqual([]);
  });

  it('rejects duplicate columns', () => {
    expect(() => log.registerColumns([
      { name: 'a', kind: 'any' },
      { name: 'a', kind: 'number' }
    ])).toThrow(InvalidArgumentError);
  });

  it('exposes the trial count as context', () => {
    expect(log.getContextDeclarations()).toEqual([{ name: 'trial_count', label: 'Trial count', log: false }]);
    expect(log.getContextValues()).toEqual({ trial_count: 0 });
    log.logTrial({});
    log.logTrial({});
    expect(log.getContextValues()).toEqual({ trial_count: 2 });
  });

  it('records events', () => {
    log.logEvent(1.5, 'experiment_start');
    log.logEvent(3, 'experiment_end');
    expect(log.getEvents()).toEqual([
      { timestamp: 1.5, name: 'experiment_start' },
      { timestamp: 3, name: 'experiment_end' }
    ]);
  });

  it('hands out copies', () => {
    log.logTrial({ a: 1 });
    log.getTrials()[0].a = 2;
    expect(log.getTrials()).toEqual([{ a: 1 }]);
  });

  it('keeps save attributes in its JSON form', () => {
    log.registerColumns([{ name: 'a', kind: 'number' }]);
    log.logTrial({ a: 1 });
    log.save({ reason: 'exhausted' });

    expect(log.isSaved).toBe(true);
    expect(log.toJSON()).toEqual({
      columns: [{ name: 'a', kind: 'number' }],
      trials: [{ a: 1 }],
      events: [],
      attributes: { reason: 'exhausted' }
    });
  });
});
