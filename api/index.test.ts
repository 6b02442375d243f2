import { describe, it, expect } from 'vitest';
import {
  ExpressionNamespace,
  HeadlessController,
  Paradigm,
  ParadigmSchema,
  ParameterExpression,
  SequenceExhaustedError,
  TrialLog,
  ascending
} from './index';

describe('public API', () => {
  it('resolves a namespace from expressions and constants', () => {
    const namespace = new ExpressionNamespace({
      base: new ParameterExpression(2),
      doubled: new ParameterExpression('base * 2'),
      offset: 1
    });

    expect(namespace.evaluateValues()).toEqual({ base: 2, doubled: 4, offset: 1 });
  });

  it('exposes the generators', () => {
    const sequence = ascending([3, 1, 2], { cycles: 1 });
    expect(sequence.take(3)).toEqual([1, 2, 3]);
    expect(() => sequence.next()).toThrow(SequenceExhaustedError);
  });

  it('runs a paradigm headless', () => {
    const paradigm = new Paradigm(new ParadigmSchema()
      .addParameter('step', { default: 'ascending([1, 2, 3], cycles=1)', log: true })
      .build());
    const data = new TrialLog();

    new HeadlessController({ paradigm, data }).run();

    expect(data.getTrials().map(trial => trial.step)).toEqual([1, 2, 3]);
  });
});
