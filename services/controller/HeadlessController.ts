import { SequenceExhaustedError } from '@core/errors/SequenceExhaustedError';
import type { LogColumn, TrialRecord } from '@core/types/log';
import type { Context, ContextDeclaration } from '@core/types/value';
import { controllerLogger as logger } from '@core/utils/logger';
import { ExperimentController } from './ExperimentController';
import type { ControllerOptions, ExperimentModel } from './types';

export type StopReason = 'requested' | 'exhausted' | 'limit';

export interface HeadlessControllerOptions extends ControllerOptions {
  /** Halt after this many trials */
  maxTrials?: number;
}

/**
 * Runs trials back to back with no hardware attached: every trial resolves
 * the whole context and logs it. Halts when a sequence runs out, when the
 * trial limit is reached or when a stop is requested.
 */
export class HeadlessController extends ExperimentController {
  private readonly maxTrials: number;
  private reason?: StopReason;

  constructor(model: ExperimentModel, options: HeadlessControllerOptions = {}) {
    super(model, options);
    this.maxTrials = options.maxTrials ?? Infinity;
  }

  get stopReason(): StopReason | undefined {
    return this.reason;
  }

  getContextDeclarations(): ContextDeclaration[] {
    return [{ name: 'trial', label: 'Trial', log: true }];
  }

  getContextValues(): Context {
    return { trial: this.currentTrial };
  }

  protected getExtraLogColumns(): LogColumn[] {
    return [{ name: 'trial', kind: 'number' }];
  }

  /**
   * Starts the experiment and returns the trial log once it halts or pauses
   */
  run(): TrialRecord[] {
    this.start();
    return this.model.data.getTrials();
  }

  protected nextTrial(): void {
    while (this.isRunning()) {
      if (this.stopRequested) {
        this.halt('requested');
        return;
      }
      if (this.pauseRequested) {
        this.pause();
        return;
      }
      if (this.currentTrial >= this.maxTrials) {
        this.halt('limit');
        return;
      }

      this.currentTrial++;
      try {
        this.refreshContext({ evaluate: true });
      } catch (error) {
        if (!(error instanceof SequenceExhaustedError)) {
          throw error;
        }
        logger.info('Sequence exhausted', { parameter: error.details?.parameter, trial: this.currentTrial });
        this.currentTrial--;
        this.halt('exhausted');
        return;
      }
      this.logTrial();
    }
  }

  protected stopExperiment(): void {
    this.model.data.save({ stop_reason: this.reason ?? 'requested', trials: this.currentTrial });
  }

  private halt(reason: StopReason): void {
    this.reason = reason;
    this.stop();
  }
}
