import { ApplyValidationError } from '@core/errors/ApplyValidationError';
import { ControllerStateError } from '@core/errors/ControllerStateError';
import type { LogColumn, TrialRecord } from '@core/types/log';
import type { Context, ContextDeclaration, ContextSource, Value } from '@core/types/value';
import { formatValue, valuesEqual } from '@core/utils/value-utils';
import { controllerLogger as logger } from '@core/utils/logger';
import { ExpressionNamespace } from '@interpreter/env/ExpressionNamespace';
import type { NamespaceObserver, SetterFunction } from '@interpreter/env/ExpressionNamespace';
import type { Paradigm } from '@services/paradigm/Paradigm';
import type {
  ContextListingEntry,
  ControllerOptions,
  ControllerState,
  ExperimentModel,
  RefreshOptions
} from './types';
import { validateParadigm } from './validate';

/**
 * Drives an experiment trial by trial.
 *
 * The paradigm in the model is the copy the operator edits. The controller
 * runs from a shadow copy and only takes over edits on `apply()`, after they
 * pass a dry run. Each trial starts with `refreshContext()`, which begins a
 * new namespace round; values are resolved on demand and every value that
 * differs from the previous trial is passed to its registered setter.
 */
export abstract class ExperimentController implements NamespaceObserver, ContextSource {
  protected state: ControllerState = 'uninitialized';
  protected currentTrial = 0;
  protected stopRequested = false;
  protected pauseRequested = false;
  protected readonly extraContext: Context;

  private pending = false;
  private syncing = false;
  private shadowParadigm?: Paradigm;
  private namespace?: ExpressionNamespace;
  private readonly setters = new Map<string, SetterFunction>();
  private readonly contextLabels = new Map<string, string>();
  private readonly contextLog = new Map<string, boolean>();
  private contextListing: ContextListingEntry[] = [];
  private readonly unsubscribe: () => void;

  constructor(protected readonly model: ExperimentModel, options: ControllerOptions = {}) {
    this.extraContext = { ...options.extraContext };
    this.unsubscribe = model.paradigm.onChange(name => this.handleParameterChange(name));
  }

  /**
   * Sets up the next trial. Implementations call `refreshContext()` first and
   * `logTrial()` when the trial is over.
   */
  protected abstract nextTrial(): void;

  /** Context variables the controller itself provides */
  getContextDeclarations(): ContextDeclaration[] {
    return [];
  }

  getContextValues(): Context {
    return {};
  }

  /** Log columns for values the controller adds to trial records */
  protected getExtraLogColumns(): LogColumn[] {
    return [];
  }

  /** Seconds, for event timestamps */
  protected getTimestamp(): number {
    return Date.now() / 1000;
  }

  getState(): ControllerState {
    return this.state;
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  /** Edits made to the paradigm that have not been applied */
  get pendingChanges(): boolean {
    return this.pending;
  }

  get trialCount(): number {
    return this.currentTrial;
  }

  /**
   * Gathers context declarations, snapshots the paradigm and builds the
   * namespace the experiment runs from.
   */
  initializeContext(): void {
    logger.debug('Initializing context');
    this.contextLabels.clear();
    this.contextLog.clear();
    const declarations = [
      ...this.model.data.getContextDeclarations(),
      ...this.model.paradigm.getContextDeclarations(),
      ...this.getContextDeclarations()
    ];
    for (const { name, label, log } of declarations) {
      this.contextLabels.set(name, label);
      this.contextLog.set(name, log);
    }

    this.shadowParadigm = this.model.paradigm.clone();
    this.namespace = this.createNamespace(this.shadowParadigm);
  }

  /**
   * Starts a new round. Everything is re-evaluated on request from here on.
   */
  refreshContext(options: RefreshOptions = {}): void {
    logger.debug('Refreshing context', { trial: this.currentTrial });
    this.requireNamespace('refresh the context').resetValues(this.collectContextValues());
    for (const [name, value] of Object.entries(options.extraContext ?? {})) {
      this.setCurrentValue(name, value);
    }
    if (options.evaluate) {
      this.evaluatePendingExpressions();
    }
  }

  evaluatePendingExpressions(extraContext?: Context): Context {
    logger.debug('Evaluating pending expressions');
    return this.requireNamespace('evaluate expressions').evaluateValues(extraContext);
  }

  /**
   * Current value of a context variable, computing it (and what it depends
   * on) if this round has not needed it yet
   */
  getCurrentValue(name: string): Value {
    return this.requireNamespace('read values').evaluateValue(name);
  }

  /**
   * Records a value for this round. Its setter runs if it changed.
   */
  setCurrentValue(name: string, value: Value): void {
    const namespace = this.requireNamespace('set values');
    namespace.setValue(name, value);
    namespace.evaluateValue(name);
  }

  valueChanged(name: string): boolean {
    this.getCurrentValue(name);
    return this.requireNamespace('compare values').valueChanged(name);
  }

  registerSetter(name: string, setter: SetterFunction): void {
    this.setters.set(name, setter);
  }

  getSetter(name: string): SetterFunction | undefined {
    return this.setters.get(name);
  }

  /**
   * Called after the setters whenever values change, and after `apply()`.
   * Subclasses that need to react to applied edits override this and call
   * super.
   */
  contextUpdated(context: Readonly<Context>): void {
    const namespace = this.namespace;
    const old = namespace ? namespace.getOldContext() : {};
    const values = { ...(namespace ? namespace.getExtraContext() : {}), ...context };

    this.contextListing = Object.entries(values)
      .map(([name, value]) => ({
        name,
        value: formatValue(value),
        label: this.contextLabels.get(name) ?? '',
        log: this.contextLog.get(name) ?? false,
        changed: !valuesEqual(old[name] ?? null, value)
      }))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  /** Context rows sorted by name, as of the last update */
  getContextListing(): ContextListingEntry[] {
    return this.contextListing.map(entry => ({ ...entry }));
  }

  /**
   * Takes over the operator's edits once they pass a dry run.
   *
   * @throws {ApplyValidationError} If an edited expression fails; nothing is changed
   */
  apply(): void {
    logger.debug('Applying requested changes');
    this.commit(this.model.paradigm);
    this.pending = false;
  }

  /**
   * Discards the operator's edits
   */
  revert(): void {
    logger.debug('Reverting requested changes');
    const shadow = this.requireShadow('revert changes');
    this.syncing = true;
    try {
      this.model.paradigm.copyFrom(shadow);
    } finally {
      this.syncing = false;
    }
    this.pending = false;
  }

  /**
   * Paradigm edit listener. Edits only matter while running: immediate
   * parameters are applied on their own, anything else waits for `apply()`.
   */
  protected handleParameterChange(name: string): void {
    if (!this.isRunning() || this.syncing) {
      return;
    }
    logger.debug('Detected change', { parameter: name });

    if (!this.model.paradigm.getDeclaration(name).immediate) {
      this.pending = true;
      return;
    }

    const candidate = this.requireShadow('apply changes').clone();
    candidate.set(name, this.model.paradigm.get(name).clone());
    try {
      this.commit(candidate);
    } catch (error) {
      this.pending = true;
      throw error;
    }
  }

  /**
   * Adds every loggable context value and the source of every expression,
   * then hands the record to the data log. Returns the trial count.
   */
  logTrial(record: TrialRecord = {}): number {
    logger.debug('Logging trial', { trial: this.currentTrial });
    const entry: TrialRecord = { ...record };
    for (const [name, log] of this.contextLog) {
      if (log) {
        entry[name] = this.getCurrentValue(name);
      }
    }
    for (const [name, expression] of this.requireShadow('log trials').getExpressions()) {
      entry[`expression_${name}`] = expression.toString();
    }
    return this.model.data.logTrial(entry);
  }

  logEvent(name: string, timestamp: number = this.getTimestamp()): void {
    this.model.data.logEvent(timestamp, name);
    logger.debug('Event', { timestamp, event: name });
  }

  /**
   * Paradigm log columns, then the controller's, then one text column with
   * the expression source of every parameter
   */
  getLogColumns(): LogColumn[] {
    const columns = [...this.model.paradigm.getLogColumns(), ...this.getExtraLogColumns()];
    const present = new Set(columns.map(column => column.name));
    const declarations = [...this.model.data.getContextDeclarations(), ...this.getContextDeclarations()];
    for (const { name, log } of declarations) {
      if (log && !present.has(name)) {
        columns.push({ name, kind: 'any' });
        present.add(name);
      }
    }
    for (const name of this.model.paradigm.names()) {
      columns.push({ name: `expression_${name}`, kind: 'text' });
    }
    return columns;
  }

  registerLogColumns(): void {
    this.model.data.registerColumns(this.getLogColumns());
  }

  start(): void {
    if (this.state !== 'uninitialized' && this.state !== 'initialized') {
      throw new ControllerStateError('start', this.state);
    }
    this.initializeContext();
    this.setupExperiment();
    this.state = 'running';
    logger.info('Experiment started');
    this.startExperiment();
  }

  stop(): void {
    if (this.state === 'uninitialized' || this.state === 'halted') {
      throw new ControllerStateError('stop', this.state);
    }
    this.state = 'halted';
    logger.info('Experiment halted', { trials: this.currentTrial });
    this.stopExperiment();
  }

  pause(): void {
    if (this.state !== 'running') {
      throw new ControllerStateError('pause', this.state);
    }
    this.state = 'paused';
    logger.info('Experiment paused', { trials: this.currentTrial });
  }

  resume(): void {
    if (this.state !== 'paused') {
      throw new ControllerStateError('resume', this.state);
    }
    this.state = 'running';
    this.pauseRequested = false;
    this.nextTrial();
  }

  requestStop(): void {
    this.stopRequested = true;
  }

  requestPause(): void {
    this.pauseRequested = true;
  }

  /** Stops listening to paradigm edits */
  dispose(): void {
    this.unsubscribe();
  }

  /**
   * Registers the log columns. Override to prepare hardware as well.
   */
  protected setupExperiment(): void {
    this.registerLogColumns();
    this.state = 'initialized';
  }

  protected startExperiment(): void {
    this.nextTrial();
  }

  protected stopExperiment(): void {
    this.model.data.save();
  }

  private commit(candidate: Paradigm): void {
    const shadow = this.requireShadow('apply changes');
    try {
      validateParadigm(candidate, this.collectContextValues());
    } catch (error) {
      if (error instanceof ApplyValidationError) {
        logger.warn(error.message, { parameter: error.details?.parameter });
      }
      throw error;
    }

    const previousContext = this.namespace?.getContext();
    shadow.copyFrom(candidate);
    this.namespace = this.createNamespace(shadow, previousContext);
    this.contextUpdated(this.namespace.getContext());
  }

  private createNamespace(paradigm: Paradigm, previousContext?: Context): ExpressionNamespace {
    return new ExpressionNamespace(paradigm.getExpressions(), {
      extraContext: this.collectContextValues(),
      observer: this,
      previousContext
    });
  }

  private collectContextValues(): Context {
    return {
      ...this.extraContext,
      ...this.model.data.getContextValues(),
      ...this.getContextValues()
    };
  }

  private requireNamespace(action: string): ExpressionNamespace {
    if (!this.namespace) {
      throw new ControllerStateError(action, this.state);
    }
    return this.namespace;
  }

  private requireShadow(action: string): Paradigm {
    if (!this.shadowParadigm) {
      throw new ControllerStateError(action, this.state);
    }
    return this.shadowParadigm;
  }
}
