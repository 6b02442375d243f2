import { CircularDependencyError } from '@core/errors/CircularDependencyError';
import { ParameterEvaluationError } from '@core/errors/ParameterEvaluationError';
import { SequenceExhaustedError } from '@core/errors/SequenceExhaustedError';
import { UnknownParameterError } from '@core/errors/UnknownParameterError';
import type { Context, Value } from '@core/types/value';
import { valuesEqual } from '@core/utils/value-utils';
import { namespaceLogger as logger } from '@core/utils/logger';
import type { FormulaResult } from '@interpreter/builtins/helpers';
import { isSequence } from '@interpreter/choice/Sequence';
import { ParameterExpression } from '@interpreter/eval/ParameterExpression';

/**
 * A parameter definition: an expression, or a plain value used as-is
 */
export type ExpressionDefinition = ParameterExpression | Value;

export type SetterFunction = (value: Value) => void;

/**
 * Receives change notifications once a resolution finishes
 */
export interface NamespaceObserver {
  /** Setter for `name`, if one is registered */
  getSetter(name: string): SetterFunction | undefined;
  /** Called after the setters with the context as it now stands */
  contextUpdated?(context: Readonly<Context>): void;
}

export interface NamespaceOptions {
  /** Values visible to formulas that are not themselves parameters */
  extraContext?: Context;
  observer?: NamespaceObserver;
  /** Context of the namespace this one replaces, for change detection */
  previousContext?: Context;
}

export interface ResolveOptions {
  /** Validate without capturing sequences */
  dryRun?: boolean;
  /** Run setters and the observer afterwards (default true) */
  notify?: boolean;
}

type ExpressionDefinitions =
  | ReadonlyMap<string, ExpressionDefinition>
  | Readonly<Record<string, ExpressionDefinition>>;

function isDefinitionMap(value: ExpressionDefinitions): value is ReadonlyMap<string, ExpressionDefinition> {
  return value instanceof Map;
}

/**
 * Resolves a set of named expressions into a context, one round at a time.
 *
 * Every name is evaluated at most once per round; a round starts with
 * `resetValues()`. Dependencies are resolved depth-first before the formula
 * that reads them. An expression written `u(expr, trigger)` only advances in
 * a round where `trigger` ran out and started over; if nothing triggers it,
 * it keeps its previous value.
 */
export class ExpressionNamespace {
  private readonly expressions: ReadonlyMap<string, ExpressionDefinition>;
  /** Names some other expression waits on */
  private readonly triggers: ReadonlySet<string>;
  private readonly observer?: NamespaceObserver;

  private extraContext: Context = {};
  private context = new Map<string, Value>();
  private oldContext = new Map<string, Value>();
  private pending = new Set<string>();
  private changed = new Map<string, Value>();
  /** Triggers that wrapped around this round */
  private fired = new Set<string>();
  private readonly resolving: string[] = [];

  constructor(
    expressions: ExpressionDefinitions,
    options: NamespaceOptions = {}
  ) {
    this.expressions = isDefinitionMap(expressions) ? new Map(expressions) : new Map(Object.entries(expressions));
    this.observer = options.observer;

    const triggers = new Set<string>();
    for (const definition of this.expressions.values()) {
      if (definition instanceof ParameterExpression) {
        definition.reset();
        if (definition.evaluateWhen !== undefined) {
          triggers.add(definition.evaluateWhen);
        }
      }
    }
    this.triggers = triggers;

    this.resetValues(options.extraContext);
    if (options.previousContext) {
      this.oldContext = new Map(Object.entries(options.previousContext));
    }
  }

  /**
   * Starts a new round: the current context becomes the old context and
   * every name is pending again.
   */
  resetValues(extraContext: Context = {}): void {
    this.extraContext = { ...extraContext };
    this.oldContext = this.context;
    this.context = new Map();
    this.pending = new Set(this.expressions.keys());
    this.changed = new Map();
    this.fired = new Set();
    logger.debug('Round reset', { pending: this.pending.size });
  }

  /**
   * Value of `name` for this round, resolving it (and whatever it depends
   * on) if needed.
   *
   * @throws {UnknownParameterError} If the name is not defined anywhere
   * @throws {CircularDependencyError} If resolving the name requires itself
   * @throws {SequenceExhaustedError} If a sequence ran out and nothing restarts it
   * @throws {ParameterEvaluationError} If a formula fails
   */
  evaluateValue(name: string, extraContext?: Context, options: ResolveOptions = {}): Value {
    const value = this.resolve(name, extraContext, options.dryRun ?? false);
    if (options.notify ?? true) {
      this.notify();
    }
    return value;
  }

  /**
   * Resolves every pending name and returns the full context
   */
  evaluateValues(extraContext?: Context, options: ResolveOptions = {}): Context {
    for (;;) {
      const [next] = this.pending;
      if (next === undefined) {
        break;
      }
      this.evaluateValue(next, extraContext, options);
    }
    return this.getContext();
  }

  /**
   * Restarts the captured sequence of `name`. Its next evaluation starts from
   * the first element.
   */
  resetGenerator(name: string): void {
    const definition = this.expressions.get(name);
    if (definition === undefined) {
      throw new UnknownParameterError(name, this.names());
    }
    if (definition instanceof ParameterExpression) {
      definition.reset();
    }
  }

  /**
   * Records a value for this round and queues a notification if it differs
   * from the previous round.
   */
  setValue(name: string, value: Value): void {
    this.context.set(name, value);
    this.pending.delete(name);
    if (!valuesEqual(this.oldContext.get(name) ?? null, value)) {
      this.changed.set(name, value);
    }
  }

  /**
   * True if `name` resolved to something different this round
   */
  valueChanged(name: string): boolean {
    return !valuesEqual(this.oldContext.get(name) ?? null, this.context.get(name) ?? null);
  }

  has(name: string): boolean {
    return this.expressions.has(name);
  }

  isResolved(name: string): boolean {
    return this.context.has(name);
  }

  getExpression(name: string): ExpressionDefinition | undefined {
    return this.expressions.get(name);
  }

  names(): string[] {
    return [...this.expressions.keys()];
  }

  getContext(): Context {
    return Object.fromEntries(this.context);
  }

  getOldContext(): Context {
    return Object.fromEntries(this.oldContext);
  }

  getExtraContext(): Context {
    return { ...this.extraContext };
  }

  getPendingNames(): string[] {
    return [...this.pending];
  }

  private resolve(name: string, extraContext: Context | undefined, dryRun: boolean): Value {
    const resolved = this.context.get(name);
    if (resolved !== undefined || this.context.has(name)) {
      return resolved ?? null;
    }

    const definition = this.expressions.get(name);
    if (definition === undefined) {
      return this.lookupExtra(name, extraContext);
    }
    if (this.resolving.includes(name)) {
      throw new CircularDependencyError([...this.resolving.slice(this.resolving.indexOf(name)), name]);
    }

    this.pending.delete(name);
    this.resolving.push(name);
    try {
      const value = this.compute(name, definition, extraContext, dryRun);
      this.setValue(name, value);
      return value;
    } catch (error) {
      this.pending.add(name);
      throw error;
    } finally {
      this.resolving.pop();
    }
  }

  private lookupExtra(name: string, extraContext: Context | undefined): Value {
    if (extraContext && Object.prototype.hasOwnProperty.call(extraContext, name)) {
      return extraContext[name];
    }
    if (Object.prototype.hasOwnProperty.call(this.extraContext, name)) {
      return this.extraContext[name];
    }
    throw new UnknownParameterError(name, this.names());
  }

  private compute(name: string, definition: ExpressionDefinition, extraContext: Context | undefined, dryRun: boolean): Value {
    if (!(definition instanceof ParameterExpression)) {
      return definition;
    }

    for (const dependency of definition.dependencies) {
      if (this.resolving.includes(dependency)) {
        throw new CircularDependencyError([...this.resolving.slice(this.resolving.indexOf(dependency)), dependency]);
      }
      if (this.pending.has(dependency)) {
        this.resolve(dependency, extraContext, dryRun);
      }
    }

    const scope = this.buildScope(extraContext);
    const trigger = definition.evaluateWhen;
    const shouldAdvance = trigger === undefined || this.fired.has(trigger);

    let result: Value;
    try {
      result = this.pull(definition, scope, dryRun, shouldAdvance);
    } catch (error) {
      if (!(error instanceof SequenceExhaustedError)) {
        throw this.wrap(name, definition, error);
      }
      if (!this.triggers.has(name)) {
        logger.debug('Sequence exhausted', { parameter: name });
        throw new SequenceExhaustedError(error.sequence, name);
      }
      logger.debug('Trigger wrapped around', { parameter: name });
      definition.reset();
      this.fired.add(name);
      try {
        result = this.pull(definition, scope, dryRun, shouldAdvance);
      } catch (retryError) {
        throw this.wrap(name, definition, retryError);
      }
    }

    return result;
  }

  /**
   * Evaluates once. A throwaway sequence from a dry run gives its first
   * element.
   */
  private pull(definition: ParameterExpression, scope: Context, dryRun: boolean, shouldAdvance: boolean): Value {
    const result: FormulaResult = definition.evaluate(scope, dryRun, shouldAdvance);
    return isSequence(result) ? result.next() : result;
  }

  /**
   * Formula scope: namespace extras, then call extras, then resolved values
   * on top.
   */
  private buildScope(extraContext: Context | undefined): Context {
    const scope: Context = { ...this.extraContext, ...extraContext };
    for (const [key, value] of this.context) {
      scope[key] = value;
    }
    return scope;
  }

  private wrap(name: string, definition: ParameterExpression, error: unknown): Error {
    if (error instanceof SequenceExhaustedError && error.details?.parameter === undefined) {
      return new SequenceExhaustedError(error.sequence, name);
    }
    if (
      error instanceof SequenceExhaustedError ||
      error instanceof CircularDependencyError ||
      error instanceof UnknownParameterError ||
      error instanceof ParameterEvaluationError
    ) {
      return error;
    }
    return new ParameterEvaluationError(name, definition.toString(), error);
  }

  /**
   * Delivers queued changes to the registered setters, then tells the
   * observer the context was updated. Setters may resolve further names;
   * their changes are delivered in the same pass.
   */
  private notify(): void {
    if (!this.observer) {
      this.changed.clear();
      return;
    }
    for (;;) {
      const [entry] = this.changed;
      if (entry === undefined) {
        break;
      }
      const [name, value] = entry;
      this.changed.delete(name);
      const setter = this.observer.getSetter(name);
      if (setter) {
        logger.debug('Applying setter', { parameter: name });
        setter(value);
      }
    }
    this.observer.contextUpdated?.(this.getContext());
  }
}
