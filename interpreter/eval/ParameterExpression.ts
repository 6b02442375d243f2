import { FormulaDefinitionError } from '@core/errors/FormulaDefinitionError';
import { InvalidArgumentError } from '@core/errors/InvalidArgumentError';
import { UnresolvedNameError } from '@core/errors/UnresolvedNameError';
import type { FormulaNode } from '@core/types/formula';
import type { Context, Value } from '@core/types/value';
import { formatValue } from '@core/utils/value-utils';
import { expressionLogger as logger } from '@core/utils/logger';
import { parseFormula } from '@grammar/parser';
import { helpers as defaultHelpers } from '@interpreter/builtins/helpers';
import type { FormulaResult, HelperTable } from '@interpreter/builtins/helpers';
import { isSequence } from '@interpreter/choice/Sequence';
import type { Sequence } from '@interpreter/choice/Sequence';
import { collectNames, evaluateFormula } from './formula-evaluator';

export interface ParameterExpressionOptions {
  /** Name of another parameter; this one only advances when that one wraps around */
  evaluateWhen?: string;
  /** Helper table formulas may call; defaults to the shared table */
  helpers?: HelperTable;
  /** Parameter name, for error messages */
  parameter?: string;
}

/**
 * Formula text of the form `u(<expression>, <trigger>)`
 */
export const ADVANCE_PATTERN = /^u\((.*), ([_A-Za-z][_A-Za-z0-9]*)\)$/s;

/**
 * A parameter value: either a literal or a formula over other parameters.
 *
 * Formulas that produce a sequence (one of the generator helpers) capture it
 * on first evaluation and pull one element per advance afterwards. Formulas
 * that produce a plain value are re-evaluated every time.
 */
export class ParameterExpression {
  private readonly literal?: Value;
  private readonly formula?: string;
  private readonly ast?: FormulaNode;
  private readonly helpers: HelperTable;
  private readonly parameter?: string;

  /** Trigger parameter named by `u(...)` or the `evaluateWhen` option */
  readonly evaluateWhen?: string;

  /** Names this formula reads, plus its trigger */
  readonly dependencies: readonly string[];

  private sequence?: Sequence;
  private current?: Value;

  constructor(value: Value, options: ParameterExpressionOptions = {}) {
    this.helpers = options.helpers ?? defaultHelpers;
    this.parameter = options.parameter;

    if (typeof value !== 'string') {
      this.literal = value;
      this.current = value;
      this.evaluateWhen = options.evaluateWhen;
      this.dependencies = this.evaluateWhen ? [this.evaluateWhen] : [];
      return;
    }

    let formula = value.trim();
    let trigger = options.evaluateWhen;
    const match = ADVANCE_PATTERN.exec(formula);
    if (match) {
      if (trigger !== undefined && trigger !== match[2]) {
        throw new InvalidArgumentError(
          `Conflicting triggers '${match[2]}' and '${trigger}' for formula '${value}'`,
          { parameter: this.parameter, formula: value }
        );
      }
      formula = match[1].trim();
      trigger = match[2];
    }

    this.formula = formula;
    this.evaluateWhen = trigger;
    this.ast = parseFormula(formula, this.parameter);

    const names = [...collectNames(this.ast)];
    if (trigger !== undefined && !names.includes(trigger)) {
      names.push(trigger);
    }
    this.dependencies = names;

    this.check(this.ast);
  }

  /**
   * Evaluates the formula once against the helpers alone. Missing names are
   * expected at this point; any other failure means the formula can never
   * work.
   */
  private check(ast: FormulaNode): void {
    const formula = this.formula ?? '';
    try {
      evaluateFormula(ast, {}, { helpers: this.helpers, formula });
    } catch (error) {
      if (error instanceof UnresolvedNameError) {
        return;
      }
      throw new FormulaDefinitionError(formula, error);
    }
  }

  /**
   * Produces the value for the current round.
   *
   * With `dryRun` a sequence-producing formula hands back a fresh Sequence
   * without capturing it. When `shouldAdvance` is false a captured sequence
   * repeats its last value.
   *
   * @throws {SequenceExhaustedError} When the captured sequence has run out
   */
  evaluate(context: Readonly<Context>, dryRun = false, shouldAdvance = true): FormulaResult {
    if (this.sequence) {
      if (shouldAdvance || this.current === undefined) {
        this.current = this.sequence.next();
      }
      return this.current;
    }

    if (!this.ast) {
      return this.literal ?? null;
    }

    const result = evaluateFormula(this.ast, context, { helpers: this.helpers, formula: this.formula });
    if (isSequence(result)) {
      if (dryRun) {
        return result;
      }
      logger.debug('Captured sequence', { parameter: this.parameter, formula: this.formula, kind: result.kind });
      this.sequence = result;
      this.current = result.next();
      return this.current;
    }

    this.current = result;
    return result;
  }

  /**
   * Drops a captured sequence so the next evaluation starts it over
   */
  reset(): void {
    if (this.ast) {
      this.sequence = undefined;
      this.current = undefined;
    }
  }

  /** Formula text without the `u(...)` wrapper; undefined for literals */
  get expression(): string | undefined {
    return this.formula;
  }

  get isConstant(): boolean {
    return this.ast === undefined;
  }

  /** True once a sequence has been captured */
  get hasSequence(): boolean {
    return this.sequence !== undefined;
  }

  /** Last produced value, if any */
  get currentValue(): Value | undefined {
    return this.current;
  }

  /**
   * Equal when the definitions are the same text (trigger included). Runtime
   * state is not compared.
   */
  equals(other: unknown): boolean {
    return other instanceof ParameterExpression && other.toString() === this.toString();
  }

  /**
   * Same definition, fresh state
   */
  clone(): ParameterExpression {
    return new ParameterExpression(this.toJSON(), {
      evaluateWhen: this.evaluateWhen,
      helpers: this.helpers,
      parameter: this.parameter
    });
  }

  /**
   * Serialized form: the literal itself, or the formula text with any trigger
   * written back as `u(...)`
   */
  toJSON(): Value {
    if (this.formula === undefined) {
      return this.literal ?? null;
    }
    return this.evaluateWhen ? `u(${this.formula}, ${this.evaluateWhen})` : this.formula;
  }

  static fromJSON(value: Value, options: ParameterExpressionOptions = {}): ParameterExpression {
    return new ParameterExpression(value, options);
  }

  toString(): string {
    const json = this.toJSON();
    return typeof json === 'string' ? json : formatValue(json);
  }
}
