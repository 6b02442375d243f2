import { TrialkitError, ErrorSeverity } from '@core/errors/TrialkitError';

export interface FormulaPosition {
  line: number;
  column: number;
  offset: number;
}

export interface FormulaParseErrorOptions {
  cause?: unknown;
  /** Name of the parameter the formula belongs to, when known */
  parameter?: string;
}

/**
 * Error thrown when a formula cannot be parsed
 */
export class FormulaParseError extends TrialkitError {
  public readonly formula: string;
  public readonly position?: FormulaPosition;

  constructor(
    message: string,
    formula: string,
    position?: FormulaPosition,
    options: FormulaParseErrorOptions = {}
  ) {
    const locationStr = position
      ? ` at line ${position.line}, column ${position.column}`
      : '';

    super(`Parse error: ${message}${locationStr}`, {
      code: 'FORMULA_PARSE_ERROR',
      severity: ErrorSeverity.Fatal,
      details: {
        parameter: options.parameter,
        formula,
        position
      },
      cause: options.cause
    });

    this.name = 'FormulaParseError';
    this.formula = formula;
    this.position = position;

    Object.setPrototypeOf(this, FormulaParseError.prototype);
  }

  /**
   * Renders the formula with a caret under the failing column.
   */
  formatPointer(): string {
    if (!this.position) {
      return this.formula;
    }
    const line = this.formula.split('\n')[this.position.line - 1] ?? '';
    return `${line}\n${' '.repeat(Math.max(0, this.position.column - 1))}^`;
  }
}
