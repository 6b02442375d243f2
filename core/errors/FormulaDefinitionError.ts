import { TrialkitError, ErrorSeverity } from '@core/errors/TrialkitError';

/**
 * Error thrown when a formula parses but fails its definition-time check
 * for a reason other than an unresolved name.
 */
export class FormulaDefinitionError extends TrialkitError {
  public readonly formula: string;

  constructor(formula: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Invalid formula '${formula}': ${reason}`, {
      code: 'FORMULA_DEFINITION_ERROR',
      severity: ErrorSeverity.Fatal,
      details: { formula },
      cause
    });

    this.name = 'FormulaDefinitionError';
    this.formula = formula;

    Object.setPrototypeOf(this, FormulaDefinitionError.prototype);
  }
}
