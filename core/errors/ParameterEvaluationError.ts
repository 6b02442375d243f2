import { TrialkitError, ErrorSeverity } from '@core/errors/TrialkitError';

/**
 * Error thrown when a parameter's formula fails while the namespace resolves
 * it. Wraps the underlying failure with the parameter name and formula text.
 */
export class ParameterEvaluationError extends TrialkitError {
  public readonly parameter: string;
  public readonly formula: string;

  constructor(parameter: string, formula: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to evaluate '${parameter}' (${formula}): ${reason}`, {
      code: 'PARAMETER_EVALUATION_ERROR',
      severity: ErrorSeverity.Fatal,
      details: { parameter, formula },
      cause
    });

    this.name = 'ParameterEvaluationError';
    this.parameter = parameter;
    this.formula = formula;

    Object.setPrototypeOf(this, ParameterEvaluationError.prototype);
  }
}
