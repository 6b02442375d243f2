import { TrialkitError, ErrorSeverity } from '@core/errors/TrialkitError';
import type { BaseErrorDetails } from '@core/errors/TrialkitError';

/**
 * Error thrown when a parsed formula fails while it is being evaluated
 * (bad operand types, wrong helper arguments, index out of range).
 */
export class FormulaEvaluationError extends TrialkitError {
  constructor(message: string, details?: BaseErrorDetails, cause?: unknown) {
    super(message, {
      code: 'FORMULA_EVALUATION_ERROR',
      severity: ErrorSeverity.Fatal,
      details,
      cause
    });

    this.name = 'FormulaEvaluationError';
    Object.setPrototypeOf(this, FormulaEvaluationError.prototype);
  }
}
