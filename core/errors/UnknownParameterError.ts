import { TrialkitError, ErrorSeverity } from '@core/errors/TrialkitError';

/**
 * Error thrown when a value is requested for a name that no expression
 * and no context layer defines.
 */
export class UnknownParameterError extends TrialkitError {
  constructor(parameter: string, available: string[] = []) {
    super(`Unknown parameter '${parameter}'`, {
      code: 'UNKNOWN_PARAMETER',
      severity: ErrorSeverity.Fatal,
      details: {
        parameter,
        available
      }
    });

    this.name = 'UnknownParameterError';
    Object.setPrototypeOf(this, UnknownParameterError.prototype);
  }
}
