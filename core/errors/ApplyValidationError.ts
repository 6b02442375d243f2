import { TrialkitError, ErrorSeverity } from '@core/errors/TrialkitError';

/**
 * Error reported when the operator's pending edits fail validation.
 * Nothing has been changed when this is thrown.
 */
export class ApplyValidationError extends TrialkitError {
  constructor(parameter: string | undefined, formula: string | undefined, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const target = parameter ? ` for '${parameter}'${formula !== undefined ? ` (${formula})` : ''}` : '';

    super(
      `Unable to apply the requested changes${target}. No changes have been made. Error message: ${reason}`,
      {
        code: 'APPLY_VALIDATION_FAILED',
        severity: ErrorSeverity.Recoverable,
        details: { parameter, formula },
        cause
      }
    );

    this.name = 'ApplyValidationError';
    Object.setPrototypeOf(this, ApplyValidationError.prototype);
  }
}
