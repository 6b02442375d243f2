import { TrialkitError, ErrorSeverity } from '@core/errors/TrialkitError';
import type { BaseErrorDetails } from '@core/errors/TrialkitError';

/**
 * Error thrown at the call site when an argument is unusable, such as an
 * empty collection handed to a sequence generator or a setting with the
 * wrong key set handed to a selector.
 */
export class InvalidArgumentError extends TrialkitError {
  constructor(message: string, details?: BaseErrorDetails) {
    super(message, {
      code: 'INVALID_ARGUMENT',
      severity: ErrorSeverity.Fatal,
      details
    });

    this.name = 'InvalidArgumentError';
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}
