import { TrialkitError, ErrorSeverity } from '@core/errors/TrialkitError';

/**
 * Error thrown when a controller lifecycle transition is not allowed from
 * its current state.
 */
export class ControllerStateError extends TrialkitError {
  constructor(action: string, state: string) {
    super(`Cannot ${action} while the experiment is ${state}`, {
      code: 'INVALID_STATE',
      severity: ErrorSeverity.Fatal,
      details: { action, state }
    });

    this.name = 'ControllerStateError';
    Object.setPrototypeOf(this, ControllerStateError.prototype);
  }
}
