import { TrialkitError, ErrorSeverity } from '@core/errors/TrialkitError';

/**
 * Error thrown when a formula references a name that is neither in the
 * evaluation scope nor in the helper table.
 */
export class UnresolvedNameError extends TrialkitError {
  public readonly identifier: string;

  constructor(identifier: string, formula?: string) {
    super(`Name '${identifier}' is not defined`, {
      code: 'UNRESOLVED_NAME',
      severity: ErrorSeverity.Recoverable,
      details: {
        identifier,
        formula
      }
    });

    this.name = 'UnresolvedNameError';
    this.identifier = identifier;

    Object.setPrototypeOf(this, UnresolvedNameError.prototype);
  }
}
