import { TrialkitError, ErrorSeverity } from '@core/errors/TrialkitError';

/**
 * Signal raised when a bounded sequence has no further elements.
 *
 * The namespace catches it to restart sequences that act as advance
 * triggers; anywhere else it means the trial sequence is complete.
 */
export class SequenceExhaustedError extends TrialkitError {
  public readonly sequence: string;

  constructor(sequence: string, parameter?: string) {
    super(
      parameter
        ? `Sequence '${sequence}' for '${parameter}' is exhausted`
        : `Sequence '${sequence}' is exhausted`,
      {
        code: 'SEQUENCE_EXHAUSTED',
        severity: ErrorSeverity.Recoverable,
        details: { sequence, parameter }
      }
    );

    this.name = 'SequenceExhaustedError';
    this.sequence = sequence;

    Object.setPrototypeOf(this, SequenceExhaustedError.prototype);
  }
}
