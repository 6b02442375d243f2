import { TrialkitError, ErrorSeverity } from '@core/errors/TrialkitError';

/**
 * Error thrown when a paradigm file cannot be read or does not have the
 * expected shape.
 */
export class ParadigmFileError extends TrialkitError {
  public readonly filePath: string;

  constructor(message: string, filePath: string, cause?: unknown) {
    super(`${message} in ${filePath}`, {
      code: 'PARADIGM_FILE_ERROR',
      severity: ErrorSeverity.Fatal,
      details: { filePath },
      cause
    });

    this.name = 'ParadigmFileError';
    this.filePath = filePath;

    Object.setPrototypeOf(this, ParadigmFileError.prototype);
  }
}
