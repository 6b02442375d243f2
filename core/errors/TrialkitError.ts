/**
 * Defines the severity levels for trialkit errors.
 */
export enum ErrorSeverity {
  /** The operation can potentially continue */
  Recoverable = 'recoverable',
  /** The operation cannot continue */
  Fatal = 'fatal',
  /** Informational message, not strictly an error */
  Info = 'info',
  /** Warning message */
  Warning = 'warning',
}

/**
 * Base interface for trialkit error details.
 * Specific error types should extend this.
 */
export interface BaseErrorDetails {
  /** Parameter being resolved when the error occurred */
  parameter?: string;
  /** Formula text of that parameter */
  formula?: string;
  [key: string]: unknown;
}

/**
 * Options for creating a TrialkitError instance.
 */
export interface TrialkitErrorOptions {
  code: string;
  severity: ErrorSeverity;
  details?: BaseErrorDetails;
  cause?: unknown;
}

/**
 * Base class for all custom trialkit errors.
 * Provides structure for error codes, severity and details.
 */
export class TrialkitError extends Error {
  /** A unique code identifying the type of error */
  public readonly code: string;
  /** The severity level of the error */
  public readonly severity: ErrorSeverity;
  /** Additional context-specific details about the error */
  public readonly details?: BaseErrorDetails;

  constructor(message: string, options: TrialkitErrorOptions) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code;
    this.severity = options.severity;
    this.details = options.details;

    // Standard way to maintain stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Recoverable errors and explicit warnings can be reported without
   * halting the experiment.
   */
  public canBeWarning(): boolean {
    return (
      this.severity === ErrorSeverity.Recoverable ||
      this.severity === ErrorSeverity.Warning
    );
  }

  /**
   * Provides a string representation including code and severity.
   */
  public toString(): string {
    let result = `[${this.code}] ${this.message}`;

    if (this.details?.parameter) {
      result += ` (parameter: ${this.details.parameter}`;
      if (this.details.formula !== undefined) {
        result += `, formula: ${this.details.formula}`;
      }
      result += ')';
    }

    result += ` (Severity: ${this.severity})`;
    return result;
  }

  public toJSON(): Record<string, unknown> {
    const result: Record<string, unknown> = {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
    };

    if (this.details) {
      result.details = this.details;
    }

    if (this.cause !== undefined) {
      result.cause = this.cause instanceof Error ? this.cause.message : String(this.cause);
    }

    return result;
  }
}
