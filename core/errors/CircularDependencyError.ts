import { TrialkitError, ErrorSeverity } from '@core/errors/TrialkitError';

/**
 * Error thrown when a parameter depends on itself, directly or through
 * other parameters.
 */
export class CircularDependencyError extends TrialkitError {
  public readonly chain: string[];

  constructor(chain: string[]) {
    super(`Circular dependency detected: ${chain.join(' -> ')}`, {
      code: 'CIRCULAR_DEPENDENCY',
      severity: ErrorSeverity.Fatal,
      details: {
        parameter: chain[0],
        chain
      }
    });

    this.name = 'CircularDependencyError';
    this.chain = chain;

    Object.setPrototypeOf(this, CircularDependencyError.prototype);
  }
}
