import chalk from 'chalk';
import { TrialkitError, ErrorSeverity } from '@core/errors/TrialkitError';
import { cliLogger as logger } from '@core/utils/logger';
import { consoleOutput } from '../utils/output';
import type { CliOutput } from '../utils/output';

export interface ErrorHandlerOptions {
  verbose?: boolean;
}

/**
 * Reports command failures. Returns the exit code rather than exiting so
 * the caller decides when the process ends.
 */
export class ErrorHandler {
  constructor(private readonly output: CliOutput = consoleOutput) {}

  handleError(error: unknown, options: ErrorHandlerOptions = {}): number {
    if (error instanceof TrialkitError) {
      this.handleTrialkitError(error, options);
      return error.severity === ErrorSeverity.Fatal ? 1 : 0;
    }
    if (error instanceof Error) {
      this.handleGenericError(error, options);
      return 1;
    }
    this.handleUnknownError(error);
    return 1;
  }

  private handleTrialkitError(error: TrialkitError, options: ErrorHandlerOptions): void {
    logger.debug('Command failed', error.toJSON());

    const label = error.canBeWarning() ? chalk.yellow('Warning: ') : chalk.red('Error: ');
    this.output.error(label + error.message);

    if (options.verbose && error.cause instanceof Error && !error.message.includes(error.cause.message)) {
      this.output.error(chalk.gray(`  Cause: ${error.cause.message}`));
    }
  }

  private handleGenericError(error: Error, options: ErrorHandlerOptions): void {
    logger.error('An unexpected error occurred', { message: error.message, stack: error.stack });
    this.output.error(chalk.red('Error: ') + error.message);

    if (options.verbose && error.stack) {
      this.output.error(chalk.gray(error.stack));
    }
  }

  private handleUnknownError(error: unknown): void {
    logger.error('An unknown error occurred', { error: String(error) });
    this.output.error(chalk.red(`Unknown Error: ${String(error)}`));
  }
}
