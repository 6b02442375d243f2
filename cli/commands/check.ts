/**
 * Check CLI Command
 * Dry-runs every expression of a paradigm without starting an experiment
 */

import { ApplyValidationError } from '@core/errors/ApplyValidationError';
import type { Context } from '@core/types/value';
import { formatValue } from '@core/utils/value-utils';
import { cliLogger as logger } from '@core/utils/logger';
import { validateParadigm } from '@services/controller/validate';
import { TrialLog } from '@services/data/TrialLog';
import { loadParadigmFile } from '@services/paradigm/paradigm-file';
import { OutputFormatter } from '../utils/output';

export type CheckResult =
  | { valid: true; context: Context }
  | { valid: false; error: ApplyValidationError };

export class CheckCommand {
  /**
   * Evaluates the paradigm as the first trial of a headless run would see it.
   * Evaluation failures come back as an invalid result; anything else, such
   * as an unreadable file, is thrown.
   */
  async execute(paradigmPath: string): Promise<CheckResult> {
    const paradigm = await loadParadigmFile(paradigmPath);
    const context: Context = { ...new TrialLog().getContextValues(), trial: 1 };

    try {
      return { valid: true, context: validateParadigm(paradigm, context) };
    } catch (error) {
      if (error instanceof ApplyValidationError) {
        logger.debug('Paradigm check failed', { paradigm: paradigmPath, parameter: error.details?.parameter });
        return { valid: false, error };
      }
      throw error;
    }
  }

  /** Name/value rows for a valid result */
  static formatContext(context: Readonly<Context>): string[] {
    const rows = Object.keys(context)
      .sort()
      .map(name => [name, formatValue(context[name])]);
    return OutputFormatter.formatTable(['Name', 'Value'], rows);
  }
}

export function createCheckCommand(): CheckCommand {
  return new CheckCommand();
}
