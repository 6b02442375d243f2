/**
 * Run CLI Command
 * Runs a paradigm headless and reports the trial log
 */

import * as path from 'path';
import { ConfigLoader } from '@core/config/loader';
import type { OutputFormat } from '@core/config/types';
import type { LogColumn, TrialRecord } from '@core/types/log';
import { cliLogger as logger } from '@core/utils/logger';
import { seedHelpers } from '@interpreter/builtins/helpers';
import { HeadlessController } from '@services/controller/HeadlessController';
import type { StopReason } from '@services/controller/HeadlessController';
import { TrialLog } from '@services/data/TrialLog';
import { loadParadigmFile } from '@services/paradigm/paradigm-file';
import { OutputFormatter } from '../utils/output';

export interface RunOptions {
  trials?: number;
  format?: OutputFormat;
  seed?: number;
  /** Include the expression source columns in table output */
  expressions?: boolean;
}

export interface RunReport {
  paradigm: string;
  columns: LogColumn[];
  trials: TrialRecord[];
  stopReason?: StopReason;
}

export class RunCommand {
  constructor(private readonly config: ConfigLoader = new ConfigLoader()) {}

  /**
   * Runs the paradigm and renders the report in the configured format
   */
  async execute(paradigmPath: string, options: RunOptions = {}): Promise<string> {
    const settings = this.config.resolveRunConfig({ maxTrials: options.trials, format: options.format });
    const report = await this.run(paradigmPath, settings.maxTrials, options.seed);

    if (settings.format === 'json') {
      return JSON.stringify(report, null, 2);
    }

    const lines = OutputFormatter.formatTrials(report.columns, report.trials, { expressions: options.expressions });
    return [
      OutputFormatter.highlightHeader(lines),
      '',
      OutputFormatter.formatSummary(report.trials.length, report.stopReason)
    ].join('\n');
  }

  async run(paradigmPath: string, maxTrials: number, seed?: number): Promise<RunReport> {
    // Generators built without their own seed draw one from this source
    if (seed !== undefined) {
      seedHelpers(seed);
    }

    const paradigm = await loadParadigmFile(paradigmPath);
    const data = new TrialLog();
    const controller = new HeadlessController({ paradigm, data }, { maxTrials });

    logger.info('Running paradigm', { paradigm: paradigmPath, maxTrials, seed });
    try {
      controller.run();
    } finally {
      controller.dispose();
    }

    return {
      paradigm: path.basename(paradigmPath),
      columns: data.getColumns(),
      trials: data.getTrials(),
      stopReason: controller.stopReason
    };
  }
}

export function createRunCommand(config?: ConfigLoader): RunCommand {
  return new RunCommand(config);
}
