import chalk from 'chalk';
import type { LogColumn, TrialRecord } from '@core/types/log';
import { formatValue } from '@core/utils/value-utils';

/**
 * Where commands write. Tests pass a collector instead of the console.
 */
export interface CliOutput {
  log(text: string): void;
  error(text: string): void;
}

export const consoleOutput: CliOutput = {
  log: text => console.log(text),
  error: text => console.error(text)
};

export const EXPRESSION_COLUMN_PREFIX = 'expression_';

export class OutputFormatter {
  /**
   * Left-aligned columns two spaces apart. The first row is the header.
   */
  static formatTable(headers: readonly string[], rows: readonly (readonly string[])[]): string[] {
    const widths = headers.map((header, index) =>
      Math.max(header.length, ...rows.map(row => (row[index] ?? '').length))
    );
    return [headers, ...rows].map(cells =>
      widths.map((width, index) => (cells[index] ?? '').padEnd(width)).join('  ').trimEnd()
    );
  }

  /**
   * Trial log as a table. Expression source columns are left out unless
   * asked for.
   */
  static formatTrials(
    columns: readonly LogColumn[],
    trials: readonly TrialRecord[],
    options: { expressions?: boolean } = {}
  ): string[] {
    const shown = columns
      .map(column => column.name)
      .filter(name => options.expressions || !name.startsWith(EXPRESSION_COLUMN_PREFIX));
    const rows = trials.map(trial => shown.map(name => formatValue(trial[name])));
    return this.formatTable(shown, rows);
  }

  static formatSummary(trials: number, stopReason?: string): string {
    const count = `${trials} trial${trials !== 1 ? 's' : ''}`;
    return stopReason ? `${count} (stopped: ${stopReason})` : count;
  }

  /** Bold header line, for terminal output */
  static highlightHeader(lines: readonly string[]): string {
    const [header, ...rest] = lines;
    return [chalk.bold(header ?? ''), ...rest].join('\n');
  }
}
