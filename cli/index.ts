import chalk from 'chalk';
import { Command, CommanderError, InvalidArgumentError as OptionArgumentError, Option } from 'commander';
import { ConfigLoader } from '@core/config/loader';
import type { OutputFormat } from '@core/config/types';
import { cliLogger as logger, loggerFactory } from '@core/utils/logger';
import { version } from '@core/version';
import { createCheckCommand, CheckCommand } from './commands/check';
import { createParamsCommand } from './commands/params';
import { createRunCommand } from './commands/run';
import { ErrorHandler } from './error/ErrorHandler';
import { consoleOutput } from './utils/output';
import type { CliOutput } from './utils/output';

// CLI Options interface
export interface CLIOptions {
  verbose?: boolean;
  debug?: boolean;
}

interface RunFlags {
  trials?: number;
  format?: OutputFormat;
  seed?: number;
  expressions?: boolean;
}

export interface CLIContext {
  output?: CliOutput;
  /** Directory searched for trialkit.config.json (default: cwd) */
  projectPath?: string;
  homePath?: string;
}

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new OptionArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new OptionArgumentError('Expected an integer.');
  }
  return parsed;
}

/**
 * CLI flags win over the config file
 */
function configureLogging(options: CLIOptions, config: ConfigLoader): void {
  const level = options.debug ? 'debug' : options.verbose ? 'info' : config.load().logging?.level;
  if (level) {
    loggerFactory.setLevel(level);
  }
}

/**
 * Runs one command line and returns the exit code
 */
export async function runCli(args: string[], context: CLIContext = {}): Promise<number> {
  const output = context.output ?? consoleOutput;
  const config = new ConfigLoader(context.projectPath ?? process.cwd(), context.homePath);
  const errorHandler = new ErrorHandler(output);
  const program = new Command();
  let exitCode = 0;

  const guard = <A extends unknown[]>(action: (...args: A) => Promise<void>) =>
    async (...args: A): Promise<void> => {
      try {
        await action(...args);
      } catch (error) {
        exitCode = Math.max(exitCode, errorHandler.handleError(error, program.opts<CLIOptions>()));
      }
    };

  program
    .name('trialkit')
    .description('Evaluate experiment paradigms and run them headless')
    .version(version)
    .option('-v, --verbose', 'Log progress')
    .option('--debug', 'Log everything')
    .exitOverride()
    .configureOutput({
      writeOut: text => output.log(text.trimEnd()),
      writeErr: text => output.error(text.trimEnd())
    })
    .hook('preAction', () => configureLogging(program.opts<CLIOptions>(), config));

  program
    .command('run')
    .description('Run a paradigm until a sequence runs out or the trial limit is reached')
    .argument('<paradigm>', 'Paradigm file (.json, .yaml or .yml)')
    .option('-n, --trials <count>', 'Maximum number of trials', parsePositiveInteger)
    .addOption(new Option('-f, --format <format>', 'Output format').choices(['table', 'json']))
    .option('-s, --seed <seed>', 'Seed for generators without their own seed', parseInteger)
    .option('-e, --expressions', 'Show expression columns in table output')
    .action(guard(async (paradigm: string, flags: RunFlags) => {
      output.log(await createRunCommand(config).execute(paradigm, flags));
    }));

  program
    .command('check')
    .description('Evaluate every parameter once without running the experiment')
    .argument('<paradigm>', 'Paradigm file (.json, .yaml or .yml)')
    .action(guard(async (paradigm: string) => {
      const result = await createCheckCommand().execute(paradigm);
      if (result.valid) {
        output.log(`${chalk.green('✓')} ${paradigm}`);
        output.log(CheckCommand.formatContext(result.context).join('\n'));
      } else {
        output.error(`${chalk.red('✗')} ${paradigm}: ${result.error.message}`);
        exitCode = 1;
      }
    }));

  program
    .command('params')
    .description('List the parameters of a paradigm')
    .argument('<paradigm>', 'Paradigm file (.json, .yaml or .yml)')
    .action(guard(async (paradigm: string) => {
      output.log(await createParamsCommand().execute(paradigm));
    }));

  try {
    await program.parseAsync(args, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      logger.debug('Command line rejected', { code: error.code });
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}

/**
 * Main CLI entry point
 */
export async function main(args: string[] = process.argv.slice(2)): Promise<void> {
  process.exitCode = await runCli(args);
}
