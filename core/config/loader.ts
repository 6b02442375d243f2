import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { configLogger as logger } from '@core/utils/logger';
import { DEFAULT_MAX_TRIALS } from './types';
import type { OutputFormat, ResolvedRunConfig, RunConfig, TrialkitConfig } from './types';

/**
 * Load trialkit configuration from both global and project locations
 */
export class ConfigLoader {
  private globalConfigPath: string;
  private projectConfigPath: string;
  private cachedConfig?: TrialkitConfig;

  constructor(projectPath?: string, homePath: string = os.homedir()) {
    // Global config location: ~/.config/trialkit.json
    this.globalConfigPath = path.join(homePath, '.config', 'trialkit.json');

    // Project config location: <project>/trialkit.config.json
    this.projectConfigPath = projectPath
      ? path.join(projectPath, 'trialkit.config.json')
      : path.join(process.cwd(), 'trialkit.config.json');
  }

  /**
   * Load and merge configurations
   */
  load(): TrialkitConfig {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const globalConfig = this.loadConfigFile(this.globalConfigPath);
    const projectConfig = this.loadConfigFile(this.projectConfigPath);

    // Project overrides global
    this.cachedConfig = this.mergeConfigs(globalConfig, projectConfig);
    return this.cachedConfig;
  }

  /**
   * Run settings with defaults filled in
   */
  resolveRunConfig(overrides: RunConfig = {}): ResolvedRunConfig {
    const run = { ...this.load().run, ...stripUndefined(overrides) };
    return {
      maxTrials: run.maxTrials ?? DEFAULT_MAX_TRIALS,
      format: run.format ?? 'table'
    };
  }

  private loadConfigFile(filePath: string): TrialkitConfig {
    try {
      if (fs.existsSync(filePath)) {
        const content = fs.readFileSync(filePath, 'utf8');
        const parsed: unknown = JSON.parse(content);
        return normalizeConfig(parsed, filePath);
      }
    } catch (error) {
      logger.warn(`Failed to load config from ${filePath}`, {
        error: error instanceof Error ? error.message : String(error)
      });
    }

    return {};
  }

  private mergeConfigs(global: TrialkitConfig, project: TrialkitConfig): TrialkitConfig {
    const merged: TrialkitConfig = {};

    if (global.logging || project.logging) {
      merged.logging = { ...global.logging, ...project.logging };
    }

    if (global.run || project.run) {
      merged.run = { ...global.run, ...project.run };
    }

    return merged;
  }
}

function stripUndefined(run: RunConfig): RunConfig {
  const result: RunConfig = {};
  if (run.maxTrials !== undefined) result.maxTrials = run.maxTrials;
  if (run.format !== undefined) result.format = run.format;
  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'table' || value === 'json';
}

/**
 * Keeps only the recognized keys; anything else is reported and dropped.
 */
function normalizeConfig(raw: unknown, filePath: string): TrialkitConfig {
  if (!isRecord(raw)) {
    logger.warn(`Ignoring config at ${filePath}: expected a JSON object`);
    return {};
  }

  const config: TrialkitConfig = {};

  if (isRecord(raw.logging) && typeof raw.logging.level === 'string') {
    config.logging = { level: raw.logging.level };
  }

  if (isRecord(raw.run)) {
    const run: RunConfig = {};
    const { maxTrials, format } = raw.run;
    if (typeof maxTrials === 'number' && Number.isInteger(maxTrials) && maxTrials > 0) {
      run.maxTrials = maxTrials;
    } else if (maxTrials !== undefined) {
      logger.warn(`Ignoring run.maxTrials in ${filePath}: expected a positive integer`);
    }
    if (isOutputFormat(format)) {
      run.format = format;
    } else if (format !== undefined) {
      logger.warn(`Ignoring run.format in ${filePath}: expected "table" or "json"`);
    }
    config.run = run;
  }

  return config;
}
