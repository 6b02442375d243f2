/**
 * Configuration types for trialkit
 */

export type OutputFormat = 'table' | 'json';

export interface TrialkitConfig {
  logging?: LoggingConfig;
  run?: RunConfig;
}

export interface LoggingConfig {
  level?: string;
}

export interface RunConfig {
  /** Upper bound on trials for headless runs */
  maxTrials?: number;
  format?: OutputFormat;
}

export interface ResolvedRunConfig {
  maxTrials: number;
  format: OutputFormat;
}

export const DEFAULT_MAX_TRIALS = 1000;
