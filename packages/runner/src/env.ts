import { access, readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError, RateLimitOptionsSchema } from '@submission-gate/core';
import type { RateLimitOptions } from '@submission-gate/core';

export const LogLevelSchema = z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export interface AppConfig {
  appName: string;
  logLevel: LogLevel;
  local: boolean;
  enforceRateLimitLocally: boolean;
  resultsPath: string;
  submissionMetadataPath: string;
  /** Options read from RATE_LIMIT_CONFIG_PATH, when set. */
  rateLimit?: RateLimitOptions;
}

const DEFAULT_RESULTS_PATH = '/autograder/results/results.json';
const LOCAL_RESULTS_PATH = './results.json';
const DEFAULT_METADATA_PATH = '/autograder/submission_metadata.json';
const LOCAL_MARKER_PATH = '/.localhost';

export async function loadConfig(): Promise<AppConfig> {
  const appName = optionalEnv('APP_NAME') ?? 'submission-gate';
  const logLevel = parseLogLevel(optionalEnv('LOG_LEVEL'));
  const local = await detectLocalRun();
  const enforceRateLimitLocally = parseFlag(optionalEnv('ENFORCE_RATE_LIMIT_LOCALLY'));
  const resultsPath =
    optionalEnv('RESULTS_PATH') ?? (local ? LOCAL_RESULTS_PATH : DEFAULT_RESULTS_PATH);
  const submissionMetadataPath = optionalEnv('SUBMISSION_METADATA_PATH') ?? DEFAULT_METADATA_PATH;
  const rateLimitConfigPath = optionalEnv('RATE_LIMIT_CONFIG_PATH');

  return {
    appName,
    logLevel,
    local,
    enforceRateLimitLocally,
    resultsPath,
    submissionMetadataPath,
    ...(rateLimitConfigPath ? { rateLimit: await readRateLimitOptions(rateLimitConfigPath) } : {})
  };
}

/** Where to write a result when configuration itself could not be loaded. */
export async function fallbackResultsPath(): Promise<string> {
  return optionalEnv('RESULTS_PATH') ?? ((await detectLocalRun()) ? LOCAL_RESULTS_PATH : DEFAULT_RESULTS_PATH);
}

async function readRateLimitOptions(path: string): Promise<RateLimitOptions> {
  let json: unknown;
  try {
    json = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Rate limit config ${path} could not be loaded`, [
      error instanceof Error ? error.message : String(error)
    ]);
  }

  const parsed = RateLimitOptionsSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Rate limit config ${path} is invalid`,
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

async function detectLocalRun(): Promise<boolean> {
  const override = optionalEnv('AUTOGRADER_LOCAL');
  if (override !== undefined) {
    return parseFlag(override);
  }

  try {
    await access(LOCAL_MARKER_PATH);
    return true;
  } catch {
    return false;
  }
}

function parseLogLevel(value: string | undefined): LogLevel {
  const parsed = LogLevelSchema.safeParse((value ?? 'INFO').toUpperCase());
  if (!parsed.success) {
    throw new ConfigurationError('LOG_LEVEL environment variable is invalid', [
      `expected one of ${LogLevelSchema.options.join(', ')} (got "${value}")`
    ]);
  }
  return parsed.data;
}

function optionalEnv(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value === '' ? undefined : value;
}

function parseFlag(value: string | undefined): boolean {
  return (value ?? 'false').toLowerCase() === 'true';
}
