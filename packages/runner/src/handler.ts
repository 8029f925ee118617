import { Logger } from '@aws-lambda-powertools/logger';
import { Metrics, MetricUnit } from '@aws-lambda-powertools/metrics';
import {
  GENERIC_FAILURE_MESSAGE,
  Orchestrator,
  createRateLimitConfig,
  type GradedResult,
  type Grader,
  type RateLimitOptions,
  type RunSummary
} from '@submission-gate/core';
import { FileResultsWriter, FileSubmissionMetadataSource } from '@submission-gate/metadata-fs';
import { fallbackResultsPath, loadConfig } from './env';

const logger = new Logger({ serviceName: process.env.APP_NAME ?? 'submission-gate' });
const metrics = new Metrics({
  namespace: process.env.APP_NAME ?? 'submission-gate',
  serviceName: process.env.APP_NAME ?? 'submission-gate'
});

const UNKNOWN_SUBMISSION_ID = 'UNKNOWN';

export interface RunOptions {
  /** Takes precedence over RATE_LIMIT_CONFIG_PATH. */
  rateLimit?: RateLimitOptions;
  modifyResults?: (result: GradedResult) => GradedResult;
}

export interface AppContext {
  orchestrator: Orchestrator;
  appName: string;
}

let appContextPromise: Promise<AppContext> | undefined;
let appContextFactory: (options: RunOptions) => Promise<AppContext> = bootstrap;

async function bootstrap(options: RunOptions): Promise<AppContext> {
  const config = await loadConfig();
  logger.setLogLevel(config.logLevel);
  logger.setPersistentLogAttributes({ app: config.appName, local: config.local });
  metrics.setDefaultDimensions({ app: config.appName });

  const rateLimit = createRateLimitConfig(options.rateLimit ?? config.rateLimit ?? {});
  if (rateLimit.capacity !== null) {
    logger.info('Rate limit configured', {
      capacity: rateLimit.capacity,
      window: rateLimit.window.describe(),
      resetTime: rateLimit.resetTime?.toISOString() ?? null,
      pullPrevRun: rateLimit.pullPrevRun,
      excludedSubmissions: rateLimit.submissionIdExclude.size
    });
  }

  const orchestrator = new Orchestrator(
    new FileSubmissionMetadataSource({
      path: config.submissionMetadataPath,
      optional: config.local
    }),
    new FileResultsWriter({ path: config.resultsPath }),
    {
      rateLimit,
      local: config.local,
      enforceRateLimitLocally: config.enforceRateLimitLocally,
      modifyResults: options.modifyResults
    },
    {
      debug: (message, context) => (context ? logger.debug(message, context) : logger.debug(message)),
      info: (message, context) => (context ? logger.info(message, context) : logger.info(message)),
      warn: (message, context) => (context ? logger.warn(message, context) : logger.warn(message)),
      error: (message, context) => (context ? logger.error(message, context) : logger.error(message))
    }
  );

  return { orchestrator, appName: config.appName };
}

async function getAppContext(options: RunOptions): Promise<AppContext> {
  if (!appContextPromise) {
    appContextPromise = appContextFactory(options).catch(error => {
      appContextPromise = undefined;
      throw error;
    });
  }
  return appContextPromise;
}

/**
 * Entry point for a course autograder script: checks the rate limit, runs
 * `grader` when a token is available and writes the results file.
 */
export async function runSubmission(grader: Grader, options: RunOptions = {}): Promise<RunSummary> {
  try {
    const app = await getAppContext(options);
    const summary = await app.orchestrator.run(grader);
    recordMetrics(summary);
    logger.info('Submission processed', {
      outcome: summary.outcome,
      score: summary.result.score,
      subCounts: summary.result.extra_data.sub_counts,
      submissionId: summary.result.extra_data.id
    });
    return summary;
  } catch (error) {
    logger.error('Unhandled error in submission runner', { error: serializeError(error) });
    metrics.addMetric('submission_errored', MetricUnit.Count, 1);
    await writeFallbackResult();
    throw error;
  } finally {
    metrics.publishStoredMetrics();
    logger.resetKeys();
  }
}

// Bootstrap failed, so no orchestrator exists to write a result; the platform
// still needs one.
async function writeFallbackResult(): Promise<void> {
  try {
    await new FileResultsWriter({ path: await fallbackResultsPath() }).write({
      score: 0,
      output: GENERIC_FAILURE_MESSAGE,
      extra_data: { id: UNKNOWN_SUBMISSION_ID, sub_counts: 0 }
    });
  } catch (error) {
    logger.error('Fallback result could not be written', { error: serializeError(error) });
  }
}

function recordMetrics(summary: RunSummary): void {
  switch (summary.outcome) {
    case 'graded':
      metrics.addMetric('submission_graded', MetricUnit.Count, 1);
      break;
    case 'grader_failed':
      metrics.addMetric('grader_failed', MetricUnit.Count, 1);
      break;
    case 'rate_limited':
      metrics.addMetric('rate_limit_denied', MetricUnit.Count, 1);
      break;
    case 'errored':
      metrics.addMetric('submission_errored', MetricUnit.Count, 1);
      break;
  }

  if (summary.decision?.enforced && summary.decision.allowed) {
    metrics.addMetric('rate_limit_granted', MetricUnit.Count, 1);
  }
  if (summary.decision && summary.decision.malformedEntries > 0) {
    metrics.addMetric('malformed_history_entry', MetricUnit.Count, summary.decision.malformedEntries);
  }
  if (summary.rehydration === 'unavailable') {
    metrics.addMetric('rehydration_unavailable', MetricUnit.Count, 1);
  }
}

function serializeError(error: unknown): Record<string, unknown> {
  const base: Record<string, unknown> = { message: 'Unknown error' };
  if (error instanceof Error) {
    base.message = error.message;
    base.name = error.name;
    base.stack = error.stack;
    if ('cause' in error && error.cause) {
      base.cause = error.cause;
    }
  }
  return base;
}

/** Replaces the bootstrap used by the next run; call without a factory to restore the default. */
export function __setAppContextFactory(
  factory?: (options: RunOptions) => Promise<AppContext> | AppContext
): void {
  appContextPromise = undefined;
  appContextFactory = factory ? async options => Promise.resolve(factory(options)) : bootstrap;
}
