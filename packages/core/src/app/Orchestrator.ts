import { ClockParseError } from '../domain/errors';
import { parseSubmissionHistory } from '../domain/history';
import type { SubmissionRecord } from '../domain/history';
import type { GradedResult, StoredResults, SubmissionMetadata } from '../domain/models';
import type { RateLimitConfig } from '../domain/RateLimitConfig';
import { parsePlatformTimestamp } from '../domain/timestamps';
import { formatRateLimitMessage } from '../ledger/messages';
import { rehydratePreviousResult } from '../ledger/ResultRehydrator';
import type { RehydrationOutcome } from '../ledger/ResultRehydrator';
import { evaluateRateLimit } from '../ledger/TokenLedger';
import type { RateLimitDecision } from '../ledger/TokenLedger';
import type { GradeReport, Grader, TestResult } from '../ports/Grader';
import type { ResultsWriter } from '../ports/ResultsWriter';
import type { SubmissionMetadataSource } from '../ports/SubmissionMetadataSource';

export const LOCAL_SUBMISSION_ID = 'LOCAL';

export const GENERIC_FAILURE_MESSAGE =
  'An unexpected exception occurred while trying to execute the autograder. Please try again or contact a TA if this persists.';
export const GRADER_CRASHED_MESSAGE =
  "An exception occurred in the autograder's main function. Please contact a TA to resolve this issue.\n";
export const NO_TOKEN_USED_MESSAGE =
  '[Rate Limit]: Since the autograder failed to run, you will not use up a token!\n';
export const REHYDRATION_FAILED_MESSAGE =
  '[ERROR]: Could not pull the data from your previous submission! This is probably due to it not have finished running!\n';
export const MISSING_SCORE_MESSAGE =
  'This autograder does not set the main score or have any tests which give points!\n';

export interface OrchestratorLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export interface OrchestratorOptions {
  rateLimit: RateLimitConfig;
  /** Local runs skip the rate limit unless `enforceRateLimitLocally` is set. */
  local?: boolean;
  enforceRateLimitLocally?: boolean;
  clock?: () => Date;
  /** Last chance to adjust a graded or replayed result before it is written. */
  modifyResults?: (result: GradedResult) => GradedResult;
}

export type RunOutcome = 'graded' | 'grader_failed' | 'rate_limited' | 'errored';

export interface RunSummary {
  outcome: RunOutcome;
  result: GradedResult;
  decision: RateLimitDecision | null;
  rehydration?: RehydrationOutcome['kind'];
}

interface Evaluation {
  decision: RateLimitDecision;
  history: SubmissionRecord[];
}

export class Orchestrator {
  private readonly clock: () => Date;

  constructor(
    private readonly metadata: SubmissionMetadataSource,
    private readonly results: ResultsWriter,
    private readonly options: OrchestratorOptions,
    private readonly logger?: OrchestratorLogger
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Handles one submission end to end and writes exactly one result. Resolves
   * with the written result even when something fails along the way.
   */
  async run(grader: Grader): Promise<RunSummary> {
    const startedAt = this.clock();
    let submissionId = LOCAL_SUBMISSION_ID;

    try {
      const metadata = await this.metadata.load();
      submissionId = metadata?.submissionId ?? LOCAL_SUBMISSION_ID;

      const evaluation = this.evaluate(metadata, startedAt);
      if (evaluation && !evaluation.decision.allowed) {
        return await this.replayPrevious(evaluation, submissionId, startedAt);
      }

      return await this.grade(grader, evaluation?.decision ?? null, submissionId, startedAt);
    } catch (error) {
      this.logger?.error('Submission run failed; writing failure result', {
        submissionId,
        error: describeError(error)
      });
      const result: GradedResult = {
        score: 0,
        output: GENERIC_FAILURE_MESSAGE,
        extra_data: { id: submissionId, sub_counts: 0 }
      };
      await this.results.write(result);
      return { outcome: 'errored', result, decision: null };
    }
  }

  private evaluate(metadata: SubmissionMetadata | null, startedAt: Date): Evaluation | null {
    const config = this.options.rateLimit;
    if (config.capacity === null) {
      return null;
    }

    if (this.options.local && !this.options.enforceRateLimitLocally) {
      this.logger?.warn('Rate limit is enabled but will not be checked because this is a local run');
      return null;
    }

    if (!metadata) {
      this.logger?.warn('Rate limit skipped: no submission metadata available');
      return null;
    }

    const now = this.resolveNow(metadata.createdAt, startedAt);
    const history = parseSubmissionHistory(metadata.previousSubmissions);
    const decision = evaluateRateLimit(now, config, history);

    for (const record of history) {
      if (record.issue) {
        this.logger?.debug('Malformed history entry', {
          index: record.index,
          issue: record.issue
        });
      }
    }

    this.logger?.info('Rate limit evaluated', {
      submissionId: metadata.submissionId,
      allowed: decision.allowed,
      capacity: decision.capacity,
      tokensUsed: decision.tokensUsed,
      malformedEntries: decision.malformedEntries,
      historyLength: history.length
    });

    return { decision, history };
  }

  private resolveNow(createdAt: string, fallback: Date): Date {
    try {
      return parsePlatformTimestamp(createdAt);
    } catch (error) {
      if (!(error instanceof ClockParseError)) {
        throw error;
      }
      this.logger?.warn('Submission created_at could not be parsed; using the process clock', {
        createdAt
      });
      return fallback;
    }
  }

  private async replayPrevious(
    evaluation: Evaluation,
    submissionId: string,
    startedAt: Date
  ): Promise<RunSummary> {
    const { decision, history } = evaluation;
    let output = decision.message;
    let payload: StoredResults = { score: 0, tests: [], leaderboard: null };
    let rehydration: RehydrationOutcome['kind'] | undefined;

    if (this.options.rateLimit.pullPrevRun) {
      const outcome = rehydratePreviousResult(history);
      rehydration = outcome.kind;
      if (outcome.kind === 'unavailable') {
        this.logger?.warn('Previous results could not be replayed', {
          submissionId,
          reason: outcome.error.message
        });
        output += REHYDRATION_FAILED_MESSAGE;
      } else {
        this.logger?.debug('Replaying previous results', { submissionId, sourceIndex: outcome.sourceIndex });
      }
      payload = outcome.result;
    }

    const built: GradedResult = {
      score: payload.score,
      tests: payload.tests,
      ...(payload.leaderboard !== null && payload.leaderboard !== undefined
        ? { leaderboard: payload.leaderboard }
        : {}),
      output,
      execution_time: this.elapsedSeconds(startedAt),
      extra_data: { id: submissionId, sub_counts: 0 }
    };

    const result = this.finalize(built);
    await this.results.write(result);
    return {
      outcome: 'rate_limited',
      result,
      decision,
      ...(rehydration ? { rehydration } : {})
    };
  }

  private async grade(
    grader: Grader,
    decision: RateLimitDecision | null,
    submissionId: string,
    startedAt: Date
  ): Promise<RunSummary> {
    let report: GradeReport;
    try {
      report = await grader.grade();
    } catch (error) {
      this.logger?.error('Grader threw', { submissionId, error: describeError(error) });
      report = { succeeded: false, tests: [], output: GRADER_CRASHED_MESSAGE };
    }

    const counts = report.succeeded;
    let output = decision
      ? formatRateLimitMessage(decision, this.options.rateLimit, { submissionCounts: counts })
      : '';
    output += report.output ?? '';
    if (!counts && decision) {
      output += NO_TOKEN_USED_MESSAGE;
    }

    let score: number;
    if (!counts) {
      score = 0;
    } else if (report.score !== undefined) {
      score = report.score;
    } else {
      const summed = sumTestScores(report.tests);
      if (summed === null) {
        output += MISSING_SCORE_MESSAGE;
      }
      score = summed ?? 0;
    }

    const built: GradedResult = {
      score,
      tests: report.tests,
      ...(report.leaderboard && report.leaderboard.length > 0 ? { leaderboard: report.leaderboard } : {}),
      ...(output ? { output } : {}),
      ...(report.visibility ? { visibility: report.visibility } : {}),
      ...(report.stdoutVisibility ? { stdout_visibility: report.stdoutVisibility } : {}),
      execution_time: this.elapsedSeconds(startedAt),
      extra_data: { id: submissionId, sub_counts: counts ? 1 : 0 }
    };

    const result = this.finalize(built);
    await this.results.write(result);
    return { outcome: counts ? 'graded' : 'grader_failed', result, decision };
  }

  private finalize(result: GradedResult): GradedResult {
    return this.options.modifyResults ? this.options.modifyResults(result) : result;
  }

  private elapsedSeconds(startedAt: Date): number {
    return Math.max(0, this.clock().getTime() - startedAt.getTime()) / 1000;
  }
}

function sumTestScores(tests: TestResult[]): number | null {
  let total: number | null = null;
  for (const test of tests) {
    if (typeof test.score === 'number') {
      total = (total ?? 0) + test.score;
    }
  }
  return total;
}

function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}
