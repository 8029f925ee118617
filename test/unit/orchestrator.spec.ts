import { describe, expect, it, vi } from 'vitest';
import {
  GENERIC_FAILURE_MESSAGE,
  GRADER_CRASHED_MESSAGE,
  MISSING_SCORE_MESSAGE,
  NO_TOKEN_USED_MESSAGE,
  Orchestrator,
  REHYDRATION_FAILED_MESSAGE,
  createRateLimitConfig,
  type GradeReport,
  type Grader,
  type OrchestratorLogger,
  type OrchestratorOptions,
  type RateLimitOptions,
  type ResultsWriter,
  type SubmissionMetadata,
  type SubmissionMetadataSource
} from '@submission-gate/core';
import { NOW, historyEntry, hoursBefore, platformTime } from '../fixtures/submissions';

const buildMetadata = (previousSubmissions: unknown[] = []): SubmissionMetadata => ({
  submissionId: '555',
  createdAt: platformTime(NOW),
  previousSubmissions
});

const buildGrader = (report: GradeReport): Grader => ({
  grade: vi.fn().mockResolvedValue(report)
});

const setup = (
  metadata: SubmissionMetadata | null,
  rateLimit: RateLimitOptions = {},
  extra: Omit<OrchestratorOptions, 'rateLimit' | 'clock'> = {}
) => {
  const source: SubmissionMetadataSource = { load: vi.fn().mockResolvedValue(metadata) };
  const writer: ResultsWriter = { write: vi.fn().mockResolvedValue(undefined) };
  const logger: OrchestratorLogger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const orchestrator = new Orchestrator(
    source,
    writer,
    { rateLimit: createRateLimitConfig(rateLimit), clock: () => NOW, ...extra },
    logger
  );
  return { orchestrator, source, writer, logger };
};

describe('Orchestrator', () => {
  it('grades and counts the submission when a token is available', async () => {
    const { orchestrator, writer } = setup(buildMetadata([historyEntry({ at: hoursBefore(2) })]), {
      tokens: 2,
      days: 1
    });
    const grader = buildGrader({
      succeeded: true,
      score: 8,
      tests: [{ name: 'unit', score: 8, max_score: 10 }],
      output: 'Ran 1 test.\n'
    });

    const summary = await orchestrator.run(grader);

    expect(grader.grade).toHaveBeenCalledTimes(1);
    expect(summary.outcome).toBe('graded');
    expect(writer.write).toHaveBeenCalledWith({
      score: 8,
      tests: [{ name: 'unit', score: 8, max_score: 10 }],
      output:
        '[Rate Limit]: Students can get up to 2 graded submissions within any given period of 1 day. ' +
        'In the last period, you have had 2 graded submissions.\n' +
        '[Rate Limit]: As of this submission time, your next token will regenerate at Mon Mar 11 10:00:00 2024.\n\n' +
        'Ran 1 test.\n',
      execution_time: 0,
      extra_data: { id: '555', sub_counts: 1 }
    });
  });

  it('replays the previous results when denied with pull_prev_run', async () => {
    const tests = [
      { name: 'unit', score: 5, max_score: 5 },
      { name: 'style', score: 2, max_score: 5 }
    ];
    const { orchestrator, writer } = setup(
      buildMetadata([historyEntry({ at: hoursBefore(2), score: 7, tests })]),
      { tokens: 1, days: 1, pull_prev_run: true }
    );
    const grader = buildGrader({ succeeded: true, tests: [] });

    const summary = await orchestrator.run(grader);

    expect(grader.grade).not.toHaveBeenCalled();
    expect(summary.outcome).toBe('rate_limited');
    expect(summary.rehydration).toBe('replayed');
    expect(summary.result).toEqual({
      score: 7,
      tests,
      output: summary.decision?.message,
      execution_time: 0,
      extra_data: { id: '555', sub_counts: 0 }
    });
    expect(writer.write).toHaveBeenCalledWith(summary.result);
  });

  it('writes a zero score without tests when denied without pull_prev_run', async () => {
    const { orchestrator } = setup(buildMetadata([historyEntry({ at: hoursBefore(2), score: 7 })]), {
      tokens: 1,
      days: 1
    });

    const summary = await orchestrator.run(buildGrader({ succeeded: true, tests: [] }));

    expect(summary.result.score).toBe(0);
    expect(summary.result.tests).toEqual([]);
    expect(summary.result.extra_data.sub_counts).toBe(0);
    expect(summary.rehydration).toBeUndefined();
  });

  it('explains when the previous results cannot be replayed', async () => {
    const unfinished = {
      submission_time: platformTime(hoursBefore(1)),
      results: { extra_data: { id: '554', sub_counts: 1 } }
    };
    const { orchestrator, logger } = setup(buildMetadata([unfinished]), {
      tokens: 1,
      days: 1,
      pull_prev_run: true
    });

    const summary = await orchestrator.run(buildGrader({ succeeded: true, tests: [] }));

    expect(summary.rehydration).toBe('unavailable');
    expect(summary.result.score).toBe(0);
    expect(summary.result.output).toBe(`${summary.decision?.message}${REHYDRATION_FAILED_MESSAGE}`);
    expect(logger.warn).toHaveBeenCalledWith('Previous results could not be replayed', {
      submissionId: '555',
      reason: 'Previous submission #0 has no stored test results; it probably never finished'
    });
  });

  it('releases the token when the grader reports a failed run', async () => {
    const { orchestrator } = setup(buildMetadata([historyEntry({ at: hoursBefore(2) })]), {
      tokens: 3,
      days: 1
    });

    const summary = await orchestrator.run(
      buildGrader({ succeeded: false, score: 6, tests: [], output: '[Error]: setup failed\n' })
    );

    expect(summary.outcome).toBe('grader_failed');
    expect(summary.result.score).toBe(0);
    expect(summary.result.extra_data.sub_counts).toBe(0);
    expect(summary.result.output).toBe(
      '[Rate Limit]: Students can get up to 3 graded submissions within any given period of 1 day. ' +
        'In the last period, you have had 1 graded submissions.\n' +
        '[Rate Limit]: As of this submission time, your next token will regenerate at Mon Mar 11 10:00:00 2024.\n\n' +
        '[Error]: setup failed\n' +
        NO_TOKEN_USED_MESSAGE
    );
  });

  it('treats a throwing grader as a failed run', async () => {
    const { orchestrator, logger } = setup(buildMetadata(), { tokens: 1, days: 1 });
    const grader: Grader = { grade: vi.fn().mockRejectedValue(new Error('segfault in student code')) };

    const summary = await orchestrator.run(grader);

    expect(summary.outcome).toBe('grader_failed');
    expect(summary.result.extra_data.sub_counts).toBe(0);
    expect(summary.result.output?.endsWith(`${GRADER_CRASHED_MESSAGE}${NO_TOKEN_USED_MESSAGE}`)).toBe(true);
    expect(logger.error).toHaveBeenCalledWith(
      'Grader threw',
      expect.objectContaining({ submissionId: '555' })
    );
  });

  it('grades without a rate limit message when rate limiting is disabled', async () => {
    const { orchestrator } = setup(null);

    const summary = await orchestrator.run(
      buildGrader({ succeeded: true, score: 3, tests: [], output: 'done\n' })
    );

    expect(summary.decision).toBeNull();
    expect(summary.result).toEqual({
      score: 3,
      tests: [],
      output: 'done\n',
      execution_time: 0,
      extra_data: { id: 'LOCAL', sub_counts: 1 }
    });
  });

  it('skips the rate limit on local runs unless told to enforce it', async () => {
    const history = [historyEntry({ at: hoursBefore(1) })];
    const skipped = setup(buildMetadata(history), { tokens: 1, days: 1 }, { local: true });
    const enforced = setup(buildMetadata(history), { tokens: 1, days: 1 }, {
      local: true,
      enforceRateLimitLocally: true
    });

    const skippedSummary = await skipped.orchestrator.run(buildGrader({ succeeded: true, score: 1, tests: [] }));
    const enforcedSummary = await enforced.orchestrator.run(buildGrader({ succeeded: true, score: 1, tests: [] }));

    expect(skippedSummary.outcome).toBe('graded');
    expect(skipped.logger.warn).toHaveBeenCalledWith(
      'Rate limit is enabled but will not be checked because this is a local run'
    );
    expect(enforcedSummary.outcome).toBe('rate_limited');
  });

  it('sums test scores when the grader sets no overall score', async () => {
    const { orchestrator } = setup(buildMetadata());

    const summary = await orchestrator.run(
      buildGrader({
        succeeded: true,
        tests: [
          { name: 'a', score: 2.5 },
          { name: 'b', score: 1 },
          { name: 'c' }
        ]
      })
    );

    expect(summary.result.score).toBe(3.5);
    expect(summary.result.output).toBeUndefined();
  });

  it('warns when nothing gives points', async () => {
    const { orchestrator } = setup(buildMetadata());

    const summary = await orchestrator.run(buildGrader({ succeeded: true, tests: [{ name: 'smoke' }] }));

    expect(summary.result.score).toBe(0);
    expect(summary.result.output).toBe(MISSING_SCORE_MESSAGE);
  });

  it('keeps a non-empty leaderboard from the grader', async () => {
    const { orchestrator } = setup(buildMetadata());

    const summary = await orchestrator.run(
      buildGrader({ succeeded: true, score: 1, tests: [], leaderboard: [{ name: 'speed', value: 12, order: 'desc' }] })
    );

    expect(summary.result.leaderboard).toEqual([{ name: 'speed', value: 12, order: 'desc' }]);
  });

  it('passes result visibility from the grader through to the results file', async () => {
    const { orchestrator, writer } = setup(buildMetadata());

    await orchestrator.run(
      buildGrader({
        succeeded: true,
        score: 2,
        tests: [],
        visibility: 'after_due_date',
        stdoutVisibility: 'hidden'
      })
    );

    expect(writer.write).toHaveBeenCalledWith({
      score: 2,
      tests: [],
      visibility: 'after_due_date',
      stdout_visibility: 'hidden',
      execution_time: 0,
      extra_data: { id: '555', sub_counts: 1 }
    });
  });

  it('lets a results hook adjust what is written after grading', async () => {
    const { orchestrator, writer } = setup(buildMetadata(), {}, {
      modifyResults: result => ({ ...result, score: result.score * 2, visibility: 'visible' })
    });

    const summary = await orchestrator.run(buildGrader({ succeeded: true, score: 4, tests: [] }));

    expect(summary.result.score).toBe(8);
    expect(summary.result.visibility).toBe('visible');
    expect(writer.write).toHaveBeenCalledWith(summary.result);
  });

  it('applies the results hook to replayed results as well', async () => {
    const { orchestrator } = setup(
      buildMetadata([historyEntry({ at: hoursBefore(2), score: 7 })]),
      { tokens: 1, days: 1, pull_prev_run: true },
      { modifyResults: result => ({ ...result, stdout_visibility: 'hidden' }) }
    );

    const summary = await orchestrator.run(buildGrader({ succeeded: true, tests: [] }));

    expect(summary.outcome).toBe('rate_limited');
    expect(summary.result.score).toBe(7);
    expect(summary.result.stdout_visibility).toBe('hidden');
  });

  it('replays a previous run whose leaderboard is not a list', async () => {
    const previous = {
      submission_time: platformTime(hoursBefore(2)),
      results: { score: '6', tests: [{ name: 'unit', score: 6 }], leaderboard: {}, extra_data: { sub_counts: 1 } }
    };
    const { orchestrator } = setup(buildMetadata([previous]), { tokens: 1, days: 1, pull_prev_run: true });

    const summary = await orchestrator.run(buildGrader({ succeeded: true, tests: [] }));

    expect(summary.rehydration).toBe('replayed');
    expect(summary.result).toEqual({
      score: 6,
      tests: [{ name: 'unit', score: 6 }],
      leaderboard: {},
      output: summary.decision?.message,
      execution_time: 0,
      extra_data: { id: '555', sub_counts: 0 }
    });
  });

  it('falls back to the process clock when created_at cannot be parsed', async () => {
    const metadata = { ...buildMetadata([historyEntry({ at: hoursBefore(30) })]), createdAt: 'garbage' };
    const { orchestrator, logger } = setup(metadata, { tokens: 1, days: 1 });

    const summary = await orchestrator.run(buildGrader({ succeeded: true, score: 1, tests: [] }));

    expect(summary.decision?.evaluatedAt).toEqual(NOW);
    expect(summary.outcome).toBe('graded');
    expect(logger.warn).toHaveBeenCalledWith(
      'Submission created_at could not be parsed; using the process clock',
      { createdAt: 'garbage' }
    );
  });

  it('writes a failure result when the metadata cannot be loaded', async () => {
    const { orchestrator, source, writer } = setup(null, { tokens: 1, days: 1 });
    vi.mocked(source.load).mockRejectedValueOnce(new Error('disk on fire'));

    const summary = await orchestrator.run(buildGrader({ succeeded: true, tests: [] }));

    expect(summary.outcome).toBe('errored');
    expect(writer.write).toHaveBeenCalledWith({
      score: 0,
      output: GENERIC_FAILURE_MESSAGE,
      extra_data: { id: 'LOCAL', sub_counts: 0 }
    });
  });
});
