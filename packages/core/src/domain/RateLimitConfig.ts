import { ClockParseError, ConfigurationError } from './errors';
import { RateLimitOptionsSchema } from './models';
import type { RateLimitOptions } from './models';
import { TimeWindow } from './TimeWindow';
import { parseWallClock } from './timestamps';

export interface RateLimitConfig {
  /** Maximum graded submissions per window; null disables rate limiting. */
  readonly capacity: number | null;
  readonly window: TimeWindow;
  /** Submissions strictly before this instant are ignored entirely. */
  readonly resetTime: Date | null;
  readonly submissionIdExclude: ReadonlySet<string>;
  /** Replay the last submission's results instead of a zero score when denied. */
  readonly pullPrevRun: boolean;
}

export function createRateLimitConfig(options: RateLimitOptions = {}): RateLimitConfig {
  const parsed = RateLimitOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid rate limit options',
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const { tokens, seconds, minutes, hours, days, reset_time, pull_prev_run, submission_id_exclude } =
    parsed.data;
  const window = TimeWindow.of({ seconds, minutes, hours, days });

  if (tokens !== null && window.totalSeconds() === 0) {
    throw new ConfigurationError(
      `A rate limit of ${tokens} token(s) needs a regeneration window longer than zero seconds`
    );
  }

  let resetTime: Date | null = null;
  if (reset_time !== null) {
    try {
      resetTime = parseWallClock(reset_time);
    } catch (error) {
      if (error instanceof ClockParseError) {
        throw new ConfigurationError('Invalid reset_time', [
          `expected YYYY-MM-DDTHH:MM:SS (got "${reset_time}")`
        ]);
      }
      throw error;
    }
  }

  return Object.freeze({
    capacity: tokens,
    window,
    resetTime,
    submissionIdExclude: new Set(submission_id_exclude),
    pullPrevRun: pull_prev_run
  });
}
