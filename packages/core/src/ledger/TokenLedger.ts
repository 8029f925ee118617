import type { SubmissionRecord } from '../domain/history';
import type { RateLimitConfig } from '../domain/RateLimitConfig';
import { formatRateLimitMessage } from './messages';

export interface RateLimitDecision {
  /** False when the config has no capacity; such decisions always allow. */
  readonly enforced: boolean;
  readonly allowed: boolean;
  readonly capacity: number | null;
  /** Tokens consumed inside the window, not counting the current submission. */
  readonly tokensUsed: number;
  /** What the student is told they have used, the current submission included when it counts. */
  readonly reportedTokens: number;
  readonly oldestCountedAt: Date | null;
  readonly nextRegenerationAt: Date | null;
  /** Entries counted only because their accounting data was unusable. */
  readonly malformedEntries: number;
  readonly evaluatedAt: Date;
  readonly message: string;
}

/**
 * Decides whether the current submission may consume a token.
 *
 * `history` must be ordered oldest first: the first counted record in that
 * order is taken as the oldest consumed token and anchors the next
 * regeneration time. Pure; identical inputs give identical decisions.
 */
export function evaluateRateLimit(
  now: Date,
  config: RateLimitConfig,
  history: readonly SubmissionRecord[]
): RateLimitDecision {
  if (config.capacity === null) {
    return Object.freeze({
      enforced: false,
      allowed: true,
      capacity: null,
      tokensUsed: 0,
      reportedTokens: 0,
      oldestCountedAt: null,
      nextRegenerationAt: null,
      malformedEntries: 0,
      evaluatedAt: now,
      message: ''
    });
  }

  const windowMs = config.window.totalMilliseconds();
  let tokensUsed = 0;
  let malformedEntries = 0;
  let oldestCountedAt: Date | null = null;

  for (const record of history) {
    if (record.submittedAt === null) {
      // Without a time the window never clears these; only a reset does.
      if (config.resetTime !== null) {
        continue;
      }
      tokensUsed += 1;
      malformedEntries += 1;
      continue;
    }
    if (config.resetTime !== null && record.submittedAt.getTime() < config.resetTime.getTime()) {
      continue;
    }
    if (now.getTime() - record.submittedAt.getTime() >= windowMs) {
      continue;
    }
    if (record.issue) {
      tokensUsed += 1;
      malformedEntries += 1;
      continue;
    }
    if (!record.counted) {
      continue;
    }
    if (record.submissionId !== undefined && config.submissionIdExclude.has(record.submissionId)) {
      continue;
    }

    tokensUsed += 1;
    if (oldestCountedAt === null) {
      oldestCountedAt = record.submittedAt;
    }
  }

  const allowed = tokensUsed < config.capacity;
  const anchor = oldestCountedAt ?? (allowed ? now : null);

  const decision = {
    enforced: true,
    allowed,
    capacity: config.capacity,
    tokensUsed,
    reportedTokens: allowed ? tokensUsed + 1 : tokensUsed,
    oldestCountedAt,
    nextRegenerationAt: anchor ? new Date(anchor.getTime() + windowMs) : null,
    malformedEntries,
    evaluatedAt: now
  };

  return Object.freeze({
    ...decision,
    message: formatRateLimitMessage(decision, config, { submissionCounts: allowed })
  });
}
