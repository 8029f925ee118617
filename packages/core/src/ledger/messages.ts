import type { RateLimitConfig } from '../domain/RateLimitConfig';
import { formatCtime } from '../domain/timestamps';
import type { RateLimitDecision } from './TokenLedger';

const PREFIX = '[Rate Limit]: ';

export type DecisionSummary = Pick<
  RateLimitDecision,
  'enforced' | 'allowed' | 'capacity' | 'tokensUsed' | 'oldestCountedAt' | 'evaluatedAt'
>;

/**
 * Student-facing explanation of a decision. `submissionCounts` is false when
 * an allowed submission ends up not consuming its token (the grader failed),
 * which lowers the reported count by one.
 */
export function formatRateLimitMessage(
  decision: DecisionSummary,
  config: RateLimitConfig,
  options: { submissionCounts: boolean }
): string {
  if (!decision.enforced || decision.capacity === null) {
    return '';
  }

  const period = config.window.describe();
  const policy = `Students can get up to ${decision.capacity} graded submissions within any given period of ${period}.`;

  let summary: string;
  if (decision.allowed) {
    const reported = decision.tokensUsed + (options.submissionCounts ? 1 : 0);
    summary = `${policy} In the last period, you have had ${reported} graded submissions.`;
  } else {
    const replay = config.pullPrevRun
      ? ', so the results of your last graded submission are being displayed.'
      : '.';
    summary =
      `${policy} You have already had ${decision.tokensUsed} graded submissions within the last ${period}${replay}` +
      ' Because you do not have any more tokens, this submission will not count as a graded submission.';
  }

  const anchor =
    decision.oldestCountedAt ?? (decision.allowed && options.submissionCounts ? decision.evaluatedAt : null);
  const regeneration = anchor
    ? `As of this submission time, your next token will regenerate at ${formatCtime(
        new Date(anchor.getTime() + config.window.totalMilliseconds())
      )}.`
    : 'As of this submission time, you have not used any tokens!';

  return `${PREFIX}${summary}\n${PREFIX}${regeneration}\n\n`;
}
