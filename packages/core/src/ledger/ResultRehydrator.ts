import { RehydrationError } from '../domain/errors';
import type { SubmissionRecord } from '../domain/history';
import type { StoredResults } from '../domain/models';

export type RehydrationOutcome =
  | { kind: 'replayed'; sourceIndex: number; result: StoredResults }
  | { kind: 'unavailable'; error: RehydrationError; result: StoredResults };

/**
 * Replays the most recent submission's stored results. The payload is
 * returned as stored, never recomputed.
 */
export function rehydratePreviousResult(history: readonly SubmissionRecord[]): RehydrationOutcome {
  const latest = history.length > 0 ? history[history.length - 1] : undefined;

  if (!latest) {
    return unavailable(new RehydrationError('No previous submission to replay', null));
  }

  if (!latest.storedResults) {
    return unavailable(
      new RehydrationError(
        `Previous submission #${latest.index} has no stored test results; it probably never finished`,
        latest.index
      )
    );
  }

  return { kind: 'replayed', sourceIndex: latest.index, result: latest.storedResults };
}

function unavailable(error: RehydrationError): RehydrationOutcome {
  return {
    kind: 'unavailable',
    error,
    result: { score: 0, tests: [], leaderboard: null }
  };
}
