import { ClockParseError } from './errors';
import { ExtraDataSchema, HistoryEntrySchema, StoredScoreSchema } from './models';
import type { StoredResults } from './models';
import { parsePlatformTimestamp } from './timestamps';

export type HistoryEntryIssue =
  | 'invalid_timestamp'
  | 'missing_results'
  | 'missing_extra_data'
  | 'invalid_extra_data';

export interface SubmissionRecord {
  /** Position in the platform-supplied history, oldest first. */
  readonly index: number;
  /** Null when the platform timestamp could not be parsed. */
  readonly submittedAt: Date | null;
  readonly counted: boolean;
  readonly submissionId?: string;
  /** Present only when the entry carries a replayable test list. */
  readonly storedResults?: StoredResults;
  /** Set when the entry's accounting data is unusable; the ledger counts such entries. */
  readonly issue?: HistoryEntryIssue;
}

/**
 * Reads platform history entries into records without reordering them.
 * Never throws: anything unusable is flagged on the record instead.
 */
export function parseSubmissionHistory(entries: readonly unknown[]): SubmissionRecord[] {
  return entries.map((entry, index) => Object.freeze(parseEntry(entry, index)));
}

function parseEntry(entry: unknown, index: number): SubmissionRecord {
  const parsed = HistoryEntrySchema.safeParse(entry);
  if (!parsed.success) {
    return { index, submittedAt: null, counted: false, issue: 'invalid_timestamp' };
  }

  let submittedAt: Date | null;
  try {
    submittedAt = parsePlatformTimestamp(parsed.data.submission_time);
  } catch (error) {
    if (!(error instanceof ClockParseError)) {
      throw error;
    }
    submittedAt = null;
  }

  const results = isRecord(parsed.data.results) ? parsed.data.results : undefined;
  const storedResults = readStoredResults(parsed.data.score, results);
  const base = { index, submittedAt, ...(storedResults ? { storedResults } : {}) };

  if (submittedAt === null) {
    return { ...base, counted: false, issue: 'invalid_timestamp' };
  }

  if (!results) {
    return { ...base, counted: false, issue: 'missing_results' };
  }

  const rawExtra = results.extra_data;
  if (rawExtra === undefined || rawExtra === null) {
    return { ...base, counted: false, issue: 'missing_extra_data' };
  }

  const extra = ExtraDataSchema.safeParse(rawExtra);
  if (!extra.success) {
    return { ...base, counted: false, issue: 'invalid_extra_data' };
  }

  return {
    ...base,
    counted: extra.data.sub_counts === 1,
    ...(extra.data.id !== undefined ? { submissionId: extra.data.id } : {})
  };
}

function readStoredResults(
  topLevelScore: unknown,
  results: Record<string, unknown> | undefined
): StoredResults | undefined {
  if (!results || !Array.isArray(results.tests)) {
    return undefined;
  }

  return {
    score: readScore(topLevelScore) ?? readScore(results.score) ?? 0,
    tests: results.tests,
    leaderboard: results.leaderboard ?? null
  };
}

function readScore(value: unknown): number | undefined {
  const parsed = StoredScoreSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
