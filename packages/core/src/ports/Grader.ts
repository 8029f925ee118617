export type ResultVisibility = 'hidden' | 'after_due_date' | 'after_published' | 'visible';

export interface TestResult {
  name?: string;
  score?: number;
  max_score?: number;
  output?: string;
  visibility?: ResultVisibility;
  [key: string]: unknown;
}

export interface LeaderboardEntry {
  name: string;
  value: number | string;
  order?: 'asc' | 'desc';
  [key: string]: unknown;
}

export interface GradeReport {
  /** False when setup or teardown failed; the submission then uses no token. */
  succeeded: boolean;
  score?: number;
  tests: TestResult[];
  leaderboard?: LeaderboardEntry[];
  output?: string;
  /** Platform visibility of the whole result, e.g. `after_due_date`. */
  visibility?: ResultVisibility;
  stdoutVisibility?: ResultVisibility;
}

/** Runs the course's checks against the submission. */
export interface Grader {
  grade(): Promise<GradeReport>;
}
