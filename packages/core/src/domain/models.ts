import { z } from 'zod';

const SubmissionIdSchema = z.union([z.string(), z.number()]).transform(value => String(value));

export const SubCountsSchema = z.union([z.literal(0), z.literal(1)]);
export type SubCounts = z.infer<typeof SubCountsSchema>;

export const ExtraDataSchema = z
  .object({
    id: SubmissionIdSchema.optional(),
    sub_counts: SubCountsSchema
  })
  .passthrough();

// Scores written by older graders may be numeric strings such as "7.0".
export const StoredScoreSchema = z.union([
  z.number().finite(),
  z.string().trim().min(1).pipe(z.coerce.number().finite())
]);

export const HistoryEntrySchema = z
  .object({
    submission_time: z.string(),
    score: z.unknown().optional(),
    results: z.unknown().optional()
  })
  .passthrough();

export const SubmissionMetadataSchema = z
  .object({
    id: SubmissionIdSchema,
    created_at: z.string(),
    previous_submissions: z.array(z.unknown()).default([])
  })
  .passthrough();

export interface SubmissionMetadata {
  submissionId: string;
  createdAt: string;
  /** Raw platform entries, oldest first. */
  previousSubmissions: unknown[];
}

export const RateLimitOptionsSchema = z
  .object({
    tokens: z.number().int().min(1).nullable().default(null),
    seconds: z.number().int().nonnegative().default(0),
    minutes: z.number().int().nonnegative().default(0),
    hours: z.number().int().nonnegative().default(0),
    days: z.number().int().nonnegative().default(0),
    reset_time: z.string().nullable().default(null),
    pull_prev_run: z.boolean().default(false),
    submission_id_exclude: z.array(SubmissionIdSchema).default([])
  })
  .strict();

export type RateLimitOptions = z.input<typeof RateLimitOptionsSchema>;

/** A previous run's payload, carried through as stored. */
export interface StoredResults {
  score: number;
  tests: unknown[];
  leaderboard: unknown;
}

export interface GradedResult {
  score: number;
  tests?: unknown[];
  leaderboard?: unknown;
  output?: string;
  visibility?: string;
  stdout_visibility?: string;
  execution_time?: number;
  extra_data: {
    id: string;
    sub_counts: SubCounts;
  };
}
