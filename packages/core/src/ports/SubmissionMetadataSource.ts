import type { SubmissionMetadata } from '../domain/models';

export interface SubmissionMetadataSource {
  /**
   * Returns the current submission and its history, or null when the
   * platform supplied no metadata (a local run).
   */
  load(): Promise<SubmissionMetadata | null>;
}
