import { readFile } from 'node:fs/promises';
import { MetadataReadError, SubmissionMetadataSchema } from '@submission-gate/core';
import type { SubmissionMetadata, SubmissionMetadataSource } from '@submission-gate/core';

export interface FileSubmissionMetadataSourceOptions {
  path: string;
  /** When true a missing file yields null instead of an error (local runs). */
  optional?: boolean;
}

export class FileSubmissionMetadataSource implements SubmissionMetadataSource {
  private readonly path: string;
  private readonly optional: boolean;

  constructor(options: FileSubmissionMetadataSourceOptions) {
    if (!options.path) {
      throw new Error('SUBMISSION_METADATA_PATH must be provided for FileSubmissionMetadataSource');
    }
    this.path = options.path;
    this.optional = options.optional ?? false;
  }

  async load(): Promise<SubmissionMetadata | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf8');
    } catch (error) {
      if (isMissingFile(error) && this.optional) {
        return null;
      }
      throw new MetadataReadError(this.path, 'file could not be read', { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new MetadataReadError(this.path, 'malformed JSON', { cause: error });
    }

    const parsed = SubmissionMetadataSchema.safeParse(json);
    if (!parsed.success) {
      throw new MetadataReadError(this.path, parsed.error.issues.map(issue => issue.message).join('; '));
    }

    return {
      submissionId: parsed.data.id,
      createdAt: parsed.data.created_at,
      previousSubmissions: parsed.data.previous_submissions
    };
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
