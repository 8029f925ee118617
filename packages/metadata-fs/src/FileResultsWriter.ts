import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { GradedResult, ResultsWriter } from '@submission-gate/core';

export interface FileResultsWriterOptions {
  path: string;
}

export class FileResultsWriter implements ResultsWriter {
  private readonly path: string;

  constructor(options: FileResultsWriterOptions) {
    if (!options.path) {
      throw new Error('RESULTS_PATH must be provided for FileResultsWriter');
    }
    this.path = options.path;
  }

  async write(result: GradedResult): Promise<void> {
    await mkdir(path.dirname(this.path), { recursive: true });
    await writeFile(this.path, JSON.stringify(result), 'utf8');
  }
}
