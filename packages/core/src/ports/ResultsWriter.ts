import type { GradedResult } from '../domain/models';

export interface ResultsWriter {
  write(result: GradedResult): Promise<void>;
}
