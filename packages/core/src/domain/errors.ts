export class ConfigurationError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class ClockParseError extends Error {
  public readonly raw: string;

  constructor(raw: string) {
    super(`Unable to parse timestamp "${raw}"`);
    this.name = 'ClockParseError';
    this.raw = raw;
  }
}

export class RehydrationError extends Error {
  public readonly submissionIndex: number | null;

  constructor(message: string, submissionIndex: number | null) {
    super(message);
    this.name = 'RehydrationError';
    this.submissionIndex = submissionIndex;
  }
}

export class MetadataReadError extends Error {
  public readonly path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(`Unable to read submission metadata at ${path}: ${reason}`, options);
    this.name = 'MetadataReadError';
    this.path = path;
  }
}
