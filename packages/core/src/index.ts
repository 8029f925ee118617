export * from './domain/errors';
export * from './domain/models';
export * from './domain/history';
export * from './domain/timestamps';
export * from './domain/TimeWindow';
export * from './domain/RateLimitConfig';
export * from './ledger/TokenLedger';
export * from './ledger/ResultRehydrator';
export * from './ledger/messages';
export * from './app/Orchestrator';
export * from './ports/Grader';
export * from './ports/ResultsWriter';
export * from './ports/SubmissionMetadataSource';
