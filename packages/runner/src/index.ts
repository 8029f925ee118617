export { runSubmission, __setAppContextFactory } from './handler';
export type { AppContext, RunOptions } from './handler';
export * from './env';
