export { main, usage, EXIT_OK, EXIT_FAILURE, EXIT_USAGE } from './cli';
export { runJob } from './runner';
export type { JobDependencies, JobOutcome, JobReport, SpendSummary } from './runner';
export * from './env';
