export { BackoffPolicy, retryWithBackoff, sleep } from './backoff.js';
export type { BackoffOptions, SleepFn, AttemptOutcome, RetryResult, RetryOptions } from './backoff.js';
export { ServiceContext } from './context.js';
export type { RuntimeContext } from './context.js';
export { envSchema, loadConfig, summarizeConfig, subscriptionTopic } from './config.js';
export type { BridgeConfig, EnvInput } from './config.js';
export { Pipeline } from './pipeline.js';
export type { DropReason, HandleOutcome, PipelineStats, PipelineDeps, PipelineOptions } from './pipeline.js';
