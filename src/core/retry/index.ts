export {
  RetryExecutor,
  DEFAULT_RETRY,
  ok,
  err,
  unwrap,
  type RetryOptions,
  type RetryAttemptInfo,
  type RetryExecutorHooks,
} from './executor.js';
