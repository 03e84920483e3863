import { PipelineError, RetryExhaustedError, toPipelineError } from '../errors.js';
import type { Result, RetryConfig } from '../../types/index.js';

export interface RetryOptions extends Partial<RetryConfig> {
  /** Names the operation in retry logs and exhaustion errors. */
  label?: string;
}

export interface RetryAttemptInfo {
  label?: string;
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: PipelineError;
}

export interface RetryExecutorHooks {
  onRetry?: (info: RetryAttemptInfo) => void;
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
};

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Returns the value of a successful result, or throws its error.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value;
  throw result.error;
}

export class RetryExecutor {
  private defaults: RetryConfig;
  private onRetry?: (info: RetryAttemptInfo) => void;
  private sleepFn: (ms: number) => Promise<void>;

  constructor(defaults: Partial<RetryConfig> = {}, hooks: RetryExecutorHooks = {}) {
    this.defaults = { ...DEFAULT_RETRY, ...defaults };
    this.onRetry = hooks.onRetry;
    this.sleepFn = hooks.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  delayFor(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
    return Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
  }

  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions = {}
  ): Promise<Result<T, PipelineError>> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? this.defaults.maxAttempts);
    const baseDelayMs = options.baseDelayMs ?? this.defaults.baseDelayMs;
    const maxDelayMs = options.maxDelayMs ?? this.defaults.maxDelayMs;

    for (let attempt = 1; ; attempt++) {
      try {
        return ok(await operation(attempt));
      } catch (error) {
        const failure = toPipelineError(error);

        if (!failure.retryable) {
          return err(failure);
        }

        if (attempt >= maxAttempts) {
          return err(new RetryExhaustedError(attempt, failure, options.label));
        }

        const delayMs = this.delayFor(attempt, baseDelayMs, maxDelayMs);
        this.onRetry?.({ label: options.label, attempt, maxAttempts, delayMs, error: failure });
        await this.sleepFn(delayMs);
      }
    }
  }
}
