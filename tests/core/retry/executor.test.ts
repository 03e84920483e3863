import { describe, it, expect, vi } from 'vitest';
import { RetryExecutor, unwrap } from '../../../src/core/retry/executor.js';
import {
  HttpStatusError,
  NetworkError,
  RetryExhaustedError,
} from '../../../src/core/errors.js';

function createExecutor(onRetry = vi.fn()) {
  const sleep = vi.fn(async (_ms: number) => {});
  const executor = new RetryExecutor({ maxAttempts: 3, baseDelayMs: 100 }, { onRetry, sleep });
  return { executor, sleep, onRetry };
}

describe('RetryExecutor', () => {
  it('should return the value after two transient failures', async () => {
    const { executor, sleep } = createExecutor();
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new HttpStatusError(503, 'unavailable'))
      .mockRejectedValueOnce(new NetworkError('socket hang up'))
      .mockResolvedValueOnce('done');

    const result = await executor.execute(operation, { maxAttempts: 3 });

    expect(result).toEqual({ ok: true, value: 'done' });
    expect(operation).toHaveBeenCalledTimes(3);
    expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it('should invoke a permanently failing operation exactly once', async () => {
    const { executor, sleep } = createExecutor();
    const operation = vi.fn(async () => {
      throw new HttpStatusError(401, 'unauthorized');
    });

    const result = await executor.execute(operation, { maxAttempts: 3 });

    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(HttpStatusError);
      expect(result.error.kind).toBe('permanent');
    }
  });

  it('should report exhaustion with the last failure', async () => {
    const { executor, onRetry } = createExecutor();
    const operation = vi.fn(async () => {
      throw new HttpStatusError(500, 'boom');
    });

    const result = await executor.execute(operation, { label: 'Search' });

    expect(operation).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(RetryExhaustedError);
      expect(result.error.kind).toBe('transient');
      expect(result.error.message).toBe('Search failed after 3 attempts: boom');
    }
  });

  it('should classify plain thrown errors as permanent', async () => {
    const { executor } = createExecutor();
    const operation = vi.fn(async () => {
      throw new Error('bad input');
    });

    const result = await executor.execute(operation);

    expect(operation).toHaveBeenCalledTimes(1);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('permanent');
  });

  it('should cap the exponential delay', () => {
    const { executor } = createExecutor();
    expect(executor.delayFor(1, 1000, 5000)).toBe(1000);
    expect(executor.delayFor(3, 1000, 5000)).toBe(4000);
    expect(executor.delayFor(4, 1000, 5000)).toBe(5000);
  });

  it('should treat maxAttempts below one as a single attempt', async () => {
    const { executor } = createExecutor();
    const operation = vi.fn(async () => {
      throw new NetworkError('reset');
    });

    await executor.execute(operation, { maxAttempts: 0 });

    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe('unwrap', () => {
  it('should return the value or throw the error', () => {
    expect(unwrap({ ok: true, value: 42 })).toBe(42);
    const error = new NetworkError('down');
    expect(() => unwrap({ ok: false, error })).toThrow(error);
  });
});
