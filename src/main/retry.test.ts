import { describe, expect, it, vi } from 'vitest';
import { fsError } from '../test/helpers';
import { backoffDelay, errorCode, isTransientFsError, withRetry } from './retry';

describe('withRetry', () => {
  it('retries transient failures until the operation succeeds', async () => {
    const onRetry = vi.fn();
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(fsError('EBUSY'))
      .mockRejectedValueOnce(fsError('EAGAIN'))
      .mockResolvedValue('ok');

    await expect(withRetry(operation, { attempts: 4, baseDelayMs: 1, onRetry })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map(([, attempt]) => attempt)).toEqual([1, 2]);
  });

  it('rethrows non-transient errors without retrying', async () => {
    const error = fsError('ENOENT');
    const operation = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(error);

    await expect(withRetry(operation, { attempts: 4, baseDelayMs: 1 })).rejects.toBe(error);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('gives up after the configured number of attempts', async () => {
    const error = fsError('EBUSY');
    const operation = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(error);

    await expect(withRetry(operation, { attempts: 3, baseDelayMs: 1 })).rejects.toBe(error);
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('passes the attempt number to the operation', async () => {
    const seen: number[] = [];
    await withRetry(
      async (attempt) => {
        seen.push(attempt);
        if (attempt < 2) {
          throw fsError('EMFILE');
        }
      },
      { attempts: 3, baseDelayMs: 1 }
    );
    expect(seen).toEqual([1, 2]);
  });
});

describe('backoffDelay', () => {
  it('doubles from the base delay and caps at the maximum', () => {
    expect(backoffDelay(1, 25, 400)).toBe(25);
    expect(backoffDelay(3, 25, 400)).toBe(100);
    expect(backoffDelay(10, 25, 400)).toBe(400);
  });
});

describe('errorCode', () => {
  it('reads string codes only', () => {
    expect(errorCode(fsError('EBUSY'))).toBe('EBUSY');
    expect(errorCode(new Error('plain'))).toBeUndefined();
    expect(errorCode({ code: 42 })).toBeUndefined();
    expect(errorCode('EBUSY')).toBeUndefined();
  });

  it('treats lock contention codes as transient', () => {
    expect(isTransientFsError(fsError('EPERM'))).toBe(true);
    expect(isTransientFsError(fsError('EACCES'))).toBe(false);
  });
});
