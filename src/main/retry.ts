import { setTimeout as sleep } from 'node:timers/promises';

export interface RetryOptions {
  /** Total tries, including the first. */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

const TRANSIENT_FS_CODES = new Set(['EBUSY', 'EAGAIN', 'EMFILE', 'ENFILE', 'EINTR', 'EPERM']);

export const errorCode = (error: unknown): string | undefined => {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
};

// EPERM shows up on Windows when a virus scanner or indexer briefly holds a file we rename.
export const isTransientFsError = (error: unknown): boolean => {
  const code = errorCode(error);
  return code !== undefined && TRANSIENT_FS_CODES.has(code);
};

export const DEFAULT_FS_RETRY: RetryOptions = {
  attempts: 4,
  baseDelayMs: 25,
  maxDelayMs: 400,
  shouldRetry: isTransientFsError
};

export const backoffDelay = (attempt: number, baseDelayMs: number, maxDelayMs: number): number =>
  Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));

export const withRetry = async <T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = DEFAULT_FS_RETRY
): Promise<T> => {
  const attempts = Math.max(1, Math.floor(options.attempts));
  const shouldRetry = options.shouldRetry ?? isTransientFsError;
  const maxDelayMs = options.maxDelayMs ?? options.baseDelayMs * 2 ** attempts;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= attempts || !shouldRetry(error)) {
        throw error;
      }
      options.onRetry?.(error, attempt);
      await sleep(backoffDelay(attempt, options.baseDelayMs, maxDelayMs));
    }
  }
};
