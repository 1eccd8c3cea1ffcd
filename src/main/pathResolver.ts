import os from 'node:os';
import path from 'node:path';
import fs from 'fs-extra';
import { v4 as uuid } from 'uuid';
import { StorageUnavailableError, type StorageAttempt, type StorageFailureReason } from '../shared/errors';
import { DEFAULT_FS_RETRY, errorCode, withRetry, type RetryOptions } from './retry';

export const APP_DIR_NAME = 'TaskVault';

export interface StorageCandidate {
  label: string;
  path: string;
}

export interface ResolvedStorage {
  root: string;
  label: string;
  /** Candidates tried before `root`, with why each was rejected. */
  attempts: StorageAttempt[];
}

class ReadBackMismatch extends Error {}

const platformDataDir = (env: NodeJS.ProcessEnv): string => {
  const home = os.homedir();
  switch (process.platform) {
    case 'win32':
      return env.APPDATA ?? path.join(home, 'AppData', 'Roaming');
    case 'darwin':
      return path.join(home, 'Library', 'Application Support');
    default:
      return env.XDG_DATA_HOME ?? path.join(home, '.local', 'share');
  }
};

/** Storage roots in order of preference; `dataDir` comes from `TASKVAULT_DATA_DIR`. */
export const defaultCandidates = (
  installDir: string,
  dataDir: string | null = null,
  env: NodeJS.ProcessEnv = process.env
): StorageCandidate[] => {
  const candidates: StorageCandidate[] = [];
  if (dataDir) {
    candidates.push({ label: 'configured data dir', path: path.resolve(dataDir) });
  }
  candidates.push(
    { label: 'install dir', path: path.join(installDir, 'data') },
    { label: 'home dir', path: path.join(os.homedir(), '.taskvault') },
    { label: 'app data dir', path: path.join(platformDataDir(env), APP_DIR_NAME) },
    { label: 'temp dir', path: path.join(os.tmpdir(), 'taskvault') }
  );
  return candidates;
};

export const classifyStorageError = (error: unknown): StorageFailureReason => {
  if (error instanceof ReadBackMismatch) {
    return 'read-back mismatch';
  }
  const code = errorCode(error);
  switch (code) {
    case 'EACCES':
    case 'EPERM':
      return 'permission denied';
    case 'EROFS':
      return 'read-only filesystem';
    case 'ENAMETOOLONG':
      return 'path too long';
    case 'ENOSPC':
    case 'EDQUOT':
      return 'disk full';
    case 'ENOTDIR':
    case 'EEXIST':
      return 'not a directory';
    default:
      return `unexpected error (${code ?? (error instanceof Error ? error.name : 'unknown')})`;
  }
};

/**
 * Picks the first candidate directory that can actually be written to. A
 * candidate only counts once a test file round-trips through it.
 */
export class PathResolver {
  constructor(
    private readonly candidates: StorageCandidate[],
    private readonly retry: RetryOptions = DEFAULT_FS_RETRY
  ) {}

  /** Creates `dir` if needed and round-trips a test file through it. */
  async checkWritable(dir: string): Promise<void> {
    await fs.ensureDir(dir);
    const testPath = path.join(dir, `.write-check-${uuid()}`);
    const marker = `taskvault-write-check:${uuid()}`;
    try {
      await fs.writeFile(testPath, marker, 'utf8');
      const readBack = await fs.readFile(testPath, 'utf8');
      if (readBack !== marker) {
        throw new ReadBackMismatch(`Test file in ${dir} read back different content`);
      }
    } finally {
      await fs.remove(testPath);
    }
  }

  async resolve(): Promise<ResolvedStorage> {
    const attempts: StorageAttempt[] = [];
    for (const candidate of this.candidates) {
      try {
        await withRetry(() => this.checkWritable(candidate.path), this.retry);
        if (attempts.length > 0) {
          console.warn(`Using fallback storage "${candidate.label}" at ${candidate.path}`, attempts);
        }
        return { root: candidate.path, label: candidate.label, attempts };
      } catch (error) {
        const attempt: StorageAttempt = {
          label: candidate.label,
          path: candidate.path,
          reason: classifyStorageError(error),
          detail: error instanceof Error ? error.message : String(error)
        };
        console.warn(`Storage candidate "${candidate.label}" rejected: ${attempt.reason}`);
        attempts.push(attempt);
      }
    }
    throw new StorageUnavailableError(attempts);
  }
}
