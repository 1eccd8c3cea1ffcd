import path from 'node:path';
import fs from 'fs-extra';
import { v4 as uuid } from 'uuid';
import { DEFAULT_FS_RETRY, withRetry, type RetryOptions } from './retry';

export const TEMP_SUFFIX = '.tmp';

/**
 * Temp-write, fsync, rename. The previous copy of `target` stays in place
 * until the rename commits, so a crash leaves either the old or the new file.
 */
export class AtomicFile {
  constructor(private readonly retry: RetryOptions = DEFAULT_FS_RETRY) {}

  async write(target: string, data: Buffer | string): Promise<void> {
    const tempPath = await this.stage(target, data);
    await this.commit(tempPath, target);
  }

  /** Writes `data` durably beside `target` and returns the staged path. */
  async stage(target: string, data: Buffer | string, stagedPath = tempPathFor(target)): Promise<string> {
    try {
      await withRetry(async () => {
        const fd = await fs.open(stagedPath, 'w');
        try {
          await fs.writeFile(fd, data);
          await fs.fsync(fd);
        } finally {
          await fs.close(fd);
        }
      }, this.retry);
      return stagedPath;
    } catch (error) {
      await fs.remove(stagedPath);
      throw error;
    }
  }

  /** Renames a staged file over `target`. `keepStaged` leaves it behind on failure for later recovery. */
  async commit(stagedPath: string, target: string, keepStaged = false): Promise<void> {
    try {
      await withRetry(() => fs.rename(stagedPath, target), this.retry);
    } catch (error) {
      if (!keepStaged) {
        await fs.remove(stagedPath);
      }
      throw error;
    }
  }

  async copy(source: string, target: string): Promise<void> {
    const data = await fs.readFile(source);
    await this.write(target, data);
  }
}

export const tempPathFor = (target: string): string =>
  path.join(path.dirname(target), `${path.basename(target)}.${uuid()}${TEMP_SUFFIX}`);

export const isTempFile = (fileName: string): boolean => fileName.endsWith(TEMP_SUFFIX);
