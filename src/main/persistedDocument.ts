import { DecryptionFailedError } from '../shared/errors';
import type { EncryptedStore } from './encryptedStore';
import { Mutex } from './locks';

export type Persistence = 'write-through' | 'deferred';

/**
 * In-memory owner of one encrypted document. Memory is authoritative: reads
 * never touch disk, and the store only receives snapshots. Every mutation is
 * serialized through one queue; write-through mutations are applied inside
 * the document lock and committed to memory only once the write succeeded.
 */
export abstract class PersistedDocument<T> {
  protected state: T;
  private revision = 0;
  private persistedRevision = 0;
  private loadError: DecryptionFailedError | null = null;
  private readonly queue: Mutex;

  protected constructor(
    protected readonly store: EncryptedStore,
    readonly documentName: string,
    protected readonly now: () => Date
  ) {
    this.state = this.empty();
    this.queue = new Mutex(`${documentName} mutations`);
  }

  protected abstract empty(): T;

  protected abstract hydrate(raw: unknown): T;

  get isDirty(): boolean {
    return this.revision > this.persistedRevision;
  }

  get isAvailable(): boolean {
    return this.loadError === null;
  }

  /**
   * Replaces memory with what is on disk. A document that fails to decrypt is
   * left on disk untouched and this repository refuses work until reloaded.
   */
  async reload(): Promise<void> {
    this.revision = 0;
    this.persistedRevision = 0;
    try {
      this.state = this.hydrate(await this.store.load(this.documentName));
      this.loadError = null;
    } catch (error) {
      if (!(error instanceof DecryptionFailedError)) {
        throw error;
      }
      console.error(`Failed to load "${this.documentName}"; it stays on disk for manual recovery`, error);
      this.state = this.empty();
      this.loadError = error;
    }
  }

  /** Discards memory without writing, as on logout. */
  reset() {
    this.state = this.empty();
    this.revision = 0;
    this.persistedRevision = 0;
    this.loadError = null;
  }

  /** Writes the current snapshot if anything changed since the last write. */
  async flush(): Promise<boolean> {
    if (!this.isAvailable) {
      return false;
    }
    return this.store.locks.withDocument(this.documentName, async () => {
      if (!this.isDirty) {
        return false;
      }
      const snapshot = this.state;
      const revision = this.revision;
      await this.store.save(this.documentName, snapshot);
      this.persistedRevision = Math.max(this.persistedRevision, revision);
      return true;
    });
  }

  markDirty() {
    this.revision += 1;
  }

  protected assertAvailable() {
    if (this.loadError) {
      throw this.loadError;
    }
  }

  protected serialize<R>(fn: () => Promise<R>): Promise<R> {
    return this.queue.runExclusive(fn, this.store.locks.timeoutMs);
  }

  /** Applies `change` under the mutation queue; `change` returns the current state when nothing changes. */
  protected mutate(change: (current: T) => T, persistence: Persistence): Promise<T> {
    return this.serialize(async () => {
      this.assertAvailable();
      if (persistence === 'deferred') {
        const next = change(this.state);
        if (next !== this.state) {
          this.state = next;
          this.markDirty();
        }
        return this.state;
      }
      return this.store.locks.withDocument(this.documentName, async () => {
        const next = change(this.state);
        if (next === this.state) {
          return this.state;
        }
        await this.store.save(this.documentName, next);
        this.state = next;
        this.revision += 1;
        this.persistedRevision = this.revision;
        return next;
      });
    });
  }
}
