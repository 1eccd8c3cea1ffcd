import { AsyncLocalStorage } from 'node:async_hooks';
import { LockTimeoutError } from '../shared/errors';

type Release = () => void;

interface Waiter {
  exclusive: boolean;
  grant: () => void;
}

/**
 * FIFO shared/exclusive lock. A queued exclusive request blocks later shared
 * requests so a stream of writers cannot starve a backup.
 */
export class ReadWriteLock {
  private readers = 0;
  private writer = false;
  private readonly waiting: Waiter[] = [];

  constructor(private readonly resource: string) {}

  get isIdle(): boolean {
    return this.readers === 0 && !this.writer && this.waiting.length === 0;
  }

  acquireShared(timeoutMs: number): Promise<Release> {
    return this.enqueue(false, timeoutMs);
  }

  acquireExclusive(timeoutMs: number): Promise<Release> {
    return this.enqueue(true, timeoutMs);
  }

  private canGrant(exclusive: boolean): boolean {
    return exclusive ? this.readers === 0 && !this.writer : !this.writer;
  }

  private enqueue(exclusive: boolean, timeoutMs: number): Promise<Release> {
    return new Promise<Release>((resolve, reject) => {
      const grant = () => {
        if (exclusive) {
          this.writer = true;
        } else {
          this.readers += 1;
        }
        let released = false;
        resolve(() => {
          if (released) {
            return;
          }
          released = true;
          if (exclusive) {
            this.writer = false;
          } else {
            this.readers -= 1;
          }
          this.drain();
        });
      };

      if (this.waiting.length === 0 && this.canGrant(exclusive)) {
        grant();
        return;
      }

      const waiter: Waiter = {
        exclusive,
        grant: () => {
          clearTimeout(timer);
          grant();
        }
      };
      const timer = setTimeout(() => {
        const index = this.waiting.indexOf(waiter);
        if (index !== -1) {
          this.waiting.splice(index, 1);
          // Our place at the head may have been holding others back.
          this.drain();
        }
        reject(new LockTimeoutError(this.resource, timeoutMs));
      }, timeoutMs);
      this.waiting.push(waiter);
    });
  }

  private drain() {
    while (this.waiting.length > 0) {
      const head = this.waiting[0];
      if (!head || !this.canGrant(head.exclusive)) {
        return;
      }
      this.waiting.shift();
      head.grant();
    }
  }
}

/** Exclusive FIFO lock. */
export class Mutex {
  private readonly lock: ReadWriteLock;

  constructor(resource: string) {
    this.lock = new ReadWriteLock(resource);
  }

  get isLocked(): boolean {
    return !this.lock.isIdle;
  }

  acquire(timeoutMs: number): Promise<Release> {
    return this.lock.acquireExclusive(timeoutMs);
  }

  async runExclusive<T>(fn: () => Promise<T>, timeoutMs: number): Promise<T> {
    const release = await this.acquire(timeoutMs);
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

const ROOT = '*';

/**
 * Write locks for one storage root. Document writers hold the root lock
 * shared plus their own document lock; backup, restore and key rotation hold
 * the root exclusively. Locks already held by the calling async chain are
 * re-entered instead of waited on.
 */
export class LockManager {
  private readonly root = new ReadWriteLock('storage root');
  private readonly documents = new Map<string, Mutex>();
  private readonly held = new AsyncLocalStorage<ReadonlySet<string>>();

  constructor(readonly timeoutMs = 10_000) {}

  isHeld(name: string): boolean {
    const held = this.held.getStore();
    return held !== undefined && (held.has(ROOT) || held.has(name));
  }

  get rootHeld(): boolean {
    return this.held.getStore()?.has(ROOT) ?? false;
  }

  async withDocument<T>(name: string, fn: () => Promise<T>): Promise<T> {
    if (this.isHeld(name)) {
      return fn();
    }
    const releaseRoot = await this.root.acquireShared(this.timeoutMs);
    try {
      const releaseDocument = await this.documentMutex(name).acquire(this.timeoutMs);
      try {
        return await this.held.run(this.extendHeld(name), fn);
      } finally {
        releaseDocument();
      }
    } finally {
      releaseRoot();
    }
  }

  /** Waits for in-flight document writes to finish, then excludes new ones until `fn` settles. */
  async withRoot<T>(fn: () => Promise<T>): Promise<T> {
    if (this.rootHeld) {
      return fn();
    }
    const release = await this.root.acquireExclusive(this.timeoutMs);
    try {
      return await this.held.run(this.extendHeld(ROOT), fn);
    } finally {
      release();
    }
  }

  private extendHeld(name: string): ReadonlySet<string> {
    const next = new Set(this.held.getStore() ?? []);
    next.add(name);
    return next;
  }

  private documentMutex(name: string): Mutex {
    let mutex = this.documents.get(name);
    if (!mutex) {
      mutex = new Mutex(`document "${name}"`);
      this.documents.set(name, mutex);
    }
    return mutex;
  }
}
