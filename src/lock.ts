/**
 * Async locks.
 *
 * JS is single-threaded, but async operations interleave at every await, so
 * the critical sections here are Promise chains rather than OS primitives.
 *
 * - `Mutex`: exclusive lock, waiters served in arrival order.
 * - `RWLock`: many readers or one writer, FIFO; a queued writer holds back
 *   readers that arrive after it.
 * - `withRepoLock`: advisory lockfile plus in-process mutex for ref updates.
 */

import type { FsModule } from './types.js';

// ---------------------------------------------------------------------------
// Mutex
// ---------------------------------------------------------------------------

export class Mutex {
  private _tail: Promise<void> = Promise.resolve();

  /**
   * Wait for the lock. Resolves to a release function; calling it more than
   * once has no further effect.
   */
  async lock(): Promise<() => void> {
    const prev = this._tail;
    let releaseNext = (): void => {};
    const next = new Promise<void>((resolve) => {
      releaseNext = resolve;
    });
    this._tail = next;

    await prev;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      releaseNext();
    };
  }

  /** Run `fn` while holding the lock. */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const unlock = await this.lock();
    try {
      return await fn();
    } finally {
      unlock();
    }
  }
}

// ---------------------------------------------------------------------------
// RWLock
// ---------------------------------------------------------------------------

interface Waiter {
  exclusive: boolean;
  grant: () => void;
}

export class RWLock {
  private _readers = 0;
  private _writer = false;
  private _queue: Waiter[] = [];

  /** Number of shared holders. */
  get readers(): number {
    return this._readers;
  }

  /** Whether the exclusive lock is held. */
  get writeLocked(): boolean {
    return this._writer;
  }

  /** Number of callers waiting for the lock. */
  get waiting(): number {
    return this._queue.length;
  }

  acquireRead(): Promise<void> {
    if (!this._writer && this._queue.length === 0) {
      this._readers++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this._queue.push({ exclusive: false, grant: resolve });
    });
  }

  acquireWrite(): Promise<void> {
    if (!this._writer && this._readers === 0 && this._queue.length === 0) {
      this._writer = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this._queue.push({ exclusive: true, grant: resolve });
    });
  }

  releaseRead(): void {
    if (this._readers === 0) throw new Error('releaseRead without a held read lock');
    this._readers--;
    this._drain();
  }

  releaseWrite(): void {
    if (!this._writer) throw new Error('releaseWrite without a held write lock');
    this._writer = false;
    this._drain();
  }

  private _drain(): void {
    while (this._queue.length > 0 && !this._writer) {
      const head = this._queue[0];
      if (head.exclusive) {
        if (this._readers > 0) return;
        this._queue.shift();
        this._writer = true;
        head.grant();
        return;
      }
      this._queue.shift();
      this._readers++;
      head.grant();
    }
  }
}

// ---------------------------------------------------------------------------
// Repository lock
// ---------------------------------------------------------------------------

// Per-repo in-process async mutexes (keyed by gitdir path)
const repoMutexes = new Map<string, Mutex>();

function errorCode(err: unknown): unknown {
  return typeof err === 'object' && err !== null && 'code' in err ? err.code : undefined;
}

/**
 * Execute `fn` while holding an advisory lock on the repository.
 *
 * Serializes both in-process async operations (via Mutex) and
 * cross-process access (via an O_EXCL lockfile).
 */
export async function withRepoLock<T>(
  fsModule: FsModule,
  gitdir: string,
  fn: () => Promise<T>,
): Promise<T> {
  let mutex = repoMutexes.get(gitdir);
  if (!mutex) {
    mutex = new Mutex();
    repoMutexes.set(gitdir, mutex);
  }

  return mutex.runExclusive(async () => {
    const lockPath = `${gitdir}/dagfile.lock`;

    let acquired = false;
    const maxAttempts = 100;
    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      try {
        const handle = await fsModule.promises.open(lockPath, 'wx');
        await handle.close();
        acquired = true;
        break;
      } catch (err) {
        if (errorCode(err) === 'EEXIST') {
          // Lock held by another process
          await sleep(10 + Math.random() * 20);
          continue;
        }
        throw err;
      }
    }
    if (!acquired) {
      throw new Error(`Could not acquire lock after ${maxAttempts} attempts: ${lockPath}`);
    }

    try {
      return await fn();
    } finally {
      try {
        await fsModule.promises.unlink(lockPath);
      } catch (err) {
        if (errorCode(err) !== 'ENOENT') throw err;
      }
    }
  });
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
