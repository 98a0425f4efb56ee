import { describe, it, expect, afterEach } from 'vitest';
import * as path from 'node:path';
import { Mutex, RWLock, withRepoLock } from '../src/index.js';
import { fs, rmTmpDir, freshStore, tick } from './helpers.js';

describe('Mutex', () => {
  it('serves waiters in arrival order', async () => {
    const mutex = new Mutex();
    const order: number[] = [];
    await Promise.all(
      [1, 2, 3].map((n) =>
        mutex.runExclusive(async () => {
          await tick();
          order.push(n);
        }),
      ),
    );
    expect(order).toEqual([1, 2, 3]);
  });

  it('releases after a failure', async () => {
    const mutex = new Mutex();
    await expect(
      mutex.runExclusive(async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(await mutex.runExclusive(() => 7)).toBe(7);
  });

  it('a second release call has no effect', async () => {
    const mutex = new Mutex();
    const unlock = await mutex.lock();
    unlock();
    unlock();
    const again = await mutex.lock();
    let third = false;
    const pending = mutex.lock().then((release) => {
      third = true;
      release();
    });
    await tick();
    expect(third).toBe(false);
    again();
    await pending;
    expect(third).toBe(true);
  });
});

describe('RWLock', () => {
  it('admits many readers at once', async () => {
    const lock = new RWLock();
    await lock.acquireRead();
    await lock.acquireRead();
    expect(lock.readers).toBe(2);
    expect(lock.writeLocked).toBe(false);
  });

  it('a writer waits for readers to leave', async () => {
    const lock = new RWLock();
    await lock.acquireRead();
    let granted = false;
    const writer = lock.acquireWrite().then(() => {
      granted = true;
    });
    await tick();
    expect(granted).toBe(false);
    expect(lock.waiting).toBe(1);

    lock.releaseRead();
    await writer;
    expect(granted).toBe(true);
    expect(lock.writeLocked).toBe(true);
    expect(lock.readers).toBe(0);
  });

  it('readers arriving behind a queued writer wait for it', async () => {
    const lock = new RWLock();
    const events: string[] = [];
    await lock.acquireRead();

    const writer = lock.acquireWrite().then(() => {
      events.push('writer');
    });
    const reader = lock.acquireRead().then(() => {
      events.push('reader');
    });
    await tick();
    expect(events).toEqual([]);
    expect(lock.waiting).toBe(2);

    lock.releaseRead();
    await writer;
    await tick();
    expect(events).toEqual(['writer']);

    lock.releaseWrite();
    await reader;
    expect(events).toEqual(['writer', 'reader']);
    expect(lock.readers).toBe(1);
  });

  it('grants consecutive queued readers together', async () => {
    const lock = new RWLock();
    await lock.acquireWrite();
    const a = lock.acquireRead();
    const b = lock.acquireRead();
    lock.releaseWrite();
    await Promise.all([a, b]);
    expect(lock.readers).toBe(2);
    expect(lock.waiting).toBe(0);
  });

  it('releasing an unheld lock throws', () => {
    const lock = new RWLock();
    expect(() => lock.releaseRead()).toThrow('releaseRead without a held read lock');
    expect(() => lock.releaseWrite()).toThrow('releaseWrite without a held write lock');
  });
});

describe('withRepoLock', () => {
  let tmpDir: string;

  afterEach(() => rmTmpDir(tmpDir));

  it('holds a lockfile only while running', async () => {
    const res = await freshStore();
    tmpDir = res.tmpDir;
    const store = res.store;
    const lockPath = path.join(store._gitdir, 'dagfile.lock');

    const result = await withRepoLock(store._fsModule, store._gitdir, async () => {
      expect(fs.existsSync(lockPath)).toBe(true);
      return 'done';
    });
    expect(result).toBe('done');
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it('serializes callers on one repository', async () => {
    const res = await freshStore();
    tmpDir = res.tmpDir;
    const store = res.store;
    const order: string[] = [];
    const run = (label: string) =>
      withRepoLock(store._fsModule, store._gitdir, async () => {
        order.push(`${label}:start`);
        await tick();
        order.push(`${label}:end`);
      });
    await Promise.all([run('a'), run('b')]);
    expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('removes the lockfile when fn throws', async () => {
    const res = await freshStore();
    tmpDir = res.tmpDir;
    const store = res.store;
    await expect(
      withRepoLock(store._fsModule, store._gitdir, async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(fs.existsSync(path.join(store._gitdir, 'dagfile.lock'))).toBe(false);
  });
});
