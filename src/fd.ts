/**
 * FileDescriptor: one open session on a File.
 */

import type { File } from './file.js';
import type { DagModifier } from './modifier.js';
import {
  OpenMode,
  SeekFrom,
  DescriptorClosedError,
  PermissionError,
  modeCanRead,
  modeCanWrite,
} from './types.js';

/**
 * An open handle bound to one File and one DagModifier.
 *
 * Holds the File's access lock from open until `close()`: shared for
 * `READ_ONLY`, exclusive for `WRITE_ONLY` and `READ_WRITE`. Closing does not
 * flush; call `flush()` first to make edits durable.
 *
 * @example
 * ```ts
 * const fd = await file.open(OpenMode.WRITE_ONLY, true);
 * try {
 *   await fd.write('hello');
 *   await fd.flush();
 * } finally {
 *   await fd.close();
 * }
 * ```
 */
export class FileDescriptor {
  private _file: File;
  private _mod: DagModifier;
  private _mode: OpenMode;
  private _fullSync: boolean;
  private _closed = false;

  /** @internal */
  constructor(file: File, mod: DagModifier, mode: OpenMode, fullSync: boolean) {
    this._file = file;
    this._mod = mod;
    this._mode = mode;
    this._fullSync = fullSync;
  }

  toString(): string {
    const mode = ['READ_ONLY', 'WRITE_ONLY', 'READ_WRITE'][this._mode];
    return `FileDescriptor('${this._file.name}', ${mode}${this._closed ? ', closed' : ''})`;
  }

  /** The File this descriptor was opened on. */
  get file(): File {
    return this._file;
  }

  get mode(): OpenMode {
    return this._mode;
  }

  /** Whether flush waits for the parent to record the new node. */
  get fullSync(): boolean {
    return this._fullSync;
  }

  get closed(): boolean {
    return this._closed;
  }

  private _checkOpen(): void {
    if (this._closed) throw new DescriptorClosedError();
  }

  private _checkReadable(): void {
    this._checkOpen();
    if (!modeCanRead(this._mode)) throw new PermissionError('Cannot read from a write-only descriptor');
  }

  private _checkWritable(verb: string): void {
    this._checkOpen();
    if (!modeCanWrite(this._mode)) throw new PermissionError(`Cannot ${verb} a read-only descriptor`);
  }

  /** Read up to `length` bytes at the cursor and advance it. */
  async read(length: number): Promise<Uint8Array> {
    this._checkReadable();
    return this._mod.read(length);
  }

  /** Read up to `length` bytes at `offset`; the cursor does not move. */
  async readAt(offset: number, length: number): Promise<Uint8Array> {
    this._checkReadable();
    return this._mod.readAt(offset, length);
  }

  /**
   * Write at the cursor and advance it. Strings are UTF-8 encoded.
   *
   * @returns Number of bytes written.
   */
  async write(data: Uint8Array | string): Promise<number> {
    this._checkWritable('write to');
    return this._mod.write(toBytes(data));
  }

  /** Write at `offset`; the cursor does not move. */
  async writeAt(offset: number, data: Uint8Array | string): Promise<number> {
    this._checkWritable('write to');
    return this._mod.writeAt(offset, toBytes(data));
  }

  async truncate(size: number): Promise<void> {
    this._checkWritable('truncate');
    return this._mod.truncate(size);
  }

  async seek(offset: number, whence: SeekFrom = SeekFrom.START): Promise<number> {
    this._checkOpen();
    return this._mod.seek(offset, whence);
  }

  /** Size as seen through this descriptor, unflushed edits included. */
  async size(): Promise<number> {
    this._checkOpen();
    return this._mod.size();
  }

  /**
   * Commit pending edits as the File's new node and report it to the parent.
   *
   * With `fullSync` the parent has recorded the node when this resolves;
   * otherwise the notification runs later and failures surface from
   * `File.sync()`. No-op on read-only descriptors. If materializing fails
   * the File keeps its previous node.
   */
  async flush(): Promise<void> {
    this._checkOpen();
    if (!modeCanWrite(this._mode)) return;

    const node = await this._mod.flush();
    await this._file._commit(node);
    if (this._fullSync) {
      await this._file._notifyParent(node);
    } else {
      this._file._deferNotify(node);
    }
  }

  /**
   * Release the access lock taken at open.
   *
   * @throws {DescriptorClosedError} If already closed; the lock is not released twice.
   */
  async close(): Promise<void> {
    this._checkOpen();
    this._closed = true;
    this._file._release(this._mode);
  }
}

function toBytes(data: Uint8Array | string): Uint8Array {
  return typeof data === 'string' ? new TextEncoder().encode(data) : data;
}
