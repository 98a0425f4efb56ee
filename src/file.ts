/**
 * File: the mutable view of one logical file in the DAG.
 */

import { defaultChunker, type Chunker } from './chunker.js';
import { FileDescriptor } from './fd.js';
import { Mutex, RWLock } from './lock.js';
import { silentLogger, type Logger } from './logger.js';
import { DagModifier } from './modifier.js';
import { NodeType, decodeNodeData, formatAddress, type DagNode } from './node.js';
import type { DagStore } from './store.js';
import {
  OpenMode,
  CorruptStateError,
  NotSupportedError,
  UnsupportedModeError,
  UnsupportedNodeTypeError,
  isOpenMode,
  type ParentCloser,
} from './types.js';

export interface FileOptions {
  /** Leaf boundaries for new data (default: 256 KiB fixed-size). */
  chunker?: Chunker;
  /** Maximum children per structured node. */
  maxLinks?: number;
  logger?: Logger;
}

/**
 * Reject nodes that are not file-shaped.
 *
 * @throws {NotSupportedError} For symlinks.
 * @throws {UnsupportedNodeTypeError} For directories and other structured types.
 * @throws {DecodeError} If the payload is malformed.
 */
function checkFileShaped(node: DagNode): void {
  switch (node.kind) {
    case 'raw':
      return;
    case 'structured': {
      const { type } = decodeNodeData(node.payload);
      switch (type) {
        case NodeType.FILE:
        case NodeType.RAW:
          return;
        case NodeType.SYMLINK:
          throw new NotSupportedError('Symlinks are not supported');
        default:
          throw new UnsupportedNodeTypeError(type);
      }
    }
  }
}

/**
 * One logical file. Owns the committed root node and arbitrates access
 * between descriptors.
 *
 * Two locks guard it. The access lock admits any number of read-only
 * descriptors or exactly one writer, and is held for each descriptor's
 * lifetime. The node lock only covers reads and stores of the committed
 * node, so `size()` and `getNode()` never wait for a writer to close.
 */
export class File {
  /** Name as known to the parent. */
  readonly name: string;
  /** Store new leaves unwrapped; set for version 1 addresses. */
  rawLeaves: boolean;

  /** @internal */ _store: DagStore;
  private _parent: ParentCloser;
  private _node: DagNode;
  private _nodeLock = new Mutex();
  private _descLock = new RWLock();
  private _chunker: Chunker;
  private _maxLinks: number | undefined;
  private _logger: Logger;
  private _deferred: Promise<void> = Promise.resolve();
  private _deferredFailure: { error: unknown } | null = null;

  constructor(
    name: string,
    node: DagNode,
    parent: ParentCloser,
    store: DagStore,
    opts: FileOptions = {},
  ) {
    this.name = name;
    this._node = node;
    this._parent = parent;
    this._store = store;
    this._chunker = opts.chunker ?? defaultChunker;
    this._maxLinks = opts.maxLinks;
    this._logger = (opts.logger ?? silentLogger).withContext(name);
    this.rawLeaves = node.address.version > 0;
  }

  toString(): string {
    return `File('${this.name}', ${formatAddress(this._node.address)})`;
  }

  get type(): 'file' {
    return 'file';
  }

  /**
   * Open a descriptor.
   *
   * `READ_ONLY` shares the access lock with other readers; `WRITE_ONLY` and
   * `READ_WRITE` wait for exclusive access. The lock is held until the
   * descriptor is closed.
   *
   * @param mode - One of `OpenMode`.
   * @param fullSync - Make the descriptor's flushes wait for the parent.
   * @throws {UnsupportedModeError} For any other mode; no lock is taken.
   */
  async open(mode: number, fullSync = false): Promise<FileDescriptor> {
    // Join the access queue before the first await, so a sync() called
    // after this open() waits for the descriptor.
    checkFileShaped(this._node);
    if (!isOpenMode(mode)) throw new UnsupportedModeError(mode);

    await (mode === OpenMode.READ_ONLY ? this._descLock.acquireRead() : this._descLock.acquireWrite());

    let mod: DagModifier;
    try {
      // Bind to the node committed when access was granted, so a writer
      // never edits a snapshot an earlier writer has replaced.
      const node = await this.getNode();
      checkFileShaped(node);
      mod = await DagModifier.create(node, this._store, this._chunker, { maxLinks: this._maxLinks });
    } catch (err) {
      this._release(mode);
      throw err;
    }
    mod.rawLeaves = this.rawLeaves;

    this._logger.debug(`open mode=${mode} fullSync=${fullSync}`);
    return new FileDescriptor(this, mod, mode, fullSync);
  }

  /** Logical size of the committed node; unflushed edits are not counted. */
  async size(): Promise<number> {
    return this._nodeLock.runExclusive(() => {
      const node = this._node;
      switch (node.kind) {
        case 'structured':
          return decodeNodeData(node.payload).fileSize;
        case 'raw':
          return node.data.length;
        default:
          throw new CorruptStateError(`Unrecognized node in File '${this.name}'`);
      }
    });
  }

  /** The committed node. */
  async getNode(): Promise<DagNode> {
    return this._nodeLock.runExclusive(() => this._node);
  }

  /**
   * Open a write-only, full-sync descriptor, flush it and close it.
   */
  async flush(): Promise<void> {
    const fd = await this.open(OpenMode.WRITE_ONLY, true);
    try {
      await fd.flush();
    } finally {
      await fd.close();
    }
  }

  /**
   * Wait until no writer holds the file, then for any deferred parent
   * notifications.
   *
   * @throws The first deferred notification failure since the last sync.
   */
  async sync(): Promise<void> {
    await this._descLock.acquireWrite();
    this._descLock.releaseWrite();

    await this._deferred;
    const failure = this._deferredFailure;
    if (failure) {
      this._deferredFailure = null;
      throw failure.error;
    }
  }

  // ---------------------------------------------------------------------------
  // Descriptor hooks
  // ---------------------------------------------------------------------------

  /** @internal Store a flushed node; the only path that changes the committed node. */
  async _commit(node: DagNode): Promise<void> {
    await this._nodeLock.runExclusive(() => {
      this._node = node;
    });
    this._logger.debug(`commit ${formatAddress(node.address)}`);
  }

  /** @internal */
  async _notifyParent(node: DagNode): Promise<void> {
    await this._parent.notify(this.name, node);
  }

  /** @internal Notify the parent on a later macrotask, in flush order. */
  _deferNotify(node: DagNode): void {
    this._deferred = this._deferred
      .then(() => new Promise<void>((resolve) => setImmediate(resolve)))
      .then(() => this._parent.notify(this.name, node))
      .catch((err: unknown) => {
        this._logger.error('deferred parent notification failed', err);
        this._deferredFailure ??= { error: err };
      });
  }

  /** @internal Release the access lock class taken for `mode`. */
  _release(mode: OpenMode): void {
    if (mode === OpenMode.READ_ONLY) {
      this._descLock.releaseRead();
    } else {
      this._descLock.releaseWrite();
    }
    this._logger.debug(`close mode=${mode}`);
  }
}
