/**
 * DagModifier: byte-level edits against one node snapshot.
 *
 * Reads of an unedited snapshot walk the tree and fetch only the blocks that
 * overlap the requested range. The first edit loads the content into a
 * pending buffer; `flush()` lays that buffer out as a new tree and rebinds
 * the modifier to the new root. Unchanged leaves keep their addresses since
 * the store is content addressed.
 */

import type { Chunker } from './chunker.js';
import { buildBalanced, DEFAULT_MAX_LINKS } from './layout.js';
import { Mutex } from './lock.js';
import { NodeType, decodeNodeData, nodeFileSize, type DagNode } from './node.js';
import type { DagStore } from './store.js';
import {
  DecodeError,
  InvalidOffsetError,
  SeekFrom,
  UnsupportedNodeTypeError,
} from './types.js';

export interface ModifierOptions {
  maxLinks?: number;
}

export class DagModifier {
  private _store: DagStore;
  private _chunker: Chunker;
  private _maxLinks: number;
  private _root: DagNode;
  private _pending: Uint8Array | null = null;
  private _offset = 0;
  private _lock = new Mutex();

  /** Store new leaves unwrapped. */
  rawLeaves = false;

  private constructor(node: DagNode, store: DagStore, chunker: Chunker, maxLinks: number) {
    this._root = node;
    this._store = store;
    this._chunker = chunker;
    this._maxLinks = maxLinks;
  }

  /**
   * Bind a modifier to `node`.
   *
   * @throws {UnsupportedNodeTypeError} If a structured node is not file or raw.
   * @throws {DecodeError} If the node payload is malformed.
   */
  static async create(
    node: DagNode,
    store: DagStore,
    chunker: Chunker,
    opts: ModifierOptions = {},
  ): Promise<DagModifier> {
    if (node.kind === 'structured') {
      const { type } = decodeNodeData(node.payload);
      if (type !== NodeType.FILE && type !== NodeType.RAW) {
        throw new UnsupportedNodeTypeError(type);
      }
    }
    return new DagModifier(node, store, chunker, opts.maxLinks ?? DEFAULT_MAX_LINKS);
  }

  /** The snapshot this modifier is bound to (the last flushed root). */
  get node(): DagNode {
    return this._root;
  }

  /** Whether there are edits not yet flushed. */
  get dirty(): boolean {
    return this._pending !== null;
  }

  /** Current cursor position. */
  get offset(): number {
    return this._offset;
  }

  /** Logical size including unflushed edits. */
  size(): number {
    return this._pending !== null ? this._pending.length : nodeFileSize(this._root);
  }

  async read(length: number): Promise<Uint8Array> {
    return this._lock.runExclusive(async () => {
      const out = await this._readAt(this._offset, length);
      this._offset += out.length;
      return out;
    });
  }

  /** Read up to `length` bytes at `offset`. Short at end of file, empty past it. */
  async readAt(offset: number, length: number): Promise<Uint8Array> {
    return this._lock.runExclusive(() => this._readAt(offset, length));
  }

  async write(data: Uint8Array): Promise<number> {
    return this._lock.runExclusive(async () => {
      const n = await this._writeAt(this._offset, data);
      this._offset += n;
      return n;
    });
  }

  /** Write `data` at `offset`; a gap past end of file is zero-filled. */
  async writeAt(offset: number, data: Uint8Array): Promise<number> {
    return this._lock.runExclusive(() => this._writeAt(offset, data));
  }

  /** Move the cursor; returns the new absolute offset. */
  async seek(offset: number, whence: SeekFrom = SeekFrom.START): Promise<number> {
    return this._lock.runExclusive(() => {
      let base: number;
      switch (whence) {
        case SeekFrom.START:
          base = 0;
          break;
        case SeekFrom.CURRENT:
          base = this._offset;
          break;
        case SeekFrom.END:
          base = this.size();
          break;
        default:
          throw new InvalidOffsetError(`Invalid seek origin: ${String(whence)}`);
      }
      const target = base + offset;
      if (!Number.isInteger(target) || target < 0) {
        throw new InvalidOffsetError(`Invalid seek offset: ${target}`);
      }
      this._offset = target;
      return target;
    });
  }

  /** Shrink to `size`, or zero-extend when larger. The cursor does not move. */
  async truncate(size: number): Promise<void> {
    return this._lock.runExclusive(async () => {
      checkOffset(size, 'truncate size');
      const pending = await this._load();
      if (size <= pending.length) {
        this._pending = pending.slice(0, size);
      } else {
        const grown = new Uint8Array(size);
        grown.set(pending);
        this._pending = grown;
      }
    });
  }

  /**
   * Materialize pending edits into a new root node. Returns the current
   * snapshot unchanged when nothing was edited.
   */
  async flush(): Promise<DagNode> {
    return this._lock.runExclusive(async () => {
      if (this._pending === null) return this._root;
      const node = await buildBalanced(this._store, this._pending, {
        chunker: this._chunker,
        rawLeaves: this.rawLeaves,
        version: this._root.address.version,
        maxLinks: this._maxLinks,
      });
      this._root = node;
      this._pending = null;
      return node;
    });
  }

  // ---------------------------------------------------------------------------
  // Internals (lock held)
  // ---------------------------------------------------------------------------

  private async _load(): Promise<Uint8Array> {
    if (this._pending === null) {
      this._pending = await this._readSnapshot(0, nodeFileSize(this._root));
    }
    return this._pending;
  }

  private async _readAt(offset: number, length: number): Promise<Uint8Array> {
    checkOffset(offset, 'read offset');
    checkOffset(length, 'read length');
    if (this._pending !== null) {
      const end = Math.min(offset + length, this._pending.length);
      return offset >= end ? new Uint8Array(0) : this._pending.slice(offset, end);
    }
    return this._readSnapshot(offset, length);
  }

  private async _writeAt(offset: number, data: Uint8Array): Promise<number> {
    checkOffset(offset, 'write offset');
    if (data.length === 0) return 0;
    const pending = await this._load();
    const end = offset + data.length;
    let buf = pending;
    if (end > pending.length) {
      buf = new Uint8Array(end);
      buf.set(pending);
    }
    buf.set(data, offset);
    this._pending = buf;
    return data.length;
  }

  private async _readSnapshot(offset: number, length: number): Promise<Uint8Array> {
    const end = Math.min(offset + length, nodeFileSize(this._root));
    if (offset >= end) return new Uint8Array(0);
    const out = new Uint8Array(end - offset);
    await this._fill(this._root, 0, out, offset);
    return out;
  }

  /**
   * Copy the part of `node` (starting at absolute offset `base`) that overlaps
   * `[from, from + out.length)` into `out`.
   */
  private async _fill(node: DagNode, base: number, out: Uint8Array, from: number): Promise<void> {
    if (node.kind === 'raw') {
      copyOverlap(node.data, base, out, from);
      return;
    }

    const nd = decodeNodeData(node.payload);
    if (nd.blockSizes.length !== node.links.length) {
      throw new DecodeError(
        `Node ${node.address.oid} has ${node.links.length} links but ${nd.blockSizes.length} block sizes`,
      );
    }
    copyOverlap(nd.data, base, out, from);

    const to = from + out.length;
    let childBase = base + nd.data.length;
    for (let i = 0; i < node.links.length && childBase < to; i++) {
      const size = nd.blockSizes[i];
      if (childBase + size > from) {
        const child = await this._store.get(node.links[i].address);
        await this._fill(child, childBase, out, from);
      }
      childBase += size;
    }
  }
}

function checkOffset(value: number, what: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidOffsetError(`Invalid ${what}: ${value}`);
  }
}

function copyOverlap(src: Uint8Array, base: number, out: Uint8Array, from: number): void {
  const start = Math.max(base, from);
  const end = Math.min(base + src.length, from + out.length);
  if (start < end) out.set(src.subarray(start - base, end - base), start - from);
}
