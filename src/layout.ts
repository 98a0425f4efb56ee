/**
 * Balanced layout: turns file content into a tree of immutable nodes.
 *
 * Leaves are written first, then parents are built level by level until one
 * root remains, so every leaf sits at the same depth.
 */

import type { Chunker } from './chunker.js';
import {
  NodeType,
  encodeNodeData,
  type AddressVersion,
  type DagNode,
  type NodeAddress,
  type StructuredNode,
} from './node.js';
import type { DagStore } from './store.js';
import { DagFileError } from './types.js';

export const DEFAULT_MAX_LINKS = 174;

export interface LayoutOptions {
  chunker: Chunker;
  /** Store leaves unwrapped. Needs address version 1. */
  rawLeaves: boolean;
  version: AddressVersion;
  maxLinks?: number;
}

interface Sized {
  address: NodeAddress;
  size: number;
}

export async function buildBalanced(
  store: DagStore,
  data: Uint8Array,
  opts: LayoutOptions,
): Promise<DagNode> {
  const maxLinks = opts.maxLinks ?? DEFAULT_MAX_LINKS;
  if (!Number.isInteger(maxLinks) || maxLinks < 2) {
    throw new RangeError(`maxLinks must be an integer >= 2, got ${maxLinks}`);
  }
  if (opts.rawLeaves && opts.version === 0) {
    throw new DagFileError('Raw leaves need address version 1');
  }

  const chunks = opts.chunker.split(data);
  if (chunks.length === 0) {
    return store.putStructured(encodeNodeData({ type: NodeType.FILE, fileSize: 0 }), [], opts.version);
  }
  if (chunks.length === 1) {
    const only = chunks[0];
    if (opts.rawLeaves) return store.putRaw(only, opts.version);
    return store.putStructured(
      encodeNodeData({ type: NodeType.FILE, data: only, fileSize: only.length }),
      [],
      opts.version,
    );
  }

  let level: Sized[] = [];
  for (const chunk of chunks) {
    const leaf = opts.rawLeaves
      ? await store.putRaw(chunk, opts.version)
      : await store.putStructured(
          encodeNodeData({ type: NodeType.RAW, data: chunk, fileSize: chunk.length }),
          [],
          opts.version,
        );
    level.push({ address: leaf.address, size: chunk.length });
  }

  for (;;) {
    const parents: StructuredNode[] = [];
    const sizes: number[] = [];
    for (let i = 0; i < level.length; i += maxLinks) {
      const group = level.slice(i, i + maxLinks);
      const blockSizes = group.map((g) => g.size);
      const fileSize = blockSizes.reduce((n, s) => n + s, 0);
      parents.push(
        await store.putStructured(
          encodeNodeData({ type: NodeType.FILE, fileSize, blockSizes }),
          group.map((g) => g.address),
          opts.version,
        ),
      );
      sizes.push(fileSize);
    }
    if (parents.length === 1) return parents[0];
    level = parents.map((p, i) => ({ address: p.address, size: sizes[i] }));
  }
}
