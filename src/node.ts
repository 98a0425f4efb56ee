/**
 * Immutable DAG nodes and the node data codec.
 *
 * A node is either an unwrapped raw leaf (a git blob) or a structured node
 * (a git tree whose `.node` blob carries the encoded NodeData and whose other
 * entries link to children).
 */

import { z } from 'zod';
import { DecodeError } from './types.js';

// ---------------------------------------------------------------------------
// Addresses
// ---------------------------------------------------------------------------

export type AddressVersion = 0 | 1;
export type Codec = 'raw' | 'dag';

export interface NodeAddress {
  /** Addressing scheme version. Version 0 only addresses structured nodes. */
  readonly version: AddressVersion;
  readonly codec: Codec;
  /** Git object id of the blob (raw) or tree (dag). */
  readonly oid: string;
}

export function formatAddress(address: NodeAddress): string {
  return `v${address.version}-${address.codec}-${address.oid}`;
}

const ADDRESS_RE = /^v([01])-(raw|dag)-([0-9a-f]{40})$/;

export function parseAddress(text: string): NodeAddress {
  const m = ADDRESS_RE.exec(text);
  if (!m) throw new DecodeError(`Invalid node address: '${text}'`);
  const version: AddressVersion = m[1] === '1' ? 1 : 0;
  const codec: Codec = m[2] === 'raw' ? 'raw' : 'dag';
  if (version === 0 && codec === 'raw') {
    throw new DecodeError(`Version 0 address cannot be raw: '${text}'`);
  }
  return { version, codec, oid: m[3] };
}

export function sameAddress(a: NodeAddress, b: NodeAddress): boolean {
  return a.oid === b.oid && a.codec === b.codec && a.version === b.version;
}

// ---------------------------------------------------------------------------
// Nodes
// ---------------------------------------------------------------------------

export interface NodeLink {
  /** Entry name inside the parent tree; orders the children. */
  readonly name: string;
  readonly address: NodeAddress;
}

export interface RawNode {
  readonly kind: 'raw';
  readonly address: NodeAddress;
  readonly data: Uint8Array;
}

export interface StructuredNode {
  readonly kind: 'structured';
  readonly address: NodeAddress;
  /** Encoded NodeData; decode with `decodeNodeData`. */
  readonly payload: Uint8Array;
  readonly links: readonly NodeLink[];
}

export type DagNode = RawNode | StructuredNode;

// ---------------------------------------------------------------------------
// Node data
// ---------------------------------------------------------------------------

export const NodeType = {
  RAW: 'raw',
  DIRECTORY: 'directory',
  FILE: 'file',
  METADATA: 'metadata',
  SYMLINK: 'symlink',
  HAMT: 'hamt',
} as const;

export type NodeType = (typeof NodeType)[keyof typeof NodeType];

export interface NodeData {
  type: NodeType;
  /** Inline bytes stored before any linked children. */
  data: Uint8Array;
  /** Declared logical size of the whole subtree. */
  fileSize: number;
  /** Logical size of each linked child, in link order. */
  blockSizes: number[];
}

const NodeDataSchema = z.object({
  type: z.enum([
    NodeType.RAW,
    NodeType.DIRECTORY,
    NodeType.FILE,
    NodeType.METADATA,
    NodeType.SYMLINK,
    NodeType.HAMT,
  ]),
  data: z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/, 'data must be base64').optional(),
  filesize: z.number().int().nonnegative().optional(),
  blocksizes: z.array(z.number().int().nonnegative()).optional(),
});

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

export function encodeNodeData(nd: {
  type: NodeType;
  data?: Uint8Array;
  fileSize?: number;
  blockSizes?: number[];
}): Uint8Array {
  const out: z.infer<typeof NodeDataSchema> = { type: nd.type };
  if (nd.data && nd.data.length > 0) out.data = Buffer.from(nd.data).toString('base64');
  if (nd.fileSize !== undefined) out.filesize = nd.fileSize;
  if (nd.blockSizes && nd.blockSizes.length > 0) out.blocksizes = nd.blockSizes;
  return textEncoder.encode(JSON.stringify(out));
}

/**
 * Decode a structured node payload.
 *
 * @throws {DecodeError} If the payload is not JSON or fails the schema.
 */
export function decodeNodeData(payload: Uint8Array): NodeData {
  let json: unknown;
  try {
    json = JSON.parse(textDecoder.decode(payload));
  } catch (err) {
    throw new DecodeError(`Malformed node payload: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = NodeDataSchema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    throw new DecodeError(`Malformed node payload: ${detail}`);
  }
  const { type, data, filesize, blocksizes } = parsed.data;
  const bytes = data ? new Uint8Array(Buffer.from(data, 'base64')) : new Uint8Array(0);
  return {
    type,
    data: bytes,
    fileSize: filesize ?? bytes.length,
    blockSizes: blocksizes ?? [],
  };
}

/** Logical size of a node: byte length for raw leaves, declared size otherwise. */
export function nodeFileSize(node: DagNode): number {
  switch (node.kind) {
    case 'raw':
      return node.data.length;
    case 'structured':
      return decodeNodeData(node.payload).fileSize;
  }
}
