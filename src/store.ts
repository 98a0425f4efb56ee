/**
 * DagStore: content-addressed node storage in a bare git repository.
 */

import * as nodeFs from 'node:fs';
import git from 'isomorphic-git';
import { MODE_BLOB, MODE_TREE, DagFileError, DecodeError, type FsModule } from './types.js';
import type {
  AddressVersion,
  DagNode,
  NodeAddress,
  NodeLink,
  RawNode,
  StructuredNode,
} from './node.js';

/** Tree entry holding a structured node's payload. */
export const PAYLOAD_ENTRY = '.node';

/** Entry name for the child at `index`; zero-padded so names sort in link order. */
export function linkName(index: number): string {
  return String(index).padStart(6, '0');
}

/**
 * Immutable node storage backed by a bare git repository.
 *
 * Raw leaves are blobs. Structured nodes are trees: a `.node` blob with the
 * payload plus one entry per child. Writing identical content twice yields
 * the same address.
 */
export class DagStore {
  /** @internal */ _fsModule: FsModule;
  /** @internal */ _gitdir: string;

  constructor(fsModule: FsModule, gitdir: string) {
    this._fsModule = fsModule;
    this._gitdir = gitdir;
  }

  toString(): string {
    return `DagStore('${this._gitdir}')`;
  }

  /**
   * Open or create a bare git repository.
   *
   * @param path - Path to the bare repository directory.
   * @param opts.fs - Filesystem module (default: Node.js `node:fs`).
   * @param opts.create - Create the repo if it doesn't exist (default: true).
   */
  static async open(
    path: string,
    opts: { fs?: FsModule; create?: boolean } = {},
  ): Promise<DagStore> {
    const fsModule = opts.fs ?? nodeFs as unknown as FsModule;
    const create = opts.create ?? true;

    let exists = false;
    try {
      await fsModule.promises.stat(`${path}/HEAD`);
      exists = true;
    } catch { /* not found */ }

    if (!exists) {
      if (!create) throw new DagFileError(`Repository not found: ${path}`);
      await git.init({ fs: fsModule, gitdir: path, bare: true });
    }
    return new DagStore(fsModule, path);
  }

  /**
   * Fetch the node at `address`.
   *
   * @throws {DecodeError} If a structured node has no payload entry.
   */
  async get(address: NodeAddress): Promise<DagNode> {
    if (address.codec === 'raw') {
      const { blob } = await git.readBlob({ fs: this._fsModule, gitdir: this._gitdir, oid: address.oid });
      return { kind: 'raw', address, data: blob };
    }

    const { tree } = await git.readTree({ fs: this._fsModule, gitdir: this._gitdir, oid: address.oid });
    let payloadOid: string | null = null;
    const links: NodeLink[] = [];
    for (const entry of tree) {
      if (entry.path === PAYLOAD_ENTRY) {
        payloadOid = entry.oid;
        continue;
      }
      links.push({
        name: entry.path,
        address: {
          version: address.version,
          codec: entry.mode === MODE_TREE ? 'dag' : 'raw',
          oid: entry.oid,
        },
      });
    }
    if (payloadOid === null) {
      throw new DecodeError(`Structured node ${address.oid} has no payload`);
    }
    links.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const { blob } = await git.readBlob({ fs: this._fsModule, gitdir: this._gitdir, oid: payloadOid });
    return { kind: 'structured', address, payload: blob, links };
  }

  /** Store an unwrapped leaf. Only version 1 addresses carry raw leaves. */
  async putRaw(data: Uint8Array, version: AddressVersion = 1): Promise<RawNode> {
    if (version === 0) throw new DagFileError('Raw leaves need address version 1');
    const oid = await git.writeBlob({ fs: this._fsModule, gitdir: this._gitdir, blob: data });
    return { kind: 'raw', address: { version, codec: 'raw', oid }, data };
  }

  /**
   * Store a structured node linking `children` in order.
   */
  async putStructured(
    payload: Uint8Array,
    children: readonly NodeAddress[],
    version: AddressVersion,
  ): Promise<StructuredNode> {
    const payloadOid = await git.writeBlob({ fs: this._fsModule, gitdir: this._gitdir, blob: payload });
    const entries: Array<{ mode: string; path: string; oid: string; type: 'blob' | 'tree' }> = [
      { mode: MODE_BLOB, path: PAYLOAD_ENTRY, oid: payloadOid, type: 'blob' },
    ];
    const links: NodeLink[] = [];
    children.forEach((child, i) => {
      if (version === 0 && child.codec === 'raw') {
        throw new DagFileError('Version 0 nodes cannot link raw leaves');
      }
      const name = linkName(i);
      entries.push({
        mode: child.codec === 'dag' ? MODE_TREE : MODE_BLOB,
        path: name,
        oid: child.oid,
        type: child.codec === 'dag' ? 'tree' : 'blob',
      });
      links.push({ name, address: { version, codec: child.codec, oid: child.oid } });
    });

    const oid = await git.writeTree({ fs: this._fsModule, gitdir: this._gitdir, tree: entries });
    return { kind: 'structured', address: { version, codec: 'dag', oid }, payload, links };
  }
}
