import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'node:path';
import git from 'isomorphic-git';
import { freshStore, toBytes, fromBytes, rmTmpDir, makeTmpDir } from './helpers.js';
import {
  DagStore,
  DagFileError,
  DecodeError,
  NodeType,
  encodeNodeData,
  decodeNodeData,
  sameAddress,
  PAYLOAD_ENTRY,
} from '../src/index.js';

let store: DagStore;
let tmpDir: string;

beforeEach(async () => {
  const res = await freshStore();
  store = res.store;
  tmpDir = res.tmpDir;
});

afterEach(() => rmTmpDir(tmpDir));

describe('DagStore.open', () => {
  it('reopens an existing repository', async () => {
    const again = await DagStore.open(store._gitdir, { create: false });
    expect(again.toString()).toBe(`DagStore('${store._gitdir}')`);
  });

  it('create: false on a missing repository throws', async () => {
    const dir = makeTmpDir();
    try {
      await expect(DagStore.open(path.join(dir, 'missing.git'), { create: false })).rejects.toThrow(
        /Repository not found/,
      );
    } finally {
      rmTmpDir(dir);
    }
  });
});

describe('raw leaves', () => {
  it('addresses a blob by content', async () => {
    const node = await store.putRaw(toBytes('hello'));
    expect(node.address).toEqual({ version: 1, codec: 'raw', oid: 'b6fc4c620b67d95f953a5c1c1230aaab5db5a1b0' });
    const again = await store.putRaw(toBytes('hello'));
    expect(sameAddress(node.address, again.address)).toBe(true);
  });

  it('get returns the bytes', async () => {
    const node = await store.putRaw(toBytes('hello'));
    const got = await store.get(node.address);
    expect(got.kind).toBe('raw');
    if (got.kind !== 'raw') return;
    expect(fromBytes(got.data)).toBe('hello');
  });

  it('version 0 rejects raw leaves', async () => {
    await expect(store.putRaw(toBytes('x'), 0)).rejects.toThrow(DagFileError);
  });
});

describe('structured nodes', () => {
  it('round-trips payload and ordered links', async () => {
    const a = await store.putRaw(toBytes('aaaa'));
    const b = await store.putRaw(toBytes('bb'));
    const payload = encodeNodeData({ type: NodeType.FILE, fileSize: 6, blockSizes: [4, 2] });
    const node = await store.putStructured(payload, [a.address, b.address], 1);
    expect(node.address.codec).toBe('dag');
    expect(node.links.map((l) => l.name)).toEqual(['000000', '000001']);

    const got = await store.get(node.address);
    expect(got.kind).toBe('structured');
    if (got.kind !== 'structured') return;
    expect(decodeNodeData(got.payload).blockSizes).toEqual([4, 2]);
    expect(got.links.map((l) => l.address)).toEqual([a.address, b.address]);
  });

  it('child links inherit the parent version and codec from the entry mode', async () => {
    const leaf = await store.putStructured(
      encodeNodeData({ type: NodeType.RAW, data: toBytes('x'), fileSize: 1 }),
      [],
      0,
    );
    const parent = await store.putStructured(
      encodeNodeData({ type: NodeType.FILE, fileSize: 1, blockSizes: [1] }),
      [leaf.address],
      0,
    );
    const got = await store.get(parent.address);
    if (got.kind !== 'structured') throw new Error('expected structured node');
    expect(got.links[0].address).toEqual({ version: 0, codec: 'dag', oid: leaf.address.oid });
  });

  it('version 0 nodes cannot link raw leaves', async () => {
    const leaf = await store.putRaw(toBytes('x'));
    await expect(
      store.putStructured(encodeNodeData({ type: NodeType.FILE }), [leaf.address], 0),
    ).rejects.toThrow(/raw leaves/);
  });

  it('a tree without a payload entry is a decode error', async () => {
    const blobOid = await git.writeBlob({ fs: store._fsModule, gitdir: store._gitdir, blob: toBytes('x') });
    const oid = await git.writeTree({
      fs: store._fsModule,
      gitdir: store._gitdir,
      tree: [{ mode: '100644', path: '000000', oid: blobOid, type: 'blob' }],
    });
    await expect(store.get({ version: 1, codec: 'dag', oid })).rejects.toThrow(DecodeError);
  });

  it('payload is stored under the reserved entry', async () => {
    const node = await store.putStructured(encodeNodeData({ type: NodeType.FILE }), [], 1);
    const { tree } = await git.readTree({ fs: store._fsModule, gitdir: store._gitdir, oid: node.address.oid });
    expect(tree.map((e) => e.path)).toEqual([PAYLOAD_ENTRY]);
  });
});
