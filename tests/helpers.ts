import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  DagStore,
  File,
  buildBalanced,
  sizeSplitter,
  type AddressVersion,
  type DagNode,
  type ParentCloser,
} from '../src/index.js';

const enc = new TextEncoder();
const dec = new TextDecoder();

export function toBytes(s: string): Uint8Array {
  return enc.encode(s);
}

export function fromBytes(b: Uint8Array): string {
  return dec.decode(b);
}

export function makeTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'dagfile-test-'));
}

export function rmTmpDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export async function freshStore(): Promise<{ store: DagStore; tmpDir: string }> {
  const tmpDir = makeTmpDir();
  const store = await DagStore.open(path.join(tmpDir, 'test.git'));
  return { store, tmpDir };
}

/** Resolve after pending microtasks and one macrotask turn. */
export function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/** Parent stub recording every notification. */
export class RecordingParent implements ParentCloser {
  calls: Array<{ name: string; node: DagNode }> = [];
  fail: Error | null = null;

  async notify(name: string, node: DagNode): Promise<void> {
    this.calls.push({ name, node });
    if (this.fail) throw this.fail;
  }
}

/** Lay `content` out in 4-byte chunks and wrap it in a File named f.txt. */
export async function fileWith(
  store: DagStore,
  parent: ParentCloser,
  content: string,
  version: AddressVersion = 1,
): Promise<File> {
  const chunker = sizeSplitter(4);
  const node = await buildBalanced(store, toBytes(content), {
    chunker,
    rawLeaves: version === 1,
    version,
  });
  return new File('f.txt', node, parent, store, { chunker });
}

export { fs };
