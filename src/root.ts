/**
 * Root: a flat mount point that names files and commits their roots to a
 * branch.
 */

import git, { Errors } from 'isomorphic-git';
import { sizeSplitter, type Chunker } from './chunker.js';
import { resolveConfig, type Config, type ConfigInput } from './config.js';
import { File } from './file.js';
import { buildBalanced } from './layout.js';
import { Mutex, withRepoLock } from './lock.js';
import { silentLogger, type Logger } from './logger.js';
import { formatAddress, type DagNode, type NodeAddress } from './node.js';
import { validateName } from './paths.js';
import type { DagStore } from './store.js';
import {
  MODE_BLOB,
  MODE_TREE,
  FileExistsError,
  FileNotFoundError,
  StaleSnapshotError,
  type ParentCloser,
} from './types.js';

export interface RootOptions extends ConfigInput {
  logger?: Logger;
}

/**
 * Records file roots by name in a git tree on one branch.
 *
 * Every `notify()` from a File writes a new tree and commit and moves the
 * branch to it. Files handed out by `file()` are cached, so all callers
 * share one File (and one access lock) per name.
 *
 * @example
 * ```ts
 * const store = await DagStore.open('/tmp/files.git');
 * const root = await Root.open(store);
 * const file = await root.createFile('notes.txt', 'hello');
 * const fd = await file.open(OpenMode.READ_WRITE, true);
 * await fd.seek(0, SeekFrom.END);
 * await fd.write(', world');
 * await fd.flush();
 * await fd.close();
 * ```
 */
export class Root implements ParentCloser {
  private _store: DagStore;
  private _config: Config;
  private _chunker: Chunker;
  private _logger: Logger;
  private _entries: Map<string, NodeAddress>;
  private _files = new Map<string, File>();
  private _commitOid: string;
  private _treeOid: string;
  private _updates = new Mutex();

  private constructor(
    store: DagStore,
    config: Config,
    logger: Logger,
    commitOid: string,
    treeOid: string,
    entries: Map<string, NodeAddress>,
  ) {
    this._store = store;
    this._config = config;
    this._chunker = sizeSplitter(config.chunkSize);
    this._logger = logger;
    this._commitOid = commitOid;
    this._treeOid = treeOid;
    this._entries = entries;
  }

  /**
   * Open the root recorded on `opts.branch`, creating the branch with an
   * empty initial commit when it does not exist.
   *
   * @throws {ConfigError} If the options are invalid.
   */
  static async open(store: DagStore, opts: RootOptions = {}): Promise<Root> {
    const { logger: baseLogger, ...input } = opts;
    const config = resolveConfig(input);
    const logger = (baseLogger ?? silentLogger).withContext(config.branch);
    const fs = store._fsModule;
    const gitdir = store._gitdir;
    const refName = `refs/heads/${config.branch}`;

    let commitOid: string;
    try {
      commitOid = await git.resolveRef({ fs, gitdir, ref: refName });
    } catch (err) {
      if (!(err instanceof Errors.NotFoundError)) throw err;
      commitOid = await withRepoLock(fs, gitdir, async () => {
        const emptyTreeOid = await git.writeTree({ fs, gitdir, tree: [] });
        const now = Math.floor(Date.now() / 1000);
        const sig = { name: config.author, email: config.email, timestamp: now, timezoneOffset: 0 };
        const oid = await git.writeCommit({
          fs,
          gitdir,
          commit: {
            message: `Initialize ${config.branch}\n`,
            tree: emptyTreeOid,
            parent: [],
            author: sig,
            committer: sig,
          },
        });
        await git.writeRef({ fs, gitdir, ref: refName, value: oid });
        await git.writeRef({ fs, gitdir, ref: 'HEAD', value: refName, symbolic: true, force: true });
        return oid;
      });
      logger.info(`created branch ${config.branch}`);
    }

    const { commit } = await git.readCommit({ fs, gitdir, oid: commitOid });
    const { tree } = await git.readTree({ fs, gitdir, oid: commit.tree });
    const entries = new Map<string, NodeAddress>();
    for (const entry of tree) {
      entries.set(entry.path, {
        version: config.version,
        codec: entry.mode === MODE_TREE ? 'dag' : 'raw',
        oid: entry.oid,
      });
    }
    return new Root(store, config, logger, commitOid, commit.tree, entries);
  }

  toString(): string {
    return `Root(branch='${this._config.branch}', commit=${this._commitOid.slice(0, 7)})`;
  }

  /** The validated configuration. */
  get config(): Config {
    return this._config;
  }

  /** The 40-character hex SHA of the branch commit last read or written. */
  get commitHash(): string {
    return this._commitOid;
  }

  /** The 40-character hex SHA of the root tree. */
  get treeHash(): string {
    return this._treeOid;
  }

  /** Recorded file names, sorted. */
  names(): string[] {
    return Array.from(this._entries.keys()).sort();
  }

  has(name: string): boolean {
    return this._entries.has(name);
  }

  /** Address recorded for `name`, or null. */
  addressOf(name: string): NodeAddress | null {
    return this._entries.get(name) ?? null;
  }

  /**
   * The File recorded under `name`.
   *
   * @throws {FileNotFoundError} If nothing is recorded under `name`.
   */
  async file(name: string): Promise<File> {
    validateName(name);
    const cached = this._files.get(name);
    if (cached) return cached;

    const address = this._entries.get(name);
    if (!address) throw new FileNotFoundError(name);
    const node = await this._store.get(address);

    // Another caller may have loaded it while we were reading
    const raced = this._files.get(name);
    if (raced) return raced;

    const file = new File(name, node, this, this._store, {
      chunker: this._chunker,
      maxLinks: this._config.maxLinks,
      logger: this._logger,
    });
    this._files.set(name, file);
    return file;
  }

  /**
   * Lay out `data` as a new file, record it, and return its File.
   *
   * @throws {FileExistsError} If `name` is already recorded.
   */
  async createFile(name: string, data: Uint8Array | string = new Uint8Array(0)): Promise<File> {
    validateName(name);
    if (this._entries.has(name)) throw new FileExistsError(name);
    const bytes = typeof data === 'string' ? new TextEncoder().encode(data) : data;
    const node = await buildBalanced(this._store, bytes, {
      chunker: this._chunker,
      rawLeaves: this._config.version === 1,
      version: this._config.version,
      maxLinks: this._config.maxLinks,
    });
    await this._updates.runExclusive(async () => {
      // Another create of this name may have committed while we laid out
      if (this._entries.has(name)) throw new FileExistsError(name);
      await this._record(name, node);
    });
    this._logger.debug(`created ${name} -> ${formatAddress(node.address)}`);
    return this.file(name);
  }

  /**
   * Record `node` as the root of `name` and commit. Updates are applied one
   * at a time.
   *
   * @throws {StaleSnapshotError} If the branch moved outside this Root.
   */
  async notify(name: string, node: DagNode): Promise<void> {
    validateName(name);
    await this._updates.runExclusive(() => this._record(name, node));
    this._logger.debug(`recorded ${name} -> ${formatAddress(node.address)}`);
  }

  /** Commit `node` under `name`; callers hold `_updates`. */
  private async _record(name: string, node: DagNode): Promise<void> {
    const entries = new Map(this._entries);
    entries.set(name, node.address);
    await this._commit(entries, `Update ${name}`);
    this._entries = entries;
  }

  private async _commit(entries: Map<string, NodeAddress>, message: string): Promise<void> {
    const fs = this._store._fsModule;
    const gitdir = this._store._gitdir;
    const refName = `refs/heads/${this._config.branch}`;

    const tree = Array.from(entries, ([path, address]) => ({
      mode: address.codec === 'dag' ? MODE_TREE : MODE_BLOB,
      path,
      oid: address.oid,
      type: address.codec === 'dag' ? ('tree' as const) : ('blob' as const),
    }));

    await withRepoLock(fs, gitdir, async () => {
      const currentOid = await git.resolveRef({ fs, gitdir, ref: refName });
      if (currentOid !== this._commitOid) {
        throw new StaleSnapshotError(`Branch '${this._config.branch}' has advanced since this root was read`);
      }

      const treeOid = await git.writeTree({ fs, gitdir, tree });
      if (treeOid === this._treeOid) return; // nothing changed

      const now = Math.floor(Date.now() / 1000);
      const sig = { name: this._config.author, email: this._config.email, timestamp: now, timezoneOffset: 0 };
      const oid = await git.writeCommit({
        fs,
        gitdir,
        commit: {
          message: message + '\n',
          tree: treeOid,
          parent: [this._commitOid],
          author: sig,
          committer: sig,
        },
      });
      await git.writeRef({ fs, gitdir, ref: refName, value: oid, force: true });

      this._commitOid = oid;
      this._treeOid = treeOid;
      this._logger.info(`commit ${oid.slice(0, 7)}: ${message}`);
    });
  }
}
