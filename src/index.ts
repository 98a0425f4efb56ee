/**
 * dagfile: mutable files over an immutable, content-addressed DAG stored in
 * a bare git repository.
 *
 * @example
 * ```ts
 * import { DagStore, Root, OpenMode } from 'dagfile';
 *
 * const store = await DagStore.open('/tmp/files.git');
 * const root = await Root.open(store);
 * const file = await root.createFile('hello.txt', 'Hello');
 *
 * // Exclusive writer; flush commits the new root to the branch
 * const fd = await file.open(OpenMode.WRITE_ONLY, true);
 * await fd.writeAt(5, ', world!');
 * await fd.flush();
 * await fd.close();
 *
 * // Shared readers
 * const r = await file.open(OpenMode.READ_ONLY);
 * const bytes = await r.readAt(0, await r.size());
 * await r.close();
 * ```
 */

// Core classes
export { File, type FileOptions } from './file.js';
export { FileDescriptor } from './fd.js';
export { Root, type RootOptions } from './root.js';
export { DagStore, PAYLOAD_ENTRY } from './store.js';
export { DagModifier, type ModifierOptions } from './modifier.js';

// Nodes
export {
  NodeType,
  encodeNodeData,
  decodeNodeData,
  nodeFileSize,
  formatAddress,
  parseAddress,
  sameAddress,
  type AddressVersion,
  type Codec,
  type NodeAddress,
  type NodeLink,
  type NodeData,
  type RawNode,
  type StructuredNode,
  type DagNode,
} from './node.js';

// Layout & chunking
export { buildBalanced, DEFAULT_MAX_LINKS, type LayoutOptions } from './layout.js';
export { sizeSplitter, defaultChunker, DEFAULT_CHUNK_SIZE, type Chunker } from './chunker.js';

// Locks
export { Mutex, RWLock, withRepoLock } from './lock.js';

// Configuration & logging
export { resolveConfig, ConfigSchema, type Config, type ConfigInput } from './config.js';
export { ConsoleLogger, silentLogger, type Logger } from './logger.js';

// Types and errors
export {
  OpenMode,
  SeekFrom,
  isOpenMode,
  MODE_BLOB,
  MODE_TREE,

  DagFileError,
  UnsupportedNodeTypeError,
  NotSupportedError,
  UnsupportedModeError,
  PermissionError,
  DecodeError,
  CorruptStateError,
  DescriptorClosedError,
  InvalidOffsetError,
  FileNotFoundError,
  FileExistsError,
  StaleSnapshotError,
  InvalidNameError,
  InvalidRefNameError,
  ConfigError,

  type ParentCloser,
  type FsModule,
} from './types.js';

// Name utilities
export { validateName, validateRefName } from './paths.js';
