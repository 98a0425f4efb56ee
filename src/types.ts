/**
 * Shared types, constants, and error classes for dagfile.
 */

import type { DagNode } from './node.js';

// ---------------------------------------------------------------------------
// Git file mode constants (octal → string for isomorphic-git)
// ---------------------------------------------------------------------------

export const MODE_TREE = '040000';
export const MODE_BLOB = '100644';

// ---------------------------------------------------------------------------
// Open modes
// ---------------------------------------------------------------------------

export const OpenMode = {
  READ_ONLY: 0,
  WRITE_ONLY: 1,
  READ_WRITE: 2,
} as const;

export type OpenMode = (typeof OpenMode)[keyof typeof OpenMode];

export function isOpenMode(mode: number): mode is OpenMode {
  return mode === OpenMode.READ_ONLY || mode === OpenMode.WRITE_ONLY || mode === OpenMode.READ_WRITE;
}

export function modeCanRead(mode: OpenMode): boolean {
  return mode !== OpenMode.WRITE_ONLY;
}

export function modeCanWrite(mode: OpenMode): boolean {
  return mode !== OpenMode.READ_ONLY;
}

// ---------------------------------------------------------------------------
// Seek origins
// ---------------------------------------------------------------------------

export const SeekFrom = {
  START: 0,
  CURRENT: 1,
  END: 2,
} as const;

export type SeekFrom = (typeof SeekFrom)[keyof typeof SeekFrom];

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

export class DagFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DagFileError';
  }
}

/** The node exists but is not file-shaped. */
export class UnsupportedNodeTypeError extends DagFileError {
  constructor(type: string) {
    super(`Unsupported node type for a file: ${type}`);
    this.name = 'UnsupportedNodeTypeError';
  }
}

/** A recognized case this layer does not implement (symlinks). */
export class NotSupportedError extends DagFileError {
  constructor(message: string) {
    super(message);
    this.name = 'NotSupportedError';
  }
}

export class UnsupportedModeError extends DagFileError {
  constructor(mode: number) {
    super(`Open mode not supported: ${mode}`);
    this.name = 'UnsupportedModeError';
  }
}

export class PermissionError extends DagFileError {
  code = 'EPERM';
  constructor(message: string) {
    super(message);
    this.name = 'PermissionError';
  }
}

export class DecodeError extends DagFileError {
  constructor(message: string) {
    super(message);
    this.name = 'DecodeError';
  }
}

/** An internal invariant was violated. */
export class CorruptStateError extends DagFileError {
  constructor(message: string) {
    super(message);
    this.name = 'CorruptStateError';
  }
}

export class DescriptorClosedError extends DagFileError {
  code = 'EBADF';
  constructor(message = 'I/O operation on closed file descriptor') {
    super(message);
    this.name = 'DescriptorClosedError';
  }
}

export class InvalidOffsetError extends DagFileError {
  code = 'EINVAL';
  constructor(message: string) {
    super(message);
    this.name = 'InvalidOffsetError';
  }
}

export class FileNotFoundError extends DagFileError {
  code = 'ENOENT';
  constructor(name: string) {
    super(`File not found: ${name}`);
    this.name = 'FileNotFoundError';
  }
}

export class FileExistsError extends DagFileError {
  code = 'EEXIST';
  constructor(name: string) {
    super(`File exists: ${name}`);
    this.name = 'FileExistsError';
  }
}

export class StaleSnapshotError extends DagFileError {
  constructor(message: string) {
    super(message);
    this.name = 'StaleSnapshotError';
  }
}

export class InvalidNameError extends DagFileError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidNameError';
  }
}

export class InvalidRefNameError extends DagFileError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRefNameError';
  }
}

export class ConfigError extends DagFileError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ---------------------------------------------------------------------------
// Parent link
// ---------------------------------------------------------------------------

/**
 * Upward link held by a File. Whatever names the file (a directory entry,
 * a mount root) implements this to record the file's new root node.
 */
export interface ParentCloser {
  notify(name: string, node: DagNode): Promise<void>;
}

// ---------------------------------------------------------------------------
// FS module interface (Node.js fs compatible)
// ---------------------------------------------------------------------------

/**
 * The filesystem interface expected by dagfile.
 * Compatible with Node.js `fs` module and isomorphic-git's FsClient.
 */
export interface FsModule {
  promises: {
    readFile(path: string, options?: { encoding?: string }): Promise<Uint8Array | string>;
    writeFile(path: string, data: Uint8Array | string, options?: { mode?: number }): Promise<void>;
    unlink(path: string): Promise<void>;
    readdir(path: string): Promise<string[]>;
    mkdir(path: string, options?: { recursive?: boolean }): Promise<string | undefined>;
    rmdir(path: string): Promise<void>;
    stat(path: string): Promise<{ mode: number; size: number; isDirectory(): boolean; isFile(): boolean; isSymbolicLink(): boolean; mtimeMs: number }>;
    lstat(path: string): Promise<{ mode: number; size: number; isDirectory(): boolean; isFile(): boolean; isSymbolicLink(): boolean; mtimeMs: number }>;
    readlink(path: string): Promise<string>;
    symlink(target: string, path: string): Promise<void>;
    chmod(path: string, mode: number): Promise<void>;
    open(path: string, flags: string | number, mode?: number): Promise<{ close(): Promise<void> }>;
  };

  // Callback-based methods required by isomorphic-git
  readFile: Function;
  writeFile: Function;
  unlink: Function;
  readdir: Function;
  mkdir: Function;
  rmdir: Function;
  stat: Function;
  lstat: Function;
  readlink: Function;
  symlink: Function;
  chmod: Function;
}
