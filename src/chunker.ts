/**
 * Chunking policy: decides leaf block boundaries for new data.
 */

export const DEFAULT_CHUNK_SIZE = 256 * 1024;

export interface Chunker {
  split(data: Uint8Array): Uint8Array[];
}

/**
 * Fixed-size splitter. The final chunk may be shorter; empty input yields
 * no chunks.
 */
export function sizeSplitter(size: number = DEFAULT_CHUNK_SIZE): Chunker {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }
  return {
    split(data: Uint8Array): Uint8Array[] {
      const chunks: Uint8Array[] = [];
      for (let offset = 0; offset < data.length; offset += size) {
        chunks.push(data.subarray(offset, Math.min(offset + size, data.length)));
      }
      return chunks;
    },
  };
}

export const defaultChunker: Chunker = sizeSplitter();
