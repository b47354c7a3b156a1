/**
 * Streaming gzip compression and decompression built on fflate
 *
 * Streaming in both directions keeps memory flat for whole-genome VCFs.
 * Concatenated gzip members (bgzip output) decompress as one stream.
 */

import { Gunzip, Gzip } from "fflate";
import { CompressionError } from "../errors";

/**
 * Gzip compression level accepted by fflate
 */
export type GzipLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

/**
 * Default compression level
 */
export const DEFAULT_GZIP_LEVEL: GzipLevel = 6;

/**
 * Push-style compressor: feed chunks, collect compressed output
 *
 * Returned chunks belong to the caller. `finish` must be called exactly once
 * to emit the gzip trailer.
 */
export interface ChunkCompressor {
  push(chunk: Uint8Array): Uint8Array[];
  finish(): Uint8Array[];
}

/**
 * Narrow a numeric level to the range fflate accepts
 *
 * @throws {CompressionError} If the level is outside 0-9
 */
export function toGzipLevel(level: number): GzipLevel {
  switch (level) {
    case 0:
    case 1:
    case 2:
    case 3:
    case 4:
    case 5:
    case 6:
    case 7:
    case 8:
    case 9:
      return level;
    default:
      throw new CompressionError(`Invalid gzip level ${level} (expected 0-9)`, "gzip", "validate");
  }
}

/**
 * Create a gzip decompression transform stream
 *
 * @example
 * ```typescript
 * const plain = compressedStream.pipeThrough(createStream());
 * ```
 */
export function createStream(): TransformStream<Uint8Array, Uint8Array> {
  const gunzip = new Gunzip();
  let bytesProcessed = 0;

  return new TransformStream<Uint8Array, Uint8Array>({
    start: (controller) => {
      gunzip.ondata = (chunk) => controller.enqueue(chunk);
    },
    transform: (chunk) => {
      bytesProcessed += chunk.length;
      try {
        gunzip.push(chunk, false);
      } catch (err) {
        throw CompressionError.fromSystemError("gzip", "stream", err, bytesProcessed);
      }
    },
    flush: () => {
      try {
        gunzip.push(new Uint8Array(0), true);
      } catch (err) {
        throw CompressionError.fromSystemError("gzip", "stream", err, bytesProcessed);
      }
    },
  });
}

/**
 * Create a push-style gzip compressor producing a single gzip member
 */
export function createCompressor(level: GzipLevel = DEFAULT_GZIP_LEVEL): ChunkCompressor {
  const pending: Uint8Array[] = [];
  const gzip = new Gzip({ level }, (chunk) => pending.push(chunk));

  const drain = (): Uint8Array[] => pending.splice(0, pending.length);

  return {
    push: (chunk) => {
      gzip.push(chunk, false);
      return drain();
    },
    finish: () => {
      gzip.push(new Uint8Array(0), true);
      return drain();
    },
  };
}
