/**
 * File writing operations using Effect Platform
 *
 * Output is compressed according to the file extension through the
 * injected `CompressionService`. A `.gz` target receives a single gzip
 * member that is finalized when the write scope closes, even if the
 * callback fails. The path `-` writes to standard output.
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, type Layer } from "effect";
import { type ChunkCompressor, CompressionDetector, CompressionService } from "../compression";
import { FileError } from "../errors";
import type { CompressionFormat, WriteOptions } from "../types";
import { WriteOptionsSchema } from "../types";
import { STDIO_PATH } from "./file-reader";
import { getPlatform, runEffect } from "./runtime";

/**
 * Handle for writing to an open output multiple times within a scope
 */
export interface FileWriteHandle {
  /**
   * Encode and write text, compressing it when the output is compressed
   */
  writeString(content: string): Promise<void>;
}

/**
 * Open an output for writing and execute the callback with a write handle
 *
 * The file is opened with 644 permissions (created or truncated) and closed
 * when the callback settles. Compressed output is finalized before closing.
 *
 * @param path File path to open, or `-` for standard output
 * @param callback Function that receives the write handle
 * @param options Write options (compression settings)
 * @param compressionLayer Compression implementation, swappable in tests
 * @returns Promise resolving to the callback's return value
 * @throws {FileError} When the file cannot be opened or written
 *
 * @example
 * ```typescript
 * await openForWriting("out.genome.vcf.gz", async (handle) => {
 *   for await (const line of processor.process(entries)) {
 *     await handle.writeString(`${line}\n`);
 *   }
 * });
 * ```
 */
export async function openForWriting<T>(
  path: string,
  callback: (handle: FileWriteHandle) => Promise<T>,
  options: WriteOptions = {},
  compressionLayer: Layer.Layer<CompressionService> = CompressionService.Live
): Promise<T> {
  validateOptions(path, options);
  const format = resolveCompressionFormat(path, options);

  const compressor = await runEffect(
    Effect.gen(function* () {
      const compressionService = yield* CompressionService;
      return yield* compressionService.createCompressor(format, options.compressionLevel ?? 6);
    }).pipe(Effect.provide(compressionLayer))
  );

  if (path === STDIO_PATH) {
    return writeWithSink(compressor, writeToStdout, callback);
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const file = yield* fs
      .open(path, { flag: "w", mode: 0o644 })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("open", path, error)));

    const sink = async (chunk: Uint8Array): Promise<void> => {
      try {
        await runEffect(file.writeAll(chunk));
      } catch (error) {
        throw FileError.fromSystemError("write", path, error);
      }
    };

    return yield* Effect.promise(() => writeWithSink(compressor, sink, callback));
  });

  return runEffect(program.pipe(Effect.scoped, Effect.provide(getPlatform())));
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

/**
 * Drive the callback against a byte sink, finalizing the compressor whether
 * or not the callback succeeds
 */
async function writeWithSink<T>(
  compressor: ChunkCompressor,
  sink: (chunk: Uint8Array) => Promise<void>,
  callback: (handle: FileWriteHandle) => Promise<T>
): Promise<T> {
  const encoder = new TextEncoder();

  const writeChunks = async (chunks: readonly Uint8Array[]): Promise<void> => {
    for (const chunk of chunks) {
      await sink(chunk);
    }
  };

  const handle: FileWriteHandle = {
    writeString: (content) => writeChunks(compressor.push(encoder.encode(content))),
  };

  try {
    return await callback(handle);
  } finally {
    await writeChunks(compressor.finish());
  }
}

function writeToStdout(chunk: Uint8Array): Promise<void> {
  return new Promise((resolve, reject) => {
    process.stdout.write(chunk, (error) => {
      if (error) {
        reject(FileError.fromSystemError("write", STDIO_PATH, error));
      } else {
        resolve();
      }
    });
  });
}

function resolveCompressionFormat(path: string, options: WriteOptions): CompressionFormat {
  if (options.autoCompress === false) {
    return "none";
  }
  if (options.compressionFormat !== undefined && options.compressionFormat !== "none") {
    return options.compressionFormat;
  }
  return path === STDIO_PATH ? "none" : CompressionDetector.fromExtension(path);
}

function validateOptions(path: string, options: WriteOptions): void {
  const validationResult = WriteOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid write options: ${validationResult.summary}`, path, "write");
  }
}
