/**
 * File reading utilities
 *
 * Reads go through Effect Platform's `FileSystem` service and come back as
 * web `ReadableStream`s, decompressed according to the file extension.
 * The path `-` reads standard input.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Stream } from "effect";
import { CompressionDetector, CompressionService } from "../compression";
import { FileError } from "../errors";
import type { FilePath, FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { getPlatform, runEffect } from "./runtime";
import { stdinStream } from "./stream-utils";

/**
 * Path that denotes standard input or standard output
 */
export const STDIO_PATH = "-";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  bufferSize: 65536,
  autoDecompress: true,
  compressionFormat: "none",
};

/**
 * Check if a path exists and is a regular file
 *
 * @throws {FileError} If path validation fails or the file cannot be inspected
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await runEffect(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Create a streaming reader for a file
 *
 * @param path File path to read, or `-` for standard input
 * @param options Reading options
 * @returns Promise resolving to a stream of (decompressed) file bytes
 * @throws {FileError} If the file does not exist or cannot be opened
 *
 * @example
 * ```typescript
 * const stream = await createStream("LP6005038-DNA_A01.genome.vcf.gz");
 * for await (const line of readLines(stream)) {
 *   // ...
 * }
 * ```
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const mergedOptions = mergeOptions(options);

  if (path === STDIO_PATH) {
    const stdin = stdinStream();
    return mergedOptions.compressionFormat === "gzip"
      ? applyDecompression(stdin, path, mergedOptions)
      : stdin;
  }

  const validatedPath = validatePath(path);
  if (!(await exists(validatedPath))) {
    throw new FileError("File does not exist or is not accessible", validatedPath, "read");
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return Stream.toReadableStream(fs.stream(validatedPath, { bufferSize: mergedOptions.bufferSize }));
  });

  let stream: ReadableStream<Uint8Array>;
  try {
    stream = await runEffect(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("open", validatedPath, error);
  }

  return mergedOptions.autoDecompress
    ? applyDecompression(stream, validatedPath, mergedOptions)
    : stream;
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

/**
 * Apply decompression to a stream when the format calls for it
 */
async function applyDecompression(
  stream: ReadableStream<Uint8Array>,
  filePath: string,
  options: Required<FileReaderOptions>
): Promise<ReadableStream<Uint8Array>> {
  const compressionFormat =
    options.compressionFormat === "none"
      ? CompressionDetector.fromExtension(filePath)
      : options.compressionFormat;

  if (compressionFormat === "none") {
    return stream;
  }

  const program = Effect.gen(function* () {
    const compressionService = yield* CompressionService;
    return yield* compressionService.createDecompressionStream(compressionFormat);
  });

  try {
    const decompressor = await runEffect(program.pipe(Effect.provide(CompressionService.Live)));
    return stream.pipeThrough(decompressor);
  } catch (error) {
    throw FileError.fromSystemError("read", filePath, error);
  }
}

/**
 * Validate a file path with ArkType and return the branded type
 */
function validatePath(path: string): FilePath {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

/**
 * Merge user options with defaults
 */
function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const merged = { ...DEFAULT_OPTIONS, ...options };

  const validationResult = FileReaderOptionsSchema(merged);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return merged;
}
