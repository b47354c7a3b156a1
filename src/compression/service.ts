/**
 * Effect-based compression service
 *
 * File I/O asks for a `CompressionService` instead of calling fflate
 * directly, so tests can swap in a mock layer (see
 * test/utils/compression-layers.ts).
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const svc = yield* CompressionService;
 *   return yield* svc.createCompressor("gzip", 6);
 * });
 *
 * await Effect.runPromise(program.pipe(Effect.provide(CompressionService.Live)));
 * ```
 *
 * @module compression/service
 */

import { Context, Effect, Layer } from "effect";
import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";
import {
  type ChunkCompressor,
  createCompressor as createGzipCompressor,
  createStream as createGzipDecompressionStream,
  DEFAULT_GZIP_LEVEL,
  toGzipLevel,
} from "./gzip";

// =============================================================================
// SERVICE SHAPE (Interface)
// =============================================================================

/**
 * Shape of the compression service
 */
export interface CompressionServiceShape {
  /**
   * Create an incremental compressor whose output forms one compressed member
   */
  readonly createCompressor: (
    format: CompressionFormat,
    level?: number
  ) => Effect.Effect<ChunkCompressor, CompressionError>;

  /**
   * Create a decompression transform stream
   */
  readonly createDecompressionStream: (
    format: CompressionFormat
  ) => Effect.Effect<TransformStream<Uint8Array, Uint8Array>, CompressionError>;
}

// =============================================================================
// SERVICE TAG
// =============================================================================

/**
 * Compression service for Effect-based dependency injection
 */
export class CompressionService extends Context.Tag("@gvcf-blocks/CompressionService")<
  CompressionService,
  CompressionServiceShape
>() {
  /**
   * Gzip compression service layer backed by fflate
   */
  static readonly Live: Layer.Layer<CompressionService> = Layer.succeed(
    CompressionService,
    createGzipService()
  );
}

// =============================================================================
// SERVICE IMPLEMENTATION
// =============================================================================

/**
 * Run a gzip call, keeping CompressionErrors and wrapping anything fflate throws
 */
const tryGzip = <A>(run: () => A): Effect.Effect<A, CompressionError> =>
  Effect.try({
    try: run,
    catch: (error) =>
      error instanceof CompressionError
        ? error
        : CompressionError.fromSystemError("gzip", "compress", error),
  });

function createGzipService(): CompressionServiceShape {
  return {
    createCompressor: (format, level) =>
      format === "none"
        ? Effect.succeed(createPassthroughCompressor())
        : tryGzip(() => createGzipCompressor(toGzipLevel(level ?? DEFAULT_GZIP_LEVEL))),

    createDecompressionStream: (format) =>
      Effect.sync(() =>
        format === "none" ? createPassthroughStream() : createGzipDecompressionStream()
      ),
  };
}

/**
 * Compressor that forwards chunks unchanged
 */
export function createPassthroughCompressor(): ChunkCompressor {
  return {
    push: (chunk) => [chunk],
    finish: () => [],
  };
}

/**
 * Create a passthrough stream that forwards data unchanged
 */
function createPassthroughStream(): TransformStream<Uint8Array, Uint8Array> {
  return new TransformStream<Uint8Array, Uint8Array>({
    transform(chunk, controller) {
      controller.enqueue(chunk);
    },
  });
}
