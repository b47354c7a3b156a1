/**
 * Mock compression layers for Effect DI testing
 *
 * Swapped into `openForWriting` in place of `CompressionService.Live`.
 */

import { Effect, Layer } from "effect";
import { CompressionService, createPassthroughCompressor } from "../../src/compression";
import { CompressionError } from "../../src/errors";
import type { CompressionFormat } from "../../src/types";

export interface CompressorRequest {
  format: CompressionFormat;
  level: number | undefined;
}

/**
 * Compression service that never compresses and records what was requested
 */
export function createRecordingCompressionService(): {
  layer: Layer.Layer<CompressionService>;
  requests: CompressorRequest[];
} {
  const requests: CompressorRequest[] = [];

  const layer = Layer.succeed(CompressionService, {
    createCompressor: (format, level) =>
      Effect.sync(() => {
        requests.push({ format, level });
        return createPassthroughCompressor();
      }),
    createDecompressionStream: () =>
      Effect.sync(
        () =>
          new TransformStream<Uint8Array, Uint8Array>({
            transform(chunk, controller) {
              controller.enqueue(chunk);
            },
          })
      ),
  });

  return { layer, requests };
}

/**
 * Compression service whose every operation fails
 */
export function createFailingCompressionService(
  errorMessage = "Simulated compression failure"
): Layer.Layer<CompressionService> {
  const failure = (): CompressionError => new CompressionError(errorMessage, "gzip", "compress");

  return Layer.succeed(CompressionService, {
    createCompressor: () => Effect.fail(failure()),
    createDecompressionStream: () => Effect.fail(failure()),
  });
}
