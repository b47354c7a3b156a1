/**
 * Compression support for gzipped VCF input and output
 *
 * @module compression
 */

export { CompressionDetector } from "./detector";
export {
  type ChunkCompressor,
  createCompressor,
  createStream,
  DEFAULT_GZIP_LEVEL,
  type GzipLevel,
  toGzipLevel,
} from "./gzip";
export {
  CompressionService,
  type CompressionServiceShape,
  createPassthroughCompressor,
} from "./service";
