/**
 * gvcf-blocks - collapse every-position VCF calls into gVCF blocks
 *
 * @example
 * ```typescript
 * import { convertToGvcf, openForWriting, VcfParser } from "gvcf-blocks";
 *
 * const parser = new VcfParser();
 * await openForWriting("blocks.vcf.gz", async (handle) => {
 *   for await (const line of convertToGvcf(parser.parseFile("calls.vcf.gz"), { minGq: 20 })) {
 *     await handle.writeString(`${line}\n`);
 *   }
 * });
 * ```
 */

// Compression infrastructure
export {
  type ChunkCompressor,
  CompressionDetector,
  CompressionService,
  type CompressionServiceShape,
} from "./compression";
// Error types
export {
  BufferError,
  CallArityError,
  CompressionError,
  FileError,
  GvcfError,
  MalformedRecordError,
  ParseError,
  StreamError,
  ValidationError,
} from "./errors";
// VCF format
export {
  decodeCall,
  decodeInfo,
  formatVcfRecord,
  getGenotype,
  parseVcfRecord,
  recordEndValue,
  VCF_CONSTANTS,
  type VariantType,
  type VcfEntry,
  type VcfParserOptions,
  VcfParser,
  type VcfRecord,
  VcfWriter,
  withNoCallGenotype,
} from "./formats/vcf";
// File I/O infrastructure
export { createStream, exists, STDIO_PATH } from "./io/file-reader";
export { type FileWriteHandle, openForWriting } from "./io/file-writer";
export { readLines } from "./io/stream-utils";
// Operations
export {
  BlockAccumulator,
  type BlockCallability,
  type CallabilityCriteria,
  type ClosedBlock,
  classifyVariantType,
  convertToGvcf,
  DEFAULT_SAMPLE_ID_PATTERN,
  type GvcfMode,
  type GvcfOptions,
  GvcfProcessor,
  type GvcfSummary,
  isReferenceCandidate,
  isVariant,
  passesCallabilityFilter,
  resolveSampleId,
} from "./operations";
// Core types
export type {
  CompressionFormat,
  FilePath,
  FileReaderOptions,
  ParserOptions,
  WriteOptions,
} from "./types";
