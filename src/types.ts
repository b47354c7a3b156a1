/**
 * Shared type definitions and validation schemas
 *
 * Format-specific record types live beside their parsers (see
 * `formats/vcf/types.ts`); this module holds the I/O and parser plumbing
 * shared across the library.
 */

import { type } from "arktype";

/**
 * Parser configuration options
 */
export interface ParserOptions {
  /** Report malformed lines through `onWarning` and continue instead of throwing */
  skipValidation?: boolean;
  /** Maximum line length before throwing error */
  maxLineLength?: number;
  /** Whether to attach source line numbers to parsed records */
  trackLineNumbers?: boolean;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * Compression formats the I/O layer understands
 */
export type CompressionFormat = "gzip" | "none";

/**
 * Branded type for validated file paths
 */
export type FilePath = string & {
  readonly __brand: "FilePath";
};

/**
 * File reading options
 */
export interface FileReaderOptions {
  /** Chunk size requested from the file system */
  bufferSize?: number;
  /** Decompress based on the file extension */
  autoDecompress?: boolean;
  /** Force a compression format instead of detecting it */
  compressionFormat?: CompressionFormat;
}

/**
 * File writing options
 */
export interface WriteOptions {
  /** Compress based on the file extension (default true) */
  autoCompress?: boolean;
  /** Force a compression format instead of detecting it */
  compressionFormat?: CompressionFormat;
  /** Gzip level, 0-9 */
  compressionLevel?: number;
}

/**
 * Result of splitting a text buffer into complete lines
 */
export interface LineProcessingResult {
  /** Complete lines extracted from buffer */
  readonly lines: string[];
  /** Incomplete line remainder to carry forward */
  readonly remainder: string;
}

/**
 * File path validation: non-empty and free of NUL bytes
 */
export const FilePathSchema = type("string>0")
  .narrow((path, ctx) => !path.includes("\0") || ctx.mustBe("free of null characters"))
  .pipe((path): FilePath => path as FilePath);

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "bufferSize?": "1024<=number<=1048576",
  "autoDecompress?": "boolean",
  "compressionFormat?": '"gzip"|"none"',
});

/**
 * File writer options validation schema
 */
export const WriteOptionsSchema = type({
  "autoCompress?": "boolean",
  "compressionFormat?": '"gzip"|"none"',
  "compressionLevel?": "0<=number<=9",
});
