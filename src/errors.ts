/**
 * Error hierarchy for gVCF conversion
 *
 * Everything the library throws on purpose derives from {@link GvcfError};
 * `code` tells the kinds apart without an `instanceof` chain, which is what
 * the CLI relies on to map an abort to its own exit status.
 *
 * Fatal vs. recoverable:
 * - {@link MalformedRecordError} stops the run (after the open block is flushed)
 * - {@link CallArityError} skips one record with a warning
 * - missing GQ/DP/MQ keys are not errors at all
 */

import type { CompressionFormat } from "./types";

type Hint = readonly [pattern: RegExp, hint: string];

const FILE_HINTS: readonly Hint[] = [
  [/enoent|no such file/, "Check the --gvcf path; use - to read standard input"],
  [/eacces|eperm|permission denied/, "Check read/write permissions on the file and its directory"],
  [/eisdir|is a directory/, "Path names a directory, expected a VCF file"],
  [/enospc|no space left/, "Output device is full; gVCF output of a whole genome can be large"],
];

const COMPRESSION_HINTS: readonly Hint[] = [
  [/magic|header/, "Input may not be gzip/bgzip; drop the .gz extension for plain VCF"],
  [/truncated|unexpected end|unexpected eof/, "Compressed input ends early; the file may be incomplete"],
  [/crc|checksum|invalid (block|distance|length)/, "Compressed data is corrupt"],
];

/**
 * Message of an unknown thrown value, with a hint appended when one matches
 */
function describeCause(cause: unknown, hints: readonly Hint[]): { detail: string; message: string } {
  const detail = cause instanceof Error ? cause.message : String(cause);
  const lowered = detail.toLowerCase();
  const hint = hints.find(([pattern]) => pattern.test(lowered))?.[1];
  return { detail, message: hint === undefined ? detail : `${detail}. ${hint}` };
}

/**
 * Base class; `lineNumber` is the 1-based input line when known
 */
export class GvcfError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "GvcfError";
  }

  override toString(): string {
    const head =
      this.lineNumber === undefined
        ? `${this.name}: ${this.message}`
        : `${this.name}: ${this.message} (line ${this.lineNumber})`;
    return this.context ? `${head}\nContext: ${this.context}` : head;
  }
}

/**
 * Options or values rejected by a schema
 */
export class ValidationError extends GvcfError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Input text that cannot be read as the named format
 */
export class ParseError extends GvcfError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * A data line that cannot be split into the ten VCF columns, or whose
 * position is not an integer. Fatal: position comparisons downstream would
 * be meaningless.
 */
export class MalformedRecordError extends ParseError {
  constructor(
    message: string,
    public readonly columnCount: number,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "VCF", lineNumber, context);
    this.name = "MalformedRecordError";
  }
}

/**
 * FORMAT keys and sample values of one record differ in count
 */
export class CallArityError extends GvcfError {
  constructor(
    public readonly formatKeyCount: number,
    public readonly sampleValueCount: number,
    lineNumber?: number,
    context?: string
  ) {
    super(
      `FORMAT declares ${formatKeyCount} keys but the sample column has ${sampleValueCount} values`,
      "CALL_ARITY_ERROR",
      lineNumber,
      context
    );
    this.name = "CallArityError";
  }
}

export type CompressionOperation = "detect" | "decompress" | "stream" | "validate" | "compress";

/**
 * Gzip failures, with the number of input bytes consumed when known
 */
export class CompressionError extends GvcfError {
  constructor(
    message: string,
    public readonly format: CompressionFormat,
    public readonly operation: CompressionOperation,
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  /**
   * Wrap an error thrown by the compression library
   */
  static fromSystemError(
    format: CompressionFormat,
    operation: CompressionOperation,
    cause: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const { detail, message } = describeCause(cause, COMPRESSION_HINTS);
    return new CompressionError(
      `${format} ${operation} failed: ${message}`,
      format,
      operation,
      bytesProcessed,
      `Cause: ${detail}`
    );
  }

  override toString(): string {
    const base = super.toString();
    return this.bytesProcessed === undefined
      ? base
      : `${base}\nBytes processed: ${this.bytesProcessed}`;
  }
}

export type FileOperation = "read" | "write" | "stat" | "open" | "close";

/**
 * Filesystem failures on the input or output path
 */
export class FileError extends GvcfError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: FileOperation,
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Wrap an error raised by the platform filesystem
   */
  static fromSystemError(operation: FileOperation, filePath: string, cause: unknown): FileError {
    const { detail, message } = describeCause(cause, FILE_HINTS);
    return new FileError(
      `Cannot ${operation} '${filePath}': ${message}`,
      filePath,
      operation,
      cause,
      `Cause: ${detail}`
    );
  }
}

/**
 * A byte stream failed while being read or transformed
 */
export class StreamError extends GvcfError {
  constructor(
    message: string,
    public readonly streamType: "read" | "write" | "transform",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * A line longer than the line buffer allows
 */
export class BufferError extends GvcfError {
  constructor(
    message: string,
    public readonly bufferSize: number,
    public readonly errorType: "overflow" | "underflow" | "corruption",
    context?: string
  ) {
    super(message, "BUFFER_ERROR", undefined, context);
    this.name = "BufferError";
  }
}
