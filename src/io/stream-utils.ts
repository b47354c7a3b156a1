/**
 * Stream processing utilities for line-oriented text
 *
 * Provides line buffering over binary streams so records can be processed
 * one at a time even when chunks split lines.
 */

import { Readable } from "node:stream";
import { BufferError, GvcfError, StreamError } from "../errors";
import type { LineProcessingResult } from "../types";

const MAX_LINE_LENGTH = 1_000_000;

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * When `signal` fires, a read that is still waiting for data (an idle stdin,
 * say) is cancelled and the iteration ends with an ABORTED error.
 *
 * @param stream Stream of binary data to process
 * @param signal Optional cancellation signal
 * @yields Complete lines of text without their line terminators
 * @throws {StreamError} If the underlying stream fails
 * @throws {BufferError} If a line exceeds the maximum length
 * @throws {GvcfError} With code ABORTED once the signal has fired
 *
 * @example
 * ```typescript
 * const stream = await createStream('calls.vcf.gz');
 * for await (const line of readLines(stream)) {
 *   if (!line.startsWith('#')) console.log(line.split('\t')[1]);
 * }
 * ```
 */
export async function* readLines(
  stream: ReadableStream<Uint8Array>,
  signal?: AbortSignal
): AsyncIterable<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";
  let totalBytesProcessed = 0;

  let cancellation: Promise<void> | undefined;
  const onAbort = (): void => {
    cancellation = reader.cancel(signal?.reason);
  };
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    while (true) {
      throwIfAborted(signal);
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      totalBytesProcessed += value.length;

      const result = processBuffer(buffer);
      buffer = result.remainder;
      yield* result.lines;
    }

    // A cancelled read reports done; it must not pass for end of input
    throwIfAborted(signal);

    buffer += decoder.decode();
    if (buffer !== "") {
      yield buffer.endsWith("\r") ? buffer.slice(0, -1) : buffer;
    }
  } catch (error) {
    if (error instanceof GvcfError) {
      throw error;
    }
    throw new StreamError(
      `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
      "read",
      totalBytesProcessed
    );
  } finally {
    signal?.removeEventListener("abort", onAbort);
    await cancellation;
    reader.releaseLock();
  }
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new GvcfError("Operation aborted during line reading", "ABORTED");
  }
}

/**
 * Extract complete lines from a text buffer
 *
 * Handles `\n` and `\r\n` endings; the trailing partial line is returned as
 * the remainder for the next chunk.
 *
 * @throws {BufferError} If a single line exceeds the maximum length
 */
export function processBuffer(buffer: string): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;
  let newline = buffer.indexOf("\n");

  while (newline !== -1) {
    const lineEnd = newline > lineStart && buffer[newline - 1] === "\r" ? newline - 1 : newline;
    const line = buffer.slice(lineStart, lineEnd);

    if (line.length > MAX_LINE_LENGTH) {
      throw new BufferError(
        `Line too long: ${line.length} characters exceeds maximum ${MAX_LINE_LENGTH}`,
        line.length,
        "overflow",
        `Line starts with: ${line.slice(0, 100)}...`
      );
    }

    lines.push(line);
    lineStart = newline + 1;
    newline = buffer.indexOf("\n", lineStart);
  }

  const remainder = buffer.slice(lineStart);
  if (remainder.length > MAX_LINE_LENGTH) {
    throw new BufferError(
      `Incomplete line too long: ${remainder.length} characters exceeds maximum ${MAX_LINE_LENGTH}`,
      remainder.length,
      "overflow",
      "This might indicate a file without proper line endings"
    );
  }

  return { lines, remainder };
}

/**
 * Expose standard input as a web ReadableStream
 */
export function stdinStream(): ReadableStream<Uint8Array> {
  return Readable.toWeb(process.stdin);
}
