/**
 * Single-sample VCF parser
 *
 * Splits tab-delimited data lines into typed {@link VcfRecord}s and passes
 * header lines through untouched, one line at a time, so whole-genome files
 * never need to fit in memory.
 *
 * @module vcf/parser
 */

import { type } from "arktype";
import { MalformedRecordError, ValidationError } from "../../errors";
import { createStream } from "../../io/file-reader";
import { readLines } from "../../io/stream-utils";
import type { FileReaderOptions } from "../../types";
import { AbstractParser } from "../abstract-parser";
import type { VcfColumns, VcfEntry, VcfParserOptions, VcfRecord } from "./types";
import { VCF_CONSTANTS } from "./types";
import { parseInfoField, parseNumericValue } from "./utils";

/**
 * ArkType validation for VCF parser options
 */
const VcfParserOptionsSchema = type({
  "skipValidation?": "boolean",
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
  "skipHeaders?": "boolean",
});

/**
 * Parse one tab-delimited VCF data line
 *
 * @param line Data line without its trailing newline
 * @param lineNumber Source line number, attached to the record and to errors
 * @throws {MalformedRecordError} When the line does not have exactly ten
 *   columns or POS is not an integer
 *
 * @example
 * ```typescript
 * const record = parseVcfRecord("1\t100\t.\tA\t.\t50\tPASS\t.\tGT:GQ:DP\t0/0:40:12");
 * record.position; // 100
 * record.sampleValues; // ["0/0", "40", "12"]
 * ```
 *
 * @public
 */
export function parseVcfRecord(line: string, lineNumber?: number): VcfRecord {
  const fields = line.split("\t");

  if (fields.length !== VCF_CONSTANTS.COLUMN_COUNT) {
    throw new MalformedRecordError(
      `VCF data lines require exactly ${VCF_CONSTANTS.COLUMN_COUNT} tab-separated columns, got ${fields.length}`,
      fields.length,
      lineNumber,
      "Each line must have: CHROM, POS, ID, REF, ALT, QUAL, FILTER, INFO, FORMAT, SAMPLE"
    );
  }

  const columns = toColumns(fields);

  if (!/^\d+$/.test(columns.pos)) {
    throw new MalformedRecordError(
      `Invalid position '${columns.pos}' for ${columns.chrom}: POS must be a non-negative integer`,
      fields.length,
      lineNumber
    );
  }

  return {
    chromosome: columns.chrom,
    position: Number.parseInt(columns.pos, 10),
    id: columns.id,
    referenceAllele: columns.ref,
    alternateAllele: columns.alt,
    quality: parseNumericValue(columns.qual) ?? null,
    filterStatus: columns.filter,
    info: parseInfoField(columns.info),
    formatKeys: columns.format.split(":"),
    sampleValues: columns.sample.split(":"),
    columns,
    ...(lineNumber !== undefined && { lineNumber }),
  };
}

function toColumns(fields: readonly string[]): VcfColumns {
  const [
    chrom = "",
    pos = "",
    id = "",
    ref = "",
    alt = "",
    qual = "",
    filter = "",
    info = "",
    format = "",
    sample = "",
  ] = fields;
  return { chrom, pos, id, ref, alt, qual, filter, info, format, sample };
}

/**
 * Streaming VCF parser
 *
 * @example
 * ```typescript
 * const parser = new VcfParser();
 * for await (const entry of parser.parseFile("chr21.vcf.gz")) {
 *   if (entry.kind === "record") console.log(entry.record.position);
 * }
 * ```
 *
 * @public
 */
export class VcfParser extends AbstractParser<VcfEntry, VcfParserOptions> {
  constructor(options: VcfParserOptions = {}) {
    const validationResult = VcfParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid VCF parser options: ${validationResult.summary}`);
    }

    super(options);
  }

  protected getDefaultOptions(): Partial<VcfParserOptions> {
    return { skipHeaders: false };
  }

  protected getFormatName(): string {
    return "VCF";
  }

  /**
   * Parse VCF entries from string data
   */
  override async *parseString(data: string): AsyncIterable<VcfEntry> {
    yield* this.parseLines(data.split(/\r?\n/));
  }

  /**
   * Parse VCF entries from a file; `.gz` files are decompressed on the fly
   */
  override async *parseFile(
    filePath: string,
    options?: FileReaderOptions
  ): AsyncIterable<VcfEntry> {
    if (filePath.length === 0) {
      throw new ValidationError("filePath cannot be empty");
    }

    const stream = await createStream(filePath, options);
    yield* this.parse(stream);
  }

  /**
   * Parse VCF entries from a binary stream
   */
  override async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<VcfEntry> {
    yield* this.parseLines(readLines(stream, this.options.signal));
  }

  /**
   * Parse VCF entries from already-split lines
   */
  async *parseLines(lines: Iterable<string> | AsyncIterable<string>): AsyncIterable<VcfEntry> {
    let lineNumber = 0;

    for await (const rawLine of lines) {
      lineNumber++;
      this.checkAborted();

      const line = rawLine.trim();
      if (line === "") continue;

      if (line.length > this.options.maxLineLength) {
        throw new MalformedRecordError(
          `Line too long (${line.length} > ${this.options.maxLineLength})`,
          0,
          lineNumber
        );
      }

      if (line.startsWith("#")) {
        if (!this.options.skipHeaders) {
          yield { kind: "header", text: line, ...this.lineNumberField(lineNumber) };
        }
        continue;
      }

      const entry = this.parseDataLine(line, lineNumber);
      if (entry !== null) yield entry;
    }
  }

  private parseDataLine(line: string, lineNumber: number): VcfEntry | null {
    try {
      const record = parseVcfRecord(line, this.options.trackLineNumbers ? lineNumber : undefined);
      return { kind: "record", record };
    } catch (error) {
      if (!this.options.skipValidation || !(error instanceof MalformedRecordError)) {
        throw error;
      }
      this.options.onWarning(`Skipping malformed line: ${error.message}`, lineNumber);
      return null;
    }
  }

  private lineNumberField(lineNumber: number): { lineNumber?: number } {
    return this.options.trackLineNumbers ? { lineNumber } : {};
  }
}
