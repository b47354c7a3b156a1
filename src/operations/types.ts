/**
 * Shared types for gVCF conversion processors
 */

import type { VcfEntry } from "../formats/vcf";
import type { CallabilityCriteria } from "./core/callability";

/**
 * Output layout of a conversion run
 *
 * - `blocks`: contiguous reference/no-call positions merge into END blocks
 * - `positions`: one line per input record, failing records forced to no-call
 */
export type GvcfMode = "blocks" | "positions";

/**
 * Options for converting a VCF entry stream
 */
export interface GvcfOptions extends Partial<CallabilityCriteria> {
  /** Output layout (default "blocks") */
  mode?: GvcfMode;

  /** Routing key prefixed to every non-header output line */
  sampleId?: string;

  /** Emit per-block diagnostics through onDebug; output is unaffected */
  debug?: boolean;

  /** Cancels the run; the open block is flushed before the abort error */
  signal?: AbortSignal;

  /** Sink for skipped-record warnings (default console.warn) */
  onWarning?: (message: string, lineNumber?: number) => void;

  /** Sink for debug diagnostics (default console.error) */
  onDebug?: (message: string) => void;
}

/**
 * Counts collected over one conversion run
 */
export interface GvcfSummary {
  headers: number;
  records: number;
  variants: number;
  referenceBlocks: number;
  noCallBlocks: number;
  noCallRecords: number;
  skippedRecords: number;
}

/**
 * A streaming stage from parsed VCF entries to output lines
 */
export interface Processor<TOptions> {
  /**
   * Process entries with the given options
   *
   * @param source - Parsed headers and records, in file order
   * @param options - Processing options
   * @returns Output lines without trailing newlines
   */
  process(
    source: AsyncIterable<VcfEntry> | Iterable<VcfEntry>,
    options: TOptions
  ): AsyncIterable<string>;
}
