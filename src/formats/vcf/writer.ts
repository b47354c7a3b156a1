/**
 * VCF line writer
 *
 * @module vcf/writer
 */

import type { VcfRecord } from "./types";
import { VCF_COLUMNS } from "./types";

/**
 * Format a record as a tab-separated VCF line from its verbatim columns
 *
 * @public
 */
export function formatVcfRecord(record: VcfRecord): string {
  return VCF_COLUMNS.map((column) => record.columns[column]).join("\t");
}

/**
 * VCF writer, optionally prefixing every data line with a routing key
 *
 * @example Keyed output for downstream grouping
 * ```typescript
 * const writer = new VcfWriter({ key: "LP6005038-DNA_A01" });
 * writer.formatRecord(record); // "LP6005038-DNA_A01\t1\t100\t..."
 * ```
 *
 * @public
 */
export class VcfWriter {
  private readonly prefix: string;

  constructor(options: { key?: string } = {}) {
    this.prefix = options.key !== undefined ? `${options.key}\t` : "";
  }

  /**
   * Format a single record
   */
  formatRecord(record: VcfRecord): string {
    return `${this.prefix}${formatVcfRecord(record)}`;
  }
}
