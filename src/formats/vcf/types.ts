/**
 * Core VCF record type definitions
 *
 * Single-sample, ten-column VCF data lines as produced by callers that emit
 * every position of the genome.
 *
 * @module vcf/types
 */

import type { ParserOptions } from "../../types";

/**
 * Column names of a single-sample VCF data line, in file order
 *
 * @public
 */
export const VCF_COLUMNS = [
  "chrom",
  "pos",
  "id",
  "ref",
  "alt",
  "qual",
  "filter",
  "info",
  "format",
  "sample",
] as const;

/** @public */
export type VcfColumn = (typeof VCF_COLUMNS)[number];

/**
 * Verbatim column text, keyed by column name
 *
 * @public
 */
export type VcfColumns = { readonly [K in VcfColumn]: string };

/**
 * One genomic position's call for a single sample
 *
 * @public
 */
export interface VcfRecord {
  /** Chromosome or contig name (e.g., "1", "chr21") */
  readonly chromosome: string;
  /** 1-based position */
  readonly position: number;
  /** ID column, "." when absent */
  readonly id: string;
  /** Reference allele; its length extends a block's END coordinate */
  readonly referenceAllele: string;
  /** Alternate allele; "." or "<NON_REF>" marks a reference/no-call candidate */
  readonly alternateAllele: string;
  /** Site quality, or null when the column is "." or not numeric */
  readonly quality: number | null;
  /** FILTER column (e.g., "PASS") */
  readonly filterStatus: string;
  /** INFO entries; flag keys such as DB map to null */
  readonly info: Readonly<Record<string, string | null>>;
  /** FORMAT keys in column order (e.g., GT, GQ, DP) */
  readonly formatKeys: readonly string[];
  /** Sample values aligned positionally with formatKeys */
  readonly sampleValues: readonly string[];
  /** The ten columns as read, used whenever a record is written back out */
  readonly columns: VcfColumns;
  /** Source line number for debugging */
  readonly lineNumber?: number;
}

/**
 * An item produced by the streaming parser: a header line passed through
 * untouched, or a parsed data record
 *
 * @public
 */
export type VcfEntry =
  | { readonly kind: "header"; readonly text: string; readonly lineNumber?: number }
  | { readonly kind: "record"; readonly record: VcfRecord };

/**
 * VCF parser configuration options
 *
 * @public
 */
export interface VcfParserOptions extends ParserOptions {
  /** Drop header lines instead of yielding them */
  skipHeaders?: boolean;
}

/**
 * Coarse variant type of a record
 *
 * @public
 */
export type VariantType = "reference" | "snp" | "indel" | "other";

/**
 * VCF format constants
 *
 * @public
 */
export const VCF_CONSTANTS = {
  /** Number of tab-separated columns in a single-sample data line */
  COLUMN_COUNT: 10,
  /** Missing-value marker used across VCF columns */
  MISSING: ".",
  /** Symbolic ALT allele used by gVCF producers for reference blocks */
  NON_REF: "<NON_REF>",
  /** Genotype written for positions forced to no-call */
  NO_CALL_GENOTYPE: "./.",
  /** FORMAT column written for positions forced to no-call */
  NO_CALL_FORMAT: "GT",
  /** Homozygous-reference genotypes, unphased and phased */
  HOM_REF_GENOTYPES: ["0/0", "0|0"],
} as const;
