/**
 * Decoding helpers for the INFO, FORMAT and sample columns
 *
 * @module vcf/utils
 */

import { CallArityError } from "../../errors";
import type { VcfRecord } from "./types";
import { VCF_CONSTANTS } from "./types";

/**
 * Decode the INFO column into key/value pairs
 *
 * Tokens that do not split into exactly one key and one value are dropped,
 * which means flag keys such as `DB` never appear in the result. Callers
 * that need flags should read {@link VcfRecord.info} instead.
 *
 * @example
 * ```typescript
 * decodeInfo(record); // INFO "DB;DP=12;END=200" -> { DP: "12", END: "200" }
 * ```
 *
 * @public
 */
export function decodeInfo(record: VcfRecord): Record<string, string> {
  const decoded: Record<string, string> = {};

  for (const item of record.columns.info.split(";")) {
    if (item === "") continue;

    const parts = item.split("=");
    const [key, value] = parts;
    if (parts.length !== 2 || key === undefined || value === undefined) continue;

    decoded[key] = value;
  }

  return decoded;
}

/**
 * Decode the FORMAT and sample columns into a FORMAT key -> value mapping
 *
 * @throws {CallArityError} When the key and value counts differ
 * @public
 */
export function decodeCall(record: VcfRecord): Record<string, string> {
  const { formatKeys, sampleValues } = record;

  if (formatKeys.length !== sampleValues.length) {
    throw new CallArityError(
      formatKeys.length,
      sampleValues.length,
      record.lineNumber,
      `${record.chromosome}:${record.position} FORMAT=${record.columns.format} SAMPLE=${record.columns.sample}`
    );
  }

  const call: Record<string, string> = {};
  formatKeys.forEach((key, index) => {
    const value = sampleValues[index];
    if (value !== undefined) call[key] = value;
  });
  return call;
}

/**
 * Genotype (GT) string of the sample, or undefined when there is none
 *
 * @public
 */
export function getGenotype(record: VcfRecord): string | undefined {
  const index = record.formatKeys.indexOf("GT");
  return index === -1 ? undefined : record.sampleValues[index];
}

/**
 * Parse a strictly integral field value; "." and decimals yield undefined
 *
 * @public
 */
export function parseIntegerValue(value: string | undefined): number | undefined {
  if (value === undefined || !/^[+-]?\d+$/.test(value)) {
    return undefined;
  }
  return Number.parseInt(value, 10);
}

/**
 * Parse a numeric field value; "." and garbage yield undefined
 *
 * @public
 */
export function parseNumericValue(value: string | undefined): number | undefined {
  if (value === undefined || value === VCF_CONSTANTS.MISSING || value.trim() === "") {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Last position covered by a record: its INFO END when present, else POS
 *
 * @public
 */
export function recordEndValue(record: VcfRecord): number {
  return parseIntegerValue(decodeInfo(record)["END"]) ?? record.position;
}

/**
 * Copy of a record whose genotype is forced to no-call (`GT` / `./.`)
 *
 * @public
 */
export function withNoCallGenotype(record: VcfRecord): VcfRecord {
  return {
    ...record,
    formatKeys: [VCF_CONSTANTS.NO_CALL_FORMAT],
    sampleValues: [VCF_CONSTANTS.NO_CALL_GENOTYPE],
    columns: {
      ...record.columns,
      format: VCF_CONSTANTS.NO_CALL_FORMAT,
      sample: VCF_CONSTANTS.NO_CALL_GENOTYPE,
    },
  };
}

/**
 * Copy of a record with its INFO column replaced
 *
 * @public
 */
export function withInfo(record: VcfRecord, info: string): VcfRecord {
  return {
    ...record,
    info: parseInfoField(info),
    columns: { ...record.columns, info },
  };
}

/**
 * Parse the INFO column keeping flags (as null values)
 *
 * @public
 */
export function parseInfoField(infoText: string): Record<string, string | null> {
  const info: Record<string, string | null> = {};
  if (infoText === VCF_CONSTANTS.MISSING) {
    return info;
  }

  for (const item of infoText.split(";")) {
    if (item === "") continue;

    const separator = item.indexOf("=");
    if (separator === -1) {
      info[item] = null;
    } else {
      info[item.slice(0, separator)] = item.slice(separator + 1);
    }
  }

  return info;
}
