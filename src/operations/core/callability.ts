/**
 * Callability filter for reference/no-call candidates
 *
 * Decides whether a position is confidently reference ("callable") or must
 * be forced to a no-call genotype. A pure function of one record: the same
 * record always yields the same answer.
 */

import type { VcfRecord } from "../../formats/vcf";
import { decodeCall, decodeInfo, parseIntegerValue, parseNumericValue } from "../../formats/vcf";
import { isReferenceCandidate } from "./classification";

/**
 * Thresholds applied by {@link passesCallabilityFilter}
 *
 * The mapping-quality thresholds are only enforced when set, and only
 * against records that carry the corresponding value.
 */
export interface CallabilityCriteria {
  /** Minimum GQ for a reference call */
  readonly minGq: number;
  /** Minimum DP for a reference call */
  readonly minDp: number;
  /** Variant calls pass only when FILTER is PASS */
  readonly requirePassFilter?: boolean;
  /** Fail reference calls whose INFO MQ0 is at or above this value */
  readonly maxMq0?: number;
  /** Fail reference calls whose INFO MQ is below this value */
  readonly minMq?: number;
  /** Fail reference calls whose QUAL is below this value */
  readonly minQual?: number;
}

/**
 * Decide whether a record passes the callability filter
 *
 * Rules, first match wins:
 * 1. A true variant call (ALT not `.` / `<NON_REF>`) passes, unless
 *    `requirePassFilter` is set and FILTER is not `PASS`.
 * 2. A reference allele of `N` fails.
 * 3. GQ below `minGq` or DP below `minDp` fails. Missing or non-integer
 *    values do not.
 * 4. MQ0 at or above `maxMq0`, MQ below `minMq`, or QUAL below `minQual`
 *    fails.
 * 5. Otherwise the record passes.
 *
 * @throws {CallArityError} When FORMAT and sample value counts differ
 *
 * @example
 * ```typescript
 * const record = parseVcfRecord("1\t100\t.\tA\t.\t.\tPASS\t.\tGT:GQ:DP\t0/0:15:30");
 * passesCallabilityFilter(record, { minGq: 20, minDp: 10 }); // false
 * ```
 */
export function passesCallabilityFilter(
  record: VcfRecord,
  criteria: CallabilityCriteria
): boolean {
  if (!isReferenceCandidate(record)) {
    return criteria.requirePassFilter !== true || record.filterStatus === "PASS";
  }

  if (record.referenceAllele === "N") {
    return false;
  }

  const call = decodeCall(record);

  const gq = parseIntegerValue(call["GQ"]);
  if (gq !== undefined && gq < criteria.minGq) {
    return false;
  }

  const dp = parseIntegerValue(call["DP"]);
  if (dp !== undefined && dp < criteria.minDp) {
    return false;
  }

  return passesMappingQuality(record, criteria);
}

function passesMappingQuality(record: VcfRecord, criteria: CallabilityCriteria): boolean {
  const { maxMq0, minMq, minQual } = criteria;
  if (maxMq0 === undefined && minMq === undefined && minQual === undefined) {
    return true;
  }

  const info = decodeInfo(record);

  const mq0 = parseNumericValue(info["MQ0"]);
  if (maxMq0 !== undefined && mq0 !== undefined && mq0 >= maxMq0) {
    return false;
  }

  const mq = parseNumericValue(info["MQ"]);
  if (minMq !== undefined && mq !== undefined && mq < minMq) {
    return false;
  }

  const quality = record.quality;
  if (minQual !== undefined && quality !== null && quality < minQual) {
    return false;
  }

  return true;
}
