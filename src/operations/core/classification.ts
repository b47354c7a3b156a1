/**
 * Variant classification for single-sample VCF records
 *
 * Two independent questions are asked of every record: does its ALT column
 * make it a reference/no-call candidate, and does its genotype make it a
 * variant call. A record with a placeholder ALT but a non hom-ref genotype
 * is still a variant.
 */

import type { VariantType, VcfRecord } from "../../formats/vcf";
import { getGenotype, VCF_CONSTANTS } from "../../formats/vcf";

/**
 * Whether the ALT column is a reference placeholder (`.` or `<NON_REF>`)
 */
export function isReferenceCandidate(record: VcfRecord): boolean {
  return (
    record.alternateAllele === VCF_CONSTANTS.MISSING ||
    record.alternateAllele === VCF_CONSTANTS.NON_REF
  );
}

/**
 * Whether the record is a variant call
 *
 * Only a homozygous-reference genotype (`0/0` or `0|0`) is non-variant.
 * Missing, malformed, heterozygous, hom-alt and multi-allelic genotypes all
 * count as variants.
 *
 * @example
 * ```typescript
 * isVariant(parseVcfRecord("1\t10\t.\tA\t.\t.\tPASS\t.\tGT\t0/0")); // false
 * isVariant(parseVcfRecord("1\t12\t.\tA\tG\t.\tPASS\t.\tGT\t0/1")); // true
 * ```
 */
export function isVariant(record: VcfRecord): boolean {
  const genotype = getGenotype(record);
  return !VCF_CONSTANTS.HOM_REF_GENOTYPES.some((homRef) => homRef === genotype);
}

/**
 * Coarse variant type from the REF and ALT columns
 *
 * Multi-allelic ALT columns are typed by their first allele.
 */
export function classifyVariantType(record: VcfRecord): VariantType {
  if (isReferenceCandidate(record)) {
    return "reference";
  }

  const [firstAlt = ""] = record.alternateAllele.split(",");
  if (!/^[ACGTN]+$/i.test(record.referenceAllele) || !/^[ACGTN]+$/i.test(firstAlt)) {
    return "other";
  }
  if (record.referenceAllele.length === 1 && firstAlt.length === 1) {
    return "snp";
  }
  return "indel";
}
