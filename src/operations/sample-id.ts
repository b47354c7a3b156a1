/**
 * Sample identity resolution from input paths
 *
 * Batch pipelines name per-sample inputs after the sample
 * (e.g. `.../LP6005038-DNA_A01/genome.vcf.gz`); the identifier becomes the
 * routing key of keyed output.
 */

/**
 * Default sample identifier pattern: the first capture group is the id
 */
export const DEFAULT_SAMPLE_ID_PATTERN = /(LP\d{7}-DNA_\w\d{2})/;

/**
 * Extract the sample identifier from a path
 *
 * @param path - Input path (or any string naming the sample)
 * @param pattern - Pattern whose first capture group is the identifier;
 *   without a capture group the whole match is used
 * @returns The identifier, or undefined when the pattern does not match
 *
 * @example
 * ```typescript
 * resolveSampleId("/data/LP6005038-DNA_A01/genome.vcf.gz"); // "LP6005038-DNA_A01"
 * resolveSampleId("/data/sample.vcf"); // undefined
 * ```
 */
export function resolveSampleId(
  path: string,
  pattern: RegExp = DEFAULT_SAMPLE_ID_PATTERN
): string | undefined {
  const match = pattern.exec(path);
  if (match === null) {
    return undefined;
  }
  return match[1] ?? match[0];
}
