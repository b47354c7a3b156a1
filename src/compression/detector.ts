/**
 * Compression format detection for variant-call files
 *
 * Detection is keyed on the file extension alone.
 */

import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";

/**
 * Extensions treated as gzip, including bgzip output (`.bgz`)
 */
const GZIP_EXTENSIONS = [".gz", ".gzip", ".bgz"] as const;

/**
 * Compression format detector
 *
 * @example Detection from file extension
 * ```typescript
 * CompressionDetector.fromExtension("/data/chr21.vcf.gz"); // "gzip"
 * CompressionDetector.fromExtension("/data/chr21.vcf"); // "none"
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from file extension
   *
   * @throws {CompressionError} If the path is empty
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError("File path must not be empty", "none", "detect");
    }

    const normalizedPath = filePath.toLowerCase().replace(/\\/g, "/");
    return GZIP_EXTENSIONS.some((ext) => normalizedPath.endsWith(ext)) ? "gzip" : "none";
  }
}
