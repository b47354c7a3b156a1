import { describe, expect, test } from "vitest";
import { CompressionDetector } from "../../src/compression/detector";
import { CompressionError } from "../../src/errors";

describe("CompressionDetector", () => {
  describe("fromExtension", () => {
    test.each(["calls.vcf.gz", "CALLS.VCF.GZ", "calls.vcf.gzip", "calls.vcf.bgz"])(
      "%s is gzip",
      (path) => {
        expect(CompressionDetector.fromExtension(path)).toBe("gzip");
      }
    );

    test.each(["calls.vcf", "calls.gz.vcf", "-"])("%s is uncompressed", (path) => {
      expect(CompressionDetector.fromExtension(path)).toBe("none");
    });

    test("normalizes Windows separators", () => {
      expect(CompressionDetector.fromExtension("C:\\data\\calls.vcf.gz")).toBe("gzip");
    });

    test("rejects an empty path", () => {
      expect(() => CompressionDetector.fromExtension("")).toThrow(CompressionError);
    });
  });
});
