import { describe, expect, test } from "vitest";
import { CallArityError } from "../../../src/errors";
import { passesCallabilityFilter } from "../../../src/operations/core/callability";
import { vcfRecord } from "../../utils/vcf-fixtures";

const permissive = { minGq: 0, minDp: 0 };

describe("passesCallabilityFilter", () => {
  describe("reference candidates", () => {
    test("pass with permissive thresholds", () => {
      expect(passesCallabilityFilter(vcfRecord(1), permissive)).toBe(true);
    });

    test("fail when GQ is below the minimum", () => {
      expect(passesCallabilityFilter(vcfRecord(1), { minGq: 41, minDp: 0 })).toBe(false);
    });

    test("pass when GQ equals the minimum", () => {
      expect(passesCallabilityFilter(vcfRecord(1), { minGq: 40, minDp: 0 })).toBe(true);
    });

    test("fail when DP is below the minimum", () => {
      expect(passesCallabilityFilter(vcfRecord(1), { minGq: 0, minDp: 21 })).toBe(false);
    });

    test("an N reference never passes", () => {
      expect(passesCallabilityFilter(vcfRecord(1, { ref: "N" }), permissive)).toBe(false);
    });

    test("missing GQ or DP keys are not enforced", () => {
      const record = vcfRecord(1, { format: "GT", sample: "0/0" });
      expect(passesCallabilityFilter(record, { minGq: 99, minDp: 99 })).toBe(true);
    });

    test("non-integer GQ values are not enforced", () => {
      const record = vcfRecord(1, { sample: "0/0:.:20" });
      expect(passesCallabilityFilter(record, { minGq: 99, minDp: 0 })).toBe(true);
    });

    test("<NON_REF> records are filtered like '.'", () => {
      const record = vcfRecord(1, { alt: "<NON_REF>", sample: "0/0:5:20" });
      expect(passesCallabilityFilter(record, { minGq: 10, minDp: 0 })).toBe(false);
    });

    test("throw CallArityError on a FORMAT/sample mismatch", () => {
      const record = vcfRecord(1, { format: "GT:GQ:DP", sample: "0/0:40" });
      expect(() => passesCallabilityFilter(record, permissive)).toThrow(CallArityError);
    });
  });

  describe("true variant calls", () => {
    test("pass regardless of GQ and DP", () => {
      const record = vcfRecord(1, { alt: "G", sample: "0/1:5:2" });
      expect(passesCallabilityFilter(record, { minGq: 20, minDp: 10 })).toBe(true);
    });

    test("require FILTER=PASS when configured", () => {
      const lowQual = vcfRecord(1, { alt: "G", filter: "LowQual", sample: "0/1:5:2" });
      const passing = vcfRecord(1, { alt: "G", sample: "0/1:5:2" });
      const criteria = { ...permissive, requirePassFilter: true };

      expect(passesCallabilityFilter(lowQual, criteria)).toBe(false);
      expect(passesCallabilityFilter(passing, criteria)).toBe(true);
    });
  });

  describe("mapping-quality criteria", () => {
    test("MQ0 at the maximum fails", () => {
      const record = vcfRecord(1, { info: "MQ0=4;MQ=35" });
      expect(passesCallabilityFilter(record, { ...permissive, maxMq0: 4 })).toBe(false);
    });

    test("MQ0 below the maximum passes", () => {
      const record = vcfRecord(1, { info: "MQ0=3;MQ=35" });
      expect(passesCallabilityFilter(record, { ...permissive, maxMq0: 4 })).toBe(true);
    });

    test("MQ below the minimum fails", () => {
      const record = vcfRecord(1, { info: "MQ0=0;MQ=29.5" });
      expect(passesCallabilityFilter(record, { ...permissive, minMq: 30 })).toBe(false);
    });

    test("QUAL below the minimum fails", () => {
      const record = vcfRecord(1, { qual: "29" });
      expect(passesCallabilityFilter(record, { ...permissive, minQual: 30 })).toBe(false);
    });

    test("missing values are not enforced", () => {
      const record = vcfRecord(1, { qual: ".", info: "DB" });
      const criteria = { ...permissive, maxMq0: 4, minMq: 30, minQual: 30 };
      expect(passesCallabilityFilter(record, criteria)).toBe(true);
    });
  });

  test("is a pure function of the record", () => {
    const record = vcfRecord(1, { sample: "0/0:15:30" });
    const criteria = { minGq: 20, minDp: 10 };

    expect(passesCallabilityFilter(record, criteria)).toBe(false);
    expect(passesCallabilityFilter(record, criteria)).toBe(false);
  });
});
