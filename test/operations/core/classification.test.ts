import { describe, expect, test } from "vitest";
import {
  classifyVariantType,
  isReferenceCandidate,
  isVariant,
} from "../../../src/operations/core/classification";
import { vcfRecord } from "../../utils/vcf-fixtures";

describe("isReferenceCandidate", () => {
  test("recognizes both reference placeholders", () => {
    expect(isReferenceCandidate(vcfRecord(1, { alt: "." }))).toBe(true);
    expect(isReferenceCandidate(vcfRecord(1, { alt: "<NON_REF>" }))).toBe(true);
  });

  test("a real allele is not a reference candidate", () => {
    expect(isReferenceCandidate(vcfRecord(1, { alt: "G" }))).toBe(false);
  });
});

describe("isVariant", () => {
  test.each(["0/0", "0|0"])("homozygous reference %s is not a variant", (gt) => {
    expect(isVariant(vcfRecord(1, { sample: `${gt}:40:20` }))).toBe(false);
  });

  test.each(["0/1", "1|1", "1/2", "./.", "0"])("genotype %s is a variant", (gt) => {
    expect(isVariant(vcfRecord(1, { sample: `${gt}:40:20` }))).toBe(true);
  });

  test("a record without GT counts as a variant", () => {
    expect(isVariant(vcfRecord(1, { format: "GQ:DP", sample: "40:20" }))).toBe(true);
  });

  test("is a pure function of the record", () => {
    const record = vcfRecord(1, { alt: "G", sample: "0/1:40:20" });
    expect(isVariant(record)).toBe(isVariant(record));
  });
});

describe("classifyVariantType", () => {
  test.each([
    [".", "A", "reference"],
    ["<NON_REF>", "A", "reference"],
    ["G", "A", "snp"],
    ["G,T", "A", "snp"],
    ["A", "AT", "indel"],
    ["AT", "A", "indel"],
    ["<DEL>", "A", "other"],
    ["*", "A", "other"],
  ] as const)("ALT %s over REF %s is %s", (alt, ref, expected) => {
    expect(classifyVariantType(vcfRecord(1, { alt, ref }))).toBe(expected);
  });
});
