/**
 * Tests for file reading with transparent decompression
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gzipSync } from "fflate";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileError } from "../../src/errors";
import { VcfParser } from "../../src/formats/vcf";
import { createStream, exists } from "../../src/io/file-reader";
import { readLines } from "../../src/io/stream-utils";
import { collect, vcfLine } from "../utils/vcf-fixtures";

const encoder = new TextEncoder();
const CONTENT = ["##fileformat=VCFv4.2", vcfLine(10), vcfLine(11), ""].join("\n");
let workDir: string;

beforeEach(() => {
  workDir = mkdtempSync(join(tmpdir(), "gvcf-blocks-reader-"));
});

afterEach(() => {
  rmSync(workDir, { recursive: true, force: true });
});

describe("exists", () => {
  test("is true for a regular file", async () => {
    const path = join(workDir, "calls.vcf");
    writeFileSync(path, CONTENT);
    expect(await exists(path)).toBe(true);
  });

  test("is false for a missing file", async () => {
    expect(await exists(join(workDir, "absent.vcf"))).toBe(false);
  });

  test("is false for a directory", async () => {
    const dir = join(workDir, "nested");
    mkdirSync(dir);
    expect(await exists(dir)).toBe(false);
  });
});

describe("createStream", () => {
  const readAllLines = async (path: string): Promise<string[]> =>
    collect(readLines(await createStream(path)));

  test("reads plain files", async () => {
    const path = join(workDir, "calls.vcf");
    writeFileSync(path, CONTENT);
    expect(await readAllLines(path)).toEqual(["##fileformat=VCFv4.2", vcfLine(10), vcfLine(11)]);
  });

  test("decompresses .gz files", async () => {
    const path = join(workDir, "calls.vcf.gz");
    writeFileSync(path, gzipSync(encoder.encode(CONTENT)));
    expect(await readAllLines(path)).toEqual(["##fileformat=VCFv4.2", vcfLine(10), vcfLine(11)]);
  });

  test("fails with FileError for a missing file", async () => {
    await expect(createStream(join(workDir, "absent.vcf"))).rejects.toThrow(FileError);
  });

  test("fails with FileError for an empty path", async () => {
    await expect(createStream("")).rejects.toThrow(FileError);
  });

  test("returns raw bytes with autoDecompress disabled", async () => {
    const path = join(workDir, "calls.vcf.gz");
    writeFileSync(path, gzipSync(encoder.encode(CONTENT)));

    const reader = (await createStream(path, { autoDecompress: false })).getReader();
    const { value } = await reader.read();
    await reader.cancel();

    expect(value?.[0]).toBe(0x1f);
    expect(value?.[1]).toBe(0x8b);
  });

  test("decompresses a forced format regardless of extension", async () => {
    const path = join(workDir, "calls.vcf");
    writeFileSync(path, gzipSync(encoder.encode(CONTENT)));

    const lines = await collect(readLines(await createStream(path, { compressionFormat: "gzip" })));
    expect(lines).toEqual(["##fileformat=VCFv4.2", vcfLine(10), vcfLine(11)]);
  });

  test("rejects an invalid buffer size", async () => {
    const path = join(workDir, "calls.vcf");
    writeFileSync(path, CONTENT);
    await expect(createStream(path, { bufferSize: 1 })).rejects.toThrow(FileError);
  });
});

describe("VcfParser.parseFile", () => {
  test("parses a gzipped VCF", async () => {
    const path = join(workDir, "LP6005038-DNA_A01.genome.vcf.gz");
    writeFileSync(path, gzipSync(encoder.encode(CONTENT)));

    const entries = await collect(new VcfParser().parseFile(path));

    expect(entries.map((entry) => entry.kind)).toEqual(["header", "record", "record"]);
  });
});
