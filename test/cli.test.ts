/**
 * End-to-end tests for the command-line interface
 */

import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gunzipSync, gzipSync } from "fflate";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { type CliIo, EXIT_INTERRUPTED, parseCommandLine, runCli } from "../src/cli";
import { vcfLine } from "./utils/vcf-fixtures";

const HET = { alt: "G", sample: "0/1:40:20" };
const INPUT = [
  "##fileformat=VCFv4.2",
  vcfLine(10),
  vcfLine(11),
  vcfLine(12, HET),
  vcfLine(13, { sample: "0/0:5:20" }),
  "",
].join("\n");

let workDir: string;
let out: string[];
let err: string[];

function captureIo(signal?: AbortSignal): CliIo {
  return {
    writeOut: (text) => out.push(text),
    writeErr: (text) => err.push(text),
    ...(signal !== undefined && { signal }),
  };
}

beforeEach(() => {
  workDir = mkdtempSync(join(tmpdir(), "gvcf-blocks-cli-"));
  out = [];
  err = [];
});

afterEach(() => {
  rmSync(workDir, { recursive: true, force: true });
});

describe("argument handling", () => {
  test("missing input and output report usage and exit 1", async () => {
    expect(await runCli([], captureIo())).toBe(1);

    expect(err[0]).toBe("Missing arguments\n");
    expect(err.join("")).toContain("Usage: gvcf-blocks [options]");
  });

  test("missing output alone is also an error", async () => {
    expect(await runCli(["-g", "calls.vcf"], captureIo())).toBe(1);
    expect(err[0]).toBe("Missing arguments\n");
  });

  test("rejects a non-integer threshold", async () => {
    expect(await runCli(["-g", "a.vcf", "-o", "b.vcf", "--min-gq", "abc"], captureIo())).toBe(1);
    expect(err.join("")).toContain("Expected a non-negative integer.");
  });

  test("--help exits 0", async () => {
    expect(await runCli(["--help"], captureIo())).toBe(0);
    expect(out.join("")).toContain("--min-gq <n>");
  });

  test("parses thresholds and defaults", () => {
    const parsed = parseCommandLine(
      ["-g", "in.vcf", "-o", "out.vcf", "--min-gq", "20", "--max-mq0", "4"],
      captureIo()
    );

    expect("options" in parsed).toBe(true);
    if ("options" in parsed) {
      expect(parsed.options).toMatchObject({
        gvcf: "in.vcf",
        output: "out.vcf",
        minGq: 20,
        minDp: 0,
        maxMq0: 4,
        mode: "blocks",
        debug: false,
        keyed: false,
      });
    }
  });
});

describe("conversion", () => {
  test("writes blocks, variants and no-call blocks in input order", async () => {
    const input = join(workDir, "calls.vcf");
    const output = join(workDir, "blocks.vcf");
    writeFileSync(input, INPUT);

    expect(await runCli(["-g", input, "-o", output, "--min-gq", "20"], captureIo())).toBe(0);

    expect(readFileSync(output, "utf8")).toBe(
      [
        "##fileformat=VCFv4.2",
        "1\t10\t.\tA\t.\t50\tPASS\tEND=11\tGT:GQ:DP\t0/0:40:20",
        vcfLine(12, HET),
        "1\t13\t.\tA\t.\t50\tPASS\tEND=13\tGT\t./.",
        "",
      ].join("\n")
    );
  });

  test("reads and writes gzip by extension", async () => {
    const input = join(workDir, "calls.vcf.gz");
    const output = join(workDir, "blocks.vcf.gz");
    writeFileSync(input, gzipSync(new TextEncoder().encode(INPUT)));

    expect(await runCli(["-g", input, "-o", output], captureIo())).toBe(0);

    const text = new TextDecoder().decode(gunzipSync(readFileSync(output)));
    expect(text.split("\n")[1]).toBe("1\t10\t.\tA\t.\t50\tPASS\tEND=11\tGT:GQ:DP\t0/0:40:20");
  });

  test("keys output with the sample id found in the input path", async () => {
    const sampleDir = join(workDir, "LP6005038-DNA_A01");
    mkdirSync(sampleDir);
    const input = join(sampleDir, "genome.vcf");
    const output = join(workDir, "keyed.vcf");
    writeFileSync(input, [vcfLine(10), ""].join("\n"));

    expect(await runCli(["-g", input, "-o", output, "--keyed"], captureIo())).toBe(0);

    expect(readFileSync(output, "utf8")).toBe(
      "LP6005038-DNA_A01\t1\t10\t.\tA\t.\t50\tPASS\tEND=10\tGT:GQ:DP\t0/0:40:20\n"
    );
  });

  test("an explicit sample id keys the output without --keyed", async () => {
    const input = join(workDir, "calls.vcf");
    const output = join(workDir, "keyed.vcf");
    writeFileSync(input, [vcfLine(10), ""].join("\n"));

    expect(await runCli(["-g", input, "-o", output, "--sample-id", "S1"], captureIo())).toBe(0);

    expect(readFileSync(output, "utf8")).toBe(
      "S1\t1\t10\t.\tA\t.\t50\tPASS\tEND=10\tGT:GQ:DP\t0/0:40:20\n"
    );
    expect(err).toEqual([]);
  });

  test("warns and writes unkeyed output when no sample id is found", async () => {
    const input = join(workDir, "calls.vcf");
    const output = join(workDir, "out.vcf");
    writeFileSync(input, [vcfLine(10), ""].join("\n"));

    expect(await runCli(["-g", input, "-o", output, "--keyed"], captureIo())).toBe(0);

    expect(err).toContain(`Warning: no sample id found in '${input}', writing unkeyed output\n`);
    expect(readFileSync(output, "utf8")).toBe(
      "1\t10\t.\tA\t.\t50\tPASS\tEND=10\tGT:GQ:DP\t0/0:40:20\n"
    );
  });

  test("positions mode writes one line per record", async () => {
    const input = join(workDir, "calls.vcf");
    const output = join(workDir, "positions.vcf");
    writeFileSync(input, INPUT);

    expect(
      await runCli(["-g", input, "-o", output, "--mode", "positions", "--min-gq", "20"], captureIo())
    ).toBe(0);

    expect(readFileSync(output, "utf8").split("\n")).toHaveLength(6);
  });

  test("logs a summary in debug mode", async () => {
    const input = join(workDir, "calls.vcf");
    writeFileSync(input, INPUT);

    expect(await runCli(["-g", input, "-o", join(workDir, "out.vcf"), "-d"], captureIo())).toBe(0);

    expect(err).toContain(
      "Processed 4 records: 1 variants, 2 reference blocks, 0 no-call blocks (0 no-call records), 0 skipped\n"
    );
  });
});

describe("failures", () => {
  test("a missing input file exits 1 with the cause", async () => {
    const code = await runCli(
      ["-g", join(workDir, "absent.vcf"), "-o", join(workDir, "out.vcf")],
      captureIo()
    );

    expect(code).toBe(1);
    expect(err.join("")).toContain("File does not exist or is not accessible");
  });

  test("a malformed line exits 1", async () => {
    const input = join(workDir, "calls.vcf");
    writeFileSync(input, `${vcfLine(10)}\n1\t11\tbroken\n`);

    expect(await runCli(["-g", input, "-o", join(workDir, "out.vcf")], captureIo())).toBe(1);
    expect(err.join("")).toContain("got 3");
  });

  test("an interrupted run exits 130", async () => {
    const input = join(workDir, "calls.vcf");
    writeFileSync(input, INPUT);
    const controller = new AbortController();
    controller.abort();

    const code = await runCli(
      ["-g", input, "-o", join(workDir, "out.vcf")],
      captureIo(controller.signal)
    );

    expect(code).toBe(EXIT_INTERRUPTED);
    expect(err).toContain("Interrupted\n");
  });
});
