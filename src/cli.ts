/**
 * Command-line interface for gVCF block conversion
 *
 * @example
 * ```bash
 * gvcf-blocks -g LP6005038-DNA_A01.genome.vcf.gz -o blocks.vcf.gz --min-gq 20 --min-dp 10
 * gvcf-blocks -g - -o - --mode positions --keyed --sample-id NA12878 < calls.vcf
 * ```
 *
 * @module cli
 */

import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { GvcfError } from "./errors";
import { VcfParser } from "./formats/vcf";
import { openForWriting } from "./io/file-writer";
import { GvcfProcessor } from "./operations/gvcf";
import { DEFAULT_SAMPLE_ID_PATTERN, resolveSampleId } from "./operations/sample-id";
import type { GvcfMode, GvcfOptions } from "./operations/types";

/**
 * Exit status after an interrupt (128 + SIGINT)
 */
export const EXIT_INTERRUPTED = 130;

/**
 * Options as parsed from the command line
 */
export type CliOptions = {
  gvcf?: string;
  output?: string;
  minGq: number;
  minDp: number;
  debug: boolean;
  mode: GvcfMode;
  keyed: boolean;
  sampleId?: string;
  samplePattern: RegExp;
  requirePass: boolean;
  maxMq0?: number;
  minMq?: number;
  minQual?: number;
};

/**
 * Where the CLI writes diagnostics; data output goes to `--output`
 */
export interface CliIo {
  writeOut(text: string): void;
  writeErr(text: string): void;
  /** External cancellation, combined with SIGINT */
  signal?: AbortSignal;
}

const defaultIo: CliIo = {
  writeOut: (text) => process.stdout.write(text),
  writeErr: (text) => process.stderr.write(text),
};

function parseNonNegativeInteger(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return Number.parseInt(value, 10);
}

function parseFiniteNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Expected a number.");
  }
  return parsed;
}

function parsePattern(value: string): RegExp {
  try {
    return new RegExp(value);
  } catch (error) {
    throw new InvalidArgumentError(
      `Invalid pattern: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Build the commander program
 */
export function buildProgram(io: CliIo = defaultIo): Command {
  return new Command()
    .name("gvcf-blocks")
    .description("Merge reference matching blocks in a VCF and output a new gVCF.")
    .version("0.1.0")
    .option("-g, --gvcf <path>", "input VCF (.gz decompressed, - for stdin)")
    .option("-o, --output <path>", "output file (.gz compressed, - for stdout)")
    .option("--min-gq <n>", "minimum GQ value for reference calls", parseNonNegativeInteger, 0)
    .option("--min-dp <n>", "minimum DP value for reference calls", parseNonNegativeInteger, 0)
    .option("-d, --debug", "output debugging messages, may be very verbose", false)
    .addOption(
      new Option("--mode <mode>", "merge blocks or emit one line per position")
        .choices(["blocks", "positions"])
        .default("blocks")
    )
    .option("--keyed", "prefix output lines with the sample id resolved from the input path", false)
    .addOption(
      new Option("--sample-id <id>", "prefix output lines with this sample id (implies --keyed)")
        .implies({ keyed: true })
    )
    .option(
      "--sample-pattern <regex>",
      "pattern resolving the sample id from the input path",
      parsePattern,
      DEFAULT_SAMPLE_ID_PATTERN
    )
    .option("--require-pass", "variant calls must have FILTER=PASS", false)
    .option("--max-mq0 <n>", "fail reference calls with MQ0 at or above this", parseFiniteNumber)
    .option("--min-mq <n>", "fail reference calls with MQ below this", parseFiniteNumber)
    .option("--min-qual <n>", "fail reference calls with QUAL below this", parseFiniteNumber)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.writeOut(text),
      writeErr: (text) => io.writeErr(text),
    });
}

/**
 * Parse arguments (without the node and script entries)
 *
 * @returns Parsed options, or the exit code when commander already handled
 *   the invocation (help, version, or an invalid option)
 */
export function parseCommandLine(
  argv: readonly string[],
  io: CliIo = defaultIo
): { options: CliOptions; program: Command } | { exitCode: number } {
  const program = buildProgram(io);
  try {
    program.parse([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return { exitCode: error.exitCode };
    }
    throw error;
  }
  return { options: program.opts<CliOptions>(), program };
}

/**
 * Translate CLI options into processor options
 */
export function toGvcfOptions(options: CliOptions, io: CliIo = defaultIo): GvcfOptions {
  let sampleId = options.sampleId;
  if (options.keyed && sampleId === undefined && options.gvcf !== undefined) {
    sampleId = resolveSampleId(options.gvcf, options.samplePattern);
    if (sampleId === undefined) {
      io.writeErr(`Warning: no sample id found in '${options.gvcf}', writing unkeyed output\n`);
    }
  }

  return {
    minGq: options.minGq,
    minDp: options.minDp,
    debug: options.debug,
    mode: options.mode,
    requirePassFilter: options.requirePass,
    ...(sampleId !== undefined && { sampleId }),
    ...(options.maxMq0 !== undefined && { maxMq0: options.maxMq0 }),
    ...(options.minMq !== undefined && { minMq: options.minMq }),
    ...(options.minQual !== undefined && { minQual: options.minQual }),
    onWarning: (message, lineNumber) =>
      io.writeErr(
        lineNumber !== undefined ? `Warning (line ${lineNumber}): ${message}\n` : `Warning: ${message}\n`
      ),
    onDebug: (message) => io.writeErr(`${message}\n`),
  };
}

/**
 * Run the CLI and resolve to the process exit code
 */
export async function runCli(argv: readonly string[], io: CliIo = defaultIo): Promise<number> {
  const parsed = parseCommandLine(argv, io);
  if ("exitCode" in parsed) {
    return parsed.exitCode;
  }

  const { options, program } = parsed;
  if (options.gvcf === undefined || options.output === undefined) {
    io.writeErr("Missing arguments\n");
    program.outputHelp({ error: true });
    return 1;
  }

  const input = options.gvcf;
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once("SIGINT", onInterrupt);
  io.signal?.addEventListener("abort", onInterrupt, { once: true });
  if (io.signal?.aborted) controller.abort();

  const gvcfOptions: GvcfOptions = { ...toGvcfOptions(options, io), signal: controller.signal };
  const parser = new VcfParser({
    signal: controller.signal,
    onWarning: gvcfOptions.onWarning,
  });
  const processor = new GvcfProcessor();

  try {
    await openForWriting(options.output, async (handle) => {
      for await (const line of processor.process(parser.parseFile(input), gvcfOptions)) {
        await handle.writeString(`${line}\n`);
      }
    });
  } catch (error) {
    if (error instanceof GvcfError && error.code === "ABORTED") {
      io.writeErr("Interrupted\n");
      return EXIT_INTERRUPTED;
    }
    io.writeErr(`${error instanceof Error ? error.toString() : String(error)}\n`);
    return 1;
  } finally {
    process.off("SIGINT", onInterrupt);
    io.signal?.removeEventListener("abort", onInterrupt);
  }

  if (options.debug) {
    const summary = processor.summary;
    io.writeErr(
      `Processed ${summary.records} records: ${summary.variants} variants, ` +
        `${summary.referenceBlocks} reference blocks, ${summary.noCallBlocks} no-call blocks ` +
        `(${summary.noCallRecords} no-call records), ${summary.skippedRecords} skipped\n`
    );
  }

  return 0;
}
