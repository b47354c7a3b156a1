/**
 * GvcfProcessor - Convert every-position VCF records to gVCF
 *
 * Drives parsed entries through the variant classifier, the callability
 * filter and the block accumulator in a single ordered pass. Output line
 * order is the input order of headers, variants and (flushed) blocks.
 *
 * @example
 * ```typescript
 * const parser = new VcfParser();
 * const processor = new GvcfProcessor();
 * for await (const line of processor.process(parser.parseFile("in.vcf.gz"), { minGq: 20 })) {
 *   console.log(line);
 * }
 * ```
 */

import { type } from "arktype";
import { CallArityError, GvcfError, ValidationError } from "../errors";
import type { VcfEntry, VcfRecord } from "../formats/vcf";
import { VcfWriter, withNoCallGenotype } from "../formats/vcf";
import { BlockAccumulator, type ClosedBlock } from "./core/block-accumulator";
import { type CallabilityCriteria, passesCallabilityFilter } from "./core/callability";
import { isVariant } from "./core/classification";
import type { GvcfMode, GvcfOptions, GvcfSummary, Processor } from "./types";

const NonNegativeInteger = type("number>=0").narrow(
  (value, ctx) => Number.isInteger(value) || ctx.mustBe("an integer")
);

/**
 * ArkType schema for GvcfOptions validation
 */
const GvcfOptionsSchema = type({
  "minGq?": NonNegativeInteger,
  "minDp?": NonNegativeInteger,
  "debug?": "boolean",
  "mode?": "'blocks' | 'positions'",
  "sampleId?": "string>0",
  "requirePassFilter?": "boolean",
  "maxMq0?": "number",
  "minMq?": "number",
  "minQual?": "number",
});

interface ResolvedGvcfOptions {
  readonly mode: GvcfMode;
  readonly criteria: CallabilityCriteria;
  readonly writer: VcfWriter;
  readonly debug: boolean;
  readonly signal: AbortSignal | undefined;
  readonly onWarning: (message: string, lineNumber?: number) => void;
  readonly onDebug: (message: string) => void;
}

function emptySummary(): GvcfSummary {
  return {
    headers: 0,
    records: 0,
    variants: 0,
    referenceBlocks: 0,
    noCallBlocks: 0,
    noCallRecords: 0,
    skippedRecords: 0,
  };
}

/**
 * Processor converting a VCF entry stream to gVCF output lines
 *
 * Each call to {@link GvcfProcessor.process} uses its own accumulator, so a
 * processor instance can be reused across inputs. {@link GvcfProcessor.summary}
 * reports the counts of the most recent run.
 */
export class GvcfProcessor implements Processor<GvcfOptions> {
  private lastSummary: GvcfSummary = emptySummary();

  /**
   * Counts collected by the most recent (or in-progress) run
   */
  get summary(): Readonly<GvcfSummary> {
    return this.lastSummary;
  }

  /**
   * Convert entries to output lines
   *
   * @param source - Parsed entries in file order
   * @param options - Thresholds and output options
   * @yields Output lines without trailing newlines
   * @throws {ValidationError} When options are invalid
   * @throws {GvcfError} With code ABORTED when the signal fires
   */
  async *process(
    source: AsyncIterable<VcfEntry> | Iterable<VcfEntry>,
    options: GvcfOptions = {}
  ): AsyncIterable<string> {
    const resolved = resolveOptions(options);
    const summary = emptySummary();
    this.lastSummary = summary;

    if (resolved.mode === "positions") {
      yield* this.processPositions(source, resolved, summary);
    } else {
      yield* this.processBlocks(source, resolved, summary);
    }
  }

  private async *processBlocks(
    source: AsyncIterable<VcfEntry> | Iterable<VcfEntry>,
    options: ResolvedGvcfOptions,
    summary: GvcfSummary
  ): AsyncIterable<string> {
    const accumulator = new BlockAccumulator();
    const emitBlock = (block: ClosedBlock): string => {
      if (block.callability === "callable") {
        summary.referenceBlocks++;
      } else {
        summary.noCallBlocks++;
      }
      if (options.debug) {
        options.onDebug(
          `${block.callability} block ${block.start.chromosome}:${block.start.position}-${block.endPosition} (${block.recordCount} records)`
        );
      }
      return options.writer.formatRecord(block.record);
    };

    try {
      for await (const entry of source) {
        throwIfAborted(options.signal);

        if (entry.kind === "header") {
          summary.headers++;
          yield entry.text;
          continue;
        }

        const { record } = entry;
        summary.records++;

        const callable = evaluate(record, options, summary);
        if (callable === undefined) continue;

        if (isVariant(record) && callable) {
          const closed = accumulator.flush();
          if (closed !== null) yield emitBlock(closed);

          summary.variants++;
          yield options.writer.formatRecord(record);
          continue;
        }

        if (!callable) summary.noCallRecords++;

        const closed = accumulator.accept(callable ? record : withNoCallGenotype(record), callable);
        if (closed !== null) yield emitBlock(closed);
      }

      // The source may end early because it was cancelled
      throwIfAborted(options.signal);
    } catch (error) {
      const pending = accumulator.flush();
      if (pending !== null) {
        options.onWarning(
          `Flushed open block at ${pending.start.chromosome}:${pending.start.position} before stopping: ${error instanceof Error ? error.message : String(error)}`
        );
        yield emitBlock(pending);
      }
      throw error;
    }

    const closed = accumulator.flush();
    if (closed !== null) yield emitBlock(closed);
  }

  private async *processPositions(
    source: AsyncIterable<VcfEntry> | Iterable<VcfEntry>,
    options: ResolvedGvcfOptions,
    summary: GvcfSummary
  ): AsyncIterable<string> {
    for await (const entry of source) {
      throwIfAborted(options.signal);

      if (entry.kind === "header") {
        summary.headers++;
        yield entry.text;
        continue;
      }

      const { record } = entry;
      summary.records++;

      const callable = evaluate(record, options, summary);
      if (callable === undefined) continue;

      if (!callable) {
        summary.noCallRecords++;
        yield options.writer.formatRecord(withNoCallGenotype(record));
        continue;
      }

      if (isVariant(record)) summary.variants++;
      yield options.writer.formatRecord(record);
    }

    throwIfAborted(options.signal);
  }
}

/**
 * Convert entries to gVCF output lines with a fresh processor
 *
 * @example
 * ```typescript
 * const lines = convertToGvcf(parser.parseString(vcfText), { minGq: 20, minDp: 10 });
 * ```
 */
export function convertToGvcf(
  source: AsyncIterable<VcfEntry> | Iterable<VcfEntry>,
  options: GvcfOptions = {}
): AsyncIterable<string> {
  return new GvcfProcessor().process(source, options);
}

/**
 * Run the callability filter, turning a FORMAT/sample mismatch into a skip
 *
 * @returns The filter result, or undefined when the record is skipped
 */
function evaluate(
  record: VcfRecord,
  options: ResolvedGvcfOptions,
  summary: GvcfSummary
): boolean | undefined {
  try {
    return passesCallabilityFilter(record, options.criteria);
  } catch (error) {
    if (!(error instanceof CallArityError)) throw error;

    summary.skippedRecords++;
    options.onWarning(
      `Skipping ${record.chromosome}:${record.position}: ${error.message}`,
      record.lineNumber
    );
    return undefined;
  }
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new GvcfError("Operation aborted during gVCF conversion", "ABORTED");
  }
}

function resolveOptions(options: GvcfOptions): ResolvedGvcfOptions {
  const validationResult = GvcfOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid gVCF options: ${validationResult.summary}`);
  }

  return {
    mode: options.mode ?? "blocks",
    criteria: {
      minGq: options.minGq ?? 0,
      minDp: options.minDp ?? 0,
      ...(options.requirePassFilter !== undefined && {
        requirePassFilter: options.requirePassFilter,
      }),
      ...(options.maxMq0 !== undefined && { maxMq0: options.maxMq0 }),
      ...(options.minMq !== undefined && { minMq: options.minMq }),
      ...(options.minQual !== undefined && { minQual: options.minQual }),
    },
    writer: new VcfWriter(options.sampleId !== undefined ? { key: options.sampleId } : {}),
    debug: options.debug ?? false,
    signal: options.signal,
    onWarning:
      options.onWarning ??
      ((message, lineNumber) =>
        console.warn(lineNumber !== undefined ? `Line ${lineNumber}: ${message}` : message)),
    onDebug: options.onDebug ?? ((message) => console.error(message)),
  };
}
