/**
 * Reference block accumulator
 *
 * Owns the single open block of a conversion run and decides, record by
 * record, whether the block extends or closes. Blocks are emitted as the
 * start record with INFO replaced by `END=<last covered position>`.
 *
 * @example
 * ```typescript
 * const accumulator = new BlockAccumulator();
 * accumulator.accept(pos10, true); // null, block opened
 * accumulator.accept(pos11, true); // null, block extended
 * accumulator.flush()?.record.columns.info; // "END=11"
 * ```
 */

import type { VcfRecord } from "../../formats/vcf";
import { recordEndValue, withInfo, withNoCallGenotype } from "../../formats/vcf";

/**
 * Callability of the open block; "unset" means no block is open
 */
export type BlockCallability = "unset" | "callable" | "no-call";

/**
 * A block that has been closed and is ready to be written
 */
export interface ClosedBlock {
  /** Output record: start record with INFO rewritten to END */
  readonly record: VcfRecord;
  /** First record absorbed */
  readonly start: VcfRecord;
  /** Last record absorbed, or null for a single-record block */
  readonly end: VcfRecord | null;
  /** Last position covered by the block */
  readonly endPosition: number;
  /** Number of input records merged */
  readonly recordCount: number;
  readonly callability: Exclude<BlockCallability, "unset">;
}

/**
 * State machine merging contiguous reference/no-call records into blocks
 *
 * A new record closes the open block when it is on another chromosome, when
 * it starts more than one base past the block's current end, or when its
 * callability differs from the block's.
 */
export class BlockAccumulator {
  private start: VcfRecord | null = null;
  private end: VcfRecord | null = null;
  private callability: BlockCallability = "unset";
  private recordCount = 0;

  /**
   * Whether a block is currently open
   */
  get isOpen(): boolean {
    return this.start !== null;
  }

  /**
   * Current callability state
   */
  get state(): BlockCallability {
    return this.callability;
  }

  /**
   * Absorb a filter-evaluated record
   *
   * @param record Reference/no-call record, already rewritten to no-call if
   *   it failed the filter
   * @param callable Result of the callability filter
   * @returns The block closed to make room for this record, if any
   */
  accept(record: VcfRecord, callable: boolean): ClosedBlock | null {
    const incoming = callable ? "callable" : "no-call";

    if (this.start === null) {
      this.open(record, incoming);
      return null;
    }

    const gap = record.position - recordEndValue(this.end ?? this.start);
    if (record.chromosome !== this.start.chromosome || gap > 1 || incoming !== this.callability) {
      const closed = this.flush();
      this.open(record, incoming);
      return closed;
    }

    this.end = record;
    this.recordCount++;
    return null;
  }

  /**
   * Close the open block
   *
   * @returns The closed block, or null when none was open
   */
  flush(): ClosedBlock | null {
    const { start, end, callability } = this;
    if (start === null || callability === "unset") {
      return null;
    }

    const last = end ?? start;
    const endPosition = recordEndValue(last) + last.referenceAllele.length - 1;

    let output = withInfo(start, `END=${endPosition}`);
    if (callability === "no-call") {
      output = withNoCallGenotype(output);
    }

    const closed: ClosedBlock = {
      record: output,
      start,
      end,
      endPosition,
      recordCount: this.recordCount,
      callability,
    };

    this.reset();
    return closed;
  }

  private open(record: VcfRecord, callability: Exclude<BlockCallability, "unset">): void {
    this.start = record;
    this.end = null;
    this.callability = callability;
    this.recordCount = 1;
  }

  private reset(): void {
    this.start = null;
    this.end = null;
    this.callability = "unset";
    this.recordCount = 0;
  }
}
