/**
 * gVCF conversion operations
 *
 * @module operations
 */

export {
  BlockAccumulator,
  type BlockCallability,
  type ClosedBlock,
} from "./core/block-accumulator";
export { type CallabilityCriteria, passesCallabilityFilter } from "./core/callability";
export { classifyVariantType, isReferenceCandidate, isVariant } from "./core/classification";
export { convertToGvcf, GvcfProcessor } from "./gvcf";
export { DEFAULT_SAMPLE_ID_PATTERN, resolveSampleId } from "./sample-id";
export type { GvcfMode, GvcfOptions, GvcfSummary, Processor } from "./types";
