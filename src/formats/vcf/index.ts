/**
 * VCF (Variant Call Format) module exports
 *
 * @example Streaming a file
 * ```typescript
 * import { VcfParser } from './formats/vcf';
 *
 * const parser = new VcfParser();
 * for await (const entry of parser.parseFile('sample.vcf.gz')) {
 *   if (entry.kind === 'record') {
 *     console.log(`${entry.record.chromosome}:${entry.record.position}`);
 *   }
 * }
 * ```
 *
 * @module vcf
 */

export { parseVcfRecord, VcfParser } from "./parser";

export type {
  VariantType,
  VcfColumn,
  VcfColumns,
  VcfEntry,
  VcfParserOptions,
  VcfRecord,
} from "./types";

export { VCF_COLUMNS, VCF_CONSTANTS } from "./types";

export {
  decodeCall,
  decodeInfo,
  getGenotype,
  parseInfoField,
  parseIntegerValue,
  parseNumericValue,
  recordEndValue,
  withInfo,
  withNoCallGenotype,
} from "./utils";

export { formatVcfRecord, VcfWriter } from "./writer";
