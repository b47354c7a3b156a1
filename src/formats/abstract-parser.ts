/**
 * Abstract base parser with shared option merging and interrupt handling
 *
 * Gives every line-oriented parser the same AbortSignal behaviour and the
 * same warning sink without imposing how lines become records.
 */

import { GvcfError } from "../errors";
import type { ParserOptions } from "../types";

/**
 * Options every parser can rely on after defaults are applied
 */
export interface ResolvedParserOptions {
  skipValidation: boolean;
  maxLineLength: number;
  trackLineNumbers: boolean;
  onWarning: (warning: string, lineNumber?: number) => void;
  signal?: AbortSignal;
}

/**
 * Abstract parser base class
 *
 * @template T - The entry type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: TOptions & ResolvedParserOptions;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    const baseDefaults: ResolvedParserOptions = {
      skipValidation: false,
      maxLineLength: 1_000_000,
      trackLineNumbers: true,
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
      },
    };

    // Merge in order: base -> format-specific -> user options
    this.options = { ...baseDefaults, ...this.getDefaultOptions(), ...withoutUndefined(options) };
    this.interruptHandler = new InterruptHandler(this.options.signal);
  }

  /**
   * Format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  /**
   * Check if parsing should stop; call this in parsing loops
   */
  protected checkAborted(): void {
    this.interruptHandler.throwIfAborted(`${this.getFormatName()} parsing`);
  }

  /**
   * Parse entries from an in-memory string
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse entries from a file, decompressing by extension
   */
  abstract parseFile(filePath: string): AsyncIterable<T>;

  /**
   * Parse entries from a binary stream
   */
  abstract parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T>;

  /**
   * Format identifier used in messages (e.g., "VCF")
   */
  protected abstract getFormatName(): string;
}

/**
 * Drop keys whose value is undefined so they do not mask defaults
 */
function withoutUndefined<T extends object>(options: T): T {
  const entries = Object.entries(options).filter(([, value]) => value !== undefined);
  return Object.fromEntries(entries) as T;
}

/**
 * AbortSignal adapter shared by all parsers
 */
class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * @throws {GvcfError} With code ABORTED once the signal has fired
   */
  throwIfAborted(context: string): void {
    if (this.signal?.aborted) {
      throw new GvcfError(`Operation aborted during ${context}`, "ABORTED");
    }
  }
}
