/**
 * Abstract base parser with shared option merging and interrupt handling
 *
 * Formats keep their own parsing logic; the base class only resolves the
 * common options and offers AbortSignal checks for parsing loops.
 */

import { ParseError } from "../errors";
import type { FileReaderOptions, ParserOptions } from "../types";

/**
 * Parser options after defaults have been applied
 */
export interface ResolvedParserOptions {
  readonly skipValidation: boolean;
  readonly maxLineLength: number;
  readonly trackLineNumbers: boolean;
  readonly signal?: AbortSignal;
  readonly onError: (error: string, lineNumber?: number) => void;
  readonly onWarning: (warning: string, lineNumber?: number) => void;
}

/**
 * @template T - Record type the parser produces
 */
export abstract class AbstractParser<T> {
  protected readonly options: ResolvedParserOptions;

  constructor(options: ParserOptions) {
    // Merge in order: base -> format-specific -> user options
    const baseDefaults = {
      skipValidation: false,
      maxLineLength: 1_000_000,
      trackLineNumbers: true,
      onError: (error: string, lineNumber?: number): void => {
        throw new ParseError(error, this.getFormatName(), lineNumber);
      },
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
      },
    };

    this.options = { ...baseDefaults, ...this.getDefaultOptions(), ...options };
  }

  /**
   * Format-specific defaults, applied between the base defaults and user options
   */
  protected abstract getDefaultOptions(): Partial<ParserOptions>;

  /**
   * Throw if the caller aborted; call from parsing loops
   * @throws {ParseError} If the signal has been aborted
   */
  protected checkAborted(): void {
    if (this.options.signal?.aborted === true) {
      throw new ParseError("Operation was aborted", "ABORTED");
    }
  }

  /**
   * Parse records from an in-memory string
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse records from a (possibly compressed) file
   */
  abstract parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<T>;

  /**
   * Format identifier used in error messages, e.g. "FASTA"
   */
  protected abstract getFormatName(): string;
}
