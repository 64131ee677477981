/**
 * FASTA parser for protein sequences
 *
 * Handles the messiness of real-world proteome files:
 * - Wrapped and unwrapped sequences
 * - Comment (`;`) and blank lines
 * - CRLF line endings
 * - Mixed case, stop (`*`) and gap (`-`, `.`) symbols
 */

import { type } from "arktype";
import { SequenceError, ValidationError } from "../errors";
import { readToString } from "../io/file-reader";
import type { FileReaderOptions, ParserOptions, ProteinSequence } from "../types";
import { ProteinResiduesSchema } from "../types";
import { AbstractParser } from "./abstract-parser";

export type FastaParserOptions = ParserOptions;

const FastaParserOptionsSchema = type({
  "skipValidation?": "boolean",
  "maxLineLength?": "number.integer>0",
  "trackLineNumbers?": "boolean",
});

interface PendingRecord {
  readonly id: string;
  readonly description: string | undefined;
  readonly lineNumber: number;
  readonly chunks: string[];
}

/**
 * Streaming FASTA parser yielding one protein record at a time
 *
 * Structural problems (sequence data before the first header, an empty
 * header, an over-long line) go to `onError`, which throws a `ParseError` by
 * default. Residue lines containing characters outside the protein alphabet
 * throw a `SequenceError` naming the record, unless `skipValidation` is set.
 * A header with no residue lines yields a record with an empty sequence.
 * Empty records and repeated record ids are reported through `onWarning`.
 *
 * @example
 * ```typescript
 * const parser = new FastaParser();
 * for await (const record of parser.parseString(">sp|P1 kinase\nMKT\nLV\n")) {
 *   console.log(record.id, record.length); // "sp|P1" 5
 * }
 * ```
 */
export class FastaParser extends AbstractParser<ProteinSequence> {
  protected getDefaultOptions(): Partial<FastaParserOptions> {
    return {
      maxLineLength: 1_000_000,
    };
  }

  constructor(options: FastaParserOptions = {}) {
    const validationResult = FastaParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid FASTA parser options: ${validationResult.summary}`);
    }
    super(options);
  }

  protected getFormatName(): string {
    return "FASTA";
  }

  async *parseString(data: string): AsyncIterable<ProteinSequence> {
    yield* this.parseLines(data.split(/\r?\n/));
  }

  /**
   * Parse a FASTA file; gzip and zstd inputs are decompressed transparently
   *
   * The file is read when iteration starts, not when this method is called.
   *
   * @throws {FileError} When the file cannot be read
   */
  async *parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<ProteinSequence> {
    if (filePath.length === 0) {
      throw new ValidationError("filePath must not be empty");
    }
    this.checkAborted();
    const text = await readToString(filePath, options);
    yield* this.parseLines(text.split(/\r?\n/));
  }

  private *parseLines(lines: readonly string[]): Generator<ProteinSequence> {
    let pending: PendingRecord | undefined;
    // Set after a rejected header so its residue lines are not reported again
    let skippingRecord = false;
    const seenIds = new Set<string>();

    for (let index = 0; index < lines.length; index++) {
      const line = lines[index] ?? "";
      const lineNumber = index + 1;

      if (line.length > this.options.maxLineLength) {
        this.options.onError(
          `Line too long (${line.length} > ${this.options.maxLineLength})`,
          lineNumber
        );
        continue;
      }

      const trimmed = line.trim();
      if (trimmed.length === 0 || trimmed.startsWith(";")) {
        continue;
      }

      if (trimmed.startsWith(">")) {
        this.checkAborted();
        if (pending !== undefined) {
          yield this.finalizeRecord(pending);
        }
        pending = this.parseHeader(trimmed, lineNumber);
        skippingRecord = pending === undefined;
        if (pending !== undefined) {
          if (seenIds.has(pending.id)) {
            this.options.onWarning(`Duplicate sequence id '${pending.id}'`, lineNumber);
          }
          seenIds.add(pending.id);
        }
        continue;
      }

      if (pending === undefined) {
        if (!skippingRecord) {
          this.options.onError("Sequence data found before header", lineNumber);
        }
        continue;
      }

      const residues = trimmed.replace(/\s+/g, "");
      if (!this.options.skipValidation) {
        const check = ProteinResiduesSchema(residues);
        if (check instanceof type.errors) {
          throw new SequenceError(
            `Invalid residue characters in sequence '${pending.id}': ${check.summary}`,
            pending.id,
            lineNumber
          );
        }
      }
      pending.chunks.push(residues);
    }

    if (pending !== undefined) {
      yield this.finalizeRecord(pending);
    }
  }

  private parseHeader(headerLine: string, lineNumber: number): PendingRecord | undefined {
    const content = headerLine.slice(1).trim();
    if (content.length === 0) {
      this.options.onError("Empty FASTA header", lineNumber);
      return undefined;
    }

    const splitAt = content.search(/\s/);
    const id = splitAt === -1 ? content : content.slice(0, splitAt);
    const description = splitAt === -1 ? "" : content.slice(splitAt).trim();

    return {
      id,
      description: description.length > 0 ? description : undefined,
      lineNumber,
      chunks: [],
    };
  }

  private finalizeRecord(pending: PendingRecord): ProteinSequence {
    const sequence = pending.chunks.join("");
    if (sequence.length === 0) {
      this.options.onWarning(`Record '${pending.id}' has no residues`, pending.lineNumber);
    }
    return {
      format: "fasta",
      id: pending.id,
      ...(pending.description !== undefined && { description: pending.description }),
      sequence,
      length: sequence.length,
      ...(this.options.trackLineNumbers && { lineNumber: pending.lineNumber }),
    };
  }
}
