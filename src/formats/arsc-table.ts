/**
 * Tab-separated ARSC result tables
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import { writeString } from "../io/file-writer";
import type { GenomeMetrics, JobResult, WriteOptions } from "../types";
import { CANONICAL_RESIDUES } from "../types";

export interface ArscTableOptions {
  /** Emit the column header line (default: true) */
  includeHeader?: boolean;
  /** Append per-residue shares and a TotalAALength column (default: false) */
  includeComposition?: boolean;
  /** Digits after the decimal point (default: 6) */
  decimalPlaces?: number;
}

const ArscTableOptionsSchema = type({
  "includeHeader?": "boolean",
  "includeComposition?": "boolean",
  "decimalPlaces?": "number.integer",
}).narrow((options, ctx) => {
  if (
    options.decimalPlaces !== undefined &&
    (options.decimalPlaces < 0 || options.decimalPlaces > 20)
  ) {
    return ctx.reject({
      expected: "decimalPlaces between 0 and 20",
      actual: String(options.decimalPlaces),
      path: ["decimalPlaces"],
    });
  }
  return true;
});

const DEFAULT_TABLE_OPTIONS: Required<ArscTableOptions> = {
  includeHeader: true,
  includeComposition: false,
  decimalPlaces: 6,
};

export const METRIC_COLUMNS = ["Genome", "N_ARSC", "C_ARSC", "S_ARSC", "AvgResMW"] as const;

/**
 * Formats successful genome results as TSV; failures are left out
 *
 * @example
 * ```typescript
 * const writer = new ArscTableWriter({ decimalPlaces: 3 });
 * process.stdout.write(writer.formatTable(results));
 * // Genome  N_ARSC  C_ARSC  S_ARSC  AvgResMW
 * // G1      0.400   3.200   0.400   123.968
 * ```
 */
export class ArscTableWriter {
  private readonly options: Required<ArscTableOptions>;

  constructor(options: ArscTableOptions = {}) {
    const validationResult = ArscTableOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid ARSC table options: ${validationResult.summary}`);
    }
    this.options = { ...DEFAULT_TABLE_OPTIONS, ...options };
  }

  formatHeader(): string {
    const columns: string[] = [...METRIC_COLUMNS];
    if (this.options.includeComposition) {
      columns.push(...CANONICAL_RESIDUES, "TotalAALength");
    }
    return columns.join("\t");
  }

  formatRecord(metrics: GenomeMetrics): string {
    const { decimalPlaces } = this.options;
    const fields = [
      metrics.genomeId,
      metrics.nArsc.toFixed(decimalPlaces),
      metrics.cArsc.toFixed(decimalPlaces),
      metrics.sArsc.toFixed(decimalPlaces),
      metrics.avgResMw.toFixed(decimalPlaces),
    ];
    if (this.options.includeComposition) {
      for (const code of CANONICAL_RESIDUES) {
        fields.push(metrics.composition[code].toFixed(decimalPlaces));
      }
      fields.push(String(metrics.totalResidues));
    }
    return fields.join("\t");
  }

  /**
   * Header (when enabled) plus one line per successful genome, in input
   * order, each terminated by a newline
   */
  formatTable(results: readonly JobResult[]): string {
    const lines: string[] = [];
    if (this.options.includeHeader) {
      lines.push(this.formatHeader());
    }
    for (const result of results) {
      if (result.success) {
        lines.push(this.formatRecord(result.metrics));
      }
    }
    return lines.map((line) => `${line}\n`).join("");
  }

  /**
   * Write the table to a file; a `.gz` path is gzip-compressed
   */
  async writeToFile(
    path: string,
    results: readonly JobResult[],
    options?: WriteOptions
  ): Promise<void> {
    await writeString(path, this.formatTable(results), options);
  }
}

/**
 * One `genomeId<TAB>errorKind<TAB>message` line per failed genome
 */
export function formatFailures(results: readonly JobResult[]): string {
  return results
    .flatMap((result) =>
      result.success
        ? []
        : [
            `${result.genomeId}\t${result.failure.errorKind}\t${result.failure.message.replace(/[\t\r\n]+/g, " ")}\n`,
          ]
    )
    .join("");
}
