/**
 * Batch-level post-processing of genome results
 *
 * Length filtering and cross-genome summary statistics for a finished run.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { GenomeMetrics, JobResult } from "../types";

export interface LengthFilter {
  /** Minimum recognized residues, inclusive */
  minLength?: number;
  /** Maximum recognized residues, inclusive */
  maxLength?: number;
}

const LengthFilterSchema = type({
  "minLength?": "number.integer>=0",
  "maxLength?": "number.integer>=0",
}).narrow((filter, ctx) => {
  if (
    filter.minLength !== undefined &&
    filter.maxLength !== undefined &&
    filter.minLength > filter.maxLength
  ) {
    return ctx.reject({
      expected: "minLength <= maxLength",
      actual: `${filter.minLength} > ${filter.maxLength}`,
      path: ["minLength"],
    });
  }
  return true;
});

export interface MetricSummary {
  readonly mean: number;
  /** Sample standard deviation; 0 for a single genome */
  readonly stdev: number;
  readonly min: number;
  readonly max: number;
}

export interface MetricsSummary {
  readonly count: number;
  readonly nArsc: MetricSummary;
  readonly cArsc: MetricSummary;
  readonly sArsc: MetricSummary;
  readonly avgResMw: MetricSummary;
}

/**
 * Drop successful genomes whose residue total falls outside the bounds
 *
 * Failures are always kept so they can still be reported.
 *
 * @throws {ValidationError} If the bounds are invalid
 */
export function filterByLength(results: readonly JobResult[], filter: LengthFilter): JobResult[] {
  const validation = LengthFilterSchema(filter);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid length filter: ${validation.summary}`);
  }

  return results.filter((result) => {
    if (!result.success) return true;
    const length = result.metrics.totalResidues;
    if (filter.minLength !== undefined && length < filter.minLength) return false;
    if (filter.maxLength !== undefined && length > filter.maxLength) return false;
    return true;
  });
}

function summarize(values: readonly number[]): MetricSummary {
  const n = values.length;
  const mean = values.reduce((sum, v) => sum + v, 0) / n;
  const variance = n > 1 ? values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (n - 1) : 0;

  return {
    mean,
    stdev: Math.sqrt(variance),
    min: Math.min(...values),
    max: Math.max(...values),
  };
}

/**
 * Mean, sample standard deviation, min and max of each metric across genomes
 * @returns undefined for an empty list
 */
export function summarizeMetrics(metrics: readonly GenomeMetrics[]): MetricsSummary | undefined {
  if (metrics.length === 0) return undefined;

  return {
    count: metrics.length,
    nArsc: summarize(metrics.map((m) => m.nArsc)),
    cArsc: summarize(metrics.map((m) => m.cArsc)),
    sArsc: summarize(metrics.map((m) => m.sArsc)),
    avgResMw: summarize(metrics.map((m) => m.avgResMw)),
  };
}

const SUMMARY_WIDTH = 70;
const LABEL_WIDTH = 12;
const VALUE_WIDTH = 16;

const SUMMARY_ROWS: ReadonlyArray<[label: string, key: keyof Omit<MetricsSummary, "count">]> = [
  ["N_ARSC", "nArsc"],
  ["C_ARSC", "cArsc"],
  ["S_ARSC", "sArsc"],
  ["AvgResMW", "avgResMw"],
];

function center(text: string, width: number): string {
  const left = Math.floor((width - text.length) / 2);
  return " ".repeat(Math.max(0, left)) + text;
}

/**
 * Render a summary as a fixed-width text table
 */
export function formatSummary(summary: MetricsSummary, decimalPlaces = 6): string {
  const cell = (value: number): string => value.toFixed(decimalPlaces).padEnd(VALUE_WIDTH);
  const row = (cells: string[]): string => cells.join(" ").trimEnd();

  const lines = [
    "=".repeat(SUMMARY_WIDTH),
    center("SUMMARY STATISTICS", SUMMARY_WIDTH),
    "=".repeat(SUMMARY_WIDTH),
    row([
      "Metric".padEnd(LABEL_WIDTH),
      ...["Mean", "Stdev", "Min", "Max"].map((h) => h.padEnd(VALUE_WIDTH)),
    ]),
    "-".repeat(SUMMARY_WIDTH),
  ];

  for (const [label, key] of SUMMARY_ROWS) {
    const stats = summary[key];
    lines.push(
      row([
        label.padEnd(LABEL_WIDTH),
        cell(stats.mean),
        cell(stats.stdev),
        cell(stats.min),
        cell(stats.max),
      ])
    );
  }

  lines.push("-".repeat(SUMMARY_WIDTH));
  lines.push(row(["Count".padEnd(LABEL_WIDTH), String(summary.count)]));
  lines.push("=".repeat(SUMMARY_WIDTH));

  return lines.join("\n");
}
