/**
 * Tests for length filtering and cross-genome summaries
 */

import { describe, expect, test } from "vitest";
import { ValidationError } from "../../src/errors";
import { emptyResidueCounts } from "../../src/operations/core/composition";
import { filterByLength, formatSummary, summarizeMetrics } from "../../src/operations/summary";
import type { GenomeMetrics, JobResult } from "../../src/types";

function makeMetrics(
  genomeId: string,
  values: { n: number; c: number; s: number; w: number; residues?: number }
): GenomeMetrics {
  return {
    genomeId,
    nArsc: values.n,
    cArsc: values.c,
    sArsc: values.s,
    avgResMw: values.w,
    totalResidues: values.residues ?? 100,
    sequenceCount: 1,
    unknownCount: 0,
    composition: emptyResidueCounts(),
  };
}

function success(genomeId: string, residues: number): JobResult {
  return {
    success: true,
    genomeId,
    metrics: makeMetrics(genomeId, { n: 0.3, c: 3, s: 0.04, w: 110, residues }),
  };
}

function failure(genomeId: string): JobResult {
  return {
    success: false,
    genomeId,
    failure: { genomeId, errorKind: "DegenerateGenome", message: "no residues" },
  };
}

describe("filterByLength", () => {
  const results = [success("short", 50), failure("broken"), success("mid", 100), success("long", 500)];

  test("should apply inclusive bounds to successes and keep failures", () => {
    const kept = filterByLength(results, { minLength: 100, maxLength: 500 });
    expect(kept.map((r) => r.genomeId)).toEqual(["broken", "mid", "long"]);
  });

  test("should apply a single bound", () => {
    expect(filterByLength(results, { maxLength: 99 }).map((r) => r.genomeId)).toEqual([
      "short",
      "broken",
    ]);
  });

  test("should keep everything without bounds", () => {
    expect(filterByLength(results, {})).toEqual(results);
  });

  test("should reject a minimum above the maximum", () => {
    expect(() => filterByLength(results, { minLength: 10, maxLength: 5 })).toThrow(
      ValidationError
    );
  });

  test("should reject negative bounds", () => {
    expect(() => filterByLength(results, { minLength: -1 })).toThrow("Invalid length filter");
  });
});

describe("summarizeMetrics", () => {
  test("should return undefined for no genomes", () => {
    expect(summarizeMetrics([])).toBeUndefined();
  });

  test("should compute mean, sample stdev, min and max", () => {
    const summary = summarizeMetrics([
      makeMetrics("a", { n: 0.25, c: 3, s: 0, w: 110 }),
      makeMetrics("b", { n: 0.75, c: 5, s: 0.5, w: 120 }),
    ]);

    expect(summary?.count).toBe(2);
    expect(summary?.nArsc.mean).toBe(0.5);
    expect(summary?.nArsc.stdev).toBeCloseTo(Math.sqrt(0.125), 12);
    expect(summary?.cArsc).toEqual({ mean: 4, stdev: Math.SQRT2, min: 3, max: 5 });
    expect(summary?.sArsc.min).toBe(0);
    expect(summary?.sArsc.max).toBe(0.5);
    expect(summary?.avgResMw.mean).toBe(115);
    expect(summary?.avgResMw.stdev).toBeCloseTo(Math.sqrt(50), 12);
  });

  test("should report zero spread for a single genome", () => {
    const summary = summarizeMetrics([makeMetrics("a", { n: 0.3, c: 3.1, s: 0.02, w: 111 })]);
    expect(summary?.nArsc).toEqual({ mean: 0.3, stdev: 0, min: 0.3, max: 0.3 });
  });
});

describe("formatSummary", () => {
  test("should render a 70-column table", () => {
    const summary = summarizeMetrics([makeMetrics("a", { n: 0.5, c: 3.25, s: 0.125, w: 118.5 })]);
    if (summary === undefined) throw new Error("expected a summary");

    expect(formatSummary(summary, 3).split("\n")).toEqual([
      "=".repeat(70),
      "                          SUMMARY STATISTICS",
      "=".repeat(70),
      "Metric       Mean             Stdev            Min              Max",
      "-".repeat(70),
      "N_ARSC       0.500            0.000            0.500            0.500",
      "C_ARSC       3.250            0.000            3.250            3.250",
      "S_ARSC       0.125            0.000            0.125            0.125",
      "AvgResMW     118.500          0.000            118.500          118.500",
      "-".repeat(70),
      "Count        1",
      "=".repeat(70),
    ]);
  });
});
