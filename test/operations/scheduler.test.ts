/**
 * Tests for the bounded-concurrency genome scheduler
 */

import { Effect, Logger, LogLevel } from "effect";
import { describe, expect, test } from "vitest";
import {
  CompressionError,
  DegenerateGenomeError,
  FileError,
  ParseError,
  SequenceError,
  ValidationError,
} from "../../src/errors";
import { ArscCalculator } from "../../src/operations/arsc";
import { classifyFailure, runGenomeJob, runGenomes } from "../../src/operations/scheduler";
import type { GenomeFailure, GenomeMetrics, GenomeSource, JobResult } from "../../src/types";

const QUIET = { logLevel: "none" } as const;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function failureOf(result: JobResult | undefined): GenomeFailure {
  if (result === undefined || result.success) {
    throw new Error(`expected a failure result, got ${JSON.stringify(result)}`);
  }
  return result.failure;
}

function metricsOf(result: JobResult | undefined): GenomeMetrics {
  if (result === undefined || !result.success) {
    throw new Error(`expected a success result, got ${JSON.stringify(result)}`);
  }
  return result.metrics;
}

function failingSource(genomeId: string, error: unknown): GenomeSource {
  return {
    genomeId,
    sequences: (function* () {
      yield "MKT";
      throw error;
    })(),
  };
}

describe("runGenomes", () => {
  test("should return one result per genome, isolating the degenerate one", async () => {
    const results = await runGenomes(
      [
        { genomeId: "G1", sequences: ["MK", "MKT"] },
        { genomeId: "G2", sequences: ["XXX"] },
        { genomeId: "G3", sequences: ["ACDEFGHIKLMNPQRSTVWY"] },
      ],
      { ...QUIET, workerCount: 3 }
    );

    expect(results.map((r) => [r.genomeId, r.success])).toEqual([
      ["G1", true],
      ["G2", false],
      ["G3", true],
    ]);

    expect(failureOf(results[1])).toEqual({
      genomeId: "G2",
      errorKind: "DegenerateGenome",
      message: "Genome 'G2' has no recognized residues (1 sequences, 3 unrecognized symbols)",
    });

    expect(metricsOf(results[0]).nArsc).toBeCloseTo(0.4, 12);
  });

  test("should produce the same results for one worker and many", async () => {
    const batch = (): GenomeSource[] => [
      { genomeId: "A", sequences: ["MKTAYIAKQRQISFVKSHFSRQ", "GSHM"] },
      { genomeId: "B", sequences: ["XXXX"] },
      { genomeId: "C", sequences: ["WWCC", "nnqq", ""] },
      { genomeId: "D", sequences: [] },
      { genomeId: "E", sequences: ["LLLLLLLLLL"] },
    ];

    const sequential = await runGenomes(batch(), { ...QUIET, workerCount: 1 });
    const parallel = await runGenomes(batch(), { ...QUIET, workerCount: 4 });
    expect(parallel).toEqual(sequential);
  });

  test("should return an empty collection for an empty batch", async () => {
    expect(await runGenomes([], QUIET)).toEqual([]);
  });

  test("should classify errors raised while reading a genome", async () => {
    const results = await runGenomes(
      [
        failingSource("parse", new ParseError("Empty FASTA header", "FASTA", 4)),
        failingSource("residues", new SequenceError("Invalid residue characters", "p1", 2)),
        failingSource("file", new FileError("read operation failed", "/x.faa", "read")),
        failingSource("other", new Error("disk gone")),
        { genomeId: "ok", sequences: ["MK"] },
      ],
      { ...QUIET, workerCount: 2 }
    );

    const kinds = results.map((r) => (r.success ? "ok" : r.failure.errorKind));
    expect(kinds).toEqual(["ParseError", "ParseError", "IOError", "IOError", "ok"]);

    expect(failureOf(results[3]).message).toBe("disk gone");
  });

  test("should never run more genomes at once than workerCount", async () => {
    let active = 0;
    let maxActive = 0;

    const tracked = (genomeId: string): GenomeSource => ({
      genomeId,
      sequences: (async function* () {
        active++;
        maxActive = Math.max(maxActive, active);
        await sleep(15);
        yield "MK";
        active--;
      })(),
    });

    const results = await runGenomes(["a", "b", "c", "d", "e"].map(tracked), {
      ...QUIET,
      workerCount: 2,
    });

    expect(results).toHaveLength(5);
    expect(maxActive).toBe(2);
    expect(active).toBe(0);
  });

  test("should keep input order while reporting progress in completion order", async () => {
    const delayed = (genomeId: string, ms: number): GenomeSource => ({
      genomeId,
      sequences: (async function* () {
        await sleep(ms);
        yield "MK";
      })(),
    });

    const progress: Array<[string, number, number]> = [];
    const results = await runGenomes([delayed("slow", 40), delayed("fast", 0)], {
      ...QUIET,
      workerCount: 2,
      onResult: (result: JobResult, completed, total) => {
        progress.push([result.genomeId, completed, total]);
      },
    });

    expect(results.map((r) => r.genomeId)).toEqual(["slow", "fast"]);
    expect(progress).toEqual([
      ["fast", 1, 2],
      ["slow", 2, 2],
    ]);
  });

  test("should reject invalid worker counts", async () => {
    await expect(runGenomes([], { workerCount: 0 })).rejects.toBeInstanceOf(ValidationError);
    await expect(runGenomes([], { workerCount: 1.5 })).rejects.toThrow("Invalid run options");
  });
});

describe("runGenomeJob", () => {
  test("should wrap a successful genome as a success result", async () => {
    const result = await Effect.runPromise(
      runGenomeJob({ genomeId: "G1", sequences: ["MK", "MKT"] }, new ArscCalculator())
    );
    expect(result.success).toBe(true);
    expect(result.genomeId).toBe("G1");
  });

  test("should turn a thrown error into a failure result", async () => {
    const result = await Effect.runPromise(
      runGenomeJob(failingSource("bad", new Error("boom")), new ArscCalculator()).pipe(
        Logger.withMinimumLogLevel(LogLevel.None)
      )
    );
    expect(result).toEqual({
      success: false,
      genomeId: "bad",
      failure: { genomeId: "bad", errorKind: "IOError", message: "boom" },
    });
  });
});

describe("classifyFailure", () => {
  test("should map error classes onto failure kinds", () => {
    expect(classifyFailure(new DegenerateGenomeError("g", 0, 0))).toBe("DegenerateGenome");
    expect(classifyFailure(new ParseError("bad", "FASTA"))).toBe("ParseError");
    expect(classifyFailure(new ValidationError("bad"))).toBe("ParseError");
    expect(classifyFailure(new SequenceError("bad", "p1"))).toBe("ParseError");
    expect(classifyFailure(new FileError("gone", "/x", "read"))).toBe("IOError");
    expect(classifyFailure(new CompressionError("corrupt", "gzip", "decompress"))).toBe("IOError");
    expect(classifyFailure("a string")).toBe("IOError");
  });
});
