/**
 * Tests for ARSC result tables
 */

import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gunzipSync } from "fflate";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { ValidationError } from "../../src/errors";
import { ArscTableWriter, formatFailures } from "../../src/formats/arsc-table";
import { ArscCalculator } from "../../src/operations/arsc";
import type { GenomeMetrics, JobResult } from "../../src/types";
import { CANONICAL_RESIDUES } from "../../src/types";

const HEADER = "Genome\tN_ARSC\tC_ARSC\tS_ARSC\tAvgResMW";
const G1_ROW = "G1\t0.400000\t3.200000\t0.400000\t123.967700";

let g1: GenomeMetrics;
let results: JobResult[];

beforeAll(async () => {
  g1 = await new ArscCalculator().calculate("G1", ["MK", "MKT"]);
  results = [
    { success: true, genomeId: "G1", metrics: g1 },
    {
      success: false,
      genomeId: "G2",
      failure: {
        genomeId: "G2",
        errorKind: "DegenerateGenome",
        message: "Genome 'G2' has no recognized residues (1 sequences, 3 unrecognized symbols)",
      },
    },
  ];
});

describe("ArscTableWriter", () => {
  test("should format the default header", () => {
    expect(new ArscTableWriter().formatHeader()).toBe(HEADER);
  });

  test("should format a record with six decimal places", () => {
    expect(new ArscTableWriter().formatRecord(g1)).toBe(G1_ROW);
  });

  test("should honour decimalPlaces", () => {
    expect(new ArscTableWriter({ decimalPlaces: 3 }).formatRecord(g1)).toBe(
      "G1\t0.400\t3.200\t0.400\t123.968"
    );
  });

  test("should list successes only, after the header", () => {
    expect(new ArscTableWriter().formatTable(results)).toBe(`${HEADER}\n${G1_ROW}\n`);
  });

  test("should omit the header when asked", () => {
    expect(new ArscTableWriter({ includeHeader: false }).formatTable(results)).toBe(`${G1_ROW}\n`);
  });

  test("should render an empty batch as just the header", () => {
    expect(new ArscTableWriter().formatTable([])).toBe(`${HEADER}\n`);
  });

  test("should append composition columns and TotalAALength", () => {
    const writer = new ArscTableWriter({ includeComposition: true, decimalPlaces: 2 });

    expect(writer.formatHeader()).toBe(`${HEADER}\t${CANONICAL_RESIDUES.join("\t")}\tTotalAALength`);

    const shares = CANONICAL_RESIDUES.map((code) =>
      code === "K" || code === "M" ? "0.40" : code === "T" ? "0.20" : "0.00"
    );
    expect(writer.formatRecord(g1)).toBe(
      ["G1", "0.40", "3.20", "0.40", "123.97", ...shares, "5"].join("\t")
    );
  });

  test("should reject invalid options", () => {
    expect(() => new ArscTableWriter({ decimalPlaces: -1 })).toThrow(ValidationError);
    expect(() => new ArscTableWriter({ decimalPlaces: 2.5 })).toThrow(ValidationError);
    expect(() => new ArscTableWriter({ decimalPlaces: 21 })).toThrow(
      "Invalid ARSC table options"
    );
  });
});

describe("formatFailures", () => {
  test("should render one line per failure", () => {
    expect(formatFailures(results)).toBe(
      "G2\tDegenerateGenome\tGenome 'G2' has no recognized residues (1 sequences, 3 unrecognized symbols)\n"
    );
  });

  test("should keep multi-line messages on one line", () => {
    const failure: JobResult = {
      success: false,
      genomeId: "G3",
      failure: { genomeId: "G3", errorKind: "IOError", message: "read failed\nContext:\tdisk" },
    };
    expect(formatFailures([failure])).toBe("G3\tIOError\tread failed Context: disk\n");
  });

  test("should be empty when nothing failed", () => {
    expect(formatFailures([])).toBe("");
  });
});

describe("ArscTableWriter.writeToFile", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "arsc-table-"));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("should write a plain TSV file", async () => {
    const path = join(dir, "arsc.tsv");
    await new ArscTableWriter().writeToFile(path, results);
    expect(readFileSync(path, "utf8")).toBe(`${HEADER}\n${G1_ROW}\n`);
  });

  test("should gzip a .gz output path", async () => {
    const path = join(dir, "arsc.tsv.gz");
    await new ArscTableWriter().writeToFile(path, results);
    const bytes = new Uint8Array(readFileSync(path));
    expect(bytes[0]).toBe(0x1f);
    expect(new TextDecoder().decode(gunzipSync(bytes))).toBe(`${HEADER}\n${G1_ROW}\n`);
  });
});
