/**
 * Tests for per-sequence residue counting
 */

import { describe, expect, test } from "vitest";
import {
  countResidues,
  emptyResidueCounts,
  recognizedCount,
} from "../../../src/operations/core/composition";
import { CANONICAL_RESIDUES } from "../../../src/types";

describe("countResidues", () => {
  test("should tally each residue type", () => {
    const comp = countResidues("MKTMK");
    expect(comp.residueCounts.M).toBe(2);
    expect(comp.residueCounts.K).toBe(2);
    expect(comp.residueCounts.T).toBe(1);
    expect(comp.residueCounts.A).toBe(0);
    expect(comp.unknownCount).toBe(0);
    expect(comp.length).toBe(5);
  });

  test("should count unrecognized symbols as unknown", () => {
    const comp = countResidues("MKX*B-");
    expect(comp.unknownCount).toBe(4);
    expect(recognizedCount(comp)).toBe(2);
    expect(comp.length).toBe(6);
  });

  test("should treat lowercase residues like uppercase ones", () => {
    const comp = countResidues("mkT");
    expect(comp.residueCounts.M).toBe(1);
    expect(comp.residueCounts.K).toBe(1);
    expect(comp.residueCounts.T).toBe(1);
    expect(comp.unknownCount).toBe(0);
  });

  test("should count non-ASCII look-alikes as unknown", () => {
    const comp = countResidues("ıſM");
    expect(comp.residueCounts.I).toBe(0);
    expect(comp.residueCounts.S).toBe(0);
    expect(comp.residueCounts.M).toBe(1);
    expect(comp.unknownCount).toBe(2);
    expect(comp.length).toBe(3);
  });

  test("should yield a zero composition for an empty sequence", () => {
    const comp = countResidues("");
    expect(comp).toEqual({ residueCounts: emptyResidueCounts(), unknownCount: 0, length: 0 });
  });

  test("should keep length equal to recognized plus unknown", () => {
    for (const sequence of ["ACDEFGHIKLMNPQRSTVWY", "XXXX", "MAXLKZ*", "g"]) {
      const comp = countResidues(sequence);
      expect(recognizedCount(comp) + comp.unknownCount).toBe(comp.length);
      expect(comp.length).toBe(sequence.length);
    }
  });

  test("should count a single repeated residue k times", () => {
    const comp = countResidues("W".repeat(37));
    expect(comp.residueCounts.W).toBe(37);
    expect(recognizedCount(comp)).toBe(37);
  });
});

describe("emptyResidueCounts", () => {
  test("should return an independent zeroed record on every call", () => {
    const first = emptyResidueCounts();
    first.A = 5;
    const second = emptyResidueCounts();
    expect(second.A).toBe(0);
    expect(Object.keys(second)).toEqual([...CANONICAL_RESIDUES]);
  });
});
