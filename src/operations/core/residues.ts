/**
 * Amino-acid residue reference table for stoichiometric metrics
 *
 * Side-chain carbon, nitrogen and sulfur counts for the 20 canonical amino
 * acids, plus average residue masses. The backbone is identical for every
 * residue, so only side chains distinguish proteomes in ARSC metrics.
 *
 * @references
 * - Baudouin-Cornu et al. (2001) "Molecular evolution of protein atomic
 *   composition", Science 293:297-300
 * - Mende et al. (2017) "Environmental drivers of a microbial genomic
 *   transition zone in the ocean's interior", Nature Microbiology 2:1367-1373
 *
 * @module residues
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import type { CanonicalResidue, ResidueInfo } from "../../types";
import { CANONICAL_RESIDUES, ResidueInfoSchema } from "../../types";

const STANDARD_RESIDUE_DATA: readonly ResidueInfo[] = [
  { code: "A", name: "Alanine", carbon: 1, nitrogen: 0, sulfur: 0, weight: 71.0788 },
  { code: "C", name: "Cysteine", carbon: 1, nitrogen: 0, sulfur: 1, weight: 103.1388 },
  { code: "D", name: "Aspartate", carbon: 2, nitrogen: 0, sulfur: 0, weight: 115.0886 },
  { code: "E", name: "Glutamate", carbon: 3, nitrogen: 0, sulfur: 0, weight: 129.1155 },
  { code: "F", name: "Phenylalanine", carbon: 7, nitrogen: 0, sulfur: 0, weight: 147.1766 },
  { code: "G", name: "Glycine", carbon: 0, nitrogen: 0, sulfur: 0, weight: 57.0519 },
  { code: "H", name: "Histidine", carbon: 4, nitrogen: 2, sulfur: 0, weight: 137.1411 },
  { code: "I", name: "Isoleucine", carbon: 4, nitrogen: 0, sulfur: 0, weight: 113.1594 },
  { code: "K", name: "Lysine", carbon: 4, nitrogen: 1, sulfur: 0, weight: 128.1741 },
  { code: "L", name: "Leucine", carbon: 4, nitrogen: 0, sulfur: 0, weight: 113.1594 },
  { code: "M", name: "Methionine", carbon: 3, nitrogen: 0, sulfur: 1, weight: 131.1926 },
  { code: "N", name: "Asparagine", carbon: 2, nitrogen: 1, sulfur: 0, weight: 114.1038 },
  { code: "P", name: "Proline", carbon: 3, nitrogen: 0, sulfur: 0, weight: 97.1167 },
  { code: "Q", name: "Glutamine", carbon: 3, nitrogen: 1, sulfur: 0, weight: 128.1307 },
  { code: "R", name: "Arginine", carbon: 4, nitrogen: 3, sulfur: 0, weight: 156.1875 },
  { code: "S", name: "Serine", carbon: 1, nitrogen: 0, sulfur: 0, weight: 87.0782 },
  { code: "T", name: "Threonine", carbon: 2, nitrogen: 0, sulfur: 0, weight: 101.1051 },
  { code: "V", name: "Valine", carbon: 3, nitrogen: 0, sulfur: 0, weight: 99.1326 },
  { code: "W", name: "Tryptophan", carbon: 9, nitrogen: 1, sulfur: 0, weight: 186.2132 },
  { code: "Y", name: "Tyrosine", carbon: 7, nitrogen: 0, sulfur: 0, weight: 163.176 },
];

/**
 * Immutable lookup from single-letter code to elemental composition
 *
 * Built once and shared read-only by every genome job.
 *
 * @example
 * ```typescript
 * const met = STANDARD_RESIDUES.lookup("m");
 * console.log(met?.sulfur); // 1
 * STANDARD_RESIDUES.lookup("X"); // undefined - tallied as unknown
 * ```
 */
export class ResidueTable {
  private readonly byCode: ReadonlyMap<string, ResidueInfo>;

  private constructor(entries: readonly ResidueInfo[]) {
    this.byCode = new Map(entries.map((entry) => [entry.code, Object.freeze({ ...entry })]));
    Object.freeze(this);
  }

  /**
   * Build a table, requiring exactly one valid entry per canonical code
   * @throws {ValidationError} On a malformed, duplicate, missing or non-canonical entry
   */
  static fromEntries(entries: readonly ResidueInfo[]): ResidueTable {
    const seen = new Set<string>();

    for (const entry of entries) {
      const validation = ResidueInfoSchema(entry);
      if (validation instanceof type.errors) {
        throw new ValidationError(
          `Invalid residue entry '${entry.code}': ${validation.summary}`,
          undefined,
          "Atom counts must be non-negative integers and weights positive"
        );
      }
      if (!isCanonicalResidue(entry.code)) {
        throw new ValidationError(`'${entry.code}' is not a canonical amino-acid code`);
      }
      if (seen.has(entry.code)) {
        throw new ValidationError(`Duplicate residue entry for '${entry.code}'`);
      }
      seen.add(entry.code);
    }

    const missing = CANONICAL_RESIDUES.filter((code) => !seen.has(code));
    if (missing.length > 0) {
      throw new ValidationError(`Residue table is missing entries for: ${missing.join(", ")}`);
    }

    return new ResidueTable(entries);
  }

  /**
   * Look up a residue code; ASCII lowercase matches its uppercase code
   * @returns The residue, or undefined for anything outside the canonical 20
   */
  lookup(code: string): ResidueInfo | undefined {
    return this.byCode.get(/^[a-z]$/.test(code) ? code.toUpperCase() : code);
  }

  /** Entries in alphabetical code order */
  entries(): ResidueInfo[] {
    return CANONICAL_RESIDUES.map((code) => this.get(code));
  }

  /** Entry for a code already known to be canonical */
  get(code: CanonicalResidue): ResidueInfo {
    const info = this.byCode.get(code);
    if (info === undefined) {
      throw new ValidationError(`Residue table has no entry for '${code}'`);
    }
    return info;
  }
}

export function isCanonicalResidue(code: string): code is CanonicalResidue {
  return CANONICAL_RESIDUES.some((canonical) => canonical === code);
}

/**
 * Process-wide standard table
 */
export const STANDARD_RESIDUES: ResidueTable = ResidueTable.fromEntries(STANDARD_RESIDUE_DATA);
