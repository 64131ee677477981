/**
 * Per-sequence residue tallies
 *
 * Pure counting step between the FASTA parser and the genome aggregator.
 * Characters outside the canonical 20 (ambiguity codes such as X, B, Z,
 * stop '*' and gap symbols) are counted as unknown rather than rejected.
 */

import type { CanonicalResidue, SequenceComposition } from "../../types";
import { CANONICAL_RESIDUES } from "../../types";
import { type ResidueTable, STANDARD_RESIDUES } from "./residues";

const ZERO_COUNTS: Readonly<Record<CanonicalResidue, number>> = Object.freeze({
  A: 0,
  C: 0,
  D: 0,
  E: 0,
  F: 0,
  G: 0,
  H: 0,
  I: 0,
  K: 0,
  L: 0,
  M: 0,
  N: 0,
  P: 0,
  Q: 0,
  R: 0,
  S: 0,
  T: 0,
  V: 0,
  W: 0,
  Y: 0,
});

/**
 * Fresh all-zero residue count record
 */
export function emptyResidueCounts(): Record<CanonicalResidue, number> {
  return { ...ZERO_COUNTS };
}

/**
 * Tally residue types in one protein sequence
 *
 * @param sequence Residue string; may be empty
 * @param table Reference table (defaults to the standard amino acids)
 *
 * @example
 * ```typescript
 * const comp = countResidues("MKX*");
 * comp.residueCounts.M; // 1
 * comp.unknownCount;    // 2
 * comp.length;          // 4
 * ```
 */
export function countResidues(
  sequence: string,
  table: ResidueTable = STANDARD_RESIDUES
): SequenceComposition {
  const residueCounts = emptyResidueCounts();
  let unknownCount = 0;
  let length = 0;

  for (const char of sequence) {
    length++;
    const info = table.lookup(char);
    if (info === undefined) {
      unknownCount++;
    } else {
      residueCounts[info.code]++;
    }
  }

  return { residueCounts, unknownCount, length };
}

/**
 * Number of recognized residues in a composition
 */
export function recognizedCount(composition: SequenceComposition): number {
  let total = 0;
  for (const code of CANONICAL_RESIDUES) {
    total += composition.residueCounts[code];
  }
  return total;
}
