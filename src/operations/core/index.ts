/**
 * Leaf algorithms: the residue reference table and per-sequence counting
 */

export { countResidues, emptyResidueCounts, recognizedCount } from "./composition";
export { isCanonicalResidue, ResidueTable, STANDARD_RESIDUES } from "./residues";
