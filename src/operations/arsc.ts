/**
 * Genome-level ARSC aggregation
 *
 * Folds per-sequence residue tallies into genome totals and derives the
 * four stoichiometric metrics of Mende et al. (2017):
 *
 * - N-ARSC: side-chain nitrogen atoms per residue
 * - C-ARSC: side-chain carbon atoms per residue
 * - S-ARSC: side-chain sulfur atoms per residue
 * - AvgResMW: average residue molecular weight (Da)
 *
 * Only recognized residues enter the denominators. Folding is associative
 * and commutative: integer totals are exact, and the weight total is
 * recomputed from residue counts in a fixed order, so the metrics do not
 * depend on the order sequences arrive in.
 *
 * @example
 * ```typescript
 * const calculator = new ArscCalculator();
 * const metrics = await calculator.calculate("Ecoli", ["MKT", "MAL"]);
 * console.log(metrics.nArsc, metrics.cArsc);
 * ```
 */

import { DegenerateGenomeError, ParseError } from "../errors";
import type {
  CanonicalResidue,
  GenomeAccumulator,
  GenomeMetrics,
  SequenceComposition,
} from "../types";
import { CANONICAL_RESIDUES } from "../types";
import { countResidues, emptyResidueCounts } from "./core/composition";
import { type ResidueTable, STANDARD_RESIDUES } from "./core/residues";

/**
 * Identity element of the fold
 */
export function createAccumulator(): GenomeAccumulator {
  return {
    totalCarbon: 0,
    totalNitrogen: 0,
    totalSulfur: 0,
    totalWeight: 0,
    totalResidues: 0,
    sequenceCount: 0,
    unknownCount: 0,
    residueCounts: emptyResidueCounts(),
  };
}

/**
 * Fold one sequence's composition into a genome accumulator
 */
export function foldComposition(
  acc: GenomeAccumulator,
  composition: SequenceComposition,
  table: ResidueTable = STANDARD_RESIDUES
): GenomeAccumulator {
  return combine(acc, composition.residueCounts, 1, composition.unknownCount, table);
}

/**
 * Combine two partial accumulators for the same genome
 */
export function mergeAccumulators(
  left: GenomeAccumulator,
  right: GenomeAccumulator,
  table: ResidueTable = STANDARD_RESIDUES
): GenomeAccumulator {
  return combine(left, right.residueCounts, right.sequenceCount, right.unknownCount, table);
}

function combine(
  acc: GenomeAccumulator,
  counts: Readonly<Record<CanonicalResidue, number>>,
  sequenceCount: number,
  unknownCount: number,
  table: ResidueTable
): GenomeAccumulator {
  const residueCounts = emptyResidueCounts();
  let totalCarbon = acc.totalCarbon;
  let totalNitrogen = acc.totalNitrogen;
  let totalSulfur = acc.totalSulfur;
  let totalResidues = acc.totalResidues;

  for (const code of CANONICAL_RESIDUES) {
    const count = counts[code];
    residueCounts[code] = acc.residueCounts[code] + count;
    if (count === 0) continue;

    const residue = table.get(code);
    totalCarbon += count * residue.carbon;
    totalNitrogen += count * residue.nitrogen;
    totalSulfur += count * residue.sulfur;
    totalResidues += count;
  }

  return {
    totalCarbon,
    totalNitrogen,
    totalSulfur,
    totalWeight: weightOf(residueCounts, table),
    totalResidues,
    sequenceCount: acc.sequenceCount + sequenceCount,
    unknownCount: acc.unknownCount + unknownCount,
    residueCounts,
  };
}

function weightOf(
  counts: Readonly<Record<CanonicalResidue, number>>,
  table: ResidueTable
): number {
  let weight = 0;
  for (const code of CANONICAL_RESIDUES) {
    weight += counts[code] * table.get(code).weight;
  }
  return weight;
}

/**
 * Derive the genome's metrics
 *
 * No rounding is applied; presentation belongs to the table writer.
 *
 * @throws {DegenerateGenomeError} When the genome has no recognized residues
 */
export function finalizeMetrics(genomeId: string, acc: GenomeAccumulator): GenomeMetrics {
  const { totalResidues } = acc;
  if (totalResidues === 0) {
    throw new DegenerateGenomeError(genomeId, acc.sequenceCount, acc.unknownCount);
  }

  const composition = emptyResidueCounts();
  for (const code of CANONICAL_RESIDUES) {
    composition[code] = acc.residueCounts[code] / totalResidues;
  }

  return {
    genomeId,
    nArsc: acc.totalNitrogen / totalResidues,
    cArsc: acc.totalCarbon / totalResidues,
    sArsc: acc.totalSulfur / totalResidues,
    avgResMw: acc.totalWeight / totalResidues,
    totalResidues,
    sequenceCount: acc.sequenceCount,
    unknownCount: acc.unknownCount,
    composition,
  };
}

/**
 * Streams a genome's sequences through counting, folding and finalization
 */
export class ArscCalculator {
  constructor(private readonly table: ResidueTable = STANDARD_RESIDUES) {}

  /**
   * Accumulate every sequence of a genome without finalizing
   * @param signal Checked between sequences
   */
  async accumulate(
    sequences: AsyncIterable<string> | Iterable<string>,
    signal?: AbortSignal
  ): Promise<GenomeAccumulator> {
    let acc = createAccumulator();
    for await (const sequence of sequences) {
      if (signal?.aborted === true) {
        throw new ParseError("Operation was aborted", "ABORTED");
      }
      acc = foldComposition(acc, countResidues(sequence, this.table), this.table);
    }
    return acc;
  }

  /**
   * Compute the metrics of one genome
   * @throws {DegenerateGenomeError} When no recognized residues were seen
   */
  async calculate(
    genomeId: string,
    sequences: AsyncIterable<string> | Iterable<string>,
    signal?: AbortSignal
  ): Promise<GenomeMetrics> {
    const acc = await this.accumulate(sequences, signal);
    return finalizeMetrics(genomeId, acc);
  }
}
