/**
 * Core type definitions for proteome composition analysis
 *
 * Data flows leaf-first: protein records are counted into
 * `SequenceComposition`s, folded into one `GenomeAccumulator` per genome,
 * and finalized into `GenomeMetrics`. The genome scheduler wraps every
 * outcome in a `JobResult`.
 */

import { type } from "arktype";

// =============================================================================
// RESIDUES
// =============================================================================

/**
 * The 20 canonical amino-acid codes, alphabetical
 */
export const CANONICAL_RESIDUES = [
  "A",
  "C",
  "D",
  "E",
  "F",
  "G",
  "H",
  "I",
  "K",
  "L",
  "M",
  "N",
  "P",
  "Q",
  "R",
  "S",
  "T",
  "V",
  "W",
  "Y",
] as const;

export type CanonicalResidue = (typeof CANONICAL_RESIDUES)[number];

/**
 * Elemental composition of one residue type
 *
 * Atom counts are side-chain atoms, the convention ARSC metrics are defined on.
 */
export interface ResidueInfo {
  readonly code: CanonicalResidue;
  readonly name: string;
  readonly carbon: number;
  readonly nitrogen: number;
  readonly sulfur: number;
  /** Average residue mass in daltons (free amino acid minus water) */
  readonly weight: number;
}

// =============================================================================
// COMPOSITION AND AGGREGATION
// =============================================================================

/**
 * Residue tally of a single protein sequence
 *
 * Invariant: `length === sum(residueCounts) + unknownCount`
 */
export interface SequenceComposition {
  readonly residueCounts: Readonly<Record<CanonicalResidue, number>>;
  readonly unknownCount: number;
  readonly length: number;
}

/**
 * Running totals for one genome
 *
 * Owned by the job processing that genome; never shared between genomes.
 */
export interface GenomeAccumulator {
  readonly totalCarbon: number;
  readonly totalNitrogen: number;
  readonly totalSulfur: number;
  readonly totalWeight: number;
  /** Recognized residues only; unknown symbols never enter a denominator */
  readonly totalResidues: number;
  readonly sequenceCount: number;
  readonly unknownCount: number;
  readonly residueCounts: Readonly<Record<CanonicalResidue, number>>;
}

/**
 * Final per-genome metrics
 */
export interface GenomeMetrics {
  readonly genomeId: string;
  readonly nArsc: number;
  readonly cArsc: number;
  readonly sArsc: number;
  readonly avgResMw: number;
  readonly totalResidues: number;
  readonly sequenceCount: number;
  readonly unknownCount: number;
  /** Share of each canonical residue among recognized residues */
  readonly composition: Readonly<Record<CanonicalResidue, number>>;
}

// =============================================================================
// JOBS
// =============================================================================

export type FailureKind = "ParseError" | "DegenerateGenome" | "IOError";

export interface GenomeFailure {
  readonly genomeId: string;
  readonly errorKind: FailureKind;
  readonly message: string;
}

/**
 * Outcome of one genome job: exactly one per input genome
 */
export type JobResult =
  | { readonly success: true; readonly genomeId: string; readonly metrics: GenomeMetrics }
  | { readonly success: false; readonly genomeId: string; readonly failure: GenomeFailure };

/**
 * A named genome and its protein sequences
 *
 * `sequences` is consumed once, lazily, by the job that owns the genome.
 */
export interface GenomeSource {
  readonly genomeId: string;
  readonly sequences: AsyncIterable<string> | Iterable<string>;
}

export type LogLevelName = "debug" | "info" | "warning" | "error" | "none";

// =============================================================================
// FASTA
// =============================================================================

/**
 * One protein record from a FASTA file
 */
export interface ProteinSequence {
  readonly format: "fasta";
  readonly id: string;
  readonly description?: string;
  /** Residue string with whitespace removed; may be empty */
  readonly sequence: string;
  readonly length: number;
  /** Line number of the header (for error reporting) */
  readonly lineNumber?: number;
}

/**
 * Parser configuration options
 */
export interface ParserOptions {
  /** Skip residue-character validation */
  skipValidation?: boolean;
  /** Maximum line length before reporting an error */
  maxLineLength?: number;
  /** Whether to record header line numbers on records */
  trackLineNumbers?: boolean;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom error handler */
  onError?: (error: string, lineNumber?: number) => void;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

// =============================================================================
// COMPRESSION AND FILE I/O
// =============================================================================

export type CompressionFormat = "gzip" | "zstd" | "none";

/**
 * Compression detection result with confidence scoring
 */
export interface CompressionDetection {
  readonly format: CompressionFormat;
  /** Detection confidence level (0-1) */
  readonly confidence: number;
  readonly magicBytes?: Uint8Array;
  readonly extension?: string;
  readonly detectionMethod: "magic-bytes" | "extension" | "hybrid";
}

export interface DecompressorOptions {
  /** Safety limit for decompressed output size */
  readonly maxOutputSize?: number;
}

export interface FileReaderOptions {
  /** Maximum on-disk file size (default: 1 GiB) */
  readonly maxFileSize?: number;
  /** Detect and decompress compressed files (default: true) */
  readonly autoDecompress?: boolean;
  /** Override compression format detection */
  readonly compressionFormat?: CompressionFormat;
  /** Options for decompression when auto-decompression is enabled */
  readonly decompressionOptions?: DecompressorOptions;
}

export interface WriteOptions {
  /** Compress based on file extension (default: true) */
  readonly autoCompress?: boolean;
  /** Compression level 1-9 for gzip (default: 6) */
  readonly compressionLevel?: number;
}

export interface FileMetadata {
  readonly path: string;
  readonly size: number;
  readonly lastModified: Date;
  readonly isFile: boolean;
  readonly isDirectory: boolean;
}

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

export const ResidueInfoSchema = type({
  code: /^[A-Z]$/,
  name: "string>0",
  carbon: "number.integer>=0",
  nitrogen: "number.integer>=0",
  sulfur: "number.integer>=0",
  weight: "number>0",
});

/**
 * Residue line validation: letters plus stop and gap symbols
 *
 * Letters outside the canonical 20 are legal here; they are tallied as
 * unknown by the composition counter.
 */
export const ProteinResiduesSchema = type("string").narrow((seq, ctx) => {
  const invalid = seq.match(/[^A-Za-z*\-.]/g);
  if (invalid !== null) {
    return ctx.reject({
      expected: "amino-acid letters, '*', '-' or '.'",
      actual: [...new Set(invalid)].join(", "),
    });
  }
  return true;
});

export const FilePathSchema = type("string>0").narrow((path, ctx) => {
  if (path.includes("\0")) {
    return ctx.reject({ expected: "a path without null characters", actual: "" });
  }
  return true;
});

export const CompressionFormatSchema = type('"gzip"|"zstd"|"none"');

export const DecompressorOptionsSchema = type({
  "maxOutputSize?": "number>0",
});

export const FileReaderOptionsSchema = type({
  "maxFileSize?": "number>=0",
  "autoDecompress?": "boolean",
  "compressionFormat?": CompressionFormatSchema,
  "decompressionOptions?": DecompressorOptionsSchema,
});

export const WriteOptionsSchema = type({
  "autoCompress?": "boolean",
  "compressionLevel?": "1<=number<=9",
});
