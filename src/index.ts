/**
 * proteome-arsc - Average Resource Use per Side Chain for whole proteomes
 *
 * Counts residues in every protein of a genome, folds the counts into
 * genome-wide N-, C- and S-ARSC and average residue weight, and runs many
 * genomes concurrently without letting one bad input affect the rest.
 */

// Command line
export { type CliIo, type CliOptions, type ParsedArguments, parseArguments, runCli, VERSION } from "./cli";
// Compression infrastructure
export {
  COMPRESSION_EXTENSIONS,
  CompressionDetector,
  CompressionService,
  type CompressionServiceShape,
  GzipDecompressor,
} from "./compression";
// Error types
export {
  ArscError,
  CompressionError,
  DegenerateGenomeError,
  ERROR_SUGGESTIONS,
  FileError,
  getErrorSuggestion,
  ParseError,
  SequenceError,
  ValidationError,
} from "./errors";
// Result tables
export { type ArscTableOptions, ArscTableWriter, formatFailures, METRIC_COLUMNS } from "./formats/arsc-table";
// FASTA format
export { FastaParser, type FastaParserOptions } from "./formats/fasta";
// Proteome discovery
export {
  collectProteomeFiles,
  genomeIdFromPath,
  isProteomeFileName,
  PROTEOME_EXTENSIONS,
  type ProteomeSourceOptions,
  proteomeSource,
} from "./io/discovery";
// File I/O infrastructure
export { FileReader } from "./io/file-reader";
export { writeString } from "./io/file-writer";
// Aggregation, scheduling and summaries
export * from "./operations";
// Core types
export type {
  CanonicalResidue,
  CompressionDetection,
  CompressionFormat,
  FailureKind,
  FileMetadata,
  FileReaderOptions,
  GenomeAccumulator,
  GenomeFailure,
  GenomeMetrics,
  GenomeSource,
  JobResult,
  LogLevelName,
  ParserOptions,
  ProteinSequence,
  ResidueInfo,
  SequenceComposition,
  WriteOptions,
} from "./types";
export { CANONICAL_RESIDUES, ResidueInfoSchema } from "./types";
