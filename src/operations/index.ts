/**
 * Genome-level operations: aggregation, scheduling and summaries
 */

export {
  ArscCalculator,
  createAccumulator,
  finalizeMetrics,
  foldComposition,
  mergeAccumulators,
} from "./arsc";
export * from "./core";
export {
  classifyFailure,
  type RunOptions,
  runGenomeJob,
  runGenomes,
  runGenomesEffect,
} from "./scheduler";
export {
  filterByLength,
  formatSummary,
  type LengthFilter,
  type MetricSummary,
  type MetricsSummary,
  summarizeMetrics,
} from "./summary";
