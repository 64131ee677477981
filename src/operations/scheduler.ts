/**
 * Bounded-concurrency genome job scheduler
 *
 * Each genome is one job: its sequences are read lazily, folded into an
 * accumulator owned by that job alone, and finalized. At most `workerCount`
 * jobs are in flight at once; the rest queue until a slot frees up. Jobs run
 * concurrently on the calling thread: file reads overlap, while counting
 * itself is not spread over CPU cores. Every failure is caught at the job
 * boundary and turned into a `GenomeFailure`, so one bad genome never
 * cancels its siblings.
 *
 * Results come back in input order, which makes the output for a fixed input
 * identical for any worker count.
 *
 * @example
 * ```typescript
 * const results = await runGenomes(
 *   [
 *     { genomeId: "G1", sequences: ["MK", "MKT"] },
 *     { genomeId: "G2", sequences: ["XXX"] },
 *   ],
 *   { workerCount: 4 }
 * );
 * // [{ success: true, genomeId: "G1", ... }, { success: false, genomeId: "G2", ... }]
 * ```
 */

import { type } from "arktype";
import { Effect, Logger, LogLevel } from "effect";
import { DegenerateGenomeError, ParseError, ValidationError } from "../errors";
import type { FailureKind, GenomeFailure, GenomeSource, JobResult, LogLevelName } from "../types";
import { ArscCalculator } from "./arsc";
import { type ResidueTable, STANDARD_RESIDUES } from "./core/residues";

/**
 * Scheduler configuration
 */
export interface RunOptions {
  /** Genomes in flight at once (default: 1) */
  workerCount?: number;
  /** Minimum level of scheduler log lines written to stderr (default: "warning") */
  logLevel?: LogLevelName;
  /** Abandons in-flight and queued jobs when aborted */
  signal?: AbortSignal;
  /** Reference table shared read-only by every job */
  residueTable?: ResidueTable;
  /** Called once per finished genome, in completion order */
  onResult?: (result: JobResult, completed: number, total: number) => void;
}

const RunOptionsSchema = type({
  "workerCount?": "number.integer>=1",
  "logLevel?": '"debug"|"info"|"warning"|"error"|"none"',
});

const DEFAULT_WORKER_COUNT = 1;
const DEFAULT_LOG_LEVEL: LogLevelName = "warning";

const LOG_LEVELS: Record<LogLevelName, LogLevel.LogLevel> = {
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warning: LogLevel.Warning,
  error: LogLevel.Error,
  none: LogLevel.None,
};

/** logfmt lines on stderr; stdout is reserved for result tables */
const StderrLogger = Logger.replace(
  Logger.defaultLogger,
  Logger.withConsoleError(Logger.logfmtLogger)
);

/**
 * Map a caught job error onto the failure taxonomy
 */
export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof DegenerateGenomeError) {
    return "DegenerateGenome";
  }
  if (error instanceof ParseError || error instanceof ValidationError) {
    return "ParseError";
  }
  // FileError, CompressionError and anything thrown by a sequence source
  return "IOError";
}

function toFailure(genomeId: string, error: unknown): GenomeFailure {
  return {
    genomeId,
    errorKind: classifyFailure(error),
    message: error instanceof Error ? error.message : String(error),
  };
}

/**
 * One genome job; never fails, a caught error becomes a failure result
 */
export function runGenomeJob(
  source: GenomeSource,
  calculator: ArscCalculator
): Effect.Effect<JobResult> {
  const { genomeId } = source;

  return Effect.tryPromise({
    try: (signal) => calculator.calculate(genomeId, source.sequences, signal),
    catch: (error) => error,
  }).pipe(
    Effect.tap((metrics) =>
      Effect.logDebug(`Finished: ${metrics.totalResidues} residues in ${metrics.sequenceCount} sequences`)
    ),
    Effect.map((metrics): JobResult => ({ success: true, genomeId, metrics })),
    Effect.catchAll((error) => {
      const failure = toFailure(genomeId, error);
      return Effect.logWarning(`${failure.errorKind}: ${failure.message}`).pipe(
        Effect.as<JobResult>({ success: false, genomeId, failure })
      );
    }),
    Effect.annotateLogs("genome", genomeId)
  );
}

/**
 * Effect form of {@link runGenomes}, for composition into larger programs
 */
export function runGenomesEffect(
  genomes: Iterable<GenomeSource>,
  options: Pick<RunOptions, "workerCount" | "residueTable" | "onResult"> = {}
): Effect.Effect<JobResult[]> {
  const workerCount = options.workerCount ?? DEFAULT_WORKER_COUNT;
  const calculator = new ArscCalculator(options.residueTable ?? STANDARD_RESIDUES);
  const onResult = options.onResult;

  return Effect.gen(function* () {
    const sources = [...genomes];
    let completed = 0;

    yield* Effect.logDebug(`Scheduling ${sources.length} genomes on ${workerCount} workers`);

    return yield* Effect.forEach(
      sources,
      (source) =>
        runGenomeJob(source, calculator).pipe(
          Effect.tap((result) =>
            Effect.sync(() => {
              completed++;
              onResult?.(result, completed, sources.length);
            })
          )
        ),
      { concurrency: workerCount }
    );
  });
}

/**
 * Compute metrics for every genome, one `JobResult` per input genome
 *
 * An empty input yields an empty array. Per-genome errors never reject the
 * returned promise; only invalid options or an abort do.
 *
 * @throws {ValidationError} If options are invalid
 */
export async function runGenomes(
  genomes: Iterable<GenomeSource>,
  options: RunOptions = {}
): Promise<JobResult[]> {
  const validation = RunOptionsSchema({
    workerCount: options.workerCount ?? DEFAULT_WORKER_COUNT,
    logLevel: options.logLevel ?? DEFAULT_LOG_LEVEL,
  });
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid run options: ${validation.summary}`);
  }

  const program = runGenomesEffect(genomes, options).pipe(
    Logger.withMinimumLogLevel(LOG_LEVELS[options.logLevel ?? DEFAULT_LOG_LEVEL]),
    Effect.provide(StderrLogger)
  );

  return Effect.runPromise(program, options.signal ? { signal: options.signal } : undefined);
}
