/**
 * `arsc` command line: proteome files in, ARSC table out
 *
 * Usage: arsc [-i <file|dir> | <file|dir>] [options]
 *
 * The table goes to stdout (or `-o`); banners, failures and the optional
 * summary go to stderr.
 */

import { type } from "arktype";
import { ArscTableWriter, formatFailures } from "./formats/arsc-table";
import { collectProteomeFiles, proteomeSource } from "./io/discovery";
import { isDirectory } from "./io/file-reader";
import { runGenomes } from "./operations/scheduler";
import { filterByLength, formatSummary, summarizeMetrics } from "./operations/summary";
import type { GenomeMetrics, JobResult } from "./types";

export const VERSION = "1.0.0";

export interface CliOptions {
  readonly input: string;
  readonly output?: string;
  readonly threads: number;
  readonly aaComposition: boolean;
  readonly decimalPlaces: number;
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly stats: boolean;
  readonly noHeader: boolean;
  readonly quiet: boolean;
  readonly verbose: boolean;
}

export type ParsedArguments =
  | { readonly kind: "run"; readonly options: CliOptions }
  | { readonly kind: "help" }
  | { readonly kind: "version" }
  | { readonly kind: "error"; readonly message: string };

/**
 * Output channels; tests pass collectors, the binary passes process streams
 */
export interface CliIo {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
}

const PROCESS_IO: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const USAGE =
  "usage: arsc [-h] [-v] [-i INPUT_DIR] [-o OUTPUT] [-t THREADS] [-a] [-d DECIMAL_PLACES]\n" +
  "            [--min-length N] [--max-length N] [-s] [--no-header] [--quiet | --verbose]\n" +
  "            [input]\n";

const HELP = `${USAGE}
Average Resource Use per Side Chain (N-, C-, S-ARSC) and average residue
weight for each proteome.

positional arguments:
  input                 .faa/.faa.gz file or directory (or use -i/--input_dir)

options:
  -h, --help            show this help message and exit
  -v, --version         show program's version number and exit
  -i, --input_dir PATH  a .faa/.faa.gz file, or a directory of them
  -o, --output PATH     write the TSV (always with header) to PATH; .gz compresses
  -t, --threads N       genomes in flight at once (default: 1)
  -a, --aa-composition  add per-residue shares and TotalAALength columns
  -d, --decimal-places N
                        digits after the decimal point (default: 6)
  --min-length N        drop genomes with fewer residues
  --max-length N        drop genomes with more residues
  -s, --stats           print summary statistics to stderr (directory input only)
  --no-header           omit the header line on stdout
  --quiet               suppress progress banners
  --verbose             log every finished genome
`;

const CliOptionsSchema = type({
  input: "string>0",
  "output?": "string>0",
  threads: "number.integer>=1",
  decimalPlaces: "number.integer>=0",
  "minLength?": "number.integer>=0",
  "maxLength?": "number.integer>=0",
}).narrow((options, ctx) => {
  if (options.decimalPlaces > 20) {
    return ctx.reject({
      expected: "at most 20 decimal places",
      actual: String(options.decimalPlaces),
      path: ["decimalPlaces"],
    });
  }
  if (
    options.minLength !== undefined &&
    options.maxLength !== undefined &&
    options.minLength > options.maxLength
  ) {
    return ctx.reject({
      expected: "--min-length not greater than --max-length",
      actual: `${options.minLength} > ${options.maxLength}`,
    });
  }
  return true;
});

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function parseInteger(flag: string, value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new UsageError(`argument ${flag}: invalid int value: '${value}'`);
  }
  return Number.parseInt(value, 10);
}

/**
 * Parse command-line arguments (without the node and script entries)
 *
 * Never throws: usage problems come back as `{ kind: "error" }`.
 *
 * @example
 * ```typescript
 * parseArguments(["proteomes/", "-t", "4"]);
 * // { kind: "run", options: { input: "proteomes/", threads: 4, ... } }
 * ```
 */
export function parseArguments(argv: readonly string[]): ParsedArguments {
  try {
    return parseOrThrow(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      return { kind: "error", message: error.message };
    }
    throw error;
  }
}

function parseOrThrow(argv: readonly string[]): ParsedArguments {
  let inputDir: string | undefined;
  let positional: string | undefined;
  let output: string | undefined;
  let threads = 1;
  let decimalPlaces = 6;
  let minLength: number | undefined;
  let maxLength: number | undefined;
  let aaComposition = false;
  let stats = false;
  let noHeader = false;
  let quiet = false;
  let verbose = false;

  let index = 0;
  while (index < argv.length) {
    const arg = argv[index] ?? "";
    index++;

    if (!arg.startsWith("-") || arg === "-") {
      if (positional !== undefined) {
        throw new UsageError(`unrecognized arguments: ${arg}`);
      }
      positional = arg;
      continue;
    }

    const equalsAt = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const flag = equalsAt === -1 ? arg : arg.slice(0, equalsAt);
    const inlineValue = equalsAt === -1 ? undefined : arg.slice(equalsAt + 1);

    const takeValue = (): string => {
      if (inlineValue !== undefined) {
        return inlineValue;
      }
      const next = argv[index];
      if (next === undefined) {
        throw new UsageError(`argument ${flag}: expected one argument`);
      }
      index++;
      return next;
    };

    switch (flag) {
      case "-h":
      case "--help":
        return { kind: "help" };
      case "-v":
      case "--version":
        return { kind: "version" };
      case "-i":
      case "--input_dir":
      case "--input-dir":
        inputDir = takeValue();
        break;
      case "-o":
      case "--output":
        output = takeValue();
        break;
      case "-t":
      case "--threads":
        threads = parseInteger(flag, takeValue());
        break;
      case "-d":
      case "--decimal-places":
        decimalPlaces = parseInteger(flag, takeValue());
        break;
      case "--min-length":
        minLength = parseInteger(flag, takeValue());
        break;
      case "--max-length":
        maxLength = parseInteger(flag, takeValue());
        break;
      case "-a":
      case "--aa-composition":
        aaComposition = true;
        break;
      case "-s":
      case "--stats":
        stats = true;
        break;
      case "--no-header":
        noHeader = true;
        break;
      case "--quiet":
        quiet = true;
        break;
      case "--verbose":
        verbose = true;
        break;
      default:
        throw new UsageError(`unrecognized arguments: ${arg}`);
    }
  }

  if (inputDir !== undefined && positional !== undefined) {
    throw new UsageError(
      "cannot specify both positional input and -i/--input_dir; use one or the other"
    );
  }
  const input = inputDir ?? positional;
  if (input === undefined) {
    throw new UsageError("missing input: provide a .faa/.faa.gz file or directory");
  }
  if (quiet && verbose) {
    throw new UsageError("argument --verbose: not allowed with argument --quiet");
  }

  const options: CliOptions = {
    input,
    threads,
    decimalPlaces,
    aaComposition,
    stats,
    noHeader,
    quiet,
    verbose,
    ...(output !== undefined && { output }),
    ...(minLength !== undefined && { minLength }),
    ...(maxLength !== undefined && { maxLength }),
  };

  const validation = CliOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new UsageError(validation.summary);
  }

  return { kind: "run", options };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run the command line and resolve to the process exit code
 *
 * 0 when at least one genome succeeded (or there was nothing to do), 1 when
 * discovery failed, every genome failed or the output could not be written,
 * 2 on a usage error.
 */
export async function runCli(argv: readonly string[], io: CliIo = PROCESS_IO): Promise<number> {
  const parsed = parseArguments(argv);

  switch (parsed.kind) {
    case "help":
      io.stdout(HELP);
      return EXIT_SUCCESS;
    case "version":
      io.stdout(`arsc ${VERSION}\n`);
      return EXIT_SUCCESS;
    case "error":
      io.stderr(`${USAGE}arsc: error: ${parsed.message}\n`);
      return EXIT_USAGE;
    case "run":
      return execute(parsed.options, io);
  }
}

async function execute(options: CliOptions, io: CliIo): Promise<number> {
  const banner = (line: string): void => {
    if (!options.quiet) {
      io.stderr(`${line}\n`);
    }
  };

  let files: string[];
  try {
    if (options.stats && !(await isDirectory(options.input))) {
      io.stderr(
        `${USAGE}arsc: error: --stats can only be used with directory input (not single file)\n`
      );
      return EXIT_USAGE;
    }
    files = await collectProteomeFiles(options.input);
  } catch (error) {
    io.stderr(`Error: ${describeError(error)}\n`);
    return EXIT_FAILURE;
  }

  banner(`ARSC Version: ${VERSION}`);
  banner(`Found ${files.length} files to process.`);
  banner(`Using ${options.threads} threads.`);

  const results = await runGenomes(
    files.map((file) => proteomeSource(file)),
    {
      workerCount: options.threads,
      logLevel: options.verbose ? "debug" : "error",
    }
  );

  const failures = formatFailures(results);
  if (failures.length > 0) {
    io.stderr(failures);
  }

  const filtered = filterByLength(results, {
    ...(options.minLength !== undefined && { minLength: options.minLength }),
    ...(options.maxLength !== undefined && { maxLength: options.maxLength }),
  });
  const metrics = successfulMetrics(filtered);
  banner(`After filtering: ${metrics.length} results.`);

  if (options.stats) {
    const summary = summarizeMetrics(metrics);
    if (summary !== undefined) {
      io.stderr(`\n${formatSummary(summary, options.decimalPlaces)}\n\n`);
    }
  }

  const writer = new ArscTableWriter({
    includeComposition: options.aaComposition,
    decimalPlaces: options.decimalPlaces,
    includeHeader: options.output !== undefined || !options.noHeader,
  });

  if (options.output !== undefined) {
    try {
      await writer.writeToFile(options.output, filtered);
    } catch (error) {
      io.stderr(`Error: ${describeError(error)}\n`);
      return EXIT_FAILURE;
    }
    banner(`Output written to ${options.output}`);
  } else {
    io.stdout(writer.formatTable(filtered));
  }

  const anySucceeded = results.some((result) => result.success);
  return results.length === 0 || anySucceeded ? EXIT_SUCCESS : EXIT_FAILURE;
}

function successfulMetrics(results: readonly JobResult[]): GenomeMetrics[] {
  return results.flatMap((result) => (result.success ? [result.metrics] : []));
}
