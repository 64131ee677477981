/**
 * Proteome file discovery and lazy genome sources
 */

import { basename } from "node:path";
import { FileSystem, Path } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { COMPRESSION_EXTENSIONS } from "../compression";
import { FileError, ValidationError } from "../errors";
import { FastaParser, type FastaParserOptions } from "../formats/fasta";
import type { FileReaderOptions, GenomeSource } from "../types";
import { FilePathSchema } from "../types";
import { runIo } from "./runtime";

export const PROTEOME_EXTENSIONS = [".faa", ".fa", ".fasta", ".fas"] as const;

const ALL_COMPRESSION_EXTENSIONS: readonly string[] = [
  ...COMPRESSION_EXTENSIONS.gzip,
  ...COMPRESSION_EXTENSIONS.zstd,
];

function stripCompressionExtension(name: string): string {
  const lower = name.toLowerCase();
  const ext = ALL_COMPRESSION_EXTENSIONS.find((candidate) => lower.endsWith(candidate));
  return ext === undefined ? name : name.slice(0, name.length - ext.length);
}

/**
 * Whether a file name has a proteome extension, optionally compressed
 *
 * @example
 * ```typescript
 * isProteomeFileName("Ecoli.faa.gz"); // true
 * isProteomeFileName("Ecoli.gff");    // false
 * ```
 */
export function isProteomeFileName(name: string): boolean {
  const inner = stripCompressionExtension(name).toLowerCase();
  return PROTEOME_EXTENSIONS.some((ext) => inner.endsWith(ext) && inner.length > ext.length);
}

/**
 * Genome identifier for a proteome file: its base name without compression
 * and proteome extensions
 *
 * @example
 * ```typescript
 * genomeIdFromPath("/data/Ecoli.faa.gz"); // "Ecoli"
 * ```
 */
export function genomeIdFromPath(filePath: string): string {
  const name = stripCompressionExtension(basename(filePath));
  const lower = name.toLowerCase();
  const ext = PROTEOME_EXTENSIONS.find(
    (candidate) => lower.endsWith(candidate) && lower.length > candidate.length
  );
  return ext === undefined ? name : name.slice(0, name.length - ext.length);
}

const EXPECTED_EXTENSIONS = PROTEOME_EXTENSIONS.join(", ");

/**
 * Resolve an input path to the proteome files to process
 *
 * A file is returned as-is when its name has a proteome extension. A
 * directory is listed (non-recursively) and its proteome files are returned
 * sorted by name.
 *
 * @throws {FileError} When the input is malformed or cannot be accessed
 * @throws {ValidationError} When no proteome file is found
 */
export async function collectProteomeFiles(input: string): Promise<string[]> {
  const pathResult = FilePathSchema(input);
  if (pathResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${pathResult.summary}`, input, "stat");
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;

    const info = yield* fs
      .stat(input)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("stat", input, error)));

    if (info.type === "Directory") {
      const names = yield* fs
        .readDirectory(input)
        .pipe(Effect.mapError((error) => FileError.fromSystemError("list", input, error)));

      const files: string[] = [];
      for (const name of [...names].sort()) {
        if (!isProteomeFileName(name)) continue;
        const fullPath = path.join(input, name);
        const entry = yield* fs
          .stat(fullPath)
          .pipe(Effect.mapError((error) => FileError.fromSystemError("stat", fullPath, error)));
        if (entry.type === "File") {
          files.push(fullPath);
        }
      }

      if (files.length === 0) {
        return yield* Effect.fail(
          new ValidationError(
            `No proteome files found in '${input}' (expected ${EXPECTED_EXTENSIONS}, optionally compressed)`
          )
        );
      }
      return files;
    }

    if (info.type === "File" && isProteomeFileName(path.basename(input))) {
      return [input];
    }

    return yield* Effect.fail(
      new ValidationError(
        `'${input}' is not a proteome file (expected ${EXPECTED_EXTENSIONS}, optionally compressed)`
      )
    );
  });

  return runIo(program);
}

export interface ProteomeSourceOptions {
  readonly parser?: FastaParserOptions;
  readonly reader?: FileReaderOptions;
}

/**
 * Genome source over a proteome file
 *
 * The file is opened and parsed only when `sequences` is iterated, so a batch
 * of sources can be built up front without holding any file in memory.
 */
export function proteomeSource(filePath: string, options: ProteomeSourceOptions = {}): GenomeSource {
  return {
    genomeId: genomeIdFromPath(filePath),
    sequences: readProteinSequences(filePath, options),
  };
}

async function* readProteinSequences(
  filePath: string,
  options: ProteomeSourceOptions
): AsyncIterable<string> {
  const parser = new FastaParser(options.parser);
  for await (const record of parser.parseFile(filePath, options.reader)) {
    yield record.sequence;
  }
}
