/**
 * File reading built on the Effect platform FileSystem
 *
 * Compressed inputs (gzip, zstd) are detected from magic bytes and file
 * extension and decompressed transparently.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Option } from "effect";
import { CompressionDetector, CompressionService } from "../compression";
import { CompressionError, FileError } from "../errors";
import type { CompressionFormat, FileMetadata, FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { runIo } from "./runtime";

const DEFAULT_OPTIONS = {
  maxFileSize: 1_073_741_824, // 1 GiB
  autoDecompress: true,
} as const;

type ResolvedReaderOptions = {
  readonly maxFileSize: number;
  readonly autoDecompress: boolean;
  readonly compressionFormat: CompressionFormat | undefined;
  readonly maxOutputSize: number | undefined;
};

/**
 * Check whether a path names an existing regular file
 *
 * @throws {FileError} If the path is malformed
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("stat", validatedPath, error)));

  return runIo(program);
}

/**
 * Check whether a path names an existing directory
 *
 * @throws {FileError} If the path is malformed
 */
export async function isDirectory(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "Directory";
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("stat", validatedPath, error)));

  return runIo(program);
}

/**
 * Stat a path
 *
 * @throws {FileError} If the path cannot be accessed
 */
export async function getMetadata(path: string): Promise<FileMetadata> {
  const validatedPath = validatePath(path);
  return runIo(statProgram(validatedPath));
}

/**
 * Read a whole file into memory, decompressing when needed
 *
 * @throws {FileError} If the file is missing, unreadable or larger than `maxFileSize`
 * @throws {CompressionError} If a compressed file cannot be decoded
 */
export async function readBytes(path: string, options: FileReaderOptions = {}): Promise<Uint8Array> {
  const validatedPath = validatePath(path);
  const resolved = mergeOptions(validatedPath, options);
  return runIo(readBytesProgram(validatedPath, resolved));
}

/**
 * Read a whole file as UTF-8 text, decompressing when needed
 *
 * @example
 * ```typescript
 * const text = await readToString("proteomes/Ecoli.faa.gz");
 * ```
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const bytes = await readBytes(path, options);
  return new TextDecoder("utf-8").decode(bytes);
}

export const FileReader = {
  exists,
  isDirectory,
  getMetadata,
  readBytes,
  readToString,
} as const;

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

function statProgram(
  validatedPath: string
): Effect.Effect<FileMetadata, FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);
    return {
      path: validatedPath,
      size: Number(info.size),
      lastModified: Option.getOrElse(info.mtime, () => new Date(0)),
      isFile: info.type === "File",
      isDirectory: info.type === "Directory",
    };
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("stat", validatedPath, error)));
}

function readBytesProgram(
  validatedPath: string,
  options: ResolvedReaderOptions
): Effect.Effect<Uint8Array, FileError | CompressionError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const metadata = yield* statProgram(validatedPath);
    if (!metadata.isFile) {
      return yield* Effect.fail(
        new FileError(`Not a regular file: '${validatedPath}'`, validatedPath, "read")
      );
    }
    if (metadata.size > options.maxFileSize) {
      return yield* Effect.fail(
        new FileError(
          `File too large: ${metadata.size} bytes exceeds limit of ${options.maxFileSize} bytes`,
          validatedPath,
          "read"
        )
      );
    }

    const fs = yield* FileSystem.FileSystem;
    const raw = yield* fs
      .readFile(validatedPath)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("read", validatedPath, error)));

    if (!options.autoDecompress) {
      return raw;
    }

    const format =
      options.compressionFormat ??
      CompressionDetector.detect(validatedPath, raw.subarray(0, 4)).format;
    if (format === "none") {
      return raw;
    }

    return yield* Effect.gen(function* () {
      const service = yield* CompressionService;
      return yield* service.decompress(raw, format, options.maxOutputSize);
    }).pipe(Effect.provide(CompressionService.layerFor(format)));
  });
}

/**
 * Validate a file path with ArkType, reporting problems as FileError
 */
function validatePath(path: string): string {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

function mergeOptions(path: string, options: FileReaderOptions): ResolvedReaderOptions {
  const validationResult = FileReaderOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, path, "read");
  }

  return {
    maxFileSize: options.maxFileSize ?? DEFAULT_OPTIONS.maxFileSize,
    autoDecompress: options.autoDecompress ?? DEFAULT_OPTIONS.autoDecompress,
    compressionFormat: options.compressionFormat,
    maxOutputSize: options.decompressionOptions?.maxOutputSize,
  };
}
