/**
 * File writing built on the Effect platform FileSystem
 *
 * Output whose path ends in a compression extension (`.gz`, `.zst`) is
 * compressed before it is written.
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { CompressionDetector, CompressionService } from "../compression";
import { type CompressionError, FileError } from "../errors";
import type { WriteOptions } from "../types";
import { FilePathSchema, WriteOptionsSchema } from "../types";
import { runIo } from "./runtime";

const DEFAULT_COMPRESSION_LEVEL = 6;

function applyCompression(
  data: Uint8Array,
  filePath: string,
  options: WriteOptions
): Effect.Effect<Uint8Array, CompressionError> {
  if (options.autoCompress === false) {
    return Effect.succeed(data);
  }

  const format = CompressionDetector.fromExtension(filePath);
  if (format === "none") {
    return Effect.succeed(data);
  }

  return Effect.gen(function* () {
    const compressionService = yield* CompressionService;
    return yield* compressionService.compress(
      data,
      format,
      options.compressionLevel ?? DEFAULT_COMPRESSION_LEVEL
    );
  }).pipe(Effect.provide(CompressionService.layerFor(format)));
}

/**
 * Write a string to a file, replacing any existing content
 *
 * @throws {FileError} When the path is invalid or the write fails
 * @throws {CompressionError} When compressing the content fails
 *
 * @example
 * ```typescript
 * await writeString("arsc.tsv.gz", table); // gzip-compressed
 * await writeString("arsc.tsv.gz", table, { autoCompress: false }); // written as-is
 * ```
 */
export async function writeString(
  path: string,
  content: string,
  options: WriteOptions = {}
): Promise<void> {
  const pathResult = FilePathSchema(path);
  if (pathResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${pathResult.summary}`, path, "write");
  }
  const optionsResult = WriteOptionsSchema(options);
  if (optionsResult instanceof type.errors) {
    throw new FileError(`Invalid write options: ${optionsResult.summary}`, path, "write");
  }

  const data = new TextEncoder().encode(content);

  const program = Effect.gen(function* () {
    const finalData = yield* applyCompression(data, path, options);
    const fs = yield* FileSystem.FileSystem;
    yield* fs
      .writeFile(path, finalData)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("write", path, error)));
  });

  await runIo(program);
}
