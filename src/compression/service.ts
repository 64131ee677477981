/**
 * Effect-based compression service
 *
 * ### `CompressionService.Live` (gzip only)
 * Synchronous construction, fflate-backed. Requests for zstd fail.
 *
 * ### `CompressionService.WithZstd` (gzip + zstd)
 * Loads the @hpcc-js/wasm-zstd module when the layer is built.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const svc = yield* CompressionService;
 *   return yield* svc.decompress(bytes, "gzip");
 * });
 * await Effect.runPromise(program.pipe(Effect.provide(CompressionService.Live)));
 * ```
 */

import { Zstd } from "@hpcc-js/wasm-zstd";
import { Context, Effect, Layer } from "effect";
import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";
import { compress as compressGzip, decompress as decompressGzip } from "./gzip";

export interface CompressionServiceShape {
  /**
   * Compress data using the specified format
   * @param level Format-specific level (gzip 1-9, zstd 1-22)
   */
  readonly compress: (
    data: Uint8Array,
    format: CompressionFormat,
    level?: number
  ) => Effect.Effect<Uint8Array, CompressionError>;

  /**
   * Decompress data that was compressed with the given format
   */
  readonly decompress: (
    data: Uint8Array,
    format: CompressionFormat,
    maxOutputSize?: number
  ) => Effect.Effect<Uint8Array, CompressionError>;
}

export class CompressionService extends Context.Tag("@proteome-arsc/CompressionService")<
  CompressionService,
  CompressionServiceShape
>() {
  static readonly Live: Layer.Layer<CompressionService> = Layer.succeed(
    CompressionService,
    createGzipOnlyService()
  );

  static readonly WithZstd: Layer.Layer<CompressionService, CompressionError> = Layer.effect(
    CompressionService,
    Effect.gen(function* () {
      const zstd = yield* Effect.tryPromise({
        try: () => Zstd.load(),
        catch: (error) =>
          new CompressionError(
            `Failed to initialize Zstd WASM: ${error instanceof Error ? error.message : String(error)}`,
            "zstd",
            "validate"
          ),
      });
      return createMultiFormatService(zstd);
    })
  );

  /**
   * Smallest layer able to handle a format
   */
  static layerFor(format: CompressionFormat): Layer.Layer<CompressionService, CompressionError> {
    return format === "zstd" ? CompressionService.WithZstd : CompressionService.Live;
  }
}

function gzipCompress(data: Uint8Array, level?: number): Effect.Effect<Uint8Array, CompressionError> {
  return Effect.tryPromise({
    try: () => compressGzip(data, { level: level ?? 6 }),
    catch: (error) => CompressionError.fromSystemError("gzip", "compress", error),
  });
}

function gzipDecompress(
  data: Uint8Array,
  maxOutputSize?: number
): Effect.Effect<Uint8Array, CompressionError> {
  return Effect.tryPromise({
    try: () => decompressGzip(data, maxOutputSize !== undefined ? { maxOutputSize } : {}),
    catch: (error) => CompressionError.fromSystemError("gzip", "decompress", error),
  });
}

function zstdUnsupported(operation: "compress" | "decompress"): Effect.Effect<never, CompressionError> {
  return Effect.fail(
    new CompressionError(
      "CompressionService.Live only supports gzip; use CompressionService.WithZstd for zstd",
      "zstd",
      operation
    )
  );
}

function createGzipOnlyService(): CompressionServiceShape {
  return {
    compress: (data, format, level) => {
      switch (format) {
        case "gzip":
          return gzipCompress(data, level);
        case "zstd":
          return zstdUnsupported("compress");
        case "none":
          return Effect.succeed(data);
      }
    },

    decompress: (data, format, maxOutputSize) => {
      switch (format) {
        case "gzip":
          return gzipDecompress(data, maxOutputSize);
        case "zstd":
          return zstdUnsupported("decompress");
        case "none":
          return Effect.succeed(data);
      }
    },
  };
}

function createMultiFormatService(zstd: Zstd): CompressionServiceShape {
  const gzipOnly = createGzipOnlyService();

  return {
    compress: (data, format, level) =>
      format === "zstd"
        ? Effect.try({
            try: () => zstd.compress(data, level ?? 3),
            catch: (error) => CompressionError.fromSystemError("zstd", "compress", error),
          })
        : gzipOnly.compress(data, format, level),

    decompress: (data, format, maxOutputSize) =>
      format === "zstd"
        ? Effect.try({
            try: () => zstd.decompress(data),
            catch: (error) => CompressionError.fromSystemError("zstd", "decompress", error),
          }).pipe(
            Effect.filterOrFail(
              (output) => maxOutputSize === undefined || output.length <= maxOutputSize,
              (output) =>
                new CompressionError(
                  `Decompressed size ${output.length} exceeds maximum ${maxOutputSize}`,
                  "zstd",
                  "decompress",
                  data.length
                )
            )
          )
        : gzipOnly.decompress(data, format, maxOutputSize),
  };
}
