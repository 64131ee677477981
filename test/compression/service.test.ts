/**
 * Tests for the Effect compression service layers
 */

import { Effect, Either } from "effect";
import { gzipSync } from "fflate";
import { describe, expect, test } from "vitest";
import { CompressionService } from "../../src/compression/service";
import { CompressionError } from "../../src/errors";

const encoder = new TextEncoder();
const decoder = new TextDecoder();
const PROTEOME = ">p1\nMKTAYIAKQR\n";

describe("CompressionService.Live", () => {
  test("should decompress gzip", async () => {
    const program = Effect.gen(function* () {
      const service = yield* CompressionService;
      return yield* service.decompress(gzipSync(encoder.encode(PROTEOME)), "gzip");
    });
    const output = await Effect.runPromise(program.pipe(Effect.provide(CompressionService.Live)));
    expect(decoder.decode(output)).toBe(PROTEOME);
  });

  test("should pass uncompressed data through", async () => {
    const data = encoder.encode(PROTEOME);
    const program = Effect.flatMap(CompressionService, (service) =>
      service.compress(data, "none")
    );
    const output = await Effect.runPromise(program.pipe(Effect.provide(CompressionService.Live)));
    expect(output).toBe(data);
  });

  test("should fail with a CompressionError for zstd", async () => {
    const program = Effect.flatMap(CompressionService, (service) =>
      service.decompress(new Uint8Array([0x28, 0xb5, 0x2f, 0xfd]), "zstd")
    );
    const result = await Effect.runPromise(
      Effect.either(program).pipe(Effect.provide(CompressionService.Live))
    );

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left).toBeInstanceOf(CompressionError);
      expect(result.left.message).toBe(
        "CompressionService.Live only supports gzip; use CompressionService.WithZstd for zstd"
      );
    }
  });

  test("should surface corrupt gzip as a typed failure", async () => {
    const program = Effect.flatMap(CompressionService, (service) =>
      service.decompress(new Uint8Array([0x1f, 0x8b, 0x00, 0x00]), "gzip")
    );
    const result = await Effect.runPromise(
      Effect.either(program).pipe(Effect.provide(CompressionService.Live))
    );
    expect(Either.isLeft(result) && result.left.format).toBe("gzip");
  });
});

describe("CompressionService.WithZstd", () => {
  test("should compress and decompress zstd", async () => {
    const data = encoder.encode(PROTEOME.repeat(20));
    const program = Effect.gen(function* () {
      const service = yield* CompressionService;
      const compressed = yield* service.compress(data, "zstd");
      return yield* service.decompress(compressed, "zstd");
    });
    const output = await Effect.runPromise(
      program.pipe(Effect.provide(CompressionService.WithZstd))
    );
    expect(decoder.decode(output)).toBe(PROTEOME.repeat(20));
  });

  test("should still handle gzip", async () => {
    const program = Effect.flatMap(CompressionService, (service) =>
      service.decompress(gzipSync(encoder.encode("MK")), "gzip")
    );
    const output = await Effect.runPromise(
      program.pipe(Effect.provide(CompressionService.WithZstd))
    );
    expect(decoder.decode(output)).toBe("MK");
  });
});

describe("CompressionService.layerFor", () => {
  test("should pick the smallest layer for a format", () => {
    expect(CompressionService.layerFor("gzip")).toBe(CompressionService.Live);
    expect(CompressionService.layerFor("none")).toBe(CompressionService.Live);
    expect(CompressionService.layerFor("zstd")).toBe(CompressionService.WithZstd);
  });
});
