/**
 * Gzip compression for proteome files, backed by fflate
 */

import { gunzipSync, gzipSync } from "fflate";
import { type } from "arktype";
import { CompressionError } from "../errors";
import type { DecompressorOptions } from "../types";
import { DecompressorOptionsSchema } from "../types";

const GZIP_MAGIC_BYTE1 = 0x1f;
const GZIP_MAGIC_BYTE2 = 0x8b;

const DEFAULT_GZIP_OPTIONS: Required<DecompressorOptions> = {
  maxOutputSize: 10_737_418_240, // 10GB
};

function validateGzipFormat(compressed: Uint8Array): void {
  if (compressed.length === 0) {
    throw new CompressionError("Compressed data must not be empty", "gzip", "decompress");
  }
  if (
    compressed.length < 2 ||
    compressed[0] !== GZIP_MAGIC_BYTE1 ||
    compressed[1] !== GZIP_MAGIC_BYTE2
  ) {
    throw new CompressionError(
      "Invalid gzip magic bytes - file may not be gzip compressed",
      "gzip",
      "decompress",
      0
    );
  }
}

function mergeOptions(options: DecompressorOptions): Required<DecompressorOptions> {
  const validation = DecompressorOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new CompressionError(
      `Invalid decompressor options: ${validation.summary}`,
      "gzip",
      "validate"
    );
  }
  return { ...DEFAULT_GZIP_OPTIONS, ...options };
}

/**
 * Decompress a whole gzip buffer
 *
 * @throws {CompressionError} On bad magic bytes, corrupt data or an output
 *   larger than `maxOutputSize`
 */
export async function decompress(
  compressed: Uint8Array,
  options: DecompressorOptions = {}
): Promise<Uint8Array> {
  const { maxOutputSize } = mergeOptions(options);
  validateGzipFormat(compressed);

  let output: Uint8Array;
  try {
    output = gunzipSync(compressed);
  } catch (error) {
    throw CompressionError.fromSystemError("gzip", "decompress", error, compressed.length);
  }

  if (output.length > maxOutputSize) {
    throw new CompressionError(
      `Decompressed size ${output.length} exceeds maximum ${maxOutputSize}`,
      "gzip",
      "decompress",
      compressed.length
    );
  }
  return output;
}

/**
 * Gzip-compress a buffer
 * @param options.level Compression level 1-9 (default: 6)
 */
export async function compress(
  data: Uint8Array,
  options: { level?: number } = {}
): Promise<Uint8Array> {
  const level = options.level ?? 6;
  if (!Number.isInteger(level) || level < 1 || level > 9) {
    throw new CompressionError(`Gzip level must be 1-9, got ${level}`, "gzip", "validate");
  }

  try {
    return gzipSync(data, { level: toGzipLevel(level) });
  } catch (error) {
    throw CompressionError.fromSystemError("gzip", "compress", error);
  }
}

type GzipLevel = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

function toGzipLevel(level: number): GzipLevel {
  const levels: readonly GzipLevel[] = [1, 2, 3, 4, 5, 6, 7, 8, 9];
  return levels.find((candidate) => candidate === level) ?? 6;
}

export const GzipDecompressor = {
  decompress,
} as const;
