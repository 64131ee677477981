/**
 * Compression format detection for proteome files
 *
 * Magic bytes are authoritative; the file extension is the fallback for
 * inputs too short to carry a signature.
 */

import { CompressionError } from "../errors";
import type { CompressionDetection, CompressionFormat } from "../types";

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;
const ZSTD_MAGIC_FIRST_BYTE = 0x28;
const ZSTD_MAGIC_SECOND_BYTE = 0xb5;
const ZSTD_MAGIC_THIRD_BYTE = 0x2f;
const ZSTD_MAGIC_FOURTH_BYTE = 0xfd;

const COMPRESSION_MAGIC_BYTES = {
  gzip: new Uint8Array([GZIP_MAGIC_FIRST_BYTE, GZIP_MAGIC_SECOND_BYTE]),
  zstd: new Uint8Array([
    ZSTD_MAGIC_FIRST_BYTE,
    ZSTD_MAGIC_SECOND_BYTE,
    ZSTD_MAGIC_THIRD_BYTE,
    ZSTD_MAGIC_FOURTH_BYTE,
  ]),
} as const;

export const COMPRESSION_EXTENSIONS = {
  gzip: [".gz", ".gzip"],
  zstd: [".zst", ".zstd"],
} as const;

const EXTENSION_CONFIDENCE = 0.6;

function startsWith(bytes: Uint8Array, magic: Uint8Array): boolean {
  return bytes.length >= magic.length && magic.every((byte, index) => bytes[index] === byte);
}

/**
 * Compression format detector
 *
 * @example
 * ```typescript
 * CompressionDetector.fromExtension("Ecoli.faa.gz"); // 'gzip'
 * CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08])).format; // 'gzip'
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from file extension
   * @throws {CompressionError} If the path is empty
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError("File path must not be empty", "none", "detect");
    }

    const normalizedPath = filePath.toLowerCase().replace(/\\/g, "/");

    if (COMPRESSION_EXTENSIONS.gzip.some((ext) => normalizedPath.endsWith(ext))) {
      return "gzip";
    }
    if (COMPRESSION_EXTENSIONS.zstd.some((ext) => normalizedPath.endsWith(ext))) {
      return "zstd";
    }
    return "none";
  }

  /**
   * Detect compression format from leading bytes
   *
   * Empty input is reported as uncompressed with full confidence: there is
   * nothing to decompress.
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionDetection {
    if (startsWith(bytes, COMPRESSION_MAGIC_BYTES.gzip)) {
      return {
        format: "gzip",
        confidence: 1.0,
        magicBytes: bytes.slice(0, COMPRESSION_MAGIC_BYTES.gzip.length),
        detectionMethod: "magic-bytes",
      };
    }
    if (startsWith(bytes, COMPRESSION_MAGIC_BYTES.zstd)) {
      return {
        format: "zstd",
        confidence: 1.0,
        magicBytes: bytes.slice(0, COMPRESSION_MAGIC_BYTES.zstd.length),
        detectionMethod: "magic-bytes",
      };
    }

    // Anything long enough to hold a signature and lacking one is plain text
    const confidence = bytes.length >= COMPRESSION_MAGIC_BYTES.zstd.length || bytes.length === 0 ? 1.0 : 0.5;
    return { format: "none", confidence, detectionMethod: "magic-bytes" };
  }

  /**
   * Combine magic-byte and extension evidence
   */
  static detect(filePath: string, bytes: Uint8Array): CompressionDetection {
    const byMagic = CompressionDetector.fromMagicBytes(bytes);
    const byExtension = CompressionDetector.fromExtension(filePath);
    const dotAt = filePath.lastIndexOf(".");
    const extension = dotAt === -1 ? "" : filePath.slice(dotAt).toLowerCase();

    if (byMagic.format !== "none" || byMagic.confidence === 1.0) {
      return {
        ...byMagic,
        extension,
        detectionMethod: byMagic.format === byExtension ? "hybrid" : "magic-bytes",
      };
    }

    return {
      format: byExtension,
      confidence: EXTENSION_CONFIDENCE,
      extension,
      detectionMethod: "extension",
    };
  }
}
