/**
 * Compression support for proteome inputs and result tables
 */

export { CompressionDetector, COMPRESSION_EXTENSIONS } from "./detector";
export { GzipDecompressor } from "./gzip";
export { CompressionService, type CompressionServiceShape } from "./service";

export type { CompressionDetection, CompressionFormat, DecompressorOptions } from "../types";
export { CompressionFormatSchema, DecompressorOptionsSchema } from "../types";
export { CompressionError } from "../errors";

