/**
 * Error handling for proteome composition analysis
 *
 * Every error raised while reading, parsing or aggregating a genome is an
 * `ArscError`, so callers (and the genome scheduler) can classify failures
 * without string matching.
 */

/**
 * Base error class for all ARSC errors
 */
export class ArscError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "ArscError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed options or invalid data
 */
export class ValidationError extends ArscError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends ArscError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * Sequence-level problems (illegal residue characters, orphan sequence data)
 */
export class SequenceError extends ValidationError {
  constructor(
    message: string,
    public readonly sequenceId: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, lineNumber, context);
    this.name = "SequenceError";
  }
}

/**
 * A genome with no recognized residues: every ARSC ratio would divide by zero
 */
export class DegenerateGenomeError extends ArscError {
  constructor(
    public readonly genomeId: string,
    public readonly sequenceCount: number,
    public readonly unknownCount: number
  ) {
    super(
      sequenceCount === 0
        ? `Genome '${genomeId}' contains no sequences`
        : `Genome '${genomeId}' has no recognized residues (${sequenceCount} sequences, ${unknownCount} unrecognized symbols)`,
      "DEGENERATE_GENOME"
    );
    this.name = "DegenerateGenomeError";
  }
}

/**
 * Compression/decompression errors
 */
export class CompressionError extends ArscError {
  constructor(
    message: string,
    public readonly format: "gzip" | "zstd" | "none",
    public readonly operation: "detect" | "decompress" | "compress" | "validate",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    if (systemError instanceof CompressionError) {
      return systemError;
    }
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = CompressionError.getSuggestionForCompressionError(format, errorMessage);

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      format,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForCompressionError(
    format: CompressionError["format"],
    errorMessage: string
  ): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("magic") || msg.includes("header")) {
      return `File may be corrupted or not actually ${format} compressed`;
    }
    if (msg.includes("truncated") || msg.includes("unexpected end")) {
      return "File appears to be truncated or incomplete";
    }
    if (msg.includes("crc") || msg.includes("checksum")) {
      return "Data integrity check failed - file may be corrupted";
    }
    return undefined;
  }

  override toString(): string {
    let msg = super.toString();
    if (this.bytesProcessed !== undefined) {
      msg += `\nBytes processed: ${this.bytesProcessed}`;
    }
    return msg;
  }
}

/**
 * File I/O errors
 */
export class FileError extends ArscError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "list",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    if (systemError instanceof FileError) {
      return systemError;
    }
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed for '${filePath}': ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("emfile") || msg.includes("too many open files")) {
      return "Lower the worker count or increase system limits";
    }
    return undefined;
  }
}

/**
 * Generic suggestions keyed by error code
 */
export const ERROR_SUGGESTIONS = {
  VALIDATION_ERROR: "Check option values and input data against the documented constraints",
  PARSE_ERROR: "Check that the input is a protein FASTA file (.faa) and not nucleotide data",
  DEGENERATE_GENOME:
    "The proteome has no canonical amino acids; check that the file is not empty or masked",
  COMPRESSION_ERROR: "Check that the file is not truncated and its extension matches its content",
  FILE_ERROR: "Check the path and file permissions",
} as const;

function hasSuggestion(code: string): code is keyof typeof ERROR_SUGGESTIONS {
  return Object.hasOwn(ERROR_SUGGESTIONS, code);
}

/**
 * Get a remediation hint for an error
 */
export function getErrorSuggestion(error: ArscError): string | undefined {
  return hasSuggestion(error.code) ? ERROR_SUGGESTIONS[error.code] : undefined;
}
