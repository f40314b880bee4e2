/**
 * Error handling for Genepop parsing and STRUCTURE conversion
 *
 * Every failure raised by the library is a {@link PopGenError} carrying a
 * stable code, the offending line where one exists and a short context string.
 */

/**
 * Base error class for all conversion errors
 */
export class PopGenError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "PopGenError";
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
 * Validation errors for invalid options or values
 */
export class ValidationError extends PopGenError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends PopGenError {
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
 * DSV-specific parsing error with column context
 */
export class DSVParseError extends ParseError {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
    public readonly field?: string
  ) {
    const context = [
      line !== undefined && `line ${line}`,
      column !== undefined && `column ${column}`,
      field !== undefined && `field "${field}"`,
    ]
      .filter(Boolean)
      .join(", ");

    super(context ? `${message} (${context})` : message, "DSV", line);
    this.name = "DSVParseError";
  }
}

/**
 * Structural Genepop errors (missing `Pop` rows, no individuals)
 */
export class GenepopParseError extends ParseError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "Genepop", lineNumber, context);
    this.name = "GenepopParseError";
  }
}

/**
 * A genotype row whose sample ID is not joined to its loci by `" ,  "`
 */
export class GenepopDelimiterError extends GenepopParseError {
  constructor(
    public readonly row: string,
    lineNumber?: number
  ) {
    super(
      "Genepop sampleID delimiter not in proper format. Ensure sampleIDs are separated from loci by ' ,  ' (space comma space space)",
      lineNumber,
      `Row: "${row}"`
    );
    this.name = "GenepopDelimiterError";
  }
}

/**
 * Locus header and genotype columns cannot be reconciled
 */
export class LocusCountError extends GenepopParseError {
  constructor(
    message: string,
    public readonly expected: number,
    public readonly actual: number,
    lineNumber?: number
  ) {
    super(message, lineNumber, `Expected ${expected} loci, found ${actual}`);
    this.name = "LocusCountError";
  }
}

/**
 * Genotype codes whose detected width cannot hold two equal alleles
 */
export class AlleleWidthError extends GenepopParseError {
  constructor(
    public readonly detectedWidth: number,
    context?: string
  ) {
    super(
      `The length of each allele is assumed to be equal (e.g. loci - 001001 with 001 for each allele), but a max loci length of ${detectedWidth} was detected. Please check data.`,
      undefined,
      context
    );
    this.name = "AlleleWidthError";
  }
}

/**
 * A single genotype code that cannot be split into two numeric alleles
 */
export class GenotypeCodeError extends GenepopParseError {
  constructor(
    message: string,
    public readonly sampleId: string,
    public readonly genotype: string,
    lineNumber?: number
  ) {
    super(`Sample '${sampleId}': ${message}`, lineNumber, `Genotype: "${genotype}"`);
    this.name = "GenotypeCodeError";
  }
}

/**
 * Sample IDs that do not carry a `POP_` prefix
 */
export class PopulationLabelError extends GenepopParseError {
  constructor(
    public readonly sampleId: string,
    lineNumber?: number
  ) {
    super(
      `Sample ID '${sampleId}' has no '_' separating the population name from the individual`,
      lineNumber,
      "Population labels are taken from the text before the first '_' in each sample ID"
    );
    this.name = "PopulationLabelError";
  }
}

/**
 * Compression/decompression errors with detailed context
 */
export class CompressionError extends PopGenError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "decompress" | "compress",
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  /**
   * Create compression error from system error
   */
  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const msg = errorMessage.toLowerCase();
    const suggestion =
      msg.includes("header") || msg.includes("magic")
        ? `. File may be corrupted or not actually ${format} compressed`
        : msg.includes("unexpected end")
          ? ". File appears to be truncated or incomplete"
          : "";

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion}`,
      format,
      operation,
      `System error: ${errorMessage}`
    );
  }
}

/**
 * File I/O errors with detailed context
 */
export class FileError extends PopGenError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat",
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
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  /**
   * Get helpful suggestion based on system error
   */
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
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }
}

/**
 * Error recovery suggestions for common issues
 */
export const ERROR_SUGGESTIONS = {
  MISSING_POP: "Genepop files separate populations with a row containing only 'Pop'",
  SAMPLE_DELIMITER: "Join each sample ID to its genotypes with ' ,  ' (space comma space space)",
  ALLELE_WIDTH: "Genotype codes hold two equal-width alleles, e.g. 001002 or 0102",
  LOCUS_COUNT: "Each genotype row needs one code per locus name in the header",
  POPULATION_LABEL: "Prefix sample IDs with their population and '_', e.g. BON_01",
  MALFORMED_LINE: "Check for extra whitespace, tabs, or encoding issues",
} as const;

/**
 * Get helpful suggestion for common error patterns
 */
export function getErrorSuggestion(error: PopGenError): string {
  if (error instanceof GenepopDelimiterError) return ERROR_SUGGESTIONS.SAMPLE_DELIMITER;
  if (error instanceof AlleleWidthError || error instanceof GenotypeCodeError) {
    return ERROR_SUGGESTIONS.ALLELE_WIDTH;
  }
  if (error instanceof LocusCountError) return ERROR_SUGGESTIONS.LOCUS_COUNT;
  if (error instanceof PopulationLabelError) return ERROR_SUGGESTIONS.POPULATION_LABEL;
  if (error.message.toLowerCase().includes("pop")) return ERROR_SUGGESTIONS.MISSING_POP;

  return ERROR_SUGGESTIONS.MALFORMED_LINE;
}
