/**
 * Abstract base parser with shared option handling
 *
 * Gives the Genepop and DSV parsers one way to merge defaults with user
 * options and to report warnings, without imposing parsing details.
 */

import type { ParserOptions } from "../types";

/**
 * Abstract parser base class
 *
 * Both text formats handled here are small enough to parse whole, so parsers
 * return a complete document rather than a record stream.
 *
 * @template T - The document type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: TOptions & Required<ParserOptions>;

  constructor(options: TOptions) {
    const baseDefaults: Required<ParserOptions> = {
      onWarning: (warning: string, lineNumber?: number): void => {
        const where = lineNumber !== undefined ? ` (line ${lineNumber})` : "";
        console.warn(`${this.getFormatName()} Warning${where}: ${warning}`);
      },
    };

    // Merge in order: base -> format-specific -> user options
    this.options = {
      ...baseDefaults,
      ...this.getDefaultOptions(),
      ...options,
      onWarning: options.onWarning ?? baseDefaults.onWarning,
    };
  }

  /**
   * Get format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  /**
   * Report a non-fatal problem through the configured warning handler
   */
  protected warn(warning: string, lineNumber?: number): void {
    this.options.onWarning(warning, lineNumber);
  }

  /**
   * Parse a complete document from a string
   */
  abstract parseString(data: string): T;

  /**
   * Parse a complete document from a file
   */
  abstract parseFile(filePath: string): Promise<T>;

  /**
   * Get format name for error messages and logging
   * @returns Format identifier (e.g., "Genepop", "CSV")
   */
  protected abstract getFormatName(): string;
}

