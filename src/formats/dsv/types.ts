/**
 * DSV Format Type Definitions
 *
 * Types for the delimiter-separated tables the converter reads, chiefly the
 * population grouping table.
 */

import type { ParserOptions } from "../../types";

/**
 * Supported delimiter types for DSV formats
 */
export type DelimiterType = "," | "\t" | ";" | string;

/**
 * Parser state for CSV/TSV parsing state machine
 */
export enum CSVParseState {
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  QUOTE_IN_QUOTED,
}

/**
 * How rows whose column count differs from the header are handled
 */
export type RaggedRowHandling = "error" | "pad" | "truncate";

/**
 * DSV parser options extending base parser options
 */
export interface DSVParserOptions extends ParserOptions {
  delimiter?: DelimiterType;
  quote?: string;
  escape?: string;

  /** First row holds column names (default true) */
  header?: boolean;

  skipEmptyLines?: boolean;
  skipComments?: boolean;
  commentPrefix?: string;

  raggedRows?: RaggedRowHandling;

  /** Maximum lines a single quoted field can span (default 100) */
  maxFieldLines?: number;
}

/**
 * A parsed delimiter-separated table
 */
export interface DSVTable {
  /** Column names, empty when the table was read without a header */
  readonly headers: readonly string[];
  /** Data rows in file order */
  readonly rows: readonly (readonly string[])[];
  /** Source line number of each data row */
  readonly lineNumbers: readonly number[];
}
