/**
 * Shared types for conversion operations
 */

import type { ConversionWarning, RecoveryPath } from "../formats/genepop/types";
import type { CompressionFormat, WarningHandler } from "../types";

/**
 * Group label written in STRUCTURE's second column
 */
export type GroupLabel = string | number;

/**
 * An in-memory population grouping table
 *
 * Rows take the population label first and the group label second; further
 * columns are ignored. Maps and plain records key by population label.
 */
export type GroupingTable =
  | readonly (readonly (string | number)[])[]
  | ReadonlyMap<string, GroupLabel>
  | Readonly<Record<string, GroupLabel>>;

/**
 * Where the group labels came from
 *
 * `default-fallback` means a table was given but did not cover every
 * population, so the whole dataset fell back to default coding.
 */
export type GroupSource = "default" | "table" | "default-fallback";

/**
 * Group labels resolved for every individual
 */
export interface GroupAssignment {
  readonly source: GroupSource;
  /** Group label per individual, in input order */
  readonly groups: readonly GroupLabel[];
  /** Group label per population label */
  readonly mapping: ReadonlyMap<string, GroupLabel>;
  /** Population labels the table did not cover */
  readonly missing: readonly string[];
  readonly warnings: readonly ConversionWarning[];
}

/**
 * Genepop input accepted by the converter
 *
 * A string is a file path; `{ text }` is file content already in memory; an
 * array is a single-column table with one row per element.
 */
export type GenepopInput = string | { readonly text: string } | readonly string[];

/**
 * Options for converting Genepop to STRUCTURE
 */
export interface ConvertOptions {
  /** Genepop data: path, in-memory text, or single-column table */
  genepop: GenepopInput;

  /** Population grouping table: CSV path or in-memory table */
  popgroup?: string | GroupingTable;

  /** Write the locus names as the first output row (default false) */
  locusnames?: boolean;

  /** Output file; when absent the result is only returned */
  path?: string;

  /** Output compression; detected from the path extension when absent */
  compression?: CompressionFormat;

  /** Warning sink; defaults to console.warn */
  onWarning?: WarningHandler;
}

/**
 * Outcome of a conversion
 */
export interface StructureConversionResult {
  /** STRUCTURE text exactly as written */
  readonly output: string;
  /** Output lines, header included when requested */
  readonly lines: readonly string[];
  readonly individualCount: number;
  /** Allele rows written, always twice the individual count */
  readonly dataRowCount: number;
  readonly locusNames: readonly string[];
  readonly stacksVersion: string;
  readonly groups: GroupAssignment;
  readonly recoveries: readonly RecoveryPath[];
  readonly warnings: readonly ConversionWarning[];
  /** File written, when a path was given */
  readonly path?: string;
}
