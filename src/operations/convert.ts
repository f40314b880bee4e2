/**
 * Genepop → STRUCTURE conversion
 *
 * The staged pipeline: load input rows, tokenize (phase 1), parse and decode
 * genotype rows (phase 2), resolve group labels, format STRUCTURE rows, then
 * write. Every validation runs before the single write, so a failed
 * conversion leaves no output file behind.
 *
 * @module operations/convert
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import { GenepopParser } from "../formats/genepop/parser";
import type { GenepopDocument } from "../formats/genepop/types";
import { StructureWriter } from "../formats/structure/writer";
import { writeString } from "../io/file-writer";
import type { WarningHandler, WriteOptions } from "../types";
import { normalizeGroupingTable, readGroupingTable, resolveGroups } from "./population-groups";
import type {
  ConvertOptions,
  GenepopInput,
  GroupingTable,
  GroupLabel,
  StructureConversionResult,
} from "./types";

/**
 * Declarative ArkType schema for ConvertOptions
 */
const ConvertOptionsSchema = type({
  genepop: type("string>0 | string[]").or({ text: "string" }),
  "popgroup?": "unknown",
  "locusnames?": "boolean",
  "path?": "string>0",
  "compression?": '"gzip"|"none"',
  "onWarning?": "unknown",
});

/**
 * Options for the in-memory conversion variants
 */
export type InMemoryConvertOptions = Omit<ConvertOptions, "genepop" | "popgroup" | "path"> & {
  popgroup?: GroupingTable;
};

const defaultGroupingWarning: WarningHandler = (warning) => {
  console.warn(`STRUCTURE Warning: ${warning}`);
};

/**
 * Convert an already parsed Genepop document
 *
 * @param grouping - Normalized population → group table, if any
 */
export function convertGenepopDocument(
  document: GenepopDocument,
  grouping: ReadonlyMap<string, GroupLabel> | undefined,
  options: Pick<ConvertOptions, "locusnames" | "onWarning"> = {}
): StructureConversionResult {
  const populations = document.individuals.map((individual) => individual.population);
  const groups = resolveGroups(
    populations,
    grouping,
    options.onWarning ?? defaultGroupingWarning
  );

  const writer = new StructureWriter({ locusNames: options.locusnames ?? false });
  const lines = writer.formatLines(document, groups.groups);

  return {
    output: writer.joinLines(lines),
    lines,
    individualCount: document.individuals.length,
    dataRowCount: document.individuals.length * 2,
    locusNames: document.locusNames,
    stacksVersion: document.stacksVersion,
    groups,
    recoveries: document.recoveries,
    warnings: [...document.warnings, ...groups.warnings],
  };
}

/**
 * Convert Genepop text held in memory
 *
 * @example
 * ```typescript
 * const result = convertGenepopText("Stacks\nLoc1\nLoc2\nPop\nBON_01 ,  001002 003004\n");
 * result.lines; // ["BON_01 1 1 3", "BON_01 1 2 4"]
 * ```
 */
export function convertGenepopText(
  text: string,
  options: InMemoryConvertOptions = {}
): StructureConversionResult {
  const parser = new GenepopParser({ onWarning: options.onWarning });
  return convertGenepopDocument(parser.parseString(text), toGrouping(options.popgroup), options);
}

/**
 * Convert Genepop rows loaded as a single-column table
 */
export function convertGenepopRows(
  rows: readonly string[],
  options: InMemoryConvertOptions = {}
): StructureConversionResult {
  const parser = new GenepopParser({ onWarning: options.onWarning });
  return convertGenepopDocument(parser.parseTable(rows), toGrouping(options.popgroup), options);
}

/**
 * Convert Genepop data to STRUCTURE input format
 *
 * Reads the Genepop data and optional grouping table, converts, and writes
 * the result to `path` when one is given.
 *
 * @example
 * ```typescript
 * await genepopToStructure({
 *   genepop: "data/salmon.gen",
 *   popgroup: "data/groups.csv",
 *   locusnames: true,
 *   path: "out/salmon.str",
 * });
 * ```
 *
 * @throws {ValidationError} If the options are invalid
 * @throws {GenepopParseError} Or a subclass, on malformed Genepop input
 * @throws {FileError} If an input cannot be read or the output written
 */
export async function genepopToStructure(
  options: ConvertOptions
): Promise<StructureConversionResult> {
  const validation = ConvertOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid conversion options: ${validation.summary}`);
  }

  const document = await loadDocument(options.genepop, options.onWarning);
  const grouping =
    typeof options.popgroup === "string"
      ? await readGroupingTable(options.popgroup)
      : toGrouping(options.popgroup);

  const result = convertGenepopDocument(document, grouping, options);
  if (options.path === undefined) {
    return result;
  }

  const writeOptions: WriteOptions =
    options.compression !== undefined ? { compressionFormat: options.compression } : {};
  await writeString(options.path, result.output, writeOptions);
  return { ...result, path: options.path };
}

async function loadDocument(
  input: GenepopInput,
  onWarning: WarningHandler | undefined
): Promise<GenepopDocument> {
  const parser = new GenepopParser({ onWarning });
  if (typeof input === "string") {
    return parser.parseFile(input);
  }
  if (isTable(input)) {
    return parser.parseTable(input);
  }
  return parser.parseString(input.text);
}

function isTable(input: GenepopInput): input is readonly string[] {
  return Array.isArray(input);
}

function toGrouping(table: GroupingTable | undefined): Map<string, GroupLabel> | undefined {
  return table === undefined ? undefined : normalizeGroupingTable(table);
}
