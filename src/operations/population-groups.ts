/**
 * Population grouping
 *
 * STRUCTURE's second column carries a group label per individual. Without a
 * grouping table each population gets its own integer code; with one, each
 * population takes the table's label. A table that misses any population is
 * rejected as a whole: the dataset falls back to default coding and a
 * `GROUPING_MISMATCH` warning is raised.
 */

import { DSVParseError, ValidationError } from "../errors";
import { DSVParser } from "../formats/dsv";
import { WARNING_CODES } from "../formats/genepop/constants";
import type { ConversionWarning } from "../formats/genepop/types";
import type { WarningHandler } from "../types";
import type { GroupAssignment, GroupingTable, GroupLabel } from "./types";

/**
 * Integer group codes in order of first appearance, starting at 1
 *
 * @example
 * ```typescript
 * defaultGroupCodes(["CAR", "BON", "CAR"]); // Map { "CAR" => 1, "BON" => 2 }
 * ```
 */
export function defaultGroupCodes(labels: readonly string[]): Map<string, number> {
  const codes = new Map<string, number>();
  for (const label of labels) {
    if (!codes.has(label)) {
      codes.set(label, codes.size + 1);
    }
  }
  return codes;
}

/**
 * Convert any accepted grouping table into a label → group map
 *
 * The first row for a population wins.
 *
 * @throws {DSVParseError} If an array row has fewer than two columns
 */
export function normalizeGroupingTable(table: GroupingTable): Map<string, GroupLabel> {
  const mapping = new Map<string, GroupLabel>();
  const add = (population: string, group: GroupLabel): void => {
    if (!mapping.has(population)) mapping.set(population, group);
  };

  if (isMap(table)) {
    table.forEach((group, population) => add(population, group));
  } else if (isRowTable(table)) {
    table.forEach((row, index) => {
      const [population, group] = row;
      if (population === undefined || group === undefined) {
        throw new DSVParseError(
          "Grouping table rows need a population label and a group label",
          index + 1
        );
      }
      add(String(population), group);
    });
  } else {
    Object.entries(table).forEach(([population, group]) => add(population, group));
  }

  return mapping;
}

/**
 * Read a grouping table from a CSV file with a header row
 *
 * Column 1 is the population label, column 2 the group label.
 *
 * @throws {DSVParseError} If the table has fewer than two columns
 * @throws {FileError} If the file cannot be read
 */
export async function readGroupingTable(path: string): Promise<Map<string, GroupLabel>> {
  const table = await new DSVParser({ delimiter: ",", header: true }).parseFile(path);
  if (table.headers.length < 2) {
    throw new DSVParseError(
      `Grouping table needs two columns (population, group), found ${table.headers.length}`,
      1
    );
  }

  return normalizeGroupingTable(table.rows.map((row) => row.map((field) => field.trim())));
}

/**
 * Resolve a group label for every individual
 *
 * @param populations - Population label of each individual, in input order
 * @param table - Grouping table, already normalized
 * @param onWarning - Receives the `GROUPING_MISMATCH` warning
 */
export function resolveGroups(
  populations: readonly string[],
  table?: ReadonlyMap<string, GroupLabel>,
  onWarning?: WarningHandler
): GroupAssignment {
  const defaults = defaultGroupCodes(populations);

  if (table === undefined) {
    return {
      source: "default",
      groups: populations.map((population) => defaults.get(population) ?? 0),
      mapping: defaults,
      missing: [],
      warnings: [],
    };
  }

  const missing = [...defaults.keys()].filter((population) => !table.has(population));
  if (missing.length > 0) {
    const warning: ConversionWarning = {
      code: WARNING_CODES.GROUPING_MISMATCH,
      message: `Population levels missing from popgroup input (${missing.join(", ")}). STRUCTURE groups now set to default population levels`,
    };
    onWarning?.(warning.message);

    return {
      source: "default-fallback",
      groups: populations.map((population) => defaults.get(population) ?? 0),
      mapping: defaults,
      missing,
      warnings: [warning],
    };
  }

  const mapping = new Map<string, GroupLabel>();
  for (const population of defaults.keys()) {
    mapping.set(population, lookup(table, population));
  }
  return {
    source: "table",
    groups: populations.map((population) => lookup(table, population)),
    mapping,
    missing: [],
    warnings: [],
  };
}

function lookup(table: ReadonlyMap<string, GroupLabel>, population: string): GroupLabel {
  const group = table.get(population);
  if (group === undefined) {
    throw new ValidationError(`Population '${population}' is missing from the grouping table`);
  }
  return group;
}

function isMap(table: GroupingTable): table is ReadonlyMap<string, GroupLabel> {
  return table instanceof Map;
}

function isRowTable(table: GroupingTable): table is readonly (readonly (string | number)[])[] {
  return Array.isArray(table);
}
