/**
 * Genepop tokenizer (phase 1)
 *
 * Turns raw text into classified rows: the stacks version tag, the locus-name
 * block, `Pop` delimiter rows and genotype rows. Nothing here looks inside a
 * genotype row; that is phase 2's job.
 */

import { GenepopParseError } from "../../errors";
import { POP_DELIMITERS } from "./constants";
import type { GenepopRow, HeaderForm, TokenizedGenepop } from "./types";

const TRAILING_WHITESPACE = /[ \t\r]+$/;

/**
 * Split Genepop text into numbered rows
 *
 * Accepts LF and CRLF endings, drops a UTF-8 byte order mark and trailing
 * blank rows.
 */
export function toRows(text: string): GenepopRow[] {
  const body = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  return fromTable(body.split(/\r?\n/));
}

/**
 * Number rows that were loaded as a single-column table
 *
 * Trailing spaces, tabs and carriage returns are stripped from every row and
 * trailing blank rows are dropped.
 */
export function fromTable(table: readonly string[]): GenepopRow[] {
  const rows = table.map((line, index) => ({
    text: line.replace(TRAILING_WHITESPACE, ""),
    lineNumber: index + 1,
  }));

  while (rows.length > 0 && rows[rows.length - 1]?.text.trim() === "") {
    rows.pop();
  }
  return rows;
}

/**
 * True when a row is a population delimiter
 */
export function isPopDelimiter(text: string): boolean {
  return POP_DELIMITERS.includes(text);
}

/**
 * Expand a comma-delimited locus list in the first row
 *
 * A first row holding more than one comma is a single list of locus names.
 * It is split, trimmed, and spliced in as one row per name.
 */
export function expandHeaderRow(rows: readonly GenepopRow[]): {
  rows: GenepopRow[];
  headerForm: HeaderForm;
} {
  const [first, ...rest] = rows;
  if (first === undefined || countCommas(first.text) <= 1) {
    return { rows: [...rows], headerForm: "rows" };
  }

  const names = first.text.split(",").map((name) => ({
    text: name.trim(),
    lineNumber: first.lineNumber,
  }));
  return { rows: [...names, ...rest], headerForm: "comma-delimited" };
}

/**
 * Classify Genepop rows
 *
 * @throws {GenepopParseError} If the input is empty or has no `Pop` row
 */
export function tokenizeGenepop(input: readonly GenepopRow[]): TokenizedGenepop {
  const { rows, headerForm } = expandHeaderRow(input);

  const [stacksVersion, ...rest] = rows;
  if (stacksVersion === undefined) {
    throw new GenepopParseError("Genepop input is empty");
  }

  const firstPop = rest.findIndex((row) => isPopDelimiter(row.text));
  if (firstPop === -1) {
    throw new GenepopParseError(
      "No population delimiter row ('Pop', 'pop' or 'POP') found",
      undefined,
      `Searched ${rest.length} rows after line ${stacksVersion.lineNumber}`
    );
  }

  const locusRows = rest.slice(0, firstPop).map((row) => ({
    text: row.text.replace(/\r/g, ""),
    lineNumber: row.lineNumber,
  }));

  const delimiterRows: GenepopRow[] = [];
  const dataRows: (GenepopRow & { populationIndex: number })[] = [];
  for (const row of rest.slice(firstPop)) {
    if (isPopDelimiter(row.text)) {
      delimiterRows.push(row);
    } else {
      dataRows.push({ ...row, populationIndex: delimiterRows.length - 1 });
    }
  }

  return { headerForm, stacksVersion, locusRows, delimiterRows, dataRows };
}

function countCommas(text: string): number {
  let count = 0;
  for (const char of text) {
    if (char === ",") count++;
  }
  return count;
}
