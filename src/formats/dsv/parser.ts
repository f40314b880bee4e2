/**
 * @module formats/dsv/parser
 * @description Delimiter-separated table parser
 *
 * Reads small CSV/TSV tables whole: RFC 4180 quoting, quoted fields spanning
 * lines, optional header row, comment and blank line skipping.
 */

import { type } from "arktype";
import { DSVParseError, ValidationError } from "../../errors";
import { readToString } from "../../io/file-reader";
import { AbstractParser } from "../abstract-parser";
import { DEFAULT_DELIMITERS, DEFAULT_ESCAPE, DEFAULT_QUOTE, MAX_FIELD_SIZE } from "./constants";
import { hasBalancedQuotes, parseCSVRow } from "./state-machine";
import type { DSVParserOptions, DSVTable } from "./types";
import { handleRaggedRow, removeBOM, splitLines } from "./utils";

const DSVParserOptionsSchema = type({
  "delimiter?": "string==1",
  "quote?": "string==1",
  "escape?": "string==1",
  "header?": "boolean",
  "skipEmptyLines?": "boolean",
  "skipComments?": "boolean",
  "commentPrefix?": "string>0",
  "raggedRows?": '"error"|"pad"|"truncate"',
  "maxFieldLines?": "number>0",
  "onWarning?": "unknown",
});

/**
 * DSVParser - CSV/TSV table parser
 *
 * @example Reading a grouping table
 * ```typescript
 * const parser = new DSVParser({ delimiter: "," });
 * const table = parser.parseString("pop,group\nBON,1\nCAR,2\n");
 * table.headers; // ["pop", "group"]
 * table.rows;    // [["BON", "1"], ["CAR", "2"]]
 * ```
 */
export class DSVParser extends AbstractParser<DSVTable, DSVParserOptions> {
  private readonly delimiter: string;
  private readonly quote: string;
  private readonly escapeChar: string;

  protected getDefaultOptions(): Partial<DSVParserOptions> {
    return {
      delimiter: DEFAULT_DELIMITERS.csv,
      quote: DEFAULT_QUOTE,
      escape: DEFAULT_ESCAPE,
      header: true,
      skipEmptyLines: true,
      skipComments: false,
      commentPrefix: "#",
      raggedRows: "pad",
      maxFieldLines: 100,
    };
  }

  constructor(options: DSVParserOptions = {}) {
    const validation = DSVParserOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid DSV parser options: ${validation.summary}`);
    }

    super(options);

    this.delimiter = this.options.delimiter ?? DEFAULT_DELIMITERS.csv;
    this.quote = this.options.quote ?? DEFAULT_QUOTE;
    this.escapeChar = this.options.escape ?? DEFAULT_ESCAPE;
  }

  protected getFormatName(): string {
    switch (this.delimiter) {
      case ",":
        return "CSV";
      case "\t":
        return "TSV";
      default:
        return "DSV";
    }
  }

  /**
   * Parse a whole table from text
   *
   * @throws {DSVParseError} On unclosed quotes, oversized fields or ragged rows
   *   when `raggedRows` is "error"
   */
  parseString(data: string): DSVTable {
    const records = this.collectRecords(splitLines(removeBOM(data)));

    let headers: string[] = [];
    let body = records;
    if (this.options.header === true && records.length > 0) {
      const [first, ...rest] = records;
      headers = first?.fields.map((name) => name.trim()) ?? [];
      body = rest;
    }

    const expectedColumns = headers.length > 0 ? headers.length : (body[0]?.fields.length ?? 0);
    const handling = this.options.raggedRows ?? "pad";

    return {
      headers,
      rows: body.map(({ fields, lineNumber }) =>
        handleRaggedRow(fields, expectedColumns, handling, lineNumber)
      ),
      lineNumbers: body.map(({ lineNumber }) => lineNumber),
    };
  }

  /**
   * Parse a table from a file, gzip input included
   */
  async parseFile(filePath: string): Promise<DSVTable> {
    const text = await readToString(filePath);
    return this.parseString(text);
  }

  /**
   * Join physical lines into logical rows and split each into fields
   */
  private collectRecords(lines: string[]): { fields: string[]; lineNumber: number }[] {
    const records: { fields: string[]; lineNumber: number }[] = [];
    const maxFieldLines = this.options.maxFieldLines ?? 100;

    let pending = "";
    let pendingStart = 0;
    let pendingLines = 0;

    lines.forEach((line, index) => {
      const lineNumber = index + 1;

      if (pendingLines === 0) {
        if (this.options.skipEmptyLines === true && line.trim() === "") return;
        if (
          this.options.skipComments === true &&
          line.startsWith(this.options.commentPrefix ?? "#")
        ) {
          return;
        }
        pending = line;
        pendingStart = lineNumber;
      } else {
        pending += `\n${line}`;
      }
      pendingLines++;

      if (!hasBalancedQuotes(pending, this.quote, this.escapeChar)) {
        if (pendingLines >= maxFieldLines) {
          throw new DSVParseError(
            `Quoted field spans more than ${maxFieldLines} lines`,
            pendingStart
          );
        }
        return;
      }

      const fields = parseCSVRow(pending, this.delimiter, this.quote, this.escapeChar, pendingStart);
      fields.forEach((field, column) => {
        if (field.length > MAX_FIELD_SIZE) {
          throw new DSVParseError(
            `Field exceeds maximum size of ${MAX_FIELD_SIZE} characters`,
            pendingStart,
            column + 1
          );
        }
      });
      records.push({ fields, lineNumber: pendingStart });
      pendingLines = 0;
    });

    if (pendingLines > 0) {
      throw new DSVParseError("Unclosed quote at end of input", pendingStart);
    }

    return records;
  }
}
