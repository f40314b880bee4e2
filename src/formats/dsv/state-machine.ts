/**
 * CSV State Machine Module
 *
 * RFC 4180 field splitting: quoted fields, doubled quotes and delimiters
 * inside quotes.
 */

import { DSVParseError } from "../../errors";
import { CSVParseState } from "./types";

/**
 * Count unescaped quotes in a line
 *
 * @param escapeChar - Usually the quote itself, as RFC 4180 doubles quotes
 */
export function countUnescapedQuotes(line: string, quote: string, escapeChar: string): number {
  let count = 0;
  for (let i = 0; i < line.length; i++) {
    if (line[i] !== quote) continue;
    if (escapeChar === quote && line[i + 1] === quote) {
      i++;
    } else {
      count++;
    }
  }
  return count;
}

/**
 * Check whether every quote opened in the text is closed
 *
 * A row with unbalanced quotes continues on the next line.
 */
export function hasBalancedQuotes(line: string, quote: string, escapeChar: string): boolean {
  return countUnescapedQuotes(line, quote, escapeChar) % 2 === 0;
}

/**
 * Split one logical CSV row into fields
 *
 * @throws {DSVParseError} On an unclosed quoted field
 */
export function parseCSVRow(
  line: string,
  delimiter: string = ",",
  quote: string = '"',
  escapeChar: string = '"',
  lineNumber?: number
): string[] {
  const fields: string[] = [];
  let currentField = "";
  let state = CSVParseState.FIELD_START;

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);
    const nextChar = line.charAt(i + 1);

    switch (state) {
      case CSVParseState.FIELD_START:
        if (char === quote) {
          state = CSVParseState.QUOTED_FIELD;
        } else if (char === delimiter) {
          fields.push("");
        } else {
          currentField = char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        break;

      case CSVParseState.UNQUOTED_FIELD:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = CSVParseState.FIELD_START;
        } else {
          currentField += char;
        }
        break;

      case CSVParseState.QUOTED_FIELD:
        if (char === quote && escapeChar === quote && nextChar === quote) {
          currentField += quote;
          i++;
        } else if (char === escapeChar && escapeChar !== quote && nextChar === quote) {
          currentField += quote;
          i++;
        } else if (char === quote) {
          state = CSVParseState.QUOTE_IN_QUOTED;
        } else {
          currentField += char;
        }
        break;

      case CSVParseState.QUOTE_IN_QUOTED:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = CSVParseState.FIELD_START;
        } else {
          // Text after a closing quote stays part of the field
          currentField += char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        break;
    }
  }

  if (state === CSVParseState.QUOTED_FIELD) {
    throw new DSVParseError("Unclosed quote in CSV field", lineNumber, fields.length + 1);
  }
  if (state === CSVParseState.UNQUOTED_FIELD || state === CSVParseState.QUOTE_IN_QUOTED) {
    fields.push(currentField);
  } else if (line.endsWith(delimiter)) {
    fields.push("");
  }

  return fields;
}
