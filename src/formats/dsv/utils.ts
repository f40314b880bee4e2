/**
 * DSV text utilities
 */

import { DSVParseError } from "../../errors";
import type { RaggedRowHandling } from "./types";

/**
 * Remove a UTF-8 byte order mark from the start of text
 */
export function removeBOM(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Split text into lines, accepting LF and CRLF endings
 */
export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * Handle ragged rows (rows with inconsistent column counts)
 *
 * @throws {DSVParseError} When handling is "error" and the count differs
 */
export function handleRaggedRow(
  fields: string[],
  expectedColumns: number,
  handling: RaggedRowHandling,
  lineNumber?: number
): string[] {
  if (fields.length === expectedColumns) {
    return fields;
  }

  switch (handling) {
    case "error":
      throw new DSVParseError(
        `Row has ${fields.length} columns, expected ${expectedColumns}`,
        lineNumber
      );
    case "pad":
      return fields.length < expectedColumns
        ? [...fields, ...new Array<string>(expectedColumns - fields.length).fill("")]
        : fields;
    case "truncate":
      return fields.slice(0, expectedColumns);
  }
}
