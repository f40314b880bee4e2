/**
 * DSV (Delimiter-Separated Values) module exports
 *
 * @module dsv
 */

export { DEFAULT_DELIMITERS, DEFAULT_ESCAPE, DEFAULT_QUOTE, MAX_FIELD_SIZE } from "./constants";
export { DSVParser } from "./parser";
export { countUnescapedQuotes, hasBalancedQuotes, parseCSVRow } from "./state-machine";
export type { DelimiterType, DSVParserOptions, DSVTable, RaggedRowHandling } from "./types";
export { CSVParseState } from "./types";
export { handleRaggedRow, removeBOM, splitLines } from "./utils";
