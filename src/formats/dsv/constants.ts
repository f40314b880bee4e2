/**
 * DSV Format Constants
 */

/**
 * Default delimiter for different formats
 */
export const DEFAULT_DELIMITERS = {
  csv: ",",
  tsv: "\t",
  ssv: ";",
} as const;

/**
 * Default quote character (RFC 4180 compliant)
 */
export const DEFAULT_QUOTE = '"';

/**
 * Default escape character (doubling quotes per RFC 4180)
 */
export const DEFAULT_ESCAPE = '"';

/**
 * Maximum field size (1MB); grouping tables hold short labels
 */
export const MAX_FIELD_SIZE = 1_000_000;
