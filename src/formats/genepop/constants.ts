/**
 * Genepop format constants
 */

/**
 * Rows that separate population blocks; matched exactly, case variants only
 */
export const POP_DELIMITERS: readonly string[] = ["Pop", "pop", "POP"];

/**
 * Separator between a sample ID and its genotype codes
 */
export const SAMPLE_DELIMITER = " ,  ";

/**
 * Allele value written for missing data
 */
export const MISSING_ALLELE = -9;

/**
 * Stacks version reported once the tag row has been reclaimed as a locus name
 */
export const NO_STACKS_VERSION = "No STACKS version specified";

/**
 * Separator between population name and individual in a sample ID
 */
export const POPULATION_SEPARATOR = "_";

/**
 * Stable codes for non-fatal parser and conversion warnings
 */
export const WARNING_CODES = {
  HEADER_MISALIGNMENT: "HEADER_MISALIGNMENT",
  COMMA_LOCUS_ROW: "COMMA_LOCUS_ROW",
  EMPTY_POPULATION: "EMPTY_POPULATION",
  GROUPING_MISMATCH: "GROUPING_MISMATCH",
} as const;
