/**
 * Genepop Format Type Definitions
 */

import type { ParserOptions } from "../../types";
import type { WARNING_CODES } from "./constants";

/**
 * Stable identifier of a warning
 */
export type WarningCode = (typeof WARNING_CODES)[keyof typeof WARNING_CODES];

/**
 * A non-fatal problem noticed while parsing or converting
 */
export interface ConversionWarning {
  readonly code: WarningCode;
  readonly message: string;
  readonly lineNumber?: number;
}

/**
 * Named recovery paths the parser may take on a misaligned header
 */
export type RecoveryPath = "header-misalignment" | "comma-locus-row";

/**
 * How the locus names were laid out in the source
 */
export type HeaderForm = "rows" | "comma-delimited";

/**
 * A source row with its 1-based line number
 */
export interface GenepopRow {
  readonly text: string;
  readonly lineNumber: number;
}

/**
 * Phase 1 output: rows classified into header, delimiter and data rows
 */
export interface TokenizedGenepop {
  readonly headerForm: HeaderForm;
  /** First row of the normalized input, free text */
  readonly stacksVersion: GenepopRow;
  /** Rows between the stacks version tag and the first `Pop` row */
  readonly locusRows: readonly GenepopRow[];
  /** Every `Pop` row in file order */
  readonly delimiterRows: readonly GenepopRow[];
  /** Genotype rows in file order, each tagged with its population block */
  readonly dataRows: readonly (GenepopRow & { readonly populationIndex: number })[];
}

/**
 * A genotype row split into sample ID and genotype codes
 */
export interface GenotypeRow {
  readonly sampleId: string;
  readonly genotypes: readonly string[];
  readonly lineNumber: number;
  readonly populationIndex: number;
}

/**
 * Both alleles of a genotype code, missing data already recoded
 */
export type AllelePair = readonly [first: number, second: number];

/**
 * One sampled individual, fully decoded
 */
export interface GenepopIndividual {
  readonly sampleId: string;
  /** Sample ID text before the first `_` */
  readonly population: string;
  /** Raw genotype codes in locus order */
  readonly genotypes: readonly string[];
  /** First allele per locus, `-9` for missing */
  readonly firstAlleles: readonly number[];
  /** Second allele per locus, `-9` for missing */
  readonly secondAlleles: readonly number[];
  /** Index of the `Pop` block the individual belongs to */
  readonly populationIndex: number;
  readonly lineNumber: number;
}

/**
 * A block of individuals following one `Pop` row
 */
export interface GenepopPopulation {
  readonly index: number;
  /** Line number of the `Pop` row opening the block */
  readonly lineNumber: number;
  readonly sampleIds: readonly string[];
}

/**
 * A parsed Genepop file
 */
export interface GenepopDocument {
  readonly headerForm: HeaderForm;
  /** Tag row text, or {@link NO_STACKS_VERSION} once reclaimed as a locus */
  readonly stacksVersion: string;
  readonly locusNames: readonly string[];
  readonly individuals: readonly GenepopIndividual[];
  readonly populations: readonly GenepopPopulation[];
  /** Width of a whole genotype code; each allele takes half */
  readonly alleleWidth: number;
  readonly recoveries: readonly RecoveryPath[];
  readonly warnings: readonly ConversionWarning[];
}

/**
 * Genepop parser options
 */
export interface GenepopParserOptions extends ParserOptions {
  /**
   * Reclaim a single comma-separated locus row when the locus count does not
   * match the genotype columns (default true)
   */
  splitCommaLocusRow?: boolean;
}
