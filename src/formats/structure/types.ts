/**
 * STRUCTURE Format Type Definitions
 */

/**
 * One STRUCTURE data row: one allele per locus for one individual
 */
export interface StructureRow {
  readonly sampleId: string;
  readonly group: string | number;
  /** Allele values in locus order, `-9` for missing */
  readonly alleles: readonly number[];
  /** 1 for the first allele row of an individual, 2 for the second */
  readonly alleleIndex: 1 | 2;
}

/**
 * STRUCTURE writer options
 */
export interface StructureWriterOptions {
  /** Write the locus names as the first row (default false) */
  locusNames?: boolean;
  lineEnding?: "\n" | "\r\n";
}
