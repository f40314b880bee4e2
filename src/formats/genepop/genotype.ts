/**
 * Genotype code decoding
 *
 * A Genepop genotype code is two fixed-width alleles written back to back:
 * `001002` is allele 1 followed by allele 2 at width 6.
 */

import { AlleleWidthError, GenotypeCodeError } from "../../errors";
import { MISSING_ALLELE } from "./constants";
import type { AllelePair, GenotypeRow } from "./types";

const MISSING_CODE = /^0+$/;
const DIGITS = /^\d+$/;

/**
 * True when every digit of the code is zero
 */
export function isMissingCode(code: string): boolean {
  return MISSING_CODE.test(code);
}

/**
 * Detect the genotype code width of a dataset
 *
 * Uses the longest code in the first locus column, ignoring all-zero codes
 * unless nothing else is there.
 *
 * @throws {AlleleWidthError} If the width is odd
 */
export function detectAlleleWidth(rows: readonly GenotypeRow[]): number {
  const firstColumn = rows.flatMap((row) => row.genotypes.slice(0, 1));
  const observed = firstColumn.filter((code) => !isMissingCode(code));
  const candidates = observed.length > 0 ? observed : firstColumn;

  const width = candidates.reduce((max, code) => Math.max(max, code.length), 0);
  if (width % 2 !== 0) {
    throw new AlleleWidthError(width, `First locus column holds ${candidates.length} codes`);
  }
  return width;
}

/**
 * Split a genotype code into its two alleles
 *
 * A half that parses to `0` is missing and becomes `-9`; an all-zero code of
 * any length is missing for both alleles.
 *
 * @example
 * ```typescript
 * decodeGenotype("001002", 6); // [1, 2]
 * decodeGenotype("000000", 6); // [-9, -9]
 * decodeGenotype("0", 6);      // [-9, -9]
 * ```
 *
 * @throws {GenotypeCodeError} If the code length differs from `alleleWidth`
 *   or a half is not numeric
 */
export function decodeGenotype(
  code: string,
  alleleWidth: number,
  sampleId: string = "",
  lineNumber?: number
): AllelePair {
  if (code.length === 0) {
    throw new GenotypeCodeError(
      "empty genotype code; loci must be separated by single spaces",
      sampleId,
      code,
      lineNumber
    );
  }
  if (isMissingCode(code)) {
    return [MISSING_ALLELE, MISSING_ALLELE];
  }
  if (code.length !== alleleWidth) {
    throw new GenotypeCodeError(
      `genotype code has length ${code.length} but the dataset uses ${alleleWidth}`,
      sampleId,
      code,
      lineNumber
    );
  }

  const half = alleleWidth / 2;
  const first = code.slice(0, half);
  const second = code.slice(half);
  if (!DIGITS.test(first) || !DIGITS.test(second)) {
    throw new GenotypeCodeError("genotype code is not numeric", sampleId, code, lineNumber);
  }

  return [toAllele(first), toAllele(second)];
}

function toAllele(digits: string): number {
  const value = Number.parseInt(digits, 10);
  return value === 0 ? MISSING_ALLELE : value;
}
