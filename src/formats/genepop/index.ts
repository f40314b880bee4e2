/**
 * Genepop format module exports
 *
 * Parsing runs in two phases: {@link tokenizeGenepop} classifies rows, then
 * {@link GenepopParser} validates and decodes the genotype rows.
 *
 * @example
 * ```typescript
 * import { GenepopParser } from "./formats/genepop";
 *
 * const doc = await new GenepopParser().parseFile("salmon.gen");
 * console.log(`${doc.individuals.length} individuals at ${doc.locusNames.length} loci`);
 * ```
 *
 * @module genepop
 */

export {
  MISSING_ALLELE,
  NO_STACKS_VERSION,
  POP_DELIMITERS,
  POPULATION_SEPARATOR,
  SAMPLE_DELIMITER,
  WARNING_CODES,
} from "./constants";
export { decodeGenotype, detectAlleleWidth, isMissingCode } from "./genotype";
export { GenepopParser, splitGenotypeRow } from "./parser";
export { expandHeaderRow, fromTable, isPopDelimiter, tokenizeGenepop, toRows } from "./tokenizer";
export type {
  AllelePair,
  ConversionWarning,
  GenepopDocument,
  GenepopIndividual,
  GenepopParserOptions,
  GenepopPopulation,
  GenepopRow,
  GenotypeRow,
  HeaderForm,
  RecoveryPath,
  TokenizedGenepop,
  WarningCode,
} from "./types";
export { detectGenepopFormat, populationLabel } from "./utils";
