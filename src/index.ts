/**
 * genepop-structure - convert Genepop genotype files to STRUCTURE input
 *
 * @example
 * ```typescript
 * import { genepopToStructure } from "genepop-structure";
 *
 * const result = await genepopToStructure({
 *   genepop: "data/salmon.gen",
 *   popgroup: "data/groups.csv",
 *   locusnames: true,
 *   path: "out/salmon.str",
 * });
 * console.log(`${result.dataRowCount} rows written`);
 * ```
 */

// Compression infrastructure
export {
  CompressionDetector,
  CompressionService,
  type CompressionServiceShape,
  compress,
  decompress,
  type GzipOptions,
} from "./compression";
// Error types
export {
  AlleleWidthError,
  CompressionError,
  DSVParseError,
  ERROR_SUGGESTIONS,
  FileError,
  GenepopDelimiterError,
  GenepopParseError,
  GenotypeCodeError,
  getErrorSuggestion,
  LocusCountError,
  ParseError,
  PopGenError,
  PopulationLabelError,
  ValidationError,
} from "./errors";
export { AbstractParser } from "./formats/abstract-parser";
// Grouping table reader
export { DSVParser, type DSVParserOptions, type DSVTable, parseCSVRow } from "./formats/dsv";
// Genepop format
export {
  type AllelePair,
  type ConversionWarning,
  decodeGenotype,
  detectAlleleWidth,
  detectGenepopFormat,
  type GenepopDocument,
  type GenepopIndividual,
  GenepopParser,
  type GenepopParserOptions,
  type GenepopPopulation,
  type GenepopRow,
  type GenotypeRow,
  type HeaderForm,
  isMissingCode,
  isPopDelimiter,
  MISSING_ALLELE,
  NO_STACKS_VERSION,
  POP_DELIMITERS,
  populationLabel,
  type RecoveryPath,
  SAMPLE_DELIMITER,
  splitGenotypeRow,
  type TokenizedGenepop,
  tokenizeGenepop,
  toRows,
  WARNING_CODES,
  type WarningCode,
} from "./formats/genepop";
// STRUCTURE format
export { type StructureRow, StructureWriter, type StructureWriterOptions } from "./formats/structure";
// File I/O infrastructure
export { exists, getMetadata, readTextProgram, readToString } from "./io/file-reader";
export {
  resolveOutputCompression,
  writeBytes,
  writeBytesProgram,
  writeString,
} from "./io/file-writer";
export { getPlatform, runProgram } from "./io/runtime";
// Conversion
export {
  convertGenepopDocument,
  convertGenepopRows,
  convertGenepopText,
  genepopToStructure,
  type InMemoryConvertOptions,
} from "./operations/convert";
export {
  defaultGroupCodes,
  normalizeGroupingTable,
  readGroupingTable,
  resolveGroups,
} from "./operations/population-groups";
export type {
  ConvertOptions,
  GenepopInput,
  GroupAssignment,
  GroupingTable,
  GroupLabel,
  GroupSource,
  StructureConversionResult,
} from "./operations/types";
// Core types
export type {
  CompressionFormat,
  FileMetadata,
  FilePath,
  FileReaderOptions,
  ParserOptions,
  WarningHandler,
  WriteOptions,
} from "./types";
