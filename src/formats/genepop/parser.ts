/**
 * Genepop parser (phase 2)
 *
 * Takes the rows classified by the tokenizer, validates every genotype row,
 * reconciles the locus header with the genotype columns and decodes each
 * individual's alleles. Any fatal problem is raised before a document is
 * returned, so callers never see a partially decoded dataset.
 *
 * @module genepop/parser
 */

import { type } from "arktype";
import {
  GenepopDelimiterError,
  GenepopParseError,
  LocusCountError,
  ValidationError,
} from "../../errors";
import { readToString } from "../../io/file-reader";
import { AbstractParser } from "../abstract-parser";
import { NO_STACKS_VERSION, WARNING_CODES } from "./constants";
import { decodeGenotype, detectAlleleWidth } from "./genotype";
import { fromTable, toRows, tokenizeGenepop } from "./tokenizer";
import type {
  ConversionWarning,
  GenepopDocument,
  GenepopIndividual,
  GenepopParserOptions,
  GenepopPopulation,
  GenepopRow,
  GenotypeRow,
  RecoveryPath,
  TokenizedGenepop,
  WarningCode,
} from "./types";
import { populationLabel } from "./utils";

const GenepopParserOptionsSchema = type({
  "onWarning?": "unknown",
  "splitCommaLocusRow?": "boolean",
});

/**
 * Split a genotype row into sample ID and genotype codes
 *
 * The row is split on single spaces; the second token must be `,` and the
 * third empty, which is what the ` ,  ` separator produces.
 *
 * @throws {GenepopDelimiterError} If the row does not use ` ,  `
 */
export function splitGenotypeRow(row: GenepopRow, populationIndex: number = 0): GenotypeRow {
  const tokens = row.text.split(" ");
  const [sampleId, comma, gap, ...genotypes] = tokens;

  if (sampleId === undefined || comma !== "," || gap !== "") {
    throw new GenepopDelimiterError(row.text, row.lineNumber);
  }

  return { sampleId, genotypes, lineNumber: row.lineNumber, populationIndex };
}

/**
 * Locus names resolved against the genotype column count
 */
interface LocusResolution {
  readonly locusNames: readonly string[];
  readonly stacksVersion: string;
  readonly recovery?: RecoveryPath;
}

/**
 * GenepopParser - reads Genepop text into a decoded document
 *
 * @example
 * ```typescript
 * const parser = new GenepopParser();
 * const doc = parser.parseString("Stacks v2\nLoc1\nLoc2\nPop\nBON_01 ,  001002 003004\n");
 * doc.locusNames;                  // ["Loc1", "Loc2"]
 * doc.individuals[0].firstAlleles; // [1, 3]
 * ```
 */
export class GenepopParser extends AbstractParser<GenepopDocument, GenepopParserOptions> {
  private warnings: ConversionWarning[] = [];

  protected getDefaultOptions(): Partial<GenepopParserOptions> {
    return { splitCommaLocusRow: true };
  }

  constructor(options: GenepopParserOptions = {}) {
    const validation = GenepopParserOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid Genepop parser options: ${validation.summary}`);
    }
    super(options);
  }

  protected getFormatName(): string {
    return "Genepop";
  }

  /**
   * Parse Genepop text
   *
   * @throws {GenepopParseError} Or one of its subclasses on malformed input
   */
  parseString(data: string): GenepopDocument {
    return this.parseRows(toRows(data));
  }

  /**
   * Parse Genepop rows already loaded as a single-column table
   */
  parseTable(table: readonly string[]): GenepopDocument {
    return this.parseRows(fromTable(table));
  }

  /**
   * Parse a Genepop file, gzip input included
   */
  async parseFile(filePath: string): Promise<GenepopDocument> {
    const text = await readToString(filePath);
    return this.parseString(text);
  }

  /**
   * Parse numbered rows
   */
  parseRows(rows: readonly GenepopRow[]): GenepopDocument {
    this.warnings = [];

    const tokens = tokenizeGenepop(rows);
    const genotypeRows = tokens.dataRows.map((row) => splitGenotypeRow(row, row.populationIndex));
    if (genotypeRows.length === 0) {
      throw new GenepopParseError("No individuals found after the first 'Pop' row");
    }

    const columnCount = checkColumnCount(genotypeRows);
    const resolution = this.resolveLocusNames(tokens, columnCount);

    const alleleWidth = detectAlleleWidth(genotypeRows);
    const individuals = genotypeRows.map((row) => decodeIndividual(row, alleleWidth));
    const populations = this.collectPopulations(tokens, individuals);

    return {
      headerForm: tokens.headerForm,
      stacksVersion: resolution.stacksVersion,
      locusNames: resolution.locusNames,
      individuals,
      populations,
      alleleWidth,
      recoveries: resolution.recovery !== undefined ? [resolution.recovery] : [],
      warnings: [...this.warnings],
    };
  }

  /**
   * Match locus names to the genotype column count
   *
   * Tries the locus block as read, then a single comma-separated locus row,
   * then the header-misalignment recovery (stacks version tag reclaimed as
   * the first locus).
   *
   * @throws {LocusCountError} If no reading of the header fits
   */
  private resolveLocusNames(tokens: TokenizedGenepop, columnCount: number): LocusResolution {
    const locusNames = tokens.locusRows.map((row) => row.text);
    if (locusNames.length === columnCount) {
      return { locusNames, stacksVersion: tokens.stacksVersion.text };
    }

    const [onlyRow, ...otherRows] = tokens.locusRows;
    if (
      this.options.splitCommaLocusRow === true &&
      onlyRow !== undefined &&
      otherRows.length === 0 &&
      onlyRow.text.includes(",")
    ) {
      const split = onlyRow.text.split(",").map((name) => name.trim());
      if (split.length === columnCount) {
        this.record(
          WARNING_CODES.COMMA_LOCUS_ROW,
          `Splitting the comma-separated locus row into ${columnCount} locus names`,
          onlyRow.lineNumber
        );
        return {
          locusNames: split,
          stacksVersion: tokens.stacksVersion.text,
          recovery: "comma-locus-row",
        };
      }
    }

    const reclaimed = [tokens.stacksVersion.text.replace(/\r/g, ""), ...locusNames];
    if (reclaimed.length === columnCount) {
      // The comma-delimited form lands here: its first name was consumed as the tag
      if (tokens.headerForm === "rows") {
        this.record(
          WARNING_CODES.HEADER_MISALIGNMENT,
          `Found ${columnCount} genotype columns but ${locusNames.length} locus names; using the first row "${tokens.stacksVersion.text}" as a locus name`,
          tokens.stacksVersion.lineNumber
        );
      }
      return {
        locusNames: reclaimed,
        stacksVersion: NO_STACKS_VERSION,
        recovery: "header-misalignment",
      };
    }

    throw new LocusCountError(
      `Genotype rows hold ${columnCount} loci but the header names ${locusNames.length}`,
      locusNames.length,
      columnCount,
      tokens.locusRows[0]?.lineNumber
    );
  }

  private collectPopulations(
    tokens: TokenizedGenepop,
    individuals: readonly GenepopIndividual[]
  ): GenepopPopulation[] {
    return tokens.delimiterRows.map((row, index) => {
      const sampleIds = individuals
        .filter((individual) => individual.populationIndex === index)
        .map((individual) => individual.sampleId);
      if (sampleIds.length === 0) {
        this.record(
          WARNING_CODES.EMPTY_POPULATION,
          "Population block has no individuals",
          row.lineNumber
        );
      }
      return { index, lineNumber: row.lineNumber, sampleIds };
    });
  }

  private record(code: WarningCode, message: string, lineNumber?: number): void {
    this.warnings.push({ code, message, lineNumber });
    this.warn(message, lineNumber);
  }
}

/**
 * Every genotype row must hold the same number of codes
 *
 * @throws {LocusCountError} On the first row that differs from the first
 */
function checkColumnCount(rows: readonly GenotypeRow[]): number {
  const expected = rows[0]?.genotypes.length ?? 0;
  for (const row of rows) {
    if (row.genotypes.length !== expected) {
      throw new LocusCountError(
        `Sample '${row.sampleId}' has ${row.genotypes.length} genotype codes, expected ${expected}`,
        expected,
        row.genotypes.length,
        row.lineNumber
      );
    }
  }
  return expected;
}

function decodeIndividual(row: GenotypeRow, alleleWidth: number): GenepopIndividual {
  const firstAlleles: number[] = [];
  const secondAlleles: number[] = [];
  for (const code of row.genotypes) {
    const [first, second] = decodeGenotype(code, alleleWidth, row.sampleId, row.lineNumber);
    firstAlleles.push(first);
    secondAlleles.push(second);
  }

  return {
    sampleId: row.sampleId,
    population: populationLabel(row.sampleId, row.lineNumber),
    genotypes: row.genotypes,
    firstAlleles,
    secondAlleles,
    populationIndex: row.populationIndex,
    lineNumber: row.lineNumber,
  };
}
