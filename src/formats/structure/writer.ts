/**
 * STRUCTURE format writer
 *
 * STRUCTURE takes one row per allele: every individual contributes two
 * consecutive rows, `SampleID Group a1 a2 ... aN`, space separated and
 * unquoted. An optional header row lists the locus names, indented by two
 * spaces to sit over the allele columns.
 *
 * @module structure/writer
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import type { GenepopDocument, GenepopIndividual } from "../genepop/types";
import type { StructureRow, StructureWriterOptions } from "./types";

const StructureWriterOptionsSchema = type({
  "locusNames?": "boolean",
  "lineEnding?": type.enumerated("\n", "\r\n"),
});

/**
 * STRUCTURE writer
 *
 * @example
 * ```typescript
 * const writer = new StructureWriter({ locusNames: true });
 * const text = writer.format(document, [1, 1, 2]);
 * ```
 */
export class StructureWriter {
  private readonly locusNames: boolean;
  private readonly lineEnding: string;

  constructor(options: StructureWriterOptions = {}) {
    const validation = StructureWriterOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid STRUCTURE writer options: ${validation.summary}`);
    }

    this.locusNames = options.locusNames ?? false;
    this.lineEnding = options.lineEnding ?? "\n";
  }

  /**
   * Header row: two blank label columns, then the locus names
   */
  formatHeader(locusNames: readonly string[]): string {
    return `  ${locusNames.join(" ")}`;
  }

  /**
   * Both allele rows of one individual
   */
  buildRows(individual: GenepopIndividual, group: string | number): [StructureRow, StructureRow] {
    return [
      { sampleId: individual.sampleId, group, alleles: individual.firstAlleles, alleleIndex: 1 },
      { sampleId: individual.sampleId, group, alleles: individual.secondAlleles, alleleIndex: 2 },
    ];
  }

  /**
   * Fields of a data row, in output order
   */
  toFields(row: StructureRow): string[] {
    return [row.sampleId, String(row.group), ...row.alleles.map(String)];
  }

  /**
   * Format a single data row
   */
  formatRow(row: StructureRow): string {
    return this.toFields(row).join(" ");
  }

  /**
   * Every output line, header first when enabled
   *
   * @param groups - Group label per individual, in document order
   * @throws {ValidationError} If there is not one group per individual
   */
  formatLines(document: GenepopDocument, groups: readonly (string | number)[]): string[] {
    if (groups.length !== document.individuals.length) {
      throw new ValidationError(
        `Expected ${document.individuals.length} group labels, got ${groups.length}`
      );
    }

    const lines: string[] = this.locusNames ? [this.formatHeader(document.locusNames)] : [];
    document.individuals.forEach((individual, index) => {
      const [first, second] = this.buildRows(individual, groups[index] ?? "");
      lines.push(this.formatRow(first), this.formatRow(second));
    });
    return lines;
  }

  /**
   * Format the whole file, one row per line with a final line ending
   */
  format(document: GenepopDocument, groups: readonly (string | number)[]): string {
    return this.joinLines(this.formatLines(document, groups));
  }

  /**
   * Join formatted lines, terminating each with the line ending
   */
  joinLines(lines: readonly string[]): string {
    return lines.map((line) => line + this.lineEnding).join("");
  }
}
