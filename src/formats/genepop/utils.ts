/**
 * Genepop utilities
 */

import { PopulationLabelError } from "../../errors";
import { POPULATION_SEPARATOR, SAMPLE_DELIMITER } from "./constants";
import { isPopDelimiter } from "./tokenizer";

/**
 * Population label of a sample: the text before its first `_`
 *
 * @example
 * ```typescript
 * populationLabel("BON_01"); // "BON"
 * populationLabel("CAR_A_7"); // "CAR"
 * ```
 *
 * @throws {PopulationLabelError} If the sample ID has no `_`
 */
export function populationLabel(sampleId: string, lineNumber?: number): string {
  const separator = sampleId.indexOf(POPULATION_SEPARATOR);
  if (separator === -1) {
    throw new PopulationLabelError(sampleId, lineNumber);
  }
  return sampleId.slice(0, separator);
}

/**
 * Quick check whether text looks like Genepop: some `Pop` row followed by a
 * row using the ` ,  ` sample separator
 */
export function detectGenepopFormat(text: string): boolean {
  const lines = text.split(/\r?\n/);
  const pop = lines.findIndex(isPopDelimiter);
  if (pop === -1) return false;
  return lines.slice(pop + 1).some((line) => line.includes(SAMPLE_DELIMITER));
}
