/**
 * Tests for the error hierarchy and recovery suggestions
 */

import { describe, expect, test } from "vitest";
import {
  AlleleWidthError,
  ERROR_SUGGESTIONS,
  GenepopDelimiterError,
  GenepopParseError,
  getErrorSuggestion,
  LocusCountError,
  PopGenError,
  PopulationLabelError,
  ValidationError,
} from "../src/errors";

describe("PopGenError", () => {
  test("toString appends the line and context", () => {
    const error = new GenepopParseError("bad row", 4, "Row: x");
    expect(error.toString()).toBe("GenepopParseError: bad row (line 4)\nContext: Row: x");
  });

  test("subclasses keep the parse error code", () => {
    const error = new LocusCountError("count mismatch", 2, 3, 7);
    expect(error).toBeInstanceOf(PopGenError);
    expect(error.code).toBe("PARSE_ERROR");
    expect(error.context).toBe("Expected 2 loci, found 3");
  });
});

describe("getErrorSuggestion", () => {
  test("points at the sample separator", () => {
    expect(getErrorSuggestion(new GenepopDelimiterError("BON_01, 0101", 5))).toBe(
      ERROR_SUGGESTIONS.SAMPLE_DELIMITER
    );
  });

  test("points at the allele width", () => {
    expect(getErrorSuggestion(new AlleleWidthError(5))).toBe(ERROR_SUGGESTIONS.ALLELE_WIDTH);
  });

  test("points at the locus count", () => {
    expect(getErrorSuggestion(new LocusCountError("mismatch", 2, 3))).toBe(
      ERROR_SUGGESTIONS.LOCUS_COUNT
    );
  });

  test("points at the population prefix", () => {
    expect(getErrorSuggestion(new PopulationLabelError("BON01"))).toBe(
      ERROR_SUGGESTIONS.POPULATION_LABEL
    );
  });

  test("points at the missing delimiter row", () => {
    const error = new GenepopParseError("No population delimiter row ('Pop', 'pop' or 'POP') found");
    expect(getErrorSuggestion(error)).toBe(ERROR_SUGGESTIONS.MISSING_POP);
  });

  test("falls back to the generic line hint", () => {
    expect(getErrorSuggestion(new ValidationError("bad option"))).toBe(
      ERROR_SUGGESTIONS.MALFORMED_LINE
    );
  });
});
