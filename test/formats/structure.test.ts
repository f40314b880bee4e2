/**
 * Tests for the STRUCTURE writer
 */

import { describe, expect, test } from "vitest";
import { ValidationError } from "../../src/errors";
import { GenepopParser } from "../../src/formats/genepop";
import { StructureWriter } from "../../src/formats/structure";

const document = new GenepopParser().parseString(
  "Stacks v2\nLoc1\nLoc2\nPop\nBON_01 ,  001002 003004\nBON_02 ,  000000 002001\n"
);

describe("StructureWriter", () => {
  test("writes two rows per individual", () => {
    const lines = new StructureWriter().formatLines(document, [1, 1]);
    expect(lines).toEqual([
      "BON_01 1 1 3",
      "BON_01 1 2 4",
      "BON_02 1 -9 2",
      "BON_02 1 -9 1",
    ]);
  });

  test("puts the locus header first when enabled", () => {
    const lines = new StructureWriter({ locusNames: true }).formatLines(document, [1, 1]);
    expect(lines[0]).toBe("  Loc1 Loc2");
    expect(lines).toHaveLength(5);
  });

  test("formats the header with two blank label columns", () => {
    expect(new StructureWriter().formatHeader(["Loc1", "Loc2"])).toBe("  Loc1 Loc2");
  });

  test("terminates every line", () => {
    expect(new StructureWriter().format(document, ["north", "south"])).toBe(
      "BON_01 north 1 3\nBON_01 north 2 4\nBON_02 south -9 2\nBON_02 south -9 1\n"
    );
  });

  test("supports CRLF line endings", () => {
    const writer = new StructureWriter({ lineEnding: "\r\n" });
    expect(writer.joinLines(["a", "b"])).toBe("a\r\nb\r\n");
  });

  test("builds allele rows in order", () => {
    const individual = document.individuals[0];
    if (individual === undefined) throw new Error("fixture has no individuals");

    const [first, second] = new StructureWriter().buildRows(individual, 3);
    expect(first).toEqual({ sampleId: "BON_01", group: 3, alleles: [1, 3], alleleIndex: 1 });
    expect(second.alleleIndex).toBe(2);
    expect(new StructureWriter().toFields(second)).toEqual(["BON_01", "3", "2", "4"]);
  });

  test("rejects a group list that does not match the individuals", () => {
    expect(() => new StructureWriter().formatLines(document, [1])).toThrow(ValidationError);
  });
});
