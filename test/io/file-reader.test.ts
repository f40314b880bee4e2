/**
 * Tests for file reading with transparent gzip decompression
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gzipSync } from "node:zlib";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileError } from "../../src/errors";
import { exists, getMetadata, readToString, validatePath } from "../../src/io/file-reader";

const GENEPOP = "Stacks v2\nLoc1\nLoc2\nPop\nBON_01 ,  001002 003004\n";

describe("file reader", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "genepop-reader-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("readToString", () => {
    test("reads plain text", async () => {
      const path = join(dir, "salmon.gen");
      writeFileSync(path, GENEPOP);
      expect(await readToString(path)).toBe(GENEPOP);
    });

    test("decompresses .gz files", async () => {
      const path = join(dir, "salmon.gen.gz");
      writeFileSync(path, gzipSync(GENEPOP));
      expect(await readToString(path)).toBe(GENEPOP);
    });

    test("detects gzip content without a .gz extension", async () => {
      const path = join(dir, "salmon.gen");
      writeFileSync(path, gzipSync(GENEPOP));
      expect(await readToString(path)).toBe(GENEPOP);
    });

    test("reads a plain file carrying a .gz extension", async () => {
      const path = join(dir, "mislabelled.gen.gz");
      writeFileSync(path, GENEPOP);
      expect(await readToString(path)).toBe(GENEPOP);
    });

    test("leaves compressed bytes alone when autoDecompress is false", async () => {
      const path = join(dir, "raw.gen.gz");
      writeFileSync(path, gzipSync("Pop"));
      const text = await readToString(path, { autoDecompress: false });
      expect(text.charCodeAt(0)).toBe(0x1f);
    });

    test("strips a UTF-8 byte order mark", async () => {
      const path = join(dir, "bom.gen");
      writeFileSync(path, `\uFEFF${GENEPOP}`);
      expect(await readToString(path)).toBe(GENEPOP);
    });

    test("throws FileError for a missing file", async () => {
      await expect(readToString(join(dir, "missing.gen"))).rejects.toBeInstanceOf(FileError);
    });

    test("throws FileError when the file exceeds maxFileSize", async () => {
      const path = join(dir, "big.gen");
      writeFileSync(path, GENEPOP);
      await expect(readToString(path, { maxFileSize: 10 })).rejects.toThrow("File too large");
    });

    test("rejects invalid options", async () => {
      const path = join(dir, "salmon.gen");
      writeFileSync(path, GENEPOP);
      await expect(readToString(path, { maxFileSize: -1 })).rejects.toBeInstanceOf(FileError);
    });
  });

  describe("exists", () => {
    test("is true for regular files", async () => {
      const path = join(dir, "salmon.gen");
      writeFileSync(path, GENEPOP);
      expect(await exists(path)).toBe(true);
    });

    test("is false for missing files and directories", async () => {
      expect(await exists(join(dir, "missing.gen"))).toBe(false);
      expect(await exists(dir)).toBe(false);
    });
  });

  describe("getMetadata", () => {
    test("reports size and extension", async () => {
      const path = join(dir, "salmon.gen");
      writeFileSync(path, GENEPOP);

      const metadata = await getMetadata(path);
      expect(metadata.size).toBe(GENEPOP.length);
      expect(metadata.extension).toBe(".gen");
      expect(metadata.lastModified).toBeInstanceOf(Date);
    });
  });

  describe("validatePath", () => {
    test("rejects empty paths", () => {
      expect(() => validatePath("")).toThrow(FileError);
    });

    test("rejects paths with wildcard characters", () => {
      expect(() => validatePath("data/*.gen")).toThrow("invalid characters");
    });

    test("normalizes backslashes", () => {
      expect(validatePath("data\\salmon.gen")).toBe("data/salmon.gen");
    });
  });
});
