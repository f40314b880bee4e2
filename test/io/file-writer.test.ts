/**
 * Tests for file writing with compression support
 */

import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gunzipSync } from "node:zlib";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ValidationError } from "../../src/errors";
import { readToString } from "../../src/io/file-reader";
import { resolveOutputCompression, writeBytes, writeString } from "../../src/io/file-writer";

const STRUCTURE = "BON_01 1 1 3\nBON_01 1 2 4\n";

describe("file writer", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "structure-writer-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("resolveOutputCompression", () => {
    test("uses the extension by default", () => {
      expect(resolveOutputCompression("out.str.gz")).toBe("gzip");
      expect(resolveOutputCompression("out.str")).toBe("none");
    });

    test("an explicit format wins over the extension", () => {
      expect(resolveOutputCompression("out.str", { compressionFormat: "gzip" })).toBe("gzip");
      expect(resolveOutputCompression("out.str.gz", { compressionFormat: "none" })).toBe("none");
    });

    test("autoCompress false disables extension detection", () => {
      expect(resolveOutputCompression("out.str.gz", { autoCompress: false })).toBe("none");
    });
  });

  describe("writeString", () => {
    test("writes plain text", async () => {
      const path = join(dir, "salmon.str");
      await writeString(path, STRUCTURE);
      expect(readFileSync(path, "utf-8")).toBe(STRUCTURE);
    });

    test("auto-compresses .gz files", async () => {
      const path = join(dir, "salmon.str.gz");
      await writeString(path, STRUCTURE);

      const bytes = readFileSync(path);
      expect(bytes[0]).toBe(0x1f);
      expect(bytes[1]).toBe(0x8b);
      expect(gunzipSync(bytes).toString("utf-8")).toBe(STRUCTURE);
    });

    test("roundtrip: write compressed, read decompressed", async () => {
      const path = join(dir, "roundtrip.str.gz");
      const content = STRUCTURE.repeat(200);
      await writeString(path, content);
      expect(await readToString(path)).toBe(content);
    });

    test("respects autoCompress: false", async () => {
      const path = join(dir, "plain.str.gz");
      await writeString(path, STRUCTURE, { autoCompress: false });
      expect(readFileSync(path, "utf-8")).toBe(STRUCTURE);
    });

    test("creates missing parent directories", async () => {
      const path = join(dir, "nested", "deeper", "salmon.str");
      await writeString(path, STRUCTURE);
      expect(existsSync(path)).toBe(true);
    });

    test("overwrites an existing file", async () => {
      const path = join(dir, "salmon.str");
      await writeString(path, "old content that is longer\n");
      await writeString(path, STRUCTURE);
      expect(readFileSync(path, "utf-8")).toBe(STRUCTURE);
    });

    test("rejects an out-of-range compression level", async () => {
      const path = join(dir, "salmon.str.gz");
      await expect(writeString(path, STRUCTURE, { compressionLevel: 12 })).rejects.toBeInstanceOf(
        ValidationError
      );
      expect(existsSync(path)).toBe(false);
    });
  });

  describe("writeBytes", () => {
    test("writes raw bytes", async () => {
      const path = join(dir, "bytes.bin");
      await writeBytes(path, new Uint8Array([1, 2, 3]));
      expect([...readFileSync(path)]).toEqual([1, 2, 3]);
    });
  });
});
