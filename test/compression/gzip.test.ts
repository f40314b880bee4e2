/**
 * Tests for gzip compression and decompression
 */

import { gzipSync } from "node:zlib";
import { describe, expect, test } from "vitest";
import { compress, decompress } from "../../src/compression/gzip";
import { CompressionError } from "../../src/errors";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

describe("gzip", () => {
  test("decompresses data produced by zlib", async () => {
    const compressed = new Uint8Array(gzipSync("BON_01 ,  001002 003004\n"));
    const result = await decompress(compressed);
    expect(decoder.decode(result)).toBe("BON_01 ,  001002 003004\n");
  });

  test("compressed output starts with the gzip magic bytes", async () => {
    const result = await compress(encoder.encode("Loc1\nLoc2\n"), { level: 9 });
    expect(result[0]).toBe(0x1f);
    expect(result[1]).toBe(0x8b);
  });

  test("round-trips text through compress and decompress", async () => {
    const text = "BON_01 1 1 3\nBON_01 1 2 4\n".repeat(50);
    const restored = await decompress(await compress(encoder.encode(text)));
    expect(decoder.decode(restored)).toBe(text);
  });

  test("rejects data without the gzip header", async () => {
    await expect(decompress(encoder.encode("not gzip"))).rejects.toThrow(
      "Invalid gzip header: missing magic bytes 1f 8b"
    );
  });

  test("rejects truncated gzip data", async () => {
    const compressed = new Uint8Array(gzipSync("Pop\n".repeat(100)));
    const truncated = compressed.slice(0, 12);
    await expect(decompress(truncated)).rejects.toBeInstanceOf(CompressionError);
  });
});
