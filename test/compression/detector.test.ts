/**
 * Tests for compression format detection
 */

import { describe, expect, test } from "vitest";
import { CompressionDetector } from "../../src/compression/detector";
import { CompressionError } from "../../src/errors";

describe("CompressionDetector", () => {
  describe("fromExtension", () => {
    test("should detect gzip compression from .gz extension", () => {
      expect(CompressionDetector.fromExtension("salmon.gen.gz")).toBe("gzip");
    });

    test("should detect gzip compression from .gzip extension", () => {
      expect(CompressionDetector.fromExtension("salmon.gen.gzip")).toBe("gzip");
    });

    test("should return none for uncompressed files", () => {
      expect(CompressionDetector.fromExtension("salmon.gen")).toBe("none");
    });

    test("should handle case insensitive extensions", () => {
      expect(CompressionDetector.fromExtension("SALMON.GEN.GZ")).toBe("gzip");
    });

    test("should handle Windows-style paths", () => {
      expect(CompressionDetector.fromExtension("C:\\data\\salmon.gen.gz")).toBe("gzip");
    });

    test("should throw error for empty path", () => {
      expect(() => CompressionDetector.fromExtension("")).toThrow(CompressionError);
    });
  });

  describe("fromMagicBytes", () => {
    test("should detect gzip magic bytes", () => {
      expect(CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08]))).toBe("gzip");
    });

    test("should return none for plain text", () => {
      const bytes = new TextEncoder().encode("Stacks v2\n");
      expect(CompressionDetector.fromMagicBytes(bytes)).toBe("none");
    });

    test("should return none when fewer than two bytes are available", () => {
      expect(CompressionDetector.fromMagicBytes(new Uint8Array([0x1f]))).toBe("none");
    });
  });

  describe("detect", () => {
    test("magic bytes win over a .gz extension", () => {
      const bytes = new TextEncoder().encode("Pop\n");
      expect(CompressionDetector.detect("plain.gen.gz", bytes)).toBe("none");
    });

    test("magic bytes win over a plain extension", () => {
      expect(CompressionDetector.detect("data.gen", new Uint8Array([0x1f, 0x8b]))).toBe("gzip");
    });

    test("falls back to the extension for tiny files", () => {
      expect(CompressionDetector.detect("empty.gen.gz", new Uint8Array([]))).toBe("gzip");
      expect(CompressionDetector.detect("empty.gen", new Uint8Array([]))).toBe("none");
    });
  });
});
