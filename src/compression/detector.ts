/**
 * Compression format detection for genotype files
 *
 * Genepop exports are often shipped gzipped; detection looks at the file
 * extension first and falls back to the gzip magic bytes.
 */

import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;

/**
 * File extensions commonly used for gzip-compressed files
 */
const GZIP_EXTENSIONS = [".gz", ".gzip"] as const;

/**
 * Compression format detector
 *
 * @example Detection from file extension
 * ```typescript
 * const format = CompressionDetector.fromExtension("/data/salmon.gen.gz");
 * console.log(format); // "gzip"
 * ```
 *
 * @example Detection from magic bytes
 * ```typescript
 * const bytes = new Uint8Array([0x1f, 0x8b, 0x08]);
 * CompressionDetector.fromMagicBytes(bytes); // "gzip"
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from file extension
   *
   * @throws {CompressionError} If the path is empty
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError("File path must not be empty", "none", "detect");
    }

    const normalizedPath = filePath.toLowerCase().replace(/\\/g, "/");
    return GZIP_EXTENSIONS.some((ext) => normalizedPath.endsWith(ext)) ? "gzip" : "none";
  }

  /**
   * Detect compression format from the leading bytes of a file
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionFormat {
    if (bytes.length < 2) return "none";
    return bytes[0] === GZIP_MAGIC_FIRST_BYTE && bytes[1] === GZIP_MAGIC_SECOND_BYTE
      ? "gzip"
      : "none";
  }

  /**
   * Combine extension and magic byte detection
   *
   * Magic bytes win: a `.gz` file holding plain text is read as plain text.
   */
  static detect(filePath: string, bytes: Uint8Array): CompressionFormat {
    const fromBytes = CompressionDetector.fromMagicBytes(bytes);
    if (fromBytes !== "none") return fromBytes;
    if (bytes.length >= 2) return "none";
    return CompressionDetector.fromExtension(filePath);
  }
}
