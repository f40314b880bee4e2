/**
 * Gzip compression and decompression on Node's zlib
 */

import { gunzip, gzip } from "node:zlib";
import { promisify } from "node:util";
import { CompressionError } from "../errors";
import { CompressionDetector } from "./detector";

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

/**
 * Gzip compression options
 */
export interface GzipOptions {
  /** Compression level, 1 (fastest) to 9 (smallest) */
  level?: number;
}

/**
 * Compress bytes with gzip
 *
 * @throws {CompressionError} If zlib rejects the input or level
 */
export async function compress(data: Uint8Array, options: GzipOptions = {}): Promise<Uint8Array> {
  try {
    const result = await gzipAsync(data, { level: options.level ?? 6 });
    return new Uint8Array(result);
  } catch (error) {
    throw CompressionError.fromSystemError("gzip", "compress", error);
  }
}

/**
 * Decompress gzip bytes
 *
 * @throws {CompressionError} If the data is not gzip or is truncated
 */
export async function decompress(compressed: Uint8Array): Promise<Uint8Array> {
  if (CompressionDetector.fromMagicBytes(compressed) !== "gzip") {
    throw new CompressionError(
      "Invalid gzip header: missing magic bytes 1f 8b",
      "gzip",
      "decompress"
    );
  }

  try {
    const result = await gunzipAsync(compressed);
    return new Uint8Array(result);
  } catch (error) {
    throw CompressionError.fromSystemError("gzip", "decompress", error);
  }
}
