/**
 * Compression module
 *
 * @example Auto-detection and decompression
 * ```typescript
 * import { CompressionDetector, decompress } from "./compression";
 *
 * if (CompressionDetector.fromExtension("salmon.gen.gz") === "gzip") {
 *   const text = new TextDecoder().decode(await decompress(bytes));
 * }
 * ```
 */

export { CompressionDetector } from "./detector";
export { compress, decompress } from "./gzip";
export type { GzipOptions } from "./gzip";
export { CompressionService } from "./service";
export type { CompressionServiceShape } from "./service";
export type { CompressionFormat } from "../types";
