/**
 * Effect-based compression service
 *
 * File reading and writing ask for a `CompressionService` instead of calling
 * gzip directly, so tests can swap in a passthrough layer.
 *
 * @example Using the compression service with Effect
 * ```typescript
 * import { Effect } from "effect";
 * import { CompressionService } from "./compression";
 *
 * const program = Effect.gen(function* () {
 *   const compressor = yield* CompressionService;
 *   return yield* compressor.compress(data, "gzip", 6);
 * });
 *
 * await Effect.runPromise(program.pipe(Effect.provide(CompressionService.Live)));
 * ```
 *
 * @module compression/service
 */

import { Context, Effect, Layer } from "effect";
import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";
import { compress as compressGzip, decompress as decompressGzip } from "./gzip";

/**
 * Shape of the compression service
 */
export interface CompressionServiceShape {
  /**
   * Compress data using the specified format
   *
   * @param level - Compression level, gzip takes 1-9
   */
  readonly compress: (
    data: Uint8Array,
    format: CompressionFormat,
    level?: number
  ) => Effect.Effect<Uint8Array, CompressionError>;

  /**
   * Decompress data that was compressed with the specified format
   */
  readonly decompress: (
    data: Uint8Array,
    format: CompressionFormat
  ) => Effect.Effect<Uint8Array, CompressionError>;
}

/**
 * Compression service tag for Effect dependency injection
 */
export class CompressionService extends Context.Tag("@genepop-structure/CompressionService")<
  CompressionService,
  CompressionServiceShape
>() {
  /**
   * Gzip compression service layer
   */
  static readonly Live: Layer.Layer<CompressionService> = Layer.succeed(
    CompressionService,
    createGzipService()
  );
}

function createGzipService(): CompressionServiceShape {
  return {
    compress: (data, format, level) =>
      format === "none"
        ? Effect.succeed(data)
        : Effect.tryPromise({
            try: () => compressGzip(data, { level: level ?? 6 }),
            catch: (error) =>
              error instanceof CompressionError
                ? error
                : CompressionError.fromSystemError("gzip", "compress", error),
          }),

    decompress: (data, format) =>
      format === "none"
        ? Effect.succeed(data)
        : Effect.tryPromise({
            try: () => decompressGzip(data),
            catch: (error) =>
              error instanceof CompressionError
                ? error
                : CompressionError.fromSystemError("gzip", "decompress", error),
          }),
  };
}
