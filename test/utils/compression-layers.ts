/**
 * Mock and test compression layers for Effect DI testing
 *
 * Usage:
 * ```typescript
 * const text = await runProgram(
 *   readTextProgram(path).pipe(
 *     Effect.provide(MockCompressionService),
 *     Effect.provide(getPlatform())
 *   )
 * );
 * ```
 */

import { Effect, Layer } from "effect";
import { CompressionService } from "../../src/compression";
import { CompressionError } from "../../src/errors";
import type { CompressionFormat } from "../../src/types";

/**
 * Mock compression service that passes through data unchanged
 */
export const MockCompressionService: Layer.Layer<CompressionService> = Layer.succeed(
  CompressionService,
  {
    compress: (data: Uint8Array) => Effect.succeed(data),
    decompress: (data: Uint8Array) => Effect.succeed(data),
  }
);

/**
 * Failing compression service for error handling tests
 */
export function createFailingCompressionService(
  errorMessage: string = "Simulated compression failure"
): Layer.Layer<CompressionService> {
  return Layer.succeed(CompressionService, {
    compress: () => Effect.fail(new CompressionError(errorMessage, "gzip", "compress")),
    decompress: () => Effect.fail(new CompressionError(errorMessage, "gzip", "decompress")),
  });
}

/**
 * Records every call the I/O layer makes
 */
export interface CompressionTracker {
  compressCalls: Array<{ format: CompressionFormat; level?: number }>;
  decompressCalls: Array<{ format: CompressionFormat }>;
}

/**
 * Passthrough service that records the requested formats
 */
export function createTrackingCompressionService(
  tracker: CompressionTracker
): Layer.Layer<CompressionService> {
  return Layer.succeed(CompressionService, {
    compress: (data: Uint8Array, format: CompressionFormat, level?: number) => {
      tracker.compressCalls.push({ format, level });
      return Effect.succeed(data);
    },
    decompress: (data: Uint8Array, format: CompressionFormat) => {
      tracker.decompressCalls.push({ format });
      return Effect.succeed(data);
    },
  });
}
