/**
 * File writing operations using Effect Platform
 *
 * All Effect plumbing is hidden behind Promise-based APIs; the underlying
 * programs are exported for callers that compose their own layers.
 *
 * @module file-writer
 */

import { FileSystem, Path } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { CompressionDetector, CompressionService } from "../compression";
import { CompressionError, FileError, ValidationError } from "../errors";
import type { CompressionFormat, WriteOptions } from "../types";
import { WriteOptionsSchema } from "../types";
import { validatePath } from "./file-reader";
import { getPlatform, runProgram } from "./runtime";

/**
 * Resolve the compression format for an output path
 *
 * An explicit `compressionFormat` wins; otherwise the extension decides
 * (`.gz` → gzip) unless `autoCompress` is false.
 */
export function resolveOutputCompression(path: string, options: WriteOptions = {}): CompressionFormat {
  if (options.compressionFormat !== undefined) {
    return options.compressionFormat;
  }
  if (options.autoCompress === false) {
    return "none";
  }
  return CompressionDetector.fromExtension(path);
}

/**
 * Effect program writing bytes to a file, compressing when required
 *
 * Creates the parent directory when it does not exist yet.
 *
 * @throws {FileError} Synchronously, if the path is invalid
 * @throws {ValidationError} Synchronously, if the options are invalid
 */
export function writeBytesProgram(
  path: string,
  content: Uint8Array,
  options: WriteOptions = {}
): Effect.Effect<
  void,
  FileError | CompressionError,
  FileSystem.FileSystem | Path.Path | CompressionService
> {
  const validatedPath = validatePath(path);
  const validation = WriteOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid write options: ${validation.summary}`);
  }
  const format = resolveOutputCompression(validatedPath, options);

  return Effect.gen(function* () {
    const compression = yield* CompressionService;
    const data = yield* compression.compress(content, format, options.compressionLevel ?? 6);

    const fs = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;

    yield* Effect.gen(function* () {
      const parentDir = pathService.dirname(validatedPath);
      const dirExists = yield* fs.exists(parentDir);
      if (!dirExists) {
        yield* fs.makeDirectory(parentDir, { recursive: true });
      }
      yield* fs.writeFile(validatedPath, data);
    }).pipe(Effect.mapError((error) => FileError.fromSystemError("write", validatedPath, error)));
  });
}

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * Compresses based on file extension by default. Use a `.gz` extension for
 * gzip output.
 *
 * @throws {FileError} When the write fails or the path is invalid
 * @throws {CompressionError} When gzip compression fails
 *
 * @example Basic write
 * ```typescript
 * await writeString("salmon.str", structureText);
 * ```
 *
 * @example Write a .gz file without compressing it
 * ```typescript
 * await writeString("salmon.str.gz", structureText, { autoCompress: false });
 * ```
 */
export async function writeString(
  path: string,
  content: string,
  options?: WriteOptions
): Promise<void> {
  const data = new TextEncoder().encode(content);
  await writeBytes(path, data, options);
}

/**
 * Write binary data to file (overwrites if exists, creates if not)
 *
 * @throws {FileError} When the write fails or the path is invalid
 * @throws {CompressionError} When gzip compression fails
 */
export async function writeBytes(
  path: string,
  content: Uint8Array,
  options?: WriteOptions
): Promise<void> {
  await runProgram(
    writeBytesProgram(path, content, options).pipe(
      Effect.provide(CompressionService.Live),
      Effect.provide(getPlatform())
    )
  );
}
