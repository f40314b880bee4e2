/**
 * File reading utilities
 *
 * Reads whole genotype and grouping files through Effect's platform
 * `FileSystem`, decompressing gzip input on the way. Genepop files are read
 * in one piece: the parser needs every row before it can classify any.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Option } from "effect";
import { CompressionDetector, CompressionService } from "../compression";
import { CompressionError, FileError } from "../errors";
import type { FileMetadata, FilePath, FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { getPlatform, runProgram } from "./runtime";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  maxFileSize: 1_073_741_824, // 1GB
  autoDecompress: true,
  compressionFormat: "none",
};

/**
 * Check if a file exists and is a regular file
 *
 * @throws {FileError} If path validation fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await runProgram(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Get file metadata
 *
 * @throws {FileError} If file cannot be accessed
 */
export async function getMetadata(path: string): Promise<FileMetadata> {
  const validatedPath = validatePath(path);

  try {
    return await runProgram(metadataProgram(validatedPath).pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Effect program reading a file to text
 *
 * Needs `FileSystem` and `CompressionService`; {@link readToString} provides
 * both, tests provide their own compression layer.
 *
 * @throws {FileError} Synchronously, if the path or options are invalid
 */
export function readTextProgram(
  path: string,
  options: FileReaderOptions = {}
): Effect.Effect<string, FileError | CompressionError, FileSystem.FileSystem | CompressionService> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  return Effect.gen(function* () {
    const metadata = yield* metadataProgram(validatedPath).pipe(
      Effect.mapError((error) => FileError.fromSystemError("stat", validatedPath, error))
    );
    if (metadata.size > mergedOptions.maxFileSize) {
      return yield* Effect.fail(
        new FileError(
          `File too large: ${metadata.size} bytes exceeds limit of ${mergedOptions.maxFileSize} bytes`,
          validatedPath,
          "read"
        )
      );
    }

    const fs = yield* FileSystem.FileSystem;
    const bytes = yield* fs
      .readFile(validatedPath)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("read", validatedPath, error)));

    let data = bytes;
    if (mergedOptions.autoDecompress) {
      const format =
        mergedOptions.compressionFormat !== "none"
          ? mergedOptions.compressionFormat
          : CompressionDetector.detect(validatedPath, bytes);
      const compression = yield* CompressionService;
      data = yield* compression.decompress(bytes, format);
    }

    return new TextDecoder("utf-8").decode(data);
  });
}

/**
 * Read entire file to string, decompressing gzip input
 *
 * @throws {FileError} If the file cannot be read or is too large
 * @throws {CompressionError} If gzip data is corrupt
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  return runProgram(
    readTextProgram(path, options).pipe(
      Effect.provide(CompressionService.Live),
      Effect.provide(getPlatform())
    )
  );
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

function metadataProgram(validatedPath: FilePath) {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);
    const dot = validatedPath.lastIndexOf(".");

    const metadata: FileMetadata = {
      path: validatedPath,
      size: Number(info.size),
      lastModified: Option.getOrUndefined(info.mtime),
      extension: dot >= 0 ? validatedPath.substring(dot) : "",
    };
    return metadata;
  });
}

/**
 * Validate file path using ArkType and return branded type
 * Every validation failure surfaces as a FileError
 */
export function validatePath(path: string): FilePath {
  try {
    const validationResult = FilePathSchema(path);
    if (validationResult instanceof type.errors) {
      throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
    }
    return validationResult;
  } catch (error) {
    if (error instanceof FileError) throw error;
    throw new FileError(
      `Invalid file path: ${error instanceof Error ? error.message : String(error)}`,
      path,
      "stat"
    );
  }
}

/**
 * Merge user options with defaults
 */
function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const validationResult = FileReaderOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return { ...DEFAULT_OPTIONS, ...options };
}
