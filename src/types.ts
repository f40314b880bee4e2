/**
 * Shared type definitions and validation schemas
 *
 * Format-specific types live beside their parsers (`formats/genepop/types`,
 * `formats/structure/types`, `formats/dsv/types`); this module holds what
 * the I/O layer and every parser share.
 */

import { type } from "arktype";
import { ValidationError } from "./errors";

/**
 * Receives non-fatal parser and conversion warnings
 */
export type WarningHandler = (warning: string, lineNumber?: number) => void;

/**
 * Base parser configuration options
 */
export interface ParserOptions {
  /** Custom warning handler, defaults to console.warn */
  onWarning?: WarningHandler;
}

/**
 * Compression formats understood by the I/O layer
 */
export type CompressionFormat = "gzip" | "none";

/**
 * Branded type for validated file paths
 */
export type FilePath = string & {
  readonly __brand: "FilePath";
};

/**
 * File metadata information
 */
export interface FileMetadata {
  /** Normalized file path */
  readonly path: FilePath;
  /** File size in bytes */
  readonly size: number;
  /** Last modified timestamp */
  readonly lastModified: Date | undefined;
  /** File extension, including the leading dot */
  readonly extension: string;
}

/**
 * File reading options
 */
export interface FileReaderOptions {
  /** Maximum file size to read in bytes */
  maxFileSize?: number;
  /** Decompress based on extension and magic bytes (default true) */
  autoDecompress?: boolean;
  /** Force a compression format instead of detecting it */
  compressionFormat?: CompressionFormat;
}

/**
 * File writing options
 */
export interface WriteOptions {
  /** Compress based on the output extension (default true) */
  autoCompress?: boolean;
  /** Force a compression format instead of detecting it */
  compressionFormat?: CompressionFormat;
  /** Gzip compression level, 1-9 */
  compressionLevel?: number;
}

/**
 * File path validation schema
 * Rejects empty paths and characters no filesystem accepts
 */
export const FilePathSchema = type("string>0").pipe((path: string) => {
  if (path.includes("\0")) {
    throw new ValidationError("File paths cannot contain null characters");
  }

  const invalidChars = /[<>"|*?]/;
  if (invalidChars.test(path)) {
    throw new ValidationError(`File path contains invalid characters: ${path}`);
  }

  return path.replace(/[\\/]+/g, "/") as FilePath;
});

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "maxFileSize?": "number>=0",
  "autoDecompress?": "boolean",
  "compressionFormat?": '"gzip"|"none"',
}).narrow((options, ctx) => {
  if (options.maxFileSize !== undefined && options.maxFileSize > 10_737_418_240) {
    return ctx.reject("maxFileSize cannot exceed 10GB");
  }
  return true;
});

/**
 * Write options validation schema
 * Gzip levels run from 1 to 9
 */
export const WriteOptionsSchema = type({
  "autoCompress?": "boolean",
  "compressionFormat?": '"gzip"|"none"',
  "compressionLevel?": "1<=number<=9",
});
