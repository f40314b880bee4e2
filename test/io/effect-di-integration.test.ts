/**
 * Integration tests for Effect DI compression in file I/O
 *
 * Runs the reader and writer programs against swapped compression layers.
 */

import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { CompressionError } from "../../src/errors";
import { readTextProgram } from "../../src/io/file-reader";
import { writeBytesProgram } from "../../src/io/file-writer";
import { getPlatform, runProgram } from "../../src/io/runtime";
import {
  type CompressionTracker,
  createFailingCompressionService,
  createTrackingCompressionService,
  MockCompressionService,
} from "../utils/compression-layers";

describe("Effect DI Integration - Compression Layers", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "effect-di-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("mock layer writes .gz paths without compressing", async () => {
    const path = join(dir, "mock.str.gz");
    const program = writeBytesProgram(path, new TextEncoder().encode("Pop\n"));

    await runProgram(
      program.pipe(Effect.provide(MockCompressionService), Effect.provide(getPlatform()))
    );
    expect(readFileSync(path, "utf-8")).toBe("Pop\n");
  });

  test("mock layer reads files as stored", async () => {
    const path = join(dir, "mock.gen");
    writeFileSync(path, "Stacks v2\n");

    const text = await runProgram(
      readTextProgram(path).pipe(
        Effect.provide(MockCompressionService),
        Effect.provide(getPlatform())
      )
    );
    expect(text).toBe("Stacks v2\n");
  });

  test("tracking layer sees the formats the I/O layer resolves", async () => {
    const tracker: CompressionTracker = { compressCalls: [], decompressCalls: [] };
    const layer = createTrackingCompressionService(tracker);
    const path = join(dir, "tracked.str.gz");

    await runProgram(
      writeBytesProgram(path, new TextEncoder().encode("Pop\n"), { compressionLevel: 9 }).pipe(
        Effect.provide(layer),
        Effect.provide(getPlatform())
      )
    );
    await runProgram(
      readTextProgram(path).pipe(Effect.provide(layer), Effect.provide(getPlatform()))
    );

    expect(tracker.compressCalls).toEqual([{ format: "gzip", level: 9 }]);
    // Stored uncompressed by the tracker, so the magic bytes say "none"
    expect(tracker.decompressCalls).toEqual([{ format: "none" }]);
  });

  test("a forced compression format skips detection", async () => {
    const tracker: CompressionTracker = { compressCalls: [], decompressCalls: [] };
    const path = join(dir, "forced.gen");
    writeFileSync(path, "Pop\n");

    await runProgram(
      readTextProgram(path, { compressionFormat: "gzip" }).pipe(
        Effect.provide(createTrackingCompressionService(tracker)),
        Effect.provide(getPlatform())
      )
    );
    expect(tracker.decompressCalls).toEqual([{ format: "gzip" }]);
  });

  test("compression failures propagate as CompressionError", async () => {
    const path = join(dir, "failing.str");

    await expect(
      runProgram(
        writeBytesProgram(path, new Uint8Array([1])).pipe(
          Effect.provide(createFailingCompressionService("disk says no")),
          Effect.provide(getPlatform())
        )
      )
    ).rejects.toBeInstanceOf(CompressionError);
  });
});
