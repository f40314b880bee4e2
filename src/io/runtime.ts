/**
 * Effect platform layer selection and program execution
 *
 * The library runs on Node.js; all file access goes through the Effect
 * platform `FileSystem` service provided by this layer.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit } from "effect";

/**
 * Get the Effect platform layer for the current runtime
 *
 * Provides FileSystem, Path, and the other platform services.
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run a fully provided Effect program as a Promise
 *
 * Rejects with the program's own error object rather than a fiber failure
 * wrapper, so callers can `instanceof` the library's error classes.
 */
export async function runProgram<A, E>(program: Effect.Effect<A, E>): Promise<A> {
  const exit = await Effect.runPromiseExit(program);
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}
