/**
 * Effect platform layer selection
 *
 * File I/O goes through Effect's platform-independent `FileSystem` service;
 * this module supplies the Node.js implementation of it.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit } from "effect";

/**
 * Get the Effect platform layer providing FileSystem, Path and friends
 *
 * @returns Effect platform layer for Node.js
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run a fully provided program, rejecting with the original failure
 *
 * `Effect.runPromise` wraps failures in a FiberFailure; callers here expect
 * the typed error (or the defect a callback threw) to surface unchanged.
 */
export async function runEffect<A, E>(program: Effect.Effect<A, E>): Promise<A> {
  const exit = await Effect.runPromiseExit(program);
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}
