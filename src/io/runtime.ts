/**
 * Effect platform layer and Promise bridge for file I/O
 */

import type { FileSystem, Path } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Effect, Either } from "effect";

/**
 * Services the I/O programs may require from the platform
 */
export type PlatformServices = FileSystem.FileSystem | Path.Path;

/**
 * Effect platform layer providing FileSystem and Path
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run an I/O program on the platform layer
 *
 * Typed failures are rethrown as-is rather than wrapped in a fiber failure,
 * so callers can `instanceof`-check FileError and friends.
 */
export async function runIo<A, E>(program: Effect.Effect<A, E, PlatformServices>): Promise<A> {
  const result = await Effect.runPromise(
    Effect.either(program).pipe(Effect.provide(getPlatform()))
  );
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}
