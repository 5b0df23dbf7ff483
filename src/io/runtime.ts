/**
 * Effect platform layer and the bridge from Effect programs to Promises
 *
 * Every public operation is an Effect program internally. `runIO` provides
 * the Node platform layer, applies the requested log level and rethrows the
 * original typed failure instead of Effect's FiberFailure wrapper.
 */

import type { FileSystem, Path } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit, Logger, LogLevel } from "effect";
import type { LogLevelName } from "../types";

/**
 * Effect platform layer providing FileSystem and Path
 */
export function getPlatform() {
  return NodeContext.layer;
}

const LOG_LEVELS: Record<LogLevelName, LogLevel.LogLevel> = {
  none: LogLevel.None,
  info: LogLevel.Info,
  debug: LogLevel.Debug,
};

/**
 * Run an I/O program on the Node platform and resolve with its value
 *
 * @throws The program's own failure (a FastFileError subclass), or the defect
 * that interrupted it
 */
export async function runIO<A, E>(
  program: Effect.Effect<A, E, FileSystem.FileSystem | Path.Path>,
  logLevel: LogLevelName = "none"
): Promise<A> {
  const exit = await Effect.runPromiseExit(
    program.pipe(Logger.withMinimumLogLevel(LOG_LEVELS[logLevel]), Effect.provide(getPlatform()))
  );

  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}
