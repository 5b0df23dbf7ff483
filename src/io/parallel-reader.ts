/**
 * Concurrent positioned reads of a planned set of chunks
 *
 * Each chunk is read by its own task straight from the shared source with an
 * explicit position, so tasks never share a cursor. All tasks run to
 * completion; failures are collected and reported together once every task
 * has settled.
 *
 * @module parallel-reader
 */

import { Effect, Either } from "effect";
import { type ChunkFailure, ChunkReadError } from "../errors";
import type { ChunkDescriptor, ChunkResult, PositionedSource } from "../types";

/**
 * Read one chunk, looping until it is full or the source reports EOF
 *
 * A short read at end of file is not an error; `readLength` records it.
 */
export const readChunk = (
  source: PositionedSource,
  descriptor: ChunkDescriptor
): Effect.Effect<ChunkResult, ChunkFailure> =>
  Effect.tryPromise({
    try: async () => {
      const content = new Uint8Array(descriptor.requestedLength);
      let readLength = 0;

      while (readLength < descriptor.requestedLength) {
        const { bytesRead } = await source.read(
          content,
          readLength,
          descriptor.requestedLength - readLength,
          descriptor.startOffset + readLength
        );
        if (bytesRead === 0) break; // EOF
        readLength += bytesRead;
      }

      return { ...descriptor, readLength, content };
    },
    catch: (cause) => ({
      index: descriptor.index,
      startOffset: descriptor.startOffset,
      requestedLength: descriptor.requestedLength,
      cause,
    }),
  }).pipe(
    Effect.tap((result) =>
      Effect.logDebug(
        `chunk ${result.index} read ${result.readLength}/${result.requestedLength} bytes at offset ${result.startOffset}`
      )
    )
  );

/**
 * Read every chunk of a plan concurrently, one task per chunk
 *
 * Resolves only after every task has finished, with results in plan order.
 * Fails with a ChunkReadError listing each chunk that failed; a failing chunk
 * never interrupts its siblings.
 */
export const readChunks = (
  source: PositionedSource,
  plan: readonly ChunkDescriptor[]
): Effect.Effect<readonly ChunkResult[], ChunkReadError> =>
  Effect.gen(function* () {
    const outcomes = yield* Effect.forEach(
      plan,
      (descriptor) => Effect.either(readChunk(source, descriptor)),
      { concurrency: Math.max(plan.length, 1) }
    );

    const results: ChunkResult[] = [];
    const failures: ChunkFailure[] = [];
    for (const outcome of outcomes) {
      if (Either.isLeft(outcome)) {
        failures.push(outcome.left);
      } else {
        results.push(outcome.right);
      }
    }

    if (failures.length > 0) {
      yield* Effect.logDebug(`${failures.length} of ${plan.length} chunk reads failed`);
      return yield* Effect.fail(new ChunkReadError(failures, plan.length));
    }

    return results;
  });
