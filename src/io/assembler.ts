/**
 * Reassembly of chunk results into one contiguous buffer
 *
 * @module assembler
 */

import { Effect } from "effect";
import { AssemblyError } from "../errors";
import type { ChunkResult } from "../types";

/**
 * Concatenate chunk results in index order and verify the total length
 *
 * Results may arrive in any order. Indices must be contiguous from 0, and the
 * sum of the bytes actually read must equal `expectedSize`; anything else
 * means the file changed under the read or a chunk came back short.
 */
export const assembleChunks = (
  results: readonly ChunkResult[],
  expectedSize: number
): Effect.Effect<Uint8Array, AssemblyError> =>
  Effect.gen(function* () {
    const ordered = [...results].sort((a, b) => a.index - b.index);

    let assembledLength = 0;
    for (const [position, chunk] of ordered.entries()) {
      if (chunk.index !== position) {
        return yield* Effect.fail(
          AssemblyError.forMissingChunk(position, expectedSize, assembledLength)
        );
      }
      assembledLength += chunk.readLength;
    }

    if (assembledLength !== expectedSize) {
      return yield* Effect.fail(AssemblyError.forSizeMismatch(expectedSize, assembledLength));
    }

    const assembled = new Uint8Array(expectedSize);
    let offset = 0;
    for (const chunk of ordered) {
      assembled.set(chunk.content.subarray(0, chunk.readLength), offset);
      offset += chunk.readLength;
    }

    yield* Effect.logDebug(`assembled ${ordered.length} chunks into ${assembledLength} bytes`);
    return assembled;
  });
