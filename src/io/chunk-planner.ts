/**
 * Partitioning a file into byte ranges for concurrent reads
 *
 * @module chunk-planner
 */

import type { ChunkDescriptor, ReadPolicy } from "../types";

/**
 * 1 worker up to 1 MiB, 8 up to 128 MiB, 16 beyond
 */
export const DEFAULT_READ_POLICY: ReadPolicy = {
  tiers: [
    { maxBytes: 1_048_576, workers: 1 },
    { maxBytes: 134_217_728, workers: 8 },
  ],
  fallbackWorkers: 16,
};

/**
 * Number of concurrent read tasks the policy assigns to a file of this size
 *
 * @example
 * ```typescript
 * selectWorkerCount(1_048_576); // 1
 * selectWorkerCount(1_048_577); // 8
 * ```
 */
export function selectWorkerCount(fileSize: number, policy: ReadPolicy = DEFAULT_READ_POLICY): number {
  const tier = policy.tiers.find((candidate) => fileSize <= candidate.maxBytes);
  return tier?.workers ?? policy.fallbackWorkers;
}

/**
 * Split `fileSize` bytes into contiguous chunks, one per worker
 *
 * Every chunk but the last covers `ceil(fileSize / workers)` bytes; the last
 * covers what remains, which may be less or, when the size divides evenly,
 * the same. An empty file gets one empty chunk.
 *
 * If the policy asks for more workers than the file can give a non-empty
 * range, fewer chunks are planned (e.g. 10 bytes over 8 workers is 5 chunks
 * of 2 bytes).
 */
export function planChunks(
  fileSize: number,
  policy: ReadPolicy = DEFAULT_READ_POLICY
): readonly ChunkDescriptor[] {
  const workers = selectWorkerCount(fileSize, policy);
  const chunkSize = Math.ceil(fileSize / workers);

  if (chunkSize === 0) {
    return [{ index: 0, startOffset: 0, requestedLength: 0 }];
  }

  const chunkCount = Math.ceil(fileSize / chunkSize);
  const lastChunkSize = fileSize - chunkSize * (chunkCount - 1);

  return Array.from({ length: chunkCount }, (_, index) => ({
    index,
    startOffset: index * chunkSize,
    requestedLength: index === chunkCount - 1 ? lastChunkSize : chunkSize,
  }));
}
