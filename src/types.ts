/**
 * Core types and validation schemas for fastfile
 */

import { type } from "arktype";

// =============================================================================
// PATHS AND MODES
// =============================================================================

/**
 * Branded type for paths that passed syntax validation
 */
export type FilePath = string & {
  readonly __brand: "FilePath";
};

/**
 * How a writer opens its target: APPEND keeps existing content and writes at
 * the end, OVERWRITE truncates first. Both create the file when missing.
 */
export type WriteMode = "APPEND" | "OVERWRITE";

export const WriteModeSchema = type("'APPEND' | 'OVERWRITE'");

/**
 * Path syntax: non-empty and naming a file, not a directory
 */
export const FilePathSchema = type("string>0")
  .narrow((path, ctx) => {
    if (path.endsWith("/") || path.endsWith("\\")) {
      return ctx.reject({
        expected: "a path ending with a file name",
        actual: `"${path}" ends with a separator`,
      });
    }
    return true;
  })
  .pipe((path) => path as FilePath);

/**
 * Byte offset into a file
 */
export const ByteOffsetSchema = type("number>=0").narrow((offset, ctx) =>
  Number.isSafeInteger(offset)
    ? true
    : ctx.reject({ expected: "an integer byte offset", actual: String(offset) })
);

// =============================================================================
// CHUNKED READ MODEL
// =============================================================================

/**
 * One planned unit of work for the parallel reader
 *
 * Descriptors of a plan partition the file: `index` is contiguous from 0,
 * ranges neither overlap nor leave gaps, and only the last one may differ in
 * length from the others.
 */
export interface ChunkDescriptor {
  /** Position in reassembly order, 0-based */
  readonly index: number;
  /** Byte offset where this chunk begins */
  readonly startOffset: number;
  /** Number of bytes this chunk is expected to contain */
  readonly requestedLength: number;
}

/**
 * Result of one successful chunk read
 */
export interface ChunkResult extends ChunkDescriptor {
  /** Bytes actually read; below requestedLength only when EOF came early */
  readonly readLength: number;
  /** Buffer of requestedLength bytes, of which the first readLength are data */
  readonly content: Uint8Array;
}

/**
 * Anything that supports positioned reads without a shared cursor.
 * `FileHandle` from node:fs/promises satisfies this.
 */
export interface PositionedSource {
  read(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number
  ): Promise<{ bytesRead: number }>;
}

// =============================================================================
// CONFIGURATION
// =============================================================================

/**
 * Worker-count tier: files up to `maxBytes` are read by `workers` tasks
 */
export interface ReadTier {
  readonly maxBytes: number;
  readonly workers: number;
}

/**
 * Size-driven worker-count policy for parallel reads
 */
export interface ReadPolicy {
  /** Checked in order; the first tier whose maxBytes covers the file wins */
  readonly tiers: readonly ReadTier[];
  /** Worker count for files larger than every tier */
  readonly fallbackWorkers: number;
}

export type LogLevelName = "none" | "info" | "debug";

export interface ReadOptions {
  /** Worker-count policy (default: 1 worker up to 1 MiB, 8 up to 128 MiB, else 16) */
  readonly policy?: ReadPolicy;
  /** Minimum level of log lines emitted during the read (default: "none") */
  readonly logLevel?: LogLevelName;
}

export interface BufferedWriterOptions {
  /** Create missing parent directories (default: false) */
  readonly createParents?: boolean;
  /** Bytes held in memory before a flush (default: 4096) */
  readonly bufferSize?: number;
}

const PositiveIntegerSchema = type("number>=1").narrow((value, ctx) =>
  Number.isInteger(value) ? true : ctx.reject({ expected: "an integer", actual: String(value) })
);

const ReadTierSchema = type({
  maxBytes: "number>=0",
  workers: PositiveIntegerSchema,
});

export const ReadPolicySchema = type({
  tiers: ReadTierSchema.array(),
  fallbackWorkers: PositiveIntegerSchema,
}).narrow((policy, ctx) => {
  for (let i = 1; i < policy.tiers.length; i++) {
    const previous = policy.tiers[i - 1];
    const current = policy.tiers[i];
    if (previous !== undefined && current !== undefined && current.maxBytes <= previous.maxBytes) {
      return ctx.reject({
        expected: "tiers sorted by ascending maxBytes",
        actual: `tier ${i} maxBytes ${current.maxBytes} <= ${previous.maxBytes}`,
        path: ["tiers", i, "maxBytes"],
      });
    }
  }
  return true;
});

export const ReadOptionsSchema = type({
  "policy?": ReadPolicySchema,
  "logLevel?": "'none' | 'info' | 'debug'",
});

export const BufferedWriterOptionsSchema = type({
  "createParents?": "boolean",
  "bufferSize?": PositiveIntegerSchema,
});
