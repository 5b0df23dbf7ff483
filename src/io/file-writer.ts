/**
 * File writing operations using Effect Platform
 *
 * Whole-string writes and a buffered sequential writer, both opening their
 * target in APPEND or OVERWRITE mode. All Effect complexity stays behind
 * Promise-based APIs.
 *
 * @module file-writer
 */

import { type } from "arktype";
import { Effect } from "effect";
import { type FileError, ValidationError } from "../errors";
import { type BufferedWriterOptions, BufferedWriterOptionsSchema, type WriteMode } from "../types";
import { fromPlatformError, openForMode, parseWriteMode } from "./path-resolver";
import { runIO } from "./runtime";

const DEFAULT_WRITER_OPTIONS: Required<BufferedWriterOptions> = {
  createParents: false,
  bufferSize: 4096,
};

const encoder = new TextEncoder();

function mergeWriterOptions(options: BufferedWriterOptions): Required<BufferedWriterOptions> {
  const merged = { ...DEFAULT_WRITER_OPTIONS, ...options };

  const validationResult = BufferedWriterOptionsSchema(merged);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid writer options: ${validationResult.summary}`);
  }

  return merged;
}

function concatBytes(parts: readonly Uint8Array[], totalLength: number): Uint8Array {
  const joined = new Uint8Array(totalLength);
  let offset = 0;
  for (const part of parts) {
    joined.set(part, offset);
    offset += part.length;
  }
  return joined;
}

/**
 * Write a string to a file
 *
 * @param path - File to write; created if missing
 * @param data - Text to write, encoded as UTF-8
 * @param mode - "APPEND" adds to the end, "OVERWRITE" replaces the content
 * @param createParents - Create missing parent directories first
 * @throws {WriteModeError} If mode is neither APPEND nor OVERWRITE
 * @throws {PathError} If the path is syntactically invalid
 * @throws {FileError} When the write fails
 *
 * @example
 * ```typescript
 * await putContents("logs/run.log", "started\n", "APPEND", true);
 * ```
 */
export async function putContents(
  path: string,
  data: string,
  mode: WriteMode,
  createParents = false
): Promise<void> {
  const writeMode = parseWriteMode(mode);

  const bytes = encoder.encode(data);

  const program = Effect.gen(function* () {
    const file = yield* openForMode(path, writeMode, createParents);
    // Opening alone creates or truncates; writeAll rejects an empty buffer
    if (bytes.length === 0) return;
    yield* file
      .writeAll(bytes)
      .pipe(Effect.mapError((error) => fromPlatformError("write", path, error)));
  });

  await runIO(Effect.scoped(program));
}

/**
 * Handle given to the callback of openBufferedWriter
 */
export interface BufferedWriteHandle {
  /**
   * Queue data for writing, flushing first when the buffer would fill up
   */
  write(data: string | Uint8Array): Promise<void>;

  /**
   * Write out everything buffered so far
   */
  flush(): Promise<void>;

  /**
   * Bytes currently held in memory
   */
  readonly bufferedBytes: number;
}

/**
 * Open a file once and write to it through an in-memory buffer
 *
 * The buffer is written out whenever it reaches `bufferSize` bytes and once
 * more after the callback resolves; then the file is closed. If the callback
 * throws, whatever is still buffered is discarded, the file is closed and
 * the callback's error is rethrown unchanged.
 *
 * @param path - File to write; created if missing
 * @param mode - "APPEND" or "OVERWRITE"
 * @param callback - Receives the handle; its result is returned
 * @param options - createParents and bufferSize (default 4096)
 * @returns The callback's result
 *
 * @example
 * ```typescript
 * await openBufferedWriter("report.txt", "OVERWRITE", async (writer) => {
 *   for (const row of rows) {
 *     await writer.write(`${row.name}\t${row.count}\n`);
 *   }
 * });
 * ```
 */
export async function openBufferedWriter<T>(
  path: string,
  mode: WriteMode,
  callback: (handle: BufferedWriteHandle) => Promise<T>,
  options: BufferedWriterOptions = {}
): Promise<T> {
  const writeMode = parseWriteMode(mode);
  const { createParents, bufferSize } = mergeWriterOptions(options);

  const program = Effect.gen(function* () {
    const file = yield* openForMode(path, writeMode, createParents);

    let pending: Uint8Array[] = [];
    let pendingBytes = 0;

    const flushEffect: Effect.Effect<void, FileError> = Effect.suspend(() => {
      if (pendingBytes === 0) return Effect.void;
      const data = concatBytes(pending, pendingBytes);
      pending = [];
      pendingBytes = 0;
      return file.writeAll(data).pipe(
        Effect.tap(() => Effect.logDebug(`flushed ${data.length} bytes`)),
        Effect.mapError((error) => fromPlatformError("write", path, error))
      );
    });

    const handle: BufferedWriteHandle = {
      write: async (data) => {
        const bytes = typeof data === "string" ? encoder.encode(data) : data;
        if (pendingBytes > 0 && pendingBytes + bytes.length > bufferSize) {
          await runIO(flushEffect);
        }
        pending.push(bytes);
        pendingBytes += bytes.length;
        if (pendingBytes >= bufferSize) {
          await runIO(flushEffect);
        }
      },
      flush: () => runIO(flushEffect),
      get bufferedBytes() {
        return pendingBytes;
      },
    };

    const result = yield* Effect.tryPromise({
      try: () => callback(handle),
      catch: (error) => error,
    });
    yield* flushEffect;
    return result;
  });

  return runIO(Effect.scoped(program));
}
