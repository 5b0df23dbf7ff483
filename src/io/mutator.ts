/**
 * In-place byte edits of existing files
 *
 * Both operations refuse offsets past the current end of file rather than
 * leave a gap of undefined bytes. Neither is crash-safe, and concurrent use
 * of the same file must be serialized by the caller.
 *
 * @module mutator
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Option } from "effect";
import { AssemblyError, type FileError, GapError, type PathError, ValidationError } from "../errors";
import { ByteOffsetSchema, type FilePath } from "../types";
import { fromPlatformError, resolveExisting } from "./path-resolver";
import { runIO } from "./runtime";

const encoder = new TextEncoder();

function toBytes(data: Uint8Array | string): Uint8Array {
  return typeof data === "string" ? encoder.encode(data) : data;
}

/**
 * Resolve the file and check that `fromByte` lies within [0, size]
 */
const resolveTarget = (
  path: string,
  fromByte: number
): Effect.Effect<
  { readonly path: FilePath; readonly size: number },
  PathError | FileError | ValidationError | GapError,
  FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    const offset = ByteOffsetSchema(fromByte);
    if (offset instanceof type.errors) {
      return yield* Effect.fail(new ValidationError(`Invalid byte offset: ${offset.summary}`));
    }

    const file = yield* resolveExisting(path);
    if (fromByte > file.size) {
      return yield* Effect.fail(new GapError(file.path, fromByte, file.size));
    }
    return file;
  });

/**
 * Read everything from `fromByte` to the end of the file
 */
const readRemainder = (
  path: FilePath,
  fromByte: number,
  length: number
): Effect.Effect<Uint8Array, FileError | AssemblyError, FileSystem.FileSystem> =>
  Effect.scoped(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const file = yield* fs.open(path, { flag: "r" });
      yield* file.seek(fromByte, "start");

      const remainder = new Uint8Array(length);
      let filled = 0;
      while (filled < length) {
        const chunk = yield* file.readAlloc(length - filled);
        if (Option.isNone(chunk)) break;
        remainder.set(chunk.value, filled);
        filled += chunk.value.length;
      }

      if (filled !== length) {
        return yield* Effect.fail(AssemblyError.forSizeMismatch(length, filled));
      }
      return remainder;
    }).pipe(
      Effect.mapError((error) =>
        error instanceof AssemblyError ? error : fromPlatformError("read", path, error)
      )
    )
  );

/**
 * Write each non-empty buffer in turn starting at `fromByte`, without truncating
 */
const writeFrom = (
  path: FilePath,
  fromByte: number,
  buffers: readonly Uint8Array[]
): Effect.Effect<void, FileError, FileSystem.FileSystem> =>
  Effect.scoped(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const file = yield* fs.open(path, { flag: "r+" });
      yield* file.seek(fromByte, "start");
      for (const buffer of buffers) {
        // writeAll fails on an empty buffer
        if (buffer.length > 0) {
          yield* file.writeAll(buffer);
        }
      }
    }).pipe(Effect.mapError((error) => fromPlatformError("write", path, error)))
  );

/**
 * Overwrite bytes starting at `fromByte`
 *
 * Bytes past the replaced range are untouched; a replacement running past
 * the end of file grows it, and `fromByte` equal to the file size appends.
 *
 * @param path - Existing file to edit
 * @param fromByte - Offset of the first byte to replace, at most the file size
 * @param replacement - Bytes to write; strings are encoded as UTF-8
 * @throws {GapError} If `fromByte` is past the end of file (the file is left unchanged)
 * @throws {FileNotFoundError} If the file does not exist
 *
 * @example
 * ```typescript
 * // "Hello, world" -> "Hello, there"
 * await overwriteAt("greeting.txt", 7, "there");
 * ```
 */
export async function overwriteAt(
  path: string,
  fromByte: number,
  replacement: Uint8Array | string
): Promise<void> {
  const program = Effect.gen(function* () {
    const target = yield* resolveTarget(path, fromByte);
    yield* writeFrom(target.path, fromByte, [toBytes(replacement)]);
  });

  await runIO(program);
}

/**
 * Insert bytes at `fromByte`, shifting everything after it
 *
 * Reads the tail from `fromByte` into memory, then writes the insertion
 * followed by the tail. The cost is proportional to the size of the tail,
 * so inserts near the end of a file are cheap and inserts near the start of
 * a large file rewrite most of it.
 *
 * @param path - Existing file to edit
 * @param fromByte - Insertion offset, at most the file size
 * @param insertion - Bytes to insert; strings are encoded as UTF-8
 * @throws {GapError} If `fromByte` is past the end of file (the file is left unchanged)
 * @throws {FileNotFoundError} If the file does not exist
 *
 * @example
 * ```typescript
 * // "Line 1\nLine 3\n" -> "Line 1\nLine 2\nLine 3\n"
 * await insertAt("lines.txt", 7, "Line 2\n");
 * ```
 */
export async function insertAt(
  path: string,
  fromByte: number,
  insertion: Uint8Array | string
): Promise<void> {
  const program = Effect.gen(function* () {
    const target = yield* resolveTarget(path, fromByte);
    const remainder = yield* readRemainder(target.path, fromByte, target.size - fromByte);
    yield* writeFrom(target.path, fromByte, [toBytes(insertion), remainder]);
  });

  await runIO(program);
}
