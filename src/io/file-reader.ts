/**
 * File reading: parallel chunked loads, line loading and whole-file helpers
 *
 * `parallelRead` loads a whole file into memory by planning byte ranges,
 * reading them concurrently from one shared handle with positioned reads,
 * and reassembling them in order. `fastLoadLines` splits the result into
 * trimmed lines.
 */

import { type FileHandle, open } from "node:fs/promises";
import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import {
  AssemblyError,
  FileEmptyError,
  FileError,
  FileNotFoundError,
  PathError,
  ValidationError,
} from "../errors";
import type { FilePath, ReadOptions } from "../types";
import { ReadOptionsSchema } from "../types";
import { assembleChunks } from "./assembler";
import { DEFAULT_READ_POLICY, planChunks } from "./chunk-planner";
import { splitLines } from "./line-splitter";
import { readChunks } from "./parallel-reader";
import { fromPlatformError, resolveExisting, validatePathEffect } from "./path-resolver";
import { runIO } from "./runtime";

const DEFAULT_OPTIONS: Required<ReadOptions> = {
  policy: DEFAULT_READ_POLICY,
  logLevel: "none",
};

/**
 * Merge user options with defaults
 *
 * @throws {ValidationError} If the merged options are invalid
 */
function mergeOptions(options: ReadOptions): Required<ReadOptions> {
  const merged = { ...DEFAULT_OPTIONS, ...options };

  const validationResult = ReadOptionsSchema(merged);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid read options: ${validationResult.summary}`);
  }

  return merged;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Open one read-only handle shared by every chunk task, closed with the scope
 */
const openShared = (path: FilePath) =>
  Effect.acquireRelease(
    Effect.tryPromise({
      try: () => open(path, "r"),
      catch: (error): FileError =>
        isErrnoException(error) && error.code === "ENOENT"
          ? new FileNotFoundError(path, "open", error)
          : FileError.fromSystemError("open", path, error),
    }),
    (handle: FileHandle) => Effect.promise(() => handle.close())
  );

const parallelReadEffect = (path: string, options: Required<ReadOptions>) =>
  Effect.scoped(
    Effect.gen(function* () {
      const file = yield* resolveExisting(path);
      const plan = planChunks(file.size, options.policy);

      yield* Effect.logDebug(
        `planned ${plan.length} chunks of ${plan[0]?.requestedLength ?? 0} bytes for ${file.size} bytes`
      );

      const handle = yield* openShared(file.path);
      const results = yield* readChunks(handle, plan);
      const assembled = yield* assembleChunks(results, file.size);

      const after = yield* Effect.tryPromise({
        try: () => handle.stat(),
        catch: (error) => FileError.fromSystemError("stat", file.path, error),
      });
      if (after.size !== file.size) {
        return yield* Effect.fail(AssemblyError.forSizeMismatch(file.size, after.size));
      }

      yield* Effect.logInfo(`read ${assembled.length} bytes in ${plan.length} chunks`);
      return assembled;
    })
  ).pipe(Effect.annotateLogs("path", path));

/**
 * Read an entire file into memory using concurrent positioned reads
 *
 * The number of concurrent reads depends on the file size (1 up to 1 MiB,
 * 8 up to 128 MiB, 16 beyond, unless `options.policy` says otherwise).
 * Either every chunk is read and the assembled length verified, or the whole
 * call fails.
 *
 * @param path - File to read
 * @param options - Worker-count policy and log level
 * @returns The file's bytes
 * @throws {FileNotFoundError} If the file does not exist
 * @throws {ChunkReadError} If one or more chunk reads failed
 * @throws {AssemblyError} If the file changed size during the read
 *
 * @example
 * ```typescript
 * const bytes = await parallelRead("access.log");
 * console.log(`Loaded ${bytes.length} bytes`);
 * ```
 */
export async function parallelRead(path: string, options: ReadOptions = {}): Promise<Uint8Array> {
  const mergedOptions = mergeOptions(options);
  return runIO(parallelReadEffect(path, mergedOptions), mergedOptions.logLevel);
}

/**
 * Load a text file as trimmed lines, reading it in parallel
 *
 * Two failures are meant to be checked rather than reported: a missing file
 * (FileNotFoundError) and, when `returnErrorOnEmptyFile` is set, a file that
 * yields no lines (FileEmptyError). Both usually mean "nothing cached yet".
 *
 * @param path - File to load
 * @param allowEmptyLines - Keep lines that are empty after trimming
 * @param returnErrorOnEmptyFile - Fail with FileEmptyError instead of returning []
 * @param options - Worker-count policy and log level
 * @throws {FileNotFoundError} If the file does not exist
 * @throws {FileEmptyError} If no lines were produced and returnErrorOnEmptyFile is set
 *
 * @example
 * ```typescript
 * const words = await fastLoadLines("words.txt", false, false);
 * ```
 */
export async function fastLoadLines(
  path: string,
  allowEmptyLines: boolean,
  returnErrorOnEmptyFile: boolean,
  options: ReadOptions = {}
): Promise<string[]> {
  const mergedOptions = mergeOptions(options);

  const program = Effect.gen(function* () {
    const bytes = yield* parallelReadEffect(path, mergedOptions);
    const lines = splitLines(bytes, allowEmptyLines);
    yield* Effect.logDebug(`split ${bytes.length} bytes into ${lines.length} lines`);

    if (returnErrorOnEmptyFile && lines.length === 0) {
      return yield* Effect.fail(new FileEmptyError(path));
    }
    return lines;
  });

  return runIO(program, mergedOptions.logLevel);
}

/**
 * Read a whole file as UTF-8 text
 *
 * @throws {FileNotFoundError} If the file does not exist
 */
export async function readContents(path: string): Promise<string> {
  const program = Effect.gen(function* () {
    const file = yield* resolveExisting(path);
    const fs = yield* FileSystem.FileSystem;
    return yield* fs
      .readFileString(file.path)
      .pipe(Effect.mapError((error) => fromPlatformError("read", file.path, error)));
  });

  return runIO(program);
}

/**
 * Check if a regular file exists at `path`
 *
 * @returns false for missing paths and for directories
 * @throws {PathError} If the path is syntactically invalid
 */
export async function exists(path: string): Promise<boolean> {
  const program = Effect.gen(function* () {
    const validatedPath = yield* validatePathEffect(path);
    const fs = yield* FileSystem.FileSystem;

    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  return runIO(
    program.pipe(
      Effect.mapError((error) =>
        error instanceof PathError ? error : fromPlatformError("stat", path, error)
      )
    )
  );
}

/**
 * Get file size in bytes
 *
 * @throws {FileNotFoundError} If the file does not exist
 */
export async function getSize(path: string): Promise<number> {
  return runIO(Effect.map(resolveExisting(path), (file) => file.size));
}
