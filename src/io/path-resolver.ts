/**
 * Path validation, existence checks and opening files by write mode
 *
 * @module path-resolver
 */

import { FileSystem, Path } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import { type } from "arktype";
import { Effect, type Scope } from "effect";
import {
  FileError,
  FileNotFoundError,
  type FileOperation,
  PathError,
  WriteModeError,
} from "../errors";
import { type FilePath, FilePathSchema, type WriteMode, WriteModeSchema } from "../types";

/**
 * An existing file and the size it had when it was resolved
 */
export interface ResolvedFile {
  readonly path: FilePath;
  readonly size: number;
}

/**
 * Check path syntax: it must not be empty and must not end with a separator
 *
 * @throws {PathError} If the path is syntactically invalid
 */
export function validatePath(path: string): FilePath {
  const result = FilePathSchema(path);
  if (result instanceof type.errors) {
    throw new PathError(`Invalid file path: ${result.summary}`, path);
  }
  return result;
}

/**
 * Parse a write mode, accepting only "APPEND" and "OVERWRITE"
 *
 * @throws {WriteModeError} For any other value
 */
export function parseWriteMode(mode: string): WriteMode {
  const result = WriteModeSchema(mode);
  if (result instanceof type.errors) {
    throw new WriteModeError(mode);
  }
  return result;
}

/**
 * Translate a platform failure into a FileError, keeping not-found distinct
 */
export function fromPlatformError(
  operation: FileOperation,
  path: string,
  error: PlatformError
): FileError {
  if (error._tag === "SystemError" && error.reason === "NotFound") {
    return new FileNotFoundError(path, operation, error);
  }
  return FileError.fromSystemError(operation, path, error);
}

/**
 * validatePath as an Effect failing with PathError
 */
export const validatePathEffect = (path: string): Effect.Effect<FilePath, PathError> =>
  Effect.try({
    try: () => validatePath(path),
    catch: (error) =>
      error instanceof PathError ? error : new PathError(`Invalid file path: ${String(error)}`, path),
  });

/**
 * Validate a path, require the file to exist and report its current size
 */
export const resolveExisting = (
  path: string
): Effect.Effect<ResolvedFile, PathError | FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const validatedPath = yield* validatePathEffect(path);
    const fs = yield* FileSystem.FileSystem;

    const fileExists = yield* fs
      .exists(validatedPath)
      .pipe(Effect.mapError((error) => fromPlatformError("stat", validatedPath, error)));
    if (!fileExists) {
      return yield* Effect.fail(new FileNotFoundError(validatedPath));
    }

    const info = yield* fs
      .stat(validatedPath)
      .pipe(Effect.mapError((error) => fromPlatformError("stat", validatedPath, error)));

    return { path: validatedPath, size: Number(info.size) };
  });

/**
 * Create every missing directory above `path`
 */
export const ensureParentDirectory = (
  path: FilePath
): Effect.Effect<void, FileError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;

    const parentDir = pathService.dirname(path);
    if (parentDir === "." || parentDir === pathService.parse(parentDir).root) {
      return;
    }

    yield* fs.makeDirectory(parentDir, { recursive: true }).pipe(
      Effect.mapError(
        (error) =>
          new FileError(
            `Cannot create directory by path "${parentDir}"`,
            path,
            "mkdir",
            error,
            `System error: ${error.message}`
          )
      )
    );
  });

/**
 * Open a file for writing according to its write mode
 *
 * APPEND opens for appending and OVERWRITE truncates; both create the file.
 * The handle is closed when the surrounding scope closes.
 */
export const openForMode = (
  path: string,
  mode: WriteMode,
  createParents: boolean
): Effect.Effect<
  FileSystem.File,
  PathError | FileError,
  FileSystem.FileSystem | Path.Path | Scope.Scope
> =>
  Effect.gen(function* () {
    const validatedPath = yield* validatePathEffect(path);
    const fs = yield* FileSystem.FileSystem;

    if (createParents) {
      yield* ensureParentDirectory(validatedPath);
    }

    return yield* fs
      .open(validatedPath, { flag: mode === "APPEND" ? "a" : "w", mode: 0o644 })
      .pipe(Effect.mapError((error) => fromPlatformError("open", validatedPath, error)));
  });
