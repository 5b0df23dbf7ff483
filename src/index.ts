/**
 * fastfile - fast bulk reads and in-place byte edits for large files
 *
 * Loads whole files with concurrent positioned reads, splits them into
 * lines, and edits existing files at a byte offset without rewriting the
 * part before it.
 */

// Error types
export {
  AssemblyError,
  type ChunkFailure,
  ChunkReadError,
  FastFileError,
  FileEmptyError,
  FileError,
  FileNotFoundError,
  type FileOperation,
  GapError,
  isFileEmpty,
  isFileNotFound,
  PathError,
  ValidationError,
  WriteModeError,
} from "./errors";

// Reading
export {
  exists,
  fastLoadLines,
  getSize,
  parallelRead,
  readContents,
} from "./io/file-reader";
export { DEFAULT_READ_POLICY, planChunks, selectWorkerCount } from "./io/chunk-planner";
export { readChunk, readChunks } from "./io/parallel-reader";
export { assembleChunks } from "./io/assembler";
export { countLineFeeds, splitLines } from "./io/line-splitter";

// Writing and editing
export { type BufferedWriteHandle, openBufferedWriter, putContents } from "./io/file-writer";
export { insertAt, overwriteAt } from "./io/mutator";
export { parseWriteMode, validatePath } from "./io/path-resolver";

// Core types
export type {
  BufferedWriterOptions,
  ChunkDescriptor,
  ChunkResult,
  FilePath,
  LogLevelName,
  PositionedSource,
  ReadOptions,
  ReadPolicy,
  ReadTier,
  WriteMode,
} from "./types";
