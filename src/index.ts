/**
 * mesh2dm - Reading and writing 2DM finite-element meshes
 *
 * Nodes, elements and node strings are typed, immutable values; the
 * reader loads a whole mesh into memory and the writer buffers entities
 * and writes them in contiguous blocks.
 */

// Error types
export {
  CardError,
  EntityNotFoundError,
  ERROR_SUGGESTIONS,
  FileClosedError,
  FileError,
  FormatError,
  getErrorSuggestion,
  IndexRangeError,
  MeshError,
  ReadError,
  ValidationError,
  WriteError,
} from "./errors";
// 2DM format
export * from "./formats/mesh2d";
// File I/O
export { exists, readToString } from "./io/file-reader";
export { openForWriting, openWriteHandle, writeString } from "./io/file-writer";
// Shared types
export {
  type FilePath,
  type FileWriteHandle,
  type ParserOptions,
  reportWarning,
  type WarningHandler,
} from "./types";
