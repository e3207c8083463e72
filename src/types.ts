/**
 * Shared option and I/O type definitions
 *
 * Entity types for the 2DM format live in `formats/mesh2d/types`; this module
 * holds what the I/O layer and every format entry point have in common.
 */

import { type } from "arktype";

/**
 * Callback for recoverable format issues
 */
export type WarningHandler = (warning: string, lineNumber?: number) => void;

/**
 * Options common to every parsing entry point
 */
export interface ParserOptions {
  /** Allow `0` as the smallest legal node/element ID */
  zeroIndex?: boolean;
  /** Keep floating point material values (false drops them with a warning) */
  allowFloatMatid?: boolean;
  /** Custom warning handler */
  onWarning?: WarningHandler;
}

/**
 * Branded file path that passed {@link FilePathSchema}
 */
export type FilePath = string & { readonly __brand: "FilePath" };

/**
 * File path validation: non-empty, no NUL bytes
 */
export const FilePathSchema = type("string>0").pipe((path: string): FilePath => {
  if (path.includes("\0")) {
    throw new Error("File paths cannot contain null characters");
  }
  return path as FilePath;
});

/**
 * Handle for writing to a file multiple times before closing it
 */
export interface FileWriteHandle {
  /** Path the handle was opened on */
  readonly path: string;
  /**
   * Write string content at the current end of the file
   *
   * @param content - String to write
   */
  writeString(content: string): Promise<void>;
  /** Release the underlying file descriptor; further writes fail */
  close(): Promise<void>;
}

/**
 * Default warning reporter used when no `onWarning` callback is given
 */
export function reportWarning(warning: string, lineNumber?: number): void {
  if (lineNumber === undefined) {
    console.warn(`2DM Warning: ${warning}`);
    return;
  }
  console.warn(`2DM Warning (line ${lineNumber}): ${warning}`);
}
