/**
 * File reading utilities
 *
 * Thin Promise-based wrappers around the Effect platform FileSystem service.
 * Meshes are loaded whole, so reading is "read everything as text".
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { FileError } from "../errors";
import type { FilePath } from "../types";
import { FilePathSchema } from "../types";
import { getPlatform } from "./runtime";

/**
 * Check if a file exists and is a regular file
 *
 * @param path File path to check
 * @returns Promise resolving to true if the path names an existing file
 * @throws {FileError} If path validation fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Read entire file to string
 *
 * @param path File path to read
 * @returns Promise resolving to file content decoded as UTF-8
 * @throws {FileError} If file cannot be read
 */
export async function readToString(path: string): Promise<string> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readFileString(validatedPath);
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("read", validatedPath, error);
  }
}

/**
 * Validate file path using ArkType and return branded type
 * Maintains FileError interface contract for callers
 */
export function validatePath(path: string): FilePath {
  try {
    const validationResult = FilePathSchema(path);
    if (validationResult instanceof type.errors) {
      throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
    }
    return validationResult;
  } catch (error) {
    if (error instanceof FileError) throw error;
    throw new FileError(
      `Invalid file path: ${error instanceof Error ? error.message : String(error)}`,
      path,
      "stat"
    );
  }
}
