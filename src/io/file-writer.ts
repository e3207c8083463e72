/**
 * File writing operations using Effect Platform
 *
 * All Effect complexity is hidden behind Promise-based APIs. Long-lived
 * handles keep their file descriptor inside an Effect `Scope`; closing the
 * handle closes the scope, which releases the descriptor.
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { Effect, Exit, Scope } from "effect";
import { FileClosedError, FileError } from "../errors";
import type { FileWriteHandle } from "../types";
import { validatePath } from "./file-reader";
import { getPlatform } from "./runtime";

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * @param path - File path to write to
 * @param content - String content to write
 * @throws {FileError} When write operation fails or path is invalid
 *
 * @example
 * ```typescript
 * await writeString("square.2dm", "MESH2D\nND 1 0 0 0\n");
 * ```
 */
export async function writeString(path: string, content: string): Promise<void> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFileString(validatedPath, content);
  });

  try {
    await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("write", validatedPath, error);
  }
}

/**
 * Open file for writing and return a handle that owns the descriptor
 *
 * The file is truncated (or created with 644 permissions). The caller must
 * call `close()` on the handle; {@link openForWriting} does that for you.
 *
 * @param path - File path to open
 * @returns Promise resolving to an open write handle
 * @throws {FileError} When the file cannot be opened
 */
export async function openWriteHandle(path: string): Promise<FileWriteHandle> {
  const validatedPath = validatePath(path);
  const scope = await Effect.runPromise(Scope.make());

  const open = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.open(validatedPath, { flag: "w", mode: 0o644 });
  });

  let file: FileSystem.File;
  try {
    file = await Effect.runPromise(open.pipe(Scope.extend(scope), Effect.provide(getPlatform())));
  } catch (error) {
    await Effect.runPromise(Scope.close(scope, Exit.void));
    throw FileError.fromSystemError("open", validatedPath, error);
  }

  const encoder = new TextEncoder();
  let closed = false;

  return {
    path: validatedPath,

    writeString: async (content: string): Promise<void> => {
      if (closed) {
        throw new FileClosedError(validatedPath);
      }
      try {
        await Effect.runPromise(file.writeAll(encoder.encode(content)));
      } catch (error) {
        throw FileError.fromSystemError("write", validatedPath, error);
      }
    },

    close: async (): Promise<void> => {
      if (closed) return;
      closed = true;
      try {
        await Effect.runPromise(Scope.close(scope, Exit.void));
      } catch (error) {
        throw FileError.fromSystemError("close", validatedPath, error);
      }
    },
  };
}

/**
 * Open file for writing and execute callback with write handle
 *
 * The file is closed when the callback completes or throws.
 *
 * @param path - File path to open (creates if not exists, overwrites if exists)
 * @param callback - Function that receives write handle and returns result
 * @returns Promise resolving to callback's return value
 * @throws {FileError} When file operations fail or path is invalid
 *
 * @example
 * ```typescript
 * await openForWriting("mesh.2dm", async (handle) => {
 *   await handle.writeString("MESH2D\n");
 *   await handle.writeString("NUM_MATERIALS_PER_ELEM 0\n");
 * });
 * ```
 */
export async function openForWriting<T>(
  path: string,
  callback: (handle: FileWriteHandle) => Promise<T>
): Promise<T> {
  const handle = await openWriteHandle(path);
  try {
    return await callback(handle);
  } finally {
    await handle.close();
  }
}
