/**
 * Tests for the Effect-backed file helpers
 */

import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileClosedError, FileError } from "../../src/errors";
import { exists, readToString, validatePath } from "../../src/io/file-reader";
import { openForWriting, openWriteHandle, writeString } from "../../src/io/file-writer";

describe("File I/O", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "mesh2dm-io-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("reading", () => {
    test("reads a whole file as text", async () => {
      const path = join(dir, "mesh.2dm");
      writeFileSync(path, "MESH2D\nND 1 0 0 0\n");
      expect(await readToString(path)).toBe("MESH2D\nND 1 0 0 0\n");
    });

    test("reports whether a regular file exists", async () => {
      const path = join(dir, "present.2dm");
      writeFileSync(path, "MESH2D\n");
      mkdirSync(join(dir, "folder"));

      expect(await exists(path)).toBe(true);
      expect(await exists(join(dir, "absent.2dm"))).toBe(false);
      expect(await exists(join(dir, "folder"))).toBe(false);
    });

    test("wraps missing files in FileError", async () => {
      try {
        await readToString(join(dir, "missing.2dm"));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(FileError);
        if (error instanceof FileError) {
          expect(error.operation).toBe("read");
          expect(error.filePath).toBe(join(dir, "missing.2dm"));
        }
      }
    });

    test("rejects empty paths and NUL bytes", () => {
      expect(() => validatePath("")).toThrow(FileError);
      expect(() => validatePath("mesh\0.2dm")).toThrow(FileError);
      expect(validatePath("mesh.2dm")).toBe("mesh.2dm");
    });
  });

  describe("writing", () => {
    test("writes and overwrites whole files", async () => {
      const path = join(dir, "out.2dm");
      await writeString(path, "first");
      await writeString(path, "MESH2D\n");
      expect(readFileSync(path, "utf8")).toBe("MESH2D\n");
    });

    test("appends through a write handle until closed", async () => {
      const path = join(dir, "handle.2dm");
      await openForWriting(path, async (handle) => {
        await handle.writeString("MESH2D\n");
        await handle.writeString("NUM_MATERIALS_PER_ELEM 0\n");
      });
      expect(readFileSync(path, "utf8")).toBe("MESH2D\nNUM_MATERIALS_PER_ELEM 0\n");
    });

    test("fails writes after close", async () => {
      const handle = await openWriteHandle(join(dir, "closed.2dm"));
      await handle.close();
      await handle.close();
      await expect(handle.writeString("late")).rejects.toThrow(FileClosedError);
    });

    test("wraps open failures in FileError", async () => {
      await expect(openWriteHandle(join(dir, "no-such-dir", "out.2dm"))).rejects.toThrow(FileError);
    });
  });
});
