/**
 * Tests for loading 2DM meshes
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  EntityNotFoundError,
  FileClosedError,
  FileError,
  FormatError,
  IndexRangeError,
  ReadError,
  ValidationError,
} from "../../src/errors";
import { resolveReaderOptions } from "../../src/formats/mesh2d/options";
import { MeshReader, scanMetadata, withReader } from "../../src/formats/mesh2d/reader";

const CHANNEL_MESH = [
  "MESH2D",
  'MESHNAME "test channel"',
  "NUM_MATERIALS_PER_ELEM 1",
  "BC 1 2",
  "# corner nodes",
  "ND 1 0.0 0.0 1.0",
  "ND 2 10.0 0.0 2.0",
  "ND 3 10.0 5.0 3.0",
  "ND 4 0.0 5.0 4.0",
  "E3T 1 1 2 3 1",
  "E3T 2 1 3 4 2",
  "NS 1 2 3 4 -1 outer",
  "NS 1 2",
  "NS -3 inner",
  "",
].join("\n");

function quietReader(text: string, zeroIndex = false): MeshReader {
  return MeshReader.fromString(text, { zeroIndex, onWarning: () => {} });
}

function lineOf(error: unknown): number | undefined {
  return error instanceof FormatError ? error.lineNumber : undefined;
}

describe("MeshReader", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "mesh2dm-reader-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function fixture(text: string, name = "mesh.2dm"): string {
    const path = join(dir, name);
    writeFileSync(path, text);
    return path;
  }

  describe("open", () => {
    test("loads counts and header fields", async () => {
      const warnings: Array<[string, number | undefined]> = [];
      const mesh = await MeshReader.open(fixture(CHANNEL_MESH), {
        onWarning: (warning, lineNumber) => {
          warnings.push([warning, lineNumber]);
        },
      });

      expect(mesh.numNodes).toBe(4);
      expect(mesh.numElements).toBe(2);
      expect(mesh.numNodeStrings).toBe(2);
      expect(mesh.name).toBe("test channel");
      expect(mesh.materialsPerElement).toBe(1);
      expect(warnings).toEqual([["Unsupported card 'BC' ignored; it will be lost on re-save", 4]]);
      await mesh.close();
    });

    test("records block offsets in bytes", async () => {
      const mesh = await MeshReader.open(fixture(CHANNEL_MESH), { onWarning: () => {} });
      expect(mesh.metadata).toEqual({
        numNodes: 4,
        numElements: 2,
        numNodeStrings: 2,
        name: "test channel",
        materialsPerElement: 1,
        nodesOffset: CHANNEL_MESH.indexOf("ND 1"),
        elementsOffset: CHANNEL_MESH.indexOf("E3T 1"),
        nodeStringsOffset: CHANNEL_MESH.indexOf("NS 1 2 3"),
      });
      await mesh.close();
    });

    test("scans metadata without building entities", () => {
      const warnings: string[] = [];
      const config = resolveReaderOptions({ onWarning: (warning) => warnings.push(warning) });
      const text = ["MESH2D", "ND 1 0 0 0", "ND 2 1 0 0", "E2L 1 1 9", "BC 1"].join("\n");

      expect(scanMetadata(text, config)).toEqual({
        numNodes: 2,
        numElements: 1,
        numNodeStrings: 0,
        name: null,
        materialsPerElement: null,
        nodesOffset: 7,
        elementsOffset: 29,
        nodeStringsOffset: null,
      });
      expect(warnings).toEqual(["Unsupported card 'BC' ignored; it will be lost on re-save"]);
      expect(() => scanMetadata("ND 1 0 0 0", config)).toThrow(ReadError);
    });

    test("fails with ReadError without the MESH2D marker", async () => {
      await expect(MeshReader.open(fixture("ND 1 0 0 0\n"))).rejects.toThrow(ReadError);
    });

    test("fails with ReadError on an empty file", async () => {
      await expect(MeshReader.open(fixture("\n# nothing here\n"))).rejects.toThrow(ReadError);
    });

    test("fails with FileError on a missing file", async () => {
      await expect(MeshReader.open(join(dir, "missing.2dm"))).rejects.toThrow(FileError);
    });

    test("validates options", async () => {
      await expect(MeshReader.open(fixture(CHANNEL_MESH), { materials: -1 })).rejects.toThrow(
        ValidationError
      );
    });

    test("withReader closes the reader after the callback", async () => {
      let captured: MeshReader | undefined;
      const extent = await withReader(fixture(CHANNEL_MESH), { onWarning: () => {} }, (mesh) => {
        captured = mesh;
        return mesh.extent;
      });
      expect(extent).toEqual([0, 10, 0, 5]);
      expect(captured?.closed).toBe(true);
    });
  });

  describe("lookup", () => {
    test("finds nodes and elements by ID", () => {
      const mesh = quietReader(CHANNEL_MESH);
      expect(mesh.node(3)).toEqual({ card: "ND", id: 3, x: 10, y: 5, z: 3 });
      expect(mesh.element(2).nodes).toEqual([1, 3, 4]);
      expect(mesh.element(2).materials).toEqual([{ kind: "integer", value: 2 }]);
    });

    test("reports misses as EntityNotFoundError", () => {
      const mesh = quietReader(CHANNEL_MESH);
      expect(() => mesh.node(5)).toThrow(EntityNotFoundError);
      expect(() => mesh.node(0)).toThrow(EntityNotFoundError);
      expect(() => mesh.element(3)).toThrow(EntityNotFoundError);
      expect(() => mesh.nodeString("missing")).toThrow(EntityNotFoundError);
    });

    test("finds node strings by name, first match wins", () => {
      const mesh = quietReader(
        ["MESH2D", "ND 1 0 0 0", "ND 2 1 0 0", "NS 1 -2 bank", "NS 2 -1 bank"].join("\n")
      );
      expect(mesh.nodeString("bank").nodes).toEqual([1, 2]);
    });

    test("assembles multi-line node strings", () => {
      const mesh = quietReader(CHANNEL_MESH);
      expect(mesh.nodeString("outer").nodes).toEqual([1, 2, 3, 4, 1]);
      expect(mesh.nodeString("inner").nodes).toEqual([1, 2, 3]);
    });
  });

  describe("iteration", () => {
    test("iterates ID ranges", () => {
      const mesh = quietReader(CHANNEL_MESH);
      expect([...mesh.iterNodes(2, 4)].map((node) => node.id)).toEqual([2, 3]);
      expect([...mesh.iterNodes()].map((node) => node.id)).toEqual([1, 2, 3, 4]);
      expect([...mesh.iterNodes(3)].map((node) => node.id)).toEqual([3, 4]);
      expect([...mesh.iterElements(-1, 2)].map((element) => element.id)).toEqual([1]);
    });

    test("iterates node strings by position", () => {
      const mesh = quietReader(CHANNEL_MESH);
      expect([...mesh.iterNodeStrings(1)].map((nodeString) => nodeString.name)).toEqual(["inner"]);
      expect([...mesh.iterNodeStrings(0, 1)].map((nodeString) => nodeString.name)).toEqual(["outer"]);
    });

    test("rejects invalid ranges", () => {
      const mesh = quietReader(CHANNEL_MESH);
      expect(() => mesh.iterNodes(3, 3)).toThrow(IndexRangeError);
      expect(() => mesh.iterNodes(1, 6)).toThrow(IndexRangeError);
      expect(() => mesh.iterNodes(5)).toThrow(IndexRangeError);
      expect(() => mesh.iterNodeStrings(2)).toThrow(IndexRangeError);
    });

    test("iterates nothing on an empty mesh", () => {
      const mesh = quietReader("MESH2D\n");
      expect([...mesh.iterNodes()]).toEqual([]);
      expect([...mesh.iterElements()]).toEqual([]);
    });
  });

  describe("queries", () => {
    test("computes and caches the extent", () => {
      const mesh = quietReader(CHANNEL_MESH);
      const extent = mesh.extent;
      expect(extent).toEqual([0, 10, 0, 5]);
      expect(mesh.extent).toBe(extent);
    });

    test("returns NaN extent for a mesh without nodes", () => {
      const mesh = quietReader("MESH2D\n");
      expect(mesh.extent.every((value) => Number.isNaN(value))).toBe(true);
      expect(mesh.name).toBe("Unnamed mesh");
    });

    test("takes materials from the card before the option", () => {
      expect(MeshReader.fromString(CHANNEL_MESH, { materials: 3, onWarning: () => {} }).materialsPerElement).toBe(1);
      expect(MeshReader.fromString("MESH2D\n", { materials: 2 }).materialsPerElement).toBe(2);
      expect(MeshReader.fromString("MESH2D\n").materialsPerElement).toBe(0);
    });

    test("reads GM as the mesh name", () => {
      expect(MeshReader.fromString('MESH2D\nGM "old style"\n').name).toBe("old style");
    });

    test("keeps the spacing of a quoted mesh name", () => {
      expect(MeshReader.fromString('MESH2D\nMESHNAME "a  b"  # note\n').name).toBe("a  b");
      expect(MeshReader.fromString("MESH2D\nMESHNAME channel  one\n").name).toBe("channel one");
    });

    test("drops float materials when disabled", () => {
      const text = ["MESH2D", "ND 1 0 0 0", "ND 2 1 0 0", "E2L 1 1 2 4 1.5"].join("\n");
      const mesh = MeshReader.fromString(text, { allowFloatMatid: false, onWarning: () => {} });
      expect(mesh.element(1).materials).toEqual([{ kind: "integer", value: 4 }]);
    });

    test("summarizes itself", () => {
      const mesh = quietReader(CHANNEL_MESH);
      expect(mesh.toString()).toBe(
        [
          "2DM Reader",
          "  Name: test channel",
          "  Nodes: 4",
          "  Elements: 2",
          "  Node strings: 2",
          "  Materials per element: 1",
        ].join("\n")
      );
    });
  });

  describe("format errors", () => {
    test("rejects gaps in node IDs with the offending line", () => {
      const text = ["MESH2D", "ND 1 0 0 0", "ND 2 1 0 0", "ND 4 1 1 0"].join("\n");
      expect(() => quietReader(text)).toThrow("Node IDs must be contiguous: expected 3, got 4");
      try {
        quietReader(text);
      } catch (error) {
        expect(lineOf(error)).toBe(4);
      }
    });

    test("rejects gaps in element IDs", () => {
      const text = ["MESH2D", "ND 1 0 0 0", "ND 2 1 0 0", "E2L 2 1 2"].join("\n");
      expect(() => quietReader(text)).toThrow(FormatError);
    });

    test("requires zero index mode for zero-based meshes", () => {
      const text = ["MESH2D", "ND 0 0 0 0", "ND 1 1 0 0", "E2L 0 0 1", "NS 0 -1"].join("\n");
      expect(() => quietReader(text)).toThrow("The mesh uses node ID 0; open it in zero index mode");

      const mesh = quietReader(text, true);
      expect(mesh.node(0).x).toBe(0);
      expect(mesh.element(0).nodes).toEqual([0, 1]);
      expect([...mesh.iterNodes(0, 1)].map((node) => node.id)).toEqual([0]);
    });

    test("rejects a one-based mesh opened in zero index mode", () => {
      expect(() => quietReader("MESH2D\nND 1 0 0 0\n", true)).toThrow(FormatError);
    });

    test("rejects references to undefined nodes", () => {
      const text = ["MESH2D", "ND 1 0 0 0", "ND 2 1 0 0", "E2L 1 1 9"].join("\n");
      expect(() => quietReader(text)).toThrow("Element 1 references node 9, which is not defined in the mesh");
    });

    test("rejects a node string left open at the end of the file", () => {
      const text = ["MESH2D", "ND 1 0 0 0", "ND 2 1 0 0", "NS 1 2"].join("\n");
      expect(() => quietReader(text)).toThrow("Node string is not terminated before the end of the file");
    });

    test("rejects a node string interrupted by another card", () => {
      const text = ["MESH2D", "ND 1 0 0 0", "ND 2 1 0 0", "NS 1 2", "ND 3 2 0 0"].join("\n");
      try {
        quietReader(text);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(FormatError);
        expect(lineOf(error)).toBe(5);
        if (error instanceof FormatError) {
          expect(error.context).toBe("ND 3 2 0 0");
        }
      }
    });

    test("attaches the line to grammar errors", () => {
      const text = ["MESH2D", "ND 1 0 0 0", "ND 2 1 0"].join("\n");
      try {
        quietReader(text);
        expect.unreachable();
      } catch (error) {
        expect(lineOf(error)).toBe(3);
      }
    });
  });

  describe("close", () => {
    test("fails every call after close", async () => {
      const mesh = quietReader(CHANNEL_MESH);
      await mesh.close();
      expect(mesh.closed).toBe(true);
      expect(() => mesh.numNodes).toThrow(FileClosedError);
      expect(() => mesh.node(1)).toThrow(FileClosedError);
      expect(() => mesh.iterElements()).toThrow(FileClosedError);
      expect(mesh.toString()).toBe("2DM Reader (closed)\n  File: <memory>");
    });
  });
});
