/**
 * Tests for multi-line node string assembly
 */

import { describe, expect, test } from "vitest";
import { CardError, FormatError } from "../../src/errors";
import { parseNodeString } from "../../src/formats/mesh2d/state-machine";
import type { NodeString, NodeStringBuilder } from "../../src/formats/mesh2d/types";
import { NodeStringState } from "../../src/formats/mesh2d/types";

function assemble(lines: string[], zeroIndex = false): NodeString {
  let builder: NodeStringBuilder | undefined;
  for (const line of lines) {
    const step = parseNodeString(line, builder, { zeroIndex });
    if (step.done) {
      return step.nodeString;
    }
    builder = step.builder;
  }
  throw new Error("node string was not terminated");
}

describe("parseNodeString", () => {
  test("closes on a single terminated line", () => {
    const step = parseNodeString("NS 1 2 3 -4");
    expect(step.done).toBe(true);
    expect(step.state).toBe(NodeStringState.CLOSED);
    if (step.done) {
      expect(step.nodeString).toEqual({ card: "NS", nodes: [1, 2, 3, 4], name: null });
    }
  });

  test("continues across lines and picks up the name", () => {
    const first = parseNodeString("NS 1 2 3 4 5");
    expect(first.done).toBe(false);
    expect(first.state).toBe(NodeStringState.OPEN);
    if (first.done) return;
    expect(first.builder.nodes).toEqual([1, 2, 3, 4, 5]);

    const second = parseNodeString("NS 6 -7 mylabel", first.builder);
    expect(second.done).toBe(true);
    if (second.done) {
      expect(second.nodeString.nodes).toEqual([1, 2, 3, 4, 5, 6, 7]);
      expect(second.nodeString.name).toBe("mylabel");
    }
  });

  test("never mutates the builder it was given", () => {
    const first = parseNodeString("NS 1 2");
    if (first.done) throw new Error("expected an open node string");
    parseNodeString("NS 3 -4", first.builder);
    expect(first.builder.nodes).toEqual([1, 2]);
  });

  test("keeps the starting line of an open string", () => {
    const first = parseNodeString("NS 1 2", undefined, { lineNumber: 3 });
    if (first.done) throw new Error("expected an open node string");
    const second = parseNodeString("NS 3 4", first.builder, { lineNumber: 4 });
    if (second.done) throw new Error("expected an open node string");
    expect(second.builder.startLine).toBe(3);
  });

  test("gives the same result for split and joined lines", () => {
    const split = assemble(["NS 1 2", "NS 3", "NS -4 outlet"]);
    const joined = assemble(["NS 1 2 3 -4 outlet"]);
    expect(split).toEqual(joined);
  });

  test("strips quotes from quoted names without warning", () => {
    const warnings: string[] = [];
    const step = parseNodeString('NS 1 -2 "left bank"', undefined, {
      onWarning: (warning) => {
        warnings.push(warning);
      },
    });
    expect(step.done && step.nodeString.name).toBe("left bank");
    expect(warnings).toEqual([]);
  });

  test("rejoins unquoted multi-word names with a warning", () => {
    const warnings: Array<[string, number | undefined]> = [];
    const step = parseNodeString("NS 1 -2 left bank", undefined, {
      lineNumber: 9,
      onWarning: (warning, lineNumber) => {
        warnings.push([warning, lineNumber]);
      },
    });
    expect(step.done && step.nodeString.name).toBe("left bank");
    expect(warnings).toEqual([
      ["Node string name 'left bank' contains spaces; names with spaces should be quoted", 9],
    ]);
  });

  test("accepts -0 as terminator in zero index mode", () => {
    expect(assemble(["NS 0 1 -0"], true).nodes).toEqual([0, 1, 0]);
    expect(() => parseNodeString("NS 0 1 -0")).toThrow(FormatError);
  });

  test("rejects strings with fewer than two nodes", () => {
    expect(() => parseNodeString("NS -1")).toThrow(CardError);
  });

  test("rejects other cards and non-integer tokens", () => {
    expect(() => parseNodeString("ND 1 0 0 0")).toThrow(CardError);
    expect(() => parseNodeString("NS 1 2.5 -3")).toThrow("Invalid node string node '2.5'");
  });
});
