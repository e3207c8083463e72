/**
 * Card grammar: one ND or element line in, one entity out
 *
 * Every function here is stateless and works on a single physical line.
 * Line numbers are only known to the caller, which passes them through
 * `options.lineNumber` for warnings and error reports.
 */

import { CardError, FormatError } from "../../errors";
import { reportWarning } from "../../types";
import type { ElementCard } from "./constants";
import { ELEMENT_CARDS, NODE_CARD, isElementCard } from "./constants";
import { createElement, createNode } from "./entities";
import { parseNodeString } from "./state-machine";
import type { CardGrammar, CardParseOptions, MaterialIndex, MeshElement, MeshNode } from "./types";
import { parseFloatToken, parseIntegerToken, parseMaterial, tokenize } from "./utils";

/** Fields after the ND tag: id, x, y, z */
const NODE_FIELDS = 4;

/**
 * Parse an ND line
 *
 * @throws {CardError} If the line is not an ND card
 * @throws {FormatError} If fields are missing, not numeric, or the ID is out of range
 *
 * @example
 * ```typescript
 * parseNode("ND 1 1.0 2.0 3.0"); // { card: "ND", id: 1, x: 1, y: 2, z: 3 }
 * ```
 */
export function parseNode(line: string, options: CardParseOptions = {}): MeshNode {
  const tokens = tokenize(line);
  const tag = tokens[0] ?? "";
  if (tag !== NODE_CARD) {
    throw new CardError(`Expected ${NODE_CARD} card, got '${tag}'`, tag, options.lineNumber, line);
  }

  const fields = tokens.slice(1);
  if (fields.length < NODE_FIELDS) {
    throw new FormatError(
      `Node requires ${NODE_FIELDS} fields (id x y z), got ${fields.length}`,
      options.lineNumber,
      line
    );
  }
  if (fields.length > NODE_FIELDS) {
    warn(options, `Ignoring ${fields.length - NODE_FIELDS} unexpected node fields`);
  }

  const [idToken = "", xToken = "", yToken = "", zToken = ""] = fields;
  const id = parseId(idToken, "node", line, options);
  return createNode(
    id,
    parseCoordinate(xToken, line, options),
    parseCoordinate(yToken, line, options),
    parseCoordinate(zToken, line, options)
  );
}

/**
 * Parse an element line
 *
 * @param line - Raw element line
 * @param card - Expected card; any element card is accepted when omitted
 * @param options - Indexing mode, float material policy and warning handler
 * @throws {CardError} If the tag is wrong or unknown, or node fields are missing
 * @throws {FormatError} If the ID, a node ID or a material is invalid
 */
export function parseElement(
  line: string,
  card?: ElementCard,
  options: CardParseOptions = {}
): MeshElement {
  const tokens = tokenize(line);
  const tag = tokens[0] ?? "";
  if (card !== undefined && tag !== card) {
    throw new CardError(`Expected ${card} card, got '${tag}'`, tag, options.lineNumber, line);
  }
  if (!isElementCard(tag)) {
    throw new CardError(`Unsupported element card '${tag}'`, tag, options.lineNumber, line);
  }

  const { numNodes } = ELEMENT_CARDS[tag];
  const fields = tokens.slice(1);
  if (fields.length < numNodes + 1) {
    throw new CardError(
      `${tag} requires an ID and ${numNodes} nodes, got ${fields.length} fields`,
      tag,
      options.lineNumber,
      line
    );
  }

  const id = parseId(fields[0] ?? "", "element", line, options);
  const nodes = fields.slice(1, numNodes + 1).map((token) => parseId(token, "node", line, options));

  const allowFloat = options.allowFloatMatid ?? true;
  const materials: MaterialIndex[] = [];
  for (const token of fields.slice(numNodes + 1)) {
    const material = parseMaterial(token);
    if (material === null) {
      throw new FormatError(`Invalid material value '${token}'`, options.lineNumber, line);
    }
    if (material.kind === "float" && !allowFloat) {
      warn(options, `Dropping float material ${token}; float materials are disabled`);
      continue;
    }
    materials.push(material);
  }

  return createElement(tag, id, nodes, materials);
}

/**
 * Reference card grammar
 */
export const referenceGrammar: CardGrammar = {
  parseNode,
  parseElement,
  parseNodeString,
};

/**
 * Parse and range-check an entity ID
 */
function parseId(
  token: string,
  kind: "node" | "element",
  line: string,
  options: CardParseOptions
): number {
  const id = parseIntegerToken(token);
  if (id === null) {
    throw new FormatError(`Invalid ${kind} ID '${token}'`, options.lineNumber, line);
  }
  const minimumId = options.zeroIndex === true ? 0 : 1;
  if (id < minimumId) {
    throw new FormatError(
      `Invalid ${kind} ID ${id}; IDs start at ${minimumId}` +
        (options.zeroIndex === true ? "" : " unless zero index mode is enabled"),
      options.lineNumber,
      line
    );
  }
  return id;
}

function parseCoordinate(token: string, line: string, options: CardParseOptions): number {
  const value = parseFloatToken(token);
  if (value === null) {
    throw new FormatError(`Invalid coordinate '${token}'`, options.lineNumber, line);
  }
  return value;
}

function warn(options: CardParseOptions, message: string): void {
  const handler = options.onWarning ?? reportWarning;
  handler(message, options.lineNumber);
}
