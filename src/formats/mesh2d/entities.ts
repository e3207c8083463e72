/**
 * 2DM entity construction, equality and rendering
 *
 * Constructors validate the per-entity invariants (node count per element
 * card, minimum node string length) and return frozen value objects.
 * Whether referenced node IDs exist is a whole-mesh question left to the
 * reader.
 *
 * @module mesh2d/entities
 */

import { CardError, FormatError } from "../../errors";
import type { ElementCard, ElementCardInfo, ElementCategory } from "./constants";
import {
  ELEMENT_CARDS,
  MESH2D_LIMITS,
  NODE_CARD,
  NODE_STRING_CARD,
  isElementCard,
} from "./constants";
import type {
  MaterialIndex,
  MaterialInput,
  MeshElement,
  MeshEntity,
  MeshNode,
  NodeString,
  RecordOptions,
} from "./types";
import { formatFloat, formatMaterial, toMaterialIndex } from "./utils";

/**
 * Look up the registry entry for an element card
 *
 * @throws {CardError} If the card is not an element card
 */
export function elementCardInfo(card: string): ElementCardInfo {
  if (!isElementCard(card)) {
    throw new CardError(`Unsupported element card '${card}'`, card);
  }
  return ELEMENT_CARDS[card];
}

/**
 * Create a node
 *
 * @throws {FormatError} If the ID is not an integer
 */
export function createNode(id: number, x: number, y: number, z: number): MeshNode {
  requireInteger(id, "Node ID");
  const node: MeshNode = { card: NODE_CARD, id, x, y, z };
  return Object.freeze(node);
}

/**
 * Create an element of the given card
 *
 * @param card Element card tag (E2L, E3T, ...)
 * @param id Element ID
 * @param nodes Node IDs; must match the node count of the card
 * @param materials Material values (numbers or typed materials)
 * @throws {CardError} If the card is unknown or the node count does not match
 *
 * @example
 * ```typescript
 * const tri = createElement("E3T", 1, [2, 3, 4], [1]);
 * ```
 */
export function createElement(
  card: ElementCard | string,
  id: number,
  nodes: readonly number[],
  materials: readonly MaterialInput[] = []
): MeshElement {
  if (!isElementCard(card)) {
    throw new CardError(`Unsupported element card '${card}'`, card);
  }
  const { numNodes } = ELEMENT_CARDS[card];
  if (nodes.length !== numNodes) {
    throw new CardError(`${card} elements require ${numNodes} nodes, got ${nodes.length}`, card);
  }
  requireInteger(id, "Element ID");
  for (const node of nodes) {
    requireInteger(node, "Node ID");
  }
  const element: MeshElement = {
    card,
    id,
    nodes: Object.freeze([...nodes]),
    materials: Object.freeze(materials.map(toMaterialIndex)),
  };
  return Object.freeze(element);
}

/**
 * Create a node string
 *
 * @throws {CardError} If fewer than two nodes are given
 */
export function createNodeString(nodes: readonly number[], name: string | null = null): NodeString {
  if (nodes.length < MESH2D_LIMITS.MIN_NODE_STRING_NODES) {
    throw new CardError(
      `Node strings require at least ${MESH2D_LIMITS.MIN_NODE_STRING_NODES} nodes, got ${nodes.length}`,
      NODE_STRING_CARD
    );
  }
  for (const node of nodes) {
    requireInteger(node, "Node ID");
  }
  const nodeString: NodeString = { card: NODE_STRING_CARD, nodes: Object.freeze([...nodes]), name };
  return Object.freeze(nodeString);
}

/**
 * Return a copy of an entity with a new ID
 */
export function withId<T extends MeshNode | MeshElement>(entity: T, id: number): T {
  requireInteger(id, "ID");
  const copy: T = { ...entity, id };
  Object.freeze(copy);
  return copy;
}

/**
 * Shape category of an element
 */
export function elementCategory(element: MeshElement): ElementCategory {
  return ELEMENT_CARDS[element.card].category;
}

/**
 * Number of materials defined for an element
 */
export function numMaterials(element: MeshElement): number {
  return element.materials.length;
}

/**
 * Position of a node as [x, y, z]
 */
export function nodePosition(node: MeshNode): readonly [number, number, number] {
  return [node.x, node.y, node.z];
}

/**
 * Structural equality of two entities
 */
export function entitiesEqual(a: MeshEntity, b: MeshEntity): boolean {
  if (a.card === NODE_CARD && b.card === NODE_CARD) {
    return (
      a.id === b.id && sameFloat(a.x, b.x) && sameFloat(a.y, b.y) && sameFloat(a.z, b.z)
    );
  }
  if (a.card === NODE_STRING_CARD && b.card === NODE_STRING_CARD) {
    return a.name === b.name && sameIntegers(a.nodes, b.nodes);
  }
  if (a.card === NODE_CARD || a.card === NODE_STRING_CARD) return false;
  if (b.card === NODE_CARD || b.card === NODE_STRING_CARD) return false;

  return (
    a.card === b.card &&
    a.id === b.id &&
    sameIntegers(a.nodes, b.nodes) &&
    a.materials.length === b.materials.length &&
    a.materials.every((material, index) => sameMaterial(material, b.materials[index]))
  );
}

/**
 * Render an entity to its ordered 2DM tokens (card tag first)
 *
 * @example
 * ```typescript
 * entityToRecord(createNode(1, 0.5, 0, 0), { decimals: 2 });
 * // ["ND", "1", " 5.00e-01", " 0.00e+00", " 0.00e+00"]
 * ```
 */
export function entityToRecord(entity: MeshEntity, options: RecordOptions = {}): string[] {
  const decimals = options.decimals ?? MESH2D_LIMITS.DEFAULT_DECIMALS;

  switch (entity.card) {
    case NODE_CARD:
      return [
        entity.card,
        entity.id.toString(),
        formatFloat(entity.x, decimals),
        formatFloat(entity.y, decimals),
        formatFloat(entity.z, decimals),
      ];
    case NODE_STRING_CARD:
      return nodeStringTokens(entity, options.includeName ?? true);
    default: {
      const allowFloat = options.allowFloatMatid ?? true;
      const materials = entity.materials
        .filter((material) => allowFloat || material.kind === "integer")
        .map((material) => formatMaterial(material, decimals));
      return [
        entity.card,
        entity.id.toString(),
        ...entity.nodes.map((node) => node.toString()),
        ...materials,
      ];
    }
  }
}

/**
 * Render an entity as one space-separated line (node strings unfolded)
 */
export function entityToString(entity: MeshEntity, options: RecordOptions = {}): string {
  return entityToRecord(entity, options).join(" ");
}

/**
 * Short human-readable label for an entity
 */
export function describeEntity(entity: MeshEntity): string {
  switch (entity.card) {
    case NODE_CARD:
      return `<Node #${entity.id}: (${entity.x}, ${entity.y}, ${entity.z})>`;
    case NODE_STRING_CARD:
      return entity.name === null
        ? `<Unnamed NodeString: (${entity.nodes.join(", ")})>`
        : `<NodeString "${entity.name}": (${entity.nodes.join(", ")})>`;
    default:
      return `<Element #${entity.id} [${entity.card}]: Node IDs (${entity.nodes.join(", ")})>`;
  }
}

/**
 * Quote a node string name if it contains whitespace
 */
export function quoteName(name: string): string {
  return /\s/.test(name) ? `"${name}"` : name;
}

function nodeStringTokens(nodeString: NodeString, includeName: boolean): string[] {
  const tokens = nodeString.nodes.map((node) => node.toString());
  const last = nodeString.nodes[nodeString.nodes.length - 1];
  if (last !== undefined) {
    // "-0" terminates a string that ends on node 0
    tokens[tokens.length - 1] = `-${Math.abs(last)}`;
  }
  if (includeName && nodeString.name !== null) {
    tokens.push(quoteName(nodeString.name));
  }
  return [NODE_STRING_CARD, ...tokens];
}

function requireInteger(value: number, what: string): void {
  if (!Number.isInteger(value)) {
    throw new FormatError(`${what} must be an integer, got ${value}`);
  }
}

function sameFloat(a: number, b: number): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

function sameIntegers(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((value, index) => value === b[index]);
}

function sameMaterial(a: MaterialIndex, b: MaterialIndex | undefined): boolean {
  return b !== undefined && a.kind === b.kind && sameFloat(a.value, b.value);
}
