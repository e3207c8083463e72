/**
 * 2DM card tags and format limits
 */

/**
 * Shape category of an element card
 */
export type ElementCategory = "linear" | "triangular" | "quadrilateral";

/**
 * Element card registry: tag → node count and shape category
 *
 * Used by the grammar to validate element records and by the element
 * factory to look an element type up by its card.
 */
export const ELEMENT_CARDS = {
  E2L: { numNodes: 2, category: "linear" },
  E3L: { numNodes: 3, category: "linear" },
  E3T: { numNodes: 3, category: "triangular" },
  E6T: { numNodes: 6, category: "triangular" },
  E4Q: { numNodes: 4, category: "quadrilateral" },
  E8Q: { numNodes: 8, category: "quadrilateral" },
  E9Q: { numNodes: 9, category: "quadrilateral" },
} as const satisfies Record<string, { numNodes: number; category: ElementCategory }>;

/**
 * Element card tag
 */
export type ElementCard = keyof typeof ELEMENT_CARDS;

/**
 * Registry entry for one element card
 */
export type ElementCardInfo = (typeof ELEMENT_CARDS)[ElementCard];

/** Node card tag */
export const NODE_CARD = "ND";
/** Node string card tag */
export const NODE_STRING_CARD = "NS";
/** File signature, first card of every 2DM file */
export const MESH2D_CARD = "MESH2D";
/** Header card carrying the number of materials per element */
export const MATERIALS_CARD = "NUM_MATERIALS_PER_ELEM";
/** Display name cards (MESHNAME is the SMS spelling, GM the older one) */
export const NAME_CARDS = ["MESHNAME", "GM"] as const;

/** Inline comment marker */
export const COMMENT_CHAR = "#";

/**
 * Writer conventions
 */
export const MESH2D_LIMITS = {
  /** Node tokens per physical NS line on write; readers accept any count */
  NODE_STRING_TOKENS_PER_LINE: 10,
  /** Decimal places for scientific float output */
  DEFAULT_DECIMALS: 8,
  /** Largest decimal count whose output still round-trips through Number() */
  MAX_DECIMALS: 17,
  /** Minimum nodes in a node string */
  MIN_NODE_STRING_NODES: 2,
} as const;

/** Display name used when the file has no MESHNAME/GM card */
export const DEFAULT_MESH_NAME = "Unnamed mesh";

/**
 * Check whether a token is a known element card
 */
export function isElementCard(token: string): token is ElementCard {
  return Object.prototype.hasOwnProperty.call(ELEMENT_CARDS, token);
}
