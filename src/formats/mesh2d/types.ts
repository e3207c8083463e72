/**
 * Core 2DM entity type definitions
 *
 * Nodes, elements and node strings are immutable value objects. Identity
 * is structural: two entities are equal when their fields are equal (see
 * `entitiesEqual`).
 *
 * @module mesh2d/types
 */

import type { ParserOptions, WarningHandler } from "../../types";
import type { ElementCard } from "./constants";

/**
 * Material value attached to an element
 *
 * 2DM stores material IDs as integers, but some tools (BASEMENT 3.x) put
 * floating point values such as centroid elevation in the same columns.
 * The kind is kept so that `1` and `1.0` survive a round trip.
 *
 * @public
 */
export type MaterialIndex =
  | { readonly kind: "integer"; readonly value: number }
  | { readonly kind: "float"; readonly value: number };

/**
 * Material value as accepted by factories
 *
 * Plain numbers become integer materials when `Number.isInteger` holds and
 * float materials otherwise. Pass `floatMaterial(1)` to force a float.
 *
 * @public
 */
export type MaterialInput = number | MaterialIndex;

/**
 * A unique, numbered point in space (ND)
 *
 * @public
 */
export interface MeshNode {
  readonly card: "ND";
  /** Node ID, 1-based unless the mesh is zero-indexed */
  readonly id: number;
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/**
 * Element record shared by all element cards
 *
 * @public
 */
export interface ElementRecord<C extends ElementCard> {
  readonly card: C;
  readonly id: number;
  /** Defining node IDs; order sets winding/connectivity */
  readonly nodes: readonly number[];
  readonly materials: readonly MaterialIndex[];
}

/** Two-noded linear element */
export type Element2L = ElementRecord<"E2L">;
/** Three-noded linear element */
export type Element3L = ElementRecord<"E3L">;
/** Three-noded triangular element */
export type Element3T = ElementRecord<"E3T">;
/** Six-noded triangular element */
export type Element6T = ElementRecord<"E6T">;
/** Four-noded quadrilateral element */
export type Element4Q = ElementRecord<"E4Q">;
/** Eight-noded quadrilateral element */
export type Element8Q = ElementRecord<"E8Q">;
/** Nine-noded quadrilateral element */
export type Element9Q = ElementRecord<"E9Q">;

/**
 * Any mesh element, discriminated by `card`
 *
 * @public
 */
export type MeshElement =
  | Element2L
  | Element3L
  | Element3T
  | Element6T
  | Element4Q
  | Element8Q
  | Element9Q;

/**
 * An open polyline through existing nodes (NS)
 *
 * Node strings have no ID; they are identified by position or by name.
 *
 * @public
 */
export interface NodeString {
  readonly card: "NS";
  readonly nodes: readonly number[];
  readonly name: string | null;
}

/**
 * Any entity that can appear in a 2DM file
 *
 * @public
 */
export type MeshEntity = MeshNode | MeshElement | NodeString;

/**
 * Assembly state of a node string spread over several NS lines
 *
 * @public
 */
export enum NodeStringState {
  EMPTY, // No in-progress node string
  OPEN, // One or more lines consumed, terminator not yet seen
  CLOSED, // Terminator seen, node string complete
}

/**
 * In-progress node string owned by the caller between assembler calls
 *
 * @public
 */
export interface NodeStringBuilder {
  readonly state: NodeStringState.OPEN;
  readonly nodes: readonly number[];
  /** Line the node string started on, when known */
  readonly startLine?: number;
}

/**
 * Result of feeding one NS line to the assembler
 *
 * @public
 */
export type NodeStringStep =
  | { readonly state: NodeStringState.OPEN; readonly done: false; readonly builder: NodeStringBuilder }
  | { readonly state: NodeStringState.CLOSED; readonly done: true; readonly nodeString: NodeString };

/**
 * Options for the card grammar
 *
 * @public
 */
export interface CardParseOptions extends ParserOptions {
  /** Line number used for warnings */
  lineNumber?: number;
}

/**
 * Options for rendering entities to tokens
 *
 * @public
 */
export interface RecordOptions {
  /** Decimal places for scientific float output */
  decimals?: number;
  /** Drop float materials instead of rendering them */
  allowFloatMatid?: boolean;
  /** Append the node string name after the terminator */
  includeName?: boolean;
}

/**
 * Stateless card grammar
 *
 * One physical line (several for node strings) in, one entity out. The
 * reader only talks to this interface; {@link referenceGrammar} is the
 * implementation wired in at build time.
 *
 * @public
 */
export interface CardGrammar {
  parseNode(line: string, options?: CardParseOptions): MeshNode;
  parseElement(line: string, card?: ElementCard, options?: CardParseOptions): MeshElement;
  parseNodeString(
    line: string,
    builder?: NodeStringBuilder,
    options?: CardParseOptions
  ): NodeStringStep;
}

/**
 * Mesh reader configuration
 *
 * @public
 */
export interface MeshReaderOptions extends ParserOptions {
  /** Materials per element when the file has no NUM_MATERIALS_PER_ELEM card */
  materials?: number;
}

/**
 * Mesh writer configuration
 *
 * @public
 */
export interface MeshWriterOptions {
  /** Materials per element; inferred from the first element when unset */
  materials?: number;
  /** Auto-assigned IDs start at 0 instead of 1 */
  zeroIndex?: boolean;
  /** Accept float materials (false rejects them) */
  allowFloatMatid?: boolean;
  /** Decimal places for coordinates and float materials */
  decimals?: number;
  /** Right-align columns to the widest value in each flush */
  align?: boolean;
  /** Display name written as a MESHNAME card */
  name?: string;
  onWarning?: WarningHandler;
}

/**
 * Validated reader configuration
 *
 * @public
 */
export interface ResolvedReaderConfig {
  readonly zeroIndex: boolean;
  readonly materials: number | null;
  readonly allowFloatMatid: boolean;
  readonly onWarning: WarningHandler;
}

/**
 * Validated writer configuration
 *
 * @public
 */
export interface ResolvedWriterConfig {
  readonly materials: number | null;
  readonly zeroIndex: boolean;
  readonly allowFloatMatid: boolean;
  readonly decimals: number;
  readonly align: boolean;
  readonly name: string | null;
  readonly onWarning: WarningHandler;
}

/**
 * Results of the metadata scan
 *
 * Offsets are byte offsets of the first record of each block in the file,
 * or null when the block is absent.
 *
 * @public
 */
export interface MeshMetadata {
  readonly numNodes: number;
  readonly numElements: number;
  readonly numNodeStrings: number;
  readonly name: string | null;
  readonly materialsPerElement: number | null;
  readonly nodesOffset: number | null;
  readonly elementsOffset: number | null;
  readonly nodeStringsOffset: number | null;
}

/**
 * Axis-aligned bounding box as [minX, maxX, minY, maxY]
 *
 * @public
 */
export type MeshExtent = readonly [minX: number, maxX: number, minY: number, maxY: number];
