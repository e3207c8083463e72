/**
 * 2DM Mesh Format Module
 *
 * Reading and writing of 2DM finite-element meshes: nodes (ND), linear,
 * triangular and quadrilateral elements (E2L, E3L, E3T, E6T, E4Q, E8Q, E9Q)
 * and node strings (NS) that may span several lines.
 *
 * @module mesh2d
 *
 * @example Reading a mesh
 * ```typescript
 * import { withReader } from "mesh2dm";
 *
 * const [minX, maxX] = await withReader("channel.2dm", {}, (mesh) => mesh.extent);
 * ```
 *
 * @example Writing a mesh
 * ```typescript
 * import { withWriter } from "mesh2dm";
 *
 * await withWriter("out.2dm", { materials: 1 }, (mesh) => {
 *   mesh.node(-1, 0, 0, 0);
 *   mesh.node(-1, 1, 0, 0);
 *   mesh.node(-1, 0, 1, 0);
 *   mesh.element("E3T", -1, [1, 2, 3], [1]);
 * });
 * ```
 */

export {
  DEFAULT_MESH_NAME,
  ELEMENT_CARDS,
  type ElementCard,
  type ElementCardInfo,
  type ElementCategory,
  isElementCard,
  MESH2D_LIMITS,
} from "./constants";
export {
  createElement,
  createNode,
  createNodeString,
  describeEntity,
  elementCardInfo,
  elementCategory,
  entitiesEqual,
  entityToRecord,
  entityToString,
  nodePosition,
  numMaterials,
  withId,
} from "./entities";
export { resolveReaderOptions, resolveWriterOptions } from "./options";
export { parseElement, parseNode, referenceGrammar } from "./parser";
export { MeshReader, scanMetadata, withReader } from "./reader";
export { parseNodeString } from "./state-machine";
export {
  type CardGrammar,
  type CardParseOptions,
  type Element2L,
  type Element3L,
  type Element3T,
  type Element4Q,
  type Element6T,
  type Element8Q,
  type Element9Q,
  type ElementRecord,
  type MaterialIndex,
  type MaterialInput,
  type MeshElement,
  type MeshEntity,
  type MeshExtent,
  type MeshMetadata,
  type MeshNode,
  type MeshReaderOptions,
  type MeshWriterOptions,
  type NodeString,
  type NodeStringBuilder,
  NodeStringState,
  type NodeStringStep,
  type RecordOptions,
  type ResolvedReaderConfig,
  type ResolvedWriterConfig,
} from "./types";
export {
  cleanLine,
  floatMaterial,
  formatFloat,
  formatMaterial,
  integerMaterial,
  parseMaterial,
  tokenize,
} from "./utils";
export { type EntityKind, formatNodeStringLines, MeshWriter, withWriter } from "./writer";
