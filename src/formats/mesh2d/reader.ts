/**
 * 2DM mesh reader
 *
 * Opening a file runs two passes over its text:
 *
 * 1. A metadata scan that checks the MESH2D marker, counts each entity
 *    kind, checks that node and element IDs are contiguous from the
 *    indexing base, picks up the header cards and records where each
 *    block starts.
 * 2. A bulk parse from the first recorded block that builds the node,
 *    element and node string collections through the card grammar.
 *
 * A fatal error in either pass fails `open()`; no partial mesh is returned.
 *
 * @example
 * ```typescript
 * const mesh = await MeshReader.open("channel.2dm");
 * console.log(mesh.numNodes, mesh.extent);
 * for (const element of mesh.elements) {
 *   console.log(element.card, element.nodes);
 * }
 * await mesh.close();
 * ```
 */

import {
  EntityNotFoundError,
  FileClosedError,
  FormatError,
  IndexRangeError,
  ReadError,
} from "../../errors";
import { readToString } from "../../io/file-reader";
import {
  DEFAULT_MESH_NAME,
  MATERIALS_CARD,
  MESH2D_CARD,
  NAME_CARDS,
  NODE_CARD,
  NODE_STRING_CARD,
  isElementCard,
} from "./constants";
import { resolveReaderOptions } from "./options";
import { referenceGrammar } from "./parser";
import type {
  CardParseOptions,
  MeshElement,
  MeshExtent,
  MeshMetadata,
  MeshNode,
  MeshReaderOptions,
  NodeString,
  NodeStringBuilder,
  ResolvedReaderConfig,
} from "./types";
import { cleanLine, parseIntegerToken, tokenize } from "./utils";

/**
 * Metadata scan result plus the line index where the bulk parse starts
 */
interface ScanResult {
  readonly metadata: MeshMetadata;
  /** Zero-based index of the first entity line, or null for a mesh with no entities */
  readonly firstEntityLine: number | null;
}

/**
 * Parsed entity collections
 */
interface MeshCollections {
  readonly nodes: readonly MeshNode[];
  readonly elements: readonly MeshElement[];
  readonly nodeStrings: readonly NodeString[];
}

/**
 * Scan 2DM text for counts, header fields and block offsets
 *
 * @param text - Whole file content
 * @param config - Resolved reader configuration
 * @param path - File path used in error reports
 * @throws {ReadError} If the MESH2D marker is missing or the file is empty
 * @throws {FormatError} If node or element IDs are not contiguous from the indexing base
 */
export function scanMetadata(
  text: string,
  config: ResolvedReaderConfig,
  path = "<memory>"
): MeshMetadata {
  return scan(text, config, path).metadata;
}

function scan(text: string, config: ResolvedReaderConfig, path: string): ScanResult {
  const base = config.zeroIndex ? 0 : 1;
  const lines = splitLines(text);

  let seenMarker = false;
  let numNodes = 0;
  let numElements = 0;
  let numNodeStrings = 0;
  let name: string | null = null;
  let materialsPerElement: number | null = null;
  let nodesOffset: number | null = null;
  let elementsOffset: number | null = null;
  let nodeStringsOffset: number | null = null;
  let firstEntityLine: number | null = null;
  let byteOffset = 0;

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index] ?? "";
    const lineNumber = index + 1;
    const lineOffset = byteOffset;
    byteOffset += Buffer.byteLength(line, "utf8") + 1;

    const tokens = tokenize(line);
    const card = tokens[0];
    if (card === undefined) continue;

    if (!seenMarker) {
      if (card !== MESH2D_CARD) {
        throw new ReadError(`File does not start with the ${MESH2D_CARD} marker`, path, lineNumber, line);
      }
      seenMarker = true;
      continue;
    }

    if (card === NODE_CARD) {
      checkContiguousId(tokens[1], base + numNodes, "node", lineNumber, line);
      nodesOffset ??= lineOffset;
      firstEntityLine ??= index;
      numNodes++;
    } else if (isElementCard(card)) {
      checkContiguousId(tokens[1], base + numElements, "element", lineNumber, line);
      elementsOffset ??= lineOffset;
      firstEntityLine ??= index;
      numElements++;
    } else if (card === NODE_STRING_CARD) {
      nodeStringsOffset ??= lineOffset;
      firstEntityLine ??= index;
      if (tokens.slice(1).some((token) => token.startsWith("-"))) {
        numNodeStrings++;
      }
    } else if (card === MATERIALS_CARD) {
      const count = parseIntegerToken(tokens[1] ?? "");
      if (count === null || count < 0) {
        throw new FormatError(
          `Invalid ${MATERIALS_CARD} value '${tokens[1] ?? ""}'`,
          lineNumber,
          line
        );
      }
      materialsPerElement = count;
    } else if (isNameCard(card)) {
      name = readMeshName(line, tokens);
    } else if (card !== MESH2D_CARD) {
      config.onWarning(`Unsupported card '${card}' ignored; it will be lost on re-save`, lineNumber);
    }
  }

  if (!seenMarker) {
    throw new ReadError(`Empty file or missing ${MESH2D_CARD} marker`, path);
  }

  return {
    metadata: {
      numNodes,
      numElements,
      numNodeStrings,
      name,
      materialsPerElement,
      nodesOffset,
      elementsOffset,
      nodeStringsOffset,
    },
    firstEntityLine,
  };
}

/**
 * Build entity collections from the first entity line onwards
 */
function assemble(
  lines: readonly string[],
  firstEntityLine: number,
  metadata: MeshMetadata,
  config: ResolvedReaderConfig
): MeshCollections {
  const base = config.zeroIndex ? 0 : 1;
  const lastNodeId = base + metadata.numNodes - 1;
  const nodes: MeshNode[] = [];
  const elements: MeshElement[] = [];
  const nodeStrings: NodeString[] = [];
  let builder: NodeStringBuilder | undefined;

  const checkReferences = (ids: readonly number[], owner: string): void => {
    for (const id of ids) {
      if (id < base || id > lastNodeId) {
        throw new FormatError(`${owner} references node ${id}, which is not defined in the mesh`);
      }
    }
  };

  for (let index = firstEntityLine; index < lines.length; index++) {
    const line = lines[index] ?? "";
    const lineNumber = index + 1;
    const card = tokenize(line)[0];
    if (card === undefined) continue;

    const options: CardParseOptions = {
      zeroIndex: config.zeroIndex,
      allowFloatMatid: config.allowFloatMatid,
      onWarning: config.onWarning,
      lineNumber,
    };

    try {
      if (builder !== undefined && card !== NODE_STRING_CARD) {
        throw new FormatError(
          `Node string starting on line ${builder.startLine ?? "?"} is interrupted by a ${card} card`
        );
      }

      if (card === NODE_CARD) {
        nodes.push(referenceGrammar.parseNode(line, options));
      } else if (isElementCard(card)) {
        const element = referenceGrammar.parseElement(line, card, options);
        checkReferences(element.nodes, `Element ${element.id}`);
        elements.push(element);
      } else if (card === NODE_STRING_CARD) {
        const step = referenceGrammar.parseNodeString(line, builder, options);
        if (step.done) {
          checkReferences(step.nodeString.nodes, `Node string ${nodeStrings.length}`);
          nodeStrings.push(step.nodeString);
          builder = undefined;
        } else {
          builder = step.builder;
        }
      }
    } catch (error) {
      if (error instanceof FormatError) {
        throw FormatError.withLine(error, lineNumber, line);
      }
      throw error;
    }
  }

  if (builder !== undefined) {
    throw new FormatError("Node string is not terminated before the end of the file", builder.startLine);
  }

  return { nodes, elements, nodeStrings };
}

/**
 * In-memory view of a 2DM mesh file
 *
 * Construct through {@link MeshReader.open} or {@link withReader}. Lookups,
 * iteration and extent are synchronous once the file is loaded.
 */
export class MeshReader {
  private readonly nodeCache: readonly MeshNode[];
  private readonly elementCache: readonly MeshElement[];
  private readonly nodeStringCache: readonly NodeString[];
  private extentCache: MeshExtent | undefined;
  private isClosed = false;

  private constructor(
    readonly path: string,
    readonly config: ResolvedReaderConfig,
    private readonly meta: MeshMetadata,
    collections: MeshCollections
  ) {
    this.nodeCache = collections.nodes;
    this.elementCache = collections.elements;
    this.nodeStringCache = collections.nodeStrings;
  }

  /**
   * Open and load a 2DM file
   *
   * @param path - Path to the mesh file
   * @param options - Indexing mode, default material count, float material policy
   * @throws {ValidationError} If options are invalid
   * @throws {FileError} If the file cannot be read
   * @throws {ReadError} If the file is empty or not a 2DM file
   * @throws {FormatError} If any record is malformed
   */
  static async open(path: string, options: MeshReaderOptions = {}): Promise<MeshReader> {
    const config = resolveReaderOptions(options);
    const text = await readToString(path);
    return MeshReader.load(text, config, path);
  }

  /**
   * Load a mesh from text already in memory
   *
   * @throws {ReadError} If the text is empty or not 2DM
   * @throws {FormatError} If any record is malformed
   */
  static fromString(text: string, options: MeshReaderOptions = {}, path = "<memory>"): MeshReader {
    return MeshReader.load(text, resolveReaderOptions(options), path);
  }

  private static load(text: string, config: ResolvedReaderConfig, path: string): MeshReader {
    const { metadata, firstEntityLine } = scan(text, config, path);
    const collections =
      firstEntityLine === null
        ? { nodes: [], elements: [], nodeStrings: [] }
        : assemble(splitLines(text), firstEntityLine, metadata, config);
    return new MeshReader(path, config, metadata, collections);
  }

  /** Display name of the mesh */
  get name(): string {
    this.ensureOpen();
    return this.meta.name ?? DEFAULT_MESH_NAME;
  }

  /** Results of the metadata scan */
  get metadata(): MeshMetadata {
    this.ensureOpen();
    return this.meta;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get numNodes(): number {
    this.ensureOpen();
    return this.nodeCache.length;
  }

  get numElements(): number {
    this.ensureOpen();
    return this.elementCache.length;
  }

  get numNodeStrings(): number {
    this.ensureOpen();
    return this.nodeStringCache.length;
  }

  /**
   * Materials per element
   *
   * The NUM_MATERIALS_PER_ELEM card wins over the `materials` option; with
   * neither present the count is 0.
   */
  get materialsPerElement(): number {
    this.ensureOpen();
    return this.meta.materialsPerElement ?? this.config.materials ?? 0;
  }

  get nodes(): readonly MeshNode[] {
    this.ensureOpen();
    return this.nodeCache;
  }

  get elements(): readonly MeshElement[] {
    this.ensureOpen();
    return this.elementCache;
  }

  get nodeStrings(): readonly NodeString[] {
    this.ensureOpen();
    return this.nodeStringCache;
  }

  /**
   * Bounding box of all nodes as [minX, maxX, minY, maxY]
   *
   * Computed on first access and cached; four NaNs for a mesh without nodes.
   */
  get extent(): MeshExtent {
    this.ensureOpen();
    if (this.extentCache === undefined) {
      this.extentCache = computeExtent(this.nodeCache);
    }
    return this.extentCache;
  }

  /**
   * Look up a node by ID
   *
   * @throws {EntityNotFoundError} If no node has this ID
   */
  node(id: number): MeshNode {
    this.ensureOpen();
    const node = this.nodeCache[id - this.base];
    if (!Number.isInteger(id) || node === undefined) {
      throw new EntityNotFoundError(`Node ${id} not found`, "node", id);
    }
    return node;
  }

  /**
   * Look up an element by ID
   *
   * @throws {EntityNotFoundError} If no element has this ID
   */
  element(id: number): MeshElement {
    this.ensureOpen();
    const element = this.elementCache[id - this.base];
    if (!Number.isInteger(id) || element === undefined) {
      throw new EntityNotFoundError(`Element ${id} not found`, "element", id);
    }
    return element;
  }

  /**
   * Look up a node string by name
   *
   * Names are not required to be unique; the first match wins.
   *
   * @throws {EntityNotFoundError} If no node string has this name
   */
  nodeString(name: string): NodeString {
    this.ensureOpen();
    const match = this.nodeStringCache.find((nodeString) => nodeString.name === name);
    if (match === undefined) {
      throw new EntityNotFoundError(`Node string '${name}' not found`, "node string", name);
    }
    return match;
  }

  /**
   * Iterate nodes with IDs in [start, end)
   *
   * A negative bound is unbounded on that side.
   *
   * @throws {IndexRangeError} If a bound lies outside the mesh or end <= start
   */
  iterNodes(start = -1, end = -1): IterableIterator<MeshNode> {
    this.ensureOpen();
    return rangeView(this.nodeCache, start, end, this.base, "node");
  }

  /**
   * Iterate elements with IDs in [start, end)
   *
   * @throws {IndexRangeError} If a bound lies outside the mesh or end <= start
   */
  iterElements(start = -1, end = -1): IterableIterator<MeshElement> {
    this.ensureOpen();
    return rangeView(this.elementCache, start, end, this.base, "element");
  }

  /**
   * Iterate node strings by zero-based position in [start, end)
   *
   * @throws {IndexRangeError} If a bound lies outside the mesh or end <= start
   */
  iterNodeStrings(start = -1, end = -1): IterableIterator<NodeString> {
    this.ensureOpen();
    return rangeView(this.nodeStringCache, start, end, 0, "node string");
  }

  /**
   * Release the reader; every later call fails with {@link FileClosedError}
   */
  async close(): Promise<void> {
    this.isClosed = true;
  }

  toString(): string {
    if (this.isClosed) {
      return `2DM Reader (closed)\n  File: ${this.path}`;
    }
    return [
      "2DM Reader",
      `  Name: ${this.name}`,
      `  Nodes: ${this.numNodes}`,
      `  Elements: ${this.numElements}`,
      `  Node strings: ${this.numNodeStrings}`,
      `  Materials per element: ${this.materialsPerElement}`,
    ].join("\n");
  }

  private get base(): number {
    return this.config.zeroIndex ? 0 : 1;
  }

  private ensureOpen(): void {
    if (this.isClosed) {
      throw new FileClosedError(this.path);
    }
  }
}

/**
 * Open a mesh, run a callback on it and close it afterwards
 *
 * @example
 * ```typescript
 * const extent = await withReader("channel.2dm", {}, async (mesh) => mesh.extent);
 * ```
 */
export async function withReader<T>(
  path: string,
  options: MeshReaderOptions,
  callback: (reader: MeshReader) => Promise<T> | T
): Promise<T> {
  const reader = await MeshReader.open(path, options);
  try {
    return await callback(reader);
  } finally {
    await reader.close();
  }
}

function computeExtent(nodes: readonly MeshNode[]): MeshExtent {
  if (nodes.length === 0) {
    return [Number.NaN, Number.NaN, Number.NaN, Number.NaN];
  }
  let minX = Number.POSITIVE_INFINITY;
  let maxX = Number.NEGATIVE_INFINITY;
  let minY = Number.POSITIVE_INFINITY;
  let maxY = Number.NEGATIVE_INFINITY;
  for (const node of nodes) {
    minX = Math.min(minX, node.x);
    maxX = Math.max(maxX, node.x);
    minY = Math.min(minY, node.y);
    maxY = Math.max(maxY, node.y);
  }
  return [minX, maxX, minY, maxY];
}

function rangeView<T>(
  items: readonly T[],
  start: number,
  end: number,
  base: number,
  kind: string
): IterableIterator<T> {
  if (items.length === 0) {
    return items.values();
  }
  const first = base;
  const limit = base + items.length;
  const from = start < 0 ? first : start;
  const to = end < 0 ? limit : end;

  if (from < first || from >= limit) {
    throw new IndexRangeError(`Start ${kind} index ${from} is outside [${first}, ${limit})`, from, to);
  }
  if (to <= from) {
    throw new IndexRangeError(`End ${kind} index must be greater than start (${to} <= ${from})`, from, to);
  }
  if (to > limit) {
    throw new IndexRangeError(`End ${kind} index ${to} is past the last ${kind} (${limit})`, from, to);
  }
  return items.slice(from - base, to - base).values();
}

function checkContiguousId(
  token: string | undefined,
  expected: number,
  kind: "node" | "element",
  lineNumber: number,
  line: string
): void {
  const id = parseIntegerToken(token ?? "");
  if (id === null) {
    throw new FormatError(`Invalid ${kind} ID '${token ?? ""}'`, lineNumber, line);
  }
  if (id === 0 && expected === 1) {
    throw new FormatError(
      `The mesh uses ${kind} ID 0; open it in zero index mode`,
      lineNumber,
      line
    );
  }
  if (id !== expected) {
    throw new FormatError(
      `${capitalize(kind)} IDs must be contiguous: expected ${expected}, got ${id}`,
      lineNumber,
      line
    );
  }
}

function isNameCard(card: string): boolean {
  return NAME_CARDS.some((nameCard) => nameCard === card);
}

function splitLines(text: string): string[] {
  return text.split("\n");
}

/**
 * Text between the first pair of double quotes, or the remaining tokens
 * when the name is unquoted
 */
function readMeshName(line: string, tokens: readonly string[]): string {
  const parts = cleanLine(line).split('"');
  if (parts.length >= 3) {
    return parts[1] ?? "";
  }
  return tokens.slice(1).join(" ").replaceAll('"', "");
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
