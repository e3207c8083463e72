/**
 * 2DM mesh writer
 *
 * Entities are buffered per kind in insertion order and written in blocks.
 * Once a kind has been flushed and another kind flushed after it, that
 * first kind cannot be written again: every kind occupies one contiguous
 * block of the file.
 *
 * @example
 * ```typescript
 * await withWriter("square.2dm", { materials: 1 }, async (mesh) => {
 *   mesh.node(-1, 0, 0, 0);
 *   mesh.node(-1, 1, 0, 0);
 *   mesh.node(-1, 1, 1, 0);
 *   mesh.element("E3T", -1, [1, 2, 3], [1]);
 *   mesh.nodeString([1, 2, 3], "boundary");
 * });
 * ```
 */

import { FileClosedError, WriteError } from "../../errors";
import { openWriteHandle } from "../../io/file-writer";
import type { FileWriteHandle } from "../../types";
import type { ElementCard } from "./constants";
import {
  MATERIALS_CARD,
  MESH2D_CARD,
  MESH2D_LIMITS,
  NAME_CARDS,
  NODE_STRING_CARD,
} from "./constants";
import { createElement, createNode, createNodeString, entityToRecord, quoteName } from "./entities";
import { resolveWriterOptions } from "./options";
import type {
  MaterialInput,
  MeshElement,
  MeshNode,
  MeshWriterOptions,
  NodeString,
  ResolvedWriterConfig,
} from "./types";
import { alignColumns } from "./utils";

/**
 * Entity block kinds, in the order `close()` writes them
 */
export type EntityKind = "nodes" | "elements" | "node strings";

const BLOCK_ORDER: readonly EntityKind[] = ["nodes", "elements", "node strings"];

/**
 * Render a node string as NS lines of at most ten node tokens each
 *
 * The name, if any, follows the terminator on the last line.
 */
export function formatNodeStringLines(nodeString: NodeString): string[] {
  const [, ...tokens] = entityToRecord(nodeString, { includeName: false });
  const perLine = MESH2D_LIMITS.NODE_STRING_TOKENS_PER_LINE;
  const lines: string[] = [];
  for (let start = 0; start < tokens.length; start += perLine) {
    lines.push(`${NODE_STRING_CARD} ${tokens.slice(start, start + perLine).join(" ")}`);
  }
  const last = lines.pop();
  if (last !== undefined) {
    lines.push(nodeString.name === null ? last : `${last} ${quoteName(nodeString.name)}`);
  }
  return lines;
}

/**
 * Buffered writer for 2DM mesh files
 *
 * Construct through {@link MeshWriter.open} or {@link withWriter}.
 */
export class MeshWriter {
  private readonly nodeBuffer: MeshNode[] = [];
  private readonly elementBuffer: MeshElement[] = [];
  private readonly nodeStringBuffer: NodeString[] = [];
  private readonly flushHistory: EntityKind[] = [];
  private nodeCount = 0;
  private elementCount = 0;
  private nodeStringCount = 0;
  private materials: number | null;
  private headerWritten = false;
  private isClosed = false;

  private constructor(
    readonly config: ResolvedWriterConfig,
    private readonly handle: FileWriteHandle
  ) {
    this.materials = config.materials;
  }

  /**
   * Create (or truncate) a 2DM file for writing
   *
   * @throws {ValidationError} If options are invalid
   * @throws {FileError} If the file cannot be opened
   */
  static async open(path: string, options: MeshWriterOptions = {}): Promise<MeshWriter> {
    const config = resolveWriterOptions(options);
    const handle = await openWriteHandle(path);
    return new MeshWriter(config, handle);
  }

  get path(): string {
    return this.handle.path;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Nodes added so far, flushed or not */
  get numNodes(): number {
    this.ensureOpen();
    return this.nodeCount;
  }

  /** Elements added so far, flushed or not */
  get numElements(): number {
    this.ensureOpen();
    return this.elementCount;
  }

  /** Node strings added so far, flushed or not */
  get numNodeStrings(): number {
    this.ensureOpen();
    return this.nodeStringCount;
  }

  /**
   * Materials per element, or null until configured or inferred
   */
  get materialsPerElement(): number | null {
    this.ensureOpen();
    return this.materials;
  }

  /**
   * Buffer a node
   *
   * A negative ID is replaced by the next free ID.
   *
   * @returns The node's ID
   * @throws {WriteError} If nodes were already written as an earlier block
   */
  node(node: MeshNode): number;
  node(id: number, x: number, y: number, z: number): number;
  node(nodeOrId: MeshNode | number, x?: number, y?: number, z?: number): number {
    this.ensureOpen();
    this.checkFlushOrder("nodes");

    let source: MeshNode;
    if (typeof nodeOrId === "number") {
      if (x === undefined || y === undefined || z === undefined) {
        throw new WriteError("Node requires x, y and z coordinates");
      }
      source = createNode(nodeOrId, x, y, z);
    } else {
      source = nodeOrId;
    }

    const id = this.resolveId(source.id, this.nodeCount);
    this.nodeBuffer.push(createNode(id, source.x, source.y, source.z));
    this.nodeCount++;
    return id;
  }

  /**
   * Buffer an element
   *
   * A negative ID is replaced by the next free ID. The first element fixes
   * the material count when none was configured; extra materials are
   * truncated with a warning.
   *
   * @returns The element's ID
   * @throws {WriteError} If the element has too few materials, a float
   *   material is given while float materials are disabled, or elements were
   *   already written as an earlier block
   */
  element(element: MeshElement): number;
  element(
    card: ElementCard,
    id: number,
    nodes: readonly number[],
    materials?: readonly MaterialInput[]
  ): number;
  element(
    elementOrCard: MeshElement | ElementCard,
    id?: number,
    nodes?: readonly number[],
    materials: readonly MaterialInput[] = []
  ): number {
    this.ensureOpen();
    this.checkFlushOrder("elements");

    let source: MeshElement;
    if (typeof elementOrCard === "string") {
      if (id === undefined || nodes === undefined) {
        throw new WriteError(`${elementOrCard} element requires an ID and node list`);
      }
      source = createElement(elementOrCard, id, nodes, materials);
    } else {
      source = elementOrCard;
    }

    const required = this.materials ?? source.materials.length;
    if (source.materials.length < required) {
      throw new WriteError(
        `Mesh requires ${required} materials per element, element has ${source.materials.length}`
      );
    }
    const elementMaterials = source.materials.slice(0, required);
    if (!this.config.allowFloatMatid && elementMaterials.some((material) => material.kind === "float")) {
      throw new WriteError("Mesh only accepts integer materials (allowFloatMatid is false)");
    }
    if (source.materials.length > required) {
      this.config.onWarning(
        `${source.materials.length - required} extra materials removed ` +
          `(mesh material count is ${required})`
      );
    }
    this.materials = required;

    const elementId = this.resolveId(source.id, this.elementCount);
    this.elementBuffer.push(createElement(source.card, elementId, source.nodes, elementMaterials));
    this.elementCount++;
    return elementId;
  }

  /**
   * Buffer a node string
   *
   * @returns The zero-based position of the node string in the mesh
   * @throws {WriteError} If fewer than two nodes are given, the name holds a
   *   quote or '#', or node strings were already written as an earlier block
   */
  nodeString(nodeString: NodeString): number;
  nodeString(nodes: readonly number[], name?: string | null): number;
  nodeString(nodeStringOrNodes: NodeString | readonly number[], name: string | null = null): number {
    this.ensureOpen();
    this.checkFlushOrder("node strings");

    const nodes = isNodeString(nodeStringOrNodes) ? nodeStringOrNodes.nodes : nodeStringOrNodes;
    const nodeStringName = isNodeString(nodeStringOrNodes) ? nodeStringOrNodes.name : name;
    if (nodes.length < MESH2D_LIMITS.MIN_NODE_STRING_NODES) {
      throw new WriteError(
        `Node strings require at least ${MESH2D_LIMITS.MIN_NODE_STRING_NODES} nodes, got ${nodes.length}`
      );
    }
    if (nodeStringName !== null && /["#]/.test(nodeStringName)) {
      throw new WriteError(
        `Node string name '${nodeStringName}' cannot contain '"' or '#'; the name would not read back`
      );
    }

    this.nodeStringBuffer.push(createNodeString(nodes, nodeStringName));
    return this.nodeStringCount++;
  }

  /**
   * Write the MESH2D marker, optional MESHNAME and NUM_MATERIALS_PER_ELEM
   *
   * Called automatically by the first flush. A multi-line signature is
   * written as one comment line per line.
   *
   * @throws {WriteError} If the header or any entity was already written
   */
  async writeHeader(signature = ""): Promise<void> {
    this.ensureOpen();
    if (this.headerWritten || this.flushHistory.length > 0) {
      throw new WriteError("Header must be written at the top of the file");
    }
    this.headerWritten = true;

    const signatureLines = signature === "" ? [] : signature.split(/\r?\n/);
    const lines =
      signatureLines.length === 0
        ? [MESH2D_CARD]
        : [
            `${MESH2D_CARD} # ${signatureLines[0] ?? ""}`,
            ...signatureLines.slice(1).map((line) => `# ${line}`),
          ];
    if (this.config.name !== null) {
      lines.push(`${NAME_CARDS[0]} "${this.config.name}"`);
    }
    this.materials ??= 0;
    lines.push(`${MATERIALS_CARD} ${this.materials}`);

    await this.handle.writeString(`${lines.join("\n")}\n`);
  }

  /**
   * Write buffered nodes and clear the buffer
   *
   * @throws {WriteError} If nodes were already written as an earlier block
   */
  async flushNodes(): Promise<void> {
    await this.flush("nodes", this.nodeBuffer, (nodes) =>
      alignColumns(
        nodes.map((node) => entityToRecord(node, { decimals: this.config.decimals })),
        this.config.align
      )
    );
  }

  /**
   * Write buffered elements and clear the buffer
   *
   * @throws {WriteError} If elements were already written as an earlier block
   */
  async flushElements(): Promise<void> {
    await this.flush("elements", this.elementBuffer, (elements) =>
      alignColumns(
        elements.map((element) =>
          entityToRecord(element, {
            decimals: this.config.decimals,
            allowFloatMatid: this.config.allowFloatMatid,
          })
        ),
        this.config.align
      )
    );
  }

  /**
   * Write buffered node strings and clear the buffer
   *
   * @throws {WriteError} If node strings were already written as an earlier block
   */
  async flushNodeStrings(): Promise<void> {
    await this.flush("node strings", this.nodeStringBuffer, (nodeStrings) =>
      nodeStrings.flatMap(formatNodeStringLines)
    );
  }

  /**
   * Flush every buffer and release the file
   *
   * The most recently flushed kind goes first when it still has buffered
   * entities; the remaining buffers follow in the order nodes, elements,
   * node strings. Closing twice does nothing.
   */
  async close(): Promise<void> {
    if (this.isClosed) return;

    try {
      const last = this.flushHistory[this.flushHistory.length - 1];
      const order = last === undefined ? BLOCK_ORDER : [last, ...BLOCK_ORDER.filter((kind) => kind !== last)];
      for (const kind of order) {
        await this.flushKind(kind);
      }
      if (!this.headerWritten) {
        await this.writeHeader();
      }
    } finally {
      this.isClosed = true;
      await this.handle.close();
    }
  }

  toString(): string {
    return [
      `2DM Writer${this.isClosed ? " (closed)" : ""}`,
      `  File: ${this.path}`,
      `  Nodes: ${this.nodeCount}`,
      `  Elements: ${this.elementCount}`,
      `  Node strings: ${this.nodeStringCount}`,
      `  Materials per element: ${this.materials ?? "unset"}`,
    ].join("\n");
  }

  private async flushKind(kind: EntityKind): Promise<void> {
    switch (kind) {
      case "nodes":
        return this.flushNodes();
      case "elements":
        return this.flushElements();
      case "node strings":
        return this.flushNodeStrings();
    }
  }

  private async flush<T>(
    kind: EntityKind,
    buffer: T[],
    render: (entities: readonly T[]) => string[]
  ): Promise<void> {
    this.ensureOpen();
    if (!this.headerWritten) {
      await this.writeHeader();
    }
    if (buffer.length === 0) return;

    this.checkFlushOrder(kind);
    const pending = buffer.slice();
    await this.handle.writeString(`${render(pending).join("\n")}\n`);
    buffer.splice(0, pending.length);
    if (this.flushHistory[this.flushHistory.length - 1] !== kind) {
      this.flushHistory.push(kind);
    }
  }

  /**
   * A kind may only be written while it is the most recently flushed block,
   * or before it has been flushed at all
   */
  private checkFlushOrder(kind: EntityKind): void {
    const last = this.flushHistory[this.flushHistory.length - 1];
    if (last !== undefined && last !== kind && this.flushHistory.includes(kind)) {
      throw WriteError.forInterleavedBlocks(kind, last);
    }
  }

  private resolveId(id: number, count: number): number {
    if (id >= 0) return id;
    return this.config.zeroIndex ? count : count + 1;
  }

  private ensureOpen(): void {
    if (this.isClosed) {
      throw new FileClosedError(this.path);
    }
  }
}

/**
 * Open a writer, run a callback on it and close it afterwards
 *
 * Buffered entities are flushed by the close, also when the callback throws.
 */
export async function withWriter<T>(
  path: string,
  options: MeshWriterOptions,
  callback: (writer: MeshWriter) => Promise<T> | T
): Promise<T> {
  const writer = await MeshWriter.open(path, options);
  try {
    return await callback(writer);
  } finally {
    await writer.close();
  }
}

function isNodeString(value: NodeString | readonly number[]): value is NodeString {
  return !Array.isArray(value);
}
