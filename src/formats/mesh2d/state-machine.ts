/**
 * Node string assembly across multiple NS lines
 *
 * A node string may be spread over any number of consecutive NS lines. The
 * first token whose text starts with `-` terminates it; whatever follows on
 * that line is the node string's name.
 *
 * The assembler holds no state of its own. The caller keeps the
 * {@link NodeStringBuilder} returned for an open string and passes it back
 * with the next line:
 *
 * EMPTY → OPEN → ... → OPEN → CLOSED
 */

import { CardError, FormatError } from "../../errors";
import { reportWarning } from "../../types";
import { NODE_STRING_CARD } from "./constants";
import { createNodeString } from "./entities";
import type { CardParseOptions, NodeStringBuilder, NodeStringStep } from "./types";
import { NodeStringState } from "./types";
import { parseIntegerToken, tokenize } from "./utils";

/**
 * Feed one NS line to the assembler
 *
 * @param line - Raw NS line (comments allowed)
 * @param builder - Builder returned by the previous call for an open string
 * @param options - Indexing mode, warning handler and line number
 * @returns The open builder, or the finished node string once the terminator is seen
 * @throws {CardError} If the line is not an NS card, or the finished string has fewer than 2 nodes
 * @throws {FormatError} If a node token is not an integer or names an invalid node ID
 *
 * @example
 * ```typescript
 * const first = parseNodeString("NS 1 2 3 4 5");
 * if (!first.done) {
 *   const second = parseNodeString("NS 6 -7 outlet", first.builder);
 *   // second.done === true, second.nodeString.nodes = [1, 2, 3, 4, 5, 6, 7]
 * }
 * ```
 */
export function parseNodeString(
  line: string,
  builder?: NodeStringBuilder,
  options: CardParseOptions = {}
): NodeStringStep {
  const tokens = tokenize(line);
  if (tokens[0] !== NODE_STRING_CARD) {
    throw new CardError(
      `Expected ${NODE_STRING_CARD} card, got '${tokens[0] ?? ""}'`,
      tokens[0] ?? "",
      options.lineNumber,
      line
    );
  }

  const nodes = builder ? [...builder.nodes] : [];
  const minimumId = options.zeroIndex === true ? 0 : 1;

  for (let index = 1; index < tokens.length; index++) {
    const token = tokens[index];
    if (token === undefined) break;

    const value = parseIntegerToken(token);
    if (value === null) {
      throw new FormatError(`Invalid node string node '${token}'`, options.lineNumber, line);
    }
    const nodeId = Math.abs(value);
    if (nodeId < minimumId) {
      throw new FormatError(
        `Invalid node ID ${nodeId} in node string; IDs start at 1 unless zero index mode is enabled`,
        options.lineNumber,
        line
      );
    }
    nodes.push(nodeId);

    if (token.startsWith("-")) {
      const name = extractName(tokens.slice(index + 1), options);
      return {
        state: NodeStringState.CLOSED,
        done: true,
        nodeString: createNodeString(nodes, name),
      };
    }
  }

  const startLine = builder?.startLine ?? options.lineNumber;
  return {
    state: NodeStringState.OPEN,
    done: false,
    builder:
      startLine === undefined
        ? { state: NodeStringState.OPEN, nodes }
        : { state: NodeStringState.OPEN, nodes, startLine },
  };
}

/**
 * Join the tokens after the terminator into a name
 *
 * Unquoted multi-word names are accepted but reported.
 */
function extractName(tokens: string[], options: CardParseOptions): string | null {
  if (tokens.length === 0) {
    return null;
  }

  const joined = tokens.join(" ");
  const quoted = joined.length >= 2 && joined.startsWith('"') && joined.endsWith('"');

  if (tokens.length > 1 && !quoted) {
    const warn = options.onWarning ?? reportWarning;
    warn(`Node string name '${joined}' contains spaces; names with spaces should be quoted`, options.lineNumber);
  }

  return quoted ? joined.slice(1, -1) : joined;
}
