/**
 * Token-level helpers shared by the grammar, reader and writer
 *
 * @module mesh2d/utils
 */

import { COMMENT_CHAR, MESH2D_LIMITS } from "./constants";
import type { MaterialIndex, MaterialInput } from "./types";

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL_FLOAT_PATTERN = /^([+-]?)(nan|inf|infinity)$/i;

/**
 * Strip the inline comment and surrounding whitespace from a line
 *
 * @example
 * ```typescript
 * cleanLine("ND 1 0 0 0  # corner"); // "ND 1 0 0 0"
 * ```
 */
export function cleanLine(line: string): string {
  const commentStart = line.indexOf(COMMENT_CHAR);
  const data = commentStart === -1 ? line : line.slice(0, commentStart);
  return data.trim();
}

/**
 * Split a line into whitespace-delimited tokens, ignoring comments
 */
export function tokenize(line: string): string[] {
  const cleaned = cleanLine(line);
  return cleaned === "" ? [] : cleaned.split(/\s+/);
}

/**
 * Parse an integer token, or null if the token is not an integer literal
 */
export function parseIntegerToken(token: string): number | null {
  return INTEGER_PATTERN.test(token) ? Number(token) : null;
}

/**
 * Parse a float token, or null if the token is not a float literal
 *
 * Accepts `nan`, `inf` and `infinity` in any case, as written by some
 * mesh tools.
 */
export function parseFloatToken(token: string): number | null {
  if (FLOAT_PATTERN.test(token)) {
    return Number(token);
  }
  const special = SPECIAL_FLOAT_PATTERN.exec(token);
  if (special) {
    if (special[2]?.toLowerCase() === "nan") return Number.NaN;
    return special[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }
  return null;
}

/**
 * Parse a material token: integer first, float on failure
 *
 * @returns The typed material, or null if the token is not numeric
 */
export function parseMaterial(token: string): MaterialIndex | null {
  const integer = parseIntegerToken(token);
  if (integer !== null) {
    return integerMaterial(integer);
  }
  const float = parseFloatToken(token);
  return float === null ? null : floatMaterial(float);
}

/**
 * Create an integer material value
 */
export function integerMaterial(value: number): MaterialIndex {
  return { kind: "integer", value };
}

/**
 * Create a float material value (rendered in scientific notation)
 */
export function floatMaterial(value: number): MaterialIndex {
  return { kind: "float", value };
}

/**
 * Normalize factory input to a typed material
 */
export function toMaterialIndex(input: MaterialInput): MaterialIndex {
  if (typeof input !== "number") {
    return input;
  }
  return Number.isInteger(input) ? integerMaterial(input) : floatMaterial(input);
}

/**
 * Format a float in normalized scientific notation
 *
 * A leading space is reserved for the sign so that positive and negative
 * values line up in fixed-width output. The exponent always has at least
 * two digits.
 *
 * @example
 * ```typescript
 * formatFloat(1.0, 6);  // " 1.000000e+00"
 * formatFloat(-1.0, 6); // "-1.000000e+00"
 * ```
 */
export function formatFloat(value: number, decimals: number = MESH2D_LIMITS.DEFAULT_DECIMALS): string {
  const sign = value >= 0 ? " " : "";
  const mantissa = value.toExponential(decimals).replace(/e([+-])(\d)$/, "e$10$2");
  return `${sign}${mantissa}`;
}

/**
 * Format a material value: bare integer or scientific float
 */
export function formatMaterial(
  material: MaterialIndex,
  decimals: number = MESH2D_LIMITS.DEFAULT_DECIMALS
): string {
  return material.kind === "integer" ? material.value.toString() : formatFloat(material.value, decimals);
}

/**
 * Join token rows into lines, right-aligning each column to its widest cell
 *
 * Rows may differ in length; a column is sized over the rows that have it.
 */
export function alignColumns(rows: readonly (readonly string[])[], align = true): string[] {
  if (!align) {
    return rows.map((row) => row.join(" "));
  }
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, column) => {
      widths[column] = Math.max(widths[column] ?? 0, cell.length);
    });
  }
  return rows.map((row) =>
    row.map((cell, column) => cell.padStart(widths[column] ?? cell.length)).join(" ")
  );
}
