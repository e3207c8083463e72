/**
 * Reader and writer configuration
 *
 * Options are validated once, when a reader or writer is opened, and
 * frozen into a resolved configuration.
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import type { WarningHandler } from "../../types";
import { reportWarning } from "../../types";
import { MESH2D_LIMITS } from "./constants";
import type {
  MeshReaderOptions,
  MeshWriterOptions,
  ResolvedReaderConfig,
  ResolvedWriterConfig,
} from "./types";

/**
 * ArkType validation schema for reader options
 */
const MeshReaderOptionsSchema = type({
  "zeroIndex?": "boolean",
  "allowFloatMatid?": "boolean",
  "materials?": "number.integer",
}).narrow((options, ctx) => {
  if (options.materials !== undefined && options.materials < 0) {
    return ctx.reject({
      path: ["materials"],
      expected: "a non-negative material count",
      actual: `${options.materials}`,
    });
  }
  return true;
});

/**
 * ArkType validation schema for writer options
 */
const MeshWriterOptionsSchema = type({
  "zeroIndex?": "boolean",
  "allowFloatMatid?": "boolean",
  "materials?": "number.integer",
  "decimals?": "number.integer",
  "align?": "boolean",
  "name?": "string",
}).narrow((options, ctx) => {
  if (options.materials !== undefined && options.materials < 0) {
    return ctx.reject({
      path: ["materials"],
      expected: "a non-negative material count",
      actual: `${options.materials}`,
    });
  }
  if (
    options.decimals !== undefined &&
    (options.decimals < 1 || options.decimals > MESH2D_LIMITS.MAX_DECIMALS)
  ) {
    return ctx.reject({
      path: ["decimals"],
      expected: `decimals between 1 and ${MESH2D_LIMITS.MAX_DECIMALS}`,
      actual: `${options.decimals}`,
    });
  }
  // MESHNAME "..." cannot hold a quote, and '#' starts a comment
  if (options.name !== undefined && /["#]/.test(options.name)) {
    return ctx.reject({
      path: ["name"],
      expected: "a mesh name without double quotes or '#'",
      actual: options.name,
    });
  }
  return true;
});

/**
 * Validate reader options and fill in defaults
 *
 * @throws {ValidationError} If an option has the wrong type or range
 */
export function resolveReaderOptions(options: MeshReaderOptions = {}): ResolvedReaderConfig {
  const { onWarning, ...settings } = options;
  const result = MeshReaderOptionsSchema(definedOnly(settings));
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid 2DM reader options: ${result.summary}`);
  }

  return Object.freeze({
    zeroIndex: result.zeroIndex ?? false,
    materials: result.materials ?? null,
    allowFloatMatid: result.allowFloatMatid ?? true,
    onWarning: resolveWarningHandler(onWarning),
  });
}

/**
 * Validate writer options and fill in defaults
 *
 * @throws {ValidationError} If an option has the wrong type or range
 */
export function resolveWriterOptions(options: MeshWriterOptions = {}): ResolvedWriterConfig {
  const { onWarning, ...settings } = options;
  const result = MeshWriterOptionsSchema(definedOnly(settings));
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid 2DM writer options: ${result.summary}`);
  }

  return Object.freeze({
    materials: result.materials ?? null,
    zeroIndex: result.zeroIndex ?? false,
    allowFloatMatid: result.allowFloatMatid ?? true,
    decimals: result.decimals ?? MESH2D_LIMITS.DEFAULT_DECIMALS,
    align: result.align ?? true,
    name: result.name ?? null,
    onWarning: resolveWarningHandler(onWarning),
  });
}

/**
 * Drop keys whose value is undefined; optional schema keys reject an explicit undefined
 */
function definedOnly(settings: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(settings).filter(([, value]) => value !== undefined)
  );
}

function resolveWarningHandler(handler: WarningHandler | undefined): WarningHandler {
  if (handler === undefined) {
    return reportWarning;
  }
  if (typeof handler !== "function") {
    throw new ValidationError("Invalid 2DM options: onWarning must be a function");
  }
  return handler;
}
