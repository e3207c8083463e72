/**
 * Central format module exports
 *
 * @example
 * ```typescript
 * import { MeshReader, MeshWriter } from "../formats";
 * ```
 */

export * from "./mesh2d";
