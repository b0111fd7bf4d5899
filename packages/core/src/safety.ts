/**
 * Runtime Safety Primitives
 *
 * @example
 * ```typescript
 * invariant(concurrency > 0, "concurrency must be positive");
 * ```
 */

import { HodataError } from "./errors.js";

/**
 * Runtime invariant check.
 *
 * @throws HodataError with code HO_INVARIANT if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new HodataError("HO_INVARIANT", message ?? "Invariant violation");
  }
}
