/**
 * @hodata/ho: higher order data structures.
 *
 * A higher order value is a value type whose properties may all be
 * functions of one argument. `Point` holds numbers; `Point<Arg<number>>`
 * holds functions of a number and, once called, gives a `Point` back. A
 * circle and a line can both be a `Point<Arg<number>>`.
 *
 * @example
 * ```typescript
 * import { func, hpair, hmap, type Pair } from "@hodata/ho";
 *
 * const mid = func(({ left: a, right: b }: Pair<number>) => {
 *   const end = b < a ? b + 1 : b;
 *   return (a + (end - a) * 0.5) % 1;
 * });
 *
 * hmap(hpair([0.7, 0.9], [0.9, 0.1]), mid); // [0.8, 0]
 * ```
 *
 * @packageDocumentation
 */

export { type Func, func, isFunc } from "./func.js";

export { type Arg, type Unit, arg, unit, isUnit } from "./arg.js";

// Star export keeps HoRegistry augmentable through "@hodata/ho".
export * from "./fun.js";

export {
  defineHo,
  hasHo,
  listHo,
  clearHoRegistry,
  type HoDefinition,
  type HoType,
} from "./define.js";

export { type HoVariant, type Variant, isVariant, variantName } from "./variant.js";

export { call, resolve } from "./call.js";

export {
  Pair,
  pair,
  hpair,
  type PairOptions,
  type LengthMismatchPolicy,
} from "./pair.js";

export { hmap, hmapPar, type ParallelMapOptions } from "./map.js";

export type { Arity, Fixed, Leaf, LeafPath, MapShape, PairShape } from "./shape.js";

export {
  AssociationConflictError,
  MissingAssociationError,
  ShapeMismatchError,
  LengthMismatchError,
} from "./errors.js";
