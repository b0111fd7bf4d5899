/**
 * @hodata/type-system: type-level building blocks.
 *
 * 1. **Type-Level Utilities**: boolean algebra for types
 *    (Equal, Extends, Not, IsNever, IsAny, IsUnion)
 *
 * 2. **Higher-Kinded Types**: type constructors as type parameters via the
 *    phantom kind marker encoding (`Apply<F, A>`)
 *
 * @packageDocumentation
 */

export {
  type Equal,
  type Extends,
  type Not,
  type IsNever,
  type IsAny,
  type IsUnion,
  typeAssert,
} from "./type-utils.js";

export {
  type TypeFunction,
  type Apply,
  type ArrayF,
  type ReadonlyArrayF,
  unsafeCoerce,
} from "./hkt.js";
