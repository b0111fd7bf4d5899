/**
 * Type-Level Boolean Utilities
 *
 * Pure type-level constructs for compile-time type assertions and comparisons.
 *
 * @example
 * ```typescript
 * import { Equal, IsUnion, typeAssert } from "@hodata/type-system";
 *
 * typeAssert<Equal<string, string>>();
 * type U = IsUnion<1 | 2>; // true
 * ```
 */

/**
 * Type-level equality check.
 *
 * The "strong" formulation:
 * - `Equal<any, unknown>` → false
 * - `Equal<never, never>` → true
 * - `Equal<1 | 2, 2 | 1>` → true
 */
export type Equal<A, B> =
  (<T>() => T extends A ? 1 : 2) extends <T>() => T extends B ? 1 : 2 ? true : false;

/**
 * Returns `true` if `A` extends `B`.
 */
export type Extends<A, B> = [A] extends [B] ? true : false;

/** Type-level NOT. */
export type Not<T extends boolean> = T extends true ? false : true;

/**
 * Check if a type is exactly `never`.
 *
 * Uses the tuple trick to avoid distributive conditional types.
 */
export type IsNever<T> = [T] extends [never] ? true : false;

/** Check if a type is `any`. */
export type IsAny<T> = 0 extends 1 & T ? true : false;

/**
 * Check if a type is a union of two or more members.
 *
 * Distributes over `T`: a union has at least one member the whole union
 * is not assignable to, even when one member is a subtype of another.
 */
export type IsUnion<T, U = T> = [T] extends [never]
  ? false
  : true extends (T extends unknown ? ([U] extends [T] ? false : true) : never)
    ? true
    : false;

/**
 * Compile-time assertion. Fails to type-check unless `T` is `true`;
 * does nothing at runtime.
 *
 * ```typescript
 * typeAssert<Equal<Fun<Unit, number>, number>>();
 * ```
 */
export function typeAssert<T extends true>(): void {}
