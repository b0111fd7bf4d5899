/**
 * Higher-Kinded Types via Phantom Kind Markers
 *
 * A type-level function is an interface whose `_` member mentions
 * `this["__kind__"]`. Applying it intersects the interface with a concrete
 * `__kind__`, so TypeScript never has to recurse to compute the result.
 *
 * ```typescript
 * interface PairOfF extends TypeFunction {
 *   readonly _: [this["__kind__"], this["__kind__"]];
 * }
 *
 * type Two = Apply<PairOfF, number>; // [number, number]
 * ```
 *
 * The association table in `@hodata/ho` stores one of these per composite
 * type: applied to an argument type `X`, it yields the composite's
 * function-of-`X` variant.
 */

// ============================================================================
// Core HKT Encoding
// ============================================================================

/**
 * Base interface for type-level functions.
 */
export interface TypeFunction {
  readonly __kind__: unknown;
  readonly _: unknown;
}

/**
 * Apply a type-level function to get the concrete type.
 *
 * @example
 * ```typescript
 * type Numbers = Apply<ArrayF, number>; // Array<number>
 * ```
 */
export type Apply<F extends TypeFunction, A> = (F & { readonly __kind__: A })["_"];

/**
 * Type-level function for `Array<A>`.
 */
export interface ArrayF extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: Array<this["__kind__"]>;
}

/**
 * Type-level function for `ReadonlyArray<A>`.
 */
export interface ReadonlyArrayF extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: ReadonlyArray<this["__kind__"]>;
}

// ============================================================================
// Utilities
// ============================================================================

/**
 * Unsafe coercion between types.
 *
 * Use sparingly. Runtime dispatch erases the types the signatures carry,
 * and this is the one place where they are put back.
 */
export function unsafeCoerce<A, B>(a: A): B {
  return a as unknown as B;
}
