/**
 * Function-association protocol.
 *
 * For every value type `V` and argument tag, `Fun<Tag, V>` is the one type
 * representing "V, but every property depends on the argument":
 *
 * - `Fun<Unit, V>` is `V` itself.
 * - `Fun<Arg<X>, K>` is `Func<X, K>` for every scalar `K`.
 * - `Fun<Arg<X>, V>` for a composite `V` is whatever the consumer declared
 *   by augmenting `HoRegistry`, stamped as a `Variant`: only `HoType.fun`
 *   produces values of it.
 *
 * Declaring a composite:
 *
 * ```typescript
 * interface Point<Tag = Unit> {
 *   readonly x: Fun<Tag, number>;
 *   readonly y: Fun<Tag, number>;
 * }
 *
 * // Point<Arg<T>> is the function variant of Point for argument T
 * interface PointF extends TypeFunction {
 *   readonly _: Point<Arg<this["__kind__"]>>;
 * }
 *
 * declare module "@hodata/ho" {
 *   interface HoRegistry {
 *     point: Assoc<Point, PointF>;
 *   }
 * }
 * ```
 *
 * Two declarations under the same key must agree, or the compiler rejects
 * the merge. Two keys associating different function types with the same
 * value type resolve to `AssociationConflict`, and a value type with no
 * entry resolves to `MissingAssociation`; neither has any inhabitant, so
 * every use of them fails to type-check.
 */

import type { Apply, Equal, IsNever, IsUnion, TypeFunction } from "@hodata/type-system";
import type { Arg, Unit } from "./arg.js";
import type { Func } from "./func.js";
import type { Variant } from "./variant.js";

/** Scalar value types: their function type is a plain handle. */
export type Scalar = number | bigint;

/**
 * A registry entry: value type `V` and a type-level function giving its
 * function variant for any argument type.
 */
export interface Assoc<V, F extends TypeFunction> {
  readonly value: V;
  readonly fun: F;
}

/**
 * Open association table, extended by declaration merging. Keys are only
 * names; lookups go by value type.
 */
// eslint-disable-next-line @typescript-eslint/no-empty-object-type
export interface HoRegistry {}

declare const missingAssociation: unique symbol;
declare const associationConflict: unique symbol;

/** No function type is associated with `V` for argument `X`. */
export interface MissingAssociation<V, X> {
  readonly [missingAssociation]: { readonly value: V; readonly arg: X };
}

/** More than one function type is associated with `V` for argument `X`. */
export interface AssociationConflict<V, X, Candidates> {
  readonly [associationConflict]: {
    readonly value: V;
    readonly arg: X;
    readonly candidates: Candidates;
  };
}

// ============================================================================
// Value type → function type
// ============================================================================

type Candidates<R, V, X> = {
  [K in keyof R]: R[K] extends Assoc<infer W, infer F extends TypeFunction>
    ? Equal<V, W> extends true
      ? Variant<Apply<F, X>>
      : never
    : never;
}[keyof R];

type Select<V, X, C> =
  IsNever<C> extends true
    ? MissingAssociation<V, X>
    : IsUnion<C> extends true
      ? AssociationConflict<V, X, C>
      : C;

type Associate<R, V, X> = [V] extends [Scalar] ? Func<X, V> : Select<V, X, Candidates<R, V, X>>;

/**
 * `Fun` against an explicit registry. Mostly useful for checking a table
 * without merging it into `HoRegistry`.
 */
export type FunIn<R, Tag, V> = [Tag] extends [Unit]
  ? V
  : [Tag] extends [Arg<infer X>]
    ? Associate<R, V, X>
    : never;

/**
 * The function type of `V` for argument tag `Tag`.
 *
 * @example
 * ```typescript
 * type A = Fun<Unit, number>;        // number
 * type B = Fun<Arg<string>, number>; // Func<string, number>
 * type C = Fun<Arg<number>, Point>;  // Variant<Point<Arg<number>>>
 * ```
 */
export type Fun<Tag, V> = FunIn<HoRegistry, Tag, V>;

// ============================================================================
// Function type → value type
// ============================================================================

type Producers<R, F, X> = {
  [K in keyof R]: R[K] extends Assoc<infer W, infer G extends TypeFunction>
    ? Equal<F, Variant<Apply<G, X>>> extends true
      ? W
      : never
    : never;
}[keyof R];

/** `ValueOf` against an explicit registry. */
export type ValueOfIn<R, F, X> = [F] extends [Func<X, infer U extends Scalar>]
  ? U
  : Producers<R, F, X>;

/**
 * The value type produced by calling function type `F` with an `X`;
 * the inverse of `Fun`, so `ValueOf<Fun<Arg<X>, V>, X>` is `V`.
 * `never` when `F` is not a function type of anything.
 */
export type ValueOf<F, X> = ValueOfIn<HoRegistry, F, X>;

/**
 * Parameter guard: intersected with `F` it rejects values that are not a
 * function type for argument `X`.
 */
export type HoFun<F, X> = [ValueOf<F, X>] extends [never] ? MissingAssociation<F, X> : unknown;
