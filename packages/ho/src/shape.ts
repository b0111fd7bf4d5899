/**
 * Container shapes.
 *
 * Arrays are containers, tuples included; anything else is a leaf. One
 * recursion covers every tuple arity and variable-length arrays, both at
 * the type level and at runtime.
 */

import type { Pair } from "./pair.js";

/** Tuple arities with a shorthand type. */
export type Arity = 2 | 3 | 4 | 5 | 6;

/**
 * Fixed-size tuple of `N` elements of type `T`.
 *
 * @example
 * ```typescript
 * type Edge = Fixed<number, 2>;           // readonly [number, number]
 * type Square = Fixed<Fixed<number, 2>, 2>;
 * ```
 */
export type Fixed<T, N extends Arity> = N extends 2
  ? readonly [T, T]
  : N extends 3
    ? readonly [T, T, T]
    : N extends 4
      ? readonly [T, T, T, T]
      : N extends 5
        ? readonly [T, T, T, T, T]
        : readonly [T, T, T, T, T, T];

/** The leaf type of a (possibly nested) container. */
export type Leaf<C> = C extends readonly (infer E)[] ? Leaf<E> : C;

/** `C` with every leaf replaced by `U`; tuples keep their arity. */
export type MapShape<C, U> = C extends readonly unknown[]
  ? { -readonly [K in keyof C]: MapShape<C[K], U> }
  : U;

/** `C` with every leaf `T` replaced by `Pair<T>`. */
export type PairShape<C> = C extends readonly unknown[]
  ? { -readonly [K in keyof C]: PairShape<C[K]> }
  : Pair<C>;

export function isContainer(value: unknown): value is readonly unknown[] {
  return Array.isArray(value);
}

/** Indices from the root container down to a leaf. */
export type LeafPath = readonly number[];

/** A leaf together with where it sits. */
export interface LeafEntry {
  readonly value: unknown;
  readonly path: LeafPath;
}

/**
 * Rebuild `value` with every leaf passed through `leaf`, index-ascending.
 */
export function mapLeaves(
  value: unknown,
  leaf: (value: unknown, path: LeafPath) => unknown,
  path: LeafPath = [],
): unknown {
  return isContainer(value)
    ? value.map((element, index) => mapLeaves(element, leaf, [...path, index]))
    : leaf(value, path);
}

/**
 * Every leaf of `value`, in the order `mapLeaves` visits them.
 */
export function collectLeaves(
  value: unknown,
  into: LeafEntry[] = [],
  path: LeafPath = [],
): LeafEntry[] {
  if (isContainer(value)) {
    value.forEach((element, index) => collectLeaves(element, into, [...path, index]));
  } else {
    into.push({ value, path });
  }
  return into;
}

/** Render a container path like `$[1][0]`. */
export function formatPath(path: LeafPath): string {
  return "$" + path.map((index) => `[${index}]`).join("");
}
