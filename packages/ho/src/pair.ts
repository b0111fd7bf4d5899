/**
 * Pairwise transposition.
 *
 * Zips two containers of the same shape into one container of pairs, so a
 * binary handle `Func<Pair<T>, U>` can then be mapped over the result.
 *
 * ```typescript
 * const args = hpair([0.7, 0.9], [0.9, 0.1]);
 * // [Pair(0.7, 0.9), Pair(0.9, 0.1)]
 * ```
 */

import { config, type PairingMismatch } from "@hodata/core";
import { unsafeCoerce } from "@hodata/type-system";
import { LengthMismatchError, ShapeMismatchError } from "./errors.js";
import { formatPath, isContainer, type PairShape } from "./shape.js";

/**
 * Two values travelling together as one leaf.
 */
export class Pair<A, B = A> {
  constructor(
    readonly left: A,
    readonly right: B,
  ) {
    Object.freeze(this);
  }

  toArray(): [A, B] {
    return [this.left, this.right];
  }
}

export function pair<A, B = A>(left: A, right: B): Pair<A, B> {
  return new Pair(left, right);
}

/**
 * What `hpair` does with arrays of different lengths:
 * `"error"` throws `LengthMismatchError`, `"truncate"` drops the elements
 * past the shorter length.
 */
export type LengthMismatchPolicy = PairingMismatch;

export interface PairOptions {
  /** Defaults to the `pairing.mismatch` configuration value */
  onLengthMismatch?: LengthMismatchPolicy;
}

function leafKind(value: unknown): string {
  if (value === null) return "null";
  if (value instanceof Pair) return "pair";
  return typeof value;
}

function zipShape(
  left: unknown,
  right: unknown,
  policy: LengthMismatchPolicy,
  path: number[],
): unknown {
  if (isContainer(left) && isContainer(right)) {
    if (left.length !== right.length && policy === "error") {
      throw new LengthMismatchError(formatPath(path), left.length, right.length);
    }
    const length = Math.min(left.length, right.length);
    const zipped: unknown[] = [];
    for (let i = 0; i < length; i++) {
      zipped.push(zipShape(left[i], right[i], policy, [...path, i]));
    }
    return zipped;
  }

  if (isContainer(left) || isContainer(right)) {
    throw new ShapeMismatchError(
      formatPath(path),
      isContainer(left) ? "an array" : `a ${leafKind(left)} leaf`,
      isContainer(right) ? "an array" : `a ${leafKind(right)} leaf`,
    );
  }

  const kind = leafKind(left);
  if (kind !== leafKind(right)) {
    throw new ShapeMismatchError(formatPath(path), `a ${kind} leaf`, `a ${leafKind(right)} leaf`);
  }
  return new Pair(left, right);
}

/**
 * Pair up the leaves of two containers of the same shape, position by
 * position.
 *
 * @throws ShapeMismatchError if a container meets a leaf, or leaves differ in kind
 * @throws LengthMismatchError if array lengths differ and the policy is "error"
 */
export function hpair<C>(left: C, right: C, options: PairOptions = {}): PairShape<C> {
  const policy = options.onLengthMismatch ?? config.get("pairing.mismatch");
  const zipped: unknown = zipShape(left, right, policy, []);
  // zipShape mirrors PairShape<C> node for node
  return unsafeCoerce<unknown, PairShape<C>>(zipped);
}
