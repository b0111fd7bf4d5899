/**
 * Structural map.
 *
 * Applies one function type to every leaf of a nested container, keeping
 * the container's shape. The handle is resolved once and shared by all
 * leaves.
 *
 * ```typescript
 * const mid = func(({ left: a, right: b }: Pair<number>) => {
 *   const end = b < a ? b + 1 : b;
 *   return (a + (end - a) * 0.5) % 1;
 * });
 *
 * hmap(hpair([0.7, 0.9], [0.9, 0.1]), mid); // [0.8, 0]
 * ```
 */

import { invariant } from "@hodata/core";
import { unsafeCoerce } from "@hodata/type-system";
import { setImmediate as nextTurn } from "timers/promises";
import { dispatcher } from "./define.js";
import type { HoFun, ValueOf } from "./fun.js";
import { collectLeaves, mapLeaves, type Leaf, type MapShape } from "./shape.js";

/**
 * Map every leaf of `container` through `f`.
 *
 * @throws MissingAssociationError if `f` is neither a handle nor a function variant
 */
export function hmap<C, F>(
  container: C,
  f: F & HoFun<F, Leaf<C>>,
): MapShape<C, ValueOf<F, Leaf<C>>> {
  const mapped = mapLeaves(container, dispatcher(f));
  return unsafeCoerce<unknown, MapShape<C, ValueOf<F, Leaf<C>>>>(mapped);
}

export interface ParallelMapOptions {
  /** Number of interleaved lanes (default 4) */
  concurrency?: number;
}

/**
 * `hmap` with leaves evaluated in interleaved asynchronous lanes. Each lane
 * walks the leaves from the end, yielding to the event loop between
 * leaves, so evaluation order differs from `hmap`; the result does not.
 */
export async function hmapPar<C, F>(
  container: C,
  f: F & HoFun<F, Leaf<C>>,
  options: ParallelMapOptions = {},
): Promise<MapShape<C, ValueOf<F, Leaf<C>>>> {
  const concurrency = options.concurrency ?? 4;
  invariant(
    Number.isInteger(concurrency) && concurrency > 0,
    `concurrency must be a positive integer, got ${concurrency}`,
  );

  const dispatch = dispatcher(f);
  const leaves = collectLeaves(container);
  const results: unknown[] = new Array(leaves.length);
  const last = leaves.length - 1;

  const lanes = Array.from({ length: Math.min(concurrency, leaves.length) }, async (_, lane) => {
    for (let i = last - lane; i >= 0; i -= concurrency) {
      await nextTurn();
      const { value, path } = leaves[i];
      results[i] = dispatch(value, path);
    }
  });
  await Promise.all(lanes);

  let next = 0;
  const mapped = mapLeaves(container, () => results[next++]);
  return unsafeCoerce<unknown, MapShape<C, ValueOf<F, Leaf<C>>>>(mapped);
}
