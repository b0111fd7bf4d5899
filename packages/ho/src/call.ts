/**
 * Call protocol.
 *
 * `call(f, x)` turns a function type back into its value type. A callable
 * handle is invoked as-is; a composite variant goes through the call logic
 * its type registered with `defineHo`, which in turn calls every field with
 * the same argument. Nothing here catches what a handle throws.
 */

import { unsafeCoerce } from "@hodata/type-system";
import { type Arg, type Unit, isUnit } from "./arg.js";
import { dispatcher } from "./define.js";
import type { HoFun, ValueOf } from "./fun.js";

/**
 * Call a function type with an argument.
 *
 * @example
 * ```typescript
 * call(func((t: number) => t * 2), 3); // 6
 * call(circle, 0.25);                  // Point
 * ```
 *
 * @throws MissingAssociationError if `f` is neither a handle nor a function variant
 */
export function call<F, X>(f: F & HoFun<F, X>, x: X): ValueOf<F, X> {
  return unsafeCoerce<unknown, ValueOf<F, X>>(dispatcher(f)(x));
}

/**
 * Resolve a function type against an argument tag. With `unit` the value
 * is returned unchanged; with `arg(x)` it is `call(f, x)`.
 */
export function resolve<V>(value: V, tag: Unit): V;
export function resolve<F, X>(f: F & HoFun<F, X>, tag: Arg<X>): ValueOf<F, X>;
export function resolve(f: unknown, tag: Unit | Arg<unknown>): unknown {
  return isUnit(tag) ? f : dispatcher(f)(tag.value);
}
