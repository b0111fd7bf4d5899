/**
 * Callable handles.
 *
 * A handle is a plain function from one argument to one result. `func()`
 * freezes it so every holder shares the same, unchangeable value; the
 * protocol never copies or owns handles.
 */

/** Standard function type: a callable handle from `T` to `U`. */
export type Func<T, U> = (arg: T) => U;

/**
 * Create a callable handle.
 *
 * @example
 * ```typescript
 * const double = func((n: number) => n * 2);
 * double(21); // 42
 * ```
 */
export function func<T, U>(fn: (arg: T) => U): Func<T, U> {
  return Object.freeze(fn);
}

/** Runtime check for the leaf case of the call protocol. */
export function isFunc(value: unknown): value is Func<unknown, unknown> {
  return typeof value === "function";
}
