/**
 * Argument tags.
 *
 * `Unit` stands for "no argument": a value is its own function type.
 * `Arg<X>` stands for "a function of X". Keeping the two apart lets
 * `Fun<Tag, V>` give both cases for the same `V` without collisions.
 */

/** Used to disambiguate "function of X" from the unparameterized case. */
export interface Arg<T> {
  readonly value: T;
}

/** The empty argument tag. */
export type Unit = readonly [];

export const unit: Unit = Object.freeze<Unit>([]);

/**
 * Wrap an argument so it can be passed as a tag to `resolve`.
 */
export function arg<T>(value: T): Arg<T> {
  return Object.freeze({ value });
}

export function isUnit(tag: Unit | Arg<unknown>): tag is Unit {
  return Array.isArray(tag);
}
