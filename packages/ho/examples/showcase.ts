/**
 * @hodata/ho Showcase
 *
 * Self-documenting examples of higher order data: one value type, its
 * function-of-an-argument variant, and the operations that move between
 * them.
 *
 * Type assertions used:
 *   typeAssert<Equal<A, B>>()      - A and B are the same type
 *   typeAssert<Not<Equal<A, B>>>() - A and B are DIFFERENT
 */

import { invariant } from "@hodata/core";
import { typeAssert, type Equal, type Not, type TypeFunction } from "@hodata/type-system";

import {
  type Arg,
  type Assoc,
  type Fun,
  type Pair,
  type Unit,
  type ValueOf,
  type Variant,
  arg,
  call,
  defineHo,
  func,
  hmap,
  hmapPar,
  hpair,
  resolve,
  unit,
} from "../src/index.js";

// ============================================================================
// 1. A COMPOSITE AND ITS FUNCTION VARIANT
// ============================================================================

/** An RGB colour; `Color<Arg<T>>` is a colour that varies with a `T`. */
interface Color<Tag = Unit> {
  readonly r: Fun<Tag, number>;
  readonly g: Fun<Tag, number>;
  readonly b: Fun<Tag, number>;
}

interface ColorF extends TypeFunction {
  readonly _: Color<Arg<this["__kind__"]>>;
}

declare module "../src/index.js" {
  interface HoRegistry {
    color: Assoc<Color, ColorF>;
  }
}

const ColorHo = defineHo<Color, ColorF>({
  name: "Color",
  call: (f, t) => ({ r: f.r(t), g: f.g(t), b: f.b(t) }),
});

typeAssert<Equal<Fun<Unit, Color>, Color>>();
typeAssert<Equal<Fun<Arg<number>, Color>, Variant<Color<Arg<number>>>>>();
typeAssert<Not<Equal<Fun<Arg<number>, Color>, Fun<Arg<string>, Color>>>>();
typeAssert<Equal<ValueOf<Fun<Arg<number>, Color>, number>, Color>>();

// Only ColorHo.fun stamps a variant; the bare fields are not one.
typeAssert<Equal<ValueOf<Color<Arg<number>>, number>, never>>();

// ============================================================================
// 2. CALLING
// ============================================================================

const fade = ColorHo.fun<number>({
  r: (t) => 255 * (1 - t),
  g: () => 0,
  b: (t) => 255 * t,
});

const purple = call(fade, 0.5);
invariant(purple.r === 127.5 && purple.b === 127.5, "fade(0.5) is halfway");

const fixed: Color = { r: 1, g: 2, b: 3 };
invariant(resolve(fixed, unit) === fixed, "unit resolves to the value itself");
invariant(resolve(fade, arg(1)).b === 255, "arg(1) calls the variant");

// ============================================================================
// 3. PAIRING AND MAPPING
// ============================================================================

/** Midpoint of two angles in turns, going the short way forward. */
const mid = func(({ left: a, right: b }: Pair<number>) => {
  const end = b < a ? b + 1 : b;
  return (a + (end - a) * 0.5) % 1;
});

const midpoints = hmap(hpair([0.7, 0.9], [0.9, 0.1]), mid);
typeAssert<Equal<typeof midpoints, number[]>>();
invariant(midpoints[0] === 0.8 && midpoints[1] === 0, "midpoints wrap around");

const swatches = hmap([0, 0.5, 1], fade);
typeAssert<Equal<typeof swatches, Color[]>>();
invariant(swatches[2].r === 0, "the last swatch is pure blue");

const parallel = await hmapPar([0, 0.25, 0.5, 0.75, 1], fade, { concurrency: 2 });
invariant(parallel.length === 5, "hmapPar keeps the shape");
