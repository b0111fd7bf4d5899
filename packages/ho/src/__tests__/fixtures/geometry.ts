/**
 * Composite consumers of the protocol, used by the tests.
 */

import type { TypeFunction } from "@hodata/type-system";
import { defineHo } from "../../define.js";
import type { Arg, Unit } from "../../arg.js";
import type { Assoc, Fun } from "../../fun.js";
import type { Variant } from "../../variant.js";

/** Higher order 3D point. */
export interface Point<Tag = Unit> {
  readonly x: Fun<Tag, number>;
  readonly y: Fun<Tag, number>;
  readonly z: Fun<Tag, number>;
}

export type PointFunc<T> = Variant<Point<Arg<T>>>;

export interface PointF extends TypeFunction {
  readonly _: Point<Arg<this["__kind__"]>>;
}

/** A weighted segment between two points; nests a composite in a composite. */
export interface Segment<Tag = Unit> {
  readonly start: Fun<Tag, Point>;
  readonly end: Fun<Tag, Point>;
  readonly weight: Fun<Tag, number>;
}

export type SegmentFunc<T> = Variant<Segment<Arg<T>>>;

export interface SegmentF extends TypeFunction {
  readonly _: Segment<Arg<this["__kind__"]>>;
}

declare module "../../fun.js" {
  interface HoRegistry {
    point: Assoc<Point, PointF>;
    segment: Assoc<Segment, SegmentF>;
  }
}

export const PointHo = defineHo<Point, PointF>({
  name: "Point",
  call: (f, t) => ({ x: f.x(t), y: f.y(t), z: f.z(t) }),
});

export const SegmentHo = defineHo<Segment, SegmentF>({
  name: "Segment",
  call: (f, t) => ({
    start: PointHo.call(f.start, t),
    end: PointHo.call(f.end, t),
    weight: f.weight(t),
  }),
});

/** Unit circle in the xy-plane; the argument is a turn in [0, 1]. */
export const circle: PointFunc<number> = PointHo.fun<number>({
  x: (t) => Math.cos(t * 2 * Math.PI),
  y: (t) => Math.sin(t * 2 * Math.PI),
  z: () => 0,
});

/** Straight line from (1, 2, 3) to (3, 6, 7); the argument runs over [0, 1]. */
export const line: PointFunc<number> = PointHo.fun<number>({
  x: (t) => 1 + 2 * t,
  y: (t) => 2 + 4 * t,
  z: (t) => 3 + 4 * t,
});
