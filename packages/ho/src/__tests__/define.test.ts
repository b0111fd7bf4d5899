import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { RegistryError, getGlobalTracer } from "@hodata/core";
import type { TypeFunction } from "@hodata/type-system";
import type { Arg, Unit } from "../arg.js";
import { call } from "../call.js";
import {
  clearHoRegistry,
  defineHo,
  dispatcher,
  hasHo,
  listHo,
  type HoDefinition,
} from "../define.js";
import { AssociationConflictError, MissingAssociationError } from "../errors.js";
import type { Fun } from "../fun.js";
import { func } from "../func.js";
import { hmap, hmapPar } from "../map.js";
import { isVariant, variantName } from "../variant.js";
import { circle, line, PointHo, SegmentHo } from "./fixtures/geometry.js";

interface Vec2<Tag = Unit> {
  readonly u: Fun<Tag, number>;
  readonly v: Fun<Tag, number>;
}

interface Vec2F extends TypeFunction {
  readonly _: Vec2<Arg<this["__kind__"]>>;
}

const vec2: HoDefinition<Vec2, Vec2F> = {
  name: "Vec2",
  call: (f, t) => ({ u: f.u(t), v: f.v(t) }),
};

describe("defineHo", () => {
  it("registers a composite under its name", () => {
    const Vec2Ho = defineHo(vec2);

    expect(Vec2Ho.name).toBe("Vec2");
    expect(hasHo("Vec2")).toBe(true);
    expect(hasHo("Matrix")).toBe(false);
    expect(listHo()).toEqual(["Point", "Segment", "Vec2"]);
  });

  it("treats registering the same definition again as a no-op", () => {
    defineHo(vec2);
    defineHo(vec2);
    expect(listHo().filter((name) => name === "Vec2")).toHaveLength(1);
  });

  it("rejects a different definition under a taken name", () => {
    const swapped: HoDefinition<Vec2, Vec2F> = {
      name: "Vec2",
      call: (f, t) => ({ u: f.v(t), v: f.u(t) }),
    };

    let thrown: unknown;
    try {
      defineHo(swapped);
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(AssociationConflictError);
    expect(thrown).toMatchObject({ code: "HO_ASSOCIATION_CONFLICT", typeName: "Vec2" });
    expect(thrown instanceof Error && thrown.cause).toBeInstanceOf(RegistryError);
    expect(() => defineHo(swapped)).toThrow(
      "'Vec2' is already associated with a different function type",
    );
  });

  it("calls the definition directly through the returned type", () => {
    const Vec2Ho = defineHo(vec2);
    const spin = Vec2Ho.fun<number>({ u: (t) => t, v: (t) => -t });

    expect(Vec2Ho.call(spin, 3)).toEqual({ u: 3, v: -3 });
    expect(PointHo.call(line, 0)).toEqual({ x: 1, y: 2, z: 3 });
  });
});

describe("fun", () => {
  it("freezes the variant", () => {
    const variant = PointHo.fun<number>({ x: (t) => t, y: (t) => t, z: (t) => t });
    expect(Object.isFrozen(variant)).toBe(true);
  });

  it("tags the variant for runtime dispatch", () => {
    const Vec2Ho = defineHo(vec2);
    const variant = Vec2Ho.fun<number>({ u: (t) => t + 1, v: (t) => t - 1 });

    expect(dispatcher(variant)(10)).toEqual({ u: 11, v: 9 });
  });

  it("stamps a copy with the type name and leaves the fields alone", () => {
    const fields = { x: (t: number) => t, y: (t: number) => t, z: (t: number) => t };
    const variant = PointHo.fun<number>(fields);

    expect(variant).not.toBe(fields);
    expect(variant[variantName]).toBe("Point");
    expect(Object.keys(variant)).toEqual(["x", "y", "z"]);
    expect(isVariant(variant)).toBe(true);
    expect(isVariant(fields)).toBe(false);
    expect(Object.isFrozen(fields)).toBe(false);
  });
});

describe("dispatcher", () => {
  it("invokes handles directly", () => {
    expect(dispatcher(func((s: string) => s.toUpperCase()))("ab")).toBe("AB");
  });

  it.each([
    [null, "null"],
    [[1, 2], "an array"],
    [{ x: 1 }, "an untagged object"],
    [42, "a value of type number"],
    ["text", "a value of type string"],
  ])("rejects %j as %s", (value, description) => {
    expect(() => dispatcher(value)).toThrow(
      `No function type is associated with ${description}: expected a callable handle ` +
        `or a function variant created by a registered higher order type`,
    );
  });
});

describe("dispatch tracing", () => {
  const tracer = getGlobalTracer();

  beforeEach(() => {
    tracer.enable();
    tracer.clear();
  });

  afterEach(() => {
    tracer.disable();
    tracer.clear();
  });

  it("records one composite event per composite call", () => {
    const segment = SegmentHo.fun<number>({
      start: circle,
      end: line,
      weight: func((t: number) => t),
    });
    call(segment, 0);
    call(circle, 0);

    expect(tracer.getAllRecords().map((record) => [record.kind, record.target])).toEqual([
      ["composite", "Segment"],
      ["composite", "Point"],
    ]);
  });

  it("records a leaf event for every leaf a handle is mapped over", () => {
    hmap([1, 2, 3], func((n: number) => n + 1));
    expect(tracer.getSummary()).toEqual({ leaf: 3, composite: 0, register: 0 });
  });

  it("records the container path of every mapped leaf", () => {
    hmap([[1], [2, 3]], func((n: number) => n + 1));
    hmap([0, 1], line);

    expect(tracer.getAllRecords().map((record) => record.detail)).toEqual([
      "$[0][0]",
      "$[1][0]",
      "$[1][1]",
      "$[0]",
      "$[1]",
    ]);
  });

  it("records container paths from hmapPar in evaluation order", async () => {
    await hmapPar([[1, 2], [3]], func((n: number) => n), { concurrency: 1 });

    expect(tracer.getAllRecords().map((record) => record.detail)).toEqual([
      "$[1][0]",
      "$[0][1]",
      "$[0][0]",
    ]);
  });

  it("records no path for a direct call", () => {
    call(line, 0);
    expect(tracer.getAllRecords()).toEqual([
      { kind: "composite", target: "Point", detail: undefined, seq: 0 },
    ]);
  });

  it("records registrations", () => {
    defineHo<Vec2, Vec2F>({ name: "Vec2Traced", call: vec2.call });
    expect(tracer.getAllRecords()).toEqual([
      { kind: "register", target: "Vec2Traced", detail: undefined, seq: 0 },
    ]);
  });
});

describe("clearHoRegistry", () => {
  it("stops tagged variants from dispatching until re-registered", () => {
    clearHoRegistry();

    expect(listHo()).toEqual([]);
    expect(() => call(circle, 0)).toThrow(MissingAssociationError);
    expect(() => call(circle, 0)).toThrow(
      "No function type is associated with a function variant of unregistered type 'Point'",
    );

    defineHo<Vec2, Vec2F>(vec2);
    expect(listHo()).toEqual(["Vec2"]);
  });
});
