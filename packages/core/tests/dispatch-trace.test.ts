/**
 * Tests for dispatch tracing
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { config } from "../src/config.js";
import {
  DispatchTracer,
  formatTrace,
  getGlobalTracer,
  printTrace,
  resetGlobalTracer,
} from "../src/dispatch-trace.js";

describe("DispatchTracer", () => {
  it("ignores records while disabled", () => {
    const tracer = new DispatchTracer(false);
    tracer.record("leaf", "handle");

    expect(tracer.isEnabled()).toBe(false);
    expect(tracer.getAllRecords()).toEqual([]);
  });

  it("numbers records in order", () => {
    const tracer = new DispatchTracer(true);
    tracer.record("register", "Point");
    tracer.record("composite", "Point", "$[0]");

    expect(tracer.getAllRecords()).toEqual([
      { kind: "register", target: "Point", detail: undefined, seq: 0 },
      { kind: "composite", target: "Point", detail: "$[0]", seq: 1 },
    ]);
  });

  it("summarizes records per kind", () => {
    const tracer = new DispatchTracer(true);
    tracer.record("leaf", "handle");
    tracer.record("leaf", "handle");
    tracer.record("composite", "Point");

    expect(tracer.getSummary()).toEqual({ leaf: 2, composite: 1, register: 0 });
  });

  it("restarts numbering after clear", () => {
    const tracer = new DispatchTracer(true);
    tracer.record("leaf", "handle");
    tracer.clear();
    tracer.record("composite", "Segment");

    expect(tracer.getAllRecords().map((record) => record.seq)).toEqual([0]);
  });

  it("can be toggled", () => {
    const tracer = new DispatchTracer(false);
    tracer.enable();
    tracer.record("leaf", "handle");
    tracer.disable();
    tracer.record("leaf", "handle");

    expect(tracer.getAllRecords()).toHaveLength(1);
  });
});

describe("formatTrace", () => {
  it("reports an empty trace", () => {
    expect(formatTrace([])).toEqual(["no dispatches recorded"]);
  });

  it("renders one line per record", () => {
    expect(
      formatTrace([
        { kind: "register", target: "Point", seq: 0 },
        { kind: "composite", target: "Point", detail: "$[1]", seq: 1 },
      ]),
    ).toEqual(["  0. [register] Point", "  1. [composite] Point ($[1])"]);
  });
});

describe("printTrace", () => {
  it("writes each formatted line", () => {
    const tracer = new DispatchTracer(true);
    tracer.record("leaf", "handle");
    const lines: string[] = [];

    printTrace(tracer, (line) => lines.push(line));

    expect(lines).toEqual(["  0. [leaf] handle"]);
  });
});

describe("global tracer", () => {
  afterEach(() => {
    config.reset();
    resetGlobalTracer();
  });

  it("is shared until reset", () => {
    expect(getGlobalTracer()).toBe(getGlobalTracer());
  });

  it("starts enabled when trace is configured", () => {
    resetGlobalTracer();
    config.set({ trace: true });

    expect(getGlobalTracer().isEnabled()).toBe(true);
  });

  it("starts disabled instead of throwing when trace is misconfigured", () => {
    const saved = process.env.HODATA_TRACE;
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    process.env.HODATA_TRACE = "on";
    config.reset();
    resetGlobalTracer();

    try {
      expect(getGlobalTracer().isEnabled()).toBe(false);
      expect(new DispatchTracer().isEnabled()).toBe(false);
      expect(warn).toHaveBeenCalledTimes(1);
    } finally {
      if (saved === undefined) {
        delete process.env.HODATA_TRACE;
      } else {
        process.env.HODATA_TRACE = saved;
      }
      warn.mockRestore();
    }
  });
});
