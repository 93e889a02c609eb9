// ─── Config & search driver tests ──────────────────────────────────────────

import { describe, it, expect, vi, afterEach } from "vitest";
import {
  BoundedSearch,
  DEFAULT_CONFIG,
  InvalidConfigError,
  assertValidConfig,
  validateConfig,
} from "../src/engine/index";

afterEach(() => {
  vi.restoreAllMocks();
});

// ─── validateConfig ────────────────────────────────────────────────────────

describe("validateConfig", () => {
  it("accepts the default config", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ ok: true, issues: [] });
  });

  it("warns on duplicate candidates without failing", () => {
    expect(validateConfig({ candidates: [0, 1, 1], bound: 2, size: 2 })).toEqual({
      ok: true,
      issues: [{ level: "warning", message: "candidate 1 is listed more than once" }],
    });
  });

  it("warns on a negative bound", () => {
    const result = validateConfig({ candidates: [0, 1], bound: -1, size: 2 });
    expect(result.ok).toBe(true);
    expect(result.issues).toEqual([
      { level: "warning", message: "bound -1 is negative, no vector can satisfy it" },
    ]);
  });

  it("collects every error", () => {
    const result = validateConfig({ candidates: [], bound: 1.5, size: 0 });
    expect(result.ok).toBe(false);
    expect(result.issues.map((i) => i.message)).toEqual([
      "size must be a positive integer (got 0)",
      "candidates must not be empty",
      "bound must be an integer (got 1.5)",
    ]);
  });

  it("flags fractional and negative candidates", () => {
    const result = validateConfig({ candidates: [0.5, -2], bound: 3, size: 1 });
    expect(result.issues).toEqual([
      { level: "error", message: "candidate 0.5 is not an integer" },
      { level: "error", message: "candidate -2 is negative" },
    ]);
  });
});

describe("assertValidConfig", () => {
  it("throws only the errors, not the warnings", () => {
    try {
      assertValidConfig({ candidates: [1, 1, -1], bound: 2, size: 2 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidConfigError);
      if (err instanceof InvalidConfigError) {
        expect(err.name).toBe("InvalidConfigError");
        expect(err.issues).toEqual([{ level: "error", message: "candidate -1 is negative" }]);
      }
    }
  });
});

// ─── BoundedSearch ─────────────────────────────────────────────────────────

describe("BoundedSearch", () => {
  it("uses the default config when none is given", () => {
    const search = new BoundedSearch();
    expect(search.config).toEqual(DEFAULT_CONFIG);
    expect(search.count()).toBe(19441);
  });

  it("merges a partial config over the defaults", () => {
    const search = new BoundedSearch({ size: 1, bound: 2 });
    expect(search.collect()).toEqual([[0], [1], [2]]);
  });

  it("validates on construction", () => {
    expect(() => new BoundedSearch({ size: 0 })).toThrow(InvalidConfigError);
    expect(() => new BoundedSearch({ candidates: [] })).toThrow(InvalidConfigError);
  });

  it("does not hold on to the caller's candidate array", () => {
    const candidates = [0, 1];
    const search = new BoundedSearch({ candidates, bound: 1, size: 2 });
    candidates.push(5);
    expect(search.collect()).toEqual([
      [0, 0],
      [0, 1],
      [1, 0],
    ]);
  });

  it("take stops after the limit", () => {
    const search = new BoundedSearch({ candidates: [0, 1], bound: 1, size: 2 });
    expect(search.take(2)).toEqual([
      [0, 0],
      [0, 1],
    ]);
    expect(search.take(1)).toEqual([[0, 0]]);
    expect(search.lastStats).toEqual({ nodes: 2, prunes: 0, solutions: 1 });
  });

  it.each([0, -1, Number.NaN, 1.5, Number.POSITIVE_INFINITY])("take(%s) returns nothing", (limit) => {
    const search = new BoundedSearch({ candidates: [0, 1], bound: 1, size: 2 });
    expect(search.take(limit)).toEqual([]);
  });

  it("warns once on construction, not on every run", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const search = new BoundedSearch({ candidates: [0, 1], bound: -1, size: 2 });
    expect(search.collect()).toEqual([]);
    expect(search.count()).toBe(0);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("Search config: bound -1 is negative, no vector can satisfy it");
  });

  it("records stats for a full run", () => {
    const search = new BoundedSearch({ candidates: [0, 1], bound: 1, size: 2 });
    expect(search.count()).toBe(3);
    expect(search.lastStats).toEqual({ nodes: 6, prunes: 1, solutions: 3 });
  });

  it("each call runs a fresh search", () => {
    const search = new BoundedSearch({ candidates: [0, 1, 2], bound: 2, size: 3 });
    const first = search.collect();
    const second = search.collect();
    expect(first).toHaveLength(10);
    expect(second).toEqual(first);
  });

  it("yields nothing when no candidate fits", () => {
    const search = new BoundedSearch({ candidates: [5], bound: 4, size: 1 });
    expect(search.collect()).toEqual([]);
    expect(search.lastStats).toEqual({ nodes: 1, prunes: 1, solutions: 0 });
  });
});
