import { describe, it, expect } from "vitest";
import { DEFAULT_ENUMERATION_OPTIONS, enumerateRoutes } from "./route-enumerator.js";
import type { EnumerationConfig } from "./distance-policy.js";
import { loadEdgeList } from "../ingestion/index.js";
import { InvalidInputError, RouteLimitExceededError } from "../errors.js";

const SAMPLE_EDGE_LIST = "AB5, BC4, CD8, DC8, DE6, AD5, CE2, EB3, AE7";

const MAX_STOPS: EnumerationConfig = { cumulative: true, weighted: false };
const EXACT_STOPS: EnumerationConfig = { cumulative: false, weighted: false };
const MAX_DISTANCE: EnumerationConfig = { cumulative: true, weighted: true };

function graphOf(edgeList: string) {
  return loadEdgeList(edgeList, { quiet: true }).graph;
}

const sample = graphOf(SAMPLE_EDGE_LIST);

describe("enumerateRoutes", () => {
  it("keeps every route within a stop bound", () => {
    expect(enumerateRoutes(sample, "A", 1, MAX_STOPS)).toEqual([
      ["A", "B"],
      ["A", "D"],
      ["A", "E"],
    ]);
  });

  it("keeps only routes using the exact stop bound", () => {
    expect(enumerateRoutes(sample, "A", 2, EXACT_STOPS)).toEqual([
      ["A", "B", "C"],
      ["A", "D", "C"],
      ["A", "D", "E"],
      ["A", "E", "B"],
    ]);
  });

  it("includes shorter routes when cumulative", () => {
    expect(enumerateRoutes(sample, "B", 2, MAX_STOPS)).toEqual([
      ["B", "C"],
      ["B", "C", "D"],
      ["B", "C", "E"],
    ]);
  });

  it("consumes track weights when weighted", () => {
    expect(enumerateRoutes(sample, "A", 5, MAX_DISTANCE)).toEqual([
      ["A", "B"],
      ["A", "D"],
    ]);
  });

  it("follows cycles back to the source", () => {
    const routes = enumerateRoutes(sample, "C", 3, MAX_STOPS);
    const cycles = routes.filter((route) => route[route.length - 1] === "C");
    expect(cycles).toEqual([
      ["C", "D", "C"],
      ["C", "E", "B", "C"],
    ]);
  });

  it("finds every cycle under a distance bound", () => {
    const routes = enumerateRoutes(sample, "C", 29, MAX_DISTANCE);
    const cycles = routes.filter((route) => route[route.length - 1] === "C").map((r) => r.join(""));
    expect(cycles.sort()).toEqual([
      "CDC",
      "CDCEBC",
      "CDEBC",
      "CEBC",
      "CEBCDC",
      "CEBCEBC",
      "CEBCEBCEBC",
    ]);
  });

  it("returns nothing for a zero bound", () => {
    expect(enumerateRoutes(sample, "A", 0, MAX_STOPS)).toEqual([]);
    expect(enumerateRoutes(sample, "A", 0, EXACT_STOPS)).toEqual([]);
  });

  it("returns nothing from a stop without tracks", () => {
    const graph = graphOf("AB1");
    expect(enumerateRoutes(graph, "B", 3, MAX_STOPS)).toEqual([]);
    expect(enumerateRoutes(graph, "B", 3, EXACT_STOPS)).toEqual([]);
  });

  it("returns nothing from an unknown stop", () => {
    expect(enumerateRoutes(sample, "Z", 3, MAX_STOPS)).toEqual([]);
  });

  it("returns nothing when no route uses the exact bound", () => {
    expect(enumerateRoutes(graphOf("AB1"), "A", 2, EXACT_STOPS)).toEqual([]);
  });

  it("follows self-loops", () => {
    expect(enumerateRoutes(graphOf("AA2"), "A", 2, EXACT_STOPS)).toEqual([["A", "A", "A"]]);
  });

  it("never returns a single-stop route", () => {
    for (const config of [MAX_STOPS, EXACT_STOPS, MAX_DISTANCE]) {
      for (let bound = 0; bound <= 12; bound++) {
        for (const route of enumerateRoutes(sample, "A", bound, config)) {
          expect(route.length).toBeGreaterThan(1);
        }
      }
    }
  });

  it("returns each route once", () => {
    const routes = enumerateRoutes(sample, "A", 30, MAX_DISTANCE);
    const keys = new Set(routes.map((route) => route.join("")));
    expect(keys.size).toBe(routes.length);
  });

  it("allows zero-weight tracks when counting stops", () => {
    expect(enumerateRoutes(graphOf("AB0, BA0"), "A", 2, MAX_STOPS)).toEqual([
      ["A", "B"],
      ["A", "B", "A"],
    ]);
  });

  it("follows zero-weight tracks that lie on no cycle when counting distance", () => {
    expect(enumerateRoutes(graphOf("AB0, BC3"), "A", 3, MAX_DISTANCE)).toEqual([
      ["A", "B"],
      ["A", "B", "C"],
    ]);
  });

  it("follows a zero-weight track back to a stop reached at a different budget", () => {
    expect(enumerateRoutes(graphOf("AB1, BA0"), "A", 2, MAX_DISTANCE)).toEqual([
      ["A", "B"],
      ["A", "B", "A"],
      ["A", "B", "A", "B"],
    ]);
  });

  it("rejects zero-weight cycles when counting distance", () => {
    expect(() => enumerateRoutes(graphOf("AB0, BA0"), "A", 3, MAX_DISTANCE)).toThrow(
      "Zero-weight cycle through A; routes cannot be bounded by distance",
    );
    expect(() => enumerateRoutes(graphOf("AA0"), "A", 1, MAX_DISTANCE)).toThrow(
      InvalidInputError,
    );
  });

  it("rejects a negative or fractional bound", () => {
    expect(() => enumerateRoutes(sample, "A", -1, MAX_STOPS)).toThrow(
      "Bound must be a non-negative integer, got -1",
    );
    expect(() => enumerateRoutes(sample, "A", 2.5, MAX_STOPS)).toThrow(InvalidInputError);
  });

  it("has no route limit unless one is given", () => {
    expect(DEFAULT_ENUMERATION_OPTIONS.maxRoutes).toBe(Number.POSITIVE_INFINITY);
    expect(enumerateRoutes(sample, "C", 6, MAX_STOPS).length).toBeGreaterThan(2);
  });

  it("stops at the route limit", () => {
    expect(() => enumerateRoutes(sample, "C", 3, MAX_STOPS, { maxRoutes: 2 })).toThrow(
      RouteLimitExceededError,
    );
  });

  it("handles bounds deeper than a recursive walk could", () => {
    const routes = enumerateRoutes(graphOf("AA1"), "A", 5_000, EXACT_STOPS);
    expect(routes).toHaveLength(1);
    expect(routes[0]).toHaveLength(5_001);
  });
});
