/**
 * Routes and query results.
 *
 * A route is a walk through the network. Queries either produce a value or
 * report that no such route exists; the latter is an ordinary outcome, not an
 * error.
 */

import type { StopId } from "./network.js";

/** Ordered stops of a walk; consecutive stops are joined by a track */
export type Route = readonly StopId[];

/**
 * How the bound of a route count is measured.
 *
 * - `max-stops`: at most `bound` stops (tracks traversed)
 * - `exact-stops`: exactly `bound` stops
 * - `max-distance`: total track weight of at most `bound`
 */
export type DistancePolicy = "max-stops" | "exact-stops" | "max-distance";

export const DISTANCE_POLICIES: readonly DistancePolicy[] = [
  "max-stops",
  "exact-stops",
  "max-distance",
];

/** A query that found a route */
export interface RouteFound {
  found: true;
  /** Total weight of the route */
  value: number;
}

/** A query whose route does not exist in the network */
export interface NoSuchRoute {
  found: false;
}

export type RouteQueryResult = RouteFound | NoSuchRoute;

/** Display form of a missing route */
export const NO_SUCH_ROUTE = "NO SUCH ROUTE";
