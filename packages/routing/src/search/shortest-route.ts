/**
 * Minimum-weight routes between stops.
 *
 * Point-to-point distances come from graphology's Dijkstra. A route from a
 * stop back to itself must leave the stop, so that case is answered here:
 * the best first track plus the shortest way home from its far end.
 */

import { dijkstra } from "graphology-shortest-path";
import type { Route, StopId } from "@transit-routes/types";
import { outgoingTracks, routeWeight, type TransitGraph } from "../domain/graph.js";

/**
 * Stops of the minimum-weight route from `source` to `target`, or null when
 * the target cannot be reached. Between distinct stops only.
 */
export function shortestPath(graph: TransitGraph, source: StopId, target: StopId): Route | null {
  if (!graph.hasNode(source) || !graph.hasNode(target)) return null;
  const path: string[] | null = dijkstra.bidirectional(graph, source, target, "weight");
  return path;
}

/** Weight of the minimum-weight route between distinct stops. */
function shortestDistance(graph: TransitGraph, source: StopId, target: StopId): number | undefined {
  if (source === target) return 0;
  const path = shortestPath(graph, source, target);
  if (path === null) return undefined;
  return routeWeight(graph, path);
}

/**
 * Weight of the shortest cycle through `stop`, or undefined if the stop lies
 * on no cycle. A self-loop counts as a cycle of one track.
 */
export function shortestCycleDistance(graph: TransitGraph, stop: StopId): number | undefined {
  let best: number | undefined;
  for (const track of outgoingTracks(graph, stop)) {
    const home = shortestDistance(graph, track.to, stop);
    if (home === undefined) continue;
    const distance = track.weight + home;
    if (best === undefined || distance < best) {
      best = distance;
    }
  }
  return best;
}

/**
 * Weight of the minimum-weight route from `source` to `target`, or undefined
 * when there is none. When the stops are the same the route is a cycle, never
 * the empty route.
 */
export function shortestRouteDistance(
  graph: TransitGraph,
  source: StopId,
  target: StopId
): number | undefined {
  if (!graph.hasNode(source) || !graph.hasNode(target)) return undefined;
  if (source === target) return shortestCycleDistance(graph, source);
  return shortestDistance(graph, source, target);
}
