/**
 * Transit graph backed by graphology.
 *
 * Stops are graph nodes keyed by their id; tracks are directed edges carrying
 * a `weight` attribute. The graph is simple (no parallel edges), so each
 * ordered pair of stops has at most one track.
 */

import Graph from "graphology";
import type { Attributes } from "graphology-types";
import type { Route, StopId, TrackAttributes } from "@transit-routes/types";

export type TransitGraph = Graph<Attributes, TrackAttributes>;

/** A track leaving a stop */
export interface OutgoingTrack {
  to: StopId;
  weight: number;
}

/** Create an empty directed transit graph */
export function createTransitGraph(): TransitGraph {
  return new Graph<Attributes, TrackAttributes>({
    type: "directed",
    multi: false,
    allowSelfLoops: true,
  });
}

/** Weight of the track `from → to`, or undefined if there is none. */
export function trackWeight(graph: TransitGraph, from: StopId, to: StopId): number | undefined {
  if (!graph.hasNode(from) || !graph.hasNode(to)) return undefined;
  const edge = graph.edge(from, to);
  if (edge === undefined) return undefined;
  return graph.getEdgeAttribute(edge, "weight");
}

/** Tracks leaving `stop`, in graph order. Unknown stops have none. */
export function outgoingTracks(graph: TransitGraph, stop: StopId): OutgoingTrack[] {
  const tracks: OutgoingTrack[] = [];
  if (!graph.hasNode(stop)) return tracks;
  graph.forEachOutEdge(stop, (_edge, attributes, _source, target) => {
    tracks.push({ to: target, weight: attributes.weight });
  });
  return tracks;
}

/**
 * Total weight along a route.
 *
 * Returns undefined as soon as two consecutive stops are not joined by a
 * track, and for routes of fewer than two stops.
 */
export function routeWeight(graph: TransitGraph, route: Route): number | undefined {
  if (route.length < 2) return undefined;
  let total = 0;
  let previous: StopId | undefined;
  for (const stop of route) {
    if (previous !== undefined) {
      const weight = trackWeight(graph, previous, stop);
      if (weight === undefined) return undefined;
      total += weight;
    }
    previous = stop;
  }
  return total;
}
