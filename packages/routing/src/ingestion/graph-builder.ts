/**
 * Build a TransitGraph from track definitions.
 *
 * Stops are created on first reference. A second definition of the same
 * ordered pair replaces the first one's weight (last write wins); weights
 * are never added together.
 */

import type { NetworkBuildStats, TrackDefinition } from "@transit-routes/types";
import { createTransitGraph, trackWeight, type TransitGraph } from "../domain/graph.js";
import { InvalidInputError } from "../errors.js";

/** Options for building a graph */
export interface GraphBuildOptions {
  /** Suppress the build summary log line */
  quiet?: boolean;
}

/** Result of building a graph from track definitions */
export interface GraphBuildResult {
  graph: TransitGraph;
  stats: NetworkBuildStats;
}

/**
 * Build a graph from tracks.
 *
 * @param tracks - Track definitions, applied in order
 * @param options - Build options
 * @returns Graph and build statistics
 */
export function buildTransitGraph(
  tracks: Iterable<TrackDefinition>,
  options: GraphBuildOptions = {}
): GraphBuildResult {
  const startTime = Date.now();
  const graph = createTransitGraph();
  let overwrittenTracks = 0;

  for (const track of tracks) {
    if (track.from === "" || track.to === "") {
      throw new InvalidInputError("Track stops must be non-empty", track.line);
    }
    if (!Number.isSafeInteger(track.weight) || track.weight < 0) {
      throw new InvalidInputError(
        `Track ${track.from}→${track.to} has invalid weight ${track.weight}`,
        track.line,
      );
    }

    if (trackWeight(graph, track.from, track.to) !== undefined) {
      overwrittenTracks++;
    }
    graph.mergeEdge(track.from, track.to, { weight: track.weight });
  }

  let totalWeight = 0;
  graph.forEachEdge((_edge, attributes) => {
    totalWeight += attributes.weight;
  });

  const stats: NetworkBuildStats = {
    stopsCount: graph.order,
    tracksCount: graph.size,
    overwrittenTracks,
    totalWeight,
    buildTimeMs: Date.now() - startTime,
  };

  if (!options.quiet) {
    console.log(
      `[transit-graph] ${stats.stopsCount} stops, ${stats.tracksCount} tracks, ${overwrittenTracks} overwritten, total weight ${totalWeight}`
    );
  }

  return { graph, stats };
}
