/**
 * Transit network model.
 *
 * The network is a directed graph of stops joined by one-way tracks. Each
 * ordered pair of stops has at most one track; redefining a track replaces
 * its weight.
 */

/**
 * Identifier of a stop. Opaque to the engine: the sample networks use single
 * letters, but any non-empty string without whitespace works.
 */
export type StopId = string;

/** Attributes stored on a graph edge */
export type TrackAttributes = {
  /** Non-negative integer distance along the track */
  weight: number;
};

/** A track as read from an edge list, before it is added to a graph */
export interface TrackDefinition extends TrackAttributes {
  from: StopId;
  to: StopId;
  /** 1-based line of the edge list the track was read from (if known) */
  line?: number;
}

/** Statistics about building a network from track definitions */
export interface NetworkBuildStats {
  /** Number of distinct stops */
  stopsCount: number;
  /** Number of distinct tracks after overwrites */
  tracksCount: number;
  /** Track definitions that replaced an earlier definition of the same pair */
  overwrittenTracks: number;
  /** Sum of all track weights */
  totalWeight: number;
  /** Time taken to build the graph in milliseconds */
  buildTimeMs: number;
}
