/**
 * Data ingestion module.
 *
 * Responsible for building the transit graph from an edge list.
 *
 * Pipeline:
 * Edge list file -> TrackDefinition[] -> TransitGraph
 */

import { readFile } from "node:fs/promises";
import { parseEdgeList } from "./edge-list/parser.js";
import { buildTransitGraph, type GraphBuildResult } from "./graph-builder.js";

export { parseEdgeList, parseTrackEntry } from "./edge-list/parser.js";
export {
  buildTransitGraph,
  type GraphBuildOptions,
  type GraphBuildResult,
} from "./graph-builder.js";

/** Options for edge list ingestion */
export interface EdgeListIngestionOptions {
  /** Path to the edge list file */
  path: string;
  /** File encoding (default utf-8) */
  encoding?: BufferEncoding;
  /** Suppress ingestion log lines */
  quiet?: boolean;
}

/**
 * Build a graph from edge list text.
 */
export function loadEdgeList(text: string, options: { quiet?: boolean } = {}): GraphBuildResult {
  return buildTransitGraph(parseEdgeList(text), options);
}

/**
 * Read an edge list file and build its graph.
 *
 * @param options - Ingestion options
 * @returns Graph and build statistics
 */
export async function ingestEdgeList(options: EdgeListIngestionOptions): Promise<GraphBuildResult> {
  const text = await readFile(options.path, { encoding: options.encoding ?? "utf-8" });
  const result = loadEdgeList(text, { quiet: options.quiet });

  if (!options.quiet) {
    console.log(
      `[ingest] ${options.path}: ${result.stats.tracksCount} tracks in ${result.stats.buildTimeMs}ms`
    );
  }

  return result;
}
