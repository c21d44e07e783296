/**
 * @transit-routes/routing
 *
 * A route query engine for small transit networks.
 *
 * Key concepts:
 * - Stop: a node of the network
 * - Track: a one-way weighted connection between two stops
 * - Route: a walk through the network
 * - Distance policy: how a route count measures its bound
 *
 * Pipeline:
 * 1. Ingest edge list -> TransitGraph
 * 2. Wrap graph in a RouteQueryEngine
 * 3. Ask for route lengths, bounded route counts, shortest routes
 */

// Domain types
export * from "./domain/index.js";
export * from "./errors.js";

// Modules
export * from "./ingestion/index.js";
export * from "./search/index.js";
export * from "./query/index.js";
