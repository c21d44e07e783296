/**
 * Core domain types for the transit route engine.
 *
 * - Network: stops joined by weighted one-way tracks (shared types)
 * - TransitGraph: the graphology graph the queries run against
 */

export * from "@transit-routes/types";
export * from "./graph.js";
