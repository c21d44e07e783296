/**
 * @transit-routes/types
 *
 * Shared domain types for the transit route engine.
 *
 * - Network: stops joined by weighted one-way tracks
 * - Route: a walk through the network, and the results of route queries
 */

export * from "./network.js";
export * from "./route.js";
