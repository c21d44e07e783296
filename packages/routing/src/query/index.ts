/**
 * Query module: the public face of the route engine.
 */

export {
  RouteQueryEngine,
  formatQueryResult,
  DEFAULT_ROUTE_QUERY_OPTIONS,
  type RouteQueryOptions,
} from "./route-query-engine.js";
