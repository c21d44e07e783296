/**
 * Route search module.
 *
 * Answers the three kinds of route question the query engine exposes:
 * - enumeration of every route within a stop or distance bound
 * - minimum-weight routes, including cycles back to the starting stop
 * - route text parsing and formatting
 */

export {
  enumerateRoutes,
  DEFAULT_ENUMERATION_OPTIONS,
  type EnumerationOptions,
} from "./route-enumerator.js";
export {
  enumerationConfigFor,
  isDistancePolicy,
  type EnumerationConfig,
} from "./distance-policy.js";
export {
  shortestPath,
  shortestCycleDistance,
  shortestRouteDistance,
} from "./shortest-route.js";
export { parseRouteText, formatRoute, routeKey } from "./route-text.js";
