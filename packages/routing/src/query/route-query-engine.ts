/**
 * Route query engine: route lengths, bounded route counts, shortest routes.
 *
 * Wraps a built TransitGraph and answers queries against it. A route that
 * does not exist is reported as `{ found: false }`; malformed input throws
 * InvalidInputError.
 */

import type {
  DistancePolicy,
  Route,
  RouteQueryResult,
  StopId,
} from "@transit-routes/types";
import { NO_SUCH_ROUTE } from "@transit-routes/types";
import { routeWeight, type TransitGraph } from "../domain/graph.js";
import { ingestEdgeList, loadEdgeList } from "../ingestion/index.js";
import { enumerationConfigFor } from "../search/distance-policy.js";
import { enumerateRoutes } from "../search/route-enumerator.js";
import { parseRouteText } from "../search/route-text.js";
import { shortestRouteDistance } from "../search/shortest-route.js";

/** Options for the query engine */
export interface RouteQueryOptions {
  /** Fail a route count once more than this many routes have been found (no limit by default) */
  maxRoutes?: number;
  /** Suppress log lines while loading networks */
  quiet?: boolean;
}

/** Default query engine options */
export const DEFAULT_ROUTE_QUERY_OPTIONS: Required<RouteQueryOptions> = {
  maxRoutes: Number.POSITIVE_INFINITY,
  quiet: false,
};

function toResult(value: number | undefined): RouteQueryResult {
  return value === undefined ? { found: false } : { found: true, value };
}

/** Display form of a query result: the value, or "NO SUCH ROUTE". */
export function formatQueryResult(result: RouteQueryResult): string {
  return result.found ? String(result.value) : NO_SUCH_ROUTE;
}

export class RouteQueryEngine {
  private readonly options: Required<RouteQueryOptions>;

  constructor(
    private readonly graph: TransitGraph,
    options: RouteQueryOptions = {},
  ) {
    this.options = { ...DEFAULT_ROUTE_QUERY_OPTIONS, ...options };
  }

  /** Engine over the network described by edge list text. */
  static fromEdgeList(text: string, options: RouteQueryOptions = {}): RouteQueryEngine {
    const { graph } = loadEdgeList(text, { quiet: options.quiet });
    return new RouteQueryEngine(graph, options);
  }

  /** Engine over the network described by an edge list file. */
  static async fromFile(path: string, options: RouteQueryOptions = {}): Promise<RouteQueryEngine> {
    const { graph } = await ingestEdgeList({ path, quiet: options.quiet });
    return new RouteQueryEngine(graph, options);
  }

  /** Stops of the network, in the order they were first referenced. */
  stops(): StopId[] {
    return this.graph.nodes();
  }

  trackCount(): number {
    return this.graph.size;
  }

  /**
   * Total weight of a fully specified route.
   *
   * @param route - Route text such as `"ABC"`, or its stops
   * @returns The summed weight, or not found if any consecutive pair of stops
   *   has no track or the route has fewer than two stops
   * @throws InvalidInputError for malformed route text
   */
  routeLength(route: string | Route): RouteQueryResult {
    const stops = typeof route === "string" ? parseRouteText(route) : route;
    return toResult(routeWeight(this.graph, stops));
  }

  /**
   * Every distinct route from `source` to `target` within `bound`, measured
   * by `policy`.
   *
   * @throws InvalidInputError for an unknown policy or a bad bound
   * @throws RouteLimitExceededError when the search outgrows `maxRoutes`
   */
  findRoutes(source: StopId, target: StopId, bound: number, policy: DistancePolicy): Route[] {
    const config = enumerationConfigFor(policy);
    const routes = enumerateRoutes(this.graph, source, bound, config, {
      maxRoutes: this.options.maxRoutes,
    });
    return routes.filter((route) => route[route.length - 1] === target);
  }

  /** Number of distinct routes from `source` to `target` within `bound`. */
  countRoutes(source: StopId, target: StopId, bound: number, policy: DistancePolicy): number {
    return this.findRoutes(source, target, bound, policy).length;
  }

  /**
   * Weight of the minimum-weight route from `source` to `target`. When the
   * stops are the same the route must leave and come back.
   */
  shortestRoute(source: StopId, target: StopId): RouteQueryResult {
    return toResult(shortestRouteDistance(this.graph, source, target));
  }
}
