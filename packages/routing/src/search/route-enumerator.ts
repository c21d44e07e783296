/**
 * Exhaustive bounded route enumeration.
 *
 * Walks every route from a source stop whose consumption fits within a bound.
 * A track consumes one unit (counting stops) or its weight (counting
 * distance). Cycles are followed like any other track, which is what lets a
 * route return to its source.
 *
 * The walk is depth-first over an explicit stack rather than recursion, so a
 * large bound grows the heap, not the call stack. Every frame has strictly
 * less budget than the frame that pushed it, so the walk terminates.
 */

import type { Route, StopId } from "@transit-routes/types";
import { outgoingTracks, type TransitGraph } from "../domain/graph.js";
import { InvalidInputError, RouteLimitExceededError } from "../errors.js";
import type { EnumerationConfig } from "./distance-policy.js";
import { routeKey } from "./route-text.js";

/** Options for route enumeration */
export interface EnumerationOptions {
  /** Fail once more than this many routes have been found */
  maxRoutes?: number;
}

/** Default enumeration options */
export const DEFAULT_ENUMERATION_OPTIONS: Required<EnumerationOptions> = {
  maxRoutes: Number.POSITIVE_INFINITY,
};

/** Pending work: a route ending at `stop` with `remaining` budget left */
interface Frame {
  stop: StopId;
  remaining: number;
  route: StopId[];
  /** Stops reached since the route last consumed budget, ending at `stop` */
  zeroTail: StopId[];
}

/**
 * Find every distinct route from `source` within `bound`.
 *
 * With `cumulative` set, a route is kept whenever its consumption is at most
 * the bound; otherwise only when the consumption is exactly the bound.
 * Single-stop routes are never kept. Routes come back in depth-first order,
 * successors in graph order.
 *
 * @throws InvalidInputError if the bound is not a non-negative integer, or a
 *   cycle of zero-weight tracks is met while counting distance
 * @throws RouteLimitExceededError if more than `maxRoutes` routes are found
 */
export function enumerateRoutes(
  graph: TransitGraph,
  source: StopId,
  bound: number,
  config: EnumerationConfig,
  options: EnumerationOptions = {}
): Route[] {
  if (!Number.isSafeInteger(bound) || bound < 0) {
    throw new InvalidInputError(`Bound must be a non-negative integer, got ${bound}`);
  }
  const { maxRoutes } = { ...DEFAULT_ENUMERATION_OPTIONS, ...options };

  const found = new Map<string, Route>();
  const stack: Frame[] = [
    { stop: source, remaining: bound, route: [source], zeroTail: [source] },
  ];

  function keep(route: Route): void {
    if (route.length < 2) return;
    const key = routeKey(route);
    if (found.has(key)) return;
    if (found.size >= maxRoutes) {
      throw new RouteLimitExceededError(maxRoutes);
    }
    found.set(key, route);
  }

  let frame = stack.pop();
  while (frame !== undefined) {
    if (frame.remaining === 0 || config.cumulative) {
      keep(frame.route);
    }

    if (frame.remaining > 0) {
      // Push in reverse so successors are expanded in graph order
      const tracks = outgoingTracks(graph, frame.stop);
      for (let i = tracks.length - 1; i >= 0; i--) {
        const track = tracks[i];
        if (track === undefined) continue;

        const consumption = config.weighted ? track.weight : 1;
        if (consumption > frame.remaining) continue;

        // A zero-weight cycle would never use up the bound
        if (consumption === 0 && frame.zeroTail.includes(track.to)) {
          throw new InvalidInputError(
            `Zero-weight cycle through ${track.to}; routes cannot be bounded by distance`
          );
        }

        stack.push({
          stop: track.to,
          remaining: frame.remaining - consumption,
          route: [...frame.route, track.to],
          zeroTail: consumption === 0 ? [...frame.zeroTail, track.to] : [track.to],
        });
      }
    }

    frame = stack.pop();
  }

  return [...found.values()];
}
