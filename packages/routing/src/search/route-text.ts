/**
 * Route text: the written form of a route.
 *
 * Single-character stops are written back to back (`ABC` is A → B → C).
 * Longer stop ids are separated by dashes (`North-Central-Harbor`).
 */

import type { Route, StopId } from "@transit-routes/types";
import { InvalidInputError } from "../errors.js";

const STOP_SEPARATOR = "-";

/**
 * Parse route text into its stops.
 *
 * @throws InvalidInputError for empty text, whitespace, or an empty
 *   dash-separated stop
 */
export function parseRouteText(text: string): StopId[] {
  if (text === "") {
    throw new InvalidInputError("Route text is empty");
  }
  if (/\s/u.test(text)) {
    throw new InvalidInputError(`Route text "${text}" contains whitespace`);
  }

  if (!text.includes(STOP_SEPARATOR)) {
    return Array.from(text);
  }

  const stops = text.split(STOP_SEPARATOR);
  if (stops.some((stop) => stop === "")) {
    throw new InvalidInputError(`Route text "${text}" has an empty stop`);
  }
  return stops;
}

/** Write a route as text; the inverse of parseRouteText for ids without dashes. */
export function formatRoute(route: Route): string {
  const singleCharacter = route.every((stop) => Array.from(stop).length === 1 && stop !== STOP_SEPARATOR);
  return route.join(singleCharacter ? "" : STOP_SEPARATOR);
}

/** Key identifying a route by its exact stop sequence. */
export function routeKey(route: Route): string {
  return JSON.stringify(route);
}
