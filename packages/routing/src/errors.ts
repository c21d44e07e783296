/**
 * Errors raised by the route engine.
 *
 * A route that does not exist is not an error: queries report it through
 * `RouteQueryResult`. These classes cover input that cannot be answered at all.
 */

/** Malformed edge lists, route text, bounds or distance policies */
export class InvalidInputError extends Error {
  /** 1-based line of the offending input, when it came from a file */
  readonly line?: number;

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `line ${line}: ${message}`);
    this.name = "InvalidInputError";
    this.line = line;
  }
}

/** Route enumeration produced more routes than the configured limit */
export class RouteLimitExceededError extends Error {
  readonly limit: number;

  constructor(limit: number) {
    super(`Route enumeration exceeded ${limit} routes. Lower the bound or raise maxRoutes.`);
    this.name = "RouteLimitExceededError";
    this.limit = limit;
  }
}
