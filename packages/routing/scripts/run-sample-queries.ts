/**
 * Run the standard queries against an edge list.
 *
 * Usage: npx tsx scripts/run-sample-queries.ts [edge-list-path]
 * Defaults to data/sample-network.txt.
 */

import { fileURLToPath } from "node:url";
import { dirname, resolve } from "node:path";
import {
  RouteQueryEngine,
  formatQueryResult,
  formatRoute,
  type RouteQueryResult,
} from "../src/index.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const DEFAULT_EDGE_LIST = resolve(__dirname, "../data/sample-network.txt");

async function main(): Promise<void> {
  const path = process.argv[2] ?? DEFAULT_EDGE_LIST;
  const engine = await RouteQueryEngine.fromFile(path);
  console.log("");

  const outputs: (RouteQueryResult | number)[] = [
    engine.routeLength("ABC"),
    engine.routeLength("AD"),
    engine.routeLength("ADC"),
    engine.routeLength("AEBCD"),
    engine.routeLength("AED"),
    engine.countRoutes("C", "C", 3, "max-stops"),
    engine.countRoutes("A", "C", 4, "exact-stops"),
    engine.shortestRoute("A", "C"),
    engine.shortestRoute("B", "B"),
    engine.countRoutes("C", "C", 30 - 1, "max-distance"),
  ];

  outputs.forEach((output, index) => {
    const text = typeof output === "number" ? String(output) : formatQueryResult(output);
    console.log(`Output #${index + 1}: ${text}`);
  });

  console.log("");
  console.log("Routes behind output #6:");
  for (const route of engine.findRoutes("C", "C", 3, "max-stops")) {
    console.log(`  ${formatRoute(route)}`);
  }
}

main().catch((error: unknown) => {
  console.error("Queries failed:", error);
  process.exit(1);
});
