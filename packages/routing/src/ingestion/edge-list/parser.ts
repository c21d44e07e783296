/**
 * Edge list parser.
 *
 * Each entry is a track written as source stop, target stop and weight with
 * no separator, e.g. `AB5` for a track from A to B of weight 5. Stops are a
 * single character each, other than `-` and `,`; the weight is the rest of
 * the entry.
 *
 * Entries are separated by newlines, and a line may hold several entries
 * separated by commas (`AB5, BC4, CD8`). Blank lines are ignored.
 */

import type { TrackDefinition } from "@transit-routes/types";
import { InvalidInputError } from "../../errors.js";

// Stops exclude "," (entry separator) and "-" (route text separator)
const ENTRY_PATTERN = /^([^\s,-])([^\s,-])(\d+)$/u;

/**
 * Parse a single entry such as `AB5`.
 *
 * @param entry - Entry text without surrounding whitespace
 * @param line - 1-based line number, used in error messages
 */
export function parseTrackEntry(entry: string, line?: number): TrackDefinition {
  const match = ENTRY_PATTERN.exec(entry);
  if (!match) {
    throw new InvalidInputError(
      `Malformed track "${entry}": expected source stop, target stop and weight, e.g. "AB5"`,
      line,
    );
  }
  const [, from = "", to = "", digits = ""] = match;
  const weight = Number.parseInt(digits, 10);
  if (!Number.isSafeInteger(weight)) {
    throw new InvalidInputError(`Track weight out of range in "${entry}"`, line);
  }
  return line === undefined ? { from, to, weight } : { from, to, weight, line };
}

/**
 * Parse a whole edge list into track definitions, in file order.
 *
 * Duplicate tracks are returned as they appear; the graph builder decides
 * which one wins.
 */
export function parseEdgeList(text: string): TrackDefinition[] {
  const tracks: TrackDefinition[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((rawLine, index) => {
    const line = index + 1;
    if (rawLine.trim() === "") return;

    for (const rawEntry of rawLine.split(",")) {
      const entry = rawEntry.trim();
      if (entry === "") {
        throw new InvalidInputError("Empty track entry", line);
      }
      tracks.push(parseTrackEntry(entry, line));
    }
  });

  return tracks;
}
