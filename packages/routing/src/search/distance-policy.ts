/**
 * Distance policies for route counting.
 *
 * Each policy maps to an enumeration config, so the enumerator itself never
 * sees a policy.
 */

import { DISTANCE_POLICIES, type DistancePolicy } from "@transit-routes/types";
import { InvalidInputError } from "../errors.js";

/** How route enumeration consumes and checks its bound */
export interface EnumerationConfig {
  /** Keep every route within the bound, not only those that use it exactly */
  cumulative: boolean;
  /** Each track consumes its weight instead of one stop */
  weighted: boolean;
}

const POLICY_CONFIGS: Record<DistancePolicy, EnumerationConfig> = {
  "max-stops": { cumulative: true, weighted: false },
  "exact-stops": { cumulative: false, weighted: false },
  "max-distance": { cumulative: true, weighted: true },
};

export function isDistancePolicy(value: unknown): value is DistancePolicy {
  return DISTANCE_POLICIES.some((policy) => policy === value);
}

/**
 * Enumeration config for a distance policy.
 *
 * @throws InvalidInputError for a value that is not a DistancePolicy
 */
export function enumerationConfigFor(policy: DistancePolicy): EnumerationConfig {
  if (!isDistancePolicy(policy)) {
    throw new InvalidInputError(`Unknown distance policy: ${String(policy)}`);
  }
  return POLICY_CONFIGS[policy];
}
