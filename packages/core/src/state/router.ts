import type { ModelHandle } from "../models/types.js";
import type { RandomSource } from "../utils/random.js";
import type { DeploymentState, Variant } from "./types.js";

/** Share of requests sent to an active canary. Fixed; not configurable. */
export const CANARY_TRAFFIC_FRACTION = 0.1;

export interface RoutingDecision {
  variant: Variant;
  handle: ModelHandle;
  canaryFraction: number;
}

/**
 * One independent uniform draw per request while a canary is active; no
 * draw at all otherwise.
 */
export function chooseVariant(state: DeploymentState, random: RandomSource): RoutingDecision {
  if (!state.canary) {
    return { variant: "stable", handle: state.stable, canaryFraction: 0 };
  }

  const useCanary = random.next() < CANARY_TRAFFIC_FRACTION;
  return {
    variant: useCanary ? "canary" : "stable",
    handle: useCanary ? state.canary.handle : state.stable,
    canaryFraction: CANARY_TRAFFIC_FRACTION
  };
}
