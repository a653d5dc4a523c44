import { InvalidStateError } from "../errors/index.js";
import type { DeploymentLifecycleState, DeploymentState, DeploymentTransition } from "./types.js";

interface TransitionRule {
  from: DeploymentLifecycleState[];
  to: DeploymentLifecycleState;
  rejection: string;
}

const RULES: Record<DeploymentTransition, TransitionRule> = {
  deploy: {
    from: ["NO_CANARY"],
    to: "CANARY_ACTIVE",
    rejection: "A canary is already active; roll it back or promote it first"
  },
  rollback: {
    from: ["CANARY_ACTIVE"],
    to: "NO_CANARY",
    rejection: "No active canary to rollback"
  },
  promote: {
    from: ["CANARY_ACTIVE"],
    to: "NO_CANARY",
    rejection: "No active canary to promote"
  }
};

export function assertTransitionAllowed(from: DeploymentLifecycleState, transition: DeploymentTransition): void {
  if (!RULES[transition].from.includes(from)) {
    throw new InvalidStateError(RULES[transition].rejection);
  }
}

export function targetState(
  from: DeploymentLifecycleState,
  transition: DeploymentTransition
): DeploymentLifecycleState {
  assertTransitionAllowed(from, transition);
  return RULES[transition].to;
}

export function transitionState(
  state: DeploymentState,
  transition: DeploymentTransition,
  patch: Partial<Omit<DeploymentState, "lifecycle">> = {}
): DeploymentState {
  const next: DeploymentState = {
    ...state,
    ...patch,
    lifecycle: targetState(state.lifecycle, transition)
  };

  if ((next.canary !== null) !== (next.lifecycle === "CANARY_ACTIVE")) {
    throw new Error(`Inconsistent deployment state after ${transition}: canary presence does not match ${next.lifecycle}`);
  }

  return Object.freeze(next);
}
