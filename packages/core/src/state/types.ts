import type { ModelHandle } from "../models/types.js";

export type Variant = "stable" | "canary";

export type DeploymentLifecycleState = "NO_CANARY" | "CANARY_ACTIVE";

export type DeploymentTransition = "deploy" | "rollback" | "promote";

export interface CanaryDeployment {
  readonly handle: ModelHandle;
  readonly startedAt: string;
}

/**
 * Replaced wholesale on every transition, so a reference taken by a reader
 * stays internally consistent for as long as it is held.
 */
export interface DeploymentState {
  readonly lifecycle: DeploymentLifecycleState;
  readonly stable: ModelHandle;
  readonly canary: CanaryDeployment | null;
  readonly simulateSlowdown: boolean;
}

export interface CanaryDeployResult {
  path: string;
  version: string;
  startedAt: string;
}

export interface CanaryRollbackResult {
  rolledBack: string;
}

export interface CanaryPromoteResult {
  previousStable: string;
  newStable: string;
}
