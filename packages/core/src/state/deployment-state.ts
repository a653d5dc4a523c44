import type { Logger } from "pino";
import type { LatencyRecorder } from "../metrics/latency-recorder.js";
import type { ModelRegistry } from "../models/registry.js";
import type { ModelHandle } from "../models/types.js";
import { Mutex } from "../utils/mutex.js";
import { assertTransitionAllowed, transitionState } from "./machine.js";
import type {
  CanaryDeployment,
  CanaryDeployResult,
  CanaryPromoteResult,
  CanaryRollbackResult,
  DeploymentLifecycleState,
  DeploymentState
} from "./types.js";

export interface DeploymentStateMachineOptions {
  logger?: Logger;
  now?: () => Date;
}

/**
 * Owns the stable/canary model references. Transitions are serialised by a
 * single state lock that stays held across the model load, so racing admin
 * calls are applied one at a time and the loser sees the winner's state.
 */
export class DeploymentStateMachine {
  private state: DeploymentState;
  private readonly lock = new Mutex();
  private readonly logger: Logger | undefined;
  private readonly now: () => Date;

  constructor(
    private readonly registry: ModelRegistry,
    private readonly recorder: LatencyRecorder,
    stable: ModelHandle,
    options: DeploymentStateMachineOptions = {}
  ) {
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.state = Object.freeze({
      lifecycle: "NO_CANARY",
      stable,
      canary: null,
      simulateSlowdown: false
    });
  }

  static async create(
    registry: ModelRegistry,
    recorder: LatencyRecorder,
    stablePath: string,
    options: DeploymentStateMachineOptions = {}
  ): Promise<DeploymentStateMachine> {
    const stable = await registry.load(stablePath);
    return new DeploymentStateMachine(registry, recorder, stable, options);
  }

  /** Never blocks on the state lock; the returned object is frozen. */
  snapshot(): DeploymentState {
    return this.state;
  }

  get lifecycle(): DeploymentLifecycleState {
    return this.state.lifecycle;
  }

  async deployCanary(path: string): Promise<CanaryDeployResult> {
    return this.lock.runExclusive(async () => {
      this.guard("deploy");
      const handle = await this.registry.load(path);
      const startedAt = this.now().toISOString();

      this.state = transitionState(this.state, "deploy", { canary: { handle, startedAt } });
      this.recorder.resetAll();

      this.logger?.info({ path, version: handle.version, startedAt }, "canary deployed");
      return { path, version: handle.version, startedAt };
    });
  }

  async rollbackCanary(): Promise<CanaryRollbackResult> {
    return this.lock.runExclusive(() => {
      const rolledBack = this.activeCanary("rollback").handle.path;
      this.state = transitionState(this.state, "rollback", { canary: null });

      this.logger?.info({ path: rolledBack }, "canary rolled back");
      return { rolledBack };
    });
  }

  async promoteCanary(): Promise<CanaryPromoteResult> {
    return this.lock.runExclusive(() => {
      const canary = this.activeCanary("promote");
      const previous = this.state.stable;

      this.state = transitionState(this.state, "promote", { stable: canary.handle, canary: null });

      this.logger?.info({ previousStable: previous.path, newStable: canary.handle.path }, "canary promoted");
      return { previousStable: previous.path, newStable: canary.handle.path };
    });
  }

  async toggleSlowdown(): Promise<boolean> {
    return this.lock.runExclusive(() => {
      // Allowed in either lifecycle state; only the flag changes.
      this.state = Object.freeze({ ...this.state, simulateSlowdown: !this.state.simulateSlowdown });
      this.logger?.info({ simulateSlowdown: this.state.simulateSlowdown }, "slowdown simulation toggled");
      return this.state.simulateSlowdown;
    });
  }

  private activeCanary(transition: "rollback" | "promote"): CanaryDeployment {
    this.guard(transition);
    const canary = this.state.canary;
    if (!canary) {
      throw new Error(`Canary missing in ${this.state.lifecycle} state`);
    }
    return canary;
  }

  private guard(transition: "deploy" | "rollback" | "promote"): void {
    try {
      assertTransitionAllowed(this.state.lifecycle, transition);
    } catch (error) {
      this.logger?.warn({ transition, lifecycle: this.state.lifecycle }, "transition rejected");
      throw error;
    }
  }
}
