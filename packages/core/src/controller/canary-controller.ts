import type { Logger } from "pino";
import { DEFAULT_INFERENCE_WORKERS, type InferenceConfig, type ServiceConfig } from "../config/schema.js";
import type { HealthCheckedEvent } from "../contracts/events.js";
import { DeploymentEventBus } from "../events/event-bus.js";
import { InlineInferenceExecutor, type InferenceExecutor } from "../inference/executor.js";
import { PredictionPipeline, type PredictionResult } from "../inference/pipeline.js";
import { WorkerInferencePool } from "../inference/worker-pool.js";
import { LatencyRecorder } from "../metrics/latency-recorder.js";
import { ModelRegistry } from "../models/registry.js";
import { DeploymentStateMachine } from "../state/deployment-state.js";
import { CANARY_TRAFFIC_FRACTION } from "../state/router.js";
import type {
  CanaryDeployResult,
  CanaryPromoteResult,
  CanaryRollbackResult,
  DeploymentLifecycleState,
  Variant
} from "../state/types.js";
import {
  MIN_SAMPLES_PER_VARIANT,
  RECOMMENDED_SAMPLES_PER_GROUP,
  evaluateHealth,
  type HealthCheckResult
} from "../statistics/health.js";
import type { Clock } from "../utils/clock.js";
import type { RandomSource } from "../utils/random.js";

export interface CanaryControllerOptions {
  stableModelPath: string;
  /** Without it (and without `executor`) inference runs inline. */
  inference?: Partial<InferenceConfig>;
  registry?: ModelRegistry;
  recorder?: LatencyRecorder;
  /** Overrides the executor `inference` would build. */
  executor?: InferenceExecutor;
  eventBus?: DeploymentEventBus;
  random?: RandomSource;
  clock?: Clock;
  now?: () => Date;
  logger?: Logger;
}

export interface ControllerStatus {
  lifecycle: DeploymentLifecycleState;
  stable: { path: string; version: string };
  canary: { path: string; version: string; startedAt: string } | null;
  canaryActive: boolean;
  simulateSlowdown: boolean;
  canaryTrafficFraction: number;
  samples: Record<Variant, number>;
  minSamplesPerVariant: number;
  recommendedSamplesPerGroup: number;
}

/**
 * Operational surface of the canary rollout: predictions, lifecycle
 * transitions and the latency health check, wired over one state machine and
 * one latency recorder.
 */
export class CanaryController {
  private constructor(
    private readonly state: DeploymentStateMachine,
    private readonly recorder: LatencyRecorder,
    private readonly pipeline: PredictionPipeline,
    private readonly executor: InferenceExecutor,
    private readonly bus: DeploymentEventBus,
    private readonly logger: Logger | undefined
  ) {}

  static async create(options: CanaryControllerOptions): Promise<CanaryController> {
    const logger = options.logger;
    const registry = options.registry ?? new ModelRegistry(logger);
    const recorder = options.recorder ?? new LatencyRecorder();

    const state = await DeploymentStateMachine.create(registry, recorder, options.stableModelPath, {
      ...(logger ? { logger } : {}),
      ...(options.now ? { now: options.now } : {})
    });

    const executor =
      options.executor ??
      (options.inference ? createExecutor(options.inference, logger) : new InlineInferenceExecutor());
    const pipeline = new PredictionPipeline(state, recorder, executor, {
      ...(options.random ? { random: options.random } : {}),
      ...(options.clock ? { clock: options.clock } : {}),
      ...(logger ? { logger } : {})
    });

    return new CanaryController(
      state,
      recorder,
      pipeline,
      executor,
      options.eventBus ?? new DeploymentEventBus(),
      logger
    );
  }

  static async fromConfig(
    config: ServiceConfig,
    overrides: Omit<CanaryControllerOptions, "stableModelPath" | "inference"> = {}
  ): Promise<CanaryController> {
    return CanaryController.create({
      ...overrides,
      stableModelPath: config.service.stable_model,
      inference: config.inference
    });
  }

  get eventBus(): DeploymentEventBus {
    return this.bus;
  }

  predict(features: unknown): Promise<PredictionResult> {
    return this.pipeline.predict(features);
  }

  async deployCanary(path: string): Promise<CanaryDeployResult> {
    const result = await this.state.deployCanary(path);
    this.bus.emitEvent("canary_deployed", {
      model_path: result.path,
      version: result.version,
      canary_start_time: result.startedAt
    });
    return result;
  }

  async rollbackCanary(): Promise<CanaryRollbackResult> {
    const result = await this.state.rollbackCanary();
    this.bus.emitEvent("canary_rolled_back", { model_path: result.rolledBack });
    return result;
  }

  async promoteCanary(): Promise<CanaryPromoteResult> {
    const result = await this.state.promoteCanary();
    this.bus.emitEvent("canary_promoted", {
      previous_stable_model: result.previousStable,
      new_stable_model: result.newStable
    });
    return result;
  }

  async toggleSlowdown(): Promise<{ simulateSlowdown: boolean }> {
    const simulateSlowdown = await this.state.toggleSlowdown();
    this.bus.emitEvent("slowdown_toggled", { simulate_slowdown: simulateSlowdown });
    return { simulateSlowdown };
  }

  /** Read-only: evaluates a copy of the latency log and never fails. */
  checkHealth(): HealthCheckResult {
    const samples = this.recorder.snapshotAll();
    const result = evaluateHealth(samples.stable, samples.canary);

    this.logger?.info(
      {
        status: result.status,
        pValue: result.pValue,
        stableMean: result.stableMean,
        canaryMean: result.canaryMean
      },
      "canary health checked"
    );
    this.bus.emitEvent<HealthCheckedEvent>("health_checked", {
      status: result.status,
      alert: result.alert,
      p_value: result.pValue,
      stable_sample_count: result.stableCount,
      canary_sample_count: result.canaryCount
    });
    return result;
  }

  getStatus(): ControllerStatus {
    const snapshot = this.state.snapshot();
    const canary = snapshot.canary;

    return {
      lifecycle: snapshot.lifecycle,
      stable: { path: snapshot.stable.path, version: snapshot.stable.version },
      canary: canary
        ? { path: canary.handle.path, version: canary.handle.version, startedAt: canary.startedAt }
        : null,
      canaryActive: canary !== null,
      simulateSlowdown: snapshot.simulateSlowdown,
      canaryTrafficFraction: canary ? CANARY_TRAFFIC_FRACTION : 0,
      samples: this.recorder.counts(),
      minSamplesPerVariant: MIN_SAMPLES_PER_VARIANT,
      recommendedSamplesPerGroup: RECOMMENDED_SAMPLES_PER_GROUP
    };
  }

  async close(): Promise<void> {
    await this.executor.close();
    this.bus.removeAllListeners();
  }
}

function createExecutor(config: Partial<InferenceConfig>, logger: Logger | undefined): InferenceExecutor {
  const workers = config.workers ?? DEFAULT_INFERENCE_WORKERS;
  if (workers <= 0) {
    return new InlineInferenceExecutor();
  }
  return new WorkerInferencePool({
    size: workers,
    ...(config.max_queue !== undefined ? { maxQueueSize: config.max_queue } : {}),
    ...(logger ? { logger } : {})
  });
}
