import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { FeatureVectorSchema } from "../contracts/api.js";
import { InvalidInputError } from "../errors/index.js";
import type { LatencyRecorder } from "../metrics/latency-recorder.js";
import type { DeploymentStateMachine } from "../state/deployment-state.js";
import { chooseVariant } from "../state/router.js";
import type { Variant } from "../state/types.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { MathRandomSource, type RandomSource } from "../utils/random.js";
import type { InferenceExecutor } from "./executor.js";

/** Artificial canary delay while slowdown simulation is on. */
export const SLOWDOWN_DELAY_MS = 10;

export interface PredictionResult {
  requestId: string;
  probability: number;
  variant: Variant;
  latencyMs: number;
  modelPath: string;
}

export interface PredictionPipelineOptions {
  random?: RandomSource;
  clock?: Clock;
  logger?: Logger;
}

export class PredictionPipeline {
  private readonly random: RandomSource;
  private readonly clock: Clock;
  private readonly logger: Logger | undefined;

  constructor(
    private readonly state: DeploymentStateMachine,
    private readonly recorder: LatencyRecorder,
    private readonly executor: InferenceExecutor,
    options: PredictionPipelineOptions = {}
  ) {
    this.random = options.random ?? new MathRandomSource();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger;
  }

  async predict(input: unknown): Promise<PredictionResult> {
    const features = parseFeatures(input);
    const requestId = randomUUID();

    // Routing works on a frozen snapshot; the state lock is never taken here.
    // The generation is read alongside it so a redeploy mid-request drops the sample.
    const snapshot = this.state.snapshot();
    const generation = this.recorder.generation;
    const decision = chooseVariant(snapshot, this.random);
    this.logger?.debug({ requestId, variant: decision.variant, features: features.length }, "routing request");

    const started = this.clock.now();
    if (decision.variant === "canary" && snapshot.simulateSlowdown) {
      await this.clock.sleep(SLOWDOWN_DELAY_MS);
    }
    const probability = await this.executor.run(decision.handle, features);
    const latencyMs = this.clock.now() - started;

    const recorded = this.recorder.record(decision.variant, latencyMs, generation);
    this.logger?.debug({ requestId, variant: decision.variant, latencyMs, recorded }, "request completed");

    return {
      requestId,
      probability,
      variant: decision.variant,
      latencyMs,
      modelPath: decision.handle.path
    };
  }
}

function parseFeatures(input: unknown): number[] {
  const result = FeatureVectorSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidInputError(result.error.issues.map((issue) => issue.message).join("; "));
  }
  return result.data;
}
