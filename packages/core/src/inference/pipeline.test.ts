import { describe, expect, it } from "vitest";
import { InvalidInputError } from "../errors/index.js";
import { LatencyRecorder } from "../metrics/latency-recorder.js";
import { createPredictor } from "../models/predictor.js";
import { ModelRegistry } from "../models/registry.js";
import { DeploymentStateMachine } from "../state/deployment-state.js";
import {
  CyclicRandomSource,
  MODEL_V1,
  MODEL_V2,
  SteppingClock,
  createModelDir,
  writeModelArtifact
} from "../testing/index.js";
import { InlineInferenceExecutor } from "./executor.js";
import { PredictionPipeline, SLOWDOWN_DELAY_MS } from "./pipeline.js";

const FEATURES = [1, 0.5, -1, 2, 0.25];

async function setup(draws: number[], steps: number[] = [2]) {
  const dir = createModelDir();
  const v1 = writeModelArtifact(dir, "model_v1.json", MODEL_V1);
  const v2 = writeModelArtifact(dir, "model_v2.json", MODEL_V2);
  const recorder = new LatencyRecorder();
  const state = await DeploymentStateMachine.create(new ModelRegistry(), recorder, v1);
  const pipeline = new PredictionPipeline(state, recorder, new InlineInferenceExecutor(), {
    random: new CyclicRandomSource(draws),
    clock: new SteppingClock(steps)
  });
  return { state, recorder, pipeline, v1, v2 };
}

describe("PredictionPipeline", () => {
  it("serves the stable model and records its latency", async () => {
    const { pipeline, recorder, v1 } = await setup([0.5]);

    const result = await pipeline.predict(FEATURES);

    expect(result.variant).toBe("stable");
    expect(result.modelPath).toBe(v1);
    expect(result.probability).toBe(createPredictor(MODEL_V1).predict(FEATURES));
    expect(result.latencyMs).toBe(2);
    expect(recorder.snapshotAll()).toEqual({ stable: [2], canary: [] });
  });

  it("adds the slowdown delay to canary latency only", async () => {
    const { pipeline, recorder, state, v2 } = await setup([0.05, 0.5]);
    await state.deployCanary(v2);
    await state.toggleSlowdown();

    const canary = await pipeline.predict(FEATURES);
    const stable = await pipeline.predict(FEATURES);

    expect(canary.variant).toBe("canary");
    expect(canary.probability).toBe(createPredictor(MODEL_V2).predict(FEATURES));
    expect(canary.latencyMs).toBe(2 + SLOWDOWN_DELAY_MS);
    expect(stable.variant).toBe("stable");
    expect(stable.latencyMs).toBe(2);
    expect(recorder.snapshotAll()).toEqual({ stable: [2], canary: [12] });
  });

  it("rejects malformed feature vectors before routing", async () => {
    const { pipeline, recorder } = await setup([0.5]);

    for (const input of [[], "1,2,3", [1, "two", 3], [1, Number.POSITIVE_INFINITY]]) {
      await expect(pipeline.predict(input)).rejects.toBeInstanceOf(InvalidInputError);
    }
    expect(recorder.counts()).toEqual({ stable: 0, canary: 0 });
  });

  it("records nothing when the model rejects the vector", async () => {
    const { pipeline, recorder } = await setup([0.5]);

    await expect(pipeline.predict([1, 2])).rejects.toThrow("Expected 5 features, received 2");
    expect(recorder.counts()).toEqual({ stable: 0, canary: 0 });
  });
});
