import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { InvalidStateError, ModelLoadError } from "../errors/index.js";
import { LatencyRecorder } from "../metrics/latency-recorder.js";
import { ModelRegistry } from "../models/registry.js";
import { MODEL_V1, MODEL_V2, createModelDir, writeModelArtifact } from "../testing/index.js";
import { DeploymentStateMachine } from "./deployment-state.js";

async function setup() {
  const dir = createModelDir();
  const v1 = writeModelArtifact(dir, "model_v1.json", MODEL_V1);
  const v2 = writeModelArtifact(dir, "model_v2.json", MODEL_V2);
  const recorder = new LatencyRecorder();
  const machine = await DeploymentStateMachine.create(new ModelRegistry(), recorder, v1, {
    now: () => new Date("2026-03-01T12:00:00.000Z")
  });
  return { dir, v1, v2, recorder, machine };
}

describe("DeploymentStateMachine", () => {
  it("starts with only the stable model", async () => {
    const { machine, v1 } = await setup();
    const state = machine.snapshot();

    expect(state.lifecycle).toBe("NO_CANARY");
    expect(state.stable.path).toBe(v1);
    expect(state.canary).toBeNull();
    expect(state.simulateSlowdown).toBe(false);
    expect(Object.isFrozen(state)).toBe(true);
  });

  it("clears the latency log when a canary is deployed", async () => {
    const { machine, recorder, v2 } = await setup();
    recorder.record("stable", 3);
    recorder.record("canary", 4);

    const result = await machine.deployCanary(v2);

    expect(result).toEqual({ path: v2, version: "v2", startedAt: "2026-03-01T12:00:00.000Z" });
    expect(machine.lifecycle).toBe("CANARY_ACTIVE");
    expect(recorder.counts()).toEqual({ stable: 0, canary: 0 });
  });

  it("leaves state and samples alone when the model cannot load", async () => {
    const { machine, recorder, dir, v1 } = await setup();
    recorder.record("stable", 3);
    const before = machine.snapshot();

    await expect(machine.deployCanary(join(dir, "missing.json"))).rejects.toBeInstanceOf(ModelLoadError);

    expect(machine.snapshot()).toBe(before);
    expect(machine.snapshot().stable.path).toBe(v1);
    expect(recorder.counts()).toEqual({ stable: 1, canary: 0 });
  });

  it("rejects a second deploy while a canary is active", async () => {
    const { machine, v1, v2 } = await setup();
    await machine.deployCanary(v2);

    await expect(machine.deployCanary(v1)).rejects.toBeInstanceOf(InvalidStateError);
    expect(machine.snapshot().canary?.handle.path).toBe(v2);
  });

  it("rejects rollback and promotion without a canary", async () => {
    const { machine } = await setup();
    await expect(machine.rollbackCanary()).rejects.toThrow("No active canary to rollback");
    await expect(machine.promoteCanary()).rejects.toThrow("No active canary to promote");
  });

  it("keeps the stable model and samples on rollback", async () => {
    const { machine, recorder, v1, v2 } = await setup();
    await machine.deployCanary(v2);
    recorder.record("canary", 5);

    await expect(machine.rollbackCanary()).resolves.toEqual({ rolledBack: v2 });
    expect(machine.snapshot().stable.path).toBe(v1);
    expect(machine.snapshot().canary).toBeNull();
    expect(recorder.counts()).toEqual({ stable: 0, canary: 1 });
  });

  it("moves the canary handle into stable on promotion", async () => {
    const { machine, v1, v2 } = await setup();
    await machine.deployCanary(v2);
    const canaryHandle = machine.snapshot().canary?.handle;

    await expect(machine.promoteCanary()).resolves.toEqual({ previousStable: v1, newStable: v2 });
    expect(machine.snapshot().stable).toBe(canaryHandle);
    expect(machine.lifecycle).toBe("NO_CANARY");
  });

  it("toggles slowdown in either lifecycle state", async () => {
    const { machine, v2 } = await setup();
    await expect(machine.toggleSlowdown()).resolves.toBe(true);
    await machine.deployCanary(v2);
    await expect(machine.toggleSlowdown()).resolves.toBe(false);
    expect(machine.lifecycle).toBe("CANARY_ACTIVE");
  });

  it("applies racing rollbacks one at a time", async () => {
    const { machine, v2 } = await setup();
    await machine.deployCanary(v2);

    const results = await Promise.allSettled([machine.rollbackCanary(), machine.rollbackCanary()]);

    expect(results.filter((result) => result.status === "fulfilled")).toHaveLength(1);
    const rejected = results.find((result) => result.status === "rejected");
    expect(rejected?.status === "rejected" ? rejected.reason : null).toBeInstanceOf(InvalidStateError);
  });

  it("lets exactly one of two concurrent deploys win", async () => {
    const { machine, v1, v2 } = await setup();

    const results = await Promise.allSettled([machine.deployCanary(v2), machine.deployCanary(v1)]);

    expect(results.map((result) => result.status)).toEqual(["fulfilled", "rejected"]);
    expect(machine.snapshot().canary?.handle.path).toBe(v2);
  });
});
