import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ModelArtifact } from "../models/artifact.js";
import type { Clock } from "../utils/clock.js";
import type { RandomSource } from "../utils/random.js";

export const MODEL_V1: ModelArtifact = {
  format: "logistic-regression",
  version: "v1",
  coefficients: [0.42, -1.15, 0.87, 0.05, 1.3],
  intercept: -0.25
};

export const MODEL_V2: ModelArtifact = {
  format: "logistic-regression",
  version: "v2",
  coefficients: [0.61, -0.92, 1.04, -0.18, 0.95],
  intercept: 0.1
};

export function createModelDir(prefix = "latency-canary-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function writeModelArtifact(dir: string, fileName: string, artifact: unknown): string {
  const path = join(dir, fileName);
  writeFileSync(path, typeof artifact === "string" ? artifact : JSON.stringify(artifact));
  return path;
}

/** Replays a fixed cycle of draws. */
export class CyclicRandomSource implements RandomSource {
  private index = 0;
  draws = 0;

  constructor(private readonly values: readonly number[]) {
    if (values.length === 0) {
      throw new RangeError("CyclicRandomSource needs at least one value");
    }
  }

  next(): number {
    const value = this.values[this.index % this.values.length] ?? 0;
    this.index += 1;
    this.draws += 1;
    return value;
  }
}

/** 0.05, 0.15, ... 0.95: exactly one draw in ten lands under 0.10. */
export function everyTenthRandom(): CyclicRandomSource {
  return new CyclicRandomSource(Array.from({ length: 10 }, (_, i) => i / 10 + 0.05));
}

/**
 * Deterministic clock for sequential predictions: every second `now()` call
 * advances by the next step of the cycle, and `sleep` advances by the
 * requested time. A start/end pair therefore measures `step + slept`.
 */
export class SteppingClock implements Clock {
  private time = 0;
  private calls = 0;
  private step = 0;

  constructor(private readonly steps: readonly number[]) {
    if (steps.length === 0) {
      throw new RangeError("SteppingClock needs at least one step");
    }
  }

  now(): number {
    if (this.calls % 2 === 1) {
      this.time += this.steps[this.step % this.steps.length] ?? 0;
      this.step += 1;
    }
    this.calls += 1;
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.time += ms;
  }
}
