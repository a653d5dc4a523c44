import type { Variant } from "../state/types.js";

export interface LatencySnapshot {
  stable: number[];
  canary: number[];
}

/**
 * Append-only latency samples per variant. Every method runs to completion
 * without yielding, so each call is its own critical section on the event
 * loop and never waits behind a deployment transition.
 *
 * `resetAll` starts a new generation. A request that read the generation
 * before the reset still completes, but its sample is discarded.
 */
export class LatencyRecorder {
  private samples: Record<Variant, number[]> = { stable: [], canary: [] };
  private currentGeneration = 0;

  get generation(): number {
    return this.currentGeneration;
  }

  /** Returns false when the sample belongs to a generation that was reset. */
  record(variant: Variant, latencyMs: number, generation = this.currentGeneration): boolean {
    if (!Number.isFinite(latencyMs) || latencyMs < 0) {
      throw new RangeError(`Latency must be a non-negative finite number, got ${latencyMs}`);
    }
    if (generation !== this.currentGeneration) {
      return false;
    }
    this.samples[variant].push(latencyMs);
    return true;
  }

  snapshot(variant: Variant): number[] {
    return [...this.samples[variant]];
  }

  snapshotAll(): LatencySnapshot {
    return {
      stable: [...this.samples.stable],
      canary: [...this.samples.canary]
    };
  }

  counts(): Record<Variant, number> {
    return {
      stable: this.samples.stable.length,
      canary: this.samples.canary.length
    };
  }

  resetAll(): void {
    this.samples = { stable: [], canary: [] };
    this.currentGeneration += 1;
  }
}
