import { describe, expect, it } from "vitest";
import { LatencyRecorder } from "./latency-recorder.js";

describe("LatencyRecorder", () => {
  it("appends per variant in order", () => {
    const recorder = new LatencyRecorder();
    recorder.record("stable", 1.5);
    recorder.record("canary", 4);
    recorder.record("stable", 2.5);

    expect(recorder.snapshot("stable")).toEqual([1.5, 2.5]);
    expect(recorder.snapshot("canary")).toEqual([4]);
    expect(recorder.counts()).toEqual({ stable: 2, canary: 1 });
  });

  it("hands out copies rather than live views", () => {
    const recorder = new LatencyRecorder();
    recorder.record("stable", 1);
    const snapshot = recorder.snapshotAll();
    snapshot.stable.push(99);
    recorder.record("canary", 2);

    expect(recorder.snapshot("stable")).toEqual([1]);
    expect(snapshot.canary).toEqual([]);
  });

  it("clears both variants together", () => {
    const recorder = new LatencyRecorder();
    recorder.record("stable", 1);
    recorder.record("canary", 2);
    recorder.resetAll();

    expect(recorder.snapshotAll()).toEqual({ stable: [], canary: [] });
  });

  it("drops samples taken before the last reset", () => {
    const recorder = new LatencyRecorder();
    const before = recorder.generation;
    recorder.resetAll();

    expect(recorder.record("canary", 11, before)).toBe(false);
    expect(recorder.record("canary", 2, recorder.generation)).toBe(true);
    expect(recorder.snapshotAll()).toEqual({ stable: [], canary: [2] });
  });

  it("rejects impossible latencies", () => {
    const recorder = new LatencyRecorder();
    expect(() => recorder.record("stable", -1)).toThrow(RangeError);
    expect(() => recorder.record("stable", Number.NaN)).toThrow(RangeError);
  });
});
