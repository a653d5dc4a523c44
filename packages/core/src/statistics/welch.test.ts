import { describe, expect, it } from "vitest";
import { studentTCdf, studentTQuantile, studentTTwoTailed } from "./distributions.js";
import { summarize, welchTTest } from "./welch.js";

describe("studentT", () => {
  it("is symmetric around zero", () => {
    expect(studentTCdf(0, 5)).toBe(0.5);
    expect(studentTCdf(1.3, 7) + studentTCdf(-1.3, 7)).toBeCloseTo(1, 10);
  });

  it("matches tabulated two-tailed p-values", () => {
    expect(studentTTwoTailed(2, 10)).toBeCloseTo(0.0734, 3);
    expect(studentTTwoTailed(2.228, 10)).toBeCloseTo(0.05, 3);
  });

  it("inverts the CDF", () => {
    expect(studentTQuantile(0.975, 30)).toBeCloseTo(2.042, 2);
  });
});

describe("welchTTest", () => {
  it("computes the statistic and Welch-Satterthwaite degrees of freedom", () => {
    const result = welchTTest([1, 2, 3, 4], [2, 4, 6, 8]);

    expect(result.baselineMean).toBe(2.5);
    expect(result.canaryMean).toBe(5);
    expect(result.tStatistic).toBeCloseTo(Math.sqrt(12) / 2, 10);
    expect(result.degreesOfFreedom).toBeCloseTo(75 / 17, 10);
    expect(result.meanDifference).toBe(2.5);
    expect(result.confidenceInterval95[0]).toBeLessThan(2.5);
    expect(result.confidenceInterval95[1]).toBeGreaterThan(2.5);
  });

  it("detects a faster canary with the one-sided p-value", () => {
    const baseline = [12.1, 12.4, 11.9, 12.2, 12.0, 12.3, 12.5, 12.1, 12.2, 12.0];
    const canary = [9.8, 10.1, 9.9, 10.2, 10.0, 9.7, 10.1, 9.9, 10.0, 10.3];

    const result = welchTTest(baseline, canary);
    expect(result.meanDifference).toBeLessThan(0);
    expect(result.pValueOneSided).toBeLessThan(0.01);
  });

  it("returns a weak signal on similar distributions", () => {
    const baseline = [5.0, 5.1, 4.9, 5.0, 5.1, 4.8, 5.0, 5.0, 5.1, 4.9];
    const canary = [5.0, 4.9, 5.0, 5.0, 4.8, 5.1, 5.0, 4.9, 5.1, 5.0];

    expect(welchTTest(baseline, canary).pValueTwoSided).toBeGreaterThan(0.05);
  });

  it("finds no difference between identical constant groups", () => {
    const result = welchTTest([3, 3, 3], [3, 3, 3, 3]);
    expect(result.tStatistic).toBe(0);
    expect(result.pValueTwoSided).toBe(1);
    expect(result.pValueOneSided).toBe(0.5);
  });

  it("treats differing constant groups as a certain difference", () => {
    const slower = welchTTest([15, 15, 15], [25, 25, 25, 25]);
    expect(slower.tStatistic).toBe(Number.POSITIVE_INFINITY);
    expect(slower.pValueTwoSided).toBe(0);
    expect(slower.pValueOneSided).toBe(1);
    expect(slower.confidenceInterval95).toEqual([10, 10]);

    const faster = welchTTest([25, 25, 25], [15, 15, 15]);
    expect(faster.tStatistic).toBe(Number.NEGATIVE_INFINITY);
    expect(faster.pValueTwoSided).toBe(0);
    expect(faster.pValueOneSided).toBe(0);
  });

  it("needs two samples per group", () => {
    expect(() => welchTTest([1], [1, 2])).toThrow(/at least 2 samples/);
  });
});

describe("summarize", () => {
  it("uses Bessel's correction", () => {
    expect(summarize([2, 4, 4, 4, 5, 5, 7, 9])).toEqual({ n: 8, mean: 5, variance: 32 / 7 });
  });

  it("returns zeros for an empty sample", () => {
    expect(summarize([])).toEqual({ n: 0, mean: 0, variance: 0 });
  });
});
