import { studentTCdf, studentTQuantile, studentTTwoTailed } from "./distributions.js";

export interface SampleSummary {
  n: number;
  mean: number;
  /** Bessel-corrected (n - 1) variance. */
  variance: number;
}

export interface TTestResult {
  tStatistic: number;
  degreesOfFreedom: number;
  pValueTwoSided: number;
  /** P(T <= t): small when the canary mean is below the baseline mean. */
  pValueOneSided: number;
  baselineMean: number;
  canaryMean: number;
  baselineStd: number;
  canaryStd: number;
  baselineN: number;
  canaryN: number;
  meanDifference: number;
  confidenceInterval95: [number, number];
}

export function summarize(samples: readonly number[]): SampleSummary {
  const n = samples.length;
  if (n === 0) {
    return { n, mean: 0, variance: 0 };
  }
  const mean = samples.reduce((sum, value) => sum + value, 0) / n;
  const variance = n > 1 ? samples.reduce((sum, value) => sum + (value - mean) ** 2, 0) / (n - 1) : 0;
  return { n, mean, variance };
}

/**
 * Welch's unequal-variance t-test of `canary` against `baseline`. The
 * statistic is positive when the canary mean is higher.
 */
export function welchTTest(baseline: readonly number[], canary: readonly number[]): TTestResult {
  if (baseline.length < 2 || canary.length < 2) {
    throw new RangeError("Need at least 2 samples for each group");
  }

  const b = summarize(baseline);
  const c = summarize(canary);
  const baselineTerm = b.variance / b.n;
  const canaryTerm = c.variance / c.n;
  const se = Math.sqrt(baselineTerm + canaryTerm);

  const common = {
    baselineMean: b.mean,
    canaryMean: c.mean,
    baselineStd: Math.sqrt(b.variance),
    canaryStd: Math.sqrt(c.variance),
    baselineN: b.n,
    canaryN: c.n,
    meanDifference: c.mean - b.mean
  };

  // Both groups constant: any mean difference is certain, none is no evidence.
  if (se === 0) {
    const diff = common.meanDifference;
    return {
      ...common,
      tStatistic: diff === 0 ? 0 : Math.sign(diff) * Number.POSITIVE_INFINITY,
      degreesOfFreedom: b.n + c.n - 2,
      pValueTwoSided: diff === 0 ? 1 : 0,
      pValueOneSided: diff === 0 ? 0.5 : diff < 0 ? 0 : 1,
      confidenceInterval95: [diff, diff]
    };
  }

  const tStatistic = common.meanDifference / se;
  const degreesOfFreedom =
    (baselineTerm + canaryTerm) ** 2 / (baselineTerm ** 2 / (b.n - 1) + canaryTerm ** 2 / (c.n - 1));
  const delta = studentTQuantile(0.975, degreesOfFreedom) * se;

  return {
    ...common,
    tStatistic,
    degreesOfFreedom,
    pValueTwoSided: studentTTwoTailed(tStatistic, degreesOfFreedom),
    pValueOneSided: studentTCdf(tStatistic, degreesOfFreedom),
    confidenceInterval95: [common.meanDifference - delta, common.meanDifference + delta]
  };
}
