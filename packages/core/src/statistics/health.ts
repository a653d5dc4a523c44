import { summarize, welchTTest } from "./welch.js";

export const MIN_SAMPLES_PER_VARIANT = 20;
/** Power-analysis target per group; informational, never used as a gate. */
export const RECOMMENDED_SAMPLES_PER_GROUP = 36;
export const SIGNIFICANCE_LEVEL = 0.05;

function insufficientDataMessage(minSamples: number): string {
  return `Insufficient data for statistical analysis. Need at least ${minSamples} samples for both models.`;
}

export const HEALTH_MESSAGES = {
  insufficient_data: insufficientDataMessage(MIN_SAMPLES_PER_VARIANT),
  acceptable: "Canary performance is acceptable.",
  alert: "ALERT: Canary latency is significantly higher than stable."
} as const;

export type HealthStatus = keyof typeof HEALTH_MESSAGES;

export interface HealthCheckResult {
  status: HealthStatus;
  alert: boolean;
  pValue: number | null;
  tStatistic: number | null;
  degreesOfFreedom: number | null;
  stableMean: number;
  canaryMean: number;
  stableCount: number;
  canaryCount: number;
  message: string;
}

export interface HealthOptions {
  minSamples?: number;
  significance?: number;
}

/**
 * Compares canary latencies against stable ones. Alerts only when the
 * two-tailed p-value is significant and the canary is the slower variant.
 */
export function evaluateHealth(
  stableSamples: readonly number[],
  canarySamples: readonly number[],
  options: HealthOptions = {}
): HealthCheckResult {
  // Welch's variance needs two observations per group.
  const minSamples = Math.max(2, options.minSamples ?? MIN_SAMPLES_PER_VARIANT);
  const significance = options.significance ?? SIGNIFICANCE_LEVEL;

  const stable = summarize(stableSamples);
  const canary = summarize(canarySamples);
  const base = {
    stableMean: stable.mean,
    canaryMean: canary.mean,
    stableCount: stable.n,
    canaryCount: canary.n
  };

  if (stable.n < minSamples || canary.n < minSamples) {
    return {
      ...base,
      status: "insufficient_data",
      alert: false,
      pValue: null,
      tStatistic: null,
      degreesOfFreedom: null,
      message: insufficientDataMessage(minSamples)
    };
  }

  const test = welchTTest(stableSamples, canarySamples);
  const alert = test.pValueTwoSided < significance && canary.mean > stable.mean;
  const status: HealthStatus = alert ? "alert" : "acceptable";

  return {
    ...base,
    status,
    alert,
    pValue: test.pValueTwoSided,
    tStatistic: test.tStatistic,
    degreesOfFreedom: test.degreesOfFreedom,
    message: HEALTH_MESSAGES[status]
  };
}
