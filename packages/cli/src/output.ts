import chalk from "chalk";
import Table from "cli-table3";
import type { HealthResponse, PredictResponse, StatusResponse } from "@latency-canary/core";

export function formatStatus(status: StatusResponse): string {
  const lines = [chalk.cyan("Latency Canary: Deployment Status"), ""];
  lines.push(`  Stable: ${status.stable_model} (${status.stable_version})`);

  if (status.canary_model) {
    lines.push(`  Canary: ${status.canary_model} (${status.canary_version ?? "-"})`);
    lines.push(`  Since:  ${status.canary_start_time ?? "-"}`);
    lines.push(`  Traffic: ${Math.round(status.canary_traffic_fraction * 100)}% canary`);
  } else {
    lines.push(chalk.yellow("  No active canary"));
  }

  if (status.simulate_slowdown) {
    lines.push(chalk.magenta("  Slowdown simulation is ON"));
  }

  const table = new Table({
    head: ["Variant", "Samples"],
    style: { head: ["cyan"] }
  });
  table.push(["stable", String(status.stable_sample_count)], ["canary", String(status.canary_sample_count)]);

  lines.push("", table.toString());
  return lines.join("\n");
}

export function formatHealth(health: HealthResponse): string {
  const headline = health.alert_triggered
    ? chalk.red(health.message)
    : health.p_value === null
      ? chalk.yellow(health.message)
      : chalk.green(health.message);

  return [
    headline,
    `  p-value: ${health.p_value === null ? "n/a" : health.p_value.toFixed(3)}`,
    `  stable: ${health.stable_avg_latency_ms.toFixed(1)} ms avg over ${health.stable_sample_count} samples`,
    `  canary: ${health.canary_avg_latency_ms.toFixed(1)} ms avg over ${health.canary_sample_count} samples`
  ].join("\n");
}

export function formatPrediction(prediction: PredictResponse): string {
  const variant = prediction.model_used === "canary" ? chalk.magenta("canary") : chalk.green("stable");
  return `churn probability ${prediction.churn_probability.toFixed(4)} from ${variant} in ${prediction.latency_ms.toFixed(2)} ms`;
}

export function parseFeatureList(input: string): number[] {
  const values = input.split(",").map((part) => part.trim());
  if (values.some((value) => value === "")) {
    throw new Error(`Invalid feature list: "${input}"`);
  }

  return values.map((value) => {
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      throw new Error(`Invalid feature value: "${value}"`);
    }
    return parsed;
  });
}
