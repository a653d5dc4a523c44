#!/usr/bin/env node
import { defineCommand, runMain } from "citty";
import chalk from "chalk";
import ora from "ora";
import { loadConfig } from "@latency-canary/core";
import { LatencyCanaryHttpClient } from "./client.js";
import { ensureDaemon } from "./daemon.js";
import { formatHealth, formatPrediction, formatStatus, parseFeatureList } from "./output.js";

const connectionArgs = {
  host: { type: "string", default: "127.0.0.1" },
  port: { type: "string", default: "8000" }
} as const;

function client(host: string, port: string): LatencyCanaryHttpClient {
  return new LatencyCanaryHttpClient(`http://${host}:${port}`);
}

async function guarded(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
    process.exit(1);
  }
}

const startCommand = defineCommand({
  meta: {
    name: "start",
    description: "Start the prediction server unless one is already running"
  },
  args: {
    ...connectionArgs,
    stable: { type: "string", description: "Stable model artifact" },
    config: { type: "string", alias: "c" },
    detach: { type: "boolean", default: false, alias: "d" }
  },
  run: async ({ args }) => {
    const spinner = ora("Starting server").start();
    try {
      if (args.config) {
        await loadConfig(args.config);
      }
      const running = await ensureDaemon({
        host: args.host,
        port: Number(args.port),
        detach: args.detach,
        ...(args.stable ? { stableModel: args.stable } : {}),
        ...(args.config ? { config: args.config } : {})
      });
      spinner.succeed(running ? "Server already running" : "Server started");
      console.log(chalk.cyan(`Listening on http://${args.host}:${args.port}`));
    } catch (error) {
      spinner.fail(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  }
});

const statusCommand = defineCommand({
  meta: { name: "status", description: "Show the current deployment" },
  args: {
    ...connectionArgs,
    json: { type: "boolean", default: false }
  },
  run: ({ args }) =>
    guarded(async () => {
      const status = await client(args.host, args.port).status();
      console.log(args.json ? JSON.stringify(status, null, 2) : formatStatus(status));
    })
});

const deployCommand = defineCommand({
  meta: { name: "deploy", description: "Deploy a model artifact as the canary" },
  args: {
    model: { type: "positional", required: true, description: "Path to the model artifact" },
    ...connectionArgs
  },
  run: ({ args }) =>
    guarded(async () => {
      const spinner = ora(`Deploying ${args.model}`).start();
      try {
        const result = await client(args.host, args.port).deploy(args.model);
        spinner.succeed(result.message);
        console.log(chalk.gray(`Canary started at ${result.canary_start_time}`));
      } catch (error) {
        spinner.fail("Deployment failed");
        throw error;
      }
    })
});

const rollbackCommand = defineCommand({
  meta: { name: "rollback", description: "Roll back the active canary" },
  args: connectionArgs,
  run: ({ args }) =>
    guarded(async () => {
      const result = await client(args.host, args.port).rollback();
      console.log(chalk.yellow(result.message));
    })
});

const promoteCommand = defineCommand({
  meta: { name: "promote", description: "Promote the active canary to stable" },
  args: connectionArgs,
  run: ({ args }) =>
    guarded(async () => {
      const result = await client(args.host, args.port).promote();
      console.log(chalk.green(result.message));
      console.log(chalk.gray(`${result.previous_stable_model} -> ${result.new_stable_model}`));
    })
});

const toggleSlowdownCommand = defineCommand({
  meta: { name: "toggle-slowdown", description: "Toggle the simulated canary slowdown" },
  args: connectionArgs,
  run: ({ args }) =>
    guarded(async () => {
      const result = await client(args.host, args.port).toggleSlowdown();
      console.log(result.simulate_slowdown ? chalk.magenta(result.message) : chalk.green(result.message));
    })
});

const healthCommand = defineCommand({
  meta: { name: "health", description: "Compare canary and stable latency" },
  args: {
    ...connectionArgs,
    json: { type: "boolean", default: false }
  },
  run: ({ args }) =>
    guarded(async () => {
      const health = await client(args.host, args.port).checkHealth();
      console.log(args.json ? JSON.stringify(health, null, 2) : formatHealth(health));
    })
});

const predictCommand = defineCommand({
  meta: { name: "predict", description: "Send one prediction request" },
  args: {
    ...connectionArgs,
    features: { type: "string", required: true, alias: "f", description: "Comma-separated feature values" }
  },
  run: ({ args }) =>
    guarded(async () => {
      const prediction = await client(args.host, args.port).predict(parseFeatureList(args.features));
      console.log(formatPrediction(prediction));
    })
});

const main = defineCommand({
  meta: {
    name: "latency-canary",
    description: "Canary rollouts for a churn prediction model, gated on latency"
  },
  subCommands: {
    start: startCommand,
    status: statusCommand,
    deploy: deployCommand,
    rollback: rollbackCommand,
    promote: promoteCommand,
    "toggle-slowdown": toggleSlowdownCommand,
    health: healthCommand,
    predict: predictCommand
  }
});

void runMain(main);
