#!/usr/bin/env node
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import YAML from "yaml";
import { parseConfig, type ServiceConfig } from "@latency-canary/core";
import { LatencyCanaryServer } from "./server.js";

const DEFAULT_CONFIG_PATH = "./latency-canary.config.yaml";

function getArg(name: string): string | undefined {
  const index = process.argv.indexOf(name);
  if (index === -1) return undefined;
  return process.argv[index + 1];
}

async function resolveConfig(): Promise<ServiceConfig> {
  const configPath = getArg("--config") ?? process.env.LATENCY_CANARY_CONFIG;
  const path = configPath ?? (existsSync(DEFAULT_CONFIG_PATH) ? DEFAULT_CONFIG_PATH : undefined);

  const raw: unknown = path ? YAML.parse(await readFile(path, "utf8")) : {};
  const file = isRecord(raw) ? raw : {};

  const stable = getArg("--stable") ?? process.env.LATENCY_CANARY_STABLE_MODEL;
  const host = getArg("--host") ?? process.env.LATENCY_CANARY_HOST;
  const port = getArg("--port") ?? process.env.LATENCY_CANARY_PORT;
  const level = process.env.LATENCY_CANARY_LOG_LEVEL;

  return parseConfig({
    ...file,
    service: { ...section(file.service), ...(stable ? { stable_model: stable } : {}) },
    server: {
      ...section(file.server),
      ...(host ? { host } : {}),
      ...(port ? { port: Number(port) } : {})
    },
    logging: { ...section(file.logging), ...(level ? { level } : {}) }
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

async function main(): Promise<void> {
  const config = await resolveConfig();
  const server = await LatencyCanaryServer.fromConfig(config);

  await server.start();
  console.log(`[latency-canary] listening on ${server.getAddress()}`);
  console.log(`[latency-canary] stable model: ${config.service.stable_model}`);

  const shutdown = () => {
    console.log("[latency-canary] shutting down...");
    server
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error(error);
        process.exit(1);
      });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
