import { spawn } from "node:child_process";
import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { fileURLToPath } from "node:url";
import { LatencyCanaryHttpClient } from "./client.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

export interface DaemonParams {
  host: string;
  port: number;
  stableModel?: string;
  config?: string;
  detach?: boolean;
}

/** Returns true when a server was already answering at the address. */
export async function ensureDaemon(params: DaemonParams): Promise<boolean> {
  const baseUrl = `http://${params.host}:${params.port}`;
  const client = new LatencyCanaryHttpClient(baseUrl);

  if (await client.health()) {
    return true;
  }

  const serverDist = resolve(__dirname, "../../server/dist/cli.js");
  const serverSrc = resolve(__dirname, "../../server/src/cli.ts");
  const compiled = existsSync(serverDist);

  const args = [
    ...(compiled ? [] : ["--import", "tsx"]),
    compiled ? serverDist : serverSrc,
    "--host",
    params.host,
    "--port",
    String(params.port)
  ];
  if (params.stableModel) {
    args.push("--stable", params.stableModel);
  }
  if (params.config) {
    args.push("--config", params.config);
  }

  const child = spawn(process.execPath, args, {
    detached: Boolean(params.detach),
    stdio: params.detach ? "ignore" : "inherit",
    env: process.env
  });

  if (params.detach) {
    child.unref();
  }

  const deadline = Date.now() + 10_000;
  while (Date.now() < deadline) {
    if (child.exitCode !== null) {
      throw new Error(`Server exited with code ${child.exitCode} before accepting requests`);
    }
    if (await client.health()) {
      return false;
    }
    await sleep(250);
  }

  throw new Error(`Failed to start server at ${baseUrl}`);
}
