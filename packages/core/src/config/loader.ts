import { readFile } from "node:fs/promises";
import YAML from "yaml";
import { ServiceConfigSchema, type ServiceConfig } from "./schema.js";

export function parseConfig(input: unknown): ServiceConfig {
  const result = ServiceConfigSchema.safeParse(input);
  if (!result.success) {
    const messages = result.error.issues.map((issue) => {
      const pointer = issue.path.length > 0 ? issue.path.join(".") : "root";
      return `  ${pointer}: ${issue.message}`;
    });
    throw new Error(`Invalid latency-canary config:\n${messages.join("\n")}`);
  }
  return result.data;
}

export async function loadConfig(path: string): Promise<ServiceConfig> {
  const raw = await readFile(path, "utf8");
  return parseConfig(YAML.parse(raw));
}
