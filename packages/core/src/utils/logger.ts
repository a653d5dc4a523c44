import { pino } from "pino";
import type { LevelWithSilent, Logger } from "pino";

export type { Logger } from "pino";

export function createLogger(level: LevelWithSilent = "info", name = "latency-canary"): Logger {
  return pino({ name, level });
}
