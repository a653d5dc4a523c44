import { z } from "zod";

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export const ServiceSchema = z.object({
  stable_model: z.string().min(1, "stable_model is required")
});

/** Worker threads started when the config leaves `inference.workers` out. */
export const DEFAULT_INFERENCE_WORKERS = 2;

export const InferenceSchema = z.object({
  /** 0 keeps inference on the event-loop thread. */
  workers: z.number().int().min(0).max(64).default(DEFAULT_INFERENCE_WORKERS),
  max_queue: z.number().int().min(1).max(100_000).default(1_000)
});

export const ServerSchema = z.object({
  port: z.number().int().min(1_024).max(65_535).default(8000),
  host: z.string().default("127.0.0.1")
});

export const LoggingSchema = z.object({
  level: LogLevelSchema.default("info")
});

export const ServiceConfigSchema = z.object({
  service: ServiceSchema,
  inference: InferenceSchema.default({}),
  server: ServerSchema.default({}),
  logging: LoggingSchema.default({})
});

export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;
export type InferenceConfig = z.infer<typeof InferenceSchema>;
