import { z } from "zod";

export const FeatureVectorSchema = z
  .array(z.number({ invalid_type_error: "features must be numbers" }).finite("features must be finite"), {
    invalid_type_error: "features must be an array of numbers",
    required_error: "features is required"
  })
  .min(1, "features must not be empty");

export const PredictRequestSchema = z.object({
  features: FeatureVectorSchema
});

export const DeployCanaryRequestSchema = z.object({
  model_path: z.string().min(1, "model_path is required")
});

export const HealthResponseSchema = z.object({
  alert_triggered: z.boolean(),
  p_value: z.number().nullable(),
  message: z.string(),
  stable_avg_latency_ms: z.number(),
  canary_avg_latency_ms: z.number(),
  stable_sample_count: z.number().int(),
  canary_sample_count: z.number().int()
});

export const StatusResponseSchema = z.object({
  message: z.string(),
  stable_model: z.string(),
  stable_version: z.string(),
  canary_model: z.string().nullable(),
  canary_version: z.string().nullable(),
  canary_start_time: z.string().nullable(),
  canary_active: z.boolean(),
  simulate_slowdown: z.boolean(),
  canary_traffic_fraction: z.number(),
  stable_sample_count: z.number().int(),
  canary_sample_count: z.number().int()
});

export const PredictResponseSchema = z.object({
  churn_probability: z.number(),
  model_used: z.enum(["stable", "canary"]),
  latency_ms: z.number(),
  request_id: z.string()
});

export const DeployCanaryResponseSchema = z.object({
  status: z.literal("success"),
  message: z.string(),
  model_path: z.string(),
  canary_start_time: z.string()
});

export const PromoteCanaryResponseSchema = z.object({
  status: z.literal("success"),
  message: z.string(),
  previous_stable_model: z.string(),
  new_stable_model: z.string()
});

export const ToggleSlowdownResponseSchema = z.object({
  simulate_slowdown: z.boolean(),
  message: z.string()
});

export const ErrorResponseSchema = z.object({
  error: z.string(),
  code: z.string().optional()
});

export type HealthResponse = z.infer<typeof HealthResponseSchema>;
export type StatusResponse = z.infer<typeof StatusResponseSchema>;
export type PredictResponse = z.infer<typeof PredictResponseSchema>;
export type DeployCanaryResponse = z.infer<typeof DeployCanaryResponseSchema>;
export type PromoteCanaryResponse = z.infer<typeof PromoteCanaryResponseSchema>;
export type ToggleSlowdownResponse = z.infer<typeof ToggleSlowdownResponseSchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
