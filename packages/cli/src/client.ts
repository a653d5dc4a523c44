import {
  DeployCanaryResponseSchema,
  ErrorResponseSchema,
  HealthResponseSchema,
  PredictResponseSchema,
  PromoteCanaryResponseSchema,
  StatusResponseSchema,
  ToggleSlowdownResponseSchema,
  type DeployCanaryResponse,
  type HealthResponse,
  type PredictResponse,
  type PromoteCanaryResponse,
  type StatusResponse,
  type ToggleSlowdownResponse
} from "@latency-canary/core";
import { z, type ZodType } from "zod";

const RollbackResponseSchema = z.object({
  status: z.string(),
  message: z.string()
});

export type RollbackResponse = z.infer<typeof RollbackResponseSchema>;

export class ApiRequestError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code: string | undefined
  ) {
    super(message);
    this.name = "ApiRequestError";
  }
}

export class LatencyCanaryHttpClient {
  constructor(
    private readonly baseUrl: string,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async health(): Promise<boolean> {
    try {
      const res = await this.fetchImpl(`${this.baseUrl}/health`);
      return res.ok;
    } catch {
      return false;
    }
  }

  status(): Promise<StatusResponse> {
    return this.request(StatusResponseSchema, "GET", "/");
  }

  predict(features: number[]): Promise<PredictResponse> {
    return this.request(PredictResponseSchema, "POST", "/predict", { features });
  }

  deploy(modelPath: string): Promise<DeployCanaryResponse> {
    return this.request(DeployCanaryResponseSchema, "POST", "/admin/deploy-canary", { model_path: modelPath });
  }

  rollback(): Promise<RollbackResponse> {
    return this.request(RollbackResponseSchema, "POST", "/admin/rollback-canary");
  }

  promote(): Promise<PromoteCanaryResponse> {
    return this.request(PromoteCanaryResponseSchema, "POST", "/admin/promote-canary");
  }

  toggleSlowdown(): Promise<ToggleSlowdownResponse> {
    return this.request(ToggleSlowdownResponseSchema, "POST", "/admin/toggle-slowdown");
  }

  checkHealth(): Promise<HealthResponse> {
    return this.request(HealthResponseSchema, "GET", "/admin/check-canary-health");
  }

  private async request<T>(schema: ZodType<T>, method: string, path: string, body?: unknown): Promise<T> {
    const init: RequestInit = {
      method,
      ...(body ? { headers: { "Content-Type": "application/json" } } : {}),
      ...(body ? { body: JSON.stringify(body) } : {})
    };

    const response = await this.fetchImpl(`${this.baseUrl}${path}`, init);

    const data: unknown = await response.json().catch(() => ({}));
    if (!response.ok) {
      const parsed = ErrorResponseSchema.safeParse(data);
      throw new ApiRequestError(
        parsed.success ? parsed.data.error : `HTTP ${response.status}`,
        response.status,
        parsed.success ? parsed.data.code : undefined
      );
    }
    return schema.parse(data);
  }
}
