import { Hono } from "hono";
import type { Context } from "hono";
import { serve } from "@hono/node-server";
import {
  CanaryController,
  DeployCanaryRequestSchema,
  ModelLoadError,
  PredictRequestSchema,
  createLogger,
  isControllerError,
  type DeployCanaryResponse,
  type DeploymentEventEnvelope,
  type ErrorResponse,
  type HealthResponse,
  type Logger,
  type PredictResponse,
  type PromoteCanaryResponse,
  type ServiceConfig,
  type StatusResponse,
  type ToggleSlowdownResponse
} from "@latency-canary/core";
import type { ZodError } from "zod";

export interface LatencyCanaryServerOptions {
  controller: CanaryController;
  host?: string;
  port?: number;
  logger?: Logger;
}

type ErrorStatus = 400 | 404 | 409 | 422 | 500;

const encoder = new TextEncoder();

export class LatencyCanaryServer {
  readonly app = new Hono();

  private readonly controller: CanaryController;
  private readonly logger: Logger | undefined;
  private server: ReturnType<typeof serve> | undefined;

  private readonly host: string;
  private readonly port: number;

  constructor(options: LatencyCanaryServerOptions) {
    this.controller = options.controller;
    this.logger = options.logger;
    this.host = options.host ?? "127.0.0.1";
    this.port = options.port ?? 8000;

    this.setupApp();
  }

  static async fromConfig(config: ServiceConfig, logger: Logger = createLogger(config.logging.level)): Promise<LatencyCanaryServer> {
    const controller = await CanaryController.fromConfig(config, { logger });
    return new LatencyCanaryServer({
      controller,
      host: config.server.host,
      port: config.server.port,
      logger
    });
  }

  start(): Promise<void> {
    return new Promise((resolve) => {
      this.server = serve(
        {
          fetch: this.app.fetch,
          hostname: this.host,
          port: this.port
        },
        (info) => {
          this.logger?.info({ host: this.host, port: info.port }, "server listening");
          resolve();
        }
      );
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = undefined;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    }
    await this.controller.close();
  }

  getAddress(): string {
    return `http://${this.host}:${this.port}`;
  }

  private setupApp(): void {
    this.app.onError((error, c) => this.errorResponse(c, error));

    this.app.get("/health", (c) => c.json({ ok: true }));

    this.app.get("/", (c) => {
      const status = this.controller.getStatus();
      const body: StatusResponse = {
        message: "Churn Prediction API",
        stable_model: status.stable.path,
        stable_version: status.stable.version,
        canary_model: status.canary?.path ?? null,
        canary_version: status.canary?.version ?? null,
        canary_start_time: status.canary?.startedAt ?? null,
        canary_active: status.canaryActive,
        simulate_slowdown: status.simulateSlowdown,
        canary_traffic_fraction: status.canaryTrafficFraction,
        stable_sample_count: status.samples.stable,
        canary_sample_count: status.samples.canary
      };
      return c.json(body);
    });

    this.app.post("/predict", async (c) => {
      const parsed = PredictRequestSchema.safeParse(await readJson(c));
      if (!parsed.success) {
        return c.json(validationError(parsed.error, "invalid_input"), 422);
      }

      const result = await this.controller.predict(parsed.data.features);
      const body: PredictResponse = {
        churn_probability: result.probability,
        model_used: result.variant,
        latency_ms: result.latencyMs,
        request_id: result.requestId
      };
      return c.json(body);
    });

    this.app.post("/admin/deploy-canary", async (c) => {
      const parsed = DeployCanaryRequestSchema.safeParse(await readJson(c));
      if (!parsed.success) {
        return c.json(validationError(parsed.error, "invalid_request"), 400);
      }

      const result = await this.controller.deployCanary(parsed.data.model_path);
      const body: DeployCanaryResponse = {
        status: "success",
        message: "Canary model deployed successfully",
        model_path: result.path,
        canary_start_time: result.startedAt
      };
      return c.json(body);
    });

    this.app.post("/admin/rollback-canary", async (c) => {
      await this.controller.rollbackCanary();
      return c.json({ status: "success", message: "Canary rolled back successfully" });
    });

    this.app.post("/admin/promote-canary", async (c) => {
      const result = await this.controller.promoteCanary();
      const body: PromoteCanaryResponse = {
        status: "success",
        message: "Canary promoted to stable successfully",
        previous_stable_model: result.previousStable,
        new_stable_model: result.newStable
      };
      return c.json(body);
    });

    this.app.post("/admin/toggle-slowdown", async (c) => {
      const { simulateSlowdown } = await this.controller.toggleSlowdown();
      const body: ToggleSlowdownResponse = {
        simulate_slowdown: simulateSlowdown,
        message: simulateSlowdown ? "Slowdown simulation enabled" : "Slowdown simulation disabled"
      };
      return c.json(body);
    });

    this.app.get("/admin/check-canary-health", (c) => {
      const result = this.controller.checkHealth();
      const body: HealthResponse = {
        alert_triggered: result.alert,
        p_value: result.pValue === null ? null : round(result.pValue, 3),
        message: result.message,
        stable_avg_latency_ms: round(result.stableMean, 1),
        canary_avg_latency_ms: round(result.canaryMean, 1),
        stable_sample_count: result.stableCount,
        canary_sample_count: result.canaryCount
      };
      return c.json(body);
    });

    this.app.get("/api/events", (c) => {
      const bus = this.controller.eventBus;
      let unsubscribe: (() => void) | undefined;

      const stream = new ReadableStream<Uint8Array>({
        start: (controller) => {
          unsubscribe = bus.subscribe((event: DeploymentEventEnvelope) => {
            try {
              controller.enqueue(encoder.encode(encodeSSE(event)));
            } catch (error) {
              // Stream already closed by the client.
              this.logger?.debug({ error: error instanceof Error ? error.message : String(error) }, "sse client gone");
              unsubscribe?.();
            }
          });

          const status = this.controller.getStatus();
          controller.enqueue(
            encoder.encode(
              `event: connected\ndata: ${JSON.stringify({ canary_active: status.canaryActive })}\n\n`
            )
          );

          c.req.raw.signal.addEventListener("abort", () => unsubscribe?.(), { once: true });
        },
        cancel: () => {
          unsubscribe?.();
        }
      });

      return new Response(stream, {
        headers: {
          "Content-Type": "text/event-stream",
          "Cache-Control": "no-cache",
          Connection: "keep-alive"
        }
      });
    });
  }

  private errorResponse(c: Context, error: Error): Response {
    const status = statusFor(error);
    if (status === 500) {
      this.logger?.error({ err: error, path: c.req.path }, "request failed");
    } else {
      this.logger?.warn({ path: c.req.path, error: error.message }, "request rejected");
    }

    const body: ErrorResponse = isControllerError(error)
      ? { error: error.message, code: error.code }
      : { error: status === 500 ? "Internal server error" : error.message };
    return c.json(body, status);
  }
}

function statusFor(error: Error): ErrorStatus {
  if (error instanceof ModelLoadError) {
    return error.reason === "not_found" ? 404 : 400;
  }
  if (!isControllerError(error)) {
    return 500;
  }
  switch (error.code) {
    case "invalid_state":
      return 409;
    case "invalid_input":
      return 422;
    default:
      return 400;
  }
}

async function readJson(c: Context): Promise<unknown> {
  const body: unknown = await c.req.json().catch(() => null);
  return body;
}

function validationError(error: ZodError, code: string): ErrorResponse {
  return {
    error: error.issues.map((issue) => issue.message).join("; "),
    code
  };
}

function round(value: number, digits: number): number {
  return Number(value.toFixed(digits));
}

function encodeSSE(event: DeploymentEventEnvelope): string {
  return `event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`;
}
