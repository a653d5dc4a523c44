export * from "./config/schema.js";
export * from "./config/loader.js";
export * from "./contracts/api.js";
export * from "./contracts/events.js";
export * from "./controller/canary-controller.js";
export * from "./errors/index.js";
export * from "./events/event-bus.js";
export * from "./inference/executor.js";
export * from "./inference/pipeline.js";
export * from "./inference/worker-pool.js";
export * from "./metrics/latency-recorder.js";
export * from "./models/artifact.js";
export * from "./models/predictor.js";
export * from "./models/registry.js";
export * from "./models/types.js";
export * from "./state/deployment-state.js";
export * from "./state/machine.js";
export * from "./state/router.js";
export * from "./state/types.js";
export * from "./statistics/distributions.js";
export * from "./statistics/health.js";
export * from "./statistics/welch.js";
export * from "./utils/clock.js";
export * from "./utils/logger.js";
export * from "./utils/mutex.js";
export * from "./utils/random.js";
