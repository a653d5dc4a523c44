import type { ModelHandle } from "../models/types.js";

/** Runs one model invocation; implementations decide which thread it runs on. */
export interface InferenceExecutor {
  run(handle: ModelHandle, features: readonly number[]): Promise<number>;
  close(): Promise<void>;
}

export class InlineInferenceExecutor implements InferenceExecutor {
  async run(handle: ModelHandle, features: readonly number[]): Promise<number> {
    return handle.predict(features);
  }

  async close(): Promise<void> {}
}
