import { parentPort } from "node:worker_threads";
import { createPredictor } from "../models/predictor.js";
import type { Predictor } from "../models/types.js";
import type { InferenceReply, InferenceTask } from "./protocol.js";

const MAX_CACHED_MODELS = 8;
const predictors = new Map<string, Predictor>();

function predictorFor(task: InferenceTask): Predictor {
  const cached = predictors.get(task.handleId);
  if (cached) {
    return cached;
  }
  if (predictors.size >= MAX_CACHED_MODELS) {
    const oldest = predictors.keys().next();
    if (!oldest.done) {
      predictors.delete(oldest.value);
    }
  }
  const predictor = createPredictor(task.artifact);
  predictors.set(task.handleId, predictor);
  return predictor;
}

parentPort?.on("message", (task: InferenceTask) => {
  let reply: InferenceReply;
  try {
    reply = { taskId: task.taskId, ok: true, probability: predictorFor(task).predict(task.features) };
  } catch (error) {
    reply = {
      taskId: task.taskId,
      ok: false,
      errorName: error instanceof Error ? error.name : "Error",
      message: error instanceof Error ? error.message : String(error)
    };
  }
  parentPort?.postMessage(reply);
});
