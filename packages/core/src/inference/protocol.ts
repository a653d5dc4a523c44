import type { LoadedArtifact } from "../models/artifact.js";

export interface InferenceTask {
  taskId: number;
  handleId: string;
  artifact: LoadedArtifact;
  features: readonly number[];
}

export type InferenceReply =
  | { taskId: number; ok: true; probability: number }
  | { taskId: number; ok: false; errorName: string; message: string };
