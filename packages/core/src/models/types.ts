import type { LoadedArtifact } from "./artifact.js";

/** Anything that maps a feature vector to a class-1 probability. */
export interface Predictor {
  readonly featureCount: number;
  predict(features: readonly number[]): number;
}

/**
 * A loaded model. Handles are frozen once created; swapping models means
 * swapping handles.
 */
export interface ModelHandle extends Predictor {
  readonly id: string;
  readonly path: string;
  readonly version: string;
  readonly loadedAt: string;
  readonly artifact: LoadedArtifact;
}
