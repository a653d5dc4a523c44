import { InvalidInputError } from "../errors/index.js";
import type { LoadedArtifact } from "./artifact.js";
import type { Predictor } from "./types.js";

export function createPredictor(artifact: LoadedArtifact): Predictor {
  const coefficients = [...artifact.coefficients];
  const intercept = artifact.intercept;

  return {
    featureCount: coefficients.length,
    predict(features: readonly number[]): number {
      if (features.length !== coefficients.length) {
        throw new InvalidInputError(
          `Expected ${coefficients.length} features, received ${features.length}`
        );
      }

      let logit = intercept;
      coefficients.forEach((weight, index) => {
        logit += weight * (features[index] ?? 0);
      });
      return sigmoid(logit);
    }
  };
}

function sigmoid(value: number): number {
  if (value >= 0) {
    return 1 / (1 + Math.exp(-value));
  }
  const exp = Math.exp(value);
  return exp / (1 + exp);
}
