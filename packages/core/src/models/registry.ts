import { randomUUID } from "node:crypto";
import { readFile } from "node:fs/promises";
import { basename, extname } from "node:path";
import { performance } from "node:perf_hooks";
import type { Logger } from "pino";
import { ModelLoadError } from "../errors/index.js";
import {
  ModelArtifactSchema,
  describeArtifactIssues,
  type LoadedArtifact,
  type ModelArtifact
} from "./artifact.js";
import { createPredictor } from "./predictor.js";
import type { ModelHandle } from "./types.js";

/**
 * Loads model artifacts from disk. Every call reads the file again so a
 * deployment always proves the artifact is loadable right now.
 */
export class ModelRegistry {
  constructor(private readonly logger?: Logger) {}

  async load(path: string): Promise<ModelHandle> {
    const started = performance.now();
    const raw = await readArtifactFile(path);

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ModelLoadError(path, "invalid_artifact", `Failed to load model: ${path} is not valid JSON`, {
        cause: error
      });
    }

    const result = ModelArtifactSchema.safeParse(parsed);
    if (!result.success) {
      throw new ModelLoadError(
        path,
        "invalid_artifact",
        `Failed to load model: ${describeArtifactIssues(result.error)}`
      );
    }

    const handle = buildHandle(path, result.data);
    this.logger?.info(
      { path, version: handle.version, loadMs: Number((performance.now() - started).toFixed(2)) },
      "model loaded"
    );
    return handle;
  }
}

async function readArtifactFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      throw new ModelLoadError(path, "not_found", `Model file not found: ${path}`, { cause: error });
    }
    throw new ModelLoadError(path, "invalid_artifact", `Failed to load model: cannot read ${path}`, {
      cause: error
    });
  }
}

function buildHandle(path: string, artifact: ModelArtifact): ModelHandle {
  const frozen: LoadedArtifact = Object.freeze({
    ...artifact,
    coefficients: Object.freeze([...artifact.coefficients])
  });
  const predictor = createPredictor(frozen);

  return Object.freeze({
    id: randomUUID(),
    path,
    version: artifact.version ?? basename(path, extname(path)),
    loadedAt: new Date().toISOString(),
    artifact: frozen,
    featureCount: predictor.featureCount,
    predict: (features: readonly number[]) => predictor.predict(features)
  });
}
