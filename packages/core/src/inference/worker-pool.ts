import { existsSync } from "node:fs";
import { cpus } from "node:os";
import { fileURLToPath } from "node:url";
import { Worker } from "node:worker_threads";
import type { Logger } from "pino";
import { InvalidInputError } from "../errors/index.js";
import type { ModelHandle } from "../models/types.js";
import type { InferenceExecutor } from "./executor.js";
import type { InferenceReply, InferenceTask } from "./protocol.js";

export interface WorkerPoolOptions {
  /** Defaults to cpus - 1, at least 1. */
  size?: number;
  /** Tasks waiting for a free worker beyond this are rejected. */
  maxQueueSize?: number;
  logger?: Logger;
}

interface PendingTask {
  task: InferenceTask;
  resolve: (probability: number) => void;
  reject: (error: Error) => void;
}

interface PooledWorker {
  id: number;
  worker: Worker;
  current: PendingTask | null;
}

/**
 * Fixed-size worker_threads pool for CPU-bound inference. Each task carries
 * the frozen artifact so workers can rebuild (and cache) the predictor
 * without touching the filesystem.
 */
export class WorkerInferencePool implements InferenceExecutor {
  private readonly workers: PooledWorker[] = [];
  private readonly queue: PendingTask[] = [];
  private readonly size: number;
  private readonly maxQueueSize: number;
  private readonly logger: Logger | undefined;
  private nextTaskId = 1;
  private nextWorkerId = 1;
  private closed = false;

  constructor(options: WorkerPoolOptions = {}) {
    this.size = Math.max(1, options.size ?? cpus().length - 1);
    this.maxQueueSize = options.maxQueueSize ?? 1_000;
    this.logger = options.logger;

    for (let i = 0; i < this.size; i++) {
      this.spawn();
    }
    this.logger?.info({ workers: this.size }, "inference worker pool started");
  }

  get stats(): { workers: number; busy: number; queued: number } {
    return {
      workers: this.workers.length,
      busy: this.workers.filter((entry) => entry.current !== null).length,
      queued: this.queue.length
    };
  }

  run(handle: ModelHandle, features: readonly number[]): Promise<number> {
    if (this.closed) {
      return Promise.reject(new Error("Inference pool is closed"));
    }
    if (this.queue.length >= this.maxQueueSize) {
      return Promise.reject(new Error(`Inference queue full (${this.maxQueueSize})`));
    }

    return new Promise<number>((resolve, reject) => {
      this.queue.push({
        task: {
          taskId: this.nextTaskId++,
          handleId: handle.id,
          artifact: handle.artifact,
          features: [...features]
        },
        resolve,
        reject
      });
      this.dispatch();
    });
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const pending of this.queue.splice(0)) {
      pending.reject(new Error("Inference pool closed before the task ran"));
    }

    const workers = this.workers.splice(0);
    for (const entry of workers) {
      entry.current?.reject(new Error("Inference pool closed while the task was running"));
      entry.current = null;
    }
    await Promise.all(workers.map((entry) => entry.worker.terminate()));
    this.logger?.info("inference worker pool stopped");
  }

  private spawn(): PooledWorker {
    const { file, execArgv } = resolveWorkerEntry();
    const entry: PooledWorker = {
      id: this.nextWorkerId++,
      worker: new Worker(file, { execArgv }),
      current: null
    };

    entry.worker.on("message", (reply: InferenceReply) => {
      this.settle(entry, reply);
    });

    entry.worker.on("error", (error) => {
      this.logger?.warn({ worker: entry.id, error: error.message }, "inference worker crashed");
      entry.current?.reject(error);
      entry.current = null;
      this.replace(entry);
    });

    entry.worker.on("exit", (code) => {
      if (!this.closed && code !== 0) {
        this.logger?.warn({ worker: entry.id, code }, "inference worker exited");
        entry.current?.reject(new Error(`Inference worker exited with code ${code}`));
        entry.current = null;
        this.replace(entry);
      }
    });

    this.workers.push(entry);
    return entry;
  }

  private replace(entry: PooledWorker): void {
    const index = this.workers.indexOf(entry);
    if (index === -1 || this.closed) {
      return;
    }
    this.workers.splice(index, 1);
    this.spawn();
    this.dispatch();
  }

  private settle(entry: PooledWorker, reply: InferenceReply): void {
    const pending = entry.current;
    entry.current = null;

    if (pending && pending.task.taskId === reply.taskId) {
      if (reply.ok) {
        pending.resolve(reply.probability);
      } else {
        pending.reject(
          reply.errorName === "InvalidInputError" ? new InvalidInputError(reply.message) : new Error(reply.message)
        );
      }
    }

    this.dispatch();
  }

  private dispatch(): void {
    for (const entry of this.workers) {
      if (this.queue.length === 0) {
        return;
      }
      if (entry.current) {
        continue;
      }
      const next = this.queue.shift();
      if (!next) {
        return;
      }
      entry.current = next;
      entry.worker.postMessage(next.task);
    }
  }
}

// Compiled builds ship the .js entry; running from sources goes through tsx.
function resolveWorkerEntry(): { file: string; execArgv: string[] } {
  const compiled = fileURLToPath(new URL("./inference-worker.js", import.meta.url));
  if (existsSync(compiled)) {
    return { file: compiled, execArgv: [] };
  }
  return {
    file: fileURLToPath(new URL("./inference-worker.ts", import.meta.url)),
    execArgv: ["--import", "tsx"]
  };
}
