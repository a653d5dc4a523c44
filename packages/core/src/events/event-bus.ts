import { EventEmitter } from "node:events";
import type { DeploymentEventEnvelope, DeploymentEventType } from "../contracts/events.js";

export class DeploymentEventBus extends EventEmitter {
  emitEvent<T>(type: DeploymentEventType, data: T): DeploymentEventEnvelope<T> {
    const event: DeploymentEventEnvelope<T> = {
      type,
      timestamp: new Date().toISOString(),
      data
    };
    this.emit("event", event);
    return event;
  }

  subscribe(listener: (event: DeploymentEventEnvelope) => void): () => void {
    this.on("event", listener);
    return () => {
      this.off("event", listener);
    };
  }
}
