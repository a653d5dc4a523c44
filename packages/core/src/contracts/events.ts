export type DeploymentEventType =
  | "canary_deployed"
  | "canary_rolled_back"
  | "canary_promoted"
  | "slowdown_toggled"
  | "health_checked";

export interface DeploymentEventEnvelope<T = unknown> {
  type: DeploymentEventType;
  timestamp: string;
  data: T;
}

export interface HealthCheckedEvent {
  status: "insufficient_data" | "acceptable" | "alert";
  alert: boolean;
  p_value: number | null;
  stable_sample_count: number;
  canary_sample_count: number;
}
