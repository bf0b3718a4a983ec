export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export interface DocumentRef {
  container: string;
  key: string;
}

export type StagePayload = JsonObject;

export type ExecutionStatus = "pending" | "running" | "succeeded" | "failed";

/** `retryable` marks the error of an attempt that will be retried; the rest are terminal. */
export type ExecutionErrorKind = "retryable" | "retries_exhausted" | "fatal" | "contract_violation";

export interface ExecutionError {
  stage: string;
  kind: ExecutionErrorKind;
  message: string;
  attempts: number;
  at: string;
  compensationError?: string;
}

export interface StageCheckpoint {
  stage: string;
  stageIndex: number;
  attempts: number;
  durationMs: number;
  completedAt: string;
  addedKeys: string[];
}

export interface ReplayAuditEvent {
  type: "replay";
  at: string;
  replayExecutionId: string;
  fromStage: string;
}

export type AuditEvent = ReplayAuditEvent;

export interface ExecutionRecord {
  executionId: string;
  documentRef: DocumentRef;
  generation: number;
  status: ExecutionStatus;
  currentStageIndex: number;
  payload: StagePayload;
  attempt: number;
  createdAt: string;
  updatedAt: string;
  lastError?: ExecutionError;
  version: number;
  leaseOwner?: string;
  leaseExpiresAt?: string;
  history: StageCheckpoint[];
  audit: AuditEvent[];
  replayOf?: string;
}

export interface ExecutionStatusView {
  executionId: string;
  status: ExecutionStatus;
  currentStage: string | null;
  currentStageIndex: number;
  attempt: number;
  lastError?: ExecutionError;
  updatedAt: string;
}

export function isTerminalStatus(status: ExecutionStatus): status is "succeeded" | "failed" {
  return status === "succeeded" || status === "failed";
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
