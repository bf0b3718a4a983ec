import { DocumentRef, ExecutionError, ExecutionStatus } from "../types";

export type ExecutionEventType = "stage_completed" | "execution_succeeded" | "execution_failed";

export interface ExecutionEvent {
  type: ExecutionEventType;
  executionId: string;
  documentRef: DocumentRef;
  status: ExecutionStatus;
  stage?: string;
  at: string;
  lastError?: ExecutionError;
  resultLocation?: string;
}

export interface Sink {
  publishExecutionEvents(events: ExecutionEvent[]): Promise<void>;
}

export function eventIdempotencyKey(event: ExecutionEvent): string {
  return `${event.executionId}:${event.type}:${event.stage ?? ""}`;
}
