export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  executionId?: string;
  container?: string;
  key?: string;
  stage?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "executions_started"
  | "executions_succeeded"
  | "executions_failed"
  | "executions_cancelled"
  | "stages_ok"
  | "stage_retries"
  | "stage_failures"
  | "events_publish_failed"
  | "execution_task_errors"
  | "triggers_received"
  | "triggers_started"
  | "trigger_poll_errors";

export type MetricTimerName = "stage_ms" | "execution_ms";
