import {
  AuditEvent,
  ExecutionError,
  ExecutionErrorKind,
  ExecutionStatus,
  JsonObject,
  StageCheckpoint,
  StagePayload,
  isJsonObject,
} from "../types";

const STATUSES: readonly ExecutionStatus[] = ["pending", "running", "succeeded", "failed"];
const ERROR_KINDS: readonly ExecutionErrorKind[] = ["retryable", "retries_exhausted", "fatal", "contract_violation"];

function parseJson(raw: string, what: string): unknown {
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new Error(`Stored ${what} is not valid JSON`, { cause: error });
  }
}

function parseObject(raw: string, what: string): JsonObject {
  const parsed = parseJson(raw, what);
  if (!isJsonObject(parsed)) {
    throw new Error(`Stored ${what} is not a JSON object`);
  }
  return parsed;
}

export function parseStatus(raw: string): ExecutionStatus {
  const status = STATUSES.find((candidate) => candidate === raw);
  if (!status) {
    throw new Error(`Unknown execution status: ${raw}`);
  }
  return status;
}

export function parsePayload(raw: string): StagePayload {
  return parseObject(raw, "payload");
}

export function parseExecutionError(raw: string | null): ExecutionError | undefined {
  if (raw === null) {
    return undefined;
  }
  const value = parseObject(raw, "lastError");
  const kind = ERROR_KINDS.find((candidate) => candidate === value.kind);
  if (
    typeof value.stage !== "string" ||
    !kind ||
    typeof value.message !== "string" ||
    typeof value.attempts !== "number" ||
    typeof value.at !== "string"
  ) {
    throw new Error("Stored lastError has an unexpected shape");
  }
  return {
    stage: value.stage,
    kind,
    message: value.message,
    attempts: value.attempts,
    at: value.at,
    ...(typeof value.compensationError === "string" ? { compensationError: value.compensationError } : {}),
  };
}

export function parseHistory(raw: string): StageCheckpoint[] {
  const parsed = parseJson(raw, "history");
  if (!Array.isArray(parsed)) {
    throw new Error("Stored history is not an array");
  }
  return parsed.map((entry: unknown) => {
    if (
      !isJsonObject(entry) ||
      typeof entry.stage !== "string" ||
      typeof entry.stageIndex !== "number" ||
      typeof entry.attempts !== "number" ||
      typeof entry.durationMs !== "number" ||
      typeof entry.completedAt !== "string" ||
      !Array.isArray(entry.addedKeys)
    ) {
      throw new Error("Stored history entry has an unexpected shape");
    }
    return {
      stage: entry.stage,
      stageIndex: entry.stageIndex,
      attempts: entry.attempts,
      durationMs: entry.durationMs,
      completedAt: entry.completedAt,
      addedKeys: entry.addedKeys.filter((key): key is string => typeof key === "string"),
    };
  });
}

export function parseAuditEvent(raw: string): AuditEvent {
  const value = parseObject(raw, "audit event");
  if (
    value.type !== "replay" ||
    typeof value.at !== "string" ||
    typeof value.replayExecutionId !== "string" ||
    typeof value.fromStage !== "string"
  ) {
    throw new Error("Stored audit event has an unexpected shape");
  }
  return {
    type: "replay",
    at: value.at,
    replayExecutionId: value.replayExecutionId,
    fromStage: value.fromStage,
  };
}
