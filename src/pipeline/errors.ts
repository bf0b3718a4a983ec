export type PipelineErrorCode =
  | "pipeline_definition_invalid"
  | "document_ref_invalid"
  | "execution_not_found"
  | "execution_duplicate"
  | "execution_conflict"
  | "execution_terminal"
  | "execution_active"
  | "replay_invalid"
  | "store_unavailable"
  | "stage_timeout";

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class PipelineDefinitionError extends PipelineError {
  constructor(message: string) {
    super("pipeline_definition_invalid", message);
  }
}

export class InvalidDocumentRefError extends PipelineError {
  constructor(message: string) {
    super("document_ref_invalid", message);
  }
}

export class ExecutionNotFoundError extends PipelineError {
  constructor(readonly executionId: string) {
    super("execution_not_found", `Execution not found: ${executionId}`);
  }
}

export class DuplicateExecutionError extends PipelineError {
  constructor(readonly executionId: string) {
    super("execution_duplicate", `Execution already exists: ${executionId}`);
  }
}

export class ConcurrentModificationError extends PipelineError {
  constructor(readonly executionId: string, expectedVersion: number) {
    super("execution_conflict", `Execution ${executionId} was modified concurrently (expected version ${expectedVersion})`);
  }
}

export class TerminalExecutionError extends PipelineError {
  constructor(readonly executionId: string) {
    super("execution_terminal", `Execution ${executionId} is terminal and cannot be modified`);
  }
}

export class ExecutionActiveError extends PipelineError {
  constructor(readonly executionId: string) {
    super("execution_active", `Execution ${executionId} has not reached a terminal status`);
  }
}

export class InvalidReplayError extends PipelineError {
  constructor(message: string) {
    super("replay_invalid", message);
  }
}

export class StoreUnavailableError extends PipelineError {
  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("store_unavailable", `Execution store unavailable during ${operation}: ${detail}`, { cause });
  }
}

export class StageTimeoutError extends PipelineError {
  constructor(stage: string, timeoutMs: number) {
    super("stage_timeout", `Stage ${stage} timed out after ${timeoutMs}ms`);
  }
}
