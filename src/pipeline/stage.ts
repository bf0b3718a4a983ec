import { Logger } from "../observability";
import { DocumentRef, StagePayload } from "../types";
import { PipelineDefinition } from "./definition";
import { PipelineDefinitionError } from "./errors";

export type StageResult =
  | { outcome: "success"; payload: StagePayload }
  | { outcome: "retryable"; reason: string }
  | { outcome: "fatal"; reason: string };

export interface StageContext {
  executionId: string;
  documentRef: DocumentRef;
  /** 1-based attempt number of this invocation. */
  attempt: number;
  signal: AbortSignal;
  logger: Logger;
}

export interface StageExecutor {
  readonly name: string;
  execute(payload: StagePayload, context: StageContext): Promise<StageResult>;
  /**
   * Called when an execution fails on this stage, before the failure is persisted.
   * Undoes externally visible side effects the stage may have produced.
   */
  compensate?(payload: StagePayload, context: StageContext): Promise<void>;
}

export function success(payload: StagePayload): StageResult {
  return { outcome: "success", payload };
}

export function retryable(reason: string): StageResult {
  return { outcome: "retryable", reason };
}

export function fatal(reason: string): StageResult {
  return { outcome: "fatal", reason };
}

export class StageRegistry {
  private readonly executors = new Map<string, StageExecutor>();

  constructor(executors: Iterable<StageExecutor> = []) {
    for (const executor of executors) {
      this.register(executor);
    }
  }

  register(executor: StageExecutor): this {
    if (this.executors.has(executor.name)) {
      throw new PipelineDefinitionError(`Stage executor already registered: ${executor.name}`);
    }
    this.executors.set(executor.name, executor);
    return this;
  }

  get(name: string): StageExecutor | undefined {
    return this.executors.get(name);
  }

  has(name: string): boolean {
    return this.executors.has(name);
  }

  assertCovers(definition: PipelineDefinition): void {
    const missing = definition.names().filter((name) => !this.executors.has(name));
    if (missing.length > 0) {
      throw new PipelineDefinitionError(`No stage executor registered for: ${missing.join(", ")}`);
    }
  }
}
