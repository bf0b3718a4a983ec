import { errorMessage, Logger, MetricsRegistry } from "../observability";
import { ExecutionEvent, Sink } from "../sink";
import { ExecutionRecordStore } from "../store/types";
import {
  DocumentRef,
  ExecutionError,
  ExecutionErrorKind,
  ExecutionRecord,
  ExecutionStatus,
  ExecutionStatusView,
  isJsonObject,
  isTerminalStatus,
  StageCheckpoint,
} from "../types";
import { computeBackoffMs, PipelineDefinition, StageSpec } from "./definition";
import {
  ConcurrentModificationError,
  DuplicateExecutionError,
  ExecutionActiveError,
  ExecutionNotFoundError,
  InvalidReplayError,
  PipelineDefinitionError,
  PipelineError,
  StageTimeoutError,
  StoreUnavailableError,
  TerminalExecutionError,
} from "./errors";
import { assertDocumentRef, createExecutionId } from "./executionId";
import { clonePayload, createInitialPayload, mergePayload, omitKeys } from "./payload";
import { fatal, retryable, StageContext, StageExecutor, StageRegistry, StageResult } from "./stage";

export type RunDisposition = "completed" | "terminal" | "leased" | "cancelled" | "superseded";

export interface RunResult {
  executionId: string;
  status: ExecutionStatus;
  disposition: RunDisposition;
  record: ExecutionRecord;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface ReplayOptions {
  fromStage?: string;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface OrchestratorDeps {
  definition: PipelineDefinition;
  registry: StageRegistry;
  store: ExecutionRecordStore;
  logger: Logger;
  metrics: MetricsRegistry;
  sink?: Sink;
  workerId?: string;
  leaseMs?: number;
  maxConcurrency?: number;
  storeRetryAttempts?: number;
  storeRetryDelayMs?: number;
  sleep?: SleepFn;
  now?: () => Date;
}

type StepResult = { next: ExecutionRecord } | { done: RunResult };

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function documentFields(record: ExecutionRecord) {
  return {
    executionId: record.executionId,
    container: record.documentRef.container,
    key: record.documentRef.key,
  };
}

/**
 * The lease is renewed at the claim, at every retry and at every checkpoint, so the
 * longest unrenewed stretch is one backoff followed by one timed-out attempt.
 */
function assertLeaseCoversStages(definition: PipelineDefinition, leaseMs: number): void {
  for (const spec of definition) {
    if (spec.timeoutMs + spec.maxBackoffMs >= leaseMs) {
      throw new PipelineDefinitionError(
        `Stage ${spec.name} needs timeoutMs + maxBackoffMs (${spec.timeoutMs + spec.maxBackoffMs}ms) below the lease (${leaseMs}ms)`,
      );
    }
  }
}

/**
 * Drives executions through the pipeline definition. Every stage outcome is
 * checkpointed in the record store before the next stage starts, so a process
 * that dies mid-run loses at most the stage that was in flight.
 */
export class Orchestrator {
  private readonly definition: PipelineDefinition;
  private readonly registry: StageRegistry;
  private readonly store: ExecutionRecordStore;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly sink?: Sink;
  private readonly workerId: string;
  private readonly leaseMs: number;
  private readonly maxConcurrency: number;
  private readonly storeRetryAttempts: number;
  private readonly storeRetryDelayMs: number;
  private readonly sleep: SleepFn;
  private readonly now: () => Date;

  private readonly tasks = new Map<string, Promise<RunResult | undefined>>();
  private readonly controllers = new Map<string, AbortController>();
  private readonly waiters: Array<() => void> = [];
  private activeSlots = 0;

  constructor(deps: OrchestratorDeps) {
    deps.registry.assertCovers(deps.definition);
    this.definition = deps.definition;
    this.registry = deps.registry;
    this.store = deps.store;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.sink = deps.sink;
    this.workerId = deps.workerId ?? "worker_local";
    this.leaseMs = deps.leaseMs ?? 10 * 60_000;
    assertLeaseCoversStages(deps.definition, this.leaseMs);
    this.maxConcurrency = Math.max(1, deps.maxConcurrency ?? 4);
    this.storeRetryAttempts = Math.max(1, deps.storeRetryAttempts ?? 3);
    this.storeRetryDelayMs = deps.storeRetryDelayMs ?? 500;
    this.sleep = deps.sleep ?? abortableSleep;
    this.now = deps.now ?? (() => new Date());
  }

  async start(ref: DocumentRef): Promise<string> {
    assertDocumentRef(ref);
    const latestId = await this.withStoreRetry("exists", () => this.store.exists(ref));
    const executionId = latestId ?? createExecutionId(ref);

    let record = await this.withStoreRetry("load", () => this.store.load(executionId));
    if (!record) {
      record = await this.createOrLoad(this.newRecord(ref, 0));
    }

    if (record.status === "pending") {
      this.schedule(record.executionId);
    } else if (record.status === "running") {
      if (this.leaseIsLive(record)) {
        this.logger.debug("execution_already_running", { ...documentFields(record), leaseOwner: record.leaseOwner });
      } else {
        this.logger.warn("execution_lease_expired", { ...documentFields(record), leaseOwner: record.leaseOwner });
        this.schedule(record.executionId);
      }
    }

    return record.executionId;
  }

  async replay(ref: DocumentRef, options: ReplayOptions = {}): Promise<string> {
    assertDocumentRef(ref);
    const latestId = await this.withStoreRetry("exists", () => this.store.exists(ref));
    if (!latestId) {
      throw new ExecutionNotFoundError(createExecutionId(ref));
    }
    const latest = await this.loadOrThrow(latestId);
    if (!isTerminalStatus(latest.status)) {
      throw new ExecutionActiveError(latest.executionId);
    }

    const firstStage = this.stageAt(0);
    const fromStage = options.fromStage ?? firstStage.name;
    const fromIndex = this.definition.indexOf(fromStage);
    if (fromIndex < 0) {
      throw new InvalidReplayError(`Unknown stage: ${fromStage}`);
    }
    if (fromIndex > latest.currentStageIndex) {
      throw new InvalidReplayError(
        `Cannot replay ${latest.executionId} from ${fromStage}: it never got past stage index ${latest.currentStageIndex}`,
      );
    }

    const keptHistory = latest.history.filter((checkpoint) => checkpoint.stageIndex < fromIndex);
    const droppedKeys = latest.history
      .filter((checkpoint) => checkpoint.stageIndex >= fromIndex)
      .flatMap((checkpoint) => checkpoint.addedKeys);

    const generation = latest.generation + 1;
    const replayRecord: ExecutionRecord = {
      ...this.newRecord(ref, generation),
      currentStageIndex: fromIndex,
      payload: omitKeys(latest.payload, droppedKeys),
      history: structuredClone(keptHistory),
      replayOf: latest.executionId,
    };

    let created: ExecutionRecord;
    try {
      created = await this.withStoreRetry("create", () => this.store.create(replayRecord));
    } catch (error) {
      if (!(error instanceof DuplicateExecutionError)) {
        throw error;
      }
      // a concurrent replay of the same generation won the create
      const existing = await this.loadOrThrow(replayRecord.executionId);
      this.schedule(existing.executionId);
      return existing.executionId;
    }

    this.metrics.incrementCounter("executions_started");
    await this.withStoreRetry("appendAudit", () =>
      this.store.appendAudit(latest.executionId, {
        type: "replay",
        at: created.createdAt,
        replayExecutionId: created.executionId,
        fromStage,
      }),
    );
    this.logger.info("execution_replayed", {
      ...documentFields(created),
      replayOf: latest.executionId,
      fromStage,
      generation,
    });

    this.schedule(created.executionId);
    return created.executionId;
  }

  async resume(executionId: string): Promise<ExecutionStatus> {
    const record = await this.loadOrThrow(executionId);
    if (!isTerminalStatus(record.status)) {
      this.schedule(executionId);
    }
    return record.status;
  }

  /** Schedules pending executions and running ones whose lease has expired. */
  async resumeStale(limit: number): Promise<string[]> {
    const nowIso = this.now().toISOString();
    const records = await this.withStoreRetry("listResumable", () => this.store.listResumable(limit, nowIso));
    for (const record of records) {
      this.logger.info("execution_resume_scheduled", { ...documentFields(record), status: record.status });
      this.schedule(record.executionId);
    }
    return records.map((record) => record.executionId);
  }

  cancel(executionId: string): boolean {
    const controller = this.controllers.get(executionId);
    if (!controller) {
      return false;
    }
    controller.abort();
    return true;
  }

  cancelAll(): number {
    for (const controller of this.controllers.values()) {
      controller.abort();
    }
    return this.controllers.size;
  }

  async getExecutionStatus(ref: DocumentRef): Promise<ExecutionStatusView | undefined> {
    assertDocumentRef(ref);
    const latestId = await this.withStoreRetry("exists", () => this.store.exists(ref));
    if (!latestId) {
      return undefined;
    }
    const record = await this.withStoreRetry("load", () => this.store.load(latestId));
    if (!record) {
      return undefined;
    }

    const view: ExecutionStatusView = {
      executionId: record.executionId,
      status: record.status,
      currentStage: this.definition.stageAt(record.currentStageIndex)?.name ?? null,
      currentStageIndex: record.currentStageIndex,
      attempt: record.attempt,
      updatedAt: record.updatedAt,
    };
    if (record.lastError) {
      view.lastError = record.lastError;
    }
    return view;
  }

  async drain(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks.values()]);
    }
  }

  async run(executionId: string, options: RunOptions = {}): Promise<RunResult> {
    const signal = options.signal;
    let record = await this.loadOrThrow(executionId);

    if (isTerminalStatus(record.status)) {
      return this.result(record, "terminal");
    }
    if (record.status === "running" && this.leaseIsLive(record) && record.leaseOwner !== this.workerId) {
      return this.result(record, "leased");
    }
    if (signal?.aborted) {
      return this.result(record, "cancelled");
    }

    const stopTimer = this.metrics.startTimer("execution_ms");
    const claimed = await this.checkpoint({
      ...record,
      status: "running",
      leaseOwner: this.workerId,
      leaseExpiresAt: this.leaseExpiry(),
      updatedAt: this.nowIso(),
    });
    if (!claimed) {
      return this.superseded(executionId);
    }
    record = claimed;
    this.logger.info("execution_claimed", { ...documentFields(record), stageIndex: record.currentStageIndex });

    while (record.currentStageIndex < this.definition.length) {
      if (signal?.aborted) {
        return this.release(record);
      }

      const step = await this.runStage(record, signal);
      if ("done" in step) {
        if (step.done.disposition === "completed") {
          stopTimer();
        }
        return step.done;
      }
      record = step.next;
    }

    // nothing left to run, e.g. a record saved right after its last stage
    return this.result(record, "terminal");
  }

  private async runStage(record: ExecutionRecord, signal?: AbortSignal): Promise<StepResult> {
    const spec = this.stageAt(record.currentStageIndex);
    const executor = this.executorFor(spec);
    const attempt = record.attempt + 1;
    const fields = { ...documentFields(record), stage: spec.name, attempt };

    this.logger.info("stage_start", fields);
    const stopTimer = this.metrics.startTimer("stage_ms");
    const result = await this.invokeStage(spec, executor, record, attempt, signal);
    const durationMs = stopTimer();

    if (result.outcome !== "success" && signal?.aborted) {
      // the attempt was interrupted by cancellation, not by the stage itself
      this.logger.warn("stage_interrupted", { ...fields, reason: result.reason });
      return { done: await this.release(record) };
    }

    switch (result.outcome) {
      case "success":
        return this.completeStage(record, spec, result.payload, attempt, durationMs);
      case "fatal":
        this.logger.error("stage_fatal", { ...fields, reason: result.reason });
        return { done: await this.fail(record, spec, executor, "fatal", result.reason, attempt) };
      case "retryable":
        return this.retryStage(record, spec, executor, result.reason, attempt, signal);
    }
  }

  private async invokeStage(
    spec: StageSpec,
    executor: StageExecutor,
    record: ExecutionRecord,
    attempt: number,
    signal?: AbortSignal,
  ): Promise<StageResult> {
    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });

    const context = this.stageContext(record, attempt, controller.signal);
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<StageResult>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        this.logger.warn("stage_timeout", { ...documentFields(record), stage: spec.name, attempt });
        resolve(retryable(new StageTimeoutError(spec.name, spec.timeoutMs).message));
      }, spec.timeoutMs);
    });

    const execution = Promise.resolve()
      .then(() => executor.execute(clonePayload(record.payload), context))
      .catch((error: unknown) => fatal(`Stage ${spec.name} threw: ${errorMessage(error)}`));

    try {
      return await Promise.race([execution, timeout]);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }

  private async completeStage(
    record: ExecutionRecord,
    spec: StageSpec,
    updated: unknown,
    attempt: number,
    durationMs: number,
  ): Promise<StepResult> {
    const executor = this.executorFor(spec);
    if (!isJsonObject(updated)) {
      const message = `Stage ${spec.name} returned a payload that is not an object`;
      return { done: await this.fail(record, spec, executor, "contract_violation", message, attempt) };
    }

    const merged = mergePayload(record.payload, updated);
    if (merged.removedKeys.length > 0) {
      const message = `Stage ${spec.name} removed payload keys: ${merged.removedKeys.join(", ")}`;
      this.logger.error("stage_contract_violation", { ...documentFields(record), stage: spec.name, attempt });
      return { done: await this.fail(record, spec, executor, "contract_violation", message, attempt) };
    }

    const completedAt = this.nowIso();
    const nextIndex = record.currentStageIndex + 1;
    const isLast = nextIndex >= this.definition.length;
    const checkpoint: StageCheckpoint = {
      stage: spec.name,
      stageIndex: record.currentStageIndex,
      attempts: attempt,
      durationMs,
      completedAt,
      addedKeys: merged.addedKeys,
    };

    const saved = await this.checkpoint({
      ...record,
      status: isLast ? "succeeded" : "running",
      currentStageIndex: nextIndex,
      payload: merged.payload,
      attempt: 0,
      lastError: undefined,
      history: [...record.history, checkpoint],
      leaseOwner: isLast ? undefined : this.workerId,
      leaseExpiresAt: isLast ? undefined : this.leaseExpiry(),
      updatedAt: completedAt,
    });
    if (!saved) {
      return { done: await this.superseded(record.executionId) };
    }

    this.metrics.incrementCounter("stages_ok");
    this.logger.info("stage_ok", { ...documentFields(saved), stage: spec.name, attempt, durationMs });

    const events: ExecutionEvent[] = [this.event("stage_completed", saved, spec.name)];
    if (isLast) {
      events.push(this.event("execution_succeeded", saved));
    }
    await this.publish(events);

    if (isLast) {
      this.metrics.incrementCounter("executions_succeeded");
      this.logger.info("execution_succeeded", { ...documentFields(saved), resultLocation: saved.payload.resultLocation });
      return { done: this.result(saved, "completed") };
    }
    return { next: saved };
  }

  private async retryStage(
    record: ExecutionRecord,
    spec: StageSpec,
    executor: StageExecutor,
    reason: string,
    attempt: number,
    signal?: AbortSignal,
  ): Promise<StepResult> {
    const fields = { ...documentFields(record), stage: spec.name, attempt };
    if (attempt >= spec.maxAttempts) {
      this.logger.error("stage_retries_exhausted", { ...fields, reason });
      return { done: await this.fail(record, spec, executor, "retries_exhausted", reason, attempt) };
    }

    const saved = await this.checkpoint({
      ...record,
      attempt,
      lastError: this.executionError(spec.name, "retryable", reason, attempt),
      leaseExpiresAt: this.leaseExpiry(),
      updatedAt: this.nowIso(),
    });
    if (!saved) {
      return { done: await this.superseded(record.executionId) };
    }

    const backoffMs = computeBackoffMs(spec, attempt);
    this.metrics.incrementCounter("stage_retries");
    this.logger.warn("stage_retry", { ...fields, reason, backoffMs });
    await this.sleep(backoffMs, signal);
    if (signal?.aborted) {
      return { done: await this.release(saved) };
    }
    return { next: saved };
  }

  private async fail(
    record: ExecutionRecord,
    spec: StageSpec,
    executor: StageExecutor,
    kind: ExecutionErrorKind,
    message: string,
    attempts: number,
  ): Promise<RunResult> {
    const lastError = this.executionError(spec.name, kind, message, attempts);

    if (executor.compensate) {
      // compensation runs to completion even when the run was cancelled
      const context = this.stageContext(record, attempts, new AbortController().signal);
      try {
        await executor.compensate(clonePayload(record.payload), context);
      } catch (error) {
        lastError.compensationError = errorMessage(error);
        this.logger.error("stage_compensation_failed", {
          ...documentFields(record),
          stage: spec.name,
          error: lastError.compensationError,
        });
      }
    }

    const saved = await this.checkpoint({
      ...record,
      status: "failed",
      attempt: attempts,
      lastError,
      leaseOwner: undefined,
      leaseExpiresAt: undefined,
      updatedAt: lastError.at,
    });
    if (!saved) {
      return this.superseded(record.executionId);
    }

    this.metrics.incrementCounter("stage_failures");
    this.metrics.incrementCounter("executions_failed");
    this.logger.error("execution_failed", { ...documentFields(saved), stage: spec.name, kind, attempts, reason: message });
    await this.publish([this.event("execution_failed", saved, spec.name)]);
    return this.result(saved, "completed");
  }

  private async release(record: ExecutionRecord): Promise<RunResult> {
    const saved = await this.checkpoint({
      ...record,
      status: "pending",
      leaseOwner: undefined,
      leaseExpiresAt: undefined,
      updatedAt: this.nowIso(),
    });
    if (!saved) {
      return this.superseded(record.executionId);
    }
    this.metrics.incrementCounter("executions_cancelled");
    this.logger.warn("execution_cancelled", { ...documentFields(saved), stageIndex: saved.currentStageIndex });
    return this.result(saved, "cancelled");
  }

  private async superseded(executionId: string): Promise<RunResult> {
    const current = await this.loadOrThrow(executionId);
    this.logger.warn("execution_superseded", { ...documentFields(current), status: current.status });
    return this.result(current, "superseded");
  }

  /** Saves the record; returns undefined when another writer got there first. */
  private async checkpoint(record: ExecutionRecord): Promise<ExecutionRecord | undefined> {
    try {
      return await this.withStoreRetry("save", () => this.store.save(record));
    } catch (error) {
      if (error instanceof ConcurrentModificationError || error instanceof TerminalExecutionError) {
        return undefined;
      }
      throw error;
    }
  }

  private async withStoreRetry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    let attempt = 0;
    while (true) {
      attempt += 1;
      try {
        return await fn();
      } catch (error) {
        if (error instanceof PipelineError) {
          throw error;
        }
        if (attempt >= this.storeRetryAttempts) {
          throw new StoreUnavailableError(operation, error);
        }
        this.logger.warn("store_retry", { operation, attempt, error: errorMessage(error) });
        await this.sleep(this.storeRetryDelayMs * attempt);
      }
    }
  }

  private async createOrLoad(record: ExecutionRecord): Promise<ExecutionRecord> {
    try {
      const created = await this.withStoreRetry("create", () => this.store.create(record));
      this.metrics.incrementCounter("executions_started");
      this.logger.info("execution_created", documentFields(created));
      return created;
    } catch (error) {
      if (error instanceof DuplicateExecutionError) {
        return this.loadOrThrow(record.executionId);
      }
      throw error;
    }
  }

  private async loadOrThrow(executionId: string): Promise<ExecutionRecord> {
    const record = await this.withStoreRetry("load", () => this.store.load(executionId));
    if (!record) {
      throw new ExecutionNotFoundError(executionId);
    }
    return record;
  }

  private schedule(executionId: string): void {
    if (this.tasks.has(executionId)) {
      return;
    }
    const controller = new AbortController();
    this.controllers.set(executionId, controller);
    const task = this.runScheduled(executionId, controller.signal).finally(() => {
      this.tasks.delete(executionId);
      this.controllers.delete(executionId);
    });
    this.tasks.set(executionId, task);
  }

  private async runScheduled(executionId: string, signal: AbortSignal): Promise<RunResult | undefined> {
    await this.acquireSlot();
    try {
      return await this.run(executionId, { signal });
    } catch (error) {
      this.metrics.incrementCounter("execution_task_errors");
      this.logger.error("execution_task_failed", { executionId, error: errorMessage(error) });
      return undefined;
    } finally {
      this.releaseSlot();
    }
  }

  private async acquireSlot(): Promise<void> {
    if (this.activeSlots < this.maxConcurrency) {
      this.activeSlots += 1;
      return;
    }
    await new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  private releaseSlot(): void {
    const next = this.waiters.shift();
    if (next) {
      // the slot passes straight to the next waiter
      next();
      return;
    }
    this.activeSlots -= 1;
  }

  private newRecord(ref: DocumentRef, generation: number): ExecutionRecord {
    const nowIso = this.nowIso();
    return {
      executionId: createExecutionId(ref, generation),
      documentRef: { container: ref.container, key: ref.key },
      generation,
      status: "pending",
      currentStageIndex: 0,
      payload: createInitialPayload(ref),
      attempt: 0,
      createdAt: nowIso,
      updatedAt: nowIso,
      version: 0,
      history: [],
      audit: [],
    };
  }

  private stageContext(record: ExecutionRecord, attempt: number, signal: AbortSignal): StageContext {
    return {
      executionId: record.executionId,
      documentRef: { ...record.documentRef },
      attempt,
      signal,
      logger: this.logger,
    };
  }

  private stageAt(index: number): StageSpec {
    const spec = this.definition.stageAt(index);
    if (!spec) {
      throw new PipelineDefinitionError(`No stage at index ${index}`);
    }
    return spec;
  }

  private executorFor(spec: StageSpec): StageExecutor {
    const executor = this.registry.get(spec.name);
    if (!executor) {
      throw new PipelineDefinitionError(`No stage executor registered for: ${spec.name}`);
    }
    return executor;
  }

  private executionError(stage: string, kind: ExecutionErrorKind, message: string, attempts: number): ExecutionError {
    return { stage, kind, message, attempts, at: this.nowIso() };
  }

  private event(type: ExecutionEvent["type"], record: ExecutionRecord, stage?: string): ExecutionEvent {
    const event: ExecutionEvent = {
      type,
      executionId: record.executionId,
      documentRef: { ...record.documentRef },
      status: record.status,
      at: record.updatedAt,
    };
    if (stage) {
      event.stage = stage;
    }
    if (record.lastError && record.status === "failed") {
      event.lastError = record.lastError;
    }
    if (typeof record.payload.resultLocation === "string") {
      event.resultLocation = record.payload.resultLocation;
    }
    return event;
  }

  private async publish(events: ExecutionEvent[]): Promise<void> {
    if (!this.sink) {
      return;
    }
    try {
      await this.sink.publishExecutionEvents(events);
    } catch (error) {
      this.metrics.incrementCounter("events_publish_failed");
      this.logger.error("events_publish_failed", {
        executionId: events[0]?.executionId,
        count: events.length,
        error: errorMessage(error),
      });
    }
  }

  private result(record: ExecutionRecord, disposition: RunDisposition): RunResult {
    return { executionId: record.executionId, status: record.status, disposition, record };
  }

  private leaseIsLive(record: ExecutionRecord): boolean {
    return record.leaseExpiresAt !== undefined && record.leaseExpiresAt > this.nowIso();
  }

  private leaseExpiry(): string {
    return new Date(this.now().getTime() + this.leaseMs).toISOString();
  }

  private nowIso(): string {
    return this.now().toISOString();
  }
}
