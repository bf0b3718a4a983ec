import fs from "node:fs";
import { AppConfig } from "../config";
import { Logger, MetricsRegistry } from "../observability";
import { Orchestrator } from "../pipeline";
import { ExecutionRecordStore, StoreStats } from "../store";
import { SqsTriggerListener, SqsTriggerQueueClient, TriggerQueueClient, parseStorageEvent } from "../trigger";
import { DocumentRef, ExecutionStatusView } from "../types";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: ExecutionRecordStore;
  logger: Logger;
  metrics: MetricsRegistry;
  orchestrator: Orchestrator;
}

export interface ExecutionOutcome {
  ref: DocumentRef;
  view?: ExecutionStatusView;
}

/** Result objects must never retrigger the pipeline that wrote them. */
export function triggerIgnorePrefixes(config: AppConfig): string[] {
  return [...new Set([config.resultPrefix, ...config.ignoreKeyPrefixes].filter((prefix) => prefix.length > 0))];
}

export function hasFailedExecution(outcomes: ExecutionOutcome[]): boolean {
  return outcomes.some((outcome) => outcome.view?.status === "failed");
}

async function settle(ctx: CommandContext, refs: DocumentRef[]): Promise<ExecutionOutcome[]> {
  await ctx.orchestrator.drain();
  const outcomes: ExecutionOutcome[] = [];
  for (const ref of refs) {
    const view = await ctx.orchestrator.getExecutionStatus(ref);
    outcomes.push({ ref, view });
    ctx.logger.info("execution_outcome", {
      container: ref.container,
      key: ref.key,
      executionId: view?.executionId,
      status: view?.status,
      currentStage: view?.currentStage,
      lastError: view?.lastError,
    });
  }
  return outcomes;
}

export async function runStart(ctx: CommandContext, ref: DocumentRef): Promise<ExecutionOutcome> {
  ctx.logger.info("start_requested", { container: ref.container, key: ref.key });
  const executionId = await ctx.orchestrator.start(ref);
  ctx.logger.info("start_accepted", { executionId, container: ref.container, key: ref.key });
  const [outcome] = await settle(ctx, [ref]);
  return outcome;
}

export async function runReplay(ctx: CommandContext, ref: DocumentRef, fromStage?: string): Promise<ExecutionOutcome> {
  ctx.logger.info("replay_requested", { container: ref.container, key: ref.key, fromStage });
  const executionId = await ctx.orchestrator.replay(ref, { fromStage });
  ctx.logger.info("replay_accepted", { executionId, container: ref.container, key: ref.key });
  const [outcome] = await settle(ctx, [ref]);
  return outcome;
}

export async function runResume(ctx: CommandContext, limit: number): Promise<{ scheduled: number }> {
  const scheduled = await ctx.orchestrator.resumeStale(limit);
  ctx.logger.info("resume_scheduled", { scheduled: scheduled.length, limit });
  await ctx.orchestrator.drain();
  ctx.logger.info("resume_complete", { scheduled: scheduled.length });
  return { scheduled: scheduled.length };
}

export async function runStatus(
  ctx: CommandContext,
  ref?: DocumentRef,
): Promise<ExecutionStatusView | StoreStats | undefined> {
  if (!ref) {
    const stats = await ctx.store.getStats();
    ctx.logger.info("status_complete", { stats });
    return stats;
  }

  const view = await ctx.orchestrator.getExecutionStatus(ref);
  if (!view) {
    ctx.logger.warn("status_not_found", { container: ref.container, key: ref.key });
    return undefined;
  }
  ctx.logger.info("status_complete", { ...view });
  return view;
}

export async function runHandleEvent(ctx: CommandContext, eventPath: string): Promise<ExecutionOutcome[]> {
  const raw = fs.readFileSync(eventPath, "utf-8");
  const refs = parseStorageEvent(raw, { ignoreKeyPrefixes: triggerIgnorePrefixes(ctx.config) });
  ctx.metrics.incrementCounter("triggers_received");
  ctx.logger.info("event_parsed", { eventPath, documents: refs.length });

  for (const ref of refs) {
    await ctx.orchestrator.start(ref);
    ctx.metrics.incrementCounter("triggers_started");
  }
  return settle(ctx, refs);
}

export interface ListenOptions {
  iterations?: number;
  signal?: AbortSignal;
  queue?: TriggerQueueClient;
}

export async function runListen(ctx: CommandContext, options: ListenOptions = {}): Promise<void> {
  let queue = options.queue;
  if (!queue) {
    if (!ctx.config.triggerQueueUrl) {
      throw new Error("listen requires a trigger queue URL (TRIGGER_QUEUE_URL)");
    }
    queue = new SqsTriggerQueueClient({ queueUrl: ctx.config.triggerQueueUrl, region: ctx.config.awsRegion });
  }

  const listener = new SqsTriggerListener({
    queue,
    target: ctx.orchestrator,
    logger: ctx.logger,
    metrics: ctx.metrics,
    ignoreKeyPrefixes: triggerIgnorePrefixes(ctx.config),
    batchSize: ctx.config.triggerBatchSize,
    waitSeconds: ctx.config.triggerWaitSeconds,
  });

  ctx.logger.info("listen_start", {
    queueUrl: ctx.config.triggerQueueUrl,
    iterations: options.iterations ?? "infinite",
  });
  const summary = await listener.listen({ signal: options.signal, iterations: options.iterations });
  await ctx.orchestrator.drain();
  ctx.logger.info("listen_complete", { ...summary });
}
