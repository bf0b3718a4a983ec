import { AppConfig } from "../config";
import { Logger, MetricsRegistry } from "../observability";
import { createDocumentPipeline, Orchestrator } from "../pipeline";
import { createProviders, Providers } from "../providers";
import { Sink } from "../sink";
import { createStageRegistry } from "../stages";
import { ExecutionRecordStore } from "../store";

export interface OrchestratorFactoryDeps {
  store: ExecutionRecordStore;
  logger: Logger;
  metrics: MetricsRegistry;
  sink?: Sink;
  workerId: string;
  providers?: Providers;
}

export function createDocumentOrchestrator(config: AppConfig, deps: OrchestratorFactoryDeps): Orchestrator {
  const providers = deps.providers ?? createProviders(config);
  return new Orchestrator({
    definition: createDocumentPipeline(config),
    registry: createStageRegistry(config, providers),
    store: deps.store,
    logger: deps.logger,
    metrics: deps.metrics,
    sink: deps.sink,
    workerId: deps.workerId,
    leaseMs: config.leaseMinutes * 60_000,
    maxConcurrency: config.maxConcurrentExecutions,
    storeRetryAttempts: config.storeRetryAttempts,
    storeRetryDelayMs: config.storeRetryDelayMs,
  });
}
