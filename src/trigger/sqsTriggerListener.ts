import { DeleteMessageCommand, ReceiveMessageCommand, SQSClient } from "@aws-sdk/client-sqs";
import { errorMessage, Logger, MetricsRegistry } from "../observability";
import { PipelineError, StoreUnavailableError } from "../pipeline/errors";
import { abortableSleep, SleepFn } from "../pipeline/orchestrator";
import { DocumentRef } from "../types";
import { InvalidTriggerEventError, parseStorageEvent } from "./storageEvents";

export interface TriggerMessage {
  id: string;
  body: string;
  receiptHandle: string;
}

export interface TriggerQueueClient {
  receive(maxMessages: number, waitSeconds: number): Promise<TriggerMessage[]>;
  delete(receiptHandle: string): Promise<void>;
}

export interface TriggerTarget {
  start(ref: DocumentRef): Promise<string>;
}

export interface SqsTriggerQueueClientOptions {
  queueUrl: string;
  client?: SQSClient;
  region?: string;
}

export class SqsTriggerQueueClient implements TriggerQueueClient {
  private readonly queueUrl: string;
  private readonly client: SQSClient;

  constructor(options: SqsTriggerQueueClientOptions) {
    this.queueUrl = options.queueUrl;
    this.client = options.client ?? new SQSClient(options.region ? { region: options.region } : {});
  }

  async receive(maxMessages: number, waitSeconds: number): Promise<TriggerMessage[]> {
    const response = await this.client.send(
      new ReceiveMessageCommand({
        QueueUrl: this.queueUrl,
        MaxNumberOfMessages: Math.min(Math.max(maxMessages, 1), 10),
        WaitTimeSeconds: Math.min(Math.max(waitSeconds, 0), 20),
      }),
    );

    const messages: TriggerMessage[] = [];
    for (const message of response.Messages ?? []) {
      if (message.MessageId && message.ReceiptHandle && message.Body !== undefined) {
        messages.push({ id: message.MessageId, body: message.Body, receiptHandle: message.ReceiptHandle });
      }
    }
    return messages;
  }

  async delete(receiptHandle: string): Promise<void> {
    await this.client.send(new DeleteMessageCommand({ QueueUrl: this.queueUrl, ReceiptHandle: receiptHandle }));
  }
}

export interface SqsTriggerListenerDeps {
  queue: TriggerQueueClient;
  target: TriggerTarget;
  logger: Logger;
  metrics: MetricsRegistry;
  ignoreKeyPrefixes: string[];
  batchSize: number;
  waitSeconds: number;
  /** First pause after a failed poll; doubles per consecutive failure up to `pollRetryMaxMs`. */
  pollRetryBaseMs?: number;
  pollRetryMaxMs?: number;
  sleep?: SleepFn;
}

export interface PollSummary {
  received: number;
  started: number;
  ignored: number;
  failed: number;
}

/** Errors that will fail the same way on redelivery. */
function isPermanentStartError(error: unknown): boolean {
  return error instanceof PipelineError && !(error instanceof StoreUnavailableError);
}

export class SqsTriggerListener {
  private readonly deps: SqsTriggerListenerDeps;

  constructor(deps: SqsTriggerListenerDeps) {
    this.deps = deps;
  }

  async pollOnce(): Promise<PollSummary> {
    const { queue, logger, metrics } = this.deps;
    const messages = await queue.receive(this.deps.batchSize, this.deps.waitSeconds);
    const summary: PollSummary = { received: messages.length, started: 0, ignored: 0, failed: 0 };

    for (const message of messages) {
      metrics.incrementCounter("triggers_received");

      let refs: DocumentRef[];
      try {
        refs = parseStorageEvent(message.body, { ignoreKeyPrefixes: this.deps.ignoreKeyPrefixes });
      } catch (error) {
        if (!(error instanceof InvalidTriggerEventError)) {
          throw error;
        }
        logger.warn("trigger_message_invalid", { messageId: message.id, error: error.message });
        summary.failed += 1;
        await queue.delete(message.receiptHandle);
        continue;
      }

      if (refs.length === 0) {
        summary.ignored += 1;
        await queue.delete(message.receiptHandle);
        continue;
      }

      try {
        for (const ref of refs) {
          const executionId = await this.deps.target.start(ref);
          metrics.incrementCounter("triggers_started");
          summary.started += 1;
          logger.info("trigger_started", { executionId, container: ref.container, key: ref.key });
        }
        await queue.delete(message.receiptHandle);
      } catch (error) {
        summary.failed += 1;
        if (isPermanentStartError(error)) {
          logger.error("trigger_start_rejected", { messageId: message.id, error: errorMessage(error) });
          await queue.delete(message.receiptHandle);
        } else {
          // left on the queue; it comes back after the visibility timeout
          logger.error("trigger_start_failed", { messageId: message.id, error: errorMessage(error) });
        }
      }
    }

    return summary;
  }

  async listen(options: { signal?: AbortSignal; iterations?: number } = {}): Promise<PollSummary> {
    const { logger, metrics } = this.deps;
    const retryBaseMs = this.deps.pollRetryBaseMs ?? 1_000;
    const retryMaxMs = this.deps.pollRetryMaxMs ?? 30_000;
    const sleep = this.deps.sleep ?? abortableSleep;
    const total: PollSummary = { received: 0, started: 0, ignored: 0, failed: 0 };
    let iteration = 0;
    let consecutiveFailures = 0;

    while (!options.signal?.aborted && (options.iterations === undefined || iteration < options.iterations)) {
      iteration += 1;
      let summary: PollSummary;
      try {
        summary = await this.pollOnce();
      } catch (error) {
        consecutiveFailures += 1;
        const backoffMs = Math.min(retryBaseMs * 2 ** (consecutiveFailures - 1), retryMaxMs);
        metrics.incrementCounter("trigger_poll_errors");
        logger.error("trigger_poll_failed", { iteration, consecutiveFailures, backoffMs, error: errorMessage(error) });
        await sleep(backoffMs, options.signal);
        continue;
      }

      consecutiveFailures = 0;
      total.received += summary.received;
      total.started += summary.started;
      total.ignored += summary.ignored;
      total.failed += summary.failed;
    }

    this.deps.logger.info("trigger_listener_stopped", { iterations: iteration, ...total });
    return total;
  }
}
