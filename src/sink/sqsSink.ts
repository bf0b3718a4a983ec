import { SendMessageBatchCommand, SQSClient } from "@aws-sdk/client-sqs";
import { BaseSink } from "./baseSink";
import { ExecutionEvent, eventIdempotencyKey } from "./types";

interface SqsClientLike {
  send(command: SendMessageBatchCommand): Promise<{ Failed?: Array<{ Id?: string; SenderFault?: boolean }> }>;
}

export interface SqsSinkOptions {
  queueUrl?: string;
  client?: SqsClientLike;
  region?: string;
  fifo?: boolean;
  maxRetries?: number;
  retryDelayMs?: number;
}

interface BatchEntry {
  Id: string;
  MessageBody: string;
  MessageDeduplicationId?: string;
  MessageGroupId?: string;
}

const BATCH_LIMIT = 10;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export class SqsSink extends BaseSink {
  private readonly queueUrl?: string;
  private readonly client: SqsClientLike;
  private readonly fifo: boolean;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(optionsOrQueueUrl?: SqsSinkOptions | string) {
    super();
    const options: SqsSinkOptions =
      typeof optionsOrQueueUrl === "string" ? { queueUrl: optionsOrQueueUrl } : (optionsOrQueueUrl ?? {});

    this.queueUrl = options.queueUrl;
    this.client = options.client ?? new SQSClient(options.region ? { region: options.region } : {});
    this.fifo = options.fifo ?? Boolean(this.queueUrl?.endsWith(".fifo"));
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 200;
  }

  async publishExecutionEvents(events: ExecutionEvent[]): Promise<void> {
    if (events.length === 0) {
      return;
    }

    this.ensureConfigured("SQS", Boolean(this.queueUrl));
    const queueUrl = this.queueUrl ?? "";

    const entries = events.map((event, index) => {
      const entry: BatchEntry = {
        Id: String(index),
        MessageBody: JSON.stringify({
          sentAt: new Date().toISOString(),
          event,
        }),
      };

      if (this.fifo) {
        // one group per execution keeps its events ordered
        entry.MessageGroupId = event.executionId;
        entry.MessageDeduplicationId = eventIdempotencyKey(event);
      }

      return entry;
    });

    for (const entryBatch of chunk(entries, BATCH_LIMIT)) {
      await this.sendBatchWithRetries(queueUrl, entryBatch);
    }
  }

  private async sendBatchWithRetries(queueUrl: string, originalEntries: BatchEntry[]): Promise<void> {
    let pendingEntries = [...originalEntries];
    let attempt = 0;

    while (pendingEntries.length > 0) {
      attempt += 1;
      const command = new SendMessageBatchCommand({
        QueueUrl: queueUrl,
        Entries: pendingEntries,
      });
      const response = await this.client.send(command);

      const failedIds = new Set((response.Failed ?? []).map((f) => f.Id).filter((id): id is string => Boolean(id)));
      if (failedIds.size === 0) {
        return;
      }

      if (attempt > this.maxRetries) {
        throw new Error(`SQS publish failed after retries (${failedIds.size} entries still failed)`);
      }

      pendingEntries = pendingEntries.filter((entry) => failedIds.has(entry.Id));
      await sleep(this.retryDelayMs * attempt);
    }
  }
}
