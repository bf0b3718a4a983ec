import type { ChannelModel, Options } from "amqplib";
import { connect as amqpConnect } from "amqplib";
import { BaseSink } from "./baseSink";
import { ExecutionEvent, eventIdempotencyKey } from "./types";

type ConnectFn = (url: string) => Promise<ConnectionLike>;

interface ConnectionLike {
  createConfirmChannel(): Promise<ChannelLike>;
  close(): Promise<void>;
}

interface ChannelLike {
  assertExchange(exchange: string, type: string, options?: Options.AssertExchange): Promise<unknown>;
  publish(exchange: string, routingKey: string, content: Buffer, options?: Options.Publish): boolean;
  waitForConfirms?(): Promise<void>;
  close(): Promise<void>;
}

export interface RabbitSinkOptions {
  connectionUrl?: string;
  exchange?: string;
  routingKeyPrefix?: string;
  exchangeType?: string;
  maxRetries?: number;
  retryDelayMs?: number;
  connectFn?: ConnectFn;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function connectAmqp(url: string): Promise<ConnectionLike> {
  const connection: ChannelModel = await amqpConnect(url);
  return connection;
}

export class RabbitSink extends BaseSink {
  private readonly connectionUrl?: string;
  private readonly exchange: string;
  private readonly routingKeyPrefix: string;
  private readonly exchangeType: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly connectFn: ConnectFn;

  constructor(optionsOrConnectionUrl?: RabbitSinkOptions | string) {
    super();
    const options: RabbitSinkOptions =
      typeof optionsOrConnectionUrl === "string" ? { connectionUrl: optionsOrConnectionUrl } : (optionsOrConnectionUrl ?? {});

    this.connectionUrl = options.connectionUrl;
    this.exchange = options.exchange ?? "document.pipeline";
    this.routingKeyPrefix = options.routingKeyPrefix ?? "execution";
    this.exchangeType = options.exchangeType ?? "topic";
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 250;
    this.connectFn = options.connectFn ?? connectAmqp;
  }

  async publishExecutionEvents(events: ExecutionEvent[]): Promise<void> {
    if (events.length === 0) {
      return;
    }

    this.ensureConfigured("RabbitMQ", Boolean(this.connectionUrl));
    const url = this.connectionUrl ?? "";

    let attempt = 0;
    while (true) {
      attempt += 1;
      let connection: ConnectionLike | undefined;
      let channel: ChannelLike | undefined;

      try {
        connection = await this.connectFn(url);
        channel = await connection.createConfirmChannel();
        await channel.assertExchange(this.exchange, this.exchangeType, { durable: true });

        for (const event of events) {
          const body = Buffer.from(
            JSON.stringify({
              sentAt: new Date().toISOString(),
              event,
            }),
          );

          channel.publish(this.exchange, `${this.routingKeyPrefix}.${event.type}`, body, {
            persistent: true,
            contentType: "application/json",
            headers: {
              "x-event-type": event.type,
              "x-execution-id": event.executionId,
              "x-idempotency-key": eventIdempotencyKey(event),
            },
          });
        }

        if (typeof channel.waitForConfirms === "function") {
          await channel.waitForConfirms();
        }

        await channel.close();
        await connection.close();
        return;
      } catch (error) {
        if (channel) {
          await channel.close().catch(() => undefined);
        }
        if (connection) {
          await connection.close().catch(() => undefined);
        }

        if (attempt > this.maxRetries) {
          throw error;
        }
      }

      await sleep(this.retryDelayMs * attempt);
    }
  }
}
