import { AppConfig } from "../config";
import { HttpSink } from "./httpSink";
import { LocalJsonlSink } from "./localJsonlSink";
import { RabbitSink } from "./rabbitSink";
import { SqsSink } from "./sqsSink";
import { Sink } from "./types";

export function createSink(config: AppConfig, runId: string, env: NodeJS.ProcessEnv = process.env): Sink {
  const sinkType = (env.SINK_TYPE ?? "local_jsonl").toLowerCase();

  switch (sinkType) {
    case "local_jsonl":
      return new LocalJsonlSink(config, runId);
    case "sqs":
      return new SqsSink({ queueUrl: env.SQS_SINK_QUEUE_URL, region: config.awsRegion });
    case "rabbit":
      return new RabbitSink(env.RABBIT_URL);
    case "http":
      return new HttpSink({
        endpoint: env.HTTP_SINK_ENDPOINT,
        token: env.HTTP_SINK_TOKEN,
        ignoreHttpsErrors: config.ignoreHttpsErrors,
      });
    default:
      throw new Error(`Unsupported sink type: ${sinkType}`);
  }
}

export { HttpSink } from "./httpSink";
export { LocalJsonlSink } from "./localJsonlSink";
export { RabbitSink } from "./rabbitSink";
export { SqsSink } from "./sqsSink";
export * from "./types";
