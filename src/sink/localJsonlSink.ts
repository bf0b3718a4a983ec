import fs from "node:fs";
import path from "node:path";
import { AppConfig } from "../config";
import { BaseSink } from "./baseSink";
import { ExecutionEvent } from "./types";

export class LocalJsonlSink extends BaseSink {
  private readonly eventsPath: string;
  private readonly runId: string;

  constructor(config: AppConfig, runId: string) {
    super();
    const manifestsDir = path.resolve(config.outputDirs.manifests);
    fs.mkdirSync(manifestsDir, { recursive: true });
    this.eventsPath = path.join(manifestsDir, "executions.jsonl");
    this.runId = runId;
  }

  async publishExecutionEvents(events: ExecutionEvent[]): Promise<void> {
    if (events.length === 0) {
      return;
    }

    const content = events.map((event) => JSON.stringify({ runId: this.runId, ...event })).join("\n") + "\n";
    await fs.promises.appendFile(this.eventsPath, content, "utf-8");
  }
}
