import { DEFAULT_CONFIG } from "../config";
import { AppConfig } from "../config/types";
import { Logger, LogOutput } from "../observability";
import { CollaboratorError } from "../providers/errors";
import { ObjectStore, SentimentDetector, SentimentResult, TextDetector } from "../providers/types";
import { createExecutionId } from "../pipeline/executionId";
import { createInitialPayload } from "../pipeline/payload";
import { DocumentRef, ExecutionRecord } from "../types";

export function createTestLogger(component = "test"): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const output: LogOutput = {
    log: (line) => {
      lines.push(line);
    },
    error: (line) => {
      lines.push(line);
    },
  };
  return { logger: new Logger({ component, runId: "run_test" }, output), lines };
}

export function createTestConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...DEFAULT_CONFIG,
    storeMode: "memory",
    ...overrides,
  };
}

export interface StoredObject {
  body: string;
  contentType: string;
}

export class FakeObjectStore implements ObjectStore {
  readonly objects = new Map<string, StoredObject>();
  readonly deleted: string[] = [];
  /** Thrown after the object is written, as when the write acknowledgement is lost. */
  failAfterPut?: Error;

  async getObject(ref: DocumentRef): Promise<Buffer> {
    const stored = this.objects.get(`${ref.container}/${ref.key}`);
    if (!stored) {
      throw new CollaboratorError(`NoSuchKey: ${ref.container}/${ref.key}`, false);
    }
    return Buffer.from(stored.body, "utf-8");
  }

  async putObject(ref: DocumentRef, body: string, contentType: string): Promise<string> {
    this.objects.set(`${ref.container}/${ref.key}`, { body, contentType });
    if (this.failAfterPut) {
      throw this.failAfterPut;
    }
    return `s3://${ref.container}/${ref.key}`;
  }

  async deleteObject(ref: DocumentRef): Promise<void> {
    this.deleted.push(`${ref.container}/${ref.key}`);
    this.objects.delete(`${ref.container}/${ref.key}`);
  }
}

export class FakeTextDetector implements TextDetector {
  calls: DocumentRef[] = [];
  lines: string[] = ["Hello world", "Second line"];
  /** Errors thrown by the next calls, in order. */
  errors: Error[] = [];

  async detectText(ref: DocumentRef): Promise<string[]> {
    this.calls.push(ref);
    const error = this.errors.shift();
    if (error) {
      throw error;
    }
    return [...this.lines];
  }
}

export class FakeSentimentDetector implements SentimentDetector {
  calls: Array<{ text: string; languageCode: string }> = [];
  result: SentimentResult = { label: "POSITIVE", scores: { Positive: 0.9, Negative: 0.02, Neutral: 0.07, Mixed: 0.01 } };
  errors: Error[] = [];
  /** When set, every call fails with this error. */
  alwaysFail?: Error;

  async detectSentiment(text: string, languageCode: string): Promise<SentimentResult> {
    this.calls.push({ text, languageCode });
    if (this.alwaysFail) {
      throw this.alwaysFail;
    }
    const error = this.errors.shift();
    if (error) {
      throw error;
    }
    return { label: this.result.label, scores: { ...this.result.scores } };
  }
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

export function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => signal.addEventListener("abort", () => resolve(), { once: true }));
}

export function buildRecord(ref: DocumentRef, overrides: Partial<ExecutionRecord> = {}): ExecutionRecord {
  const now = "2024-05-01T10:00:00.000Z";
  return {
    executionId: createExecutionId(ref, overrides.generation ?? 0),
    documentRef: { ...ref },
    generation: 0,
    status: "pending",
    currentStageIndex: 0,
    payload: createInitialPayload(ref),
    attempt: 0,
    createdAt: now,
    updatedAt: now,
    version: 0,
    history: [],
    audit: [],
    ...overrides,
  };
}
