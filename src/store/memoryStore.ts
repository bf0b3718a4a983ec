import {
  ConcurrentModificationError,
  DuplicateExecutionError,
  ExecutionNotFoundError,
  TerminalExecutionError,
} from "../pipeline/errors";
import { documentKey } from "../pipeline/executionId";
import { AuditEvent, DocumentRef, ExecutionRecord, isTerminalStatus } from "../types";
import { ExecutionRecordStore, StoreStats } from "./types";

export class InMemoryStore implements ExecutionRecordStore {
  private readonly records = new Map<string, ExecutionRecord>();
  private readonly latestByDocument = new Map<string, { executionId: string; generation: number }>();

  async create(record: ExecutionRecord): Promise<ExecutionRecord> {
    if (this.records.has(record.executionId)) {
      throw new DuplicateExecutionError(record.executionId);
    }

    const stored: ExecutionRecord = { ...structuredClone(record), version: 1 };
    this.records.set(record.executionId, stored);

    const docKey = documentKey(record.documentRef);
    const latest = this.latestByDocument.get(docKey);
    if (!latest || latest.generation <= record.generation) {
      this.latestByDocument.set(docKey, { executionId: record.executionId, generation: record.generation });
    }
    return structuredClone(stored);
  }

  async load(executionId: string): Promise<ExecutionRecord | undefined> {
    const stored = this.records.get(executionId);
    return stored ? structuredClone(stored) : undefined;
  }

  async save(record: ExecutionRecord): Promise<ExecutionRecord> {
    const stored = this.records.get(record.executionId);
    if (!stored) {
      throw new ExecutionNotFoundError(record.executionId);
    }
    if (isTerminalStatus(stored.status)) {
      throw new TerminalExecutionError(record.executionId);
    }
    if (stored.version !== record.version) {
      throw new ConcurrentModificationError(record.executionId, record.version);
    }

    const next: ExecutionRecord = { ...structuredClone(record), audit: stored.audit, version: stored.version + 1 };
    this.records.set(record.executionId, next);
    return structuredClone(next);
  }

  async exists(ref: DocumentRef): Promise<string | undefined> {
    return this.latestByDocument.get(documentKey(ref))?.executionId;
  }

  async appendAudit(executionId: string, event: AuditEvent): Promise<void> {
    const stored = this.records.get(executionId);
    if (!stored) {
      throw new ExecutionNotFoundError(executionId);
    }
    stored.audit = [...stored.audit, structuredClone(event)];
  }

  async listResumable(limit: number, nowIso: string): Promise<ExecutionRecord[]> {
    return [...this.records.values()]
      .filter(
        (record) =>
          record.status === "pending" ||
          (record.status === "running" && (record.leaseExpiresAt === undefined || record.leaseExpiresAt < nowIso)),
      )
      .sort((a, b) => a.updatedAt.localeCompare(b.updatedAt))
      .slice(0, limit)
      .map((record) => structuredClone(record));
  }

  async getStats(): Promise<StoreStats> {
    const stats: StoreStats = { totalExecutions: 0, pending: 0, running: 0, succeeded: 0, failed: 0 };
    for (const record of this.records.values()) {
      stats.totalExecutions += 1;
      stats[record.status] += 1;
    }
    return stats;
  }

  async close(): Promise<void> {
    return;
  }
}
