import { AuditEvent, DocumentRef, ExecutionRecord } from "../types";

export interface StoreStats {
  totalExecutions: number;
  pending: number;
  running: number;
  succeeded: number;
  failed: number;
}

/**
 * Durable home of execution records. `save` is a compare-and-swap on `version`:
 * a stale writer gets ConcurrentModificationError, and terminal records reject
 * every save (only `appendAudit` may touch them).
 */
export interface ExecutionRecordStore {
  create(record: ExecutionRecord): Promise<ExecutionRecord>;
  load(executionId: string): Promise<ExecutionRecord | undefined>;
  save(record: ExecutionRecord): Promise<ExecutionRecord>;
  exists(ref: DocumentRef): Promise<string | undefined>;
  appendAudit(executionId: string, event: AuditEvent): Promise<void>;
  listResumable(limit: number, nowIso: string): Promise<ExecutionRecord[]>;
  getStats(): Promise<StoreStats>;
  close(): Promise<void>;
}
