import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import {
  ConcurrentModificationError,
  DuplicateExecutionError,
  ExecutionNotFoundError,
  TerminalExecutionError,
} from "../pipeline/errors";
import { AuditEvent, DocumentRef, ExecutionRecord, isTerminalStatus } from "../types";
import { parseAuditEvent, parseExecutionError, parseHistory, parsePayload, parseStatus } from "./serialization";
import { ExecutionRecordStore, StoreStats } from "./types";

type ExecutionRow = {
  executionId: string;
  container: string;
  objectKey: string;
  generation: number;
  status: string;
  currentStageIndex: number;
  payload: string;
  attempt: number;
  createdAt: string;
  updatedAt: string;
  lastError: string | null;
  version: number;
  leaseOwner: string | null;
  leaseExpiresAt: string | null;
  history: string;
  replayOf: string | null;
};

type SaveParams = Pick<
  ExecutionRow,
  | "executionId"
  | "status"
  | "currentStageIndex"
  | "payload"
  | "attempt"
  | "updatedAt"
  | "lastError"
  | "leaseOwner"
  | "leaseExpiresAt"
  | "history"
  | "version"
>;

type AuditRow = {
  event: string;
};

const EXECUTION_COLUMNS = `
  executionId, container, objectKey, generation, status, currentStageIndex, payload, attempt,
  createdAt, updatedAt, lastError, version, leaseOwner, leaseExpiresAt, history, replayOf
`;

function isConstraintViolation(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string" &&
    error.code.startsWith("SQLITE_CONSTRAINT")
  );
}

function toRow(record: ExecutionRecord): ExecutionRow {
  return {
    executionId: record.executionId,
    container: record.documentRef.container,
    objectKey: record.documentRef.key,
    generation: record.generation,
    status: record.status,
    currentStageIndex: record.currentStageIndex,
    payload: JSON.stringify(record.payload),
    attempt: record.attempt,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
    lastError: record.lastError ? JSON.stringify(record.lastError) : null,
    version: record.version,
    leaseOwner: record.leaseOwner ?? null,
    leaseExpiresAt: record.leaseExpiresAt ?? null,
    history: JSON.stringify(record.history),
    replayOf: record.replayOf ?? null,
  };
}

export class SqliteStore implements ExecutionRecordStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath === ":memory:") {
      this.db = new Database(dbPath);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }
    this.initializeSchema();
  }

  async create(record: ExecutionRecord): Promise<ExecutionRecord> {
    const row = { ...toRow(record), version: 1 };
    try {
      this.db
        .prepare<ExecutionRow>(
          `
          INSERT INTO executions (${EXECUTION_COLUMNS})
          VALUES (
            @executionId, @container, @objectKey, @generation, @status, @currentStageIndex, @payload, @attempt,
            @createdAt, @updatedAt, @lastError, @version, @leaseOwner, @leaseExpiresAt, @history, @replayOf
          )
        `,
        )
        .run(row);
    } catch (error) {
      if (isConstraintViolation(error)) {
        throw new DuplicateExecutionError(record.executionId);
      }
      throw error;
    }

    return this.loadOrThrow(record.executionId);
  }

  async load(executionId: string): Promise<ExecutionRecord | undefined> {
    const row = this.db
      .prepare<[string], ExecutionRow>(`SELECT ${EXECUTION_COLUMNS} FROM executions WHERE executionId = ?`)
      .get(executionId);
    if (!row) {
      return undefined;
    }
    return this.fromRow(row);
  }

  async save(record: ExecutionRecord): Promise<ExecutionRecord> {
    const row = toRow(record);
    const result = this.db
      .prepare<SaveParams>(
        `
        UPDATE executions
        SET
          status = @status,
          currentStageIndex = @currentStageIndex,
          payload = @payload,
          attempt = @attempt,
          updatedAt = @updatedAt,
          lastError = @lastError,
          leaseOwner = @leaseOwner,
          leaseExpiresAt = @leaseExpiresAt,
          history = @history,
          version = version + 1
        WHERE executionId = @executionId
          AND version = @version
          AND status NOT IN ('succeeded', 'failed')
      `,
      )
      .run({
        executionId: row.executionId,
        status: row.status,
        currentStageIndex: row.currentStageIndex,
        payload: row.payload,
        attempt: row.attempt,
        updatedAt: row.updatedAt,
        lastError: row.lastError,
        leaseOwner: row.leaseOwner,
        leaseExpiresAt: row.leaseExpiresAt,
        history: row.history,
        version: row.version,
      });

    if (result.changes === 0) {
      const current = await this.load(record.executionId);
      if (!current) {
        throw new ExecutionNotFoundError(record.executionId);
      }
      if (isTerminalStatus(current.status)) {
        throw new TerminalExecutionError(record.executionId);
      }
      throw new ConcurrentModificationError(record.executionId, record.version);
    }

    return this.loadOrThrow(record.executionId);
  }

  async exists(ref: DocumentRef): Promise<string | undefined> {
    const row = this.db
      .prepare<[string, string], { executionId: string }>(
        `
        SELECT executionId
        FROM executions
        WHERE container = ? AND objectKey = ?
        ORDER BY generation DESC
        LIMIT 1
      `,
      )
      .get(ref.container, ref.key);
    return row?.executionId;
  }

  async appendAudit(executionId: string, event: AuditEvent): Promise<void> {
    const found = this.db
      .prepare<[string], { executionId: string }>(`SELECT executionId FROM executions WHERE executionId = ?`)
      .get(executionId);
    if (!found) {
      throw new ExecutionNotFoundError(executionId);
    }

    this.db
      .prepare<{ executionId: string; event: string; createdAt: string }>(
        `
        INSERT INTO execution_audit (executionId, event, createdAt)
        VALUES (@executionId, @event, @createdAt)
      `,
      )
      .run({ executionId, event: JSON.stringify(event), createdAt: event.at });
  }

  async listResumable(limit: number, nowIso: string): Promise<ExecutionRecord[]> {
    const rows = this.db
      .prepare<{ now: string; limit: number }, ExecutionRow>(
        `
        SELECT ${EXECUTION_COLUMNS}
        FROM executions
        WHERE status = 'pending'
          OR (status = 'running' AND (leaseExpiresAt IS NULL OR leaseExpiresAt < @now))
        ORDER BY updatedAt ASC
        LIMIT @limit
      `,
      )
      .all({ now: nowIso, limit });

    return rows.map((row) => this.fromRow(row));
  }

  async getStats(): Promise<StoreStats> {
    return {
      totalExecutions: this.countWhere("1 = 1"),
      pending: this.countWhere("status = 'pending'"),
      running: this.countWhere("status = 'running'"),
      succeeded: this.countWhere("status = 'succeeded'"),
      failed: this.countWhere("status = 'failed'"),
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private async loadOrThrow(executionId: string): Promise<ExecutionRecord> {
    const record = await this.load(executionId);
    if (!record) {
      throw new ExecutionNotFoundError(executionId);
    }
    return record;
  }

  private fromRow(row: ExecutionRow): ExecutionRecord {
    const auditRows = this.db
      .prepare<[string], AuditRow>(`SELECT event FROM execution_audit WHERE executionId = ? ORDER BY id ASC`)
      .all(row.executionId);

    const record: ExecutionRecord = {
      executionId: row.executionId,
      documentRef: { container: row.container, key: row.objectKey },
      generation: row.generation,
      status: parseStatus(row.status),
      currentStageIndex: row.currentStageIndex,
      payload: parsePayload(row.payload),
      attempt: row.attempt,
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
      version: row.version,
      history: parseHistory(row.history),
      audit: auditRows.map((auditRow) => parseAuditEvent(auditRow.event)),
    };

    const lastError = parseExecutionError(row.lastError);
    if (lastError) {
      record.lastError = lastError;
    }
    if (row.leaseOwner !== null) {
      record.leaseOwner = row.leaseOwner;
    }
    if (row.leaseExpiresAt !== null) {
      record.leaseExpiresAt = row.leaseExpiresAt;
    }
    if (row.replayOf !== null) {
      record.replayOf = row.replayOf;
    }
    return record;
  }

  private countWhere(whereClause: string): number {
    const row = this.db
      .prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM executions WHERE ${whereClause}`)
      .get();
    return row?.count ?? 0;
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS executions (
        executionId TEXT PRIMARY KEY,
        container TEXT NOT NULL,
        objectKey TEXT NOT NULL,
        generation INTEGER NOT NULL DEFAULT 0,
        status TEXT NOT NULL,
        currentStageIndex INTEGER NOT NULL DEFAULT 0,
        payload TEXT NOT NULL,
        attempt INTEGER NOT NULL DEFAULT 0,
        createdAt TEXT NOT NULL,
        updatedAt TEXT NOT NULL,
        lastError TEXT NULL,
        version INTEGER NOT NULL,
        leaseOwner TEXT NULL,
        leaseExpiresAt TEXT NULL,
        history TEXT NOT NULL,
        replayOf TEXT NULL
      );

      CREATE TABLE IF NOT EXISTS execution_audit (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        executionId TEXT NOT NULL,
        event TEXT NOT NULL,
        createdAt TEXT NOT NULL
      );

      CREATE UNIQUE INDEX IF NOT EXISTS idx_executions_document ON executions(container, objectKey, generation);
      CREATE INDEX IF NOT EXISTS idx_executions_status ON executions(status);
      CREATE INDEX IF NOT EXISTS idx_execution_audit_execution ON execution_audit(executionId);
    `);
  }
}
