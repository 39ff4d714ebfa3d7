import { randomUUID } from "node:crypto";
import * as fs from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";

import {
  AuditEventType,
  CaseStatus,
  Confidence,
  TaskStatus,
  ValidatorVerdict,
  isJsonObject,
  type AuditEvent,
  type AuditEventDraft,
  type CaseRecord,
  type JsonObject,
  type RemediationHint,
  type TaskResult,
  type TaskResultDraft,
  type ValidationAttempt,
  type ValidationAttemptDraft,
} from "../contracts/case";
import { createLogger, type PipelineLogger } from "../log";
import type { CaseStore, CreateCaseResult } from "./case_store";

export type LeaseNextCaseResult =
  | { outcome: "leased"; record: CaseRecord; previousStatus: CaseStatus }
  | { outcome: "empty" }
  | { outcome: "contention" };

type CaseRow = {
  id: string;
  source_text: string;
  status: string;
  created_at: string;
  updated_at: string;
  lease_owner: string | null;
  lease_expires_at: string | null;
};

type ResultRow = {
  case_id: string;
  task_name: string;
  revision: number;
  status: string;
  payload_json: string | null;
  confidence: string;
  error_message: string | null;
  skip_reason: string | null;
  degraded_reasons_json: string;
  attempts: number;
  produced_at: string;
};

type AttemptRow = {
  id: string;
  case_id: string;
  checkpoint: string;
  attempt_number: number;
  producer_revision: number;
  producer_output_json: string | null;
  validator_verdict: string;
  remediation_hint_json: string | null;
  created_at: string;
};

type AuditRow = {
  id: string;
  case_id: string;
  run_id: string;
  seq: number;
  event_type: string;
  payload_json: string;
  ts: string;
};

const TERMINAL_STATUSES: CaseStatus[] = ["complete", "partial"];

const isBusyError = (error: unknown) => {
  const code = error && typeof error === "object" && "code" in error ? error.code : undefined;
  return code === "SQLITE_BUSY" || code === "SQLITE_BUSY_SNAPSHOT" || code === "SQLITE_BUSY_TIMEOUT";
};

const parseObject = (json: string | null): JsonObject | null => {
  if (json === null) return null;
  const parsed: unknown = JSON.parse(json);
  return isJsonObject(parsed) ? parsed : null;
};

const parseStringList = (json: string): string[] => {
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === "string") : [];
};

const parseHint = (json: string | null): RemediationHint | null => {
  const obj = parseObject(json);
  if (!obj) return null;
  return {
    missingFields: Array.isArray(obj.missingFields) ? obj.missingFields.map(String) : [],
    inconsistencies: Array.isArray(obj.inconsistencies) ? obj.inconsistencies.map(String) : [],
    guidance: typeof obj.guidance === "string" ? obj.guidance : "",
  };
};

// Rows written by an older build may carry values this one no longer knows.
function narrow<T extends string>(schema: z.ZodType<T>, value: string, fallback: T): T {
  const parsed = schema.safeParse(value);
  return parsed.success ? parsed.data : fallback;
}

export class SqliteCaseStore implements CaseStore {
  private db: Database.Database;
  private log: PipelineLogger;

  constructor(dbPath: string = "./data/cases.db", log: PipelineLogger = createLogger("case_store")) {
    this.log = log;
    if (dbPath !== ":memory:") {
      fs.mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.pragma("busy_timeout = 2000");
    this.initSchema();
    this.log.debug({ evt: "case_store.opened", dbPath }, "case_store.opened");
  }

  private initSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS cases (
        id TEXT PRIMARY KEY,
        source_text TEXT NOT NULL,
        status TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        lease_owner TEXT,
        lease_expires_at TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_cases_status_created
        ON cases(status, created_at);

      CREATE TABLE IF NOT EXISTS task_results (
        case_id TEXT NOT NULL,
        task_name TEXT NOT NULL,
        revision INTEGER NOT NULL,
        status TEXT NOT NULL,
        payload_json TEXT,
        confidence TEXT NOT NULL,
        error_message TEXT,
        skip_reason TEXT,
        degraded_reasons_json TEXT NOT NULL,
        attempts INTEGER NOT NULL,
        produced_at TEXT NOT NULL,
        PRIMARY KEY (case_id, task_name, revision),
        FOREIGN KEY (case_id) REFERENCES cases(id)
      );

      CREATE TABLE IF NOT EXISTS validation_attempts (
        id TEXT PRIMARY KEY,
        case_id TEXT NOT NULL,
        checkpoint TEXT NOT NULL,
        attempt_number INTEGER NOT NULL,
        producer_revision INTEGER NOT NULL,
        producer_output_json TEXT,
        validator_verdict TEXT NOT NULL,
        remediation_hint_json TEXT,
        created_at TEXT NOT NULL,
        FOREIGN KEY (case_id) REFERENCES cases(id)
      );

      CREATE INDEX IF NOT EXISTS idx_validation_attempts_case
        ON validation_attempts(case_id, created_at);

      CREATE TABLE IF NOT EXISTS audit_events (
        id TEXT PRIMARY KEY,
        case_id TEXT NOT NULL,
        run_id TEXT NOT NULL,
        seq INTEGER NOT NULL,
        event_type TEXT NOT NULL,
        payload_json TEXT NOT NULL,
        ts TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_audit_events_case
        ON audit_events(case_id);
    `);
  }

  close() {
    this.db.close();
  }

  private rowToCase(row: CaseRow): CaseRecord {
    return {
      caseId: row.id,
      sourceText: row.source_text,
      status: narrow(CaseStatus, row.status, "pending"),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      leaseOwner: row.lease_owner,
      leaseExpiresAt: row.lease_expires_at,
    };
  }

  private rowToResult(row: ResultRow): TaskResult {
    return {
      caseId: row.case_id,
      taskName: row.task_name,
      status: narrow(TaskStatus, row.status, "failed"),
      payload: parseObject(row.payload_json),
      confidence: narrow(Confidence, row.confidence, "none"),
      ...(row.error_message !== null ? { errorMessage: row.error_message } : {}),
      ...(row.skip_reason !== null ? { skipReason: row.skip_reason } : {}),
      degradedReasons: parseStringList(row.degraded_reasons_json),
      revision: row.revision,
      attempts: row.attempts,
      producedAt: row.produced_at,
    };
  }

  private rowToAttempt(row: AttemptRow): ValidationAttempt {
    return {
      id: row.id,
      caseId: row.case_id,
      checkpoint: row.checkpoint,
      attemptNumber: row.attempt_number,
      producerRevision: row.producer_revision,
      producerOutput: parseObject(row.producer_output_json),
      validatorVerdict: narrow(ValidatorVerdict, row.validator_verdict, "needs_remediation"),
      remediationHint: parseHint(row.remediation_hint_json),
      createdAt: row.created_at,
    };
  }

  private rowToAudit(row: AuditRow): AuditEvent {
    return {
      id: row.id,
      caseId: row.case_id,
      runId: row.run_id,
      seq: row.seq,
      eventType: narrow(AuditEventType, row.event_type, "pipeline-started"),
      payload: parseObject(row.payload_json) ?? {},
      ts: row.ts,
    };
  }

  async createCase(args: { caseId?: string; sourceText: string }): Promise<CreateCaseResult> {
    const caseId = args.caseId ?? randomUUID();
    const now = new Date().toISOString();
    const inserted = this.db
      .prepare<[string, string, string, string]>(`
        INSERT OR IGNORE INTO cases (id, source_text, status, created_at, updated_at)
        VALUES (?, ?, 'pending', ?, ?)
      `)
      .run(caseId, args.sourceText, now, now);

    const row = this.db.prepare<[string], CaseRow>("SELECT * FROM cases WHERE id = ?").get(caseId);
    if (!row) throw new Error(`case insert failed: ${caseId}`);
    return { record: this.rowToCase(row), created: inserted.changes === 1 };
  }

  async getCase(caseId: string): Promise<CaseRecord | null> {
    const row = this.db.prepare<[string], CaseRow>("SELECT * FROM cases WHERE id = ?").get(caseId);
    return row ? this.rowToCase(row) : null;
  }

  async setCaseStatus(args: { caseId: string; status: CaseStatus }): Promise<void> {
    const clearLease = TERMINAL_STATUSES.includes(args.status);
    const update = this.db
      .prepare<[string, string, string]>(`
        UPDATE cases
        SET status = ?, updated_at = ?
          ${clearLease ? ", lease_owner = NULL, lease_expires_at = NULL" : ""}
        WHERE id = ?
      `)
      .run(args.status, new Date().toISOString(), args.caseId);
    if (update.changes === 0) throw new Error(`case not found: ${args.caseId}`);
  }

  async listCases(args: { status?: CaseStatus; limit?: number } = {}): Promise<CaseRecord[]> {
    const limit = args.limit ?? 100;
    const rows = args.status
      ? this.db
          .prepare<[string, number], CaseRow>(
            "SELECT * FROM cases WHERE status = ? ORDER BY created_at ASC LIMIT ?"
          )
          .all(args.status, limit)
      : this.db
          .prepare<[number], CaseRow>("SELECT * FROM cases ORDER BY created_at ASC LIMIT ?")
          .all(limit);
    return rows.map((row) => this.rowToCase(row));
  }

  async saveResult(draft: TaskResultDraft): Promise<TaskResult> {
    const producedAt = new Date().toISOString();
    const insert = this.db.transaction((): number => {
      const current = this.db
        .prepare<[string, string], { revision: number | null }>(
          "SELECT MAX(revision) AS revision FROM task_results WHERE case_id = ? AND task_name = ?"
        )
        .get(draft.caseId, draft.taskName);
      const revision = (current?.revision ?? 0) + 1;
      this.db
        .prepare(`
          INSERT INTO task_results (
            case_id, task_name, revision, status, payload_json, confidence,
            error_message, skip_reason, degraded_reasons_json, attempts, produced_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `)
        .run(
          draft.caseId,
          draft.taskName,
          revision,
          draft.status,
          draft.payload === null ? null : JSON.stringify(draft.payload),
          draft.confidence,
          draft.errorMessage ?? null,
          draft.skipReason ?? null,
          JSON.stringify(draft.degradedReasons),
          draft.attempts,
          producedAt
        );
      return revision;
    });

    const revision = insert.immediate();
    return {
      ...draft,
      degradedReasons: [...draft.degradedReasons],
      revision,
      producedAt,
    };
  }

  async getResult(caseId: string, taskName: string): Promise<TaskResult | null> {
    const row = this.db
      .prepare<[string, string], ResultRow>(`
        SELECT * FROM task_results
        WHERE case_id = ? AND task_name = ?
        ORDER BY revision DESC
        LIMIT 1
      `)
      .get(caseId, taskName);
    return row ? this.rowToResult(row) : null;
  }

  async listResults(caseId: string): Promise<TaskResult[]> {
    const rows = this.db
      .prepare<[string], ResultRow>(`
        SELECT r.* FROM task_results r
        WHERE r.case_id = ?
          AND r.revision = (
            SELECT MAX(x.revision) FROM task_results x
            WHERE x.case_id = r.case_id AND x.task_name = r.task_name
          )
        ORDER BY r.task_name ASC
      `)
      .all(caseId);
    return rows.map((row) => this.rowToResult(row));
  }

  async getResultHistory(caseId: string, taskName: string): Promise<TaskResult[]> {
    const rows = this.db
      .prepare<[string, string], ResultRow>(`
        SELECT * FROM task_results
        WHERE case_id = ? AND task_name = ?
        ORDER BY revision ASC
      `)
      .all(caseId, taskName);
    return rows.map((row) => this.rowToResult(row));
  }

  async appendValidationAttempt(draft: ValidationAttemptDraft): Promise<ValidationAttempt> {
    const attempt: ValidationAttempt = {
      ...draft,
      id: randomUUID(),
      createdAt: new Date().toISOString(),
    };
    this.db
      .prepare(`
        INSERT INTO validation_attempts (
          id, case_id, checkpoint, attempt_number, producer_revision,
          producer_output_json, validator_verdict, remediation_hint_json, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        attempt.id,
        attempt.caseId,
        attempt.checkpoint,
        attempt.attemptNumber,
        attempt.producerRevision,
        attempt.producerOutput === null ? null : JSON.stringify(attempt.producerOutput),
        attempt.validatorVerdict,
        attempt.remediationHint === null ? null : JSON.stringify(attempt.remediationHint),
        attempt.createdAt
      );
    return attempt;
  }

  async listValidationAttempts(caseId: string): Promise<ValidationAttempt[]> {
    const rows = this.db
      .prepare<[string], AttemptRow>(`
        SELECT * FROM validation_attempts
        WHERE case_id = ?
        ORDER BY rowid ASC
      `)
      .all(caseId);
    return rows.map((row) => this.rowToAttempt(row));
  }

  async appendAuditEvent(draft: AuditEventDraft): Promise<AuditEvent> {
    const event: AuditEvent = { ...draft, id: randomUUID() };
    this.db
      .prepare(`
        INSERT INTO audit_events (id, case_id, run_id, seq, event_type, payload_json, ts)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        event.id,
        event.caseId,
        event.runId,
        event.seq,
        event.eventType,
        JSON.stringify(event.payload),
        event.ts
      );
    return event;
  }

  async listAuditEvents(
    caseId: string,
    args: { limit?: number; runId?: string } = {}
  ): Promise<AuditEvent[]> {
    const limit = args.limit ?? -1;
    const rows = args.runId
      ? this.db
          .prepare<[string, string, number], AuditRow>(`
            SELECT * FROM audit_events
            WHERE case_id = ? AND run_id = ?
            ORDER BY rowid ASC
            LIMIT ?
          `)
          .all(caseId, args.runId, limit)
      : this.db
          .prepare<[string, number], AuditRow>(`
            SELECT * FROM audit_events
            WHERE case_id = ?
            ORDER BY rowid ASC
            LIMIT ?
          `)
          .all(caseId, limit);
    return rows.map((row) => this.rowToAudit(row));
  }

  /**
   * Claims the oldest case that is waiting (`pending`) or whose worker lease
   * lapsed while `in_progress`. Cases processed inline by the HTTP route carry
   * no lease and are never picked up here.
   */
  async leaseNextCase(args: {
    leaseOwner: string;
    leaseDurationSeconds: number;
  }): Promise<LeaseNextCaseResult> {
    const nowIso = new Date().toISOString();
    const leaseExpiresAt = new Date(Date.now() + args.leaseDurationSeconds * 1000).toISOString();

    try {
      this.db.exec("BEGIN IMMEDIATE");
    } catch (error) {
      if (isBusyError(error)) return { outcome: "contention" };
      throw error;
    }

    try {
      const row = this.db
        .prepare<[string, string], CaseRow>(`
          SELECT * FROM cases
          WHERE (status = 'pending' AND (lease_expires_at IS NULL OR lease_expires_at < ?))
             OR (status = 'in_progress' AND lease_expires_at IS NOT NULL AND lease_expires_at < ?)
          ORDER BY created_at ASC
          LIMIT 1
        `)
        .get(nowIso, nowIso);

      if (!row) {
        this.db.exec("ROLLBACK");
        return { outcome: "empty" };
      }

      const update = this.db
        .prepare<[string, string, string, string]>(`
          UPDATE cases
          SET lease_expires_at = ?, lease_owner = ?
          WHERE id = ?
            AND (lease_expires_at IS NULL OR lease_expires_at < ?)
        `)
        .run(leaseExpiresAt, args.leaseOwner, row.id, nowIso);

      if (update.changes === 0) {
        this.db.exec("ROLLBACK");
        return { outcome: "contention" };
      }

      this.db.exec("COMMIT");

      const record = this.rowToCase({
        ...row,
        lease_owner: args.leaseOwner,
        lease_expires_at: leaseExpiresAt,
      });
      return { outcome: "leased", record, previousStatus: record.status };
    } catch (error) {
      try {
        this.db.exec("ROLLBACK");
      } catch (rollbackError) {
        this.log.warn(
          { evt: "case_store.rollback_failed", error: String(rollbackError) },
          "case_store.rollback_failed"
        );
      }
      throw error;
    }
  }

  async getLeaseableStats(): Promise<{ leaseableCount: number; oldestCreatedAt: string | null }> {
    const nowIso = new Date().toISOString();
    const row = this.db
      .prepare<[string, string], { leaseable_count: number; oldest_created_at: string | null }>(`
        SELECT COUNT(*) AS leaseable_count, MIN(created_at) AS oldest_created_at
        FROM cases
        WHERE (status = 'pending' AND (lease_expires_at IS NULL OR lease_expires_at < ?))
           OR (status = 'in_progress' AND lease_expires_at IS NOT NULL AND lease_expires_at < ?)
      `)
      .get(nowIso, nowIso);
    return {
      leaseableCount: row?.leaseable_count ?? 0,
      oldestCreatedAt: row?.oldest_created_at ?? null,
    };
  }
}
