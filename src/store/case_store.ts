import { randomUUID } from "node:crypto";

import type {
  AuditEvent,
  AuditEventDraft,
  CaseRecord,
  CaseStatus,
  TaskResult,
  TaskResultDraft,
  ValidationAttempt,
  ValidationAttemptDraft,
} from "../contracts/case";

export type CreateCaseResult = {
  record: CaseRecord;
  created: boolean;
};

/**
 * Durable storage for cases, task results, validation attempts and audit events.
 *
 * Task results are append-only: `saveResult` assigns the next revision for the
 * (caseId, taskName) slot and never rewrites an earlier one. The current result
 * is the highest revision.
 */
export interface CaseStore {
  /** Creates the case, or returns the existing record when the id is already known. */
  createCase(args: { caseId?: string; sourceText: string }): Promise<CreateCaseResult>;
  getCase(caseId: string): Promise<CaseRecord | null>;
  setCaseStatus(args: { caseId: string; status: CaseStatus }): Promise<void>;
  listCases(args?: { status?: CaseStatus; limit?: number }): Promise<CaseRecord[]>;

  saveResult(draft: TaskResultDraft): Promise<TaskResult>;
  getResult(caseId: string, taskName: string): Promise<TaskResult | null>;
  listResults(caseId: string): Promise<TaskResult[]>;
  getResultHistory(caseId: string, taskName: string): Promise<TaskResult[]>;

  appendValidationAttempt(draft: ValidationAttemptDraft): Promise<ValidationAttempt>;
  listValidationAttempts(caseId: string): Promise<ValidationAttempt[]>;

  appendAuditEvent(draft: AuditEventDraft): Promise<AuditEvent>;
  listAuditEvents(caseId: string, args?: { limit?: number; runId?: string }): Promise<AuditEvent[]>;
}

const clone = <T>(value: T): T => structuredClone(value);

export class MemoryCaseStore implements CaseStore {
  private cases = new Map<string, CaseRecord>();
  private results = new Map<string, TaskResult[]>();
  private attempts = new Map<string, ValidationAttempt[]>();
  private audit = new Map<string, AuditEvent[]>();

  private slotKey(caseId: string, taskName: string) {
    return `${caseId}::${taskName}`;
  }

  async createCase(args: { caseId?: string; sourceText: string }): Promise<CreateCaseResult> {
    const caseId = args.caseId ?? randomUUID();
    const existing = this.cases.get(caseId);
    if (existing) return { record: clone(existing), created: false };

    const now = new Date().toISOString();
    const record: CaseRecord = {
      caseId,
      sourceText: args.sourceText,
      status: "pending",
      createdAt: now,
      updatedAt: now,
      leaseOwner: null,
      leaseExpiresAt: null,
    };
    this.cases.set(caseId, record);
    return { record: clone(record), created: true };
  }

  async getCase(caseId: string): Promise<CaseRecord | null> {
    const record = this.cases.get(caseId);
    return record ? clone(record) : null;
  }

  async setCaseStatus(args: { caseId: string; status: CaseStatus }): Promise<void> {
    const record = this.cases.get(args.caseId);
    if (!record) throw new Error(`case not found: ${args.caseId}`);
    record.status = args.status;
    record.updatedAt = new Date().toISOString();
  }

  async listCases(args: { status?: CaseStatus; limit?: number } = {}): Promise<CaseRecord[]> {
    const all = Array.from(this.cases.values())
      .filter((record) => !args.status || record.status === args.status)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
    return all.slice(0, args.limit ?? all.length).map(clone);
  }

  async saveResult(draft: TaskResultDraft): Promise<TaskResult> {
    if (!this.cases.has(draft.caseId)) throw new Error(`case not found: ${draft.caseId}`);
    const key = this.slotKey(draft.caseId, draft.taskName);
    const history = this.results.get(key) ?? [];
    const result: TaskResult = {
      ...clone(draft),
      revision: history.length + 1,
      producedAt: new Date().toISOString(),
    };
    history.push(result);
    this.results.set(key, history);
    return clone(result);
  }

  async getResult(caseId: string, taskName: string): Promise<TaskResult | null> {
    const history = this.results.get(this.slotKey(caseId, taskName));
    const current = history?.at(-1);
    return current ? clone(current) : null;
  }

  async listResults(caseId: string): Promise<TaskResult[]> {
    const current: TaskResult[] = [];
    for (const [key, history] of this.results) {
      if (!key.startsWith(`${caseId}::`)) continue;
      const last = history.at(-1);
      if (last) current.push(clone(last));
    }
    return current.sort((a, b) => a.taskName.localeCompare(b.taskName));
  }

  async getResultHistory(caseId: string, taskName: string): Promise<TaskResult[]> {
    return (this.results.get(this.slotKey(caseId, taskName)) ?? []).map(clone);
  }

  async appendValidationAttempt(draft: ValidationAttemptDraft): Promise<ValidationAttempt> {
    const attempt: ValidationAttempt = {
      ...clone(draft),
      id: randomUUID(),
      createdAt: new Date().toISOString(),
    };
    const list = this.attempts.get(draft.caseId) ?? [];
    list.push(attempt);
    this.attempts.set(draft.caseId, list);
    return clone(attempt);
  }

  async listValidationAttempts(caseId: string): Promise<ValidationAttempt[]> {
    return (this.attempts.get(caseId) ?? []).map(clone);
  }

  async appendAuditEvent(draft: AuditEventDraft): Promise<AuditEvent> {
    const event: AuditEvent = { ...clone(draft), id: randomUUID() };
    const list = this.audit.get(draft.caseId) ?? [];
    list.push(event);
    this.audit.set(draft.caseId, list);
    return clone(event);
  }

  async listAuditEvents(
    caseId: string,
    args: { limit?: number; runId?: string } = {}
  ): Promise<AuditEvent[]> {
    const list = (this.audit.get(caseId) ?? []).filter(
      (event) => !args.runId || event.runId === args.runId
    );
    return list.slice(0, args.limit ?? list.length).map(clone);
  }
}
