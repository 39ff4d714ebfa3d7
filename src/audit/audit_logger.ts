import type { AuditEvent, AuditEventDraft } from "../contracts/case";
import { silentLogger, type PipelineLogger } from "../log";
import type { CaseStore } from "../store/case_store";

export interface AuditLogger {
  logEvent(event: AuditEventDraft): Promise<AuditEvent>;
}

/** Appends to the store's audit table and mirrors each event to the log. */
export class StoreAuditLogger implements AuditLogger {
  private store: CaseStore;
  private log: PipelineLogger;

  constructor(store: CaseStore, log: PipelineLogger = silentLogger) {
    this.store = store;
    this.log = log;
  }

  async logEvent(event: AuditEventDraft): Promise<AuditEvent> {
    const saved = await this.store.appendAuditEvent(event);
    this.log.debug(
      {
        evt: "audit.event",
        caseId: event.caseId,
        runId: event.runId,
        seq: event.seq,
        eventType: event.eventType,
        taskName: typeof event.payload.taskName === "string" ? event.payload.taskName : undefined,
      },
      `audit.${event.eventType}`
    );
    return saved;
  }
}
