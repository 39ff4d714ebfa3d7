import { describe, it, expect, afterEach } from "vitest";

import type { TaskResultDraft } from "../src/contracts/case";
import { MemoryCaseStore, type CaseStore } from "../src/store/case_store";
import { SqliteCaseStore } from "../src/store/sqlite_case_store";

const draft = (overrides: Partial<TaskResultDraft> = {}): TaskResultDraft => ({
  caseId: "case-1",
  taskName: "grades",
  status: "success",
  payload: { gpa: 3.6 },
  confidence: "high",
  degradedReasons: [],
  attempts: 1,
  ...overrides,
});

const opened: SqliteCaseStore[] = [];

const factories: Array<[string, () => CaseStore]> = [
  ["MemoryCaseStore", () => new MemoryCaseStore()],
  [
    "SqliteCaseStore",
    () => {
      const store = new SqliteCaseStore(":memory:");
      opened.push(store);
      return store;
    },
  ],
];

afterEach(() => {
  for (const store of opened.splice(0)) store.close();
});

describe.each(factories)("%s", (_name, createStore) => {
  it("creates a case once and reports whether it was new", async () => {
    const store = createStore();
    const first = await store.createCase({ caseId: "case-1", sourceText: "text" });
    const second = await store.createCase({ caseId: "case-1", sourceText: "other" });

    expect(first.created).toBe(true);
    expect(first.record.status).toBe("pending");
    expect(second.created).toBe(false);
    expect(second.record.sourceText).toBe("text");
  });

  it("assigns increasing revisions and serves the highest as current", async () => {
    const store = createStore();
    await store.createCase({ caseId: "case-1", sourceText: "text" });

    const first = await store.saveResult(draft());
    const second = await store.saveResult(
      draft({ status: "degraded", confidence: "low", degradedReasons: ["input x unavailable"] })
    );
    await store.saveResult(draft({ taskName: "letters" }));

    expect([first.revision, second.revision]).toEqual([1, 2]);
    expect(await store.getResult("case-1", "grades")).toMatchObject({
      revision: 2,
      status: "degraded",
      degradedReasons: ["input x unavailable"],
    });
    expect((await store.listResults("case-1")).map((r) => [r.taskName, r.revision])).toEqual([
      ["grades", 2],
      ["letters", 1],
    ]);
    expect((await store.getResultHistory("case-1", "grades")).map((r) => r.status)).toEqual([
      "success",
      "degraded",
    ]);
  });

  it("keeps failure and skip details", async () => {
    const store = createStore();
    await store.createCase({ caseId: "case-1", sourceText: "text" });
    await store.saveResult(
      draft({ status: "failed", payload: null, confidence: "none", errorMessage: "timed out", attempts: 3 })
    );
    await store.saveResult(
      draft({ taskName: "report", status: "skipped", payload: null, confidence: "none", skipReason: "no input", attempts: 0 })
    );

    expect(await store.getResult("case-1", "grades")).toMatchObject({
      status: "failed",
      payload: null,
      errorMessage: "timed out",
      attempts: 3,
    });
    expect((await store.getResult("case-1", "report"))?.skipReason).toBe("no input");
  });

  it("appends validation attempts and audit events in order", async () => {
    const store = createStore();
    await store.createCase({ caseId: "case-1", sourceText: "text" });
    for (const attemptNumber of [1, 2]) {
      await store.appendValidationAttempt({
        caseId: "case-1",
        checkpoint: "school_check",
        attemptNumber,
        producerRevision: attemptNumber,
        producerOutput: { schoolName: null },
        validatorVerdict: "needs_remediation",
        remediationHint: { missingFields: ["schoolName"], inconsistencies: [], guidance: "name the school" },
      });
    }
    for (const [seq, runId] of [[1, "run-a"], [2, "run-a"], [1, "run-b"]] as const) {
      await store.appendAuditEvent({
        caseId: "case-1",
        runId,
        seq,
        eventType: "pipeline-started",
        payload: { seq },
        ts: "2026-01-01T00:00:00.000Z",
      });
    }

    const attempts = await store.listValidationAttempts("case-1");
    expect(attempts.map((a) => a.attemptNumber)).toEqual([1, 2]);
    expect(attempts[1].remediationHint?.missingFields).toEqual(["schoolName"]);
    expect((await store.listAuditEvents("case-1")).map((e) => `${e.runId}/${e.seq}`)).toEqual([
      "run-a/1",
      "run-a/2",
      "run-b/1",
    ]);
    expect((await store.listAuditEvents("case-1", { runId: "run-b" }))[0].payload).toEqual({ seq: 1 });
    expect(await store.listAuditEvents("case-1", { limit: 2 })).toHaveLength(2);
  });

  it("updates case status and filters listings by it", async () => {
    const store = createStore();
    await store.createCase({ caseId: "case-1", sourceText: "one" });
    await store.createCase({ caseId: "case-2", sourceText: "two" });
    await store.setCaseStatus({ caseId: "case-2", status: "complete" });

    expect((await store.listCases({ status: "complete" })).map((c) => c.caseId)).toEqual(["case-2"]);
    expect(await store.listCases({ limit: 1 })).toHaveLength(1);
    await expect(store.setCaseStatus({ caseId: "missing", status: "complete" })).rejects.toThrow(
      "case not found: missing"
    );
  });
});

describe("SqliteCaseStore leases", () => {
  it("leases a pending case once until its lease lapses", async () => {
    const store = new SqliteCaseStore(":memory:");
    opened.push(store);
    await store.createCase({ caseId: "case-q", sourceText: "text" });

    const first = await store.leaseNextCase({ leaseOwner: "w1", leaseDurationSeconds: 60 });
    expect(first.outcome).toBe("leased");
    if (first.outcome === "leased") {
      expect(first.record.caseId).toBe("case-q");
      expect(first.record.leaseOwner).toBe("w1");
      expect(first.previousStatus).toBe("pending");
    }
    expect((await store.leaseNextCase({ leaseOwner: "w2", leaseDurationSeconds: 60 })).outcome).toBe("empty");
    expect((await store.getLeaseableStats()).leaseableCount).toBe(0);
  });

  it("recovers an in-progress case whose lease expired", async () => {
    const store = new SqliteCaseStore(":memory:");
    opened.push(store);
    await store.createCase({ caseId: "case-q", sourceText: "text" });
    await store.leaseNextCase({ leaseOwner: "w1", leaseDurationSeconds: -5 });
    await store.setCaseStatus({ caseId: "case-q", status: "in_progress" });

    const stats = await store.getLeaseableStats();
    expect(stats.leaseableCount).toBe(1);
    const recovered = await store.leaseNextCase({ leaseOwner: "w2", leaseDurationSeconds: 60 });
    expect(recovered.outcome).toBe("leased");
    if (recovered.outcome === "leased") {
      expect(recovered.previousStatus).toBe("in_progress");
      expect(recovered.record.leaseOwner).toBe("w2");
    }
  });

  it("ignores in-progress cases without a lease and clears leases on completion", async () => {
    const store = new SqliteCaseStore(":memory:");
    opened.push(store);
    await store.createCase({ caseId: "inline", sourceText: "text" });
    await store.setCaseStatus({ caseId: "inline", status: "in_progress" });
    expect((await store.leaseNextCase({ leaseOwner: "w1", leaseDurationSeconds: 60 })).outcome).toBe("empty");

    await store.createCase({ caseId: "queued", sourceText: "text" });
    await store.leaseNextCase({ leaseOwner: "w1", leaseDurationSeconds: 60 });
    await store.setCaseStatus({ caseId: "queued", status: "complete" });
    const record = await store.getCase("queued");
    expect(record?.leaseOwner).toBeNull();
    expect(record?.leaseExpiresAt).toBeNull();
  });
});
