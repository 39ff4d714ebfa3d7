import { describe, it, expect } from "vitest";

import { UNKNOWN_INPUT, type ProgressEvent } from "../src/contracts/case";
import { CaseSourceConflictError } from "../src/pipeline/errors";
import { CaseOrchestrator } from "../src/pipeline/orchestrator";
import { buildStageGraph } from "../src/pipeline/stage_graph";
import type { AnalysisTaskDefinition, TaskContext } from "../src/pipeline/task";
import { MemoryCaseStore } from "../src/store/case_store";
import { SqliteCaseStore } from "../src/store/sqlite_case_store";
import { FAST_CONFIG, analysisTask, scriptedValidator, type Verdict } from "./helpers/scripted_tasks";

type Overrides = Partial<Record<string, AnalysisTaskDefinition>>;

function scenario(script: Verdict[], overrides: Overrides = {}, synthContexts: TaskContext[] = []) {
  const pick = (task: AnalysisTaskDefinition) => overrides[task.name] ?? task;
  const validator = scriptedValidator("context", "enrich", script);
  const graph = buildStageGraph({
    tasks: [
      pick(analysisTask("extract")),
      pick(analysisTask("application", { requires: ["extract"] })),
      pick(analysisTask("grades", { requires: ["extract"] })),
      pick(analysisTask("letters", { requires: ["extract"] })),
      pick(analysisTask("enrich", { requires: ["extract"] })),
      validator,
      pick(
        analysisTask("synth", {
          prefers: ["application", "grades", "letters", "enrich", "context"],
          contexts: synthContexts,
        })
      ),
      pick(analysisTask("report", { requires: ["synth"] })),
    ],
    checkpoints: [{ name: "school_check", producer: "enrich", validator: "context" }],
  });
  return { graph, validator };
}

describe("CaseOrchestrator scenarios", () => {
  it("completes with no validation attempts when the validator accepts at once", async () => {
    const store = new MemoryCaseStore();
    const { graph } = scenario(["accept"]);
    const orchestrator = new CaseOrchestrator({ store, graph, config: FAST_CONFIG });

    const outcome = await orchestrator.process({ sourceText: "application text" });

    expect(outcome.status).toBe("complete");
    expect(outcome.validationAttempts).toEqual([]);
    expect(outcome.checkpoints).toEqual([
      {
        name: "school_check",
        producer: "enrich",
        validator: "context",
        resolution: "accepted",
        validatorCalls: 1,
        remediations: 0,
      },
    ]);
    expect(Object.keys(outcome.results).sort()).toEqual(
      ["application", "context", "enrich", "extract", "grades", "letters", "report", "synth"]
    );
    expect(Object.values(outcome.results).every((result) => result.status === "success")).toBe(true);
    expect(outcome.results.context.payload).toEqual({ checked: "enrich", verdict: "accepted" });
    expect((await store.getCase(outcome.caseId))?.status).toBe("complete");
  });

  it("records each rejection and keeps the final remediated output", async () => {
    const store = new MemoryCaseStore();
    const { graph, validator } = scenario(["reject", "reject", "accept"]);
    const orchestrator = new CaseOrchestrator({
      store,
      graph,
      config: { ...FAST_CONFIG, checkpointMaxAttempts: 2 },
    });

    const outcome = await orchestrator.process({ sourceText: "text" });

    expect(outcome.status).toBe("complete");
    expect(validator.calls()).toBe(3);
    expect(outcome.validationAttempts.map((a) => [a.attemptNumber, a.producerRevision])).toEqual([
      [1, 1],
      [2, 2],
    ]);
    expect(outcome.validationAttempts[0].remediationHint).toEqual({
      missingFields: ["score"],
      inconsistencies: [],
      guidance: "add a score",
    });
    expect(outcome.results.enrich.status).toBe("success");
    expect(outcome.results.enrich.revision).toBe(3);
    expect(outcome.results.enrich.payload).toEqual({ task: "enrich", attempt: 1, remediation: 2 });
    expect(outcome.results.context.attempts).toBe(3);

    const history = await store.getResultHistory(outcome.caseId, "enrich");
    expect(history.map((r) => r.revision)).toEqual([1, 2, 3]);
    expect(await store.listValidationAttempts(outcome.caseId)).toHaveLength(2);
  });

  it("degrades the producer when validation never succeeds and still completes by default", async () => {
    const store = new MemoryCaseStore();
    const { graph, validator } = scenario(["reject"]);
    const orchestrator = new CaseOrchestrator({ store, graph, config: FAST_CONFIG });

    const outcome = await orchestrator.process({ sourceText: "text" });

    expect(validator.calls()).toBe(3);
    expect(outcome.validationAttempts).toHaveLength(2);
    expect(outcome.results.enrich.status).toBe("degraded");
    expect(outcome.results.enrich.revision).toBe(4);
    expect(outcome.results.enrich.confidence).toBe("low");
    expect(outcome.results.enrich.degradedReasons).toEqual([
      "validation_exhausted: not accepted after 2 remediation attempt(s)",
    ]);
    expect(outcome.results.context.status).toBe("degraded");
    expect(outcome.results.context.degradedReasons).toEqual(["enrich output not accepted (exhausted)"]);
    expect(outcome.degraded).toEqual(["enrich", "context"]);
    expect(outcome.checkpoints[0].resolution).toBe("exhausted");
    expect(outcome.status).toBe("complete");
  });

  it("marks the case partial for a degraded required task when the policy says so", async () => {
    const store = new MemoryCaseStore();
    const { graph } = scenario(["reject"]);
    const orchestrator = new CaseOrchestrator({
      store,
      graph,
      config: { ...FAST_CONFIG, degradedCountsAsComplete: false },
    });

    const outcome = await orchestrator.process({ sourceText: "text" });

    expect(outcome.status).toBe("partial");
    expect(outcome.validationAttempts).toHaveLength(2);
    expect((await store.getCase(outcome.caseId))?.status).toBe("partial");
  });

  it("fails a timed-out task and still synthesizes with an unknown input", async () => {
    const store = new MemoryCaseStore();
    const synthContexts: TaskContext[] = [];
    const { graph } = scenario(
      ["accept"],
      { grades: analysisTask("grades", { requires: ["extract"], timeoutMs: 20, delayMs: 500 }) },
      synthContexts
    );
    const orchestrator = new CaseOrchestrator({ store, graph, config: FAST_CONFIG });

    const outcome = await orchestrator.process({ sourceText: "text" });

    expect(outcome.results.grades.status).toBe("failed");
    expect(outcome.results.grades.errorMessage).toBe("grades timed out after 20ms");
    expect(outcome.results.synth.status).toBe("degraded");
    expect(outcome.results.synth.degradedReasons).toEqual(["input grades unavailable"]);
    expect(synthContexts[0].inputs.grades).toEqual({ available: false, status: "failed", value: UNKNOWN_INPUT });
    expect(outcome.results.report.status).toBe("success");
    expect(outcome.failed).toEqual(["grades"]);
    expect(outcome.issues).toContainEqual({
      taskName: "grades",
      status: "failed",
      reason: "grades timed out after 20ms",
    });
    expect(outcome.status).toBe("partial");
  });

  it("never lets a failing task stop its siblings", async () => {
    const store = new MemoryCaseStore();
    const { graph } = scenario(["accept"], {
      letters: analysisTask("letters", {
        requires: ["extract"],
        run: async () => {
          throw new Error("letters unreadable");
        },
      }),
    });
    const orchestrator = new CaseOrchestrator({ store, graph, config: FAST_CONFIG });

    const outcome = await orchestrator.process({ sourceText: "text" });

    expect(outcome.results.letters.status).toBe("failed");
    expect(outcome.results.letters.errorMessage).toBe("letters unreadable");
    for (const sibling of ["application", "grades", "enrich"]) {
      expect(outcome.results[sibling].status).toBe("success");
    }
  });

  it("records a payload the store cannot hold as a failed task", async () => {
    const store = new SqliteCaseStore(":memory:");
    const { graph } = scenario(["accept"], {
      letters: analysisTask("letters", {
        requires: ["extract"],
        run: async () => ({ payload: { count: BigInt(2) }, confidence: "high" }),
      }),
    });
    const orchestrator = new CaseOrchestrator({ store, graph, config: FAST_CONFIG });

    try {
      const outcome = await orchestrator.process({ sourceText: "text" });

      expect(outcome.results.letters.status).toBe("failed");
      expect(outcome.results.letters.errorMessage).toBe(
        "letters returned invalid output: payload is not JSON-serializable: Do not know how to serialize a BigInt"
      );
      expect(outcome.results.synth.degradedReasons).toEqual(["input letters unavailable"]);
      expect(outcome.status).toBe("partial");
      expect((await store.getCase(outcome.caseId))?.status).toBe("partial");
    } finally {
      store.close();
    }
  });

  it("treats a malformed verdict as an unavailable validator", async () => {
    const store = new MemoryCaseStore();
    const { graph, validator } = scenario(["malformed"]);
    const orchestrator = new CaseOrchestrator({ store, graph, config: FAST_CONFIG });

    const outcome = await orchestrator.process({ sourceText: "text" });

    expect(validator.calls()).toBe(1);
    expect(outcome.validationAttempts).toEqual([]);
    expect(outcome.checkpoints[0]).toMatchObject({ resolution: "validator_failed", validatorCalls: 1, remediations: 0 });
    expect(outcome.results.context.status).toBe("failed");
    expect(outcome.results.enrich.status).toBe("degraded");
    expect(outcome.results.enrich.revision).toBe(2);
    expect(outcome.results.enrich.degradedReasons[0]).toMatch(
      /^validator_unavailable: output not validated \(context returned invalid output: verdict: /
    );
    expect(await store.listValidationAttempts(outcome.caseId)).toEqual([]);
  });

  it("skips every task whose required input is unavailable", async () => {
    const store = new MemoryCaseStore();
    const { graph, validator } = scenario(["accept"], {
      extract: analysisTask("extract", {
        run: async () => {
          throw new Error("unreadable upload");
        },
      }),
    });
    const orchestrator = new CaseOrchestrator({ store, graph, config: FAST_CONFIG });

    const outcome = await orchestrator.process({ sourceText: "text" });

    expect(outcome.failed).toEqual(["extract"]);
    expect(outcome.skipped).toEqual(["application", "grades", "letters", "enrich", "context"]);
    expect(outcome.results.application.skipReason).toBe("required input unavailable: extract");
    expect(outcome.results.context.skipReason).toBe("required input unavailable: enrich");
    expect(outcome.checkpoints[0].resolution).toBe("skipped");
    expect(validator.calls()).toBe(0);
    expect(outcome.results.synth.status).toBe("degraded");
    expect(outcome.results.report.status).toBe("success");
    expect(outcome.status).toBe("partial");
  });

  it("writes an ordered audit trail for the run", async () => {
    const store = new MemoryCaseStore();
    const { graph } = scenario(["reject", "accept"]);
    const orchestrator = new CaseOrchestrator({ store, graph, config: FAST_CONFIG });

    const outcome = await orchestrator.process({ sourceText: "text" });
    const events = await store.listAuditEvents(outcome.caseId);
    const types = events.map((event) => event.eventType);

    expect(types[0]).toBe("case-created");
    expect(types[1]).toBe("pipeline-started");
    expect(types.at(-1)).toBe("pipeline-completed");
    expect(types.filter((type) => type === "validation-attempt")).toHaveLength(1);
    expect(types.filter((type) => type === "checkpoint-resolved")).toHaveLength(1);
    expect(events.map((event) => event.seq)).toEqual(events.map((_event, index) => index + 1));
    expect(new Set(events.map((event) => event.runId))).toEqual(new Set([outcome.runId]));
  });

  it("creates a placeholder case when none is supplied", async () => {
    const store = new MemoryCaseStore();
    const { graph } = scenario(["accept"]);
    const orchestrator = new CaseOrchestrator({ store, graph, config: FAST_CONFIG });

    const outcome = await orchestrator.process();
    const record = await store.getCase(outcome.caseId);
    const [created] = await store.listAuditEvents(outcome.caseId, { limit: 1 });

    expect(record?.sourceText).toBe("");
    expect(created.eventType).toBe("case-created");
    expect(created.payload).toEqual({ sourceChars: 0, placeholder: true });
  });

  it("refuses to change the source text of an existing case", async () => {
    const store = new MemoryCaseStore();
    const { graph } = scenario(["accept"]);
    const orchestrator = new CaseOrchestrator({ store, graph, config: FAST_CONFIG });
    await store.createCase({ caseId: "case-7", sourceText: "original" });

    await expect(orchestrator.process({ caseId: "case-7", sourceText: "edited" })).rejects.toBeInstanceOf(
      CaseSourceConflictError
    );
    expect((await store.getCase("case-7"))?.status).toBe("pending");
  });

  it("emits progress and survives an emitter that throws", async () => {
    const events: ProgressEvent[] = [];
    const { graph } = scenario(["reject", "accept"]);
    const collecting = new CaseOrchestrator({
      store: new MemoryCaseStore(),
      graph,
      config: FAST_CONFIG,
      progress: { emit: (event) => events.push(event) },
    });
    await collecting.process({ sourceText: "text" });

    expect(events.at(-1)?.state).toBe("case_complete");
    expect(events.find((event) => event.state === "remediating")).toMatchObject({
      taskName: "enrich",
      detail: { attemptNumber: 1, checkpoint: "school_check" },
    });

    const throwing = new CaseOrchestrator({
      store: new MemoryCaseStore(),
      graph: scenario(["accept"]).graph,
      config: FAST_CONFIG,
      progress: {
        emit: () => {
          throw new Error("subscriber gone");
        },
      },
    });
    const outcome = await throwing.process({ sourceText: "text" });
    expect(outcome.status).toBe("complete");
  });
});
