import { randomUUID } from "node:crypto";

import {
  UNKNOWN_INPUT,
  type AuditEventType,
  type CaseIssue,
  type CaseOutcome,
  type CaseRecord,
  type CheckpointSummary,
  type Confidence,
  type JsonObject,
  type ProgressEvent,
  type RemediationHint,
  type TaskResult,
  type TaskResultDraft,
  type ValidationAttempt,
} from "../contracts/case";
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "../config/pipeline_config";
import { StoreAuditLogger, type AuditLogger } from "../audit/audit_logger";
import { silentLogger, type PipelineLogger } from "../log";
import { noopProgressEmitter, type ProgressEmitter } from "../sse/progress_hub";
import type { CaseStore } from "../store/case_store";
import {
  CaseSourceConflictError,
  PersistenceUnavailableError,
  errorMessage,
} from "./errors";
import type { StageGraph } from "./stage_graph";
import { invokeTask, type InvocationOutcome } from "./task_invoker";
import type {
  CheckpointDefinition,
  RemediationRequest,
  TaskDefinition,
  TaskContext,
  TaskInput,
  TaskKind,
  TaskOutput,
  ValidatorTaskDefinition,
} from "./task";
import { runValidationLoop, type ValidationLoopOutcome } from "./validation_loop";

export type ProcessCaseInput = {
  caseId?: string;
  sourceText?: string;
  /** Ignore persisted results and run every task again. */
  rerun?: boolean;
};

export type CaseOrchestratorOptions = {
  store: CaseStore;
  graph: StageGraph;
  audit?: AuditLogger;
  progress?: ProgressEmitter;
  config?: Partial<PipelineConfig>;
  log?: PipelineLogger;
};

type CaseRun = {
  runId: string;
  record: CaseRecord;
  seq: number;
  resume: boolean;
  persisted: Map<string, TaskResult>;
  results: Map<string, TaskResult>;
  // Tasks invoked during this run; their dependents cannot reuse older results.
  executed: Set<string>;
  attempts: ValidationAttempt[];
  checkpoints: CheckpointSummary[];
};

type CollectedInputs = {
  inputs: Record<string, TaskInput>;
  blockedBy: string[];
  missingPreferred: string[];
};

const CONFIDENCE_ORDER: Confidence[] = ["none", "low", "medium", "high", "very-high"];

const capConfidence = (value: Confidence, cap: Confidence): Confidence =>
  CONFIDENCE_ORDER.indexOf(value) > CONFIDENCE_ORDER.indexOf(cap) ? cap : value;

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) deepFreeze(nested);
  }
  return value;
}

const toInput = (result: TaskResult | undefined): TaskInput => {
  if (result?.payload && (result.status === "success" || result.status === "degraded")) {
    const input: TaskInput = {
      available: true,
      status: result.status,
      payload: structuredClone(result.payload),
      confidence: result.confidence,
    };
    return deepFreeze(input);
  }
  return {
    available: false,
    status: result?.status === "failed" || result?.status === "skipped" ? result.status : "missing",
    value: UNKNOWN_INPUT,
  };
};

/**
 * Drives one case through the stage graph. Stages run in order; the tasks
 * inside a stage run concurrently and each persists its result on completion.
 * Task failures are recorded and never abort the case; only persistence
 * failures and internal invariant errors escape `process`.
 */
export class CaseOrchestrator {
  private store: CaseStore;
  private graph: StageGraph;
  private audit: AuditLogger;
  private progress: ProgressEmitter;
  private config: PipelineConfig;
  private log: PipelineLogger;

  constructor(opts: CaseOrchestratorOptions) {
    this.store = opts.store;
    this.graph = opts.graph;
    this.log = opts.log ?? silentLogger;
    this.audit = opts.audit ?? new StoreAuditLogger(opts.store, this.log);
    this.progress = opts.progress ?? noopProgressEmitter;
    this.config = { ...DEFAULT_PIPELINE_CONFIG, ...(opts.config ?? {}) };
  }

  async process(input: ProcessCaseInput = {}): Promise<CaseOutcome> {
    const runId = randomUUID();
    const { record, created } = await this.ensureCase(input);
    const run: CaseRun = {
      runId,
      record,
      seq: 0,
      resume: this.config.resumeFromPersisted && input.rerun !== true,
      persisted: new Map(),
      results: new Map(),
      executed: new Set(),
      attempts: [],
      checkpoints: [],
    };

    if (created) {
      await this.auditEvent(run, "case-created", {
        sourceChars: record.sourceText.length,
        placeholder: record.sourceText.length === 0,
      });
    }

    if (run.resume) {
      const persisted = await this.persist("list_results", () =>
        this.store.listResults(record.caseId)
      );
      for (const result of persisted) run.persisted.set(result.taskName, result);
    }

    await this.persist("set_status", () =>
      this.store.setCaseStatus({ caseId: record.caseId, status: "in_progress" })
    );
    await this.auditEvent(run, "pipeline-started", {
      stages: this.graph.stages.map((stage) => [...stage]),
      resume: run.resume,
      persistedResults: run.persisted.size,
    });
    this.log.info(
      { evt: "pipeline.started", caseId: record.caseId, runId, resume: run.resume },
      "pipeline.started"
    );

    for (const [index, stage] of this.graph.stages.entries()) {
      const settled = await Promise.allSettled(stage.map((name) => this.runNode(run, name)));
      const rejected = settled.find(
        (entry): entry is PromiseRejectedResult => entry.status === "rejected"
      );
      if (rejected) {
        this.log.error(
          {
            evt: "pipeline.aborted",
            caseId: record.caseId,
            runId,
            stage: index + 1,
            error: errorMessage(rejected.reason),
          },
          "pipeline.aborted"
        );
        throw rejected.reason;
      }
    }

    return this.finish(run);
  }

  /** Records a case for the queue worker without running it. */
  async enqueue(input: { caseId?: string; sourceText: string }): Promise<CaseRecord> {
    const { record, created } = await this.ensureCase(input);
    if (created) {
      const run = { runId: randomUUID(), record, seq: 0 };
      await this.auditEvent(run, "case-created", {
        sourceChars: record.sourceText.length,
        placeholder: false,
        queued: true,
      });
    }
    this.emit({ caseId: record.caseId, taskName: null, state: "queued", ts: new Date().toISOString() });
    return record;
  }

  private async ensureCase(input: ProcessCaseInput) {
    if (input.caseId) {
      const caseId = input.caseId;
      const existing = await this.persist("get_case", () => this.store.getCase(caseId));
      if (existing) {
        if (input.sourceText !== undefined && input.sourceText !== existing.sourceText) {
          throw new CaseSourceConflictError(existing.caseId);
        }
        return { record: existing, created: false };
      }
    }
    return this.persist("create_case", () =>
      this.store.createCase({ caseId: input.caseId, sourceText: input.sourceText ?? "" })
    );
  }

  private async runNode(run: CaseRun, name: string): Promise<void> {
    const def = this.requireTask(name);
    const caseId = run.record.caseId;

    const reusable = this.reusableResult(run, def);
    if (reusable) {
      run.results.set(name, reusable);
      await this.auditEvent(run, "task-resumed", {
        taskName: name,
        status: reusable.status,
        revision: reusable.revision,
      });
      const checkpoint = this.graph.checkpointForValidator(name);
      if (checkpoint) {
        run.checkpoints.push({
          name: checkpoint.name,
          producer: checkpoint.producer,
          validator: checkpoint.validator,
          resolution: "resumed",
          validatorCalls: 0,
          remediations: 0,
        });
      }
      this.emit({ caseId, taskName: name, state: "resumed", ts: new Date().toISOString() });
      return;
    }

    const collected = this.collectInputs(run, def);
    if (collected.blockedBy.length > 0) {
      const skipReason = `required input unavailable: ${collected.blockedBy.join(", ")}`;
      const saved = await this.saveResult(run, {
        caseId,
        taskName: name,
        status: "skipped",
        payload: null,
        confidence: "none",
        skipReason,
        degradedReasons: [],
        attempts: 0,
      });
      await this.auditEvent(run, "task-skipped", {
        taskName: name,
        reason: skipReason,
        revision: saved.revision,
      });
      const checkpoint = this.graph.checkpointForValidator(name);
      if (checkpoint) {
        run.checkpoints.push({
          name: checkpoint.name,
          producer: checkpoint.producer,
          validator: checkpoint.validator,
          resolution: "skipped",
          validatorCalls: 0,
          remediations: 0,
        });
        await this.auditEvent(run, "checkpoint-resolved", {
          checkpoint: checkpoint.name,
          resolution: "skipped",
          reason: skipReason,
        });
      }
      this.emit({
        caseId,
        taskName: name,
        state: "skipped",
        ts: new Date().toISOString(),
        detail: { reason: skipReason },
      });
      return;
    }

    run.executed.add(name);
    await this.auditEvent(run, "task-started", {
      taskName: name,
      kind: def.kind,
      missingPreferred: collected.missingPreferred,
    });
    this.emit({ caseId, taskName: name, state: "started", ts: new Date().toISOString() });

    if (def.kind === "validator") {
      const checkpoint = this.graph.checkpointForValidator(name);
      if (!checkpoint) throw new Error(`validator ${name} has no checkpoint`);
      await this.runCheckpoint(run, checkpoint, def, collected);
      return;
    }

    const outcome = await this.invoke(run, def, collected.inputs, null);
    const saved = await this.saveResult(run, this.draftFromOutcome(run, def, outcome, collected));
    await this.reportResult(run, saved);
  }

  /** A persisted result is reused only when no dependency was re-run in this run. */
  private reusableResult(run: CaseRun, def: TaskDefinition): TaskResult | null {
    if (!run.resume) return null;
    const persisted = run.persisted.get(def.name);
    if (!persisted || (persisted.status !== "success" && persisted.status !== "degraded")) {
      return null;
    }
    const deps = this.graph.dependenciesOf(def.name);
    if (deps.some((dep) => run.executed.has(dep))) return null;
    return persisted;
  }

  private collectInputs(run: CaseRun, def: TaskDefinition): CollectedInputs {
    const inputs: Record<string, TaskInput> = {};
    const blockedBy: string[] = [];
    const missingPreferred: string[] = [];

    for (const dep of def.requires) {
      const input = toInput(run.results.get(dep));
      inputs[dep] = input;
      if (!input.available) blockedBy.push(dep);
    }
    for (const dep of def.prefers) {
      if (dep in inputs) continue;
      const input = toInput(run.results.get(dep));
      inputs[dep] = input;
      if (!input.available) missingPreferred.push(dep);
    }
    return { inputs, blockedBy, missingPreferred };
  }

  private invoke<T extends TaskOutput>(
    run: CaseRun,
    def: {
      name: string;
      kind: TaskKind;
      timeoutMs?: number;
      retries?: number;
      run(ctx: TaskContext): Promise<T>;
    },
    inputs: Record<string, TaskInput>,
    remediation: RemediationRequest | null
  ): Promise<InvocationOutcome<T>> {
    return invokeTask({
      taskName: def.name,
      kind: def.kind,
      run: (ctx) => def.run(ctx),
      context: {
        caseId: run.record.caseId,
        sourceText: run.record.sourceText,
        inputs: Object.freeze({ ...inputs }),
        remediation: remediation ? deepFreeze(structuredClone(remediation)) : null,
      },
      policy: {
        timeoutMs: def.timeoutMs ?? this.config.taskTimeoutMs,
        retries: def.retries ?? this.config.taskLocalRetries,
        retryDelayMs: this.config.taskRetryDelayMs,
      },
      log: this.log,
    });
  }

  private draftFromOutcome(
    run: CaseRun,
    def: TaskDefinition,
    outcome: InvocationOutcome<TaskOutput>,
    collected: CollectedInputs,
    extraReasons: string[] = []
  ): TaskResultDraft {
    if (!outcome.ok) {
      return {
        caseId: run.record.caseId,
        taskName: def.name,
        status: "failed",
        payload: null,
        confidence: "none",
        errorMessage: errorMessage(outcome.error),
        degradedReasons: [],
        attempts: outcome.attempts,
      };
    }
    const degradedReasons = [
      ...collected.missingPreferred.map((dep) => `input ${dep} unavailable`),
      ...extraReasons,
    ];
    return {
      caseId: run.record.caseId,
      taskName: def.name,
      status: degradedReasons.length > 0 ? "degraded" : "success",
      payload: outcome.output.payload,
      confidence:
        degradedReasons.length > 0
          ? capConfidence(outcome.output.confidence, "medium")
          : outcome.output.confidence,
      degradedReasons,
      attempts: outcome.attempts,
    };
  }

  private async runCheckpoint(
    run: CaseRun,
    checkpoint: CheckpointDefinition,
    validatorDef: ValidatorTaskDefinition,
    collected: CollectedInputs
  ) {
    const caseId = run.record.caseId;
    const producerDef = this.requireTask(checkpoint.producer);
    if (producerDef.kind !== "analysis") throw new Error(`producer ${producerDef.name} is not an analysis task`);
    const initialProducer = run.results.get(checkpoint.producer);
    if (!initialProducer) throw new Error(`producer ${checkpoint.producer} has no result`);

    const loop = await runValidationLoop({
      maxAttempts: checkpoint.maxAttempts ?? this.config.checkpointMaxAttempts,
      priorAttempts: await this.priorAttemptCount(run, checkpoint, initialProducer),
      producer: initialProducer,
      validate: (producer) =>
        this.invoke(
          run,
          validatorDef,
          { ...collected.inputs, [checkpoint.producer]: toInput(producer) },
          null
        ),
      recordAttempt: async ({ attemptNumber, producer, hint }) => {
        const attempt = await this.persist("append_validation_attempt", () =>
          this.store.appendValidationAttempt({
            caseId,
            checkpoint: checkpoint.name,
            attemptNumber,
            producerRevision: producer.revision,
            producerOutput: producer.payload,
            validatorVerdict: "needs_remediation",
            remediationHint: hint,
          })
        );
        run.attempts.push(attempt);
        await this.auditEvent(run, "validation-attempt", {
          checkpoint: checkpoint.name,
          attemptNumber,
          producer: producer.taskName,
          producerRevision: producer.revision,
          verdict: "needs_remediation",
          hint,
        });
        this.emit({
          caseId,
          taskName: producer.taskName,
          state: "remediating",
          ts: new Date().toISOString(),
          detail: { attemptNumber, checkpoint: checkpoint.name },
        });
      },
      remediate: async ({ attemptNumber, producer, hint }) => {
        const producerInputs = this.collectInputs(run, producerDef);
        const outcome = await this.invoke(run, producerDef, producerInputs.inputs, {
          attemptNumber,
          hint,
          previousOutput: producer.payload,
        });
        if (!outcome.ok) {
          this.log.warn(
            {
              evt: "pipeline.remediation.failed",
              caseId,
              taskName: producer.taskName,
              attemptNumber,
              error: errorMessage(outcome.error),
            },
            "pipeline.remediation.failed"
          );
          return { ok: false, error: outcome.error };
        }
        const saved = await this.saveResult(
          run,
          this.draftFromOutcome(run, producerDef, outcome, producerInputs)
        );
        await this.reportResult(run, saved, { remediationAttempt: attemptNumber });
        return { ok: true, result: saved };
      },
      markDegraded: async (producer, reason) => {
        const saved = await this.saveResult(run, {
          caseId,
          taskName: producer.taskName,
          status: "degraded",
          payload: producer.payload,
          confidence: capConfidence(producer.confidence, "low"),
          degradedReasons: [...producer.degradedReasons, reason],
          attempts: producer.attempts,
        });
        await this.reportResult(run, saved, { checkpoint: checkpoint.name });
        return saved;
      },
    });

    const saved = await this.saveResult(
      run,
      this.validatorDraft(run, validatorDef, loop, collected)
    );
    await this.reportResult(run, saved);

    const summary: CheckpointSummary = {
      name: checkpoint.name,
      producer: checkpoint.producer,
      validator: checkpoint.validator,
      resolution: loop.resolution,
      validatorCalls: loop.validatorCalls,
      remediations: loop.remediations,
    };
    run.checkpoints.push(summary);
    await this.auditEvent(run, "checkpoint-resolved", {
      checkpoint: checkpoint.name,
      resolution: loop.resolution,
      validatorCalls: loop.validatorCalls,
      remediations: loop.remediations,
      producerRevision: loop.producer.revision,
      producerStatus: loop.producer.status,
      finalHint: loop.resolution === "accepted" ? null : this.hintPayload(loop.lastHint),
    });
    this.log.info(
      { evt: "pipeline.checkpoint.resolved", caseId, ...summary },
      "pipeline.checkpoint.resolved"
    );
  }

  /**
   * Remediations an interrupted run already spent on the producer output this
   * run reused. Each remediation saves revision r + 1 after an attempt against
   * revision r, so the chain is walked back from the current revision. A
   * producer that ran again here starts a fresh budget.
   */
  private async priorAttemptCount(
    run: CaseRun,
    checkpoint: CheckpointDefinition,
    producer: TaskResult
  ): Promise<number> {
    if (!run.resume || run.executed.has(checkpoint.producer)) return 0;
    const recorded = await this.persist("list_validation_attempts", () =>
      this.store.listValidationAttempts(run.record.caseId)
    );
    const revisions = new Set(
      recorded
        .filter((attempt) => attempt.checkpoint === checkpoint.name)
        .map((attempt) => attempt.producerRevision)
    );
    // An attempt against the current revision means the run stopped before its remediation saved.
    let count = revisions.has(producer.revision) ? 1 : 0;
    for (let revision = producer.revision - 1; revisions.has(revision); revision -= 1) count += 1;
    return count;
  }

  private hintPayload(hint: RemediationHint | null): JsonObject | null {
    return hint ? { ...hint } : null;
  }

  private validatorDraft(
    run: CaseRun,
    def: ValidatorTaskDefinition,
    loop: ValidationLoopOutcome,
    collected: CollectedInputs
  ): TaskResultDraft {
    const last = loop.lastValidation;
    if (!last.ok) {
      return this.draftFromOutcome(run, def, last, collected);
    }
    const reasons =
      loop.resolution === "accepted"
        ? []
        : [`${loop.producer.taskName} output not accepted (${loop.resolution})`];
    const draft = this.draftFromOutcome(run, def, last, collected, reasons);
    return {
      ...draft,
      attempts: loop.validatorCalls,
      payload: { ...last.output.payload, verdict: last.output.verdict },
    };
  }

  private async reportResult(run: CaseRun, result: TaskResult, extra: JsonObject = {}) {
    const eventType: AuditEventType = result.status === "failed" ? "task-failed" : "task-completed";
    await this.auditEvent(run, eventType, {
      taskName: result.taskName,
      status: result.status,
      revision: result.revision,
      confidence: result.confidence,
      attempts: result.attempts,
      ...(result.errorMessage ? { error: result.errorMessage } : {}),
      ...(result.degradedReasons.length > 0 ? { degradedReasons: result.degradedReasons } : {}),
      ...extra,
    });
    const state =
      result.status === "success" ? "completed" : result.status === "skipped" ? "skipped" : result.status;
    this.emit({
      caseId: result.caseId,
      taskName: result.taskName,
      state,
      ts: new Date().toISOString(),
      detail: { revision: result.revision, confidence: result.confidence },
    });
    this.log.info(
      {
        evt: `pipeline.task.${result.status}`,
        caseId: result.caseId,
        runId: run.runId,
        taskName: result.taskName,
        revision: result.revision,
        attempts: result.attempts,
      },
      `pipeline.task.${result.status}`
    );
  }

  private async finish(run: CaseRun): Promise<CaseOutcome> {
    const caseId = run.record.caseId;
    const results: Record<string, TaskResult> = {};
    const degraded: string[] = [];
    const failed: string[] = [];
    const skipped: string[] = [];
    const issues: CaseIssue[] = [];
    let complete = true;

    for (const def of this.graph.tasks.values()) {
      const result = run.results.get(def.name);
      if (!result) throw new Error(`task ${def.name} finished without a result`);
      results[def.name] = result;
      if (result.status === "success") continue;

      if (result.status === "degraded") degraded.push(def.name);
      if (result.status === "failed") failed.push(def.name);
      if (result.status === "skipped") skipped.push(def.name);
      issues.push({
        taskName: def.name,
        status: result.status,
        reason:
          result.errorMessage ??
          result.skipReason ??
          (result.degradedReasons.join("; ") || result.status),
      });

      if (!def.required) continue;
      if (result.status === "failed" || result.status === "skipped") complete = false;
      if (result.status === "degraded" && !this.config.degradedCountsAsComplete) complete = false;
    }

    const status = complete ? "complete" : "partial";
    await this.persist("set_status", () => this.store.setCaseStatus({ caseId, status }));
    await this.auditEvent(run, complete ? "pipeline-completed" : "pipeline-partial", {
      status,
      degraded,
      failed,
      skipped,
      validationAttempts: run.attempts.length,
    });
    this.emit({
      caseId,
      taskName: null,
      state: complete ? "case_complete" : "case_partial",
      ts: new Date().toISOString(),
      detail: { degraded, failed, skipped },
    });
    this.log.info(
      { evt: "pipeline.finished", caseId, runId: run.runId, status, degraded, failed, skipped },
      "pipeline.finished"
    );

    return {
      caseId,
      runId: run.runId,
      status,
      results,
      degraded,
      failed,
      skipped,
      issues,
      validationAttempts: run.attempts,
      checkpoints: run.checkpoints,
    };
  }

  private requireTask(name: string): TaskDefinition {
    const def = this.graph.tasks.get(name);
    if (!def) throw new Error(`unknown task ${name}`);
    return def;
  }

  private async saveResult(run: CaseRun, draft: TaskResultDraft): Promise<TaskResult> {
    const saved = await this.persist("save_result", () => this.store.saveResult(draft));
    run.results.set(saved.taskName, saved);
    return saved;
  }

  private async auditEvent(
    run: Pick<CaseRun, "runId" | "record" | "seq">,
    eventType: AuditEventType,
    payload: JsonObject
  ) {
    run.seq += 1;
    const seq = run.seq;
    await this.persist("audit", () =>
      this.audit.logEvent({
        caseId: run.record.caseId,
        runId: run.runId,
        seq,
        eventType,
        payload,
        ts: new Date().toISOString(),
      })
    );
  }

  private emit(event: ProgressEvent) {
    try {
      this.progress.emit(event);
    } catch (error) {
      this.log.warn(
        { evt: "pipeline.progress.emit_failed", caseId: event.caseId, error: errorMessage(error) },
        "pipeline.progress.emit_failed"
      );
    }
  }

  private async persist<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof PersistenceUnavailableError) throw error;
      throw new PersistenceUnavailableError(operation, error);
    }
  }
}
