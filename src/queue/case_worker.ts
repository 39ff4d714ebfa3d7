import { setTimeout as sleep } from "node:timers/promises";

import type { WorkerConfig } from "../config/pipeline_config";
import type { PipelineLogger } from "../log";
import { errorMessage } from "../pipeline/errors";
import type { CaseOrchestrator } from "../pipeline/orchestrator";
import type { LeaseNextCaseResult } from "../store/sqlite_case_store";

export interface CaseLeaseSource {
  leaseNextCase(args: { leaseOwner: string; leaseDurationSeconds: number }): Promise<LeaseNextCaseResult>;
  getLeaseableStats(): Promise<{ leaseableCount: number; oldestCreatedAt: string | null }>;
}

export type TickResult = "processed" | "failed" | "idle" | "busy";

/**
 * Polls for leaseable cases and runs them one at a time. A case whose run
 * throws keeps its lease until expiry and is then picked up again, resuming
 * from the results already persisted.
 */
export class CaseWorker {
  private running = false;
  private pollCount = 0;
  private timer: NodeJS.Timeout | null = null;
  readonly stats = { attempts: 0, wins: 0, contention: 0, empty: 0, processed: 0, failed: 0 };

  constructor(
    private readonly opts: {
      source: CaseLeaseSource;
      orchestrator: Pick<CaseOrchestrator, "process">;
      config: WorkerConfig;
      log: PipelineLogger;
    }
  ) {}

  async tick(): Promise<TickResult> {
    if (this.running) return "busy";
    this.running = true;
    try {
      this.pollCount += 1;
      const logIdle = this.pollCount % this.opts.config.heartbeatEvery === 0;
      if (logIdle) await this.logHeartbeat("poll");
      return await this.processNext({ logIdle });
    } finally {
      this.running = false;
    }
  }

  start() {
    if (this.timer) return;
    const run = () => {
      this.tick().catch((error: unknown) => {
        this.opts.log.error({ evt: "worker.tick_failed", error: errorMessage(error) }, "worker.tick_failed");
      });
    };
    run();
    this.timer = setInterval(run, this.opts.config.pollIntervalMs);
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  async logHeartbeat(reason: "startup" | "poll") {
    const leaseable = await this.opts.source.getLeaseableStats();
    this.opts.log.info(
      {
        evt: "worker.heartbeat",
        reason,
        workerId: this.opts.config.workerId,
        leaseableCount: leaseable.leaseableCount,
        oldestCreatedAgeMs: leaseable.oldestCreatedAt ? Date.now() - Date.parse(leaseable.oldestCreatedAt) : null,
        leaseStats: { ...this.stats },
      },
      "worker.heartbeat"
    );
  }

  private async lease(): Promise<LeaseNextCaseResult | null> {
    const { config, source } = this.opts;
    let emptyScans = 0;

    for (let attempt = 1; attempt <= config.leaseAttemptLimit; attempt += 1) {
      this.stats.attempts += 1;
      const leased = await source.leaseNextCase({
        leaseOwner: config.workerId,
        leaseDurationSeconds: config.leaseSeconds,
      });
      if (leased.outcome === "leased") {
        this.stats.wins += 1;
        return leased;
      }
      if (leased.outcome === "contention") {
        this.stats.contention += 1;
      } else {
        this.stats.empty += 1;
        emptyScans += 1;
        if (emptyScans >= config.emptyScanLimit) return leased;
      }

      const span = Math.max(1, config.jitterMaxMs - config.jitterMinMs + 1);
      await sleep(Math.max(0, config.jitterMinMs + Math.floor(Math.random() * span)));
    }
    return null;
  }

  private async processNext(opts: { logIdle: boolean }): Promise<TickResult> {
    const leased = await this.lease();
    if (!leased || leased.outcome !== "leased") {
      const payload = { evt: "worker.case.none", reason: leased?.outcome ?? "contention" };
      this.opts.log.debug(payload, "worker.case.none");
      if (opts.logIdle) this.opts.log.info(payload, "worker.case.none");
      return "idle";
    }

    const { record, previousStatus } = leased;
    this.opts.log.info(
      { evt: "worker.case.picked", caseId: record.caseId, previousStatus, recovered: previousStatus === "in_progress" },
      "worker.case.picked"
    );

    try {
      const outcome = await this.opts.orchestrator.process({ caseId: record.caseId });
      this.stats.processed += 1;
      this.opts.log.info(
        { evt: "worker.case.done", caseId: record.caseId, status: outcome.status, degraded: outcome.degraded, failed: outcome.failed },
        "worker.case.done"
      );
      return "processed";
    } catch (error) {
      this.stats.failed += 1;
      this.opts.log.error({ evt: "worker.case.error", caseId: record.caseId, error: errorMessage(error) }, "worker.case.error");
      return "failed";
    }
  }
}
