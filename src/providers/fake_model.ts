import { setTimeout as sleep } from "node:timers/promises";

import type { TaskModel, TaskModelRequest } from "./task_model";

/**
 * Offline model: answers with the task's own deterministic draft, so the
 * pipeline runs end to end without a provider.
 */
export class FakeTaskModel implements TaskModel {
  readonly provider = "fake" as const;
  private latencyMs: number;
  readonly callsByTask = new Map<string, number>();

  constructor(opts: { latencyMs?: number } = {}) {
    this.latencyMs = opts.latencyMs ?? 0;
  }

  async complete(request: TaskModelRequest): Promise<unknown> {
    this.callsByTask.set(request.taskName, (this.callsByTask.get(request.taskName) ?? 0) + 1);
    if (this.latencyMs > 0) {
      await sleep(this.latencyMs, undefined, { signal: request.signal });
    }
    return structuredClone(request.draft);
  }
}
