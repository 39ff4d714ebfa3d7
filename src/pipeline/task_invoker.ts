import { setTimeout as sleep } from "node:timers/promises";

import { Confidence, ValidatorDecision, isJsonObject, type JsonObject } from "../contracts/case";
import { silentLogger, type PipelineLogger } from "../log";
import { TaskOutputError, TaskTimeoutError, errorMessage, isRetryable } from "./errors";
import type { TaskContext, TaskKind, TaskOutput } from "./task";

export type InvocationPolicy = {
  timeoutMs: number;
  /** Extra calls after the first one. */
  retries: number;
  retryDelayMs: number;
};

export type InvocationOutcome<T extends TaskOutput> =
  | { ok: true; output: T; attempts: number }
  | { ok: false; error: Error; attempts: number };

const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));

// The stored payload is the JSON form, so downstream tasks see what the store keeps.
function toJsonPayload(taskName: string, payload: JsonObject): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(JSON.stringify(payload));
  } catch (error) {
    throw new TaskOutputError(taskName, [`payload is not JSON-serializable: ${errorMessage(error)}`]);
  }
  if (!isJsonObject(parsed)) throw new TaskOutputError(taskName, ["payload must serialize to an object"]);
  return parsed;
}

function checkOutputShape<T extends TaskOutput>(taskName: string, kind: TaskKind, output: T): T {
  const issues: string[] = [];
  if (!isJsonObject(output.payload)) issues.push("payload must be an object");
  if (!Confidence.safeParse(output.confidence).success) {
    issues.push(`unknown confidence ${String(output.confidence)}`);
  }
  if (kind === "validator") {
    const decision = ValidatorDecision.safeParse(output);
    if (!decision.success) {
      for (const issue of decision.error.issues) {
        issues.push(`${issue.path.join(".") || "verdict"}: ${issue.message}`);
      }
    }
  }
  if (issues.length > 0) throw new TaskOutputError(taskName, issues);
  return { ...output, payload: toJsonPayload(taskName, output.payload) };
}

async function callWithTimeout<T>(
  taskName: string,
  timeoutMs: number,
  call: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = new TaskTimeoutError(taskName, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([call(controller.signal), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

/**
 * Calls a task under the per-call timeout and retries transient failures
 * locally. Errors flagged `retryable: false` end the attempt loop at once.
 * Never throws: the caller gets a settled outcome either way.
 */
export async function invokeTask<T extends TaskOutput>(args: {
  taskName: string;
  /** Validator outputs must also carry a well-formed verdict. Defaults to "analysis". */
  kind?: TaskKind;
  run: (ctx: TaskContext) => Promise<T>;
  context: Omit<TaskContext, "signal" | "attempt">;
  policy: InvocationPolicy;
  log?: PipelineLogger;
}): Promise<InvocationOutcome<T>> {
  const log = args.log ?? silentLogger;
  const maxCalls = Math.max(0, args.policy.retries) + 1;
  let lastError: Error = new Error(`${args.taskName} was not invoked`);

  for (let attempt = 1; attempt <= maxCalls; attempt += 1) {
    try {
      const output = await callWithTimeout(args.taskName, args.policy.timeoutMs, (signal) =>
        args.run(Object.freeze({ ...args.context, signal, attempt }))
      );
      return {
        ok: true,
        output: checkOutputShape(args.taskName, args.kind ?? "analysis", output),
        attempts: attempt,
      };
    } catch (error) {
      lastError = toError(error);
      const retryable = isRetryable(error) && attempt < maxCalls;
      log.warn(
        {
          evt: "pipeline.task.attempt_failed",
          caseId: args.context.caseId,
          taskName: args.taskName,
          attempt,
          maxCalls,
          retryable,
          error: errorMessage(error),
        },
        "pipeline.task.attempt_failed"
      );
      if (!retryable) return { ok: false, error: lastError, attempts: attempt };
      if (args.policy.retryDelayMs > 0) {
        await sleep(args.policy.retryDelayMs * 2 ** (attempt - 1));
      }
    }
  }

  return { ok: false, error: lastError, attempts: maxCalls };
}
