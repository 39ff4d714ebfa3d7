import { describe, it, expect } from "vitest";

import type { RemediationHint, TaskResult } from "../src/contracts/case";
import type { ValidatorOutput } from "../src/pipeline/task";
import type { InvocationOutcome } from "../src/pipeline/task_invoker";
import { runValidationLoop, type ValidationLoopArgs } from "../src/pipeline/validation_loop";

const HINT: RemediationHint = { missingFields: ["score"], inconsistencies: [], guidance: "add a score" };

const producerResult = (revision: number, status: TaskResult["status"] = "success"): TaskResult => ({
  caseId: "case-1",
  taskName: "producer",
  status,
  payload: { revision },
  confidence: "high",
  degradedReasons: [],
  revision,
  attempts: 1,
  producedAt: "2026-01-01T00:00:00.000Z",
});

const accepted: InvocationOutcome<ValidatorOutput> = {
  ok: true,
  attempts: 1,
  output: { verdict: "accepted", payload: {}, confidence: "high" },
};

const rejected: InvocationOutcome<ValidatorOutput> = {
  ok: true,
  attempts: 1,
  output: { verdict: "needs_remediation", payload: {}, confidence: "low", hint: HINT },
};

function harness(verdicts: Array<InvocationOutcome<ValidatorOutput>>, maxAttempts: number) {
  let revision = 1;
  let calls = 0;
  const recorded: number[] = [];
  const degradedReasons: string[] = [];
  const args: ValidationLoopArgs = {
    maxAttempts,
    producer: producerResult(1),
    validate: async () => verdicts[Math.min(calls++, verdicts.length - 1)],
    recordAttempt: async ({ attemptNumber }) => {
      recorded.push(attemptNumber);
    },
    remediate: async () => {
      revision += 1;
      return { ok: true, result: producerResult(revision) };
    },
    markDegraded: async (producer, reason) => {
      degradedReasons.push(reason);
      revision += 1;
      return { ...producer, status: "degraded", revision, degradedReasons: [...producer.degradedReasons, reason] };
    },
  };
  return { args, recorded, degradedReasons, validatorCalls: () => calls };
}

describe("runValidationLoop", () => {
  it("accepts on the first call without remediation", async () => {
    const h = harness([accepted], 2);
    const outcome = await runValidationLoop(h.args);
    expect(outcome.resolution).toBe("accepted");
    expect(outcome.validatorCalls).toBe(1);
    expect(outcome.remediations).toBe(0);
    expect(outcome.producer.revision).toBe(1);
    expect(h.recorded).toEqual([]);
  });

  it("uses the remediated output once the validator accepts it", async () => {
    const h = harness([rejected, rejected, accepted], 2);
    const outcome = await runValidationLoop(h.args);
    expect(outcome.resolution).toBe("accepted");
    expect(outcome.validatorCalls).toBe(3);
    expect(outcome.remediations).toBe(2);
    expect(outcome.producer.revision).toBe(3);
    expect(h.recorded).toEqual([1, 2]);
    expect(h.degradedReasons).toEqual([]);
  });

  for (const maxAttempts of [0, 1, 2, 3, 4, 5]) {
    it(`stops after ${maxAttempts + 1} validator calls when the validator never accepts (max ${maxAttempts})`, async () => {
      const h = harness([rejected], maxAttempts);
      const outcome = await runValidationLoop(h.args);
      expect(outcome.resolution).toBe("exhausted");
      expect(h.validatorCalls()).toBe(maxAttempts + 1);
      expect(outcome.remediations).toBe(maxAttempts);
      expect(h.recorded).toHaveLength(maxAttempts);
      expect(outcome.producer.status).toBe("degraded");
      expect(h.degradedReasons).toEqual([
        `validation_exhausted: not accepted after ${maxAttempts} remediation attempt(s)`,
      ]);
      expect(outcome.lastHint).toEqual(HINT);
    });
  }

  it("degrades the producer when the validator itself fails", async () => {
    const h = harness([{ ok: false, attempts: 1, error: new Error("validator down") }], 2);
    const outcome = await runValidationLoop(h.args);
    expect(outcome.resolution).toBe("validator_failed");
    expect(h.degradedReasons).toEqual(["validator_unavailable: output not validated (validator down)"]);
    expect(outcome.producer.status).toBe("degraded");
  });

  it("keeps the last good output when remediation fails", async () => {
    const h = harness([rejected], 2);
    h.args.remediate = async () => ({ ok: false, error: new Error("producer down") });
    const outcome = await runValidationLoop(h.args);
    expect(outcome.resolution).toBe("remediation_failed");
    expect(outcome.remediations).toBe(1);
    expect(h.recorded).toEqual([1]);
    expect(h.degradedReasons).toEqual(["remediation_failed: producer down"]);
    expect(outcome.producer.payload).toEqual({ revision: 1 });
    expect(outcome.producer.revision).toBe(2);
  });
});
