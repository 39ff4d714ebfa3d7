import type { RemediationHint, TaskResult } from "../contracts/case";
import { errorMessage } from "./errors";
import type { InvocationOutcome } from "./task_invoker";
import type { ValidatorOutput } from "./task";

export type ValidationLoopResolution =
  | "accepted"
  | "exhausted"
  | "validator_failed"
  | "remediation_failed";

export type RemediationOutcome =
  | { ok: true; result: TaskResult }
  | { ok: false; error: Error };

export type ValidationLoopArgs = {
  /** Remediation bound. The validator runs at most maxAttempts + 1 times. */
  maxAttempts: number;
  /** Remediations an interrupted earlier run already spent on this producer output. */
  priorAttempts?: number;
  producer: TaskResult;
  validate(producer: TaskResult): Promise<InvocationOutcome<ValidatorOutput>>;
  /** Persists the rejected attempt before the producer is re-invoked. */
  recordAttempt(args: {
    attemptNumber: number;
    producer: TaskResult;
    hint: RemediationHint;
  }): Promise<void>;
  remediate(args: {
    attemptNumber: number;
    producer: TaskResult;
    hint: RemediationHint;
  }): Promise<RemediationOutcome>;
  /** Writes a superseding degraded revision of the producer result. */
  markDegraded(producer: TaskResult, reason: string): Promise<TaskResult>;
};

export type ValidationLoopOutcome = {
  resolution: ValidationLoopResolution;
  producer: TaskResult;
  lastValidation: InvocationOutcome<ValidatorOutput>;
  validatorCalls: number;
  remediations: number;
  lastHint: RemediationHint | null;
};

export async function runValidationLoop(args: ValidationLoopArgs): Promise<ValidationLoopOutcome> {
  const maxAttempts = Math.max(0, Math.floor(args.maxAttempts));
  const priorAttempts = Math.max(0, Math.floor(args.priorAttempts ?? 0));
  let producer = args.producer;
  let validatorCalls = 0;
  let remediations = 0;
  let lastHint: RemediationHint | null = null;

  for (;;) {
    validatorCalls += 1;
    const validation = await args.validate(producer);
    const done = (resolution: ValidationLoopResolution): ValidationLoopOutcome => ({
      resolution,
      producer,
      lastValidation: validation,
      validatorCalls,
      remediations,
      lastHint,
    });

    if (!validation.ok) {
      producer = await args.markDegraded(
        producer,
        `validator_unavailable: output not validated (${errorMessage(validation.error)})`
      );
      return done("validator_failed");
    }

    const verdict = validation.output;
    if (verdict.verdict === "accepted") return done("accepted");

    lastHint = verdict.hint;
    if (priorAttempts + remediations >= maxAttempts) {
      producer = await args.markDegraded(
        producer,
        `validation_exhausted: not accepted after ${priorAttempts + remediations} remediation attempt(s)`
      );
      return done("exhausted");
    }

    remediations += 1;
    const attemptNumber = priorAttempts + remediations;
    await args.recordAttempt({ attemptNumber, producer, hint: verdict.hint });
    const remediated = await args.remediate({
      attemptNumber,
      producer,
      hint: verdict.hint,
    });

    if (!remediated.ok) {
      producer = await args.markDegraded(
        producer,
        `remediation_failed: ${errorMessage(remediated.error)}`
      );
      return done("remediation_failed");
    }
    producer = remediated.result;
  }
}
