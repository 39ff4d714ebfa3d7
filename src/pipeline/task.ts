import type {
  Confidence,
  JsonObject,
  RemediationHint,
  UNKNOWN_INPUT,
} from "../contracts/case";

export type TaskKind = "analysis" | "validator";

/** Dependency output as seen by a dependent task. */
export type TaskInput =
  | {
      available: true;
      status: "success" | "degraded";
      payload: JsonObject;
      confidence: Confidence;
    }
  | {
      available: false;
      status: "failed" | "skipped" | "missing";
      value: typeof UNKNOWN_INPUT;
    };

export type RemediationRequest = {
  attemptNumber: number;
  hint: RemediationHint;
  previousOutput: JsonObject | null;
};

export type TaskContext = {
  readonly caseId: string;
  readonly sourceText: string;
  // Only the task's declared dependencies appear here.
  readonly inputs: Readonly<Record<string, TaskInput>>;
  readonly remediation: RemediationRequest | null;
  readonly signal: AbortSignal;
  readonly attempt: number;
};

export type TaskOutput = {
  payload: JsonObject;
  confidence: Confidence;
};

export type ValidatorOutput =
  | (TaskOutput & { verdict: "accepted" })
  | (TaskOutput & { verdict: "needs_remediation"; hint: RemediationHint });

type TaskDefinitionBase = {
  name: string;
  description?: string;
  /** Missing or failed => this task is skipped. */
  requires: readonly string[];
  /** Missing or failed => this task runs with unknown defaults and is degraded. */
  prefers: readonly string[];
  /** Whether this task must succeed (or degrade) for the case to be complete. */
  required: boolean;
  timeoutMs?: number;
  retries?: number;
};

export type AnalysisTaskDefinition = TaskDefinitionBase & {
  kind: "analysis";
  run(ctx: TaskContext): Promise<TaskOutput>;
};

export type ValidatorTaskDefinition = TaskDefinitionBase & {
  kind: "validator";
  run(ctx: TaskContext): Promise<ValidatorOutput>;
};

export type TaskDefinition = AnalysisTaskDefinition | ValidatorTaskDefinition;

export type CheckpointDefinition = {
  name: string;
  producer: string;
  validator: string;
  /** Remediation bound; falls back to the pipeline setting. */
  maxAttempts?: number;
};
