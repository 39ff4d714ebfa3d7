import { z } from "zod";

export const CaseStatus = z.enum(["pending", "in_progress", "complete", "partial"]);
export type CaseStatus = z.infer<typeof CaseStatus>;

export const TaskStatus = z.enum(["success", "failed", "skipped", "degraded"]);
export type TaskStatus = z.infer<typeof TaskStatus>;

// Ordered weakest to strongest.
export const Confidence = z.enum(["none", "low", "medium", "high", "very-high"]);
export type Confidence = z.infer<typeof Confidence>;

export type JsonObject = Record<string, unknown>;

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const UNKNOWN_INPUT = "unknown — data unavailable";

export const ProcessCaseRequest = z.object({
  case_id: z.string().trim().min(1).max(128).optional(),
  source_text: z.string().min(1).max(200_000).optional(),
  rerun: z.boolean().optional(),
  mode: z.enum(["sync", "queued"]).default("sync"),
});

export type ProcessCaseRequest = z.infer<typeof ProcessCaseRequest>;

export const ReadinessRequest = z.object({
  source_text: z.string().max(200_000),
});

export type CaseRecord = {
  caseId: string;
  sourceText: string;
  status: CaseStatus;
  createdAt: string;
  updatedAt: string;
  leaseOwner?: string | null;
  leaseExpiresAt?: string | null;
};

export type TaskResult = {
  caseId: string;
  taskName: string;
  status: TaskStatus;
  payload: JsonObject | null;
  confidence: Confidence;
  // Set only when status is "failed".
  errorMessage?: string;
  skipReason?: string;
  degradedReasons: string[];
  revision: number;
  attempts: number;
  producedAt: string;
};

export type TaskResultDraft = Omit<TaskResult, "revision" | "producedAt">;

export type ValidatorVerdict = z.infer<typeof ValidatorVerdict>;

export const RemediationHint = z.object({
  missingFields: z.array(z.string()),
  inconsistencies: z.array(z.string()),
  guidance: z.string(),
});
export type RemediationHint = z.infer<typeof RemediationHint>;

export type ValidationAttempt = {
  id: string;
  caseId: string;
  checkpoint: string;
  attemptNumber: number;
  producerRevision: number;
  producerOutput: JsonObject | null;
  validatorVerdict: ValidatorVerdict;
  remediationHint: RemediationHint | null;
  createdAt: string;
};

export type ValidationAttemptDraft = Omit<ValidationAttempt, "id" | "createdAt">;

export const AUDIT_EVENT_TYPES = [
  "case-created",
  "pipeline-started",
  "task-started",
  "task-completed",
  "task-failed",
  "task-skipped",
  "task-resumed",
  "validation-attempt",
  "checkpoint-resolved",
  "pipeline-completed",
  "pipeline-partial",
] as const;

export const AuditEventType = z.enum(AUDIT_EVENT_TYPES);
export type AuditEventType = z.infer<typeof AuditEventType>;

export const ValidatorVerdict = z.enum(["accepted", "needs_remediation"]);

// Verdict fields a validator task must return next to its payload.
export const ValidatorDecision = z.discriminatedUnion("verdict", [
  z.object({ verdict: z.literal("accepted") }),
  z.object({ verdict: z.literal("needs_remediation"), hint: RemediationHint }),
]);

export type AuditEvent = {
  id: string;
  caseId: string;
  runId: string;
  seq: number;
  eventType: AuditEventType;
  payload: JsonObject;
  ts: string;
};

export type AuditEventDraft = Omit<AuditEvent, "id">;

export type CheckpointResolution =
  | "accepted"
  | "exhausted"
  | "validator_failed"
  | "remediation_failed"
  | "skipped"
  | "resumed";

export type CheckpointSummary = {
  name: string;
  producer: string;
  validator: string;
  resolution: CheckpointResolution;
  validatorCalls: number;
  remediations: number;
};

export type CaseIssue = {
  taskName: string;
  status: Exclude<TaskStatus, "success">;
  reason: string;
};

export type CaseOutcome = {
  caseId: string;
  runId: string;
  status: Extract<CaseStatus, "complete" | "partial">;
  results: Record<string, TaskResult>;
  degraded: string[];
  failed: string[];
  skipped: string[];
  issues: CaseIssue[];
  validationAttempts: ValidationAttempt[];
  checkpoints: CheckpointSummary[];
};

export type ProgressState =
  | "queued"
  | "started"
  | "completed"
  | "degraded"
  | "failed"
  | "skipped"
  | "resumed"
  | "remediating";

export type ProgressEvent = {
  caseId: string;
  taskName: string | null;
  state: ProgressState | "case_complete" | "case_partial";
  ts: string;
  detail?: JsonObject;
};
