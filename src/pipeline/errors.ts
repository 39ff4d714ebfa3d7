export type StageGraphErrorCode =
  | "cycle_detected"
  | "unknown_dependency"
  | "duplicate_task"
  | "invalid_checkpoint"
  | "empty_graph";

export class StageGraphError extends Error {
  public readonly code: StageGraphErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(code: StageGraphErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "StageGraphError";
    this.code = code;
    this.details = details;
  }

  toJSON() {
    return {
      error: "invalid_stage_graph",
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export class TaskTimeoutError extends Error {
  public readonly retryable = true;
  public readonly taskName: string;
  public readonly timeoutMs: number;

  constructor(taskName: string, timeoutMs: number) {
    super(`${taskName} timed out after ${timeoutMs}ms`);
    this.name = "TaskTimeoutError";
    this.taskName = taskName;
    this.timeoutMs = timeoutMs;
  }
}

export class TaskOutputError extends Error {
  public readonly retryable = false;
  public readonly taskName: string;
  public readonly issues: string[];

  constructor(taskName: string, issues: string[]) {
    super(`${taskName} returned invalid output: ${issues.slice(0, 3).join("; ")}`);
    this.name = "TaskOutputError";
    this.taskName = taskName;
    this.issues = issues;
  }
}

export class ModelProviderError extends Error {
  statusCode: number;
  retryable: boolean;
  errorType?: string;
  errorCode?: string;
  retryAfterMs?: number;

  constructor(
    message: string,
    args: {
      statusCode?: number;
      retryable?: boolean;
      errorType?: string;
      errorCode?: string;
      retryAfterMs?: number;
    } = {}
  ) {
    super(message);
    this.name = "ModelProviderError";
    this.statusCode = args.statusCode ?? 502;
    this.retryable = args.retryable ?? true;
    this.errorType = args.errorType;
    this.errorCode = args.errorCode;
    this.retryAfterMs = args.retryAfterMs;
  }
}

export class PersistenceUnavailableError extends Error {
  public readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`persistence unavailable during ${operation}: ${errorMessage(cause)}`, { cause });
    this.name = "PersistenceUnavailableError";
    this.operation = operation;
  }

  toJSON() {
    return {
      error: "persistence_unavailable",
      operation: this.operation,
      message: this.message,
    };
  }
}

export class CaseSourceConflictError extends Error {
  public readonly caseId: string;

  constructor(caseId: string) {
    super(`case ${caseId} already exists with different source text`);
    this.name = "CaseSourceConflictError";
    this.caseId = caseId;
  }

  toJSON() {
    return {
      error: "case_source_conflict",
      caseId: this.caseId,
      message: this.message,
    };
  }
}

export class CaseNotFoundError extends Error {
  public readonly caseId: string;

  constructor(caseId: string) {
    super(`case ${caseId} not found`);
    this.name = "CaseNotFoundError";
    this.caseId = caseId;
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const isRetryable = (error: unknown): boolean => {
  if (error && typeof error === "object" && "retryable" in error) {
    return error.retryable !== false;
  }
  return true;
};
