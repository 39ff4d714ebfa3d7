import { config as loadEnv } from "dotenv";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

export type Env = Record<string, string | undefined>;

export type PipelineConfig = {
  taskTimeoutMs: number;
  taskLocalRetries: number;
  taskRetryDelayMs: number;
  checkpointMaxAttempts: number;
  // When false, a degraded required task leaves the case partial.
  degradedCountsAsComplete: boolean;
  resumeFromPersisted: boolean;
};

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  taskTimeoutMs: 60_000,
  taskLocalRetries: 2,
  taskRetryDelayMs: 250,
  checkpointMaxAttempts: 2,
  degradedCountsAsComplete: true,
  resumeFromPersisted: true,
};

export const isTruthy = (value?: string) =>
  value !== undefined && ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());

const isFalsy = (value?: string) =>
  value !== undefined && ["0", "false", "no", "off"].includes(value.trim().toLowerCase());

// Accepts 0, unlike the `Number(x) || d` shorthand.
const readCount = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
};

const readFlag = (value: string | undefined, fallback: boolean): boolean => {
  if (isTruthy(value)) return true;
  if (isFalsy(value)) return false;
  return fallback;
};

export function resolvePipelineConfig(env: Env = process.env): PipelineConfig {
  const d = DEFAULT_PIPELINE_CONFIG;
  return {
    taskTimeoutMs: Number(env.TASK_TIMEOUT_MS ?? d.taskTimeoutMs) || d.taskTimeoutMs,
    taskLocalRetries: readCount(env.TASK_LOCAL_RETRIES, d.taskLocalRetries),
    taskRetryDelayMs: readCount(env.TASK_RETRY_DELAY_MS, d.taskRetryDelayMs),
    checkpointMaxAttempts: readCount(env.CHECKPOINT_MAX_ATTEMPTS, d.checkpointMaxAttempts),
    degradedCountsAsComplete: readFlag(env.DEGRADED_COUNTS_AS_COMPLETE, d.degradedCountsAsComplete),
    resumeFromPersisted: readFlag(env.PIPELINE_RESUME, d.resumeFromPersisted),
  };
}

export function resolveDbPath(env: Env = process.env): string {
  const isDev = env.NODE_ENV !== "production";
  const explicit = env.CASE_DB_PATH ?? env.DB_PATH;
  if (!explicit && !isDev) {
    throw new Error("CASE_DB_PATH must be set in non-dev environments.");
  }
  return explicit ?? "./data/cases.db";
}

export type WorkerConfig = {
  workerId: string;
  leaseSeconds: number;
  pollIntervalMs: number;
  heartbeatEvery: number;
  leaseAttemptLimit: number;
  emptyScanLimit: number;
  jitterMinMs: number;
  jitterMaxMs: number;
};

export function resolveWorkerConfig(env: Env = process.env, fallbackId = "worker"): WorkerConfig {
  return {
    workerId: env.WORKER_ID ?? fallbackId,
    // Long enough to cover a full run; an expired lease marks a crashed worker.
    leaseSeconds: Number(env.WORKER_LEASE_SECONDS ?? 600) || 600,
    pollIntervalMs: Number(env.WORKER_POLL_INTERVAL_MS ?? 500) || 500,
    heartbeatEvery: Number(env.WORKER_HEARTBEAT_EVERY ?? 20) || 20,
    leaseAttemptLimit: Number(env.WORKER_LEASE_ATTEMPTS ?? 5) || 5,
    emptyScanLimit: Number(env.WORKER_EMPTY_SCANS ?? 2) || 2,
    jitterMinMs: readCount(env.WORKER_LEASE_JITTER_MIN_MS, 10),
    jitterMaxMs: readCount(env.WORKER_LEASE_JITTER_MAX_MS, 50),
  };
}
