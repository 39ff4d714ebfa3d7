import { randomUUID } from "node:crypto";

import { resolveWorkerConfig } from "./config/pipeline_config";
import { createLogger } from "./log";
import { errorMessage } from "./pipeline/errors";
import { CaseWorker } from "./queue/case_worker";
import { createRuntime } from "./runtime";

const log = createLogger("worker");

async function main() {
  const runtime = createRuntime({ log });
  const config = resolveWorkerConfig(process.env, randomUUID());
  const worker = new CaseWorker({
    source: runtime.store,
    orchestrator: runtime.orchestrator,
    config,
    log,
  });

  log.info(
    {
      evt: "worker.started",
      dbPath: runtime.dbPath,
      provider: runtime.model.provider,
      ...config,
    },
    "worker.started"
  );

  await worker.logHeartbeat("startup");
  worker.start();

  const shutdown = (signal: string) => {
    log.info({ evt: "worker.stopping", signal }, "worker.stopping");
    worker.stop();
    runtime.store.close();
    process.exit(0);
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  log.error({ error: errorMessage(err) }, "worker.fatal");
  process.exit(1);
});
