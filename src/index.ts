import Fastify from "fastify";
import cors from "@fastify/cors";

import { createLogger } from "./log";
import { caseRoutes } from "./routes/cases";
import { eventsRoutes } from "./routes/events";
import { healthRoutes } from "./routes/healthz";
import { createRuntime } from "./runtime";
import { ProgressHub } from "./sse/progress_hub";

const app = Fastify({ logger: true });

async function main() {
  const log = createLogger("case-pipeline");
  const hub = new ProgressHub();
  const runtime = createRuntime({ log, progress: hub });

  // CORS (v0/dev): permissive. Tighten before prod.
  app.register(cors, {
    origin: true,
  });

  app.register(healthRoutes, { store: runtime.store });
  app.register(caseRoutes, { prefix: "/v1", store: runtime.store, orchestrator: runtime.orchestrator });
  app.register(eventsRoutes, { prefix: "/v1", store: runtime.store, hub });

  app.addHook("onClose", async () => {
    hub.shutdown();
    runtime.store.close();
  });

  const port = Number(process.env.PORT ?? 3333);
  await app.listen({ port, host: "0.0.0.0" });
  log.info(
    {
      evt: "server.started",
      port,
      dbPath: runtime.dbPath,
      provider: runtime.model.provider,
      model: runtime.model.model,
      stages: runtime.graph.stages,
    },
    "server.started"
  );
}

main().catch((err) => {
  app.log.error(err);
  process.exit(1);
});
