import type { FastifyInstance } from "fastify";

import { errorMessage } from "../pipeline/errors";
import type { CaseStore } from "../store/case_store";

const SERVICE = "case-pipeline";

/** Liveness, plus a read against the case store when one is wired in. */
export async function healthRoutes(app: FastifyInstance, opts: { store?: CaseStore }) {
  app.get("/healthz", async (_req, reply) => {
    const ts = new Date().toISOString();
    const store = opts.store;
    if (!store) return { ok: true, service: SERVICE, ts };

    try {
      await store.listCases({ limit: 1 });
      return { ok: true, service: SERVICE, persistence: "ok", ts };
    } catch (error) {
      app.log.warn(
        { evt: "healthz.persistence_unavailable", error: errorMessage(error) },
        "healthz.persistence_unavailable"
      );
      return reply.code(503).send({
        ok: false,
        service: SERVICE,
        persistence: "unavailable",
        error: errorMessage(error),
        ts,
      });
    }
  });
}
