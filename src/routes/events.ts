import type { FastifyInstance } from "fastify";
import { FastifySSEPlugin } from "fastify-sse-v2";
import { z } from "zod";

import type { CaseStore } from "../store/case_store";
import { bearerGuard } from "./api_key";
import { sseSink, type ProgressHub } from "../sse/progress_hub";

const CaseParams = z.object({ id: z.string().min(1) });

export async function eventsRoutes(
  app: FastifyInstance,
  opts: { store: CaseStore; hub: ProgressHub; apiKey?: string }
) {
  const apiKey = opts.apiKey ?? process.env.CASE_API_KEY;
  await app.register(FastifySSEPlugin);

  app.addHook("preHandler", bearerGuard(apiKey));

  app.options("/cases/:id/events", async (_req, reply) => reply.code(204).send());

  app.get("/cases/:id/events", async (req, reply) => {
    const params = CaseParams.safeParse(req.params);
    if (!params.success) {
      return reply.code(400).send({ error: "invalid_request", details: params.error.flatten() });
    }
    const record = await opts.store.getCase(params.data.id);
    if (!record) {
      return reply.code(404).send({ error: "not_found", caseId: params.data.id });
    }

    reply.header("X-Accel-Buffering", "no");
    const unsubscribe = opts.hub.subscribe(sseSink({ caseId: record.caseId, reply, log: req.log }));
    req.raw.on("close", unsubscribe);

    reply.sse({ event: "status", data: JSON.stringify({ caseId: record.caseId, status: record.status }) });
    return reply;
  });
}
