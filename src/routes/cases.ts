import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";

import { CaseStatus, ProcessCaseRequest, ReadinessRequest } from "../contracts/case";
import {
  CaseNotFoundError,
  CaseSourceConflictError,
  PersistenceUnavailableError,
} from "../pipeline/errors";
import type { CaseOrchestrator } from "../pipeline/orchestrator";
import type { CaseStore } from "../store/case_store";
import { bearerGuard } from "./api_key";
import { assessReadiness } from "../tasks/readiness";

const CaseParams = z.object({ id: z.string().min(1) });
const HistoryParams = CaseParams.extend({ task: z.string().min(1) });

const AuditQuery = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional(),
  run_id: z.string().min(1).optional(),
});

const ListQuery = z.object({
  status: CaseStatus.optional(),
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

const ReadinessBody = ReadinessRequest.extend({
  case_id: z.string().trim().min(1).max(128).optional(),
});

function sendPipelineError(reply: FastifyReply, error: unknown) {
  if (error instanceof CaseSourceConflictError) {
    return reply.code(409).send(error.toJSON());
  }
  if (error instanceof CaseNotFoundError) {
    return reply.code(404).send({ error: "not_found", caseId: error.caseId });
  }
  if (error instanceof PersistenceUnavailableError) {
    return reply.code(503).send(error.toJSON());
  }
  throw error;
}

export async function caseRoutes(
  app: FastifyInstance,
  opts: { store: CaseStore; orchestrator: CaseOrchestrator; apiKey?: string }
) {
  const { store, orchestrator } = opts;
  const apiKey = opts.apiKey ?? process.env.CASE_API_KEY;

  app.addHook("preHandler", bearerGuard(apiKey));

  const loadCase = async (caseId: string) => {
    const record = await store.getCase(caseId);
    if (!record) throw new CaseNotFoundError(caseId);
    return record;
  };

  app.options("/cases", async (_req, reply) => reply.code(204).send());
  app.options("/cases/:id", async (_req, reply) => reply.code(204).send());
  app.options("/readiness", async (_req, reply) => reply.code(204).send());

  app.post("/cases", async (req, reply) => {
    const parsed = ProcessCaseRequest.safeParse(req.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({
        error: "invalid_request",
        details: parsed.error.flatten(),
      });
    }
    const body = parsed.data;

    try {
      if (body.mode === "queued") {
        if (!body.source_text) {
          return reply.code(400).send({
            error: "invalid_request",
            details: { fieldErrors: { source_text: ["required for queued mode"] }, formErrors: [] },
          });
        }
        const record = await orchestrator.enqueue({ caseId: body.case_id, sourceText: body.source_text });
        req.log.info({ evt: "cases.queued", caseId: record.caseId }, "cases.queued");
        return reply.code(202).send({ ok: true, case: record });
      }

      const outcome = await orchestrator.process({
        caseId: body.case_id,
        sourceText: body.source_text,
        rerun: body.rerun,
      });
      return reply.code(200).send({ ok: true, outcome });
    } catch (error) {
      return sendPipelineError(reply, error);
    }
  });

  app.get("/cases", async (req, reply) => {
    const parsed = ListQuery.safeParse(req.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: "invalid_request", details: parsed.error.flatten() });
    }
    const cases = await store.listCases(parsed.data);
    return { ok: true, cases };
  });

  app.get("/cases/:id", async (req, reply) => {
    const params = CaseParams.safeParse(req.params);
    if (!params.success) {
      return reply.code(400).send({ error: "invalid_request", details: params.error.flatten() });
    }
    try {
      const record = await loadCase(params.data.id);
      const [results, validationAttempts] = await Promise.all([
        store.listResults(record.caseId),
        store.listValidationAttempts(record.caseId),
      ]);
      return { ok: true, case: record, results, validationAttempts };
    } catch (error) {
      return sendPipelineError(reply, error);
    }
  });

  app.get("/cases/:id/results/:task/history", async (req, reply) => {
    const params = HistoryParams.safeParse(req.params);
    if (!params.success) {
      return reply.code(400).send({ error: "invalid_request", details: params.error.flatten() });
    }
    try {
      const record = await loadCase(params.data.id);
      const revisions = await store.getResultHistory(record.caseId, params.data.task);
      if (revisions.length === 0) {
        return reply.code(404).send({ error: "not_found", caseId: record.caseId, taskName: params.data.task });
      }
      return { ok: true, caseId: record.caseId, taskName: params.data.task, revisions };
    } catch (error) {
      return sendPipelineError(reply, error);
    }
  });

  app.get("/cases/:id/audit", async (req, reply) => {
    const params = CaseParams.safeParse(req.params);
    if (!params.success) {
      return reply.code(400).send({ error: "invalid_request", details: params.error.flatten() });
    }
    const query = AuditQuery.safeParse(req.query);
    if (!query.success) {
      return reply.code(400).send({ error: "invalid_request", details: query.error.flatten() });
    }
    try {
      const record = await loadCase(params.data.id);
      const events = await store.listAuditEvents(record.caseId, {
        limit: query.data.limit,
        runId: query.data.run_id,
      });
      return { ok: true, caseId: record.caseId, events };
    } catch (error) {
      return sendPipelineError(reply, error);
    }
  });

  app.post("/readiness", async (req, reply) => {
    const parsed = ReadinessBody.safeParse(req.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: "invalid_request", details: parsed.error.flatten() });
    }
    const processed = new Set<string>();
    if (parsed.data.case_id) {
      for (const result of await store.listResults(parsed.data.case_id)) {
        if (result.status === "success" || result.status === "degraded") processed.add(result.taskName);
      }
    }
    return { ok: true, readiness: assessReadiness(parsed.data.source_text, processed) };
  });
}
