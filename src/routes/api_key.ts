import type { FastifyReply, FastifyRequest } from "fastify";

/** Bearer-token guard. A missing key disables the check (dev). */
export function bearerGuard(apiKey: string | undefined) {
  return async (req: FastifyRequest, reply: FastifyReply) => {
    if (!apiKey) return;
    if (req.method === "OPTIONS") return;

    const authHeader = req.headers.authorization;
    const token = authHeader?.startsWith("Bearer ")
      ? authHeader.slice("Bearer ".length).trim()
      : undefined;
    if (!token || token !== apiKey) {
      reply.header("WWW-Authenticate", "Bearer");
      return reply.code(401).send({ error: "unauthorized" });
    }
  };
}
