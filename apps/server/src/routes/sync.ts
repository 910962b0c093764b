import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { Services } from "../app";
import type { AppConfig } from "../config";

export function registerSyncRoutes(app: FastifyInstance, { orchestrator }: Pick<Services, "orchestrator">, cfg: AppConfig) {
  app.post("/api/sync", async (request, reply) => {
    const schema = z.object({
      organizationId: z.coerce.number().int().positive().optional(),
      start: z.string().optional(),
      stop: z.string().optional(),
    });
    const parsed = schema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.status(400).send({ ok: false, error: parsed.error.message });
    }

    const { start, stop } = parsed.data;
    const organizationId = parsed.data.organizationId ?? cfg.organizationId;
    if (organizationId === undefined) {
      return reply.status(400).send({ ok: false, error: "organizationId required" });
    }

    const result = await orchestrator.sync(organizationId, { start, stop });
    return { ok: true, data: result };
  });
}
