import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { Services } from "../app";
import { cellValue } from "../report/pivot";
import { formatReport } from "../report/format";

// `?start=&stop=` means no bound.
const bound = z.preprocess(v => (v === "" ? undefined : v), z.string().optional());

const rangeQuery = z.object({
  start: bound,
  stop: bound,
});

export function registerReportRoutes(app: FastifyInstance, { repos, reports }: Pick<Services, "repos" | "reports">) {
  app.get("/api/report", async (request, reply) => {
    const parsed = rangeQuery.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({ ok: false, error: parsed.error.message });
    }
    const report = reports.build(parsed.data);
    return { ok: true, data: { report, formatted: formatReport(report, reports.labels()) } };
  });

  app.get("/api/report/:userId/:projectId", async (request, reply) => {
    const params = z.object({
      userId: z.coerce.number().int(),
      projectId: z.coerce.number().int(),
    }).safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ ok: false, error: params.error.message });
    }
    const query = rangeQuery.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send({ ok: false, error: query.error.message });
    }
    const tracked = cellValue(reports.build(query.data), params.data.userId, params.data.projectId);
    return { ok: true, data: { ...params.data, tracked } };
  });

  app.get("/api/projects", async () => {
    return { ok: true, data: repos.projects.get() };
  });

  app.get("/api/projects/:id", async (request, reply) => {
    const parsed = z.object({ id: z.coerce.number().int() }).safeParse(request.params);
    if (!parsed.success) {
      return reply.status(400).send({ ok: false, error: parsed.error.message });
    }
    const project = repos.projects.getOne({ id: parsed.data.id });
    if (!project) return reply.status(404).send({ ok: false, error: "Project not found" });
    return { ok: true, data: project };
  });
}
