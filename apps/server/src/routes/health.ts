import type { FastifyInstance } from "fastify";
import type { Services } from "../app";

export function registerHealthRoutes(app: FastifyInstance, { hubstaff }: Pick<Services, "hubstaff">) {
  app.get("/api/health", async () => {
    return { ok: true, authenticated: hubstaff.isAuthenticated };
  });
}
