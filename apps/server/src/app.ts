import Fastify, { type FastifyBaseLogger, type FastifyError } from "fastify";
import cors from "@fastify/cors";
import type { AppConfig } from "./config";
import { StateDb } from "./db";
import { HubstaffClient } from "./adapters/hubstaffClient";
import { createRepositories, type Repositories } from "./repositories";
import { ReportService } from "./services/reportService";
import { SyncOrchestrator, type RemoteSource } from "./services/syncService";
import { registerHealthRoutes } from "./routes/health";
import { registerSyncRoutes } from "./routes/sync";
import { registerReportRoutes } from "./routes/report";
import { AppError } from "./lib/errors";
import { createLogger, type RootLogger } from "./lib/logger";

export type Services = {
  db: StateDb;
  repos: Repositories;
  hubstaff: HubstaffClient;
  reports: ReportService;
  orchestrator: SyncOrchestrator;
};

/** Wires storage, the Hubstaff client and the services around one config and one logger. */
export function createServices(cfg: AppConfig, root: RootLogger, remote?: RemoteSource): Services {
  const db = new StateDb(cfg.dbPath);
  const repos = createRepositories(db);
  const hubstaff = new HubstaffClient(cfg, createLogger(root, "HubstaffClient"));
  const reports = new ReportService(repos, createLogger(root, "ReportService"));
  const orchestrator = new SyncOrchestrator(repos, remote ?? hubstaff, reports, createLogger(root, "SyncOrchestrator"));
  return { db, repos, hubstaff, reports, orchestrator };
}

export const createApp = async (cfg: AppConfig, root: RootLogger, services = createServices(cfg, root)) => {
  const { db, orchestrator } = services;
  orchestrator.install();

  const logger: FastifyBaseLogger = root;
  const app = Fastify({ loggerInstance: logger });

  await app.register(cors, {
    origin: cfg.corsOrigin === "*" ? true : cfg.corsOrigin.split(",").map(s => s.trim()),
  });

  app.setErrorHandler<FastifyError>((error, request, reply) => {
    const statusCode = error instanceof AppError
      ? error.statusCode
      : typeof error.statusCode === "number" ? error.statusCode : 500;
    if (statusCode >= 500) request.log.error({ err: error }, "Unhandled route error");
    return reply.status(statusCode >= 400 && statusCode <= 599 ? statusCode : 500).send({
      ok: false,
      error: error.message || "Internal server error",
      ...(error instanceof AppError && error.details !== undefined ? { details: error.details } : {}),
      ...(cfg.exposeErrorDetails ? { stack: error.stack } : {}),
    });
  });

  app.setNotFoundHandler((_request, reply) => {
    return reply.status(404).send({ ok: false, error: "Route not found" });
  });

  registerHealthRoutes(app, services);
  registerSyncRoutes(app, services, cfg);
  registerReportRoutes(app, services);

  // Background sync, opt-in
  let syncRunning = false;
  const organizationId = cfg.organizationId;
  const syncInterval = cfg.syncIntervalMs > 0 && organizationId !== undefined
    ? setInterval(async () => {
      if (syncRunning) return;
      syncRunning = true;
      try { await orchestrator.sync(organizationId); }
      catch (e) { app.log.error({ err: e }, "Background sync failed"); }
      finally { syncRunning = false; }
    }, cfg.syncIntervalMs)
    : undefined;

  app.addHook("onClose", async () => {
    if (syncInterval) clearInterval(syncInterval);
    db.close();
  });

  return app;
};
