import type { DateRange, RunResult, SyncResult } from "@timepivot/shared";
import { resolveRange, type HubstaffClient } from "../adapters/hubstaffClient";
import { createAllTables, type Repositories } from "../repositories";
import { completeRange } from "../lib/dates";
import type { Logger } from "../lib/logger";
import { validateRange, type ReportService } from "./reportService";

export type RemoteSource = Pick<HubstaffClient, "fetchDailyActivities" | "fetchProjects">;

export type RunOptions = {
  organizationId?: number;
  range?: DateRange;
  reportOnly?: boolean;
};

export class SyncOrchestrator {
  constructor(
    private readonly repos: Repositories,
    private readonly remote: RemoteSource,
    private readonly reports: ReportService,
    private readonly log: Logger,
  ) {}

  install(): void {
    this.log.debug("Running install");
    createAllTables(this.repos);
    this.log.debug("Install done");
  }

  /**
   * One sync cycle: fetch activities, fetch projects, then upsert in that order.
   * Remote failures arrive as empty lists, so an unproductive cycle still succeeds.
   */
  async sync(organizationId: number, range: DateRange = {}): Promise<SyncResult> {
    validateRange(range);
    const { start, stop } = resolveRange(range);
    const startedAt = new Date().toISOString();

    const activities = await this.remote.fetchDailyActivities(organizationId, start, stop);
    const projects = await this.remote.fetchProjects(organizationId);

    this.repos.activities.insert(activities);
    this.log.info("Synced activities", { organizationId, start, stop, count: activities.length });
    this.repos.projects.insert(projects);
    this.log.info("Synced projects", { organizationId, count: projects.length });

    return {
      organizationId,
      start,
      stop,
      activities: activities.length,
      projects: projects.length,
      startedAt,
      finishedAt: new Date().toISOString(),
    };
  }

  /**
   * Optional sync followed by a report built from storage. `reportOnly` never touches the remote.
   * Both steps see the same range: a single bound is that one day.
   */
  async run(options: RunOptions): Promise<RunResult> {
    const range = completeRange(options.range ?? {});
    let sync: SyncResult | undefined;

    if (!options.reportOnly) {
      if (options.organizationId === undefined) {
        this.log.warn("No organization id given; skipping sync");
      } else {
        sync = await this.sync(options.organizationId, range);
      }
    }

    return { sync, report: this.reports.build(range) };
  }
}
