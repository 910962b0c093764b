import type { DateRange, PivotReport, ReportLabels } from "@timepivot/shared";
import { ACTIVITIES_TABLE, activityColumnIndex } from "../repositories/activityRepo";
import type { Repositories } from "../repositories";
import { isDay } from "../lib/dates";
import { DataIntegrityError, ValidationError } from "../lib/errors";
import type { Logger } from "../lib/logger";
import { pivotTracked, type TrackedFact } from "../report/pivot";

const DATE = activityColumnIndex("date");
const USER_ID = activityColumnIndex("user_id");
const PROJECT_ID = activityColumnIndex("project_id");
const TRACKED = activityColumnIndex("tracked");

export class ReportService {
  constructor(
    private readonly repos: Repositories,
    private readonly log: Logger,
  ) {}

  /** Pivots stored activities into tracked seconds per user and project. */
  build(range: DateRange = {}): PivotReport {
    validateRange(range);
    const rows = this.repos.activities.get({}, true);
    const report = pivotTracked(rows.map(toFact), range);
    this.log.debug("Built report", {
      ...range,
      rows: rows.length,
      users: report.rowKeys.length,
      projects: report.columnKeys.length,
    });
    return report;
  }

  /** Names for the report axes, from whatever projects and users are stored. */
  labels(): ReportLabels {
    return {
      users: new Map(this.repos.users.get().map(u => [u.id, u.name])),
      projects: new Map(this.repos.projects.get().map(p => [p.id, p.name])),
    };
  }
}

export function validateRange(range: DateRange) {
  for (const key of ["start", "stop"] as const) {
    const value = range[key];
    if (value !== undefined && !isDay(value)) throw new ValidationError(`${key} must be a YYYY-MM-DD date`, { [key]: value });
  }
  if (range.start && range.stop && range.start > range.stop) {
    throw new ValidationError("start must not be after stop", range);
  }
}

function toFact(row: unknown[]): TrackedFact {
  const date = row[DATE];
  if (typeof date !== "string" || !isDay(date)) throw new DataIntegrityError(ACTIVITIES_TABLE, "date", date);
  return {
    date,
    userId: integer(row[USER_ID], "user_id"),
    projectId: integer(row[PROJECT_ID], "project_id"),
    tracked: integer(row[TRACKED], "tracked"),
  };
}

function integer(value: unknown, column: string): number {
  if (typeof value === "number" && Number.isInteger(value)) return value;
  throw new DataIntegrityError(ACTIVITIES_TABLE, column, value);
}
