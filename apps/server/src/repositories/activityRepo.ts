import type { Activity } from "@timepivot/shared";
import type { Filters, Row, SqlValue, StateDb } from "../db";
import { RowReader, boolValue, dayValue, timestampValue } from "./columns";
import type { Repository } from "./repository";

export const ACTIVITIES_TABLE = "activities";

// `date` is deliberately not unique: several users and projects share a day.
export const ACTIVITY_SCHEMA = {
  id: "INTEGER PRIMARY KEY",
  date: "DATE NOT NULL",
  user_id: "INTEGER NOT NULL",
  project_id: "INTEGER NOT NULL",
  task_id: "INTEGER",
  keyboard: "INTEGER NOT NULL DEFAULT 0",
  mouse: "INTEGER NOT NULL DEFAULT 0",
  overall: "INTEGER NOT NULL DEFAULT 0",
  tracked: "INTEGER NOT NULL DEFAULT 0",
  input_tracked: "INTEGER NOT NULL DEFAULT 0",
  manual: "INTEGER NOT NULL DEFAULT 0",
  idle: "INTEGER NOT NULL DEFAULT 0",
  resumed: "INTEGER NOT NULL DEFAULT 0",
  billable: "INTEGER NOT NULL DEFAULT 0",
  created_at: "DATETIME NOT NULL",
  updated_at: "DATETIME NOT NULL",
} as const;

export type ActivityColumn = keyof typeof ACTIVITY_SCHEMA;

export const ACTIVITY_COLUMNS: readonly string[] = Object.keys(ACTIVITY_SCHEMA);

/** Position of a column in raw tuples returned by `get(filters, true)`. */
export const activityColumnIndex = (column: ActivityColumn) => ACTIVITY_COLUMNS.indexOf(column);

/** Activities are recomputed upstream, so a re-synced id replaces the stored row. */
export class ActivityRepo implements Repository<Activity> {
  constructor(private readonly db: StateDb) {}

  createTable(): void {
    this.db.createTable(ACTIVITIES_TABLE, ACTIVITY_SCHEMA);
  }

  insert(activities: readonly Activity[]): void {
    this.db.insertMany(ACTIVITIES_TABLE, ACTIVITY_COLUMNS, activities.map(toValues), "REPLACE");
  }

  get(filters?: Filters, raw?: false): Activity[];
  get(filters: Filters, raw: true): unknown[][];
  get(filters: Filters = {}, raw = false): Activity[] | unknown[][] {
    if (raw) return this.db.select(ACTIVITIES_TABLE, ACTIVITY_COLUMNS, filters, true);
    return this.db.select(ACTIVITIES_TABLE, ACTIVITY_COLUMNS, filters).map(toActivity);
  }

  getOne(filters: Filters = {}): Activity | undefined {
    const row = this.db.selectOne(ACTIVITIES_TABLE, ACTIVITY_COLUMNS, filters);
    return row ? toActivity(row) : undefined;
  }
}

function toValues(a: Activity): SqlValue[] {
  return [
    a.id, dayValue(a.date), a.userId, a.projectId, a.taskId,
    a.keyboard, a.mouse, a.overall, a.tracked, a.inputTracked,
    boolValue(a.manual), a.idle, a.resumed, boolValue(a.billable),
    timestampValue(a.createdAt), timestampValue(a.updatedAt),
  ];
}

function toActivity(row: Row): Activity {
  const r = new RowReader(ACTIVITIES_TABLE, row);
  return {
    id: r.int("id"),
    date: r.day("date"),
    userId: r.int("user_id"),
    projectId: r.int("project_id"),
    taskId: r.intOrNull("task_id"),
    keyboard: r.int("keyboard"),
    mouse: r.int("mouse"),
    overall: r.int("overall"),
    tracked: r.int("tracked"),
    inputTracked: r.int("input_tracked"),
    manual: r.bool("manual"),
    idle: r.int("idle"),
    resumed: r.int("resumed"),
    billable: r.bool("billable"),
    createdAt: r.timestamp("created_at"),
    updatedAt: r.timestamp("updated_at"),
  };
}
