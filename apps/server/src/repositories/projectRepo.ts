import type { Project } from "@timepivot/shared";
import type { Filters, Row, SqlValue, StateDb } from "../db";
import { RowReader, boolValue, timestampValue } from "./columns";
import type { Repository } from "./repository";

export const PROJECTS_TABLE = "projects";

export const PROJECT_SCHEMA = {
  id: "INTEGER PRIMARY KEY",
  name: "TEXT NOT NULL",
  status: "TEXT NOT NULL",
  billable: "INTEGER NOT NULL DEFAULT 0",
  created_at: "DATETIME NOT NULL",
  updated_at: "DATETIME NOT NULL",
} as const;

const PROJECT_COLUMNS: readonly string[] = Object.keys(PROJECT_SCHEMA);

/** Projects are append-only reference data: the first stored version of an id is kept. */
export class ProjectRepo implements Repository<Project> {
  constructor(private readonly db: StateDb) {}

  createTable(): void {
    this.db.createTable(PROJECTS_TABLE, PROJECT_SCHEMA);
  }

  insert(projects: readonly Project[]): void {
    this.db.insertMany(PROJECTS_TABLE, PROJECT_COLUMNS, projects.map(toValues), "IGNORE");
  }

  get(filters?: Filters, raw?: false): Project[];
  get(filters: Filters, raw: true): unknown[][];
  get(filters: Filters = {}, raw = false): Project[] | unknown[][] {
    if (raw) return this.db.select(PROJECTS_TABLE, PROJECT_COLUMNS, filters, true);
    return this.db.select(PROJECTS_TABLE, PROJECT_COLUMNS, filters).map(toProject);
  }

  getOne(filters: Filters = {}): Project | undefined {
    const row = this.db.selectOne(PROJECTS_TABLE, PROJECT_COLUMNS, filters);
    return row ? toProject(row) : undefined;
  }
}

function toValues(p: Project): SqlValue[] {
  return [p.id, p.name, p.status, boolValue(p.billable), timestampValue(p.createdAt), timestampValue(p.updatedAt)];
}

function toProject(row: Row): Project {
  const r = new RowReader(PROJECTS_TABLE, row);
  return {
    id: r.int("id"),
    name: r.text("name"),
    status: r.text("status"),
    billable: r.bool("billable"),
    createdAt: r.timestamp("created_at"),
    updatedAt: r.timestamp("updated_at"),
  };
}
