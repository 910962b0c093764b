import type { User } from "@timepivot/shared";
import type { Filters, Row, SqlValue, StateDb } from "../db";
import { RowReader, timestampValue } from "./columns";
import type { Repository } from "./repository";

export const USERS_TABLE = "users";

export const USER_SCHEMA = {
  id: "INTEGER PRIMARY KEY",
  name: "TEXT NOT NULL",
  email: "TEXT UNIQUE",
  time_zone: "TEXT",
  status: "TEXT",
  created_at: "DATETIME NOT NULL",
  updated_at: "DATETIME NOT NULL",
} as const;

const USER_COLUMNS: readonly string[] = Object.keys(USER_SCHEMA);

export class UserRepo implements Repository<User> {
  constructor(private readonly db: StateDb) {}

  createTable(): void {
    this.db.createTable(USERS_TABLE, USER_SCHEMA);
  }

  insert(users: readonly User[]): void {
    this.db.insertMany(USERS_TABLE, USER_COLUMNS, users.map(toValues), "REPLACE");
  }

  get(filters?: Filters, raw?: false): User[];
  get(filters: Filters, raw: true): unknown[][];
  get(filters: Filters = {}, raw = false): User[] | unknown[][] {
    if (raw) return this.db.select(USERS_TABLE, USER_COLUMNS, filters, true);
    return this.db.select(USERS_TABLE, USER_COLUMNS, filters).map(toUser);
  }

  getOne(filters: Filters = {}): User | undefined {
    const row = this.db.selectOne(USERS_TABLE, USER_COLUMNS, filters);
    return row ? toUser(row) : undefined;
  }
}

function toValues(u: User): SqlValue[] {
  return [u.id, u.name, u.email, u.timeZone, u.status, timestampValue(u.createdAt), timestampValue(u.updatedAt)];
}

function toUser(row: Row): User {
  const r = new RowReader(USERS_TABLE, row);
  return {
    id: r.int("id"),
    name: r.text("name"),
    email: r.text("email"),
    timeZone: r.text("time_zone"),
    status: r.text("status"),
    createdAt: r.timestamp("created_at"),
    updatedAt: r.timestamp("updated_at"),
  };
}
