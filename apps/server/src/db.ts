import Database from "better-sqlite3";
import { ValidationError } from "./lib/errors";

/** Column name → SQL type and constraints, in table order. */
export type ColumnSpec = Readonly<Record<string, string>>;

export type SqlValue = string | number | bigint | Buffer | null;

/** Equality filters on named columns. `null` matches `IS NULL`. */
export type Filters = Readonly<Record<string, SqlValue | undefined>>;

export type ConflictPolicy = "REPLACE" | "IGNORE";

export type Row = Record<string, unknown>;

const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

function assertIdentifier(name: string) {
  if (!IDENTIFIER.test(name)) throw new ValidationError(`Invalid SQL identifier: ${name}`);
}

function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class StateDb {
  private db: Database.Database;

  constructor(filePath: string) {
    this.db = new Database(filePath);
    if (filePath !== ":memory:") this.db.pragma("journal_mode = WAL");
  }

  close() {
    this.db.close();
  }

  getRawDb() {
    return this.db;
  }

  createTable(table: string, columns: ColumnSpec) {
    assertIdentifier(table);
    const defs = Object.entries(columns).map(([name, type]) => {
      assertIdentifier(name);
      return `${name} ${type}`;
    });
    this.db.exec(`CREATE TABLE IF NOT EXISTS ${table} (${defs.join(", ")})`);
  }

  select(table: string, columns: readonly string[], filters: Filters, raw: true): unknown[][];
  select(table: string, columns: readonly string[], filters: Filters, raw?: false): Row[];
  select(table: string, columns: readonly string[], filters: Filters, raw = false): Row[] | unknown[][] {
    const { sql, params } = this.buildSelect(table, columns, filters);
    const stmt = this.db.prepare(sql);
    if (raw) {
      return stmt.raw(true).all(...params).filter(Array.isArray);
    }
    return stmt.all(...params).filter(isRow);
  }

  selectOne(table: string, columns: readonly string[], filters: Filters): Row | undefined {
    const { sql, params } = this.buildSelect(table, columns, filters);
    const row: unknown = this.db.prepare(`${sql} LIMIT 1`).get(...params);
    return isRow(row) ? row : undefined;
  }

  /** Bulk insert in one transaction; duplicate keys resolve per `onConflict`. */
  insertMany(table: string, columns: readonly string[], rows: readonly SqlValue[][], onConflict: ConflictPolicy) {
    if (!rows.length) return;
    assertIdentifier(table);
    columns.forEach(assertIdentifier);

    const placeholders = columns.map(() => "?").join(", ");
    const stmt = this.db.prepare(
      `INSERT OR ${onConflict} INTO ${table} (${columns.join(", ")}) VALUES (${placeholders})`,
    );

    const tx = this.db.transaction((items: readonly SqlValue[][]) => {
      for (const values of items) {
        if (values.length !== columns.length) {
          throw new ValidationError(`Expected ${columns.length} values for ${table}, got ${values.length}`);
        }
        stmt.run(...values);
      }
    });
    tx(rows);
  }

  private buildSelect(table: string, columns: readonly string[], filters: Filters) {
    assertIdentifier(table);
    columns.forEach(assertIdentifier);

    const clauses: string[] = [];
    const params: SqlValue[] = [];
    for (const [name, value] of Object.entries(filters)) {
      if (value === undefined) continue;
      if (!columns.includes(name)) throw new ValidationError(`Unknown column for ${table}: ${name}`);
      if (value === null) {
        clauses.push(`${name} IS NULL`);
      } else {
        clauses.push(`${name} = ?`);
        params.push(value);
      }
    }

    const where = clauses.length ? ` WHERE ${clauses.join(" AND ")}` : "";
    return { sql: `SELECT ${columns.join(", ")} FROM ${table}${where} ORDER BY rowid`, params };
  }
}
