import type { Row } from "../db";
import { formatDay, parseDay, parseTimestamp } from "../lib/dates";
import { DataIntegrityError } from "../lib/errors";

/**
 * Typed column readers for rows coming back from SQLite.
 * Every mismatch is a corrupt row and throws `DataIntegrityError`.
 */
export class RowReader {
  constructor(
    private readonly table: string,
    private readonly row: Row,
  ) {}

  int(column: string): number {
    const value = this.row[column];
    if (typeof value === "number" && Number.isInteger(value)) return value;
    if (typeof value === "bigint") return Number(value);
    throw new DataIntegrityError(this.table, column, value);
  }

  intOrNull(column: string): number | null {
    return this.row[column] === null ? null : this.int(column);
  }

  text(column: string): string {
    const value = this.row[column];
    if (typeof value === "string") return value;
    throw new DataIntegrityError(this.table, column, value);
  }

  bool(column: string): boolean {
    const value = this.int(column);
    if (value === 0 || value === 1) return value === 1;
    throw new DataIntegrityError(this.table, column, value);
  }

  day(column: string): Date {
    const raw = this.text(column);
    const date = parseDay(raw);
    if (!date) throw new DataIntegrityError(this.table, column, raw);
    return date;
  }

  timestamp(column: string): Date {
    const raw = this.text(column);
    const date = parseTimestamp(raw);
    if (!date) throw new DataIntegrityError(this.table, column, raw);
    return date;
  }
}

export const dayValue = (date: Date) => formatDay(date);
export const timestampValue = (date: Date) => date.toISOString();
export const boolValue = (flag: boolean) => (flag ? 1 : 0);
