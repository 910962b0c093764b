import type { Filters } from "../db";

export type { Filters };

/** Storage contract shared by every entity table. */
export interface Repository<T> {
  /** Creates the backing table when missing. Safe to call repeatedly. */
  createTable(): void;
  /** Bulk upsert; duplicate ids resolve by the table's conflict policy. */
  insert(entities: readonly T[]): void;
  get(filters?: Filters, raw?: false): T[];
  /** Untyped tuples in column order, for bulk analytical loads. */
  get(filters: Filters, raw: true): unknown[][];
  getOne(filters?: Filters): T | undefined;
}
