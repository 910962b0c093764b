import type { DateRange, PivotReport } from "@timepivot/shared";
import { completeRange } from "../lib/dates";

/** The slice of an activity row the report needs. */
export type TrackedFact = {
  date: string;
  userId: number;
  projectId: number;
  tracked: number;
};

/**
 * Keeps facts whose `YYYY-MM-DD` date lies within the inclusive range.
 * A single bound selects that one day; no bounds keep everything.
 */
export function filterByDate<T extends { date: string }>(facts: readonly T[], range: DateRange): T[] {
  const { start, stop } = completeRange(range);
  if (start === undefined || stop === undefined) return [...facts];
  return facts.filter(f => f.date >= start && f.date <= stop);
}

/** Sums tracked seconds into a users × projects matrix. Only observed ids become axes. */
export function pivotTracked(facts: readonly TrackedFact[], requested: DateRange = {}): PivotReport {
  const range = completeRange(requested);
  const sums = new Map<number, Map<number, number>>();
  const projectIds = new Set<number>();

  for (const f of filterByDate(facts, range)) {
    let byProject = sums.get(f.userId);
    if (!byProject) {
      byProject = new Map();
      sums.set(f.userId, byProject);
    }
    byProject.set(f.projectId, (byProject.get(f.projectId) ?? 0) + f.tracked);
    projectIds.add(f.projectId);
  }

  const rowKeys = [...sums.keys()].sort((a, b) => a - b);
  const columnKeys = [...projectIds].sort((a, b) => a - b);
  const cells = rowKeys.map(userId => {
    const byProject = sums.get(userId);
    return columnKeys.map(projectId => byProject?.get(projectId) ?? 0);
  });

  const rowTotals = cells.map(row => row.reduce((s, v) => s + v, 0));
  const columnTotals = columnKeys.map((_, c) => cells.reduce((s, row) => s + row[c], 0));
  const grandTotal = rowTotals.reduce((s, v) => s + v, 0);

  return { range, rowKeys, columnKeys, cells, rowTotals, columnTotals, grandTotal };
}

/** Tracked-seconds lookup by ids; 0 for combinations outside the matrix. */
export function cellValue(report: PivotReport, userId: number, projectId: number): number {
  const r = report.rowKeys.indexOf(userId);
  const c = report.columnKeys.indexOf(projectId);
  if (r < 0 || c < 0) return 0;
  return report.cells[r][c];
}
