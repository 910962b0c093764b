import { describe, expect, it } from "vitest";
import { cellValue, filterByDate, pivotTracked, type TrackedFact } from "./pivot";
import { formatDuration } from "./format";

const fact = (userId: number, projectId: number, tracked: number, date = "2024-01-01"): TrackedFact => ({
  date,
  userId,
  projectId,
  tracked,
});

describe("pivotTracked", () => {
  const facts = [fact(1, 10, 3600), fact(1, 10, 1800), fact(1, 20, 60), fact(2, 10, 0)];

  it("sums tracked seconds per user and project", () => {
    const report = pivotTracked(facts);
    expect(report.rowKeys).toEqual([1, 2]);
    expect(report.columnKeys).toEqual([10, 20]);
    expect(report.cells).toEqual([
      [5400, 60],
      [0, 0],
    ]);
  });

  it("formats cells as H:MM:SS", () => {
    const report = pivotTracked(facts);
    expect(formatDuration(cellValue(report, 1, 10))).toBe("1:30:00");
    expect(formatDuration(cellValue(report, 1, 20))).toBe("0:01:00");
    expect(formatDuration(cellValue(report, 2, 10))).toBe("0:00:00");
  });

  it("fills unobserved combinations of observed ids with zero", () => {
    expect(cellValue(pivotTracked(facts), 2, 20)).toBe(0);
  });

  it("computes totals", () => {
    const report = pivotTracked(facts);
    expect(report.rowTotals).toEqual([5460, 0]);
    expect(report.columnTotals).toEqual([5400, 60]);
    expect(report.grandTotal).toBe(5460);
  });

  it("sorts axes by id regardless of input order", () => {
    const report = pivotTracked([fact(9, 30, 1), fact(3, 12, 1), fact(5, 7, 1)]);
    expect(report.rowKeys).toEqual([3, 5, 9]);
    expect(report.columnKeys).toEqual([7, 12, 30]);
  });

  it("returns an empty matrix for no facts", () => {
    const report = pivotTracked([]);
    expect(report.rowKeys).toEqual([]);
    expect(report.columnKeys).toEqual([]);
    expect(report.cells).toEqual([]);
    expect(report.grandTotal).toBe(0);
  });
});

describe("date filtering", () => {
  const facts = [fact(1, 10, 100, "2024-01-01"), fact(1, 10, 200, "2024-01-02")];

  it("keeps one exact day when start equals stop", () => {
    const report = pivotTracked(facts, { start: "2024-01-01", stop: "2024-01-01" });
    expect(report.cells).toEqual([[100]]);
  });

  it("keeps an inclusive range", () => {
    const report = pivotTracked(facts, { start: "2024-01-01", stop: "2024-01-02" });
    expect(report.cells).toEqual([[300]]);
  });

  it("keeps everything without bounds", () => {
    expect(filterByDate(facts, {})).toHaveLength(2);
  });

  it("treats a single bound as that exact day", () => {
    expect(filterByDate(facts, { start: "2024-01-01" }).map(f => f.tracked)).toEqual([100]);
    expect(filterByDate(facts, { stop: "2024-01-02" }).map(f => f.tracked)).toEqual([200]);
  });

  it("reports the completed range", () => {
    expect(pivotTracked(facts, { stop: "2024-01-02" }).range).toEqual({ start: "2024-01-02", stop: "2024-01-02" });
  });

  it("drops users and projects with nothing in range", () => {
    const report = pivotTracked([...facts, fact(2, 20, 50, "2024-02-01")], { start: "2024-01-01", stop: "2024-01-31" });
    expect(report.rowKeys).toEqual([1]);
    expect(report.columnKeys).toEqual([10]);
  });
});
