import { describe, expect, it } from "vitest";
import { formatDuration, formatReport, renderReportTable } from "./format";
import { pivotTracked } from "./pivot";

describe("formatDuration", () => {
  it.each([
    [0, "0:00:00"],
    [59, "0:00:59"],
    [60, "0:01:00"],
    [5400, "1:30:00"],
    [3661, "1:01:01"],
    [93600, "26:00:00"],
  ])("%i seconds → %s", (seconds, expected) => {
    expect(formatDuration(seconds)).toBe(expected);
  });
});

describe("renderReportTable", () => {
  const report = pivotTracked([
    { date: "2024-01-01", userId: 1, projectId: 10, tracked: 3600 },
    { date: "2024-01-01", userId: 1, projectId: 10, tracked: 1800 },
    { date: "2024-01-01", userId: 1, projectId: 20, tracked: 60 },
    { date: "2024-01-01", userId: 2, projectId: 10, tracked: 0 },
  ]);

  it("labels axes with stored names and falls back to ids", () => {
    const formatted = formatReport(report, {
      users: new Map([[1, "Ada"]]),
      projects: new Map([[10, "Website"]]),
    });

    expect(renderReportTable(formatted).split("\n")).toEqual([
      "User   Website       20    Total",
      "-----  -------  -------  -------",
      "Ada    1:30:00  0:01:00  1:31:00",
      "2      0:00:00  0:00:00  0:00:00",
      "-----  -------  -------  -------",
      "Total  1:30:00  0:01:00  1:31:00",
    ]);
  });

  it("keys formatted cells by project id", () => {
    const formatted = formatReport(report);
    expect(formatted.rows[0]).toEqual({
      userId: 1,
      userName: undefined,
      cells: { "10": "1:30:00", "20": "0:01:00" },
      total: "1:31:00",
    });
    expect(formatted.grandTotal).toBe("1:31:00");
  });

  it("renders a notice for an empty report", () => {
    expect(renderReportTable(formatReport(pivotTracked([])))).toBe("No tracked time recorded.");
  });
});
