import type { FormattedReport, PivotReport, ReportLabels } from "@timepivot/shared";

const pad2 = (n: number) => String(n).padStart(2, "0");

/** `H:MM:SS`; hours are not wrapped at 24. */
export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  return `${h}:${pad2(m)}:${pad2(s)}`;
}

export function formatReport(report: PivotReport, labels?: ReportLabels): FormattedReport {
  const columns = report.columnKeys.map(projectId => ({
    projectId,
    projectName: labels?.projects.get(projectId),
  }));

  const rows = report.rowKeys.map((userId, r) => {
    const cells: Record<string, string> = {};
    report.columnKeys.forEach((projectId, c) => {
      cells[String(projectId)] = formatDuration(report.cells[r][c]);
    });
    return { userId, userName: labels?.users.get(userId), cells, total: formatDuration(report.rowTotals[r]) };
  });

  const columnTotals: Record<string, string> = {};
  report.columnKeys.forEach((projectId, c) => {
    columnTotals[String(projectId)] = formatDuration(report.columnTotals[c]);
  });

  return { range: report.range, columns, rows, columnTotals, grandTotal: formatDuration(report.grandTotal) };
}

/** Plain-text table: users down, projects across, totals on the last row and column. */
export function renderReportTable(report: FormattedReport): string {
  if (!report.rows.length) return "No tracked time recorded.";

  const header = ["User", ...report.columns.map(c => c.projectName ?? String(c.projectId)), "Total"];
  const body = report.rows.map(row => [
    row.userName ?? String(row.userId),
    ...report.columns.map(c => row.cells[String(c.projectId)]),
    row.total,
  ]);
  const footer = ["Total", ...report.columns.map(c => report.columnTotals[String(c.projectId)]), report.grandTotal];

  const lines = [header, ...body, footer];
  const widths = header.map((_, i) => Math.max(...lines.map(line => line[i].length)));
  const render = (line: string[]) =>
    line.map((cell, i) => (i === 0 ? cell.padEnd(widths[i]) : cell.padStart(widths[i]))).join("  ").trimEnd();
  const rule = widths.map(w => "-".repeat(w)).join("  ");

  return [render(header), rule, ...body.map(render), rule, render(footer)].join("\n");
}
