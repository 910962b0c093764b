// ─── Organizations ───

export type Organization = {
  id: number;
};

// ─── Users ───

export type User = {
  readonly id: number;
  readonly name: string;
  readonly email: string;
  readonly timeZone: string;
  readonly status: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
};

// ─── Projects ───

export type Project = {
  readonly id: number;
  readonly name: string;
  readonly status: string;
  readonly billable: boolean;
  readonly createdAt: Date;
  readonly updatedAt: Date;
};

// ─── Activities ───

/** One record per (user, project, task, day). Counters are in seconds unless noted. */
export type Activity = {
  readonly id: number;
  /** Calendar day at local midnight. */
  readonly date: Date;
  readonly userId: number;
  readonly projectId: number;
  readonly taskId: number | null;
  readonly keyboard: number;
  readonly mouse: number;
  readonly overall: number;
  readonly tracked: number;
  readonly inputTracked: number;
  readonly manual: boolean;
  readonly idle: number;
  /** Number of times tracking was resumed. */
  readonly resumed: number;
  readonly billable: boolean;
  readonly createdAt: Date;
  readonly updatedAt: Date;
};

// ─── Sync ───

/** Inclusive date bounds as `YYYY-MM-DD` strings. */
export type DateRange = {
  start?: string;
  stop?: string;
};

export type SyncResult = {
  organizationId: number;
  start: string;
  stop: string;
  activities: number;
  projects: number;
  startedAt: string;
  finishedAt: string;
};

// ─── Report ───

export type PivotReport = {
  range: DateRange;
  /** User ids, ascending. */
  rowKeys: number[];
  /** Project ids, ascending. */
  columnKeys: number[];
  /** Tracked seconds, `cells[row][column]`. */
  cells: number[][];
  rowTotals: number[];
  columnTotals: number[];
  grandTotal: number;
};

export type ReportLabels = {
  users: Map<number, string>;
  projects: Map<number, string>;
};

export type FormattedReportRow = {
  userId: number;
  userName?: string;
  cells: Record<string, string>;
  total: string;
};

export type FormattedReport = {
  range: DateRange;
  columns: Array<{ projectId: number; projectName?: string }>;
  rows: FormattedReportRow[];
  columnTotals: Record<string, string>;
  grandTotal: string;
};

export type RunResult = {
  sync?: SyncResult;
  report: PivotReport;
};
