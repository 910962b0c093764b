import { z } from "zod";
import type { Activity, DateRange, Organization, Project } from "@timepivot/shared";
import type { AppConfig } from "../config";
import { completeRange, parseDay, parseTimestamp, today } from "../lib/dates";
import { NotSupportedError } from "../lib/errors";
import type { Logger } from "../lib/logger";

const API_VERSION = "v339";

const day = z.string().transform((value, ctx) => {
  const date = parseDay(value);
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected a YYYY-MM-DD date" });
    return z.NEVER;
  }
  return date;
});

const timestamp = z.string().transform((value, ctx) => {
  const date = parseTimestamp(value);
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected an ISO-8601 timestamp" });
    return z.NEVER;
  }
  return date;
});

// The API sends flags as 0/1 or true/false depending on the endpoint.
const flag = z.union([z.boolean(), z.number()]).transform(v => Boolean(v));
const counter = z.number().int().default(0);

const activitySchema = z.object({
  id: z.number().int(),
  date: day,
  user_id: z.number().int(),
  project_id: z.number().int(),
  task_id: z.number().int().nullable().default(null),
  keyboard: counter,
  mouse: counter,
  overall: counter,
  tracked: counter,
  input_tracked: counter,
  manual: flag.default(false),
  idle: counter,
  resumed: counter,
  billable: flag.default(false),
  created_at: timestamp,
  updated_at: timestamp,
});

const projectSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  status: z.string().default("active"),
  billable: flag.default(false),
  created_at: timestamp,
  updated_at: timestamp,
});

const loginSchema = z.object({ auth_token: z.string().min(1) });

const listOf = (key: string) => z.object({ [key]: z.array(z.unknown()).default([]) });

export type HubstaffActivity = z.input<typeof activitySchema>;
export type HubstaffProject = z.input<typeof projectSchema>;

export class HubstaffClient {
  private authToken: string | undefined;

  constructor(
    private readonly cfg: AppConfig,
    private readonly log: Logger,
  ) {}

  get isAuthenticated(): boolean {
    return Boolean(this.authToken);
  }

  /**
   * Exchanges the configured credentials for a session token.
   * Failure leaves the client unauthenticated; it never throws.
   */
  async authenticate(): Promise<boolean> {
    const response = await this.send(`${API_VERSION}/members/login`, {
      method: "POST",
      body: new URLSearchParams({ email: this.cfg.hubstaffEmail, password: this.cfg.hubstaffPassword }),
    });
    this.log.debug("Trying to authenticate", { status: response?.status });
    if (response?.status !== 200) return false;

    const parsed = loginSchema.safeParse(response.body);
    if (!parsed.success) return false;
    this.authToken = parsed.data.auth_token;
    return true;
  }

  /** Daily activity records for an inclusive date range; today when no bound is given. */
  async fetchDailyActivities(organizationId: number, start?: string, stop?: string): Promise<Activity[]> {
    const range = resolveRange({ start, stop });
    const records = await this.list(`${API_VERSION}/company/${organizationId}/operations/by_day`, "daily_activities", {
      "date[start]": range.start,
      "date[stop]": range.stop,
    });

    const activities: Activity[] = [];
    for (const record of records) {
      const parsed = activitySchema.safeParse(record);
      if (!parsed.success) {
        this.log.warn("Skipping malformed activity", { issues: parsed.error.issues.map(i => i.path.join(".")) });
        continue;
      }
      const a = parsed.data;
      activities.push({
        id: a.id,
        date: a.date,
        userId: a.user_id,
        projectId: a.project_id,
        taskId: a.task_id,
        keyboard: a.keyboard,
        mouse: a.mouse,
        overall: a.overall,
        tracked: a.tracked,
        inputTracked: a.input_tracked,
        manual: a.manual,
        idle: a.idle,
        resumed: a.resumed,
        billable: a.billable,
        createdAt: a.created_at,
        updatedAt: a.updated_at,
      });
    }
    this.log.debug("Got activities", { organizationId, ...range, count: activities.length });
    return activities;
  }

  async fetchProjects(organizationId: number): Promise<Project[]> {
    const records = await this.list(`${API_VERSION}/company/${organizationId}/projects`, "projects");

    const projects: Project[] = [];
    for (const record of records) {
      const parsed = projectSchema.safeParse(record);
      if (!parsed.success) {
        this.log.warn("Skipping malformed project", { issues: parsed.error.issues.map(i => i.path.join(".")) });
        continue;
      }
      const p = parsed.data;
      projects.push({
        id: p.id,
        name: p.name,
        status: p.status,
        billable: p.billable,
        createdAt: p.created_at,
        updatedAt: p.updated_at,
      });
    }
    this.log.debug("Got projects", { organizationId, count: projects.length });
    return projects;
  }

  async fetchOrganization(_organizationId: number): Promise<Organization> {
    throw new NotSupportedError("Fetching organization details");
  }

  async fetchProject(_projectId: number): Promise<Project> {
    throw new NotSupportedError("Fetching a single project");
  }

  /** GETs a list endpoint; anything but a 2xx JSON body with `key` yields an empty list. */
  private async list(path: string, key: string, params: Record<string, string> = {}): Promise<unknown[]> {
    if (!this.authToken) await this.authenticate();

    const url = new URL(`${this.cfg.hubstaffBaseUrl}/${path}`);
    for (const [name, value] of Object.entries(params)) url.searchParams.set(name, value);

    const response = await this.send(url, { method: "GET" });
    if (!response?.ok) {
      this.log.debug("Remote list request failed", { path, status: response?.status });
      return [];
    }

    const parsed = listOf(key).safeParse(response.body);
    if (!parsed.success) {
      this.log.warn("Unexpected response shape", { path, key });
      return [];
    }
    return parsed.data[key] ?? [];
  }

  /** Status and parsed JSON body; the timeout covers the body as well as the headers. */
  private async send(target: string | URL, init: RequestInit): Promise<RemoteResponse | undefined> {
    const url = typeof target === "string" ? `${this.cfg.hubstaffBaseUrl}/${target}` : target;
    const headers = new Headers(init.headers);
    headers.set("AppToken", this.cfg.hubstaffAppToken);
    if (this.authToken) headers.set("AuthToken", this.authToken);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.cfg.hubstaffTimeoutMs);
    try {
      const response = await fetch(url, { ...init, headers, signal: controller.signal });
      const text = await response.text();
      return { ok: response.ok, status: response.status, body: parseJson(text) };
    } catch (error) {
      const reason = error instanceof Error && error.name === "AbortError"
        ? `timed out after ${this.cfg.hubstaffTimeoutMs}ms`
        : error instanceof Error ? error.message : "unknown";
      this.log.warn("Hubstaff request failed", { url: String(url), reason });
      return undefined;
    } finally {
      clearTimeout(timeout);
    }
  }
}

type RemoteResponse = {
  ok: boolean;
  status: number;
  body: unknown;
};

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Fills missing bounds: none → today, one → the other. */
export function resolveRange(range: DateRange): { start: string; stop: string } {
  const { start = today(), stop = start } = completeRange(range);
  return { start, stop };
}
