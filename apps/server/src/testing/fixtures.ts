import type { Activity, Project, User } from "@timepivot/shared";
import { loadConfig, type AppConfig } from "../config";
import { StateDb } from "../db";
import { parseDay } from "../lib/dates";
import { createLogger, silentLogger } from "../lib/logger";
import { createAllTables, createRepositories } from "../repositories";

export const testConfig = (env: Record<string, string> = {}): AppConfig =>
  loadConfig({
    HUBSTAFF_BASE_URL: "https://hubstaff.test",
    HUBSTAFF_APP_TOKEN: "test-app-token",
    HUBSTAFF_EMAIL: "tester@example.com",
    HUBSTAFF_PASSWORD: "test-password",
    DB_FILENAME: ":memory:",
    LOG_LEVEL: "silent",
    ...env,
  });

export const testLogger = () => createLogger(silentLogger(), "test");

export function day(value: string): Date {
  const date = parseDay(value);
  if (!date) throw new Error(`Bad fixture day: ${value}`);
  return date;
}

export function memoryRepos() {
  const db = new StateDb(":memory:");
  const repos = createRepositories(db);
  createAllTables(repos);
  return { db, repos };
}

export const makeActivity = (overrides: Partial<Activity> = {}): Activity => ({
  id: 1,
  date: day("2024-01-01"),
  userId: 1,
  projectId: 10,
  taskId: 100,
  keyboard: 120,
  mouse: 340,
  overall: 400,
  tracked: 3600,
  inputTracked: 3500,
  manual: false,
  idle: 30,
  resumed: 2,
  billable: true,
  createdAt: new Date("2024-01-01T09:00:00.000Z"),
  updatedAt: new Date("2024-01-01T17:00:00.000Z"),
  ...overrides,
});

export const makeProject = (overrides: Partial<Project> = {}): Project => ({
  id: 10,
  name: "Website",
  status: "active",
  billable: true,
  createdAt: new Date("2023-06-01T08:00:00.000Z"),
  updatedAt: new Date("2023-06-02T08:00:00.000Z"),
  ...overrides,
});

export const makeUser = (overrides: Partial<User> = {}): User => ({
  id: 1,
  name: "Ada",
  email: "ada@example.com",
  timeZone: "Europe/London",
  status: "active",
  createdAt: new Date("2023-01-01T00:00:00.000Z"),
  updatedAt: new Date("2023-01-01T00:00:00.000Z"),
  ...overrides,
});
