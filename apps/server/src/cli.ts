import { parseArgs } from "node:util";
import { z } from "zod";
import { createApp, createServices } from "./app";
import { loadConfig, type AppConfig } from "./config";
import { isDay } from "./lib/dates";
import { ValidationError } from "./lib/errors";
import { createLogger, createRootLogger } from "./lib/logger";
import { formatReport, renderReportTable } from "./report/format";

const USAGE = `Usage: timepivot [options]

Syncs Hubstaff daily activities and prints tracked time by user and project.

  -o, --organization <id>  Organization id as specified in the Hubstaff API
  -s, --start <date>       First day to sync and report (YYYY-MM-DD)
  -e, --stop <date>        Last day to sync and report (YYYY-MM-DD)
  -r, --report-only        Skip the sync and report on stored data
  -i, --install            Create the database file and tables, then exit
      --serve              Start the HTTP API
  -d, --debug              Debug logging
  -h, --help               Show this help`;

const day = z.string().refine(isDay, "must be a YYYY-MM-DD date");

const argsSchema = z
  .object({
    organization: z.coerce.number().int().positive().optional(),
    start: day.optional(),
    stop: day.optional(),
    "report-only": z.boolean().default(false),
    install: z.boolean().default(false),
    serve: z.boolean().default(false),
    debug: z.boolean().default(false),
    help: z.boolean().default(false),
  })
  .refine(a => !(a.install && a.organization !== undefined), {
    message: "--install and --organization are mutually exclusive",
  });

export type CliArgs = z.infer<typeof argsSchema>;

export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      organization: { type: "string", short: "o" },
      start: { type: "string", short: "s" },
      stop: { type: "string", short: "e" },
      "report-only": { type: "boolean", short: "r" },
      install: { type: "boolean", short: "i" },
      serve: { type: "boolean" },
      debug: { type: "boolean", short: "d" },
      help: { type: "boolean", short: "h" },
    },
    strict: true,
  });
  return argsSchema.parse(values);
}

/** Applies the flags that override the environment. */
export function configFromArgs(args: CliArgs, loaded: AppConfig): AppConfig {
  const organizationId = args.organization ?? loaded.organizationId;
  return args.debug
    ? { ...loaded, organizationId, debug: true, logLevel: "debug" }
    : { ...loaded, organizationId };
}

/** Runs one CLI invocation and returns the process exit code. */
export async function main(argv: string[], env?: Record<string, string | undefined>, out: (line: string) => void = console.log): Promise<number> {
  const args = parseCliArgs(argv);
  if (args.help) {
    out(USAGE);
    return 0;
  }

  const cfg = configFromArgs(args, loadConfig(env));
  const root = createRootLogger(cfg);
  const log = createLogger(root, "cli");

  if (args.serve) {
    const app = await createApp(cfg, root);
    await app.listen({ port: cfg.port, host: cfg.host });
    return 0;
  }

  const { db, orchestrator, reports } = createServices(cfg, root);
  try {
    orchestrator.install();
    if (args.install) return 0;

    const { organizationId } = cfg;
    if (!args["report-only"] && organizationId === undefined) {
      throw new ValidationError("An organization id is required unless --report-only or --install is given.");
    }

    const range = { start: args.start, stop: args.stop };
    const result = await orchestrator.run({ organizationId, range, reportOnly: args["report-only"] });
    if (result.sync) log.debug("Sync finished", { ...result.sync });

    out(renderReportTable(formatReport(result.report, reports.labels())));
    return 0;
  } finally {
    db.close();
  }
}

function describeError(error: unknown): string {
  if (error instanceof z.ZodError) return error.issues.map(i => `${i.path.join(".") || "args"}: ${i.message}`).join("\n");
  if (error instanceof Error) return error.message;
  return String(error);
}

export function runCli() {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(describeError(error));
      process.exitCode = 1;
    });
}
