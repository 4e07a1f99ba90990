import path from "node:path";
import { parseArgs } from "node:util";
import { and, asc, eq, gte, lte, sql } from "drizzle-orm";
import { z } from "zod";
import { weatherHourly, type WeatherDb } from "./db.js";
import { AppError } from "./errors.js";
import type { DailySummary, TimestampRange } from "./types.js";
import { formatLocalTimestamp } from "./utils.js";

export type ExportFormat = "csv" | "json";

export class UsageError extends AppError {
  constructor(message: string) {
    super(message, "USAGE_ERROR");
    this.name = "UsageError";
  }
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2})(:\d{2})?$/;

const UTF8_BOM = "\uFEFF";

/**
 * Accepts `YYYY-MM-DD`, `YYYY-MM-DD HH:MM` or `YYYY-MM-DDTHH:MM`. A bare
 * date is the start of the day, or its last second when `endOfDay` is set.
 */
export function parseDateArg(value: string, endOfDay = false): string {
  const trimmed = value.trim();
  if (DATE_ONLY.test(trimmed)) {
    return `${trimmed}T${endOfDay ? "23:59:59" : "00:00:00"}`;
  }
  const match = DATE_TIME.exec(trimmed);
  if (!match) {
    throw new UsageError(`Invalid date: ${value} (expected YYYY-MM-DD or YYYY-MM-DD HH:MM)`);
  }
  return `${match[1]}T${match[2]}${match[3] ?? ":00"}`;
}

export interface RangeArgs {
  days?: number;
  from?: string;
  to?: string;
}

export function resolveRange(args: RangeArgs, now: Date = new Date()): TimestampRange {
  if (args.from || args.to) {
    if (!args.from || !args.to) {
      throw new UsageError("Give both --from and --to, or use --days");
    }
    const range = { from: parseDateArg(args.from), to: parseDateArg(args.to, true) };
    if (range.from > range.to) {
      throw new UsageError(`--from (${args.from}) is after --to (${args.to})`);
    }
    return range;
  }

  const days = args.days ?? 7;
  const from = new Date(now.getFullYear(), now.getMonth(), now.getDate() - (days - 1));
  return { from: formatLocalTimestamp(from), to: formatLocalTimestamp(now) };
}

export function aggregateDaily(
  db: WeatherDb,
  range: TimestampRange,
  location?: string
): DailySummary[] {
  const w = weatherHourly;
  const day = sql<string>`date(${w.timestamp_local})`;

  return db
    .select({
      day,
      location: w.location,
      temp_min: sql<number | null>`min(${w.temp})`,
      temp_avg: sql<number | null>`avg(${w.temp})`,
      temp_max: sql<number | null>`max(${w.temp})`,
      precip_sum: sql<number>`sum(coalesce(${w.precip}, 0))`,
      precipprob_max: sql<number>`max(coalesce(${w.precipprob}, 0))`,
      windspeed_avg: sql<number>`avg(coalesce(${w.windspeed}, 0))`,
      windgust_max: sql<number>`max(coalesce(${w.windgust}, 0))`,
      humidity_avg: sql<number>`avg(coalesce(${w.humidity}, 0))`,
      pressure_avg: sql<number>`avg(coalesce(${w.pressure}, 0))`,
      cloudcover_avg: sql<number>`avg(coalesce(${w.cloudcover}, 0))`,
      hours_count: sql<number>`count(*)`,
    })
    .from(w)
    .where(
      and(
        gte(w.timestamp_local, range.from),
        lte(w.timestamp_local, range.to),
        location ? eq(w.location, location) : undefined
      )
    )
    .groupBy(day, w.location)
    .orderBy(asc(day), asc(w.location))
    .all();
}

const SUMMARY_COLUMNS: (keyof DailySummary)[] = [
  "day",
  "location",
  "temp_min",
  "temp_avg",
  "temp_max",
  "precip_sum",
  "precipprob_max",
  "windspeed_avg",
  "windgust_max",
  "humidity_avg",
  "pressure_avg",
  "cloudcover_avg",
  "hours_count",
];

function csvField(value: string | number | null): string {
  if (value === null) return "";
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** UTF-8 CSV with a byte-order mark so spreadsheet apps pick the right encoding. */
export function toCsv(rows: DailySummary[]): string {
  const lines = [SUMMARY_COLUMNS.join(",")];
  for (const row of rows) {
    lines.push(SUMMARY_COLUMNS.map((column) => csvField(row[column])).join(","));
  }
  return `${UTF8_BOM}${lines.join("\r\n")}\r\n`;
}

export function toJson(rows: DailySummary[]): string {
  return `${JSON.stringify(rows, null, 2)}\n`;
}

function compactDate(timestamp: string): string {
  return timestamp.slice(0, 10).replace(/-/g, "");
}

export function defaultExportPath(
  location: string,
  range: TimestampRange,
  format: ExportFormat,
  baseDir = process.cwd()
): string {
  const span = `${compactDate(range.from)}-${compactDate(range.to)}`;
  return path.join(baseDir, "exports", `daily_${location}_${span}.${format}`);
}

export function resolveOutPath(out: string, baseDir = process.cwd()): string {
  return path.isAbsolute(out) ? out : path.resolve(baseDir, out);
}

const argsSchema = z.object({
  days: z.coerce.number().int().positive().optional(),
  from: z.string().optional(),
  to: z.string().optional(),
  location: z.string().min(1),
  out: z.string().optional(),
  format: z.enum(["csv", "json"]).default("csv"),
});

export type ExportArgs = z.infer<typeof argsSchema>;

export function parseExportArgs(argv: string[], defaultLocation: string): ExportArgs {
  let values: Record<string, string | boolean | undefined>;
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        days: { type: "string" },
        from: { type: "string" },
        to: { type: "string" },
        location: { type: "string", default: defaultLocation },
        out: { type: "string" },
        format: { type: "string" },
      },
      strict: true,
    }));
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }

  const result = argsSchema.safeParse(values);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `--${issue.path.join(".")}: ${issue.message}`
    );
    throw new UsageError(issues.join("\n"));
  }
  return result.data;
}
