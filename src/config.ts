import { z } from "zod";
import { ConfigError, StorageInitError } from "./errors.js";
import type { UnitGroup } from "./types.js";

export const DEFAULT_LOCATION = "Kungsbacka";
const DEFAULT_UNIT_GROUP: UnitGroup = "metric";
export const DEFAULT_DATABASE_URL = "sqlite:///weather.db";
const DEFAULT_HTTP_TIMEOUT_MS = 30_000;
const DEFAULT_DB_BUSY_TIMEOUT_MS = 30_000;
const PLACEHOLDER_PREFIXES = ["DIN_", "YOUR_"];

export interface JobConfig {
  apiKey: string;
  location: string;
  unitGroup: UnitGroup;
  databaseUrl: string;
  httpTimeoutMs: number;
  dbBusyTimeoutMs: number;
}

export type Env = Record<string, string | undefined>;

export function getEnvVar(env: Env, name: string, fallback?: string): string | undefined {
  const value = env[name];
  if (value && value.trim().length > 0) {
    return value.trim();
  }
  return fallback;
}

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const configSchema = z.object({
  apiKey: z
    .string({ required_error: "VC_API_KEY must be set" })
    .refine(
      (key) => !PLACEHOLDER_PREFIXES.some((prefix) => key.toUpperCase().startsWith(prefix)),
      "VC_API_KEY is still a placeholder value"
    ),
  location: z.string().min(1),
  unitGroup: z.enum(["metric", "us", "uk", "base"]),
  databaseUrl: z.string().min(1),
  httpTimeoutMs: positiveInt(DEFAULT_HTTP_TIMEOUT_MS),
  dbBusyTimeoutMs: positiveInt(DEFAULT_DB_BUSY_TIMEOUT_MS),
});

/**
 * Builds the job configuration from environment variables. Entry points load
 * `.env` into `process.env` before calling this.
 */
export function loadConfig(env: Env): JobConfig {
  const result = configSchema.safeParse({
    apiKey: getEnvVar(env, "VC_API_KEY"),
    location: getEnvVar(env, "VC_LOCATION", DEFAULT_LOCATION),
    unitGroup: getEnvVar(env, "VC_UNIT_GROUP", DEFAULT_UNIT_GROUP),
    databaseUrl: getEnvVar(env, "DATABASE_URL", DEFAULT_DATABASE_URL),
    httpTimeoutMs: getEnvVar(env, "HTTP_TIMEOUT_MS"),
    dbBusyTimeoutMs: getEnvVar(env, "DB_BUSY_TIMEOUT_MS"),
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration:\n${issues.join("\n")}`, { issues });
  }
  return result.data;
}

/**
 * Maps a `sqlite://` connection string to a better-sqlite3 filename.
 * `sqlite:///weather.db` is relative, `sqlite:////var/db/weather.db` absolute.
 */
export function resolveSqlitePath(databaseUrl: string): string {
  const prefix = "sqlite://";
  if (!databaseUrl.startsWith(prefix)) {
    throw new StorageInitError(`Unsupported DATABASE_URL (expected ${prefix}...): ${databaseUrl}`);
  }

  const rest = databaseUrl.slice(prefix.length);
  if (rest === "" || rest === "/" || rest === "/:memory:") {
    return ":memory:";
  }
  if (!rest.startsWith("/")) {
    throw new StorageInitError(`DATABASE_URL must not name a host: ${databaseUrl}`);
  }
  return rest.slice(1);
}
