import { sql, type SQL } from "drizzle-orm";
import type { AnySQLiteColumn } from "drizzle-orm/sqlite-core";
import { weatherHourly, type WeatherDb } from "./db.js";
import { RetriesExhaustedError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { Observation } from "./types.js";
import {
  STORAGE_BACKOFF,
  nextBackoff,
  sleep as defaultSleep,
  withJitter,
  type RandomFn,
  type SleepFn,
} from "./utils.js";

const DEFAULT_MAX_ATTEMPTS = 5;

export interface UpsertOptions {
  maxAttempts?: number;
  sleep?: SleepFn;
  random?: RandomFn;
  logger?: Logger;
}

function excluded(column: AnySQLiteColumn): SQL {
  return sql.raw(`excluded."${column.name}"`);
}

// Every column but the key and fetched_at, which keeps its first-insert value.
const updateSet = {
  timezone_name: excluded(weatherHourly.timezone_name),
  temp: excluded(weatherHourly.temp),
  feelslike: excluded(weatherHourly.feelslike),
  humidity: excluded(weatherHourly.humidity),
  precip: excluded(weatherHourly.precip),
  precipprob: excluded(weatherHourly.precipprob),
  windspeed: excluded(weatherHourly.windspeed),
  windgust: excluded(weatherHourly.windgust),
  pressure: excluded(weatherHourly.pressure),
  cloudcover: excluded(weatherHourly.cloudcover),
  conditions: excluded(weatherHourly.conditions),
  icon: excluded(weatherHourly.icon),
  source: excluded(weatherHourly.source),
};

const BUSY_CODE = /^SQLITE_(BUSY|LOCKED)/;

/** True for SQLite lock contention, looking through wrapped `cause`s. */
export function isStorageBusy(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth += 1) {
    const code = "code" in current ? current.code : undefined;
    if (typeof code === "string" && BUSY_CODE.test(code)) {
      return true;
    }
    const message = current.message.toLowerCase();
    if (message.includes("database is locked") || message.includes("database table is locked")) {
      return true;
    }
    current = current.cause;
  }
  return false;
}

function writeBatch(db: WeatherDb, rows: Observation[]): void {
  db.transaction((tx) => {
    tx.insert(weatherHourly)
      .values(rows)
      .onConflictDoUpdate({
        target: [weatherHourly.location, weatherHourly.timestamp_local],
        set: updateSet,
      })
      .run();
  });
}

/**
 * Inserts or refreshes a batch in one transaction. Lock contention retries the
 * whole batch with backoff; any other storage error propagates at once.
 */
export async function upsertObservations(
  db: WeatherDb,
  rows: Observation[],
  options: UpsertOptions = {}
): Promise<number> {
  const {
    maxAttempts = DEFAULT_MAX_ATTEMPTS,
    sleep = defaultSleep,
    random = Math.random,
    logger,
  } = options;

  if (rows.length === 0) {
    logger?.info("No rows to upsert");
    return 0;
  }

  let backoffMs = STORAGE_BACKOFF.initialMs;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      writeBatch(db, rows);
      logger?.info("Upsert complete", { rows: rows.length, attempt });
      return rows.length;
    } catch (error) {
      if (!isStorageBusy(error)) {
        logger?.error("Upsert failed", error, { rows: rows.length, attempt });
        throw error;
      }

      lastError = error;
      if (attempt === maxAttempts) break;

      const delayMs = withJitter(backoffMs, STORAGE_BACKOFF, random);
      logger?.warn("Database busy, retrying upsert", {
        reason: errorMessage(error),
        delayMs: Math.round(delayMs),
        attempt,
        maxAttempts,
      });
      await sleep(delayMs);
      backoffMs = nextBackoff(backoffMs, STORAGE_BACKOFF);
    }
  }

  logger?.error("Upsert retries exhausted", lastError, { attempts: maxAttempts });
  throw new RetriesExhaustedError("Upsert", maxAttempts, lastError);
}
