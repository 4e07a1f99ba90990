/**
 * SQLite storage for hourly observations (Drizzle ORM over better-sqlite3).
 *
 * Primary key: (location, timestamp_local). Timestamps are the provider's
 * local wall clock, stored as `YYYY-MM-DDTHH:MM:SS` text so they sort and
 * compare lexically.
 */

import Database from "better-sqlite3";
import { sql } from "drizzle-orm";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { primaryKey, real, sqliteTable, text } from "drizzle-orm/sqlite-core";
import { resolveSqlitePath } from "./config.js";
import { StorageInitError, errorMessage } from "./errors.js";
import { SOURCE_TAG } from "./hour-parser.js";

export const weatherHourly = sqliteTable(
  "weather_hourly",
  {
    location: text("location").notNull(),
    timestamp_local: text("timestamp_local").notNull(),
    timezone_name: text("timezone_name"),

    temp: real("temp"),
    feelslike: real("feelslike"),
    humidity: real("humidity"),
    precip: real("precip"),
    precipprob: real("precipprob"),
    windspeed: real("windspeed"),
    windgust: real("windgust"),
    pressure: real("pressure"),
    cloudcover: real("cloudcover"),
    conditions: text("conditions"),
    icon: text("icon"),

    source: text("source").default(SOURCE_TAG),
    fetched_at: text("fetched_at").default(sql`CURRENT_TIMESTAMP`),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.location, table.timestamp_local] }),
  })
);

const CREATE_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS weather_hourly (
    location        TEXT NOT NULL,
    timestamp_local TEXT NOT NULL,
    timezone_name   TEXT,
    temp            REAL,
    feelslike       REAL,
    humidity        REAL,
    precip          REAL,
    precipprob      REAL,
    windspeed       REAL,
    windgust        REAL,
    pressure        REAL,
    cloudcover      REAL,
    conditions      TEXT,
    icon            TEXT,
    source          TEXT DEFAULT '${SOURCE_TAG}',
    fetched_at      TEXT DEFAULT CURRENT_TIMESTAMP,
    PRIMARY KEY (location, timestamp_local)
  )
`;

export type WeatherDb = BetterSQLite3Database;

export interface Storage {
  db: WeatherDb;
  connection: Database.Database;
  close(): void;
}

export interface OpenStorageOptions {
  databaseUrl: string;
  busyTimeoutMs?: number;
  /** Open an existing file without creating it or the table. */
  readOnly?: boolean;
}

/** Opens the database, checks it answers, and creates the table if absent. */
export function openStorage(options: OpenStorageOptions): Storage {
  const filename = resolveSqlitePath(options.databaseUrl);
  const readOnly = options.readOnly ?? false;

  let connection: Database.Database;
  try {
    connection = new Database(filename, {
      timeout: options.busyTimeoutMs ?? 30_000,
      readonly: readOnly,
      fileMustExist: readOnly,
    });
  } catch (error) {
    throw new StorageInitError(`Could not open ${filename}: ${errorMessage(error)}`, error);
  }

  try {
    connection.prepare("SELECT 1").get();
    if (!readOnly) connection.exec(CREATE_TABLE_SQL);
  } catch (error) {
    connection.close();
    throw new StorageInitError(
      `Could not initialise ${filename}: ${errorMessage(error)}`,
      error
    );
  }

  const opened = connection;
  return {
    db: drizzle(opened),
    connection: opened,
    close: () => opened.close(),
  };
}
