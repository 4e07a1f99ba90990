import { mkdtempSync, rmSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import Database from "better-sqlite3";
import { and, eq } from "drizzle-orm";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { openStorage, weatherHourly, type Storage } from "../src/db.js";
import { RetriesExhaustedError } from "../src/errors.js";
import type { Observation } from "../src/types.js";
import { isStorageBusy, upsertObservations } from "../src/upsert.js";

function observation(overrides: Partial<Observation> = {}): Observation {
  return {
    location: "Kungsbacka",
    timestamp_local: "2025-08-27T00:00:00",
    timezone_name: "Europe/Stockholm",
    temp: 10.0,
    feelslike: 9.0,
    humidity: 80.0,
    precip: 0.0,
    precipprob: 0.0,
    windspeed: 2.0,
    windgust: 4.0,
    pressure: 1015.0,
    cloudcover: 50.0,
    conditions: "Clear",
    icon: "clear-night",
    source: "VisualCrossing",
    ...overrides,
  };
}

function rowsFor(storage: Storage, location: string, timestamp: string) {
  return storage.db
    .select()
    .from(weatherHourly)
    .where(
      and(eq(weatherHourly.location, location), eq(weatherHourly.timestamp_local, timestamp))
    )
    .all();
}

const noSleep = async (_ms: number): Promise<void> => {};

describe("upsertObservations", () => {
  let storage: Storage;

  beforeEach(() => {
    storage = openStorage({ databaseUrl: "sqlite://" });
  });

  afterEach(() => {
    if (storage.connection.open) storage.close();
  });

  it("inserts then overwrites the same key without duplicating it", async () => {
    await upsertObservations(storage.db, [observation({ temp: 10.0 })]);
    await upsertObservations(storage.db, [observation({ temp: 12.5, conditions: "Rain" })]);

    const rows = rowsFor(storage, "Kungsbacka", "2025-08-27T00:00:00");
    expect(rows).toHaveLength(1);
    expect(rows[0].temp).toBe(12.5);
    expect(rows[0].conditions).toBe("Rain");
  });

  it("overwrites measurements with null when the provider stops reporting them", async () => {
    await upsertObservations(storage.db, [observation({ windgust: 4.0 })]);
    await upsertObservations(storage.db, [observation({ windgust: null })]);

    expect(rowsFor(storage, "Kungsbacka", "2025-08-27T00:00:00")[0].windgust).toBeNull();
  });

  it("leaves rows outside the batch untouched", async () => {
    await upsertObservations(storage.db, [
      observation({ timestamp_local: "2025-08-27T00:00:00", temp: 10 }),
      observation({ timestamp_local: "2025-08-27T01:00:00", temp: 11 }),
    ]);
    await upsertObservations(storage.db, [
      observation({ timestamp_local: "2025-08-27T01:00:00", temp: 15 }),
    ]);

    expect(rowsFor(storage, "Kungsbacka", "2025-08-27T00:00:00")[0].temp).toBe(10);
    expect(rowsFor(storage, "Kungsbacka", "2025-08-27T01:00:00")[0].temp).toBe(15);
    expect(storage.db.select().from(weatherHourly).all()).toHaveLength(2);
  });

  it("sets fetched_at on first insert and keeps it on update", async () => {
    const count = await upsertObservations(storage.db, [observation()]);
    expect(count).toBe(1);

    const [inserted] = rowsFor(storage, "Kungsbacka", "2025-08-27T00:00:00");
    expect(inserted.fetched_at).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
    expect(inserted.source).toBe("VisualCrossing");

    storage.connection.exec("UPDATE weather_hourly SET fetched_at = '2000-01-01 00:00:00'");
    await upsertObservations(storage.db, [observation({ temp: 3 })]);

    const [updated] = rowsFor(storage, "Kungsbacka", "2025-08-27T00:00:00");
    expect(updated.temp).toBe(3);
    expect(updated.fetched_at).toBe("2000-01-01 00:00:00");
  });

  it("treats an empty batch as a no-op", async () => {
    const db = storage.db;
    storage.close();

    await expect(upsertObservations(db, [])).resolves.toBe(0);
  });

  it("propagates non-contention errors without retrying", async () => {
    storage.connection.exec("DROP TABLE weather_hourly");
    const sleep = vi.fn(noSleep);

    await expect(upsertObservations(storage.db, [observation()], { sleep })).rejects.toThrow(
      /no such table/
    );
    expect(sleep).not.toHaveBeenCalled();
  });

  it("stores nothing from a batch that fails partway", async () => {
    await upsertObservations(storage.db, [observation({ temp: 10 })]);
    storage.connection.exec(`
      CREATE TRIGGER reject_sentinel BEFORE INSERT ON weather_hourly
      WHEN NEW.temp = -999
      BEGIN SELECT RAISE(ABORT, 'rejected reading'); END
    `);
    const sleep = vi.fn(noSleep);

    const batch = [
      observation({ timestamp_local: "2025-08-27T00:00:00", temp: 20 }),
      observation({ timestamp_local: "2025-08-27T01:00:00", temp: 11 }),
      observation({ timestamp_local: "2025-08-27T02:00:00", temp: -999 }),
    ];
    await expect(upsertObservations(storage.db, batch, { sleep })).rejects.toThrow(
      /rejected reading/
    );

    const rows = storage.db.select().from(weatherHourly).all();
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({ timestamp_local: "2025-08-27T00:00:00", temp: 10 });
    expect(sleep).not.toHaveBeenCalled();
  });
});

describe("upsertObservations under lock contention", () => {
  let dir: string;
  let storage: Storage;
  let locker: Database.Database;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), "weather-upsert-"));
    const file = path.join(dir, "weather.db");
    storage = openStorage({ databaseUrl: `sqlite:///${file}`, busyTimeoutMs: 0 });
    locker = new Database(file);
    locker.exec("BEGIN IMMEDIATE");
  });

  afterEach(() => {
    if (locker.inTransaction) locker.exec("ROLLBACK");
    locker.close();
    storage.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it("retries the batch once the lock is released", async () => {
    const sleep = vi.fn(async (_ms: number) => {
      locker.exec("COMMIT");
    });

    const count = await upsertObservations(storage.db, [observation({ temp: 7 })], {
      sleep,
      random: () => 0,
    });

    expect(count).toBe(1);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(500);
    expect(rowsFor(storage, "Kungsbacka", "2025-08-27T00:00:00")[0].temp).toBe(7);
  });

  it("gives up after maxAttempts with doubling backoff", async () => {
    const sleep = vi.fn(noSleep);

    const error = await upsertObservations(storage.db, [observation()], {
      sleep,
      random: () => 0,
      maxAttempts: 3,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetriesExhaustedError);
    expect(error).toMatchObject({ attempts: 3 });
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([500, 1000]);
  });
});

describe("isStorageBusy", () => {
  function sqliteError(code: string, message: string): Error {
    return Object.assign(new Error(message), { code });
  }

  it("recognises busy and locked codes", () => {
    expect(isStorageBusy(sqliteError("SQLITE_BUSY", "database is locked"))).toBe(true);
    expect(isStorageBusy(sqliteError("SQLITE_BUSY_SNAPSHOT", "snapshot"))).toBe(true);
    expect(isStorageBusy(sqliteError("SQLITE_LOCKED", "table locked"))).toBe(true);
  });

  it("looks through wrapping errors", () => {
    const wrapped = new Error("Failed query", {
      cause: sqliteError("SQLITE_BUSY", "database is locked"),
    });
    expect(isStorageBusy(wrapped)).toBe(true);
  });

  it("rejects other storage errors", () => {
    expect(isStorageBusy(sqliteError("SQLITE_CONSTRAINT", "constraint failed"))).toBe(false);
    expect(isStorageBusy(new Error("no such table: weather_hourly"))).toBe(false);
    expect(isStorageBusy("database is locked")).toBe(false);
  });
});
