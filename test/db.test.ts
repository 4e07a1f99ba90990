import { existsSync, mkdtempSync, rmSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { openStorage, weatherHourly } from "../src/db.js";
import { StorageInitError } from "../src/errors.js";

describe("openStorage", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), "weather-db-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("creates the file and table on first open", () => {
    const file = path.join(dir, "weather.db");
    const storage = openStorage({ databaseUrl: `sqlite:///${file}` });

    expect(storage.db.select().from(weatherHourly).all()).toEqual([]);
    storage.close();
    expect(existsSync(file)).toBe(true);
  });

  it("does not create a missing file when opened read-only", () => {
    const file = path.join(dir, "typo.db");

    expect(() => openStorage({ databaseUrl: `sqlite:///${file}`, readOnly: true })).toThrow(
      StorageInitError
    );
    expect(existsSync(file)).toBe(false);
  });

  it("reads an existing file read-only", () => {
    const file = path.join(dir, "weather.db");
    openStorage({ databaseUrl: `sqlite:///${file}` }).close();

    const storage = openStorage({ databaseUrl: `sqlite:///${file}`, readOnly: true });

    expect(storage.connection.readonly).toBe(true);
    expect(storage.db.select().from(weatherHourly).all()).toEqual([]);
    storage.close();
  });

  it("wraps unsupported URLs in StorageInitError", () => {
    expect(() => openStorage({ databaseUrl: "postgresql://localhost/weather" })).toThrow(
      StorageInitError
    );
  });
});
