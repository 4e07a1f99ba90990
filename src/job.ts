import type { JobConfig } from "./config.js";
import { openStorage, type Storage } from "./db.js";
import { fetchHours, type FetchHoursDeps } from "./fetcher.js";
import { upsertObservations } from "./upsert.js";
import { maskApiKey } from "./utils.js";

export const ExitCode = {
  Ok: 0,
  RunFailed: 1,
  InitFailed: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export type JobDeps = FetchHoursDeps;

/**
 * One extract-load run: open storage, fetch [yesterday, tomorrow], upsert.
 * Storage problems map to InitFailed, anything after that to RunFailed.
 */
export async function runJob(config: JobConfig, deps: JobDeps): Promise<ExitCode> {
  const { logger } = deps;
  logger.info("Starting weather job", {
    location: config.location,
    unitGroup: config.unitGroup,
    apiKey: maskApiKey(config.apiKey),
  });

  let storage: Storage;
  try {
    storage = openStorage({
      databaseUrl: config.databaseUrl,
      busyTimeoutMs: config.dbBusyTimeoutMs,
    });
  } catch (error) {
    logger.error("Storage initialisation failed", error, { databaseUrl: config.databaseUrl });
    return ExitCode.InitFailed;
  }

  try {
    const rows = await fetchHours(config, deps);
    await upsertObservations(storage.db, rows, {
      sleep: deps.sleep,
      random: deps.random,
      logger,
    });
    logger.info("Weather job finished", { rows: rows.length });
    return ExitCode.Ok;
  } catch (error) {
    logger.error("Weather job failed", error);
    return ExitCode.RunFailed;
  } finally {
    storage.close();
  }
}
