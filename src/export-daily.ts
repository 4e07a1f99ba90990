#!/usr/bin/env node
import "dotenv/config";
import fs from "node:fs/promises";
import { DEFAULT_DATABASE_URL, DEFAULT_LOCATION, getEnvVar } from "./config.js";
import { openStorage, type Storage } from "./db.js";
import {
  UsageError,
  aggregateDaily,
  defaultExportPath,
  parseExportArgs,
  resolveOutPath,
  resolveRange,
  toCsv,
  toJson,
  type ExportArgs,
} from "./export.js";
import { ExitCode } from "./job.js";
import { createLogger, parseLogLevel, type Logger } from "./logger.js";
import { ensureParentDir } from "./utils.js";

async function exportDaily(logger: Logger): Promise<ExitCode> {
  const env = process.env;
  let args: ExportArgs;
  try {
    const defaultLocation = getEnvVar(env, "VC_LOCATION") ?? DEFAULT_LOCATION;
    args = parseExportArgs(process.argv.slice(2), defaultLocation);
  } catch (error) {
    logger.error("Invalid arguments", error);
    return ExitCode.InitFailed;
  }

  let storage: Storage;
  try {
    storage = openStorage({
      databaseUrl: getEnvVar(env, "DATABASE_URL") ?? DEFAULT_DATABASE_URL,
      readOnly: true,
    });
  } catch (error) {
    logger.error("Storage initialisation failed", error);
    return ExitCode.InitFailed;
  }

  try {
    const range = resolveRange(args);
    const rows = aggregateDaily(storage.db, range, args.location);
    if (rows.length === 0) {
      logger.info("No rows to export for the selected range/location", {
        ...range,
        location: args.location,
      });
      return ExitCode.Ok;
    }

    const outPath = args.out
      ? resolveOutPath(args.out)
      : defaultExportPath(args.location, range, args.format);
    await ensureParentDir(outPath);
    await fs.writeFile(outPath, args.format === "csv" ? toCsv(rows) : toJson(rows), "utf-8");

    logger.info("Export written", { rows: rows.length, path: outPath, format: args.format });
    return ExitCode.Ok;
  } catch (error) {
    logger.error("Export failed", error);
    return error instanceof UsageError ? ExitCode.InitFailed : ExitCode.RunFailed;
  } finally {
    storage.close();
  }
}

async function main(): Promise<ExitCode> {
  const logger = createLogger("weather-export", {
    level: parseLogLevel(getEnvVar(process.env, "LOG_LEVEL")),
  });
  try {
    return await exportDaily(logger);
  } finally {
    await logger.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error("Export crashed", error);
    process.exitCode = ExitCode.RunFailed;
  });
