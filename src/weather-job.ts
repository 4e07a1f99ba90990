#!/usr/bin/env node
import "dotenv/config";
import { getEnvVar, loadConfig, type JobConfig } from "./config.js";
import { ExitCode, runJob } from "./job.js";
import { createLogger, parseLogLevel } from "./logger.js";

async function main(): Promise<ExitCode> {
  const logger = createLogger("weather-job", {
    level: parseLogLevel(getEnvVar(process.env, "LOG_LEVEL")),
    logFile: getEnvVar(process.env, "LOG_FILE"),
  });

  try {
    let config: JobConfig;
    try {
      config = loadConfig(process.env);
    } catch (error) {
      logger.error("Invalid configuration", error);
      return ExitCode.InitFailed;
    }
    return await runJob(config, { logger });
  } finally {
    await logger.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error("Weather job crashed", error);
    process.exitCode = ExitCode.RunFailed;
  });
