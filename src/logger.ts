/** Structured JSON-lines logger, created per run and passed to each component. */

import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import path from "node:path";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogContext = Record<string, unknown>;

export interface LogSink {
  write(line: string): void;
  close?(): Promise<void>;
}

export const consoleSink: LogSink = {
  write(line) {
    console.log(line);
  },
};

/** Appends to a file. A file that cannot be written is reported once on stderr. */
export class FileSink implements LogSink {
  private readonly stream: WriteStream;
  private failure: Error | undefined;

  constructor(filePath: string) {
    mkdirSync(path.dirname(filePath), { recursive: true });
    this.stream = createWriteStream(filePath, { flags: "a", encoding: "utf-8" });
    this.stream.on("error", (error) => {
      this.failure = error;
      console.error(`Log file ${filePath} is not writable`, error);
    });
  }

  get error(): Error | undefined {
    return this.failure;
  }

  write(line: string): void {
    if (this.failure || this.stream.destroyed) return;
    this.stream.write(`${line}\n`);
  }

  close(): Promise<void> {
    if (this.stream.destroyed) return Promise.resolve();
    return new Promise((resolve) => {
      this.stream.once("close", () => resolve());
      this.stream.end();
    });
  }
}

export class Logger {
  constructor(
    private readonly serviceName: string,
    private readonly level: LogLevel = LogLevel.INFO,
    private readonly sinks: LogSink[] = [consoleSink]
  ) {}

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (level < this.level) return;

    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      service: this.serviceName,
      message,
      ...context,
    });

    for (const sink of this.sinks) {
      sink.write(line);
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (error instanceof Error) {
      this.log(LogLevel.ERROR, message, {
        ...context,
        error: error.message,
        errorName: error.name,
        stack: error.stack,
      });
      return;
    }
    this.log(LogLevel.ERROR, message, {
      ...context,
      error: error === undefined ? undefined : String(error),
    });
  }

  async close(): Promise<void> {
    await Promise.all(this.sinks.map((sink) => sink.close?.()));
  }
}

const LEVELS: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

export function parseLogLevel(raw: string | undefined): LogLevel {
  if (!raw) {
    return LogLevel.INFO;
  }
  return LEVELS[raw.trim().toLowerCase()] ?? LogLevel.INFO;
}

export function createLogger(
  serviceName: string,
  options: { level?: LogLevel; logFile?: string } = {}
): Logger {
  const sinks: LogSink[] = [consoleSink];
  if (options.logFile) {
    sinks.push(new FileSink(options.logFile));
  }
  return new Logger(serviceName, options.level ?? LogLevel.INFO, sinks);
}
