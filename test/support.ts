import type { FetchFn } from "../src/http-retry.js";
import { LogLevel, Logger, type LogSink } from "../src/logger.js";

export function fetchSequence(...steps: (Response | Error)[]) {
  const calls: string[] = [];
  const fetchFn: FetchFn = async (input) => {
    calls.push(input);
    const step = steps.shift();
    if (!step) throw new Error("unexpected extra request");
    if (step instanceof Error) throw step;
    return step;
  };
  return { fetchFn, calls };
}

export function memoryLogger() {
  const lines: Record<string, unknown>[] = [];
  const sink: LogSink = {
    write: (line) => {
      lines.push(JSON.parse(line) as Record<string, unknown>);
    },
  };
  return { logger: new Logger("test", LogLevel.DEBUG, [sink]), lines };
}
