import type { JobConfig } from "./config.js";
import { decodeResponse, parseHours } from "./hour-parser.js";
import { fetchWithRetry, type FetchFn } from "./http-retry.js";
import type { Logger } from "./logger.js";
import type { Observation } from "./types.js";
import { utcDateString, type RandomFn, type SleepFn } from "./utils.js";

const BASE_URL =
  "https://weather.visualcrossing.com/VisualCrossingWebServices/rest/services/timeline";

const DAY_MS = 24 * 60 * 60 * 1000;

export const ELEMENTS = [
  "datetime",
  "temp",
  "feelslike",
  "humidity",
  "precip",
  "precipprob",
  "windspeed",
  "windgust",
  "pressure",
  "cloudcover",
  "conditions",
  "icon",
];

export interface TimelineRequest {
  url: string;
  params: Record<string, string>;
}

export interface FetchHoursDeps {
  logger: Logger;
  fetchFn?: FetchFn;
  sleep?: SleepFn;
  random?: RandomFn;
  now?: () => Date;
}

/** [yesterday, tomorrow] in UTC around `now`. */
export function buildTimelineRequest(config: JobConfig, now: Date): TimelineRequest {
  const start = utcDateString(new Date(now.getTime() - DAY_MS));
  const end = utcDateString(new Date(now.getTime() + DAY_MS));

  return {
    url: `${BASE_URL}/${encodeURIComponent(config.location)}/${start}/${end}`,
    params: {
      unitGroup: config.unitGroup,
      include: "hours,current",
      key: config.apiKey,
      contentType: "json",
      elements: ELEMENTS.join(","),
    },
  };
}

export async function fetchHours(config: JobConfig, deps: FetchHoursDeps): Promise<Observation[]> {
  const { logger } = deps;
  const request = buildTimelineRequest(config, deps.now?.() ?? new Date());

  logger.info("Fetching timeline", { location: config.location, unitGroup: config.unitGroup });
  const response = await fetchWithRetry(request.url, request.params, {
    timeoutMs: config.httpTimeoutMs,
    fetchFn: deps.fetchFn,
    sleep: deps.sleep,
    random: deps.random,
    logger,
  });

  const payload = decodeResponse(response, logger);
  const rows = parseHours(payload, config.location);
  logger.info("Fetched hourly rows", { count: rows.length });
  return rows;
}
