import { z } from "zod";
import { PayloadParseError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { HttpResponse } from "./http-retry.js";
import type { Observation, TimelinePayload } from "./types.js";
import { truncate } from "./utils.js";

export const SOURCE_TAG = "VisualCrossing";

const measurement = z.number().nullish();
const label = z.string().nullish();

const hourSchema = z.object({
  datetime: z.string(),
  temp: measurement,
  feelslike: measurement,
  humidity: measurement,
  precip: measurement,
  precipprob: measurement,
  windspeed: measurement,
  windgust: measurement,
  pressure: measurement,
  cloudcover: measurement,
  conditions: label,
  icon: label,
});

const daySchema = z.object({
  datetime: z.string(),
  hours: z.array(hourSchema).nullish().transform((hours) => hours ?? []),
});

const payloadSchema = z.object({
  timezone: z.string().nullish().transform((tz) => tz ?? null),
  days: z.array(daySchema).nullish().transform((days) => days ?? []),
});

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^(\d{2}):(\d{2}):(\d{2})$/;

/** "0:05:00" -> "00:05:00"; two-digit hours pass through. */
export function normalizeHourString(time: string): string {
  const trimmed = time.trim();
  const [hour] = trimmed.split(":");
  return hour.length === 1 ? `0${trimmed}` : trimmed;
}

/**
 * Joins a provider day ("2025-08-27") and hour ("0:05:00") into a local
 * wall-clock timestamp ("2025-08-27T00:05:00").
 */
export function combineDateTime(date: string, time: string): string {
  const normalized = normalizeHourString(time);
  const dateMatch = DATE_PATTERN.exec(date.trim());
  const timeMatch = TIME_PATTERN.exec(normalized);
  if (!dateMatch || !timeMatch) {
    throw new PayloadParseError(`Invalid date/time: ${date} ${time}`, { date, time });
  }

  const [, year, month, day] = dateMatch.map(Number);
  const [, hours, minutes, seconds] = timeMatch.map(Number);
  const parsed = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
  if (
    parsed.getUTCFullYear() !== year ||
    parsed.getUTCMonth() !== month - 1 ||
    parsed.getUTCDate() !== day ||
    hours > 23 ||
    minutes > 59 ||
    seconds > 59
  ) {
    throw new PayloadParseError(`Invalid date/time: ${date} ${time}`, { date, time });
  }

  return `${date.trim()}T${normalized}`;
}

export function validatePayload(payload: unknown): TimelinePayload {
  const result = payloadSchema.safeParse(payload);
  if (!result.success) {
    throw new PayloadParseError(
      "Unexpected timeline payload shape",
      { issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`) },
      result.error
    );
  }
  return result.data;
}

/** Flattens the day-grouped payload into one Observation per (day, hour). */
export function parseHours(payload: unknown, location: string): Observation[] {
  const { timezone, days } = validatePayload(payload);
  const rows: Observation[] = [];

  for (const day of days) {
    for (const hour of day.hours) {
      rows.push({
        location,
        timestamp_local: combineDateTime(day.datetime, hour.datetime),
        timezone_name: timezone,
        temp: hour.temp ?? null,
        feelslike: hour.feelslike ?? null,
        humidity: hour.humidity ?? null,
        precip: hour.precip ?? null,
        precipprob: hour.precipprob ?? null,
        windspeed: hour.windspeed ?? null,
        windgust: hour.windgust ?? null,
        pressure: hour.pressure ?? null,
        cloudcover: hour.cloudcover ?? null,
        conditions: hour.conditions ?? null,
        icon: hour.icon ?? null,
        source: SOURCE_TAG,
      });
    }
  }

  return rows;
}

export function decodeResponse(response: HttpResponse, logger?: Logger): unknown {
  try {
    return JSON.parse(response.body) as unknown;
  } catch (error) {
    const body = truncate(response.body);
    logger?.error("Could not decode JSON response", error, { body });
    throw new PayloadParseError(
      `Response is not valid JSON: ${errorMessage(error)}`,
      { body },
      error
    );
  }
}
