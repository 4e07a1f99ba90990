export type UnitGroup = "metric" | "us" | "uk" | "base";

export interface TimelineHour {
  datetime: string;
  temp?: number | null;
  feelslike?: number | null;
  humidity?: number | null;
  precip?: number | null;
  precipprob?: number | null;
  windspeed?: number | null;
  windgust?: number | null;
  pressure?: number | null;
  cloudcover?: number | null;
  conditions?: string | null;
  icon?: string | null;
}

export interface TimelineDay {
  datetime: string;
  hours: TimelineHour[];
}

export interface TimelinePayload {
  timezone: string | null;
  days: TimelineDay[];
}

/** One hourly row, keyed by (location, timestamp_local). */
export interface Observation {
  location: string;
  timestamp_local: string;
  timezone_name: string | null;
  temp: number | null;
  feelslike: number | null;
  humidity: number | null;
  precip: number | null;
  precipprob: number | null;
  windspeed: number | null;
  windgust: number | null;
  pressure: number | null;
  cloudcover: number | null;
  conditions: string | null;
  icon: string | null;
  source: string;
}

export interface DailySummary {
  day: string;
  location: string;
  temp_min: number | null;
  temp_avg: number | null;
  temp_max: number | null;
  precip_sum: number;
  precipprob_max: number;
  windspeed_avg: number;
  windgust_max: number;
  humidity_avg: number;
  pressure_avg: number;
  cloudcover_avg: number;
  hours_count: number;
}

export interface TimestampRange {
  from: string;
  to: string;
}
