import fs from "node:fs/promises";
import path from "node:path";

export type SleepFn = (ms: number) => Promise<void>;
export type RandomFn = () => number;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface BackoffPolicy {
  initialMs: number;
  maxMs: number;
  maxJitterMs: number;
}

export const HTTP_BACKOFF: BackoffPolicy = { initialMs: 1000, maxMs: 30_000, maxJitterMs: 500 };
export const STORAGE_BACKOFF: BackoffPolicy = { initialMs: 500, maxMs: 5000, maxJitterMs: 250 };

export function nextBackoff(currentMs: number, policy: BackoffPolicy): number {
  return Math.min(currentMs * 2, policy.maxMs);
}

export function withJitter(baseMs: number, policy: BackoffPolicy, random: RandomFn): number {
  return baseMs + random() * policy.maxJitterMs;
}

export function truncate(text: string, max = 500): string {
  return text.length > max ? text.slice(0, max) : text;
}

export function maskApiKey(key: string): string {
  return key.length > 8 ? `${key.slice(0, 4)}...${key.slice(-4)}` : "(short)";
}

/** YYYY-MM-DD of a UTC instant. */
export function utcDateString(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Wall-clock YYYY-MM-DDTHH:MM:SS in the process time zone. */
export function formatLocalTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export async function ensureParentDir(filePath: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
}
