import { TimeGranularity } from "./types";

export const timeGranularities = ["day", "week", "month", "year"] as const satisfies readonly TimeGranularity[];

const DAY_MS = 86_400_000;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_LOCAL = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3})\d*)?)?$/;
const ISO_ZONED = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})$/;
// Month-first platform export format, e.g. "5/01/24, 10:15" is May 1st
const SLASH_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4})(?:,?\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

export function isTimeGranularity(value: string): value is TimeGranularity {
  return timeGranularities.some((g) => g === value);
}

function fromParts(year: number, month: number, day: number, hour = 0, minute = 0, second = 0, ms = 0): Date | null {
  if (hour > 23 || minute > 59 || second > 59) return null;
  const d = new Date(Date.UTC(year, month - 1, day, hour, minute, second, ms));
  // Date.UTC rolls 2024-02-30 over into March; reject instead
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) return null;
  return d;
}

function num(part: string | undefined): number {
  return part ? Number(part) : 0;
}

/**
 * Parses the timestamp shapes seen in course platform exports. Values
 * without a zone are read as UTC. Returns null when the text is not a date.
 */
export function parseTimestamp(raw: string): Date | null {
  const text = raw.trim();
  if (!text) return null;

  let m = ISO_DATE.exec(text);
  if (m) return fromParts(num(m[1]), num(m[2]), num(m[3]));

  m = ISO_LOCAL.exec(text);
  if (m) {
    const ms = m[7] ? Number(m[7].padEnd(3, "0")) : 0;
    return fromParts(num(m[1]), num(m[2]), num(m[3]), num(m[4]), num(m[5]), num(m[6]), ms);
  }

  if (ISO_ZONED.test(text)) {
    const d = new Date(text);
    return isNaN(d.getTime()) ? null : d;
  }

  m = SLASH_DATE.exec(text);
  if (m) {
    const year = m[3].length === 2 ? 2000 + Number(m[3]) : Number(m[3]);
    return fromParts(year, num(m[1]), num(m[2]), num(m[4]), num(m[5]), num(m[6]));
  }

  return null;
}

function isoWeek(date: Date): string {
  const target = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
  const dayNr = (target.getUTCDay() + 6) % 7; // Monday = 0
  target.setUTCDate(target.getUTCDate() - dayNr + 3); // Thursday of the same week
  const isoYear = target.getUTCFullYear();
  const firstThursday = new Date(Date.UTC(isoYear, 0, 4));
  firstThursday.setUTCDate(firstThursday.getUTCDate() - ((firstThursday.getUTCDay() + 6) % 7) + 3);
  const week = 1 + Math.round((target.getTime() - firstThursday.getTime()) / (7 * DAY_MS));
  return `${isoYear}-W${String(week).padStart(2, "0")}`;
}

/** Truncates an ISO 8601 UTC timestamp to its bucket key. */
export function toBucket(timestamp: string, granularity: TimeGranularity): string {
  const date = new Date(timestamp);
  if (isNaN(date.getTime())) throw new RangeError(`Invalid timestamp: ${timestamp}`);
  const iso = date.toISOString();
  switch (granularity) {
    case "day":
      return iso.slice(0, 10);
    case "week":
      return isoWeek(date);
    case "month":
      return iso.slice(0, 7);
    case "year":
      return iso.slice(0, 4);
  }
}
