import { TimestampParseError } from "../errors.js";

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Notes carry wall-clock time with no zone. The value is kept in the UTC
 * fields of a Date, so day arithmetic is plain millisecond addition.
 */
export function parseTimestamp(text: string): Date {
  const match = TIMESTAMP_PATTERN.exec(text);
  if (!match) {
    throw new TimestampParseError(text);
  }

  const [year, month, day, hour, minute] = match.slice(1).map(Number);
  if (month < 1 || month > 12 || hour > 23 || minute > 59) {
    throw new TimestampParseError(text);
  }

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute));
  // Date.UTC rolls 2024-02-30 over into March; reject instead
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    throw new TimestampParseError(text);
  }

  return date;
}

/** Parses a bare `YYYY-MM-DD` as midnight of that day. */
export function parseDay(text: string): Date {
  return parseTimestamp(`${text} 00:00`);
}

function pad(value: number, width = 2): string {
  return value.toString().padStart(width, "0");
}

export function formatTimestamp(date: Date): string {
  const day = `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
  return `${day} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`;
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}
