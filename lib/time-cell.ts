import type { CellValue } from "./types";

const MINUTE_MS = 60_000;
const DAY_MS = 24 * 60 * MINUTE_MS;
// Day zero of spreadsheet serial dates; time-only values are anchored here.
export const SPREADSHEET_EPOCH_MS = Date.UTC(1899, 11, 30);
// Workbook durations ("[h]:mm") arrive as dates just after day zero; anything from here on is a calendar date.
export const DURATION_CUTOFF_MS = Date.UTC(1900, 0, 1);

export type TimeCell =
  | { kind: "empty" }
  | { kind: "duration"; minutes: number }
  | { kind: "time-string"; text: string }
  | { kind: "numeric-string"; text: string }
  | { kind: "number"; value: number };

const DECIMAL_PATTERN = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;
const CLOCK_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?\s*([ap])?\.?\s*(m)?\.?$/i;
const ISO_DATE_TIME_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ]+(.+?))?Z?$/;
const LOCAL_DATE_TIME_PATTERN = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})(?:[T ]+(.+))?$/;

export function classifyCell(value: CellValue | undefined): TimeCell {
  if (value === null || value === undefined) return { kind: "empty" };
  if (value instanceof Date) {
    const time = value.getTime();
    if (Number.isNaN(time) || time >= DURATION_CUTOFF_MS) return { kind: "empty" };
    return { kind: "duration", minutes: (time - SPREADSHEET_EPOCH_MS) / MINUTE_MS };
  }
  if (typeof value === "number") return { kind: "number", value };

  const text = value.trim();
  if (!text) return { kind: "empty" };
  if (text.includes(":")) return { kind: "time-string", text };
  return { kind: "numeric-string", text };
}

function nonNegative(minutes: number) {
  return Number.isFinite(minutes) && minutes > 0 ? minutes : 0;
}

/** Hours before the first colon, minutes are the two characters right after it. */
export function parseColonDuration(text: string): number | null {
  const idx = text.indexOf(":");
  if (idx < 0) return null;
  const hoursPart = text.slice(0, idx).trim();
  const minutesPart = text.slice(idx + 1, idx + 3);
  if (!/^[-+]?\d+$/.test(hoursPart) || !/^\d{2}$/.test(minutesPart)) return null;
  return Number(hoursPart) * 60 + Number(minutesPart);
}

/** Decimal hours with either "," or "." as separator. */
export function parseDecimalHours(text: string): number | null {
  const normalized = text.trim().replace(/,/g, ".");
  if (!DECIMAL_PATTERN.test(normalized)) return null;
  const value = Number(normalized);
  return Number.isFinite(value) ? value : null;
}

function minutesFromDecimalText(text: string) {
  const hours = parseDecimalHours(text);
  return hours === null ? 0 : nonNegative(hours * 60);
}

export function parseCellToMinutes(value: CellValue | undefined): number {
  const cell = classifyCell(value);
  switch (cell.kind) {
    case "empty":
      return 0;
    case "duration":
      return nonNegative(cell.minutes);
    case "time-string": {
      const minutes = parseColonDuration(cell.text);
      if (minutes !== null) return nonNegative(minutes);
      return minutesFromDecimalText(cell.text);
    }
    case "numeric-string":
      return minutesFromDecimalText(cell.text);
    case "number":
      return nonNegative(cell.value * 60);
  }
}

/** Milliseconds since midnight for "H:MM", "H:MM:SS" and 12-hour "h:MMam"/"h:MM PM". */
export function parseClock(text: string): number | null {
  const m = CLOCK_PATTERN.exec(text.trim());
  if (!m) return null;
  if (m[4] && !m[5]) return null;
  let hours = Number(m[1]);
  const minutes = Number(m[2]);
  const seconds = m[3] ? Number(m[3]) : 0;
  if (minutes > 59 || seconds > 59) return null;

  const meridiem = m[4]?.toLowerCase();
  if (meridiem) {
    if (hours < 1 || hours > 12) return null;
    hours = (hours % 12) + (meridiem === "p" ? 12 : 0);
  } else if (hours > 23) {
    return null;
  }
  return ((hours * 60 + minutes) * 60 + seconds) * 1000;
}

function utcDay(year: number, month: number, day: number): number | null {
  const time = Date.UTC(year, month - 1, day);
  const d = new Date(time);
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return null;
  }
  return time;
}

function withClock(dayMs: number | null, clockText: string | undefined): number | null {
  if (dayMs === null) return null;
  if (!clockText) return dayMs;
  const clock = parseClock(clockText);
  return clock === null ? null : dayMs + clock;
}

/**
 * Wall-clock instant of a check-in/check-out cell in epoch milliseconds.
 * Recorded times are taken as-is; no timezone is applied.
 */
export function parseInstant(value: CellValue | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) {
    const time = value.getTime();
    return Number.isNaN(time) ? null : time;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? SPREADSHEET_EPOCH_MS + value * DAY_MS : null;
  }

  const text = value.trim();
  if (!text) return null;

  const clock = parseClock(text);
  if (clock !== null) return SPREADSHEET_EPOCH_MS + clock;

  const iso = ISO_DATE_TIME_PATTERN.exec(text);
  if (iso) {
    return withClock(utcDay(Number(iso[1]), Number(iso[2]), Number(iso[3])), iso[4]);
  }

  const local = LOCAL_DATE_TIME_PATTERN.exec(text);
  if (local) {
    let month = Number(local[1]);
    let day = Number(local[2]);
    // Month first, unless the first part cannot be a month.
    if (month > 12 && day <= 12) [month, day] = [day, month];
    return withClock(utcDay(Number(local[3]), month, day), local[4]);
  }

  return null;
}
