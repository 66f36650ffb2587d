import { formatInTimeZone } from "date-fns-tz";

const WEEK_LABEL_PATTERN = /^W(\d{2})-(\d{4})$/;

function utcDate(year: number, monthIndex: number, day: number) {
  return new Date(Date.UTC(year, monthIndex, day));
}

export function addDays(date: Date, days: number): Date {
  const next = new Date(date.getTime());
  next.setUTCDate(next.getUTCDate() + days);
  return next;
}

/** Label of the ISO week `now` falls in, as seen from `timeZone`: "W07-2025". */
export function getWeekLabel(now: Date, timeZone = "Europe/Amsterdam"): string {
  return formatInTimeZone(now, timeZone, "'W'II-RRRR");
}

export function parseWeekLabel(label: string): { year: number; week: number } | null {
  const m = WEEK_LABEL_PATTERN.exec(label);
  if (!m) return null;
  const week = Number(m[1]);
  const year = Number(m[2]);
  if (week < 1 || week > getIsoWeeksInYear(year)) return null;
  return { year, week };
}

export function getIsoWeekDates(year: number, week: number): Date[] {
  // ISO week 1 is the week containing Jan 4.
  const jan4 = utcDate(year, 0, 4);
  const jan4Weekday = jan4.getUTCDay() || 7; // Sunday -> 7
  const week1Monday = addDays(jan4, 1 - jan4Weekday);
  const monday = addDays(week1Monday, (week - 1) * 7);
  return Array.from({ length: 7 }, (_, i) => addDays(monday, i));
}

export function getIsoWeek(date: Date): { year: number; week: number } {
  const d = new Date(date.getTime());
  d.setUTCHours(0, 0, 0, 0);
  d.setUTCDate(d.getUTCDate() + 4 - (d.getUTCDay() || 7));
  const yearStart = utcDate(d.getUTCFullYear(), 0, 1);
  const week = Math.ceil(((d.getTime() - yearStart.getTime()) / 86400000 + 1) / 7);
  return { year: d.getUTCFullYear(), week };
}

export function getIsoWeeksInYear(year: number): number {
  // Dec 28 always belongs to the last ISO week of the year.
  return getIsoWeek(utcDate(year, 11, 28)).week;
}

export function formatNlDate(date: Date): string {
  return `${String(date.getUTCDate()).padStart(2, "0")}-${String(date.getUTCMonth() + 1).padStart(2, "0")}-${date.getUTCFullYear()}`;
}

/** "30-12-2024 t/m 05-01-2025" for "W01-2025"; "" for anything that is no week label. */
export function describeWeekLabel(label: string): string {
  const parsed = parseWeekLabel(label);
  if (!parsed) return "";
  const dates = getIsoWeekDates(parsed.year, parsed.week);
  return `${formatNlDate(dates[0])} t/m ${formatNlDate(dates[6])}`;
}
