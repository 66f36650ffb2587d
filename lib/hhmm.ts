import type { HoursStatus } from "./types";

/** "H:MM" with unbounded hours; "" for a missing value, never "0:00". */
export function formatMinutes(minutes: number | null | undefined): string {
  if (minutes === null || minutes === undefined || !Number.isFinite(minutes)) return "";
  const rounded = Math.round(minutes);
  const sign = rounded < 0 ? "-" : "";
  const abs = Math.abs(rounded);
  const h = Math.floor(abs / 60);
  const m = abs % 60;
  return `${sign}${h}:${String(m).padStart(2, "0")}`;
}

export function parseHhmm(value: string | null | undefined): number | null {
  if (typeof value !== "string") return null;
  const parts = value.split(":");
  if (parts.length !== 2) return null;
  const [h, m] = parts;
  if (!/^\s*[-+]?\d+\s*$/.test(h) || !/^\s*[-+]?\d+\s*$/.test(m)) return null;
  return Number(h.trim()) * 60 + Number(m.trim());
}

export function classifyHhmm(value: string | null | undefined, thresholdHours: number): HoursStatus | null {
  const minutes = parseHhmm(value);
  if (minutes === null) return null;
  return minutes >= thresholdHours * 60 ? "met" : "below";
}
