import { resolveColumnIndex } from "./check-pairs";
import { formatMinutes } from "./hhmm";
import { parseCellToMinutes, parseInstant } from "./time-cell";
import type { CellValue, CheckPair, EpisodeSource, RawTable, StudentMinutes, StudentWeekSummary } from "./types";

const MINUTE_MS = 60_000;

function finiteTotal(minutes: number) {
  return Number.isFinite(minutes) && minutes > 0 ? minutes : 0;
}

function readName(value: CellValue | undefined): string {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? "" : value.toISOString();
  return String(value).trim();
}

/** Minutes between check-in and check-out; 0 unless both parse and out is after in. */
export function episodeMinutes(checkIn: CellValue | undefined, checkOut: CellValue | undefined): number {
  const start = parseInstant(checkIn);
  const end = parseInstant(checkOut);
  if (start === null || end === null || end <= start) return 0;
  return (end - start) / MINUTE_MS;
}

function rowMinutesFromPairs(row: CellValue[], pairs: CheckPair[]) {
  let total = 0;
  for (const pair of pairs) {
    total += episodeMinutes(row[pair.inCol], row[pair.outCol]);
  }
  return finiteTotal(total);
}

function rowMinutesFromColumns(row: CellValue[], columns: number[]) {
  let total = 0;
  for (const col of columns) {
    total += parseCellToMinutes(row[col]);
  }
  return finiteTotal(total);
}

export function aggregate(table: RawTable, nameColumn: string | number, source: EpisodeSource): StudentMinutes[] {
  const nameIdx = resolveColumnIndex(table, nameColumn);
  const totals = new Map<string, number>();

  for (const row of table.rows) {
    const name = readName(row[nameIdx]);
    if (!name) continue;

    const minutes =
      source.flavor === "instant"
        ? rowMinutesFromPairs(row, source.pairs)
        : rowMinutesFromColumns(row, source.columns);
    totals.set(name, finiteTotal((totals.get(name) ?? 0) + minutes));
  }

  return [...totals].map(([name, minutes]) => ({ name, minutes }));
}

export function summarizeWeek(students: StudentMinutes[], thresholdHours: number): StudentWeekSummary[] {
  const thresholdMinutes = thresholdHours * 60;
  return students.map((student) => ({
    ...student,
    hours: Math.round((student.minutes / 60) * 100) / 100,
    hhmm: formatMinutes(student.minutes),
    deltaMinutes: Math.round(student.minutes - thresholdMinutes)
  }));
}
