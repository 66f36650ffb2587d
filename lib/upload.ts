import { aggregate } from "./aggregate";
import { resolveColumnIndex, resolveColumns, resolvePairs } from "./check-pairs";
import { formatMinutes } from "./hhmm";
import { mergeWeek } from "./ledger";
import type { EpisodeSource, Ledger, RawTable, StudentMinutes, UploadOptions, WeekRow } from "./types";

export type UploadResult = {
  weekLabel: string;
  students: StudentMinutes[];
  weekRows: WeekRow[];
  ledger: Ledger;
};

export function resolveEpisodeSource(table: RawTable, options: UploadOptions): EpisodeSource {
  if (options.flavor === "elapsed") {
    return { flavor: "elapsed", columns: resolveColumns(table, options.layout) };
  }
  return { flavor: "instant", pairs: resolvePairs(table, options.layout) };
}

export function toWeekRows(students: StudentMinutes[]): WeekRow[] {
  return students.map((student) => ({ name: student.name, hhmm: formatMinutes(student.minutes) }));
}

/**
 * Upload pipeline without side effects: layout, aggregation, formatting, merge.
 * Layout errors are thrown before the ledger is touched.
 */
export function processUpload(table: RawTable, options: UploadOptions, ledger: Ledger, weekLabel: string): UploadResult {
  resolveColumnIndex(table, options.nameColumn);
  const source = resolveEpisodeSource(table, options);
  const students = aggregate(table, options.nameColumn, source);
  const weekRows = toWeekRows(students);
  return {
    weekLabel,
    students,
    weekRows,
    ledger: mergeWeek(ledger, weekLabel, weekRows)
  };
}
