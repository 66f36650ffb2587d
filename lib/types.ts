export type CellValue = string | number | Date | null;

export type RawTable = {
  headers: string[];
  rows: CellValue[][];
};

export type CheckPair = {
  inCol: number;
  outCol: number;
};

export type LayoutMode =
  | { kind: "named"; start?: string; end?: string }
  | { kind: "block"; startIndex: number; endIndex: number } // inclusive
  | { kind: "fixed"; pairs: Array<[number, number]> }
  | { kind: "header-match"; inHeader: string; outHeader: string };

export type AggregationFlavor = "instant" | "elapsed";

export type EpisodeSource =
  | { flavor: "instant"; pairs: CheckPair[] }
  | { flavor: "elapsed"; columns: number[] };

export type StudentMinutes = {
  name: string;
  minutes: number;
};

export type StudentWeekSummary = StudentMinutes & {
  hours: number;
  hhmm: string;
  deltaMinutes: number; // minutes minus threshold
};

export type WeekRow = {
  name: string;
  hhmm: string;
};

export type LedgerRow = {
  name: string;
  coach: string;
  hours: Record<string, string>; // week label -> "H:MM"
};

export type Ledger = {
  weeks: string[];
  rows: LedgerRow[];
};

export type LayoutDefinition = {
  id: string;
  label: string;
  flavor: AggregationFlavor;
  mode: LayoutMode;
};

export type UploadOptions = {
  nameColumn: string | number;
  layout: LayoutMode;
  flavor: AggregationFlavor;
};

export type HoursStatus = "met" | "below";

export const NAME_COLUMN = "Naam";
export const COACH_COLUMN = "Coach";
