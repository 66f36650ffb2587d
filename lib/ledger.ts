import { StudentNotFoundError } from "./errors";
import { COACH_COLUMN, NAME_COLUMN, type Ledger, type LedgerRow, type WeekRow } from "./types";

const WEEK_LABEL_PATTERN = /^W\d{2}-\d{4}$/;

export function emptyLedger(): Ledger {
  return { weeks: [], rows: [] };
}

export function isWeekLabel(label: string) {
  return WEEK_LABEL_PATTERN.test(label);
}

export function ledgerColumns(ledger: Ledger): string[] {
  return [NAME_COLUMN, COACH_COLUMN, ...ledger.weeks];
}

function compareNames(a: LedgerRow, b: LedgerRow) {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

function cloneRow(row: LedgerRow): LedgerRow {
  return { name: row.name, coach: row.coach, hours: { ...row.hours } };
}

/**
 * Outer-joins one week column into the ledger. Coach values are carried
 * through, an existing week label is overwritten in place, rows come back
 * sorted by name.
 */
export function mergeWeek(ledger: Ledger, weekLabel: string, weekRows: WeekRow[]): Ledger {
  if (!weekLabel.trim() || weekLabel === NAME_COLUMN || weekLabel === COACH_COLUMN) {
    throw new Error(`Invalid week label: ${weekLabel}`);
  }

  const byName = new Map<string, LedgerRow>();
  for (const row of ledger.rows) byName.set(row.name, cloneRow(row));

  for (const entry of weekRows) {
    const name = entry.name.trim();
    if (!name) continue;
    let row = byName.get(name);
    if (!row) {
      row = { name, coach: "", hours: {} };
      byName.set(name, row);
    }
    if (entry.hhmm) row.hours[weekLabel] = entry.hhmm;
    else delete row.hours[weekLabel];
  }

  const weeks = ledger.weeks.includes(weekLabel) ? [...ledger.weeks] : [...ledger.weeks, weekLabel];
  const rows = [...byName.values()].sort(compareNames);
  return { weeks, rows };
}

export function setCoach(ledger: Ledger, name: string, coach: string): Ledger {
  const target = name.trim();
  if (!ledger.rows.some((row) => row.name === target)) {
    throw new StudentNotFoundError(target);
  }
  return {
    weeks: [...ledger.weeks],
    rows: ledger.rows.map((row) => (row.name === target ? { ...cloneRow(row), coach: coach.trim() } : cloneRow(row)))
  };
}

export function listCoaches(ledger: Ledger): string[] {
  const coaches = new Set<string>();
  for (const row of ledger.rows) {
    if (row.coach) coaches.add(row.coach);
  }
  return [...coaches].sort((a, b) => a.localeCompare(b));
}

export function filterByCoach(ledger: Ledger, coach: string | null | undefined): Ledger {
  const wanted = coach?.trim();
  if (!wanted) return ledger;
  return {
    weeks: [...ledger.weeks],
    rows: ledger.rows.filter((row) => row.coach === wanted).map(cloneRow)
  };
}

/** Header row plus one string row per student; absent week values become "". */
export function ledgerToTable(ledger: Ledger): string[][] {
  return [
    ledgerColumns(ledger),
    ...ledger.rows.map((row) => [row.name, row.coach, ...ledger.weeks.map((week) => row.hours[week] ?? "")])
  ];
}

/**
 * Rebuilds a ledger from its tabular form. Files written before the coach
 * column existed are accepted; a repeated name is folded into its first row.
 */
export function ledgerFromTable(table: string[][]): Ledger {
  const [header, ...body] = table;
  if (!header || !header.length) return emptyLedger();

  const columns = header.map((value) => value.trim());
  const nameIdx = columns.indexOf(NAME_COLUMN);
  if (nameIdx < 0) throw new Error(`Ledger header has no ${NAME_COLUMN} column`);
  const coachIdx = columns.indexOf(COACH_COLUMN);

  const weekColumns = columns
    .map((label, idx) => ({ label, idx }))
    .filter(({ label, idx }) => idx !== nameIdx && idx !== coachIdx && label !== "");
  const weeks = [...new Set(weekColumns.map(({ label }) => label))];

  const byName = new Map<string, LedgerRow>();
  for (const cells of body) {
    const name = (cells[nameIdx] ?? "").trim();
    if (!name) continue;
    const existing = byName.get(name);
    const row = existing ?? { name, coach: "", hours: {} };
    const coach = coachIdx >= 0 ? (cells[coachIdx] ?? "").trim() : "";
    if (!row.coach && coach) row.coach = coach;
    for (const { label, idx } of weekColumns) {
      const value = (cells[idx] ?? "").trim();
      if (value && !row.hours[label]) row.hours[label] = value;
    }
    if (!existing) byName.set(name, row);
  }

  return { weeks, rows: [...byName.values()].sort(compareNames) };
}
