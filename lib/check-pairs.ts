import { ColumnNotFoundError, InsufficientColumnsError, InvalidLayoutError } from "./errors";
import type { CheckPair, LayoutMode, RawTable } from "./types";

export const START_COLUMN_SYNONYMS = [
  "check in time",
  "check-in time",
  "check in",
  "start",
  "start time",
  "checkin time"
] as const;

export const END_COLUMN_SYNONYMS = [
  "check out time",
  "check-out time",
  "check out",
  "einde",
  "end",
  "end time",
  "checkout time"
] as const;

function normalizeHeader(value: string) {
  return value.trim().toLowerCase();
}

export function columnCount(table: RawTable) {
  return table.headers.length;
}

function findHeaderIndex(headers: string[], name: string) {
  const exact = headers.indexOf(name);
  if (exact >= 0) return exact;
  const wanted = normalizeHeader(name);
  return headers.findIndex((header) => normalizeHeader(header) === wanted);
}

function findSynonymIndex(headers: string[], synonyms: readonly string[]) {
  return headers.findIndex((header) => synonyms.includes(normalizeHeader(header)));
}

export function findDefaultColumns(headers: string[]) {
  const startIdx = findSynonymIndex(headers, START_COLUMN_SYNONYMS);
  const endIdx = findSynonymIndex(headers, END_COLUMN_SYNONYMS);
  return {
    start: startIdx >= 0 ? headers[startIdx] : null,
    end: endIdx >= 0 ? headers[endIdx] : null
  };
}

/** Header name (exact, then trimmed case-insensitive) or zero-based index. */
export function resolveColumnIndex(table: RawTable, column: string | number): number {
  if (typeof column === "number") {
    if (!Number.isInteger(column) || column < 0) {
      throw new InvalidLayoutError(`Invalid column index: ${column}`);
    }
    ensureColumns(table, column);
    return column;
  }
  const idx = findHeaderIndex(table.headers, column);
  if (idx < 0) throw new ColumnNotFoundError(`Column not found: ${column}`);
  return idx;
}

function ensureColumns(table: RawTable, maxIndex: number) {
  const actual = columnCount(table);
  if (actual < maxIndex + 1) {
    throw new InsufficientColumnsError(maxIndex + 1, actual);
  }
}

function assertIndex(value: number) {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidLayoutError(`Invalid column index: ${value}`);
  }
}

function assertDistinctColumns(pairs: CheckPair[]) {
  const seen = new Set<number>();
  for (const pair of pairs) {
    if (pair.inCol === pair.outCol) {
      throw new InvalidLayoutError(`Check-in and check-out share column ${pair.inCol}`);
    }
    for (const col of [pair.inCol, pair.outCol]) {
      if (seen.has(col)) throw new InvalidLayoutError(`Column ${col} is used by more than one pair`);
      seen.add(col);
    }
  }
}

function resolveNamed(table: RawTable, start?: string, end?: string): CheckPair[] {
  if (columnCount(table) < 2) {
    throw new ColumnNotFoundError("Upload needs at least a start and an end column.");
  }

  const defaults = findDefaultColumns(table.headers);
  const startName = start?.trim() ? start : defaults.start;
  const endName = end?.trim() ? end : defaults.end;
  if (!startName) throw new ColumnNotFoundError("No check-in column selected or recognised.");
  if (!endName) throw new ColumnNotFoundError("No check-out column selected or recognised.");

  const inCol = findHeaderIndex(table.headers, startName);
  if (inCol < 0) throw new ColumnNotFoundError(`Column not found: ${startName}`);
  const outCol = findHeaderIndex(table.headers, endName);
  if (outCol < 0) throw new ColumnNotFoundError(`Column not found: ${endName}`);
  if (inCol === outCol) {
    throw new ColumnNotFoundError("Check-in and check-out must be different columns.");
  }
  return [{ inCol, outCol }];
}

function resolveBlock(table: RawTable, startIndex: number, endIndex: number): CheckPair[] {
  assertIndex(startIndex);
  assertIndex(endIndex);
  if (endIndex < startIndex) {
    throw new InvalidLayoutError(`Block end ${endIndex} lies before block start ${startIndex}`);
  }
  ensureColumns(table, endIndex);

  const pairs: CheckPair[] = [];
  for (let col = startIndex; col + 1 <= endIndex; col += 2) {
    pairs.push({ inCol: col, outCol: col + 1 });
  }
  return pairs;
}

function resolveFixed(table: RawTable, fixed: Array<[number, number]>): CheckPair[] {
  const pairs = fixed.map(([inCol, outCol]) => {
    assertIndex(inCol);
    assertIndex(outCol);
    return { inCol, outCol };
  });
  assertDistinctColumns(pairs);
  if (pairs.length) {
    ensureColumns(table, Math.max(...pairs.map((p) => Math.max(p.inCol, p.outCol))));
  }
  return pairs;
}

function resolveHeaderMatch(table: RawTable, inHeader: string, outHeader: string): CheckPair[] {
  const inNeedle = normalizeHeader(inHeader);
  const outNeedle = normalizeHeader(outHeader);
  if (!inNeedle || !outNeedle) throw new InvalidLayoutError("Header match needs both header texts.");

  const inCols: number[] = [];
  const outCols: number[] = [];
  table.headers.forEach((header, idx) => {
    const normalized = normalizeHeader(header);
    if (normalized.includes(inNeedle)) inCols.push(idx);
    else if (normalized.includes(outNeedle)) outCols.push(idx);
  });

  if (!inCols.length || !outCols.length) {
    throw new ColumnNotFoundError(`No "${inHeader}" / "${outHeader}" columns found.`);
  }
  const length = Math.min(inCols.length, outCols.length);
  return Array.from({ length }, (_, i) => ({ inCol: inCols[i], outCol: outCols[i] }));
}

export function resolvePairs(table: RawTable, mode: LayoutMode): CheckPair[] {
  switch (mode.kind) {
    case "named":
      return resolveNamed(table, mode.start, mode.end);
    case "block":
      return resolveBlock(table, mode.startIndex, mode.endIndex);
    case "fixed":
      return resolveFixed(table, mode.pairs);
    case "header-match":
      return resolveHeaderMatch(table, mode.inHeader, mode.outHeader);
  }
}

/** Columns read as already-elapsed durations: a whole block, or the columns of the pairs. */
export function resolveColumns(table: RawTable, mode: LayoutMode): number[] {
  if (mode.kind === "block") {
    resolveBlock(table, mode.startIndex, mode.endIndex);
    return Array.from({ length: mode.endIndex - mode.startIndex + 1 }, (_, i) => mode.startIndex + i);
  }
  return resolvePairs(table, mode).flatMap((pair) => [pair.inCol, pair.outCol]);
}
