import { Readable } from "node:stream";
import ExcelJS from "exceljs";
import Papa from "papaparse";
import { DecodeError } from "./errors";
import type { CellValue, RawTable } from "./types";

type TextEncoding = "utf-8" | "latin1";
type Delimiter = "," | ";";

const CSV_ATTEMPTS: Array<{ encoding: TextEncoding; delimiter: Delimiter }> = [
  { encoding: "utf-8", delimiter: "," },
  { encoding: "utf-8", delimiter: ";" },
  { encoding: "latin1", delimiter: "," },
  { encoding: "latin1", delimiter: ";" }
];

export type PreviewCell = string | number | null;

function fileExtension(filename: string) {
  const idx = filename.lastIndexOf(".");
  return idx >= 0 ? filename.slice(idx + 1).toLowerCase() : "";
}

function headerLabel(value: CellValue, idx: number) {
  const text = value instanceof Date ? value.toISOString() : value === null ? "" : String(value).trim();
  return text || `Kolom ${idx + 1}`;
}

/** Header labels made unique: a repeated "In" becomes "In (2)", "In (3)". */
export function uniqueHeaders(labels: string[]): string[] {
  const taken = new Set<string>();
  return labels.map((label) => {
    let candidate = label;
    for (let n = 2; taken.has(candidate); n++) candidate = `${label} (${n})`;
    taken.add(candidate);
    return candidate;
  });
}

function toCellValue(value: ExcelJS.CellValue): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "number" || value instanceof Date) return value;
  if (typeof value === "string") return value.trim() ? value : null;
  if (typeof value === "boolean") return String(value);
  if ("richText" in value) return value.richText.map((part) => part.text).join("") || null;
  if ("hyperlink" in value) return value.text || null;
  if ("formula" in value || "sharedFormula" in value) {
    return value.result === undefined ? null : toCellValue(value.result);
  }
  // error values
  return null;
}

async function readWorkbook(bytes: Uint8Array): Promise<RawTable> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.read(Readable.from([Buffer.from(bytes)]));
  } catch (error) {
    throw new DecodeError(`Workbook could not be opened: ${error instanceof Error ? error.message : "unknown error"}`);
  }

  const sheet = workbook.worksheets[0];
  if (!sheet || sheet.rowCount < 1) throw new DecodeError("Workbook has no data on its first sheet.");

  const width = sheet.columnCount;
  const readRow = (rowNo: number) => {
    const row = sheet.getRow(rowNo);
    return Array.from({ length: width }, (_, i) => toCellValue(row.getCell(i + 1).value));
  };

  const headerCells = readRow(1);
  if (headerCells.every((cell) => cell === null)) throw new DecodeError("Workbook has no header row.");

  const rows: CellValue[][] = [];
  for (let rowNo = 2; rowNo <= sheet.rowCount; rowNo++) {
    const cells = readRow(rowNo);
    if (cells.some((cell) => cell !== null)) rows.push(cells);
  }

  return { headers: uniqueHeaders(headerCells.map(headerLabel)), rows };
}

function decodeText(bytes: Uint8Array, encoding: TextEncoding): string | null {
  try {
    return new TextDecoder(encoding, { fatal: true }).decode(bytes);
  } catch {
    return null;
  }
}

/** One delimited-text attempt; null when this encoding/delimiter combination does not fit. */
export function parseDelimited(text: string, delimiter: Delimiter): RawTable | null {
  const result = Papa.parse<string[]>(text, { delimiter, skipEmptyLines: "greedy" });
  if (result.errors.some((error) => error.type === "Quotes")) return null;

  const [header, ...body] = result.data;
  if (!header || header.length === 0) return null;
  if (delimiter === "," && header.length === 1 && header[0].includes(";")) return null;
  if (body.some((row) => row.length > header.length)) return null;

  return {
    headers: uniqueHeaders(header.map((value, idx) => headerLabel(value, idx))),
    rows: body.map((row) => Array.from({ length: header.length }, (_, i) => (row[i]?.trim() ? row[i] : null)))
  };
}

function readDelimited(bytes: Uint8Array): RawTable {
  const decoded = new Map<TextEncoding, string | null>();
  for (const attempt of CSV_ATTEMPTS) {
    if (!decoded.has(attempt.encoding)) decoded.set(attempt.encoding, decodeText(bytes, attempt.encoding));
    const text = decoded.get(attempt.encoding);
    if (!text?.trim()) continue;
    const table = parseDelimited(text, attempt.delimiter);
    if (table) return table;
  }
  throw new DecodeError("File could not be read as comma or semicolon separated text (UTF-8 or Latin-1).");
}

export async function readUploadedTable(filename: string, bytes: Uint8Array): Promise<RawTable> {
  const ext = fileExtension(filename);
  if (ext === "xlsx") return readWorkbook(bytes);
  if (ext === "xls") throw new DecodeError("Legacy .xls workbooks are not supported; save the file as .xlsx.");
  return readDelimited(bytes);
}

export function previewTable(table: RawTable, limit = 20): { headers: string[]; rows: PreviewCell[][] } {
  return {
    headers: [...table.headers],
    rows: table.rows
      .slice(0, limit)
      .map((row) => row.map((cell) => (cell instanceof Date ? cell.toISOString() : cell)))
  };
}
