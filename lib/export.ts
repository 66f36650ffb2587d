import ExcelJS from "exceljs";
import { classifyHhmm } from "./hhmm";
import { ledgerToTable } from "./ledger";
import { serializeLedger } from "./store";
import type { HoursStatus, Ledger } from "./types";

export type ExportFormat = "csv" | "xlsx" | "pdf";

export const STATUS_COLORS: Record<HoursStatus, { fill: string; text: string }> = {
  met: { fill: "e8f5e9", text: "1b5e20" },
  below: { fill: "ffebee", text: "b71c1c" }
};

export const EXPORT_CONTENT_TYPES: Record<ExportFormat, string> = {
  csv: "text/csv; charset=utf-8",
  xlsx: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  pdf: "application/pdf"
};

export function parseExportFormat(value: string | null | undefined): ExportFormat | null {
  return value === "csv" || value === "xlsx" || value === "pdf" ? value : null;
}

function ensureFileNameSafe(value: string): string {
  return value.replace(/[^a-zA-Z0-9._-]+/g, "_");
}

export function buildExportFilename(format: ExportFormat, coach?: string | null) {
  const suffix = coach?.trim() ? `_${ensureFileNameSafe(coach.trim())}` : "";
  return `weekuren_cumulatief${suffix}.${format}`;
}

export function buildLedgerCsv(ledger: Ledger): string {
  return serializeLedger(ledger);
}

export async function buildLedgerXlsx(ledger: Ledger, thresholdHours: number): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const ws = workbook.addWorksheet("Weekuren", { views: [{ state: "frozen", ySplit: 1 }] });
  const [header, ...body] = ledgerToTable(ledger);

  ws.columns = header.map((label, idx) => ({ header: label, key: label, width: idx === 0 ? 28 : idx === 1 ? 18 : 11 }));
  ws.getRow(1).font = { bold: true };

  for (const values of body) {
    const row = ws.addRow(values);
    for (let col = 3; col <= values.length; col++) {
      const status = classifyHhmm(values[col - 1], thresholdHours);
      if (!status) continue;
      const cell = row.getCell(col);
      cell.fill = { type: "pattern", pattern: "solid", fgColor: { argb: `FF${STATUS_COLORS[status].fill.toUpperCase()}` } };
      cell.font = { bold: true, color: { argb: `FF${STATUS_COLORS[status].text.toUpperCase()}` } };
      cell.alignment = { horizontal: "right" };
    }
  }

  const rawBuffer = await workbook.xlsx.writeBuffer();
  return Buffer.from(rawBuffer);
}
