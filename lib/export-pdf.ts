import { jsPDF } from "jspdf";
import autoTable from "jspdf-autotable";
import { STATUS_COLORS } from "./export";
import { classifyHhmm } from "./hhmm";
import { ledgerToTable } from "./ledger";
import type { Ledger } from "./types";

type RgbColor = [number, number, number];

function hexToRgb(hex: string): RgbColor {
  const value = Number.parseInt(hex, 16);
  return [(value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff];
}

export type PdfExportOptions = {
  thresholdHours: number;
  title?: string;
  subtitle?: string;
};

/** Landscape A4 table; the header row repeats on every page. */
export function buildLedgerPdf(ledger: Ledger, options: PdfExportOptions): Buffer {
  const doc = new jsPDF({ orientation: "landscape", unit: "mm", format: "a4" });
  const [header, ...body] = ledgerToTable(ledger);

  doc.setFontSize(14);
  doc.text(options.title ?? "Weekuren per student", 14, 14);
  doc.setFontSize(9);
  doc.text(
    options.subtitle ?? `Groen = ≥ ${options.thresholdHours} uur, rood = minder dan ${options.thresholdHours} uur`,
    14,
    20
  );

  autoTable(doc, {
    head: [header],
    body,
    startY: 25,
    showHead: "everyPage",
    styles: { fontSize: 8, cellPadding: 1.5 },
    headStyles: { fillColor: [41, 128, 185] },
    didParseCell: (data) => {
      if (data.section !== "body" || data.column.index < 2) return;
      const status = classifyHhmm(typeof data.cell.raw === "string" ? data.cell.raw : "", options.thresholdHours);
      if (!status) return;
      data.cell.styles.fillColor = hexToRgb(STATUS_COLORS[status].fill);
      data.cell.styles.textColor = hexToRgb(STATUS_COLORS[status].text);
      data.cell.styles.fontStyle = "bold";
    },
    didDrawPage: (data) => {
      doc.setFontSize(8);
      doc.text(`Pagina ${data.pageNumber}`, doc.internal.pageSize.getWidth() - 30, doc.internal.pageSize.getHeight() - 8);
    }
  });

  return Buffer.from(doc.output("arraybuffer"));
}
