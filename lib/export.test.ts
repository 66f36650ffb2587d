import { Readable } from "node:stream";
import ExcelJS from "exceljs";
import { describe, expect, it } from "vitest";
import { buildExportFilename, buildLedgerCsv, buildLedgerXlsx, parseExportFormat } from "./export";
import type { Ledger } from "./types";

const LEDGER: Ledger = {
  weeks: ["W01-2025"],
  rows: [
    { name: "Ana", coach: "Joost", hours: { "W01-2025": "16:00" } },
    { name: "Ben", coach: "", hours: { "W01-2025": "3:00" } },
    { name: "Cas", coach: "", hours: {} }
  ]
};

describe("buildLedgerCsv", () => {
  it("matches the persisted file format", () => {
    expect(buildLedgerCsv(LEDGER)).toBe("Naam,Coach,W01-2025\nAna,Joost,16:00\nBen,,3:00\nCas,,");
  });
});

describe("buildLedgerXlsx", () => {
  it("colours week cells against the threshold", async () => {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.read(Readable.from([await buildLedgerXlsx(LEDGER, 16)]));
    const sheet = workbook.getWorksheet("Weekuren");
    if (!sheet) throw new Error("sheet missing");

    expect(sheet.getRow(1).getCell(3).value).toBe("W01-2025");
    expect(sheet.getRow(2).getCell(3).value).toBe("16:00");
    expect(sheet.getRow(2).getCell(3).fill).toMatchObject({ fgColor: { argb: "FFE8F5E9" } });
    expect(sheet.getRow(3).getCell(3).fill).toMatchObject({ fgColor: { argb: "FFFFEBEE" } });
  });
});

describe("export helpers", () => {
  it("names files after the coach filter", () => {
    expect(buildExportFilename("pdf", "Joost de Vries")).toBe("weekuren_cumulatief_Joost_de_Vries.pdf");
    expect(buildExportFilename("csv", null)).toBe("weekuren_cumulatief.csv");
  });

  it("accepts only known formats", () => {
    expect(parseExportFormat("xlsx")).toBe("xlsx");
    expect(parseExportFormat("xls")).toBeNull();
    expect(parseExportFormat(null)).toBeNull();
  });
});
