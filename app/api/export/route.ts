import { NextResponse } from "next/server";
import {
  EXPORT_CONTENT_TYPES,
  buildExportFilename,
  buildLedgerCsv,
  buildLedgerXlsx,
  parseExportFormat
} from "@/lib/export";
import { buildLedgerPdf } from "@/lib/export-pdf";
import { errorResponse } from "@/lib/http";
import { filterByCoach } from "@/lib/ledger";
import { getLedgerSession } from "@/lib/ledger-session";
import { getThresholdHours, isPdfExportDisabled } from "@/lib/runtime";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(request: Request) {
  try {
    const params = new URL(request.url).searchParams;
    const format = parseExportFormat(params.get("format") ?? "csv");
    if (!format) return NextResponse.json({ error: "Invalid format" }, { status: 400 });
    if (format === "pdf" && isPdfExportDisabled()) {
      return NextResponse.json({ error: "PDF export is disabled for this deployment." }, { status: 400 });
    }

    const coach = params.get("coach");
    const ledger = filterByCoach(await getLedgerSession().current(), coach);
    const thresholdHours = getThresholdHours();

    let body: BodyInit;
    if (format === "csv") body = buildLedgerCsv(ledger);
    else if (format === "xlsx") body = new Uint8Array(await buildLedgerXlsx(ledger, thresholdHours));
    else {
      body = new Uint8Array(
        buildLedgerPdf(ledger, {
          thresholdHours,
          title: coach?.trim() ? `Weekuren per student (coach: ${coach.trim()})` : undefined
        })
      );
    }

    return new NextResponse(body, {
      headers: {
        "Content-Type": EXPORT_CONTENT_TYPES[format],
        "Content-Disposition": `attachment; filename="${buildExportFilename(format, coach)}"`,
        "Cache-Control": "no-store"
      }
    });
  } catch (error) {
    return errorResponse(error, "Export failed");
  }
}
