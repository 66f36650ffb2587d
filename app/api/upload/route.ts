import { NextResponse } from "next/server";
import { summarizeWeek } from "@/lib/aggregate";
import { InvalidLayoutError } from "@/lib/errors";
import { errorResponse, formText, readUploadFile } from "@/lib/http";
import { getLedgerSession } from "@/lib/ledger-session";
import { findLayout, loadLayouts } from "@/lib/layouts";
import { getThresholdHours } from "@/lib/runtime";
import type { LayoutMode } from "@/lib/types";
import { readUploadedTable } from "@/lib/upload-reader";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function POST(request: Request) {
  try {
    const form = await request.formData().catch(() => null);
    if (!form) return NextResponse.json({ error: "Expected multipart form data" }, { status: 400 });

    const nameColumn = formText(form, "nameColumn");
    if (!nameColumn) return NextResponse.json({ error: "Name column is required" }, { status: 400 });

    const layout = findLayout(await loadLayouts(), formText(form, "layout"));
    if (!layout) throw new InvalidLayoutError("Unknown layout");

    const mode: LayoutMode =
      layout.mode.kind === "named"
        ? {
            kind: "named",
            start: formText(form, "startColumn") ?? layout.mode.start,
            end: formText(form, "endColumn") ?? layout.mode.end
          }
        : layout.mode;

    const { filename, bytes } = await readUploadFile(form);
    const table = await readUploadedTable(filename, bytes);
    const result = await getLedgerSession().applyUpload(table, { nameColumn, layout: mode, flavor: layout.flavor });

    return NextResponse.json({
      weekLabel: result.weekLabel,
      students: summarizeWeek(result.students, getThresholdHours()),
      ledger: result.ledger,
      persisted: result.persisted,
      persistError: result.persistError
    });
  } catch (error) {
    return errorResponse(error, "Upload failed");
  }
}
