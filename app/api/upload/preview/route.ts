import { NextResponse } from "next/server";
import { findDefaultColumns } from "@/lib/check-pairs";
import { errorResponse, readUploadFile } from "@/lib/http";
import { loadLayouts } from "@/lib/layouts";
import { previewTable, readUploadedTable } from "@/lib/upload-reader";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function POST(request: Request) {
  try {
    const form = await request.formData().catch(() => null);
    if (!form) return NextResponse.json({ error: "Expected multipart form data" }, { status: 400 });

    const { filename, bytes } = await readUploadFile(form);
    const table = await readUploadedTable(filename, bytes);
    const layouts = await loadLayouts();

    return NextResponse.json({
      filename,
      rowCount: table.rows.length,
      ...previewTable(table),
      defaults: findDefaultColumns(table.headers),
      layouts
    });
  } catch (error) {
    return errorResponse(error, "Preview failed");
  }
}
