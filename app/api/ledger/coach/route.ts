import { NextResponse } from "next/server";
import { errorResponse } from "@/lib/http";
import { getLedgerSession } from "@/lib/ledger-session";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function PUT(request: Request) {
  try {
    const body: unknown = await request.json().catch(() => null);
    if (!body || typeof body !== "object") {
      return NextResponse.json({ error: "Invalid JSON body" }, { status: 400 });
    }

    const name = "name" in body ? body.name : undefined;
    const coach = "coach" in body ? body.coach : undefined;
    if (typeof name !== "string" || !name.trim()) {
      return NextResponse.json({ error: "Invalid name" }, { status: 400 });
    }
    if (typeof coach !== "string") {
      return NextResponse.json({ error: "Invalid coach" }, { status: 400 });
    }

    const result = await getLedgerSession().updateCoach(name, coach);
    return NextResponse.json(result);
  } catch (error) {
    return errorResponse(error, "Failed to save coach");
  }
}
