import { NextResponse } from "next/server";
import { errorResponse } from "@/lib/http";
import { filterByCoach, listCoaches } from "@/lib/ledger";
import { getLedgerSession } from "@/lib/ledger-session";
import { getThresholdHours } from "@/lib/runtime";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(request: Request) {
  try {
    const coach = new URL(request.url).searchParams.get("coach");
    const ledger = await getLedgerSession().current();
    return NextResponse.json({
      ledger: filterByCoach(ledger, coach),
      coaches: listCoaches(ledger),
      thresholdHours: getThresholdHours()
    });
  } catch (error) {
    return errorResponse(error, "Failed to load ledger");
  }
}

export async function DELETE() {
  try {
    const result = await getLedgerSession().reset();
    return NextResponse.json(result);
  } catch (error) {
    return errorResponse(error, "Reset failed");
  }
}
