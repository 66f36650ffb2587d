import { Dashboard } from "@/components/Dashboard";
import { getWeekLabel } from "@/lib/calendar";
import { getLedgerSession } from "@/lib/ledger-session";
import { getThresholdHours, getTimeZone, isPdfExportDisabled } from "@/lib/runtime";

export const dynamic = "force-dynamic";

export default async function HomePage() {
  const ledger = await getLedgerSession().current();
  const thresholdHours = getThresholdHours();
  const currentWeek = getWeekLabel(new Date(), getTimeZone());

  return (
    <main className="shell grid" style={{ gap: "1rem" }}>
      <section className="hero">
        <h1>Weekuren per student</h1>
        <p>Upload wekelijks je CSV of Excel. Elke upload vult de kolom van de huidige week ({currentWeek}).</p>
      </section>

      <Dashboard initialLedger={ledger} thresholdHours={thresholdHours} pdfDisabled={isPdfExportDisabled()} />
    </main>
  );
}
