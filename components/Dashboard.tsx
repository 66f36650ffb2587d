"use client";

import { useMemo, useState } from "react";
import { filterByCoach, listCoaches } from "@/lib/ledger";
import type { Ledger } from "@/lib/types";
import { ExportPanel } from "./ExportPanel";
import { LedgerTable } from "./LedgerTable";
import { ResetButton } from "./ResetButton";
import { UploadPanel } from "./UploadPanel";

export function Dashboard({
  initialLedger,
  thresholdHours,
  pdfDisabled
}: {
  initialLedger: Ledger;
  thresholdHours: number;
  pdfDisabled: boolean;
}) {
  const [ledger, setLedger] = useState<Ledger>(initialLedger);
  const [coach, setCoach] = useState("");
  const coaches = useMemo(() => listCoaches(ledger), [ledger]);
  const visible = useMemo(() => filterByCoach(ledger, coach), [ledger, coach]);

  return (
    <section className="grid cols-2">
      <div className="grid" style={{ alignContent: "start" }}>
        <UploadPanel thresholdHours={thresholdHours} onLedgerChange={setLedger} />
        <ExportPanel coach={coach} pdfDisabled={pdfDisabled} disabled={ledger.rows.length === 0} />
        <ResetButton onReset={setLedger} disabled={ledger.rows.length === 0} />
      </div>

      <section className="card" aria-labelledby="overview-heading">
        <div className="toolbar spread">
          <h2 id="overview-heading">Overzicht per week</h2>
          <label className="toolbar small">
            Coach
            <select value={coach} onChange={(e) => setCoach(e.target.value)}>
              <option value="">Alle coaches</option>
              {coaches.map((c) => (
                <option key={c} value={c}>
                  {c}
                </option>
              ))}
            </select>
          </label>
        </div>

        {ledger.rows.length === 0 ? (
          <div className="muted-box" style={{ marginTop: "0.8rem" }}>
            Nog geen data. Upload een CSV om te starten.
          </div>
        ) : (
          <LedgerTable ledger={visible} thresholdHours={thresholdHours} onLedgerChange={setLedger} />
        )}

        <p className="small" style={{ marginTop: "0.6rem" }}>
          Groen = ≥ {thresholdHours} uur, rood = minder dan {thresholdHours} uur.
        </p>
      </section>
    </section>
  );
}
