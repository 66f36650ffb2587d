"use client";

import { useState } from "react";
import type { Ledger } from "@/lib/types";

export function ResetButton({ onReset, disabled }: { onReset: (ledger: Ledger) => void; disabled: boolean }) {
  const [busy, setBusy] = useState(false);
  const [status, setStatus] = useState("");

  async function reset() {
    if (!window.confirm("De cumulatieve tabel wordt volledig gewist. Doorgaan?")) return;
    setBusy(true);
    setStatus("");
    try {
      const res = await fetch("/api/ledger", { method: "DELETE" });
      const data = (await res.json()) as { error?: string; ledger?: Ledger; persistError?: string };
      if (!res.ok || !data.ledger) throw new Error(data.error || "Reset mislukt");
      onReset(data.ledger);
      setStatus(data.persistError ? `Gereset, maar: ${data.persistError}` : "Cumulatieve tabel is gereset.");
    } catch (e) {
      setStatus(e instanceof Error ? e.message : "Reset mislukt");
    } finally {
      setBusy(false);
    }
  }

  return (
    <section className="card">
      <div className="toolbar spread">
        <h2>Reset</h2>
        <button type="button" className="btn danger" onClick={reset} disabled={busy || disabled}>
          {busy ? "Bezig..." : "Reset tabel"}
        </button>
      </div>
      {status ? <p className="status-text">{status}</p> : null}
    </section>
  );
}
