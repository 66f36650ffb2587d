"use client";

import { useState } from "react";
import { describeWeekLabel } from "@/lib/calendar";
import { classifyHhmm } from "@/lib/hhmm";
import type { Ledger } from "@/lib/types";

type CoachResponse = {
  error?: string;
  ledger?: Ledger;
  persisted?: boolean;
  persistError?: string;
};

function CoachCell({
  name,
  coach,
  onSaved
}: {
  name: string;
  coach: string;
  onSaved: (ledger: Ledger, warning: string) => void;
}) {
  const [value, setValue] = useState(coach);
  const [saving, setSaving] = useState(false);
  const [error, setError] = useState("");

  async function save() {
    if (value.trim() === coach) return;
    setSaving(true);
    setError("");
    try {
      const res = await fetch("/api/ledger/coach", {
        method: "PUT",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ name, coach: value })
      });
      const data = (await res.json()) as CoachResponse;
      if (!res.ok || !data.ledger) throw new Error(data.error || "Opslaan mislukt");
      onSaved(data.ledger, data.persisted === false ? data.persistError ?? "Niet opgeslagen op schijf" : "");
    } catch (e) {
      setError(e instanceof Error ? e.message : "Opslaan mislukt");
    } finally {
      setSaving(false);
    }
  }

  return (
    <td>
      <input
        className="coach-input"
        value={value}
        disabled={saving}
        aria-label={`Coach van ${name}`}
        onChange={(e) => setValue(e.target.value)}
        onBlur={save}
        onKeyDown={(e) => {
          if (e.key === "Enter") e.currentTarget.blur();
        }}
      />
      {error ? <div className="small" style={{ color: "var(--danger)" }}>{error}</div> : null}
    </td>
  );
}

export function LedgerTable({
  ledger,
  thresholdHours,
  onLedgerChange
}: {
  ledger: Ledger;
  thresholdHours: number;
  onLedgerChange: (ledger: Ledger) => void;
}) {
  const [warning, setWarning] = useState("");

  return (
    <div className="table-wrap">
      {warning ? <div className="muted-box">{warning}</div> : null}
      <table className="ledger">
        <thead>
          <tr>
            <th>Naam</th>
            <th>Coach</th>
            {ledger.weeks.map((week) => (
              <th key={week} title={describeWeekLabel(week)}>
                {week}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {ledger.rows.map((row) => (
            <tr key={row.name}>
              <td>{row.name}</td>
              <CoachCell
                key={`${row.name}:${row.coach}`}
                name={row.name}
                coach={row.coach}
                onSaved={(next, message) => {
                  setWarning(message);
                  onLedgerChange(next);
                }}
              />
              {ledger.weeks.map((week) => {
                const value = row.hours[week] ?? "";
                const status = classifyHhmm(value, thresholdHours);
                return (
                  <td key={week} className={`hours${status ? ` cell-${status}` : ""}`}>
                    {value}
                  </td>
                );
              })}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
