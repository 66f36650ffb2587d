"use client";

import { startTransition, useState } from "react";
import { formatMinutes } from "@/lib/hhmm";
import type { LayoutDefinition, Ledger, StudentWeekSummary } from "@/lib/types";

type PreviewResponse = {
  error?: string;
  filename?: string;
  rowCount?: number;
  headers?: string[];
  rows?: Array<Array<string | number | null>>;
  defaults?: { start: string | null; end: string | null };
  layouts?: LayoutDefinition[];
};

type UploadResponse = {
  error?: string;
  weekLabel?: string;
  students?: StudentWeekSummary[];
  ledger?: Ledger;
  persisted?: boolean;
  persistError?: string;
};

type Preview = Required<Pick<PreviewResponse, "headers" | "rows" | "layouts" | "defaults">> & { rowCount: number };

function formatDelta(deltaMinutes: number) {
  return `${deltaMinutes < 0 ? "-" : "+"}${formatMinutes(Math.abs(deltaMinutes))}`;
}

export function UploadPanel({
  thresholdHours,
  onLedgerChange
}: {
  thresholdHours: number;
  onLedgerChange: (ledger: Ledger) => void;
}) {
  const [file, setFile] = useState<File | null>(null);
  const [preview, setPreview] = useState<Preview | null>(null);
  const [layoutId, setLayoutId] = useState("kolommen");
  const [nameColumn, setNameColumn] = useState("");
  const [startColumn, setStartColumn] = useState("");
  const [endColumn, setEndColumn] = useState("");
  const [loading, setLoading] = useState<"" | "preview" | "upload">("");
  const [error, setError] = useState("");
  const [result, setResult] = useState<UploadResponse | null>(null);

  async function loadPreview(next: File | null) {
    setFile(next);
    setPreview(null);
    setResult(null);
    setError("");
    if (!next) return;

    setLoading("preview");
    try {
      const form = new FormData();
      form.set("file", next);
      const res = await fetch("/api/upload/preview", { method: "POST", body: form });
      const data = (await res.json()) as PreviewResponse;
      if (!res.ok || !data.headers) throw new Error(data.error || "Bestand kon niet gelezen worden");

      const headers = data.headers;
      const defaults = data.defaults ?? { start: null, end: null };
      setPreview({
        headers,
        rows: data.rows ?? [],
        layouts: data.layouts ?? [],
        defaults,
        rowCount: data.rowCount ?? 0
      });
      setNameColumn(headers[0] ?? "");
      setStartColumn(defaults.start ?? headers[0] ?? "");
      setEndColumn(defaults.end ?? headers[0] ?? "");
    } catch (e) {
      setError(e instanceof Error ? e.message : "Bestand kon niet gelezen worden");
    } finally {
      setLoading("");
    }
  }

  async function submit() {
    if (!file || !preview) return;
    setLoading("upload");
    setError("");
    try {
      const form = new FormData();
      form.set("file", file);
      form.set("layout", layoutId);
      form.set("nameColumn", nameColumn);
      form.set("startColumn", startColumn);
      form.set("endColumn", endColumn);
      const res = await fetch("/api/upload", { method: "POST", body: form });
      const data = (await res.json()) as UploadResponse;
      if (!res.ok || !data.ledger) throw new Error(data.error || "Upload mislukt");
      const ledger = data.ledger;
      startTransition(() => {
        setResult(data);
        onLedgerChange(ledger);
      });
    } catch (e) {
      setError(e instanceof Error ? e.message : "Upload mislukt");
    } finally {
      setLoading("");
    }
  }

  const selectedLayout = preview?.layouts.find((layout) => layout.id === layoutId);
  const needsColumns = !selectedLayout || selectedLayout.mode.kind === "named";

  return (
    <section className="card" aria-labelledby="upload-heading">
      <h2 id="upload-heading">Upload</h2>
      <input
        type="file"
        accept=".csv,.txt,.xlsx"
        onChange={(e) => loadPreview(e.target.files?.[0] ?? null)}
        disabled={Boolean(loading)}
      />
      {loading === "preview" ? <p className="status-text">Bestand wordt gelezen...</p> : null}

      {preview ? (
        <div className="grid" style={{ marginTop: "0.8rem" }}>
          <div className="small">
            {preview.rowCount} rijen, eerste {preview.rows.length} getoond
          </div>
          <div className="table-wrap preview">
            <table className="ledger">
              <thead>
                <tr>
                  {preview.headers.map((header, idx) => (
                    <th key={`${header}-${idx}`}>{header}</th>
                  ))}
                </tr>
              </thead>
              <tbody>
                {preview.rows.map((row, rowIdx) => (
                  <tr key={rowIdx}>
                    {row.map((cell, colIdx) => (
                      <td key={colIdx}>{cell ?? ""}</td>
                    ))}
                  </tr>
                ))}
              </tbody>
            </table>
          </div>

          <label className="field">
            Indeling
            <select value={layoutId} onChange={(e) => setLayoutId(e.target.value)}>
              {preview.layouts.map((layout) => (
                <option key={layout.id} value={layout.id}>
                  {layout.label}
                </option>
              ))}
            </select>
          </label>

          <label className="field">
            Kolom met naam student
            <select value={nameColumn} onChange={(e) => setNameColumn(e.target.value)}>
              {preview.headers.map((header, idx) => (
                <option key={idx} value={header}>
                  {header}
                </option>
              ))}
            </select>
          </label>

          {needsColumns ? (
            <>
              <label className="field">
                Starttijd-kolom (check-in)
                <select value={startColumn} onChange={(e) => setStartColumn(e.target.value)}>
                  {preview.headers.map((header, idx) => (
                    <option key={idx} value={header}>
                      {header}
                    </option>
                  ))}
                </select>
              </label>
              <label className="field">
                Eindtijd-kolom (check-out)
                <select value={endColumn} onChange={(e) => setEndColumn(e.target.value)}>
                  {preview.headers.map((header, idx) => (
                    <option key={idx} value={header}>
                      {header}
                    </option>
                  ))}
                </select>
              </label>
            </>
          ) : null}

          <div className="toolbar">
            <button type="button" className="btn primary" onClick={submit} disabled={Boolean(loading)}>
              {loading === "upload" ? "Bezig..." : "Bereken weekuren"}
            </button>
          </div>
        </div>
      ) : null}

      {error ? <p className="status-text" style={{ color: "var(--danger)" }}>{error}</p> : null}

      {result?.students ? (
        <div className="export-results">
          <strong>Kolom voor {result.weekLabel} bijgewerkt.</strong>
          {result.persisted === false ? (
            <div className="muted-box">Let op: niet opgeslagen op schijf ({result.persistError}).</div>
          ) : null}
          <table className="ledger">
            <thead>
              <tr>
                <th>Naam</th>
                <th>Uren</th>
                <th>Verschil met {thresholdHours} uur</th>
              </tr>
            </thead>
            <tbody>
              {result.students.map((student) => (
                <tr key={student.name}>
                  <td>{student.name}</td>
                  <td className={`hours cell-${student.deltaMinutes >= 0 ? "met" : "below"}`}>{student.hhmm}</td>
                  <td className="hours">{formatDelta(student.deltaMinutes)}</td>
                </tr>
              ))}
            </tbody>
          </table>
        </div>
      ) : null}
    </section>
  );
}
