"use client";

function exportHref(format: "csv" | "xlsx" | "pdf", coach: string) {
  const params = new URLSearchParams({ format });
  if (coach) params.set("coach", coach);
  return `/api/export?${params.toString()}`;
}

export function ExportPanel({
  coach,
  pdfDisabled,
  disabled
}: {
  coach: string;
  pdfDisabled: boolean;
  disabled: boolean;
}) {
  return (
    <section className="card" aria-labelledby="export-heading">
      <div className="toolbar spread">
        <h2 id="export-heading">Export</h2>
        {disabled ? (
          <span className="small">Nog niets te exporteren</span>
        ) : (
          <div className="toolbar">
            <a className="btn primary" href={exportHref("csv", coach)}>
              CSV
            </a>
            <a className="btn" href={exportHref("xlsx", coach)}>
              Excel
            </a>
            {!pdfDisabled ? (
              <a className="btn" href={exportHref("pdf", coach)}>
                PDF
              </a>
            ) : null}
          </div>
        )}
      </div>
      {coach && !disabled ? <p className="small">Alleen studenten van coach {coach}.</p> : null}
      {pdfDisabled ? <div className="muted-box">PDF export is uitgeschakeld. CSV en Excel blijven beschikbaar.</div> : null}
    </section>
  );
}
