import Link from "next/link";

export default function NotFound() {
  return (
    <main className="shell">
      <section className="card">
        <h1>Pagina niet gevonden</h1>
        <p className="small">Deze pagina bestaat niet.</p>
        <div className="toolbar" style={{ marginTop: "0.75rem" }}>
          <Link className="btn primary" href="/">
            Naar het overzicht
          </Link>
        </div>
      </section>
    </main>
  );
}
