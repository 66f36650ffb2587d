import { describe, expect, it } from "vitest";
import { ColumnNotFoundError } from "./errors";
import { emptyLedger } from "./ledger";
import type { RawTable } from "./types";
import { processUpload, resolveEpisodeSource } from "./upload";

const DAILY_TOTALS: RawTable = {
  headers: ["Naam", "Ma", "Di", "Wo"],
  rows: [
    ["Ana", "2:00", "1,5", null],
    ["Ben", "0:45", null, "1"]
  ]
};

describe("resolveEpisodeSource", () => {
  it("reads every block column in the elapsed flavor", () => {
    const source = resolveEpisodeSource(DAILY_TOTALS, { nameColumn: "Naam", layout: { kind: "block", startIndex: 1, endIndex: 3 }, flavor: "elapsed" });
    expect(source).toEqual({ flavor: "elapsed", columns: [1, 2, 3] });
  });

  it("drops the unpaired last block column in the instant flavor", () => {
    const source = resolveEpisodeSource(DAILY_TOTALS, { nameColumn: "Naam", layout: { kind: "block", startIndex: 1, endIndex: 3 }, flavor: "instant" });
    expect(source).toEqual({ flavor: "instant", pairs: [{ inCol: 1, outCol: 2 }] });
  });
});

describe("processUpload", () => {
  it("aggregates, formats and merges one week", () => {
    const result = processUpload(
      DAILY_TOTALS,
      { nameColumn: "Naam", layout: { kind: "block", startIndex: 1, endIndex: 3 }, flavor: "elapsed" },
      emptyLedger(),
      "W03-2025"
    );
    expect(result.weekRows).toEqual([
      { name: "Ana", hhmm: "3:30" },
      { name: "Ben", hhmm: "1:45" }
    ]);
    expect(result.ledger.weeks).toEqual(["W03-2025"]);
    expect(result.ledger.rows[1]).toEqual({ name: "Ben", coach: "", hours: { "W03-2025": "1:45" } });
  });

  it("keeps totals finite when huge cells add up past the float range", () => {
    const table: RawTable = { headers: ["Naam", "Ma", "Di", "Wo"], rows: [["Ana", "1e306", "1e306", "1e306"]] };
    const result = processUpload(
      table,
      { nameColumn: "Naam", layout: { kind: "block", startIndex: 1, endIndex: 3 }, flavor: "elapsed" },
      emptyLedger(),
      "W07-2025"
    );
    expect(result.students).toEqual([{ name: "Ana", minutes: 0 }]);
    expect(result.ledger.rows[0].hours).toEqual({ "W07-2025": "0:00" });
  });

  it("checks the name column before anything else", () => {
    expect(() =>
      processUpload(DAILY_TOTALS, { nameColumn: "Student", layout: { kind: "named" }, flavor: "instant" }, emptyLedger(), "W03-2025")
    ).toThrow(ColumnNotFoundError);
  });
});
