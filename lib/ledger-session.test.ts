import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { InsufficientColumnsError, PersistenceError } from "./errors";
import { emptyLedger } from "./ledger";
import { LedgerSession } from "./ledger-session";
import { createLedgerStore, type LedgerStore } from "./store";
import type { RawTable, UploadOptions } from "./types";

const ONETAP: UploadOptions = {
  nameColumn: "Naam",
  layout: { kind: "header-match", inHeader: "Check In Time", outHeader: "Check Out Time" },
  flavor: "instant"
};

const WEEK_7 = new Date("2025-02-12T10:00:00Z");
const WEEK_8 = new Date("2025-02-19T10:00:00Z");

function onetapExport(rows: Array<[string, string, string]>): RawTable {
  return { headers: ["Naam", "Check In Time", "Check Out Time"], rows };
}

let dir: string;
let filePath: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), "weekuren-session-"));
  filePath = path.join(dir, "weekuren_cumulatief.csv");
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function newSession() {
  return new LedgerSession(createLedgerStore(filePath), "Europe/Amsterdam");
}

describe("LedgerSession", () => {
  it("labels an upload with the current week and persists it", async () => {
    const result = await newSession().applyUpload(onetapExport([["Ana", "09:00", "17:30"]]), ONETAP, WEEK_7);

    expect(result.persisted).toBe(true);
    expect(result.weekLabel).toBe("W07-2025");
    expect(result.students).toEqual([{ name: "Ana", minutes: 510 }]);
    expect(await readFile(filePath, "utf8")).toBe("Naam,Coach,W07-2025\nAna,,8:30");
  });

  it("reloads the ledger in a new process", async () => {
    await newSession().applyUpload(onetapExport([["Ana", "09:00", "17:30"]]), ONETAP, WEEK_7);
    const ledger = await newSession().current();
    expect(ledger).toEqual({ weeks: ["W07-2025"], rows: [{ name: "Ana", coach: "", hours: { "W07-2025": "8:30" } }] });
  });

  it("keeps a coach across later weeks", async () => {
    const session = newSession();
    await session.applyUpload(onetapExport([["Ana", "09:00", "17:30"]]), ONETAP, WEEK_7);
    await session.updateCoach("Ana", "Joost");
    const result = await session.applyUpload(onetapExport([["Ana", "10:00", "12:00"], ["Ben", "08:00", "16:00"]]), ONETAP, WEEK_8);

    expect(result.ledger.rows).toEqual([
      { name: "Ana", coach: "Joost", hours: { "W07-2025": "8:30", "W08-2025": "2:00" } },
      { name: "Ben", coach: "", hours: { "W08-2025": "8:00" } }
    ]);
    expect(await readFile(filePath, "utf8")).toBe("Naam,Coach,W07-2025,W08-2025\nAna,Joost,8:30,2:00\nBen,,,8:00");
  });

  it("overwrites a week uploaded twice", async () => {
    const session = newSession();
    await session.applyUpload(onetapExport([["Ana", "09:00", "10:00"]]), ONETAP, WEEK_7);
    const result = await session.applyUpload(onetapExport([["Ana", "09:00", "11:00"]]), ONETAP, WEEK_7);
    expect(result.ledger).toEqual({ weeks: ["W07-2025"], rows: [{ name: "Ana", coach: "", hours: { "W07-2025": "2:00" } }] });
  });

  it("leaves ledger and file untouched when the layout needs more columns", async () => {
    const session = newSession();
    await session.applyUpload(onetapExport([["Ana", "09:00", "17:30"]]), ONETAP, WEEK_7);
    const before = await readFile(filePath, "utf8");

    const headers = ["Naam", ...Array.from({ length: 29 }, (_, i) => `Kolom ${i + 2}`)];
    const wide: RawTable = { headers, rows: [headers.map((_, i) => (i === 0 ? "Ben" : "09:00"))] };
    const options: UploadOptions = { nameColumn: "Naam", layout: { kind: "fixed", pairs: [[29, 30]] }, flavor: "instant" };

    await expect(session.applyUpload(wide, options, WEEK_8)).rejects.toBeInstanceOf(InsufficientColumnsError);
    expect((await session.current()).rows.map((row) => row.name)).toEqual(["Ana"]);
    expect(await readFile(filePath, "utf8")).toBe(before);
  });

  it("reports a failed flush and keeps the merged ledger in memory", async () => {
    const failing: LedgerStore = {
      filePath: "unwritable.csv",
      read: async () => emptyLedger(),
      write: async () => {
        throw new PersistenceError("disk full");
      },
      remove: async () => undefined
    };
    const session = new LedgerSession(failing, "Europe/Amsterdam");
    const result = await session.applyUpload(onetapExport([["Ana", "09:00", "17:30"]]), ONETAP, WEEK_7);

    expect(result.persisted).toBe(false);
    expect(result.persistError).toBe("disk full");
    expect((await session.current()).rows).toEqual([{ name: "Ana", coach: "", hours: { "W07-2025": "8:30" } }]);
  });

  it("resets to an empty ledger and deletes the file", async () => {
    const session = newSession();
    await session.applyUpload(onetapExport([["Ana", "09:00", "17:30"]]), ONETAP, WEEK_7);
    const result = await session.reset();

    expect(result).toEqual({ persisted: true, ledger: emptyLedger() });
    await expect(readFile(filePath, "utf8")).rejects.toThrow();
    expect(await newSession().current()).toEqual(emptyLedger());
  });
});
