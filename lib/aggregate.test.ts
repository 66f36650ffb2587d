import { describe, expect, it } from "vitest";
import { aggregate, episodeMinutes, summarizeWeek } from "./aggregate";
import { ColumnNotFoundError } from "./errors";
import { formatMinutes } from "./hhmm";
import type { CellValue, EpisodeSource, RawTable } from "./types";

const ONE_PAIR: EpisodeSource = { flavor: "instant", pairs: [{ inCol: 1, outCol: 2 }] };

function attendance(rows: CellValue[][]): RawTable {
  return { headers: ["Naam", "Check in", "Check out"], rows };
}

describe("episodeMinutes", () => {
  it("counts only when both instants parse and out is after in", () => {
    expect(episodeMinutes("09:00", "17:30")).toBe(510);
    expect(episodeMinutes("09:00", null)).toBe(0);
    expect(episodeMinutes("17:00", "09:00")).toBe(0);
    expect(episodeMinutes("09:00", "09:00")).toBe(0);
    expect(episodeMinutes("later", "17:00")).toBe(0);
  });
});

describe("aggregate", () => {
  it("turns a 09:00-17:30 episode into 8:30", () => {
    const result = aggregate(attendance([["Ana", "09:00", "17:30"]]), "Naam", ONE_PAIR);
    expect(result).toEqual([{ name: "Ana", minutes: 510 }]);
    expect(formatMinutes(result[0].minutes)).toBe("8:30");
  });

  it("keeps a zero-minute record when the check-out is missing", () => {
    expect(aggregate(attendance([["Ben", "09:00", null]]), "Naam", ONE_PAIR)).toEqual([{ name: "Ben", minutes: 0 }]);
  });

  it("groups names after trimming", () => {
    const table = attendance([
      ["Ana", "09:00", "10:00"],
      ["Ana ", "11:00", "11:30"],
      ["Ben", "13:00", "14:00"]
    ]);
    expect(aggregate(table, "Naam", ONE_PAIR)).toEqual([
      { name: "Ana", minutes: 90 },
      { name: "Ben", minutes: 60 }
    ]);
  });

  it("skips rows without a name", () => {
    const table = attendance([
      ["", "09:00", "10:00"],
      [null, "09:00", "10:00"],
      ["   ", "09:00", "10:00"]
    ]);
    expect(aggregate(table, "Naam", ONE_PAIR)).toEqual([]);
  });

  it("sums several pairs per row", () => {
    const table: RawTable = {
      headers: ["Naam", "In 1", "Uit 1", "In 2", "Uit 2"],
      rows: [["Cas", "9:00AM", "12:00PM", "1:00PM", "3:15PM"]]
    };
    const source: EpisodeSource = {
      flavor: "instant",
      pairs: [
        { inCol: 1, outCol: 2 },
        { inCol: 3, outCol: 4 }
      ]
    };
    expect(aggregate(table, "Naam", source)).toEqual([{ name: "Cas", minutes: 315 }]);
  });

  it("reads workbook time cells as instants", () => {
    const table = attendance([["Dewi", new Date(Date.UTC(1899, 11, 30, 9, 0)), new Date(Date.UTC(1899, 11, 30, 17, 30))]]);
    expect(aggregate(table, 0, ONE_PAIR)).toEqual([{ name: "Dewi", minutes: 510 }]);
  });

  it("sums already-elapsed cells in the elapsed flavor", () => {
    const table: RawTable = {
      headers: ["Naam", "Ma", "Di", "Wo"],
      rows: [
        ["Ana", "1,5", "2:30", 1],
        ["Ben", null, "x", "0.25"]
      ]
    };
    expect(aggregate(table, "Naam", { flavor: "elapsed", columns: [1, 2, 3] })).toEqual([
      { name: "Ana", minutes: 300 },
      { name: "Ben", minutes: 15 }
    ]);
  });

  it("rejects an unknown name column", () => {
    expect(() => aggregate(attendance([]), "Student", ONE_PAIR)).toThrow(ColumnNotFoundError);
  });
});

describe("summarizeWeek", () => {
  it("adds clock text and the difference to the threshold", () => {
    expect(summarizeWeek([{ name: "Ana", minutes: 510 }], 16)).toEqual([
      { name: "Ana", minutes: 510, hours: 8.5, hhmm: "8:30", deltaMinutes: -450 }
    ]);
  });
});
