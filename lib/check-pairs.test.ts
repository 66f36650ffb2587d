import { describe, expect, it } from "vitest";
import { findDefaultColumns, resolveColumnIndex, resolveColumns, resolvePairs } from "./check-pairs";
import { ColumnNotFoundError, InsufficientColumnsError, InvalidLayoutError } from "./errors";
import type { RawTable } from "./types";

function tableWith(headers: string[]): RawTable {
  return { headers, rows: [] };
}

function columns(count: number): RawTable {
  return tableWith(Array.from({ length: count }, (_, i) => `Kolom ${i + 1}`));
}

describe("findDefaultColumns", () => {
  it("matches synonyms case-insensitively", () => {
    expect(findDefaultColumns(["naam", "Check-in time", " END "])).toEqual({ start: "Check-in time", end: " END " });
    expect(findDefaultColumns(["naam", "Begin", "Einde"])).toEqual({ start: null, end: "Einde" });
  });
});

describe("resolvePairs: named", () => {
  it("uses the synonym defaults", () => {
    const table = tableWith(["Name", "Check In Time", "Check Out Time"]);
    expect(resolvePairs(table, { kind: "named" })).toEqual([{ inCol: 1, outCol: 2 }]);
  });

  it("uses caller columns, matched exactly or case-insensitively", () => {
    const table = tableWith(["Naam", "Binnen", "Buiten"]);
    expect(resolvePairs(table, { kind: "named", start: "binnen", end: "Buiten" })).toEqual([{ inCol: 1, outCol: 2 }]);
  });

  it("rejects missing headers and single-column tables", () => {
    expect(() => resolvePairs(tableWith(["Naam", "Binnen", "Buiten"]), { kind: "named" })).toThrow(ColumnNotFoundError);
    expect(() => resolvePairs(tableWith(["Naam", "Start"]), { kind: "named", end: "Einde" })).toThrow(ColumnNotFoundError);
    expect(() => resolvePairs(tableWith(["Start"]), { kind: "named" })).toThrow(ColumnNotFoundError);
  });

  it("rejects start and end on the same column", () => {
    const table = tableWith(["Naam", "A", "B"]);
    expect(() => resolvePairs(table, { kind: "named", start: "A", end: "a" })).toThrow(ColumnNotFoundError);
  });
});

describe("resolvePairs: block", () => {
  it("pairs consecutive columns", () => {
    expect(resolvePairs(columns(8), { kind: "block", startIndex: 2, endIndex: 7 })).toEqual([
      { inCol: 2, outCol: 3 },
      { inCol: 4, outCol: 5 },
      { inCol: 6, outCol: 7 }
    ]);
  });

  it("drops a trailing unpaired column", () => {
    expect(resolvePairs(columns(8), { kind: "block", startIndex: 2, endIndex: 6 })).toEqual([
      { inCol: 2, outCol: 3 },
      { inCol: 4, outCol: 5 }
    ]);
  });

  it("rejects a 30-column upload when the layout reaches column 31", () => {
    let caught: unknown;
    try {
      resolvePairs(columns(30), { kind: "block", startIndex: 0, endIndex: 30 });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InsufficientColumnsError);
    expect(caught).toMatchObject({ required: 31, actual: 30, status: 422 });
  });

  it("rejects an inverted block", () => {
    expect(() => resolvePairs(columns(8), { kind: "block", startIndex: 5, endIndex: 3 })).toThrow(InvalidLayoutError);
  });
});

describe("resolvePairs: fixed", () => {
  it("uses the configured pairs verbatim", () => {
    const pairs: Array<[number, number]> = [
      [12, 14],
      [16, 18]
    ];
    expect(resolvePairs(columns(19), { kind: "fixed", pairs })).toEqual([
      { inCol: 12, outCol: 14 },
      { inCol: 16, outCol: 18 }
    ]);
    expect(() => resolvePairs(columns(18), { kind: "fixed", pairs })).toThrow(InsufficientColumnsError);
  });

  it("rejects pairs that reuse a column", () => {
    expect(() => resolvePairs(columns(5), { kind: "fixed", pairs: [[1, 1]] })).toThrow(InvalidLayoutError);
    expect(() =>
      resolvePairs(columns(5), {
        kind: "fixed",
        pairs: [
          [1, 2],
          [2, 3]
        ]
      })
    ).toThrow(InvalidLayoutError);
  });
});

describe("resolvePairs: header-match", () => {
  it("zips repeated check-in and check-out columns in order", () => {
    const table = tableWith([
      "Name",
      "Check In Time 1",
      "Check Out Time 1",
      "Check In Time 2",
      "Check Out Time 2",
      "Check In Time 3"
    ]);
    expect(resolvePairs(table, { kind: "header-match", inHeader: "check in time", outHeader: "Check Out Time" })).toEqual([
      { inCol: 1, outCol: 2 },
      { inCol: 3, outCol: 4 }
    ]);
  });

  it("fails when no column matches", () => {
    const table = tableWith(["Name", "Start", "End"]);
    expect(() => resolvePairs(table, { kind: "header-match", inHeader: "Check In Time", outHeader: "Check Out Time" })).toThrow(
      ColumnNotFoundError
    );
  });
});

describe("resolveColumns", () => {
  it("returns every column of a block, odd length included", () => {
    expect(resolveColumns(columns(6), { kind: "block", startIndex: 2, endIndex: 4 })).toEqual([2, 3, 4]);
  });

  it("flattens pairs for the other layouts", () => {
    expect(
      resolveColumns(columns(19), {
        kind: "fixed",
        pairs: [
          [12, 14],
          [16, 18]
        ]
      })
    ).toEqual([12, 14, 16, 18]);
  });
});

describe("resolveColumnIndex", () => {
  const table = tableWith(["Name", "In", "Out"]);

  it("accepts names and indexes", () => {
    expect(resolveColumnIndex(table, "Out")).toBe(2);
    expect(resolveColumnIndex(table, " name ")).toBe(0);
    expect(resolveColumnIndex(table, 1)).toBe(1);
  });

  it("rejects unknown columns", () => {
    expect(() => resolveColumnIndex(table, "Student")).toThrow(ColumnNotFoundError);
    expect(() => resolveColumnIndex(table, 5)).toThrow(InsufficientColumnsError);
  });
});
