import { describe, expect, it } from "vitest";
import * as XLSX from "xlsx";
import { loadSupplementaryTable, matrixToTable } from "@/lib/supplementary";
import { fakeFile } from "@/test/fakeFile";

function workbookBytes(rows: unknown[][]): ArrayBuffer {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), "Items");
  const out: unknown = XLSX.write(workbook, { type: "array", bookType: "xlsx" });
  if (!(out instanceof ArrayBuffer)) throw new Error("expected an ArrayBuffer");
  return out;
}

describe("matrixToTable", () => {
  it("uses the first non-blank row as the header", () => {
    expect(
      matrixToTable([
        ["", ""],
        ["Item", "Qty"],
        ["Milk", 12],
        [null, ""],
        ["Bread", 4],
      ])
    ).toEqual({
      columns: ["Item", "Qty"],
      rows: [
        { Item: "Milk", Qty: "12" },
        { Item: "Bread", Qty: "4" },
      ],
    });
  });

  it("names blank and repeated header cells", () => {
    expect(matrixToTable([["Item", "", "Item"], ["a", "b", "c"]])).toEqual({
      columns: ["Item", "Column 2", "Item (2)"],
      rows: [{ Item: "a", "Column 2": "b", "Item (2)": "c" }],
    });
  });

  it("widens the header to the longest row", () => {
    expect(matrixToTable([["A", "B"], ["1", "2", "3"]])).toEqual({
      columns: ["A", "B", "Column 3"],
      rows: [{ A: "1", B: "2", "Column 3": "3" }],
    });
  });

  it("returns null when every row is blank", () => {
    expect(matrixToTable([[""], []])).toBeNull();
  });
});

describe("loadSupplementaryTable", () => {
  it("returns null without a file", async () => {
    expect(await loadSupplementaryTable(null)).toBeNull();
  });

  it("reads a CSV file", async () => {
    const result = await loadSupplementaryTable(
      fakeFile("short-supply.csv", "Item,Value\nParmesan,120000\nMozzarella,80000\n")
    );
    expect(result).toEqual({
      status: "loaded",
      fileName: "short-supply.csv",
      table: {
        columns: ["Item", "Value"],
        rows: [
          { Item: "Parmesan", Value: "120000" },
          { Item: "Mozzarella", Value: "80000" },
        ],
      },
    });
  });

  it("reads a single-column CSV file", async () => {
    const result = await loadSupplementaryTable(fakeFile("items.csv", "Item\nRicotta\n"));
    expect(result).toEqual({
      status: "loaded",
      fileName: "items.csv",
      table: { columns: ["Item"], rows: [{ Item: "Ricotta" }] },
    });
  });

  it("reads a CSV file with a very large number of rows", async () => {
    const lines = Array.from({ length: 200000 }, (_, i) => `Item ${i + 1},${i}`);
    const result = await loadSupplementaryTable(
      fakeFile("big.csv", `Item,Qty\n${lines.join("\n")}\n`)
    );
    expect(result?.status).toBe("loaded");
    if (result?.status !== "loaded") return;
    expect(result.table.columns).toEqual(["Item", "Qty"]);
    expect(result.table.rows).toHaveLength(200000);
    expect(result.table.rows[199999]).toEqual({ Item: "Item 200000", Qty: "199999" });
  });

  it("matches the extension case-insensitively", async () => {
    const result = await loadSupplementaryTable(fakeFile("RETURNS.CSV", "Item\nFeta\n"));
    expect(result?.status).toBe("loaded");
  });

  it("reads the first sheet of an .xlsx workbook", async () => {
    const bytes = workbookBytes([
      ["Item", "Returned"],
      ["Gouda", 15],
      ["Brie", 7],
    ]);
    const result = await loadSupplementaryTable(fakeFile("returns.xlsx", bytes));
    expect(result).toEqual({
      status: "loaded",
      fileName: "returns.xlsx",
      table: {
        columns: ["Item", "Returned"],
        rows: [
          { Item: "Gouda", Returned: "15" },
          { Item: "Brie", Returned: "7" },
        ],
      },
    });
  });

  it("fails on an unsupported extension", async () => {
    expect(await loadSupplementaryTable(fakeFile("notes.txt", "hello"))).toEqual({
      status: "failed",
      fileName: "notes.txt",
      message: 'Unsupported file type for "notes.txt". Upload an .xlsx, .xls or .csv file.',
    });
  });

  it("fails on a file without an extension", async () => {
    const result = await loadSupplementaryTable(fakeFile("README", "hello"));
    expect(result?.status).toBe("failed");
  });

  it("fails on a workbook with the wrong signature", async () => {
    expect(await loadSupplementaryTable(fakeFile("broken.xlsx", "not a workbook"))).toEqual({
      status: "failed",
      fileName: "broken.xlsx",
      message: '"broken.xlsx" is not a valid Excel workbook.',
    });
  });

  it("fails on an .xls file that is not an OLE document", async () => {
    const result = await loadSupplementaryTable(fakeFile("legacy.xls", workbookBytes([["A"]])));
    expect(result).toEqual({
      status: "failed",
      fileName: "legacy.xls",
      message: '"legacy.xls" is not a valid Excel workbook.',
    });
  });

  it("fails on an empty CSV file", async () => {
    expect(await loadSupplementaryTable(fakeFile("empty.csv", "\n\n"))).toEqual({
      status: "failed",
      fileName: "empty.csv",
      message: '"empty.csv" does not contain a header row.',
    });
  });

  it("fails on malformed CSV quoting", async () => {
    const result = await loadSupplementaryTable(fakeFile("bad.csv", 'Item,Value\n"Parmesan,12\n'));
    expect(result?.status).toBe("failed");
    if (result?.status !== "failed") return;
    expect(result.message).toMatch(/^Could not read "bad\.csv": /);
  });

  it("reports a failed read of the file bytes", async () => {
    const result = await loadSupplementaryTable({
      name: "returns.csv",
      arrayBuffer: () => Promise.reject(new Error("disk unavailable")),
    });
    expect(result).toEqual({
      status: "failed",
      fileName: "returns.csv",
      message: 'Could not read "returns.csv": disk unavailable',
    });
  });
});
