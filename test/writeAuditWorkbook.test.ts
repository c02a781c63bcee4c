import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";
import { describe, expect, it } from "vitest";
import {
  auditWorkbookBuffer,
  buildAuditWorkbook,
  toSheetName,
  writeAuditWorkbook,
} from "../src/export/writeAuditWorkbook";
import { reconcileTables } from "../src/reconcile/runReconciliation";
import { sampleTables } from "./utils/reportFixtures";

describe("toSheetName", () => {
  it("truncates to the 31 character limit", () => {
    expect(toSheetName("A very long brand name that exceeds the limit")).toBe(
      "A very long brand name that exc"
    );
    expect(toSheetName("Maison de l’Avenir")).toBe("Maison de l’Avenir");
  });

  it("removes characters Excel rejects", () => {
    expect(toSheetName("Brand: A/B [x]")).toBe("Brand AB x");
    expect(toSheetName("???")).toBe("Sheet");
  });

  it("de-duplicates against names already used", () => {
    expect(toSheetName("audit", new Set(["Audit"]))).toBe("audit (2)");
    expect(toSheetName("x".repeat(40), new Set(["x".repeat(31)]))).toBe(`${"x".repeat(27)} (2)`);
  });
});

describe("buildAuditWorkbook", () => {
  const result = reconcileTables(sampleTables());

  it("adds the audit, summary and per-brand sheets that have rows", () => {
    const workbook = buildAuditWorkbook(result);
    expect(workbook.SheetNames).toEqual([
      "Audit",
      "Brand Summary",
      "Maison de l’Avenir",
      "Creation Lamis",
      "Paris Collection",
      "CP Trendies",
      "Unmapped",
    ]);
  });

  it("writes the full table sorted by business sales", () => {
    const workbook = buildAuditWorkbook(result);
    const sheet = workbook.Sheets.Audit;
    expect(sheet).toBeDefined();
    if (!sheet) return;
    const rows = XLSX.utils.sheet_to_json<(string | number)[]>(sheet, { header: 1 });
    expect(rows[0]?.slice(0, 7)).toEqual([
      "ASIN",
      "Brand",
      "Item Name",
      "Stock",
      "Business Sales",
      "Ad Sales",
      "Ad Spend",
    ]);
    expect(rows[1]?.slice(0, 7)).toEqual([
      "B0DGLJHCJJ",
      "Maison de l’Avenir",
      "Oud Opulence",
      12,
      2000,
      500,
      100,
    ]);
    expect(rows).toHaveLength(6);
  });

  it("writes a readable file", () => {
    const outPath = path.resolve(__dirname, "tmp", `audit-${Date.now()}`, "audit.xlsx");
    writeAuditWorkbook(result, outPath);
    expect(fs.existsSync(outPath)).toBe(true);
    const reread = XLSX.readFile(outPath);
    expect(reread.SheetNames[1]).toBe("Brand Summary");
  });

  it("serializes to a buffer", () => {
    const buffer = auditWorkbookBuffer(result);
    expect(buffer.length).toBeGreaterThan(0);
    expect(XLSX.read(buffer, { type: "buffer" }).SheetNames[0]).toBe("Audit");
  });
});
