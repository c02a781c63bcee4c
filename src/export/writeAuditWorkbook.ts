import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";
import type { ReconciliationOutput } from "../reconcile/runReconciliation";
import { UNMAPPED_BRAND, type BrandSummaryRow, type ProductRow } from "../reconcile/types";
import { filterByBrand } from "../reconcile/views";

export const SHEET_NAME_MAX_LENGTH = 31;
export const AUDIT_SHEET = "Audit";
export const SUMMARY_SHEET = "Brand Summary";
export const DEFAULT_WORKBOOK_NAME = "Amazon_Performance_Master.xlsx";

type Cell = string | number;

const PRODUCT_COLUMNS: [string, (row: ProductRow) => Cell][] = [
  ["ASIN", (row) => row.product_id],
  ["Brand", (row) => row.brand],
  ["Item Name", (row) => row.display_name],
  ["Stock", (row) => row.stock_quantity],
  ["Business Sales", (row) => row.gross_sales],
  ["Ad Sales", (row) => row.ad_sales],
  ["Ad Spend", (row) => row.ad_spend],
  ["Organic Sales", (row) => row.organic_sales],
  ["ACOS", (row) => row.acos],
  ["TACOS", (row) => row.tacos],
  ["ROAS", (row) => row.roas],
  ["Ad Contribution", (row) => row.ad_contribution],
  ["Impressions", (row) => row.impressions],
  ["Clicks", (row) => row.clicks],
  ["CTR", (row) => row.ctr],
  ["Orders", (row) => row.orders],
  ["CVR", (row) => row.cvr],
  ["Units Ordered", (row) => row.units_ordered],
  ["Sessions", (row) => row.sessions],
  ["Unit Session %", (row) => row.unit_session_rate],
  ["DRR", (row) => row.drr],
  ["Campaigns", (row) => row.campaigns.join(" | ")],
  ["SKUs", (row) => row.skus.join(" | ")],
  ["Sources", (row) => row.sources.join(", ")],
];

const SUMMARY_COLUMNS: [string, (row: BrandSummaryRow) => Cell][] = [
  ["Brand", (row) => row.brand],
  ["Products", (row) => row.product_count],
  ["Stock", (row) => row.stock_quantity],
  ["Business Sales", (row) => row.gross_sales],
  ["Ad Sales", (row) => row.ad_sales],
  ["Ad Spend", (row) => row.ad_spend],
  ["Organic Sales", (row) => row.organic_sales],
  ["ACOS", (row) => row.acos],
  ["TACOS", (row) => row.tacos],
  ["ROAS", (row) => row.roas],
  ["Ad Contribution", (row) => row.ad_contribution],
  ["CTR", (row) => row.ctr],
  ["CVR", (row) => row.cvr],
  ["DRR", (row) => row.drr],
];

function toMatrix<T>(columns: [string, (row: T) => Cell][], rows: readonly T[]): Cell[][] {
  return [columns.map(([header]) => header), ...rows.map((row) => columns.map(([, get]) => get(row)))];
}

/**
 * Excel sheet names: no \ / ? * [ ] :, at most 31 characters, unique
 * case-insensitively within the workbook.
 */
export function toSheetName(name: string, taken: ReadonlySet<string> = new Set()): string {
  const base =
    name
      .replace(/[\\/?*[\]:]/g, "")
      .trim()
      .slice(0, SHEET_NAME_MAX_LENGTH)
      .trim() || "Sheet";
  const lowerTaken = new Set(Array.from(taken, (entry) => entry.toLowerCase()));
  if (!lowerTaken.has(base.toLowerCase())) return base;
  for (let n = 2; ; n += 1) {
    const suffix = ` (${n})`;
    const candidate = `${base.slice(0, SHEET_NAME_MAX_LENGTH - suffix.length).trim()}${suffix}`;
    if (!lowerTaken.has(candidate.toLowerCase())) return candidate;
  }
}

export function buildAuditWorkbook(result: ReconciliationOutput): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  const taken = new Set<string>();

  const append = (name: string, matrix: Cell[][]) => {
    const sheetName = toSheetName(name, taken);
    taken.add(sheetName);
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(matrix), sheetName);
  };

  append(AUDIT_SHEET, toMatrix(PRODUCT_COLUMNS, result.records));
  append(SUMMARY_SHEET, toMatrix(SUMMARY_COLUMNS, result.brandSummary));

  for (const brand of [...result.brands, UNMAPPED_BRAND]) {
    const rows = filterByBrand(result.records, brand);
    if (!rows.length) continue;
    append(brand, toMatrix(PRODUCT_COLUMNS, rows));
  }

  return workbook;
}

export function writeAuditWorkbook(result: ReconciliationOutput, outPath: string): string {
  const dir = path.dirname(outPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  XLSX.writeFile(buildAuditWorkbook(result), outPath);
  return outPath;
}

export function auditWorkbookBuffer(result: ReconciliationOutput): Buffer {
  const data: unknown = XLSX.write(buildAuditWorkbook(result), { type: "buffer", bookType: "xlsx" });
  if (!Buffer.isBuffer(data)) {
    throw new Error("xlsx did not return a buffer");
  }
  return data;
}
