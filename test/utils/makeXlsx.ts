import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";

export const ADS_HEADER_ROW = [
  "Date",
  "Campaign Name",
  "Ad Group Name",
  "Advertised SKU",
  "Advertised ASIN",
  "Impressions",
  "Clicks",
  "Click-Thru Rate (CTR)",
  "Spend",
  "7 Day Total Sales ",
  "Total Advertising Cost of Sales (ACOS) ",
  "Total Return on Advertising Spend (ROAS)",
  "7 Day Total Orders (#)",
  "7 Day Advertised SKU Sales ",
];

export function makeXlsx(
  filePath: string,
  rows: (string | number | boolean | null)[][] = [],
  sheetName = "Sponsored Product Advertised P"
): void {
  const allRows = rows.length ? rows : [ADS_HEADER_ROW];

  const worksheet = XLSX.utils.aoa_to_sheet(allRows);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, worksheet, sheetName);

  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  XLSX.writeFile(workbook, filePath);
}

export function writeTextFixture(filePath: string, content: string): void {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(filePath, content);
}
