import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";
import { ReportReadError } from "../reconcile/errors";
import type { CellValue, RawTable, ReportSource } from "../reconcile/types";

export type ReportFormat = "csv" | "tsv" | "workbook";

export type ReadReportOptions = {
  source: ReportSource;
  /** Needed for Buffer input to pick the format; ignored for paths. */
  fileName?: string;
};

const WORKBOOK_EXTENSIONS = new Set([".xlsx", ".xls", ".xlsm", ".xlsb"]);

export function detectReportFormat(fileName: string): ReportFormat | null {
  const ext = path.extname(fileName).toLowerCase();
  if (ext === ".csv") return "csv";
  if (ext === ".txt" || ext === ".tsv") return "tsv";
  if (WORKBOOK_EXTENSIONS.has(ext)) return "workbook";
  return null;
}

export function parseDelimited(content: string, delimiter: string): string[][] {
  const rows: string[][] = [];
  let current: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < content.length; i += 1) {
    const char = content[i];
    if (char === '"') {
      const next = content[i + 1];
      if (inQuotes && next === '"') {
        field += '"';
        i += 1;
      } else if (inQuotes || !field) {
        // a quote opens a field only at its start; mid-field quotes stay literal
        inQuotes = !inQuotes;
      } else {
        field += char;
      }
      continue;
    }

    if (char === delimiter && !inQuotes) {
      current.push(field);
      field = "";
      continue;
    }

    if ((char === "\n" || char === "\r") && !inQuotes) {
      if (char === "\r" && content[i + 1] === "\n") {
        i += 1;
      }
      current.push(field);
      field = "";
      if (current.length > 1 || current[0]?.trim()) {
        rows.push(current);
      }
      current = [];
      continue;
    }

    field += char;
  }

  if (field.length || current.length) {
    current.push(field);
    if (current.length > 1 || current[0]?.trim()) rows.push(current);
  }

  return rows;
}

function ensureWorksheetRef(ws: XLSX.WorkSheet) {
  const ref = ws["!ref"];
  if (!ref || ref === "A1") {
    let maxR = 0;
    let maxC = 0;

    for (const key of Object.keys(ws)) {
      if (key[0] === "!") continue;
      const addr = XLSX.utils.decode_cell(key);
      if (addr.r > maxR) maxR = addr.r;
      if (addr.c > maxC) maxC = addr.c;
    }

    ws["!ref"] = XLSX.utils.encode_range({ s: { r: 0, c: 0 }, e: { r: maxR, c: maxC } });
  }
}

function readWorkbookMatrix(data: Buffer): CellValue[][] {
  const workbook = XLSX.read(data, { type: "buffer", dense: true, cellDates: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) return [];
  ensureWorksheetRef(sheet);
  return XLSX.utils.sheet_to_json<CellValue[]>(sheet, {
    header: 1,
    raw: true,
    blankrows: false,
    defval: null,
  });
}

function uniqueHeaders(raw: CellValue[]): string[] {
  const seen = new Map<string, number>();
  return raw.map((value) => {
    const header = String(value ?? "")
      .replace(/^\uFEFF/, "")
      .trim();
    const count = seen.get(header) ?? 0;
    seen.set(header, count + 1);
    return count === 0 ? header : `${header}_${count}`;
  });
}

function isBlankCell(value: CellValue | undefined): boolean {
  return value === null || value === undefined || (typeof value === "string" && !value.trim());
}

export function matrixToTable(matrix: CellValue[][]): RawTable {
  if (!matrix.length) return { headers: [], rows: [] };
  const headers = uniqueHeaders(matrix[0] ?? []);
  const rows: Record<string, CellValue>[] = [];
  for (let i = 1; i < matrix.length; i += 1) {
    const cells = matrix[i] ?? [];
    if (cells.every((cell) => isBlankCell(cell))) continue;
    const row: Record<string, CellValue> = {};
    headers.forEach((header, index) => {
      row[header] = cells[index] ?? null;
    });
    rows.push(row);
  }
  return { headers, rows };
}

export function parseReportContent(data: Buffer, format: ReportFormat): RawTable {
  if (format === "workbook") return matrixToTable(readWorkbookMatrix(data));
  const content = data.toString("utf8");
  return matrixToTable(parseDelimited(content, format === "csv" ? "," : "\t"));
}

/**
 * Reads one report fully into memory. Any failure (missing file, unknown
 * extension, corrupt workbook) is fatal for the run.
 */
export function readReportTable(input: string | Buffer, options: ReadReportOptions): RawTable {
  const filePath = Buffer.isBuffer(input) ? null : input;
  const fileName = filePath ?? options.fileName ?? "";
  const format = detectReportFormat(fileName);
  if (!format) {
    throw new ReportReadError({
      source: options.source,
      path: filePath ?? options.fileName ?? null,
      cause: `unsupported file type "${path.extname(fileName) || fileName || "unknown"}"`,
    });
  }

  try {
    const data = Buffer.isBuffer(input) ? input : fs.readFileSync(input);
    return parseReportContent(data, format);
  } catch (err) {
    throw new ReportReadError({ source: options.source, path: filePath, cause: err });
  }
}
