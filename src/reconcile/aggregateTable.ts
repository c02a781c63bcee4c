import { normalizeNumber, type NormalizeNumberOptions } from "./normalizeNumber";
import { UNMAPPED_BRAND, type BrandRule, type CellValue, type RawTable } from "./types";

export type SourceAggregateOptions = {
  numberOptions?: NormalizeNumberOptions;
  brandRules?: readonly BrandRule[];
};

export type AggregateSpec<N extends string, T extends string> = {
  idColumn: string;
  numericColumns: { field: N; column: string | undefined }[];
  textColumns: { field: T; column: string | undefined }[];
  /** Rows failing this keep their identifier in the output but add nothing to it. */
  contributes?: (row: Record<string, CellValue>) => boolean;
  brandHint?: (row: Record<string, CellValue>) => string;
  placeholderId: string;
  numberOptions?: NormalizeNumberOptions;
};

export type AggregateGroup<N extends string, T extends string> = {
  productId: string;
  sums: Map<N, number>;
  /** Distinct non-empty values in first-seen order; the first entry is the "first" reduction. */
  texts: Map<T, string[]>;
  brandHints: string[];
  rowCount: number;
};

export type AggregateResult<N extends string, T extends string> = {
  groups: Map<string, AggregateGroup<N, T>>;
  droppedRows: number;
};

export function normalizeProductId(value: CellValue | undefined): string {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) return "";
  return String(value).trim().toUpperCase();
}

export function cellText(value: CellValue | undefined): string {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) return value.toISOString();
  return String(value).trim();
}

export function columnText(row: Record<string, CellValue>, column: string | undefined): string {
  return column === undefined ? "" : cellText(row[column]);
}

function pushDistinct(list: string[], value: string) {
  if (value && !list.includes(value)) list.push(value);
}

function newGroup<N extends string, T extends string>(
  productId: string,
  spec: AggregateSpec<N, T>
): AggregateGroup<N, T> {
  const sums = new Map<N, number>();
  for (const { field } of spec.numericColumns) sums.set(field, 0);
  const texts = new Map<T, string[]>();
  for (const { field } of spec.textColumns) texts.set(field, []);
  return { productId, sums, texts, brandHints: [], rowCount: 0 };
}

/**
 * Reduces a raw report to one group per product identifier: numeric columns
 * are summed, text columns collected. Grouping by a Map key makes each
 * identifier appear exactly once.
 *
 * Rows without an identifier are kept under `placeholderId` when they carry a
 * non-zero number or a mapped brand hint, otherwise they are dropped.
 */
export function aggregateTable<N extends string, T extends string>(
  table: RawTable,
  spec: AggregateSpec<N, T>
): AggregateResult<N, T> {
  const groups = new Map<string, AggregateGroup<N, T>>();
  let droppedRows = 0;

  for (const row of table.rows) {
    const contributes = spec.contributes ? spec.contributes(row) : true;

    const values = spec.numericColumns.map(({ field, column }) => ({
      field,
      value:
        contributes && column !== undefined
          ? normalizeNumber(row[column], spec.numberOptions)
          : 0,
    }));
    const hint = contributes && spec.brandHint ? spec.brandHint(row) : UNMAPPED_BRAND;

    let productId = normalizeProductId(row[spec.idColumn]);
    if (!productId) {
      const hasSignal = values.some(({ value }) => value !== 0) || hint !== UNMAPPED_BRAND;
      if (!contributes || !hasSignal) {
        droppedRows += 1;
        continue;
      }
      productId = spec.placeholderId;
    }

    const group = groups.get(productId) ?? newGroup(productId, spec);
    groups.set(productId, group);
    if (!contributes) continue;

    group.rowCount += 1;
    for (const { field, value } of values) {
      group.sums.set(field, (group.sums.get(field) ?? 0) + value);
    }
    for (const { field, column } of spec.textColumns) {
      if (column === undefined) continue;
      const list = group.texts.get(field) ?? [];
      pushDistinct(list, cellText(row[column]));
      group.texts.set(field, list);
    }
    if (hint !== UNMAPPED_BRAND) pushDistinct(group.brandHints, hint);
  }

  return { groups, droppedRows };
}

export function firstText<N extends string, T extends string>(
  group: AggregateGroup<N, T>,
  field: T
): string | null {
  return group.texts.get(field)?.[0] ?? null;
}
