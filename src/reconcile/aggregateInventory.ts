import { classifyBrand } from "../brands/classifyBrand";
import { aggregateTable, columnText, type SourceAggregateOptions } from "./aggregateTable";
import { resolveColumns } from "./columns";
import {
  UNMAPPED_BRAND,
  type InventoryAggregate,
  type RawTable,
  type SourceAggregation,
} from "./types";

export const SELLABLE_CONDITION = "SELLABLE";
export const INVENTORY_PLACEHOLDER_ID = "UNIDENTIFIED-INVENTORY";

export function isSellable(value: unknown): boolean {
  return String(value ?? "").trim().toUpperCase() === SELLABLE_CONDITION;
}

/**
 * Sellable stock per ASIN. Rows in any other condition keep their ASIN in the
 * output (with zero stock) but add no units, SKUs or brand hints.
 */
export function aggregateInventory(
  table: RawTable,
  options: SourceAggregateOptions = {}
): SourceAggregation<InventoryAggregate> {
  const columns = resolveColumns("inventory", table.headers);
  const idColumn = columns.productId ?? "";
  const conditionColumn = columns.conditionCode ?? "";
  const skuColumn = columns.sku;

  const result = aggregateTable(table, {
    idColumn,
    numericColumns: [{ field: "stock", column: columns.quantity }],
    textColumns: [{ field: "skus", column: skuColumn }],
    contributes: (row) => isSellable(row[conditionColumn]),
    brandHint: skuColumn
      ? (row) => classifyBrand([columnText(row, skuColumn)], options.brandRules)
      : undefined,
    placeholderId: INVENTORY_PLACEHOLDER_ID,
    numberOptions: options.numberOptions,
  });

  const groups = new Map<string, InventoryAggregate>();
  for (const [productId, group] of result.groups) {
    groups.set(productId, {
      productId,
      stock: group.sums.get("stock") ?? 0,
      brandHint: group.brandHints[0] ?? UNMAPPED_BRAND,
      brandHints: group.brandHints,
      skus: group.texts.get("skus") ?? [],
    });
  }

  return { groups, columns, droppedRows: result.droppedRows };
}
