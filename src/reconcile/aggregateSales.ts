import { classifyBrand } from "../brands/classifyBrand";
import {
  aggregateTable,
  columnText,
  firstText,
  type SourceAggregateOptions,
} from "./aggregateTable";
import { resolveColumns } from "./columns";
import type { RawTable, SalesAggregate, SourceAggregation } from "./types";

export const SALES_PLACEHOLDER_ID = "UNIDENTIFIED-SALES";

export function aggregateSales(
  table: RawTable,
  options: SourceAggregateOptions = {}
): SourceAggregation<SalesAggregate> {
  const columns = resolveColumns("sales", table.headers);

  const result = aggregateTable(table, {
    idColumn: columns.productId ?? "",
    numericColumns: [
      { field: "grossSales", column: columns.salesAmount },
      { field: "unitsOrdered", column: columns.unitsOrdered },
      { field: "sessions", column: columns.sessionsTotal },
    ],
    textColumns: [
      { field: "title", column: columns.title },
      { field: "skus", column: columns.sku },
    ],
    brandHint: (row) =>
      classifyBrand(
        [columnText(row, columns.title), columnText(row, columns.sku)],
        options.brandRules
      ),
    placeholderId: SALES_PLACEHOLDER_ID,
    numberOptions: options.numberOptions,
  });

  const groups = new Map<string, SalesAggregate>();
  for (const [productId, group] of result.groups) {
    groups.set(productId, {
      productId,
      grossSales: group.sums.get("grossSales") ?? 0,
      unitsOrdered: group.sums.get("unitsOrdered") ?? 0,
      sessions: group.sums.get("sessions") ?? 0,
      title: firstText(group, "title"),
      skus: group.texts.get("skus") ?? [],
    });
  }

  return { groups, columns, droppedRows: result.droppedRows };
}
