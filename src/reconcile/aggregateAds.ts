import { classifyBrand } from "../brands/classifyBrand";
import {
  aggregateTable,
  columnText,
  firstText,
  type SourceAggregateOptions,
} from "./aggregateTable";
import { resolveColumns } from "./columns";
import type { AdsAggregate, RawTable, SourceAggregation } from "./types";

export const ADS_PLACEHOLDER_ID = "UNIDENTIFIED-ADS";

/**
 * One row per advertised ASIN across all campaigns. The first campaign name
 * feeds brand classification; the distinct list is kept for audit display.
 */
export function aggregateAds(
  table: RawTable,
  options: SourceAggregateOptions = {}
): SourceAggregation<AdsAggregate> {
  const columns = resolveColumns("ads", table.headers);

  const result = aggregateTable(table, {
    idColumn: columns.productId ?? "",
    numericColumns: [
      { field: "totalSales", column: columns.salesAmount },
      { field: "advertisedSkuSales", column: columns.advertisedSkuSales },
      { field: "spend", column: columns.spendAmount },
      { field: "clicks", column: columns.clicks },
      { field: "impressions", column: columns.impressions },
      { field: "orders", column: columns.orders },
    ],
    textColumns: [
      { field: "campaigns", column: columns.campaignName },
      { field: "skus", column: columns.sku },
    ],
    brandHint: (row) =>
      classifyBrand(
        [columnText(row, columns.campaignName), columnText(row, columns.sku)],
        options.brandRules
      ),
    placeholderId: ADS_PLACEHOLDER_ID,
    numberOptions: options.numberOptions,
  });

  const groups = new Map<string, AdsAggregate>();
  for (const [productId, group] of result.groups) {
    groups.set(productId, {
      productId,
      totalSales: group.sums.get("totalSales") ?? 0,
      advertisedSkuSales: group.sums.get("advertisedSkuSales") ?? 0,
      spend: group.sums.get("spend") ?? 0,
      clicks: group.sums.get("clicks") ?? 0,
      impressions: group.sums.get("impressions") ?? 0,
      orders: group.sums.get("orders") ?? 0,
      campaign: firstText(group, "campaigns"),
      campaigns: group.texts.get("campaigns") ?? [],
      skus: group.texts.get("skus") ?? [],
    });
  }

  return { groups, columns, droppedRows: result.droppedRows };
}
