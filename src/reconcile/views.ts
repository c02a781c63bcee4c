import { DEFAULT_WINDOW_DAYS, rollupByBrand } from "./metrics";
import type { BrandSummaryRow, ProductRecord } from "./types";

const byGrossSalesDesc = <T extends { gross_sales: number }>(
  a: T,
  b: T,
  tieBreak: (x: T, y: T) => number
) => b.gross_sales - a.gross_sales || tieBreak(a, b);

export function sortByGrossSales<T extends ProductRecord>(records: readonly T[]): T[] {
  return [...records].sort((a, b) =>
    byGrossSalesDesc(a, b, (x, y) => x.product_id.localeCompare(y.product_id))
  );
}

export function filterByBrand<T extends ProductRecord>(records: readonly T[], brand: string): T[] {
  return sortByGrossSales(records.filter((record) => record.brand === brand));
}

export function buildBrandSummary(
  records: readonly ProductRecord[],
  windowDays: number = DEFAULT_WINDOW_DAYS
): BrandSummaryRow[] {
  return rollupByBrand(records, windowDays).sort((a, b) =>
    byGrossSalesDesc(a, b, (x, y) => x.brand.localeCompare(y.brand))
  );
}
