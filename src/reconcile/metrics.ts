import type {
  BrandSummaryRow,
  MetricTotals,
  PortfolioTotals,
  ProductMetrics,
  ProductRecord,
  ProductRow,
} from "./types";

export const DEFAULT_WINDOW_DAYS = 30;

export const safeRatio = (numerator: number, denominator: number): number => {
  if (denominator === 0) return 0;
  const value = numerator / denominator;
  return Number.isFinite(value) ? value : 0;
};

function assertWindowDays(windowDays: number) {
  if (!Number.isInteger(windowDays) || windowDays <= 0) {
    throw new RangeError(`windowDays must be a positive integer, got ${windowDays}`);
  }
}

/**
 * Ratios for one set of totals. Brand and portfolio rollups call this on
 * summed fields, so their ratios are ratios of sums.
 */
export function deriveMetrics(totals: MetricTotals, windowDays: number): ProductMetrics {
  assertWindowDays(windowDays);
  return {
    acos: safeRatio(totals.ad_spend, totals.ad_sales),
    tacos: safeRatio(totals.ad_spend, totals.gross_sales),
    roas: safeRatio(totals.ad_sales, totals.ad_spend),
    organic_sales: totals.gross_sales - totals.ad_sales,
    ad_contribution: safeRatio(totals.ad_sales, totals.gross_sales),
    ctr: safeRatio(totals.clicks, totals.impressions),
    cvr: safeRatio(totals.orders, totals.clicks),
    unit_session_rate: safeRatio(totals.units_ordered, totals.sessions),
    drr: totals.gross_sales / windowDays,
  };
}

export function computeProductMetrics(
  record: ProductRecord,
  windowDays: number = DEFAULT_WINDOW_DAYS
): ProductRow {
  return { ...record, ...deriveMetrics(record, windowDays) };
}

const emptyTotals = (): MetricTotals => ({
  stock_quantity: 0,
  gross_sales: 0,
  ad_sales: 0,
  ad_spend: 0,
  clicks: 0,
  impressions: 0,
  orders: 0,
  units_ordered: 0,
  sessions: 0,
});

function addTotals(acc: MetricTotals, row: MetricTotals) {
  acc.stock_quantity += row.stock_quantity;
  acc.gross_sales += row.gross_sales;
  acc.ad_sales += row.ad_sales;
  acc.ad_spend += row.ad_spend;
  acc.clicks += row.clicks;
  acc.impressions += row.impressions;
  acc.orders += row.orders;
  acc.units_ordered += row.units_ordered;
  acc.sessions += row.sessions;
}

export function rollupByBrand(
  records: readonly ProductRecord[],
  windowDays: number = DEFAULT_WINDOW_DAYS
): BrandSummaryRow[] {
  const byBrand = new Map<string, { totals: MetricTotals; count: number }>();
  for (const record of records) {
    const entry = byBrand.get(record.brand) ?? { totals: emptyTotals(), count: 0 };
    addTotals(entry.totals, record);
    entry.count += 1;
    byBrand.set(record.brand, entry);
  }

  return Array.from(byBrand.entries()).map(([brand, { totals, count }]) => ({
    brand,
    product_count: count,
    ...totals,
    ...deriveMetrics(totals, windowDays),
  }));
}

export function computePortfolioTotals(
  records: readonly ProductRecord[],
  windowDays: number = DEFAULT_WINDOW_DAYS
): PortfolioTotals {
  const totals = emptyTotals();
  for (const record of records) addTotals(totals, record);
  return {
    product_count: records.length,
    ...totals,
    ...deriveMetrics(totals, windowDays),
  };
}
