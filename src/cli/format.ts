import type { BrandSummaryRow, PortfolioTotals } from "../reconcile/types";

export function formatAmount(value: number): string {
  return value.toLocaleString("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 });
}

export function formatUnits(value: number): string {
  return value.toLocaleString("en-US", { maximumFractionDigits: 0 });
}

export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

export function formatOverview(totals: PortfolioTotals, currency: string): string[] {
  return [
    `Total Business Sales: ${currency} ${formatAmount(totals.gross_sales)}`,
    `Total Ad Sales: ${currency} ${formatAmount(totals.ad_sales)}`,
    `Total Ad Spend: ${currency} ${formatAmount(totals.ad_spend)}`,
    `Sellable Stock: ${formatUnits(totals.stock_quantity)} Units`,
    `ACOS: ${formatPercent(totals.acos)}  TACOS: ${formatPercent(totals.tacos)}`,
  ];
}

export function formatBrandLine(row: BrandSummaryRow): string {
  return [
    row.brand.padEnd(22),
    `sales ${formatAmount(row.gross_sales)}`,
    `ad ${formatAmount(row.ad_sales)}`,
    `spend ${formatAmount(row.ad_spend)}`,
    `stock ${formatUnits(row.stock_quantity)}`,
    `ACOS ${formatPercent(row.acos)}`,
    `TACOS ${formatPercent(row.tacos)}`,
  ].join("  ");
}
