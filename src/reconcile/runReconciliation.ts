import { DEFAULT_BRAND_RULES, brandNames } from "../brands/brandRules";
import { DEFAULT_PRODUCT_NAMES } from "../brands/productNames";
import type { AuditConfig } from "../config/loadConfig";
import { readReportTable } from "../io/readReportTable";
import { aggregateAds } from "./aggregateAds";
import { aggregateInventory } from "./aggregateInventory";
import { aggregateSales } from "./aggregateSales";
import { ConfigError, ReconcileError } from "./errors";
import { computePortfolioTotals, computeProductMetrics, DEFAULT_WINDOW_DAYS } from "./metrics";
import { mergeSources } from "./mergeSources";
import { DEFAULT_CURRENCY_TOKENS } from "./normalizeNumber";
import {
  REPORT_SOURCES,
  type BrandSummaryRow,
  type PortfolioTotals,
  type ProductRow,
  type RawTable,
  type ReportSource,
  type ResolvedColumns,
} from "./types";
import { buildBrandSummary, sortByGrossSales } from "./views";

export type ReportTables = Record<ReportSource, RawTable>;
export type ReportInputs = Record<ReportSource, string>;

export type ReconcileOptions = Partial<AuditConfig>;

export type ReconciliationOutput = {
  records: ProductRow[];
  brandSummary: BrandSummaryRow[];
  totals: PortfolioTotals;
  brands: string[];
  columns: Record<ReportSource, ResolvedColumns>;
  windowDays: number;
  warnings: string[];
};

export type ReconciliationResult =
  | ({ status: "ok" } & ReconciliationOutput)
  | { status: "failed"; error: ReconcileError };

/**
 * Aggregates the three reports, joins them on ASIN and derives metrics.
 * Throws a ReconcileError (no partial output) when a required column is
 * missing from any report.
 */
export function reconcileTables(
  tables: ReportTables,
  options: ReconcileOptions = {}
): ReconciliationOutput {
  const windowDays = options.windowDays ?? DEFAULT_WINDOW_DAYS;
  if (!Number.isInteger(windowDays) || windowDays <= 0) {
    throw new ConfigError("windowDays", `expected a positive whole number of days, got ${windowDays}`);
  }
  const adSalesBasis = options.adSalesBasis ?? "total";
  const brandRules = options.brandRules ?? DEFAULT_BRAND_RULES;
  const aggregateOptions = {
    numberOptions: { currencyTokens: options.currencyTokens ?? DEFAULT_CURRENCY_TOKENS },
    brandRules,
  };

  const inventory = aggregateInventory(tables.inventory, aggregateOptions);
  const sales = aggregateSales(tables.sales, aggregateOptions);
  const ads = aggregateAds(tables.ads, aggregateOptions);

  const warnings: string[] = [];
  const dropped: Record<ReportSource, number> = {
    inventory: inventory.droppedRows,
    sales: sales.droppedRows,
    ads: ads.droppedRows,
  };
  for (const source of REPORT_SOURCES) {
    if (dropped[source] > 0) {
      warnings.push(`${source} report: dropped ${dropped[source]} row(s) with no ASIN and nothing to keep.`);
    }
  }

  const adSalesColumns = {
    total: ads.columns.salesAmount !== undefined,
    advertisedSku: ads.columns.advertisedSkuSales !== undefined,
  };
  if (adSalesBasis === "advertised_sku" && !adSalesColumns.advertisedSku && adSalesColumns.total) {
    warnings.push("ads report has no advertised SKU sales column; using total sales for ad sales.");
  }
  if (adSalesBasis === "total" && !adSalesColumns.total && adSalesColumns.advertisedSku) {
    warnings.push("ads report has no total sales column; using advertised SKU sales for ad sales.");
  }

  const merged = mergeSources(inventory.groups, sales.groups, ads.groups, {
    adSalesBasis,
    adSalesColumns,
    brandRules,
    productNames: options.productNames ?? DEFAULT_PRODUCT_NAMES,
  });
  const records = sortByGrossSales(merged.map((record) => computeProductMetrics(record, windowDays)));

  return {
    records,
    brandSummary: buildBrandSummary(records, windowDays),
    totals: computePortfolioTotals(records, windowDays),
    brands: brandNames(brandRules),
    columns: { inventory: inventory.columns, sales: sales.columns, ads: ads.columns },
    windowDays,
    warnings,
  };
}

export function runReconciliation(
  tables: ReportTables,
  options: ReconcileOptions = {}
): ReconciliationResult {
  try {
    return { status: "ok", ...reconcileTables(tables, options) };
  } catch (err) {
    if (err instanceof ReconcileError) return { status: "failed", error: err };
    throw err;
  }
}

export function readReportTables(inputs: ReportInputs): ReportTables {
  return {
    inventory: readReportTable(inputs.inventory, { source: "inventory" }),
    sales: readReportTable(inputs.sales, { source: "sales" }),
    ads: readReportTable(inputs.ads, { source: "ads" }),
  };
}

export function reconcileReportFiles(
  inputs: ReportInputs,
  options: ReconcileOptions = {}
): ReconciliationResult {
  let tables: ReportTables;
  try {
    tables = readReportTables(inputs);
  } catch (err) {
    if (err instanceof ReconcileError) return { status: "failed", error: err };
    throw err;
  }
  return runReconciliation(tables, options);
}
