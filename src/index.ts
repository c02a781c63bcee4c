export * from "./reconcile/types";
export * from "./reconcile/errors";
export { normalizeNumber, DEFAULT_CURRENCY_TOKENS } from "./reconcile/normalizeNumber";
export type { NormalizeNumberOptions } from "./reconcile/normalizeNumber";
export { resolveColumn, resolveColumns, ROLE_TABLES } from "./reconcile/columns";
export type { RoleSpec } from "./reconcile/columns";
export { classifyBrand } from "./brands/classifyBrand";
export { DEFAULT_BRAND_RULES, loadBrandRules, parseBrandRules } from "./brands/brandRules";
export { DEFAULT_PRODUCT_NAMES, loadProductNames } from "./brands/productNames";
export { aggregateTable } from "./reconcile/aggregateTable";
export { aggregateInventory } from "./reconcile/aggregateInventory";
export { aggregateSales } from "./reconcile/aggregateSales";
export { aggregateAds } from "./reconcile/aggregateAds";
export { mergeSources } from "./reconcile/mergeSources";
export {
  computePortfolioTotals,
  computeProductMetrics,
  rollupByBrand,
  safeRatio,
} from "./reconcile/metrics";
export { buildBrandSummary, filterByBrand, sortByGrossSales } from "./reconcile/views";
export {
  reconcileReportFiles,
  reconcileTables,
  runReconciliation,
} from "./reconcile/runReconciliation";
export type {
  ReconcileOptions,
  ReconciliationOutput,
  ReconciliationResult,
  ReportTables,
} from "./reconcile/runReconciliation";
export { readReportTable } from "./io/readReportTable";
export { buildAuditWorkbook, writeAuditWorkbook } from "./export/writeAuditWorkbook";
export { loadConfig } from "./config/loadConfig";
export type { AuditConfig } from "./config/loadConfig";
