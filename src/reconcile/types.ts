export type CellValue = string | number | boolean | Date | null;

export type RawTable = {
  headers: string[];
  rows: Record<string, CellValue>[];
};

export type ReportSource = "inventory" | "sales" | "ads";

export const REPORT_SOURCES: readonly ReportSource[] = ["inventory", "sales", "ads"];

export type ColumnRole =
  | "productId"
  | "salesAmount"
  | "spendAmount"
  | "title"
  | "sku"
  | "campaignName"
  | "quantity"
  | "conditionCode"
  | "unitsOrdered"
  | "sessionsTotal"
  | "clicks"
  | "impressions"
  | "orders"
  | "advertisedSkuSales";

export type ResolvedColumns = Partial<Record<ColumnRole, string>>;

export type AdSalesBasis = "total" | "advertised_sku";

export type BrandRule = {
  brand: string;
  signals: string[];
};

export const UNMAPPED_BRAND = "Unmapped";
export const UNKNOWN_PRODUCT_NAME = "N/A";

export type InventoryAggregate = {
  productId: string;
  stock: number;
  brandHint: string;
  brandHints: string[];
  skus: string[];
};

export type SalesAggregate = {
  productId: string;
  grossSales: number;
  unitsOrdered: number;
  sessions: number;
  title: string | null;
  skus: string[];
};

export type AdsAggregate = {
  productId: string;
  totalSales: number;
  advertisedSkuSales: number;
  spend: number;
  clicks: number;
  impressions: number;
  orders: number;
  campaign: string | null;
  campaigns: string[];
  skus: string[];
};

export type SourceAggregation<T> = {
  groups: Map<string, T>;
  columns: ResolvedColumns;
  droppedRows: number;
};

export type ProductRecord = {
  product_id: string;
  brand: string;
  display_name: string;
  stock_quantity: number;
  gross_sales: number;
  ad_sales: number;
  ad_spend: number;
  clicks: number;
  impressions: number;
  orders: number;
  units_ordered: number;
  sessions: number;
  campaigns: string[];
  skus: string[];
  sources: ReportSource[];
};

export type ProductMetrics = {
  acos: number;
  tacos: number;
  roas: number;
  organic_sales: number;
  ad_contribution: number;
  ctr: number;
  cvr: number;
  unit_session_rate: number;
  drr: number;
};

export type ProductRow = ProductRecord & ProductMetrics;

export type MetricTotals = {
  stock_quantity: number;
  gross_sales: number;
  ad_sales: number;
  ad_spend: number;
  clicks: number;
  impressions: number;
  orders: number;
  units_ordered: number;
  sessions: number;
};

export type BrandSummaryRow = MetricTotals &
  ProductMetrics & {
    brand: string;
    product_count: number;
  };

export type PortfolioTotals = MetricTotals &
  ProductMetrics & {
    product_count: number;
  };
