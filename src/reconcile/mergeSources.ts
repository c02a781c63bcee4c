import { classifyBrand } from "../brands/classifyBrand";
import { DEFAULT_BRAND_RULES } from "../brands/brandRules";
import { DEFAULT_PRODUCT_NAMES, type ProductNameReference } from "../brands/productNames";
import {
  UNKNOWN_PRODUCT_NAME,
  UNMAPPED_BRAND,
  type AdSalesBasis,
  type AdsAggregate,
  type BrandRule,
  type InventoryAggregate,
  type ProductRecord,
  type ReportSource,
  type SalesAggregate,
} from "./types";

export type MergeOptions = {
  adSalesBasis?: AdSalesBasis;
  /** Whether each ads sales column was present in the report; decides the basis fallback. */
  adSalesColumns?: { total: boolean; advertisedSku: boolean };
  brandRules?: readonly BrandRule[];
  productNames?: ProductNameReference;
};

export function selectAdSales(
  ads: AdsAggregate | undefined,
  basis: AdSalesBasis,
  available: { total: boolean; advertisedSku: boolean }
): number {
  if (!ads) return 0;
  if (basis === "advertised_sku") {
    return available.advertisedSku || !available.total ? ads.advertisedSkuSales : ads.totalSales;
  }
  return available.total || !available.advertisedSku ? ads.totalSales : ads.advertisedSkuSales;
}

export function resolveBrand(
  inventory: InventoryAggregate | undefined,
  sales: SalesAggregate | undefined,
  ads: AdsAggregate | undefined,
  rules: readonly BrandRule[]
): string {
  if (inventory && inventory.brandHint !== UNMAPPED_BRAND) return inventory.brandHint;
  return classifyBrand([sales?.title, ...(sales?.skus ?? []), ads?.campaign], rules);
}

export function resolveDisplayName(
  productId: string,
  sales: SalesAggregate | undefined,
  names: ProductNameReference
): string {
  return names.get(productId) ?? sales?.title ?? UNKNOWN_PRODUCT_NAME;
}

function unionKeys(...maps: ReadonlyMap<string, unknown>[]): string[] {
  const keys = new Set<string>();
  for (const map of maps) {
    for (const key of map.keys()) keys.add(key);
  }
  return Array.from(keys);
}

/**
 * Full outer join of the three per-source aggregates on canonical ASIN.
 * Every identifier seen in any source yields exactly one record; fields from
 * an absent source default to 0 or the sentinel text.
 */
export function mergeSources(
  inventory: ReadonlyMap<string, InventoryAggregate>,
  sales: ReadonlyMap<string, SalesAggregate>,
  ads: ReadonlyMap<string, AdsAggregate>,
  options: MergeOptions = {}
): ProductRecord[] {
  const {
    adSalesBasis = "total",
    adSalesColumns = { total: true, advertisedSku: true },
    brandRules = DEFAULT_BRAND_RULES,
    productNames = DEFAULT_PRODUCT_NAMES,
  } = options;

  return unionKeys(inventory, sales, ads).map((productId) => {
    const inv = inventory.get(productId);
    const sale = sales.get(productId);
    const ad = ads.get(productId);

    const sources: ReportSource[] = [];
    if (inv) sources.push("inventory");
    if (sale) sources.push("sales");
    if (ad) sources.push("ads");

    const skus: string[] = [];
    for (const sku of [...(inv?.skus ?? []), ...(sale?.skus ?? []), ...(ad?.skus ?? [])]) {
      if (!skus.includes(sku)) skus.push(sku);
    }

    return {
      product_id: productId,
      brand: resolveBrand(inv, sale, ad, brandRules),
      display_name: resolveDisplayName(productId, sale, productNames),
      stock_quantity: inv?.stock ?? 0,
      gross_sales: sale?.grossSales ?? 0,
      ad_sales: selectAdSales(ad, adSalesBasis, adSalesColumns),
      ad_spend: ad?.spend ?? 0,
      clicks: ad?.clicks ?? 0,
      impressions: ad?.impressions ?? 0,
      orders: ad?.orders ?? 0,
      units_ordered: sale?.unitsOrdered ?? 0,
      sessions: sale?.sessions ?? 0,
      campaigns: ad?.campaigns ?? [],
      skus,
      sources,
    };
  });
}
