import { MissingColumnError } from "./errors";
import type { ColumnRole, ReportSource, ResolvedColumns } from "./types";

export type RoleSpec = {
  role: ColumnRole;
  keywords: string[];
  exclude?: string[];
  required?: boolean;
};

/**
 * First header (in the table's own column order) containing any keyword,
 * case-insensitively, and none of the exclude terms. Report headers drift
 * between format versions, so containment is used instead of equality.
 */
export function resolveColumn(
  headers: readonly string[],
  keywords: readonly string[],
  exclude: readonly string[] = []
): string | null {
  const kws = keywords.map((kw) => kw.toLowerCase());
  const exs = exclude.map((ex) => ex.toLowerCase());
  for (const header of headers) {
    const lower = String(header).trim().toLowerCase();
    if (!kws.some((kw) => lower.includes(kw))) continue;
    if (exs.some((ex) => lower.includes(ex))) continue;
    return header;
  }
  return null;
}

export const INVENTORY_ROLES: RoleSpec[] = [
  { role: "productId", keywords: ["asin"], required: true },
  { role: "quantity", keywords: ["quantity available", "quantity-available"] },
  { role: "conditionCode", keywords: ["warehouse-condition-code", "condition code"], required: true },
  { role: "sku", keywords: ["seller-sku", "sku"] },
];

export const SALES_ROLES: RoleSpec[] = [
  { role: "productId", keywords: ["child asin", "asin"], exclude: ["parent"], required: true },
  { role: "salesAmount", keywords: ["ordered product sales"], exclude: ["b2b"] },
  { role: "title", keywords: ["title", "item name"] },
  { role: "sku", keywords: ["sku"] },
  { role: "unitsOrdered", keywords: ["units ordered"], exclude: ["b2b"] },
  { role: "sessionsTotal", keywords: ["sessions - total", "sessions total"], exclude: ["b2b"] },
];

export const ADS_ROLES: RoleSpec[] = [
  { role: "productId", keywords: ["advertised asin"], required: true },
  { role: "salesAmount", keywords: ["7 day total sales", "14 day total sales"] },
  {
    role: "advertisedSkuSales",
    keywords: ["7 day advertised sku sales", "14 day advertised sku sales"],
  },
  { role: "spendAmount", keywords: ["spend"], exclude: ["return on"] },
  { role: "campaignName", keywords: ["campaign name"] },
  { role: "sku", keywords: ["advertised sku"], exclude: ["sales", "units"] },
  { role: "clicks", keywords: ["clicks"] },
  { role: "impressions", keywords: ["impressions"] },
  { role: "orders", keywords: ["7 day total orders", "14 day total orders"] },
];

export const ROLE_TABLES: Record<ReportSource, RoleSpec[]> = {
  inventory: INVENTORY_ROLES,
  sales: SALES_ROLES,
  ads: ADS_ROLES,
};

export function resolveColumns(
  source: ReportSource,
  headers: readonly string[],
  specs: readonly RoleSpec[] = ROLE_TABLES[source]
): ResolvedColumns {
  const resolved: ResolvedColumns = {};
  for (const spec of specs) {
    const header = resolveColumn(headers, spec.keywords, spec.exclude);
    if (header !== null) {
      resolved[spec.role] = header;
      continue;
    }
    if (spec.required) {
      throw new MissingColumnError({
        source,
        role: spec.role,
        keywords: spec.keywords,
        headers: [...headers],
      });
    }
  }
  return resolved;
}
