import { config as loadEnv } from "dotenv";
import { loadBrandRules } from "../brands/brandRules";
import { loadProductNames, type ProductNameReference } from "../brands/productNames";
import { ConfigError } from "../reconcile/errors";
import { DEFAULT_WINDOW_DAYS } from "../reconcile/metrics";
import { DEFAULT_CURRENCY_TOKENS } from "../reconcile/normalizeNumber";
import type { AdSalesBasis, BrandRule } from "../reconcile/types";

export type AuditConfig = {
  windowDays: number;
  adSalesBasis: AdSalesBasis;
  currencyTokens: string[];
  brandRules: BrandRule[];
  productNames: ProductNameReference;
};

type EnvSource = Record<string, string | undefined>;

export function loadEnvFile(path = ".env.local") {
  loadEnv({ path });
}

export function parseWindowDays(value: string | undefined, key = "REPORT_WINDOW_DAYS"): number {
  if (value === undefined || value.trim() === "") return DEFAULT_WINDOW_DAYS;
  const raw = value.trim();
  const num = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(num) || num <= 0) {
    throw new ConfigError(key, `expected a positive whole number of days, got "${value}"`);
  }
  return num;
}

export function parseAdSalesBasis(value: string | undefined, key = "AD_SALES_BASIS"): AdSalesBasis {
  const raw = (value ?? "").trim().toLowerCase();
  if (!raw || raw === "total") return "total";
  if (raw === "advertised_sku") return "advertised_sku";
  throw new ConfigError(key, `expected "total" or "advertised_sku", got "${value}"`);
}

export function parseCurrencyTokens(value: string | undefined): string[] {
  if (value === undefined || value.trim() === "") return [...DEFAULT_CURRENCY_TOKENS];
  return value
    .split(",")
    .map((token) => token.trim())
    .filter(Boolean);
}

export function loadConfig(env: EnvSource = process.env): AuditConfig {
  return {
    windowDays: parseWindowDays(env.REPORT_WINDOW_DAYS),
    adSalesBasis: parseAdSalesBasis(env.AD_SALES_BASIS),
    currencyTokens: parseCurrencyTokens(env.CURRENCY_TOKENS),
    brandRules: loadBrandRules(env.BRAND_RULES_PATH?.trim() || undefined),
    productNames: loadProductNames(env.PRODUCT_NAMES_PATH?.trim() || undefined),
  };
}
