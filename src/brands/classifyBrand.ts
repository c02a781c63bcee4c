import { UNMAPPED_BRAND, type BrandRule } from "../reconcile/types";
import { DEFAULT_BRAND_RULES } from "./brandRules";

export function buildScanText(signals: readonly (string | null | undefined)[]): string {
  return signals
    .map((signal) => String(signal ?? "").trim())
    .filter(Boolean)
    .join(" ")
    .toUpperCase();
}

/**
 * Returns the first brand, in table order, with any signal token contained in
 * the joined text. Tokens overlap across brands (e.g. "CPT" and "PC"), so the
 * table order is the tie-break.
 */
export function classifyBrand(
  signals: readonly (string | null | undefined)[],
  rules: readonly BrandRule[] = DEFAULT_BRAND_RULES
): string {
  const text = buildScanText(signals);
  if (!text) return UNMAPPED_BRAND;
  for (const rule of rules) {
    if (rule.signals.some((token) => text.includes(token))) return rule.brand;
  }
  return UNMAPPED_BRAND;
}
