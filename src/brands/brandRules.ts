import fs from "node:fs";
import bundledRules from "../../config/brandRules.json";
import { ConfigError } from "../reconcile/errors";
import { UNMAPPED_BRAND, type BrandRule } from "../reconcile/types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates an ordered brand table. Order is kept as declared; signals are
 * upper-cased to match the classifier's scan text.
 */
export function parseBrandRules(input: unknown, key = "BRAND_RULES"): BrandRule[] {
  if (!Array.isArray(input) || input.length === 0) {
    throw new ConfigError(key, "expected a non-empty array of { brand, signals }");
  }

  const seen = new Set<string>();
  const rules: BrandRule[] = [];
  input.forEach((entry, index) => {
    if (!isRecord(entry)) {
      throw new ConfigError(key, `entry ${index} is not an object`);
    }
    const brand = typeof entry.brand === "string" ? entry.brand.trim() : "";
    if (!brand) throw new ConfigError(key, `entry ${index} has no brand name`);
    if (brand === UNMAPPED_BRAND) {
      throw new ConfigError(key, `"${UNMAPPED_BRAND}" is reserved`);
    }
    if (seen.has(brand)) throw new ConfigError(key, `duplicate brand "${brand}"`);
    seen.add(brand);

    const rawSignals: unknown[] = Array.isArray(entry.signals) ? entry.signals : [];
    const signals = rawSignals
      .filter((signal): signal is string => typeof signal === "string")
      .map((signal) => signal.trim().toUpperCase())
      .filter(Boolean);
    if (!signals.length) throw new ConfigError(key, `brand "${brand}" has no signals`);

    rules.push({ brand, signals });
  });
  return rules;
}

export function loadBrandRules(filePath?: string): BrandRule[] {
  if (!filePath) return DEFAULT_BRAND_RULES;
  if (!fs.existsSync(filePath)) {
    throw new ConfigError("BRAND_RULES_PATH", `file not found: ${filePath}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError("BRAND_RULES_PATH", `${filePath} is not valid JSON (${message})`);
  }
  return parseBrandRules(parsed, "BRAND_RULES_PATH");
}

export const DEFAULT_BRAND_RULES: BrandRule[] = parseBrandRules(bundledRules);

export function brandNames(rules: readonly BrandRule[]): string[] {
  return rules.map((rule) => rule.brand);
}
