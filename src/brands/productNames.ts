import fs from "node:fs";
import bundledNames from "../../config/productNames.json";
import { ConfigError } from "../reconcile/errors";

export type ProductNameReference = ReadonlyMap<string, string>;

export function parseProductNames(input: unknown, key = "PRODUCT_NAMES"): Map<string, string> {
  if (typeof input !== "object" || input === null || Array.isArray(input)) {
    throw new ConfigError(key, "expected an object of ASIN -> name");
  }
  const names = new Map<string, string>();
  for (const [asin, name] of Object.entries(input)) {
    const id = asin.trim().toUpperCase();
    if (!id) continue;
    if (typeof name !== "string" || !name.trim()) {
      throw new ConfigError(key, `name for ${id} must be a non-empty string`);
    }
    names.set(id, name.trim());
  }
  return names;
}

export const DEFAULT_PRODUCT_NAMES: ProductNameReference = parseProductNames(bundledNames);

export function loadProductNames(filePath?: string): ProductNameReference {
  if (!filePath) return DEFAULT_PRODUCT_NAMES;
  if (!fs.existsSync(filePath)) {
    throw new ConfigError("PRODUCT_NAMES_PATH", `file not found: ${filePath}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError("PRODUCT_NAMES_PATH", `${filePath} is not valid JSON (${message})`);
  }
  return parseProductNames(parsed, "PRODUCT_NAMES_PATH");
}
