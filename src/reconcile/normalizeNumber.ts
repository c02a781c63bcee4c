export const DEFAULT_CURRENCY_TOKENS = ["AED", "$"];

export type NormalizeNumberOptions = {
  currencyTokens?: string[];
  stripPercent?: boolean;
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function buildTokenPattern(tokens: string[]): RegExp | null {
  const cleaned = tokens.map((token) => token.trim()).filter(Boolean);
  if (!cleaned.length) return null;
  // Longest first so "US$" is removed before "$".
  cleaned.sort((a, b) => b.length - a.length);
  return new RegExp(cleaned.map(escapeRegExp).join("|"), "gi");
}

const patternCache = new Map<string, RegExp | null>();

function tokenPattern(tokens: string[]): RegExp | null {
  const key = tokens.join("\u0000");
  if (!patternCache.has(key)) patternCache.set(key, buildTokenPattern(tokens));
  return patternCache.get(key) ?? null;
}

/**
 * Best-effort conversion of a report cell to a number.
 *
 * Unparseable text, blanks and non-finite values all become 0, so one bad
 * cell never aborts a reconciliation run.
 */
export function normalizeNumber(value: unknown, options: NormalizeNumberOptions = {}): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value !== "string") return 0;

  const { currencyTokens = DEFAULT_CURRENCY_TOKENS, stripPercent = true } = options;
  let cleaned = value;
  const pattern = tokenPattern(currencyTokens);
  if (pattern) cleaned = cleaned.replace(pattern, "");
  cleaned = cleaned.replace(/,/g, "").replace(/\s+/g, "");
  if (stripPercent) cleaned = cleaned.replace(/%$/, "");
  if (!cleaned) return 0;

  const num = Number(cleaned);
  return Number.isFinite(num) ? num : 0;
}
