import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { buildScanText, classifyBrand } from "../src/brands/classifyBrand";
import { DEFAULT_BRAND_RULES, loadBrandRules, parseBrandRules } from "../src/brands/brandRules";
import { ConfigError } from "../src/reconcile/errors";

describe("classifyBrand", () => {
  it("joins non-empty signals in order, upper-cased", () => {
    expect(buildScanText(["a", null, "  ", "b c", undefined])).toBe("A B C");
  });

  it("matches title, SKU and campaign tokens against the default table", () => {
    expect(classifyBrand(["Paris Collection Rose EDP"])).toBe("Paris Collection");
    expect(classifyBrand([null, "cpt-123"])).toBe("CP Trendies");
    expect(classifyBrand([null, null, "DORALL | Auto"])).toBe("Dorall Collection");
  });

  it("lets the earliest declared brand win when several match", () => {
    // "CL_" (Creation Lamis) is declared before "JPD" (Jean Paul Dupont).
    expect(classifyBrand(["JPD CL_ROSE"])).toBe("Creation Lamis");

    const shortFirst = [
      { brand: "Beta", signals: ["PC"] },
      { brand: "Alpha", signals: ["PCB"] },
    ];
    const longFirst = [
      { brand: "Alpha", signals: ["PCB"] },
      { brand: "Beta", signals: ["PC"] },
    ];
    for (let run = 0; run < 3; run += 1) {
      expect(classifyBrand(["PCB-100"], longFirst)).toBe("Alpha");
      expect(classifyBrand(["PCB-100"], shortFirst)).toBe("Beta");
    }
  });

  it("returns Unmapped without text or without a hit", () => {
    expect(classifyBrand([])).toBe("Unmapped");
    expect(classifyBrand([null, undefined, "  "])).toBe("Unmapped");
    expect(classifyBrand(["xyz widget"])).toBe("Unmapped");
  });
});

describe("brand rules", () => {
  it("keeps the bundled table in declaration order", () => {
    expect(DEFAULT_BRAND_RULES.map((rule) => rule.brand)).toEqual([
      "Maison de l’Avenir",
      "Creation Lamis",
      "Jean Paul Dupont",
      "Paris Collection",
      "Dorall Collection",
      "CP Trendies",
    ]);
  });

  it("upper-cases signals and drops blanks", () => {
    const rules = parseBrandRules([{ brand: " Acme ", signals: ["acm_", " ", 7, "Acme Co"] }]);
    expect(rules).toEqual([{ brand: "Acme", signals: ["ACM_", "ACME CO"] }]);
  });

  it("rejects invalid tables", () => {
    expect(() => parseBrandRules([])).toThrow(ConfigError);
    expect(() => parseBrandRules({ brand: "Acme" })).toThrow(ConfigError);
    expect(() =>
      parseBrandRules([
        { brand: "Acme", signals: ["A"] },
        { brand: "Acme", signals: ["B"] },
      ])
    ).toThrow('Invalid BRAND_RULES: duplicate brand "Acme"');
    expect(() => parseBrandRules([{ brand: "Unmapped", signals: ["X"] }])).toThrow(ConfigError);
    expect(() => parseBrandRules([{ brand: "Acme", signals: [] }])).toThrow(
      'Invalid BRAND_RULES: brand "Acme" has no signals'
    );
  });

  it("loads a table from a JSON file", () => {
    const filePath = path.resolve(__dirname, "tmp", `brand-rules-${Date.now()}.json`);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify([{ brand: "House", signals: ["hs_"] }]));

    expect(loadBrandRules(filePath)).toEqual([{ brand: "House", signals: ["HS_"] }]);
    expect(loadBrandRules()).toBe(DEFAULT_BRAND_RULES);
    expect(() => loadBrandRules(path.join(path.dirname(filePath), "missing.json"))).toThrow(
      ConfigError
    );
  });
});
