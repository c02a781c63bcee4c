import { describe, expect, it } from "vitest";
import {
  computePortfolioTotals,
  computeProductMetrics,
  rollupByBrand,
  safeRatio,
} from "../src/reconcile/metrics";
import { buildBrandSummary, filterByBrand, sortByGrossSales } from "../src/reconcile/views";
import type { ProductRecord } from "../src/reconcile/types";

const record = (overrides: Partial<ProductRecord>): ProductRecord => ({
  product_id: "B0TEST",
  brand: "Unmapped",
  display_name: "N/A",
  stock_quantity: 0,
  gross_sales: 0,
  ad_sales: 0,
  ad_spend: 0,
  clicks: 0,
  impressions: 0,
  orders: 0,
  units_ordered: 0,
  sessions: 0,
  campaigns: [],
  skus: [],
  sources: [],
  ...overrides,
});

describe("safeRatio", () => {
  it("returns 0 for zero or non-finite denominators", () => {
    expect(safeRatio(5, 0)).toBe(0);
    expect(safeRatio(0, 0)).toBe(0);
    expect(safeRatio(5, Number.NaN)).toBe(0);
    expect(safeRatio(Number.POSITIVE_INFINITY, 2)).toBe(0);
    expect(safeRatio(1, 4)).toBe(0.25);
  });
});

describe("computeProductMetrics", () => {
  it("derives every ratio for one product", () => {
    const row = computeProductMetrics(
      record({
        gross_sales: 200,
        ad_sales: 50,
        ad_spend: 10,
        clicks: 20,
        impressions: 1000,
        orders: 2,
        units_ordered: 8,
        sessions: 40,
      }),
      30
    );
    expect(row.acos).toBeCloseTo(0.2);
    expect(row.tacos).toBeCloseTo(0.05);
    expect(row.roas).toBeCloseTo(5);
    expect(row.organic_sales).toBe(150);
    expect(row.ad_contribution).toBeCloseTo(0.25);
    expect(row.ctr).toBeCloseTo(0.02);
    expect(row.cvr).toBeCloseTo(0.1);
    expect(row.unit_session_rate).toBeCloseTo(0.2);
    expect(row.drr).toBeCloseTo(200 / 30);
    expect(row.product_id).toBe("B0TEST");
  });

  it("guards every ratio against division by zero", () => {
    const row = computeProductMetrics(record({ gross_sales: 0, ad_spend: 5 }));
    expect(row.tacos).toBe(0);
    expect(row.acos).toBe(0);
    expect(row.roas).toBe(0);
    expect(row.ad_contribution).toBe(0);
    expect(row.ctr).toBe(0);
    expect(row.cvr).toBe(0);
    expect(row.drr).toBe(0);
  });

  it("does not mutate the input record", () => {
    const input = record({ gross_sales: 10 });
    computeProductMetrics(input, 10);
    expect(input).not.toHaveProperty("drr");
  });

  it("rejects a non-positive window", () => {
    expect(() => computeProductMetrics(record({}), 0)).toThrow(RangeError);
  });
});

describe("rollupByBrand", () => {
  it("computes brand ratios from summed fields", () => {
    const [summary] = rollupByBrand([
      record({ product_id: "A", brand: "Paris Collection", ad_spend: 10, ad_sales: 100 }),
      record({ product_id: "B", brand: "Paris Collection", ad_spend: 5, ad_sales: 5 }),
    ]);
    expect(summary?.brand).toBe("Paris Collection");
    expect(summary?.product_count).toBe(2);
    expect(summary?.ad_spend).toBe(15);
    expect(summary?.ad_sales).toBe(105);
    expect(summary?.acos).toBeCloseTo(15 / 105);
    expect(summary?.acos).not.toBeCloseTo(0.55);
  });
});

describe("computePortfolioTotals", () => {
  it("sums the overview figures across all products", () => {
    const totals = computePortfolioTotals(
      [
        record({ product_id: "A", gross_sales: 100, ad_sales: 40, ad_spend: 8, stock_quantity: 3 }),
        record({ product_id: "B", gross_sales: 50, ad_sales: 10, ad_spend: 2, stock_quantity: 7 }),
      ],
      10
    );
    expect(totals.product_count).toBe(2);
    expect(totals.gross_sales).toBe(150);
    expect(totals.ad_sales).toBe(50);
    expect(totals.ad_spend).toBe(10);
    expect(totals.stock_quantity).toBe(10);
    expect(totals.tacos).toBeCloseTo(10 / 150);
    expect(totals.drr).toBe(15);
  });
});

describe("views", () => {
  const records = [
    record({ product_id: "C", brand: "Dorall Collection", gross_sales: 10 }),
    record({ product_id: "A", brand: "CP Trendies", gross_sales: 50 }),
    record({ product_id: "B", brand: "Dorall Collection", gross_sales: 50 }),
    record({ product_id: "D", brand: "Dorall Collection", gross_sales: 70 }),
  ];

  it("sorts by gross sales descending with ASIN as tie-break", () => {
    expect(sortByGrossSales(records).map((row) => row.product_id)).toEqual(["D", "A", "B", "C"]);
  });

  it("filters one brand keeping the sort", () => {
    expect(filterByBrand(records, "Dorall Collection").map((row) => row.product_id)).toEqual([
      "D",
      "B",
      "C",
    ]);
    expect(filterByBrand(records, "Paris Collection")).toEqual([]);
  });

  it("orders the brand summary by gross sales", () => {
    expect(buildBrandSummary(records).map((row) => [row.brand, row.gross_sales])).toEqual([
      ["Dorall Collection", 130],
      ["CP Trendies", 50],
    ]);
  });
});
