import path from "node:path";
import { loadConfig, loadEnvFile, parseAdSalesBasis, parseWindowDays } from "../config/loadConfig";
import { DEFAULT_WORKBOOK_NAME, writeAuditWorkbook } from "../export/writeAuditWorkbook";
import { reconcileReportFiles } from "../reconcile/runReconciliation";
import { getArg } from "./args";
import { formatBrandLine, formatOverview } from "./format";

function usage() {
  console.log(
    "Usage: npm run reconcile -- --ads <ad-report> --sales <business-report> --inventory <inventory.txt>\n" +
      "  [--out <workbook.xlsx>] [--window-days <n>] [--ad-sales total|advertised_sku]"
  );
}

function main() {
  const ads = getArg("--ads");
  const sales = getArg("--sales");
  const inventory = getArg("--inventory");

  if (!ads || !sales || !inventory) {
    usage();
    process.exit(1);
  }

  loadEnvFile();
  const config = loadConfig();
  const windowDaysArg = getArg("--window-days");
  const adSalesArg = getArg("--ad-sales");
  if (windowDaysArg !== undefined) config.windowDays = parseWindowDays(windowDaysArg, "--window-days");
  if (adSalesArg !== undefined) config.adSalesBasis = parseAdSalesBasis(adSalesArg, "--ad-sales");

  const result = reconcileReportFiles(
    {
      ads: path.resolve(process.cwd(), ads),
      sales: path.resolve(process.cwd(), sales),
      inventory: path.resolve(process.cwd(), inventory),
    },
    config
  );

  if (result.status === "failed") {
    console.error(`reconcile failed (${result.error.status}): ${result.error.message}`);
    process.exitCode = 1;
    return;
  }

  for (const warning of result.warnings) console.warn(warning);

  const currency = config.currencyTokens[0] ?? "";
  console.log(`Products: ${result.totals.product_count} (window ${result.windowDays} days)`);
  for (const line of formatOverview(result.totals, currency)) console.log(line);
  console.log("Brand summary:");
  for (const row of result.brandSummary) console.log(`  ${formatBrandLine(row)}`);

  const outPath = path.resolve(process.cwd(), getArg("--out") ?? path.join("out", DEFAULT_WORKBOOK_NAME));
  writeAuditWorkbook(result, outPath);
  console.log(`Workbook written: ${outPath}`);
}

try {
  main();
} catch (err) {
  console.error(err);
  process.exit(1);
}
