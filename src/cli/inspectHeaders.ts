import path from "node:path";
import { readReportTable } from "../io/readReportTable";
import { ROLE_TABLES, resolveColumn } from "../reconcile/columns";
import { REPORT_SOURCES, type ReportSource } from "../reconcile/types";
import { getArg, getPositionalArgs } from "./args";

function isReportSource(value: string | undefined): value is ReportSource {
  return REPORT_SOURCES.some((source) => source === value);
}

function main(): void {
  const source = getArg("--source");
  const inputPath = getPositionalArgs()[0];

  if (!inputPath || !isReportSource(source)) {
    console.error("usage: npm run inspect -- --source <inventory|sales|ads> <path-to-report>");
    process.exitCode = 1;
    return;
  }

  try {
    const resolvedPath = path.resolve(process.cwd(), inputPath);
    const table = readReportTable(resolvedPath, { source });

    console.log(`Report: ${resolvedPath}`);
    console.log(`Rows: ${table.rows.length}`);
    console.log(`Headers (${table.headers.length}): ${table.headers.join(" | ")}`);

    let missingRequired = false;
    for (const spec of ROLE_TABLES[source]) {
      const header = resolveColumn(table.headers, spec.keywords, spec.exclude);
      const label = spec.required ? `${spec.role} (required)` : spec.role;
      if (!header && spec.required) missingRequired = true;
      console.log(`- ${label}: ${header ?? "<not found>"}`);
    }
    if (missingRequired) process.exitCode = 1;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`inspect failed: ${message}`);
    process.exitCode = 1;
  }
}

main();
