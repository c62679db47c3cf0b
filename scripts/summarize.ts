import "dotenv/config";
import { readFile } from "node:fs/promises";
import { loadCategoryCatalog } from "../src/config/categories";
import { readConfig } from "../src/config/env";
import { buildCashFlowDashboard } from "../src/dashboard";
import { formatInflowDistribution, formatReconciliationRow } from "../src/dashboard/format";
import { parseCsvTable } from "../src/ingest/csv";
import { parseArgs } from "./args";

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = readConfig();
  const catalog = await loadCategoryCatalog(config.categoryCatalogPath);
  const [expensesCsv, inflowsCsv] = await Promise.all([
    readFile(args.expensesPath, "utf8"),
    readFile(args.inflowsPath, "utf8"),
  ]);

  const result = buildCashFlowDashboard({
    expenses: parseCsvTable(expensesCsv),
    inflows: parseCsvTable(inflowsCsv),
    today: args.today,
    project: args.project,
    catalog,
  });

  if (!result.success) {
    for (const error of result.error.errors) {
      console.error(`⚠️  ${error.message}`);
    }
    process.exitCode = 1;
    return;
  }

  const dashboard = result.data;
  console.log(`Inflow distribution by project (${dashboard.selectedProject})`);
  console.table(formatInflowDistribution(dashboard.inflowDistribution));
  console.log("Cash flow summary");
  console.table(dashboard.reconciliation.map(formatReconciliationRow));
  if (dashboard.untrackedCategories.length) {
    console.warn(`⚠️  Not in category catalog, excluded from totals: ${dashboard.untrackedCategories.join(", ")}`);
  }
  console.log(`🧮 ${dashboard.caption}`);
}

main().catch((error) => {
  console.error("❌ Failed to summarize cash flow:", error);
  process.exit(1);
});
