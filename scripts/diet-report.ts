#!/usr/bin/env npx tsx
/**
 * diet-report.ts — Single-entry-point nutrition report
 *
 * Reads the recipe table, cleans it, computes per-diet macro statistics and
 * rankings, and writes tables and charts to the output directory.
 * Exits 0 on success (rejected rows included), 1 on a fatal error.
 *
 * Usage:
 *   npx tsx scripts/diet-report.ts
 *
 * Configuration (.env.local or environment):
 *   INPUT_PATH, OUTPUT_DIR, TOP_N, TOP_PER_DIET, COLUMN_MAP
 */

import * as dotenv from "dotenv";
import { loadConfig } from "../src/lib/config";
import { handleError } from "../src/lib/errors";
import { runDietReport } from "../src/lib/pipeline";

dotenv.config({ path: ".env.local" });

// ============================================
// Main
// ============================================

async function main(): Promise<void> {
  console.log("=== Nutritional Data Analysis ===\n");

  const config = loadConfig();
  const result = await runDietReport(config);

  console.log("\n=== Summary ===");
  console.log(`Rows accepted: ${result.acceptedRows}/${result.totalRows}`);
  console.log(`Artifacts written: ${result.manifest.length}`);
  if (result.skippedCharts.length > 0) {
    console.log(`Charts skipped: ${result.skippedCharts.map((s) => s.name).join(", ")}`);
  }
  console.log("\n✅ Analysis complete.");
}

main().catch((error) => {
  process.exit(handleError(error));
});
