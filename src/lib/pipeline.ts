/**
 * Diet report pipeline
 *
 *   load → clean → aggregate → rank → charts + tables → export
 *
 * Row-level problems are counted and reported; only ingest and export
 * failures abort the run.
 */

import { summarizeByDiet, summarizeByDietAndCuisine } from "./aggregator";
import { renderCharts, type SkippedChart } from "./charts";
import { cleanRows, REJECTION_REASONS, type RejectionReason } from "./cleaner";
import type { ReportConfig } from "./config";
import type { Logger } from "./errors";
import { macroDistributions, ratioDistributions } from "./distributions";
import { exportArtifacts, svgToPng, type ArtifactManifest } from "./exporter";
import { readRecipeRows } from "./loader";
import { rankDiets, rankRecipes, rankRecipesPerDiet } from "./ranker";
import { buildReportFiles } from "./report";

export interface ReportResult {
  manifest: ArtifactManifest;
  totalRows: number;
  acceptedRows: number;
  rejected: Record<RejectionReason, number>;
  skippedCharts: SkippedChart[];
}

export interface RunOptions {
  logger?: Logger;
  /** SVG → PNG renderer, replaceable in tests */
  rasterize?: (svg: string) => Buffer;
}

export async function runDietReport(
  config: ReportConfig,
  options: RunOptions = {}
): Promise<ReportResult> {
  const logger = options.logger ?? console;

  logger.log(`Input: ${config.inputPath}`);
  logger.log(`Output: ${config.outputDir}\n`);

  const cleaned = await cleanRows(readRecipeRows(config.inputPath, config.columns), config.columns);
  const { records, rejected, totalRows } = cleaned;
  const rejectedRows = totalRows - records.length;

  logger.log(`Rows read: ${totalRows}, accepted: ${records.length}, rejected: ${rejectedRows}`);
  if (rejectedRows > 0) {
    const breakdown = REJECTION_REASONS.filter((r) => rejected[r] > 0)
      .map((r) => `${r}=${rejected[r]}`)
      .join(", ");
    logger.warn(`⚠️  Rejected rows by reason: ${breakdown}`);
  }

  const dietSummaries = summarizeByDiet(records);
  const dietCuisineSummaries = summarizeByDietAndCuisine(records);
  logger.log(`Diet types: ${dietSummaries.length}, diet × cuisine groups: ${dietCuisineSummaries.length}`);

  const topProtein = rankRecipes(records, "protein", config.topN);
  const topProteinToCarbs = rankRecipes(records, "protein_to_carbs", config.topN);
  const topProteinByDiet = rankRecipesPerDiet(records, "protein", config.topPerDiet);
  const dietProteinRanking = rankDiets(dietSummaries, "protein", dietSummaries.length || 1);

  const best = dietProteinRanking[0];
  if (best) {
    logger.log(
      `Highest average protein diet: ${best.item.dietType} with ${best.value.toFixed(2)}g`
    );
  }

  const { charts, skipped } = renderCharts({
    summaries: dietSummaries,
    topProtein,
    topProteinToCarbs,
    topProteinByDiet,
    macroDistributions: macroDistributions(records),
    ratioDistributions: ratioDistributions(records),
  });
  for (const s of skipped) {
    logger.warn(`⚠️  Skipped chart ${s.name}: ${s.reason}`);
  }

  const files = buildReportFiles({
    inputPath: config.inputPath,
    totalRows,
    records,
    rejected,
    rejections: cleaned.rejections,
    dietSummaries,
    dietCuisineSummaries,
    topProtein,
    topProteinToCarbs,
    topProteinByDiet,
    dietProteinRanking,
  });

  const manifest = await exportArtifacts(
    config.outputDir,
    files,
    charts,
    options.rasterize ?? svgToPng
  );

  logger.log();
  for (const entry of manifest) {
    logger.log(`✓ Saved: ${entry.path}`);
  }

  return {
    manifest,
    totalRows,
    acceptedRows: records.length,
    rejected,
    skippedCharts: skipped,
  };
}
