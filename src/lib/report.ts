/**
 * Tabular report contents
 *
 * Builds the CSV tables, the per-diet JSON documents and the plain-text
 * summary from the aggregated results. Every table starts with its header
 * row, including when there are no data rows.
 */

import { stringify } from "csv-stringify/sync";
import type { DietCuisineSummary, DietSummary, MacroStats } from "./aggregator";
import {
  REJECTION_REASONS,
  type RecipeRecord,
  type Rejection,
  type RejectionReason,
} from "./cleaner";
import { metricValue, recipeMacros, type DietRanking, type RankingEntry } from "./ranker";
import { NUTRIENT_FIELDS } from "./schema";

export interface ReportData {
  inputPath: string;
  totalRows: number;
  records: RecipeRecord[];
  rejected: Record<RejectionReason, number>;
  rejections: Rejection[];
  dietSummaries: DietSummary[];
  dietCuisineSummaries: DietCuisineSummary[];
  topProtein: RankingEntry<RecipeRecord>[];
  topProteinToCarbs: RankingEntry<RecipeRecord>[];
  topProteinByDiet: DietRanking[];
  dietProteinRanking: RankingEntry<DietSummary>[];
}

export type ReportFileKind = "table" | "document";

export interface ReportFile {
  kind: ReportFileKind;
  name: string;
  content: string;
}

/** Rejections listed individually in analysis_summary.txt */
export const MAX_LISTED_REJECTIONS = 20;

type Cell = string | number;

export function formatNumber(value: number | null | undefined): string {
  if (value === null || value === undefined || !Number.isFinite(value)) return "";
  return value.toFixed(2);
}

function table(header: readonly string[], rows: readonly Cell[][]): string {
  return stringify([[...header], ...rows]);
}

function macroColumns(prefix = ""): string[] {
  return NUTRIENT_FIELDS.flatMap((f) => [
    `${prefix}mean_${f}`,
    `${prefix}stddev_${f}`,
    `${prefix}min_${f}`,
    `${prefix}max_${f}`,
  ]);
}

function macroCells(macros: MacroStats): string[] {
  return NUTRIENT_FIELDS.flatMap((f) => [
    formatNumber(macros[f].mean),
    formatNumber(macros[f].stdDev),
    formatNumber(macros[f].min),
    formatNumber(macros[f].max),
  ]);
}

export function dietSummaryTable(summaries: DietSummary[]): string {
  return table(
    ["diet_type", "record_count", ...macroColumns(), "total_protein", "top_cuisines"],
    summaries.map((s) => [
      s.dietType,
      s.recordCount,
      ...macroCells(s.macros),
      formatNumber(s.macros.protein.total),
      s.topCuisines.map((c) => `${c.cuisineType}:${c.count}`).join("; "),
    ])
  );
}

export function dietCuisineTable(summaries: DietCuisineSummary[]): string {
  return table(
    ["diet_type", "cuisine_type", "record_count", ...macroColumns()],
    summaries.map((s) => [s.dietType, s.cuisineType, s.recordCount, ...macroCells(s.macros)])
  );
}

const RECIPE_RANKING_HEADER = [
  "rank",
  "recipe_name",
  "diet_type",
  "cuisine_type",
  "metric",
  "value",
  "protein_g",
  "carbs_g",
  "fat_g",
] as const;

function recipeRankingRow(entry: RankingEntry<RecipeRecord>): Cell[] {
  const r = entry.item;
  return [
    entry.rank,
    r.recipeName,
    r.dietType,
    r.cuisineType,
    entry.metric,
    formatNumber(entry.value),
    formatNumber(r.proteinG),
    formatNumber(r.carbsG),
    formatNumber(r.fatG),
  ];
}

export function recipeRankingTable(entries: RankingEntry<RecipeRecord>[]): string {
  return table(RECIPE_RANKING_HEADER, entries.map(recipeRankingRow));
}

export function perDietRankingTable(rankings: DietRanking[]): string {
  return table(
    RECIPE_RANKING_HEADER,
    rankings.flatMap((r) => r.entries.map(recipeRankingRow))
  );
}

export function dietRankingTable(entries: RankingEntry<DietSummary>[]): string {
  return table(
    ["rank", "diet_type", "metric", "value", "record_count"],
    entries.map((e) => [e.rank, e.item.dietType, e.metric, formatNumber(e.value), e.item.recordCount])
  );
}

export function processedRecipesTable(records: RecipeRecord[]): string {
  return table(
    [
      "diet_type",
      "recipe_name",
      "cuisine_type",
      "protein_g",
      "carbs_g",
      "fat_g",
      "protein_to_carbs_ratio",
      "carbs_to_fat_ratio",
    ],
    records.map((r) => {
      const macros = recipeMacros(r);
      return [
        r.dietType,
        r.recipeName,
        r.cuisineType,
        formatNumber(r.proteinG),
        formatNumber(r.carbsG),
        formatNumber(r.fatG),
        formatNumber(metricValue(macros, "protein_to_carbs")),
        formatNumber(metricValue(macros, "carbs_to_fat")),
      ];
    })
  );
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Document key for each diet: its name with whitespace turned into "_". A key
 * already taken by an earlier diet ("low carb" next to "low_carb") gets the
 * first free numeric suffix.
 */
export function documentIds(dietTypes: readonly string[]): string[] {
  const taken = new Set<string>();
  return dietTypes.map((dietType) => {
    const slug = dietType.replace(/\s+/g, "_");
    let id = slug;
    for (let n = 2; taken.has(id); n++) {
      id = `${slug}_${n}`;
    }
    taken.add(id);
    return id;
  });
}

/**
 * One document per diet type.
 */
export function dietDocuments(summaries: DietSummary[]): string {
  const ids = documentIds(summaries.map((s) => s.dietType));
  const documents = summaries.map((s, i) => ({
    _id: ids[i],
    diet_type: s.dietType,
    recipe_count: s.recordCount,
    macronutrients: {
      protein_g: round2(s.macros.protein.mean),
      carbs_g: round2(s.macros.carbs.mean),
      fat_g: round2(s.macros.fat.mean),
    },
    max_protein: round2(s.macros.protein.max),
    min_protein: round2(s.macros.protein.min),
    top_cuisines: Object.fromEntries(s.topCuisines.map((c) => [c.cuisineType, c.count])),
  }));
  return `${JSON.stringify(documents, null, 2)}\n`;
}

export function analysisSummary(data: ReportData): string {
  const rule = "=".repeat(50);
  const accepted = data.records.length;
  const lines: string[] = [
    "NUTRITIONAL DATA ANALYSIS SUMMARY",
    rule,
    "",
    `Input: ${data.inputPath}`,
    `Rows read: ${data.totalRows}`,
    `Rows accepted: ${accepted}`,
    `Rows rejected: ${data.totalRows - accepted}`,
  ];

  for (const reason of REJECTION_REASONS) {
    lines.push(`  ${reason}: ${data.rejected[reason]}`);
  }

  if (data.rejections.length > 0) {
    lines.push("", "Rejected rows:");
    for (const r of data.rejections.slice(0, MAX_LISTED_REJECTIONS)) {
      lines.push(`  row ${r.line}: ${r.reason} (${r.column})`);
    }
    if (data.rejections.length > MAX_LISTED_REJECTIONS) {
      lines.push(`  … and ${data.rejections.length - MAX_LISTED_REJECTIONS} more`);
    }
  }

  lines.push("", "Average Macronutrients by Diet Type:");
  if (data.dietSummaries.length === 0) {
    lines.push("  (no valid records)");
  }
  for (const s of data.dietSummaries) {
    lines.push(
      `  ${s.dietType}: protein ${formatNumber(s.macros.protein.mean)} g, ` +
        `carbs ${formatNumber(s.macros.carbs.mean)} g, ` +
        `fat ${formatNumber(s.macros.fat.mean)} g (n=${s.recordCount})`
    );
  }

  const best = data.dietProteinRanking[0];
  lines.push("", "Highest Protein Diet Type:");
  lines.push(
    best
      ? `  ${best.item.dietType} with ${formatNumber(best.value)} g average protein`
      : "  (none)"
  );

  return `${lines.join("\n")}\n`;
}

export function buildReportFiles(data: ReportData): ReportFile[] {
  return [
    { kind: "table", name: "diet_summary.csv", content: dietSummaryTable(data.dietSummaries) },
    {
      kind: "table",
      name: "diet_cuisine_summary.csv",
      content: dietCuisineTable(data.dietCuisineSummaries),
    },
    { kind: "table", name: "top_protein.csv", content: recipeRankingTable(data.topProtein) },
    {
      kind: "table",
      name: "top_protein_to_carbs.csv",
      content: recipeRankingTable(data.topProteinToCarbs),
    },
    {
      kind: "table",
      name: "top_protein_by_diet.csv",
      content: perDietRankingTable(data.topProteinByDiet),
    },
    {
      kind: "table",
      name: "diet_protein_ranking.csv",
      content: dietRankingTable(data.dietProteinRanking),
    },
    { kind: "table", name: "processed_recipes.csv", content: processedRecipesTable(data.records) },
    { kind: "document", name: "diet_documents.json", content: dietDocuments(data.dietSummaries) },
    { kind: "document", name: "analysis_summary.txt", content: analysisSummary(data) },
  ];
}
