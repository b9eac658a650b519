/**
 * Top-N rankings of recipes and diet groups
 *
 * Entries are sorted descending by the metric value. Ties fall back to a
 * fixed chain of keys so the output never depends on input row order.
 */

import { compareText, nutrientAmount, type DietSummary } from "./aggregator";
import type { RecipeRecord } from "./cleaner";

export const RANKING_METRICS = [
  "protein",
  "carbs",
  "fat",
  "protein_to_carbs",
  "carbs_to_fat",
] as const;

export type RankingMetric = (typeof RANKING_METRICS)[number];

export const METRIC_LABELS: Record<RankingMetric, string> = {
  protein: "Protein (g)",
  carbs: "Carbs (g)",
  fat: "Fat (g)",
  protein_to_carbs: "Protein-to-carbs ratio",
  carbs_to_fat: "Carbs-to-fat ratio",
};

export interface RankingEntry<T> {
  rank: number;
  metric: RankingMetric;
  value: number;
  item: T;
}

interface Macros {
  protein: number;
  carbs: number;
  fat: number;
}

function ratio(numerator: number, denominator: number): number | undefined {
  return denominator === 0 ? undefined : numerator / denominator;
}

/**
 * Metric value for a set of macro amounts. Ratios are undefined when the
 * denominator is zero.
 */
export function metricValue(macros: Macros, metric: RankingMetric): number | undefined {
  switch (metric) {
    case "protein":
    case "carbs":
    case "fat":
      return macros[metric];
    case "protein_to_carbs":
      return ratio(macros.protein, macros.carbs);
    case "carbs_to_fat":
      return ratio(macros.carbs, macros.fat);
  }
}

export function recipeMacros(record: RecipeRecord): Macros {
  return {
    protein: nutrientAmount(record, "protein"),
    carbs: nutrientAmount(record, "carbs"),
    fat: nutrientAmount(record, "fat"),
  };
}

function dietMacros(summary: DietSummary): Macros {
  return {
    protein: summary.macros.protein.mean,
    carbs: summary.macros.carbs.mean,
    fat: summary.macros.fat.mean,
  };
}

function assertTopN(topN: number): void {
  if (!Number.isInteger(topN) || topN < 1) {
    throw new RangeError(`topN must be a positive integer, got ${topN}`);
  }
}

function rank<T>(
  items: Iterable<T>,
  metric: RankingMetric,
  topN: number,
  valueOf: (item: T) => number | undefined,
  tieBreak: (a: T, b: T) => number
): RankingEntry<T>[] {
  assertTopN(topN);

  const scored: Array<{ value: number; item: T }> = [];
  for (const item of items) {
    const value = valueOf(item);
    if (value === undefined || !Number.isFinite(value)) continue;
    scored.push({ value, item });
  }

  scored.sort((a, b) => b.value - a.value || tieBreak(a.item, b.item));

  return scored.slice(0, topN).map(({ value, item }, i) => ({
    rank: i + 1,
    metric,
    value,
    item,
  }));
}

function compareRecipes(a: RecipeRecord, b: RecipeRecord): number {
  return (
    compareText(a.recipeName, b.recipeName) ||
    compareText(a.dietType, b.dietType) ||
    compareText(a.cuisineType, b.cuisineType) ||
    a.line - b.line
  );
}

export function rankRecipes(
  records: Iterable<RecipeRecord>,
  metric: RankingMetric,
  topN: number
): RankingEntry<RecipeRecord>[] {
  return rank(records, metric, topN, (r) => metricValue(recipeMacros(r), metric), compareRecipes);
}

/**
 * Ranks diet groups by their mean metric (ratios use the group means).
 */
export function rankDiets(
  summaries: Iterable<DietSummary>,
  metric: RankingMetric,
  topN: number
): RankingEntry<DietSummary>[] {
  return rank(
    summaries,
    metric,
    topN,
    (s) => metricValue(dietMacros(s), metric),
    (a, b) => compareText(a.dietType, b.dietType)
  );
}

export interface DietRanking {
  dietType: string;
  entries: RankingEntry<RecipeRecord>[];
}

/**
 * Top recipes within each diet, diets in first-seen order.
 */
export function rankRecipesPerDiet(
  records: Iterable<RecipeRecord>,
  metric: RankingMetric,
  perDiet: number
): DietRanking[] {
  assertTopN(perDiet);

  const byDiet = new Map<string, RecipeRecord[]>();
  for (const record of records) {
    const list = byDiet.get(record.dietType);
    if (list) list.push(record);
    else byDiet.set(record.dietType, [record]);
  }

  return [...byDiet].map(([dietType, list]) => ({
    dietType,
    entries: rankRecipes(list, metric, perDiet),
  }));
}
