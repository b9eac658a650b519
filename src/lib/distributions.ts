/**
 * Per-diet value distributions (five-number summaries) for box plots
 *
 * Unlike the running statistics in the aggregator, quartiles need every
 * value of a group, so each group's values are collected and sorted once at
 * the end of the run.
 */

import type { RecipeRecord } from "./cleaner";
import { metricValue, recipeMacros, type RankingMetric } from "./ranker";
import { NUTRIENT_FIELDS } from "./schema";

export interface BoxStats {
  count: number;
  min: number;
  q1: number;
  median: number;
  q3: number;
  max: number;
}

export interface DietBox {
  dietType: string;
  box: BoxStats;
}

export interface Distribution {
  metric: RankingMetric;
  /** Values at or above the cap are left out of the plot */
  cap: number | null;
  boxes: DietBox[];
}

/** Ratio outliers beyond these values flatten the plot. */
export const RATIO_CAPS = {
  protein_to_carbs: 10,
  carbs_to_fat: 20,
} as const;

// ============================================
// Percentiles
// ============================================

/**
 * Linear interpolation between closest ranks, over an ascending array.
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) {
    throw new Error("percentile called with no values");
  }
  const idx = p * (sorted.length - 1);
  const lo = Math.floor(idx);
  const hi = Math.ceil(idx);
  const low = sorted[lo] ?? 0;
  const high = sorted[hi] ?? low;
  return lo === hi ? low : low * (1 - (idx - lo)) + high * (idx - lo);
}

export function boxStats(values: readonly number[]): BoxStats {
  const sorted = [...values].sort((a, b) => a - b);
  return {
    count: sorted.length,
    min: percentile(sorted, 0),
    q1: percentile(sorted, 0.25),
    median: percentile(sorted, 0.5),
    q3: percentile(sorted, 0.75),
    max: percentile(sorted, 1),
  };
}

// ============================================
// Grouping
// ============================================

/**
 * Box statistics of one metric per diet, diets in first-seen order. Records
 * whose metric is undefined (a zero-denominator ratio) or not below `cap` are
 * left out; a diet with no remaining values gets no box.
 */
export function distributionByDiet(
  records: Iterable<RecipeRecord>,
  metric: RankingMetric,
  cap: number | null = null
): Distribution {
  const byDiet = new Map<string, number[]>();

  for (const record of records) {
    const value = metricValue(recipeMacros(record), metric);
    if (value === undefined || !Number.isFinite(value)) continue;
    if (cap !== null && value >= cap) continue;
    const values = byDiet.get(record.dietType);
    if (values) values.push(value);
    else byDiet.set(record.dietType, [value]);
  }

  return {
    metric,
    cap,
    boxes: [...byDiet].map(([dietType, values]) => ({ dietType, box: boxStats(values) })),
  };
}

export function macroDistributions(records: readonly RecipeRecord[]): Distribution[] {
  return NUTRIENT_FIELDS.map((field) => distributionByDiet(records, field));
}

export function ratioDistributions(records: readonly RecipeRecord[]): Distribution[] {
  return [
    distributionByDiet(records, "protein_to_carbs", RATIO_CAPS.protein_to_carbs),
    distributionByDiet(records, "carbs_to_fat", RATIO_CAPS.carbs_to_fat),
  ];
}
