/**
 * Per-diet (and per diet × cuisine) macro-nutrient statistics
 *
 * Single pass over the cleaned records. Groups are emitted in the order their
 * key first appears, so identical input always yields identical ordering.
 */

import type { RecipeRecord } from "./cleaner";
import { NUTRIENT_FIELDS, type NutrientField } from "./schema";

export interface NutrientStats {
  mean: number;
  /** Sample standard deviation; null with fewer than two records */
  stdDev: number | null;
  min: number;
  max: number;
  total: number;
}

export type MacroStats = Record<NutrientField, NutrientStats>;

export interface CuisineCount {
  cuisineType: string;
  count: number;
}

export interface DietSummary {
  dietType: string;
  recordCount: number;
  macros: MacroStats;
  topCuisines: CuisineCount[];
}

export interface DietCuisineSummary {
  dietType: string;
  cuisineType: string;
  recordCount: number;
  macros: MacroStats;
}

export const TOP_CUISINES = 5;

// ============================================
// Running statistics
// ============================================

export function nutrientAmount(record: RecipeRecord, field: NutrientField): number {
  switch (field) {
    case "protein":
      return record.proteinG;
    case "carbs":
      return record.carbsG;
    case "fat":
      return record.fatG;
  }
}

// Welford running mean/variance
class RunningStats {
  private n = 0;
  private mean = 0;
  private m2 = 0;
  private min = Infinity;
  private max = -Infinity;
  private total = 0;

  push(value: number): void {
    this.n++;
    const delta = value - this.mean;
    this.mean += delta / this.n;
    this.m2 += delta * (value - this.mean);
    this.total += value;
    if (value < this.min) this.min = value;
    if (value > this.max) this.max = value;
  }

  toStats(): NutrientStats {
    if (this.n === 0) {
      throw new Error("toStats called on an empty group");
    }
    return {
      mean: this.mean,
      stdDev: this.n >= 2 ? Math.sqrt(this.m2 / (this.n - 1)) : null,
      min: this.min,
      max: this.max,
      total: this.total,
    };
  }
}

class MacroAccumulator {
  count = 0;
  private readonly stats: Record<NutrientField, RunningStats> = {
    protein: new RunningStats(),
    carbs: new RunningStats(),
    fat: new RunningStats(),
  };

  push(record: RecipeRecord): void {
    this.count++;
    for (const field of NUTRIENT_FIELDS) {
      this.stats[field].push(nutrientAmount(record, field));
    }
  }

  toMacros(): MacroStats {
    return {
      protein: this.stats.protein.toStats(),
      carbs: this.stats.carbs.toStats(),
      fat: this.stats.fat.toStats(),
    };
  }
}

// ============================================
// Grouping
// ============================================

/**
 * Most common cuisines first; equal counts ordered by name.
 */
function topCuisines(counts: Map<string, number>, limit: number): CuisineCount[] {
  return [...counts]
    .map(([cuisineType, count]) => ({ cuisineType, count }))
    .sort((a, b) => b.count - a.count || compareText(a.cuisineType, b.cuisineType))
    .slice(0, limit);
}

/** Locale-independent string order (UTF-16 code units). */
export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function summarizeByDiet(records: Iterable<RecipeRecord>): DietSummary[] {
  const groups = new Map<string, { acc: MacroAccumulator; cuisines: Map<string, number> }>();

  for (const record of records) {
    let group = groups.get(record.dietType);
    if (!group) {
      group = { acc: new MacroAccumulator(), cuisines: new Map() };
      groups.set(record.dietType, group);
    }
    group.acc.push(record);
    group.cuisines.set(record.cuisineType, (group.cuisines.get(record.cuisineType) ?? 0) + 1);
  }

  const summaries: DietSummary[] = [];
  for (const [dietType, { acc, cuisines }] of groups) {
    if (acc.count === 0) continue;
    summaries.push({
      dietType,
      recordCount: acc.count,
      macros: acc.toMacros(),
      topCuisines: topCuisines(cuisines, TOP_CUISINES),
    });
  }
  return summaries;
}

export function summarizeByDietAndCuisine(records: Iterable<RecipeRecord>): DietCuisineSummary[] {
  // diet -> cuisine -> stats; both levels keep first-seen order
  const groups = new Map<string, Map<string, MacroAccumulator>>();

  for (const record of records) {
    let byCuisine = groups.get(record.dietType);
    if (!byCuisine) {
      byCuisine = new Map();
      groups.set(record.dietType, byCuisine);
    }
    let acc = byCuisine.get(record.cuisineType);
    if (!acc) {
      acc = new MacroAccumulator();
      byCuisine.set(record.cuisineType, acc);
    }
    acc.push(record);
  }

  const summaries: DietCuisineSummary[] = [];
  for (const [dietType, byCuisine] of groups) {
    for (const [cuisineType, acc] of byCuisine) {
      if (acc.count === 0) continue;
      summaries.push({ dietType, cuisineType, recordCount: acc.count, macros: acc.toMacros() });
    }
  }
  return summaries;
}
