/**
 * Column mapping for the recipe table
 *
 * Maps each semantic field the pipeline needs to the header name used by the
 * source file. The defaults match the All_Diets.csv export.
 */

import { z } from "zod";

export const FIELD_NAMES = [
  "dietType",
  "cuisineType",
  "recipeName",
  "protein",
  "carbs",
  "fat",
] as const;

export type FieldName = (typeof FIELD_NAMES)[number];

export type ColumnMapping = Record<FieldName, string>;

export const NUTRIENT_FIELDS = ["protein", "carbs", "fat"] as const;

export type NutrientField = (typeof NUTRIENT_FIELDS)[number];

export const NUTRIENT_LABELS: Record<NutrientField, string> = {
  protein: "Protein",
  carbs: "Carbs",
  fat: "Fat",
};

export const DEFAULT_COLUMNS: ColumnMapping = {
  dietType: "Diet_type",
  cuisineType: "Cuisine_type",
  recipeName: "Recipe_name",
  protein: "Protein(g)",
  carbs: "Carbs(g)",
  fat: "Fat(g)",
};

const ColumnName = z.string().trim().min(1, "Column name must not be empty");

/** Partial override; unspecified fields keep their default column. */
export const ColumnMappingSchema = z
  .object({
    dietType: ColumnName.optional(),
    cuisineType: ColumnName.optional(),
    recipeName: ColumnName.optional(),
    protein: ColumnName.optional(),
    carbs: ColumnName.optional(),
    fat: ColumnName.optional(),
  })
  .strict()
  .transform((override): ColumnMapping => ({ ...DEFAULT_COLUMNS, ...stripUndefined(override) }))
  .refine((mapping) => new Set(Object.values(mapping)).size === FIELD_NAMES.length, {
    message: "Each field must map to a distinct column",
  });

function stripUndefined(override: Partial<ColumnMapping>): Partial<ColumnMapping> {
  const result: Partial<ColumnMapping> = {};
  for (const field of FIELD_NAMES) {
    const column = override[field];
    if (column !== undefined) result[field] = column;
  }
  return result;
}
