/**
 * Row validation and cleaning
 *
 * Turns raw rows into typed recipe records. A row with any invalid field is
 * rejected with a single reason; nothing is ever filled in with a default.
 */

import { z } from "zod";
import type { RawRow } from "./loader";
import { FIELD_NAMES, type ColumnMapping, type FieldName } from "./schema";

export const REJECTION_REASONS = ["missing_field", "non_numeric", "negative_value"] as const;

export type RejectionReason = (typeof REJECTION_REASONS)[number];

export const UNSPECIFIED_CUISINE = "unspecified";

export interface RecipeRecord {
  line: number;
  dietType: string;
  cuisineType: string;
  recipeName: string;
  proteinG: number;
  carbsG: number;
  fatG: number;
}

export interface Rejection {
  line: number;
  reason: RejectionReason;
  column: string;
}

export type RowResult =
  | { ok: true; record: RecipeRecord }
  | { ok: false; rejection: Rejection };

export interface CleanResult {
  records: RecipeRecord[];
  rejected: Record<RejectionReason, number>;
  rejections: Rejection[];
  totalRows: number;
}

// Plain decimal literals only: no hex, no "Infinity", no thousands separators.
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/** Largest accepted amount in grams; keeps group totals finite. */
export const MAX_AMOUNT_G = 1_000_000;

const requiredText = z
  .string({ required_error: "missing_field", invalid_type_error: "missing_field" })
  .trim()
  .min(1, "missing_field");

const nutrientAmount = requiredText
  .regex(DECIMAL, "non_numeric")
  .transform(Number)
  .refine(Number.isFinite, "non_numeric")
  .refine((n) => n >= 0, "negative_value")
  .refine((n) => n <= MAX_AMOUNT_G, "non_numeric");

function isRejectionReason(value: string): value is RejectionReason {
  return (REJECTION_REASONS as readonly string[]).includes(value);
}

/**
 * Trim, collapse inner whitespace and lowercase a category label so that
 * " Keto ", "keto" and "KETO" group together.
 */
export function normalizeLabel(label: string): string {
  return label.trim().replace(/\s+/g, " ").toLowerCase();
}

// Key order is check order: the first failing field decides the reason.
const RowSchema = z.object({
  dietType: requiredText,
  recipeName: requiredText,
  protein: nutrientAmount,
  carbs: nutrientAmount,
  fat: nutrientAmount,
  cuisineType: z.string().optional(),
});

function isFieldName(value: unknown): value is FieldName {
  return typeof value === "string" && (FIELD_NAMES as readonly string[]).includes(value);
}

export function validateRow(row: RawRow, columns: ColumnMapping): RowResult {
  const fields: Record<FieldName, string | undefined> = {
    dietType: row.values[columns.dietType],
    cuisineType: row.values[columns.cuisineType],
    recipeName: row.values[columns.recipeName],
    protein: row.values[columns.protein],
    carbs: row.values[columns.carbs],
    fat: row.values[columns.fat],
  };

  const result = RowSchema.safeParse(fields);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path[0];
    const message = issue?.message ?? "missing_field";
    return {
      ok: false,
      rejection: {
        line: row.line,
        reason: isRejectionReason(message) ? message : "non_numeric",
        column: isFieldName(field) ? columns[field] : "",
      },
    };
  }

  const { dietType, recipeName, protein, carbs, fat, cuisineType } = result.data;
  const cuisine = normalizeLabel(cuisineType ?? "");

  return {
    ok: true,
    record: {
      line: row.line,
      dietType: normalizeLabel(dietType),
      cuisineType: cuisine === "" ? UNSPECIFIED_CUISINE : cuisine,
      recipeName,
      proteinG: protein,
      carbsG: carbs,
      fatG: fat,
    },
  };
}

export function emptyRejectionCounts(): Record<RejectionReason, number> {
  return { missing_field: 0, non_numeric: 0, negative_value: 0 };
}

export async function cleanRows(
  rows: AsyncIterable<RawRow> | Iterable<RawRow>,
  columns: ColumnMapping
): Promise<CleanResult> {
  const records: RecipeRecord[] = [];
  const rejections: Rejection[] = [];
  const rejected = emptyRejectionCounts();
  let totalRows = 0;

  for await (const row of rows) {
    totalRows++;
    const result = validateRow(row, columns);
    if (result.ok) {
      records.push(result.record);
    } else {
      rejected[result.rejection.reason]++;
      rejections.push(result.rejection);
    }
  }

  return { records, rejected, rejections, totalRows };
}
