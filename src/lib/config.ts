/**
 * Report configuration
 *
 * Read from the process environment (the entry script loads .env.local via
 * dotenv first):
 *
 *   INPUT_PATH=All_Diets.csv      source table
 *   OUTPUT_DIR=output             artifact destination
 *   TOP_N=10                      length of the overall rankings
 *   TOP_PER_DIET=5                length of each per-diet ranking
 *   COLUMN_MAP={"protein":"protein_g"}   optional header overrides
 */

import { z } from "zod";
import { fromZodError, ConfigError } from "./errors";
import { ColumnMappingSchema, DEFAULT_COLUMNS, type ColumnMapping } from "./schema";

export const DEFAULT_INPUT_PATH = "All_Diets.csv";
export const DEFAULT_OUTPUT_DIR = "output";
export const DEFAULT_TOP_N = 10;
export const DEFAULT_TOP_PER_DIET = 5;

export interface ReportConfig {
  inputPath: string;
  outputDir: string;
  topN: number;
  topPerDiet: number;
  columns: ColumnMapping;
}

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const EnvSchema = z.object({
  INPUT_PATH: optionalText,
  OUTPUT_DIR: optionalText,
  TOP_N: optionalText.pipe(z.coerce.number().int().positive().optional()),
  TOP_PER_DIET: optionalText.pipe(z.coerce.number().int().positive().optional()),
  COLUMN_MAP: optionalText,
});

function parseColumnMap(raw: string | undefined): ColumnMapping {
  if (raw === undefined) return { ...DEFAULT_COLUMNS };

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError("COLUMN_MAP is not valid JSON", { cause: error });
  }

  const result = ColumnMappingSchema.safeParse(json);
  if (!result.success) throw fromZodError(result.error, "COLUMN_MAP");
  return result.data;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ReportConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) throw fromZodError(result.error, "environment");
  const parsed = result.data;

  return {
    inputPath: parsed.INPUT_PATH ?? DEFAULT_INPUT_PATH,
    outputDir: parsed.OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR,
    topN: parsed.TOP_N ?? DEFAULT_TOP_N,
    topPerDiet: parsed.TOP_PER_DIET ?? DEFAULT_TOP_PER_DIET,
    columns: parseColumnMap(parsed.COLUMN_MAP),
  };
}
