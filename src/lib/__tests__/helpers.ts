import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { vi } from "vitest";
import type { RecipeRecord } from "@/lib/cleaner";
import type { Logger } from "@/lib/errors";

export function makeTempDir(prefix = "diet-report-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeCsv(dir: string, name: string, lines: string[]): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, lines.map((l) => `${l}\n`).join(""));
  return file;
}

let nextLine = 1;

export function recipe(overrides: Partial<RecipeRecord> = {}): RecipeRecord {
  return {
    line: nextLine++,
    dietType: "keto",
    cuisineType: "american",
    recipeName: "Recipe",
    proteinG: 10,
    carbsG: 10,
    fatG: 10,
    ...overrides,
  };
}

export function silentLogger(): Logger {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) items.push(item);
  return items;
}
