/**
 * Recipe table loader
 *
 * Streams a comma-delimited file row by row. The header must contain every
 * column named by the mapping; values are passed through as raw strings and
 * interpreted later by the cleaner.
 */

import * as fs from "fs";
import { parse } from "csv-parse";
import { IngestError } from "./errors";
import { FIELD_NAMES, type ColumnMapping } from "./schema";

export interface RawRow {
  /** 1-based data row number (the header is not counted) */
  line: number;
  values: Record<string, string>;
}

/**
 * Returns the mapped columns missing from the header, in field order.
 */
export function checkHeader(header: readonly string[], columns: ColumnMapping): string[] {
  const present = new Set(header);
  return FIELD_NAMES.map((field) => columns[field]).filter((column) => !present.has(column));
}

function toCells(record: unknown): string[] {
  if (!Array.isArray(record)) return [];
  return record.map((cell) => (typeof cell === "string" ? cell : String(cell ?? "")));
}

export async function* readRecipeRows(
  filePath: string,
  columns: ColumnMapping
): AsyncGenerator<RawRow> {
  try {
    await fs.promises.access(filePath, fs.constants.R_OK);
  } catch (error) {
    throw new IngestError(`Cannot read input file "${filePath}"`, { cause: error });
  }

  const input = fs.createReadStream(filePath);
  const parser = parse({
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  input.on("error", (err) => parser.destroy(err));
  input.pipe(parser);

  let header: string[] | null = null;
  let line = 0;

  try {
    for await (const record of parser) {
      const cells = toCells(record);

      if (header === null) {
        const missing = checkHeader(cells, columns);
        if (missing.length > 0) {
          throw new IngestError(
            `Input file "${filePath}" is missing required column(s): ${missing.join(", ")}`,
            { details: { missing, header: cells } }
          );
        }
        header = cells;
        continue;
      }

      line++;
      const values: Record<string, string> = {};
      header.forEach((name, i) => {
        values[name] = cells[i] ?? "";
      });
      yield { line, values };
    }
  } catch (error) {
    if (error instanceof IngestError) throw error;
    throw new IngestError(`Failed to parse input file "${filePath}"`, { cause: error });
  } finally {
    input.destroy();
  }

  if (header === null) {
    throw new IngestError(`Input file "${filePath}" is empty (no header row)`);
  }
}
