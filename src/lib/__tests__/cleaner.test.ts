import { describe, test, expect } from "vitest";
import { cleanRows, MAX_AMOUNT_G, normalizeLabel, validateRow, UNSPECIFIED_CUISINE } from "@/lib/cleaner";
import type { RawRow } from "@/lib/loader";
import { DEFAULT_COLUMNS } from "@/lib/schema";

function row(values: Partial<Record<string, string>>, line = 1): RawRow {
  const base: Record<string, string> = {
    Diet_type: "keto",
    Recipe_name: "Egg Muffins",
    Cuisine_type: "american",
    "Protein(g)": "12",
    "Carbs(g)": "2",
    "Fat(g)": "9",
  };
  for (const [key, value] of Object.entries(values)) {
    if (value === undefined) delete base[key];
    else base[key] = value;
  }
  return { line, values: base };
}

function rejectionOf(values: Partial<Record<string, string>>) {
  const result = validateRow(row(values), DEFAULT_COLUMNS);
  return result.ok ? null : result.rejection;
}

describe("normalizeLabel", () => {
  test("trims, collapses whitespace and lowercases", () => {
    expect(normalizeLabel("  Low   Carb ")).toBe("low carb");
    expect(normalizeLabel("KETO")).toBe("keto");
    expect(normalizeLabel("\tmediterranean\n")).toBe("mediterranean");
  });
});

describe("validateRow", () => {
  test("builds a normalized record from a valid row", () => {
    const result = validateRow(
      row({
        Diet_type: " Keto ",
        Cuisine_type: "  Mediterranean ",
        Recipe_name: "  Salmon Bowl ",
        "Protein(g)": "30.5",
        "Carbs(g)": " 5 ",
        "Fat(g)": "0",
      }, 7),
      DEFAULT_COLUMNS
    );

    expect(result).toEqual({
      ok: true,
      record: {
        line: 7,
        dietType: "keto",
        cuisineType: "mediterranean",
        recipeName: "Salmon Bowl",
        proteinG: 30.5,
        carbsG: 5,
        fatG: 0,
      },
    });
  });

  test("accepts exponent notation", () => {
    const result = validateRow(row({ "Protein(g)": "1.5e1" }), DEFAULT_COLUMNS);
    expect(result.ok && result.record.proteinG).toBe(15);
  });

  test("an empty cuisine is kept as unspecified", () => {
    const result = validateRow(row({ Cuisine_type: "  " }), DEFAULT_COLUMNS);
    expect(result.ok && result.record.cuisineType).toBe(UNSPECIFIED_CUISINE);
  });

  test("empty diet type is a missing field", () => {
    expect(rejectionOf({ Diet_type: "   " })).toEqual({
      line: 1,
      reason: "missing_field",
      column: "Diet_type",
    });
  });

  test("empty recipe name is a missing field", () => {
    expect(rejectionOf({ Recipe_name: "" })?.reason).toBe("missing_field");
    expect(rejectionOf({ Recipe_name: "" })?.column).toBe("Recipe_name");
  });

  test("empty or absent nutrient is a missing field, never zero", () => {
    expect(rejectionOf({ "Protein(g)": "" })).toEqual({
      line: 1,
      reason: "missing_field",
      column: "Protein(g)",
    });
    expect(rejectionOf({ "Fat(g)": undefined })?.reason).toBe("missing_field");
  });

  test.each(["bad", "12g", "1,234", "0x10", "Infinity", "NaN", "1e999", "--1"])(
    "%s is non-numeric",
    (value) => {
      expect(rejectionOf({ "Carbs(g)": value })).toEqual({
        line: 1,
        reason: "non_numeric",
        column: "Carbs(g)",
      });
    }
  );

  test("amounts above the gram bound are non-numeric", () => {
    expect(rejectionOf({ "Protein(g)": "1e308" })).toEqual({
      line: 1,
      reason: "non_numeric",
      column: "Protein(g)",
    });
    expect(rejectionOf({ "Fat(g)": "1000000.01" })?.reason).toBe("non_numeric");

    const atBound = validateRow(row({ "Protein(g)": String(MAX_AMOUNT_G) }), DEFAULT_COLUMNS);
    expect(atBound.ok && atBound.record.proteinG).toBe(1_000_000);
  });

  test("negative amounts are rejected", () => {
    expect(rejectionOf({ "Fat(g)": "-0.5" })).toEqual({
      line: 1,
      reason: "negative_value",
      column: "Fat(g)",
    });
  });

  test("the first failing field decides the reason", () => {
    expect(rejectionOf({ Diet_type: "", "Carbs(g)": "bad" })?.reason).toBe("missing_field");
    expect(rejectionOf({ "Protein(g)": "-3", "Carbs(g)": "bad" })?.reason).toBe("negative_value");
    expect(rejectionOf({ "Protein(g)": "abc", "Fat(g)": "-1" })?.column).toBe("Protein(g)");
  });

  test("uses the configured column mapping", () => {
    const columns = {
      dietType: "diet_type",
      cuisineType: "cuisine_type",
      recipeName: "recipe_name",
      protein: "protein_g",
      carbs: "carbs_g",
      fat: "fat_g",
    };
    const result = validateRow(
      {
        line: 3,
        values: {
          diet_type: "Vegan",
          cuisine_type: "Thai",
          recipe_name: "Tofu Curry",
          protein_g: "14",
          carbs_g: "22",
          fat_g: "11",
        },
      },
      columns
    );
    expect(result.ok && result.record.dietType).toBe("vegan");
    expect(result.ok && result.record.carbsG).toBe(22);
  });
});

describe("cleanRows", () => {
  test("counts rejections by reason and keeps valid records in order", async () => {
    const rows = [
      row({ Recipe_name: "A" }, 1),
      row({ "Carbs(g)": "bad" }, 2),
      row({ Recipe_name: "B", Diet_type: "Vegan" }, 3),
      row({ "Fat(g)": "-2" }, 4),
      row({ "Protein(g)": "" }, 5),
      row({ "Protein(g)": "n/a" }, 6),
    ];

    const result = await cleanRows(rows, DEFAULT_COLUMNS);

    expect(result.totalRows).toBe(6);
    expect(result.records.map((r) => r.recipeName)).toEqual(["A", "B"]);
    expect(result.rejected).toEqual({ missing_field: 1, non_numeric: 2, negative_value: 1 });
    expect(result.rejections.map((r) => r.line)).toEqual([2, 4, 5, 6]);
  });

  test("rejected plus accepted equals rows read", async () => {
    const values = ["1", "", "x", "-1", "2.5", " ", "3e2", "-0", "7"];
    const rows = values.map((v, i) => row({ "Protein(g)": v }, i + 1));

    const result = await cleanRows(rows, DEFAULT_COLUMNS);
    const rejected = Object.values(result.rejected).reduce((a, b) => a + b, 0);

    expect(rejected + result.records.length).toBe(result.totalRows);
    expect(result.totalRows).toBe(values.length);
  });

  test("consumes an async row stream", async () => {
    async function* stream() {
      yield row({ Recipe_name: "First" }, 1);
      yield row({ Recipe_name: "Second" }, 2);
    }

    const result = await cleanRows(stream(), DEFAULT_COLUMNS);

    expect(result.records.map((r) => r.line)).toEqual([1, 2]);
  });
});
