import { describe, test, expect } from "vitest";
import { summarizeByDiet, summarizeByDietAndCuisine } from "@/lib/aggregator";
import { emptyRejectionCounts, type RecipeRecord } from "@/lib/cleaner";
import { rankDiets, rankRecipes, rankRecipesPerDiet } from "@/lib/ranker";
import {
  analysisSummary,
  buildReportFiles,
  dietDocuments,
  documentIds,
  dietSummaryTable,
  formatNumber,
  processedRecipesTable,
  recipeRankingTable,
  type ReportData,
} from "@/lib/report";
import { recipe } from "./helpers";

function reportData(records: RecipeRecord[], totalRows = records.length): ReportData {
  const dietSummaries = summarizeByDiet(records);
  return {
    inputPath: "All_Diets.csv",
    totalRows,
    records,
    rejected: emptyRejectionCounts(),
    rejections: [],
    dietSummaries,
    dietCuisineSummaries: summarizeByDietAndCuisine(records),
    topProtein: rankRecipes(records, "protein", 10),
    topProteinToCarbs: rankRecipes(records, "protein_to_carbs", 10),
    topProteinByDiet: rankRecipesPerDiet(records, "protein", 5),
    dietProteinRanking: rankDiets(dietSummaries, "protein", 10),
  };
}

describe("formatNumber", () => {
  test("two decimals, empty for missing values", () => {
    expect(formatNumber(3)).toBe("3.00");
    expect(formatNumber(0.125)).toBe("0.13");
    expect(formatNumber(null)).toBe("");
    expect(formatNumber(undefined)).toBe("");
    expect(formatNumber(NaN)).toBe("");
  });
});

describe("tables", () => {
  test("diet summary rows carry every statistic", () => {
    const csv = dietSummaryTable(
      summarizeByDiet([
        recipe({ dietType: "keto", cuisineType: "american", proteinG: 30, carbsG: 5, fatG: 40 }),
      ])
    );

    expect(csv.split("\n")).toEqual([
      "diet_type,record_count," +
        "mean_protein,stddev_protein,min_protein,max_protein," +
        "mean_carbs,stddev_carbs,min_carbs,max_carbs," +
        "mean_fat,stddev_fat,min_fat,max_fat,total_protein,top_cuisines",
      "keto,1,30.00,,30.00,30.00,5.00,,5.00,5.00,40.00,,40.00,40.00,30.00,american:1",
      "",
    ]);
  });

  test("empty tables still have their header", () => {
    expect(dietSummaryTable([])).toBe(
      "diet_type,record_count," +
        "mean_protein,stddev_protein,min_protein,max_protein," +
        "mean_carbs,stddev_carbs,min_carbs,max_carbs," +
        "mean_fat,stddev_fat,min_fat,max_fat,total_protein,top_cuisines\n"
    );
    expect(recipeRankingTable([])).toBe(
      "rank,recipe_name,diet_type,cuisine_type,metric,value,protein_g,carbs_g,fat_g\n"
    );
  });

  test("ranking rows quote names containing commas", () => {
    const csv = recipeRankingTable(
      rankRecipes([recipe({ recipeName: "Steak, grilled", proteinG: 52.1, carbsG: 3.2, fatG: 20.5 })], "protein", 5)
    );

    expect(csv.split("\n")[1]).toBe('1,"Steak, grilled",keto,american,protein,52.10,52.10,3.20,20.50');
  });

  test("processed recipes include ratios, blank when undefined", () => {
    const csv = processedRecipesTable([
      recipe({ dietType: "vegan", recipeName: "Oats", cuisineType: "british", proteinG: 6, carbsG: 30, fatG: 3 }),
      recipe({ dietType: "keto", recipeName: "Butter", cuisineType: "french", proteinG: 1, carbsG: 0, fatG: 81 }),
    ]);

    expect(csv.split("\n").slice(1, 3)).toEqual([
      "vegan,Oats,british,6.00,30.00,3.00,0.20,10.00",
      "keto,Butter,french,1.00,0.00,81.00,,0.00",
    ]);
  });
});

describe("dietDocuments", () => {
  test("one rounded document per diet", () => {
    const json = dietDocuments(
      summarizeByDiet([
        recipe({ dietType: "low carb", cuisineType: "thai", proteinG: 10, carbsG: 1, fatG: 2 }),
        recipe({ dietType: "low carb", cuisineType: "thai", proteinG: 11, carbsG: 2, fatG: 2 }),
        recipe({ dietType: "low carb", cuisineType: "thai", proteinG: 12, carbsG: 2, fatG: 3 }),
      ])
    );

    expect(JSON.parse(json)).toEqual([
      {
        _id: "low_carb",
        diet_type: "low carb",
        recipe_count: 3,
        macronutrients: { protein_g: 11, carbs_g: 1.67, fat_g: 2.33 },
        max_protein: 12,
        min_protein: 10,
        top_cuisines: { thai: 3 },
      },
    ]);
  });
});

describe("documentIds", () => {
  test("diets whose names differ only in spacing get distinct keys", () => {
    expect(documentIds(["low_carb", "low carb", "low  carb", "keto"])).toEqual([
      "low_carb",
      "low_carb_2",
      "low_carb_3",
      "keto",
    ]);
  });

  test("a suffix already used by a real diet is skipped", () => {
    expect(documentIds(["low_carb_2", "low_carb", "low carb"])).toEqual([
      "low_carb_2",
      "low_carb",
      "low_carb_3",
    ]);
  });

  test("every document carries its own key", () => {
    const json = dietDocuments(
      summarizeByDiet([recipe({ dietType: "low carb" }), recipe({ dietType: "low_carb" })])
    );
    expect(JSON.parse(json).map((d: { _id: string }) => d._id)).toEqual(["low_carb", "low_carb_2"]);
  });
});

describe("analysisSummary", () => {
  test("reports row accounting and the highest protein diet", () => {
    const data = reportData([
      recipe({ dietType: "keto", proteinG: 30 }),
      recipe({ dietType: "vegan", proteinG: 10 }),
    ], 3);
    data.rejected = { missing_field: 0, non_numeric: 1, negative_value: 0 };
    data.rejections = [{ line: 2, reason: "non_numeric", column: "Carbs(g)" }];

    const lines = analysisSummary(data).split("\n");

    expect(lines).toContain("Rows read: 3");
    expect(lines).toContain("Rows accepted: 2");
    expect(lines).toContain("Rows rejected: 1");
    expect(lines).toContain("  non_numeric: 1");
    expect(lines).toContain("  row 2: non_numeric (Carbs(g))");
    expect(lines).toContain("  keto with 30.00 g average protein");
  });

  test("empty data is summarized without diets", () => {
    const lines = analysisSummary(reportData([])).split("\n");
    expect(lines).toContain("  (no valid records)");
    expect(lines).toContain("  (none)");
  });
});

describe("buildReportFiles", () => {
  test("produces every table and document under a fixed name", () => {
    const files = buildReportFiles(reportData([recipe()]));
    expect(files.map((f) => [f.kind, f.name])).toEqual([
      ["table", "diet_summary.csv"],
      ["table", "diet_cuisine_summary.csv"],
      ["table", "top_protein.csv"],
      ["table", "top_protein_to_carbs.csv"],
      ["table", "top_protein_by_diet.csv"],
      ["table", "diet_protein_ranking.csv"],
      ["table", "processed_recipes.csv"],
      ["document", "diet_documents.json"],
      ["document", "analysis_summary.txt"],
    ]);
  });
});
