/**
 * Chart rendering
 *
 * Bar, pie and scatter plots are recharts charts rendered to static markup
 * and placed inside a titled SVG frame; the heatmap and box plots, which
 * recharts does not provide, are drawn directly. Category order and colours
 * come only from the order of the summaries passed in: the diet at position
 * i always gets PALETTE[i % PALETTE.length].
 */

import type { ReactElement, ReactNode } from "react";
import { renderToStaticMarkup } from "react-dom/server";
import {
  Bar,
  BarChart,
  CartesianGrid,
  Cell,
  Pie,
  PieChart,
  Scatter,
  ScatterChart,
  XAxis,
  YAxis,
} from "recharts";
import type { DietSummary } from "./aggregator";
import type { RecipeRecord } from "./cleaner";
import type { Distribution } from "./distributions";
import { METRIC_LABELS, type DietRanking, type RankingEntry } from "./ranker";
import { NUTRIENT_FIELDS, NUTRIENT_LABELS } from "./schema";

export const CHART_NAMES = [
  "macros_by_diet",
  "diet_share",
  "macro_heatmap",
  "macro_distributions",
  "ratio_distributions",
  "top_protein",
  "top_protein_to_carbs",
  "top_protein_scatter",
] as const;

export type ChartName = (typeof CHART_NAMES)[number];

export interface ChartArtifact {
  name: ChartName;
  title: string;
  svg: string;
}

export interface SkippedChart {
  name: ChartName;
  reason: string;
}

export interface ChartInput {
  summaries: DietSummary[];
  topProtein: RankingEntry<RecipeRecord>[];
  topProteinToCarbs: RankingEntry<RecipeRecord>[];
  topProteinByDiet: DietRanking[];
  macroDistributions: Distribution[];
  ratioDistributions: Distribution[];
}

export const PALETTE = [
  "#6366f1",
  "#f59e0b",
  "#10b981",
  "#ef4444",
  "#0ea5e9",
  "#a855f7",
  "#84cc16",
  "#ec4899",
  "#14b8a6",
  "#f97316",
] as const;

const NUTRIENT_COLORS = {
  protein: "#4f46e5",
  carbs: "#f59e0b",
  fat: "#10b981",
} as const;

const WIDTH = 960;
const HEIGHT = 540;
const MARGIN = { top: 70, right: 40, bottom: 90, left: 80 };
const PLOT_TOP = 56;
const LEGEND_HEIGHT = 44;
const FONT = "DejaVu Sans, Arial, sans-serif";
const TEXT_COLOR = "#374151";
const MUTED_COLOR = "#6b7280";
const GRID_COLOR = "#e5e7eb";

// ============================================
// Shared helpers
// ============================================

export function dietColor(index: number): string {
  return PALETTE[index % PALETTE.length] ?? PALETTE[0];
}

function colorOf(dietOrder: readonly string[], dietType: string): string {
  const index = dietOrder.indexOf(dietType);
  return dietColor(index < 0 ? 0 : index);
}

/** Round a coordinate so markup is stable across platforms. */
function px(value: number): number {
  return Math.round(value * 100) / 100;
}

function label(value: number): string {
  return value.toFixed(2).replace(/\.?0+$/, "");
}

/**
 * Upper bound for a value axis: the next multiple of the value's leading
 * power of ten.
 */
export function niceMax(value: number): number {
  if (!Number.isFinite(value) || value <= 0) return 1;
  const magnitude = 10 ** Math.floor(Math.log10(value));
  return px(Math.ceil(value / magnitude) * magnitude);
}

/** Shorten to `max` code points so a surrogate pair is never split. */
export function truncate(text: string, max: number): string {
  const chars = [...text];
  return chars.length > max ? `${chars.slice(0, max - 1).join("")}…` : text;
}

/**
 * recharts wraps its <svg> in an HTML container; keep only the drawing
 * inside the svg so it can sit in the chart frame.
 */
function plotMarkup(chart: ReactElement): string {
  const match = /<svg[^>]*>([\s\S]*)<\/svg>/.exec(renderToStaticMarkup(chart));
  if (!match) {
    throw new Error("chart rendered no svg element");
  }
  return match[1] ?? "";
}

function Frame({ title, children }: { title: string; children: ReactNode }) {
  return (
    <svg
      xmlns="http://www.w3.org/2000/svg"
      width={WIDTH}
      height={HEIGHT}
      viewBox={`0 0 ${WIDTH} ${HEIGHT}`}
      fontFamily={FONT}
    >
      <rect width={WIDTH} height={HEIGHT} fill="#ffffff" />
      <text x={WIDTH / 2} y={36} textAnchor="middle" fontSize={22} fontWeight={700} fill="#111827">
        {title}
      </text>
      {children}
    </svg>
  );
}

function Plot({ markup }: { markup: string }) {
  return <g transform={`translate(0 ${PLOT_TOP})`} dangerouslySetInnerHTML={{ __html: markup }} />;
}

interface LegendItem {
  label: string;
  color: string;
}

function Legend({
  items,
  x,
  y,
  direction,
}: {
  items: LegendItem[];
  x: number;
  y: number;
  direction: "row" | "column";
}) {
  return (
    <g transform={`translate(${x} ${y})`}>
      {items.map((item, i) => (
        <g
          key={item.label}
          transform={direction === "row" ? `translate(${i * 140} 0)` : `translate(0 ${i * 28})`}
        >
          <rect width={16} height={16} fill={item.color} />
          <text x={24} y={13} fontSize={14} fill={TEXT_COLOR}>
            {item.label}
          </text>
        </g>
      ))}
    </g>
  );
}

function dietLegendItems(dietTypes: readonly string[], dietOrder: readonly string[]): LegendItem[] {
  return dietOrder
    .filter((dietType) => dietTypes.includes(dietType))
    .map((dietType) => ({ label: dietType, color: colorOf(dietOrder, dietType) }));
}

const axisTick = { fill: MUTED_COLOR, fontSize: 12 };

// ============================================
// recharts charts
// ============================================

export function macroBarChart(summaries: DietSummary[]): ReactElement {
  const data = summaries.map((s) => ({
    dietType: s.dietType,
    protein: s.macros.protein.mean,
    carbs: s.macros.carbs.mean,
    fat: s.macros.fat.mean,
  }));

  const plot = plotMarkup(
    <BarChart
      id="macros_by_diet"
      width={WIDTH}
      height={HEIGHT - PLOT_TOP - LEGEND_HEIGHT}
      data={data}
      margin={{ top: 10, right: 40, bottom: 10, left: 30 }}
    >
      <CartesianGrid strokeDasharray="3 3" stroke={GRID_COLOR} vertical={false} />
      <XAxis dataKey="dietType" interval={0} tick={{ fill: TEXT_COLOR, fontSize: 13 }} />
      <YAxis
        tick={axisTick}
        label={{ value: "Average amount (g)", angle: -90, position: "insideLeft", fill: TEXT_COLOR }}
      />
      {NUTRIENT_FIELDS.map((field) => (
        <Bar key={field} dataKey={field} fill={NUTRIENT_COLORS[field]} isAnimationActive={false} />
      ))}
    </BarChart>
  );

  return (
    <Frame title="Average Macronutrients by Diet Type">
      <Plot markup={plot} />
      <Legend
        items={NUTRIENT_FIELDS.map((f) => ({ label: NUTRIENT_LABELS[f], color: NUTRIENT_COLORS[f] }))}
        x={MARGIN.left}
        y={HEIGHT - 30}
        direction="row"
      />
    </Frame>
  );
}

export function dietSharePie(summaries: DietSummary[]): ReactElement {
  const total = summaries.reduce((sum, s) => sum + s.recordCount, 0);
  const data = summaries.map((s) => ({ dietType: s.dietType, count: s.recordCount }));

  const plot = plotMarkup(
    <PieChart id="diet_share" width={600} height={HEIGHT - PLOT_TOP}>
      <Pie
        data={data}
        dataKey="count"
        nameKey="dietType"
        cx={300}
        cy={230}
        outerRadius={190}
        startAngle={90}
        endAngle={-270}
        stroke="#ffffff"
        isAnimationActive={false}
      >
        {summaries.map((s, i) => (
          <Cell key={s.dietType} fill={dietColor(i)} />
        ))}
      </Pie>
    </PieChart>
  );

  const items = summaries.map((s, i) => ({
    label: `${s.dietType} (${s.recordCount}, ${((s.recordCount / total) * 100).toFixed(1)}%)`,
    color: dietColor(i),
  }));

  return (
    <Frame title="Recipe Share by Diet Type">
      <Plot markup={plot} />
      <Legend items={items} x={620} y={110} direction="column" />
    </Frame>
  );
}

export function rankingBarChart(
  name: ChartName,
  title: string,
  entries: RankingEntry<RecipeRecord>[],
  dietOrder: readonly string[]
): ReactElement {
  const metric = entries[0]?.metric ?? "protein";
  const data = entries.map((entry) => ({
    label: `${entry.rank}. ${truncate(entry.item.recipeName, 36)}`,
    value: entry.value,
    dietType: entry.item.dietType,
  }));

  const plot = plotMarkup(
    <BarChart
      id={name}
      layout="vertical"
      width={WIDTH}
      height={HEIGHT - PLOT_TOP - LEGEND_HEIGHT}
      data={data}
      margin={{ top: 10, right: 50, bottom: 20, left: 10 }}
    >
      <CartesianGrid strokeDasharray="3 3" stroke={GRID_COLOR} horizontal={false} />
      <XAxis
        type="number"
        tick={axisTick}
        label={{ value: METRIC_LABELS[metric], position: "insideBottom", offset: -12, fill: TEXT_COLOR }}
      />
      <YAxis type="category" dataKey="label" width={300} interval={0} tick={{ fill: TEXT_COLOR, fontSize: 12 }} />
      <Bar dataKey="value" isAnimationActive={false}>
        {data.map((d) => (
          <Cell key={d.label} fill={colorOf(dietOrder, d.dietType)} />
        ))}
      </Bar>
    </BarChart>
  );

  return (
    <Frame title={title}>
      <Plot markup={plot} />
      <Legend
        items={dietLegendItems(
          data.map((d) => d.dietType),
          dietOrder
        )}
        x={MARGIN.left}
        y={HEIGHT - 30}
        direction="row"
      />
    </Frame>
  );
}

/** Protein against carbs for each diet's top-protein recipes. */
export function proteinScatter(rankings: DietRanking[], dietOrder: readonly string[]): ReactElement {
  const groups = rankings.filter((r) => r.entries.length > 0);

  const plot = plotMarkup(
    <ScatterChart
      id="top_protein_scatter"
      width={WIDTH - 200}
      height={HEIGHT - PLOT_TOP}
      margin={{ top: 10, right: 30, bottom: 30, left: 30 }}
    >
      <CartesianGrid strokeDasharray="3 3" stroke={GRID_COLOR} />
      <XAxis
        type="number"
        dataKey="protein"
        tick={axisTick}
        label={{ value: "Protein (g)", position: "insideBottom", offset: -15, fill: TEXT_COLOR }}
      />
      <YAxis
        type="number"
        dataKey="carbs"
        tick={axisTick}
        label={{ value: "Carbs (g)", angle: -90, position: "insideLeft", fill: TEXT_COLOR }}
      />
      {groups.map((group) => (
        <Scatter
          key={group.dietType}
          name={group.dietType}
          data={group.entries.map((e) => ({ protein: e.item.proteinG, carbs: e.item.carbsG }))}
          fill={colorOf(dietOrder, group.dietType)}
          isAnimationActive={false}
        />
      ))}
    </ScatterChart>
  );

  return (
    <Frame title="Top Protein-Rich Recipes: Protein vs Carbs">
      <Plot markup={plot} />
      <Legend
        items={dietLegendItems(
          groups.map((g) => g.dietType),
          dietOrder
        )}
        x={WIDTH - 180}
        y={PLOT_TOP + 20}
        direction="column"
      />
    </Frame>
  );
}

// ============================================
// Hand-drawn charts
// ============================================

// light yellow to dark red
const HEAT_FROM = [0xff, 0xf7, 0xbc] as const;
const HEAT_TO = [0xb3, 0x00, 0x00] as const;

function heatColor(t: number): string {
  const channels = HEAT_FROM.map((from, i) =>
    Math.round(from + (HEAT_TO[i] - from) * t)
      .toString(16)
      .padStart(2, "0")
  );
  return `#${channels.join("")}`;
}

export function macroHeatmap(summaries: DietSummary[]): ReactElement {
  const plotWidth = WIDTH - MARGIN.left - MARGIN.right - 40;
  const plotHeight = HEIGHT - MARGIN.top - MARGIN.bottom;
  const cellWidth = plotWidth / summaries.length;
  const cellHeight = plotHeight / NUTRIENT_FIELDS.length;
  const max = Math.max(...summaries.flatMap((s) => NUTRIENT_FIELDS.map((f) => s.macros[f].mean)));
  const left = MARGIN.left + 40;

  return (
    <Frame title="Macronutrient Content Heatmap by Diet Type">
      {NUTRIENT_FIELDS.map((field, row) => (
        <g key={field}>
          <text
            x={left - 10}
            y={px(MARGIN.top + (row + 0.5) * cellHeight + 5)}
            textAnchor="end"
            fontSize={14}
            fill={TEXT_COLOR}
          >
            {NUTRIENT_LABELS[field]}
          </text>
          {summaries.map((summary, col) => {
            const mean = summary.macros[field].mean;
            const t = max > 0 ? mean / max : 0;
            return (
              <g key={summary.dietType}>
                <rect
                  x={px(left + col * cellWidth)}
                  y={px(MARGIN.top + row * cellHeight)}
                  width={px(cellWidth)}
                  height={px(cellHeight)}
                  fill={heatColor(t)}
                  stroke="#ffffff"
                />
                <text
                  x={px(left + (col + 0.5) * cellWidth)}
                  y={px(MARGIN.top + (row + 0.5) * cellHeight + 5)}
                  textAnchor="middle"
                  fontSize={13}
                  fill={t > 0.6 ? "#ffffff" : "#111827"}
                >
                  {mean.toFixed(2)}
                </text>
              </g>
            );
          })}
        </g>
      ))}
      {summaries.map((summary, col) => (
        <text
          key={summary.dietType}
          x={px(left + (col + 0.5) * cellWidth)}
          y={HEIGHT - MARGIN.bottom + 22}
          textAnchor="middle"
          fontSize={13}
          fill={TEXT_COLOR}
        >
          {summary.dietType}
        </text>
      ))}
    </Frame>
  );
}

const PANEL_TOP = PLOT_TOP + 40;
const PANEL_BOTTOM = HEIGHT - 80;

function panelTitle(distribution: Distribution): string {
  const name = METRIC_LABELS[distribution.metric];
  return distribution.cap === null ? name : `${name} (below ${distribution.cap})`;
}

/**
 * One box per diet: whiskers at min and max, box from q1 to q3, a line at
 * the median.
 */
function BoxPlotPanel({
  x,
  width,
  distribution,
  dietOrder,
}: {
  x: number;
  width: number;
  distribution: Distribution;
  dietOrder: readonly string[];
}) {
  const left = x + 60;
  const plotWidth = width - 60 - 20;
  const plotHeight = PANEL_BOTTOM - PANEL_TOP;
  const max = niceMax(Math.max(0, ...distribution.boxes.map((b) => b.box.max)));
  const y = (value: number) => px(PANEL_BOTTOM - (value / max) * plotHeight);
  const slot = plotWidth / Math.max(distribution.boxes.length, 1);
  const half = Math.min(slot * 0.3, 24);
  const ticks = [0, 1, 2, 3, 4, 5].map((i) => (max * i) / 5);

  return (
    <g>
      <text
        x={px(x + width / 2)}
        y={PLOT_TOP + 16}
        textAnchor="middle"
        fontSize={15}
        fontWeight={700}
        fill="#111827"
      >
        {panelTitle(distribution)}
      </text>
      {ticks.map((tick) => (
        <g key={tick}>
          <line x1={left} x2={px(left + plotWidth)} y1={y(tick)} y2={y(tick)} stroke={GRID_COLOR} />
          <text x={left - 6} y={y(tick) + 4} textAnchor="end" fontSize={11} fill={MUTED_COLOR}>
            {label(tick)}
          </text>
        </g>
      ))}
      {distribution.boxes.length === 0 && (
        <text x={px(left + plotWidth / 2)} y={px(PANEL_TOP + plotHeight / 2)} textAnchor="middle" fontSize={13} fill={MUTED_COLOR}>
          no values
        </text>
      )}
      {distribution.boxes.map(({ dietType, box }, i) => {
        const cx = px(left + (i + 0.5) * slot);
        return (
          <g key={dietType}>
            <line x1={cx} x2={cx} y1={y(box.min)} y2={y(box.max)} stroke={TEXT_COLOR} />
            <line x1={px(cx - half / 2)} x2={px(cx + half / 2)} y1={y(box.max)} y2={y(box.max)} stroke={TEXT_COLOR} />
            <line x1={px(cx - half / 2)} x2={px(cx + half / 2)} y1={y(box.min)} y2={y(box.min)} stroke={TEXT_COLOR} />
            <rect
              x={px(cx - half)}
              y={y(box.q3)}
              width={px(half * 2)}
              height={px(y(box.q1) - y(box.q3))}
              fill={colorOf(dietOrder, dietType)}
              stroke={TEXT_COLOR}
            />
            <line x1={px(cx - half)} x2={px(cx + half)} y1={y(box.median)} y2={y(box.median)} stroke="#111827" strokeWidth={2} />
            <text
              transform={`translate(${cx} ${PANEL_BOTTOM + 14}) rotate(-30)`}
              textAnchor="end"
              fontSize={11}
              fill={TEXT_COLOR}
            >
              {dietType}
            </text>
          </g>
        );
      })}
    </g>
  );
}

export function boxPlotChart(
  title: string,
  distributions: Distribution[],
  dietOrder: readonly string[]
): ReactElement {
  const width = WIDTH / Math.max(distributions.length, 1);
  return (
    <Frame title={title}>
      {distributions.map((distribution, i) => (
        <BoxPlotPanel
          key={distribution.metric}
          x={px(i * width)}
          width={px(width)}
          distribution={distribution}
          dietOrder={dietOrder}
        />
      ))}
    </Frame>
  );
}

// ============================================
// Chart set
// ============================================

function render(name: ChartName, title: string, element: ReactElement): ChartArtifact {
  return { name, title, svg: renderToStaticMarkup(element) };
}

/**
 * Renders every chart whose input is non-empty; the rest are reported as
 * skipped rather than drawn empty. Charts come back in CHART_NAMES order.
 */
export function renderCharts(input: ChartInput): {
  charts: ChartArtifact[];
  skipped: SkippedChart[];
} {
  const { summaries, topProtein, topProteinToCarbs, topProteinByDiet } = input;
  const dietOrder = summaries.map((s) => s.dietType);
  const noSummaries = summaries.length === 0;

  const views: Record<ChartName, { title: string; skip: string | null; draw: (title: string) => ReactElement }> = {
    macros_by_diet: {
      title: "Average Macronutrients by Diet Type",
      skip: noSummaries ? "no diet summaries" : null,
      draw: () => macroBarChart(summaries),
    },
    diet_share: {
      title: "Recipe Share by Diet Type",
      skip: noSummaries ? "no diet summaries" : null,
      draw: () => dietSharePie(summaries),
    },
    macro_heatmap: {
      title: "Macronutrient Content Heatmap",
      skip: noSummaries ? "no diet summaries" : null,
      draw: () => macroHeatmap(summaries),
    },
    macro_distributions: {
      title: "Macronutrient Distributions by Diet Type",
      skip: noSummaries ? "no diet summaries" : null,
      draw: (title) => boxPlotChart(title, input.macroDistributions, dietOrder),
    },
    ratio_distributions: {
      title: "Macronutrient Ratio Distributions by Diet Type",
      skip: input.ratioDistributions.every((d) => d.boxes.length === 0) ? "no ratio values below the cap" : null,
      draw: (title) => boxPlotChart(title, input.ratioDistributions, dietOrder),
    },
    top_protein: {
      title: "Top Recipes by Protein",
      skip: topProtein.length === 0 ? "empty ranking" : null,
      draw: (title) => rankingBarChart("top_protein", title, topProtein, dietOrder),
    },
    top_protein_to_carbs: {
      title: "Top Recipes by Protein-to-Carbs Ratio",
      skip: topProteinToCarbs.length === 0 ? "empty ranking" : null,
      draw: (title) => rankingBarChart("top_protein_to_carbs", title, topProteinToCarbs, dietOrder),
    },
    top_protein_scatter: {
      title: "Top Protein-Rich Recipes: Protein vs Carbs",
      skip: topProteinByDiet.every((r) => r.entries.length === 0) ? "empty ranking" : null,
      draw: () => proteinScatter(topProteinByDiet, dietOrder),
    },
  };

  const charts: ChartArtifact[] = [];
  const skipped: SkippedChart[] = [];
  for (const name of CHART_NAMES) {
    const view = views[name];
    if (view.skip !== null) {
      skipped.push({ name, reason: view.skip });
    } else {
      charts.push(render(name, view.title, view.draw(view.title)));
    }
  }

  return { charts, skipped };
}
