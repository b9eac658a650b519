/**
 * Artifact exporter
 *
 * Writes report files and rasterized charts into the output directory under
 * fixed names and returns the run's manifest. Each file goes to a temporary
 * sibling first and is renamed over the target once fully written, so an
 * interrupted run never leaves a truncated artifact behind. A chart this run
 * skipped is removed, so the directory only ever holds the latest run's
 * charts.
 */

import * as fs from "fs";
import * as path from "path";
import { Resvg } from "@resvg/resvg-js";
import { CHART_NAMES, type ChartArtifact } from "./charts";
import { ExportError } from "./errors";
import type { ReportFile } from "./report";

export type ArtifactKind = "table" | "chart" | "document";

export interface ManifestEntry {
  kind: ArtifactKind;
  name: string;
  path: string;
}

export type ArtifactManifest = readonly Readonly<ManifestEntry>[];

export function svgToPng(svg: string): Buffer {
  const resvg = new Resvg(svg, {
    background: "#ffffff",
    font: { loadSystemFonts: true, defaultFontFamily: "DejaVu Sans" },
  });
  return resvg.render().asPng();
}

async function ensureWritableDir(outputDir: string): Promise<void> {
  try {
    await fs.promises.mkdir(outputDir, { recursive: true });
  } catch (error) {
    throw new ExportError(`Cannot create output directory "${outputDir}"`, { cause: error });
  }

  try {
    const stat = await fs.promises.stat(outputDir);
    if (!stat.isDirectory()) {
      throw new ExportError(`Output path "${outputDir}" is not a directory`);
    }
    await fs.promises.access(outputDir, fs.constants.W_OK);
  } catch (error) {
    if (error instanceof ExportError) throw error;
    throw new ExportError(`Output directory "${outputDir}" is not writable`, { cause: error });
  }
}

/**
 * Write one artifact. The temporary file's handle is closed on every path;
 * the temporary file is removed if anything fails before the rename.
 */
export async function writeArtifact(target: string, data: string | Buffer): Promise<void> {
  const tmp = `${target}.tmp`;
  try {
    const handle = await fs.promises.open(tmp, "w");
    try {
      await handle.writeFile(data);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.promises.rename(tmp, target);
  } catch (error) {
    await fs.promises.rm(tmp, { force: true }).catch(() => undefined);
    throw new ExportError(`Failed to write "${target}"`, { cause: error });
  }
}

export async function exportArtifacts(
  outputDir: string,
  files: readonly ReportFile[],
  charts: readonly ChartArtifact[],
  render: (svg: string) => Buffer = svgToPng
): Promise<ArtifactManifest> {
  await ensureWritableDir(outputDir);

  const manifest: ManifestEntry[] = [];

  for (const file of files) {
    const target = path.join(outputDir, file.name);
    await writeArtifact(target, file.content);
    manifest.push({ kind: file.kind, name: file.name, path: target });
  }

  for (const chart of charts) {
    const name = `${chart.name}.png`;
    const target = path.join(outputDir, name);
    let png: Buffer;
    try {
      png = render(chart.svg);
    } catch (error) {
      throw new ExportError(`Failed to render chart "${chart.name}"`, { cause: error });
    }
    await writeArtifact(target, png);
    manifest.push({ kind: "chart", name, path: target });
  }

  const written = new Set<string>(charts.map((chart) => chart.name));
  for (const name of CHART_NAMES) {
    if (written.has(name)) continue;
    const target = path.join(outputDir, `${name}.png`);
    try {
      await fs.promises.rm(target, { force: true });
    } catch (error) {
      throw new ExportError(`Failed to remove stale chart "${target}"`, { cause: error });
    }
  }

  return Object.freeze(manifest.map((entry) => Object.freeze(entry)));
}
