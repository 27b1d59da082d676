// src/wld/render/renderTool.ts
import path from "node:path";
import { mkdir, stat, writeFile } from "node:fs/promises";

import type { LoadWorldOptions } from "../loadWorld.js";
import { loadWorld } from "../loadWorld.js";
import type { Definitions } from "../definitions.js";
import { renderOverview } from "./overview.js";
import { writePngRgba } from "./png.js";

export type RenderToolOptions = Readonly<{
  definitions: Definitions;
  load?: LoadWorldOptions;
  out?: string;
  scale?: number;
  fog?: boolean;
  overwrite?: boolean;
  dryRun?: boolean;
}>;

async function existsPath(p: string): Promise<boolean> {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

export function defaultOutFile(inputFile: string): string {
  const ext = path.extname(inputFile);
  const base = inputFile.slice(0, inputFile.length - ext.length);
  return `${base}.png`;
}

export async function runRenderTool(worldPath: string, opts: RenderToolOptions): Promise<void> {
  const outPath = opts.out ?? defaultOutFile(worldPath);

  if (opts.overwrite !== true && (await existsPath(outPath))) {
    console.warn(`Skip (exists): ${outPath}`);
    return;
  }

  if (opts.dryRun === true) {
    console.log(`[dry-run] ${worldPath} -> ${outPath}`);
    return;
  }

  const res = await loadWorld(worldPath, { ...opts.load, definitions: opts.definitions });
  if (!res.ok) throw res.error;

  const img = renderOverview(res.world, {
    definitions: opts.definitions,
    scale: opts.scale ?? 1,
    fog: opts.fog === true,
  });

  await mkdir(path.dirname(outPath), { recursive: true });
  await writeFile(outPath, writePngRgba(img));
  console.log(`${worldPath} -> ${outPath}`);
}
