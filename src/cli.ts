#!/usr/bin/env node
// src/cli.ts
import { Command, InvalidArgumentError } from "commander";
import { writeFile } from "node:fs/promises";

import { emptyDefinitions, loadDefinitions, type Definitions } from "./wld/definitions.js";
import { loadWorld, type LoadWorldOptions } from "./wld/loadWorld.js";
import { runRenderTool } from "./wld/render/renderTool.js";
import { stringifyWorldSummary, worldToSummaryJson } from "./wld/worldJson.js";
import type { ProgressFn } from "./wld/worldDecoder.js";

type CommonOpts = {
  player?: string;
  defs?: string;
  progress: boolean;
};

async function definitionsFrom(defsPath: string | undefined): Promise<Definitions> {
  if (defsPath === undefined) return emptyDefinitions();
  const res = await loadDefinitions(defsPath);
  if (!res.ok) throw new Error(`Failed to load definitions: ${res.reason}`);
  return res.definitions;
}

function loadOptions(opts: CommonOpts, definitions: Definitions): LoadWorldOptions {
  const out: {
    definitions: Definitions;
    playerPath?: string;
    onWarn: (m: string) => void;
    onStatus?: (m: string) => void;
    onProgress?: ProgressFn;
  } = { definitions, onWarn: (m) => console.warn(m) };

  if (opts.player !== undefined) out.playerPath = opts.player;
  if (opts.progress) {
    out.onStatus = (m) => process.stderr.write(m + "\n");
    let last = -1;
    out.onProgress = (e) => {
      if (e.percent === last) return;
      last = e.percent;
      process.stderr.write(`Reading tiles: ${e.percent}%\n`);
    };
  }
  return out;
}

function parseScale(v: string): number {
  const n = Number(v);
  if (!Number.isInteger(n) || n < 1 || n > 16) {
    throw new InvalidArgumentError("expected integer 1..16");
  }
  return n;
}

const program = new Command();

program
  .name("wldscope")
  .description("World file tools (.wld -> JSON summary, overview PNG)")
  .version("0.3.0");

program
  .command("info")
  .description("Decode a world file and print a JSON summary")
  .argument("<world>", "Path to .wld file")
  .option("--player <path>", "Player file whose map folder marks explored tiles")
  .option("--defs <path>", "Definitions JSON (items, prefixes, NPCs, tiles, walls)")
  .option("--progress", "Report per-column progress on stderr", false)
  .option("-o, --output <path>", "Write JSON to a file (default: stdout)")
  .action(async (world: string, opts: CommonOpts & { output?: string }) => {
    const definitions = await definitionsFrom(opts.defs);
    const res = await loadWorld(world, loadOptions(opts, definitions));
    if (!res.ok) throw res.error;

    const text = stringifyWorldSummary(worldToSummaryJson(res.world));
    if (opts.output) await writeFile(opts.output, text, "utf8");
    else process.stdout.write(text);
  });

program
  .command("render")
  .description("Render a world file to an overview PNG (one tile per pixel block)")
  .argument("<world>", "Path to .wld file")
  .option("--player <path>", "Player file whose map folder marks explored tiles")
  .option("--defs <path>", "Definitions JSON (tile and wall colors)")
  .option("--progress", "Report per-column progress on stderr", false)
  .option("-o, --out <path>", "Output PNG (default: <world>.png)")
  .option("--scale <n>", "Pixels per tile", parseScale, 1)
  .option("--fog", "Paint unexplored tiles black", false)
  .option("--overwrite", "Overwrite an existing PNG", false)
  .option("--dry-run", "Print the planned output but do not write anything", false)
  .action(
    async (
      world: string,
      opts: CommonOpts & {
        out?: string;
        scale: number;
        fog: boolean;
        overwrite: boolean;
        dryRun: boolean;
      },
    ) => {
      const definitions = await definitionsFrom(opts.defs);
      const params: Parameters<typeof runRenderTool>[1] = {
        definitions,
        load: loadOptions(opts, definitions),
        scale: opts.scale,
        fog: opts.fog,
        overwrite: opts.overwrite,
        dryRun: opts.dryRun,
        ...(opts.out !== undefined ? { out: opts.out } : {}),
      };
      await runRenderTool(world, params);
    },
  );

program.parseAsync(process.argv).catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(msg + "\n");
  process.exitCode = 1;
});
