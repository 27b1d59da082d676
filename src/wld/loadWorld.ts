import { readFile, stat } from "node:fs/promises";

import { WorldLoadError, toLoadError } from "./errors.js";
import { loadHeaderTable, type HeaderTable } from "./header.js";
import { applyPlayerOverlay, resolvePlayerMapPath } from "./playerOverlay.js";
import type { World } from "./world.js";
import { decodeWorldBytesAsync, type DecodeOptions } from "./worldDecoder.js";

export type LoadResult =
  | Readonly<{ ok: true; world: World; playerMap?: string }>
  | Readonly<{ ok: false; error: WorldLoadError }>;

export type LoadWorldOptions = Omit<DecodeOptions, "headerTable"> &
  Readonly<{
    playerPath?: string;
    headerTable?: HeaderTable;
  }>;

async function isFile(p: string): Promise<boolean> {
  try {
    const st = await stat(p);
    return st.isFile();
  } catch {
    return false;
  }
}

async function readBytes(p: string, what: string): Promise<Buffer> {
  try {
    return await readFile(p);
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new WorldLoadError("IoError", "io", `Cannot read ${what} '${p}': ${msg}`);
  }
}

async function resolveHeaderTable(opts: LoadWorldOptions): Promise<HeaderTable> {
  if (opts.headerTable) return opts.headerTable;
  const res = await loadHeaderTable();
  if (!res.ok) throw new WorldLoadError("IoError", "io", res.reason);
  return res.table;
}

/**
 * Decodes a world file and, when a player file is given, marks explored tiles
 * from its companion map. Never throws for I/O or format problems: the first
 * failure comes back as `{ ok: false }` and no world is returned.
 */
export async function loadWorld(
  worldPath: string,
  opts: LoadWorldOptions = {},
): Promise<LoadResult> {
  try {
    const headerTable = await resolveHeaderTable(opts);
    const bytes = await readBytes(worldPath, "world file");
    const world = await decodeWorldBytesAsync(bytes, { ...opts, headerTable });

    if (opts.playerPath === undefined) return { ok: true, world };

    if (opts.signal?.aborted) {
      throw new WorldLoadError("Cancelled", "playerOverlay", "Decode cancelled");
    }
    const mapPath = await resolvePlayerMapPath(opts.playerPath, world.header, isFile);
    if (mapPath === undefined) {
      opts.onWarn?.(`No player map found for '${opts.playerPath}'; marking every tile explored`);
      world.tiles.setAllSeen(true);
      return { ok: true, world };
    }

    opts.onStatus?.("Loading player map...");
    const mapBytes = await readBytes(mapPath, "player map");
    applyPlayerOverlay(world.tiles, mapBytes, opts.onWarn);
    return { ok: true, world, playerMap: mapPath };
  } catch (e: unknown) {
    return { ok: false, error: toLoadError("io", e) };
  }
}
