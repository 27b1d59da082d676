import path from "node:path";
import { inflateRawSync } from "node:zlib";

import { ByteCursor } from "./binary.js";
import { WorldLoadError, atStage } from "./errors.js";
import type { WorldHeader } from "./header.js";
import type { WarnFn } from "./sections.js";
import type { TileGrid } from "./tile.js";
import { FILE_TYPE_PLAYER_MAP, readFileSignature } from "./worldDecoder.js";

export const LAST_LEGACY_MAP_VERSION = 91;

/**
 * Candidate `.map` files for a world, most specific first. The player's map
 * folder is the player file path without its extension.
 */
export function playerMapCandidates(playerPath: string, header: WorldHeader): string[] {
  const ext = path.extname(playerPath);
  const dir = ext ? playerPath.slice(0, -ext.length) : playerPath;

  const out: string[] = [];
  const guid = header.guidString();
  if (guid !== undefined) out.push(path.join(dir, `${guid}.map`));
  const worldId = header.number("worldID");
  if (worldId !== undefined) out.push(path.join(dir, `${worldId}.map`));
  return out;
}

export async function resolvePlayerMapPath(
  playerPath: string,
  header: WorldHeader,
  exists: (p: string) => Promise<boolean>,
): Promise<string | undefined> {
  for (const candidate of playerMapCandidates(playerPath, header)) {
    if (await exists(candidate)) return candidate;
  }
  return undefined;
}

/**
 * Marks explored tiles in `grid` from the bytes of a player `.map` file.
 */
export function applyPlayerOverlay(
  grid: TileGrid,
  bytes: Uint8Array,
  warn: WarnFn = () => {},
): void {
  const r = ByteCursor.from(bytes);
  const version = atStage("playerOverlay", () => r.u32());
  if (version <= LAST_LEGACY_MAP_VERSION) {
    atStage("playerOverlay", () => applyLegacyOverlay(grid, r, version, warn));
  } else {
    applyModernOverlay(grid, r, version, warn);
  }
}

function checkDimensions(grid: TileGrid, high: number, wide: number, warn: WarnFn): void {
  if (high !== grid.height || wide !== grid.width) {
    warn(`Player map is ${wide}x${high} but the world is ${grid.width}x${grid.height}`);
  }
}

function runOverflow(what: string, at: string, run: number, limit: number): WorldLoadError {
  const msg = `Run of ${run} at ${at} overflows ${what} of ${limit}`;
  return new WorldLoadError("CorruptData", "playerOverlay", msg);
}

// Column-major cells; each carries a presence byte and a run down the column.
function applyLegacyOverlay(grid: TileGrid, r: ByteCursor, version: number, warn: WarnFn): void {
  r.string(); // name
  r.i32(); // world id
  const high = r.i32();
  const wide = r.i32();
  checkDimensions(grid, high, wide, warn);

  const { width, height } = grid;
  for (let x = 0; x < width; x++) {
    let y = 0;
    while (y < height) {
      const present = r.u8() !== 0;
      if (present) {
        r.skip(version <= 77 ? 1 : 2); // tile id
        r.skip(2); // light, misc
        if (version >= 50) r.skip(1); // misc2
      }
      const rle = r.u16();
      if (y + rle >= height) throw runOverflow("column height", `(${x},${y})`, rle, height);
      for (let k = 0; k <= rle; k++) grid.setSeen(x + (y + k) * width, present);
      y += rle + 1;
    }
  }
}

function applyModernOverlay(grid: TileGrid, r: ByteCursor, version: number, warn: WarnFn): void {
  if (version >= 135) readFileSignature(r, FILE_TYPE_PLAYER_MAP, "playerOverlay");

  const cells = atStage("playerOverlay", () => {
    r.string(); // name
    r.i32(); // world id
    const high = r.i32();
    const wide = r.i32();
    checkDimensions(grid, high, wide, warn);

    const numTiles = r.u16();
    const numWalls = r.u16();
    r.skip(4 * 2); // liquid, sky, dirt, rock counts

    const tilePresent = r.bitmap(numTiles);
    const wallPresent = r.bitmap(numWalls);
    // Per-type option bytes; only their length matters.
    r.skip(tilePresent.filter(Boolean).length);
    r.skip(wallPresent.filter(Boolean).length);

    return version >= 93 ? ByteCursor.from(inflate(r.bytes(r.remaining()))) : r;
  });

  atStage("playerOverlay", () => walkModernCells(grid, cells));
}

function inflate(compressed: Uint8Array): Buffer {
  try {
    return inflateRawSync(compressed, { windowBits: 15 });
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new WorldLoadError(
      "DecompressionError",
      "playerOverlay",
      `Raw deflate stream is corrupt: ${msg}`,
    );
  }
}

// Row-major cells; a run repeats along the current row.
function walkModernCells(grid: TileGrid, r: ByteCursor): void {
  const { width, height } = grid;
  for (let y = 0; y < height; y++) {
    let x = 0;
    while (x < width) {
      const flags = r.u8();
      if (flags & 0x01) r.u8(); // color
      const kind = (flags >> 1) & 7;
      if (kind === 1 || kind === 2 || kind === 7) r.skip(flags & 0x10 ? 2 : 1); // tile id
      const light = flags & 0x20 ? r.u8() : 255;

      let rle = 0;
      switch ((flags >> 6) & 3) {
        case 1:
          rle = r.u8();
          break;
        case 2:
          rle = r.u16();
          break;
      }
      if (x + rle >= width) throw runOverflow("row width", `(${x},${y})`, rle, width);

      const seen = kind !== 0;
      const index = x + y * width;
      grid.setSeen(index, seen);
      for (let k = 1; k <= rle; k++) {
        // Explored runs with a non-default light level carry one light byte per repeated cell.
        if (seen && light !== 255) r.u8();
        grid.setSeen(index + k, seen);
      }
      x += rle + 1;
    }
  }
}
