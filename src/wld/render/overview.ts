import type { Definitions, Rgb } from "../definitions.js";
import { TileFlag } from "../tile.js";
import type { World } from "../world.js";
import { createImage, fillRect, type Rgba, type RgbaImage } from "./rgbaImage.js";

export const PALETTE = {
  sky: [155, 209, 255],
  earth: [151, 107, 75],
  tile: [128, 128, 128],
  wall: [82, 62, 48],
  water: [9, 61, 191],
  lava: [253, 32, 3],
  honey: [254, 194, 20],
  shimmer: [196, 150, 255],
  unexplored: [0, 0, 0],
} as const satisfies Record<string, Rgb>;

export type OverviewOptions = Readonly<{
  definitions: Definitions;
  scale?: number;
  fog?: boolean; // paint unexplored tiles black
}>;

function opaque([r, g, b]: Rgb): Rgba {
  return [r, g, b, 255];
}

function liquidColor(flags: number): Rgb {
  if (flags & TileFlag.SHIMMER) return PALETTE.shimmer;
  if (flags & TileFlag.LAVA) return PALETTE.lava;
  if (flags & TileFlag.HONEY) return PALETTE.honey;
  return PALETTE.water;
}

/**
 * One block of `scale`x`scale` pixels per tile. Priority: active tile, liquid,
 * wall, then sky above ground level and earth below.
 */
export function renderOverview(world: World, opts: OverviewOptions): RgbaImage {
  const scale = opts.scale ?? 1;
  if (!Number.isInteger(scale) || scale < 1 || scale > 16) {
    throw new Error(`Scale must be an integer in [1, 16], got ${scale}`);
  }

  const { tiles: defTiles, walls: defWalls } = opts.definitions;
  const groundLevel = world.header.number("groundLevel") ?? world.height;
  const img = createImage(world.width * scale, world.height * scale);

  for (let y = 0; y < world.height; y++) {
    for (let x = 0; x < world.width; x++) {
      const t = world.tileAt(x, y);
      let color: Rgb;
      if (opts.fog === true && (t.flags & TileFlag.SEEN) === 0) color = PALETTE.unexplored;
      else if (t.flags & TileFlag.ACTIVE) color = defTiles.get(t.type)?.color ?? PALETTE.tile;
      else if (t.liquid > 0) color = liquidColor(t.flags);
      else if (t.wall > 0) color = defWalls.get(t.wall)?.color ?? PALETTE.wall;
      else color = y < groundLevel ? PALETTE.sky : PALETTE.earth;

      fillRect(img, x * scale, y * scale, scale, scale, opaque(color));
    }
  }
  return img;
}
