import { describe, expect, it } from "vitest";

import { ByteCursor } from "../src/wld/binary.js";
import {
  TileFlag,
  TileGrid,
  decodeTile,
  emptyTile,
  hasFlag,
  type Tile,
} from "../src/wld/tile.js";
import { encodeTile, type TileSpec } from "./support/worldStreams.js";

type Decoded = { tile: Tile; rle: number; consumed: number };

function decodeOne(spec: TileSpec, framed: boolean[] = []): Decoded {
  const bytes = encodeTile(spec);
  const r = new ByteCursor(bytes);
  const tile = emptyTile();
  const rle = decodeTile(r, framed, tile);
  return { tile, rle, consumed: r.tell() };
}

describe("decodeTile", () => {
  it("decodes a bare record as an empty cell", () => {
    const { tile, rle, consumed } = decodeOne({});
    expect(tile).toEqual(emptyTile());
    expect(rle).toBe(0);
    expect(consumed).toBe(1);
  });

  it("reads frame coordinates only for framed types", () => {
    const framed = [false, false, false, false, false, true];
    const withFrame = decodeOne({ type: 5, u: 18, v: 36, rle: 3 }, framed);
    expect(withFrame.tile.flags).toBe(TileFlag.ACTIVE);
    expect(withFrame.tile.type).toBe(5);
    expect(withFrame.tile.u).toBe(18);
    expect(withFrame.tile.v).toBe(36);
    expect(withFrame.rle).toBe(3);

    const plain = decodeOne({ type: 4 }, framed);
    expect(plain.tile.u).toBe(-1);
    expect(plain.tile.v).toBe(-1);
    expect(plain.consumed).toBe(2);
  });

  it("assembles 16-bit tile types from the high-byte flag", () => {
    expect(decodeOne({ type: 421 }).tile.type).toBe(421);
  });

  it("reads the wall high byte after the liquid amount", () => {
    const { tile, consumed } = decodeOne({ wall: 0x123, wallColor: 7, liquid: 40 });
    expect(tile.wall).toBe(0x123);
    expect(tile.wallColor).toBe(7);
    expect(tile.liquid).toBe(40);
    // flags1, flags2, flags3, wall low, wall color, liquid, wall high
    expect(consumed).toBe(7);
  });

  it("maps liquid bits to flags", () => {
    expect(decodeOne({ liquid: 255 }).tile.flags).toBe(0);
    expect(decodeOne({ liquid: 255, liquidKind: "lava" }).tile.flags).toBe(TileFlag.LAVA);
    expect(decodeOne({ liquid: 255, liquidKind: "honey" }).tile.flags).toBe(TileFlag.HONEY);
    expect(decodeOne({ liquid: 12, liquidKind: "shimmer" }).tile.flags).toBe(TileFlag.SHIMMER);
  });

  it("decodes wires, actuators and slopes", () => {
    const { tile } = decodeOne({
      type: 1,
      wires: ["red", "blue", "green", "yellow"],
      slope: 1,
      actuator: true,
      inactive: true,
    });
    expect(tile.flags).toBe(
      TileFlag.ACTIVE |
        TileFlag.RED_WIRE |
        TileFlag.BLUE_WIRE |
        TileFlag.GREEN_WIRE |
        TileFlag.YELLOW_WIRE |
        TileFlag.HALF |
        TileFlag.ACTUATOR |
        TileFlag.INACTIVE,
    );
    expect(tile.slope).toBe(0);

    const sloped = decodeOne({ type: 1, slope: 3 }).tile;
    expect(hasFlag(sloped, TileFlag.HALF)).toBe(false);
    expect(sloped.slope).toBe(2);
  });

  it("reads tile paint", () => {
    expect(decodeOne({ type: 1, color: 12 }).tile.color).toBe(12);
  });

  it("reads 16-bit run counts", () => {
    expect(decodeOne({ rle: 300 }).rle).toBe(300);
  });

  it("clears fields left over from the previous record", () => {
    const bytes = Buffer.concat([encodeTile({ type: 2, wall: 3, liquid: 9 }), encodeTile({})]);
    const r = new ByteCursor(bytes);
    const tile = emptyTile();
    decodeTile(r, [], tile);
    decodeTile(r, [], tile);
    expect(tile).toEqual(emptyTile());
  });
});

describe("TileGrid", () => {
  it("indexes cells as x + y * width", () => {
    const grid = new TileGrid(4, 3);
    expect(grid.size).toBe(12);
    expect(grid.indexOf(3, 2)).toBe(11);
    expect(() => grid.indexOf(4, 0)).toThrow(RangeError);
    expect(() => grid.indexOf(0, -1)).toThrow(RangeError);
  });

  it("stores and loads tiles", () => {
    const grid = new TileGrid(2, 2);
    const t: Tile = { ...emptyTile(), flags: TileFlag.ACTIVE, type: 7, u: 18, v: 0 };
    grid.store(grid.indexOf(1, 1), t);
    expect(grid.at(1, 1)).toEqual(t);
    expect(grid.at(0, 0)).toEqual(emptyTile());
  });

  it("tracks the seen flag independently of other flags", () => {
    const grid = new TileGrid(3, 1);
    grid.store(0, { ...emptyTile(), flags: TileFlag.ACTIVE });
    grid.setAllSeen(true);
    expect(grid.flagsAt(0)).toBe(TileFlag.ACTIVE | TileFlag.SEEN);
    grid.setSeen(0, false);
    expect(grid.flagsAt(0)).toBe(TileFlag.ACTIVE);
    expect(grid.countWhere((f) => (f & TileFlag.SEEN) !== 0)).toBe(2);
  });

  it("rejects empty dimensions", () => {
    expect(() => new TileGrid(0, 5)).toThrow("Invalid grid dimensions 0x5");
  });
});
