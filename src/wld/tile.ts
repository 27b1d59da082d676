import type { ByteCursor } from "./binary.js";

export const TileFlag = {
  ACTIVE: 0x1,
  LAVA: 0x2,
  HONEY: 0x4,
  RED_WIRE: 0x8,
  BLUE_WIRE: 0x10,
  GREEN_WIRE: 0x20,
  HALF: 0x40,
  ACTUATOR: 0x80,
  INACTIVE: 0x100,
  SEEN: 0x200,
  YELLOW_WIRE: 0x400,
  SHIMMER: 0x800,
} as const;

export type Tile = {
  flags: number;
  type: number;
  wall: number;
  liquid: number;
  slope: number; // 0..3
  color: number;
  wallColor: number;
  u: number; // -1 unless the type is framed
  v: number;
};

export function emptyTile(): Tile {
  return { flags: 0, type: 0, wall: 0, liquid: 0, slope: 0, color: 0, wallColor: 0, u: -1, v: -1 };
}

export function hasFlag(tile: Readonly<Tile>, flag: number): boolean {
  return (tile.flags & flag) !== 0;
}

/**
 * Decodes one packed tile record into `out` and returns its run count: the
 * number of following cells that repeat it.
 *
 * `framed[type]` says whether that tile type carries u/v frame coordinates.
 */
export function decodeTile(r: ByteCursor, framed: ReadonlyArray<boolean>, out: Tile): number {
  const flags1 = r.u8();
  let flags2 = 0;
  let flags3 = 0;
  if (flags1 & 0x01) {
    flags2 = r.u8();
    if (flags2 & 0x01) flags3 = r.u8();
  }

  let flags = 0;
  out.type = 0;
  out.wall = 0;
  out.liquid = 0;
  out.color = 0;
  out.wallColor = 0;
  out.u = -1;
  out.v = -1;

  if (flags1 & 0x02) {
    flags |= TileFlag.ACTIVE;
    out.type = r.u8();
    if (flags1 & 0x20) out.type |= r.u8() << 8;
    if (framed[out.type] === true) {
      out.u = r.u16();
      out.v = r.u16();
    }
    if (flags3 & 0x08) out.color = r.u8();
  }

  if (flags1 & 0x04) {
    out.wall = r.u8();
    if (flags3 & 0x10) out.wallColor = r.u8();
  }

  const liquidBits = flags1 & 0x18;
  if (liquidBits !== 0) {
    out.liquid = r.u8();
    if (liquidBits === 0x10) flags |= TileFlag.LAVA;
    else if (liquidBits === 0x18) flags |= TileFlag.HONEY;
    if (flags3 & 0x80) flags |= TileFlag.SHIMMER;
  }

  if (flags2 & 0x02) flags |= TileFlag.RED_WIRE;
  if (flags2 & 0x04) flags |= TileFlag.BLUE_WIRE;
  if (flags2 & 0x08) flags |= TileFlag.GREEN_WIRE;

  const slope = (flags2 >> 4) & 7;
  if (slope === 1) flags |= TileFlag.HALF;
  out.slope = slope > 1 ? slope - 1 : 0;

  if (flags3 & 0x02) flags |= TileFlag.ACTUATOR;
  if (flags3 & 0x04) flags |= TileFlag.INACTIVE;
  if (flags3 & 0x20) flags |= TileFlag.YELLOW_WIRE;

  // The wall high byte trails the liquid amount in the stream.
  if (flags3 & 0x40) out.wall |= r.u8() << 8;

  out.flags = flags;

  switch (flags1 >> 6) {
    case 1:
      return r.u8();
    case 2:
      return r.u16();
    default:
      return 0;
  }
}

/**
 * Struct-of-arrays tile storage. Cell (x, y) lives at index `x + y * width`.
 */
export class TileGrid {
  public readonly size: number;

  private readonly flags: Uint16Array;
  private readonly type: Uint16Array;
  private readonly wall: Uint16Array;
  private readonly liquid: Uint8Array;
  private readonly slope: Uint8Array;
  private readonly color: Uint8Array;
  private readonly wallColor: Uint8Array;
  private readonly u: Int32Array;
  private readonly v: Int32Array;

  public constructor(
    public readonly width: number,
    public readonly height: number,
  ) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new Error(`Invalid grid dimensions ${width}x${height}`);
    }
    this.size = width * height;
    this.flags = new Uint16Array(this.size);
    this.type = new Uint16Array(this.size);
    this.wall = new Uint16Array(this.size);
    this.liquid = new Uint8Array(this.size);
    this.slope = new Uint8Array(this.size);
    this.color = new Uint8Array(this.size);
    this.wallColor = new Uint8Array(this.size);
    this.u = new Int32Array(this.size).fill(-1);
    this.v = new Int32Array(this.size).fill(-1);
  }

  public indexOf(x: number, y: number): number {
    const integral = Number.isInteger(x) && Number.isInteger(y);
    if (!integral || x < 0 || y < 0 || x >= this.width || y >= this.height) {
      throw new RangeError(`Tile (${x},${y}) outside ${this.width}x${this.height} grid`);
    }
    return x + y * this.width;
  }

  public store(index: number, t: Readonly<Tile>): void {
    this.flags[index] = t.flags;
    this.type[index] = t.type;
    this.wall[index] = t.wall;
    this.liquid[index] = t.liquid;
    this.slope[index] = t.slope;
    this.color[index] = t.color;
    this.wallColor[index] = t.wallColor;
    this.u[index] = t.u;
    this.v[index] = t.v;
  }

  public load(index: number): Tile {
    return {
      flags: this.flags[index] ?? 0,
      type: this.type[index] ?? 0,
      wall: this.wall[index] ?? 0,
      liquid: this.liquid[index] ?? 0,
      slope: this.slope[index] ?? 0,
      color: this.color[index] ?? 0,
      wallColor: this.wallColor[index] ?? 0,
      u: this.u[index] ?? -1,
      v: this.v[index] ?? -1,
    };
  }

  public at(x: number, y: number): Tile {
    return this.load(this.indexOf(x, y));
  }

  public flagsAt(index: number): number {
    return this.flags[index] ?? 0;
  }

  public isSeen(index: number): boolean {
    return ((this.flags[index] ?? 0) & TileFlag.SEEN) !== 0;
  }

  public setSeen(index: number, seen: boolean): void {
    const f = this.flags[index] ?? 0;
    this.flags[index] = seen ? f | TileFlag.SEEN : f & ~TileFlag.SEEN;
  }

  public setAllSeen(seen: boolean): void {
    for (let i = 0; i < this.size; i++) this.setSeen(i, seen);
  }

  public countWhere(pred: (flags: number, wall: number) => boolean): number {
    let n = 0;
    for (let i = 0; i < this.size; i++) if (pred(this.flags[i] ?? 0, this.wall[i] ?? 0)) n++;
    return n;
  }
}
