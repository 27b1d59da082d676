import type { HeaderValue } from "./header.js";
import { TileFlag } from "./tile.js";
import type { Chest, Entity, Npc, Sign, World } from "./world.js";

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type WorldSummaryJsonV1 = {
  schema: "wldscope.world.summary.v1";
  version: number;
  width: number;
  height: number;
  guid?: string;
  header: Record<string, JsonValue>;
  stats: {
    activeTiles: number;
    wallTiles: number;
    seenTiles: number;
  };
  chests: ReadonlyArray<Chest>;
  signs: ReadonlyArray<Sign>;
  npcs: ReadonlyArray<Npc>;
  otherNpcs: ReadonlyArray<Npc>;
  shimmeredNpcs: number[];
  entities: ReadonlyArray<Entity>;
  bestiary: {
    kills: Record<string, number>;
    sighted: string[];
    chats: string[];
  };
};

function headerValueToJson(v: HeaderValue): JsonValue {
  if (typeof v === "bigint") return v.toString();
  if (v instanceof Uint8Array) return Buffer.from(v).toString("hex");
  if (Array.isArray(v)) return v.map(headerValueToJson);
  return v;
}

export function worldToSummaryJson(world: World): WorldSummaryJsonV1 {
  const header: Record<string, JsonValue> = {};
  for (const [k, v] of world.header.entries()) header[k] = headerValueToJson(v);

  const grid = world.tiles;
  const out: WorldSummaryJsonV1 = {
    schema: "wldscope.world.summary.v1",
    version: world.version,
    width: world.width,
    height: world.height,
    header,
    stats: {
      activeTiles: grid.countWhere((f) => (f & TileFlag.ACTIVE) !== 0),
      wallTiles: grid.countWhere((_f, wall) => wall !== 0),
      seenTiles: grid.countWhere((f) => (f & TileFlag.SEEN) !== 0),
    },
    chests: world.chests,
    signs: world.signs,
    npcs: world.npcs,
    otherNpcs: world.otherNpcs,
    shimmeredNpcs: [...world.shimmeredNpcs].sort((a, b) => a - b),
    entities: world.entities,
    bestiary: {
      kills: Object.fromEntries(world.bestiary.kills),
      sighted: [...world.bestiary.sighted],
      chats: [...world.bestiary.chats],
    },
  };

  const guid = world.header.guidString();
  if (guid !== undefined) out.guid = guid;
  return out;
}

export function stringifyWorldSummary(doc: WorldSummaryJsonV1): string {
  return JSON.stringify(doc, null, 2) + "\n";
}
