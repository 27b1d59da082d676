import type { ByteCursor } from "./binary.js";
import type { Definitions } from "./definitions.js";
import { CursorError } from "./errors.js";
import type { Bestiary, Chest, ChestItem, Entity, Npc, Sign } from "./world.js";

export type WarnFn = (msg: string) => void;

export type SectionContext = Readonly<{
  definitions: Definitions;
  warn: WarnFn;
}>;

function count(r: ByteCursor, read: "i16" | "i32", what: string): number {
  const n = read === "i16" ? r.i16() : r.i32();
  if (n < 0) throw new CursorError("CorruptData", `Negative ${what} count: ${n}`);
  return n;
}

export function readChests(r: ByteCursor, ctx: SectionContext): Chest[] {
  const numChests = count(r, "i16", "chest");
  const itemsPerChest = count(r, "i16", "chest slot");
  const chests: Chest[] = [];

  for (let i = 0; i < numChests; i++) {
    const x = r.i32();
    const y = r.i32();
    const name = r.string();
    const items: ChestItem[] = [];

    for (let slot = 0; slot < itemsPerChest; slot++) {
      const stack = r.i16();
      if (stack <= 0) continue;

      const itemId = r.i32();
      const prefixId = r.u8();
      const item: {
        stack: number;
        itemId: number;
        name?: string;
        prefixId: number;
        prefix?: string;
      } = { stack, itemId, prefixId };
      const itemName = ctx.definitions.items.get(itemId);
      if (itemName !== undefined) item.name = itemName;
      const prefix = ctx.definitions.prefixes.get(prefixId);
      if (prefix !== undefined) item.prefix = prefix;
      items.push(item);
    }

    chests.push({ x, y, name, items });
  }
  return chests;
}

export function readSigns(r: ByteCursor): Sign[] {
  const numSigns = count(r, "i16", "sign");
  const signs: Sign[] = [];
  for (let i = 0; i < numSigns; i++) {
    const text = r.string();
    const x = r.i32();
    const y = r.i32();
    signs.push({ text, x, y });
  }
  return signs;
}

export type NpcSection = Readonly<{
  npcs: Npc[];
  otherNpcs: Npc[];
  shimmered: Set<number>;
}>;

type NpcIdentity = { sprite: number; head: number; title: string };

// Numeric sprite ids from 190 on, type names before that.
function readNpcIdentity(r: ByteCursor, version: number, ctx: SectionContext): NpcIdentity {
  if (version >= 190) {
    const sprite = r.i32();
    const def = ctx.definitions.npcsById.get(sprite);
    if (!def && ctx.definitions.npcsById.size > 0) ctx.warn(`Unknown NPC id ${sprite}`);
    return { sprite, head: def?.head ?? 0, title: def?.title ?? "" };
  }
  const title = r.string();
  const def = ctx.definitions.npcsByName.get(title);
  if (!def && ctx.definitions.npcsByName.size > 0) ctx.warn(`Unknown NPC '${title}'`);
  return { sprite: def?.id ?? 0, head: def?.head ?? 0, title };
}

export function readNpcs(r: ByteCursor, version: number, ctx: SectionContext): NpcSection {
  const shimmered = new Set<number>();
  if (version >= 268) {
    const n = count(r, "i32", "shimmered NPC");
    for (let i = 0; i < n; i++) shimmered.add(r.i32());
  }

  const npcs: Npc[] = [];
  while (r.u8() !== 0) {
    const identity = readNpcIdentity(r, version, ctx);
    const npc: {
      sprite: number;
      head: number;
      title: string;
      name: string;
      x: number;
      y: number;
      homeless: boolean;
      homeX?: number;
      homeY?: number;
      townVariation?: number;
    } = {
      ...identity,
      name: r.string(),
      x: r.f32(),
      y: r.f32(),
      homeless: r.u8() !== 0,
      homeX: r.i32(),
      homeY: r.i32(),
    };
    if (version >= 213 && r.u8() !== 0) npc.townVariation = r.i32();
    npcs.push(npc);
  }

  const otherNpcs: Npc[] = [];
  if (version >= 140) {
    while (r.u8() !== 0) {
      const identity = readNpcIdentity(r, version, ctx);
      otherNpcs.push({ ...identity, head: 0, name: "", x: r.f32(), y: r.f32(), homeless: true });
    }
  }

  return { npcs, otherNpcs, shimmered };
}

/** Pre-122 training dummies: positions only, discarded. */
export function skipDummies(r: ByteCursor): void {
  const n = count(r, "i32", "dummy");
  r.skip(n * 4);
}

export function readEntities(r: ByteCursor): Entity[] {
  const n = count(r, "i32", "entity");
  const entities: Entity[] = [];
  for (let i = 0; i < n; i++) {
    const tag = r.u8();
    switch (tag) {
      case 0:
        entities.push({ kind: "trainingDummy", id: r.i32(), x: r.i16(), y: r.i16(), npc: r.i16() });
        break;
      case 1:
        entities.push({
          kind: "itemFrame",
          id: r.i32(),
          x: r.i16(),
          y: r.i16(),
          itemId: r.i16(),
          prefix: r.u8(),
          stack: r.i16(),
        });
        break;
      case 2:
        entities.push({
          kind: "logicSensor",
          id: r.i32(),
          x: r.i16(),
          y: r.i16(),
          sensorType: r.u8(),
          on: r.u8() !== 0,
        });
        break;
      default:
        throw new CursorError("CorruptData", `Unknown entity type ${tag} at entity ${i} of ${n}`);
    }
  }
  return entities;
}

/** Plate positions; read for stream positioning only. */
export function skipPressurePlates(r: ByteCursor): void {
  const n = count(r, "i32", "pressure plate");
  r.skip(n * 8);
}

/** Room assignments (npc, x, y); read for stream positioning only. */
export function skipTownManager(r: ByteCursor): void {
  const n = count(r, "i32", "town room");
  r.skip(n * 12);
}

export function readBestiary(r: ByteCursor): Bestiary {
  const kills = new Map<string, number>();
  const numKills = count(r, "i32", "kill");
  for (let i = 0; i < numKills; i++) {
    const creature = r.string();
    kills.set(creature, r.i32());
  }

  const sighted = new Set<string>();
  const numSighted = count(r, "i32", "sighting");
  for (let i = 0; i < numSighted; i++) sighted.add(r.string());

  const chats = new Set<string>();
  const numChats = count(r, "i32", "chat");
  for (let i = 0; i < numChats; i++) chats.add(r.string());

  return { kills, sighted, chats };
}
