import type { WorldHeader } from "./header.js";
import type { Tile, TileGrid } from "./tile.js";

export type ChestItem = Readonly<{
  stack: number;
  itemId: number;
  name?: string;
  prefixId: number;
  prefix?: string;
}>;

export type Chest = Readonly<{
  x: number;
  y: number;
  name: string;
  items: ReadonlyArray<ChestItem>;
}>;

export type Sign = Readonly<{ text: string; x: number; y: number }>;

export type Npc = Readonly<{
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
}>;

export type TrainingDummy = Readonly<{
  kind: "trainingDummy";
  id: number;
  x: number;
  y: number;
  npc: number;
}>;

export type ItemFrame = Readonly<{
  kind: "itemFrame";
  id: number;
  x: number;
  y: number;
  itemId: number;
  prefix: number;
  stack: number;
}>;

export type LogicSensor = Readonly<{
  kind: "logicSensor";
  id: number;
  x: number;
  y: number;
  sensorType: number;
  on: boolean;
}>;

export type Entity = TrainingDummy | ItemFrame | LogicSensor;

export type Bestiary = Readonly<{
  kills: ReadonlyMap<string, number>;
  sighted: ReadonlySet<string>;
  chats: ReadonlySet<string>;
}>;

export type WorldParts = Readonly<{
  version: number;
  header: WorldHeader;
  tiles: TileGrid;
  chests: ReadonlyArray<Chest>;
  signs: ReadonlyArray<Sign>;
  npcs: ReadonlyArray<Npc>;
  otherNpcs: ReadonlyArray<Npc>;
  shimmeredNpcs: ReadonlySet<number>;
  entities: ReadonlyArray<Entity>;
  bestiary: Bestiary;
}>;

/**
 * A fully decoded world. Owned by whoever requested the decode; nothing else
 * keeps a reference to it.
 */
export class World {
  public readonly version: number;
  public readonly header: WorldHeader;
  public readonly tiles: TileGrid;
  public readonly chests: ReadonlyArray<Chest>;
  public readonly signs: ReadonlyArray<Sign>;
  public readonly npcs: ReadonlyArray<Npc>;
  public readonly otherNpcs: ReadonlyArray<Npc>;
  public readonly shimmeredNpcs: ReadonlySet<number>;
  public readonly entities: ReadonlyArray<Entity>;
  public readonly bestiary: Bestiary;

  public constructor(parts: WorldParts) {
    this.version = parts.version;
    this.header = parts.header;
    this.tiles = parts.tiles;
    this.chests = parts.chests;
    this.signs = parts.signs;
    this.npcs = parts.npcs;
    this.otherNpcs = parts.otherNpcs;
    this.shimmeredNpcs = parts.shimmeredNpcs;
    this.entities = parts.entities;
    this.bestiary = parts.bestiary;
  }

  public get width(): number {
    return this.tiles.width;
  }

  public get height(): number {
    return this.tiles.height;
  }

  public tileAt(x: number, y: number): Tile {
    return this.tiles.at(x, y);
  }
}
