import { readFile } from "node:fs/promises";

export type Rgb = readonly [number, number, number];

export type NpcDefinition = Readonly<{ id: number; title: string; head: number }>;
export type BlockDefinition = Readonly<{ id: number; name: string; color?: Rgb }>;

/** Read-only lookup tables shared by any number of concurrent decodes. */
export type Definitions = Readonly<{
  items: ReadonlyMap<number, string>;
  prefixes: ReadonlyMap<number, string>;
  npcsById: ReadonlyMap<number, NpcDefinition>;
  npcsByName: ReadonlyMap<string, NpcDefinition>;
  tiles: ReadonlyMap<number, BlockDefinition>;
  walls: ReadonlyMap<number, BlockDefinition>;
}>;

export type DefinitionsResult =
  | Readonly<{ ok: true; definitions: Definitions }>
  | Readonly<{ ok: false; reason: string }>;

export function emptyDefinitions(): Definitions {
  return {
    items: new Map(),
    prefixes: new Map(),
    npcsById: new Map(),
    npcsByName: new Map(),
    tiles: new Map(),
    walls: new Map(),
  };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function requireInt(item: Record<string, unknown>, key: string, label: string): number {
  const v = item[key];
  if (typeof v !== "number" || !Number.isInteger(v) || v < 0) {
    throw new Error(`Invalid ${label}.${key}: expected non-negative integer`);
  }
  return v;
}

function requireString(item: Record<string, unknown>, key: string, label: string): string {
  const v = item[key];
  if (typeof v !== "string") throw new Error(`Invalid ${label}.${key}: expected string`);
  return v;
}

function listOf(
  input: Record<string, unknown>,
  key: string,
): Array<[Record<string, unknown>, string]> {
  const v = input[key];
  if (v === undefined) return [];
  if (!Array.isArray(v)) throw new Error(`Invalid ${key}: expected array`);
  return v.map((item: unknown, i: number): [Record<string, unknown>, string] => {
    const label = `${key}[${i}]`;
    if (!isRecord(item)) throw new Error(`Invalid ${label}: expected object`);
    return [item, label];
  });
}

/** "#rrggbb" */
export function parseHexColor(v: string): Rgb | undefined {
  const m = /^#([0-9a-fA-F]{2})([0-9a-fA-F]{2})([0-9a-fA-F]{2})$/.exec(v);
  if (!m) return undefined;
  return [parseInt(m[1] ?? "0", 16), parseInt(m[2] ?? "0", 16), parseInt(m[3] ?? "0", 16)];
}

function parseBlocks(input: Record<string, unknown>, key: string): Map<number, BlockDefinition> {
  const out = new Map<number, BlockDefinition>();
  for (const [item, label] of listOf(input, key)) {
    const id = requireInt(item, "id", label);
    const name = requireString(item, "name", label);
    if (item.color === undefined) {
      out.set(id, { id, name });
      continue;
    }
    const color = typeof item.color === "string" ? parseHexColor(item.color) : undefined;
    if (!color) throw new Error(`Invalid ${label}.color: expected "#rrggbb"`);
    out.set(id, { id, name, color });
  }
  return out;
}

function parseNames(input: Record<string, unknown>, key: string): Map<number, string> {
  const out = new Map<number, string>();
  for (const [item, label] of listOf(input, key)) {
    out.set(requireInt(item, "id", label), requireString(item, "name", label));
  }
  return out;
}

export function parseDefinitions(input: unknown): DefinitionsResult {
  try {
    if (!isRecord(input)) throw new Error("Invalid definitions: expected object");

    const npcsById = new Map<number, NpcDefinition>();
    const npcsByName = new Map<string, NpcDefinition>();
    for (const [item, label] of listOf(input, "npcs")) {
      const npc: NpcDefinition = {
        id: requireInt(item, "id", label),
        title: requireString(item, "title", label),
        head: requireInt(item, "head", label),
      };
      npcsById.set(npc.id, npc);
      npcsByName.set(npc.title, npc);
    }

    return {
      ok: true,
      definitions: {
        items: parseNames(input, "items"),
        prefixes: parseNames(input, "prefixes"),
        npcsById,
        npcsByName,
        tiles: parseBlocks(input, "tiles"),
        walls: parseBlocks(input, "walls"),
      },
    };
  } catch (e: unknown) {
    return { ok: false, reason: e instanceof Error ? e.message : String(e) };
  }
}

export async function loadDefinitions(path: string): Promise<DefinitionsResult> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    return { ok: false, reason: `Failed to read definitions: ${msg}` };
  }
  try {
    return parseDefinitions(JSON.parse(text) as unknown);
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    return { ok: false, reason: `Definitions are not valid JSON: ${msg}` };
  }
}
