import { readFile } from "node:fs/promises";

import type { ByteCursor } from "./binary.js";
import { resolveDataFile } from "./dataFiles.js";

export type HeaderScalarType =
  | "bool"
  | "u8"
  | "i16"
  | "i32"
  | "u32"
  | "i64"
  | "u64"
  | "f32"
  | "f64"
  | "string";

export type HeaderFieldDef = Readonly<{
  name: string;
  type: HeaderScalarType | "bytes";
  min?: number; // first version carrying the field
  max?: number; // last version carrying the field
  length?: number; // "bytes" only
  count?: number; // fixed-length array
  countType?: "i16" | "i32"; // length-prefixed array
}>;

export type HeaderTable = Readonly<{ fields: ReadonlyArray<HeaderFieldDef> }>;

export type HeaderTableResult =
  | Readonly<{ ok: true; table: HeaderTable }>
  | Readonly<{ ok: false; reason: string }>;

export type HeaderValue = boolean | number | bigint | string | Uint8Array | HeaderValue[];

const SCALAR_TYPES: ReadonlySet<string> = new Set<HeaderScalarType>([
  "bool",
  "u8",
  "i16",
  "i32",
  "u32",
  "i64",
  "u64",
  "f32",
  "f64",
  "string",
]);

function isFieldType(v: unknown): v is HeaderFieldDef["type"] {
  return typeof v === "string" && (v === "bytes" || SCALAR_TYPES.has(v));
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function optionalInt(
  item: Record<string, unknown>,
  key: string,
  label: string,
): number | undefined {
  const v = item[key];
  if (v === undefined) return undefined;
  if (typeof v !== "number" || !Number.isInteger(v) || v < 0) {
    throw new Error(`Invalid ${label}.${key}: expected non-negative integer`);
  }
  return v;
}

function parseFieldDef(item: unknown, i: number): HeaderFieldDef {
  const label = `fields[${i}]`;
  if (!isRecord(item)) throw new Error(`Invalid ${label}: expected object`);

  const name = item.name;
  const type = item.type;
  if (typeof name !== "string" || name.length === 0) throw new Error(`Invalid ${label}.name`);
  if (!isFieldType(type)) {
    throw new Error(`Invalid ${label}.type: '${String(type)}'`);
  }

  const out: {
    name: string;
    type: HeaderFieldDef["type"];
    min?: number;
    max?: number;
    length?: number;
    count?: number;
    countType?: "i16" | "i32";
  } = { name, type };

  const min = optionalInt(item, "min", label);
  if (min !== undefined) out.min = min;
  const max = optionalInt(item, "max", label);
  if (max !== undefined) out.max = max;
  const count = optionalInt(item, "count", label);
  if (count !== undefined) out.count = count;

  if (type === "bytes") {
    const length = optionalInt(item, "length", label);
    if (length === undefined) throw new Error(`Invalid ${label}: bytes field needs a length`);
    out.length = length;
  }

  const countType = item.countType;
  if (countType !== undefined) {
    if (countType !== "i16" && countType !== "i32") {
      throw new Error(`Invalid ${label}.countType: expected "i16" or "i32"`);
    }
    if (count !== undefined) throw new Error(`Invalid ${label}: count and countType are exclusive`);
    out.countType = countType;
  }

  if (min !== undefined && max !== undefined && max < min) {
    throw new Error(`Invalid ${label}: max ${max} < min ${min}`);
  }
  return out;
}

export function parseHeaderTable(input: unknown): HeaderTableResult {
  try {
    if (!isRecord(input)) throw new Error("Invalid header table: expected object");
    if (!Array.isArray(input.fields)) {
      throw new Error("Invalid header table: expected fields array");
    }
    const fields = input.fields.map((f: unknown, i: number) => parseFieldDef(f, i));
    return { ok: true, table: { fields } };
  } catch (e: unknown) {
    return { ok: false, reason: e instanceof Error ? e.message : String(e) };
  }
}

export async function loadHeaderTable(path?: string): Promise<HeaderTableResult> {
  let text: string;
  try {
    text = await readFile(path ?? resolveDataFile("header.json"), "utf8");
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    return { ok: false, reason: `Failed to read header table: ${msg}` };
  }
  try {
    return parseHeaderTable(JSON.parse(text) as unknown);
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    return { ok: false, reason: `Header table is not valid JSON: ${msg}` };
  }
}

export function fieldPresent(def: HeaderFieldDef, version: number): boolean {
  if (def.min !== undefined && version < def.min) return false;
  if (def.max !== undefined && version > def.max) return false;
  return true;
}

function readScalar(r: ByteCursor, type: HeaderScalarType): HeaderValue {
  switch (type) {
    case "bool":
      return r.bool();
    case "u8":
      return r.u8();
    case "i16":
      return r.i16();
    case "i32":
      return r.i32();
    case "u32":
      return r.u32();
    case "i64":
      return r.i64();
    case "u64":
      return r.u64();
    case "f32":
      return r.f32();
    case "f64":
      return r.f64();
    case "string":
      return r.string();
  }
}

function readField(r: ByteCursor, def: HeaderFieldDef): HeaderValue {
  const one = (): HeaderValue =>
    def.type === "bytes" ? Uint8Array.from(r.bytes(def.length ?? 0)) : readScalar(r, def.type);

  let n: number | undefined = def.count;
  if (def.countType === "i16") n = r.i16();
  else if (def.countType === "i32") n = r.i32();
  if (n === undefined) return one();

  if (n < 0) throw new Error(`Negative element count ${n} for header field '${def.name}'`);
  const out: HeaderValue[] = [];
  for (let i = 0; i < n; i++) out.push(one());
  return out;
}

/** Ordered, version-dependent bag of named header properties. */
export class WorldHeader {
  private readonly values = new Map<string, HeaderValue>();

  public set(name: string, value: HeaderValue): void {
    this.values.set(name, value);
  }

  public has(name: string): boolean {
    return this.values.has(name);
  }

  public get(name: string): HeaderValue | undefined {
    return this.values.get(name);
  }

  public number(name: string): number | undefined {
    const v = this.values.get(name);
    return typeof v === "number" ? v : undefined;
  }

  public keys(): string[] {
    return [...this.values.keys()];
  }

  public entries(): Array<[string, HeaderValue]> {
    return [...this.values.entries()];
  }

  /**
   * Canonical dashed token of the 16-byte world GUID: the first three groups
   * are little-endian, the rest big-endian.
   */
  public guidString(): string | undefined {
    const g = this.values.get("guid");
    if (!(g instanceof Uint8Array) || g.length !== 16) return undefined;
    const hex = (bytes: ArrayLike<number>): string =>
      Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join("");
    const rev = (from: number, to: number): number[] => Array.from(g.subarray(from, to)).reverse();
    return [
      hex(rev(0, 4)),
      hex(rev(4, 6)),
      hex(rev(6, 8)),
      hex(g.subarray(8, 10)),
      hex(g.subarray(10, 16)),
    ].join("-");
  }
}

export function readWorldHeader(r: ByteCursor, version: number, table: HeaderTable): WorldHeader {
  const header = new WorldHeader();
  for (const def of table.fields) {
    if (!fieldPresent(def, version)) continue;
    header.set(def.name, readField(r, def));
  }
  return header;
}
