import { beforeAll, describe, expect, it } from "vitest";

import { ByteCursor } from "../src/wld/binary.js";
import {
  WorldHeader,
  fieldPresent,
  loadHeaderTable,
  parseHeaderTable,
  readWorldHeader,
  type HeaderTable,
  type HeaderValue,
} from "../src/wld/header.js";
import { writeHeaderSection } from "./support/worldStreams.js";

function reasonOf(input: unknown): string {
  const res = parseHeaderTable(input);
  if (res.ok) throw new Error("Expected the table to be rejected");
  return res.reason;
}

function readBack(
  table: HeaderTable,
  version: number,
  values: Readonly<Record<string, HeaderValue>> = {},
): { header: WorldHeader; consumed: number; length: number } {
  const bytes = writeHeaderSection(table, version, values);
  const r = new ByteCursor(bytes);
  const header = readWorldHeader(r, version, table);
  return { header, consumed: r.tell(), length: bytes.length };
}

describe("parseHeaderTable", () => {
  it("accepts version windows, fixed counts and prefixed counts", () => {
    const res = parseHeaderTable({
      fields: [
        { name: "a", type: "i32", min: 100, max: 200 },
        { name: "b", type: "u8", count: 3 },
        { name: "c", type: "string", countType: "i16" },
        { name: "d", type: "bytes", length: 16 },
      ],
    });
    expect(res).toEqual({
      ok: true,
      table: {
        fields: [
          { name: "a", type: "i32", min: 100, max: 200 },
          { name: "b", type: "u8", count: 3 },
          { name: "c", type: "string", countType: "i16" },
          { name: "d", type: "bytes", length: 16 },
        ],
      },
    });
  });

  it("rejects malformed definitions with the offending entry", () => {
    expect(reasonOf([])).toBe("Invalid header table: expected fields array");
    const wide = { fields: [{ name: "a", type: "u128" }] };
    expect(reasonOf(wide)).toBe("Invalid fields[0].type: 'u128'");
    expect(reasonOf({ fields: [{ name: "g", type: "bytes" }] })).toBe(
      "Invalid fields[0]: bytes field needs a length",
    );
    expect(reasonOf({ fields: [{ name: "x", type: "i32", count: 2, countType: "i32" }] })).toBe(
      "Invalid fields[0]: count and countType are exclusive",
    );
    expect(reasonOf({ fields: [{ name: "x", type: "i32", min: 10, max: 9 }] })).toBe(
      "Invalid fields[0]: max 9 < min 10",
    );
    expect(reasonOf({ fields: [{ name: "", type: "i32" }] })).toBe("Invalid fields[0].name");
  });
});

describe("fieldPresent", () => {
  it("treats min and max as inclusive bounds", () => {
    const def = { name: "masterMode", type: "bool", min: 208, max: 208 } as const;
    expect(fieldPresent(def, 207)).toBe(false);
    expect(fieldPresent(def, 208)).toBe(true);
    expect(fieldPresent(def, 209)).toBe(false);
  });
});

describe("bundled header table", () => {
  let table: HeaderTable;

  beforeAll(async () => {
    const res = await loadHeaderTable();
    if (!res.ok) throw new Error(res.reason);
    table = res.table;
  });

  it("loads every field definition", () => {
    expect(table.fields.length).toBe(167);
    expect(table.fields[0]).toEqual({ name: "worldName", type: "string" });
  });

  it("reads a current-version header field by field", () => {
    const guid = Uint8Array.from({ length: 16 }, (_, i) => i);
    const { header, consumed, length } = readBack(table, 279, {
      worldName: "Alpha",
      seedText: "seed",
      worldGenVersion: 1n,
      guid,
      worldID: 42,
      tilesHigh: 10,
      tilesWide: 20,
      gameMode: 2,
      killCounts: [1, 2, 3],
      anglers: ["a", "b"],
      groundLevel: 300.5,
    });

    expect(consumed).toBe(length);
    expect(header.get("worldName")).toBe("Alpha");
    expect(header.get("seedText")).toBe("seed");
    expect(header.get("worldGenVersion")).toBe(1n);
    expect(header.number("worldID")).toBe(42);
    expect(header.number("tilesWide")).toBe(20);
    expect(header.number("groundLevel")).toBe(300.5);
    expect(header.get("killCounts")).toEqual([1, 2, 3]);
    expect(header.get("anglers")).toEqual(["a", "b"]);
    expect(header.get("treeX")).toEqual([0, 0, 0]);
    expect(header.has("gameMode")).toBe(true);
    expect(header.has("expertMode")).toBe(false);
    expect(header.guidString()).toBe("03020100-0504-0706-0809-0a0b0c0d0e0f");
  });

  it("reads the numeric seed that preceded the text seed", () => {
    const { header, consumed, length } = readBack(table, 179, { seedText: 77 });
    expect(consumed).toBe(length);
    expect(header.get("seedText")).toBe(77);
    expect(header.has("guid")).toBe(false);
    expect(header.guidString()).toBeUndefined();
  });

  it("omits fields introduced after an old version", () => {
    const { header, consumed, length } = readBack(table, 100, { anglers: ["x"] });
    expect(consumed).toBe(length);
    expect(header.get("anglers")).toEqual(["x"]);
    expect(header.has("killCounts")).toBe(false);
    expect(header.has("creationTime")).toBe(false);
    expect(header.has("expertMode")).toBe(false);
  });

  it("reads a field at its threshold and after it, never before", () => {
    const counts = new Map<string, number>();
    for (const def of table.fields) counts.set(def.name, (counts.get(def.name) ?? 0) + 1);

    for (const def of table.fields) {
      if (def.min === undefined || counts.get(def.name) !== 1) continue;
      for (const v of [def.min - 1, def.min, def.min + 1]) {
        const { header, consumed, length } = readBack(table, v);
        const expected = v >= def.min && (def.max === undefined || v <= def.max);
        expect(consumed).toBe(length);
        expect(header.has(def.name), `${def.name} at ${v}`).toBe(expected);
      }
    }
  });
});

describe("WorldHeader", () => {
  it("keeps insertion order and typed accessors", () => {
    const h = new WorldHeader();
    h.set("b", 2);
    h.set("a", "text");
    expect(h.keys()).toEqual(["b", "a"]);
    expect(h.number("b")).toBe(2);
    expect(h.number("a")).toBeUndefined();
    expect(h.entries()).toEqual([
      ["b", 2],
      ["a", "text"],
    ]);
  });

  it("requires exactly 16 bytes for a GUID", () => {
    const h = new WorldHeader();
    h.set("guid", new Uint8Array(15));
    expect(h.guidString()).toBeUndefined();
  });
});
