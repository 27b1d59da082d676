import { describe, expect, it } from "vitest";

import { ByteCursor } from "../src/wld/binary.js";
import { BinaryWriter } from "./support/binaryWriter.js";
import { catchCursorError } from "./support/catchError.js";

describe("ByteCursor", () => {
  it("reads little-endian integers and floats in order", () => {
    const w = new BinaryWriter();
    w.writeU16LE(0x0201);
    w.writeI16LE(-2);
    w.writeU32LE(0xdeadbeef);
    w.writeI32LE(-5);
    w.writeF32LE(1.5);
    w.writeF64LE(-0.25);
    w.writeI64LE(-3n);
    w.writeU64LE(2n ** 63n);

    const r = new ByteCursor(w.toBuffer());
    expect(r.u16()).toBe(0x0201);
    expect(r.i16()).toBe(-2);
    expect(r.u32()).toBe(0xdeadbeef);
    expect(r.i32()).toBe(-5);
    expect(r.f32()).toBe(1.5);
    expect(r.f64()).toBe(-0.25);
    expect(r.i64()).toBe(-3n);
    expect(r.u64()).toBe(2n ** 63n);
    expect(r.remaining()).toBe(0);
  });

  it("decodes a two-byte 7-bit length prefix", () => {
    const buf = Buffer.concat([Buffer.from([0xc8, 0x01]), Buffer.alloc(200, 0x61)]);
    const r = new ByteCursor(buf);
    expect(r.string()).toBe("a".repeat(200));
    expect(r.tell()).toBe(202);
  });

  it("decodes string bodies as UTF-8", () => {
    const r = new ByteCursor(Buffer.from([0x06, 0x68, 0xc3, 0xa9, 0x6c, 0x6c, 0x6f]));
    expect(r.string()).toBe("héllo");
  });

  it("rejects a length prefix longer than five bytes", () => {
    const r = new ByteCursor(Buffer.from([0x80, 0x80, 0x80, 0x80, 0x80, 0x01]));
    expect(catchCursorError(() => r.string()).kind).toBe("CorruptData");
  });

  it("unpacks bitmaps least-significant bit first", () => {
    const r = new ByteCursor(Buffer.from([0b00000101, 0b00000010]));
    const bits = r.bitmap(10);
    expect(bits.map((b) => (b ? 1 : 0)).join("")).toBe("1010000001");
    expect(r.tell()).toBe(2);
  });

  it("raises TruncatedData instead of reading past the end", () => {
    const r = new ByteCursor(Buffer.from([1, 2, 3]));
    const err = catchCursorError(() => r.u32());
    expect(err.kind).toBe("TruncatedData");
    expect(err.message).toBe("Unexpected EOF at 0: need 4 bytes, have 3");
    expect(r.tell()).toBe(0);
  });

  it("allows seeking to the end but not beyond it", () => {
    const r = new ByteCursor(Buffer.from([1, 2, 3]));
    r.seek(3);
    expect(r.remaining()).toBe(0);
    expect(catchCursorError(() => r.seek(4)).kind).toBe("TruncatedData");
  });

  it("honours the byte offset of a Uint8Array view", () => {
    const base = Uint8Array.from([9, 9, 7, 0]);
    const r = ByteCursor.from(base.subarray(2));
    expect(r.length()).toBe(2);
    expect(r.u16()).toBe(7);
  });

  it("reads latin1 tags and raw byte slices", () => {
    const r = new ByteCursor(Buffer.from("relogic\x02\xaa\xbb", "latin1"));
    expect(r.ascii(7)).toBe("relogic");
    expect(r.bool()).toBe(true);
    expect([...r.bytes(2)]).toEqual([0xaa, 0xbb]);
  });
});
