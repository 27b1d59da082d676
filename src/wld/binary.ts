import { CursorError } from "./errors.js";

/**
 * Little-endian reader over an in-memory buffer. Every read is bounds-checked;
 * running off the end raises `TruncatedData` instead of yielding garbage.
 */
export class ByteCursor {
  private offset = 0;

  public constructor(private readonly buf: Buffer) {}

  public static from(bytes: Uint8Array): ByteCursor {
    return new ByteCursor(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
  }

  public length(): number {
    return this.buf.length;
  }

  public tell(): number {
    return this.offset;
  }

  public remaining(): number {
    return this.buf.length - this.offset;
  }

  public seek(absoluteOffset: number): void {
    const inside = absoluteOffset >= 0 && absoluteOffset <= this.buf.length;
    if (!Number.isInteger(absoluteOffset) || !inside) {
      throw new CursorError(
        "TruncatedData",
        `Seek to ${absoluteOffset} outside buffer of ${this.buf.length} bytes`,
      );
    }
    this.offset = absoluteOffset;
  }

  public skip(n: number): void {
    if (!Number.isInteger(n) || n < 0) {
      throw new CursorError("CorruptData", `Invalid skip length: ${n}`);
    }
    this.ensure(n);
    this.offset += n;
  }

  public u8(): number {
    this.ensure(1);
    const v = this.buf.readUInt8(this.offset);
    this.offset += 1;
    return v;
  }

  public bool(): boolean {
    return this.u8() !== 0;
  }

  public u16(): number {
    this.ensure(2);
    const v = this.buf.readUInt16LE(this.offset);
    this.offset += 2;
    return v;
  }

  public i16(): number {
    this.ensure(2);
    const v = this.buf.readInt16LE(this.offset);
    this.offset += 2;
    return v;
  }

  public u32(): number {
    this.ensure(4);
    const v = this.buf.readUInt32LE(this.offset);
    this.offset += 4;
    return v;
  }

  public i32(): number {
    this.ensure(4);
    const v = this.buf.readInt32LE(this.offset);
    this.offset += 4;
    return v;
  }

  public i64(): bigint {
    this.ensure(8);
    const v = this.buf.readBigInt64LE(this.offset);
    this.offset += 8;
    return v;
  }

  public u64(): bigint {
    this.ensure(8);
    const v = this.buf.readBigUInt64LE(this.offset);
    this.offset += 8;
    return v;
  }

  public f32(): number {
    this.ensure(4);
    const v = this.buf.readFloatLE(this.offset);
    this.offset += 4;
    return v;
  }

  public f64(): number {
    this.ensure(8);
    const v = this.buf.readDoubleLE(this.offset);
    this.offset += 8;
    return v;
  }

  public bytes(n: number): Buffer {
    if (!Number.isInteger(n) || n < 0) {
      throw new CursorError("CorruptData", `Invalid read length: ${n}`);
    }
    this.ensure(n);
    const out = this.buf.subarray(this.offset, this.offset + n);
    this.offset += n;
    return out;
  }

  public ascii(n: number): string {
    return this.bytes(n).toString("latin1");
  }

  /** 7-bit varint length followed by that many UTF-8 bytes. */
  public string(): string {
    let len = 0;
    let shift = 0;
    for (;;) {
      if (shift > 28) {
        throw new CursorError("CorruptData", "String length prefix is longer than 5 bytes");
      }
      const b = this.u8();
      len += (b & 0x7f) * 2 ** shift;
      if ((b & 0x80) === 0) break;
      shift += 7;
    }
    return this.bytes(len).toString("utf8");
  }

  /** Packed presence bits, first entry in bit 0 of the first byte. */
  public bitmap(count: number): boolean[] {
    const out: boolean[] = [];
    let bits = 0;
    for (let i = 0; i < count; i++) {
      if ((i & 7) === 0) bits = this.u8();
      out.push((bits & (1 << (i & 7))) !== 0);
    }
    return out;
  }

  private ensure(n: number): void {
    if (this.offset + n > this.buf.length) {
      throw new CursorError(
        "TruncatedData",
        `Unexpected EOF at ${this.offset}: need ${n} bytes, have ${this.remaining()}`,
      );
    }
  }
}
