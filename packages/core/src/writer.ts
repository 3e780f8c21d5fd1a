/**
 * Fixed-size byte writer
 *
 * Encoders size their output first, then fill it front to back. Values
 * outside a field's range throw instead of being truncated silently.
 */

import type { Endian } from "./cursor.ts";

export class ByteWriter {
  private readonly bytes: Uint8Array;
  private readonly view: DataView;
  private pos = 0;

  constructor(size: number) {
    this.bytes = new Uint8Array(size);
    this.view = new DataView(this.bytes.buffer);
  }

  get position(): number {
    return this.pos;
  }

  writeU8(value: number, field = "u8"): void {
    assertUint(value, 0xff, field);
    this.view.setUint8(this.pos, value);
    this.pos += 1;
  }

  writeU16(value: number, endian: Endian = "le", field = "u16"): void {
    assertUint(value, 0xffff, field);
    this.view.setUint16(this.pos, value, endian === "le");
    this.pos += 2;
  }

  writeU32(value: number, endian: Endian = "le", field = "u32"): void {
    assertUint(value, 0xffffffff, field);
    this.view.setUint32(this.pos, value, endian === "le");
    this.pos += 4;
  }

  writeU48BE(value: number, field = "u48"): void {
    assertUint(value, 0xffffffffffff, field);
    this.view.setUint16(this.pos, Math.floor(value / 0x100000000), false);
    this.view.setUint32(this.pos + 2, value % 0x100000000, false);
    this.pos += 6;
  }

  writeU48LE(value: number, field = "u48"): void {
    assertUint(value, 0xffffffffffff, field);
    this.view.setUint32(this.pos, value % 0x100000000, true);
    this.view.setUint16(this.pos + 4, Math.floor(value / 0x100000000), true);
    this.pos += 6;
  }

  writeU64LE(value: bigint, field = "u64"): void {
    if (value < 0n || value > 0xffffffffffffffffn) {
      throw new Error(`${field} out of range: ${value}`);
    }
    this.view.setBigUint64(this.pos, value, true);
    this.pos += 8;
  }

  writeBytes(value: Uint8Array): void {
    this.bytes.set(value, this.pos);
    this.pos += value.length;
  }

  /**
   * Return the filled buffer.
   * @throws Error if fewer or more bytes were written than were allocated
   */
  finish(): Uint8Array {
    if (this.pos !== this.bytes.length) {
      throw new Error(`Encoded ${this.pos} bytes, expected ${this.bytes.length}`);
    }
    return this.bytes;
  }
}

function assertUint(value: number, max: number, field: string): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new Error(`${field} out of range: ${value} (max ${max})`);
  }
}
