/**
 * Bounded Byte Cursor
 *
 * Sequential little/big-endian reads over an immutable buffer with an
 * internal position. Every read is bounds-checked before the DataView is
 * touched; a short buffer surfaces as a DecodeFailure, never as a RangeError.
 *
 * A cursor can open a *window* over its next N bytes. Reads that run past
 * the window's end fail with the window's own error code (for example
 * `ace_body_overrun`) even when the underlying buffer has more bytes, so a
 * body decoder cannot wander into a sibling structure.
 */

import { DecodeFailure, type DecodeErrorCode } from "./result.ts";

export type Endian = "le" | "be";

export type CursorOptions = {
  /** Absolute offset of byte 0 of this cursor, used in error offsets (default: 0) */
  base?: number;
  /** Error code raised when a read passes the end (default: "out_of_bounds") */
  overrunCode?: DecodeErrorCode;
};

export class ByteCursor {
  private readonly view: DataView;
  private readonly base: number;
  private readonly overrunCode: DecodeErrorCode;
  private pos = 0;

  constructor(
    private readonly bytes: Uint8Array,
    options?: CursorOptions
  ) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.base = options?.base ?? 0;
    this.overrunCode = options?.overrunCode ?? "out_of_bounds";
  }

  /** Read position relative to this cursor's start */
  get position(): number {
    return this.pos;
  }

  /** Read position relative to the outermost buffer */
  get absolutePosition(): number {
    return this.base + this.pos;
  }

  get length(): number {
    return this.bytes.length;
  }

  remaining(): number {
    return this.bytes.length - this.pos;
  }

  /**
   * Move to an absolute position within this cursor.
   * Seeking to exactly `length` is allowed; the next read then fails.
   */
  seek(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.bytes.length) {
      throw new DecodeFailure({
        code: this.overrunCode,
        message: `Cannot seek to ${offset}: buffer is ${this.bytes.length} bytes`,
        offset: this.base + offset,
      });
    }
    this.pos = offset;
  }

  skip(count: number): void {
    this.require(count, "skip");
    this.pos += count;
  }

  readU8(): number {
    this.require(1, "u8");
    const value = this.view.getUint8(this.pos);
    this.pos += 1;
    return value;
  }

  readU16(endian: Endian = "le"): number {
    this.require(2, "u16");
    const value = this.view.getUint16(this.pos, endian === "le");
    this.pos += 2;
    return value;
  }

  readU32(endian: Endian = "le"): number {
    this.require(4, "u32");
    const value = this.view.getUint32(this.pos, endian === "le");
    this.pos += 4;
    return value;
  }

  /** 48-bit big-endian unsigned (SID identifier authority) */
  readU48BE(): number {
    this.require(6, "u48");
    const high = this.view.getUint16(this.pos, false);
    const low = this.view.getUint32(this.pos + 2, false);
    this.pos += 6;
    return high * 0x100000000 + low;
  }

  /** 48-bit little-endian unsigned (MFT entry number) */
  readU48LE(): number {
    this.require(6, "u48");
    const low = this.view.getUint32(this.pos, true);
    const high = this.view.getUint16(this.pos + 4, true);
    this.pos += 6;
    return high * 0x100000000 + low;
  }

  readU64LE(): bigint {
    this.require(8, "u64");
    const value = this.view.getBigUint64(this.pos, true);
    this.pos += 8;
    return value;
  }

  /** Copy of the next `count` bytes */
  readBytes(count: number): Uint8Array {
    this.require(count, "bytes");
    const value = this.bytes.slice(this.pos, this.pos + count);
    this.pos += count;
    return value;
  }

  /**
   * Sub-cursor over the next `length` bytes; this cursor advances past them.
   *
   * Fails with this cursor's own code if the bytes are not there. Reads
   * past the window's end fail with `overrunCode`.
   */
  window(length: number, overrunCode: DecodeErrorCode): ByteCursor {
    this.require(length, "window");
    const sub = new ByteCursor(this.bytes.subarray(this.pos, this.pos + length), {
      base: this.base + this.pos,
      overrunCode,
    });
    this.pos += length;
    return sub;
  }

  private require(count: number, what: string): void {
    if (count < 0 || this.pos + count > this.bytes.length) {
      throw new DecodeFailure({
        code: this.overrunCode,
        message: `Reading ${what} needs ${count} bytes at offset ${this.absolutePosition}, ${this.remaining()} remaining`,
        offset: this.absolutePosition,
      });
    }
  }
}
