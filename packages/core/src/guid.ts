/**
 * GUID
 *
 * Layout (16 bytes):
 * - 0-3:   data1 (u32 LE)
 * - 4-5:   data2 (u16 LE)
 * - 6-7:   data3 (u16 LE)
 * - 8-15:  data4 (8 bytes, stored as-is)
 *
 * Text form: `54849625-5478-4994-A5BA-3E3B0328C30D`
 */

import { bytesToHex, hexToBytes } from "@winsec/encoding";
import { GUID_SIZE } from "./constants.ts";
import { runDecode } from "./context.ts";
import type { ByteCursor } from "./cursor.ts";
import type { DecodeOptions } from "./options.ts";
import type { DecodeResult, Result } from "./result.ts";
import { ByteWriter } from "./writer.ts";

export type Guid = {
  readonly data1: number;
  readonly data2: number;
  readonly data3: number;
  /** Always 8 bytes */
  readonly data4: Uint8Array;
};

export type GuidParseError = {
  code: "invalid_guid";
  message: string;
};

const GUID_PATTERN =
  /^\{?([0-9a-fA-F]{8})-([0-9a-fA-F]{4})-([0-9a-fA-F]{4})-([0-9a-fA-F]{4})-([0-9a-fA-F]{12})\}?$/;

export function readGuid(cursor: ByteCursor): Guid {
  const data1 = cursor.readU32();
  const data2 = cursor.readU16();
  const data3 = cursor.readU16();
  const data4 = cursor.readBytes(8);
  return { data1, data2, data3, data4 };
}

export function writeGuid(writer: ByteWriter, guid: Guid): void {
  if (guid.data4.length !== 8) {
    throw new Error(`GUID data4 must be 8 bytes, got ${guid.data4.length}`);
  }
  writer.writeU32(guid.data1, "le", "guid.data1");
  writer.writeU16(guid.data2, "le", "guid.data2");
  writer.writeU16(guid.data3, "le", "guid.data3");
  writer.writeBytes(guid.data4);
}

export function decodeGuid(bytes: Uint8Array, options?: DecodeOptions): DecodeResult<Guid> {
  return runDecode(bytes, options, readGuid);
}

export function encodeGuid(guid: Guid): Uint8Array {
  const writer = new ByteWriter(GUID_SIZE);
  writeGuid(writer, guid);
  return writer.finish();
}

/**
 * Upper-case registry form without braces
 */
export function formatGuid(guid: Guid): string {
  const hex = (value: number, width: number) => value.toString(16).padStart(width, "0");
  const tail = bytesToHex(guid.data4);
  return `${hex(guid.data1, 8)}-${hex(guid.data2, 4)}-${hex(guid.data3, 4)}-${tail.slice(0, 4)}-${tail.slice(4)}`.toUpperCase();
}

/**
 * Parse `XXXXXXXX-XXXX-XXXX-XXXX-XXXXXXXXXXXX`, with or without braces, any case
 */
export function parseGuid(text: string): Result<Guid, GuidParseError> {
  const match = GUID_PATTERN.exec(text.trim());
  if (!match) {
    return { ok: false, error: { code: "invalid_guid", message: `Not a GUID: ${text}` } };
  }

  const [, d1 = "", d2 = "", d3 = "", d4a = "", d4b = ""] = match;
  return {
    ok: true,
    value: {
      data1: Number.parseInt(d1, 16),
      data2: Number.parseInt(d2, 16),
      data3: Number.parseInt(d3, 16),
      data4: hexToBytes(d4a + d4b),
    },
  };
}
