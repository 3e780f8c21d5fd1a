/**
 * FILETIME: 64-bit count of 100-nanosecond intervals since 1601-01-01 UTC.
 *
 * Kept as a bigint so no precision is lost; conversions to ISO-8601 keep
 * microseconds (the last tick digit is dropped, as Date has no room for it).
 */

import { FILETIME_SIZE, FILETIME_UNIX_EPOCH_TICKS } from "./constants.ts";
import { runDecode } from "./context.ts";
import type { ByteCursor } from "./cursor.ts";
import type { DecodeOptions } from "./options.ts";
import type { DecodeResult } from "./result.ts";
import { ByteWriter } from "./writer.ts";

export type FileTime = {
  readonly ticks: bigint;
};

export function readFileTime(cursor: ByteCursor): FileTime {
  return { ticks: cursor.readU64LE() };
}

export function decodeFileTime(bytes: Uint8Array, options?: DecodeOptions): DecodeResult<FileTime> {
  return runDecode(bytes, options, readFileTime);
}

export function encodeFileTime(fileTime: FileTime): Uint8Array {
  const writer = new ByteWriter(FILETIME_SIZE);
  writer.writeU64LE(fileTime.ticks, "filetime");
  return writer.finish();
}

/**
 * Split into whole Unix milliseconds plus the leftover microseconds (0-999)
 */
function toUnixParts(fileTime: FileTime): { millis: bigint; micros: bigint } {
  const unixMicros = fileTime.ticks / 10n - FILETIME_UNIX_EPOCH_TICKS / 10n;
  let millis = unixMicros / 1000n;
  // bigint division truncates toward zero; floor for pre-1970 values
  if (unixMicros < 0n && unixMicros % 1000n !== 0n) {
    millis -= 1n;
  }
  return { millis, micros: unixMicros - millis * 1000n };
}

/**
 * @example ticks 130266586132760403n → "2013-10-19T12:16:53.276040Z"
 */
export function fileTimeToIsoString(fileTime: FileTime): string {
  const { millis, micros } = toUnixParts(fileTime);
  const iso = new Date(Number(millis)).toISOString();
  return `${iso.slice(0, -1)}${micros.toString().padStart(3, "0")}Z`;
}

/** Millisecond precision */
export function fileTimeToDate(fileTime: FileTime): Date {
  return new Date(Number(toUnixParts(fileTime).millis));
}

/**
 * @throws Error if the date is before 1601-01-01
 */
export function fileTimeFromDate(date: Date): FileTime {
  const ticks = BigInt(date.getTime()) * 10_000n + FILETIME_UNIX_EPOCH_TICKS;
  if (ticks < 0n) {
    throw new Error(`Date precedes the FILETIME epoch: ${date.toISOString()}`);
  }
  return { ticks };
}
