/**
 * MS-DOS date and time
 *
 * Date (u16): bits 0-4 day, bits 5-8 month, bits 9-15 years since 1980.
 * Time (u16): bits 0-4 seconds / 2, bits 5-10 minutes, bits 11-15 hours.
 *
 * A zero day or month is read as 1 so that an all-zero date formats as
 * 1980-01-01. Out-of-range hours or minutes are kept as stored.
 */

import { DOS_EPOCH_YEAR } from "./constants.ts";
import { runDecode } from "./context.ts";
import type { ByteCursor } from "./cursor.ts";
import type { DecodeOptions } from "./options.ts";
import type { DecodeResult } from "./result.ts";

export type DosDate = {
  readonly raw: number;
  readonly year: number;
  readonly month: number;
  readonly day: number;
};

export type DosTime = {
  readonly raw: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
};

export type DosDateTime = {
  readonly date: DosDate;
  readonly time: DosTime;
};

export function dosDateFromRaw(raw: number): DosDate {
  return {
    raw,
    year: (raw >>> 9) + DOS_EPOCH_YEAR,
    month: ((raw >>> 5) & 0x0f) || 1,
    day: (raw & 0x1f) || 1,
  };
}

export function dosTimeFromRaw(raw: number): DosTime {
  return {
    raw,
    hour: (raw >>> 11) & 0x1f,
    minute: (raw >>> 5) & 0x3f,
    second: (raw & 0x1f) * 2,
  };
}

/**
 * Packed form with the date in the low 16 bits and the time in the high 16 bits
 */
export function dosDateTimeFromU32(value: number): DosDateTime {
  return {
    date: dosDateFromRaw(value & 0xffff),
    time: dosTimeFromRaw((value >>> 16) & 0xffff),
  };
}

export function readDosDate(cursor: ByteCursor): DosDate {
  return dosDateFromRaw(cursor.readU16());
}

export function readDosTime(cursor: ByteCursor): DosTime {
  return dosTimeFromRaw(cursor.readU16());
}

/** Date first, then time */
export function readDosDateTime(cursor: ByteCursor): DosDateTime {
  const date = readDosDate(cursor);
  const time = readDosTime(cursor);
  return { date, time };
}

export function decodeDosDate(bytes: Uint8Array, options?: DecodeOptions): DecodeResult<DosDate> {
  return runDecode(bytes, options, readDosDate);
}

export function decodeDosTime(bytes: Uint8Array, options?: DecodeOptions): DecodeResult<DosTime> {
  return runDecode(bytes, options, readDosTime);
}

export function decodeDosDateTime(
  bytes: Uint8Array,
  options?: DecodeOptions
): DecodeResult<DosDateTime> {
  return runDecode(bytes, options, readDosDateTime);
}

const pad2 = (value: number) => value.toString().padStart(2, "0");

/** `YYYY-MM-DD` */
export function formatDosDate(date: DosDate): string {
  return `${date.year}-${pad2(date.month)}-${pad2(date.day)}`;
}

/** `HH:MM:SS` */
export function formatDosTime(time: DosTime): string {
  return `${pad2(time.hour)}:${pad2(time.minute)}:${pad2(time.second)}`;
}

/** `YYYY-MM-DD HH:MM:SS` */
export function formatDosDateTime(dateTime: DosDateTime): string {
  return `${formatDosDate(dateTime.date)} ${formatDosTime(dateTime.time)}`;
}
