/**
 * NTFS MFT file reference
 *
 * u64 LE on disk: the low 48 bits are the MFT entry number, the high
 * 16 bits are the entry's sequence number.
 */

import { MFT_REFERENCE_SIZE } from "./constants.ts";
import { runDecode } from "./context.ts";
import type { ByteCursor } from "./cursor.ts";
import type { DecodeOptions } from "./options.ts";
import type { DecodeResult } from "./result.ts";
import { ByteWriter } from "./writer.ts";

export type MftReference = {
  readonly entry: number;
  readonly sequence: number;
};

export function readMftReference(cursor: ByteCursor): MftReference {
  const entry = cursor.readU48LE();
  const sequence = cursor.readU16();
  return { entry, sequence };
}

export function decodeMftReference(
  bytes: Uint8Array,
  options?: DecodeOptions
): DecodeResult<MftReference> {
  return runDecode(bytes, options, readMftReference);
}

export function encodeMftReference(reference: MftReference): Uint8Array {
  const writer = new ByteWriter(MFT_REFERENCE_SIZE);
  writer.writeU48LE(reference.entry, "mft.entry");
  writer.writeU16(reference.sequence, "le", "mft.sequence");
  return writer.finish();
}

export function mftReferenceFromU64(value: bigint): MftReference {
  return {
    entry: Number(value & 0xffff_ffff_ffffn),
    sequence: Number((value >> 48n) & 0xffffn),
  };
}

export function mftReferenceToU64(reference: MftReference): bigint {
  return (BigInt(reference.sequence) << 48n) | BigInt(reference.entry);
}

/** `entry-sequence`, e.g. "115-37224" */
export function formatMftReference(reference: MftReference): string {
  return `${reference.entry}-${reference.sequence}`;
}
