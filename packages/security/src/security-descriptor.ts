/**
 * Self-relative Security Descriptor
 *
 * Header (20 bytes):
 * - 0:     revision (u8)
 * - 1:     sbz1 (u8)
 * - 2-3:   control (u16)
 * - 4-7:   owner SID offset (u32)
 * - 8-11:  group SID offset (u32)
 * - 12-15: SACL offset (u32)
 * - 16-19: DACL offset (u32)
 *
 * Offsets are measured from the first header byte; 0 means the part is
 * absent. Decoding happens in two phases: the fixed header first, then an
 * absolute seek per non-zero offset.
 *
 * Encoding places the parts directly after the header in the order owner,
 * group, SACL, DACL.
 */

import {
  type ByteCursor,
  ByteWriter,
  type DecodeContext,
  type DecodeOptions,
  type DecodeResult,
  type Reader,
  runDecode,
} from "@winsec/core";
import { aclByteLength, readAcl, writeAcl } from "./acl.ts";
import { SD_CONTROL, SD_HEADER_SIZE, SD_REVISION } from "./constants.ts";
import { readSid, sidByteLength, writeSid } from "./sid.ts";
import type { Acl, SecurityDescriptor, Sid } from "./types.ts";

// ============================================================================
// Decoding
// ============================================================================

type AclSlot = {
  name: "SACL" | "DACL";
  bit: number;
  offset: number;
  /** Position of the offset field in the header */
  field: number;
};

function checkAclPresence(
  slot: AclSlot,
  control: number,
  start: number,
  context: DecodeContext
): void {
  const flagged = (control & slot.bit) !== 0;
  const bitName = slot.name === "SACL" ? "SE_SACL_PRESENT" : "SE_DACL_PRESENT";

  if (flagged && slot.offset === 0) {
    context.report({
      code: "offset_control_mismatch",
      message: `${slot.name} offset is 0 but ${bitName} is set`,
      offset: start + slot.field,
    });
  } else if (!flagged && slot.offset !== 0) {
    context.report({
      code: "offset_control_mismatch",
      message: `${slot.name} offset is ${slot.offset} but ${bitName} is clear`,
      offset: start + slot.field,
    });
  }
}

/**
 * Read a security descriptor whose header starts at the cursor's position.
 * Offsets are resolved against that position.
 */
export function readSecurityDescriptor(
  cursor: ByteCursor,
  context: DecodeContext
): SecurityDescriptor {
  const origin = cursor.position;
  const start = cursor.absolutePosition;

  const revision = cursor.readU8();
  context.checkRevision("Security descriptor", revision, [SD_REVISION], start);
  const reserved = cursor.readU8();
  const control = cursor.readU16();
  const ownerOffset = cursor.readU32();
  const groupOffset = cursor.readU32();
  const saclOffset = cursor.readU32();
  const daclOffset = cursor.readU32();

  checkAclPresence(
    { name: "SACL", bit: SD_CONTROL.SE_SACL_PRESENT, offset: saclOffset, field: 12 },
    control,
    start,
    context
  );
  checkAclPresence(
    { name: "DACL", bit: SD_CONTROL.SE_DACL_PRESENT, offset: daclOffset, field: 16 },
    control,
    start,
    context
  );

  const resolve = <T>(part: string, offset: number, read: Reader<T>): T | null => {
    if (offset === 0) return null;
    context.debug(`${part} at offset ${offset}`);
    cursor.seek(origin + offset);
    return read(cursor, context);
  };

  const owner = resolve("owner", ownerOffset, readSid);
  const group = resolve("group", groupOffset, readSid);
  const sacl = resolve("SACL", saclOffset, readAcl);
  const dacl = resolve("DACL", daclOffset, readAcl);

  return { revision, reserved, control, owner, group, sacl, dacl };
}

export function decodeSecurityDescriptor(
  bytes: Uint8Array,
  options?: DecodeOptions
): DecodeResult<SecurityDescriptor> {
  return runDecode(bytes, options, readSecurityDescriptor);
}

// ============================================================================
// Encoding
// ============================================================================

type Layout = {
  owner: number;
  group: number;
  sacl: number;
  dacl: number;
  size: number;
};

function layout(sd: SecurityDescriptor): Layout {
  let next = SD_HEADER_SIZE;
  const place = <T>(part: T | null, length: (part: T) => number): number => {
    if (part === null) return 0;
    const offset = next;
    next += length(part);
    return offset;
  };

  const owner = place<Sid>(sd.owner, sidByteLength);
  const group = place<Sid>(sd.group, sidByteLength);
  const sacl = place<Acl>(sd.sacl, aclByteLength);
  const dacl = place<Acl>(sd.dacl, aclByteLength);
  return { owner, group, sacl, dacl, size: next };
}

/**
 * Control word with the SACL/DACL present bits matching the parts written
 */
function controlFor(sd: SecurityDescriptor): number {
  let control = sd.control & ~(SD_CONTROL.SE_SACL_PRESENT | SD_CONTROL.SE_DACL_PRESENT);
  if (sd.sacl) control |= SD_CONTROL.SE_SACL_PRESENT;
  if (sd.dacl) control |= SD_CONTROL.SE_DACL_PRESENT;
  return control;
}

export function securityDescriptorByteLength(sd: SecurityDescriptor): number {
  return layout(sd).size;
}

export function writeSecurityDescriptor(writer: ByteWriter, sd: SecurityDescriptor): void {
  const offsets = layout(sd);

  writer.writeU8(sd.revision, "sd.revision");
  writer.writeU8(sd.reserved, "sd.reserved");
  writer.writeU16(controlFor(sd), "le", "sd.control");
  writer.writeU32(offsets.owner, "le", "sd.ownerOffset");
  writer.writeU32(offsets.group, "le", "sd.groupOffset");
  writer.writeU32(offsets.sacl, "le", "sd.saclOffset");
  writer.writeU32(offsets.dacl, "le", "sd.daclOffset");

  if (sd.owner) writeSid(writer, sd.owner);
  if (sd.group) writeSid(writer, sd.group);
  if (sd.sacl) writeAcl(writer, sd.sacl);
  if (sd.dacl) writeAcl(writer, sd.dacl);
}

/**
 * @throws Error if a part cannot be represented (see encodeSid / encodeAcl)
 */
export function encodeSecurityDescriptor(sd: SecurityDescriptor): Uint8Array {
  const writer = new ByteWriter(securityDescriptorByteLength(sd));
  writeSecurityDescriptor(writer, sd);
  return writer.finish();
}
