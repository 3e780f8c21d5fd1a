/**
 * Access Control List (ACL)
 *
 * Header (8 bytes):
 * - 0:   revision (u8)
 * - 1:   sbz1 (u8)
 * - 2-3: size (u16, header + every ACE)
 * - 4-5: ace count (u16)
 * - 6-7: sbz2 (u16)
 *
 * Followed by `ace count` ACEs back to back. Iteration is driven by the
 * count alone; bytes after the last ACE are never looked at.
 */

import {
  type ByteCursor,
  ByteWriter,
  type DecodeContext,
  type DecodeOptions,
  type DecodeResult,
  runDecode,
} from "@winsec/core";
import { aceByteLength, readAce, writeAce } from "./ace.ts";
import { ACL_HEADER_SIZE, ACL_REVISIONS, MAX_STRUCTURE_SIZE } from "./constants.ts";
import type { Ace, Acl } from "./types.ts";

export function readAcl(cursor: ByteCursor, context: DecodeContext): Acl {
  const start = cursor.absolutePosition;
  const revision = cursor.readU8();
  context.checkRevision("ACL", revision, ACL_REVISIONS, start);

  const reserved1 = cursor.readU8();
  const size = cursor.readU16();
  const count = cursor.readU16();
  const reserved2 = cursor.readU16();

  const aces: Ace[] = [];
  for (let i = 0; i < count; i++) {
    aces.push(readAce(cursor, context));
  }

  const consumed = cursor.absolutePosition - start;
  if (consumed !== size) {
    context.report({
      code: "size_mismatch",
      message: `ACL declares ${size} bytes, but its header and ${count} ACEs occupy ${consumed}`,
      offset: start,
    });
  }

  return { revision, reserved1, reserved2, aces };
}

export function aclByteLength(acl: Acl): number {
  return acl.aces.reduce((total, ace) => total + aceByteLength(ace), ACL_HEADER_SIZE);
}

export function writeAcl(writer: ByteWriter, acl: Acl): void {
  const size = aclByteLength(acl);
  if (size > MAX_STRUCTURE_SIZE) {
    throw new Error(`ACL is ${size} bytes, larger than the ${MAX_STRUCTURE_SIZE}-byte limit`);
  }
  if (acl.aces.length > 0xffff) {
    throw new Error(`ACL holds ${acl.aces.length} ACEs, more than ${0xffff}`);
  }

  writer.writeU8(acl.revision, "acl.revision");
  writer.writeU8(acl.reserved1, "acl.reserved1");
  writer.writeU16(size, "le", "acl.size");
  writer.writeU16(acl.aces.length, "le", "acl.aceCount");
  writer.writeU16(acl.reserved2, "le", "acl.reserved2");
  for (const ace of acl.aces) {
    writeAce(writer, ace);
  }
}

export function decodeAcl(bytes: Uint8Array, options?: DecodeOptions): DecodeResult<Acl> {
  return runDecode(bytes, options, readAcl);
}

/**
 * @throws Error if the ACL exceeds 65535 bytes or 65535 ACEs, or a field is out of range
 */
export function encodeAcl(acl: Acl): Uint8Array {
  const writer = new ByteWriter(aclByteLength(acl));
  writeAcl(writer, acl);
  return writer.finish();
}
