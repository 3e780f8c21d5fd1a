/**
 * Security Identifier (SID)
 *
 * Layout:
 * - 0:     revision (u8)
 * - 1:     sub-authority count (u8)
 * - 2-7:   identifier authority (u48 BE)
 * - 8-:    sub-authorities (u32 LE each)
 *
 * Text form: S-<revision>-<authority>-<sub1>-<sub2>-...
 */

import {
  type ByteCursor,
  ByteWriter,
  type DecodeContext,
  type DecodeOptions,
  type DecodeResult,
  type Result,
  runDecode,
} from "@winsec/core";
import { MAX_AUTHORITY, SID_HEADER_SIZE, SID_REVISION } from "./constants.ts";
import type { Sid } from "./types.ts";

export type SidParseError = {
  code: "invalid_sid";
  message: string;
};

/** Authorities at or above this value are written in hex */
const HEX_AUTHORITY_THRESHOLD = 0x1_0000_0000;

const SID_PATTERN = /^S-(\d{1,3})-(\d{1,15}|0x[0-9a-f]{1,12})((?:-\d{1,10})*)$/i;

export function readSid(cursor: ByteCursor, context: DecodeContext): Sid {
  const start = cursor.absolutePosition;
  const revision = cursor.readU8();
  context.checkRevision("SID", revision, [SID_REVISION], start);

  const count = cursor.readU8();
  const authority = cursor.readU48BE();
  const subAuthorities: number[] = [];
  for (let i = 0; i < count; i++) {
    subAuthorities.push(cursor.readU32());
  }

  return { revision, authority, subAuthorities };
}

export function writeSid(writer: ByteWriter, sid: Sid): void {
  writer.writeU8(sid.revision, "sid.revision");
  writer.writeU8(sid.subAuthorities.length, "sid.subAuthorityCount");
  writer.writeU48BE(sid.authority, "sid.authority");
  for (const sub of sid.subAuthorities) {
    writer.writeU32(sub, "le", "sid.subAuthority");
  }
}

export function sidByteLength(sid: Sid): number {
  return SID_HEADER_SIZE + 4 * sid.subAuthorities.length;
}

export function decodeSid(bytes: Uint8Array, options?: DecodeOptions): DecodeResult<Sid> {
  return runDecode(bytes, options, readSid);
}

/**
 * @throws Error if a field does not fit its wire width (e.g. more than 255 sub-authorities)
 */
export function encodeSid(sid: Sid): Uint8Array {
  const writer = new ByteWriter(sidByteLength(sid));
  writeSid(writer, sid);
  return writer.finish();
}

/**
 * @example formatSid({ revision: 1, authority: 5, subAuthorities: [18] }) → "S-1-5-18"
 */
export function formatSid(sid: Sid): string {
  const authority =
    sid.authority >= HEX_AUTHORITY_THRESHOLD
      ? `0x${sid.authority.toString(16).toUpperCase().padStart(12, "0")}`
      : sid.authority.toString();
  return ["S", sid.revision, authority, ...sid.subAuthorities].join("-");
}

/**
 * Inverse of formatSid. Accepts a lower-case "s" prefix and a decimal or
 * 0x-prefixed hex authority.
 */
export function parseSid(text: string): Result<Sid, SidParseError> {
  const fail = (message: string): Result<Sid, SidParseError> => ({
    ok: false,
    error: { code: "invalid_sid", message },
  });

  const match = SID_PATTERN.exec(text.trim());
  if (!match) {
    return fail(`Not a SID: ${text}`);
  }

  const [, revisionText = "", authorityText = "", subText = ""] = match;
  const revision = Number.parseInt(revisionText, 10);
  if (revision > 0xff) {
    return fail(`SID revision out of range: ${revision}`);
  }

  const authority = /^0x/i.test(authorityText)
    ? Number.parseInt(authorityText.slice(2), 16)
    : Number.parseInt(authorityText, 10);
  if (authority > MAX_AUTHORITY) {
    return fail(`SID authority out of range: ${authorityText}`);
  }

  const subAuthorities = subText === "" ? [] : subText.slice(1).split("-").map(Number);
  const tooLarge = subAuthorities.find((sub) => sub > 0xffffffff);
  if (tooLarge !== undefined) {
    return fail(`SID sub-authority out of range: ${tooLarge}`);
  }
  if (subAuthorities.length > 0xff) {
    return fail(`SID has ${subAuthorities.length} sub-authorities`);
  }

  return { ok: true, value: { revision, authority, subAuthorities } };
}

export function sidEquals(a: Sid, b: Sid): boolean {
  return (
    a.revision === b.revision &&
    a.authority === b.authority &&
    a.subAuthorities.length === b.subAuthorities.length &&
    a.subAuthorities.every((sub, i) => sub === b.subAuthorities[i])
  );
}
