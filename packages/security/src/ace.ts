/**
 * Access Control Entry (ACE)
 *
 * Header (4 bytes): type (u8), flags (u8), size (u16 LE, header included).
 * The body that follows is exactly `size - 4` bytes and its shape is picked
 * by the type tag:
 *
 * | kind           | types                    | body                                        |
 * |----------------|--------------------------|---------------------------------------------|
 * | basic          | 00-03, 11, 13, 14        | mask, SID                                   |
 * | callback       | 09, 0A, 0D, 0E           | mask, SID, application data                 |
 * | object         | 05-08                    | mask, object flags, [GUID], [GUID], SID     |
 * | callbackObject | 0B, 0C, 0F, 10           | object body, application data               |
 * | opaque         | anything else            | raw bytes                                   |
 *
 * Body decoders read through a window sized from the header, so a body
 * that needs more than its declared size fails with `ace_body_overrun`
 * instead of reading into the next ACE.
 */

import {
  type ByteCursor,
  ByteWriter,
  type DecodeContext,
  DecodeFailure,
  type DecodeOptions,
  type DecodeResult,
  GUID_SIZE,
  type Guid,
  readGuid,
  runDecode,
  writeGuid,
} from "@winsec/core";
import { ACE_HEADER_SIZE, ACE_TYPE, OBJECT_ACE_FLAGS } from "./constants.ts";
import { readSid, sidByteLength, writeSid } from "./sid.ts";
import type {
  Ace,
  AceKind,
  BasicAceType,
  CallbackAceType,
  CallbackObjectAce,
  CallbackObjectAceType,
  ObjectAce,
  ObjectAceType,
  Sid,
} from "./types.ts";

// ============================================================================
// Type classification
// ============================================================================

const BASIC_TYPES: readonly BasicAceType[] = [
  ACE_TYPE.ACCESS_ALLOWED,
  ACE_TYPE.ACCESS_DENIED,
  ACE_TYPE.SYSTEM_AUDIT,
  ACE_TYPE.SYSTEM_ALARM,
  ACE_TYPE.SYSTEM_MANDATORY_LABEL,
  ACE_TYPE.SYSTEM_SCOPED_POLICY_ID,
  ACE_TYPE.SYSTEM_PROCESS_TRUST_LABEL,
];

const CALLBACK_TYPES: readonly CallbackAceType[] = [
  ACE_TYPE.ACCESS_ALLOWED_CALLBACK,
  ACE_TYPE.ACCESS_DENIED_CALLBACK,
  ACE_TYPE.SYSTEM_AUDIT_CALLBACK,
  ACE_TYPE.SYSTEM_ALARM_CALLBACK,
];

const OBJECT_TYPES: readonly ObjectAceType[] = [
  ACE_TYPE.ACCESS_ALLOWED_OBJECT,
  ACE_TYPE.ACCESS_DENIED_OBJECT,
  ACE_TYPE.SYSTEM_AUDIT_OBJECT,
  ACE_TYPE.SYSTEM_ALARM_OBJECT,
];

const CALLBACK_OBJECT_TYPES: readonly CallbackObjectAceType[] = [
  ACE_TYPE.ACCESS_ALLOWED_CALLBACK_OBJECT,
  ACE_TYPE.ACCESS_DENIED_CALLBACK_OBJECT,
  ACE_TYPE.SYSTEM_AUDIT_CALLBACK_OBJECT,
  ACE_TYPE.SYSTEM_ALARM_CALLBACK_OBJECT,
];

function isBasicType(type: number): type is BasicAceType {
  return BASIC_TYPES.some((t) => t === type);
}

function isCallbackType(type: number): type is CallbackAceType {
  return CALLBACK_TYPES.some((t) => t === type);
}

function isObjectType(type: number): type is ObjectAceType {
  return OBJECT_TYPES.some((t) => t === type);
}

function isCallbackObjectType(type: number): type is CallbackObjectAceType {
  return CALLBACK_OBJECT_TYPES.some((t) => t === type);
}

/**
 * Body shape the decoder uses for a type tag
 */
export function getAceKind(type: number): AceKind {
  if (isBasicType(type)) return "basic";
  if (isCallbackType(type)) return "callback";
  if (isObjectType(type)) return "object";
  if (isCallbackObjectType(type)) return "callbackObject";
  return "opaque";
}

// ============================================================================
// Decoding
// ============================================================================

type ObjectBody = {
  mask: number;
  objectFlags: number;
  objectType: Guid | null;
  inheritedObjectType: Guid | null;
  sid: Sid;
};

function readObjectBody(body: ByteCursor, context: DecodeContext): ObjectBody {
  const mask = body.readU32();
  const objectFlags = body.readU32();
  const objectType =
    objectFlags & OBJECT_ACE_FLAGS.ACE_OBJECT_TYPE_PRESENT ? readGuid(body) : null;
  const inheritedObjectType =
    objectFlags & OBJECT_ACE_FLAGS.ACE_INHERITED_OBJECT_TYPE_PRESENT ? readGuid(body) : null;
  const sid = readSid(body, context);
  return { mask, objectFlags, objectType, inheritedObjectType, sid };
}

function readAceBody(type: number, flags: number, body: ByteCursor, context: DecodeContext): Ace {
  if (isBasicType(type)) {
    const mask = body.readU32();
    const sid = readSid(body, context);
    return { kind: "basic", type, flags, mask, sid };
  }

  if (isCallbackType(type)) {
    const mask = body.readU32();
    const sid = readSid(body, context);
    const applicationData = body.readBytes(body.remaining());
    return { kind: "callback", type, flags, mask, sid, applicationData };
  }

  if (isObjectType(type)) {
    return { kind: "object", type, flags, ...readObjectBody(body, context) };
  }

  if (isCallbackObjectType(type)) {
    const fields = readObjectBody(body, context);
    const applicationData = body.readBytes(body.remaining());
    return { kind: "callbackObject", type, flags, ...fields, applicationData };
  }

  return { kind: "opaque", type, flags, body: body.readBytes(body.remaining()) };
}

/**
 * Read one ACE; the cursor ends up exactly `size` bytes past the ACE start.
 */
export function readAce(cursor: ByteCursor, context: DecodeContext): Ace {
  const start = cursor.absolutePosition;
  const type = cursor.readU8();
  const flags = cursor.readU8();
  const size = cursor.readU16();

  if (size < ACE_HEADER_SIZE) {
    throw new DecodeFailure({
      code: "ace_body_overrun",
      message: `ACE declares size ${size}, smaller than its ${ACE_HEADER_SIZE}-byte header`,
      offset: start,
    });
  }

  const body = cursor.window(size - ACE_HEADER_SIZE, "ace_body_overrun");
  const ace = readAceBody(type, flags, body, context);

  // Callback and opaque bodies absorb the rest of the window
  if (body.remaining() > 0) {
    context.report({
      code: "size_mismatch",
      message: `ACE type 0x${type.toString(16).padStart(2, "0")} declares ${size} bytes but uses ${size - body.remaining()}`,
      offset: start,
    });
  }

  return ace;
}

export function decodeAce(bytes: Uint8Array, options?: DecodeOptions): DecodeResult<Ace> {
  return runDecode(bytes, options, readAce);
}

// ============================================================================
// Encoding
// ============================================================================

function objectBodyLength(ace: ObjectAce | CallbackObjectAce): number {
  return (
    8 +
    (ace.objectType ? GUID_SIZE : 0) +
    (ace.inheritedObjectType ? GUID_SIZE : 0) +
    sidByteLength(ace.sid)
  );
}

function aceBodyLength(ace: Ace): number {
  switch (ace.kind) {
    case "basic":
      return 4 + sidByteLength(ace.sid);
    case "callback":
      return 4 + sidByteLength(ace.sid) + ace.applicationData.length;
    case "object":
      return objectBodyLength(ace);
    case "callbackObject":
      return objectBodyLength(ace) + ace.applicationData.length;
    case "opaque":
      return ace.body.length;
  }
}

/**
 * Wire size: header plus body, as written into the size field
 */
export function aceByteLength(ace: Ace): number {
  return ACE_HEADER_SIZE + aceBodyLength(ace);
}

/**
 * Object flags with the presence bits matching the GUIDs actually written
 */
function objectFlagsFor(ace: ObjectAce | CallbackObjectAce): number {
  const presence =
    OBJECT_ACE_FLAGS.ACE_OBJECT_TYPE_PRESENT | OBJECT_ACE_FLAGS.ACE_INHERITED_OBJECT_TYPE_PRESENT;
  let flags = ace.objectFlags & ~presence;
  if (ace.objectType) flags |= OBJECT_ACE_FLAGS.ACE_OBJECT_TYPE_PRESENT;
  if (ace.inheritedObjectType) flags |= OBJECT_ACE_FLAGS.ACE_INHERITED_OBJECT_TYPE_PRESENT;
  return flags >>> 0;
}

export function writeAce(writer: ByteWriter, ace: Ace): void {
  writer.writeU8(ace.type, "ace.type");
  writer.writeU8(ace.flags, "ace.flags");
  writer.writeU16(aceByteLength(ace), "le", "ace.size");

  switch (ace.kind) {
    case "basic":
      writer.writeU32(ace.mask, "le", "ace.mask");
      writeSid(writer, ace.sid);
      break;
    case "callback":
      writer.writeU32(ace.mask, "le", "ace.mask");
      writeSid(writer, ace.sid);
      writer.writeBytes(ace.applicationData);
      break;
    case "object":
    case "callbackObject":
      writer.writeU32(ace.mask, "le", "ace.mask");
      writer.writeU32(objectFlagsFor(ace), "le", "ace.objectFlags");
      if (ace.objectType) writeGuid(writer, ace.objectType);
      if (ace.inheritedObjectType) writeGuid(writer, ace.inheritedObjectType);
      writeSid(writer, ace.sid);
      if (ace.kind === "callbackObject") writer.writeBytes(ace.applicationData);
      break;
    case "opaque":
      writer.writeBytes(ace.body);
      break;
  }
}

/**
 * @throws Error if the ACE does not fit the 16-bit size field or a field is out of range
 */
export function encodeAce(ace: Ace): Uint8Array {
  const writer = new ByteWriter(aceByteLength(ace));
  writeAce(writer, ace);
  return writer.finish();
}
