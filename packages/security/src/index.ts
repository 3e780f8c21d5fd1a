/**
 * @winsec/security
 *
 * Windows access-control structures: SID, ACE, ACL and the self-relative
 * security descriptor. Decoders return a DecodeResult (see @winsec/core);
 * encoders return the exact byte layout.
 */

// Constants
export {
  ACCESS_MASK,
  ACE_FLAGS,
  ACE_HEADER_SIZE,
  ACE_TYPE,
  ACL_HEADER_SIZE,
  ACL_REVISION,
  ACL_REVISION_DS,
  ACL_REVISIONS,
  MAX_AUTHORITY,
  MAX_STRUCTURE_SIZE,
  MAX_SUB_AUTHORITIES,
  OBJECT_ACE_FLAGS,
  SD_CONTROL,
  SD_HEADER_SIZE,
  SD_REVISION,
  SID_HEADER_SIZE,
  SID_REVISION,
  SPECIFIC_RIGHTS_MASK,
} from "./constants.ts";

// Types
export type {
  Ace,
  AceKind,
  Acl,
  BasicAce,
  BasicAceType,
  CallbackAce,
  CallbackAceType,
  CallbackObjectAce,
  CallbackObjectAceType,
  ObjectAce,
  ObjectAceType,
  OpaqueAce,
  SecurityDescriptor,
  Sid,
  ValidationErrorCode,
  ValidationResult,
} from "./types.ts";

// Codecs
export { aceByteLength, decodeAce, encodeAce, getAceKind, readAce, writeAce } from "./ace.ts";
export { aclByteLength, decodeAcl, encodeAcl, readAcl, writeAcl } from "./acl.ts";
export {
  decodeSecurityDescriptor,
  encodeSecurityDescriptor,
  readSecurityDescriptor,
  securityDescriptorByteLength,
  writeSecurityDescriptor,
} from "./security-descriptor.ts";
export {
  decodeSid,
  encodeSid,
  formatSid,
  parseSid,
  readSid,
  type SidParseError,
  sidByteLength,
  sidEquals,
  writeSid,
} from "./sid.ts";

// Names & rendering
export {
  type AceJSON,
  type AclJSON,
  aceToJSON,
  aclToJSON,
  type SecurityDescriptorJSON,
  type SidJSON,
  securityDescriptorToJSON,
  sidToJSON,
} from "./json.ts";
export { aceTypeName, describeAccessMask, describeAceFlags, describeControlFlags } from "./names.ts";
export { lookupWellKnownSid } from "./well-known.ts";

// Validation
export { validateAcl, validateSecurityDescriptor, validateSid } from "./validation.ts";
