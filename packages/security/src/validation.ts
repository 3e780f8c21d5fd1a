/**
 * Security Structure Validation
 *
 * Checks a decoded or hand-built value against the rules Windows applies,
 * without touching bytes. Decoding is lenient by comparison: it accepts
 * anything it can parse and reports oddities as anomalies.
 *
 * SID:
 * - revision is 1
 * - authority fits 48 bits, sub-authorities fit u32
 * - at most 15 sub-authorities
 *
 * ACL:
 * - revision is 2 or 4; 4 when it holds object ACEs
 * - every ACE and the ACL itself fit a u16 size field
 * - every SID inside is valid
 *
 * Security descriptor:
 * - revision is 1, owner/group/ACLs valid when present
 */

import { aceByteLength } from "./ace.ts";
import { aclByteLength } from "./acl.ts";
import {
  ACL_REVISION_DS,
  ACL_REVISIONS,
  MAX_AUTHORITY,
  MAX_STRUCTURE_SIZE,
  MAX_SUB_AUTHORITIES,
  SD_REVISION,
  SID_REVISION,
} from "./constants.ts";
import type { Acl, SecurityDescriptor, Sid, ValidationErrorCode, ValidationResult } from "./types.ts";

const VALID: ValidationResult = { valid: true };

function invalid(error: ValidationErrorCode, message: string): ValidationResult {
  return { valid: false, error, message };
}

export function validateSid(sid: Sid): ValidationResult {
  if (sid.revision !== SID_REVISION) {
    return invalid("invalid_revision", `SID revision ${sid.revision}, expected ${SID_REVISION}`);
  }
  if (!Number.isInteger(sid.authority) || sid.authority < 0 || sid.authority > MAX_AUTHORITY) {
    return invalid("invalid_authority", `SID authority ${sid.authority} does not fit 48 bits`);
  }
  if (sid.subAuthorities.length > MAX_SUB_AUTHORITIES) {
    return invalid(
      "too_many_sub_authorities",
      `SID has ${sid.subAuthorities.length} sub-authorities, at most ${MAX_SUB_AUTHORITIES} allowed`
    );
  }
  const bad = sid.subAuthorities.findIndex(
    (sub) => !Number.isInteger(sub) || sub < 0 || sub > 0xffffffff
  );
  if (bad !== -1) {
    return invalid(
      "invalid_sub_authority",
      `SID sub-authority ${bad} is ${sid.subAuthorities[bad]}, not a u32`
    );
  }
  return VALID;
}

export function validateAcl(acl: Acl): ValidationResult {
  if (!ACL_REVISIONS.some((revision) => revision === acl.revision)) {
    return invalid("invalid_revision", `ACL revision ${acl.revision}, expected 2 or 4`);
  }

  for (const [index, ace] of acl.aces.entries()) {
    const size = aceByteLength(ace);
    if (size > MAX_STRUCTURE_SIZE) {
      return invalid("too_large", `ACE ${index} is ${size} bytes`);
    }
    if ((ace.kind === "object" || ace.kind === "callbackObject") && acl.revision < ACL_REVISION_DS) {
      return invalid(
        "revision_too_low",
        `ACE ${index} is an object ACE; ACL revision must be ${ACL_REVISION_DS}`
      );
    }
    if (ace.kind !== "opaque") {
      const result = validateSid(ace.sid);
      if (!result.valid) return result;
    }
  }

  const size = aclByteLength(acl);
  if (size > MAX_STRUCTURE_SIZE) {
    return invalid("too_large", `ACL is ${size} bytes`);
  }
  return VALID;
}

export function validateSecurityDescriptor(sd: SecurityDescriptor): ValidationResult {
  if (sd.revision !== SD_REVISION) {
    return invalid(
      "invalid_revision",
      `Security descriptor revision ${sd.revision}, expected ${SD_REVISION}`
    );
  }

  for (const sid of [sd.owner, sd.group]) {
    if (sid) {
      const result = validateSid(sid);
      if (!result.valid) return result;
    }
  }
  for (const acl of [sd.sacl, sd.dacl]) {
    if (acl) {
      const result = validateAcl(acl);
      if (!result.valid) return result;
    }
  }
  return VALID;
}
