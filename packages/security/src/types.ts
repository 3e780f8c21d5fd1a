/**
 * Security structure types
 *
 * Every value is self-contained: byte fields are copies, never views into
 * the decoded buffer. Wire-only fields (SID sub-authority count, ACE and
 * ACL sizes, ACL entry count, SD offsets) are not stored; encoders derive
 * them from the value so they cannot drift out of sync.
 */

import type { Guid } from "@winsec/core";
import type { ACE_TYPE } from "./constants.ts";

// ============================================================================
// SID
// ============================================================================

export type Sid = {
  readonly revision: number;
  /** 48-bit identifier authority */
  readonly authority: number;
  /** u32 each; the wire count byte is this array's length */
  readonly subAuthorities: readonly number[];
};

// ============================================================================
// ACE
// ============================================================================

type AceTypes = typeof ACE_TYPE;

/** Body: access mask + SID */
export type BasicAceType =
  | AceTypes["ACCESS_ALLOWED"]
  | AceTypes["ACCESS_DENIED"]
  | AceTypes["SYSTEM_AUDIT"]
  | AceTypes["SYSTEM_ALARM"]
  | AceTypes["SYSTEM_MANDATORY_LABEL"]
  | AceTypes["SYSTEM_SCOPED_POLICY_ID"]
  | AceTypes["SYSTEM_PROCESS_TRUST_LABEL"];

/** Body: access mask + SID + application data */
export type CallbackAceType =
  | AceTypes["ACCESS_ALLOWED_CALLBACK"]
  | AceTypes["ACCESS_DENIED_CALLBACK"]
  | AceTypes["SYSTEM_AUDIT_CALLBACK"]
  | AceTypes["SYSTEM_ALARM_CALLBACK"];

/** Body: access mask + object flags + optional GUIDs + SID */
export type ObjectAceType =
  | AceTypes["ACCESS_ALLOWED_OBJECT"]
  | AceTypes["ACCESS_DENIED_OBJECT"]
  | AceTypes["SYSTEM_AUDIT_OBJECT"]
  | AceTypes["SYSTEM_ALARM_OBJECT"];

/** Body: object ACE body + application data */
export type CallbackObjectAceType =
  | AceTypes["ACCESS_ALLOWED_CALLBACK_OBJECT"]
  | AceTypes["ACCESS_DENIED_CALLBACK_OBJECT"]
  | AceTypes["SYSTEM_AUDIT_CALLBACK_OBJECT"]
  | AceTypes["SYSTEM_ALARM_CALLBACK_OBJECT"];

export type AceKind = "basic" | "callback" | "object" | "callbackObject" | "opaque";

export type BasicAce = {
  readonly kind: "basic";
  readonly type: BasicAceType;
  readonly flags: number;
  readonly mask: number;
  readonly sid: Sid;
};

export type CallbackAce = {
  readonly kind: "callback";
  readonly type: CallbackAceType;
  readonly flags: number;
  readonly mask: number;
  readonly sid: Sid;
  /** Conditional expression or other trailing data, kept verbatim */
  readonly applicationData: Uint8Array;
};

type ObjectAceFields = {
  readonly flags: number;
  readonly mask: number;
  /**
   * Object flags as stored. The presence bits are recomputed from
   * `objectType` / `inheritedObjectType` on encode.
   */
  readonly objectFlags: number;
  readonly objectType: Guid | null;
  readonly inheritedObjectType: Guid | null;
  readonly sid: Sid;
};

export type ObjectAce = ObjectAceFields & {
  readonly kind: "object";
  readonly type: ObjectAceType;
};

export type CallbackObjectAce = ObjectAceFields & {
  readonly kind: "callbackObject";
  readonly type: CallbackObjectAceType;
  readonly applicationData: Uint8Array;
};

/** Unrecognised (or deliberately uninterpreted) type tag; body kept verbatim */
export type OpaqueAce = {
  readonly kind: "opaque";
  readonly type: number;
  readonly flags: number;
  readonly body: Uint8Array;
};

export type Ace = BasicAce | CallbackAce | ObjectAce | CallbackObjectAce | OpaqueAce;

// ============================================================================
// ACL
// ============================================================================

export type Acl = {
  readonly revision: number;
  /** Sbz1, normally 0 */
  readonly reserved1: number;
  /** Sbz2, normally 0 */
  readonly reserved2: number;
  readonly aces: readonly Ace[];
};

// ============================================================================
// Security Descriptor
// ============================================================================

export type SecurityDescriptor = {
  readonly revision: number;
  /** Sbz1 (resource-manager control bits when SE_RM_CONTROL_VALID is set) */
  readonly reserved: number;
  /** SD_CONTROL bits; SACL/DACL present bits are recomputed on encode */
  readonly control: number;
  readonly owner: Sid | null;
  readonly group: Sid | null;
  readonly sacl: Acl | null;
  readonly dacl: Acl | null;
};

// ============================================================================
// Validation
// ============================================================================

export type ValidationErrorCode =
  | "invalid_revision"
  | "invalid_authority"
  | "invalid_sub_authority"
  | "too_many_sub_authorities"
  | "revision_too_low"
  | "too_large";

export type ValidationResult =
  | { valid: true }
  | { valid: false; error: ValidationErrorCode; message: string };
