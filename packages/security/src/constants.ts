/**
 * Security structure constants
 *
 * Layouts (all integers little-endian unless noted):
 * - SID:  revision u8, sub_count u8, authority u48 BE, sub_authorities u32[sub_count]
 * - ACE:  type u8, flags u8, size u16, body[size - 4]
 * - ACL:  revision u8, sbz1 u8, size u16, ace_count u16, sbz2 u16, ACE[ace_count]
 * - SD:   revision u8, sbz1 u8, control u16, owner u32, group u32, sacl u32, dacl u32
 *         (offsets relative to the start of the SD header, 0 = absent)
 */

// ============================================================================
// Sizes & revisions
// ============================================================================

/** Revision + count + 6-byte authority */
export const SID_HEADER_SIZE = 8;
export const SID_REVISION = 1;
/** Windows refuses SIDs with more sub-authorities than this */
export const MAX_SUB_AUTHORITIES = 15;
/** Largest value of the 48-bit identifier authority */
export const MAX_AUTHORITY = 0xffff_ffff_ffff;

export const ACE_HEADER_SIZE = 4;

export const ACL_HEADER_SIZE = 8;
export const ACL_REVISION = 2;
/** Required once an ACL holds object ACEs */
export const ACL_REVISION_DS = 4;
export const ACL_REVISIONS = [ACL_REVISION, ACL_REVISION_DS] as const;

export const SD_HEADER_SIZE = 20;
export const SD_REVISION = 1;

/** u16 size fields cap ACEs and ACLs at this many bytes */
export const MAX_STRUCTURE_SIZE = 0xffff;

// ============================================================================
// ACE types
// ============================================================================

export const ACE_TYPE = {
  ACCESS_ALLOWED: 0x00,
  ACCESS_DENIED: 0x01,
  SYSTEM_AUDIT: 0x02,
  SYSTEM_ALARM: 0x03,
  ACCESS_ALLOWED_COMPOUND: 0x04,
  ACCESS_ALLOWED_OBJECT: 0x05,
  ACCESS_DENIED_OBJECT: 0x06,
  SYSTEM_AUDIT_OBJECT: 0x07,
  SYSTEM_ALARM_OBJECT: 0x08,
  ACCESS_ALLOWED_CALLBACK: 0x09,
  ACCESS_DENIED_CALLBACK: 0x0a,
  ACCESS_ALLOWED_CALLBACK_OBJECT: 0x0b,
  ACCESS_DENIED_CALLBACK_OBJECT: 0x0c,
  SYSTEM_AUDIT_CALLBACK: 0x0d,
  SYSTEM_ALARM_CALLBACK: 0x0e,
  SYSTEM_AUDIT_CALLBACK_OBJECT: 0x0f,
  SYSTEM_ALARM_CALLBACK_OBJECT: 0x10,
  SYSTEM_MANDATORY_LABEL: 0x11,
  SYSTEM_RESOURCE_ATTRIBUTE: 0x12,
  SYSTEM_SCOPED_POLICY_ID: 0x13,
  SYSTEM_PROCESS_TRUST_LABEL: 0x14,
} as const;

// ============================================================================
// Flag bits
// ============================================================================

/** ACE header flags */
export const ACE_FLAGS = {
  OBJECT_INHERIT_ACE: 0x01,
  CONTAINER_INHERIT_ACE: 0x02,
  NO_PROPAGATE_INHERIT_ACE: 0x04,
  INHERIT_ONLY_ACE: 0x08,
  INHERITED_ACE: 0x10,
  SUCCESSFUL_ACCESS_ACE_FLAG: 0x40,
  FAILED_ACCESS_ACE_FLAG: 0x80,
} as const;

/** Flags field of object ACE bodies; each bit announces one optional GUID */
export const OBJECT_ACE_FLAGS = {
  ACE_OBJECT_TYPE_PRESENT: 0x1,
  ACE_INHERITED_OBJECT_TYPE_PRESENT: 0x2,
} as const;

/** Security descriptor control bits */
export const SD_CONTROL = {
  SE_OWNER_DEFAULTED: 0x0001,
  SE_GROUP_DEFAULTED: 0x0002,
  SE_DACL_PRESENT: 0x0004,
  SE_DACL_DEFAULTED: 0x0008,
  SE_SACL_PRESENT: 0x0010,
  SE_SACL_DEFAULTED: 0x0020,
  SE_DACL_TRUSTED: 0x0040,
  SE_SERVER_SECURITY: 0x0080,
  SE_DACL_AUTO_INHERIT_REQ: 0x0100,
  SE_SACL_AUTO_INHERIT_REQ: 0x0200,
  SE_DACL_AUTO_INHERITED: 0x0400,
  SE_SACL_AUTO_INHERITED: 0x0800,
  SE_DACL_PROTECTED: 0x1000,
  SE_SACL_PROTECTED: 0x2000,
  SE_RM_CONTROL_VALID: 0x4000,
  SE_SELF_RELATIVE: 0x8000,
} as const;

/** Generic and standard access rights (the object-specific low 16 bits are left unnamed) */
export const ACCESS_MASK = {
  DELETE: 0x0001_0000,
  READ_CONTROL: 0x0002_0000,
  WRITE_DAC: 0x0004_0000,
  WRITE_OWNER: 0x0008_0000,
  SYNCHRONIZE: 0x0010_0000,
  ACCESS_SYSTEM_SECURITY: 0x0100_0000,
  MAXIMUM_ALLOWED: 0x0200_0000,
  GENERIC_ALL: 0x1000_0000,
  GENERIC_EXECUTE: 0x2000_0000,
  GENERIC_WRITE: 0x4000_0000,
  GENERIC_READ: 0x8000_0000,
} as const;

/** Low 16 bits of an access mask */
export const SPECIFIC_RIGHTS_MASK = 0x0000_ffff;
