/**
 * Shared byte fixtures, written as hex dumps
 */
import { hexToBytes } from "@winsec/encoding";

export const hex = (...parts: string[]): Uint8Array => hexToBytes(parts.join(" "));

/** S-1-5-18 */
export const SYSTEM_SID = "01 01 00 00 00 00 00 05 12 00 00 00";
/** S-1-5-32-544 */
export const ADMINS_SID = "01 02 00 00 00 00 00 05 20 00 00 00 20 02 00 00";
/** S-1-1-0 */
export const EVERYONE_SID = "01 01 00 00 00 00 00 01 00 00 00 00";

/** 54849625-5478-4994-A5BA-3E3B0328C30D */
export const GUID_A = "25 96 84 54 78 54 94 49 a5 ba 3e 3b 03 28 c3 0d";
/** BF967ABA-0DE6-11D0-A285-00AA003049E2 */
export const GUID_B = "ba 7a 96 bf e6 0d d0 11 a2 85 00 aa 00 30 49 e2";

/** ACCESS_ALLOWED, OI|CI, 0x001F01FF, SYSTEM */
export const ALLOW_SYSTEM_ACE = `00 03 14 00 ff 01 1f 00 ${SYSTEM_SID}`;
/** ACCESS_ALLOWED, no flags, 0x001200A9, Administrators */
export const ALLOW_ADMINS_ACE = `00 00 18 00 a9 00 12 00 ${ADMINS_SID}`;
/** SYSTEM_AUDIT, success|failure, DELETE, Everyone */
export const AUDIT_EVERYONE_ACE = `02 c0 14 00 00 00 01 00 ${EVERYONE_SID}`;
/** ACCESS_DENIED_OBJECT with an object type only */
export const DENY_OBJECT_ACE = `06 00 28 00 10 00 00 00 01 00 00 00 ${GUID_A} ${SYSTEM_SID}`;
/** ACCESS_ALLOWED_OBJECT with both GUIDs */
export const ALLOW_OBJECT_ACE = `05 02 38 00 30 00 00 00 03 00 00 00 ${GUID_A} ${GUID_B} ${SYSTEM_SID}`;
/** ACCESS_ALLOWED_CALLBACK with 4 bytes of application data */
export const CALLBACK_ACE = `09 00 18 00 ff 01 1f 00 ${SYSTEM_SID} 61 72 74 78`;
/** ACCESS_ALLOWED_CALLBACK_OBJECT with the inherited object type only */
export const CALLBACK_OBJECT_ACE = `0b 00 2a 00 00 01 00 00 02 00 00 00 ${GUID_A} ${SYSTEM_SID} 01 02`;
/** Unknown type 0x1F */
export const OPAQUE_ACE = "1f 00 08 00 de ad be ef";
/** SYSTEM_MANDATORY_LABEL, NO_WRITE_UP, S-1-16-12288 */
export const MANDATORY_LABEL_ACE = "11 00 14 00 01 00 00 00 01 01 00 00 00 00 00 10 00 30 00 00";

/** Revision 2, two ACEs, 52 bytes */
export const DACL = `02 00 34 00 02 00 00 00 ${ALLOW_SYSTEM_ACE} ${ALLOW_ADMINS_ACE}`;

/**
 * Self-relative SD, 100 bytes: control SE_SELF_RELATIVE|SE_DACL_PRESENT,
 * owner Administrators at 20, group SYSTEM at 36, no SACL, DACL at 48
 */
export const SECURITY_DESCRIPTOR = `01 00 04 80 14 00 00 00 24 00 00 00 00 00 00 00 30 00 00 00 ${ADMINS_SID} ${SYSTEM_SID} ${DACL}`;
