/**
 * Symbolic names for ACE types and flag words. Naming only; nothing here
 * decides access.
 */

import { ACCESS_MASK, ACE_FLAGS, ACE_TYPE, SD_CONTROL, SPECIFIC_RIGHTS_MASK } from "./constants.ts";

const hex = (value: number, width: number): string =>
  `0x${value.toString(16).toUpperCase().padStart(width, "0")}`;

const ACE_TYPE_NAMES = new Map<number, string>(
  Object.entries(ACE_TYPE).map(([name, value]) => [value, `${name}_ACE_TYPE`])
);

/**
 * @example aceTypeName(0x00) → "ACCESS_ALLOWED_ACE_TYPE"
 * @example aceTypeName(0x1f) → "UNKNOWN_0x1F"
 */
export function aceTypeName(type: number): string {
  return ACE_TYPE_NAMES.get(type) ?? `UNKNOWN_${hex(type, 2)}`;
}

/**
 * Names of the bits set in `value`, in ascending bit order. Bits without a
 * name are appended as one hex value.
 */
function describeBits(
  value: number,
  table: Readonly<Record<string, number>>,
  width: number
): string[] {
  const names: string[] = [];
  let rest = value >>> 0;

  const entries = Object.entries(table).sort(([, a], [, b]) => a - b);
  for (const [name, bit] of entries) {
    if ((rest & bit) >>> 0 === bit) {
      names.push(name);
      rest = (rest & ~bit) >>> 0;
    }
  }

  if (rest !== 0) names.push(hex(rest, width));
  return names;
}

export function describeAceFlags(flags: number): string[] {
  return describeBits(flags, ACE_FLAGS, 2);
}

/**
 * Generic and standard rights by name. Object-specific rights (low 16 bits)
 * mean different things per object type and come out as one hex value.
 *
 * @example describeAccessMask(0x001f01ff) → ["0x01FF", "DELETE", "READ_CONTROL", "WRITE_DAC", "WRITE_OWNER", "SYNCHRONIZE"]
 */
export function describeAccessMask(mask: number): string[] {
  const specific = mask & SPECIFIC_RIGHTS_MASK;
  const named = describeBits((mask & ~SPECIFIC_RIGHTS_MASK) >>> 0, ACCESS_MASK, 8);
  return specific === 0 ? named : [hex(specific, 4), ...named];
}

export function describeControlFlags(control: number): string[] {
  return describeBits(control, SD_CONTROL, 4);
}
