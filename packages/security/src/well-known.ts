/**
 * Well-known SID names
 *
 * Two tables: fixed SIDs by their text form, and the relative IDs that
 * every domain (S-1-5-21-<a>-<b>-<c>) assigns the same meaning.
 */

import table from "./data/well-known-sids.json";
import { formatSid, parseSid } from "./sid.ts";
import type { Sid } from "./types.ts";

const WELL_KNOWN_SIDS: ReadonlyMap<string, string> = new Map(Object.entries(table.sids));
const DOMAIN_RIDS: ReadonlyMap<string, string> = new Map(Object.entries(table.domainRids));

/** S-1-5-21 followed by three domain identifiers and the RID */
function isDomainAccount(sid: Sid): boolean {
  return sid.authority === 5 && sid.subAuthorities.length === 5 && sid.subAuthorities[0] === 21;
}

/**
 * @example lookupWellKnownSid("S-1-5-18") → "Local System"
 * @example lookupWellKnownSid("S-1-5-21-1-2-3-500") → "Administrator"
 * @returns undefined for SIDs without a well-known name, or unparsable text
 */
export function lookupWellKnownSid(sid: Sid | string): string | undefined {
  let value: Sid;
  if (typeof sid === "string") {
    const parsed = parseSid(sid);
    if (!parsed.ok) return undefined;
    value = parsed.value;
  } else {
    value = sid;
  }

  const name = WELL_KNOWN_SIDS.get(formatSid(value));
  if (name !== undefined) return name;

  if (isDomainAccount(value)) {
    const rid = value.subAuthorities[4];
    return rid === undefined ? undefined : DOMAIN_RIDS.get(String(rid));
  }
  return undefined;
}
