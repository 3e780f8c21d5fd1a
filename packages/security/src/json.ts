/**
 * JSON-safe rendering of decoded security structures
 *
 * SIDs and GUIDs become their text forms, type tags and flag words become
 * names, raw bytes become lower-case hex. The output is for display and
 * logging; it is not read back.
 */

import { formatGuid } from "@winsec/core";
import { bytesToHex } from "@winsec/encoding";
import { aceTypeName, describeAccessMask, describeAceFlags, describeControlFlags } from "./names.ts";
import { formatSid } from "./sid.ts";
import type { Ace, Acl, SecurityDescriptor, Sid } from "./types.ts";
import { lookupWellKnownSid } from "./well-known.ts";

export type SidJSON = {
  sid: string;
  name?: string;
};

export type AceJSON = {
  type: string;
  flags: string[];
  mask?: string[];
  sid?: SidJSON;
  objectFlags?: number;
  objectType?: string;
  inheritedObjectType?: string;
  applicationData?: string;
  body?: string;
};

export type AclJSON = {
  revision: number;
  aces: AceJSON[];
};

export type SecurityDescriptorJSON = {
  revision: number;
  control: string[];
  owner: SidJSON | null;
  group: SidJSON | null;
  sacl: AclJSON | null;
  dacl: AclJSON | null;
};

export function sidToJSON(sid: Sid): SidJSON {
  const name = lookupWellKnownSid(sid);
  return name === undefined ? { sid: formatSid(sid) } : { sid: formatSid(sid), name };
}

export function aceToJSON(ace: Ace): AceJSON {
  const header = { type: aceTypeName(ace.type), flags: describeAceFlags(ace.flags) };

  switch (ace.kind) {
    case "basic":
      return { ...header, mask: describeAccessMask(ace.mask), sid: sidToJSON(ace.sid) };
    case "callback":
      return {
        ...header,
        mask: describeAccessMask(ace.mask),
        sid: sidToJSON(ace.sid),
        applicationData: bytesToHex(ace.applicationData),
      };
    case "object":
    case "callbackObject": {
      const json: AceJSON = {
        ...header,
        mask: describeAccessMask(ace.mask),
        objectFlags: ace.objectFlags,
        sid: sidToJSON(ace.sid),
      };
      if (ace.objectType) json.objectType = formatGuid(ace.objectType);
      if (ace.inheritedObjectType) json.inheritedObjectType = formatGuid(ace.inheritedObjectType);
      if (ace.kind === "callbackObject") json.applicationData = bytesToHex(ace.applicationData);
      return json;
    }
    case "opaque":
      return { ...header, body: bytesToHex(ace.body) };
  }
}

export function aclToJSON(acl: Acl): AclJSON {
  return { revision: acl.revision, aces: acl.aces.map(aceToJSON) };
}

export function securityDescriptorToJSON(sd: SecurityDescriptor): SecurityDescriptorJSON {
  return {
    revision: sd.revision,
    control: describeControlFlags(sd.control),
    owner: sd.owner ? sidToJSON(sd.owner) : null,
    group: sd.group ? sidToJSON(sd.group) : null,
    sacl: sd.sacl ? aclToJSON(sd.sacl) : null,
    dacl: sd.dacl ? aclToJSON(sd.dacl) : null,
  };
}
