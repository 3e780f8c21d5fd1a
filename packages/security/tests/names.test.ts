/**
 * Name lookup tests
 */
import { describe, expect, it } from "vitest";
import {
  aceTypeName,
  describeAccessMask,
  describeAceFlags,
  describeControlFlags,
} from "../src/names.ts";
import { lookupWellKnownSid } from "../src/well-known.ts";

describe("aceTypeName", () => {
  it("should name defined types", () => {
    expect(aceTypeName(0x00)).toBe("ACCESS_ALLOWED_ACE_TYPE");
    expect(aceTypeName(0x11)).toBe("SYSTEM_MANDATORY_LABEL_ACE_TYPE");
    expect(aceTypeName(0x14)).toBe("SYSTEM_PROCESS_TRUST_LABEL_ACE_TYPE");
  });

  it("should fall back to hex for unknown types", () => {
    expect(aceTypeName(0x1f)).toBe("UNKNOWN_0x1F");
  });
});

describe("describeAceFlags", () => {
  it("should list set flags in bit order", () => {
    expect(describeAceFlags(0xc3)).toEqual([
      "OBJECT_INHERIT_ACE",
      "CONTAINER_INHERIT_ACE",
      "SUCCESSFUL_ACCESS_ACE_FLAG",
      "FAILED_ACCESS_ACE_FLAG",
    ]);
  });

  it("should append unnamed bits as hex", () => {
    expect(describeAceFlags(0x30)).toEqual(["INHERITED_ACE", "0x20"]);
    expect(describeAceFlags(0)).toEqual([]);
  });
});

describe("describeAccessMask", () => {
  it("should keep object-specific rights as one hex value", () => {
    expect(describeAccessMask(0x001f01ff)).toEqual([
      "0x01FF",
      "DELETE",
      "READ_CONTROL",
      "WRITE_DAC",
      "WRITE_OWNER",
      "SYNCHRONIZE",
    ]);
  });

  it("should name generic rights in the top bits", () => {
    expect(describeAccessMask(0x80000000)).toEqual(["GENERIC_READ"]);
    expect(describeAccessMask(0xf0000000)).toEqual([
      "GENERIC_ALL",
      "GENERIC_EXECUTE",
      "GENERIC_WRITE",
      "GENERIC_READ",
    ]);
  });

  it("should append reserved bits as hex", () => {
    expect(describeAccessMask(0x80e00000)).toEqual(["GENERIC_READ", "0x00E00000"]);
  });
});

describe("describeControlFlags", () => {
  it("should name the control bits", () => {
    expect(describeControlFlags(0x8c14)).toEqual([
      "SE_DACL_PRESENT",
      "SE_SACL_PRESENT",
      "SE_DACL_AUTO_INHERITED",
      "SE_SACL_AUTO_INHERITED",
      "SE_SELF_RELATIVE",
    ]);
  });
});

describe("lookupWellKnownSid", () => {
  it("should name fixed SIDs", () => {
    expect(lookupWellKnownSid("S-1-5-18")).toBe("Local System");
    expect(lookupWellKnownSid("s-1-1-0")).toBe("Everyone");
    expect(lookupWellKnownSid({ revision: 1, authority: 16, subAuthorities: [12288] })).toBe(
      "High Mandatory Level"
    );
  });

  it("should name domain-relative RIDs", () => {
    expect(lookupWellKnownSid("S-1-5-21-1004336348-1177238915-682003330-500")).toBe("Administrator");
    expect(lookupWellKnownSid("S-1-5-21-1-2-3-512")).toBe("Domain Admins");
  });

  it("should return undefined for anything else", () => {
    expect(lookupWellKnownSid("S-1-5-21-1-2-3-1001")).toBeUndefined();
    expect(lookupWellKnownSid("S-1-5-21-500")).toBeUndefined();
    expect(lookupWellKnownSid("not a sid")).toBeUndefined();
  });
});
