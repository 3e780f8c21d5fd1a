/**
 * ACE codec tests
 */
import { decodeGuid, unwrapDecode } from "@winsec/core";
import { describe, expect, it } from "vitest";
import { aceByteLength, decodeAce, encodeAce, getAceKind } from "../src/ace.ts";
import type { Ace, ObjectAce, Sid } from "../src/types.ts";
import {
  ALLOW_OBJECT_ACE,
  ALLOW_SYSTEM_ACE,
  AUDIT_EVERYONE_ACE,
  CALLBACK_ACE,
  CALLBACK_OBJECT_ACE,
  DENY_OBJECT_ACE,
  GUID_A,
  GUID_B,
  hex,
  MANDATORY_LABEL_ACE,
  OPAQUE_ACE,
  SYSTEM_SID,
} from "./fixtures.ts";

const SYSTEM: Sid = { revision: 1, authority: 5, subAuthorities: [18] };
const guidA = unwrapDecode(decodeGuid(hex(GUID_A)));
const guidB = unwrapDecode(decodeGuid(hex(GUID_B)));

describe("ACE", () => {
  describe("getAceKind", () => {
    it("should classify every defined type tag", () => {
      const kinds = Array.from({ length: 0x15 }, (_, type) => getAceKind(type));
      expect(kinds).toEqual([
        "basic", "basic", "basic", "basic",
        "opaque",
        "object", "object", "object", "object",
        "callback", "callback",
        "callbackObject", "callbackObject",
        "callback", "callback",
        "callbackObject", "callbackObject",
        "basic",
        "opaque",
        "basic", "basic",
      ]);
    });

    it("should treat unknown tags as opaque", () => {
      expect(getAceKind(0x15)).toBe("opaque");
      expect(getAceKind(0xff)).toBe("opaque");
    });
  });

  describe("decodeAce", () => {
    it("should decode an access-allowed ACE", () => {
      expect(decodeAce(hex(ALLOW_SYSTEM_ACE))).toEqual({
        ok: true,
        value: { kind: "basic", type: 0x00, flags: 0x03, mask: 0x001f01ff, sid: SYSTEM },
        anomalies: [],
      });
    });

    it("should decode an audit ACE with success and failure flags", () => {
      const ace = unwrapDecode(decodeAce(hex(AUDIT_EVERYONE_ACE)));
      expect(ace).toEqual({
        kind: "basic",
        type: 0x02,
        flags: 0xc0,
        mask: 0x00010000,
        sid: { revision: 1, authority: 1, subAuthorities: [0] },
      });
    });

    it("should decode a mandatory label", () => {
      const ace = unwrapDecode(decodeAce(hex(MANDATORY_LABEL_ACE)));
      expect(ace.kind).toBe("basic");
      expect(ace.kind === "basic" && ace.sid).toEqual({
        revision: 1,
        authority: 16,
        subAuthorities: [12288],
      });
    });

    it("should keep callback application data", () => {
      expect(unwrapDecode(decodeAce(hex(CALLBACK_ACE)))).toEqual({
        kind: "callback",
        type: 0x09,
        flags: 0,
        mask: 0x001f01ff,
        sid: SYSTEM,
        applicationData: hex("61 72 74 78"),
      });
    });

    it("should read only the object type when its bit alone is set", () => {
      expect(unwrapDecode(decodeAce(hex(DENY_OBJECT_ACE)))).toEqual({
        kind: "object",
        type: 0x06,
        flags: 0,
        mask: 0x10,
        objectFlags: 1,
        objectType: guidA,
        inheritedObjectType: null,
        sid: SYSTEM,
      });
    });

    it("should read both GUIDs in order", () => {
      const ace = unwrapDecode(decodeAce(hex(ALLOW_OBJECT_ACE)));
      expect(ace.kind === "object" && ace.objectType).toEqual(guidA);
      expect(ace.kind === "object" && ace.inheritedObjectType).toEqual(guidB);
      expect(ace.kind === "object" && ace.sid).toEqual(SYSTEM);
    });

    it("should decode a callback object ACE", () => {
      expect(unwrapDecode(decodeAce(hex(CALLBACK_OBJECT_ACE)))).toEqual({
        kind: "callbackObject",
        type: 0x0b,
        flags: 0,
        mask: 0x100,
        objectFlags: 2,
        objectType: null,
        inheritedObjectType: guidA,
        sid: SYSTEM,
        applicationData: hex("01 02"),
      });
    });

    it("should keep unknown types as opaque bytes", () => {
      expect(decodeAce(hex(OPAQUE_ACE))).toEqual({
        ok: true,
        value: { kind: "opaque", type: 0x1f, flags: 0, body: hex("de ad be ef") },
        anomalies: [],
      });
    });

    it("should keep compound and resource attribute ACEs opaque", () => {
      const compound = unwrapDecode(decodeAce(hex("04 00 08 00 01 02 03 04")));
      const resource = unwrapDecode(decodeAce(hex("12 00 06 00 aa bb")));
      expect(compound).toEqual({ kind: "opaque", type: 0x04, flags: 0, body: hex("01 02 03 04") });
      expect(resource).toEqual({ kind: "opaque", type: 0x12, flags: 0, body: hex("aa bb") });
    });

    it("should copy bytes out of the input buffer", () => {
      const bytes = hex(OPAQUE_ACE);
      const ace = unwrapDecode(decodeAce(bytes));
      bytes.fill(0);
      expect(ace.kind === "opaque" && ace.body).toEqual(hex("de ad be ef"));
    });

    it("should stop a body at its declared size", () => {
      // size 16 leaves 12 body bytes; the SID needs 16
      const result = decodeAce(hex("00 00 10 00 ff 01 1f 00", SYSTEM_SID));
      expect(result).toEqual({
        ok: false,
        error: {
          code: "ace_body_overrun",
          message: "Reading u32 needs 4 bytes at offset 16, 0 remaining",
          offset: 16,
        },
      });
    });

    it("should stop an object body whose GUID does not fit", () => {
      const result = decodeAce(hex("05 00 18 00 00 00 00 00 01 00 00 00", GUID_A));
      expect(!result.ok && result.error.code).toBe("ace_body_overrun");
    });

    it("should reject a declared size below the header", () => {
      expect(decodeAce(hex("00 00 02 00 00 00"))).toEqual({
        ok: false,
        error: {
          code: "ace_body_overrun",
          message: "ACE declares size 2, smaller than its 4-byte header",
          offset: 0,
        },
      });
    });

    it("should fail with out_of_bounds when the buffer ends inside the body", () => {
      expect(decodeAce(hex("1f 00 10 00 de ad"))).toEqual({
        ok: false,
        error: {
          code: "out_of_bounds",
          message: "Reading window needs 12 bytes at offset 4, 2 remaining",
          offset: 4,
        },
      });
    });

    it("should report and skip unused body bytes", () => {
      const bytes = hex("00 00 18 00 ff 01 1f 00", SYSTEM_SID, "00 00 00 00");
      const result = decodeAce(bytes);
      expect(result.ok && result.value).toEqual({
        kind: "basic",
        type: 0,
        flags: 0,
        mask: 0x001f01ff,
        sid: SYSTEM,
      });
      expect(result.ok && result.anomalies).toEqual([
        {
          code: "size_mismatch",
          message: "ACE type 0x00 declares 24 bytes but uses 20",
          offset: 0,
        },
      ]);
    });

    it("should fail on unused body bytes in strict mode", () => {
      const result = decodeAce(hex("00 00 18 00 ff 01 1f 00", SYSTEM_SID, "00 00 00 00"), {
        strict: true,
      });
      expect(!result.ok && result.error.code).toBe("size_mismatch");
    });
  });

  describe("encodeAce", () => {
    it.each([
      ["basic", ALLOW_SYSTEM_ACE],
      ["audit", AUDIT_EVERYONE_ACE],
      ["mandatory label", MANDATORY_LABEL_ACE],
      ["callback", CALLBACK_ACE],
      ["object", DENY_OBJECT_ACE],
      ["object with both GUIDs", ALLOW_OBJECT_ACE],
      ["callback object", CALLBACK_OBJECT_ACE],
      ["opaque", OPAQUE_ACE],
    ])("should reproduce the bytes of a %s ACE", (_, dump) => {
      const bytes = hex(dump);
      expect(encodeAce(unwrapDecode(decodeAce(bytes)))).toEqual(bytes);
    });

    it("should compute the size from the body", () => {
      const ace: Ace = {
        kind: "callback",
        type: 0x09,
        flags: 0,
        mask: 1,
        sid: SYSTEM,
        applicationData: new Uint8Array(10),
      };
      expect(aceByteLength(ace)).toBe(30);
      expect(Array.from(encodeAce(ace).subarray(2, 4))).toEqual([30, 0]);
    });

    it("should set object presence bits from the GUIDs and keep the others", () => {
      const ace: ObjectAce = {
        kind: "object",
        type: 0x05,
        flags: 0,
        mask: 0x30,
        objectFlags: 0x06,
        objectType: guidA,
        inheritedObjectType: null,
        sid: SYSTEM,
      };
      const bytes = encodeAce(ace);
      expect(Array.from(bytes.subarray(8, 12))).toEqual([0x05, 0, 0, 0]);

      const decoded = unwrapDecode(decodeAce(bytes));
      expect(decoded).toEqual({ ...ace, objectFlags: 0x05 });
    });

    it("should throw when the ACE exceeds the u16 size field", () => {
      const ace: Ace = { kind: "opaque", type: 0x1f, flags: 0, body: new Uint8Array(0xffff) };
      expect(() => encodeAce(ace)).toThrow("ace.size out of range: 65539 (max 65535)");
    });
  });
});
