/**
 * NTFS MFT reference tests
 */
import { hexToBytes } from "@winsec/encoding";
import { describe, expect, it } from "vitest";
import {
  decodeMftReference,
  encodeMftReference,
  formatMftReference,
  mftReferenceFromU64,
  mftReferenceToU64,
} from "../src/mft-reference.ts";
import { unwrapDecode } from "../src/result.ts";

const RAW = hexToBytes("73 00 00 00 00 00 68 91");

describe("MftReference", () => {
  it("should split entry and sequence", () => {
    expect(unwrapDecode(decodeMftReference(RAW))).toEqual({ entry: 115, sequence: 37224 });
  });

  it("should convert to and from the packed u64", () => {
    expect(mftReferenceToU64({ entry: 115, sequence: 37224 })).toBe(10477624533077459059n);
    expect(mftReferenceFromU64(10477624533077459059n)).toEqual({ entry: 115, sequence: 37224 });
  });

  it("should re-encode to the original bytes", () => {
    expect(encodeMftReference({ entry: 115, sequence: 37224 })).toEqual(RAW);
  });

  it("should format as entry-sequence", () => {
    expect(formatMftReference({ entry: 115, sequence: 37224 })).toBe("115-37224");
  });

  it("should fail on truncated input", () => {
    const result = decodeMftReference(RAW.subarray(0, 6));
    expect(result).toEqual({
      ok: false,
      error: {
        code: "out_of_bounds",
        message: "Reading u16 needs 2 bytes at offset 6, 0 remaining",
        offset: 6,
      },
    });
  });
});
