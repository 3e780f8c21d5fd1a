/**
 * FILETIME tests
 */
import { hexToBytes } from "@winsec/encoding";
import { describe, expect, it } from "vitest";
import {
  decodeFileTime,
  encodeFileTime,
  fileTimeFromDate,
  fileTimeToDate,
  fileTimeToIsoString,
} from "../src/filetime.ts";
import { unwrapDecode } from "../src/result.ts";

const RAW = hexToBytes("53 c7 8b 18 c5 cc ce 01");

describe("FILETIME", () => {
  it("should decode ticks as u64 LE", () => {
    expect(unwrapDecode(decodeFileTime(RAW))).toEqual({ ticks: 130266586132760403n });
  });

  it("should render with microsecond precision", () => {
    expect(fileTimeToIsoString(unwrapDecode(decodeFileTime(RAW)))).toBe(
      "2013-10-19T12:16:53.276040Z"
    );
  });

  it("should render the epoch", () => {
    expect(fileTimeToIsoString({ ticks: 0n })).toBe("1601-01-01T00:00:00.000000Z");
  });

  it("should convert to a millisecond Date", () => {
    expect(fileTimeToDate({ ticks: 130266586132760403n }).getTime()).toBe(1382185013276);
  });

  it("should convert from a Date", () => {
    expect(fileTimeFromDate(new Date("1970-01-01T00:00:00.000Z"))).toEqual({
      ticks: 116444736000000000n,
    });
    expect(() => fileTimeFromDate(new Date("1500-01-01T00:00:00.000Z"))).toThrow(
      "Date precedes the FILETIME epoch"
    );
  });

  it("should re-encode to the original bytes", () => {
    expect(encodeFileTime(unwrapDecode(decodeFileTime(RAW)))).toEqual(RAW);
  });

  it("should fail on truncated input", () => {
    const result = decodeFileTime(RAW.subarray(0, 7));
    expect(!result.ok && result.error.code).toBe("out_of_bounds");
  });
});
