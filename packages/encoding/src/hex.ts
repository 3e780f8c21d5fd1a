/**
 * Hex encoding/decoding utilities
 */

export type HexOptions = {
  /** Emit A-F instead of a-f (default: false) */
  upperCase?: boolean;
  /** Separator placed between bytes (default: none) */
  separator?: string;
};

/**
 * Convert bytes to hex string.
 *
 * @example bytesToHex(new Uint8Array([0x0a, 0xff])) → "0aff"
 * @example bytesToHex(bytes, { upperCase: true, separator: " " }) → "0A FF"
 */
export function bytesToHex(bytes: Uint8Array, options?: HexOptions): string {
  const hex = Array.from(bytes).map((b) => b.toString(16).padStart(2, "0"));
  const joined = hex.join(options?.separator ?? "");
  return options?.upperCase ? joined.toUpperCase() : joined;
}

/**
 * Convert hex string to bytes.
 *
 * Whitespace between digits is ignored, so fixtures copied from a hex
 * dump ("01 01 00 00") decode as-is.
 *
 * @throws Error if the digit count is odd or a non-hex character is found
 */
export function hexToBytes(hex: string): Uint8Array {
  const digits = hex.replace(/\s+/g, "");
  if (digits.length % 2 !== 0) {
    throw new Error("Hex string must have even length");
  }
  if (!/^[0-9a-fA-F]*$/.test(digits)) {
    throw new Error(`Invalid hex string: ${hex}`);
  }

  const bytes = new Uint8Array(digits.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = Number.parseInt(digits.slice(i * 2, i * 2 + 2), 16);
  }

  return bytes;
}
