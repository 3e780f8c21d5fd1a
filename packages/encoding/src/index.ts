/**
 * @winsec/encoding
 *
 * Shared encoding utilities for the winsec packages.
 *
 * - Hex encode/decode
 * - Byte concatenation and comparison
 *
 * This package has zero runtime dependencies so that both `@winsec/core`
 * and `@winsec/security` can import it.
 */

export { bytesEqual, concatBytes } from "./bytes.ts";
export { bytesToHex, type HexOptions, hexToBytes } from "./hex.ts";
