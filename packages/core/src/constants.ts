/**
 * Sizes and epochs of the fixed-width structures
 */

/** GUID: u32 + u16 + u16 + 8 bytes */
export const GUID_SIZE = 16;

/** FILETIME: u64 LE */
export const FILETIME_SIZE = 8;

/** MS-DOS date + MS-DOS time, u16 LE each */
export const DOS_DATE_TIME_SIZE = 4;

/** NTFS file reference: 48-bit entry + u16 sequence */
export const MFT_REFERENCE_SIZE = 8;

/** 100-ns ticks between 1601-01-01 and 1970-01-01 (UTC) */
export const FILETIME_UNIX_EPOCH_TICKS = 116_444_736_000_000_000n;

/** First year representable in an MS-DOS date */
export const DOS_EPOCH_YEAR = 1980;
