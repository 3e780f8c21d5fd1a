/**
 * @winsec/core
 *
 * Shared decoding machinery for the winsec packages:
 * - bounded byte cursor and fixed-size writer
 * - DecodeResult / anomaly model and decode options
 * - fixed-width Windows structures: GUID, FILETIME, MS-DOS date/time,
 *   NTFS MFT file reference
 */

// Constants
export {
  DOS_DATE_TIME_SIZE,
  DOS_EPOCH_YEAR,
  FILETIME_SIZE,
  FILETIME_UNIX_EPOCH_TICKS,
  GUID_SIZE,
  MFT_REFERENCE_SIZE,
} from "./constants.ts";

// Decode machinery
export { DecodeContext, type Reader, runDecode } from "./context.ts";
export { ByteCursor, type CursorOptions, type Endian } from "./cursor.ts";
export { createConsoleLogger, isLogger, type Logger } from "./logger.ts";
export {
  type DecodeOptions,
  DecodeOptionsSchema,
  type ResolvedDecodeOptions,
  resolveDecodeOptions,
} from "./options.ts";
export {
  type Anomaly,
  type AnomalyCode,
  type DecodeError,
  type DecodeErrorCode,
  DecodeFailure,
  type DecodeResult,
  type Result,
  unwrapDecode,
} from "./result.ts";
export { ByteWriter } from "./writer.ts";

// Fixed-width structures
export {
  type DosDate,
  type DosDateTime,
  type DosTime,
  decodeDosDate,
  decodeDosDateTime,
  decodeDosTime,
  dosDateFromRaw,
  dosDateTimeFromU32,
  dosTimeFromRaw,
  formatDosDate,
  formatDosDateTime,
  formatDosTime,
  readDosDate,
  readDosDateTime,
  readDosTime,
} from "./dos-time.ts";
export {
  decodeFileTime,
  encodeFileTime,
  type FileTime,
  fileTimeFromDate,
  fileTimeToDate,
  fileTimeToIsoString,
  readFileTime,
} from "./filetime.ts";
export {
  decodeGuid,
  encodeGuid,
  formatGuid,
  type Guid,
  type GuidParseError,
  parseGuid,
  readGuid,
  writeGuid,
} from "./guid.ts";
export {
  decodeMftReference,
  encodeMftReference,
  formatMftReference,
  type MftReference,
  mftReferenceFromU64,
  mftReferenceToU64,
  readMftReference,
} from "./mft-reference.ts";
