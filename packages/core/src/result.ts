/**
 * Decode results and errors
 *
 * Every public decoder returns a discriminated union instead of throwing.
 */

// ============================================================================
// Result & Error
// ============================================================================

/**
 * Discriminated union for fallible operations that do not decode bytes
 * (parsing text forms, validation helpers).
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Hard failures: decode of the enclosing structure stops.
 */
export type DecodeErrorCode =
  | "out_of_bounds"
  | "ace_body_overrun"
  | "invalid_revision"
  | "size_mismatch"
  | "offset_control_mismatch";

/**
 * Non-fatal findings attached to a successful decode.
 * In strict mode the first one becomes the error instead.
 */
export type AnomalyCode = "size_mismatch" | "offset_control_mismatch" | "invalid_revision";

export type DecodeError = {
  /** Machine-readable error code */
  code: DecodeErrorCode;
  /** Human-readable description */
  message: string;
  /** Absolute byte offset (within the decoded buffer) where the problem was found */
  offset: number;
};

export type Anomaly = {
  code: AnomalyCode;
  message: string;
  offset: number;
};

export type DecodeResult<T> =
  | { ok: true; value: T; anomalies: readonly Anomaly[] }
  | { ok: false; error: DecodeError };

/**
 * Carries a DecodeError up through nested readers.
 *
 * Readers throw it; `runDecode` converts it back into a DecodeResult at
 * the public boundary. It never escapes a public decode function.
 */
export class DecodeFailure extends Error {
  constructor(readonly error: DecodeError) {
    super(error.message);
    this.name = "DecodeFailure";
  }
}

/**
 * Unwrap a successful decode or throw with the decode error's message.
 *
 * Intended for callers (and tests) that already know the input is well formed.
 */
export function unwrapDecode<T>(result: DecodeResult<T>): T {
  if (!result.ok) {
    throw new Error(`${result.error.code} at offset ${result.error.offset}: ${result.error.message}`);
  }
  return result.value;
}
