/**
 * Per-call decode state: resolved options plus the anomalies collected so far.
 */

import { ByteCursor } from "./cursor.ts";
import { type DecodeOptions, type ResolvedDecodeOptions, resolveDecodeOptions } from "./options.ts";
import { type Anomaly, DecodeFailure, type DecodeResult } from "./result.ts";

export class DecodeContext {
  private readonly found: Anomaly[] = [];

  constructor(readonly options: ResolvedDecodeOptions) {}

  get anomalies(): readonly Anomaly[] {
    return this.found;
  }

  debug(message: string): void {
    this.options.logger?.debug(message);
  }

  /**
   * Record a non-fatal finding. Strict mode aborts the decode instead.
   */
  report(anomaly: Anomaly): void {
    this.options.logger?.warn(`${anomaly.code} at offset ${anomaly.offset}: ${anomaly.message}`);
    if (this.options.strict) {
      throw new DecodeFailure(anomaly);
    }
    this.found.push(anomaly);
  }

  /**
   * Check a revision byte against the known set: a hard error when
   * `enforceRevision` is on, an anomaly otherwise.
   */
  checkRevision(structure: string, revision: number, known: readonly number[], offset: number): void {
    if (known.includes(revision)) return;

    const anomaly: Anomaly = {
      code: "invalid_revision",
      message: `${structure} revision ${revision} is not a known revision (${known.join(", ")})`,
      offset,
    };
    if (this.options.enforceRevision) {
      this.options.logger?.warn(`${anomaly.code} at offset ${offset}: ${anomaly.message}`);
      throw new DecodeFailure(anomaly);
    }
    this.report(anomaly);
  }
}

export type Reader<T> = (cursor: ByteCursor, context: DecodeContext) => T;

/**
 * Run a reader over `bytes` and convert its outcome into a DecodeResult.
 *
 * Only DecodeFailure is converted; anything else is a bug and propagates.
 * @throws ZodError if `options` is invalid
 */
export function runDecode<T>(
  bytes: Uint8Array,
  options: DecodeOptions | undefined,
  read: Reader<T>
): DecodeResult<T> {
  const context = new DecodeContext(resolveDecodeOptions(options));

  try {
    const value = read(new ByteCursor(bytes), context);
    return { ok: true, value, anomalies: context.anomalies };
  } catch (err) {
    if (err instanceof DecodeFailure) {
      return { ok: false, error: err.error };
    }
    throw err;
  }
}
