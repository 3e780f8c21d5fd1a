/**
 * Decode options schema
 */

import { z } from "zod";
import { isLogger, type Logger } from "./logger.ts";

export const DecodeOptionsSchema = z
  .object({
    /** Turn anomalies (size/offset/revision findings) into hard errors */
    strict: z.boolean().default(false),
    /** Reject revisions outside the known set instead of flagging them */
    enforceRevision: z.boolean().default(false),
    /** Receives debug traces and anomaly warnings */
    logger: z
      .custom<Logger>(isLogger, { message: "logger must provide debug and warn functions" })
      .optional(),
  })
  .strict();

/** Options as accepted from callers (every field optional) */
export type DecodeOptions = z.input<typeof DecodeOptionsSchema>;

/** Options with defaults applied */
export type ResolvedDecodeOptions = z.output<typeof DecodeOptionsSchema>;

/**
 * Apply defaults and validate caller options.
 * @throws ZodError if an option has the wrong type or an unknown key is present
 */
export function resolveDecodeOptions(options?: DecodeOptions): ResolvedDecodeOptions {
  return DecodeOptionsSchema.parse(options ?? {});
}
