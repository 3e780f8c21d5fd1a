/**
 * Minimal logging interface.
 *
 * Decoders never log on their own; a logger only receives output when the
 * caller passes one through DecodeOptions.
 */
export type Logger = {
  debug: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
};

/**
 * Logger writing `[tag] message` lines to the console.
 *
 * @example createConsoleLogger("winsec:sd").debug("dacl at offset 20")
 *          → console.debug("[winsec:sd] dacl at offset 20")
 */
export function createConsoleLogger(tag: string): Logger {
  return {
    debug: (message, ...args) => console.debug(`[${tag}] ${message}`, ...args),
    warn: (message, ...args) => console.warn(`[${tag}] ${message}`, ...args),
  };
}

export function isLogger(value: unknown): value is Logger {
  return (
    typeof value === "object" &&
    value !== null &&
    "debug" in value &&
    typeof value.debug === "function" &&
    "warn" in value &&
    typeof value.warn === "function"
  );
}
