/** Structured metadata attached to a log line. */
export type LogMeta = Record<string, unknown>;

/**
 * Minimal logger contract; any console-like or structured logger fits.
 * Messages are dotted event names such as `request.transport.failed`.
 */
export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
}

/** Logger that discards everything, used when none is configured. */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
