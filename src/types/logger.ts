/**
 * Logging seam. Components take this rather than pino's Logger, so tests can
 * hand them a recording fake.
 */

export interface LogFn {
  (obj: object, msg?: string): void;
  (msg: string): void;
}

export interface Logger {
  trace: LogFn;
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  fatal: LogFn;

  /** Logger whose entries carry the extra bindings */
  child(bindings: Record<string, unknown>): Logger;
}
