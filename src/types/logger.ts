/**
 * Logger contract used by every pluginpack component.
 *
 * Shaped after pino so a pino instance can be passed in directly,
 * while tests supply a capturing mock.
 */
export interface Logger {
  debug(obj: object, msg?: string): void;
  debug(msg: string): void;
  info(obj: object, msg?: string): void;
  info(msg: string): void;
  warn(obj: object, msg?: string): void;
  warn(msg: string): void;
  error(obj: object, msg?: string): void;
  error(msg: string): void;

  /** Derive a logger that stamps `bindings` on every entry */
  child(bindings: Record<string, unknown>): Logger;
}
