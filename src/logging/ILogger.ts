/**
 * Minimal structured logger contract used across the engine. Components accept
 * an `ILogger` so tests can pass a silent or spying implementation.
 */
export interface ILogger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): ILogger;
}
