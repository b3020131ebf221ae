import { pino, type Logger, type LoggerOptions } from 'pino';
import type { ILogger } from './ILogger.js';

/** Keys scrubbed from every log line (LLM keys and registry tokens end up in config meta). */
const REDACTED_PATHS = ['apiKey', '*.apiKey', 'token', '*.token', 'authorization', '*.authorization'];

function normalizeMeta(meta?: Record<string, unknown>): Record<string, unknown> {
  if (!meta) return {};
  const err = meta.error;
  if (err instanceof Error) {
    return { ...meta, error: { name: err.name, message: err.message, stack: err.stack } };
  }
  return meta;
}

export class PinoLogger implements ILogger {
  private readonly base: Logger;

  constructor(options?: LoggerOptions, existing?: Logger) {
    this.base = existing ?? pino({ redact: REDACTED_PATHS, ...options });
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.base.info(normalizeMeta(meta), message);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.base.warn(normalizeMeta(meta), message);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.base.error(normalizeMeta(meta), message);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.base.debug(normalizeMeta(meta), message);
  }

  child(bindings: Record<string, unknown>): ILogger {
    return new PinoLogger(undefined, this.base.child(bindings));
  }
}
