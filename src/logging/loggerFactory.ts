import type { ILogger } from './ILogger.js';
import { PinoLogger } from './PinoLogger.js';

export type LoggerFactory = (name: string, bindings?: Record<string, unknown>) => ILogger;

let rootLogger: ILogger | undefined;

function getRootLogger(): ILogger {
  if (!rootLogger) {
    rootLogger = new PinoLogger({
      name: 'variety-engine',
      level: process.env.VARIETY_LOG_LEVEL ?? 'info',
    });
  }
  return rootLogger;
}

const defaultFactory: LoggerFactory = (name, bindings) =>
  getRootLogger().child({ component: name, ...(bindings ?? {}) });

let activeFactory: LoggerFactory = defaultFactory;

/**
 * Returns a component-scoped logger from the active factory.
 */
export function createLogger(name: string, bindings?: Record<string, unknown>): ILogger {
  return activeFactory(name, bindings);
}

export function setLoggerFactory(factory: LoggerFactory): void {
  activeFactory = factory;
}

export function resetLoggerFactory(): void {
  activeFactory = defaultFactory;
}

/** Logger that drops everything; handy as a default in tests. */
export class NoopLogger implements ILogger {
  info(): void {}
  warn(): void {}
  error(): void {}
  debug(): void {}
  child(): ILogger {
    return this;
  }
}

/**
 * Child of `base` tagged with `component`, or a fresh logger from the active
 * factory when no base is given.
 */
export function componentLogger(name: string, base?: ILogger): ILogger {
  return base ? base.child({ component: name }) : createLogger(name);
}
