/**
 * @file PinoLogger.spec.ts
 * @description Unit tests for the pino-backed logger
 */

import { describe, it, expect, afterEach } from 'vitest';
import { pino } from 'pino';
import { PinoLogger } from '../../src/logging/PinoLogger.js';
import {
  NoopLogger,
  componentLogger,
  createLogger,
  resetLoggerFactory,
  setLoggerFactory,
} from '../../src/logging/loggerFactory.js';

function capture(): { lines: Array<Record<string, unknown>>; logger: PinoLogger } {
  const lines: Array<Record<string, unknown>> = [];
  const base = pino(
    { level: 'debug', base: null, timestamp: false, redact: ['apiKey', '*.apiKey'] },
    { write: (line: string) => lines.push(JSON.parse(line)) },
  );
  return { lines, logger: new PinoLogger(undefined, base) };
}

describe('PinoLogger', () => {
  it('writes the message with its metadata', () => {
    const { lines, logger } = capture();
    logger.info('Capability acquired', { capability: 'memory', processId: 'proc-1' });

    expect(lines).toEqual([{ level: 30, msg: 'Capability acquired', capability: 'memory', processId: 'proc-1' }]);
  });

  it('serialises an Error under meta.error', () => {
    const { lines, logger } = capture();
    const error = new Error('spawn failed');
    logger.warn('Acquisition failed', { error });

    expect(lines[0]?.error).toEqual({ name: 'Error', message: 'spawn failed', stack: error.stack });
  });

  it('child loggers carry their bindings', () => {
    const { lines, logger } = capture();
    logger.child({ component: 'VarietyMonitor' }).debug('Tick');

    expect(lines).toEqual([{ level: 20, msg: 'Tick', component: 'VarietyMonitor' }]);
  });
});

describe('loggerFactory', () => {
  afterEach(() => {
    resetLoggerFactory();
  });

  it('createLogger goes through the active factory', () => {
    const names: string[] = [];
    const silent = new NoopLogger();
    setLoggerFactory((name) => {
      names.push(name);
      return silent;
    });

    expect(createLogger('ProcessSupervisor')).toBe(silent);
    expect(componentLogger('PackageInstaller')).toBe(silent);
    expect(names).toEqual(['ProcessSupervisor', 'PackageInstaller']);
  });

  it('componentLogger tags a child of the given base', () => {
    const { lines, logger } = capture();
    componentLogger('CapabilityRouter', logger).info('Route registered');

    expect(lines).toEqual([{ level: 30, msg: 'Route registered', component: 'CapabilityRouter' }]);
  });
});
