/**
 * @file errors.spec.ts
 * @description Unit tests for VarietyError
 */

import { describe, it, expect } from 'vitest';
import { VarietyError, VarietyErrorCode, describeError } from '../../src/utils/errors.js';

describe('VarietyError', () => {
  it('carries code, details and component', () => {
    const error = new VarietyError('no such tool', VarietyErrorCode.NO_TOOLS, { capability: 'memory' }, 'ToolSelector');

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(VarietyError);
    expect(error.name).toBe('VarietyError');
    expect(error.code).toBe('NO_TOOLS');
    expect(error.details).toEqual({ capability: 'memory' });
    expect(error.component).toBe('ToolSelector');
  });

  it('serialises the cause message', () => {
    const error = new VarietyError('spawn failed', VarietyErrorCode.SPAWN_FAILED, undefined, 'ProcessSupervisor', new Error('EACCES'));
    const plain = error.toPlainObject();

    expect(plain).toMatchObject({
      name: 'VarietyError',
      message: 'spawn failed',
      code: 'SPAWN_FAILED',
      component: 'ProcessSupervisor',
      cause: 'EACCES',
    });
    expect(JSON.parse(JSON.stringify(error))).toEqual(plain);
  });

  it('hasCode narrows only matching VarietyErrors', () => {
    const error = new VarietyError('gone', VarietyErrorCode.TRANSPORT_CLOSED);
    expect(VarietyError.hasCode(error, VarietyErrorCode.TRANSPORT_CLOSED)).toBe(true);
    expect(VarietyError.hasCode(error, VarietyErrorCode.REMOTE_ERROR)).toBe(false);
    expect(VarietyError.hasCode(new Error('gone'), VarietyErrorCode.TRANSPORT_CLOSED)).toBe(false);
  });

  it('wrap keeps VarietyErrors and wraps everything else', () => {
    const original = new VarietyError('x', VarietyErrorCode.INSTALL_FAILED);
    expect(VarietyError.wrap(original, VarietyErrorCode.INTERNAL_ERROR)).toBe(original);

    const wrapped = VarietyError.wrap(new Error('disk full'), VarietyErrorCode.INSTALL_FAILED, 'npm install failed', 'PackageInstaller');
    expect(wrapped.message).toBe('npm install failed: disk full');
    expect(wrapped.code).toBe(VarietyErrorCode.INSTALL_FAILED);
    expect(wrapped.component).toBe('PackageInstaller');

    expect(VarietyError.wrap('plain string', VarietyErrorCode.INTERNAL_ERROR).message).toBe('plain string');
  });

  it('describeError prefixes the code for VarietyErrors', () => {
    expect(describeError(new VarietyError('nothing found', VarietyErrorCode.DISCOVERY_EMPTY))).toBe('DISCOVERY_EMPTY: nothing found');
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError(42)).toBe('42');
  });
});
