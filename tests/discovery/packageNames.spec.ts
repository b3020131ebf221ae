/**
 * @file packageNames.spec.ts
 * @description Unit tests for package, version and capability name checks
 */

import { describe, it, expect } from 'vitest';
import {
  assertValidCapabilityName,
  assertValidPackageName,
  assertValidVersionSpec,
  isValidPackageName,
} from '../../src/discovery/packageNames.js';
import { VarietyErrorCode } from '../../src/utils/errors.js';
import { tokenize } from '../../src/utils/tokens.js';

describe('package names', () => {
  it.each(['mcp-server-redis', '@modelcontextprotocol/server-memory', 'a.b_c~d'])('accepts %s', (name) => {
    expect(isValidPackageName(name)).toBe(true);
    expect(assertValidPackageName(name)).toBe(name);
  });

  it.each([
    'Upper-Case',
    '.hidden',
    '_private',
    '@scope/pkg/extra',
    '../escape',
    'pkg; rm -rf /',
    '--registry=http://evil.test',
    '-dash',
    '',
    'a'.repeat(215),
  ])('rejects %s', (name) => {
    expect(isValidPackageName(name)).toBe(false);
    expect(() => assertValidPackageName(name)).toThrowError(/Invalid package name/);
  });

  it('checks version specs', () => {
    expect(assertValidVersionSpec('latest')).toBe('latest');
    expect(assertValidVersionSpec('^1.2.3')).toBe('^1.2.3');
    expect(() => assertValidVersionSpec('1.0.0 || rm')).toThrowError(/Invalid version spec/);
  });
});

describe('capability names', () => {
  it('normalizes case and surrounding whitespace', () => {
    expect(assertValidCapabilityName('  Brave_Search ')).toBe('brave_search');
  });

  it('rejects names that are empty, too long or carry odd characters', () => {
    for (const bad of ['', '   ', '-leading', 'has space', 'x'.repeat(65), 'path/like']) {
      let caught: unknown;
      try {
        assertValidCapabilityName(bad);
      } catch (error) {
        caught = error;
      }
      expect(caught).toMatchObject({ code: VarietyErrorCode.INVALID_ARGUMENT });
    }
  });

  it('tokenize keeps the whole name and its parts', () => {
    expect(tokenize('brave_search')).toEqual(['brave_search', 'brave', 'search']);
    expect(tokenize('Memory')).toEqual(['memory']);
    expect(tokenize('  ')).toEqual([]);
  });
});
