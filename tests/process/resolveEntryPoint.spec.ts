/**
 * @file resolveEntryPoint.spec.ts
 * @description Unit tests for locating the start command of an installed package
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { resolveEntryPoint } from '../../src/process/resolveEntryPoint.js';
import { VarietyErrorCode } from '../../src/utils/errors.js';

const NODE = '/usr/local/bin/node';

describe('resolveEntryPoint', () => {
  let dir: string;

  async function writePackage(manifest: Record<string, unknown>, files: string[]): Promise<void> {
    await writeFile(path.join(dir, 'package.json'), JSON.stringify(manifest));
    for (const file of files) {
      await mkdir(path.dirname(path.join(dir, file)), { recursive: true });
      await writeFile(path.join(dir, file), '// entry\n');
    }
  }

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'entry-point-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('prefers the bin entry whose key names a server', async () => {
    await writePackage(
      { name: 'demo', bin: { 'demo-cli': 'cli.js', 'mcp-server-demo': 'dist/server.js' }, main: 'lib/index.js' },
      ['cli.js', 'dist/server.js', 'lib/index.js'],
    );

    await expect(resolveEntryPoint(dir, NODE)).resolves.toEqual({
      executablePath: NODE,
      args: [path.join(dir, 'dist/server.js')],
      entryFile: path.join(dir, 'dist/server.js'),
    });
  });

  it('accepts a string bin', async () => {
    await writePackage({ name: 'demo', bin: 'bin/run.mjs' }, ['bin/run.mjs']);
    const entry = await resolveEntryPoint(dir, NODE);
    expect(entry.args).toEqual([path.join(dir, 'bin/run.mjs')]);
  });

  it('falls back to main, then dist/index.js', async () => {
    await writePackage({ name: 'demo', main: 'missing.js' }, ['dist/index.js']);
    const entry = await resolveEntryPoint(dir, NODE);
    expect(entry.entryFile).toBe(path.join(dir, 'dist/index.js'));
  });

  it('skips entries that name a directory', async () => {
    await writePackage({ name: 'demo', bin: '.', main: 'dist' }, ['dist/index.js']);
    await expect(resolveEntryPoint(dir, NODE)).resolves.toEqual({
      executablePath: NODE,
      args: [path.join(dir, 'dist/index.js')],
      entryFile: path.join(dir, 'dist/index.js'),
    });
  });

  it('runs non-script entries directly', async () => {
    await writePackage({ name: 'demo', bin: { server: 'bin/server' } }, ['bin/server']);
    await expect(resolveEntryPoint(dir, NODE)).resolves.toEqual({
      executablePath: path.join(dir, 'bin/server'),
      args: [],
      entryFile: path.join(dir, 'bin/server'),
    });
  });

  it('skips entries that point outside the package', async () => {
    await writePackage({ name: 'demo', bin: '../escape.js' }, ['index.js']);
    const entry = await resolveEntryPoint(dir, NODE);
    expect(entry.entryFile).toBe(path.join(dir, 'index.js'));
  });

  it('throws SPAWN_NOT_FOUND without any entry point', async () => {
    await writePackage({ name: 'demo' }, []);
    await expect(resolveEntryPoint(dir, NODE)).rejects.toMatchObject({
      code: VarietyErrorCode.SPAWN_NOT_FOUND,
      details: { tried: ['dist/index.js', 'index.js'] },
    });
  });

  it('throws SPAWN_NOT_FOUND without a package.json', async () => {
    await expect(resolveEntryPoint(dir, NODE)).rejects.toMatchObject({ code: VarietyErrorCode.SPAWN_NOT_FOUND });
  });
});
