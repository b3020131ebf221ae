/**
 * @file PackageInstaller.spec.ts
 * @description Tests for per-install directories and failure reporting
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { access, mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { PackageInstaller } from '../../src/installer/PackageInstaller.js';
import { ExecFileCommandRunner } from '../../src/installer/ExecFileCommandRunner.js';
import { NoopLogger } from '../../src/logging/loggerFactory.js';
import { VarietyErrorCode } from '../../src/utils/errors.js';
import type { CommandResult, ICommandRunner } from '../../src/installer/types.js';
import { FakeNpmRunner } from '../helpers/FakeNpmRunner.js';

describe('PackageInstaller', () => {
  let installRoot: string;

  beforeEach(async () => {
    installRoot = await mkdtemp(path.join(os.tmpdir(), 'installer-'));
  });

  afterEach(async () => {
    await rm(installRoot, { recursive: true, force: true });
  });

  it('installs into a fresh directory under the install root', async () => {
    const runner = new FakeNpmRunner();
    const installer = new PackageInstaller({ installRoot, runner, logger: new NoopLogger() });

    const installed = await installer.install({ packageName: '@modelcontextprotocol/server-memory', version: 'latest' });

    expect(path.dirname(installed.installDir)).toBe(installRoot);
    expect(path.basename(installed.installDir)).toMatch(/^modelcontextprotocol-server-memory-/);
    expect(installed).toEqual({
      packageName: '@modelcontextprotocol/server-memory',
      version: 'latest',
      installDir: installed.installDir,
      packageDir: path.join(installed.installDir, 'node_modules', '@modelcontextprotocol', 'server-memory'),
      status: 'installed',
    });
    expect(runner.calls).toEqual([
      {
        command: 'npm',
        args: [
          'install',
          '--no-audit',
          '--no-fund',
          '--ignore-scripts=true',
          '--prefix',
          installed.installDir,
          '@modelcontextprotocol/server-memory@latest',
        ],
        cwd: installed.installDir,
        timeoutMs: 300_000,
      },
    ]);
    expect(JSON.parse(await readFile(path.join(installed.installDir, 'package.json'), 'utf8'))).toEqual({
      name: 'variety-install',
      private: true,
    });
  });

  it('gives every install its own directory', async () => {
    const installer = new PackageInstaller({ installRoot, runner: new FakeNpmRunner(), logger: new NoopLogger() });

    const first = await installer.install({ packageName: 'mcp-server-kv', version: '1.0.0' });
    const second = await installer.install({ packageName: 'mcp-server-kv', version: '1.0.0' });

    expect(first.installDir).not.toBe(second.installDir);
    expect((await readdir(installRoot)).length).toBe(2);
  });

  it('passes the registry override and script policy to npm', () => {
    const installer = new PackageInstaller({
      installRoot,
      ignoreScripts: false,
      registryUrl: 'http://registry.test',
      logger: new NoopLogger(),
    });
    expect(installer.buildInstallArgs({ packageName: 'mcp-server-kv', version: '^2' }, '/tmp/x')).toEqual([
      'install',
      '--no-audit',
      '--no-fund',
      '--ignore-scripts=false',
      '--prefix',
      '/tmp/x',
      '--registry',
      'http://registry.test',
      'mcp-server-kv@^2',
    ]);
  });

  it('reports a non-zero exit with the output tail', async () => {
    const runner = new FakeNpmRunner(() => ({ exitCode: 1, output: 'npm ERR! 404 Not Found - mcp-server-ghost' }));
    const installer = new PackageInstaller({ installRoot, runner, logger: new NoopLogger() });

    await expect(installer.install({ packageName: 'mcp-server-ghost', version: 'latest' })).rejects.toMatchObject({
      code: VarietyErrorCode.INSTALL_FAILED,
      message: 'npm install mcp-server-ghost@latest exited with code 1',
      details: { exitCode: 1, timedOut: false, outputTail: 'npm ERR! 404 Not Found - mcp-server-ghost' },
    });
  });

  it('tracks each install directory from installing to failed with the reason', async () => {
    let finish: (result: CommandResult) => void = () => {};
    const runner: ICommandRunner = {
      run: () =>
        new Promise<CommandResult>((resolve) => {
          finish = resolve;
        }),
    };
    const installer = new PackageInstaller({ installRoot, runner, logger: new NoopLogger() });

    const pending = installer.install({ packageName: 'mcp-server-ghost', version: 'latest' });
    await vi.waitFor(() => expect(installer.list().map((i) => i.status)).toEqual(['installing']));
    finish({ exitCode: 1, output: 'npm ERR! 404' });
    await expect(pending).rejects.toMatchObject({ code: VarietyErrorCode.INSTALL_FAILED });

    const [record] = installer.list();
    expect(record).toMatchObject({
      packageName: 'mcp-server-ghost',
      status: 'failed',
      failureReason: 'npm install mcp-server-ghost@latest exited with code 1',
    });
    expect(installer.get(record?.installDir ?? '')?.status).toBe('failed');
  });

  it('lists successful installs as installed until they are removed', async () => {
    const installer = new PackageInstaller({ installRoot, runner: new FakeNpmRunner(), logger: new NoopLogger() });
    const installed = await installer.install({ packageName: 'mcp-server-kv', version: 'latest' });

    expect(installer.list()).toEqual([installed]);
    expect(installed.status).toBe('installed');

    await installer.uninstall(installed);
    expect(installer.list()).toEqual([]);
  });

  it('fails when npm succeeds without producing the package', async () => {
    const runner = new FakeNpmRunner(() => ({ skipPackage: true }));
    const installer = new PackageInstaller({ installRoot, runner, logger: new NoopLogger() });

    await expect(installer.install({ packageName: 'mcp-server-kv', version: 'latest' })).rejects.toMatchObject({
      code: VarietyErrorCode.INSTALL_FAILED,
      details: { packageName: 'mcp-server-kv', exitCode: 0 },
    });
  });

  it('refuses invalid names before running anything', async () => {
    const runner = new FakeNpmRunner();
    const installer = new PackageInstaller({ installRoot, runner, logger: new NoopLogger() });

    await expect(installer.install({ packageName: '--global', version: 'latest' })).rejects.toMatchObject({
      code: VarietyErrorCode.INSTALL_FAILED,
    });
    await expect(installer.install({ packageName: 'mcp-server-kv', version: 'latest; rm' })).rejects.toMatchObject({
      code: VarietyErrorCode.INSTALL_FAILED,
    });
    expect(runner.calls).toEqual([]);
    expect(await readdir(installRoot)).toEqual([]);
  });

  it('removes install directories only under the install root', async () => {
    const installer = new PackageInstaller({ installRoot, runner: new FakeNpmRunner(), logger: new NoopLogger() });
    const installed = await installer.install({ packageName: 'mcp-server-kv', version: 'latest' });

    await installer.uninstall(installed);
    await expect(access(installed.installDir)).rejects.toThrow();

    await expect(installer.uninstall({ installDir: os.tmpdir(), packageName: 'x' })).rejects.toMatchObject({
      code: VarietyErrorCode.INVALID_ARGUMENT,
    });
    await expect(
      installer.uninstall({ installDir: path.join(installRoot, '..', 'elsewhere'), packageName: 'x' }),
    ).rejects.toMatchObject({ code: VarietyErrorCode.INVALID_ARGUMENT });
  });
});

describe('ExecFileCommandRunner', () => {
  const runner = new ExecFileCommandRunner({ maxOutputChars: 5 });

  it('resolves with the exit code and the tail of the output', async () => {
    await expect(
      runner.run({
        command: process.execPath,
        args: ['-e', "process.stdout.write('abcdefgh'); process.exit(3)"],
        cwd: os.tmpdir(),
        timeoutMs: 10_000,
      }),
    ).resolves.toEqual({ exitCode: 3, output: 'defgh', timedOut: false });
  });

  it('rejects when the command cannot be started', async () => {
    await expect(
      runner.run({ command: 'variety-no-such-command', args: [], cwd: os.tmpdir(), timeoutMs: 1_000 }),
    ).rejects.toThrow(/ENOENT/);
  });
});
