/**
 * @fileoverview Materialises a candidate package on disk.
 * @module variety-engine/installer/PackageInstaller
 *
 * Every install gets a fresh `mkdtemp` directory under the install root and
 * is a single package-manager invocation without a shell. Success means exit
 * code 0 and the package directory present under `node_modules`. There are no
 * automatic retries; the acquisition loop owns retry policy.
 *
 * Each install directory is tracked as `installing`, then `installed` or
 * `failed` with the failure reason, until it is removed.
 */

import { mkdir, mkdtemp, rm, stat, writeFile } from 'node:fs/promises';
import * as path from 'node:path';

import type { InstallerConfig } from '../config/RuntimeConfig.js';
import { DEFAULT_RUNTIME_CONFIG } from '../config/RuntimeConfig.js';
import { assertValidPackageName, assertValidVersionSpec } from '../discovery/packageNames.js';
import { createLogger } from '../logging/loggerFactory.js';
import type { ILogger } from '../logging/ILogger.js';
import { VarietyError, VarietyErrorCode } from '../utils/errors.js';
import { ExecFileCommandRunner } from './ExecFileCommandRunner.js';
import type { ICommandRunner, InstalledPackage, PackageSpec } from './types.js';

export interface PackageInstallerOptions extends Partial<InstallerConfig> {
  runner?: ICommandRunner;
  logger?: ILogger;
}

const OUTPUT_TAIL_CHARS = 2_000;

function safeDirectoryPrefix(packageName: string): string {
  return packageName.replace(/^@/, '').replace(/[^a-z0-9._-]+/g, '-');
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isDirectory();
  } catch {
    return false;
  }
}

export class PackageInstaller {
  private readonly config: InstallerConfig;
  private readonly runner: ICommandRunner;
  private readonly logger: ILogger;
  private readonly installs = new Map<string, InstalledPackage>();

  constructor(options: PackageInstallerOptions = {}) {
    const defaults = DEFAULT_RUNTIME_CONFIG.installer;
    this.config = {
      installRoot: path.resolve(options.installRoot ?? defaults.installRoot),
      npmCommand: options.npmCommand ?? defaults.npmCommand,
      installTimeoutMs: options.installTimeoutMs ?? defaults.installTimeoutMs,
      ignoreScripts: options.ignoreScripts ?? defaults.ignoreScripts,
      registryUrl: options.registryUrl,
    };
    this.runner = options.runner ?? new ExecFileCommandRunner();
    this.logger = options.logger ?? createLogger('PackageInstaller');
  }

  get installRoot(): string {
    return this.config.installRoot;
  }

  /** Install directories created by this installer and not yet removed. */
  list(): InstalledPackage[] {
    return [...this.installs.values()].map((record) => ({ ...record }));
  }

  get(installDir: string): InstalledPackage | undefined {
    const record = this.installs.get(path.resolve(installDir));
    return record ? { ...record } : undefined;
  }

  /** Package-manager arguments for one install; the spec is validated first. */
  buildInstallArgs(spec: PackageSpec, installDir: string): string[] {
    const packageName = assertValidPackageName(spec.packageName);
    const version = assertValidVersionSpec(spec.version);
    return [
      'install',
      '--no-audit',
      '--no-fund',
      `--ignore-scripts=${String(this.config.ignoreScripts)}`,
      '--prefix',
      installDir,
      ...(this.config.registryUrl ? ['--registry', this.config.registryUrl] : []),
      `${packageName}@${version}`,
    ];
  }

  /**
   * @throws {VarietyError} `INSTALL_FAILED` with the exit code and the tail of
   *   the package manager's output.
   */
  async install(spec: PackageSpec): Promise<InstalledPackage> {
    const { packageName, version } = spec;
    try {
      assertValidPackageName(packageName);
      assertValidVersionSpec(version);
    } catch (error) {
      throw new VarietyError(
        `Refusing to install ${packageName}@${version}`,
        VarietyErrorCode.INSTALL_FAILED,
        { packageName, version },
        'PackageInstaller',
        error,
      );
    }

    let installDir: string;
    try {
      await mkdir(this.config.installRoot, { recursive: true });
      installDir = await mkdtemp(path.join(this.config.installRoot, `${safeDirectoryPrefix(packageName)}-`));
      await writeFile(
        path.join(installDir, 'package.json'),
        JSON.stringify({ name: 'variety-install', private: true }, null, 2),
      );
    } catch (error) {
      throw new VarietyError(
        `Could not prepare install directory for ${packageName}`,
        VarietyErrorCode.INSTALL_FAILED,
        { packageName, version, installRoot: this.config.installRoot },
        'PackageInstaller',
        error,
      );
    }
    const args = this.buildInstallArgs(spec, installDir);

    const packageDir = path.join(installDir, 'node_modules', ...packageName.split('/'));
    const record: InstalledPackage = { packageName, version, installDir, packageDir, status: 'installing' };
    this.installs.set(installDir, record);
    this.logger.info('Installing package', { packageName, version, installDir });

    let exitCode: number;
    let output: string;
    let timedOut = false;
    try {
      const result = await this.runner.run({
        command: this.config.npmCommand,
        args,
        cwd: installDir,
        timeoutMs: this.config.installTimeoutMs,
      });
      exitCode = result.exitCode;
      output = result.output;
      timedOut = result.timedOut === true;
    } catch (error) {
      throw this.failed(
        record,
        new VarietyError(
          `Could not run ${this.config.npmCommand} for ${packageName}`,
          VarietyErrorCode.INSTALL_FAILED,
          { packageName, version, installDir },
          'PackageInstaller',
          error,
        ),
      );
    }

    const outputTail = output.slice(-OUTPUT_TAIL_CHARS);
    if (exitCode !== 0) {
      this.logger.warn('Install command failed', { packageName, exitCode, timedOut });
      throw this.failed(
        record,
        new VarietyError(
          `${this.config.npmCommand} install ${packageName}@${version} exited with code ${exitCode}${timedOut ? ' (timed out)' : ''}`,
          VarietyErrorCode.INSTALL_FAILED,
          { packageName, version, installDir, exitCode, timedOut, outputTail },
          'PackageInstaller',
        ),
      );
    }
    if (!(await isDirectory(packageDir))) {
      throw this.failed(
        record,
        new VarietyError(
          `${packageName} is missing from ${installDir} after install`,
          VarietyErrorCode.INSTALL_FAILED,
          { packageName, version, installDir, exitCode, outputTail },
          'PackageInstaller',
        ),
      );
    }

    record.status = 'installed';
    this.logger.info('Package installed', { packageName, version, packageDir });
    return { ...record };
  }

  /**
   * Removes an install directory. Only directories under the install root are
   * touched.
   */
  async uninstall(installed: Pick<InstalledPackage, 'installDir' | 'packageName'>): Promise<void> {
    const target = path.resolve(installed.installDir);
    if (!target.startsWith(this.config.installRoot + path.sep)) {
      throw new VarietyError(
        `Refusing to remove ${target}: outside the install root`,
        VarietyErrorCode.INVALID_ARGUMENT,
        { installDir: target, installRoot: this.config.installRoot },
        'PackageInstaller',
      );
    }
    await rm(target, { recursive: true, force: true });
    this.installs.delete(target);
    this.logger.info('Package removed', { packageName: installed.packageName, installDir: target });
  }

  private failed(record: InstalledPackage, error: VarietyError): VarietyError {
    record.status = 'failed';
    record.failureReason = error.message;
    return error;
  }
}
