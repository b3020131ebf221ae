/**
 * @fileoverview Installer types and the external command boundary.
 */

export type InstallStatus = 'installing' | 'installed' | 'failed';

export interface InstalledPackage {
  packageName: string;
  version: string;
  /** Unique per-install working directory (the npm prefix). */
  installDir: string;
  /** `<installDir>/node_modules/<packageName>` */
  packageDir: string;
  status: InstallStatus;
  failureReason?: string;
}

/** What the installer needs from a candidate. */
export interface PackageSpec {
  packageName: string;
  version: string;
}

export interface CommandRequest {
  command: string;
  args: string[];
  cwd: string;
  timeoutMs: number;
}

export interface CommandResult {
  exitCode: number;
  /** Combined stdout and stderr, possibly truncated from the front. */
  output: string;
  timedOut?: boolean;
}

/** Runs one external command without a shell. */
export interface ICommandRunner {
  run(request: CommandRequest): Promise<CommandResult>;
}
