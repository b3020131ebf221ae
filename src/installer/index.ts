export { PackageInstaller, type PackageInstallerOptions } from './PackageInstaller.js';
export { ExecFileCommandRunner, type ExecFileCommandRunnerOptions } from './ExecFileCommandRunner.js';
export type {
  CommandRequest,
  CommandResult,
  ICommandRunner,
  InstalledPackage,
  InstallStatus,
  PackageSpec,
} from './types.js';
