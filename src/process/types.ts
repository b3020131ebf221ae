/**
 * @fileoverview Types for the process supervisor.
 */

export type ProcessStatus = 'starting' | 'running' | 'crashed' | 'stopped';

export interface SpawnRequest {
  /** Absolute path of the executable, or a bare command resolved through PATH. */
  executablePath: string;
  args?: string[];
  workingDir: string;
  /** Package the process was started from; informational. */
  packageName: string;
  /** Extra environment merged over the parent's environment. */
  env?: Record<string, string>;
}

/** Read-only view of a ProcessHandle. Never exposes the OS handle. */
export interface ProcessSnapshot {
  id: string;
  packageName: string;
  executablePath: string;
  status: ProcessStatus;
  pid?: number;
  startedAt: string;
  exitedAt?: string;
  exitCode?: number | null;
  signal?: string | null;
}

export interface ProcessStartedEvent {
  type: 'process:started';
  timestamp: string;
  process: ProcessSnapshot;
}

export interface ProcessExitedEvent {
  type: 'process:exited';
  timestamp: string;
  process: ProcessSnapshot;
  /** Last stderr lines captured before exit. */
  stderrTail: string[];
}

export type SupervisorEvent = ProcessStartedEvent | ProcessExitedEvent;

export type SupervisorEventListener = (event: SupervisorEvent) => void;

/** Launch command derived from an installed package. */
export interface ResolvedEntryPoint {
  executablePath: string;
  args: string[];
  /** File inside the package that was selected. */
  entryFile: string;
}
