/**
 * @fileoverview Owns every plugin subprocess and its stdio transport.
 * @module variety-engine/process/ProcessSupervisor
 *
 * Lifecycle of a handle:
 *   starting → running → crashed | stopped
 *
 * Exit watching is independent of protocol traffic. A process that prints
 * nothing is still `running`; higher layers use the handshake as liveness.
 * Other components only ever see {@link ProcessSnapshot}s and process ids.
 */

import { spawn as spawnChild, type ChildProcess } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { constants as fsConstants } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import * as path from 'node:path';
import { v4 as uuidv4 } from 'uuid';

import type { SupervisorConfig } from '../config/RuntimeConfig.js';
import { DEFAULT_RUNTIME_CONFIG } from '../config/RuntimeConfig.js';
import { createLogger } from '../logging/loggerFactory.js';
import type { ILogger } from '../logging/ILogger.js';
import { LineFramer } from '../protocol/LineFramer.js';
import type { ByteTransport } from '../protocol/types.js';
import { VarietyError, VarietyErrorCode } from '../utils/errors.js';
import { ChildProcessTransport } from './ChildProcessTransport.js';
import { resolveEntryPoint } from './resolveEntryPoint.js';
import type {
  ProcessSnapshot,
  ProcessStatus,
  ResolvedEntryPoint,
  SpawnRequest,
  SupervisorEvent,
  SupervisorEventListener,
} from './types.js';

export interface ProcessSupervisorOptions extends Partial<SupervisorConfig> {
  logger?: ILogger;
  /** Exited snapshots kept for `get()` and `getDiagnostics()`. @default 50 */
  exitedRetention?: number;
}

interface ProcessHandle {
  id: string;
  packageName: string;
  executablePath: string;
  status: ProcessStatus;
  pid?: number;
  startedAt: string;
  exitedAt?: string;
  exitCode?: number | null;
  signal?: string | null;
  child: ChildProcess;
  transport: ChildProcessTransport;
  stderr: string[];
  stderrFramer: LineFramer;
  stopRequested: boolean;
  finalized: boolean;
  closeFallback?: ReturnType<typeof setTimeout>;
  exited: Promise<ProcessSnapshot>;
  markExited: (snapshot: ProcessSnapshot) => void;
}

interface ExitedRecord {
  snapshot: ProcessSnapshot;
  stderr: string[];
}

/** Time allowed between `exit` and `close` before the stdio pipes are torn down. */
const CLOSE_FALLBACK_MS = 500;

function hasPathSeparator(command: string): boolean {
  return command.includes('/') || command.includes(path.sep);
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class ProcessSupervisor {
  private readonly emitter = new EventEmitter();
  private readonly handles = new Map<string, ProcessHandle>();
  private readonly exitedRecords = new Map<string, ExitedRecord>();
  private readonly config: SupervisorConfig;
  private readonly exitedRetention: number;
  private readonly logger: ILogger;

  constructor(options: ProcessSupervisorOptions = {}) {
    const defaults = DEFAULT_RUNTIME_CONFIG.supervisor;
    this.config = {
      stopGraceMs: options.stopGraceMs ?? defaults.stopGraceMs,
      stderrBufferLines: options.stderrBufferLines ?? defaults.stderrBufferLines,
      startupGraceMs: options.startupGraceMs ?? defaults.startupGraceMs,
    };
    this.exitedRetention = options.exitedRetention ?? 50;
    this.logger = options.logger ?? createLogger('ProcessSupervisor');
  }

  // ==========================================================================
  // EVENTS
  // ==========================================================================

  public on(listener: SupervisorEventListener): void {
    this.emitter.on('event', listener);
  }

  public off(listener: SupervisorEventListener): void {
    this.emitter.off('event', listener);
  }

  // ==========================================================================
  // SPAWN
  // ==========================================================================

  /**
   * Starts a subprocess with piped stdio and no shell.
   *
   * Resolves once the OS confirmed the spawn and the process survived the
   * startup grace window.
   *
   * @throws {VarietyError} `SPAWN_NOT_FOUND` when the executable is missing,
   *   `SPAWN_FAILED` for any other launch failure or an exit during startup.
   */
  public async spawn(request: SpawnRequest): Promise<ProcessSnapshot> {
    const { executablePath, workingDir, packageName } = request;
    const args = request.args ?? [];
    if (!executablePath) {
      throw new VarietyError('executablePath is required', VarietyErrorCode.INVALID_ARGUMENT, { packageName }, 'ProcessSupervisor');
    }

    if (hasPathSeparator(executablePath)) {
      try {
        await access(executablePath, fsConstants.X_OK);
      } catch (error) {
        throw new VarietyError(
          `Executable not found: ${executablePath}`,
          VarietyErrorCode.SPAWN_NOT_FOUND,
          { executablePath, packageName },
          'ProcessSupervisor',
          error,
        );
      }
    }
    await this.assertDirectory(workingDir, packageName);

    const id = this.allocateId();
    let child: ChildProcess;
    try {
      child = spawnChild(executablePath, args, {
        cwd: workingDir,
        env: { ...process.env, ...(request.env ?? {}) },
        stdio: ['pipe', 'pipe', 'pipe'],
        shell: false,
        windowsHide: true,
      });
    } catch (error) {
      throw this.spawnError(error, executablePath, packageName);
    }

    const { stdin, stdout, stderr } = child;
    if (!stdin || !stdout || !stderr) {
      child.kill('SIGKILL');
      throw new VarietyError(
        `Spawned ${packageName} without piped stdio`,
        VarietyErrorCode.SPAWN_FAILED,
        { executablePath, packageName },
        'ProcessSupervisor',
      );
    }

    const logger = this.logger.child({ processId: id, packageName });
    let markExited: (snapshot: ProcessSnapshot) => void = () => {};
    const exited = new Promise<ProcessSnapshot>((resolve) => {
      markExited = resolve;
    });
    const handle: ProcessHandle = {
      id,
      packageName,
      executablePath,
      status: 'starting',
      startedAt: new Date().toISOString(),
      child,
      transport: new ChildProcessTransport(stdin, stdout, logger),
      stderr: [],
      stderrFramer: new LineFramer(),
      stopRequested: false,
      finalized: false,
      exited,
      markExited,
    };
    this.handles.set(id, handle);

    stderr.on('data', (chunk: Buffer) => this.captureStderr(handle, chunk, logger));
    child.on('exit', (code, signal) => this.handleExit(handle, code, signal));
    child.on('close', (code, signal) => {
      if (handle.exitedAt === undefined) this.handleExit(handle, code, signal);
      this.finalize(handle);
    });

    try {
      await new Promise<void>((resolve, reject) => {
        child.once('spawn', () => resolve());
        child.once('error', reject);
      });
    } catch (error) {
      handle.finalized = true;
      handle.transport.close('spawn failed');
      this.handles.delete(id);
      throw this.spawnError(error, executablePath, packageName);
    }
    child.on('error', (error) => logger.warn('Child process error', { error }));

    handle.status = 'running';
    handle.pid = child.pid;
    logger.info('Process started', { pid: child.pid, executablePath, args });
    this.emit({ type: 'process:started', timestamp: handle.startedAt, process: this.snapshot(handle) });

    if (this.config.startupGraceMs > 0) {
      const exitedEarly = await this.exitsWithin(handle, this.config.startupGraceMs);
      if (exitedEarly) {
        // stderr is complete once the pipes closed
        await handle.exited;
        throw new VarietyError(
          `${packageName} exited during startup (code ${String(handle.exitCode)}, signal ${String(handle.signal)})`,
          VarietyErrorCode.SPAWN_FAILED,
          {
            processId: id,
            executablePath,
            packageName,
            exitCode: handle.exitCode,
            signal: handle.signal,
            stderrTail: handle.stderr.slice(-20),
          },
          'ProcessSupervisor',
        );
      }
    }

    return this.snapshot(handle);
  }

  /** See {@link resolveEntryPoint}. */
  public resolveExecutable(packageDir: string): Promise<ResolvedEntryPoint> {
    return resolveEntryPoint(packageDir);
  }

  // ==========================================================================
  // I/O
  // ==========================================================================

  /** @throws {VarietyError} `PROCESS_NOT_RUNNING` unless the handle is `running`. */
  public send(id: string, data: string): void {
    const handle = this.requireRunning(id, 'send');
    try {
      handle.transport.write(data);
    } catch (error) {
      throw new VarietyError(
        `Could not write to process ${id}`,
        VarietyErrorCode.PROCESS_NOT_RUNNING,
        { processId: id },
        'ProcessSupervisor',
        error,
      );
    }
  }

  /** @throws {VarietyError} `PROCESS_NOT_RUNNING` unless the handle is `running`. */
  public getTransport(id: string): ByteTransport {
    return this.requireRunning(id, 'getTransport').transport;
  }

  /** Last captured stderr lines, live or recently exited. */
  public getDiagnostics(id: string): string[] {
    const handle = this.handles.get(id);
    if (handle) return [...handle.stderr];
    return [...(this.exitedRecords.get(id)?.stderr ?? [])];
  }

  // ==========================================================================
  // STOP
  // ==========================================================================

  /**
   * SIGTERM, then SIGKILL once `graceMs` elapsed. Idempotent: stopping an
   * exited or unknown id resolves with its last snapshot (or undefined).
   */
  public async stop(id: string, options: { graceMs?: number } = {}): Promise<ProcessSnapshot | undefined> {
    const handle = this.handles.get(id);
    if (!handle) return this.exitedRecords.get(id)?.snapshot;
    if (handle.exitedAt !== undefined) return handle.exited;

    if (!handle.stopRequested) {
      handle.stopRequested = true;
      const graceMs = options.graceMs ?? this.config.stopGraceMs;
      this.logger.debug('Stopping process', { processId: id, graceMs });
      handle.child.kill('SIGTERM');
      const killTimer = setTimeout(() => {
        if (handle.exitedAt === undefined) {
          this.logger.warn('Process ignored SIGTERM, sending SIGKILL', { processId: id });
          handle.child.kill('SIGKILL');
        }
      }, graceMs);
      void handle.exited.finally(() => clearTimeout(killTimer));
    }
    return handle.exited;
  }

  public async stopAll(options: { graceMs?: number } = {}): Promise<void> {
    await Promise.all([...this.handles.keys()].map((id) => this.stop(id, options)));
  }

  // ==========================================================================
  // QUERIES
  // ==========================================================================

  /** Snapshots of processes that have not exited yet. */
  public list(): ProcessSnapshot[] {
    return [...this.handles.values()]
      .filter((h) => h.exitedAt === undefined)
      .map((h) => this.snapshot(h));
  }

  public get(id: string): ProcessSnapshot | undefined {
    const handle = this.handles.get(id);
    if (handle) return this.snapshot(handle);
    return this.exitedRecords.get(id)?.snapshot;
  }

  public isRunning(id: string): boolean {
    return this.handles.get(id)?.status === 'running';
  }

  // ==========================================================================
  // INTERNAL
  // ==========================================================================

  private allocateId(): string {
    let id = `proc-${uuidv4().slice(0, 8)}`;
    while (this.handles.has(id) || this.exitedRecords.has(id)) {
      id = `proc-${uuidv4().slice(0, 8)}`;
    }
    return id;
  }

  private async assertDirectory(workingDir: string, packageName: string): Promise<void> {
    try {
      if ((await stat(workingDir)).isDirectory()) return;
    } catch {
      // reported below
    }
    throw new VarietyError(
      `Working directory does not exist: ${workingDir}`,
      VarietyErrorCode.SPAWN_FAILED,
      { workingDir, packageName },
      'ProcessSupervisor',
    );
  }

  private spawnError(error: unknown, executablePath: string, packageName: string): VarietyError {
    const code = errnoCode(error);
    const notFound = code === 'ENOENT';
    return new VarietyError(
      notFound
        ? `Executable not found: ${executablePath}`
        : `Failed to spawn ${executablePath}: ${error instanceof Error ? error.message : String(error)}`,
      notFound ? VarietyErrorCode.SPAWN_NOT_FOUND : VarietyErrorCode.SPAWN_FAILED,
      { executablePath, packageName, errno: code },
      'ProcessSupervisor',
      error,
    );
  }

  private requireRunning(id: string, operation: string): ProcessHandle {
    const handle = this.handles.get(id);
    if (!handle || handle.status !== 'running') {
      throw new VarietyError(
        `Process ${id} is not running`,
        VarietyErrorCode.PROCESS_NOT_RUNNING,
        { processId: id, operation, status: handle?.status ?? this.exitedRecords.get(id)?.snapshot.status },
        'ProcessSupervisor',
      );
    }
    return handle;
  }

  private captureStderr(handle: ProcessHandle, chunk: Buffer, logger: ILogger): void {
    const limit = this.config.stderrBufferLines;
    for (const line of handle.stderrFramer.push(chunk).lines) {
      logger.debug('stderr', { line });
      if (limit === 0) continue;
      handle.stderr.push(line);
      if (handle.stderr.length > limit) handle.stderr.splice(0, handle.stderr.length - limit);
    }
  }

  private handleExit(handle: ProcessHandle, code: number | null, signal: NodeJS.Signals | null): void {
    if (handle.finalized || handle.exitedAt !== undefined) return;
    handle.exitedAt = new Date().toISOString();
    handle.exitCode = code;
    handle.signal = signal;
    handle.status = handle.stopRequested ? 'stopped' : 'crashed';

    const level = handle.status === 'crashed' ? 'warn' : 'info';
    this.logger[level]('Process exited', {
      processId: handle.id,
      packageName: handle.packageName,
      status: handle.status,
      exitCode: code,
      signal,
    });

    // A grandchild may keep the pipes open; do not wait on `close` forever.
    handle.closeFallback = setTimeout(() => {
      handle.child.stdout?.destroy();
      handle.child.stderr?.destroy();
      this.finalize(handle);
    }, CLOSE_FALLBACK_MS);
  }

  private finalize(handle: ProcessHandle): void {
    if (handle.finalized) return;
    handle.finalized = true;
    if (handle.closeFallback) clearTimeout(handle.closeFallback);

    handle.transport.close(`process ${handle.status} (code ${String(handle.exitCode)}, signal ${String(handle.signal)})`);
    this.handles.delete(handle.id);

    const snapshot = this.snapshot(handle);
    this.exitedRecords.set(handle.id, { snapshot, stderr: [...handle.stderr] });
    while (this.exitedRecords.size > this.exitedRetention) {
      const oldest = this.exitedRecords.keys().next().value;
      if (oldest === undefined) break;
      this.exitedRecords.delete(oldest);
    }

    this.emit({
      type: 'process:exited',
      timestamp: handle.exitedAt ?? new Date().toISOString(),
      process: snapshot,
      stderrTail: handle.stderr.slice(-20),
    });
    handle.markExited(snapshot);
  }

  private exitsWithin(handle: ProcessHandle, ms: number): Promise<boolean> {
    if (handle.exitedAt !== undefined) return Promise.resolve(true);
    return new Promise<boolean>((resolve) => {
      const onExit = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        handle.child.off('exit', onExit);
        resolve(false);
      }, ms);
      handle.child.once('exit', onExit);
    });
  }

  private snapshot(handle: ProcessHandle): ProcessSnapshot {
    const snapshot: ProcessSnapshot = {
      id: handle.id,
      packageName: handle.packageName,
      executablePath: handle.executablePath,
      status: handle.status,
      startedAt: handle.startedAt,
    };
    if (handle.pid !== undefined) snapshot.pid = handle.pid;
    if (handle.exitedAt !== undefined) {
      snapshot.exitedAt = handle.exitedAt;
      snapshot.exitCode = handle.exitCode;
      snapshot.signal = handle.signal;
    }
    return snapshot;
  }

  private emit(event: SupervisorEvent): void {
    try {
      this.emitter.emit('event', event);
    } catch (error) {
      this.logger.error('Supervisor event listener threw', { type: event.type, error });
    }
  }
}
