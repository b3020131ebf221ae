/**
 * @fileoverview Runs one acquisition attempt for one capability.
 * @module variety-engine/acquisition/CapabilityAcquirer
 *
 * Stages:
 *   detected → discovering → installing → spawning → handshaking → registered
 *   any stage → failed { stage, reason, code }
 *
 * The whole attempt runs under one deadline. When it expires the attempt
 * fails with ACQUISITION_TIMEOUT in whatever stage it was in; a process that
 * was already started is stopped and the install directory is kept. Stage
 * work that finishes after the deadline releases what it acquired.
 */

import type { ProtocolClient } from '../protocol/ProtocolClient.js';
import type { ByteTransport, ToolDescriptor } from '../protocol/types.js';
import type { CandidateServer } from '../discovery/types.js';
import type { InstalledPackage, PackageSpec } from '../installer/types.js';
import type { ProcessSnapshot, ResolvedEntryPoint, SpawnRequest } from '../process/types.js';
import type { CapabilityRouter } from '../routing/CapabilityRouter.js';
import { createLogger } from '../logging/loggerFactory.js';
import type { ILogger } from '../logging/ILogger.js';
import { VarietyError, VarietyErrorCode, describeError } from '../utils/errors.js';
import type { AcquisitionFailure, SelectedCandidate, WorkingStage } from './types.js';

// ============================================================================
// COLLABORATORS
// ============================================================================

export interface DiscoveryPort {
  discover(capability: string): Promise<CandidateServer[]>;
}

export interface InstallerPort {
  install(spec: PackageSpec): Promise<InstalledPackage>;
  uninstall(installed: Pick<InstalledPackage, 'installDir' | 'packageName'>): Promise<void>;
}

export interface SupervisorPort {
  resolveExecutable(packageDir: string): Promise<ResolvedEntryPoint>;
  spawn(request: SpawnRequest): Promise<ProcessSnapshot>;
  getTransport(id: string): ByteTransport;
  isRunning(id: string): boolean;
  stop(id: string, options?: { graceMs?: number }): Promise<ProcessSnapshot | undefined>;
}

export type ProtocolClientFactory = (transport: ByteTransport, processId: string) => ProtocolClient;

export interface CapabilityAcquirerOptions {
  discovery: DiscoveryPort;
  installer: InstallerPort;
  supervisor: SupervisorPort;
  router: CapabilityRouter;
  createClient: ProtocolClientFactory;
  /** @default 180000 */
  attemptTimeoutMs?: number;
  /** Remove the install directory when spawn or handshake fails. @default false */
  cleanupOnFailure?: boolean;
  logger?: ILogger;
}

// ============================================================================
// ATTEMPT I/O
// ============================================================================

/** Progress reported while an attempt runs. */
export interface StageUpdate {
  stage: WorkingStage;
  candidatesConsidered?: number;
  candidate?: SelectedCandidate;
  installDir?: string;
  processId?: string;
}

export interface AcquisitionRequest {
  capability: string;
  /** Packages that failed in earlier attempts; tried last. */
  excludePackages?: ReadonlySet<string>;
  onStage?: (update: StageUpdate) => void;
}

export type AcquisitionResult =
  | {
      ok: true;
      capability: string;
      candidate: SelectedCandidate;
      installed: InstalledPackage;
      processId: string;
      toolName: string;
      tools: ToolDescriptor[];
    }
  | {
      ok: false;
      capability: string;
      failure: AcquisitionFailure;
      candidate?: SelectedCandidate;
      installed?: InstalledPackage;
    };

/** What the acquisition loop needs from an acquirer. */
export interface ICapabilityAcquirer {
  acquire(request: AcquisitionRequest): Promise<AcquisitionResult>;
}

interface AttemptState {
  capability: string;
  stage: WorkingStage;
  expired: boolean;
  candidate?: SelectedCandidate;
  installed?: InstalledPackage;
  processId?: string;
  client?: ProtocolClient;
}

// ============================================================================
// ACQUIRER
// ============================================================================

export class CapabilityAcquirer implements ICapabilityAcquirer {
  private readonly deps: CapabilityAcquirerOptions;
  private readonly attemptTimeoutMs: number;
  private readonly cleanupOnFailure: boolean;
  private readonly logger: ILogger;

  constructor(options: CapabilityAcquirerOptions) {
    this.deps = options;
    this.attemptTimeoutMs = options.attemptTimeoutMs ?? 180_000;
    this.cleanupOnFailure = options.cleanupOnFailure ?? false;
    this.logger = options.logger ?? createLogger('CapabilityAcquirer');
  }

  /** Never rejects: failures come back as `{ ok: false, failure }`. */
  async acquire(request: AcquisitionRequest): Promise<AcquisitionResult> {
    const state: AttemptState = { capability: request.capability, stage: 'detected', expired: false };
    const logger = this.logger.child({ capability: request.capability });

    let deadlineTimer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_, reject) => {
      deadlineTimer = setTimeout(() => {
        state.expired = true;
        reject(
          new VarietyError(
            `Acquisition of '${state.capability}' exceeded ${this.attemptTimeoutMs}ms in stage ${state.stage}`,
            VarietyErrorCode.ACQUISITION_TIMEOUT,
            { capability: state.capability, stage: state.stage },
            'CapabilityAcquirer',
          ),
        );
      }, this.attemptTimeoutMs);
    });
    // The deadline only matters while a stage is racing it.
    void deadline.catch(() => undefined);

    const enter = (update: StageUpdate): void => {
      state.stage = update.stage;
      logger.debug('Stage entered', { stage: update.stage });
      request.onStage?.(update);
    };

    const race = async <T>(work: Promise<T>): Promise<T> => {
      void work.catch((error: unknown) => {
        if (state.expired) logger.debug('Stage failed after the deadline', { stage: state.stage, error });
      });
      return Promise.race([work, deadline]);
    };

    try {
      // ---- discovering ----------------------------------------------------
      enter({ stage: 'discovering' });
      const candidates = await race(this.deps.discovery.discover(request.capability));
      const chosen = this.choose(candidates, request.excludePackages);
      if (!chosen) {
        throw new VarietyError(
          `No candidate package provides '${request.capability}'`,
          VarietyErrorCode.DISCOVERY_EMPTY,
          { capability: request.capability },
          'CapabilityAcquirer',
        );
      }
      state.candidate = {
        packageName: chosen.packageName,
        version: chosen.version,
        sourceOrigin: chosen.sourceOrigin,
        score: chosen.score,
      };

      // ---- installing -----------------------------------------------------
      enter({ stage: 'installing', candidatesConsidered: candidates.length, candidate: state.candidate });
      state.installed = await race(this.deps.installer.install({ packageName: chosen.packageName, version: chosen.version }));

      // ---- spawning -------------------------------------------------------
      enter({ stage: 'spawning', installDir: state.installed.installDir });
      const processId = await race(this.spawn(state, state.installed));

      // ---- handshaking ----------------------------------------------------
      enter({ stage: 'handshaking', processId });
      const { tools, tool } = await race(this.handshake(state, processId));

      if (state.expired) throw this.expiredError(state);
      const client = state.client;
      if (!client) {
        throw new VarietyError('Handshake finished without a client', VarietyErrorCode.INTERNAL_ERROR, undefined, 'CapabilityAcquirer');
      }
      // The process may have exited between tools/list and here; its exit event found nothing to unmap.
      if (!client.isReady() || !this.deps.supervisor.isRunning(processId)) {
        throw new VarietyError(
          `Process ${processId} exited during the handshake`,
          VarietyErrorCode.PROCESS_CRASHED,
          { processId, clientState: client.getState() },
          'CapabilityAcquirer',
        );
      }
      this.deps.router.attachClient(processId, client);
      this.deps.router.register(request.capability, processId, tool.name);
      logger.info('Capability acquired', {
        packageName: chosen.packageName,
        processId,
        toolName: tool.name,
      });
      return {
        ok: true,
        capability: request.capability,
        candidate: state.candidate,
        installed: state.installed,
        processId,
        toolName: tool.name,
        tools,
      };
    } catch (error) {
      const failure = this.toFailure(state, error);
      logger.warn('Acquisition failed', { ...failure });
      await this.release(state, failure);
      return {
        ok: false,
        capability: request.capability,
        failure,
        candidate: state.candidate,
        installed: state.installed,
      };
    } finally {
      clearTimeout(deadlineTimer);
    }
  }

  // ==========================================================================
  // STAGES
  // ==========================================================================

  private choose(candidates: readonly CandidateServer[], exclude?: ReadonlySet<string>): CandidateServer | undefined {
    if (exclude && exclude.size > 0) {
      const fresh = candidates.find((c) => !exclude.has(c.packageName));
      if (fresh) return fresh;
    }
    return candidates[0];
  }

  private async spawn(state: AttemptState, installed: InstalledPackage): Promise<string> {
    const entry = await this.deps.supervisor.resolveExecutable(installed.packageDir);
    const snapshot = await this.deps.supervisor.spawn({
      executablePath: entry.executablePath,
      args: entry.args,
      workingDir: installed.packageDir,
      packageName: installed.packageName,
    });
    state.processId = snapshot.id;
    if (state.expired) await this.stopProcess(snapshot.id);
    return snapshot.id;
  }

  private async handshake(
    state: AttemptState,
    processId: string,
  ): Promise<{ tools: ToolDescriptor[]; tool: ToolDescriptor }> {
    const client = this.deps.createClient(this.deps.supervisor.getTransport(processId), processId);
    state.client = client;
    await client.initialize();
    const tools = await client.listTools();
    const tool = this.deps.router.selectTool(state.capability, tools);
    if (state.expired) client.close('acquisition timed out');
    return { tools, tool };
  }

  // ==========================================================================
  // FAILURE HANDLING
  // ==========================================================================

  private toFailure(state: AttemptState, error: unknown): AcquisitionFailure {
    const code = error instanceof VarietyError ? error.code : VarietyErrorCode.INTERNAL_ERROR;
    return { stage: state.stage, code, reason: describeError(error) };
  }

  private expiredError(state: AttemptState): VarietyError {
    return new VarietyError(
      `Acquisition of '${state.capability}' exceeded its deadline`,
      VarietyErrorCode.ACQUISITION_TIMEOUT,
      { capability: state.capability, stage: state.stage },
      'CapabilityAcquirer',
    );
  }

  /** Stops what the attempt started. The install directory stays unless configured otherwise. */
  private async release(state: AttemptState, failure: AcquisitionFailure): Promise<void> {
    state.client?.close(`acquisition failed: ${failure.code}`);
    if (state.processId) {
      this.deps.router.invalidateProcess(state.processId);
      await this.stopProcess(state.processId);
    }

    const lateStage = failure.stage === 'spawning' || failure.stage === 'handshaking';
    if (
      state.installed &&
      this.cleanupOnFailure &&
      lateStage &&
      failure.code !== VarietyErrorCode.ACQUISITION_TIMEOUT
    ) {
      try {
        await this.deps.installer.uninstall(state.installed);
      } catch (error) {
        this.logger.warn('Could not remove install directory', { installDir: state.installed.installDir, error });
      }
    }
  }

  private async stopProcess(processId: string): Promise<void> {
    try {
      await this.deps.supervisor.stop(processId);
    } catch (error) {
      this.logger.warn('Could not stop process', { processId, error });
    }
  }
}
