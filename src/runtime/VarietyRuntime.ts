/**
 * @fileoverview Wires the engine's components and exposes the status interface.
 * @module variety-engine/runtime/VarietyRuntime
 *
 * ```ts
 * const runtime = createVarietyRuntime({ config: { monitor: { intervalMs: 10_000 } } });
 * runtime.start();
 * runtime.injectGap(['memory'], 'high', 'planner');
 * // ...later
 * const result = await runtime.invoke('memory', { query: 'projects' });
 * await runtime.shutdown();
 * ```
 */

import type { AxiosInstance } from 'axios';

import { CapabilityAcquirer, type DiscoveryPort, type InstallerPort } from '../acquisition/CapabilityAcquirer.js';
import { DeclaredRequirementsGapSource } from '../acquisition/DeclaredRequirementsGapSource.js';
import type { AcquisitionSnapshot, GapSeverity, IGapSource, MonitorEventListener } from '../acquisition/types.js';
import { VarietyMonitor, type InjectGapResult } from '../acquisition/VarietyMonitor.js';
import {
  resolveRuntimeConfig,
  type DeepPartial,
  type VarietyRuntimeConfig,
} from '../config/RuntimeConfig.js';
import { CuratedCandidateSource } from '../discovery/CuratedCandidateSource.js';
import { LlmResearchSource } from '../discovery/LlmResearchSource.js';
import { NpmRegistrySource } from '../discovery/NpmRegistrySource.js';
import { PackageDiscoveryEngine } from '../discovery/PackageDiscoveryEngine.js';
import type { ICandidateSource } from '../discovery/types.js';
import { PackageInstaller } from '../installer/PackageInstaller.js';
import type { ICommandRunner, InstalledPackage } from '../installer/types.js';
import { componentLogger } from '../logging/loggerFactory.js';
import type { ILogger } from '../logging/ILogger.js';
import { HealthMonitor, type HealthStatus } from '../process/HealthMonitor.js';
import { ProcessSupervisor } from '../process/ProcessSupervisor.js';
import type { ProcessStatus, SupervisorEvent } from '../process/types.js';
import { ProtocolClient } from '../protocol/ProtocolClient.js';
import type { ByteTransport } from '../protocol/types.js';
import { CapabilityRouter, type CapabilityRoute } from '../routing/CapabilityRouter.js';

// ============================================================================
// TYPES
// ============================================================================

export interface RunningProcessInfo {
  id: string;
  packageName: string;
  status: ProcessStatus;
}

export interface VarietyRuntimeComponents {
  config: VarietyRuntimeConfig;
  discovery: DiscoveryPort;
  installer: InstallerPort & { list(): InstalledPackage[] };
  supervisor: ProcessSupervisor;
  gapSources?: IGapSource[];
  logger?: ILogger;
}

export interface CreateVarietyRuntimeOptions {
  /** Overrides applied on top of defaults and `VARIETY_*` environment variables. */
  config?: DeepPartial<VarietyRuntimeConfig>;
  env?: NodeJS.ProcessEnv;
  logger?: ILogger;
  /** Replaces the candidate sources built from config. */
  candidateSources?: ICandidateSource[];
  /** Extra gap sources next to the declared-requirements source. */
  gapSources?: IGapSource[];
  commandRunner?: ICommandRunner;
  /** Pre-built HTTP clients for the registry and research sources. */
  http?: { registry?: AxiosInstance; research?: AxiosInstance };
}

// ============================================================================
// RUNTIME
// ============================================================================

export class VarietyRuntime {
  readonly config: VarietyRuntimeConfig;
  readonly supervisor: ProcessSupervisor;
  readonly router: CapabilityRouter;
  readonly monitor: VarietyMonitor;
  /** Absent when `config.health.enabled` is false. */
  readonly health: HealthMonitor | undefined;

  private readonly installer: VarietyRuntimeComponents['installer'];
  private readonly clients = new Map<string, ProtocolClient>();
  private readonly baseLogger: ILogger | undefined;
  private readonly logger: ILogger;
  private readonly onSupervisorEvent: (event: SupervisorEvent) => void;
  private readonly unhealthyReasons = new Map<string, string>();
  private shuttingDown = false;

  constructor(components: VarietyRuntimeComponents) {
    const { config, supervisor } = components;
    this.config = config;
    this.installer = components.installer;
    this.supervisor = supervisor;
    this.baseLogger = components.logger;
    this.logger = componentLogger('VarietyRuntime', this.baseLogger);

    this.router = new CapabilityRouter({
      isProcessRunning: (id) => supervisor.isRunning(id),
      logger: componentLogger('CapabilityRouter', this.baseLogger),
    });

    const acquirer = new CapabilityAcquirer({
      discovery: components.discovery,
      installer: components.installer,
      supervisor,
      router: this.router,
      createClient: (transport, processId) => this.openClient(transport, processId),
      attemptTimeoutMs: config.monitor.attemptTimeoutMs,
      cleanupOnFailure: config.monitor.cleanupOnFailure,
      logger: componentLogger('CapabilityAcquirer', this.baseLogger),
    });

    this.monitor = new VarietyMonitor({
      acquirer,
      router: this.router,
      gapSources: components.gapSources,
      config: {
        intervalMs: config.monitor.intervalMs,
        historyLimit: config.monitor.historyLimit,
        backoff: config.monitor.backoff,
      },
      logger: componentLogger('VarietyMonitor', this.baseLogger),
    });

    this.health = config.health.enabled
      ? new HealthMonitor({
          config: {
            intervalMs: config.health.intervalMs,
            timeoutMs: config.health.timeoutMs,
            maxFailures: config.health.maxFailures,
          },
          onUnhealthy: (processId, reason) => this.stopUnhealthy(processId, reason),
          logger: componentLogger('HealthMonitor', this.baseLogger),
        })
      : undefined;

    this.monitor.on((event) => {
      if (event.type !== 'acquisition:registered' || !event.snapshot.processId) return;
      const client = this.clients.get(event.snapshot.processId);
      if (client) this.health?.watch(event.snapshot.processId, client);
    });

    this.onSupervisorEvent = (event) => {
      if (event.type !== 'process:exited') return;
      const { id } = event.process;
      const reason = this.unhealthyReasons.get(id);
      this.unhealthyReasons.delete(id);
      this.health?.unwatch(id);
      this.clients.get(id)?.close(reason ?? `process ${event.process.status}`);
      this.clients.delete(id);
      this.monitor.handleProcessExit(event.process, reason);
    };
    supervisor.on(this.onSupervisorEvent);
  }

  // ==========================================================================
  // LIFECYCLE
  // ==========================================================================

  start(): void {
    this.monitor.start();
    this.health?.start();
  }

  /** Stops the monitor, closes every client and stops every process. */
  async shutdown(): Promise<void> {
    if (this.shuttingDown) return;
    this.shuttingDown = true;
    this.logger.info('Shutting down', { processes: this.supervisor.list().length });

    this.health?.stop();
    await this.monitor.stop();
    for (const [processId, client] of this.clients) {
      client.close('runtime shutdown');
      this.router.detachClient(processId);
    }
    this.clients.clear();
    await this.supervisor.stopAll();
    this.supervisor.off(this.onSupervisorEvent);
  }

  // ==========================================================================
  // TRIGGER & ROUTING
  // ==========================================================================

  injectGap(requiredCapabilities: readonly string[], severity: GapSeverity = 'normal', source = 'injected'): InjectGapResult {
    return this.monitor.injectGap(requiredCapabilities, severity, source);
  }

  invoke(capability: string, args: Record<string, unknown> = {}, timeoutMs?: number): Promise<unknown> {
    return this.router.invoke(capability, args, timeoutMs);
  }

  on(listener: MonitorEventListener): void {
    this.monitor.on(listener);
  }

  off(listener: MonitorEventListener): void {
    this.monitor.off(listener);
  }

  // ==========================================================================
  // STATUS
  // ==========================================================================

  listRunningProcesses(): RunningProcessInfo[] {
    return this.supervisor
      .list()
      .filter((p) => p.status === 'running')
      .map(({ id, packageName, status }) => ({ id, packageName, status }));
  }

  /** Mapped capability names, sorted. */
  listCapabilities(): string[] {
    return this.router.capabilities();
  }

  listRoutes(): CapabilityRoute[] {
    return this.router.list();
  }

  /** Install directories with their status (`installing`, `installed`, `failed`). */
  listInstalls(): InstalledPackage[] {
    return this.installer.list();
  }

  getAcquisitionStatus(capability: string): AcquisitionSnapshot | undefined {
    return this.monitor.getStatus(capability);
  }

  getHistory(): AcquisitionSnapshot[] {
    return this.monitor.getHistory();
  }

  /** Ping status of every registered process; empty when health checks are off. */
  listHealth(): HealthStatus[] {
    return this.health?.listStatuses() ?? [];
  }

  // ==========================================================================
  // INTERNAL
  // ==========================================================================

  /** Stops a process that stopped answering; its exit then takes the process-loss path. */
  private async stopUnhealthy(processId: string, reason: string): Promise<void> {
    this.logger.warn('Stopping unresponsive process', { processId, reason });
    this.unhealthyReasons.set(processId, `process ${processId} unresponsive: ${reason}`);
    // Mappings go first so no call is routed to it while it shuts down.
    this.router.invalidateProcess(processId);
    await this.supervisor.stop(processId);
  }

  private openClient(transport: ByteTransport, processId: string): ProtocolClient {
    const client = new ProtocolClient(transport, {
      defaultTimeoutMs: this.config.protocol.callTimeoutMs,
      handshakeTimeoutMs: this.config.protocol.handshakeTimeoutMs,
      protocolVersion: this.config.protocol.protocolVersion,
      clientInfo: this.config.protocol.clientInfo,
      label: processId,
      logger: componentLogger('ProtocolClient', this.baseLogger).child({ processId }),
    });
    this.clients.set(processId, client);
    return client;
  }
}

// ============================================================================
// FACTORY
// ============================================================================

/** Builds the candidate sources enabled in `config.discovery`. */
export function buildCandidateSources(
  config: VarietyRuntimeConfig,
  logger?: ILogger,
  http: CreateVarietyRuntimeOptions['http'] = {},
): ICandidateSource[] {
  const { discovery } = config;
  const sources: ICandidateSource[] = [];
  if (discovery.curated.enabled) {
    sources.push(
      new CuratedCandidateSource({
        mappingFile: discovery.curated.mappingFile,
        logger: componentLogger('CuratedCandidateSource', logger),
      }),
    );
  }
  if (discovery.registry.enabled) {
    sources.push(
      new NpmRegistrySource({
        baseURL: discovery.registry.baseURL,
        searchSize: discovery.registry.searchSize,
        requestTimeoutMs: discovery.registry.requestTimeoutMs,
        http: http.registry,
        logger: componentLogger('NpmRegistrySource', logger),
      }),
    );
  }
  if (discovery.research.enabled && (discovery.research.baseURL || http.research)) {
    sources.push(
      new LlmResearchSource({
        baseURL: discovery.research.baseURL,
        apiKey: discovery.research.apiKey,
        model: discovery.research.model,
        requestTimeoutMs: discovery.research.requestTimeoutMs,
        maxSuggestions: discovery.research.maxSuggestions,
        http: http.research,
        logger: componentLogger('LlmResearchSource', logger),
      }),
    );
  }
  return sources;
}

/**
 * Resolves configuration (defaults ← env ← overrides) and assembles a
 * runtime with the default component set.
 *
 * @throws {VarietyError} `CONFIGURATION_ERROR` for invalid configuration.
 */
export function createVarietyRuntime(options: CreateVarietyRuntimeOptions = {}): VarietyRuntime {
  const config = resolveRuntimeConfig(options.config, options.env);
  const logger = options.logger;

  const discovery = new PackageDiscoveryEngine({
    sources: options.candidateSources ?? buildCandidateSources(config, logger, options.http),
    maxCandidates: config.discovery.maxCandidates,
    logger: componentLogger('PackageDiscoveryEngine', logger),
  });
  const installer = new PackageInstaller({
    ...config.installer,
    runner: options.commandRunner,
    logger: componentLogger('PackageInstaller', logger),
  });
  const supervisor = new ProcessSupervisor({
    ...config.supervisor,
    logger: componentLogger('ProcessSupervisor', logger),
  });

  const gapSources: IGapSource[] = [...(options.gapSources ?? [])];
  if (config.monitor.requiredCapabilities.length > 0) {
    gapSources.unshift(
      new DeclaredRequirementsGapSource({
        requiredCapabilities: config.monitor.requiredCapabilities,
        varietyThreshold: config.monitor.varietyThreshold,
      }),
    );
  }

  return new VarietyRuntime({ config, discovery, installer, supervisor, gapSources, logger });
}
