/**
 * @fileoverview Gap-driven acquisition loop.
 * @module variety-engine/acquisition/VarietyMonitor
 *
 * Every tick:
 *   injected gaps + IGapSource.observe() → capabilities not mapped
 *     → skip in-flight (coalescing) and capabilities inside their back-off window
 *     → start one background attempt per remaining capability
 *
 * `tick()` never waits for attempts. Injected demand stays pending until the
 * capability is registered or parked after `maxAttempts` consecutive failures;
 * re-injecting a capability resets its failure count.
 */

import { EventEmitter } from 'node:events';

import type { MonitorConfig } from '../config/RuntimeConfig.js';
import { DEFAULT_RUNTIME_CONFIG } from '../config/RuntimeConfig.js';
import { assertValidCapabilityName } from '../discovery/packageNames.js';
import { createLogger } from '../logging/loggerFactory.js';
import type { ILogger } from '../logging/ILogger.js';
import type { ProcessSnapshot } from '../process/types.js';
import type { CapabilityRouter } from '../routing/CapabilityRouter.js';
import { VarietyError, VarietyErrorCode } from '../utils/errors.js';
import type { ICapabilityAcquirer, StageUpdate } from './CapabilityAcquirer.js';
import { RetryBackoff } from './RetryBackoff.js';
import {
  GAP_SEVERITY_ORDER,
  type AcquisitionSnapshot,
  type GapSeverity,
  type IGapSource,
  type MonitorEvent,
  type MonitorEventListener,
  type VarietyGap,
} from './types.js';

export interface VarietyMonitorOptions {
  acquirer: ICapabilityAcquirer;
  router: CapabilityRouter;
  gapSources?: IGapSource[];
  config?: Partial<Pick<MonitorConfig, 'intervalMs' | 'historyLimit'>> & {
    backoff?: Partial<MonitorConfig['backoff']>;
  };
  logger?: ILogger;
}

export interface InjectGapResult {
  accepted: boolean;
  capabilities: string[];
  gap?: VarietyGap;
}

export interface TickReport {
  started: string[];
  skipped: Array<{ capability: string; reason: 'mapped' | 'in-flight' | 'backoff' | 'parked' }>;
}

interface Demand {
  severity: GapSeverity;
  source: string;
}

interface CapabilityRecord {
  snapshot: AcquisitionSnapshot;
  consecutiveFailures: number;
  nextEligibleAt: number;
  parked: boolean;
  failedPackages: Set<string>;
}

export class VarietyMonitor {
  private readonly emitter = new EventEmitter();
  private readonly acquirer: ICapabilityAcquirer;
  private readonly router: CapabilityRouter;
  private readonly gapSources: IGapSource[];
  private readonly config: Pick<MonitorConfig, 'intervalMs' | 'historyLimit'>;
  private readonly backoff: RetryBackoff;
  private readonly logger: ILogger;

  private readonly pendingDemand = new Map<string, Demand>();
  private readonly records = new Map<string, CapabilityRecord>();
  private readonly inFlight = new Map<string, Promise<void>>();
  private readonly scheduledTicks = new Set<Promise<void>>();
  private readonly history: AcquisitionSnapshot[] = [];
  private timer: ReturnType<typeof setInterval> | undefined;
  private stopped = false;

  constructor(options: VarietyMonitorOptions) {
    const defaults = DEFAULT_RUNTIME_CONFIG.monitor;
    const config = options.config ?? {};
    this.acquirer = options.acquirer;
    this.router = options.router;
    this.gapSources = [...(options.gapSources ?? [])];
    this.config = {
      intervalMs: config.intervalMs ?? defaults.intervalMs,
      historyLimit: config.historyLimit ?? defaults.historyLimit,
    };
    this.backoff = new RetryBackoff(config.backoff);
    this.logger = options.logger ?? createLogger('VarietyMonitor');
  }

  // ==========================================================================
  // EVENTS
  // ==========================================================================

  public on(listener: MonitorEventListener): void {
    this.emitter.on('event', listener);
  }

  public off(listener: MonitorEventListener): void {
    this.emitter.off('event', listener);
  }

  // ==========================================================================
  // LIFECYCLE
  // ==========================================================================

  public start(): void {
    if (this.timer) return;
    this.stopped = false;
    this.timer = setInterval(() => this.scheduleTick(), this.config.intervalMs);
    this.timer.unref();
    this.logger.info('Variety monitor started', { intervalMs: this.config.intervalMs });
    this.scheduleTick();
  }

  /** Halts ticking and waits for in-flight attempts to settle. */
  public async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    await this.whenIdle();
    this.logger.info('Variety monitor stopped');
  }

  public isRunning(): boolean {
    return this.timer !== undefined;
  }

  // ==========================================================================
  // GAPS
  // ==========================================================================

  /**
   * Records an externally observed gap and triggers an immediate tick.
   *
   * @throws {VarietyError} `INVALID_ARGUMENT` for an empty list or a
   *   malformed capability name.
   */
  public injectGap(
    requiredCapabilities: readonly string[],
    severity: GapSeverity = 'normal',
    source = 'injected',
  ): InjectGapResult {
    if (requiredCapabilities.length === 0) {
      throw new VarietyError('A gap needs at least one capability', VarietyErrorCode.INVALID_ARGUMENT, { source }, 'VarietyMonitor');
    }
    if (!(severity in GAP_SEVERITY_ORDER)) {
      throw new VarietyError(`Unknown severity '${String(severity)}'`, VarietyErrorCode.INVALID_ARGUMENT, { severity }, 'VarietyMonitor');
    }
    const capabilities = [...new Set(requiredCapabilities.map((c) => assertValidCapabilityName(c)))];
    if (this.stopped) {
      return { accepted: false, capabilities };
    }

    const gap: VarietyGap = Object.freeze({
      requiredCapabilities: Object.freeze([...capabilities]),
      severity,
      source,
      observedAt: new Date().toISOString(),
    });

    for (const capability of capabilities) {
      const record = this.records.get(capability);
      if (record) {
        record.consecutiveFailures = 0;
        record.nextEligibleAt = 0;
        record.parked = false;
        record.failedPackages.clear();
      }
      this.addDemand(capability, { severity, source });
    }

    this.emit({ type: 'gap:accepted', timestamp: gap.observedAt, gap });
    this.scheduleTick();
    return { accepted: true, capabilities, gap };
  }

  /**
   * Gathers demand and starts attempts. Resolves once attempts are started,
   * not when they finish.
   */
  public async tick(): Promise<TickReport> {
    const report: TickReport = { started: [], skipped: [] };
    if (this.stopped) return report;

    const computed = await this.observeSources();
    for (const gap of computed) {
      this.emit({ type: 'gap:accepted', timestamp: gap.observedAt, gap });
    }
    if (this.stopped) return report;

    const demand = new Map(this.pendingDemand);
    for (const gap of computed) {
      for (const capability of gap.requiredCapabilities) {
        mergeDemand(demand, capability, { severity: gap.severity, source: gap.source });
      }
    }

    const now = Date.now();
    for (const [capability, wanted] of demand) {
      if (this.router.has(capability)) {
        this.pendingDemand.delete(capability);
        report.skipped.push({ capability, reason: 'mapped' });
        continue;
      }
      if (this.inFlight.has(capability)) {
        report.skipped.push({ capability, reason: 'in-flight' });
        continue;
      }
      const record = this.records.get(capability);
      if (record?.parked) {
        report.skipped.push({ capability, reason: 'parked' });
        continue;
      }
      if (record && now < record.nextEligibleAt && wanted.severity !== 'critical') {
        report.skipped.push({ capability, reason: 'backoff' });
        continue;
      }
      this.startAttempt(capability, wanted);
      report.started.push(capability);
    }

    if (report.started.length > 0) {
      this.logger.debug('Tick started attempts', { started: report.started });
    }
    return report;
  }

  /**
   * Drops the mappings of an exited process. Its capabilities become eligible
   * again on the next tick that still requires them. Records still pointing
   * at the process are reset even when the router already unmapped them
   * after a failed invoke. `reason` replaces the exit description, e.g. when
   * the process was stopped for not answering pings.
   */
  public handleProcessExit(exited: ProcessSnapshot, reason?: string): string[] {
    const unmapped = this.router.invalidateProcess(exited.id);
    const lost = new Set(unmapped);
    for (const [capability, record] of this.records) {
      if (record.snapshot.stage === 'registered' && record.snapshot.processId === exited.id) lost.add(capability);
    }
    if (lost.size === 0) return [];

    const capabilities = [...lost].sort();
    const timestamp = new Date().toISOString();
    for (const capability of capabilities) {
      const record = this.records.get(capability);
      if (!record || record.snapshot.processId !== exited.id) continue;
      record.snapshot = {
        ...record.snapshot,
        stage: 'detected',
        updatedAt: timestamp,
        failure: {
          stage: 'detected',
          code: VarietyErrorCode.PROCESS_CRASHED,
          reason:
            reason ??
            `process ${exited.id} ${exited.status} (code ${String(exited.exitCode)}, signal ${String(exited.signal)})`,
        },
      };
    }
    this.emit({
      type: 'process:lost',
      timestamp,
      processId: exited.id,
      packageName: exited.packageName,
      status: exited.status,
      capabilities,
    });
    return capabilities;
  }

  // ==========================================================================
  // QUERIES
  // ==========================================================================

  public getStatus(capability: string): AcquisitionSnapshot | undefined {
    const record = this.records.get(capability.trim().toLowerCase());
    return record ? { ...record.snapshot } : undefined;
  }

  public listStatuses(): AcquisitionSnapshot[] {
    return [...this.records.values()].map((r) => ({ ...r.snapshot }));
  }

  /** Finished attempts, oldest first. */
  public getHistory(): AcquisitionSnapshot[] {
    return [...this.history];
  }

  public inFlightCapabilities(): string[] {
    return [...this.inFlight.keys()].sort();
  }

  /** Settles once every scheduled tick and every attempt it started has finished. */
  public async whenIdle(): Promise<void> {
    while (this.scheduledTicks.size > 0 || this.inFlight.size > 0) {
      await Promise.allSettled([...this.scheduledTicks, ...this.inFlight.values()]);
    }
  }

  // ==========================================================================
  // INTERNAL
  // ==========================================================================

  private scheduleTick(): void {
    const scheduled: Promise<void> = this.tick()
      .then(() => undefined)
      .catch((error: unknown) => {
        this.logger.error('Tick failed', { error });
      })
      .finally(() => {
        this.scheduledTicks.delete(scheduled);
      });
    this.scheduledTicks.add(scheduled);
  }

  private async observeSources(): Promise<VarietyGap[]> {
    const context = {
      mappedCapabilities: this.router.capabilities(),
      inFlightCapabilities: this.inFlightCapabilities(),
    };
    const gaps: VarietyGap[] = [];
    for (const source of this.gapSources) {
      try {
        for (const gap of await source.observe(context)) {
          const capabilities = gap.requiredCapabilities.map((c) => assertValidCapabilityName(c));
          if (capabilities.length > 0) gaps.push({ ...gap, requiredCapabilities: capabilities });
        }
      } catch (error) {
        this.logger.warn('Gap source failed; skipping', { source: source.name, error });
      }
    }
    return gaps;
  }

  private addDemand(capability: string, demand: Demand): void {
    mergeDemand(this.pendingDemand, capability, demand);
  }

  private startAttempt(capability: string, demand: Demand): void {
    const previous = this.records.get(capability);
    const now = new Date().toISOString();
    const record: CapabilityRecord = previous ?? {
      snapshot: {
        capability,
        stage: 'detected',
        attempt: 0,
        consecutiveFailures: 0,
        severity: demand.severity,
        gapSource: demand.source,
        startedAt: now,
        updatedAt: now,
      },
      consecutiveFailures: 0,
      nextEligibleAt: 0,
      parked: false,
      failedPackages: new Set(),
    };
    record.snapshot = {
      capability,
      stage: 'detected',
      attempt: record.snapshot.attempt + 1,
      consecutiveFailures: record.consecutiveFailures,
      severity: demand.severity,
      gapSource: demand.source,
      startedAt: now,
      updatedAt: now,
    };
    this.records.set(capability, record);
    this.emitStage(record);

    const attempt = this.acquirer
      .acquire({
        capability,
        excludePackages: new Set(record.failedPackages),
        onStage: (update) => this.applyStage(record, update),
      })
      .then((result) => {
        const finishedAt = new Date().toISOString();
        if (result.ok) {
          record.consecutiveFailures = 0;
          record.nextEligibleAt = 0;
          record.failedPackages.clear();
          record.snapshot = {
            ...record.snapshot,
            stage: 'registered',
            consecutiveFailures: 0,
            processId: result.processId,
            toolName: result.toolName,
            installDir: result.installed.installDir,
            updatedAt: finishedAt,
            finishedAt,
          };
          this.pendingDemand.delete(capability);
          this.finish(record);
          this.emit({ type: 'acquisition:registered', timestamp: finishedAt, capability, snapshot: { ...record.snapshot } });
          return;
        }

        record.consecutiveFailures += 1;
        if (result.candidate) record.failedPackages.add(result.candidate.packageName);
        record.parked = this.backoff.isParked(record.consecutiveFailures);
        const delay = this.backoff.delayFor(record.consecutiveFailures);
        record.nextEligibleAt = Date.now() + delay;
        if (record.parked) this.pendingDemand.delete(capability);

        record.snapshot = {
          ...record.snapshot,
          stage: 'failed',
          consecutiveFailures: record.consecutiveFailures,
          failure: result.failure,
          updatedAt: finishedAt,
          finishedAt,
          nextEligibleAt: record.parked ? undefined : new Date(record.nextEligibleAt).toISOString(),
          parked: record.parked,
        };
        this.finish(record);
        this.emit({
          type: 'acquisition:failed',
          timestamp: finishedAt,
          capability,
          failure: result.failure,
          snapshot: { ...record.snapshot },
        });
      })
      .catch((error: unknown) => {
        this.logger.error('Acquisition bookkeeping failed', { capability, error });
      })
      .finally(() => {
        this.inFlight.delete(capability);
      });

    this.inFlight.set(capability, attempt);
  }

  private applyStage(record: CapabilityRecord, update: StageUpdate): void {
    const snapshot: AcquisitionSnapshot = {
      ...record.snapshot,
      stage: update.stage,
      updatedAt: new Date().toISOString(),
    };
    if (update.candidatesConsidered !== undefined) snapshot.candidatesConsidered = update.candidatesConsidered;
    if (update.candidate) snapshot.candidate = update.candidate;
    if (update.installDir) snapshot.installDir = update.installDir;
    if (update.processId) snapshot.processId = update.processId;
    record.snapshot = snapshot;
    this.emitStage(record);
  }

  private finish(record: CapabilityRecord): void {
    if (this.config.historyLimit === 0) return;
    this.history.push({ ...record.snapshot });
    if (this.history.length > this.config.historyLimit) {
      this.history.splice(0, this.history.length - this.config.historyLimit);
    }
  }

  private emitStage(record: CapabilityRecord): void {
    this.emit({
      type: 'acquisition:stage',
      timestamp: record.snapshot.updatedAt,
      capability: record.snapshot.capability,
      stage: record.snapshot.stage,
      snapshot: { ...record.snapshot },
    });
  }

  private emit(event: MonitorEvent): void {
    try {
      this.emitter.emit('event', event);
    } catch (error) {
      this.logger.error('Monitor event listener threw', { type: event.type, error });
    }
  }
}

/** Keeps the strongest severity seen for a capability. */
function mergeDemand(target: Map<string, Demand>, capability: string, demand: Demand): void {
  const existing = target.get(capability);
  if (!existing || GAP_SEVERITY_ORDER[demand.severity] > GAP_SEVERITY_ORDER[existing.severity]) {
    target.set(capability, demand);
  }
}
