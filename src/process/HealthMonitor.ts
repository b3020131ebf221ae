/**
 * @fileoverview Periodic `ping` checks of registered plugin processes.
 * @module variety-engine/process/HealthMonitor
 *
 * Exit watching only catches processes that die. A process that stays alive
 * but stops answering is caught here: every `intervalMs` each watched process
 * is pinged with a `timeoutMs` deadline, and after `maxFailures` consecutive
 * failed pings it is reported unhealthy and no longer watched. What happens
 * to an unhealthy process is up to the `onUnhealthy` handler.
 *
 * A JSON-RPC error reply still counts as healthy: the server answered.
 */

import { EventEmitter } from 'node:events';

import type { HealthConfig } from '../config/RuntimeConfig.js';
import { DEFAULT_RUNTIME_CONFIG } from '../config/RuntimeConfig.js';
import { createLogger } from '../logging/loggerFactory.js';
import type { ILogger } from '../logging/ILogger.js';
import { VarietyError, VarietyErrorCode, describeError } from '../utils/errors.js';

/** What a watched process must answer. `ProtocolClient` satisfies it. */
export interface PingTarget {
  ping(timeoutMs?: number): Promise<void>;
}

export interface HealthStatus {
  processId: string;
  healthy: boolean;
  consecutiveFailures: number;
  lastCheckedAt?: string;
  lastError?: string;
}

export interface HealthCheckFailedEvent {
  type: 'health:check-failed';
  timestamp: string;
  processId: string;
  consecutiveFailures: number;
  reason: string;
}

export interface ProcessUnhealthyEvent {
  type: 'health:unhealthy';
  timestamp: string;
  processId: string;
  consecutiveFailures: number;
  reason: string;
}

export type HealthEvent = HealthCheckFailedEvent | ProcessUnhealthyEvent;
export type HealthEventListener = (event: HealthEvent) => void;

export interface HealthMonitorOptions {
  config?: Partial<Omit<HealthConfig, 'enabled'>>;
  onUnhealthy?: (processId: string, reason: string) => Promise<void> | void;
  logger?: ILogger;
}

interface Watched {
  target: PingTarget;
  status: HealthStatus;
  checking?: Promise<HealthStatus>;
}

export class HealthMonitor {
  private readonly emitter = new EventEmitter();
  private readonly watched = new Map<string, Watched>();
  private readonly config: Omit<HealthConfig, 'enabled'>;
  private readonly onUnhealthy: HealthMonitorOptions['onUnhealthy'];
  private readonly logger: ILogger;
  private timer: ReturnType<typeof setInterval> | undefined;

  constructor(options: HealthMonitorOptions = {}) {
    const defaults = DEFAULT_RUNTIME_CONFIG.health;
    const config = options.config ?? {};
    this.config = {
      intervalMs: config.intervalMs ?? defaults.intervalMs,
      timeoutMs: config.timeoutMs ?? defaults.timeoutMs,
      maxFailures: config.maxFailures ?? defaults.maxFailures,
    };
    this.onUnhealthy = options.onUnhealthy;
    this.logger = options.logger ?? createLogger('HealthMonitor');
  }

  public on(listener: HealthEventListener): void {
    this.emitter.on('event', listener);
  }

  public off(listener: HealthEventListener): void {
    this.emitter.off('event', listener);
  }

  // ==========================================================================
  // LIFECYCLE
  // ==========================================================================

  public start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.checkAll();
    }, this.config.intervalMs);
    this.timer.unref();
  }

  public stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
  }

  public isRunning(): boolean {
    return this.timer !== undefined;
  }

  // ==========================================================================
  // WATCH LIST
  // ==========================================================================

  /** Starts watching a process with a clean failure count. A new target restarts the count. */
  public watch(processId: string, target: PingTarget): void {
    if (this.watched.get(processId)?.target === target) return;
    this.watched.set(processId, {
      target,
      status: { processId, healthy: true, consecutiveFailures: 0 },
    });
  }

  public unwatch(processId: string): boolean {
    return this.watched.delete(processId);
  }

  public getStatus(processId: string): HealthStatus | undefined {
    const entry = this.watched.get(processId);
    return entry ? { ...entry.status } : undefined;
  }

  public listStatuses(): HealthStatus[] {
    return [...this.watched.values()].map((w) => ({ ...w.status }));
  }

  // ==========================================================================
  // CHECKS
  // ==========================================================================

  /** Pings every watched process once. A check still running is joined, not repeated. */
  public async checkAll(): Promise<HealthStatus[]> {
    return Promise.all([...this.watched.keys()].map((id) => this.check(id)));
  }

  /**
   * @throws {VarietyError} `INVALID_ARGUMENT` when the process is not watched.
   */
  public async check(processId: string): Promise<HealthStatus> {
    const entry = this.watched.get(processId);
    if (!entry) {
      throw new VarietyError(
        `Process ${processId} is not watched`,
        VarietyErrorCode.INVALID_ARGUMENT,
        { processId },
        'HealthMonitor',
      );
    }
    if (!entry.checking) {
      entry.checking = this.runCheck(processId, entry).finally(() => {
        entry.checking = undefined;
      });
    }
    return entry.checking;
  }

  private async runCheck(processId: string, entry: Watched): Promise<HealthStatus> {
    let failure: string | undefined;
    try {
      await entry.target.ping(this.config.timeoutMs);
    } catch (error) {
      if (!VarietyError.hasCode(error, VarietyErrorCode.REMOTE_ERROR)) failure = describeError(error);
    }

    const timestamp = new Date().toISOString();
    // Unwatched (or re-watched) while the ping was in flight.
    if (this.watched.get(processId) !== entry) {
      return { ...entry.status, lastCheckedAt: timestamp };
    }

    if (failure === undefined) {
      entry.status = { processId, healthy: true, consecutiveFailures: 0, lastCheckedAt: timestamp };
      return { ...entry.status };
    }

    const consecutiveFailures = entry.status.consecutiveFailures + 1;
    const unhealthy = consecutiveFailures >= this.config.maxFailures;
    entry.status = {
      processId,
      healthy: !unhealthy,
      consecutiveFailures,
      lastCheckedAt: timestamp,
      lastError: failure,
    };
    this.logger.warn('Health check failed', { processId, consecutiveFailures, reason: failure });
    this.emit({ type: 'health:check-failed', timestamp, processId, consecutiveFailures, reason: failure });

    if (unhealthy) {
      this.watched.delete(processId);
      const reason = `no answer to ${consecutiveFailures} consecutive pings (last: ${failure})`;
      this.emit({ type: 'health:unhealthy', timestamp, processId, consecutiveFailures, reason });
      try {
        await this.onUnhealthy?.(processId, reason);
      } catch (error) {
        this.logger.error('Unhealthy-process handler failed', { processId, error });
      }
    }
    return { ...entry.status };
  }

  private emit(event: HealthEvent): void {
    try {
      this.emitter.emit('event', event);
    } catch (error) {
      this.logger.error('Health event listener threw', { type: event.type, error });
    }
  }
}
