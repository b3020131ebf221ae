/**
 * @fileoverview Capability → (process, tool) table and request routing.
 * @module variety-engine/routing/CapabilityRouter
 *
 * The router is the only writer of the mapping table. `register` is
 * synchronous so the very next `invoke` sees it. A mapping is only valid
 * while its process runs; losing the process drops every mapping that points
 * at it in one step.
 */

import { createLogger } from '../logging/loggerFactory.js';
import type { ILogger } from '../logging/ILogger.js';
import type { ToolDescriptor } from '../protocol/types.js';
import { assertValidCapabilityName } from '../discovery/packageNames.js';
import { VarietyError, VarietyErrorCode } from '../utils/errors.js';
import { selectTool } from './ToolSelector.js';

/** What the router needs from a protocol client. */
export interface ToolInvoker {
  isReady(): boolean;
  callTool(name: string, args: Record<string, unknown>, timeoutMs?: number): Promise<unknown>;
}

export interface CapabilityRoute {
  capability: string;
  processId: string;
  toolName: string;
  registeredAt: string;
}

export interface CapabilityRouterOptions {
  /** Liveness check against the supervisor. Defaults to "always running". */
  isProcessRunning?: (processId: string) => boolean;
  logger?: ILogger;
}

export class CapabilityRouter {
  private readonly routes = new Map<string, CapabilityRoute>();
  private readonly clients = new Map<string, ToolInvoker>();
  private readonly isProcessRunning: (processId: string) => boolean;
  private readonly logger: ILogger;

  constructor(options: CapabilityRouterOptions = {}) {
    this.isProcessRunning = options.isProcessRunning ?? (() => true);
    this.logger = options.logger ?? createLogger('CapabilityRouter');
  }

  // ==========================================================================
  // CLIENTS
  // ==========================================================================

  attachClient(processId: string, client: ToolInvoker): void {
    this.clients.set(processId, client);
  }

  /** Forgets the client of a process; its mappings are left untouched. */
  detachClient(processId: string): ToolInvoker | undefined {
    const client = this.clients.get(processId);
    this.clients.delete(processId);
    return client;
  }

  // ==========================================================================
  // MAPPINGS
  // ==========================================================================

  /** Maps `capability` to a tool of a process, replacing any earlier mapping. */
  register(capability: string, processId: string, toolName: string): CapabilityRoute {
    const name = assertValidCapabilityName(capability);
    const route: CapabilityRoute = {
      capability: name,
      processId,
      toolName,
      registeredAt: new Date().toISOString(),
    };
    this.routes.set(name, route);
    this.logger.info('Capability registered', { capability: name, processId, toolName });
    return route;
  }

  /**
   * Drops every mapping that points at `processId` and its client.
   * Returns the capabilities that were unmapped, sorted.
   */
  invalidateProcess(processId: string): string[] {
    const removed: string[] = [];
    for (const [capability, route] of this.routes) {
      if (route.processId === processId) {
        this.routes.delete(capability);
        removed.push(capability);
      }
    }
    this.clients.delete(processId);
    if (removed.length > 0) {
      this.logger.warn('Process invalidated; capabilities unmapped', { processId, capabilities: removed });
    }
    return removed.sort();
  }

  resolve(capability: string): CapabilityRoute | undefined {
    return this.routes.get(capability.trim().toLowerCase());
  }

  has(capability: string): boolean {
    return this.resolve(capability) !== undefined;
  }

  list(): CapabilityRoute[] {
    return [...this.routes.values()].sort((a, b) => (a.capability < b.capability ? -1 : 1));
  }

  /** Mapped capability names, sorted. */
  capabilities(): string[] {
    return this.list().map((r) => r.capability);
  }

  selectTool(capability: string, tools: readonly ToolDescriptor[]): ToolDescriptor {
    return selectTool(capability, tools);
  }

  // ==========================================================================
  // INVOCATION
  // ==========================================================================

  /**
   * Calls the tool mapped to `capability` and returns its result verbatim.
   *
   * @throws {VarietyError} `UNKNOWN_CAPABILITY` when nothing is mapped,
   *   `PROCESS_UNAVAILABLE` when the process is gone (its mappings are dropped
   *   first), and `REMOTE_ERROR` / `REQUEST_TIMEOUT` passed through with the
   *   mapping kept.
   */
  async invoke(capability: string, args: Record<string, unknown> = {}, timeoutMs?: number): Promise<unknown> {
    const route = this.resolve(capability);
    if (!route) {
      throw new VarietyError(
        `No process provides capability '${capability}'`,
        VarietyErrorCode.UNKNOWN_CAPABILITY,
        { capability },
        'CapabilityRouter',
      );
    }

    const client = this.clients.get(route.processId);
    if (!client || !client.isReady() || !this.isProcessRunning(route.processId)) {
      throw this.unavailable(route, 'process is not running');
    }

    try {
      return await client.callTool(route.toolName, args, timeoutMs);
    } catch (error) {
      if (VarietyError.hasCode(error, VarietyErrorCode.TRANSPORT_CLOSED)) {
        throw this.unavailable(route, 'transport closed', error);
      }
      throw error;
    }
  }

  private unavailable(route: CapabilityRoute, reason: string, cause?: unknown): VarietyError {
    const unmapped = this.invalidateProcess(route.processId);
    return new VarietyError(
      `Capability '${route.capability}' is unavailable: ${reason}`,
      VarietyErrorCode.PROCESS_UNAVAILABLE,
      { capability: route.capability, processId: route.processId, unmapped },
      'CapabilityRouter',
      cause,
    );
  }
}
