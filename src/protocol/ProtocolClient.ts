/**
 * @fileoverview JSON-RPC client for one plugin transport.
 * @module variety-engine/protocol/ProtocolClient
 *
 * Owns the PendingRequest table of its transport:
 *   call() → id allocated → frame written → wait for matching id | deadline | close
 *
 * Ids are monotonically increasing integers scoped to the client and never
 * reused. Responses are matched strictly by id, so out-of-order replies are
 * fine and a reply for an id that already timed out is dropped.
 */

import { createLogger } from '../logging/loggerFactory.js';
import type { ILogger } from '../logging/ILogger.js';
import { VarietyError, VarietyErrorCode } from '../utils/errors.js';
import { compileSchema, formatSchemaErrors } from '../utils/schema.js';
import { decodeFrame, encodeFrame } from './FrameCodec.js';
import { LineFramer } from './LineFramer.js';
import type {
  ByteTransport,
  ClientInfo,
  InitializeResult,
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcResponse,
  NotificationListener,
  ProtocolClientState,
  ToolDescriptor,
} from './types.js';
import { JSON_RPC_METHOD_NOT_FOUND } from './types.js';

// ============================================================================
// OPTIONS
// ============================================================================

export interface ProtocolClientOptions {
  /** Timeout used when `call()` is given none. @default 30000 */
  defaultTimeoutMs?: number;
  /** @default 15000 */
  handshakeTimeoutMs?: number;
  /** @default '2024-11-05' */
  protocolVersion?: string;
  clientInfo?: ClientInfo;
  /** Used in log lines and error details, usually the process id. */
  label?: string;
  logger?: ILogger;
  /** Upper bound on `tools/list` pagination. @default 20 */
  maxToolPages?: number;
}

const DEFAULT_OPTIONS = {
  defaultTimeoutMs: 30_000,
  handshakeTimeoutMs: 15_000,
  protocolVersion: '2024-11-05',
  clientInfo: { name: 'variety-engine', version: '0.1.0' },
  label: 'transport',
  maxToolPages: 20,
};

interface PendingRequest {
  id: number;
  method: string;
  deadline: number;
  timer: ReturnType<typeof setTimeout>;
  resolve: (result: unknown) => void;
  reject: (error: VarietyError) => void;
}

const initializeResultSchema = {
  type: 'object',
  required: ['protocolVersion'],
  properties: {
    protocolVersion: { type: 'string' },
    capabilities: { type: 'object' },
    serverInfo: {
      type: 'object',
      required: ['name'],
      properties: { name: { type: 'string' }, version: { type: 'string' } },
    },
    instructions: { type: 'string' },
  },
};

interface ToolsListPage {
  tools: ToolDescriptor[];
  nextCursor?: string;
}

const toolsListSchema = {
  type: 'object',
  required: ['tools'],
  properties: {
    tools: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name'],
        properties: {
          name: { type: 'string', minLength: 1 },
          description: { type: 'string' },
          inputSchema: { type: 'object' },
        },
      },
    },
    nextCursor: { type: 'string' },
  },
};

const isInitializeResult = compileSchema<InitializeResult>(initializeResultSchema);
const isToolsListPage = compileSchema<ToolsListPage>(toolsListSchema);

// ============================================================================
// CLIENT
// ============================================================================

export class ProtocolClient {
  private readonly options: typeof DEFAULT_OPTIONS;
  private readonly logger: ILogger;
  private readonly framer = new LineFramer();
  private readonly pending = new Map<number, PendingRequest>();
  private readonly notificationListeners = new Set<NotificationListener>();
  private readonly detachers: Array<() => void> = [];
  private nextId = 1;
  private state: ProtocolClientState = 'new';
  private closeReason: string | undefined;
  private serverInfo: InitializeResult | undefined;

  constructor(
    private readonly transport: ByteTransport,
    options: ProtocolClientOptions = {},
  ) {
    this.options = {
      defaultTimeoutMs: options.defaultTimeoutMs ?? DEFAULT_OPTIONS.defaultTimeoutMs,
      handshakeTimeoutMs: options.handshakeTimeoutMs ?? DEFAULT_OPTIONS.handshakeTimeoutMs,
      protocolVersion: options.protocolVersion ?? DEFAULT_OPTIONS.protocolVersion,
      clientInfo: options.clientInfo ?? DEFAULT_OPTIONS.clientInfo,
      label: options.label ?? DEFAULT_OPTIONS.label,
      maxToolPages: options.maxToolPages ?? DEFAULT_OPTIONS.maxToolPages,
    };
    this.logger = options.logger ?? createLogger('ProtocolClient', { transport: this.options.label });

    this.detachers.push(transport.onData((chunk) => this.handleChunk(chunk)));
    this.detachers.push(transport.onClose((reason) => this.handleTransportClosed(reason)));
  }

  // ==========================================================================
  // HANDSHAKE
  // ==========================================================================

  /**
   * Performs the one-time `initialize` exchange followed by the
   * `notifications/initialized` notification.
   *
   * @throws {VarietyError} `PROTOCOL_ALREADY_INITIALIZED` on a second call,
   *   `TRANSPORT_CLOSED` if the transport is gone, `HANDSHAKE_FAILED` otherwise.
   */
  async initialize(): Promise<InitializeResult> {
    if (this.state === 'closed') {
      throw this.closedError('initialize');
    }
    if (this.state !== 'new') {
      throw new VarietyError(
        `initialize() already called on ${this.options.label} (state: ${this.state})`,
        VarietyErrorCode.PROTOCOL_ALREADY_INITIALIZED,
        { state: this.state },
        'ProtocolClient',
      );
    }
    this.state = 'initializing';

    let raw: unknown;
    try {
      raw = await this.request(
        'initialize',
        {
          protocolVersion: this.options.protocolVersion,
          capabilities: {},
          clientInfo: this.options.clientInfo,
        },
        this.options.handshakeTimeoutMs,
      );
    } catch (error) {
      if (this.state === 'initializing') this.state = 'failed';
      throw this.handshakeError(error);
    }
    // The transport can close between the response and this continuation.
    if (this.getState() !== 'initializing') {
      throw this.handshakeError(this.closedError('initialize'));
    }

    if (!isInitializeResult(raw)) {
      this.state = 'failed';
      throw new VarietyError(
        `Invalid initialize result from ${this.options.label}: ${formatSchemaErrors(isInitializeResult.errors)}`,
        VarietyErrorCode.HANDSHAKE_FAILED,
        { result: raw },
        'ProtocolClient',
      );
    }

    this.serverInfo = raw;
    this.state = 'ready';
    this.notify('notifications/initialized');
    this.logger.debug('Handshake complete', {
      protocolVersion: raw.protocolVersion,
      server: raw.serverInfo?.name,
    });
    return raw;
  }

  // ==========================================================================
  // CALLS
  // ==========================================================================

  /**
   * Places a correlated call. Resolves with the raw `result` of the response.
   *
   * @throws {VarietyError} `PROTOCOL_NOT_INITIALIZED`, `REQUEST_TIMEOUT`,
   *   `TRANSPORT_CLOSED` or `REMOTE_ERROR` (remote code/message/data in details).
   */
  async call(method: string, params?: unknown, timeoutMs?: number): Promise<unknown> {
    this.assertReady(method);
    return this.request(method, params, timeoutMs ?? this.options.defaultTimeoutMs);
  }

  /** Fire-and-forget; no pending entry is created. */
  notify(method: string, params?: unknown): void {
    this.assertReady(method);
    const frame: JsonRpcNotification = { jsonrpc: '2.0', method };
    if (params !== undefined) frame.params = params;
    try {
      this.transport.write(encodeFrame(frame));
    } catch (error) {
      throw new VarietyError(
        `Failed to write ${method} to ${this.options.label}`,
        VarietyErrorCode.TRANSPORT_CLOSED,
        { method },
        'ProtocolClient',
        error,
      );
    }
  }

  /** Lists every tool the server exposes, following `nextCursor` pagination. */
  async listTools(timeoutMs?: number): Promise<ToolDescriptor[]> {
    const tools: ToolDescriptor[] = [];
    let cursor: string | undefined;
    for (let page = 0; page < this.options.maxToolPages; page++) {
      const raw = await this.call('tools/list', cursor ? { cursor } : {}, timeoutMs);
      if (!isToolsListPage(raw)) {
        throw new VarietyError(
          `Malformed tools/list result from ${this.options.label}: ${formatSchemaErrors(isToolsListPage.errors)}`,
          VarietyErrorCode.HANDSHAKE_FAILED,
          { result: raw },
          'ProtocolClient',
        );
      }
      tools.push(...raw.tools);
      if (!raw.nextCursor) break;
      cursor = raw.nextCursor;
    }
    return tools;
  }

  /** Sends `ping`; resolves once the server answered. */
  async ping(timeoutMs?: number): Promise<void> {
    await this.call('ping', {}, timeoutMs);
  }

  /** Invokes `tools/call`; the result payload is returned verbatim. */
  async callTool(name: string, args: Record<string, unknown>, timeoutMs?: number): Promise<unknown> {
    return this.call('tools/call', { name, arguments: args }, timeoutMs);
  }

  onNotification(listener: NotificationListener): () => void {
    this.notificationListeners.add(listener);
    return () => {
      this.notificationListeners.delete(listener);
    };
  }

  /**
   * Detaches from the transport and fails every outstanding call with
   * `TRANSPORT_CLOSED`. Does not terminate the process behind the transport.
   */
  close(reason = 'client closed'): void {
    if (this.state === 'closed') return;
    this.state = 'closed';
    this.closeReason = reason;
    for (const detach of this.detachers.splice(0)) detach();
    this.rejectAllPending(reason);
    this.framer.reset();
  }

  // ==========================================================================
  // ACCESSORS
  // ==========================================================================

  getState(): ProtocolClientState {
    return this.state;
  }

  isReady(): boolean {
    return this.state === 'ready';
  }

  getServerInfo(): InitializeResult | undefined {
    return this.serverInfo;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /** Snapshot of outstanding calls, oldest first. */
  listPending(): Array<{ id: number; method: string; deadline: number }> {
    return [...this.pending.values()].map(({ id, method, deadline }) => ({ id, method, deadline }));
  }

  // ==========================================================================
  // INTERNAL
  // ==========================================================================

  private request(method: string, params: unknown, timeoutMs: number): Promise<unknown> {
    if (this.state === 'closed' || this.transport.isClosed) {
      return Promise.reject(this.closedError(method));
    }

    const id = this.nextId++;
    const frame: JsonRpcRequest = { jsonrpc: '2.0', id, method };
    if (params !== undefined) frame.params = params;

    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (!this.pending.delete(id)) return;
        this.logger.warn('Request timed out', { id, method, timeoutMs });
        reject(
          new VarietyError(
            `${method} on ${this.options.label} timed out after ${timeoutMs}ms`,
            VarietyErrorCode.REQUEST_TIMEOUT,
            { id, method, timeoutMs },
            'ProtocolClient',
          ),
        );
      }, timeoutMs);

      this.pending.set(id, {
        id,
        method,
        deadline: Date.now() + timeoutMs,
        timer,
        resolve,
        reject,
      });

      try {
        this.transport.write(encodeFrame(frame));
      } catch (error) {
        clearTimeout(timer);
        this.pending.delete(id);
        reject(
          new VarietyError(
            `Failed to write ${method} to ${this.options.label}`,
            VarietyErrorCode.TRANSPORT_CLOSED,
            { id, method },
            'ProtocolClient',
            error,
          ),
        );
      }
    });
  }

  private handleChunk(chunk: string | Uint8Array): void {
    const { lines, discarded } = this.framer.push(chunk);
    if (discarded > 0) {
      this.logger.warn('Discarded oversized inbound line', { discarded });
    }
    for (const line of lines) {
      this.handleLine(line);
    }
  }

  private handleLine(line: string): void {
    const decoded = decodeFrame(line);
    if (!decoded.ok) {
      this.logger.debug('Dropping undecodable line', {
        reason: decoded.reason,
        line: line.slice(0, 200),
      });
      return;
    }

    const inbound = decoded.frame;
    switch (inbound.kind) {
      case 'response':
        this.handleResponse(inbound.frame);
        return;
      case 'notification':
        this.dispatchNotification(inbound.frame);
        return;
      case 'request':
        this.answerServerRequest(inbound.frame);
        return;
    }
  }

  private handleResponse(response: JsonRpcResponse): void {
    const id = response.id;
    const pending = typeof id === 'number' ? this.pending.get(id) : undefined;
    if (!pending) {
      this.logger.debug('Dropping response without a pending request', { id });
      return;
    }

    clearTimeout(pending.timer);
    this.pending.delete(pending.id);

    if ('error' in response) {
      pending.reject(
        new VarietyError(
          `Remote error for ${pending.method}: ${response.error.message}`,
          VarietyErrorCode.REMOTE_ERROR,
          {
            id: pending.id,
            method: pending.method,
            remoteCode: response.error.code,
            remoteMessage: response.error.message,
            remoteData: response.error.data,
          },
          'ProtocolClient',
        ),
      );
      return;
    }
    pending.resolve(response.result);
  }

  private dispatchNotification(notification: JsonRpcNotification): void {
    for (const listener of this.notificationListeners) {
      try {
        listener(notification);
      } catch (error) {
        this.logger.error('Notification listener threw', { method: notification.method, error });
      }
    }
  }

  private answerServerRequest(request: JsonRpcRequest): void {
    if (this.transport.isClosed) return;
    const reply =
      request.method === 'ping'
        ? encodeFrame({ jsonrpc: '2.0', id: request.id, result: {} })
        : encodeFrame({
            jsonrpc: '2.0',
            id: request.id,
            error: { code: JSON_RPC_METHOD_NOT_FOUND, message: `Method not found: ${request.method}` },
          });
    try {
      this.transport.write(reply);
    } catch (error) {
      this.logger.warn('Could not answer server request', { method: request.method, error });
    }
  }

  private handleTransportClosed(reason: string): void {
    if (this.state === 'closed') return;
    this.logger.debug('Transport closed', { reason, pending: this.pending.size });
    this.close(reason);
  }

  private rejectAllPending(reason: string): void {
    const entries = [...this.pending.values()];
    this.pending.clear();
    for (const entry of entries) {
      clearTimeout(entry.timer);
      entry.reject(
        new VarietyError(
          `Transport ${this.options.label} closed while ${entry.method} was pending: ${reason}`,
          VarietyErrorCode.TRANSPORT_CLOSED,
          { id: entry.id, method: entry.method, reason },
          'ProtocolClient',
        ),
      );
    }
  }

  private assertReady(method: string): void {
    if (this.state === 'ready') return;
    if (this.state === 'closed') throw this.closedError(method);
    throw new VarietyError(
      `Cannot send ${method} before the handshake completed (state: ${this.state})`,
      VarietyErrorCode.PROTOCOL_NOT_INITIALIZED,
      { method, state: this.state },
      'ProtocolClient',
    );
  }

  private closedError(method: string): VarietyError {
    return new VarietyError(
      `Transport ${this.options.label} is closed`,
      VarietyErrorCode.TRANSPORT_CLOSED,
      { method, reason: this.closeReason },
      'ProtocolClient',
    );
  }

  private handshakeError(error: unknown): VarietyError {
    if (VarietyError.hasCode(error, VarietyErrorCode.TRANSPORT_CLOSED)) {
      return new VarietyError(
        `Handshake with ${this.options.label} failed: transport closed`,
        VarietyErrorCode.HANDSHAKE_FAILED,
        { reason: error.details?.reason },
        'ProtocolClient',
        error,
      );
    }
    return VarietyError.hasCode(error, VarietyErrorCode.HANDSHAKE_FAILED)
      ? error
      : new VarietyError(
          `Handshake with ${this.options.label} failed`,
          VarietyErrorCode.HANDSHAKE_FAILED,
          { causeCode: error instanceof VarietyError ? error.code : undefined },
          'ProtocolClient',
          error,
        );
  }
}
