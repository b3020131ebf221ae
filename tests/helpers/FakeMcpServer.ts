/**
 * @file FakeMcpServer.ts
 * @description Scripted plugin server on the far end of an InMemoryTransport pair.
 */

import { decodeFrame, encodeFrame } from '../../src/protocol/FrameCodec.js';
import { InMemoryTransport } from '../../src/protocol/InMemoryTransport.js';
import { LineFramer } from '../../src/protocol/LineFramer.js';
import type { JsonRpcId, JsonRpcNotification, JsonRpcRequest, JsonRpcResponse, ToolDescriptor } from '../../src/protocol/types.js';

/** Returning `undefined` leaves the request unanswered until the test replies. */
export type RequestHandler = (request: JsonRpcRequest) => { result: unknown } | { error: { code: number; message: string; data?: unknown } } | undefined;

export const DEFAULT_TOOLS: ToolDescriptor[] = [
  { name: 'read_graph', description: 'Read the knowledge graph memory' },
  { name: 'echo', description: 'Echo the arguments back' },
];

export class FakeMcpServer {
  readonly clientEnd: InMemoryTransport;
  readonly serverEnd: InMemoryTransport;
  readonly requests: JsonRpcRequest[] = [];
  readonly notifications: JsonRpcNotification[] = [];
  readonly responses: JsonRpcResponse[] = [];

  private readonly framer = new LineFramer();
  private readonly handlers = new Map<string, RequestHandler>();
  private waiters: Array<() => boolean> = [];

  constructor(tools: ToolDescriptor[] = DEFAULT_TOOLS) {
    const [clientEnd, serverEnd] = InMemoryTransport.pair();
    this.clientEnd = clientEnd;
    this.serverEnd = serverEnd;

    this.handle('initialize', (request) => ({
      result: {
        protocolVersion: readProtocolVersion(request.params),
        capabilities: { tools: {} },
        serverInfo: { name: 'fake-server', version: '1.0.0' },
      },
    }));
    this.handle('ping', () => ({ result: {} }));
    this.handle('tools/list', () => ({ result: { tools } }));
    this.handle('tools/call', (request) => ({
      result: { content: [{ type: 'text', text: JSON.stringify(request.params) }] },
    }));

    this.serverEnd.onData((chunk) => {
      for (const line of this.framer.push(chunk).lines) this.receive(line);
    });
  }

  handle(method: string, handler: RequestHandler): this {
    this.handlers.set(method, handler);
    return this;
  }

  /** Leaves every request for `method` unanswered. */
  hold(method: string): this {
    return this.handle(method, () => undefined);
  }

  reply(id: JsonRpcId, result: unknown): void {
    this.serverEnd.write(encodeFrame({ jsonrpc: '2.0', id, result }));
  }

  replyError(id: JsonRpcId, code: number, message: string, data?: unknown): void {
    this.serverEnd.write(encodeFrame({ jsonrpc: '2.0', id, error: { code, message, data } }));
  }

  notify(method: string, params?: unknown): void {
    this.serverEnd.write(encodeFrame({ jsonrpc: '2.0', method, params }));
  }

  /** Sends a server-initiated request to the client. */
  request(id: JsonRpcId, method: string): void {
    this.serverEnd.write(encodeFrame({ jsonrpc: '2.0', id, method }));
  }

  writeRaw(text: string): void {
    this.serverEnd.write(text);
  }

  /** Resolves with the `nth` request for `method`, waiting for it if needed. */
  nextRequest(method: string, nth = 0): Promise<JsonRpcRequest> {
    return new Promise((resolve) => {
      const check = (): boolean => {
        const match = this.requests.filter((r) => r.method === method)[nth];
        if (match) resolve(match);
        return match !== undefined;
      };
      if (!check()) this.waiters.push(check);
    });
  }

  close(reason = 'server closed'): void {
    this.serverEnd.close(reason);
  }

  private receive(line: string): void {
    const decoded = decodeFrame(line);
    if (!decoded.ok) return;
    const inbound = decoded.frame;
    if (inbound.kind === 'notification') {
      this.notifications.push(inbound.frame);
      return;
    }
    if (inbound.kind === 'response') {
      this.responses.push(inbound.frame);
      return;
    }

    const request = inbound.frame;
    this.requests.push(request);
    this.waiters = this.waiters.filter((check) => !check());

    const handler = this.handlers.get(request.method);
    if (!handler) {
      this.replyError(request.id, -32601, `Method not found: ${request.method}`);
      return;
    }
    const outcome = handler(request);
    if (!outcome) return;
    if ('error' in outcome) {
      this.replyError(request.id, outcome.error.code, outcome.error.message, outcome.error.data);
    } else {
      this.reply(request.id, outcome.result);
    }
  }
}

function readProtocolVersion(params: unknown): string {
  if (typeof params === 'object' && params !== null && 'protocolVersion' in params) {
    const { protocolVersion } = params;
    if (typeof protocolVersion === 'string') return protocolVersion;
  }
  return '2024-11-05';
}
