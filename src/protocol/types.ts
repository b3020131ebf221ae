/**
 * @fileoverview Wire and transport types for the line-delimited JSON-RPC 2.0
 * protocol spoken to plugin processes over stdio.
 */

// ============================================================================
// FRAMES
// ============================================================================

export type JsonRpcId = number | string;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: JsonRpcId;
  method: string;
  params?: unknown;
}

export interface JsonRpcNotification {
  jsonrpc: '2.0';
  method: string;
  params?: unknown;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccessResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: JsonRpcId | null;
  error: JsonRpcErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

/** A decoded inbound line, classified by shape. */
export type InboundFrame =
  | { kind: 'response'; frame: JsonRpcResponse }
  | { kind: 'request'; frame: JsonRpcRequest }
  | { kind: 'notification'; frame: JsonRpcNotification };

/** Standard JSON-RPC error codes used when answering server-initiated requests. */
export const JSON_RPC_METHOD_NOT_FOUND = -32601;

// ============================================================================
// TRANSPORT
// ============================================================================

/**
 * Byte-oriented duplex channel to one plugin process. Outgoing frames are
 * written as text; inbound chunks arrive in arbitrary splits and are re-framed
 * by the client.
 */
export interface ByteTransport {
  readonly isClosed: boolean;
  /** @throws when the transport is closed. */
  write(data: string): void;
  /** Subscribes to inbound chunks. Returns an unsubscribe function. */
  onData(listener: (chunk: string | Uint8Array) => void): () => void;
  /** Fires once when either side closes. Fires immediately if already closed. */
  onClose(listener: (reason: string) => void): () => void;
}

// ============================================================================
// MCP PAYLOADS
// ============================================================================

export interface ClientInfo {
  name: string;
  version: string;
}

export interface InitializeResult {
  protocolVersion: string;
  capabilities?: Record<string, unknown>;
  serverInfo?: { name: string; version?: string };
  instructions?: string;
}

export interface ToolDescriptor {
  name: string;
  description?: string;
  inputSchema?: Record<string, unknown>;
}

export type ProtocolClientState = 'new' | 'initializing' | 'ready' | 'failed' | 'closed';

export type NotificationListener = (notification: JsonRpcNotification) => void;
