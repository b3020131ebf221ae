/**
 * @fileoverview Protocol client barrel exports.
 * @module variety-engine/protocol
 */

export type {
  ByteTransport,
  ClientInfo,
  InboundFrame,
  InitializeResult,
  JsonRpcErrorObject,
  JsonRpcErrorResponse,
  JsonRpcId,
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcResponse,
  JsonRpcSuccessResponse,
  NotificationListener,
  ProtocolClientState,
  ToolDescriptor,
} from './types.js';
export { JSON_RPC_METHOD_NOT_FOUND } from './types.js';

export { ProtocolClient, type ProtocolClientOptions } from './ProtocolClient.js';
export { LineFramer, DEFAULT_MAX_LINE_LENGTH, type FramerPushResult } from './LineFramer.js';
export { decodeFrame, encodeFrame, type DecodeResult } from './FrameCodec.js';
export { InMemoryTransport } from './InMemoryTransport.js';
