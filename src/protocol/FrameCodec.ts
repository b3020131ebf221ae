/**
 * @fileoverview Encoding and validation of JSON-RPC frames.
 *
 * Inbound lines are parsed and checked against ajv schemas; anything that is
 * not a well-formed response, request or notification is reported as a
 * decode failure so the client can drop it without disturbing other traffic.
 */

import { compileSchema } from '../utils/schema.js';
import type {
  InboundFrame,
  JsonRpcErrorResponse,
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcSuccessResponse,
} from './types.js';

const idSchema = { type: ['integer', 'string'] };

const successSchema = {
  type: 'object',
  required: ['jsonrpc', 'id', 'result'],
  properties: {
    jsonrpc: { const: '2.0' },
    id: idSchema,
  },
  not: { required: ['error'] },
};

const errorResponseSchema = {
  type: 'object',
  required: ['jsonrpc', 'id', 'error'],
  properties: {
    jsonrpc: { const: '2.0' },
    id: { type: ['integer', 'string', 'null'] },
    error: {
      type: 'object',
      required: ['code', 'message'],
      properties: {
        code: { type: 'integer' },
        message: { type: 'string' },
      },
    },
  },
  not: { required: ['result'] },
};

const requestSchema = {
  type: 'object',
  required: ['jsonrpc', 'id', 'method'],
  properties: {
    jsonrpc: { const: '2.0' },
    id: idSchema,
    method: { type: 'string', minLength: 1 },
  },
};

const notificationSchema = {
  type: 'object',
  required: ['jsonrpc', 'method'],
  properties: {
    jsonrpc: { const: '2.0' },
    method: { type: 'string', minLength: 1 },
  },
  not: { required: ['id'] },
};

const isSuccess = compileSchema<JsonRpcSuccessResponse>(successSchema);
const isErrorResponse = compileSchema<JsonRpcErrorResponse>(errorResponseSchema);
const isRequest = compileSchema<JsonRpcRequest>(requestSchema);
const isNotification = compileSchema<JsonRpcNotification>(notificationSchema);

export type DecodeResult =
  | { ok: true; frame: InboundFrame }
  | { ok: false; reason: 'invalid_json' | 'invalid_frame'; line: string };

export function decodeFrame(line: string): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return { ok: false, reason: 'invalid_json', line };
  }

  if (isSuccess(parsed)) return { ok: true, frame: { kind: 'response', frame: parsed } };
  if (isErrorResponse(parsed)) return { ok: true, frame: { kind: 'response', frame: parsed } };
  if (isRequest(parsed)) return { ok: true, frame: { kind: 'request', frame: parsed } };
  if (isNotification(parsed)) return { ok: true, frame: { kind: 'notification', frame: parsed } };
  return { ok: false, reason: 'invalid_frame', line };
}

/** Serialises one outgoing frame as a single line. */
export function encodeFrame(
  frame: JsonRpcRequest | JsonRpcNotification | JsonRpcSuccessResponse | JsonRpcErrorResponse,
): string {
  return `${JSON.stringify(frame)}\n`;
}
