/**
 * @file LineFramer.spec.ts
 * @description Unit tests for newline re-framing of inbound chunks
 */

import { describe, it, expect } from 'vitest';
import { LineFramer } from '../../src/protocol/LineFramer.js';
import { decodeFrame, encodeFrame } from '../../src/protocol/FrameCodec.js';

describe('LineFramer', () => {
  it('returns complete lines and buffers the remainder', () => {
    const framer = new LineFramer();

    expect(framer.push('{"a":1}\n{"b"')).toEqual({ lines: ['{"a":1}'], discarded: 0 });
    expect(framer.pendingLength).toBe(4);
    expect(framer.push(':2}\n')).toEqual({ lines: ['{"b":2}'], discarded: 0 });
    expect(framer.pendingLength).toBe(0);
  });

  it('strips carriage returns and skips blank lines', () => {
    const framer = new LineFramer();
    expect(framer.push('one\r\n\n   \ntwo\n').lines).toEqual(['one', 'two']);
  });

  it('decodes multi-byte characters split across byte chunks', () => {
    const framer = new LineFramer();
    const bytes = Buffer.from('héllo\n', 'utf8');
    // 'é' is two bytes; split between them
    const first = framer.push(bytes.subarray(0, 2));
    const second = framer.push(bytes.subarray(2));

    expect(first.lines).toEqual([]);
    expect(second.lines).toEqual(['héllo']);
  });

  it('discards a line that grows past the limit and resumes after its newline', () => {
    const framer = new LineFramer(10);

    const overflow = framer.push('x'.repeat(12));
    expect(overflow).toEqual({ lines: [], discarded: 12 });

    const tail = framer.push('yyy\nok\n');
    expect(tail).toEqual({ lines: ['ok'], discarded: 3 });
  });

  it('reset() drops buffered text', () => {
    const framer = new LineFramer();
    framer.push('partial');
    framer.reset();
    expect(framer.push('line\n').lines).toEqual(['line']);
  });
});

describe('FrameCodec', () => {
  it('classifies responses, requests and notifications', () => {
    expect(decodeFrame('{"jsonrpc":"2.0","id":1,"result":{"ok":true}}')).toEqual({
      ok: true,
      frame: { kind: 'response', frame: { jsonrpc: '2.0', id: 1, result: { ok: true } } },
    });
    expect(decodeFrame('{"jsonrpc":"2.0","id":"s1","method":"ping"}')).toEqual({
      ok: true,
      frame: { kind: 'request', frame: { jsonrpc: '2.0', id: 's1', method: 'ping' } },
    });
    expect(decodeFrame('{"jsonrpc":"2.0","method":"notifications/message","params":{"level":"info"}}')).toEqual({
      ok: true,
      frame: {
        kind: 'notification',
        frame: { jsonrpc: '2.0', method: 'notifications/message', params: { level: 'info' } },
      },
    });
  });

  it('accepts error responses with a null id', () => {
    const decoded = decodeFrame('{"jsonrpc":"2.0","id":null,"error":{"code":-32700,"message":"Parse error"}}');
    expect(decoded.ok && decoded.frame.kind).toBe('response');
  });

  it('reports invalid JSON and invalid frames', () => {
    expect(decodeFrame('not json')).toEqual({ ok: false, reason: 'invalid_json', line: 'not json' });
    expect(decodeFrame('{"jsonrpc":"1.0","id":1,"result":null}')).toEqual({
      ok: false,
      reason: 'invalid_frame',
      line: '{"jsonrpc":"1.0","id":1,"result":null}',
    });
  });

  it('encodes one frame per line', () => {
    expect(encodeFrame({ jsonrpc: '2.0', id: 3, method: 'tools/list', params: {} })).toBe(
      '{"jsonrpc":"2.0","id":3,"method":"tools/list","params":{}}\n',
    );
  });
});
