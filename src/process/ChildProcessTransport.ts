import type { Readable, Writable } from 'node:stream';

import type { ILogger } from '../logging/ILogger.js';
import type { ByteTransport } from '../protocol/types.js';

/**
 * {@link ByteTransport} over a child's stdin (outgoing) and stdout (incoming).
 * The supervisor closes it when the process goes away.
 */
export class ChildProcessTransport implements ByteTransport {
  private closed = false;
  private closeReason = '';
  private readonly closeListeners = new Set<(reason: string) => void>();

  constructor(
    private readonly stdin: Writable,
    private readonly stdout: Readable,
    private readonly logger: ILogger,
  ) {
    stdin.on('error', (error: Error) => {
      // EPIPE once the child has exited; the exit handler closes us.
      this.logger.debug('stdin error', { error });
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  write(data: string): void {
    if (this.closed || this.stdin.destroyed || !this.stdin.writable) {
      throw new Error(`transport closed${this.closeReason ? `: ${this.closeReason}` : ''}`);
    }
    this.stdin.write(data);
  }

  onData(listener: (chunk: string | Uint8Array) => void): () => void {
    const handler = (chunk: Buffer | string): void => {
      if (!this.closed) listener(chunk);
    };
    this.stdout.on('data', handler);
    return () => {
      this.stdout.off('data', handler);
    };
  }

  onClose(listener: (reason: string) => void): () => void {
    if (this.closed) {
      listener(this.closeReason);
      return () => {};
    }
    this.closeListeners.add(listener);
    return () => {
      this.closeListeners.delete(listener);
    };
  }

  /** Called by the supervisor; idempotent. */
  close(reason: string): void {
    if (this.closed) return;
    this.closed = true;
    this.closeReason = reason;
    if (!this.stdin.destroyed) this.stdin.end();
    const listeners = [...this.closeListeners];
    this.closeListeners.clear();
    for (const listener of listeners) listener(reason);
  }
}
