import type { ByteTransport } from './types.js';

/**
 * One end of an in-process duplex pipe. Writes on one end are delivered
 * asynchronously (next microtask) to the data listeners of the other end,
 * mimicking stdio without a child process.
 */
export class InMemoryTransport implements ByteTransport {
  private peer: InMemoryTransport | undefined;
  private closed = false;
  private closeReason = '';
  private readonly dataListeners = new Set<(chunk: string | Uint8Array) => void>();
  private readonly closeListeners = new Set<(reason: string) => void>();

  get isClosed(): boolean {
    return this.closed;
  }

  /** Connects two transports so each one's writes arrive at the other. */
  static pair(): [InMemoryTransport, InMemoryTransport] {
    const a = new InMemoryTransport();
    const b = new InMemoryTransport();
    a.peer = b;
    b.peer = a;
    return [a, b];
  }

  write(data: string): void {
    if (this.closed) {
      throw new Error(`transport closed: ${this.closeReason}`);
    }
    const peer = this.peer;
    if (!peer) return;
    queueMicrotask(() => peer.deliver(data));
  }

  onData(listener: (chunk: string | Uint8Array) => void): () => void {
    this.dataListeners.add(listener);
    return () => {
      this.dataListeners.delete(listener);
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

  /** Closes both ends. */
  close(reason = 'closed'): void {
    this.shutdown(reason);
    this.peer?.shutdown(reason);
  }

  private deliver(chunk: string): void {
    if (this.closed) return;
    for (const listener of [...this.dataListeners]) listener(chunk);
  }

  private shutdown(reason: string): void {
    if (this.closed) return;
    this.closed = true;
    this.closeReason = reason;
    const listeners = [...this.closeListeners];
    this.closeListeners.clear();
    this.dataListeners.clear();
    for (const listener of listeners) listener(reason);
  }
}
