import { Logger } from '@nestjs/common';

import WebSocket from 'ws';

import { BoundedQueue } from '../../../../common/queues/bounded-queue';
import type { IRealtimeSocket, SocketReceiveResult } from '../../domain/ports/realtime-socket.port';

/** Límite de bytes del reason en un close frame */
const MAX_CLOSE_REASON_BYTES = 123;
const DEFAULT_INBOUND_CAPACITY = 256;

const truncateReason = (reason: string): string => {
  let truncated = reason;
  while (Buffer.byteLength(truncated) > MAX_CLOSE_REASON_BYTES) {
    truncated = truncated.slice(0, -1);
  }
  return truncated;
};

const toText = (data: WebSocket.RawData): string => {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
};

/**
 * Adaptador de un socket `ws` al puerto IRealtimeSocket.
 * Los mensajes entrantes se encolan hasta que la sesión los recibe.
 */
export class WsSocketAdapter implements IRealtimeSocket {
  private readonly logger = new Logger(WsSocketAdapter.name);
  private readonly inbound: BoundedQueue<string>;

  constructor(
    private readonly ws: WebSocket,
    capacity: number = DEFAULT_INBOUND_CAPACITY,
  ) {
    this.inbound = new BoundedQueue<string>(capacity);

    this.ws.on('message', (data: WebSocket.RawData) => {
      if (!this.inbound.push(toText(data)) && !this.inbound.isClosed) {
        this.logger.warn('Inbound queue full, oldest client message dropped');
      }
    });
    this.ws.on('close', () => this.inbound.close());
    this.ws.on('error', (error: Error) => {
      this.logger.warn(`WebSocket error: ${error.message}`);
    });
  }

  get isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  async receive(timeoutMs: number): Promise<SocketReceiveResult> {
    const data = await this.inbound.shift(timeoutMs);
    if (data !== undefined) {
      return { kind: 'message', data };
    }
    return this.inbound.isClosed ? { kind: 'closed' } : { kind: 'timeout' };
  }

  send(data: string): Promise<void> {
    if (!this.isOpen) {
      return Promise.reject(new Error('WebSocket is not open'));
    }

    return new Promise<void>((resolve, reject) => {
      this.ws.send(data, (error?: Error) => (error ? reject(error) : resolve()));
    });
  }

  close(code: number, reason: string): void {
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close(code, truncateReason(reason));
    }
    this.inbound.close();
  }
}
