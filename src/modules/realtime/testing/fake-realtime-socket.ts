import { BoundedQueue } from '../../../common/queues/bounded-queue';
import type { IRealtimeSocket, SocketReceiveResult } from '../domain/ports/realtime-socket.port';

/**
 * Socket en memoria para specs: `deliver` simula un mensaje del cliente y
 * `disconnect` un cierre iniciado por el cliente.
 */
export class FakeRealtimeSocket implements IRealtimeSocket {
  readonly sent: string[] = [];
  closedWith?: { code: number; reason: string };
  failSends = false;

  private readonly inbound = new BoundedQueue<string>(100);

  get isOpen(): boolean {
    return this.closedWith === undefined && !this.inbound.isClosed;
  }

  async receive(timeoutMs: number): Promise<SocketReceiveResult> {
    if (this.inbound.isClosed) {
      return { kind: 'closed' };
    }

    const data = await this.inbound.shift(timeoutMs);
    if (data !== undefined) {
      return { kind: 'message', data };
    }
    return this.inbound.isClosed ? { kind: 'closed' } : { kind: 'timeout' };
  }

  async send(data: string): Promise<void> {
    if (!this.isOpen || this.failSends) {
      throw new Error('Socket is not open');
    }
    this.sent.push(data);
  }

  close(code: number, reason: string): void {
    this.closedWith ??= { code, reason };
    this.inbound.close();
  }

  deliver(data: string): void {
    this.inbound.push(data);
  }

  disconnect(): void {
    this.inbound.close();
  }

  sentJson(): unknown[] {
    return this.sent.map((frame) => JSON.parse(frame));
  }
}

/**
 * Espera activa con timers reales hasta que se cumpla la condición.
 */
export async function waitFor(condition: () => boolean, timeoutMs: number = 1000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}
