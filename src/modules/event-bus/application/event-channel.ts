import { BoundedQueue } from '../../../common/queues/bounded-queue';
import { EventMessage } from '../domain/models/event-message.model';

/**
 * Canal tipado por suscriptor sobre una cola acotada.
 * Si el consumidor se retrasa se descartan los mensajes más antiguos.
 */
export class EventChannel {
  constructor(
    readonly topic: string,
    private readonly queue: BoundedQueue<EventMessage>,
    private readonly detach: () => void,
  ) {}

  receive(timeoutMs: number): Promise<EventMessage | undefined> {
    return this.queue.shift(timeoutMs);
  }

  tryReceive(): EventMessage | undefined {
    return this.queue.tryShift();
  }

  get pending(): number {
    return this.queue.size;
  }

  get dropped(): number {
    return this.queue.dropped;
  }

  get isClosed(): boolean {
    return this.queue.isClosed;
  }

  close(): void {
    if (this.queue.isClosed) {
      return;
    }
    this.detach();
    this.queue.close();
  }
}
