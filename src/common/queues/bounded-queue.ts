interface Waiter<T> {
  resolve: (item: T | undefined) => void;
  timer: NodeJS.Timeout;
}

/**
 * Cola FIFO acotada con back-pressure "drop-oldest".
 *
 * Un único productor síncrono (`push`) y consumidores que esperan con
 * timeout (`shift`). Al superar la capacidad se descarta el elemento más
 * antiguo y se contabiliza en `dropped`.
 */
export class BoundedQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;
  private droppedCount = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Encola un elemento. Devuelve false si la cola está cerrada o si hubo
   * que descartar el elemento más antiguo para hacerle sitio.
   */
  push(item: T): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(item);
      return true;
    }

    this.items.push(item);
    if (this.items.length > this.capacity) {
      this.items.shift();
      this.droppedCount++;
      return false;
    }

    return true;
  }

  tryShift(): T | undefined {
    return this.items.shift();
  }

  /**
   * Espera como máximo `timeoutMs` por el siguiente elemento.
   * Resuelve `undefined` en timeout o cuando la cola se cierra.
   */
  shift(timeoutMs: number): Promise<T | undefined> {
    const ready = this.items.shift();
    if (ready !== undefined || this.closed) {
      return Promise.resolve(ready);
    }

    return new Promise<T | undefined>((resolve) => {
      const waiter: Waiter<T> = {
        resolve,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) {
            this.waiters.splice(index, 1);
          }
          resolve(undefined);
        }, Math.max(0, timeoutMs)),
      };
      this.waiters.push(waiter);
    });
  }

  /**
   * Cierra la cola, libera a los consumidores en espera y descarta el contenido.
   */
  close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.items.length = 0;

    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.resolve(undefined);
    }
  }
}
