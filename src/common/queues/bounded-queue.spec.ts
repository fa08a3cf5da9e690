import { BoundedQueue } from './bounded-queue';

describe('BoundedQueue', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('should reject a non positive capacity', () => {
    expect(() => new BoundedQueue<string>(0)).toThrow(RangeError);
  });

  it('should keep FIFO order', () => {
    const queue = new BoundedQueue<string>(3);
    queue.push('a');
    queue.push('b');

    expect(queue.tryShift()).toBe('a');
    expect(queue.tryShift()).toBe('b');
    expect(queue.tryShift()).toBeUndefined();
  });

  it('should drop the oldest item when full', () => {
    const queue = new BoundedQueue<number>(2);

    expect(queue.push(1)).toBe(true);
    expect(queue.push(2)).toBe(true);
    expect(queue.push(3)).toBe(false);

    expect(queue.size).toBe(2);
    expect(queue.dropped).toBe(1);
    expect(queue.tryShift()).toBe(2);
    expect(queue.tryShift()).toBe(3);
  });

  it('should hand a pushed item directly to a waiting consumer', async () => {
    const queue = new BoundedQueue<string>(1);
    const pending = queue.shift(1000);

    expect(queue.push('hello')).toBe(true);
    await expect(pending).resolves.toBe('hello');
    expect(queue.size).toBe(0);
  });

  it('should resolve undefined when the wait times out', async () => {
    jest.useFakeTimers();
    const queue = new BoundedQueue<string>(1);
    const pending = queue.shift(100);

    jest.advanceTimersByTime(100);

    await expect(pending).resolves.toBeUndefined();
    // el consumidor expirado ya no recibe elementos
    queue.push('late');
    expect(queue.tryShift()).toBe('late');
  });

  it('should release waiters and refuse items once closed', async () => {
    const queue = new BoundedQueue<string>(2);
    queue.push('discarded');
    queue.tryShift();
    const pending = queue.shift(10_000);

    queue.close();

    await expect(pending).resolves.toBeUndefined();
    expect(queue.isClosed).toBe(true);
    expect(queue.push('x')).toBe(false);
    await expect(queue.shift(10)).resolves.toBeUndefined();
  });
});
