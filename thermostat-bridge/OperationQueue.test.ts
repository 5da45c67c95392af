import { OperationQueue } from './OperationQueue';

describe('OperationQueue', () => {
  test('should run operations one at a time in arrival order', async () => {
    const queue = new OperationQueue('test');
    const events: string[] = [];
    let running = 0;
    let maxRunning = 0;

    const operation = (name: string, delayMs: number) => async (): Promise<string> => {
      running++;
      maxRunning = Math.max(maxRunning, running);
      events.push(`${name}:start`);
      await new Promise((resolve) => setTimeout(resolve, delayMs));
      events.push(`${name}:end`);
      running--;
      return name;
    };

    const results = await Promise.all([
      queue.enqueue('a', operation('a', 10)),
      queue.enqueue('b', operation('b', 1)),
      queue.enqueue('c', operation('c', 5)),
    ]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(maxRunning).toBe(1);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  test('should keep going after a failed operation', async () => {
    const queue = new OperationQueue('test');

    const failed = queue.enqueue('fail', async () => {
      throw new Error('write failed');
    });
    const next = queue.enqueue('next', async () => 42);

    await expect(failed).rejects.toThrow('write failed');
    await expect(next).resolves.toBe(42);
  });

  test('should report what is running and waiting', async () => {
    const queue = new OperationQueue('test');
    let release: () => void = () => undefined;
    const blocker = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = queue.enqueue('first', () => blocker);
    const second = queue.enqueue('second', async () => undefined);
    await Promise.resolve();

    expect(queue.getStatus()).toEqual({ queueLength: 1, isProcessing: true, current: 'first' });

    release();
    await Promise.all([first, second]);
    await new Promise((resolve) => setImmediate(resolve));
    expect(queue.getStatus()).toEqual({ queueLength: 0, isProcessing: false, current: null });
  });
});
