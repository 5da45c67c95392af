import { TypedEventEmitter } from './TypedEventEmitter';

interface TestEvents {
  reading: { value: number };
  closed: { reason: string };
}

describe('TypedEventEmitter', () => {
  let emitter: TypedEventEmitter<TestEvents>;

  beforeEach(() => {
    emitter = new TypedEventEmitter<TestEvents>();
  });

  test('should deliver payloads to every handler of the event', () => {
    const first = jest.fn();
    const second = jest.fn();
    const other = jest.fn();
    emitter.on('reading', first);
    emitter.on('reading', second);
    emitter.on('closed', other);

    emitter.emit('reading', { value: 21 });

    expect(first).toHaveBeenCalledWith({ value: 21 });
    expect(second).toHaveBeenCalledWith({ value: 21 });
    expect(other).not.toHaveBeenCalled();
  });

  test('should unsubscribe through the returned function', () => {
    const handler = jest.fn();
    const unsubscribe = emitter.on('reading', handler);

    unsubscribe();
    emitter.emit('reading', { value: 1 });

    expect(handler).not.toHaveBeenCalled();
    expect(emitter.listenerCount('reading')).toBe(0);
  });

  test('should call a once handler a single time', () => {
    const handler = jest.fn();
    emitter.once('closed', handler);

    emitter.emit('closed', { reason: 'cleanup' });
    emitter.emit('closed', { reason: 'cleanup' });

    expect(handler).toHaveBeenCalledTimes(1);
  });

  test('should keep calling handlers after one throws', () => {
    const failing = jest.fn(() => {
      throw new Error('handler failed');
    });
    const next = jest.fn();
    emitter.on('reading', failing);
    emitter.on('reading', next);

    expect(() => emitter.emit('reading', { value: 3 })).not.toThrow();
    expect(next).toHaveBeenCalledTimes(1);
  });

  test('should remove handlers per event or all at once', () => {
    emitter.on('reading', jest.fn());
    emitter.on('closed', jest.fn());

    emitter.removeAllListeners('reading');
    expect(emitter.listenerCount('reading')).toBe(0);
    expect(emitter.listenerCount('closed')).toBe(1);

    emitter.removeAllListeners();
    expect(emitter.listenerCount('closed')).toBe(0);
  });
});
