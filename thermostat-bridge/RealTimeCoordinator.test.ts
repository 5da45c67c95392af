/**
 * Real-Time Coordinator Tests
 */

import { RealTimeCoordinator } from './RealTimeCoordinator';
import type { RealTimeStatus } from './ThermostatTypes';
import { decodeRealTimeStatus } from './codec';

function status(target: number): RealTimeStatus {
  const data = Buffer.alloc(20);
  data.writeUInt16LE(target * 10, 0);
  return decodeRealTimeStatus(data);
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (error: Error) => void } {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('RealTimeCoordinator', () => {
  let clock: number;
  let fetch: jest.Mock<Promise<RealTimeStatus>, []>;
  let coordinator: RealTimeCoordinator;

  beforeEach(() => {
    clock = 1_000_000;
    fetch = jest.fn(() => Promise.resolve(status(21)));
    coordinator = new RealTimeCoordinator({
      address: 'AA:BB:CC:DD:EE:01',
      fetch,
      maxAgeMs: 25000,
      now: () => clock,
    });
  });

  test('should serve a fresh reading from the cache', async () => {
    await coordinator.get();
    clock += 24999;
    const second = await coordinator.get();

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(second.targetTemperature).toBe(21);
  });

  test('should read again once the reading is older than the window', async () => {
    await coordinator.get();
    clock += 25000;
    await coordinator.get();

    expect(fetch).toHaveBeenCalledTimes(2);
  });

  test('should honour a per-call freshness bound', async () => {
    await coordinator.get();
    clock += 1000;
    await coordinator.get(500);

    expect(fetch).toHaveBeenCalledTimes(2);
  });

  test('should share one device read between concurrent callers', async () => {
    const pending = deferred<RealTimeStatus>();
    fetch.mockImplementationOnce(() => pending.promise);

    const first = coordinator.get();
    const second = coordinator.get();
    pending.resolve(status(19));

    await expect(first).resolves.toEqual(status(19));
    await expect(second).resolves.toEqual(status(19));
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  test('should not cache a failed read', async () => {
    fetch.mockImplementationOnce(() => Promise.reject(new Error('link lost')));

    await expect(coordinator.get()).rejects.toThrow('link lost');
    expect(coordinator.lastReading).toBeNull();

    await expect(coordinator.get()).resolves.toEqual(status(21));
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  test('should deliver a failure to every concurrent caller', async () => {
    const pending = deferred<RealTimeStatus>();
    fetch.mockImplementationOnce(() => pending.promise);

    const first = coordinator.get();
    const second = coordinator.get();
    pending.reject(new Error('timeout'));

    await expect(first).rejects.toThrow('timeout');
    await expect(second).rejects.toThrow('timeout');
  });

  test('should drop the cached reading on invalidate', async () => {
    await coordinator.get();
    coordinator.invalidate();

    expect(coordinator.lastReading).toBeNull();
    await coordinator.get();
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  test('should not let a read started before invalidation fill the cache', async () => {
    const pending = deferred<RealTimeStatus>();
    fetch.mockImplementationOnce(() => pending.promise);

    const stale = coordinator.get();
    coordinator.invalidate();
    pending.resolve(status(15));

    await expect(stale).resolves.toEqual(status(15));
    expect(coordinator.lastReading).toBeNull();
  });

  test('should emit each new reading with its capture time', async () => {
    const updates: number[] = [];
    coordinator.on('updated', (update) => updates.push(update.capturedAt));

    await coordinator.get();
    await coordinator.get();

    expect(updates).toEqual([1_000_000]);
    expect(coordinator.lastReading?.capturedAt).toBe(1_000_000);
  });
});
