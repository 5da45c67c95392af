/**
 * Real-Time Coordinator
 *
 * Time-windowed cache over the live status characteristic. Concurrent callers
 * share a single device read; failed reads are never cached.
 */

import { TIMING } from './ThermostatConstants';
import { thermostatLogger } from './ThermostatLogger';
import type { RealTimeStatus } from './ThermostatTypes';
import { TypedEventEmitter } from './TypedEventEmitter';

export interface CachedReading<T> {
  value: T;
  capturedAt: number;
}

export interface CoordinatorEvents {
  updated: { address: string; status: RealTimeStatus; capturedAt: number };
}

export interface RealTimeCoordinatorOptions {
  address: string;
  /** Performs one device read + decode */
  fetch: () => Promise<RealTimeStatus>;
  maxAgeMs?: number;
  now?: () => number;
}

export class RealTimeCoordinator extends TypedEventEmitter<CoordinatorEvents> {
  private readonly address: string;
  private readonly fetch: () => Promise<RealTimeStatus>;
  private readonly defaultMaxAgeMs: number;
  private readonly now: () => number;

  private cached: CachedReading<RealTimeStatus> | null = null;
  private inFlight: Promise<RealTimeStatus> | null = null;
  // Bumped on invalidation so a read started before it cannot repopulate the cache
  private generation = 0;

  constructor(options: RealTimeCoordinatorOptions) {
    super();
    this.address = options.address;
    this.fetch = options.fetch;
    this.defaultMaxAgeMs = options.maxAgeMs ?? TIMING.REAL_TIME_MAX_AGE;
    this.now = options.now ?? Date.now;
  }

  get lastReading(): CachedReading<RealTimeStatus> | null {
    return this.cached;
  }

  get(maxAgeMs: number = this.defaultMaxAgeMs): Promise<RealTimeStatus> {
    if (this.cached && this.now() - this.cached.capturedAt < maxAgeMs) {
      thermostatLogger.debug(`[Coordinator] Cache hit for ${this.address}`, {
        ageMs: this.now() - this.cached.capturedAt,
      }, 'COORDINATOR');
      return Promise.resolve(this.cached.value);
    }

    if (this.inFlight) {
      return this.inFlight;
    }

    // Start on the next microtask so inFlight is set before refresh can settle
    const generation = this.generation;
    const read = Promise.resolve().then(() => this.refresh(generation));
    this.inFlight = read;
    return read;
  }

  private async refresh(generation: number): Promise<RealTimeStatus> {
    try {
      const status = await this.fetch();
      if (generation === this.generation) {
        const capturedAt = this.now();
        this.cached = { value: status, capturedAt };
        this.emit('updated', { address: this.address, status, capturedAt });
      }
      return status;
    } finally {
      if (generation === this.generation) {
        this.inFlight = null;
      }
    }
  }

  /**
   * Drop the cached reading and forget any read in flight (its waiters still
   * receive its outcome).
   */
  invalidate(): void {
    this.generation++;
    this.cached = null;
    this.inFlight = null;
    thermostatLogger.debug(`[Coordinator] Cache cleared for ${this.address}`, undefined, 'COORDINATOR');
  }
}
