/**
 * Thermostat Session
 *
 * Owns the BLE link to one thermostat and walks it through
 *   disconnected → connecting → connected → pairing → authenticating → ready
 *
 * Authentication is the factory reset id handshake: the id is read from the
 * device on first pairing, persisted in the credential store, and written back
 * to the device on every connection.
 *
 * - connect() fails fast with AlreadyConnectingError while an attempt is running
 * - ensureReady() waits for a running attempt, or starts one (lazy reconnect)
 * - runExclusive() serialises GATT operations on the link
 * - any transport failure on a ready link invalidates it (→ disconnected)
 */

import { characteristicUuid } from './ThermostatConstants';
import {
  AlreadyConnectingError,
  asThermostatError,
  AuthenticationFailedError,
  DeviceNotFoundError,
  NotReadyError,
  ThermostatError,
  toTransportError,
  TransportError,
} from './ThermostatErrors';
import { thermostatLogger } from './ThermostatLogger';
import type { DeviceIdentity } from './ThermostatTypes';
import { TypedEventEmitter } from './TypedEventEmitter';
import { OperationQueue } from './OperationQueue';
import { getPlatformConfig, ThermostatConfig } from './PlatformConfig';
import type { CharacteristicIO } from './SplitTransfer';
import type { GattHandle, ICredentialStore, IDiscovery, IGattTransport } from './interfaces/ITransport';
import { decodeDeviceName, decodeFactoryResetId, decodeHardwareRevision, decodeText, encodeFactoryResetId } from './codec';

export type SessionPhase = 'disconnected' | 'connecting' | 'connected' | 'pairing' | 'authenticating' | 'ready';

export type DisconnectReason = 'cleanup' | 'connectFailed' | 'transportError' | 'linkLost';

export interface SessionEvents {
  phaseChanged: { address: string; previous: SessionPhase; phase: SessionPhase };
  ready: { identity: DeviceIdentity };
  invalidated: { address: string; error: TransportError };
  disconnected: { address: string; reason: DisconnectReason };
}

/** A ready link; only valid until the session is invalidated */
export interface SessionLink extends CharacteristicIO {
  readonly address: string;
  readonly mtu: number;
}

export type ReadyResult = { ok: true; link: SessionLink } | { ok: false; error: ThermostatError };

export interface ThermostatSessionOptions {
  address: string;
  transport: IGattTransport;
  discovery: IDiscovery;
  credentials: ICredentialStore;
  config?: Readonly<ThermostatConfig>;
}

export class ThermostatSession extends TypedEventEmitter<SessionEvents> {
  readonly address: string;

  private readonly transport: IGattTransport;
  private readonly discovery: IDiscovery;
  private readonly credentials: ICredentialStore;
  private readonly config: Readonly<ThermostatConfig>;
  private readonly queue: OperationQueue;

  private currentPhase: SessionPhase = 'disconnected';
  private handle: GattHandle | null = null;
  private currentIdentity: DeviceIdentity | null = null;
  private connectAttempt: Promise<DeviceIdentity> | null = null;
  private unsubscribeLinkLost: (() => void) | null = null;
  private terminated = false;

  constructor(options: ThermostatSessionOptions) {
    super();
    this.address = options.address;
    this.transport = options.transport;
    this.discovery = options.discovery;
    this.credentials = options.credentials;
    this.config = options.config ?? getPlatformConfig();
    this.queue = new OperationQueue(options.address);
  }

  get phase(): SessionPhase {
    return this.currentPhase;
  }

  get identity(): DeviceIdentity | null {
    return this.currentIdentity;
  }

  get isReady(): boolean {
    return this.currentPhase === 'ready' && this.handle !== null;
  }

  get isConnecting(): boolean {
    return this.connectAttempt !== null;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Connection lifecycle
  // ─────────────────────────────────────────────────────────────────────────────

  async connect(): Promise<DeviceIdentity> {
    if (this.terminated) {
      throw new NotReadyError(`Session for ${this.address} has been cleaned up`);
    }
    if (this.connectAttempt) {
      throw new AlreadyConnectingError(this.address);
    }
    if (this.isReady && this.currentIdentity) {
      return this.currentIdentity;
    }

    const attempt = this.establish();
    this.connectAttempt = attempt;
    try {
      return await attempt;
    } finally {
      if (this.connectAttempt === attempt) {
        this.connectAttempt = null;
      }
    }
  }

  /**
   * Resolve a ready link, waiting for a running connection attempt or starting
   * one. Failures come back as a value, never as a rejection.
   */
  async ensureReady(): Promise<ReadyResult> {
    if (this.terminated) {
      return { ok: false, error: new NotReadyError(`Session for ${this.address} has been cleaned up`) };
    }

    const pending = this.connectAttempt;
    if (pending) {
      try {
        await pending;
      } catch (error) {
        return { ok: false, error: asThermostatError(error, 'connect') };
      }
    }

    if (this.handle && this.currentPhase === 'ready') {
      return { ok: true, link: this.createLink(this.handle) };
    }

    // Another waiter may have started a new attempt in the meantime
    if (this.connectAttempt) {
      return this.ensureReady();
    }

    thermostatLogger.info(`[Session] ${this.address} not ready, reconnecting on demand`, undefined, 'SESSION');
    try {
      await this.connect();
    } catch (error) {
      return { ok: false, error: asThermostatError(error, 'connect') };
    }

    if (this.handle && this.currentPhase === 'ready') {
      return { ok: true, link: this.createLink(this.handle) };
    }
    return { ok: false, error: new NotReadyError(`Link to ${this.address} was lost right after connecting`) };
  }

  /**
   * Run one GATT operation sequence with exclusive use of the link.
   */
  runExclusive<T>(label: string, operation: () => Promise<T>): Promise<T> {
    return this.queue.enqueue(label, operation);
  }

  async forgetCredential(): Promise<void> {
    await this.credentials.remove(this.address);
    thermostatLogger.info(`[Session] Forgot factory reset id for ${this.address}`, undefined, 'SESSION');
  }

  /**
   * Disconnect and retire the session. A session is never reused afterwards.
   */
  async cleanup(): Promise<void> {
    this.terminated = true;

    const pending = this.connectAttempt;
    if (pending) {
      try {
        await pending;
      } catch (error) {
        thermostatLogger.debug(`[Session] Pending connect ended during cleanup`, { error: asThermostatError(error, 'connect').message }, 'SESSION');
      }
    }

    const handle = this.handle;
    this.detachLink();
    if (handle) {
      await this.releaseHandle(handle);
    }
    if (this.currentPhase !== 'disconnected') {
      this.setPhase('disconnected');
    }
    this.emit('disconnected', { address: this.address, reason: 'cleanup' });
    this.removeAllListeners();
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Connect sequence
  // ─────────────────────────────────────────────────────────────────────────────

  private async establish(): Promise<DeviceIdentity> {
    const { timing } = this.config;
    let handle: GattHandle | null = null;

    try {
      this.setPhase('connecting');
      thermostatLogger.logConnection(this.address, 'Locating device');

      const advertisement = await this.discovery.findDevice(this.address, timing.scanTimeoutMs)
        .catch((error: unknown) => { throw asThermostatError(error, 'discovery'); });
      if (!advertisement) {
        throw new DeviceNotFoundError(this.address);
      }

      handle = await this.transport.connect(this.address, timing.connectTimeoutMs)
        .catch((error: unknown) => { throw asThermostatError(error, 'connect'); });
      this.handle = handle;
      this.setPhase('connected');

      // Encryption state does not survive reconnects, so pair every time
      this.setPhase('pairing');
      try {
        await this.transport.pair(handle);
      } catch (error) {
        throw new AuthenticationFailedError(`Pairing with ${this.address} failed`, error);
      }

      this.setPhase('authenticating');
      const factoryResetId = await this.resolveFactoryResetId(handle);
      await this.rawWrite(handle, characteristicUuid('factoryResetId'), encodeFactoryResetId({ id: factoryResetId, deviceAddress: null }));

      const identity: DeviceIdentity = {
        address: this.address,
        factoryResetId,
        modelNumber: await this.readSecondary(handle, 'modelNumber', decodeText),
        deviceName: await this.readSecondary(handle, 'deviceName', (data) => decodeDeviceName(data).name || null),
        softwareRevision: await this.readSecondary(handle, 'softwareRevision', decodeText),
        hardwareRevision: await this.readSecondary(handle, 'hardwareRevision', decodeHardwareRevision),
      };

      this.currentIdentity = identity;
      const linked = handle;
      this.unsubscribeLinkLost = this.transport.onLinkLost(linked, () => this.handleLinkLost(linked));
      this.setPhase('ready');
      thermostatLogger.logConnection(this.address, 'Ready', { model: identity.modelNumber, name: identity.deviceName });
      this.emit('ready', { identity });
      return identity;
    } catch (error) {
      const failure = asThermostatError(error, 'connect');
      thermostatLogger.logConnectionError(this.address, this.currentPhase, failure);
      this.detachLink();
      if (handle) {
        await this.releaseHandle(handle);
      }
      this.setPhase('disconnected');
      this.emit('disconnected', { address: this.address, reason: 'connectFailed' });
      throw failure;
    }
  }

  private async resolveFactoryResetId(handle: GattHandle): Promise<number> {
    const stored = await this.credentials.load(this.address).catch((error: unknown) => {
      throw new AuthenticationFailedError(`Could not load credential for ${this.address}`, error);
    });
    if (stored !== null) {
      return stored;
    }

    thermostatLogger.info(`[Session] No stored factory reset id for ${this.address}, reading from device`, undefined, 'SESSION');
    const info = decodeFactoryResetId(await this.rawRead(handle, characteristicUuid('factoryResetId')));
    // The device reports 0 unless it is in pairing mode
    if (info.id === 0) {
      throw new AuthenticationFailedError(`Device ${this.address} is not in pairing mode`);
    }

    await this.credentials.save(this.address, info.id).catch((error: unknown) => {
      throw new AuthenticationFailedError(`Could not persist credential for ${this.address}`, error);
    });
    thermostatLogger.info(`[Session] Stored factory reset id for ${this.address}`, undefined, 'SESSION');
    return info.id;
  }

  private async readSecondary<T>(
    handle: GattHandle,
    id: 'modelNumber' | 'deviceName' | 'softwareRevision' | 'hardwareRevision',
    decode: (data: Buffer) => T,
  ): Promise<T | null> {
    try {
      return decode(await this.rawRead(handle, characteristicUuid(id)));
    } catch (error) {
      thermostatLogger.warn(`[Session] Could not read ${id} from ${this.address}`, {
        error: asThermostatError(error, id).message,
      }, 'SESSION');
      return null;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // GATT access
  // ─────────────────────────────────────────────────────────────────────────────

  private async rawRead(handle: GattHandle, uuid: string): Promise<Buffer> {
    try {
      const data = await this.transport.read(handle, uuid);
      thermostatLogger.logFrame('read', uuid, data);
      return data;
    } catch (error) {
      throw toTransportError(error, `read ${uuid}`);
    }
  }

  private async rawWrite(handle: GattHandle, uuid: string, data: Buffer, requireAck = true): Promise<void> {
    thermostatLogger.logFrame('write', uuid, data);
    try {
      await this.transport.write(handle, uuid, data, requireAck);
    } catch (error) {
      throw toTransportError(error, `write ${uuid}`);
    }
  }

  private createLink(handle: GattHandle): SessionLink {
    return {
      address: this.address,
      mtu: this.transport.negotiatedMtu(handle),
      read: (uuid) => this.guarded(handle, () => this.rawRead(handle, uuid)),
      write: (uuid, data, requireAck) => this.guarded(handle, () => this.rawWrite(handle, uuid, data, requireAck)),
    };
  }

  private async guarded<T>(handle: GattHandle, operation: () => Promise<T>): Promise<T> {
    if (this.handle !== handle || this.currentPhase !== 'ready') {
      throw new NotReadyError(`Link to ${this.address} is no longer valid`);
    }
    try {
      return await operation();
    } catch (error) {
      if (error instanceof TransportError) {
        this.invalidate(handle, error, 'transportError');
      }
      throw error;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Invalidation
  // ─────────────────────────────────────────────────────────────────────────────

  private handleLinkLost(handle: GattHandle): void {
    this.invalidate(handle, new TransportError(`Link to ${this.address} lost`), 'linkLost');
  }

  private invalidate(handle: GattHandle, error: TransportError, reason: DisconnectReason): void {
    if (this.handle !== handle) return;

    thermostatLogger.warn(`[Session] Invalidating link to ${this.address}`, { reason, error: error.message }, 'SESSION');
    this.detachLink();
    this.setPhase('disconnected');
    this.emit('invalidated', { address: this.address, error });
    this.emit('disconnected', { address: this.address, reason });
    void this.releaseHandle(handle);
  }

  private detachLink(): void {
    if (this.unsubscribeLinkLost) {
      this.unsubscribeLinkLost();
      this.unsubscribeLinkLost = null;
    }
    this.handle = null;
  }

  /** Best-effort disconnect of a handle that is no longer used */
  private async releaseHandle(handle: GattHandle): Promise<void> {
    try {
      await this.transport.disconnect(handle);
    } catch (error) {
      thermostatLogger.debug(`[Session] Disconnect of ${this.address} failed`, {
        error: asThermostatError(error, 'disconnect').message,
      }, 'SESSION');
    }
  }

  private setPhase(phase: SessionPhase): void {
    const previous = this.currentPhase;
    if (previous === phase) return;
    this.currentPhase = phase;
    thermostatLogger.debug(`[Session] ${this.address}: ${previous} → ${phase}`, undefined, 'SESSION');
    this.emit('phaseChanged', { address: this.address, previous, phase });
  }
}
