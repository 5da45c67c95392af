/**
 * Noble Transport Implementation
 * Wraps @abandonware/noble (HCI / WinRT / CoreBluetooth) for Windows and macOS
 *
 * Noble has no pairing API; the OS pairs on first encrypted access, so pair()
 * only records the step. Characteristics are indexed once per connection.
 */

import type { Characteristic, Peripheral } from '@abandonware/noble';
import { DEFAULT_MTU } from '../ThermostatConstants';
import { CharacteristicMissingError, errorMessage, NotReadyError, TransportError } from '../ThermostatErrors';
import { thermostatLogger } from '../ThermostatLogger';
import type { GattHandle, IBleTransport, ThermostatAdvertisement } from '../interfaces/ITransport';
import { withTimeout } from '../utils/timing';
import { normalizeUuid, sameAddress, splitManufacturerData } from './gattUtils';

type NobleModule = typeof import('@abandonware/noble');

// Noble will be dynamically loaded
let noble: NobleModule | null = null;

function loadNoble(): NobleModule {
  if (!noble) {
    try {
      noble = require('@abandonware/noble');
      thermostatLogger.debug('[NobleTransport] Noble library loaded', undefined, 'TRANSPORT');
    } catch (error) {
      throw new TransportError('Noble is not available on this system', error);
    }
  }
  if (!noble) {
    throw new TransportError('Noble is not available on this system');
  }
  return noble;
}

const POWER_ON_TIMEOUT_MS = 15000;

interface NobleLink {
  handle: GattHandle;
  peripheral: Peripheral;
  characteristics: Map<string, Characteristic>;
}

export class NobleTransport implements IBleTransport {
  readonly name = 'noble';

  private readonly peripherals = new Map<string, Peripheral>();
  private readonly links = new Map<string, NobleLink>();

  // ─────────────────────────────────────────────────────────────────────────
  // Discovery
  // ─────────────────────────────────────────────────────────────────────────

  async scan(manufacturerId: number, timeoutMs: number): Promise<ThermostatAdvertisement[]> {
    const found = new Map<string, ThermostatAdvertisement>();
    await this.runScan(timeoutMs, (peripheral) => {
      const advertisement = this.toAdvertisement(peripheral, manufacturerId);
      if (advertisement && !found.has(advertisement.address)) {
        thermostatLogger.debug(`[NobleTransport] Discovered ${advertisement.address}`, { rssi: advertisement.rssi }, 'DISCOVERY');
        found.set(advertisement.address, advertisement);
      }
      return false;
    });
    return [...found.values()];
  }

  async findDevice(address: string, timeoutMs: number): Promise<ThermostatAdvertisement | null> {
    let match: ThermostatAdvertisement | null = null;
    await this.runScan(timeoutMs, (peripheral) => {
      if (!sameAddress(this.addressOf(peripheral), address)) return false;
      match = this.toAdvertisement(peripheral, null);
      return true;
    });
    return match;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // GATT
  // ─────────────────────────────────────────────────────────────────────────

  async connect(address: string, timeoutMs: number): Promise<GattHandle> {
    const peripheral = this.lookupPeripheral(address);
    if (!peripheral) {
      throw new TransportError(`Peripheral ${address} has not been discovered`);
    }

    thermostatLogger.info(`[NobleTransport] Connecting to ${address}...`, undefined, 'TRANSPORT');
    try {
      await withTimeout(peripheral.connectAsync(), timeoutMs, `connect ${address}`);
    } catch (error) {
      await this.safeDisconnect(peripheral);
      throw error;
    }

    try {
      const { characteristics } = await peripheral.discoverAllServicesAndCharacteristicsAsync();
      const index = new Map<string, Characteristic>();
      for (const characteristic of characteristics) {
        index.set(normalizeUuid(characteristic.uuid), characteristic);
      }

      const handle: GattHandle = { address };
      this.links.set(address, { handle, peripheral, characteristics: index });
      thermostatLogger.info(`[NobleTransport] Connected to ${address}`, { characteristics: index.size }, 'TRANSPORT');
      return handle;
    } catch (error) {
      await this.safeDisconnect(peripheral);
      throw new TransportError(`Service discovery on ${address} failed: ${errorMessage(error)}`, error);
    }
  }

  async pair(handle: GattHandle): Promise<void> {
    this.requireLink(handle);
    thermostatLogger.debug(`[NobleTransport] ${handle.address}: pairing is handled by the OS on first encrypted access`, undefined, 'TRANSPORT');
  }

  async read(handle: GattHandle, characteristicUuid: string): Promise<Buffer> {
    return this.characteristic(handle, characteristicUuid).readAsync();
  }

  async write(handle: GattHandle, characteristicUuid: string, data: Buffer, requireAck: boolean): Promise<void> {
    // Noble takes withoutResponse, the inverse of requireAck
    await this.characteristic(handle, characteristicUuid).writeAsync(data, !requireAck);
  }

  async disconnect(handle: GattHandle): Promise<void> {
    const link = this.links.get(handle.address);
    if (!link || link.handle !== handle) return;
    this.links.delete(handle.address);
    await link.peripheral.disconnectAsync();
    thermostatLogger.info(`[NobleTransport] Disconnected from ${handle.address}`, undefined, 'TRANSPORT');
  }

  negotiatedMtu(handle: GattHandle): number {
    return this.requireLink(handle).peripheral.mtu ?? DEFAULT_MTU;
  }

  onLinkLost(handle: GattHandle, listener: () => void): () => void {
    const { peripheral } = this.requireLink(handle);
    const onDisconnect = (): void => {
      thermostatLogger.warn(`[NobleTransport] ${handle.address} disconnected`, undefined, 'TRANSPORT');
      listener();
    };
    peripheral.once('disconnect', onDisconnect);
    return () => {
      peripheral.removeListener('disconnect', onDisconnect);
    };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Private Methods
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Scan until `onPeripheral` returns true or the timeout elapses.
   */
  private async runScan(timeoutMs: number, onPeripheral: (peripheral: Peripheral) => boolean): Promise<void> {
    const ble = loadNoble();
    await this.waitForBluetoothReady(ble);

    await new Promise<void>((resolve, reject) => {
      let settled = false;
      const finish = (error?: unknown): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        ble.removeListener('discover', onDiscover);
        ble.stopScanningAsync().then(
          () => (error === undefined ? resolve() : reject(error)),
          (stopError: unknown) => {
            thermostatLogger.warn('[NobleTransport] Error stopping scan', { error: errorMessage(stopError) }, 'DISCOVERY');
            if (error === undefined) resolve();
            else reject(error);
          },
        );
      };
      const onDiscover = (peripheral: Peripheral): void => {
        this.peripherals.set(this.addressOf(peripheral), peripheral);
        if (onPeripheral(peripheral)) finish();
      };
      const timer = setTimeout(() => finish(), timeoutMs);

      ble.on('discover', onDiscover);
      ble.startScanningAsync([], false).catch((error: unknown) => {
        finish(new TransportError(`Scan failed: ${errorMessage(error)}`, error));
      });
    });
  }

  private waitForBluetoothReady(ble: NobleModule): Promise<void> {
    return new Promise((resolve, reject) => {
      if (ble._state === 'poweredOn') {
        resolve();
        return;
      }

      const timeout = setTimeout(() => {
        ble.removeListener('stateChange', stateChangeHandler);
        reject(new TransportError(`Bluetooth adapter not powered on after ${POWER_ON_TIMEOUT_MS}ms`));
      }, POWER_ON_TIMEOUT_MS);

      const stateChangeHandler = (state: string): void => {
        thermostatLogger.debug(`[NobleTransport] Bluetooth state: ${state}`, undefined, 'TRANSPORT');
        if (state === 'poweredOn') {
          clearTimeout(timeout);
          ble.removeListener('stateChange', stateChangeHandler);
          resolve();
        }
      };

      ble.on('stateChange', stateChangeHandler);
    });
  }

  /** macOS hides link addresses; fall back to the CoreBluetooth id */
  private addressOf(peripheral: Peripheral): string {
    return peripheral.address && peripheral.address !== 'unknown' ? peripheral.address : peripheral.id;
  }

  private lookupPeripheral(address: string): Peripheral | null {
    for (const [known, peripheral] of this.peripherals) {
      if (sameAddress(known, address)) return peripheral;
    }
    return null;
  }

  private toAdvertisement(peripheral: Peripheral, manufacturerId: number | null): ThermostatAdvertisement | null {
    const data = splitManufacturerData(peripheral.advertisement.manufacturerData);
    if (manufacturerId !== null && (!data || data.companyId !== manufacturerId)) {
      return null;
    }
    return {
      address: this.addressOf(peripheral),
      name: peripheral.advertisement.localName || null,
      rssi: peripheral.rssi,
      manufacturerData: data ? Buffer.from(data.payload) : Buffer.alloc(0),
    };
  }

  private requireLink(handle: GattHandle): NobleLink {
    const link = this.links.get(handle.address);
    if (!link || link.handle !== handle) {
      throw new NotReadyError(`No open link to ${handle.address}`);
    }
    return link;
  }

  private characteristic(handle: GattHandle, uuid: string): Characteristic {
    const characteristic = this.requireLink(handle).characteristics.get(normalizeUuid(uuid));
    if (!characteristic) {
      throw new CharacteristicMissingError(uuid, handle.address);
    }
    return characteristic;
  }

  private async safeDisconnect(peripheral: Peripheral): Promise<void> {
    try {
      await peripheral.disconnectAsync();
    } catch (error) {
      thermostatLogger.debug('[NobleTransport] Disconnect after failed connect failed', { error: errorMessage(error) }, 'TRANSPORT');
    }
  }
}
