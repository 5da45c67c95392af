/**
 * node-ble Transport Implementation
 * Wraps node-ble (BlueZ via DBus) for Linux / Raspberry Pi
 */

import { DEFAULT_MTU } from '../ThermostatConstants';
import { CharacteristicMissingError, errorMessage, NotReadyError, TransportError } from '../ThermostatErrors';
import { thermostatLogger } from '../ThermostatLogger';
import type { GattHandle, IBleTransport, ThermostatAdvertisement } from '../interfaces/ITransport';
import { sleep, withTimeout } from '../utils/timing';
import { normalizeUuid, sameAddress } from './gattUtils';

type NodeBleModule = typeof import('node-ble');
type Bluetooth = ReturnType<NodeBleModule['createBluetooth']>['bluetooth'];
type Adapter = Awaited<ReturnType<Bluetooth['defaultAdapter']>>;
type Device = Awaited<ReturnType<Adapter['getDevice']>>;
type GattServer = Awaited<ReturnType<Device['gatt']>>;
type GattService = Awaited<ReturnType<GattServer['getPrimaryService']>>;
type GattCharacteristic = Awaited<ReturnType<GattService['getCharacteristic']>>;

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

const GATT_RETRY_ATTEMPTS = 3;
const GATT_RETRY_DELAY_MS = 500;
const GATT_STABILIZATION_MS = 200;
const POLL_INTERVAL_MS = 1000;

interface NodeBleLink {
  handle: GattHandle;
  device: Device;
  characteristics: Map<string, GattCharacteristic>;
}

function isNotConnected(error: unknown): boolean {
  const text = errorMessage(error);
  return text.includes('NotConnected') || text.includes('Not Connected');
}

export class NodeBleTransport implements IBleTransport {
  readonly name = 'node-ble';

  private destroy: (() => void) | null = null;
  private adapter: Adapter | null = null;
  private readonly links = new Map<string, NodeBleLink>();

  // ─────────────────────────────────────────────────────────────────────────
  // Discovery
  // ─────────────────────────────────────────────────────────────────────────

  async scan(manufacturerId: number, timeoutMs: number): Promise<ThermostatAdvertisement[]> {
    const adapter = await this.getAdapter();
    const found = new Map<string, ThermostatAdvertisement>();

    await this.withDiscovery(adapter, async () => {
      const deadline = Date.now() + timeoutMs;
      while (Date.now() < deadline) {
        for (const address of await adapter.devices()) {
          if (found.has(address)) continue;
          const advertisement = await this.describe(adapter, address, manufacturerId);
          if (advertisement) {
            thermostatLogger.debug(`[NodeBleTransport] Discovered ${address}`, { rssi: advertisement.rssi }, 'DISCOVERY');
            found.set(address, advertisement);
          }
        }
        await sleep(Math.min(POLL_INTERVAL_MS, Math.max(0, deadline - Date.now())));
      }
    });

    return [...found.values()];
  }

  async findDevice(address: string, timeoutMs: number): Promise<ThermostatAdvertisement | null> {
    const adapter = await this.getAdapter();
    let match: ThermostatAdvertisement | null = null;

    await this.withDiscovery(adapter, async () => {
      const deadline = Date.now() + timeoutMs;
      while (Date.now() < deadline && !match) {
        const known = (await adapter.devices()).find((candidate) => sameAddress(candidate, address));
        if (known) {
          match = await this.describe(adapter, known, null);
        } else {
          await sleep(Math.min(POLL_INTERVAL_MS, Math.max(0, deadline - Date.now())));
        }
      }
    });

    return match;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // GATT
  // ─────────────────────────────────────────────────────────────────────────

  async connect(address: string, timeoutMs: number): Promise<GattHandle> {
    const adapter = await this.getAdapter();
    const device = await withTimeout(adapter.waitDevice(address.toUpperCase(), timeoutMs), timeoutMs, `locate ${address}`);

    thermostatLogger.info(`[NodeBleTransport] Connecting to ${address}...`, undefined, 'TRANSPORT');
    try {
      await withTimeout(device.connect(), timeoutMs, `connect ${address}`);
      const gattServer = await this.acquireGattServer(device, address);
      const characteristics = await this.indexCharacteristics(gattServer);

      const handle: GattHandle = { address };
      this.links.set(address, { handle, device, characteristics });
      thermostatLogger.info(`[NodeBleTransport] Connected to ${address}`, { characteristics: characteristics.size }, 'TRANSPORT');
      return handle;
    } catch (error) {
      await this.safeDisconnect(device, address);
      throw error;
    }
  }

  async pair(handle: GattHandle): Promise<void> {
    const { device } = this.requireLink(handle);
    if (await device.isPaired()) {
      thermostatLogger.debug(`[NodeBleTransport] ${handle.address} already paired`, undefined, 'TRANSPORT');
      return;
    }
    await device.pair();
    thermostatLogger.info(`[NodeBleTransport] Paired with ${handle.address}`, undefined, 'TRANSPORT');
  }

  async read(handle: GattHandle, characteristicUuid: string): Promise<Buffer> {
    return this.characteristic(handle, characteristicUuid).readValue();
  }

  async write(handle: GattHandle, characteristicUuid: string, data: Buffer, requireAck: boolean): Promise<void> {
    const characteristic = this.characteristic(handle, characteristicUuid);
    if (requireAck) {
      await characteristic.writeValueWithResponse(data);
    } else {
      await characteristic.writeValueWithoutResponse(data);
    }
  }

  async disconnect(handle: GattHandle): Promise<void> {
    const link = this.links.get(handle.address);
    if (!link || link.handle !== handle) return;
    this.links.delete(handle.address);
    await this.safeDisconnect(link.device, handle.address);
    thermostatLogger.info(`[NodeBleTransport] Disconnected from ${handle.address}`, undefined, 'TRANSPORT');
  }

  negotiatedMtu(handle: GattHandle): number {
    // BlueZ does not expose the negotiated MTU over DBus
    this.requireLink(handle);
    return DEFAULT_MTU;
  }

  onLinkLost(handle: GattHandle, listener: () => void): () => void {
    const { device } = this.requireLink(handle);
    const onDisconnect = (): void => {
      thermostatLogger.warn(`[NodeBleTransport] ${handle.address} disconnected`, undefined, 'TRANSPORT');
      listener();
    };
    device.once('disconnect', onDisconnect);
    return () => {
      device.removeListener('disconnect', onDisconnect);
    };
  }

  /** Release the DBus connection; the transport can be reused afterwards */
  cleanup(): void {
    this.links.clear();
    this.adapter = null;
    if (this.destroy) {
      this.destroy();
      this.destroy = null;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Private Methods
  // ─────────────────────────────────────────────────────────────────────────

  private async getAdapter(): Promise<Adapter> {
    if (this.adapter) return this.adapter;

    let nodeBle: NodeBleModule;
    try {
      nodeBle = require('node-ble');
    } catch (error) {
      throw new TransportError('node-ble is not available on this system', error);
    }

    try {
      const { bluetooth, destroy } = nodeBle.createBluetooth();
      this.destroy = destroy;
      const adapter = await bluetooth.defaultAdapter();
      thermostatLogger.info(`[NodeBleTransport] Adapter: ${await adapter.getName()} (${await adapter.getAddress()})`, undefined, 'TRANSPORT');
      this.adapter = adapter;
      return adapter;
    } catch (error) {
      this.cleanup();
      throw new TransportError(`BlueZ adapter unavailable: ${errorMessage(error)}`, error);
    }
  }

  private async withDiscovery(adapter: Adapter, body: () => Promise<void>): Promise<void> {
    const alreadyDiscovering = await adapter.isDiscovering();
    if (!alreadyDiscovering) {
      await adapter.startDiscovery();
    }
    try {
      await body();
    } finally {
      if (!alreadyDiscovering) {
        try {
          await adapter.stopDiscovery();
        } catch (error) {
          thermostatLogger.warn('[NodeBleTransport] Error stopping discovery', { error: errorMessage(error) }, 'DISCOVERY');
        }
      }
    }
  }

  private async describe(adapter: Adapter, address: string, manufacturerId: number | null): Promise<ThermostatAdvertisement | null> {
    try {
      const device = await adapter.getDevice(address);
      const manufacturerData = await this.manufacturerPayload(device, manufacturerId);
      if (manufacturerId !== null && manufacturerData === null) {
        return null;
      }

      let name: string | null = null;
      try {
        name = await device.getName();
      } catch {
        name = null;
      }

      let rssi: number | null = null;
      try {
        const value = Number(await device.getRSSI());
        rssi = Number.isFinite(value) ? value : null;
      } catch {
        rssi = null;
      }

      return { address, name, rssi, manufacturerData: manufacturerData ?? Buffer.alloc(0) };
    } catch (error) {
      thermostatLogger.debug(`[NodeBleTransport] Error processing device ${address}`, { error: errorMessage(error) }, 'DISCOVERY');
      return null;
    }
  }

  /** BlueZ keys manufacturer data by the decimal company id */
  private async manufacturerPayload(device: Device, manufacturerId: number | null): Promise<Buffer | null> {
    let data: Record<string, unknown>;
    try {
      data = await device.getManufacturerData();
    } catch {
      return null;
    }
    const entries = Object.entries(data);
    const entry = manufacturerId === null ? entries[0] : entries.find(([key]) => Number(key) === manufacturerId);
    if (!entry) return null;
    const value: unknown = entry[1];
    return Buffer.isBuffer(value) ? Buffer.from(value) : null;
  }

  private async acquireGattServer(device: Device, address: string): Promise<GattServer> {
    let lastError: unknown = null;
    for (let attempt = 0; attempt < GATT_RETRY_ATTEMPTS; attempt++) {
      // Wait for BlueZ stabilization
      await sleep(GATT_STABILIZATION_MS);
      try {
        return await device.gatt();
      } catch (error) {
        lastError = error;
        thermostatLogger.warn(`[NodeBleTransport] GATT attempt ${attempt + 1}/${GATT_RETRY_ATTEMPTS} for ${address} failed`, {
          error: errorMessage(error),
        }, 'TRANSPORT');
        if (attempt < GATT_RETRY_ATTEMPTS - 1) {
          await sleep(GATT_RETRY_DELAY_MS);
        }
      }
    }
    throw new TransportError(`Failed to acquire GATT server for ${address}: ${errorMessage(lastError)}`, lastError);
  }

  private async indexCharacteristics(gattServer: GattServer): Promise<Map<string, GattCharacteristic>> {
    const index = new Map<string, GattCharacteristic>();
    for (const serviceUuid of await gattServer.services()) {
      const service = await gattServer.getPrimaryService(serviceUuid);
      for (const characteristicUuid of await service.characteristics()) {
        index.set(normalizeUuid(characteristicUuid), await service.getCharacteristic(characteristicUuid));
      }
    }
    return index;
  }

  private requireLink(handle: GattHandle): NodeBleLink {
    const link = this.links.get(handle.address);
    if (!link || link.handle !== handle) {
      throw new NotReadyError(`No open link to ${handle.address}`);
    }
    return link;
  }

  private characteristic(handle: GattHandle, uuid: string): GattCharacteristic {
    const characteristic = this.requireLink(handle).characteristics.get(normalizeUuid(uuid));
    if (!characteristic) {
      throw new CharacteristicMissingError(uuid, handle.address);
    }
    return characteristic;
  }

  private async safeDisconnect(device: Device, address: string): Promise<void> {
    try {
      await device.disconnect();
    } catch (error) {
      // "Not Connected" is actually success
      if (!isNotConnected(error)) {
        thermostatLogger.debug(`[NodeBleTransport] Disconnect of ${address} failed`, { error: errorMessage(error) }, 'TRANSPORT');
      }
    }
  }
}
