/**
 * BLE Transport Interfaces
 * Platform-agnostic boundary between the thermostat core and the BLE stack
 */

// ─────────────────────────────────────────────────────────────────────────────
// GATT Transport
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Opaque link handle. Only the transport that issued it may interpret it;
 * once any operation on it fails at link level it must not be used again.
 */
export interface GattHandle {
  readonly address: string;
}

export interface IGattTransport {
  readonly name: string;

  connect(address: string, timeoutMs: number): Promise<GattHandle>;
  pair(handle: GattHandle): Promise<void>;
  read(handle: GattHandle, characteristicUuid: string): Promise<Buffer>;
  write(handle: GattHandle, characteristicUuid: string, data: Buffer, requireAck: boolean): Promise<void>;
  disconnect(handle: GattHandle): Promise<void>;
  negotiatedMtu(handle: GattHandle): number;

  /** Subscribe to unsolicited link loss; returns an unsubscribe function */
  onLinkLost(handle: GattHandle, listener: () => void): () => void;
}

// ─────────────────────────────────────────────────────────────────────────────
// Discovery
// ─────────────────────────────────────────────────────────────────────────────

export interface ThermostatAdvertisement {
  address: string;
  name: string | null;
  rssi: number | null;
  /** Manufacturer-specific payload without the 2-byte company identifier */
  manufacturerData: Buffer;
}

export interface IDiscovery {
  /** Collect advertisements carrying the given company identifier */
  scan(manufacturerId: number, timeoutMs: number): Promise<ThermostatAdvertisement[]>;

  /** Locate one device by its link address; null when it is not visible */
  findDevice(address: string, timeoutMs: number): Promise<ThermostatAdvertisement | null>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Credential Store
// ─────────────────────────────────────────────────────────────────────────────

export interface ICredentialStore {
  load(address: string): Promise<number | null>;
  save(address: string, factoryResetId: number): Promise<void>;
  remove(address: string): Promise<void>;
}

/** A transport that also provides discovery (both concrete BLE stacks do) */
export type IBleTransport = IGattTransport & IDiscovery;
