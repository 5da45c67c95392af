/**
 * Mock Thermostat Transport
 * Simulates one thermostat in process for tests and development without a BLE adapter.
 *
 * Behaves like the device where the protocol depends on it:
 * - split characteristics are served as 20-byte frames, the last one flagged
 *   and zero padded, and accept the two-frame write sequence
 * - the calendar day read/written is the one last selected via calendar control,
 *   and writing 0 there commits
 * - the factory reset id reads as 0 unless the device is in pairing mode
 */

import { CHARACTERISTICS, CharacteristicId, DEFAULT_MTU, MANUFACTURER_ID, SPLIT_HEADER } from './ThermostatConstants';
import { CharacteristicMissingError } from './ThermostatErrors';
import { thermostatLogger } from './ThermostatLogger';
import type { CharacteristicValue } from './ThermostatTypes';
import type { GattHandle, IBleTransport, ThermostatAdvertisement } from './interfaces/ITransport';
import { normalizeUuid, sameAddress } from './transports/gattUtils';
import { CALENDAR_DAY_LENGTH, encodeCharacteristic } from './codec';

export type MockOperation = 'scan' | 'connect' | 'pair' | 'read' | 'write' | 'disconnect';

export interface MockThermostatOptions {
  address?: string;
  name?: string;
  factoryResetId?: number;
  pairingMode?: boolean;
}

export interface MockFrame {
  uuid: string;
  data: Buffer;
}

const FRAME_PAYLOAD = 19;

function isCharacteristicId(id: string): id is CharacteristicId {
  return id in CHARACTERISTICS;
}

const ID_BY_UUID = new Map<string, CharacteristicId>();
for (const id of Object.keys(CHARACTERISTICS)) {
  if (isCharacteristicId(id)) {
    ID_BY_UUID.set(normalizeUuid(CHARACTERISTICS[id].uuid), id);
  }
}

function lookupId(uuid: string): CharacteristicId | null {
  return ID_BY_UUID.get(normalizeUuid(uuid)) ?? null;
}

/** Device-side framing: 19 payload bytes per frame, final frame flagged and padded */
export function buildReadFrames(payload: Buffer): Buffer[] {
  const frames: Buffer[] = [];
  const count = Math.max(1, Math.ceil(payload.length / FRAME_PAYLOAD));
  for (let index = 0; index < count; index++) {
    const last = index === count - 1;
    const chunk = payload.subarray(index * FRAME_PAYLOAD, (index + 1) * FRAME_PAYLOAD);
    const frame = Buffer.alloc(last ? 1 + FRAME_PAYLOAD : 1 + chunk.length);
    frame[0] = (index & SPLIT_HEADER.SEQUENCE_MASK) | (last ? SPLIT_HEADER.FINAL : 0);
    chunk.copy(frame, 1);
    frames.push(frame);
  }
  return frames;
}

export class MockThermostatTransport implements IBleTransport {
  readonly name = 'mock';
  readonly address: string;
  readonly deviceName: string;

  factoryResetId: number;
  pairingMode: boolean;
  visible = true;

  /** Every frame written, in order */
  readonly writes: MockFrame[] = [];
  /** Every characteristic read, in order */
  readonly reads: string[] = [];
  connectCount = 0;
  pairCount = 0;
  disconnectCount = 0;
  commitCount = 0;
  /** Last factory reset id written by the client */
  authenticatedWith: number | null = null;

  private readonly values = new Map<CharacteristicId, Buffer>();
  private readonly calendar = new Map<number, Buffer>();
  private readonly pendingFrames = new Map<CharacteristicId, Buffer[]>();
  private readonly failures: Array<{ operation: MockOperation; error: Error }> = [];
  private readonly linkLostListeners = new Set<() => void>();
  private selectedDay = 1;
  private splitWrite: Buffer[] = [];
  private handle: GattHandle | null = null;

  constructor(options: MockThermostatOptions = {}) {
    this.address = options.address ?? 'AA:BB:CC:DD:EE:01';
    this.deviceName = options.name ?? 'Thermostat';
    this.factoryResetId = options.factoryResetId ?? 123456;
    this.pairingMode = options.pairingMode ?? true;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Test controls
  // ─────────────────────────────────────────────────────────────────────────────

  /** Store an encoded characteristic value on the simulated device */
  setCharacteristic(value: CharacteristicValue): void {
    this.setRaw(value.kind, encodeCharacteristic(value));
  }

  setRaw(id: CharacteristicId, data: Buffer): void {
    if (id === 'calendarDay') {
      this.calendar.set(data[0], Buffer.from(data));
      return;
    }
    this.values.set(id, Buffer.from(data));
  }

  getRaw(id: CharacteristicId): Buffer | null {
    const value = id === 'calendarDay' ? this.calendar.get(this.selectedDay) : this.values.get(id);
    return value ? Buffer.from(value) : null;
  }

  calendarRecord(day: number): Buffer | null {
    const record = this.calendar.get(day);
    return record ? Buffer.from(record) : null;
  }

  /** Make the next call of `operation` fail with `error` */
  failNext(operation: MockOperation, error: Error = new Error(`mock ${operation} failure`)): void {
    this.failures.push({ operation, error });
  }

  /** Simulate an unsolicited link loss */
  dropLink(): void {
    if (!this.handle) return;
    this.handle = null;
    for (const listener of [...this.linkLostListeners]) {
      listener();
    }
    this.linkLostListeners.clear();
  }

  get isConnected(): boolean {
    return this.handle !== null;
  }

  writesTo(id: CharacteristicId): Buffer[] {
    const key = normalizeUuid(CHARACTERISTICS[id].uuid);
    return this.writes.filter((frame) => normalizeUuid(frame.uuid) === key).map((frame) => frame.data);
  }

  readCount(id: CharacteristicId): number {
    const key = normalizeUuid(CHARACTERISTICS[id].uuid);
    return this.reads.filter((uuid) => normalizeUuid(uuid) === key).length;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Discovery
  // ─────────────────────────────────────────────────────────────────────────────

  async scan(manufacturerId: number): Promise<ThermostatAdvertisement[]> {
    this.maybeFail('scan');
    if (!this.visible || manufacturerId !== MANUFACTURER_ID) return [];
    return [this.advertisement()];
  }

  async findDevice(address: string): Promise<ThermostatAdvertisement | null> {
    this.maybeFail('scan');
    return this.visible && sameAddress(address, this.address) ? this.advertisement() : null;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // GATT
  // ─────────────────────────────────────────────────────────────────────────────

  async connect(address: string): Promise<GattHandle> {
    this.maybeFail('connect');
    if (!this.visible || !sameAddress(address, this.address)) {
      throw new Error(`Mock: ${address} not reachable`);
    }
    this.connectCount++;
    this.handle = { address };
    thermostatLogger.debug(`[MockTransport] Connected to ${address}`, undefined, 'TRANSPORT');
    return this.handle;
  }

  async pair(handle: GattHandle): Promise<void> {
    this.requireHandle(handle);
    this.maybeFail('pair');
    this.pairCount++;
  }

  async read(handle: GattHandle, characteristicUuid: string): Promise<Buffer> {
    this.requireHandle(handle);
    this.maybeFail('read');
    this.reads.push(characteristicUuid);

    const id = lookupId(characteristicUuid);
    if (id === null) {
      throw new Error(`Mock: unknown characteristic ${characteristicUuid}`);
    }
    if (id === 'factoryResetId') {
      const data = Buffer.alloc(4);
      data.writeUInt32LE(this.pairingMode ? this.factoryResetId : 0, 0);
      return data;
    }
    if (CHARACTERISTICS[id].transfer === 'split') {
      return this.nextFrame(id);
    }
    const value = this.values.get(id);
    if (!value) {
      throw new CharacteristicMissingError(characteristicUuid, handle.address);
    }
    return Buffer.from(value);
  }

  async write(handle: GattHandle, characteristicUuid: string, data: Buffer): Promise<void> {
    this.requireHandle(handle);
    this.maybeFail('write');
    this.writes.push({ uuid: characteristicUuid, data: Buffer.from(data) });

    const id = lookupId(characteristicUuid);
    if (id === null) {
      throw new Error(`Mock: unknown characteristic ${characteristicUuid}`);
    }
    switch (id) {
      case 'factoryResetId':
        this.authenticatedWith = data.readUInt32LE(0);
        return;
      case 'calendarControl':
        if (data[0] === 0) {
          this.commitCount++;
        } else {
          this.selectedDay = data[0];
          this.pendingFrames.delete('calendarDay');
        }
        return;
      case 'calendarDay':
        this.receiveSplitFrame(data);
        return;
      default:
        this.values.set(id, Buffer.from(data));
    }
  }

  async disconnect(handle: GattHandle): Promise<void> {
    this.maybeFail('disconnect');
    if (this.handle !== handle) return;
    this.handle = null;
    this.linkLostListeners.clear();
    this.disconnectCount++;
  }

  negotiatedMtu(handle: GattHandle): number {
    this.requireHandle(handle);
    return DEFAULT_MTU;
  }

  onLinkLost(handle: GattHandle, listener: () => void): () => void {
    this.requireHandle(handle);
    this.linkLostListeners.add(listener);
    return () => {
      this.linkLostListeners.delete(listener);
    };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Private Methods
  // ─────────────────────────────────────────────────────────────────────────────

  private advertisement(): ThermostatAdvertisement {
    return {
      address: this.address,
      name: this.deviceName,
      rssi: -60,
      manufacturerData: Buffer.from(`${this.deviceName};${this.pairingMode ? 1 : 0};0`, 'ascii'),
    };
  }

  private nextFrame(id: CharacteristicId): Buffer {
    let frames = this.pendingFrames.get(id);
    if (!frames || frames.length === 0) {
      const payload = id === 'calendarDay'
        ? this.calendar.get(this.selectedDay) ?? Buffer.from([this.selectedDay])
        : this.values.get(id) ?? Buffer.alloc(0);
      frames = payload.length === 0 ? [Buffer.alloc(0)] : buildReadFrames(payload);
      this.pendingFrames.set(id, frames);
    }
    const frame = frames.shift();
    return frame ? Buffer.from(frame) : Buffer.alloc(0);
  }

  private receiveSplitFrame(frame: Buffer): void {
    if (frame[0] === SPLIT_HEADER.FIRST_WRITE) {
      this.splitWrite = [];
    }
    this.splitWrite.push(frame.subarray(1));
    if ((frame[0] & SPLIT_HEADER.FINAL) === 0) return;

    const record = Buffer.concat(this.splitWrite);
    this.splitWrite = [];
    if (record.length !== CALENDAR_DAY_LENGTH || record[0] !== this.selectedDay) {
      throw new Error(`Mock: rejected calendar record for day ${record[0]} (selected ${this.selectedDay})`);
    }
    this.calendar.set(this.selectedDay, record);
  }

  private requireHandle(handle: GattHandle): void {
    if (this.handle !== handle) {
      throw new Error(`Mock: link to ${handle.address} is not open`);
    }
  }

  private maybeFail(operation: MockOperation): void {
    const index = this.failures.findIndex((failure) => failure.operation === operation);
    if (index === -1) return;
    const [failure] = this.failures.splice(index, 1);
    throw failure.error;
  }
}
